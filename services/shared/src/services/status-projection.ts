import type { Order, OrderStatusPatch, Shipper } from '../types/order.types';

export type StatusPatchField = keyof OrderStatusPatch;

export interface ProjectionResult {
     order: Order;
     changed: StatusPatchField[];
}

function sameDate(a: Date | null, b: Date): boolean {
     return a !== null && a.getTime() === b.getTime();
}

function sameShipper(a: Shipper | null, b: Shipper): boolean {
     if (a === null) {
          return false;
     }
     return (
          (a.shipperId ?? null) === (b.shipperId ?? null) &&
          (a.name ?? null) === (b.name ?? null) &&
          (a.phone ?? null) === (b.phone ?? null) &&
          (a.vehicleType ?? null) === (b.vehicleType ?? null)
     );
}

/**
 * Applies the non-null fields of a sparse status patch to an order.
 * Plain assignment, so applying the same patch twice yields the same order;
 * updatedAt only moves when at least one field actually changed.
 */
export function applyStatusPatch(order: Order, patch: OrderStatusPatch, now: Date): ProjectionResult {
     const changed: StatusPatchField[] = [];
     const shipping = { ...order.shipping };
     let { orderStatus, paymentStatus } = order;

     if (patch.orderStatus != null && patch.orderStatus !== orderStatus) {
          orderStatus = patch.orderStatus;
          changed.push('orderStatus');
     }
     if (patch.paymentStatus != null && patch.paymentStatus !== paymentStatus) {
          paymentStatus = patch.paymentStatus;
          changed.push('paymentStatus');
     }
     if (patch.shippingStatus != null && patch.shippingStatus !== shipping.status) {
          shipping.status = patch.shippingStatus;
          changed.push('shippingStatus');
     }
     if (patch.shippingOrderCode != null && patch.shippingOrderCode !== shipping.shippingOrderCode) {
          shipping.shippingOrderCode = patch.shippingOrderCode;
          changed.push('shippingOrderCode');
     }
     if (patch.shipper != null && !sameShipper(shipping.shipper, patch.shipper)) {
          shipping.shipper = { ...patch.shipper };
          changed.push('shipper');
     }
     if (
          patch.estimatedDeliveryTime != null &&
          !sameDate(shipping.estimatedDeliveryTime, patch.estimatedDeliveryTime)
     ) {
          shipping.estimatedDeliveryTime = patch.estimatedDeliveryTime;
          changed.push('estimatedDeliveryTime');
     }
     if (patch.deliveredAt != null && !sameDate(shipping.deliveredAt, patch.deliveredAt)) {
          shipping.deliveredAt = patch.deliveredAt;
          changed.push('deliveredAt');
     }
     if (patch.failedReason != null && patch.failedReason !== shipping.failedReason) {
          shipping.failedReason = patch.failedReason;
          changed.push('failedReason');
     }

     if (changed.length === 0) {
          return { order, changed };
     }

     return {
          order: { ...order, orderStatus, paymentStatus, shipping, updatedAt: now },
          changed,
     };
}
