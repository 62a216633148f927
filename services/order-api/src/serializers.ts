import type { Order } from '@order-service/shared/src/types/order.types';
import type { Product } from '@order-service/shared/src/types/product.types';

function iso(value: Date | null): string | null {
     return value ? value.toISOString() : null;
}

export function serializeOrder(order: Order) {
     return {
          id: order.id,
          orderCode: order.orderCode,
          customer: { ...order.customer },
          items: order.items.map((item) => ({
               id: item.id,
               productId: item.productId,
               productName: item.productName,
               quantity: item.quantity,
               unitPrice: item.unitPrice,
               totalPrice: item.totalPrice,
          })),
          pricing: {
               subTotal: order.pricing.subtotal,
               shippingFee: order.pricing.shippingFee,
               discount: order.pricing.discount,
               totalAmount: order.pricing.totalAmount,
               currency: order.pricing.currency,
          },
          shipping: {
               shippingOrderCode: order.shipping.shippingOrderCode,
               status: order.shipping.status,
               address: { ...order.shipping.address },
               shipper: order.shipping.shipper ? { ...order.shipping.shipper } : null,
               estimatedDeliveryTime: iso(order.shipping.estimatedDeliveryTime),
               deliveredAt: iso(order.shipping.deliveredAt),
               failedReason: order.shipping.failedReason,
          },
          orderStatus: order.orderStatus,
          paymentMethod: order.paymentMethod,
          paymentStatus: order.paymentStatus,
          createdAt: order.createdAt.toISOString(),
          updatedAt: order.updatedAt.toISOString(),
     };
}

export type OrderResponse = ReturnType<typeof serializeOrder>;

export function serializeProduct(product: Product) {
     return {
          id: product.id,
          name: product.name,
          description: product.description,
          price: product.price,
          currency: product.currency,
          stock: product.stock,
          status: product.status,
          createdAt: product.createdAt.toISOString(),
          updatedAt: product.updatedAt.toISOString(),
     };
}
