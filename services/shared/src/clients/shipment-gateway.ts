import { z } from 'zod';
import type { ShipmentConfig } from '../config/config';
import {
     isOrderStatus,
     isShippingStatus,
     OrderDraft,
     OrderStatus,
     Shipper,
     ShippingStatus,
} from '../types/order.types';
import { parseAddress } from '../services/address-parser';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger({ component: 'shipment-gateway' });

/**
 * Every gateway call resolves to exactly one of these; nothing is thrown.
 */
export type ShipmentOutcome<T> =
     | { kind: 'success'; response: T }
     | { kind: 'failure'; statusCode: number; body: string }
     | { kind: 'timeout'; timeoutMs: number }
     | { kind: 'transport_error'; message: string };

export interface ShipmentCreated {
     shippingOrderCode: string | null;
     status: ShippingStatus | null;
     shipper: Shipper | null;
     estimatedDeliveryTime: Date | null;
     orderStatus: OrderStatus | null;
}

export interface ShipmentStatusChanged {
     statusCode: number;
}

export interface ShipmentGateway {
     createShipment(order: OrderDraft): Promise<ShipmentOutcome<ShipmentCreated>>;
     cancelShipment(orderCode: string): Promise<ShipmentOutcome<ShipmentStatusChanged>>;
}

export interface ShipmentItemPayload {
     productId: number;
     productName: string;
     productSku: string;
     quantity: number;
     unitPrice: number;
}

export interface ShipmentPayload {
     orderCode: string;
     senderName: string;
     senderPhone: string;
     senderAddress: string;
     senderCity: string;
     senderDistrict: string;
     senderWard: string;
     receiverName: string;
     receiverPhone: string;
     receiverAddress: string;
     receiverCity: string;
     receiverDistrict: string;
     receiverWard: string;
     packageWeight: number;
     packageLength: number;
     packageWidth: number;
     packageHeight: number;
     packageValue: number;
     packageDescription: string;
     shippingFee: number;
     codAmount: number;
     estimatedPickupTime: string | null;
     estimatedDeliveryTime: string | null;
     actualPickupTime: string | null;
     actualDeliveryTime: string | null;
     carrierCode: string;
     serviceType: string;
     createdBy: string;
     items: ShipmentItemPayload[];
}

export const ITEM_WEIGHT_KG = 0.5;
export const MIN_PACKAGE_WEIGHT_KG = 1.0;
const DEFAULT_PACKAGE_DIMENSION_CM = 10.0;

export function calculatePackageWeight(items: ReadonlyArray<{ quantity: number }>): number {
     const total = items.reduce((sum, item) => sum + item.quantity * ITEM_WEIGHT_KG, 0);
     return Math.max(total, MIN_PACKAGE_WEIGHT_KG);
}

// The provider only takes numeric product ids
function toProviderProductId(productId: string): number {
     return /^\d+$/.test(productId) ? Number(productId) : 0;
}

export function buildShipmentPayload(order: OrderDraft): ShipmentPayload {
     const { customer, shipping, pricing } = order;
     const address = shipping.address.fullAddress;
     const parsed = parseAddress(address);

     return {
          orderCode: order.orderCode,
          // The customer ships to themselves unless a receiver was given
          senderName: customer.name,
          senderPhone: customer.phone,
          senderAddress: address,
          senderCity: parsed.city,
          senderDistrict: parsed.district,
          senderWard: parsed.ward,
          receiverName: shipping.address.receiverName,
          receiverPhone: shipping.address.receiverPhone,
          receiverAddress: address,
          receiverCity: parsed.city,
          receiverDistrict: parsed.district,
          receiverWard: parsed.ward,
          packageWeight: calculatePackageWeight(order.items),
          packageLength: DEFAULT_PACKAGE_DIMENSION_CM,
          packageWidth: DEFAULT_PACKAGE_DIMENSION_CM,
          packageHeight: DEFAULT_PACKAGE_DIMENSION_CM,
          packageValue: pricing.subtotal,
          packageDescription: order.items
               .map((item) => `${item.productName} x${item.quantity}`)
               .join(', '),
          shippingFee: pricing.shippingFee,
          codAmount: order.paymentMethod === 'COD' ? pricing.totalAmount : 0,
          estimatedPickupTime: null,
          estimatedDeliveryTime: shipping.estimatedDeliveryTime?.toISOString() ?? null,
          actualPickupTime: null,
          actualDeliveryTime: shipping.deliveredAt?.toISOString() ?? null,
          carrierCode: '',
          serviceType: 'STANDARD',
          createdBy: customer.customerId,
          items: order.items.map((item) => ({
               productId: toProviderProductId(item.productId),
               productName: item.productName,
               productSku: item.productId,
               quantity: item.quantity,
               unitPrice: item.unitPrice,
          })),
     };
}

const providerShipperSchema = z.object({
     shipperId: z.coerce.string().nullish(),
     name: z.string().nullish(),
     phone: z.string().nullish(),
     vehicleType: z.string().nullish(),
});

const createShipmentResponseSchema = z.object({
     shippingOrderCode: z.coerce.string().nullish(),
     status: z.string().nullish(),
     shipper: providerShipperSchema.nullish(),
     estimatedDeliveryTime: z.string().nullish(),
     orderStatus: z.string().nullish(),
});

type CreateShipmentResponse = z.infer<typeof createShipmentResponseSchema>;

const PROVIDER_STATUS_MAP: Record<string, ShippingStatus> = {
     PENDING: 'CREATED',
     IN_TRANSIT: 'DELIVERING',
     OUT_FOR_DELIVERY: 'DELIVERING',
     RETURNED: 'FAILED',
};

/** Maps the provider's status vocabulary onto ours; a shipment that exists is at least CREATED. */
export function mapProviderShippingStatus(raw: string): ShippingStatus {
     const status = raw.trim().toUpperCase();
     if (isShippingStatus(status)) {
          return status;
     }
     return PROVIDER_STATUS_MAP[status] ?? 'CREATED';
}

function parseProviderDate(raw: string, orderCode: string): Date | null {
     const parsed = new Date(raw);
     if (Number.isNaN(parsed.getTime())) {
          log.warn({ orderCode, value: raw }, 'Failed to parse estimatedDeliveryTime from shipment API');
          return null;
     }
     return parsed;
}

function toShipmentCreated(body: CreateShipmentResponse, orderCode: string): ShipmentCreated {
     const orderStatus = body.orderStatus ? body.orderStatus.trim().toUpperCase() : null;
     if (orderStatus !== null && !isOrderStatus(orderStatus)) {
          log.debug({ orderCode, orderStatus }, 'Ignoring unknown order status from shipment API');
     }

     return {
          shippingOrderCode: body.shippingOrderCode || null,
          status: body.status ? mapProviderShippingStatus(body.status) : null,
          shipper: body.shipper ?? null,
          estimatedDeliveryTime: body.estimatedDeliveryTime
               ? parseProviderDate(body.estimatedDeliveryTime, orderCode)
               : null,
          orderStatus: orderStatus !== null && isOrderStatus(orderStatus) ? orderStatus : null,
     };
}

// AbortSignal.timeout rejects with a DOMException, which may come from another realm
function isTimeout(error: unknown): boolean {
     return (
          typeof error === 'object' &&
          error !== null &&
          'name' in error &&
          (error.name === 'TimeoutError' || error.name === 'AbortError')
     );
}

export class ShipmentHttpGateway implements ShipmentGateway {
     private readonly baseUrl: string;

     constructor(
          baseUrl: string,
          private readonly timeoutMs: number
     ) {
          this.baseUrl = baseUrl.replace(/\/+$/, '');
     }

     async createShipment(order: OrderDraft): Promise<ShipmentOutcome<ShipmentCreated>> {
          const url = `${this.baseUrl}/api/shipments`;
          const orderCode = order.orderCode;

          try {
               const payload = buildShipmentPayload(order);
               log.info({ orderCode, url }, 'Sending order to shipment API');
               log.debug({ orderCode, payload }, 'Shipment API request payload');

               const response = await fetch(url, {
                    method: 'POST',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify(payload),
                    signal: AbortSignal.timeout(this.timeoutMs),
               });
               const text = await response.text();

               log.info({ orderCode, status: response.status }, 'Shipment API responded');

               if (response.status !== 200 && response.status !== 201) {
                    log.error(
                         { orderCode, status: response.status, body: text.slice(0, 500) },
                         'Shipment API rejected order'
                    );
                    return { kind: 'failure', statusCode: response.status, body: text };
               }

               let json: unknown;
               try {
                    json = JSON.parse(text);
               } catch (parseError) {
                    log.error(
                         { orderCode, err: parseError, body: text.slice(0, 200) },
                         'Shipment API returned a malformed body'
                    );
                    return { kind: 'failure', statusCode: response.status, body: text };
               }

               const parsed = createShipmentResponseSchema.safeParse(json);
               if (!parsed.success) {
                    log.error(
                         { orderCode, issues: parsed.error.issues },
                         'Shipment API response does not match the expected shape'
                    );
                    return { kind: 'failure', statusCode: response.status, body: text };
               }

               log.info({ orderCode }, 'Shipment created');
               return { kind: 'success', response: toShipmentCreated(parsed.data, orderCode) };
          } catch (error) {
               return this.classifyError(error, orderCode, 'create');
          }
     }

     async cancelShipment(orderCode: string): Promise<ShipmentOutcome<ShipmentStatusChanged>> {
          const url = `${this.baseUrl}/api/shipments/${encodeURIComponent(orderCode)}/status`;

          try {
               log.info({ orderCode, url }, 'Cancelling shipment');

               const response = await fetch(url, {
                    method: 'PUT',
                    headers: { 'Content-Type': 'application/json' },
                    body: JSON.stringify({ status: 'CANCELLED' }),
                    signal: AbortSignal.timeout(this.timeoutMs),
               });
               const text = await response.text();

               if (![200, 201, 204].includes(response.status)) {
                    log.error(
                         { orderCode, status: response.status, body: text.slice(0, 500) },
                         'Shipment API rejected cancellation'
                    );
                    return { kind: 'failure', statusCode: response.status, body: text };
               }

               log.info({ orderCode, status: response.status }, 'Shipment cancelled');
               return { kind: 'success', response: { statusCode: response.status } };
          } catch (error) {
               return this.classifyError(error, orderCode, 'cancel');
          }
     }

     private classifyError(
          error: unknown,
          orderCode: string,
          operation: 'create' | 'cancel'
     ): { kind: 'timeout'; timeoutMs: number } | { kind: 'transport_error'; message: string } {
          if (isTimeout(error)) {
               log.error({ orderCode, operation, timeoutMs: this.timeoutMs }, 'Shipment API timed out');
               return { kind: 'timeout', timeoutMs: this.timeoutMs };
          }
          const message = error instanceof Error ? error.message : String(error);
          log.error({ orderCode, operation, err: error }, 'Shipment API request failed');
          return { kind: 'transport_error', message };
     }
}

export class ShipmentMockGateway implements ShipmentGateway {
     async createShipment(order: OrderDraft): Promise<ShipmentOutcome<ShipmentCreated>> {
          log.debug({ orderCode: order.orderCode }, 'Mock shipment create');

          // Simulate latency
          await new Promise((resolve) => setTimeout(resolve, 50 + Math.random() * 100));

          const estimatedDeliveryTime = new Date(Date.now() + 3 * 24 * 60 * 60 * 1000);

          return {
               kind: 'success',
               response: {
                    shippingOrderCode: `SHP-${order.orderCode}`,
                    status: 'CREATED',
                    shipper: null,
                    estimatedDeliveryTime,
                    orderStatus: null,
               },
          };
     }

     async cancelShipment(orderCode: string): Promise<ShipmentOutcome<ShipmentStatusChanged>> {
          log.debug({ orderCode }, 'Mock shipment cancel');

          await new Promise((resolve) => setTimeout(resolve, 50 + Math.random() * 100));

          return { kind: 'success', response: { statusCode: 200 } };
     }
}

export function createShipmentGateway(config: ShipmentConfig): ShipmentGateway {
     if (config.clientType === 'mock') {
          log.info('Using mock shipment gateway');
          return new ShipmentMockGateway();
     }

     if (!config.baseUrl) {
          throw new Error('SHIPMENT_API_URL must be set for the http shipment gateway');
     }

     log.info({ baseUrl: config.baseUrl, timeoutMs: config.timeoutMs }, 'Using HTTP shipment gateway');
     return new ShipmentHttpGateway(config.baseUrl, config.timeoutMs);
}
