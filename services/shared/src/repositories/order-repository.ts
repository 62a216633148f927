import { PoolClient } from 'pg';
import {
     isOrderStatus,
     isPaymentMethod,
     isPaymentStatus,
     isShippingStatus,
     Order,
     OrderDraft,
     OrderItem,
     Pagination,
     Shipper,
} from '../types/order.types';
import { logger } from '../utils/logger';
import { rethrowUniqueViolation } from './pg-errors';

export interface OrderRepository {
     /** Writes the order and all of its items; returns the order with item ids. */
     insert(order: OrderDraft): Promise<Order>;
     /** Single joined read of the order and its items. */
     findByCode(orderCode: string): Promise<Order | null>;
     findById(id: string): Promise<Order | null>;
     existsByCode(orderCode: string): Promise<boolean>;
     /** Most recently updated first. */
     list(page: Pagination): Promise<Order[]>;
     /** Persists the mutable status fields of an existing order. */
     update(order: Order): Promise<void>;
}

export interface OrderWithItemRow {
     id: string;
     order_code: string;
     customer_id: string;
     customer_name: string;
     customer_phone: string;
     customer_email: string | null;
     subtotal: number;
     shipping_fee: number;
     discount: number;
     total_amount: number;
     currency: string;
     payment_method: string;
     payment_status: string;
     shipping_order_code: string | null;
     shipping_status: string;
     receiver_name: string;
     receiver_phone: string;
     receiver_address: string;
     shipper: Shipper | null;
     estimated_delivery_time: Date | null;
     delivered_at: Date | null;
     failed_reason: string | null;
     order_status: string;
     created_at: Date;
     updated_at: Date;
     item_id: number | null;
     item_product_id: string | null;
     item_product_name: string | null;
     item_quantity: number | null;
     item_unit_price: number | null;
     item_total_price: number | null;
}

const ORDER_COLUMNS = `
        o.id, o.order_code, o.customer_id, o.customer_name, o.customer_phone, o.customer_email,
        o.subtotal, o.shipping_fee, o.discount, o.total_amount, o.currency,
        o.payment_method, o.payment_status,
        o.shipping_order_code, o.shipping_status, o.receiver_name, o.receiver_phone,
        o.receiver_address, o.shipper, o.estimated_delivery_time, o.delivered_at, o.failed_reason,
        o.order_status, o.created_at, o.updated_at,
        i.id AS item_id, i.product_id AS item_product_id, i.product_name AS item_product_name,
        i.quantity AS item_quantity, i.unit_price AS item_unit_price, i.total_price AS item_total_price`;

function toOrder(row: OrderWithItemRow): Order {
     if (
          !isOrderStatus(row.order_status) ||
          !isShippingStatus(row.shipping_status) ||
          !isPaymentMethod(row.payment_method) ||
          !isPaymentStatus(row.payment_status)
     ) {
          logger.warn(
               {
                    orderCode: row.order_code,
                    orderStatus: row.order_status,
                    shippingStatus: row.shipping_status,
                    paymentMethod: row.payment_method,
                    paymentStatus: row.payment_status,
               },
               'Order row holds an unknown status value'
          );
     }

     return {
          id: row.id,
          orderCode: row.order_code,
          customer: {
               customerId: row.customer_id,
               name: row.customer_name,
               phone: row.customer_phone,
               email: row.customer_email,
          },
          items: [],
          pricing: {
               subtotal: row.subtotal,
               shippingFee: row.shipping_fee,
               discount: row.discount,
               totalAmount: row.total_amount,
               currency: row.currency,
          },
          shipping: {
               shippingOrderCode: row.shipping_order_code,
               status: isShippingStatus(row.shipping_status) ? row.shipping_status : 'NOT_CREATED',
               address: {
                    receiverName: row.receiver_name,
                    receiverPhone: row.receiver_phone,
                    fullAddress: row.receiver_address,
               },
               shipper: row.shipper,
               estimatedDeliveryTime: row.estimated_delivery_time,
               deliveredAt: row.delivered_at,
               failedReason: row.failed_reason,
          },
          orderStatus: isOrderStatus(row.order_status) ? row.order_status : 'CONFIRMED',
          paymentMethod: isPaymentMethod(row.payment_method) ? row.payment_method : 'COD',
          paymentStatus: isPaymentStatus(row.payment_status) ? row.payment_status : 'PENDING',
          createdAt: row.created_at,
          updatedAt: row.updated_at,
     };
}

function toItem(row: OrderWithItemRow): OrderItem | null {
     if (row.item_id === null) {
          return null;
     }
     return {
          id: row.item_id,
          productId: row.item_product_id ?? '',
          productName: row.item_product_name ?? '',
          quantity: row.item_quantity ?? 0,
          unitPrice: row.item_unit_price ?? 0,
          totalPrice: row.item_total_price ?? 0,
     };
}

/**
 * Folds joined order/item rows back into aggregates, keeping the row order.
 */
export function groupOrderRows(rows: OrderWithItemRow[]): Order[] {
     const orders = new Map<string, Order>();
     for (const row of rows) {
          let order = orders.get(row.id);
          if (!order) {
               order = toOrder(row);
               orders.set(row.id, order);
          }
          const item = toItem(row);
          if (item) {
               order.items.push(item);
          }
     }
     return [...orders.values()];
}

export class PgOrderRepository implements OrderRepository {
     constructor(private readonly client: PoolClient) {}

     async insert(order: OrderDraft): Promise<Order> {
          try {
               await this.client.query(
                    `
        INSERT INTO orders (
          id, order_code, customer_id, customer_name, customer_phone, customer_email,
          subtotal, shipping_fee, discount, total_amount, currency,
          payment_method, payment_status,
          shipping_order_code, shipping_status, receiver_name, receiver_phone, receiver_address,
          shipper, estimated_delivery_time, delivered_at, failed_reason,
          order_status, created_at, updated_at
        ) VALUES (
          $1, $2, $3, $4, $5, $6,
          $7, $8, $9, $10, $11,
          $12, $13,
          $14, $15, $16, $17, $18,
          $19::jsonb, $20, $21, $22,
          $23, $24, $25
        )
      `,
                    [
                         order.id,
                         order.orderCode,
                         order.customer.customerId,
                         order.customer.name,
                         order.customer.phone,
                         order.customer.email,
                         order.pricing.subtotal,
                         order.pricing.shippingFee,
                         order.pricing.discount,
                         order.pricing.totalAmount,
                         order.pricing.currency,
                         order.paymentMethod,
                         order.paymentStatus,
                         order.shipping.shippingOrderCode,
                         order.shipping.status,
                         order.shipping.address.receiverName,
                         order.shipping.address.receiverPhone,
                         order.shipping.address.fullAddress,
                         order.shipping.shipper ? JSON.stringify(order.shipping.shipper) : null,
                         order.shipping.estimatedDeliveryTime,
                         order.shipping.deliveredAt,
                         order.shipping.failedReason,
                         order.orderStatus,
                         order.createdAt,
                         order.updatedAt,
                    ]
               );
          } catch (error) {
               rethrowUniqueViolation(error);
          }

          if (order.items.length === 0) {
               return { ...order, items: [] };
          }

          const values: unknown[] = [];
          const tuples = order.items.map((item, index) => {
               const base = index * 6;
               values.push(
                    order.id,
                    item.productId,
                    item.productName,
                    item.quantity,
                    item.unitPrice,
                    item.totalPrice
               );
               return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`;
          });

          const { rows } = await this.client.query<{ id: number }>(
               `
      INSERT INTO order_items (order_id, product_id, product_name, quantity, unit_price, total_price)
      VALUES ${tuples.join(', ')}
      RETURNING id
    `,
               values
          );

          return {
               ...order,
               items: order.items.map((item, index) => ({ ...item, id: rows[index].id })),
          };
     }

     async findByCode(orderCode: string): Promise<Order | null> {
          const { rows } = await this.client.query<OrderWithItemRow>(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders o
      LEFT JOIN order_items i ON i.order_id = o.id
      WHERE o.order_code = $1
      ORDER BY i.id
    `,
               [orderCode]
          );
          return groupOrderRows(rows)[0] ?? null;
     }

     async findById(id: string): Promise<Order | null> {
          const { rows } = await this.client.query<OrderWithItemRow>(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders o
      LEFT JOIN order_items i ON i.order_id = o.id
      WHERE o.id = $1
      ORDER BY i.id
    `,
               [id]
          );
          return groupOrderRows(rows)[0] ?? null;
     }

     async existsByCode(orderCode: string): Promise<boolean> {
          const { rows } = await this.client.query<{ exists: boolean }>(
               `SELECT EXISTS (SELECT 1 FROM orders WHERE order_code = $1) AS exists`,
               [orderCode]
          );
          return rows[0]?.exists === true;
     }

     async list(page: Pagination): Promise<Order[]> {
          const { rows } = await this.client.query<OrderWithItemRow>(
               `
      WITH page AS (
        SELECT * FROM orders
        ORDER BY updated_at DESC, id
        OFFSET $1 LIMIT $2
      )
      SELECT ${ORDER_COLUMNS}
      FROM page o
      LEFT JOIN order_items i ON i.order_id = o.id
      ORDER BY o.updated_at DESC, o.id, i.id
    `,
               [page.skip, page.limit]
          );
          return groupOrderRows(rows);
     }

     async update(order: Order): Promise<void> {
          await this.client.query(
               `
      UPDATE orders
      SET order_status = $1,
          payment_status = $2,
          shipping_status = $3,
          shipping_order_code = $4,
          shipper = $5::jsonb,
          estimated_delivery_time = $6,
          delivered_at = $7,
          failed_reason = $8,
          updated_at = $9
      WHERE id = $10
    `,
               [
                    order.orderStatus,
                    order.paymentStatus,
                    order.shipping.status,
                    order.shipping.shippingOrderCode,
                    order.shipping.shipper ? JSON.stringify(order.shipping.shipper) : null,
                    order.shipping.estimatedDeliveryTime,
                    order.shipping.deliveredAt,
                    order.shipping.failedReason,
                    order.updatedAt,
                    order.id,
               ]
          );
     }
}
