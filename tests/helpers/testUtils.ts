import type {
     ShipmentCreated,
     ShipmentGateway,
     ShipmentOutcome,
     ShipmentStatusChanged,
} from '@order-service/shared/src/clients/shipment-gateway';
import type { OrderWorkflowConfig } from '@order-service/shared/src/config/config';
import type { OrderRepository } from '@order-service/shared/src/repositories/order-repository';
import type { ProductRepository } from '@order-service/shared/src/repositories/product-repository';
import type { Repositories, UnitOfWork } from '@order-service/shared/src/repositories/unit-of-work';
import type { OrderCodeGenerator } from '@order-service/shared/src/services/order-code-generator';
import type {
     Order,
     OrderDraft,
     OrderItem,
     Pagination,
} from '@order-service/shared/src/types/order.types';
import type { Product } from '@order-service/shared/src/types/product.types';
import { UniqueViolationError } from '@order-service/shared/src/utils/errors';

/**
 * Test utilities: an in-process stand-in for the database and the shipment provider
 */

export const TEST_WORKFLOW_CONFIG: OrderWorkflowConfig = {
     maxOrderCodeAttempts: 5,
     defaultCurrency: 'VND',
     defaultReceiverAddress: 'Ho Chi Minh City, Vietnam',
};

export const FIXED_NOW = new Date('2024-01-15T09:30:12.000Z');

function cloneDate(value: Date | null): Date | null {
     return value ? new Date(value.getTime()) : null;
}

export function cloneProduct(product: Product): Product {
     return {
          ...product,
          createdAt: new Date(product.createdAt.getTime()),
          updatedAt: new Date(product.updatedAt.getTime()),
     };
}

export function cloneOrder(order: Order): Order {
     return {
          ...order,
          customer: { ...order.customer },
          items: order.items.map((item) => ({ ...item })),
          pricing: { ...order.pricing },
          shipping: {
               ...order.shipping,
               address: { ...order.shipping.address },
               shipper: order.shipping.shipper ? { ...order.shipping.shipper } : null,
               estimatedDeliveryTime: cloneDate(order.shipping.estimatedDeliveryTime),
               deliveredAt: cloneDate(order.shipping.deliveredAt),
          },
          createdAt: new Date(order.createdAt.getTime()),
          updatedAt: new Date(order.updatedAt.getTime()),
     };
}

function byRecentUpdate(a: { updatedAt: Date; id: string }, b: { updatedAt: Date; id: string }) {
     const diff = b.updatedAt.getTime() - a.updatedAt.getTime();
     return diff !== 0 ? diff : a.id.localeCompare(b.id);
}

function paginate<T>(rows: T[], page: Pagination): T[] {
     return rows.slice(page.skip, page.skip + page.limit);
}

export interface InMemoryStoreHooks {
     /** Runs before an order insert; throw to simulate a storage failure. */
     beforeOrderInsert?: (order: OrderDraft) => void;
}

/**
 * Keeps orders and products in maps. Each unit of work records an undo log and
 * replays it when the callback throws, so a failed unit leaves nothing behind.
 * The order code is unique, like the uq_order_code constraint.
 */
export class InMemoryStore implements UnitOfWork {
     readonly products = new Map<string, Product>();
     readonly orders = new Map<string, Order>();
     readonly hooks: InMemoryStoreHooks = {};
     runs = 0;
     private nextItemId = 1;

     async run<T>(fn: (repositories: Repositories) => Promise<T>): Promise<T> {
          this.runs++;
          const undo: Array<() => void> = [];
          try {
               return await fn({
                    orders: this.orderRepository(undo),
                    products: this.productRepository(undo),
               });
          } catch (error) {
               for (const step of undo.reverse()) {
                    step();
               }
               throw error;
          }
     }

     addProduct(overrides: Partial<Product> = {}): Product {
          const product = buildProduct(overrides);
          this.products.set(product.id, cloneProduct(product));
          return product;
     }

     addOrder(order: Order): Order {
          this.orders.set(order.id, cloneOrder(order));
          return order;
     }

     findOrderByCode(orderCode: string): Order | undefined {
          return [...this.orders.values()].find((order) => order.orderCode === orderCode);
     }

     private orderRepository(undo: Array<() => void>): OrderRepository {
          const orders = this.orders;
          const findBy = (predicate: (order: Order) => boolean) => {
               const order = [...orders.values()].find(predicate);
               return Promise.resolve(order ? cloneOrder(order) : null);
          };

          return {
               insert: async (draft) => {
                    this.hooks.beforeOrderInsert?.(draft);
                    if ([...orders.values()].some((order) => order.orderCode === draft.orderCode)) {
                         throw new UniqueViolationError('uq_order_code');
                    }
                    const items: OrderItem[] = draft.items.map((item) => ({
                         ...item,
                         id: this.nextItemId++,
                    }));
                    const order = cloneOrder({ ...draft, items });
                    orders.set(order.id, order);
                    undo.push(() => orders.delete(order.id));
                    return cloneOrder(order);
               },
               findByCode: (orderCode) => findBy((order) => order.orderCode === orderCode),
               findById: (id) => findBy((order) => order.id === id),
               existsByCode: async (orderCode) =>
                    [...orders.values()].some((order) => order.orderCode === orderCode),
               list: async (page) =>
                    paginate([...orders.values()].sort(byRecentUpdate), page).map(cloneOrder),
               update: async (order) => {
                    const previous = orders.get(order.id);
                    if (!previous) {
                         return;
                    }
                    // Only the status columns are written; items and pricing stay as stored
                    orders.set(order.id, {
                         ...previous,
                         orderStatus: order.orderStatus,
                         paymentStatus: order.paymentStatus,
                         shipping: cloneOrder(order).shipping,
                         updatedAt: new Date(order.updatedAt.getTime()),
                    });
                    undo.push(() => orders.set(order.id, previous));
               },
          };
     }

     private productRepository(undo: Array<() => void>): ProductRepository {
          const products = this.products;
          return {
               insert: async (product) => {
                    if (products.has(product.id)) {
                         throw new UniqueViolationError('products_pkey');
                    }
                    products.set(product.id, cloneProduct(product));
                    undo.push(() => products.delete(product.id));
                    return cloneProduct(product);
               },
               findById: async (id) => {
                    const product = products.get(id);
                    return product ? cloneProduct(product) : null;
               },
               findByIds: async (ids) =>
                    ids.flatMap((id) => {
                         const product = products.get(id);
                         return product ? [cloneProduct(product)] : [];
                    }),
               list: async (page) =>
                    paginate([...products.values()].sort(byRecentUpdate), page).map(cloneProduct),
               update: async (product) => {
                    const previous = products.get(product.id);
                    if (!previous) {
                         return;
                    }
                    products.set(product.id, cloneProduct(product));
                    undo.push(() => products.set(product.id, previous));
               },
               delete: async (id) => {
                    const previous = products.get(id);
                    if (!previous) {
                         return false;
                    }
                    products.delete(id);
                    undo.push(() => products.set(id, previous));
                    return true;
               },
          };
     }
}

let productSequence = 0;

export function buildProduct(overrides: Partial<Product> = {}): Product {
     productSequence++;
     return {
          id: `00000000-0000-4000-8000-${String(productSequence).padStart(12, '0')}`,
          name: `Test Product ${productSequence}`,
          description: null,
          price: 100,
          currency: 'VND',
          stock: 10,
          status: 'ACTIVE',
          createdAt: FIXED_NOW,
          updatedAt: FIXED_NOW,
          ...overrides,
     };
}

export function buildOrder(overrides: Partial<Order> = {}): Order {
     return {
          id: 'a1b2c3d4-0000-4000-8000-000000000001',
          orderCode: 'ORD-20240115-093012-0001',
          customer: {
               customerId: 'CUST-001',
               name: 'Nguyen Van A',
               phone: '0901234567',
               email: null,
          },
          items: [
               {
                    id: 1,
                    productId: 'prod-1',
                    productName: 'Test Product',
                    quantity: 2,
                    unitPrice: 100,
                    totalPrice: 200,
               },
          ],
          pricing: {
               subtotal: 200,
               shippingFee: 0,
               discount: 0,
               totalAmount: 200,
               currency: 'VND',
          },
          shipping: {
               shippingOrderCode: 'SHP-ORD-20240115-093012-0001',
               status: 'CREATED',
               address: {
                    receiverName: 'Nguyen Van A',
                    receiverPhone: '0901234567',
                    fullAddress: 'Ho Chi Minh City, Vietnam',
               },
               shipper: null,
               estimatedDeliveryTime: null,
               deliveredAt: null,
               failedReason: null,
          },
          orderStatus: 'CONFIRMED',
          paymentMethod: 'COD',
          paymentStatus: 'PENDING',
          createdAt: FIXED_NOW,
          updatedAt: FIXED_NOW,
          ...overrides,
     };
}

/** A gateway that accepts every shipment until told otherwise. */
export function createMockGateway(): jest.Mocked<ShipmentGateway> {
     return {
          createShipment: jest.fn<Promise<ShipmentOutcome<ShipmentCreated>>, [OrderDraft]>(
               async (order) => ({
                    kind: 'success',
                    response: {
                         shippingOrderCode: `SHP-${order.orderCode}`,
                         status: 'CREATED',
                         shipper: null,
                         estimatedDeliveryTime: null,
                         orderStatus: null,
                    },
               })
          ),
          cancelShipment: jest.fn<Promise<ShipmentOutcome<ShipmentStatusChanged>>, [string]>(
               async () => ({
                    kind: 'success',
                    response: { statusCode: 200 },
               })
          ),
     };
}

/** Hands out the given codes in order, then repeats the last one. */
export function sequenceCodeGenerator(...codes: string[]): OrderCodeGenerator {
     let index = 0;
     return {
          next: () => codes[Math.min(index++, codes.length - 1)],
     };
}
