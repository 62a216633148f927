import { randomUUID } from 'crypto';
import type { ShipmentGateway, ShipmentOutcome } from '../clients/shipment-gateway';
import type { OrderWorkflowConfig } from '../config/config';
import type { Repositories, UnitOfWork } from '../repositories/unit-of-work';
import {
     CreateOrderRequest,
     Order,
     OrderDraft,
     OrderStatusPatch,
     Pagination,
} from '../types/order.types';
import type { Product } from '../types/product.types';
import {
     DomainError,
     GatewayError,
     GatewayFailureKind,
     OrderAlreadyCancelledError,
     OrderCodeExhaustedError,
     OrderNotFoundError,
     PersistenceError,
     ProductInactiveError,
     ProductNotFoundError,
     UniqueViolationError,
     ValidationError,
     ValidationIssue,
} from '../utils/errors';
import type { Logger } from 'pino';
import { createChildLogger } from '../utils/logger';
import { OrderCodeGenerator, generateUniqueOrderCode } from './order-code-generator';
import { calculatePricing } from './pricing-calculator';
import { applyStatusPatch } from './status-projection';

// Statuses from which a cancellation must first be confirmed by the shipment provider
const GATEWAY_GATED_CANCELLATION = new Set(['PENDING']);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export interface OrderServiceDependencies {
     unitOfWork: UnitOfWork;
     gateway: ShipmentGateway;
     codeGenerator: OrderCodeGenerator;
     config: OrderWorkflowConfig;
     clock?: () => Date;
     logger?: Logger;
}

function describeFailure(outcome: Exclude<ShipmentOutcome<unknown>, { kind: 'success' }>): string {
     switch (outcome.kind) {
          case 'failure':
               return `provider responded with status ${outcome.statusCode}`;
          case 'timeout':
               return `provider did not respond within ${outcome.timeoutMs}ms`;
          case 'transport_error':
               return `request failed: ${outcome.message}`;
     }
}

function validateCreateRequest(request: CreateOrderRequest): void {
     const issues: ValidationIssue[] = [];
     const { customer, items, pricing } = request;

     if (!customer.name || customer.name.trim() === '') {
          issues.push({ path: 'customer.name', message: 'must not be empty' });
     }
     if (!customer.phone || customer.phone.trim() === '') {
          issues.push({ path: 'customer.phone', message: 'must not be empty' });
     }
     if (customer.email != null && customer.email !== '' && !EMAIL_PATTERN.test(customer.email)) {
          issues.push({ path: 'customer.email', message: 'must be a valid email address' });
     }
     if (customer.customerId != null && customer.customerId.length > 50) {
          issues.push({ path: 'customer.customerId', message: 'must be at most 50 characters' });
     }
     if (!items || items.length === 0) {
          issues.push({ path: 'items', message: 'must contain at least one item' });
     } else {
          items.forEach((item, index) => {
               if (!item.productId || item.productId.trim() === '') {
                    issues.push({ path: `items.${index}.productId`, message: 'must not be empty' });
               }
               if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
                    issues.push({
                         path: `items.${index}.quantity`,
                         message: 'must be a positive integer',
                    });
               }
          });
     }
     if (pricing?.shippingFee != null && pricing.shippingFee < 0) {
          issues.push({ path: 'pricing.shippingFee', message: 'must be greater than or equal to 0' });
     }
     if (pricing?.discount != null && pricing.discount < 0) {
          issues.push({ path: 'pricing.discount', message: 'must be greater than or equal to 0' });
     }

     if (issues.length > 0) {
          throw ValidationError.fromIssues(issues);
     }
}

/**
 * Order creation and status transitions.
 *
 * Creation runs Validating -> Pricing -> CallingGateway -> Persisting. Nothing is
 * written unless the shipment provider accepted the shipment, and no transaction
 * is open while the provider call is in flight.
 */
export class OrderService {
     private readonly unitOfWork: UnitOfWork;
     private readonly gateway: ShipmentGateway;
     private readonly codeGenerator: OrderCodeGenerator;
     private readonly config: OrderWorkflowConfig;
     private readonly clock: () => Date;
     private readonly log: Logger;

     constructor(dependencies: OrderServiceDependencies) {
          this.unitOfWork = dependencies.unitOfWork;
          this.gateway = dependencies.gateway;
          this.codeGenerator = dependencies.codeGenerator;
          this.config = dependencies.config;
          this.clock = dependencies.clock ?? (() => new Date());
          this.log = dependencies.logger ?? createChildLogger({ component: 'order-service' });
     }

     async createOrder(request: CreateOrderRequest): Promise<Order> {
          validateCreateRequest(request);

          const { products, orderCode } = await this.unitOfWork.run(async (repositories) => {
               const products = await this.loadOrderableProducts(repositories, request);
               const orderCode = await generateUniqueOrderCode(
                    this.codeGenerator,
                    (code) => repositories.orders.existsByCode(code),
                    this.config.maxOrderCodeAttempts
               );
               return { products, orderCode };
          });

          const draft = this.buildDraft(request, products, orderCode);

          this.log.info(
               { orderCode, itemCount: draft.items.length, totalAmount: draft.pricing.totalAmount },
               'Requesting shipment before saving order'
          );
          const outcome = await this.gateway.createShipment(draft);

          if (outcome.kind !== 'success') {
               this.log.error(
                    { orderCode, outcome: outcome.kind, reason: describeFailure(outcome) },
                    'Shipment creation failed. Order not saved.'
               );
               throw new GatewayError(
                    'Failed to create shipment. Order was not created. Please try again.',
                    outcome.kind
               );
          }

          const shipment = outcome.response;
          if (shipment.shippingOrderCode) {
               draft.shipping.shippingOrderCode = shipment.shippingOrderCode;
          }
          if (shipment.status) {
               draft.shipping.status = shipment.status;
          }
          if (shipment.shipper) {
               draft.shipping.shipper = shipment.shipper;
          }
          if (shipment.estimatedDeliveryTime) {
               draft.shipping.estimatedDeliveryTime = shipment.estimatedDeliveryTime;
          }
          if (shipment.orderStatus) {
               draft.orderStatus = shipment.orderStatus;
          }

          const order = await this.persistNewOrder(draft);
          this.log.info(
               { orderCode: order.orderCode, shippingOrderCode: order.shipping.shippingOrderCode },
               'Order created after shipment confirmation'
          );
          return order;
     }

     async getOrderByCode(orderCode: string): Promise<Order> {
          const order = await this.unitOfWork.run((repositories) =>
               repositories.orders.findByCode(orderCode)
          );
          if (!order) {
               throw new OrderNotFoundError(orderCode);
          }
          return order;
     }

     async getOrderById(id: string): Promise<Order> {
          const order = await this.unitOfWork.run((repositories) => repositories.orders.findById(id));
          if (!order) {
               throw new OrderNotFoundError(id);
          }
          return order;
     }

     listOrders(page: Pagination): Promise<Order[]> {
          return this.unitOfWork.run((repositories) => repositories.orders.list(page));
     }

     /**
      * Internal status update. Cancelling an order that is still PENDING with the
      * provider needs the provider to cancel the shipment first; every other change
      * is local.
      */
     async updateOrder(orderCode: string, patch: OrderStatusPatch): Promise<Order> {
          const current = await this.getOrderByCode(orderCode);

          if (this.requiresGatewayCancellation(current, patch)) {
               this.log.info(
                    { orderCode },
                    'Cancelling PENDING order. Calling shipment API before updating database.'
               );
               const outcome = await this.gateway.cancelShipment(orderCode);
               if (outcome.kind !== 'success') {
                    this.log.error(
                         { orderCode, outcome: outcome.kind, reason: describeFailure(outcome) },
                         'Shipment cancellation failed. Order status not updated.'
                    );
                    throw new GatewayError(
                         'Failed to cancel shipment. Order status was not updated. Please try again.',
                         outcome.kind
                    );
               }
          }

          return this.applyPatch(orderCode, patch);
     }

     /**
      * Soft delete: the order row stays, its status becomes CANCELLED.
      * Unlike a PATCH, the shipment provider is not asked to cancel.
      */
     async cancelOrder(orderCode: string): Promise<Order> {
          const current = await this.getOrderByCode(orderCode);
          if (current.orderStatus === 'CANCELLED') {
               throw new OrderAlreadyCancelledError(orderCode);
          }
          return this.applyPatch(orderCode, { orderStatus: 'CANCELLED' });
     }

     /**
      * State pushed by the shipment provider or an operator. The change already
      * happened elsewhere, so the provider is never called back from here.
      */
     applyExternalUpdate(orderCode: string, patch: OrderStatusPatch): Promise<Order> {
          return this.applyPatch(orderCode, patch);
     }

     private requiresGatewayCancellation(order: Order, patch: OrderStatusPatch): boolean {
          return (
               patch.orderStatus != null &&
               patch.orderStatus.toUpperCase() === 'CANCELLED' &&
               GATEWAY_GATED_CANCELLATION.has(order.orderStatus.toUpperCase())
          );
     }

     private async applyPatch(orderCode: string, patch: OrderStatusPatch): Promise<Order> {
          return this.unitOfWork.run(async (repositories) => {
               const order = await repositories.orders.findByCode(orderCode);
               if (!order) {
                    throw new OrderNotFoundError(orderCode);
               }

               const { order: next, changed } = applyStatusPatch(order, patch, this.clock());
               if (changed.length === 0) {
                    this.log.debug({ orderCode }, 'Status update carries no changes');
                    return order;
               }

               await repositories.orders.update(next);
               this.log.info({ orderCode, changed }, 'Order status updated');
               return next;
          });
     }

     private async loadOrderableProducts(
          repositories: Repositories,
          request: CreateOrderRequest
     ): Promise<Map<string, Product>> {
          const ids = [...new Set(request.items.map((item) => item.productId))];
          const found = await repositories.products.findByIds(ids);
          const products = new Map(found.map((product) => [product.id, product]));

          for (const item of request.items) {
               const product = products.get(item.productId);
               if (!product) {
                    throw new ProductNotFoundError(item.productId);
               }
               if (product.status !== 'ACTIVE') {
                    throw new ProductInactiveError(item.productId);
               }
          }
          return products;
     }

     private buildDraft(
          request: CreateOrderRequest,
          products: Map<string, Product>,
          orderCode: string
     ): OrderDraft {
          const lines = request.items.map((item) => {
               const product = products.get(item.productId);
               if (!product) {
                    throw new ProductNotFoundError(item.productId);
               }
               return { product, quantity: item.quantity };
          });
          const { items, pricing } = calculatePricing(
               lines,
               {
                    shippingFee: request.pricing?.shippingFee,
                    discount: request.pricing?.discount,
                    currency: request.pricing?.currency,
               },
               this.config.defaultCurrency
          );

          const customer = request.customer;
          const address = request.shipping?.address;
          const now = this.clock();

          return {
               id: randomUUID(),
               orderCode,
               customer: {
                    customerId: customer.customerId ?? '',
                    name: customer.name.trim(),
                    phone: customer.phone.trim(),
                    email: customer.email || null,
               },
               items,
               pricing,
               shipping: {
                    shippingOrderCode: null,
                    status: 'NOT_CREATED',
                    address: {
                         receiverName: address?.receiverName || customer.name.trim(),
                         receiverPhone: address?.receiverPhone || customer.phone.trim(),
                         fullAddress: address?.fullAddress || this.config.defaultReceiverAddress,
                    },
                    shipper: null,
                    estimatedDeliveryTime: null,
                    deliveredAt: null,
                    failedReason: null,
               },
               orderStatus: 'CONFIRMED',
               paymentMethod: request.paymentMethod ?? 'COD',
               paymentStatus: 'PENDING',
               createdAt: now,
               updatedAt: now,
          };
     }

     /**
      * Inserts the order and its items in one transaction. A concurrent request may
      * have taken the code after the pre-check, in which case a fresh code is drawn.
      * Any other failure leaves a shipment at the provider with no local order; that
      * is logged for reconciliation and not compensated.
      */
     private async persistNewOrder(draft: OrderDraft): Promise<Order> {
          const maxAttempts = this.config.maxOrderCodeAttempts;
          let candidate = draft;

          for (let attempt = 1; attempt <= maxAttempts; attempt++) {
               try {
                    return await this.unitOfWork.run((repositories) =>
                         repositories.orders.insert(candidate)
                    );
               } catch (error) {
                    if (error instanceof UniqueViolationError) {
                         const nextCode = this.codeGenerator.next();
                         this.log.warn(
                              {
                                   orderCode: candidate.orderCode,
                                   nextOrderCode: nextCode,
                                   shippingOrderCode: candidate.shipping.shippingOrderCode,
                                   attempt,
                              },
                              'Order code taken by a concurrent request; retrying with a new code'
                         );
                         candidate = { ...candidate, orderCode: nextCode };
                         continue;
                    }
                    if (error instanceof DomainError) {
                         throw error;
                    }
                    this.log.error(
                         {
                              err: error,
                              alert: 'RECONCILIATION_REQUIRED',
                              orderCode: candidate.orderCode,
                              shippingOrderCode: candidate.shipping.shippingOrderCode,
                         },
                         'Shipment was created but the order could not be saved'
                    );
                    throw new PersistenceError(
                         'Shipment was created but the order could not be saved. Please contact support.'
                    );
               }
          }

          this.log.error(
               {
                    alert: 'RECONCILIATION_REQUIRED',
                    orderCode: draft.orderCode,
                    shippingOrderCode: draft.shipping.shippingOrderCode,
                    attempts: maxAttempts,
               },
               'Shipment was created but no free order code could be found'
          );
          throw new OrderCodeExhaustedError(maxAttempts);
     }
}
