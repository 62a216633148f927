import { FastifyInstance } from 'fastify';
import { OrderService } from '@order-service/shared/src/services/order-service';
import {
     CreateOrderRequest,
     OrderStatus,
     OrderStatusPatch,
     PAYMENT_METHODS,
     PAYMENT_METHOD_NAMES,
     Pagination,
     PaymentStatus,
     Shipper,
     ShippingStatus,
} from '@order-service/shared/src/types/order.types';
import {
     cancelOrderSchema,
     createOrderSchema,
     externalStatusUpdateSchema,
     getOrderByCodeSchema,
     getOrderByIdSchema,
     listOrdersSchema,
     listPaymentMethodsSchema,
     updateOrderSchema,
} from '../schemas/order.schemas';
import { serializeOrder } from '../serializers';

export interface OrderRoutesOptions {
     orderService: OrderService;
}

// Wire format of a status update; timestamps arrive as ISO strings
interface StatusPatchBody {
     orderStatus?: OrderStatus | null;
     paymentStatus?: PaymentStatus | null;
     shippingStatus?: ShippingStatus | null;
     shippingOrderCode?: string | null;
     shipper?: Shipper | null;
     estimatedDeliveryTime?: string | null;
     deliveredAt?: string | null;
     failedReason?: string | null;
}

interface OrderCodeParams {
     orderCode: string;
}

function toDate(value: string | null | undefined): Date | null {
     return value ? new Date(value) : null;
}

export function toStatusPatch(body: StatusPatchBody): OrderStatusPatch {
     return {
          orderStatus: body.orderStatus,
          paymentStatus: body.paymentStatus,
          shippingStatus: body.shippingStatus,
          shippingOrderCode: body.shippingOrderCode,
          shipper: body.shipper,
          estimatedDeliveryTime: toDate(body.estimatedDeliveryTime),
          deliveredAt: toDate(body.deliveredAt),
          failedReason: body.failedReason,
     };
}

export async function registerOrderRoutes(app: FastifyInstance, options: OrderRoutesOptions) {
     const { orderService } = options;

     // Create an order; saved only once the shipment exists
     app.post<{ Body: CreateOrderRequest }>(
          '/',
          { schema: createOrderSchema },
          async (request, reply) => {
               const order = await orderService.createOrder(request.body);
               reply.code(201);
               return serializeOrder(order);
          }
     );

     app.get<{ Querystring: Pagination }>(
          '/',
          { schema: listOrdersSchema },
          async (request) => {
               const orders = await orderService.listOrders(request.query);
               return orders.map(serializeOrder);
          }
     );

     app.get('/payment-methods', { schema: listPaymentMethodsSchema }, async () =>
          PAYMENT_METHODS.map((id) => ({ id, name: PAYMENT_METHOD_NAMES[id] }))
     );

     app.get<{ Params: { id: string } }>(
          '/:id',
          { schema: getOrderByIdSchema },
          async (request) => serializeOrder(await orderService.getOrderById(request.params.id))
     );

     app.get<{ Params: OrderCodeParams }>(
          '/by-code/:orderCode',
          { schema: getOrderByCodeSchema },
          async (request) =>
               serializeOrder(await orderService.getOrderByCode(request.params.orderCode))
     );

     // Internal status update; may cancel the shipment first
     app.patch<{ Params: OrderCodeParams; Body: StatusPatchBody }>(
          '/by-code/:orderCode',
          { schema: updateOrderSchema },
          async (request) => {
               const order = await orderService.updateOrder(
                    request.params.orderCode,
                    toStatusPatch(request.body ?? {})
               );
               return serializeOrder(order);
          }
     );

     // Soft delete
     app.delete<{ Params: OrderCodeParams }>(
          '/by-code/:orderCode',
          { schema: cancelOrderSchema },
          async (request) => serializeOrder(await orderService.cancelOrder(request.params.orderCode))
     );

     // Pushed by the shipment provider
     app.post<{ Params: OrderCodeParams; Body: StatusPatchBody }>(
          '/by-code/:orderCode/status-update',
          { schema: externalStatusUpdateSchema },
          async (request) => {
               const order = await orderService.applyExternalUpdate(
                    request.params.orderCode,
                    toStatusPatch(request.body ?? {})
               );
               return serializeOrder(order);
          }
     );
}
