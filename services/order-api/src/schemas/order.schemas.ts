import {
     ORDER_STATUSES,
     PAYMENT_METHODS,
     PAYMENT_STATUSES,
     SHIPPING_STATUSES,
} from '@order-service/shared/src/types/order.types';
import { errorResponse, paginationQuerySchema } from './common.schemas';

const shipperSchema = {
     type: 'object',
     nullable: true,
     properties: {
          shipperId: { type: 'string', nullable: true, example: 'SHIPPER-17' },
          name: { type: 'string', nullable: true, example: 'Tran Van B' },
          phone: { type: 'string', nullable: true, example: '0912345678' },
          vehicleType: {
               type: 'string',
               nullable: true,
               description: 'motorbike | car | truck',
               example: 'motorbike',
          },
     },
};

const orderResponse = {
     type: 'object',
     properties: {
          id: { type: 'string', format: 'uuid' },
          orderCode: { type: 'string', example: 'ORD-20240115-093012-0042' },
          customer: {
               type: 'object',
               properties: {
                    customerId: { type: 'string', example: 'CUST-001' },
                    name: { type: 'string', example: 'Nguyen Van A' },
                    phone: { type: 'string', example: '0901234567' },
                    email: { type: 'string', nullable: true, example: 'a.nguyen@example.com' },
               },
          },
          items: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         id: { type: 'integer', example: 1 },
                         productId: { type: 'string' },
                         productName: { type: 'string', example: 'Ceramic Coffee Mug' },
                         quantity: { type: 'integer', example: 2 },
                         unitPrice: { type: 'number', example: 120000 },
                         totalPrice: { type: 'number', example: 240000 },
                    },
               },
          },
          pricing: {
               type: 'object',
               properties: {
                    subTotal: { type: 'number', example: 240000 },
                    shippingFee: { type: 'number', example: 30000 },
                    discount: { type: 'number', example: 0 },
                    totalAmount: { type: 'number', example: 270000 },
                    currency: { type: 'string', example: 'VND' },
               },
          },
          shipping: {
               type: 'object',
               properties: {
                    shippingOrderCode: { type: 'string', nullable: true, example: 'SHP-12345' },
                    status: { type: 'string', enum: [...SHIPPING_STATUSES] },
                    address: {
                         type: 'object',
                         properties: {
                              receiverName: { type: 'string' },
                              receiverPhone: { type: 'string' },
                              fullAddress: { type: 'string', example: '12 Le Loi, District 1, Ho Chi Minh City' },
                         },
                    },
                    shipper: shipperSchema,
                    estimatedDeliveryTime: { type: 'string', format: 'date-time', nullable: true },
                    deliveredAt: { type: 'string', format: 'date-time', nullable: true },
                    failedReason: { type: 'string', nullable: true },
               },
          },
          orderStatus: { type: 'string', enum: [...ORDER_STATUSES] },
          paymentMethod: { type: 'string', enum: [...PAYMENT_METHODS] },
          paymentStatus: { type: 'string', enum: [...PAYMENT_STATUSES] },
          createdAt: { type: 'string', format: 'date-time' },
          updatedAt: { type: 'string', format: 'date-time' },
     },
};

const orderCodeParams = {
     type: 'object',
     required: ['orderCode'],
     properties: {
          orderCode: {
               type: 'string',
               minLength: 1,
               description: 'Human-readable order code',
               example: 'ORD-20240115-093012-0042',
          },
     },
};

const statusPatchBody = {
     type: 'object',
     properties: {
          orderStatus: { type: 'string', nullable: true, enum: [...ORDER_STATUSES, null] },
          paymentStatus: { type: 'string', nullable: true, enum: [...PAYMENT_STATUSES, null] },
          shippingStatus: { type: 'string', nullable: true, enum: [...SHIPPING_STATUSES, null] },
          shippingOrderCode: { type: 'string', nullable: true, minLength: 1 },
          shipper: shipperSchema,
          estimatedDeliveryTime: { type: 'string', nullable: true, format: 'date-time' },
          deliveredAt: { type: 'string', nullable: true, format: 'date-time' },
          failedReason: { type: 'string', nullable: true },
     },
};

export const createOrderSchema = {
     tags: ['orders'],
     summary: 'Create an order',
     description:
          'Validates the order, prices it from current product prices and requests a shipment. The order is only saved after the shipment provider accepts it.',
     body: {
          type: 'object',
          required: ['customer', 'items'],
          properties: {
               customer: {
                    type: 'object',
                    required: ['name', 'phone'],
                    properties: {
                         customerId: { type: 'string', nullable: true, maxLength: 50, example: 'CUST-001' },
                         name: { type: 'string', minLength: 1, example: 'Nguyen Van A' },
                         phone: { type: 'string', minLength: 1, example: '0901234567' },
                         email: { type: 'string', nullable: true, example: 'a.nguyen@example.com' },
                    },
               },
               items: {
                    type: 'array',
                    minItems: 1,
                    items: {
                         type: 'object',
                         required: ['productId', 'quantity'],
                         properties: {
                              productId: { type: 'string', minLength: 1 },
                              quantity: { type: 'integer', minimum: 1, example: 2 },
                         },
                    },
               },
               pricing: {
                    type: 'object',
                    nullable: true,
                    description: 'Only shippingFee, discount and currency are taken from the client',
                    properties: {
                         shippingFee: { type: 'number', nullable: true, minimum: 0, example: 30000 },
                         discount: { type: 'number', nullable: true, minimum: 0, example: 0 },
                         currency: { type: 'string', nullable: true, example: 'VND' },
                    },
               },
               shipping: {
                    type: 'object',
                    nullable: true,
                    properties: {
                         address: {
                              type: 'object',
                              nullable: true,
                              properties: {
                                   receiverName: { type: 'string', nullable: true },
                                   receiverPhone: { type: 'string', nullable: true },
                                   fullAddress: {
                                        type: 'string',
                                        nullable: true,
                                        example: '12 Le Loi, District 1, Ho Chi Minh City',
                                   },
                              },
                         },
                    },
               },
               paymentMethod: { type: 'string', nullable: true, enum: [...PAYMENT_METHODS, null] },
          },
     },
     response: {
          201: { description: 'Order created', ...orderResponse },
          400: errorResponse('Invalid request or inactive product'),
          404: errorResponse('Product not found'),
          500: errorResponse('Order could not be saved'),
          502: errorResponse('Shipment provider rejected or did not answer'),
     },
};

export const listOrdersSchema = {
     tags: ['orders'],
     summary: 'List orders',
     description: 'Most recently updated first',
     querystring: paginationQuerySchema,
     response: {
          200: { type: 'array', items: orderResponse },
     },
};

export const listPaymentMethodsSchema = {
     tags: ['orders'],
     summary: 'List payment methods',
     response: {
          200: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         id: { type: 'string', example: 'COD' },
                         name: { type: 'string', example: 'Cash on Delivery' },
                    },
               },
          },
     },
};

export const getOrderByIdSchema = {
     tags: ['orders'],
     summary: 'Get an order by id',
     params: {
          type: 'object',
          required: ['id'],
          properties: {
               id: { type: 'string', format: 'uuid', description: 'Order id' },
          },
     },
     response: {
          200: orderResponse,
          404: errorResponse('Order not found'),
     },
};

export const getOrderByCodeSchema = {
     tags: ['orders'],
     summary: 'Get an order by code',
     params: orderCodeParams,
     response: {
          200: orderResponse,
          404: errorResponse('Order not found'),
     },
};

export const updateOrderSchema = {
     tags: ['orders'],
     summary: 'Update order status',
     description:
          'Applies the non-null fields. Cancelling a PENDING order first cancels the shipment with the provider; the order is left unchanged if that fails.',
     params: orderCodeParams,
     body: statusPatchBody,
     response: {
          200: orderResponse,
          400: errorResponse('Invalid request'),
          404: errorResponse('Order not found'),
          502: errorResponse('Shipment provider could not cancel the shipment'),
     },
};

export const cancelOrderSchema = {
     tags: ['orders'],
     summary: 'Cancel an order',
     description:
          'Soft delete: the order is kept with orderStatus CANCELLED. The shipment provider is not called.',
     params: orderCodeParams,
     response: {
          200: orderResponse,
          400: errorResponse('Order is already cancelled'),
          404: errorResponse('Order not found'),
     },
};

export const externalStatusUpdateSchema = {
     tags: ['orders'],
     summary: 'Receive a status update from the shipment provider',
     description: 'Applies the pushed fields without calling the provider back. Repeating a push is harmless.',
     params: orderCodeParams,
     body: statusPatchBody,
     response: {
          200: orderResponse,
          400: errorResponse('Invalid request'),
          404: errorResponse('Order not found'),
     },
};
