// Type definitions for the order aggregate

export const ORDER_STATUSES = ['DRAFT', 'PENDING', 'CONFIRMED', 'CANCELLED', 'COMPLETED'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const SHIPPING_STATUSES = [
     'NOT_CREATED',
     'CREATED',
     'PICKED',
     'DELIVERING',
     'DELIVERED',
     'FAILED',
     'CANCELLED',
] as const;
export type ShippingStatus = (typeof SHIPPING_STATUSES)[number];

export const PAYMENT_METHODS = ['COD', 'BANK_TRANSFER', 'CREDIT_CARD', 'PAYPAL'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const PAYMENT_METHOD_NAMES: Record<PaymentMethod, string> = {
     COD: 'Cash on Delivery',
     BANK_TRANSFER: 'Bank Transfer',
     CREDIT_CARD: 'Credit Card',
     PAYPAL: 'PayPal',
};

export const PAYMENT_STATUSES = [
     'PENDING',
     'PAID',
     'PREPAID',
     'SENDER_PAY',
     'RECEIVER_PAY',
     'COD',
] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export function isOrderStatus(value: string): value is OrderStatus {
     return ORDER_STATUSES.some((status) => status === value);
}

export function isShippingStatus(value: string): value is ShippingStatus {
     return SHIPPING_STATUSES.some((status) => status === value);
}

export function isPaymentMethod(value: string): value is PaymentMethod {
     return PAYMENT_METHODS.some((method) => method === value);
}

export function isPaymentStatus(value: string): value is PaymentStatus {
     return PAYMENT_STATUSES.some((status) => status === value);
}

export interface Customer {
     customerId: string;
     name: string;
     phone: string;
     email: string | null;
}

export interface Pricing {
     subtotal: number;
     shippingFee: number;
     discount: number;
     totalAmount: number;
     currency: string;
}

export interface ShippingAddress {
     receiverName: string;
     receiverPhone: string;
     fullAddress: string;
}

export interface Shipper {
     shipperId?: string | null;
     name?: string | null;
     phone?: string | null;
     vehicleType?: string | null;
}

export interface ShippingInfo {
     shippingOrderCode: string | null;
     status: ShippingStatus;
     address: ShippingAddress;
     shipper: Shipper | null;
     estimatedDeliveryTime: Date | null;
     deliveredAt: Date | null;
     failedReason: string | null;
}

export interface OrderItemDraft {
     productId: string;
     productName: string;
     quantity: number;
     unitPrice: number;
     totalPrice: number;
}

export interface OrderItem extends OrderItemDraft {
     id: number;
}

interface OrderFields {
     id: string;
     orderCode: string;
     customer: Customer;
     pricing: Pricing;
     shipping: ShippingInfo;
     orderStatus: OrderStatus;
     paymentMethod: PaymentMethod;
     paymentStatus: PaymentStatus;
     createdAt: Date;
     updatedAt: Date;
}

/** An order built in memory that has not been written yet; items carry no ids. */
export interface OrderDraft extends OrderFields {
     items: OrderItemDraft[];
}

export interface Order extends OrderFields {
     items: OrderItem[];
}

// Requests entering the workflow

export interface OrderLineRequest {
     productId: string;
     quantity: number;
}

export interface CreateOrderRequest {
     customer: {
          customerId?: string | null;
          name: string;
          phone: string;
          email?: string | null;
     };
     items: OrderLineRequest[];
     pricing?: {
          shippingFee?: number | null;
          discount?: number | null;
          currency?: string | null;
     } | null;
     shipping?: {
          address?: Partial<ShippingAddress> | null;
     } | null;
     paymentMethod?: PaymentMethod | null;
}

/** Sparse status update; absent and null fields are left untouched. */
export interface OrderStatusPatch {
     orderStatus?: OrderStatus | null;
     paymentStatus?: PaymentStatus | null;
     shippingStatus?: ShippingStatus | null;
     shippingOrderCode?: string | null;
     shipper?: Shipper | null;
     estimatedDeliveryTime?: Date | null;
     deliveredAt?: Date | null;
     failedReason?: string | null;
}

export interface Pagination {
     skip: number;
     limit: number;
}
