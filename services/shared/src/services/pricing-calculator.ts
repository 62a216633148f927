import type { OrderItemDraft, Pricing } from '../types/order.types';
import type { Product } from '../types/product.types';

export interface PricingLine {
     product: Product;
     quantity: number;
}

export interface PricingAdjustments {
     shippingFee?: number | null;
     discount?: number | null;
     currency?: string | null;
}

export interface PricedOrder {
     items: OrderItemDraft[];
     pricing: Pricing;
}

/**
 * Prices order lines from the products' current catalog prices. Any price the
 * client sent is ignored; only shipping fee, discount and currency are taken
 * from the request. The total is not clamped at zero.
 */
export function calculatePricing(
     lines: PricingLine[],
     adjustments: PricingAdjustments,
     defaultCurrency: string
): PricedOrder {
     const items = lines.map(({ product, quantity }) => ({
          productId: product.id,
          productName: product.name,
          quantity,
          unitPrice: product.price,
          totalPrice: product.price * quantity,
     }));

     const subtotal = items.reduce((sum, item) => sum + item.totalPrice, 0);
     const shippingFee = adjustments.shippingFee ?? 0;
     const discount = adjustments.discount ?? 0;

     return {
          items,
          pricing: {
               subtotal,
               shippingFee,
               discount,
               totalAmount: subtotal + shippingFee - discount,
               currency: adjustments.currency || defaultCurrency,
          },
     };
}
