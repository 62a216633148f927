import { calculatePricing } from '@order-service/shared/src/services/pricing-calculator';
import { buildProduct } from '../helpers/testUtils';

describe('calculatePricing', () => {
     const mug = buildProduct({ id: 'mug', name: 'Mug', price: 100 });
     const bag = buildProduct({ id: 'bag', name: 'Bag', price: 250 });

     it('should price each line from the current product price', () => {
          const { items } = calculatePricing(
               [
                    { product: mug, quantity: 2 },
                    { product: bag, quantity: 1 },
               ],
               {},
               'VND'
          );

          expect(items).toEqual([
               { productId: 'mug', productName: 'Mug', quantity: 2, unitPrice: 100, totalPrice: 200 },
               { productId: 'bag', productName: 'Bag', quantity: 1, unitPrice: 250, totalPrice: 250 },
          ]);
     });

     it('should compute subtotal and total with shipping fee and discount', () => {
          const { pricing } = calculatePricing(
               [
                    { product: mug, quantity: 2 },
                    { product: bag, quantity: 1 },
               ],
               { shippingFee: 30, discount: 50 },
               'VND'
          );

          expect(pricing).toEqual({
               subtotal: 450,
               shippingFee: 30,
               discount: 50,
               totalAmount: 430,
               currency: 'VND',
          });
     });

     it('should default missing adjustments to zero', () => {
          const { pricing } = calculatePricing([{ product: mug, quantity: 3 }], { shippingFee: null }, 'VND');

          expect(pricing.shippingFee).toBe(0);
          expect(pricing.discount).toBe(0);
          expect(pricing.totalAmount).toBe(300);
     });

     it('should not clamp a negative total', () => {
          const { pricing } = calculatePricing([{ product: mug, quantity: 1 }], { discount: 150 }, 'VND');

          expect(pricing.totalAmount).toBe(-50);
     });

     it('should keep duplicate products as separate lines', () => {
          const { items, pricing } = calculatePricing(
               [
                    { product: mug, quantity: 1 },
                    { product: mug, quantity: 4 },
               ],
               {},
               'VND'
          );

          expect(items).toHaveLength(2);
          expect(pricing.subtotal).toBe(500);
     });

     it('should use the requested currency or fall back to the default', () => {
          expect(calculatePricing([{ product: mug, quantity: 1 }], { currency: 'USD' }, 'VND').pricing.currency).toBe('USD');
          expect(calculatePricing([{ product: mug, quantity: 1 }], { currency: '' }, 'VND').pricing.currency).toBe('VND');
     });
});
