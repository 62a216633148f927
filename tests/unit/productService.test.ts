import { ProductService } from '@order-service/shared/src/services/product-service';
import {
     ProductNotFoundError,
     UniqueViolationError,
     ValidationError,
} from '@order-service/shared/src/utils/errors';
import { FIXED_NOW, InMemoryStore } from '../helpers/testUtils';

describe('ProductService (Unit)', () => {
     const later = new Date('2024-02-01T00:00:00.000Z');

     let store: InMemoryStore;
     let now: Date;
     let productService: ProductService;

     beforeEach(() => {
          store = new InMemoryStore();
          now = FIXED_NOW;
          productService = new ProductService({
               unitOfWork: store,
               defaultCurrency: 'VND',
               clock: () => now,
          });
     });

     describe('createProduct', () => {
          it('should create a product with defaults', async () => {
               const product = await productService.createProduct({ name: '  Mug  ', price: 120000 });

               expect(product).toEqual({
                    id: expect.any(String),
                    name: 'Mug',
                    description: null,
                    price: 120000,
                    currency: 'VND',
                    stock: 0,
                    status: 'ACTIVE',
                    createdAt: FIXED_NOW,
                    updatedAt: FIXED_NOW,
               });
               expect(store.products.get(product.id)).toEqual(product);
          });

          it('should reject a blank name and a negative price together', async () => {
               const error = await productService
                    .createProduct({ name: ' ', price: -1 })
                    .catch((e: unknown) => e);

               expect(error).toBeInstanceOf(ValidationError);
               if (error instanceof ValidationError) {
                    expect(error.details.map((issue) => issue.path)).toEqual(['name', 'price']);
               }
          });

          it('should reject a fractional stock', async () => {
               await expect(
                    productService.createProduct({ name: 'Mug', price: 1, stock: 1.5 })
               ).rejects.toThrow('stock: must be a non-negative integer');
          });

          it('should retry with a new id on a collision', async () => {
               store.addProduct({ id: 'taken' });
               const ids = ['taken', 'fresh'];
               const service = new ProductService({
                    unitOfWork: store,
                    defaultCurrency: 'VND',
                    idGenerator: () => ids.shift() ?? 'exhausted',
               });

               const product = await service.createProduct({ name: 'Mug', price: 1 });

               expect(product.id).toBe('fresh');
          });

          it('should give up after repeated collisions', async () => {
               store.addProduct({ id: 'taken' });
               const service = new ProductService({
                    unitOfWork: store,
                    defaultCurrency: 'VND',
                    idGenerator: () => 'taken',
               });

               await expect(service.createProduct({ name: 'Mug', price: 1 })).rejects.toThrow(
                    UniqueViolationError
               );
          });
     });

     describe('reads', () => {
          it('should get a product by id', async () => {
               const product = store.addProduct({ id: 'mug' });

               await expect(productService.getProduct('mug')).resolves.toEqual(product);
          });

          it('should raise not found for an unknown id', async () => {
               await expect(productService.getProduct('ghost')).rejects.toThrow(
                    'Product with ID ghost not found.'
               );
          });

          it('should list most recently updated first', async () => {
               store.addProduct({ id: 'old', updatedAt: new Date('2024-01-01T00:00:00.000Z') });
               store.addProduct({ id: 'new', updatedAt: new Date('2024-01-05T00:00:00.000Z') });

               const products = await productService.listProducts({ skip: 0, limit: 50 });

               expect(products.map((product) => product.id)).toEqual(['new', 'old']);
          });
     });

     describe('updateProduct', () => {
          it('should apply non-null fields and bump updatedAt', async () => {
               store.addProduct({ id: 'mug', name: 'Mug', price: 100, description: 'Blue' });
               now = later;

               const updated = await productService.updateProduct('mug', {
                    price: 150,
                    description: null,
                    status: 'INACTIVE',
               });

               expect(updated.price).toBe(150);
               expect(updated.description).toBe('Blue');
               expect(updated.status).toBe('INACTIVE');
               expect(updated.name).toBe('Mug');
               expect(updated.updatedAt).toEqual(later);
               expect(store.products.get('mug')?.price).toBe(150);
          });

          it('should raise not found for an unknown id', async () => {
               await expect(productService.updateProduct('ghost', { price: 1 })).rejects.toThrow(
                    ProductNotFoundError
               );
          });

          it('should validate the changes', async () => {
               store.addProduct({ id: 'mug' });

               await expect(productService.updateProduct('mug', { name: '' })).rejects.toThrow(
                    ValidationError
               );
          });
     });

     describe('deleteProduct', () => {
          it('should remove the product', async () => {
               store.addProduct({ id: 'mug' });

               await productService.deleteProduct('mug');

               expect(store.products.has('mug')).toBe(false);
          });

          it('should raise not found for an unknown id', async () => {
               await expect(productService.deleteProduct('ghost')).rejects.toThrow(ProductNotFoundError);
          });
     });
});
