import {
     ConfigError,
     DomainError,
     GatewayError,
     NotFoundError,
     OrderAlreadyCancelledError,
     OrderCodeExhaustedError,
     OrderNotFoundError,
     PersistenceError,
     ProductInactiveError,
     ProductNotFoundError,
     UniqueViolationError,
     ValidationError,
} from '@order-service/shared/src/utils/errors';

describe('Error Classes', () => {
     describe('DomainError', () => {
          it('should create a domain error with message and code', () => {
               const error = new DomainError('Test error', 'TEST_CODE');
               expect(error.message).toBe('Test error');
               expect(error.code).toBe('TEST_CODE');
               expect(error.statusCode).toBe(400);
               expect(error.name).toBe('DomainError');
               expect(error instanceof Error).toBe(true);
          });

          it('should accept custom status code', () => {
               const error = new DomainError('Test error', 'TEST_CODE', 500);
               expect(error.statusCode).toBe(500);
          });
     });

     describe('ValidationError', () => {
          it('should summarise field issues', () => {
               const error = ValidationError.fromIssues([
                    { path: 'customer.name', message: 'must not be empty' },
                    { path: 'items', message: 'must contain at least one item' },
               ]);
               expect(error.message).toBe(
                    'Invalid request: customer.name: must not be empty; items: must contain at least one item'
               );
               expect(error.code).toBe('VALIDATION_ERROR');
               expect(error.statusCode).toBe(400);
               expect(error.details).toHaveLength(2);
          });
     });

     describe('ProductInactiveError', () => {
          it('should be a validation error with its own code', () => {
               const error = new ProductInactiveError('mug');
               expect(error).toBeInstanceOf(ValidationError);
               expect(error.message).toBe('Product mug is not active.');
               expect(error.code).toBe('PRODUCT_INACTIVE');
               expect(error.statusCode).toBe(400);
          });
     });

     describe('Not found errors', () => {
          it('should create order and product not found errors', () => {
               const order = new OrderNotFoundError('ORD-1');
               const product = new ProductNotFoundError('mug');

               expect(order).toBeInstanceOf(NotFoundError);
               expect(order.message).toBe('Order ORD-1 not found.');
               expect(order.code).toBe('ORDER_NOT_FOUND');
               expect(order.statusCode).toBe(404);
               expect(product.message).toBe('Product with ID mug not found.');
               expect(product.code).toBe('PRODUCT_NOT_FOUND');
               expect(product.name).toBe('ProductNotFoundError');
          });
     });

     describe('OrderAlreadyCancelledError', () => {
          it('should be a client error', () => {
               const error = new OrderAlreadyCancelledError('ORD-1');
               expect(error.statusCode).toBe(400);
               expect(error.code).toBe('ORDER_ALREADY_CANCELLED');
               expect(error.orderCode).toBe('ORD-1');
          });
     });

     describe('GatewayError', () => {
          it('should carry the outcome kind', () => {
               const error = new GatewayError('Failed to create shipment.', 'timeout');
               expect(error.statusCode).toBe(502);
               expect(error.code).toBe('GATEWAY_ERROR');
               expect(error.outcome).toBe('timeout');
          });
     });

     describe('Server-side errors', () => {
          it('should map persistence and code exhaustion to 500', () => {
               expect(new PersistenceError().statusCode).toBe(500);
               expect(new PersistenceError().message).toBe(
                    'Failed to save the order. Please contact support.'
               );
               const exhausted = new OrderCodeExhaustedError(5);
               expect(exhausted.statusCode).toBe(500);
               expect(exhausted.message).toBe('Could not generate a unique order code after 5 attempts');
          });
     });

     describe('Internal errors', () => {
          it('should not be domain errors', () => {
               expect(new UniqueViolationError('uq_order_code')).not.toBeInstanceOf(DomainError);
               expect(new UniqueViolationError('uq_order_code').message).toBe(
                    'Unique constraint violated: uq_order_code'
               );
               expect(new ConfigError(['PORT: invalid']).message).toBe('Invalid configuration: PORT: invalid');
          });
     });
});
