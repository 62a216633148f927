// Custom error classes for domain-specific errors

export interface ValidationIssue {
     path: string;
     message: string;
}

export class DomainError extends Error {
     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number = 400
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

export class ValidationError extends DomainError {
     constructor(
          message: string,
          public readonly details: ValidationIssue[] = [],
          code: string = 'VALIDATION_ERROR'
     ) {
          super(message, code, 400);
     }

     static fromIssues(issues: ValidationIssue[]): ValidationError {
          const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
          return new ValidationError(`Invalid request: ${summary}`, issues);
     }
}

export class ProductInactiveError extends ValidationError {
     constructor(public readonly productId: string) {
          super(
               `Product ${productId} is not active.`,
               [{ path: 'items.productId', message: `product ${productId} is not active` }],
               'PRODUCT_INACTIVE'
          );
     }
}

export class NotFoundError extends DomainError {
     constructor(message: string, code: string = 'NOT_FOUND') {
          super(message, code, 404);
     }
}

export class OrderNotFoundError extends NotFoundError {
     constructor(public readonly reference: string) {
          super(`Order ${reference} not found.`, 'ORDER_NOT_FOUND');
     }
}

export class ProductNotFoundError extends NotFoundError {
     constructor(public readonly productId: string) {
          super(`Product with ID ${productId} not found.`, 'PRODUCT_NOT_FOUND');
     }
}

export class OrderAlreadyCancelledError extends DomainError {
     constructor(public readonly orderCode: string) {
          super('Order is already cancelled.', 'ORDER_ALREADY_CANCELLED', 400);
     }
}

export type GatewayFailureKind = 'failure' | 'timeout' | 'transport_error';

export class GatewayError extends DomainError {
     constructor(
          message: string,
          public readonly outcome: GatewayFailureKind
     ) {
          super(message, 'GATEWAY_ERROR', 502);
     }
}

export class PersistenceError extends DomainError {
     constructor(message: string = 'Failed to save the order. Please contact support.') {
          super(message, 'PERSISTENCE_ERROR', 500);
     }
}

export class OrderCodeExhaustedError extends DomainError {
     constructor(public readonly attempts: number) {
          super(
               `Could not generate a unique order code after ${attempts} attempts`,
               'ORDER_CODE_EXHAUSTED',
               500
          );
     }
}

// Raised by repositories when Postgres rejects a row with a unique violation (23505)
export class UniqueViolationError extends Error {
     constructor(public readonly constraint: string | undefined) {
          super(`Unique constraint violated${constraint ? `: ${constraint}` : ''}`);
          this.name = 'UniqueViolationError';
     }
}

export class ConfigError extends Error {
     constructor(public readonly issues: string[]) {
          super(`Invalid configuration: ${issues.join('; ')}`);
          this.name = 'ConfigError';
     }
}
