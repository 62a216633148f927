import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { DomainError, ValidationError, ValidationIssue } from '@order-service/shared/src/utils/errors';

interface ErrorBody {
     error: string;
     message: string;
     details?: ValidationIssue[];
}

/** Turns Fastify schema failures into paths such as `body.customer.name`. */
export function toValidationIssues(error: FastifyError): ValidationIssue[] {
     const context = error.validationContext ?? 'body';
     return (error.validation ?? []).map((issue) => {
          const segments = issue.instancePath.split('/').filter((segment) => segment !== '');
          const missing = issue.params.missingProperty;
          if (issue.keyword === 'required' && typeof missing === 'string') {
               segments.push(missing);
          }
          return {
               path: [context, ...segments].join('.'),
               message: issue.message ?? 'is invalid',
          };
     });
}

export function handleRouteError(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
     let status: number;
     let body: ErrorBody;

     if (error.validation) {
          const validation = ValidationError.fromIssues(toValidationIssues(error));
          status = validation.statusCode;
          body = { error: validation.code, message: validation.message, details: validation.details };
     } else if (error instanceof DomainError) {
          status = error.statusCode;
          body = { error: error.code, message: error.message };
          if (error instanceof ValidationError && error.details.length > 0) {
               body.details = error.details;
          }
     } else if (error.statusCode !== undefined && error.statusCode < 500) {
          // Malformed JSON, unsupported media type and the like
          status = error.statusCode;
          body = { error: error.code || 'BAD_REQUEST', message: error.message };
     } else {
          request.log.error({ err: error }, 'Unhandled error');
          status = 500;
          body = { error: 'INTERNAL_ERROR', message: 'An unexpected error occurred' };
     }

     if (status >= 500 && error instanceof DomainError) {
          request.log.error({ err: error, code: error.code }, error.message);
     }

     return reply.code(status).send(body);
}
