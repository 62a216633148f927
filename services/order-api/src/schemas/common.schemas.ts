export const errorResponseSchema = {
     type: 'object',
     properties: {
          error: { type: 'string', example: 'VALIDATION_ERROR' },
          message: { type: 'string', example: 'Invalid request: customer.name: must not be empty' },
          details: {
               type: 'array',
               items: {
                    type: 'object',
                    properties: {
                         path: { type: 'string', example: 'customer.name' },
                         message: { type: 'string', example: 'must not be empty' },
                    },
               },
          },
     },
};

export function errorResponse(description: string) {
     return { description, ...errorResponseSchema };
}

export const paginationQuerySchema = {
     type: 'object',
     properties: {
          skip: { type: 'integer', minimum: 0, default: 0, description: 'Rows to skip' },
          limit: {
               type: 'integer',
               minimum: 1,
               maximum: 100,
               default: 50,
               description: 'Maximum number of rows to return',
          },
     },
};
