import Fastify, { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import cors from '@fastify/cors';
import { randomUUID } from 'crypto';
import type { OrderService } from '@order-service/shared/src/services/order-service';
import type { ProductService } from '@order-service/shared/src/services/product-service';
import { handleRouteError } from './errors';
import { registerOrderRoutes } from './routes/orders';
import { registerProductRoutes } from './routes/products';

export interface AppDependencies {
     orderService: OrderService;
     productService: ProductService;
     checkDatabase: () => Promise<boolean>;
}

export interface AppOptions {
     /** Fastify request log level; false disables request logging. */
     logLevel?: string | false;
     docs?: boolean;
     corsOrigins?: string[];
     title?: string;
}

function correlationId(header: string | string[] | undefined): string {
     return typeof header === 'string' && header !== '' ? header : randomUUID();
}

export async function buildApp(
     dependencies: AppDependencies,
     options: AppOptions = {}
): Promise<FastifyInstance> {
     const { logLevel = false, docs = true, corsOrigins = ['*'], title = 'Order API' } = options;

     const app = Fastify({
          logger: logLevel ? { level: logLevel } : false,
          requestIdHeader: 'x-correlation-id',
          genReqId: (req) => correlationId(req.headers['x-correlation-id']),
          ajv: {
               customOptions: {
                    removeAdditional: 'all',
                    coerceTypes: true,
                    useDefaults: true,
                    strict: false,
               },
          },
     });

     app.setErrorHandler(handleRouteError);

     // CORS
     await app.register(cors, {
          origin: corsOrigins.includes('*') ? true : corsOrigins,
     });

     // OpenAPI/Swagger
     if (docs) {
          await app.register(swagger, {
               openapi: {
                    info: {
                         title,
                         description:
                              'Order management with shipment-gated order creation and status tracking',
                         version: '1.0.0',
                    },
                    tags: [
                         { name: 'orders', description: 'Order creation and status transitions' },
                         { name: 'products', description: 'Product catalog' },
                         { name: 'health', description: 'Health and readiness checks' },
                    ],
               },
          });

          await app.register(swaggerUi, {
               routePrefix: '/docs',
               uiConfig: {
                    docExpansion: 'list',
                    deepLinking: true,
               },
          });
     }

     // Health checks
     app.get(
          '/health',
          {
               schema: {
                    tags: ['health'],
                    description: 'Basic health check',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ok' },
                                   timestamp: { type: 'string', format: 'date-time' },
                              },
                         },
                    },
               },
          },
          async () => {
               return {
                    status: 'ok',
                    timestamp: new Date().toISOString(),
               };
          }
     );

     app.get(
          '/health/ready',
          {
               schema: {
                    tags: ['health'],
                    description: 'Readiness check with dependency validation',
                    response: {
                         200: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string', example: 'ready' },
                                   dependencies: {
                                        type: 'object',
                                        properties: {
                                             database: { type: 'string' },
                                        },
                                   },
                              },
                         },
                         503: {
                              type: 'object',
                              properties: {
                                   status: { type: 'string' },
                                   error: { type: 'string' },
                              },
                         },
                    },
               },
          },
          async (_request, reply) => {
               try {
                    const dbHealthy = await dependencies.checkDatabase();
                    if (!dbHealthy) {
                         reply.code(503);
                         return {
                              status: 'not_ready',
                              error: 'Database connection failed',
                         };
                    }

                    return {
                         status: 'ready',
                         dependencies: {
                              database: 'ok',
                         },
                    };
               } catch (error) {
                    reply.code(503);
                    return {
                         status: 'not_ready',
                         error: error instanceof Error ? error.message : 'Unknown error',
                    };
               }
          }
     );

     await app.register(registerOrderRoutes, {
          prefix: '/orders',
          orderService: dependencies.orderService,
     });
     await app.register(registerProductRoutes, {
          prefix: '/products',
          productService: dependencies.productService,
     });

     return app;
}
