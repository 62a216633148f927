import type { FastifyInstance } from 'fastify';
import type { ShipmentGateway } from '@order-service/shared/src/clients/shipment-gateway';
import type { OrderCodeGenerator } from '@order-service/shared/src/services/order-code-generator';
import { OrderService } from '@order-service/shared/src/services/order-service';
import { ProductService } from '@order-service/shared/src/services/product-service';
import { buildApp } from '@order-service/order-api/src/app';
import { InMemoryStore, TEST_WORKFLOW_CONFIG } from './testUtils';

export interface TestAppOptions {
     store: InMemoryStore;
     gateway: ShipmentGateway;
     codeGenerator: OrderCodeGenerator;
     clock?: () => Date;
     checkDatabase?: () => Promise<boolean>;
     docs?: boolean;
}

/** The order API wired to in-process stand-ins; nothing leaves the process. */
export async function buildTestApp(options: TestAppOptions): Promise<FastifyInstance> {
     const orderService = new OrderService({
          unitOfWork: options.store,
          gateway: options.gateway,
          codeGenerator: options.codeGenerator,
          config: TEST_WORKFLOW_CONFIG,
          clock: options.clock,
     });
     const productService = new ProductService({
          unitOfWork: options.store,
          defaultCurrency: TEST_WORKFLOW_CONFIG.defaultCurrency,
          clock: options.clock,
     });

     const app = await buildApp(
          {
               orderService,
               productService,
               checkDatabase: options.checkDatabase ?? (async () => true),
          },
          { docs: options.docs ?? false }
     );
     await app.ready();
     return app;
}
