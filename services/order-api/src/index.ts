import * as dotenv from 'dotenv';
import { loadConfig } from '@order-service/shared/src/config/config';
import { createShipmentGateway } from '@order-service/shared/src/clients/shipment-gateway';
import { createDatabase } from '@order-service/shared/src/db/client';
import { PgUnitOfWork } from '@order-service/shared/src/repositories/unit-of-work';
import { createOrderCodeGenerator } from '@order-service/shared/src/services/order-code-generator';
import { OrderService } from '@order-service/shared/src/services/order-service';
import { ProductService } from '@order-service/shared/src/services/product-service';
import { logger } from '@order-service/shared/src/utils/logger';
import { buildApp } from './app';

// Load environment variables
dotenv.config();

async function main() {
     const config = loadConfig();
     const database = createDatabase(config.database);
     const unitOfWork = new PgUnitOfWork(database);

     const orderService = new OrderService({
          unitOfWork,
          gateway: createShipmentGateway(config.shipment),
          codeGenerator: createOrderCodeGenerator(),
          config: config.orders,
     });
     const productService = new ProductService({
          unitOfWork,
          defaultCurrency: config.orders.defaultCurrency,
     });

     const app = await buildApp(
          { orderService, productService, checkDatabase: database.checkConnection },
          {
               logLevel: process.env.LOG_LEVEL || 'info',
               corsOrigins: config.server.corsOrigins,
               title: config.appName,
          }
     );

     const { host, port } = config.server;
     try {
          await app.listen({ port, host });
          logger.info(
               { shipmentClient: config.shipment.clientType },
               `Order API listening on ${host}:${port}`
          );
          logger.info(`OpenAPI docs available at http://${host}:${port}/docs`);
     } catch (err) {
          logger.error({ err }, 'Failed to start server');
          await database.close();
          process.exit(1);
     }

     // Graceful shutdown
     const shutdown = async (signal: string) => {
          logger.info({ signal }, 'Shutting down gracefully...');
          try {
               await app.close();
               await database.close();
               process.exit(0);
          } catch (err) {
               logger.error({ err }, 'Error during shutdown');
               process.exit(1);
          }
     };

     process.on('SIGINT', () => void shutdown('SIGINT'));
     process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
     logger.fatal({ err }, 'Fatal error');
     process.exit(1);
});
