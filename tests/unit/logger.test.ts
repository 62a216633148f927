import { createChildLogger, logger } from '@order-service/shared/src/utils/logger';

describe('Logger', () => {
     it('should follow LOG_LEVEL', () => {
          expect(logger.level).toBe('silent');
     });

     it('should tag every line with the service and environment', () => {
          expect(logger.bindings()).toEqual(
               expect.objectContaining({ service: 'order-service', environment: 'test' })
          );
     });

     it('should create child loggers carrying their context', () => {
          const child = createChildLogger({ component: 'order-service' });

          expect(child.bindings()).toEqual(
               expect.objectContaining({ service: 'order-service', component: 'order-service' })
          );
          expect(child.level).toBe(logger.level);
     });

     it('should merge nested child contexts', () => {
          const child = createChildLogger({ component: 'shipment-gateway' }).child({
               orderCode: 'ORD-20240115-093012-0001',
          });

          expect(child.bindings()).toEqual(
               expect.objectContaining({
                    component: 'shipment-gateway',
                    orderCode: 'ORD-20240115-093012-0001',
               })
          );
     });
});
