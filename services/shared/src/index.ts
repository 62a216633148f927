// Config
export * from './config/config';

// Database
export * from './db/client';

// Repositories
export * from './repositories/order-repository';
export * from './repositories/product-repository';
export * from './repositories/unit-of-work';

// Services
export * from './services/address-parser';
export * from './services/order-code-generator';
export * from './services/order-service';
export * from './services/pricing-calculator';
export * from './services/product-service';
export * from './services/status-projection';

// Clients
export * from './clients/shipment-gateway';

// Types
export * from './types/order.types';
export * from './types/product.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
