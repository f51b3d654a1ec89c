// Database
export * from './db/client';
export * from './db/unit-of-work';
export * from './db/repositories/item-repository';
export * from './db/repositories/order-repository';

// Messaging
export * from './messaging/client';
export * from './messaging/event-publisher';

// Domain
export * from './domain';

// Services
export * from './services/order-service';
export * from './services/item-service';
export * from './services/mappers';

// Schemas and types
export * from './schemas/order.schemas';
export * from './schemas/item.schemas';
export * from './types/order.types';
export * from './types/item.types';

// Utils
export * from './utils/logger';
export * from './utils/errors';
export * from './utils/validation';
