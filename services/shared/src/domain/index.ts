export * from './value-objects';
export * from './events';
export * from './aggregate-root';
export * from './order-item';
export * from './order';
export * from './item';
export * from './repositories';
