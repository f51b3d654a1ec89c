export * from './decimal';
export * from './money';
export * from './price';
export * from './sku';
export * from './stock-level';
