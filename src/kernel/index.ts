export * from './alternatives.js';
export * from './branded.js';
export * from './content-error.js';
export * from './diagnostic-codes.js';
export * from './diagnostic-order.js';
export * from './diagnostics.js';
export * from './logger.js';
