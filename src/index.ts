export * from './kernel/index.js';
export * from './content/index.js';
