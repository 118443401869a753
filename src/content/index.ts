export * from './bootstrap.js';
export * from './change-source.js';
export * from './collections.js';
export * from './config.js';
export * from './decode-file.js';
export * from './derive.js';
export * from './load-source.js';
export * from './merge.js';
export * from './pack-files.js';
export * from './pipeline.js';
export * from './registry.js';
export * from './reload-supervisor.js';
export * from './resolve-sources.js';
export * from './schema-artifacts.js';
export * from './schemas.js';
export * from './snapshot.js';
export * from './validate.js';
