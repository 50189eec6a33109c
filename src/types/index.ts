// Re-export all types from a single entry point
export * from './enums.js';
export * from './config.types.js';
export * from './record.types.js';
export * from './render.types.js';
export * from './storage.types.js';
export * from './pipeline.types.js';
