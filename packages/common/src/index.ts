export * from './case.js';
export * from './context.js';
export * from './env.js';
export * from './errors.js';
export * from './fs.js';
export * from './github.js';
export * from './lock.js';
export * from './logger.js';
export * from './process.js';
export * from './state-store.js';
