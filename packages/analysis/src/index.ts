export * from './analyzers/churn.js';
export * from './analyzers/coverage.js';
export * from './analyzers/lint.js';
export * from './analyzers/source.js';
export * from './analyzers/tdg.js';
export * from './concurrency.js';
export * from './deep-context/markdown.js';
export * from './deep-context/model.js';
export * from './deep-context/sarif.js';
export * from './deps.js';
export * from './files.js';
export * from './formatters.js';
export * from './handlers.js';
export * from './project.js';
export * from './runtime.js';
export * from './sarif.js';
export * from './service.js';
export * from './templates.js';
