export * from './types.js';
export * from './gates.js';
export * from './glob.js';
export * from './severity.js';
export * from './selector.js';
export * from './fix-strategy.js';
export * from './lexer.js';
export * from './complexity.js';
export * from './satd.js';
export * from './issue.js';
export * from './diagnostics.js';
export * from './coverage-report.js';
export * from './churn.js';
export * from './tdg.js';
export * from './dead-code.js';
export * from './plan.js';
export * from './rewrite.js';
export * from './test-deps.js';
export * from './test-stubs.js';
