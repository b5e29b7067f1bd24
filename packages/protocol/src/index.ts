export * from './adapters/cli.js';
export * from './adapters/http.js';
export * from './adapters/mcp.js';
export * from './errors.js';
export * from './handler.js';
export * from './jsonrpc.js';
export * from './mcp-server.js';
export * from './response.js';
export * from './router.js';
export * from './types.js';
