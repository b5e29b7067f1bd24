export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse<T = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccessResponse<T> | JsonRpcErrorResponse;

export const JSON_RPC_ERRORS = {
  parseError: -32700,
  invalidRequest: -32600,
  methodNotFound: -32601,
  invalidParams: -32602,
  internalError: -32603,
  serverError: -32000
} as const;

export type Protocol = 'Cli' | 'Http' | 'Mcp';

export const OUTPUT_FORMATS = ['summary', 'full', 'json', 'sarif', 'markdown'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type RequestMethod = 'GET' | 'POST';

export interface CliContext {
  command: string;
  args: string[];
}

export interface HttpContext {
  query: Record<string, string>;
  remoteAddress?: string;
}

export interface McpContext {
  id: JsonRpcId;
  method: string;
}

export interface RequestExtensions {
  protocol: Protocol;
  outputFormat: OutputFormat;
  cliContext?: CliContext;
  httpContext?: HttpContext;
  mcpContext?: McpContext;
}

export interface UnifiedRequest {
  method: RequestMethod;
  path: string;
  body: string;
  headers: Record<string, string>;
  extensions: RequestExtensions;
}

export interface UnifiedResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}
