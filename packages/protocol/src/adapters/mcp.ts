import { JsonRpcError, jsonRpcError, jsonRpcResult } from '../jsonrpc.js';
import { errorMessageOf, isJsonResponse } from '../response.js';
import {
  JSON_RPC_ERRORS,
  OUTPUT_FORMATS,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type RequestMethod,
  type UnifiedRequest,
  type UnifiedResponse
} from '../types.js';

const ANALYZE_PREFIX = 'analyze_';
const ANALYZE_PATH = '/api/v1/analyze/';

const GET_METHODS: Record<string, string> = {
  list_templates: '/api/v1/templates'
};

export interface McpRoute {
  method: RequestMethod;
  path: string;
}

/** `analyze_dead_code` ↔ `POST /api/v1/analyze/dead-code`, `list_templates` ↔ `GET /api/v1/templates`. */
export function mcpMethodToRoute(method: string): McpRoute | null {
  if (method.startsWith(ANALYZE_PREFIX) && method.length > ANALYZE_PREFIX.length) {
    return { method: 'POST', path: `${ANALYZE_PATH}${method.slice(ANALYZE_PREFIX.length).replace(/_/g, '-')}` };
  }
  const path = GET_METHODS[method];
  return path ? { method: 'GET', path } : null;
}

export function routeToMcpMethod(route: McpRoute): string | null {
  if (route.method === 'POST' && route.path.startsWith(ANALYZE_PATH)) {
    return `${ANALYZE_PREFIX}${route.path.slice(ANALYZE_PATH.length).replace(/-/g, '_')}`;
  }
  const entry = Object.entries(GET_METHODS).find(([, path]) => route.method === 'GET' && path === route.path);
  return entry ? entry[0] : null;
}

export function decodeMcp(request: JsonRpcRequest): UnifiedRequest {
  const route = mcpMethodToRoute(request.method);
  if (!route) {
    throw new JsonRpcError(JSON_RPC_ERRORS.methodNotFound, `Method not found: ${request.method}`, request.id ?? null);
  }

  const params = request.params ?? {};
  if (typeof params !== 'object' || params === null || Array.isArray(params)) {
    throw new JsonRpcError(JSON_RPC_ERRORS.invalidParams, 'params must be an object', request.id ?? null);
  }
  const format = 'format' in params ? params.format : undefined;

  return {
    method: route.method,
    path: route.path,
    body: JSON.stringify(params),
    headers: { 'content-type': 'application/json' },
    extensions: {
      protocol: 'Mcp',
      outputFormat: OUTPUT_FORMATS.find((candidate) => candidate === format) ?? 'json',
      mcpContext: { id: request.id ?? null, method: request.method }
    }
  };
}

export function statusToJsonRpcCode(status: number): number {
  switch (status) {
    case 400:
      return JSON_RPC_ERRORS.invalidParams;
    case 404:
      return JSON_RPC_ERRORS.methodNotFound;
    case 500:
      return JSON_RPC_ERRORS.internalError;
    default:
      return JSON_RPC_ERRORS.serverError;
  }
}

function errorData(response: UnifiedResponse): unknown {
  if (!isJsonResponse(response)) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(response.body);
    return typeof parsed === 'object' && parsed !== null && 'data' in parsed ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

/** JSON bodies become the result object; text renderings are wrapped as MCP text content. */
export function encodeMcp(id: JsonRpcId, response: UnifiedResponse): JsonRpcResponse {
  if (response.status < 400) {
    const result: unknown = isJsonResponse(response)
      ? JSON.parse(response.body)
      : { content: [{ type: 'text', text: response.body }] };
    return jsonRpcResult(id, result);
  }

  const data = errorData(response);
  const message = errorMessageOf(response);
  return jsonRpcError(
    id,
    data === undefined
      ? { code: statusToJsonRpcCode(response.status), message }
      : { code: statusToJsonRpcCode(response.status), message, data }
  );
}
