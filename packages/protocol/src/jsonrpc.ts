import { z } from 'zod';

import {
  JSON_RPC_ERRORS,
  type JsonRpcErrorObject,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcSuccessResponse
} from './types.js';

const idSchema = z.union([z.string(), z.number(), z.null()]);

const envelopeSchema = z.object({
  jsonrpc: z.unknown(),
  id: idSchema.optional(),
  method: z.string().min(1),
  params: z.unknown().optional()
});

export class JsonRpcError extends Error {
  constructor(
    readonly code: number,
    message: string,
    readonly id: JsonRpcId = null,
    readonly data?: unknown
  ) {
    super(message);
    this.name = 'JsonRpcError';
  }

  toObject(): JsonRpcErrorObject {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

function idOf(value: unknown): JsonRpcId {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return null;
  }
  const parsed = idSchema.safeParse(value.id);
  return parsed.success ? parsed.data : null;
}

/** Validates an already-decoded envelope; `jsonrpc` must be exactly "2.0". */
export function parseJsonRpcRequest(value: unknown): JsonRpcRequest {
  const parsed = envelopeSchema.safeParse(value);
  if (!parsed.success) {
    throw new JsonRpcError(JSON_RPC_ERRORS.invalidRequest, 'Invalid JSON-RPC request shape', idOf(value));
  }

  const { jsonrpc, id, method, params } = parsed.data;
  if (jsonrpc !== '2.0') {
    throw new JsonRpcError(JSON_RPC_ERRORS.invalidRequest, 'Unsupported JSON-RPC version', id ?? null);
  }

  return { jsonrpc: '2.0', id, method, params };
}

export function parseJsonRpcLine(line: string): JsonRpcRequest {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    throw new JsonRpcError(JSON_RPC_ERRORS.parseError, 'Parse error');
  }
  return parseJsonRpcRequest(value);
}

export function encodeJsonRpcRequest(id: JsonRpcId, method: string, params?: unknown): string {
  const request: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
  return JSON.stringify(request);
}

export function jsonRpcResult<T>(id: JsonRpcId, result: T): JsonRpcSuccessResponse<T> {
  return { jsonrpc: '2.0', id, result };
}

export function jsonRpcError(id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcErrorResponse {
  return { jsonrpc: '2.0', id, error };
}
