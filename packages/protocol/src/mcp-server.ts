import { once } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { setImmediate } from 'node:timers/promises';

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from '@refactor-gate/common';
import { z } from 'zod';

import { decodeMcp, encodeMcp, mcpMethodToRoute, routeToMcpMethod } from './adapters/mcp.js';
import { JsonRpcError, jsonRpcError, jsonRpcResult, parseJsonRpcRequest } from './jsonrpc.js';
import { errorMessageOf } from './response.js';
import type { Router, ToolInputSchema } from './router.js';
import { JSON_RPC_ERRORS, type JsonRpcRequest, type JsonRpcResponse } from './types.js';

export const MCP_PROTOCOL_VERSION = '2024-11-05';

export interface McpServerInfo {
  name: string;
  version: string;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

const EMPTY_INPUT_SCHEMA: ToolInputSchema = { type: 'object', properties: {} };

const toolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional()
});

export function listMcpTools(router: Router): McpTool[] {
  return router
    .list()
    .flatMap((route) => {
      const name = routeToMcpMethod(route);
      return name ? [{ name, description: route.description, inputSchema: route.inputSchema ?? EMPTY_INPUT_SCHEMA }] : [];
    })
    .sort((left, right) => left.name.localeCompare(right.name));
}

function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: 'text', text }], isError } : { content: [{ type: 'text', text }] };
}

/** Runs a tool by name; the handler's rendering comes back as text content, failures with `isError`. */
export async function callMcpTool(router: Router, name: string, args: Record<string, unknown> = {}): Promise<CallToolResult> {
  const route = mcpMethodToRoute(name);
  if (!route || !router.resolve(route.method, route.path)) {
    return textResult(`Unknown tool: ${name}`, true);
  }

  const response = await router.handle(decodeMcp({ jsonrpc: '2.0', id: null, method: name, params: args }));
  return response.status >= 400 ? textResult(errorMessageOf(response), true) : textResult(response.body);
}

/** Answers one decoded JSON-RPC request; notifications (no id) get no response. */
export async function dispatchMcpRequest(
  router: Router,
  request: JsonRpcRequest,
  serverInfo: McpServerInfo
): Promise<JsonRpcResponse | null> {
  const id = request.id ?? null;
  const isNotification = request.id === undefined;

  let response: JsonRpcResponse;
  if (request.method === 'initialize') {
    response = jsonRpcResult(id, {
      protocolVersion: MCP_PROTOCOL_VERSION,
      serverInfo,
      capabilities: { tools: {} }
    });
  } else if (request.method === 'tools/list') {
    response = jsonRpcResult(id, { tools: listMcpTools(router) });
  } else if (request.method === 'tools/call') {
    const params = toolCallParamsSchema.safeParse(request.params);
    response = params.success
      ? jsonRpcResult(id, await callMcpTool(router, params.data.name, params.data.arguments))
      : jsonRpcError(id, { code: JSON_RPC_ERRORS.invalidParams, message: 'tools/call needs a tool name' });
  } else if (request.method.startsWith('notifications/')) {
    return null;
  } else {
    try {
      response = encodeMcp(id, await router.handle(decodeMcp(request)));
    } catch (error) {
      if (!(error instanceof JsonRpcError)) {
        throw error;
      }
      response = jsonRpcError(id, error.toObject());
    }
  }

  return isNotification ? null : response;
}

export async function handleMcpMessage(
  router: Router,
  message: unknown,
  serverInfo: McpServerInfo
): Promise<JsonRpcResponse | null> {
  try {
    return await dispatchMcpRequest(router, parseJsonRpcRequest(message), serverInfo);
  } catch (error) {
    if (error instanceof JsonRpcError) {
      return jsonRpcError(error.id, error.toObject());
    }
    throw error;
  }
}

export interface StdioServerOptions {
  router: Router;
  input: Readable;
  output: Writable;
  serverInfo: McpServerInfo;
  logger?: Logger;
}

/** Serves `tools/list` and `tools/call` over stdio until the input ends and every call has answered. */
export async function serveMcpStdio(options: StdioServerOptions): Promise<void> {
  const server = new Server(options.serverInfo, { capabilities: { tools: {} } });
  const inFlight = new Set<Promise<void>>();

  server.setRequestHandler(ListToolsRequestSchema, () => ({ tools: listMcpTools(options.router) }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const call = callMcpTool(options.router, request.params.name, request.params.arguments);
    const settled = call.then(
      () => undefined,
      () => undefined
    );
    inFlight.add(settled);
    try {
      return await call;
    } finally {
      inFlight.delete(settled);
    }
  });

  server.onerror = (error) => {
    options.logger?.warn({ err: error }, 'mcp transport error');
  };

  const ended = once(options.input, 'end');
  await server.connect(new StdioServerTransport(options.input, options.output));
  await ended;

  // Messages from the last chunk start their handlers on the microtask queue.
  await setImmediate();
  while (inFlight.size > 0) {
    await Promise.all(inFlight);
  }
  await setImmediate();
  await server.close();
}
