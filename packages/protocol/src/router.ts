import { ConfigurationError, errorMessage, LockHeldError, type Logger } from '@refactor-gate/common';

import { HandlerNotFoundError, ProtocolError } from './errors.js';
import type { Handler } from './handler.js';
import { errorResponse } from './response.js';
import type { RequestMethod, UnifiedRequest, UnifiedResponse } from './types.js';

/** JSON Schema for a route's arguments, as MCP clients see it in `tools/list`. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
}

export interface RouteDefinition {
  method: RequestMethod;
  path: string;
  description: string;
  handler: Handler;
  inputSchema?: ToolInputSchema;
}

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

/** One table of handlers shared by every protocol adapter. */
export class Router {
  private readonly routes = new Map<string, RouteDefinition>();

  constructor(private readonly logger?: Logger) {}

  register(route: RouteDefinition): this {
    const key = routeKey(route.method, route.path);
    if (this.routes.has(key)) {
      throw new Error(`Route already registered: ${key}`);
    }
    this.routes.set(key, route);
    return this;
  }

  resolve(method: string, path: string): RouteDefinition | null {
    return this.routes.get(routeKey(method, path)) ?? null;
  }

  list(): RouteDefinition[] {
    return Array.from(this.routes.values());
  }

  async handle(request: UnifiedRequest): Promise<UnifiedResponse> {
    try {
      const route = this.resolve(request.method, request.path);
      if (!route) {
        throw new HandlerNotFoundError(request.method, request.path);
      }
      return await route.handler(request);
    } catch (error) {
      return this.toErrorResponse(error, request);
    }
  }

  private toErrorResponse(error: unknown, request: UnifiedRequest): UnifiedResponse {
    if (error instanceof HandlerNotFoundError) {
      return errorResponse(error.status, error.message);
    }
    if (error instanceof ProtocolError) {
      return errorResponse(error.status, error.message, error.details);
    }
    if (error instanceof ConfigurationError) {
      return errorResponse(400, error.message);
    }
    if (error instanceof LockHeldError) {
      return errorResponse(409, error.message);
    }

    this.logger?.error({ err: error, path: request.path, protocol: request.extensions.protocol }, 'handler failed');
    return errorResponse(500, errorMessage(error));
  }
}
