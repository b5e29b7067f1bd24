import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';

import type { LogLevel } from '@refactor-gate/common';
import {
  JSON_RPC_ERRORS,
  decodeHttp,
  encodeHttp,
  handleMcpMessage,
  jsonRpcError,
  type McpServerInfo,
  type Router
} from '@refactor-gate/protocol';

export const SERVER_INFO: McpServerInfo = { name: 'refactor-gate', version: '0.1.0' };

export interface BuildServerOptions {
  router: Router;
  logLevel?: LogLevel;
  serverInfo?: McpServerInfo;
}

function rawBody(request: FastifyRequest): string {
  return typeof request.body === 'string' ? request.body : '';
}

/** Parses a JSON-RPC body, taking the method from the path when the body leaves it out. */
function mcpMessage(body: string, method: string): unknown {
  const parsed: unknown = JSON.parse(body === '' ? '{}' : body);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return parsed;
  }
  return 'method' in parsed ? parsed : { ...parsed, method };
}

export function buildServer(options: BuildServerOptions): FastifyInstance {
  const app = Fastify({ logger: { level: options.logLevel ?? 'info' } });
  const serverInfo = options.serverInfo ?? SERVER_INFO;

  // Handlers decode bodies themselves, so every adapter sees the same bytes.
  app.addContentTypeParser('application/json', { parseAs: 'string' }, (request, body, done) => {
    done(null, typeof body === 'string' ? body : body.toString('utf8'));
  });

  app.get('/health', async () => ({ status: 'ok' }));

  const forward = async (request: FastifyRequest, reply: FastifyReply) => {
    const response = encodeHttp(
      await options.router.handle(
        decodeHttp({
          method: request.method,
          url: request.url,
          headers: request.headers,
          body: rawBody(request),
          remoteAddress: request.ip
        })
      )
    );
    return reply.code(response.status).headers(response.headers).send(response.body);
  };

  app.get('/api/v1/*', forward);
  app.post('/api/v1/*', forward);

  app.post<{ Params: { method: string } }>('/mcp/:method', async (request, reply) => {
    let message: unknown;
    try {
      message = mcpMessage(rawBody(request), request.params.method);
    } catch (error) {
      request.log.debug({ err: error }, 'unparsable json-rpc body');
      return reply.code(200).send(jsonRpcError(null, { code: JSON_RPC_ERRORS.parseError, message: 'Parse error' }));
    }

    const response = await handleMcpMessage(options.router, message, serverInfo);
    if (!response) {
      return reply.code(204).send();
    }
    return reply.code(200).send(response);
  });

  return app;
}
