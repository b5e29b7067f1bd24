import { PassThrough } from 'node:stream';

import { ConfigurationError, LockHeldError } from '@refactor-gate/common';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { decodeCli, encodeCli } from '../src/adapters/cli.js';
import { decodeHttp, encodeHttp } from '../src/adapters/http.js';
import { jsonHandler } from '../src/handler.js';
import { callMcpTool, handleMcpMessage, serveMcpStdio } from '../src/mcp-server.js';
import { jsonResponse } from '../src/response.js';
import { Router } from '../src/router.js';

const serverInfo = { name: 'refactor-gate', version: '0.0.0-test' };

function makeRouter(): Router {
  const echoSchema = z.object({ project_path: z.string(), threshold: z.coerce.number().default(10) });

  return new Router()
    .register({
      method: 'POST',
      path: '/api/v1/analyze/echo',
      description: 'Echoes the decoded body',
      inputSchema: {
        type: 'object',
        properties: { project_path: { type: 'string' }, threshold: { type: 'number' } },
        required: ['project_path']
      },
      handler: jsonHandler(echoSchema, async (body) => ({ json: { project_path: body.project_path, threshold: body.threshold } }))
    })
    .register({
      method: 'POST',
      path: '/api/v1/analyze/broken',
      description: 'Always fails',
      handler: async () => {
        throw new Error('disk on fire');
      }
    })
    .register({
      method: 'POST',
      path: '/api/v1/analyze/misconfigured',
      description: 'Fails validation of the project',
      handler: async () => {
        throw new ConfigurationError('Project path does not exist: /nowhere');
      }
    })
    .register({
      method: 'POST',
      path: '/api/v1/analyze/locked',
      description: 'Finds the cache locked',
      handler: async () => {
        throw new LockHeldError('/work/.refactor-gate/.lock', 4242);
      }
    })
    .register({
      method: 'GET',
      path: '/api/v1/templates',
      description: 'Lists templates',
      handler: jsonHandler(z.object({ toolchain: z.string().optional() }), async (query) => ({
        text: `templates for ${query.toolchain ?? 'all'}`
      }))
    });
}

describe('router', () => {
  it('answers the same body for CLI, HTTP and MCP requests', async () => {
    const router = makeRouter();

    const cli = await router.handle(
      decodeCli({ command: ['analyze', 'echo'], args: [], flags: { 'project-path': '.', threshold: '12' } })
    );
    const http = await router.handle(
      decodeHttp({ method: 'POST', url: '/api/v1/analyze/echo', headers: {}, body: '{"project_path":".","threshold":12}' })
    );
    const mcp = await handleMcpMessage(
      router,
      { jsonrpc: '2.0', id: 1, method: 'analyze_echo', params: { project_path: '.', threshold: 12 } },
      serverInfo
    );

    expect(cli.body).toBe(http.body);
    expect(mcp).toEqual({ jsonrpc: '2.0', id: 1, result: JSON.parse(http.body) });
    expect(JSON.parse(http.body)).toEqual({ project_path: '.', threshold: 12 });
  });

  it('turns validation failures into 400 responses', async () => {
    const response = await makeRouter().handle(
      decodeHttp({ method: 'POST', url: '/api/v1/analyze/echo', headers: {}, body: '{"threshold":"x"}' })
    );

    expect(response.status).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: 'Invalid request: project_path: Required; threshold: Expected number, received nan',
      data: { issues: ['project_path: Required', 'threshold: Expected number, received nan'] }
    });
  });

  it('reports malformed JSON as a Json protocol error', async () => {
    const response = await makeRouter().handle(
      decodeHttp({ method: 'POST', url: '/api/v1/analyze/echo', headers: {}, body: '{' })
    );

    expect(response.status).toBe(400);
    expect(JSON.parse(response.body).error).toMatch(/^Request body is not valid JSON: /);
  });

  it('maps unknown routes to 404 and handler failures to 500', async () => {
    const router = makeRouter();

    const missing = await router.handle(decodeHttp({ method: 'POST', url: '/api/v1/analyze/nope', headers: {}, body: '' }));
    const broken = await router.handle(decodeHttp({ method: 'POST', url: '/api/v1/analyze/broken', headers: {}, body: '' }));
    const misconfigured = await router.handle(
      decodeHttp({ method: 'POST', url: '/api/v1/analyze/misconfigured', headers: {}, body: '' })
    );

    expect(encodeHttp(missing)).toMatchObject({ status: 404, body: '{\n  "error": "No handler for POST /api/v1/analyze/nope"\n}' });
    expect(encodeCli(broken)).toEqual({ exitCode: 2, stdout: '', stderr: 'disk on fire' });
    expect(encodeCli(misconfigured)).toEqual({ exitCode: 1, stdout: '', stderr: 'Project path does not exist: /nowhere' });
  });

  it('maps a held cache lock to 409', async () => {
    const response = await makeRouter().handle(decodeHttp({ method: 'POST', url: '/api/v1/analyze/locked', headers: {}, body: '' }));

    expect(response.status).toBe(409);
    expect(encodeCli(response)).toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'Cache is locked by process 4242 (/work/.refactor-gate/.lock)'
    });
  });

  it('feeds GET query parameters to the handler when the body is empty', async () => {
    const response = await makeRouter().handle(
      decodeHttp({ method: 'GET', url: '/api/v1/templates?toolchain=rust', headers: {}, body: '' })
    );

    expect(response).toEqual({ status: 200, headers: { 'content-type': 'text/plain; charset=utf-8' }, body: 'templates for rust' });
  });

  it('refuses duplicate registrations', () => {
    const router = makeRouter();

    expect(() =>
      router.register({ method: 'GET', path: '/api/v1/templates', description: 'again', handler: async () => jsonResponse(200, {}) })
    ).toThrow('Route already registered: GET /api/v1/templates');
  });
});

describe('mcp server', () => {
  it('answers initialize and tools/list', async () => {
    const router = makeRouter();

    expect(await handleMcpMessage(router, { jsonrpc: '2.0', id: 1, method: 'initialize', params: {} }, serverInfo)).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { protocolVersion: '2024-11-05', serverInfo, capabilities: { tools: {} } }
    });
    expect(await handleMcpMessage(router, { jsonrpc: '2.0', id: 2, method: 'tools/list' }, serverInfo)).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: {
        tools: [
          { name: 'analyze_broken', description: 'Always fails', inputSchema: { type: 'object', properties: {} } },
          {
            name: 'analyze_echo',
            description: 'Echoes the decoded body',
            inputSchema: {
              type: 'object',
              properties: { project_path: { type: 'string' }, threshold: { type: 'number' } },
              required: ['project_path']
            }
          },
          { name: 'analyze_locked', description: 'Finds the cache locked', inputSchema: { type: 'object', properties: {} } },
          { name: 'analyze_misconfigured', description: 'Fails validation of the project', inputSchema: { type: 'object', properties: {} } },
          { name: 'list_templates', description: 'Lists templates', inputSchema: { type: 'object', properties: {} } }
        ]
      }
    });
  });

  it('rejects other JSON-RPC versions and stays silent for notifications', async () => {
    const router = makeRouter();

    expect(await handleMcpMessage(router, { jsonrpc: '1.0', id: 9, method: 'initialize' }, serverInfo)).toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32600, message: 'Unsupported JSON-RPC version' }
    });
    expect(await handleMcpMessage(router, { jsonrpc: '2.0', method: 'notifications/initialized' }, serverInfo)).toBeNull();
    expect(await handleMcpMessage(router, { jsonrpc: '2.0', method: 'analyze_echo', params: { project_path: '.' } }, serverInfo)).toBeNull();
  });

  it('maps handler statuses onto error codes', async () => {
    const router = makeRouter();

    const invalid = await handleMcpMessage(router, { jsonrpc: '2.0', id: 3, method: 'analyze_echo', params: {} }, serverInfo);
    const unknown = await handleMcpMessage(router, { jsonrpc: '2.0', id: 4, method: 'analyze_nothing', params: {} }, serverInfo);

    expect(invalid).toMatchObject({ id: 3, error: { code: -32602, message: 'Invalid request: project_path: Required' } });
    expect(unknown).toMatchObject({ id: 4, error: { code: -32601, message: 'No handler for POST /api/v1/analyze/nothing' } });
  });

  it('runs tools/call through the router', async () => {
    const router = makeRouter();

    expect(await callMcpTool(router, 'analyze_echo', { project_path: 'a' })).toEqual({
      content: [{ type: 'text', text: '{\n  "project_path": "a",\n  "threshold": 10\n}' }]
    });
    expect(await callMcpTool(router, 'list_templates', { toolchain: 'rust' })).toEqual({
      content: [{ type: 'text', text: 'templates for rust' }]
    });
    expect(await callMcpTool(router, 'analyze_broken')).toEqual({ content: [{ type: 'text', text: 'disk on fire' }], isError: true });
    expect(await callMcpTool(router, 'analyze_nothing')).toEqual({
      content: [{ type: 'text', text: 'Unknown tool: analyze_nothing' }],
      isError: true
    });
    expect(
      await handleMcpMessage(
        router,
        { jsonrpc: '2.0', id: 5, method: 'tools/call', params: { name: 'analyze_echo', arguments: {} } },
        serverInfo
      )
    ).toEqual({
      jsonrpc: '2.0',
      id: 5,
      result: { content: [{ type: 'text', text: 'Invalid request: project_path: Required' }], isError: true }
    });
    expect(await handleMcpMessage(router, { jsonrpc: '2.0', id: 6, method: 'tools/call', params: {} }, serverInfo)).toEqual({
      jsonrpc: '2.0',
      id: 6,
      error: { code: -32602, message: 'tools/call needs a tool name' }
    });
  });

  it('serves tools/list and tools/call over stdio and answers every call before closing', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

    const done = serveMcpStdio({ router: makeRouter(), input, output, serverInfo });
    input.write('{"jsonrpc":"2.0","id":1,"method":"tools/call","params":{"name":"analyze_echo","arguments":{"project_path":"a"}}}\n');
    input.write('{"jsonrpc":"2.0","id":2,"method":"tools/list"}\n');
    input.end('{"jsonrpc":"2.0","id":3,"method":"tools/call","params":{"name":"analyze_broken","arguments":{}}}\n');
    await done;

    const responses = chunks
      .join('')
      .trim()
      .split('\n')
      .map((line): unknown => JSON.parse(line));
    expect(responses).toHaveLength(3);
    expect(responses).toContainEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { content: [{ type: 'text', text: '{\n  "project_path": "a",\n  "threshold": 10\n}' }] }
    });
    expect(responses).toContainEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { content: [{ type: 'text', text: 'disk on fire' }], isError: true }
    });
    expect(responses).toContainEqual(expect.objectContaining({ id: 2, result: { tools: expect.any(Array) } }));
  });
});
