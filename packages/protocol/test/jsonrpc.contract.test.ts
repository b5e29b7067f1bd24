import { describe, expect, it } from 'vitest';

import { encodeJsonRpcRequest, JsonRpcError, parseJsonRpcLine, parseJsonRpcRequest } from '../src/jsonrpc.js';

describe('jsonrpc codec', () => {
  it('encodes requests with the 2.0 envelope', () => {
    const encoded = encodeJsonRpcRequest(7, 'analyze_complexity', { project_path: '.' });

    expect(JSON.parse(encoded)).toEqual({
      jsonrpc: '2.0',
      id: 7,
      method: 'analyze_complexity',
      params: { project_path: '.' }
    });
  });

  it('parses requests and notifications', () => {
    expect(parseJsonRpcLine('{"jsonrpc":"2.0","id":"a","method":"tools/list"}')).toEqual({
      jsonrpc: '2.0',
      id: 'a',
      method: 'tools/list',
      params: undefined
    });
    expect(parseJsonRpcRequest({ jsonrpc: '2.0', method: 'notifications/initialized' }).id).toBeUndefined();
  });

  it('rejects unparsable lines with -32700', () => {
    expect(() => parseJsonRpcLine('{nope')).toThrowError(new JsonRpcError(-32700, 'Parse error'));
    expect(() => parseJsonRpcLine('{nope')).toThrowError(JsonRpcError);
  });

  it('rejects other versions and bad shapes with -32600 and keeps the id', () => {
    let caught: unknown;
    try {
      parseJsonRpcRequest({ jsonrpc: '1.0', id: 3, method: 'initialize' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(JsonRpcError);
    expect(caught).toMatchObject({ code: -32600, id: 3, message: 'Unsupported JSON-RPC version' });
    expect(() => parseJsonRpcRequest({ foo: 'bar' })).toThrowError(/Invalid JSON-RPC request shape/);
  });
});
