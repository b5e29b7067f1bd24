import { ProtocolError } from '../errors.js';
import { OUTPUT_FORMATS, type OutputFormat, type RequestMethod, type UnifiedRequest, type UnifiedResponse } from '../types.js';

export interface HttpInput {
  method: string;
  url: string;
  headers: Record<string, string | string[] | undefined>;
  body: string;
  remoteAddress?: string;
}

export interface HttpOutput {
  status: number;
  headers: Record<string, string>;
  body: string;
}

function normalizeHeaders(headers: HttpInput['headers']): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

function parseMethod(method: string): RequestMethod {
  const upper = method.toUpperCase();
  if (upper === 'GET' || upper === 'POST') {
    return upper;
  }
  throw new ProtocolError('Decode', `Unsupported HTTP method: ${method}`);
}

function parseBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

function formatFrom(body: string, query: Record<string, string>): OutputFormat {
  const parsed = body.trim() === '' ? null : parseBody(body);
  const candidate: unknown =
    typeof parsed === 'object' && parsed !== null && 'format' in parsed ? parsed.format : query.format;
  return OUTPUT_FORMATS.find((format) => format === candidate) ?? 'json';
}

export function decodeHttp(input: HttpInput): UnifiedRequest {
  const url = new URL(input.url, 'http://localhost');
  const query = Object.fromEntries(url.searchParams.entries());

  return {
    method: parseMethod(input.method),
    path: url.pathname,
    body: input.body,
    headers: normalizeHeaders(input.headers),
    extensions: {
      protocol: 'Http',
      outputFormat: formatFrom(input.body, query),
      httpContext: { query, remoteAddress: input.remoteAddress }
    }
  };
}

export function encodeHttp(response: UnifiedResponse): HttpOutput {
  return { status: response.status, headers: { ...response.headers }, body: response.body };
}

export function decodeHttpResponse(output: HttpOutput): UnifiedResponse {
  return { status: output.status, headers: normalizeHeaders(output.headers), body: output.body };
}
