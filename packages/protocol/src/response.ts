import type { UnifiedResponse } from './types.js';

export const JSON_CONTENT_TYPE = 'application/json';

export function jsonResponse(status: number, value: unknown): UnifiedResponse {
  return {
    status,
    headers: { 'content-type': JSON_CONTENT_TYPE },
    body: JSON.stringify(value, null, 2)
  };
}

export function textResponse(status: number, text: string, contentType = 'text/plain; charset=utf-8'): UnifiedResponse {
  return { status, headers: { 'content-type': contentType }, body: text };
}

export function errorResponse(status: number, message: string, data?: unknown): UnifiedResponse {
  return jsonResponse(status, data === undefined ? { error: message } : { error: message, data });
}

export function isJsonResponse(response: UnifiedResponse): boolean {
  return (response.headers['content-type'] ?? '').startsWith(JSON_CONTENT_TYPE);
}

/** The `error` field of a JSON error body, or the raw body. */
export function errorMessageOf(response: UnifiedResponse): string {
  if (isJsonResponse(response)) {
    try {
      const parsed: unknown = JSON.parse(response.body);
      if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
        return parsed.error;
      }
    } catch {
      return response.body;
    }
  }
  return response.body;
}
