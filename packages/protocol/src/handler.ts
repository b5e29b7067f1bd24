import type { z } from 'zod';

import { ProtocolError } from './errors.js';
import { jsonResponse, textResponse } from './response.js';
import type { UnifiedRequest, UnifiedResponse } from './types.js';

export type Handler = (request: UnifiedRequest) => Promise<UnifiedResponse>;

export type HandlerResult =
  | { status?: number; json: unknown }
  | { status?: number; text: string; contentType?: string };

function decodeBody(request: UnifiedRequest): unknown {
  if (request.body.trim() === '') {
    return { ...request.extensions.httpContext?.query };
  }
  try {
    return JSON.parse(request.body);
  } catch (error) {
    throw new ProtocolError('Json', `Request body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
  return `${field}: ${issue.message}`;
}

export function decodeRequestBody<S extends z.ZodTypeAny>(schema: S, request: UnifiedRequest): z.output<S> {
  const parsed = schema.safeParse(decodeBody(request));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(describeIssue);
    throw new ProtocolError('InvalidFormat', `Invalid request: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/** Validates the decoded body with `schema` before calling `run`; the result becomes JSON or text. */
export function jsonHandler<S extends z.ZodTypeAny>(
  schema: S,
  run: (body: z.output<S>, request: UnifiedRequest) => Promise<HandlerResult>
): Handler {
  return async (request) => {
    const body = decodeRequestBody(schema, request);
    const result = await run(body, request);

    if ('json' in result) {
      return jsonResponse(result.status ?? 200, result.json);
    }
    return textResponse(result.status ?? 200, result.text, result.contentType);
  };
}
