import { CommandFailedError, ConfigurationError, describeCommand, splitCommandLine, type ProcessRunner } from '@refactor-gate/common';
import { z } from 'zod';

import { serializeRewriteRequest, type RewriteRequest } from './request.js';

export interface AgentResponse {
  sourceCode: string;
  testCode: string | null;
}

export class AgentResponseError extends Error {
  constructor(readonly command: string) {
    super(`Agent output contained neither a JSON answer nor a fenced code block (${command})`);
    this.name = 'AgentResponseError';
  }
}

/** Receives a rewrite request and answers with the new file contents. */
export type RewriteAgent = (request: RewriteRequest) => Promise<AgentResponse>;

const agentJsonSchema = z.object({
  source_code: z.string(),
  test_code: z.string().nullish()
});

const FENCE = /^```([^\n]*)\n([\s\S]*?)^```/gm;

function parseJsonResponse(output: string): AgentResponse | null {
  const trimmed = output.trim();
  if (!trimmed.startsWith('{')) {
    return null;
  }
  try {
    const parsed = agentJsonSchema.safeParse(JSON.parse(trimmed));
    return parsed.success ? { sourceCode: parsed.data.source_code, testCode: parsed.data.test_code ?? null } : null;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}

/** The first fenced block is the source; a block whose info string mentions `test` carries the tests. */
function parseFencedResponse(output: string): AgentResponse | null {
  let sourceCode: string | null = null;
  let testCode: string | null = null;

  for (const match of output.matchAll(FENCE)) {
    const info = (match[1] ?? '').toLowerCase();
    const body = match[2] ?? '';
    if (info.includes('test') && testCode === null) {
      testCode = body;
    } else if (sourceCode === null) {
      sourceCode = body;
    }
  }

  return sourceCode === null ? null : { sourceCode, testCode };
}

export function parseAgentResponse(output: string): AgentResponse | null {
  return parseJsonResponse(output) ?? parseFencedResponse(output);
}

export interface CommandAgentOptions {
  command: string;
  runner: ProcessRunner;
  cwd: string;
}

/** Runs the configured command with the request JSON on stdin. */
export function createCommandAgent(options: CommandAgentOptions): RewriteAgent {
  const [command, ...args] = splitCommandLine(options.command);
  if (!command) {
    throw new ConfigurationError('Agent command is empty');
  }

  return async (request) => {
    const result = await options.runner(command, args, { cwd: options.cwd, input: serializeRewriteRequest(request) });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(describeCommand(command, args), result.exitCode, result.stderr);
    }

    const response = parseAgentResponse(result.stdout);
    if (!response) {
      throw new AgentResponseError(describeCommand(command, args));
    }
    return response;
  };
}
