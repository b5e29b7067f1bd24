import os from 'node:os';

import { z } from 'zod';

import { ConfigurationError } from './errors.js';

const booleanFlag = z
  .preprocess((value) => value === '1' || value === 'true' || value === true, z.boolean())
  .default(false);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  WEB_PORT: z.coerce.number().int().positive().default(3000),
  WEB_HOST: z.string().min(1).default('127.0.0.1'),
  REFACTOR_CACHE_DIR: z.string().min(1).optional(),
  COVERAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30 * 1000),
  LOCK_STALE_MS: z.coerce.number().int().positive().default(6 * 60 * 60 * 1000),
  ANALYSIS_CONCURRENCY: z.coerce.number().int().positive().default(Math.max(1, os.cpus().length)),
  GITHUB_TOKEN: z.string().min(1).optional(),
  REWRITE_TEMPLATES_PATH: z.string().min(1).optional(),
  REFACTOR_AGENT_COMMAND: z.string().min(1).optional(),
  REFACTOR_CI: booleanFlag
});

export type AppEnv = z.output<typeof envSchema>;

export type LogLevel = AppEnv['LOG_LEVEL'];

export function parseEnv(input: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = envSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') ?? 'environment';
    throw new ConfigurationError(`Invalid ${field}: ${issue?.message ?? 'unparsable value'}`);
  }
  return result.data;
}

/** Splits a shell-like command line on whitespace, honouring single and double quotes. */
export function splitCommandLine(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quote: string | null = null;
  let pending = false;

  for (const char of value) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
      pending = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (pending) {
        parts.push(current);
        current = '';
        pending = false;
      }
      continue;
    }
    current += char;
    pending = true;
  }

  if (quote) {
    throw new ConfigurationError(`Unterminated quote in command: ${value}`);
  }
  if (pending) {
    parts.push(current);
  }
  return parts;
}
