import path from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { parseArgs } from 'node:util';

import { createAnalysisRuntime } from '@refactor-gate/analysis';
import {
  ConfigurationError,
  createExecutionContext,
  createLogger,
  LockHeldError,
  parseEnv,
  writeFileAtomic,
  type AppEnv,
  type Logger,
  type ProcessRunner
} from '@refactor-gate/common';
import {
  decodeCli,
  encodeCli,
  ProtocolError,
  serveMcpStdio,
  type CliFlagValue,
  type CliInvocation,
  type Router,
  type UnifiedRequest
} from '@refactor-gate/protocol';
import { buildServer, SERVER_INFO } from '@refactor-gate/web';

import { parseRefactorFlags, REFACTOR_OPTIONS, runRefactorAuto } from './refactor-command.js';

export const USAGE = `Usage: refactor-gate <command> [options]

Commands:
  analyze <kind>   Run one analyzer (complexity, satd, dead-code, churn, tdg,
                   deep-context, lint-hotspot, compilation-errors, coverage)
  context          Deep context as Markdown (analyze deep-context)
  list, templates  List configured rewrite templates
  refactor auto    Run the quality-gate refactor loop
  serve            Start the HTTP server
  mcp              Serve JSON-RPC over stdio
`;

export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  stdin: Readable;
  env: NodeJS.ProcessEnv;
  cwd: string;
  signal?: AbortSignal;
  runner?: ProcessRunner;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const ANALYZE_OPTIONS = {
  'project-path': { type: 'string' },
  format: { type: 'string' },
  output: { type: 'string' },
  include: { type: 'string', multiple: true },
  exclude: { type: 'string', multiple: true },
  toolchain: { type: 'string' },
  threshold: { type: 'string' },
  days: { type: 'string' },
  file: { type: 'string' }
} as const;

const SERVE_OPTIONS = {
  port: { type: 'string' },
  host: { type: 'string' }
} as const;

/** parseArgs reports unknown or malformed options as TypeErrors. */
function parseUsage<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof TypeError) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

function decodeInvocation(invocation: CliInvocation): UnifiedRequest {
  try {
    return decodeCli(invocation);
  } catch (error) {
    if (error instanceof ProtocolError) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

function withNewline(text: string): string {
  return text === '' || text.endsWith('\n') ? text : `${text}\n`;
}

interface CommandScope {
  io: CliIo;
  env: AppEnv;
  logger: Logger;
}

function analysisRouter(scope: CommandScope): Router {
  const ctx = createExecutionContext({
    projectPath: '.',
    cwd: scope.io.cwd,
    env: scope.io.env,
    cacheDir: scope.env.REFACTOR_CACHE_DIR,
    signal: scope.io.signal
  });
  return createAnalysisRuntime({
    ctx,
    env: scope.env,
    logger: scope.logger,
    runner: scope.io.runner,
    coverageLock: { staleMs: scope.env.LOCK_STALE_MS }
  }).router;
}

async function runAnalyze(scope: CommandScope, command: string[], args: string[], defaults: Record<string, string>): Promise<number> {
  const { values } = parseUsage(() => parseArgs({ args, options: ANALYZE_OPTIONS, allowPositionals: false, strict: true }));

  const flags: Record<string, CliFlagValue> = { 'project-path': '.', ...defaults };
  for (const [name, value] of Object.entries(values)) {
    if (value !== undefined && name !== 'output') {
      flags[name] = value;
    }
  }

  const output = encodeCli(await analysisRouter(scope).handle(decodeInvocation({ command, args, flags })));
  if (output.exitCode !== 0) {
    scope.io.stderr.write(withNewline(output.stderr));
    return output.exitCode;
  }

  if (values.output) {
    const target = path.resolve(scope.io.cwd, values.output);
    await writeFileAtomic(target, withNewline(output.stdout));
    scope.logger.info({ output: target }, 'report written');
  } else {
    scope.io.stdout.write(withNewline(output.stdout));
  }
  return 0;
}

async function runServe(scope: CommandScope, args: string[]): Promise<number> {
  const { values } = parseUsage(() => parseArgs({ args, options: SERVE_OPTIONS, strict: true }));
  const port = values.port === undefined ? scope.env.WEB_PORT : Number(values.port);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`Invalid --port: ${values.port ?? ''}`);
  }

  const app = buildServer({ router: analysisRouter(scope), logLevel: scope.env.LOG_LEVEL });
  await app.listen({ port, host: values.host ?? scope.env.WEB_HOST });

  const signal = scope.io.signal;
  if (signal) {
    await new Promise<void>((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      signal.addEventListener('abort', () => resolve(), { once: true });
    });
    await app.close();
  }
  return 0;
}

async function runRefactor(scope: CommandScope, args: string[]): Promise<number> {
  const [sub, ...rest] = args;
  if (sub !== 'auto') {
    throw new UsageError(`Unknown refactor command: ${sub ?? '(none)'}`);
  }
  const { values } = parseUsage(() => parseArgs({ args: rest, options: REFACTOR_OPTIONS, strict: true }));

  return runRefactorAuto({
    flags: parseRefactorFlags(values),
    env: scope.env,
    cwd: scope.io.cwd,
    processEnv: scope.io.env,
    logger: scope.logger,
    reporter: {
      progress: (text) => scope.io.stderr.write(text),
      request: (text) => scope.io.stdout.write(text)
    },
    write: (text) => scope.io.stdout.write(text),
    signal: scope.io.signal,
    runner: scope.io.runner
  });
}

async function dispatch(argv: string[], io: CliIo): Promise<number> {
  const [command, ...rest] = argv;
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    io.stdout.write(USAGE);
    return 0;
  }

  const env = parseEnv(io.env);
  const scope: CommandScope = { io, env, logger: createLogger({ level: env.LOG_LEVEL }) };

  switch (command) {
    case 'analyze': {
      const [kind, ...args] = rest;
      if (!kind || kind.startsWith('-')) {
        throw new UsageError('analyze needs an analyzer kind');
      }
      return runAnalyze(scope, ['analyze', kind], args, {});
    }
    case 'context':
      return runAnalyze(scope, ['analyze', 'deep-context'], rest, { format: 'markdown' });
    case 'list':
    case 'templates':
      return runAnalyze(scope, [command], rest, {});
    case 'refactor':
      return runRefactor(scope, rest);
    case 'serve':
      return runServe(scope, rest);
    case 'mcp':
      await serveMcpStdio({
        router: analysisRouter(scope),
        input: io.stdin,
        output: io.stdout,
        serverInfo: SERVER_INFO,
        logger: scope.logger
      });
      return 0;
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/** Runs one invocation. Usage errors exit 1, configuration and lock errors exit 2; anything else propagates. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  try {
    return await dispatch(argv, io);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`error: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    if (error instanceof ConfigurationError || error instanceof LockHeldError) {
      io.stderr.write(`error: ${error.message}\n`);
      return 2;
    }
    throw error;
  }
}
