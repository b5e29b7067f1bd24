import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import type { ExecutionContext } from './context.js';
import { CommandFailedError } from './errors.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  input?: string;
}

export type ProcessRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<CommandResult>;

interface ExecFailure {
  code?: unknown;
  killed?: boolean;
  stdout: string;
  stderr: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return (
    error instanceof Error &&
    'stdout' in error &&
    typeof error.stdout === 'string' &&
    'stderr' in error &&
    typeof error.stderr === 'string'
  );
}

function exitCodeOf(failure: ExecFailure): number {
  if (typeof failure.code === 'number') {
    return failure.code;
  }
  if (failure.code === 'ENOENT') {
    return 127;
  }
  return 1;
}

/**
 * Runs a command with the context's cwd, env and cancellation signal. A
 * non-zero exit, a missing executable or a timeout all come back as a result.
 */
export async function runCommand(
  ctx: ExecutionContext,
  command: string,
  args: readonly string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const promise = execFileAsync(command, [...args], {
    cwd: options.cwd ?? ctx.cwd,
    env: { ...ctx.env, ...options.env },
    timeout: options.timeoutMs,
    maxBuffer: MAX_BUFFER,
    signal: ctx.signal,
    encoding: 'utf8'
  });

  if (options.input !== undefined) {
    promise.child.stdin?.end(options.input);
  }

  try {
    const { stdout, stderr } = await promise;
    return { exitCode: 0, stdout, stderr, timedOut: false };
  } catch (error) {
    if (isExecFailure(error)) {
      const timedOut = options.timeoutMs !== undefined && error.killed === true;
      return { exitCode: exitCodeOf(error), stdout: error.stdout, stderr: error.stderr, timedOut };
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { exitCode: 127, stdout: '', stderr: error.message, timedOut: false };
    }
    throw error;
  }
}

export function createProcessRunner(ctx: ExecutionContext): ProcessRunner {
  return (command, args, options) => runCommand(ctx, command, args, options);
}

export function describeCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}

/** For callers that treat a failed command as fatal. */
export function ensureSuccess(result: CommandResult, command: string, args: readonly string[]): CommandResult {
  if (result.exitCode !== 0) {
    throw new CommandFailedError(describeCommand(command, args), result.exitCode, result.stderr);
  }
  return result;
}
