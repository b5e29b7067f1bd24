import path from 'node:path';

export interface ExecutionContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  cacheDir: string;
  signal?: AbortSignal;
}

export const DEFAULT_CACHE_DIRNAME = '.refactor-gate';

export interface ContextInput {
  projectPath: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cacheDir?: string;
  signal?: AbortSignal;
}

/** Resolves the project and cache paths once; later code only reads the returned record. */
export function createExecutionContext(input: ContextInput): ExecutionContext {
  const base = input.cwd ?? process.cwd();
  const cwd = path.resolve(base, input.projectPath);
  const cacheDir = input.cacheDir ? path.resolve(base, input.cacheDir) : path.join(cwd, DEFAULT_CACHE_DIRNAME);

  return {
    cwd,
    env: input.env ?? process.env,
    cacheDir,
    signal: input.signal
  };
}

export function withSignal(ctx: ExecutionContext, signal: AbortSignal | undefined): ExecutionContext {
  return { ...ctx, signal };
}
