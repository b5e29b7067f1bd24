export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class LockHeldError extends Error {
  constructor(
    readonly lockPath: string,
    readonly ownerPid: number
  ) {
    super(`Cache is locked by process ${ownerPid} (${lockPath})`);
    this.name = 'LockHeldError';
  }
}

export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    const detail = stderr.trim().split('\n')[0] ?? '';
    super(`${command} exited with ${exitCode}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandFailedError';
  }
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
