import type { ExecutionContext, Logger, ProcessRunner } from '@refactor-gate/common';
import type { SourceDocument, Toolchain } from '@refactor-gate/domain';

export interface AnalysisDeps {
  ctx: ExecutionContext;
  runner: ProcessRunner;
  logger: Logger;
  concurrency: number;
  coverageTimeoutMs: number;
  /** Take `<cache>/.lock` around coverage runs; unset when the caller already holds it. */
  coverageLock?: { staleMs: number };
}

/** Files read once per request and shared by every analyzer that needs them. */
export interface ProjectSnapshot {
  root: string;
  toolchain: Toolchain;
  documents: SourceDocument[];
}
