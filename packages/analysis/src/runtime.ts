import { createProcessRunner, type AppEnv, type ExecutionContext, type Logger, type ProcessRunner } from '@refactor-gate/common';
import { Router } from '@refactor-gate/protocol';

import { registerAnalysisHandlers } from './handlers.js';
import { AnalysisService } from './service.js';
import { loadRewriteTemplates } from './templates.js';

export interface AnalysisRuntimeOptions {
  ctx: ExecutionContext;
  env: Pick<AppEnv, 'ANALYSIS_CONCURRENCY' | 'COVERAGE_TIMEOUT_MS' | 'REWRITE_TEMPLATES_PATH'>;
  logger: Logger;
  runner?: ProcessRunner;
  now?: () => Date;
  templatesPath?: string | null;
  /** Set by every entry point except the refactor loop, which holds the cache lock for its whole run. */
  coverageLock?: { staleMs: number };
}

export interface AnalysisRuntime {
  service: AnalysisService;
  router: Router;
}

/** The service and the router every entry point shares. */
export function createAnalysisRuntime(options: AnalysisRuntimeOptions): AnalysisRuntime {
  const { ctx, env, logger } = options;
  const service = new AnalysisService(
    {
      ctx,
      runner: options.runner ?? createProcessRunner(ctx),
      logger: logger.child({ component: 'analysis' }),
      concurrency: env.ANALYSIS_CONCURRENCY,
      coverageTimeoutMs: env.COVERAGE_TIMEOUT_MS,
      coverageLock: options.coverageLock
    },
    options.now
  );

  const router = new Router(logger.child({ component: 'router' }));
  const templatesPath = options.templatesPath ?? env.REWRITE_TEMPLATES_PATH;
  registerAnalysisHandlers(router, service, { templates: () => loadRewriteTemplates(templatesPath) });

  return { service, router };
}
