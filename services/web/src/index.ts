import { createAnalysisRuntime } from '@refactor-gate/analysis';
import { createExecutionContext, createLogger, parseEnv } from '@refactor-gate/common';

import { buildServer } from './server.js';

async function main() {
  const env = parseEnv();
  const logger = createLogger({ level: env.LOG_LEVEL, name: 'refactor-gate-web' });
  const ctx = createExecutionContext({ projectPath: '.', cacheDir: env.REFACTOR_CACHE_DIR });
  const { router } = createAnalysisRuntime({ ctx, env, logger, coverageLock: { staleMs: env.LOCK_STALE_MS } });

  const app = buildServer({ router, logLevel: env.LOG_LEVEL });

  const close = async () => {
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void close();
  });
  process.on('SIGTERM', () => {
    void close();
  });

  await app.listen({ port: env.WEB_PORT, host: env.WEB_HOST });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
