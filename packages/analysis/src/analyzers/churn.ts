import { CHURN_LOG_FORMAT, emptyChurn, parseGitLog, type ChurnAnalysis } from '@refactor-gate/domain';

import type { AnalysisDeps } from '../deps.js';

export const DEFAULT_CHURN_DAYS = 30;

/** Commit history over the last `days`; anything but a readable git log yields an empty result. */
export async function analyzeChurn(
  root: string,
  deps: Pick<AnalysisDeps, 'runner' | 'logger'>,
  days: number = DEFAULT_CHURN_DAYS,
  now: Date = new Date()
): Promise<ChurnAnalysis> {
  // numstat paths relative to `root`, which may sit below the repository root.
  const args = ['log', `--since=${days} days ago`, '--relative', '--numstat', `--format=${CHURN_LOG_FORMAT}`];
  const result = await deps.runner('git', args, { cwd: root, env: { GIT_TERMINAL_PROMPT: '0' } });

  if (result.exitCode !== 0) {
    deps.logger.warn({ tool: 'git', exitCode: result.exitCode, stderr: result.stderr.trim() }, 'churn analysis skipped');
    return emptyChurn(days);
  }

  return parseGitLog(result.stdout, days, now);
}
