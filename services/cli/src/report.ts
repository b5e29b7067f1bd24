import { snakeCaseKeys } from '@refactor-gate/common';
import {
  describeFixStrategy,
  type FileRewritePlan,
  type RefactorState,
  type RefactorStatus,
  type SelectedTarget
} from '@refactor-gate/domain';

import type { RefactorOutcome } from './orchestrator.js';

export type SummaryFormat = 'json' | 'markdown';

function percent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function renderProgressBlock(state: RefactorState, target: SelectedTarget | null): string {
  const { progress } = state;
  const lines = [
    `Iteration ${state.iteration} | Phase: ${progress.currentPhase} | Overall ${percent(progress.overallCompletionPercent)}`,
    `  Lint ${percent(progress.lintCompletionPercent)} | Complexity ${percent(progress.complexityCompletionPercent)} | SATD ${percent(progress.satdCompletionPercent)} | Coverage ${percent(progress.coverageCompletionPercent)}`,
    `  Files completed: ${progress.filesCompleted} (remaining ${progress.filesRemaining}) | ETA ${progress.estimatedTimeRemainingMinutes} min`
  ];
  if (target) {
    lines.push(`  Target: ${target.file} [${target.tier}] ${target.reason}`);
  }
  if (progress.qualityGatesRemaining.length > 0) {
    lines.push(`  Remaining gates: ${progress.qualityGatesRemaining.join('; ')}`);
  }
  return `${lines.join('\n')}\n`;
}

export function renderPlan(plan: FileRewritePlan): string {
  const lines = [`Plan for ${plan.filePath} (${plan.violations.length} violations)`];
  for (const violation of plan.violations) {
    lines.push(`  ${violation.line}:${violation.column} ${violation.lintName} -> ${describeFixStrategy(violation.fixStrategy)}`);
  }
  return `${lines.join('\n')}\n`;
}

export function summaryJson(outcome: RefactorOutcome): unknown {
  return snakeCaseKeys({
    status: outcome.status,
    iterations: outcome.iterations,
    filesCompleted: outcome.state.filesCompleted,
    progress: outcome.state.progress,
    metrics: outcome.state.qualityMetrics,
    message: outcome.message
  });
}

export function renderSummaryMarkdown(outcome: RefactorOutcome): string {
  const { progress, qualityMetrics: metrics } = outcome.state;
  const sections: string[] = [];

  sections.push('## Refactor Summary');
  sections.push(
    [
      `Status: **${outcome.status}**`,
      `Iterations: ${outcome.iterations}`,
      `Overall completion: ${percent(progress.overallCompletionPercent)}`,
      `Phase: ${progress.currentPhase}`
    ].join('\n')
  );
  if (outcome.message) {
    sections.push(outcome.message);
  }

  sections.push('### Metrics');
  sections.push(
    [
      `- Lint violations: ${metrics.totalViolations} in ${metrics.filesWithIssues} of ${metrics.totalFiles} files`,
      `- Coverage: ${percent(metrics.coveragePercent)}`,
      `- Max complexity: ${metrics.maxComplexity} (${metrics.functionsWithHighComplexity} of ${metrics.totalFunctions} functions over the limit)`,
      `- SATD items: ${metrics.satdCount}`
    ].join('\n')
  );

  if (progress.qualityGatesPassed.length > 0) {
    sections.push('### Gates passed');
    sections.push(progress.qualityGatesPassed.map((gate) => `- ${gate}`).join('\n'));
  }
  if (progress.qualityGatesRemaining.length > 0) {
    sections.push('### Gates remaining');
    sections.push(progress.qualityGatesRemaining.map((gate) => `- ${gate}`).join('\n'));
  }

  sections.push('### Files completed');
  sections.push(
    outcome.state.filesCompleted.length === 0
      ? 'None yet.'
      : outcome.state.filesCompleted.map((file) => `- \`${file}\``).join('\n')
  );

  return `${sections.join('\n\n')}\n`;
}

export function renderSummary(outcome: RefactorOutcome, format: SummaryFormat): string {
  return format === 'json' ? `${JSON.stringify(summaryJson(outcome), null, 2)}\n` : renderSummaryMarkdown(outcome);
}

/** Outside CI every finished run exits 0; in CI anything short of Complete fails. Cancellation is never a failure. */
export function exitCodeFor(status: RefactorStatus, ciMode: boolean): number {
  if (status === 'Complete' || status === 'Canceled' || !ciMode) {
    return 0;
  }
  return 1;
}
