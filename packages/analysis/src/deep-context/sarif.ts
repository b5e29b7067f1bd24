import type { FunctionInfo, SatdItem, SatdSeverity } from '@refactor-gate/domain';

import type { DeadCodeAnalysis } from '../analyzers/source.js';
import { sarifLocation, sarifLog, sarifRule, type SarifLevel, type SarifLog, type SarifResult } from '../sarif.js';
import type { DeepContext } from './model.js';

export const COGNITIVE_THRESHOLD = 15;

const SATD_LEVEL: Record<SatdSeverity, SarifLevel> = { high: 'error', medium: 'warning', low: 'note' };

export const COMPLEXITY_RULES = [
  sarifRule('complexity/high-cyclomatic', 'High cyclomatic complexity', 'warning', ['complexity', 'maintainability']),
  sarifRule('complexity/high-cognitive', 'High cognitive complexity', 'warning', ['complexity', 'maintainability'])
];
export const SATD_RULE = sarifRule('debt/technical-debt', 'Self-admitted technical debt', 'note', ['debt', 'maintainability']);
export const DEAD_CODE_RULE = sarifRule('dead-code/unused-code', 'Dead code detected', 'warning', ['dead-code', 'maintainability']);

/** Cyclomatic above `threshold` is a warning and above twice that an error; cognitive uses its own ceiling. */
export interface ComplexityFindings {
  threshold: number;
  files: readonly { path: string; functions: readonly FunctionInfo[] }[];
}

export function complexityResults(analysis: ComplexityFindings): SarifResult[] {
  const threshold = analysis.threshold;
  return analysis.files.flatMap((file) =>
    file.functions.flatMap((fn) => {
      const results: SarifResult[] = [];
      const properties = { cyclomatic_complexity: fn.cyclomatic, cognitive_complexity: fn.cognitive };
      if (fn.cyclomatic > threshold) {
        results.push({
          ruleId: 'complexity/high-cyclomatic',
          level: fn.cyclomatic > threshold * 2 ? 'error' : 'warning',
          message: { text: `Function '${fn.name}' has cyclomatic complexity of ${fn.cyclomatic}` },
          locations: [sarifLocation(file.path, fn.line, fn.endLine)],
          properties
        });
      }
      if (fn.cognitive > COGNITIVE_THRESHOLD) {
        results.push({
          ruleId: 'complexity/high-cognitive',
          level: fn.cognitive > 25 ? 'error' : 'warning',
          message: { text: `Function '${fn.name}' has cognitive complexity of ${fn.cognitive}` },
          locations: [sarifLocation(file.path, fn.line, fn.endLine)],
          properties
        });
      }
      return results;
    })
  );
}

export function satdResults(items: readonly SatdItem[]): SarifResult[] {
  return items.map((item) => ({
    ruleId: SATD_RULE.id,
    level: SATD_LEVEL[item.severity],
    message: { text: `${item.marker}: ${item.text.trim()}` },
    locations: [sarifLocation(item.file, item.line)],
    properties: { category: item.category, severity: item.severity }
  }));
}

export function deadCodeResults(analysis: DeadCodeAnalysis): SarifResult[] {
  return analysis.files.flatMap((file) =>
    file.items.map((item) => ({
      ruleId: DEAD_CODE_RULE.id,
      level: 'warning' as const,
      message: { text: `${item.itemType} '${item.name}': ${item.reason}` },
      locations: [sarifLocation(file.path, item.line)],
      properties: { confidence: file.confidence }
    }))
  );
}

export function deepContextSarif(context: DeepContext): SarifLog {
  return sarifLog(
    [...COMPLEXITY_RULES, SATD_RULE, DEAD_CODE_RULE],
    [...complexityResults(context), ...satdResults(context.satd.items), ...deadCodeResults(context.deadCode)],
    {
      overall_health_score: context.scorecard.overallHealth,
      technical_debt_hours: context.scorecard.technicalDebtHours
    }
  );
}
