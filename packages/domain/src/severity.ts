import type { IssueKeyword, ViolationDetail, ViolationSeverity } from './types.js';

const severityBase: Record<ViolationSeverity, number> = {
  error: 100,
  warning: 50,
  note: 10,
  info: 5
};

const RISKY_LINT = /unsafe|panic|unwrap|expect/;
const COMPLEXITY_LINT = /complexity|cognitive/;

function lintMultiplier(lintName: string): number {
  if (RISKY_LINT.test(lintName)) {
    return 3;
  }
  if (COMPLEXITY_LINT.test(lintName)) {
    return 2;
  }
  return 1;
}

function hasCategory(keywords: readonly IssueKeyword[], category: string): boolean {
  return keywords.some((keyword) => keyword.category === category);
}

/** Extra weight for a violation whose lint lines up with the categories an issue talks about. */
export function issueMultiplier(lintName: string, keywords: readonly IssueKeyword[]): number {
  if (keywords.length === 0) {
    return 1;
  }

  const lint = lintName.toLowerCase();
  if (lint.includes('security') && hasCategory(keywords, 'Security')) {
    return 4;
  }
  if (lint.includes('complexity') && hasCategory(keywords, 'Complexity')) {
    return 3;
  }
  if (lint.includes('performance') && hasCategory(keywords, 'Performance')) {
    return 3;
  }
  if ((lint.includes('bug') || lint.includes('correct')) && hasCategory(keywords, 'Correctness')) {
    return 3;
  }
  return 1;
}

export function violationScore(violation: Pick<ViolationDetail, 'lintName' | 'severity'>, keywords: readonly IssueKeyword[] = []): number {
  const base = severityBase[violation.severity] ?? 5;
  return base * lintMultiplier(violation.lintName) * issueMultiplier(violation.lintName, keywords);
}

export function fileSeverityScore(violations: readonly ViolationDetail[], keywords: readonly IssueKeyword[] = []): number {
  return violations.reduce((total, violation) => total + violationScore(violation, keywords), 0);
}

export function parseViolationSeverity(value: string): ViolationSeverity {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'error' || normalized === 'warning' || normalized === 'note') {
    return normalized;
  }
  if (normalized === 'warn') {
    return 'warning';
  }
  if (normalized === 'help') {
    return 'note';
  }
  return 'info';
}
