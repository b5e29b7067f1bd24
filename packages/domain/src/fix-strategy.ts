import { MISSING_TESTS_LINT } from './test-stubs.js';
import type { FixStrategy, ViolationDetail } from './types.js';

export const DEFAULT_SUGGESTION = 'Apply clippy suggestion';

export function determineFixStrategy(violation: Pick<ViolationDetail, 'lintName' | 'suggestion'>): FixStrategy {
  const lint = violation.lintName;

  if (lint === 'satd_item' || lint.includes('unused')) {
    return { kind: 'RemoveDeadCode' };
  }
  if (lint === 'high_complexity' || lint.includes('complexity')) {
    return { kind: 'ExtractFunction' };
  }
  if (lint === 'if_same_then_else' || lint.endsWith('::if_same_then_else')) {
    return { kind: 'SimplifyCondition' };
  }
  if (lint === MISSING_TESTS_LINT) {
    return { kind: 'AddTest' };
  }
  return { kind: 'ApplySuggestion', suggestion: violation.suggestion ?? DEFAULT_SUGGESTION };
}

export function describeFixStrategy(strategy: FixStrategy): string {
  switch (strategy.kind) {
    case 'ApplySuggestion':
      return `ApplySuggestion(${strategy.suggestion})`;
    default:
      return strategy.kind;
  }
}
