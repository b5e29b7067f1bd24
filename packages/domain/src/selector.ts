import { isNonRefactorableFile, normalizePath, passesFilters } from './glob.js';
import { fileSeverityScore } from './severity.js';
import type {
  CompilationError,
  FileComplexity,
  IssueKeyword,
  QualityMetrics,
  QualityProfile,
  Selection,
  SelectedTarget,
  SelectionFilters,
  ViolationDetail
} from './types.js';

export interface SourceFileStat {
  path: string;
  sloc: number;
}

export interface SelectionInput {
  profile: QualityProfile;
  metrics: QualityMetrics;
  filters: SelectionFilters;
  filesCompleted: readonly string[];
  /** Restricts every tier to these paths when the mode names explicit targets. */
  targetSet?: readonly string[] | null;
  /** Paths already handled during this invocation without being completed (dry runs). */
  skipped?: readonly string[];
  violations: readonly ViolationDetail[];
  compilationErrors?: readonly CompilationError[];
  coverageByFile: Readonly<Record<string, number>>;
  sourceFiles: readonly SourceFileStat[];
  complexity: readonly FileComplexity[];
  satdByFile: Readonly<Record<string, number>>;
  issueKeywords?: readonly IssueKeyword[];
  coverageDriven?: boolean;
}

export const MIN_COVERAGE_DRIVEN_SLOC = 20;

function selected(file: string, tier: SelectedTarget['tier'], reason: string): SelectedTarget {
  return { kind: 'selected', file, tier, reason };
}

function createEligibility(input: SelectionInput) {
  const completed = new Set(input.filesCompleted.map(normalizePath));
  const skipped = new Set((input.skipped ?? []).map(normalizePath));
  const targets = input.targetSet ? new Set(input.targetSet.map(normalizePath)) : null;

  return (file: string, allowNonRefactorable: boolean): boolean => {
    const normalized = normalizePath(file);
    if (completed.has(normalized) || skipped.has(normalized)) {
      return false;
    }
    if (targets && !targets.has(normalized)) {
      return false;
    }
    if (!allowNonRefactorable && isNonRefactorableFile(normalized)) {
      return false;
    }
    if (targets) {
      return true;
    }
    return passesFilters(normalized, input.filters);
  };
}

function groupByFile<T extends { file: string }>(items: readonly T[]): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const item of items) {
    const key = normalizePath(item.file);
    const list = grouped.get(key);
    if (list) {
      list.push(item);
    } else {
      grouped.set(key, [item]);
    }
  }
  return grouped;
}

export function selectLintTarget(input: SelectionInput): SelectedTarget | null {
  const eligible = createEligibility(input);
  const keywords = input.issueKeywords ?? [];

  const ranked = Array.from(groupByFile(input.violations).entries())
    .filter(([file]) => eligible(file, true))
    .map(([file, violations]) => ({
      file,
      count: violations.length,
      severity: fileSeverityScore(violations, keywords),
      coverage: input.coverageByFile[file] ?? 100
    }))
    .sort((left, right) => {
      if (right.count !== left.count) {
        return right.count - left.count;
      }
      if (right.severity !== left.severity) {
        return right.severity - left.severity;
      }
      if (left.coverage !== right.coverage) {
        return left.coverage - right.coverage;
      }
      return left.file.localeCompare(right.file);
    });

  const best = ranked[0];
  if (!best) {
    return null;
  }
  return selected(best.file, 'lint', `${best.count} lint violations (severity score ${best.severity})`);
}

export function selectBuildTarget(input: SelectionInput): SelectedTarget | null {
  const eligible = createEligibility(input);

  const ranked = Array.from(groupByFile(input.compilationErrors ?? []).entries())
    .filter(([file]) => eligible(file, true))
    .sort((left, right) => right[1].length - left[1].length || left[0].localeCompare(right[0]));

  const best = ranked[0];
  if (!best) {
    return null;
  }
  return selected(best[0], 'build', `${best[1].length} compilation errors`);
}

export function selectCoverageTarget(input: SelectionInput): SelectedTarget | null {
  const eligible = createEligibility(input);
  const minimum = input.profile.coverageMin;

  const gaps = input.sourceFiles
    .map((file) => ({ ...file, path: normalizePath(file.path) }))
    .filter((file) => eligible(file.path, false))
    .map((file) => ({ ...file, coverage: input.coverageByFile[file.path] ?? 0 }))
    .filter((file) => file.coverage < minimum);

  if (input.coverageDriven) {
    const best = gaps
      .filter((file) => file.sloc >= MIN_COVERAGE_DRIVEN_SLOC)
      .sort((left, right) => left.coverage - right.coverage || right.sloc - left.sloc || left.path.localeCompare(right.path))[0];
    if (best) {
      return selected(best.path, 'coverage', `largest file with lowest coverage (${best.coverage.toFixed(1)}%, ${best.sloc} lines)`);
    }
    return null;
  }

  const first = gaps.sort((left, right) => left.path.localeCompare(right.path))[0];
  if (!first) {
    return null;
  }
  return selected(first.path, 'coverage', `coverage ${first.coverage.toFixed(1)}% below ${minimum}%`);
}

export function selectExtremeQualityTarget(input: SelectionInput): SelectedTarget | null {
  const eligible = createEligibility(input);
  const { profile, metrics } = input;

  if (metrics.maxComplexity > profile.complexityMax) {
    const best = input.complexity
      .map((file) => ({ ...file, path: normalizePath(file.path) }))
      .filter((file) => eligible(file.path, false))
      .filter((file) => file.functions.some((fn) => fn.cyclomatic > profile.complexityMax))
      .sort((left, right) => right.maxCyclomatic - left.maxCyclomatic || left.path.localeCompare(right.path))[0];
    if (best) {
      return selected(best.path, 'complexity', `function complexity ${best.maxCyclomatic} exceeds ${profile.complexityMax}`);
    }
  }

  if (metrics.satdCount > 0) {
    const best = Object.entries(input.satdByFile)
      .map(([file, count]) => ({ file: normalizePath(file), count }))
      .filter((entry) => entry.count > 0 && eligible(entry.file, false))
      .sort((left, right) => right.count - left.count || left.file.localeCompare(right.file))[0];
    if (best) {
      return selected(best.file, 'satd', `${best.count} SATD items`);
    }
  }

  return null;
}

/** Strict priority: lint, then build errors, then coverage gaps, then complexity and SATD. */
export function selectTarget(input: SelectionInput): Selection {
  const target =
    selectLintTarget(input) ??
    selectBuildTarget(input) ??
    selectCoverageTarget(input) ??
    selectExtremeQualityTarget(input);

  if (target) {
    return target;
  }
  return { kind: 'exhausted', reason: 'No eligible file remains in any tier' };
}
