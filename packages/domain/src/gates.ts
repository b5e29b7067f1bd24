import type { QualityMetrics, QualityProfile, RefactorPhase, RefactorProgress } from './types.js';

export const EXTREME_QUALITY_PROFILE: QualityProfile = {
  coverageMin: 80,
  complexityMax: 10,
  complexityTarget: 5,
  satdAllowed: 0
};

export const PROGRESS_WEIGHTS = {
  lint: 0.3,
  complexity: 0.3,
  satd: 0.2,
  coverage: 0.2
} as const;

export function emptyMetrics(): QualityMetrics {
  return {
    totalViolations: 0,
    filesWithIssues: 0,
    totalFiles: 0,
    coveragePercent: 0,
    maxComplexity: 0,
    functionsWithHighComplexity: 0,
    totalFunctions: 0,
    satdCount: 0
  };
}

export function meetsQualityGates(metrics: QualityMetrics, profile: QualityProfile): boolean {
  return (
    metrics.coveragePercent >= profile.coverageMin &&
    metrics.maxComplexity <= profile.complexityMax &&
    metrics.satdCount <= profile.satdAllowed &&
    metrics.totalViolations === 0
  );
}

export function sameMetrics(left: QualityMetrics, right: QualityMetrics): boolean {
  return (
    left.totalViolations === right.totalViolations &&
    left.filesWithIssues === right.filesWithIssues &&
    left.totalFiles === right.totalFiles &&
    left.coveragePercent === right.coveragePercent &&
    left.maxComplexity === right.maxComplexity &&
    left.functionsWithHighComplexity === right.functionsWithHighComplexity &&
    left.totalFunctions === right.totalFunctions &&
    left.satdCount === right.satdCount
  );
}

function clampPercent(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(100, Math.max(0, value));
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function determinePhase(metrics: QualityMetrics, profile: QualityProfile): RefactorPhase {
  if (metrics.totalViolations > 0) {
    return 'LintFixes';
  }
  if (metrics.maxComplexity > profile.complexityMax) {
    return 'ComplexityReduction';
  }
  if (metrics.satdCount > profile.satdAllowed) {
    return 'SatdCleanup';
  }
  if (metrics.coveragePercent < profile.coverageMin) {
    return 'CoverageDriven';
  }
  return 'QualityValidation';
}

export interface GateReport {
  passed: string[];
  remaining: string[];
}

export function describeGates(metrics: QualityMetrics, profile: QualityProfile): GateReport {
  const passed: string[] = [];
  const remaining: string[] = [];

  if (metrics.totalViolations === 0) {
    passed.push('Lint: zero violations');
  } else {
    remaining.push(`Fix ${metrics.totalViolations} lint violations`);
  }

  if (metrics.maxComplexity <= profile.complexityMax) {
    passed.push(`Complexity: max ${metrics.maxComplexity} ≤ ${profile.complexityMax}`);
  } else {
    remaining.push(`Reduce max complexity from ${metrics.maxComplexity} to ≤ ${profile.complexityMax}`);
  }

  if (metrics.satdCount <= profile.satdAllowed) {
    passed.push(`SATD: ${metrics.satdCount} ≤ ${profile.satdAllowed}`);
  } else {
    remaining.push(`Resolve ${metrics.satdCount - profile.satdAllowed} SATD items`);
  }

  const coverage = metrics.coveragePercent.toFixed(1);
  if (metrics.coveragePercent >= profile.coverageMin) {
    passed.push(`Coverage: ${coverage}% ≥ ${profile.coverageMin}%`);
  } else {
    remaining.push(`Improve coverage from ${coverage}% to ≥ ${profile.coverageMin}%`);
  }

  return { passed, remaining };
}

export function estimateRemainingMinutes(elapsedSeconds: number, overallPercent: number): number {
  const elapsed = Math.max(0, elapsedSeconds);
  const total = overallPercent > 5 ? elapsed / (overallPercent / 100) : elapsed * 20;
  return round1(Math.max(0, (total - elapsed) / 60));
}

export interface ProgressInput {
  metrics: QualityMetrics;
  profile: QualityProfile;
  satdBaseline: number;
  filesCompleted: number;
  elapsedSeconds: number;
  phase?: RefactorPhase;
}

export function computeProgress(input: ProgressInput): RefactorProgress {
  const { metrics, profile } = input;

  const lint =
    metrics.totalViolations === 0 || metrics.totalFiles === 0
      ? 100
      : clampPercent((100 * (metrics.totalFiles - metrics.filesWithIssues)) / metrics.totalFiles);

  const complexity =
    metrics.maxComplexity <= profile.complexityMax || metrics.totalFunctions === 0
      ? 100
      : clampPercent(
          (100 * (metrics.totalFunctions - metrics.functionsWithHighComplexity)) / metrics.totalFunctions
        );

  const baseline = Math.max(input.satdBaseline, metrics.satdCount);
  const satd = baseline === 0 ? 100 : clampPercent((100 * (baseline - metrics.satdCount)) / baseline);

  const coverage = clampPercent(metrics.coveragePercent);

  const overall =
    PROGRESS_WEIGHTS.lint * lint +
    PROGRESS_WEIGHTS.complexity * complexity +
    PROGRESS_WEIGHTS.satd * satd +
    PROGRESS_WEIGHTS.coverage * coverage;

  const gates = describeGates(metrics, profile);

  return {
    overallCompletionPercent: round1(overall),
    lintCompletionPercent: round1(lint),
    complexityCompletionPercent: round1(complexity),
    satdCompletionPercent: round1(satd),
    coverageCompletionPercent: round1(coverage),
    filesCompleted: input.filesCompleted,
    filesRemaining: Math.max(0, metrics.totalFiles - input.filesCompleted),
    estimatedTimeRemainingMinutes: estimateRemainingMinutes(input.elapsedSeconds, overall),
    qualityGatesPassed: gates.passed,
    qualityGatesRemaining: gates.remaining,
    currentPhase: input.phase ?? determinePhase(metrics, profile)
  };
}
