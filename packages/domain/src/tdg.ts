import { satdWeight } from './satd.js';
import type { FunctionInfo, SatdItem, ViolationDetail } from './types.js';

export const TDG_WEIGHTS = {
  complexity: 0.4,
  churn: 0.35,
  satd: 0.25
} as const;

export type TdgBand = 'healthy' | 'monitor' | 'refactor' | 'critical';

export interface TdgFileInput {
  path: string;
  functions: readonly Pick<FunctionInfo, 'cyclomatic'>[];
  sloc: number;
  churnScore: number;
  satdItems: readonly Pick<SatdItem, 'severity'>[];
}

export interface TdgComponents {
  complexity: number;
  churn: number;
  satd: number;
  sizeNormalizer: number;
}

export interface TdgFileScore {
  path: string;
  value: number;
  band: TdgBand;
  components: TdgComponents;
}

export interface TdgSummary {
  totalFiles: number;
  criticalFiles: number;
  warningFiles: number;
  averageTdg: number;
  p95Tdg: number;
  estimatedDebtHours: number;
  hotspots: TdgFileScore[];
}

function round(value: number, digits = 3): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function tdgBand(value: number): TdgBand {
  if (value >= 2) {
    return 'critical';
  }
  if (value >= 1) {
    return 'refactor';
  }
  if (value >= 0.5) {
    return 'monitor';
  }
  return 'healthy';
}

export function tdgComponents(input: TdgFileInput): TdgComponents {
  const cyclomaticTotal = input.functions.reduce((sum, fn) => sum + fn.cyclomatic, 0);
  const satdTotal = input.satdItems.reduce((sum, item) => sum + satdWeight[item.severity], 0);

  return {
    complexity: Math.min(5, cyclomaticTotal / 20),
    churn: Math.min(5, Math.max(0, input.churnScore) * 5),
    satd: Math.min(5, satdTotal / 2),
    sizeNormalizer: Math.max(1, Math.log10(Math.max(1, input.sloc)) - 1)
  };
}

export function scoreTdg(input: TdgFileInput): TdgFileScore {
  const components = tdgComponents(input);
  const value =
    (TDG_WEIGHTS.complexity * components.complexity +
      TDG_WEIGHTS.churn * components.churn +
      TDG_WEIGHTS.satd * components.satd) /
    components.sizeNormalizer;

  return {
    path: input.path,
    value: round(value),
    band: tdgBand(value),
    components: {
      complexity: round(components.complexity),
      churn: round(components.churn),
      satd: round(components.satd),
      sizeNormalizer: round(components.sizeNormalizer)
    }
  };
}

/** 30 minutes per complexity point over the threshold, plus 30/15 minutes per error/warning. */
export function estimateDebtHours(
  functions: readonly Pick<FunctionInfo, 'cyclomatic'>[],
  violations: readonly Pick<ViolationDetail, 'severity'>[],
  threshold: number
): number {
  const complexityMinutes = functions.reduce((sum, fn) => sum + 30 * Math.max(0, fn.cyclomatic - threshold), 0);
  const violationMinutes = violations.reduce((sum, violation) => {
    if (violation.severity === 'error') {
      return sum + 30;
    }
    if (violation.severity === 'warning') {
      return sum + 15;
    }
    return sum;
  }, 0);
  return round((complexityMinutes + violationMinutes) / 60, 2);
}

export function summarizeTdg(scores: readonly TdgFileScore[], estimatedDebtHours: number, hotspotLimit = 10): TdgSummary {
  const values = scores.map((score) => score.value).sort((a, b) => a - b);
  const p95Index = Math.min(values.length - 1, Math.max(0, Math.ceil(0.95 * values.length) - 1));

  return {
    totalFiles: scores.length,
    criticalFiles: scores.filter((score) => score.band === 'critical').length,
    warningFiles: scores.filter((score) => score.band === 'refactor').length,
    averageTdg: values.length === 0 ? 0 : round(values.reduce((sum, value) => sum + value, 0) / values.length),
    p95Tdg: values[p95Index] ?? 0,
    estimatedDebtHours,
    hotspots: [...scores]
      .sort((left, right) => right.value - left.value || left.path.localeCompare(right.path))
      .slice(0, hotspotLimit)
  };
}
