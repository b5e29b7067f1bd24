import type { ChurnAnalysis, Toolchain, TdgBand } from '@refactor-gate/domain';

import type { ComplexityAnalysis, DeadCodeAnalysis, SatdAnalysis } from '../analyzers/source.js';
import type { TdgAnalysis } from '../analyzers/tdg.js';

export const DEFECT_WEIGHTS = {
  complexity: 0.4,
  churn: 0.3,
  satd: 0.3
} as const;

const PREDICTED_DEFECT_LIMIT = 10;
const HOTSPOT_LIMIT = 10;

export interface ContextFunction {
  name: string;
  line: number;
  endLine: number;
  cyclomatic: number;
  cognitive: number;
}

export interface ContextFile {
  path: string;
  sloc: number;
  functions: ContextFunction[];
  satdItems: number;
  deadCodeItems: number;
  churnScore: number;
  tdg: number;
  tdgBand: TdgBand;
  defectScore: number;
}

export interface QualityScorecard {
  overallHealth: number;
  complexityScore: number;
  maintainabilityIndex: number;
  technicalDebtHours: number;
}

export interface ContextSummary {
  totalFiles: number;
  totalFunctions: number;
  maxCyclomatic: number;
  medianCyclomatic: number;
  functionsOverThreshold: number;
  satdItems: number;
  deadCodeItems: number;
  deadCodePercentage: number;
  totalCommits: number;
  averageTdg: number;
  criticalFiles: number;
}

export interface ComplexityHotspot {
  file: string;
  function: string;
  line: number;
  cyclomatic: number;
  cognitive: number;
}

export interface PredictedDefect {
  file: string;
  defectScore: number;
  factors: string[];
}

export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface Recommendation {
  priority: RecommendationPriority;
  title: string;
  description: string;
  files: string[];
}

export interface DeepContext {
  generatedAt: string;
  projectPath: string;
  toolchain: Toolchain;
  threshold: number;
  files: ContextFile[];
  summary: ContextSummary;
  scorecard: QualityScorecard;
  complexityHotspots: ComplexityHotspot[];
  churn: ChurnAnalysis;
  satd: SatdAnalysis;
  deadCode: DeadCodeAnalysis;
  predictedDefects: PredictedDefect[];
  recommendations: Recommendation[];
}

export interface DeepContextInput {
  projectPath: string;
  toolchain: Toolchain;
  threshold: number;
  generatedAt: string;
  complexity: ComplexityAnalysis;
  satd: SatdAnalysis;
  deadCode: DeadCodeAnalysis;
  churn: ChurnAnalysis;
  tdg: TdgAnalysis;
}

function round(value: number, digits = 3): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function clamp(value: number, low: number, high: number): number {
  return Math.min(high, Math.max(low, value));
}

/** 0.4·norm(complexity) + 0.3·churn + 0.3·norm(satd), each normalized against the project maximum. */
export function defectScore(
  file: { maxCyclomatic: number; churnScore: number; satdItems: number },
  maxima: { cyclomatic: number; satd: number }
): number {
  const complexity = maxima.cyclomatic > 0 ? file.maxCyclomatic / maxima.cyclomatic : 0;
  const satd = maxima.satd > 0 ? file.satdItems / maxima.satd : 0;
  return round(
    DEFECT_WEIGHTS.complexity * complexity + DEFECT_WEIGHTS.churn * clamp(file.churnScore, 0, 1) + DEFECT_WEIGHTS.satd * satd
  );
}

function buildScorecard(input: DeepContextInput, summary: ContextSummary): QualityScorecard {
  const overThreshold = summary.totalFunctions > 0 ? summary.functionsOverThreshold / summary.totalFunctions : 0;
  const complexityScore = round(100 * (1 - overThreshold), 1);
  const maintainabilityIndex = round(clamp(100 - 20 * input.tdg.summary.averageTdg, 0, 100), 1);
  const satdPenalty = Math.min(20, summary.satdItems);
  const deadPenalty = Math.min(20, summary.deadCodePercentage);

  return {
    overallHealth: round(clamp((complexityScore + maintainabilityIndex) / 2 - satdPenalty - deadPenalty, 0, 100), 1),
    complexityScore,
    maintainabilityIndex,
    technicalDebtHours: input.tdg.summary.estimatedDebtHours
  };
}

function describeFactors(file: ContextFile, threshold: number): string[] {
  const factors: string[] = [];
  const max = file.functions.reduce((value, fn) => Math.max(value, fn.cyclomatic), 0);
  if (max > threshold) {
    factors.push(`max cyclomatic complexity ${max}`);
  }
  if (file.churnScore > 0) {
    factors.push(`churn score ${file.churnScore}`);
  }
  if (file.satdItems > 0) {
    factors.push(`${file.satdItems} SATD items`);
  }
  if (file.deadCodeItems > 0) {
    factors.push(`${file.deadCodeItems} dead code items`);
  }
  return factors;
}

const PRIORITY_ORDER: Record<RecommendationPriority, number> = { high: 0, medium: 1, low: 2 };

function buildRecommendations(input: DeepContextInput, files: readonly ContextFile[]): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const threshold = input.threshold;

  const complex = files
    .filter((file) => file.functions.some((fn) => fn.cyclomatic > threshold))
    .map((file) => file.path);
  if (complex.length > 0) {
    recommendations.push({
      priority: 'high',
      title: 'Reduce function complexity',
      description: `${input.complexity.summary.functionsOverThreshold} functions exceed cyclomatic complexity ${threshold}; extract helpers until each is at or below the threshold.`,
      files: complex.slice(0, 5)
    });
  }

  const critical = input.tdg.files.filter((file) => file.band === 'critical').map((file) => file.path);
  if (critical.length > 0) {
    recommendations.push({
      priority: 'high',
      title: 'Refactor critical technical debt',
      description: `${critical.length} files have a technical debt gradient of 2.0 or more.`,
      files: critical.slice(0, 5)
    });
  }

  if (input.satd.summary.totalItems > 0) {
    const defects = input.satd.summary.bySeverity.high;
    recommendations.push({
      priority: defects > 0 ? 'high' : 'medium',
      title: 'Resolve self-admitted technical debt',
      description:
        defects > 0
          ? `${input.satd.summary.totalItems} SATD comments, ${defects} of them marking known defects.`
          : `${input.satd.summary.totalItems} SATD comments remain in the code.`,
      files: Object.entries(input.satd.byFile)
        .sort((left, right) => right[1] - left[1] || left[0].localeCompare(right[0]))
        .slice(0, 5)
        .map(([file]) => file)
    });
  }

  if (input.deadCode.files.length > 0) {
    recommendations.push({
      priority: 'medium',
      title: 'Remove dead code',
      description: `${input.deadCode.summary.totalDeadLines} lines across ${input.deadCode.summary.filesWithDeadCode} files appear unused.`,
      files: input.deadCode.files.slice(0, 5).map((file) => file.path)
    });
  }

  if (input.churn.summary.hotspotFiles.length > 0) {
    recommendations.push({
      priority: 'low',
      title: 'Stabilize frequently changed files',
      description: `${input.churn.summary.hotspotFiles.length} files changed more than five times in the last ${input.churn.periodDays} days.`,
      files: input.churn.summary.hotspotFiles.slice(0, 5)
    });
  }

  return recommendations
    .map((recommendation, index) => ({ recommendation, index }))
    .sort((left, right) => PRIORITY_ORDER[left.recommendation.priority] - PRIORITY_ORDER[right.recommendation.priority] || left.index - right.index)
    .map((entry) => entry.recommendation);
}

/** The typed artifact every rendering and the refactor loop read functions from. */
export function buildDeepContext(input: DeepContextInput): DeepContext {
  const churnByFile = new Map(input.churn.files.map((file) => [file.path, file.churnScore]));
  const tdgByFile = new Map(input.tdg.files.map((file) => [file.path, file]));
  const deadByFile = new Map(input.deadCode.files.map((file) => [file.path, file.items.length]));
  const maxima = {
    cyclomatic: input.complexity.files.reduce((max, file) => Math.max(max, file.maxCyclomatic), 0),
    satd: Object.values(input.satd.byFile).reduce((max, count) => Math.max(max, count), 0)
  };

  const files: ContextFile[] = input.complexity.files
    .map((file) => {
      const churnScore = churnByFile.get(file.path) ?? 0;
      const satdItems = input.satd.byFile[file.path] ?? 0;
      const tdg = tdgByFile.get(file.path);
      return {
        path: file.path,
        sloc: file.sloc,
        functions: file.functions.map((fn) => ({
          name: fn.name,
          line: fn.line,
          endLine: fn.endLine,
          cyclomatic: fn.cyclomatic,
          cognitive: fn.cognitive
        })),
        satdItems,
        deadCodeItems: deadByFile.get(file.path) ?? 0,
        churnScore,
        tdg: tdg?.value ?? 0,
        tdgBand: tdg?.band ?? 'healthy',
        defectScore: defectScore({ maxCyclomatic: file.maxCyclomatic, churnScore, satdItems }, maxima)
      };
    })
    .sort((left, right) => left.path.localeCompare(right.path));

  const summary: ContextSummary = {
    totalFiles: files.length,
    totalFunctions: input.complexity.summary.totalFunctions,
    maxCyclomatic: input.complexity.summary.maxCyclomatic,
    medianCyclomatic: input.complexity.summary.medianCyclomatic,
    functionsOverThreshold: input.complexity.summary.functionsOverThreshold,
    satdItems: input.satd.summary.totalItems,
    deadCodeItems: input.deadCode.files.reduce((sum, file) => sum + file.items.length, 0),
    deadCodePercentage: input.deadCode.summary.deadPercentage,
    totalCommits: input.churn.summary.totalCommits,
    averageTdg: input.tdg.summary.averageTdg,
    criticalFiles: input.tdg.summary.criticalFiles
  };

  const complexityHotspots = files
    .flatMap((file) =>
      file.functions.map((fn) => ({ file: file.path, function: fn.name, line: fn.line, cyclomatic: fn.cyclomatic, cognitive: fn.cognitive }))
    )
    .sort((left, right) => right.cyclomatic - left.cyclomatic || right.cognitive - left.cognitive || left.file.localeCompare(right.file) || left.line - right.line)
    .slice(0, HOTSPOT_LIMIT);

  const predictedDefects = files
    .filter((file) => file.defectScore > 0)
    .sort((left, right) => right.defectScore - left.defectScore || left.path.localeCompare(right.path))
    .slice(0, PREDICTED_DEFECT_LIMIT)
    .map((file) => ({ file: file.path, defectScore: file.defectScore, factors: describeFactors(file, input.threshold) }));

  return {
    generatedAt: input.generatedAt,
    projectPath: input.projectPath,
    toolchain: input.toolchain,
    threshold: input.threshold,
    files,
    summary,
    scorecard: buildScorecard(input, summary),
    complexityHotspots,
    churn: input.churn,
    satd: input.satd,
    deadCode: input.deadCode,
    predictedDefects,
    recommendations: buildRecommendations(input, files)
  };
}

/** Function index keyed by project-relative path. */
export function functionsByFile(context: DeepContext): Map<string, ContextFunction[]> {
  return new Map(context.files.map((file) => [file.path, file.functions]));
}
