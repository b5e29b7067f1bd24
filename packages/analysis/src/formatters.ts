import { snakeCaseKeys } from '@refactor-gate/common';
import type { ChurnAnalysis, ViolationDetail } from '@refactor-gate/domain';
import type { HandlerResult, OutputFormat } from '@refactor-gate/protocol';

import type { CoverageMeasurement } from './analyzers/coverage.js';
import type { CompilationAnalysis, LintHotspotAnalysis } from './analyzers/lint.js';
import type { ComplexityAnalysis, DeadCodeAnalysis, SatdAnalysis } from './analyzers/source.js';
import type { TdgAnalysis } from './analyzers/tdg.js';
import { renderDeepContextMarkdown } from './deep-context/markdown.js';
import type { DeepContext } from './deep-context/model.js';
import {
  COMPLEXITY_RULES,
  DEAD_CODE_RULE,
  SATD_RULE,
  complexityResults,
  deadCodeResults,
  deepContextSarif,
  satdResults
} from './deep-context/sarif.js';
import { sarifLocation, sarifLog, sarifRule, type SarifLevel, type SarifLog } from './sarif.js';

const MARKDOWN = 'text/markdown; charset=utf-8';
const DETAIL_LIMIT = 20;

export interface ReportMeta {
  projectPath: string;
  generatedAt: string;
}

/** How one analyzer's result reads in each output format. */
export interface ReportView<T extends object> {
  title: string;
  /** Record fields whose keys are data (paths, author names) rather than field names. */
  preserve?: readonly string[];
  summary(data: T): string[];
  details(data: T): string[];
  sarif(data: T): SarifLog;
  markdown?(data: T, meta: ReportMeta): string;
}

function genericMarkdown<T extends object>(view: ReportView<T>, data: T, meta: ReportMeta): string {
  const sections: string[] = [];
  sections.push(`# ${view.title}`);
  sections.push(`**Generated:** ${meta.generatedAt}\n**Project:** ${meta.projectPath}`);
  sections.push(['## Summary', '', ...view.summary(data).map((line) => `- ${line}`)].join('\n'));
  const details = view.details(data);
  if (details.length > 0) {
    sections.push(['## Details', '', ...details.map((line) => `- ${line}`)].join('\n'));
  }
  return `${sections.join('\n\n')}\n`;
}

export function formatReport<T extends object>(view: ReportView<T>, data: T, meta: ReportMeta, format: OutputFormat): HandlerResult {
  switch (format) {
    case 'json':
      return { json: snakeCaseKeys({ generatedAt: meta.generatedAt, projectPath: meta.projectPath, ...data }, view.preserve) };
    case 'sarif':
      return { json: view.sarif(data) };
    case 'markdown':
      return { text: view.markdown ? view.markdown(data, meta) : genericMarkdown(view, data, meta), contentType: MARKDOWN };
    case 'summary':
      return { text: [view.title, ...view.summary(data).map((line) => `  ${line}`)].join('\n') };
    case 'full':
      return {
        text: [view.title, ...view.summary(data).map((line) => `  ${line}`), '', ...view.details(data).map((line) => `  ${line}`)].join('\n')
      };
  }
}

const VIOLATION_LEVEL: Record<ViolationDetail['severity'], SarifLevel> = { error: 'error', warning: 'warning', note: 'note', info: 'note' };

function violationSarif(violations: readonly ViolationDetail[]): SarifLog {
  const names = Array.from(new Set(violations.map((violation) => violation.lintName))).sort();
  return sarifLog(
    names.map((name) => sarifRule(name, name, 'warning', ['lint'])),
    violations.map((violation) => ({
      ruleId: violation.lintName,
      level: VIOLATION_LEVEL[violation.severity],
      message: { text: violation.message },
      locations: [sarifLocation(violation.file, violation.line, violation.endLine, violation.column)],
      properties: { machine_applicable: violation.machineApplicable }
    }))
  );
}

function describeViolation(violation: ViolationDetail): string {
  return `${violation.file}:${violation.line}:${violation.column} ${violation.severity} [${violation.lintName}] ${violation.message}`;
}

export const complexityView: ReportView<ComplexityAnalysis> = {
  title: 'Complexity Analysis',
  summary: ({ summary, threshold }) => [
    `Files: ${summary.totalFiles}`,
    `Functions: ${summary.totalFunctions}`,
    `Max cyclomatic: ${summary.maxCyclomatic}`,
    `Max cognitive: ${summary.maxCognitive}`,
    `Median cyclomatic: ${summary.medianCyclomatic}`,
    `Functions over ${threshold}: ${summary.functionsOverThreshold}`
  ],
  details: ({ files, threshold }) =>
    files
      .flatMap((file) => file.functions.filter((fn) => fn.cyclomatic > threshold).map((fn) => ({ file: file.path, fn })))
      .sort((left, right) => right.fn.cyclomatic - left.fn.cyclomatic)
      .slice(0, DETAIL_LIMIT)
      .map(({ file, fn }) => `${file}:${fn.line} ${fn.name} cyclomatic ${fn.cyclomatic}, cognitive ${fn.cognitive}`),
  sarif: (data) => sarifLog(COMPLEXITY_RULES, complexityResults(data))
};

export const satdView: ReportView<SatdAnalysis> = {
  title: 'Self-Admitted Technical Debt',
  preserve: ['byFile'],
  summary: ({ summary }) => [
    `Items: ${summary.totalItems}`,
    `Files: ${summary.filesWithSatd}`,
    `High: ${summary.bySeverity.high}, medium: ${summary.bySeverity.medium}, low: ${summary.bySeverity.low}`
  ],
  details: ({ items }) => items.map((item) => `${item.file}:${item.line} ${item.marker} (${item.severity}) ${item.text.trim()}`),
  sarif: ({ items }) => sarifLog([SATD_RULE], satdResults(items))
};

export const deadCodeView: ReportView<DeadCodeAnalysis> = {
  title: 'Dead Code Analysis',
  summary: ({ summary }) => [
    `Files analyzed: ${summary.totalFilesAnalyzed}`,
    `Files with dead code: ${summary.filesWithDeadCode}`,
    `Dead lines: ${summary.totalDeadLines} (${summary.deadPercentage.toFixed(1)}%)`,
    `Dead functions: ${summary.deadFunctions}, classes: ${summary.deadClasses}, unreachable blocks: ${summary.unreachableBlocks}`
  ],
  details: ({ files }) =>
    files.flatMap((file) => file.items.map((item) => `${file.path}:${item.line} ${item.itemType} ${item.name}: ${item.reason}`)),
  sarif: (data) => sarifLog([DEAD_CODE_RULE], deadCodeResults(data))
};

const CHURN_RULE = sarifRule('churn/hotspot', 'Frequently changed file', 'note', ['churn']);

export const churnView: ReportView<ChurnAnalysis> = {
  title: 'Code Churn Analysis',
  preserve: ['authorContributions'],
  summary: ({ periodDays, summary }) => [
    `Period: ${periodDays} days`,
    `Commits: ${summary.totalCommits}`,
    `Files changed: ${summary.totalFilesChanged}`,
    `Hotspots: ${summary.hotspotFiles.length}`
  ],
  details: ({ files }) =>
    files
      .slice(0, DETAIL_LIMIT)
      .map((file) => `${file.path}: ${file.commitCount} commits, +${file.additions}/-${file.deletions}, score ${file.churnScore}`),
  sarif: ({ files, summary }) =>
    sarifLog(
      [CHURN_RULE],
      files
        .filter((file) => summary.hotspotFiles.includes(file.path))
        .map((file) => ({
          ruleId: CHURN_RULE.id,
          level: 'note' as const,
          message: { text: `${file.commitCount} commits by ${file.uniqueAuthors.length} authors` },
          locations: [sarifLocation(file.path, 1)],
          properties: { churn_score: file.churnScore }
        }))
    )
};

const TDG_RULE = sarifRule('debt/technical-debt-gradient', 'High technical debt gradient', 'warning', ['debt']);

export const tdgView: ReportView<TdgAnalysis> = {
  title: 'Technical Debt Gradient',
  summary: ({ summary }) => [
    `Files: ${summary.totalFiles}`,
    `Critical: ${summary.criticalFiles}`,
    `Refactor: ${summary.warningFiles}`,
    `Average TDG: ${summary.averageTdg}`,
    `P95 TDG: ${summary.p95Tdg}`,
    `Estimated debt: ${summary.estimatedDebtHours} hours`
  ],
  details: ({ summary }) => summary.hotspots.map((file) => `${file.path}: ${file.value} (${file.band})`),
  sarif: ({ files }) =>
    sarifLog(
      [TDG_RULE],
      files
        .filter((file) => file.band === 'critical' || file.band === 'refactor')
        .map((file) => ({
          ruleId: TDG_RULE.id,
          level: file.band === 'critical' ? ('error' as const) : ('warning' as const),
          message: { text: `TDG ${file.value} (${file.band})` },
          locations: [sarifLocation(file.path, 1)],
          properties: { tdg: file.value }
        }))
    )
};

export const deepContextView: ReportView<DeepContext> = {
  title: 'Deep Context Analysis',
  preserve: ['byFile', 'authorContributions'],
  summary: ({ summary, scorecard }) => [
    `Files: ${summary.totalFiles}`,
    `Functions: ${summary.totalFunctions}`,
    `Overall health: ${scorecard.overallHealth.toFixed(1)}%`,
    `SATD items: ${summary.satdItems}`,
    `Dead code items: ${summary.deadCodeItems}`,
    `Estimated debt: ${scorecard.technicalDebtHours} hours`
  ],
  details: ({ recommendations }) => recommendations.map((rec) => `[${rec.priority}] ${rec.title}: ${rec.description}`),
  sarif: deepContextSarif,
  markdown: (data) => renderDeepContextMarkdown(data)
};

function hotspotSummary(result: LintHotspotAnalysis['hotspot']): string {
  return result ? `Hotspot: ${result.file} (${result.totalViolations} violations, density ${result.defectDensity.toFixed(4)})` : 'Hotspot: none';
}

export const lintHotspotView: ReportView<LintHotspotAnalysis> = {
  title: 'Lint Hotspot Analysis',
  preserve: ['summaryByFile'],
  summary: (data) => [`Tool: ${data.tool}`, `Violations: ${data.totalProjectViolations}`, hotspotSummary(data.hotspot)],
  details: ({ allViolations }) => allViolations.slice(0, DETAIL_LIMIT).map(describeViolation),
  sarif: ({ allViolations }) => violationSarif(allViolations)
};

export const compilationErrorsView: ReportView<CompilationAnalysis> = {
  title: 'Compilation Errors',
  preserve: ['summaryByFile'],
  summary: (data) => [
    `Build exit code: ${data.buildExitCode ?? 'not run'}`,
    `Errors: ${data.errors.length}`,
    hotspotSummary(data.hotspot.hotspot)
  ],
  details: ({ errors }) => errors.map((error) => `${error.file}:${error.line}:${error.column} ${error.code ?? 'error'} ${error.message}`),
  sarif: ({ hotspot }) => violationSarif(hotspot.allViolations)
};

const COVERAGE_RULE = sarifRule('coverage/low-coverage', 'Low test coverage', 'note', ['coverage']);

export const coverageView: ReportView<CoverageMeasurement> = {
  title: 'Coverage',
  preserve: ['byFile'],
  summary: (data) => [`Source: ${data.source}`, `${data.file ?? 'Project'}: ${data.percent.toFixed(1)}%`],
  details: ({ report }) =>
    Object.entries(report.byFile)
      .sort((left, right) => left[1] - right[1] || left[0].localeCompare(right[0]))
      .map(([file, percent]) => `${file}: ${percent.toFixed(1)}%`),
  sarif: ({ file, percent }) =>
    sarifLog(
      [COVERAGE_RULE],
      file ? [{ ruleId: COVERAGE_RULE.id, level: 'note', message: { text: `Line coverage ${percent.toFixed(1)}%` }, locations: [sarifLocation(file, 1)] }] : []
    )
};
