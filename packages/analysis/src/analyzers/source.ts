import {
  analyzeDeadCode,
  analyzeFileComplexity,
  countSloc,
  detectSatd,
  scanSource,
  summarizeComplexity,
  summarizeDeadCode,
  type ComplexitySummary,
  type DeadCodeSummary,
  type FileComplexity,
  type FileDeadCode,
  type SatdCategory,
  type SatdItem,
  type SatdSeverity
} from '@refactor-gate/domain';

import type { ProjectSnapshot } from '../deps.js';

export interface ComplexityAnalysis {
  threshold: number;
  files: FileComplexity[];
  summary: ComplexitySummary;
}

export function analyzeComplexity(snapshot: ProjectSnapshot, threshold: number): ComplexityAnalysis {
  const files = snapshot.documents.map((document) =>
    analyzeFileComplexity(document.path, document.content, snapshot.toolchain)
  );
  files.sort((left, right) => right.maxCyclomatic - left.maxCyclomatic || left.path.localeCompare(right.path));

  return { threshold, files, summary: summarizeComplexity(files, threshold) };
}

export interface SatdSummary {
  totalItems: number;
  filesWithSatd: number;
  bySeverity: Record<SatdSeverity, number>;
  byCategory: Record<SatdCategory, number>;
}

export interface SatdAnalysis {
  items: SatdItem[];
  byFile: Record<string, number>;
  summary: SatdSummary;
}

export function analyzeSatd(snapshot: ProjectSnapshot): SatdAnalysis {
  const items = snapshot.documents.flatMap((document) => detectSatd(document.path, document.content, snapshot.toolchain));
  const byFile: Record<string, number> = {};
  const bySeverity: Record<SatdSeverity, number> = { high: 0, medium: 0, low: 0 };
  const byCategory: Record<SatdCategory, number> = { design: 0, defect: 0, requirement: 0, refactor: 0, quality: 0 };

  for (const item of items) {
    byFile[item.file] = (byFile[item.file] ?? 0) + 1;
    bySeverity[item.severity] += 1;
    byCategory[item.category] += 1;
  }

  return {
    items,
    byFile,
    summary: { totalItems: items.length, filesWithSatd: Object.keys(byFile).length, bySeverity, byCategory }
  };
}

export interface DeadCodeAnalysis {
  files: FileDeadCode[];
  summary: DeadCodeSummary;
}

export function analyzeProjectDeadCode(snapshot: ProjectSnapshot): DeadCodeAnalysis {
  const all = analyzeDeadCode(snapshot.documents, snapshot.toolchain);
  return {
    files: all
      .filter((file) => file.items.length > 0)
      .sort((left, right) => right.deadLines - left.deadLines || left.path.localeCompare(right.path)),
    summary: summarizeDeadCode(all)
  };
}

export function slocByFile(snapshot: ProjectSnapshot): Record<string, number> {
  const result: Record<string, number> = {};
  for (const document of snapshot.documents) {
    result[document.path] = countSloc(scanSource(document.content, snapshot.toolchain));
  }
  return result;
}
