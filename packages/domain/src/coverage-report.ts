import { normalizePath } from './glob.js';

export interface CoverageReport {
  totalPercent: number | null;
  byFile: Record<string, number>;
}

function percentTokens(line: string): number[] {
  return line
    .split(/\s+/)
    .filter((token) => token.endsWith('%'))
    .map((token) => Number.parseFloat(token.slice(0, -1)))
    .filter((value) => !Number.isNaN(value));
}

/** Line coverage is the second percentage column of `llvm-cov report`; fall back to the first. */
function llvmLinePercent(line: string): number | null {
  const percents = percentTokens(line);
  return percents[1] ?? percents[0] ?? null;
}

export function parseLlvmCovReport(output: string): CoverageReport {
  const byFile: Record<string, number> = {};
  let totalPercent: number | null = null;

  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('Filename') || trimmed.startsWith('-')) {
      continue;
    }
    const percent = llvmLinePercent(trimmed);
    if (percent === null) {
      continue;
    }
    const name = trimmed.split(/\s+/)[0] ?? '';
    if (name === 'TOTAL') {
      totalPercent = percent;
    } else if (name) {
      byFile[normalizePath(name)] = percent;
    }
  }

  return { totalPercent, byFile };
}

export function parseGrcovFiles(output: string): CoverageReport {
  const byFile: Record<string, number> = {};

  for (const line of output.split('\n')) {
    const separator = line.lastIndexOf(':');
    if (separator <= 0) {
      continue;
    }
    const value = line.slice(separator + 1).trim();
    if (!value.endsWith('%')) {
      continue;
    }
    const percent = Number.parseFloat(value.slice(0, -1));
    if (!Number.isNaN(percent)) {
      byFile[normalizePath(line.slice(0, separator).trim())] = percent;
    }
  }

  return { totalPercent: null, byFile };
}

export function parseTarpaulinSummary(output: string): CoverageReport {
  const byFile: Record<string, number> = {};
  let totalPercent: number | null = null;

  for (const line of output.split('\n')) {
    const fileMatch = /^\|\|\s+(.+?):\s+(\d+)\/(\d+)/.exec(line.trim());
    if (fileMatch?.[1] && fileMatch[2] && fileMatch[3]) {
      const total = Number(fileMatch[3]);
      byFile[normalizePath(fileMatch[1])] = total === 0 ? 0 : (Number(fileMatch[2]) / total) * 100;
      continue;
    }
    if (line.includes('coverage') || line.includes('Coverage')) {
      const percent = percentTokens(line)[0];
      if (percent !== undefined) {
        totalPercent = percent;
      }
    }
  }

  return { totalPercent, byFile };
}

/** The file's own entry, matched exactly or by path suffix; null when the report has no line data for it. */
export function measuredCoverageForFile(report: CoverageReport, relativeFile: string): number | null {
  const target = normalizePath(relativeFile);
  const exact = report.byFile[target];
  if (exact !== undefined) {
    return exact;
  }
  for (const [file, percent] of Object.entries(report.byFile)) {
    if (file.endsWith(`/${target}`) || target.endsWith(`/${file}`)) {
      return percent;
    }
  }
  return null;
}

/** Per-file lookup with the project total as the fallback. */
export function coverageForFile(report: CoverageReport, relativeFile: string): number | null {
  return measuredCoverageForFile(report, relativeFile) ?? report.totalPercent;
}

export function projectCoverage(report: CoverageReport): number {
  if (report.totalPercent !== null) {
    return report.totalPercent;
  }
  const values = Object.values(report.byFile);
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
