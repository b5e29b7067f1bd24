import { normalizePath } from './glob.js';
import type { CompilationError, LintHotspotResult, ViolationDetail } from './types.js';

const SHORT_DIAGNOSTIC = /^(.+?):(\d+):(\d+): error(?:\[([A-Za-z0-9]+)\])?: (.*)$/;

export function parseShortDiagnostics(output: string): CompilationError[] {
  const errors: CompilationError[] = [];

  for (const raw of output.split('\n')) {
    const line = raw.trim();
    const match = SHORT_DIAGNOSTIC.exec(line);
    if (!match?.[1] || !match[2] || !match[3]) {
      continue;
    }
    errors.push({
      file: normalizePath(match[1]),
      line: Number(match[2]),
      column: Number(match[3]),
      code: match[4] ?? null,
      message: (match[5] ?? '').trim()
    });
  }

  return errors;
}

export function compilationErrorToViolation(error: CompilationError): ViolationDetail {
  return {
    file: error.file,
    line: error.line,
    column: error.column,
    endLine: error.line,
    endColumn: error.column,
    lintName: 'compilation_error',
    message: error.code ? `[${error.code}] ${error.message}` : error.message,
    severity: 'error',
    suggestion: 'Fix the compilation error before other refactoring',
    machineApplicable: false
  };
}

/**
 * Aggregates violations into the enforcement shape. Density is violations per
 * logical line; files with unknown size count as 100 lines.
 */
export function buildLintHotspot(
  violations: readonly ViolationDetail[],
  slocByFile: Readonly<Record<string, number>>,
  defaultSloc = 100
): LintHotspotResult {
  const grouped = new Map<string, ViolationDetail[]>();
  for (const violation of violations) {
    const file = normalizePath(violation.file);
    const list = grouped.get(file) ?? [];
    list.push({ ...violation, file });
    grouped.set(file, list);
  }

  const summaryByFile: LintHotspotResult['summaryByFile'] = {};
  let hotspot: LintHotspotResult['hotspot'] = null;

  for (const [file, fileViolations] of Array.from(grouped.entries()).sort((a, b) => a[0].localeCompare(b[0]))) {
    const sloc = Math.max(1, slocByFile[file] ?? defaultSloc);
    const defectDensity = Number((fileViolations.length / sloc).toFixed(6));
    summaryByFile[file] = { defectDensity, totalViolations: fileViolations.length };

    if (!hotspot || defectDensity > hotspot.defectDensity) {
      hotspot = { file, defectDensity, totalViolations: fileViolations.length, violations: fileViolations };
    }
  }

  return {
    totalProjectViolations: violations.length,
    summaryByFile,
    hotspot,
    allViolations: Array.from(grouped.values()).flat()
  };
}

export function emptyLintHotspot(): LintHotspotResult {
  return { totalProjectViolations: 0, summaryByFile: {}, hotspot: null, allViolations: [] };
}
