import { determineFixStrategy } from './fix-strategy.js';
import { detectSatd, satdLineEdits, satdToViolation } from './satd.js';
import type {
  AstMetadata,
  FileRewritePlan,
  PlannedViolation,
  QualityProfile,
  Toolchain,
  ViolationDetail
} from './types.js';

export const COMPLEXITY_ANNOTATION = 'COMPLEXITY: This function needs to be broken down';

export interface PlanInput {
  filePath: string;
  /** Current file content, or null when the file does not exist yet. */
  content: string | null;
  toolchain: Toolchain;
  violations: readonly ViolationDetail[];
  astMetadata: AstMetadata;
  profile: QualityProfile;
}

export function highComplexityViolations(
  filePath: string,
  astMetadata: AstMetadata,
  profile: QualityProfile
): ViolationDetail[] {
  return astMetadata.functions
    .filter((fn) => fn.cyclomatic > profile.complexityMax)
    .map((fn) => ({
      file: filePath,
      line: fn.line,
      column: 1,
      endLine: fn.endLine,
      endColumn: 1,
      lintName: 'high_complexity',
      message: `Function '${fn.name}' has complexity ${fn.cyclomatic} (max allowed: ${profile.complexityMax})`,
      severity: 'error',
      suggestion: `Break down this function to achieve target complexity of ${profile.complexityTarget}`,
      machineApplicable: false
    }));
}

/** Lint findings plus the SATD and complexity findings read from the file itself. */
export function synthesizeViolations(input: PlanInput): ViolationDetail[] {
  const violations = [...input.violations];
  if (input.content === null) {
    return violations;
  }
  violations.push(...detectSatd(input.filePath, input.content, input.toolchain).map(satdToViolation));
  violations.push(...highComplexityViolations(input.filePath, input.astMetadata, input.profile));
  return violations;
}

export function planViolations(violations: readonly ViolationDetail[]): PlannedViolation[] {
  return violations.map((violation) => ({
    lintName: violation.lintName,
    line: violation.line,
    column: violation.column,
    message: violation.message,
    fixStrategy: determineFixStrategy(violation)
  }));
}

function commentPrefix(toolchain: Toolchain): string {
  return toolchain === 'python-uv' ? '#' : '//';
}

/**
 * SATD lines are removed and each over-complex function gets a marker comment
 * above its signature. Other strategies leave the text alone.
 */
export function annotateContent(content: string, planned: readonly PlannedViolation[], toolchain: Toolchain): string {
  const edits = new Map<number, string | null>();
  const satdEdits = satdLineEdits(content, toolchain);
  const lines = content.split('\n');
  const marker = `${commentPrefix(toolchain)} ${COMPLEXITY_ANNOTATION}`;

  for (const violation of planned) {
    if (violation.fixStrategy.kind === 'RemoveDeadCode' && violation.lintName === 'satd_item') {
      const edit = satdEdits.get(violation.line);
      if (edit !== undefined) {
        edits.set(violation.line, edit);
      }
      continue;
    }

    if (violation.fixStrategy.kind === 'ExtractFunction' && violation.lintName === 'high_complexity') {
      const text = lines[violation.line - 1];
      const previous = lines[violation.line - 2] ?? '';
      if (text === undefined || previous.includes(COMPLEXITY_ANNOTATION) || edits.has(violation.line)) {
        continue;
      }
      const indent = text.slice(0, text.length - text.trimStart().length);
      edits.set(violation.line, `${indent}${marker}\n${text}`);
    }
  }

  const output: string[] = [];
  lines.forEach((text, index) => {
    const edit = edits.get(index + 1);
    if (edit === undefined) {
      output.push(text);
    } else if (edit !== null) {
      output.push(edit);
    }
  });
  return output.join('\n');
}

export function buildRewritePlan(input: PlanInput): FileRewritePlan {
  const planned = planViolations(synthesizeViolations(input));

  return {
    filePath: input.filePath,
    violations: planned,
    astMetadata: input.astMetadata,
    newContent: input.content === null ? '' : annotateContent(input.content, planned, input.toolchain)
  };
}
