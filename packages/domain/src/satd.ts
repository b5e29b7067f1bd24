import { scanSource } from './lexer.js';
import type { SatdCategory, SatdItem, SatdSeverity, Toolchain, ViolationDetail } from './types.js';

const MARKER_PATTERN = /\b(TODO|FIXME|HACK|XXX|BUG|KLUDGE|REFACTOR)(?:\([^)]*\))?:/;

const markerSeverity: Record<string, SatdSeverity> = {
  HACK: 'high',
  XXX: 'high',
  BUG: 'high',
  FIXME: 'medium',
  REFACTOR: 'medium',
  KLUDGE: 'medium',
  TODO: 'low'
};

const markerCategory: Record<string, SatdCategory> = {
  HACK: 'design',
  KLUDGE: 'design',
  BUG: 'defect',
  FIXME: 'defect',
  TODO: 'requirement',
  REFACTOR: 'refactor',
  XXX: 'quality'
};

export const satdWeight: Record<SatdSeverity, number> = {
  high: 3,
  medium: 2,
  low: 1
};

/** One item per line; markers inside string literals are never reported. */
export function detectSatd(file: string, content: string, toolchain: Toolchain): SatdItem[] {
  const items: SatdItem[] = [];

  for (const line of scanSource(content, toolchain)) {
    if (line.comment === null) {
      continue;
    }
    const match = MARKER_PATTERN.exec(line.comment);
    const marker = match?.[1];
    if (!marker) {
      continue;
    }
    items.push({
      file,
      line: line.number,
      marker,
      category: markerCategory[marker] ?? 'requirement',
      severity: markerSeverity[marker] ?? 'low',
      text: line.text.trim()
    });
  }

  return items;
}

export function satdToViolation(item: SatdItem): ViolationDetail {
  return {
    file: item.file,
    line: item.line,
    column: 1,
    endLine: item.line,
    endColumn: 1,
    lintName: 'satd_item',
    message: `Self-admitted technical debt: ${item.text}`,
    severity: 'warning',
    suggestion: 'Remove or address technical debt',
    machineApplicable: false
  };
}

/**
 * Per-line edits that drop SATD markers: `null` deletes the line, a string
 * replaces it. Comment-only marker lines go; trailing marker comments after
 * code are cut back to the code. A deleted line that opened or closed a block
 * comment leaves the delimiter behind.
 */
export function satdLineEdits(content: string, toolchain: Toolchain): Map<number, string | null> {
  const edits = new Map<number, string | null>();

  for (const line of scanSource(content, toolchain)) {
    if (line.comment === null || !MARKER_PATTERN.test(line.comment)) {
      continue;
    }
    if (line.code.trim().length === 0) {
      const trimmed = line.text.trim();
      const indent = line.text.slice(0, line.text.length - line.text.trimStart().length);
      if (trimmed.startsWith('/*') && !trimmed.includes('*/')) {
        edits.set(line.number, `${indent}/*`);
      } else if (!trimmed.startsWith('/*') && trimmed.includes('*/')) {
        edits.set(line.number, `${indent}*/`);
      } else {
        edits.set(line.number, null);
      }
      continue;
    }

    const tail = line.commentColumn === null ? '' : line.text.slice(line.commentColumn);
    if (!MARKER_PATTERN.test(tail)) {
      continue;
    }
    const kept = line.text.slice(0, line.commentColumn ?? 0).trimEnd();
    edits.set(line.number, tail.startsWith('/*') && !tail.includes('*/') ? `${kept} /*` : kept);
  }

  return edits;
}

export function applyLineEdits(content: string, edits: ReadonlyMap<number, string | null>): string {
  const kept: string[] = [];
  content.split('\n').forEach((text, index) => {
    const edit = edits.get(index + 1);
    if (edit === undefined) {
      kept.push(text);
    } else if (edit !== null) {
      kept.push(edit);
    }
  });
  return kept.join('\n');
}

export function removeSatdComments(content: string, toolchain: Toolchain): string {
  return applyLineEdits(content, satdLineEdits(content, toolchain));
}
