import { analyzeFunctions } from './complexity.js';
import { scanSource, type ScannedLine } from './lexer.js';
import type { Confidence, Toolchain } from './types.js';

export type DeadItemType = 'function' | 'class' | 'module' | 'unreachable';

export interface DeadCodeItem {
  itemType: DeadItemType;
  name: string;
  line: number;
  reason: string;
}

export interface FileDeadCode {
  path: string;
  deadLines: number;
  totalLines: number;
  deadPercentage: number;
  deadFunctions: number;
  deadClasses: number;
  deadModules: number;
  unreachableBlocks: number;
  items: DeadCodeItem[];
  confidence: Confidence;
}

export interface DeadCodeSummary {
  totalFilesAnalyzed: number;
  filesWithDeadCode: number;
  totalDeadLines: number;
  deadPercentage: number;
  deadFunctions: number;
  deadClasses: number;
  deadModules: number;
  unreachableBlocks: number;
}

export interface SourceDocument {
  path: string;
  content: string;
}

const CLASS_PATTERNS: Record<Toolchain, RegExp> = {
  rust: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:struct|enum|trait)\s+([A-Za-z_]\w*)/,
  deno: /^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+([A-Za-z_$][\w$]*)/,
  'python-uv': /^\s*class\s+([A-Za-z_]\w*)/,
  go: /^\s*type\s+([A-Za-z_]\w*)\s+(?:struct|interface)\b/
};

const INLINE_MODULE = /^\s*(?:pub(?:\([^)]*\))?\s+)?mod\s+([a-z_]\w*)\s*\{/;

const TERMINATORS: Record<Toolchain, RegExp> = {
  rust: /^\s*(?:return\b[^;]*;|break\s*;|continue\s*;|(?:panic|unreachable|todo|unimplemented)!\(.*\);)\s*$/,
  deno: /^\s*(?:return\b[^;]*;?|break\s*;?|continue\s*;?|throw\b.*)\s*$/,
  go: /^\s*(?:return\b.*|break|continue|panic\(.*\))\s*$/,
  'python-uv': /^\s*(?:return\b.*|raise\b.*|break|continue)\s*$/
};

const ALWAYS_LIVE = new Set(['main', 'init', 'constructor', 'new', 'default', 'drop', 'fmt', 'from', 'into']);
const TEST_ATTRIBUTE = /#\[(?:tokio::)?test\]|#\[cfg\(test\)\]|@pytest|\bdescribe\(|\bit\(/;

function isExported(line: ScannedLine, name: string, toolchain: Toolchain): boolean {
  switch (toolchain) {
    case 'rust':
      return /\bpub\b/.test(line.code);
    case 'deno':
      return /^\s*export\b/.test(line.code);
    case 'go':
      return /^[A-Z]/.test(name);
    case 'python-uv':
      return !name.startsWith('_');
  }
}

function isTestOrEntry(name: string, lines: readonly ScannedLine[], index: number): boolean {
  if (ALWAYS_LIVE.has(name) || name.startsWith('test') || /^__\w+__$/.test(name)) {
    return true;
  }
  for (let back = index - 1; back >= Math.max(0, index - 3); back -= 1) {
    const previous = lines[back]?.text ?? '';
    if (TEST_ATTRIBUTE.test(previous)) {
      return true;
    }
  }
  return false;
}

function countIdentifiers(documents: ReadonlyArray<{ lines: readonly ScannedLine[] }>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const document of documents) {
    for (const line of document.lines) {
      for (const match of line.code.matchAll(/[A-Za-z_$][\w$]*/g)) {
        counts.set(match[0], (counts.get(match[0]) ?? 0) + 1);
      }
    }
  }
  return counts;
}

function indentationOf(text: string): number {
  return text.length - text.trimStart().length;
}

function findUnreachable(lines: readonly ScannedLine[], toolchain: Toolchain): Array<{ line: number; length: number }> {
  const blocks: Array<{ line: number; length: number }> = [];
  const terminator = TERMINATORS[toolchain];

  for (let index = 0; index < lines.length - 1; index += 1) {
    const current = lines[index];
    if (!current || !terminator.test(current.code)) {
      continue;
    }
    const indent = indentationOf(current.text);
    let length = 0;
    let first = 0;
    for (let cursor = index + 1; cursor < lines.length; cursor += 1) {
      const next = lines[cursor];
      if (!next) {
        break;
      }
      const code = next.code.trim();
      if (code.length === 0) {
        continue;
      }
      if (indentationOf(next.text) !== indent || code.startsWith('}') || /^(?:case\b|default\b|else\b|elif\b|except\b|finally\b)/.test(code)) {
        break;
      }
      if (length === 0) {
        first = next.number;
      }
      length += 1;
    }
    if (length > 0) {
      blocks.push({ line: first, length });
    }
  }

  return blocks;
}

function fileConfidence(items: readonly DeadCodeItem[], highConfidence: number, mediumConfidence: number): Confidence {
  if (items.length === 0 || highConfidence > 0) {
    return 'High';
  }
  if (mediumConfidence > 0) {
    return 'Medium';
  }
  return 'Low';
}

/**
 * Project-wide dead code: definitions whose identifier never appears outside
 * the definition, plus statements following an unconditional exit.
 */
export function analyzeDeadCode(documents: readonly SourceDocument[], toolchain: Toolchain): FileDeadCode[] {
  const scanned = documents.map((document) => ({ ...document, lines: scanSource(document.content, toolchain) }));
  const references = countIdentifiers(scanned);

  return scanned.map((document) => {
    const { lines } = document;
    const items: DeadCodeItem[] = [];
    let deadLines = 0;
    let high = 0;
    let medium = 0;
    let deadFunctions = 0;
    let deadClasses = 0;
    let deadModules = 0;

    for (const fn of analyzeFunctions(lines, toolchain)) {
      const index = fn.line - 1;
      const line = lines[index];
      if (!line || isTestOrEntry(fn.name, lines, index) || (references.get(fn.name) ?? 0) > 1) {
        continue;
      }
      const exported = isExported(line, fn.name, toolchain);
      items.push({
        itemType: 'function',
        name: fn.name,
        line: fn.line,
        reason: exported ? 'Exported but never referenced in the project' : 'Never referenced'
      });
      deadFunctions += 1;
      deadLines += fn.endLine - fn.line + 1;
      if (exported) {
        medium += 1;
      } else {
        high += 1;
      }
    }

    lines.forEach((line, index) => {
      const classMatch = CLASS_PATTERNS[toolchain].exec(line.code);
      const className = classMatch?.[1];
      if (className && !isTestOrEntry(className, lines, index) && (references.get(className) ?? 0) <= 1) {
        const exported = isExported(line, className, toolchain);
        items.push({ itemType: 'class', name: className, line: line.number, reason: exported ? 'Exported type never referenced' : 'Type never referenced' });
        deadClasses += 1;
        deadLines += 1;
        if (exported) {
          medium += 1;
        } else {
          high += 1;
        }
      }

      const moduleMatch = toolchain === 'rust' ? INLINE_MODULE.exec(line.code) : null;
      const moduleName = moduleMatch?.[1];
      if (moduleName && moduleName !== 'tests' && !isTestOrEntry(moduleName, lines, index) && (references.get(moduleName) ?? 0) <= 1) {
        items.push({ itemType: 'module', name: moduleName, line: line.number, reason: 'Inline module never referenced' });
        deadModules += 1;
        deadLines += 1;
        medium += 1;
      }
    });

    const unreachable = findUnreachable(lines, toolchain);
    for (const block of unreachable) {
      items.push({ itemType: 'unreachable', name: `line ${block.line}`, line: block.line, reason: 'Statement follows an unconditional exit' });
      deadLines += block.length;
    }

    const totalLines = lines.filter((line) => line.text.trim().length > 0).length;
    items.sort((left, right) => left.line - right.line);

    return {
      path: document.path,
      deadLines,
      totalLines,
      deadPercentage: totalLines === 0 ? 0 : Math.round((Math.min(deadLines, totalLines) / totalLines) * 10000) / 100,
      deadFunctions,
      deadClasses,
      deadModules,
      unreachableBlocks: unreachable.length,
      items,
      confidence: fileConfidence(items, high, medium)
    };
  });
}

export function summarizeDeadCode(files: readonly FileDeadCode[]): DeadCodeSummary {
  const totalLines = files.reduce((sum, file) => sum + file.totalLines, 0);
  const totalDeadLines = files.reduce((sum, file) => sum + file.deadLines, 0);

  return {
    totalFilesAnalyzed: files.length,
    filesWithDeadCode: files.filter((file) => file.items.length > 0).length,
    totalDeadLines,
    deadPercentage: totalLines === 0 ? 0 : Math.round((Math.min(totalDeadLines, totalLines) / totalLines) * 10000) / 100,
    deadFunctions: files.reduce((sum, file) => sum + file.deadFunctions, 0),
    deadClasses: files.reduce((sum, file) => sum + file.deadClasses, 0),
    deadModules: files.reduce((sum, file) => sum + file.deadModules, 0),
    unreachableBlocks: files.reduce((sum, file) => sum + file.unreachableBlocks, 0)
  };
}
