import { createHash } from 'node:crypto';

import { countSloc, scanSource, type ScannedLine } from './lexer.js';
import type { AstMetadata, FileComplexity, FunctionInfo, Toolchain } from './types.js';

export const COMPLEXITY_CEILING = 255;

const FUNCTION_PATTERNS: Record<Toolchain, RegExp[]> = {
  rust: [/\bfn\s+([A-Za-z_][A-Za-z0-9_]*)/],
  go: [/^\s*func\s+(?:\([^)]*\)\s*)?([A-Za-z_][A-Za-z0-9_]*)/],
  deno: [
    /\bfunction\s*\*?\s*([A-Za-z_$][\w$]*)\s*[<(]/,
    /\b(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(?::[^=]+)?=\s*(?:async\s*)?(?:\([^)]*\)|[A-Za-z_$][\w$]*)\s*(?::[^=]+)?=>/,
    /^\s*(?:(?:public|private|protected|static|async|override|readonly)\s+)*([A-Za-z_$][\w$]*)\s*\([^)]*\)\s*(?::\s*[^{;]+)?\{\s*$/
  ],
  'python-uv': [/^\s*(?:async\s+)?def\s+([A-Za-z_][A-Za-z0-9_]*)/]
};

const NOT_A_METHOD = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'function', 'else', 'do', 'with']);

const IMPORT_PATTERNS: Record<Toolchain, RegExp> = {
  rust: /^\s*(?:pub\s+)?use\s+/,
  go: /^\s*import\b/,
  deno: /^\s*import\b/,
  'python-uv': /^\s*(?:import|from)\s+\S+/
};

interface Decisions {
  branches: RegExp;
  loops: RegExp;
  arms: RegExp | null;
  handlers: RegExp | null;
  logical: RegExp;
}

const DECISIONS: Record<Toolchain, Decisions> = {
  rust: { branches: /\bif\b/g, loops: /\b(?:for|while|loop)\b/g, arms: /=>/g, handlers: null, logical: /&&|\|\|/g },
  go: { branches: /\bif\b/g, loops: /\bfor\b/g, arms: /\bcase\b/g, handlers: null, logical: /&&|\|\|/g },
  deno: { branches: /\bif\b/g, loops: /\b(?:for|while)\b/g, arms: /\bcase\b/g, handlers: /\bcatch\b/g, logical: /&&|\|\||\?\?/g },
  'python-uv': { branches: /\b(?:if|elif)\b/g, loops: /\b(?:for|while)\b/g, arms: /^\s*case\b/g, handlers: /\bexcept\b/g, logical: /\b(?:and|or)\b/g }
};

const CONTROL_FLOW: Record<Toolchain, RegExp> = {
  rust: /\b(?:if|for|while|loop|match)\b/g,
  go: /\b(?:if|for|switch|select)\b/g,
  deno: /\b(?:if|for|while|switch|catch)\b/g,
  'python-uv': /\b(?:if|for|while|try|except|with|match)\b/g
};

const ELSE_BRANCH: Record<Toolchain, RegExp> = {
  rust: /\belse\b/g,
  go: /\belse\b/g,
  deno: /\belse\b/g,
  'python-uv': /\b(?:elif|else)\b/g
};

const EARLY_EXIT = /\b(?:return|break|continue)\b/;

interface FunctionSpan {
  name: string;
  start: number;
  end: number;
}

function countMatches(text: string, pattern: RegExp | null): number {
  if (!pattern) {
    return 0;
  }
  return (text.match(pattern) ?? []).length;
}

function matchFunctionName(code: string, toolchain: Toolchain): string | null {
  for (const pattern of FUNCTION_PATTERNS[toolchain]) {
    const match = pattern.exec(code);
    const name = match?.[1];
    if (name && !NOT_A_METHOD.has(name)) {
      return name;
    }
  }
  return null;
}

function findBraceSpans(lines: readonly ScannedLine[], toolchain: Toolchain): FunctionSpan[] {
  const spans: FunctionSpan[] = [];

  lines.forEach((line, index) => {
    const name = matchFunctionName(line.code, toolchain);
    if (!name) {
      return;
    }

    let depth = 0;
    let grouping = 0;
    let opened = false;
    for (let cursor = index; cursor < lines.length; cursor += 1) {
      const code = lines[cursor]?.code ?? '';
      const startColumn = cursor === index ? Math.max(0, code.indexOf(name)) : 0;
      for (const ch of code.slice(startColumn)) {
        if (!opened && (ch === '(' || ch === '[')) {
          grouping += 1;
        } else if (!opened && (ch === ')' || ch === ']')) {
          grouping -= 1;
        }
        if (ch === ';' && !opened && grouping <= 0) {
          return;
        }
        if (ch === '{') {
          depth += 1;
          opened = true;
        } else if (ch === '}') {
          depth -= 1;
          if (opened && depth === 0) {
            spans.push({ name, start: index, end: cursor });
            return;
          }
        }
      }
    }
  });

  return spans;
}

function indentation(text: string): number {
  return text.length - text.trimStart().length;
}

function findIndentSpans(lines: readonly ScannedLine[], toolchain: Toolchain): FunctionSpan[] {
  const spans: FunctionSpan[] = [];

  lines.forEach((line, index) => {
    const name = matchFunctionName(line.code, toolchain);
    if (!name) {
      return;
    }
    const baseIndent = indentation(line.text);
    let end = index;
    for (let cursor = index + 1; cursor < lines.length; cursor += 1) {
      const candidate = lines[cursor];
      if (!candidate || candidate.code.trim().length === 0) {
        continue;
      }
      if (indentation(candidate.text) <= baseIndent) {
        break;
      }
      end = cursor;
    }
    spans.push({ name, start: index, end });
  });

  return spans;
}

function ownLines(span: FunctionSpan, spans: readonly FunctionSpan[]): Set<number> {
  const own = new Set<number>();
  for (let index = span.start; index <= span.end; index += 1) {
    own.add(index);
  }
  for (const inner of spans) {
    if (inner !== span && inner.start > span.start && inner.end <= span.end) {
      for (let index = inner.start; index <= inner.end; index += 1) {
        own.delete(index);
      }
    }
  }
  return own;
}

export function cyclomaticOf(code: string, toolchain: Toolchain): number {
  const decisions = DECISIONS[toolchain];
  return (
    countMatches(code, decisions.branches) +
    countMatches(code, decisions.loops) +
    countMatches(code, decisions.arms) +
    countMatches(code, decisions.handlers) +
    countMatches(code, decisions.logical)
  );
}

function braceDepthBefore(lines: readonly ScannedLine[], span: FunctionSpan): Map<number, number> {
  const depths = new Map<number, number>();
  let depth = 0;
  for (let index = span.start; index <= span.end; index += 1) {
    depths.set(index, depth);
    for (const ch of lines[index]?.code ?? '') {
      if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
      }
    }
  }
  return depths;
}

function pythonNesting(lines: readonly ScannedLine[], span: FunctionSpan): Map<number, number> {
  const nesting = new Map<number, number>();
  const stack: number[] = [];
  const control = CONTROL_FLOW['python-uv'];

  for (let index = span.start + 1; index <= span.end; index += 1) {
    const line = lines[index];
    if (!line || line.code.trim().length === 0) {
      continue;
    }
    const indent = indentation(line.text);
    while (stack.length > 0 && (stack[stack.length - 1] ?? 0) >= indent) {
      stack.pop();
    }
    nesting.set(index, stack.length);
    control.lastIndex = 0;
    if (control.test(line.code) && line.code.trimEnd().endsWith(':')) {
      stack.push(indent);
    }
  }
  return nesting;
}

function cognitiveOf(lines: readonly ScannedLine[], span: FunctionSpan, own: Set<number>, toolchain: Toolchain): number {
  const nestingByLine =
    toolchain === 'python-uv' ? pythonNesting(lines, span) : braceDepthBefore(lines, span);
  let score = 0;

  for (const index of own) {
    if (index === span.start) {
      continue;
    }
    const code = lines[index]?.code ?? '';
    if (code.trim().length === 0) {
      continue;
    }
    const rawNesting = nestingByLine.get(index) ?? 0;
    const nesting = toolchain === 'python-uv' ? rawNesting : Math.max(0, rawNesting - 1);

    const elseCount = countMatches(code, ELSE_BRANCH[toolchain]);
    let structures = countMatches(code, CONTROL_FLOW[toolchain]);
    if (toolchain !== 'python-uv') {
      structures -= countMatches(code, /\belse\s+if\b/g);
    }

    score += elseCount;
    score += Math.max(0, structures) * (1 + nesting);

    if (nesting > 0 && EARLY_EXIT.test(code)) {
      score += 1;
    }
  }

  return score;
}

function saturate(value: number): number {
  return Math.min(COMPLEXITY_CEILING, Math.max(0, value));
}

export function analyzeFunctions(lines: readonly ScannedLine[], toolchain: Toolchain): FunctionInfo[] {
  const spans = toolchain === 'python-uv' ? findIndentSpans(lines, toolchain) : findBraceSpans(lines, toolchain);

  return spans.map((span) => {
    const own = ownLines(span, spans);
    let decisions = 0;
    for (const index of own) {
      const code = lines[index]?.code ?? '';
      decisions += cyclomaticOf(index === span.start ? code.slice(code.indexOf(span.name)) : code, toolchain);
    }

    return {
      name: span.name,
      line: span.start + 1,
      endLine: span.end + 1,
      cyclomatic: saturate(1 + decisions),
      cognitive: saturate(cognitiveOf(lines, span, own, toolchain))
    };
  });
}

export function analyzeFileComplexity(path: string, content: string, toolchain: Toolchain): FileComplexity {
  const lines = scanSource(content, toolchain);
  const functions = analyzeFunctions(lines, toolchain);

  return {
    path,
    functions,
    maxCyclomatic: functions.reduce((max, fn) => Math.max(max, fn.cyclomatic), 0),
    maxCognitive: functions.reduce((max, fn) => Math.max(max, fn.cognitive), 0),
    sloc: countSloc(lines)
  };
}

export function extractAstMetadata(content: string, toolchain: Toolchain): AstMetadata {
  const lines = scanSource(content, toolchain);
  const functions = analyzeFunctions(lines, toolchain);
  const importPattern = IMPORT_PATTERNS[toolchain];
  const imports = lines.filter((line) => importPattern.test(line.code)).map((line) => line.code.trim());

  const structure = functions.map((fn) => `${fn.name}@${fn.line}-${fn.endLine}`).join('|');
  const structureHash = createHash('sha256').update(`${imports.join('\n')}#${structure}`).digest('hex').slice(0, 16);

  return { functions, imports, structureHash };
}

export interface ComplexitySummary {
  totalFiles: number;
  totalFunctions: number;
  maxCyclomatic: number;
  maxCognitive: number;
  medianCyclomatic: number;
  p90Cyclomatic: number;
  functionsOverThreshold: number;
}

function percentile(sorted: readonly number[], fraction: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(fraction * sorted.length) - 1));
  return sorted[index] ?? 0;
}

export function summarizeComplexity(files: readonly FileComplexity[], threshold: number): ComplexitySummary {
  const values = files.flatMap((file) => file.functions.map((fn) => fn.cyclomatic)).sort((a, b) => a - b);

  return {
    totalFiles: files.length,
    totalFunctions: values.length,
    maxCyclomatic: values[values.length - 1] ?? 0,
    maxCognitive: files.reduce((max, file) => Math.max(max, file.maxCognitive), 0),
    medianCyclomatic: percentile(values, 0.5),
    p90Cyclomatic: percentile(values, 0.9),
    functionsOverThreshold: values.filter((value) => value > threshold).length
  };
}
