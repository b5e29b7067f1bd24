import { normalizePath } from './glob.js';

export interface RewriteTemplate {
  fileSuffix: string;
  signature: string;
  replacement: string;
}

export interface TemplateRewrite {
  content: string;
  applied: RewriteTemplate[];
}

/**
 * Index one past the brace that closes the first block opened at or after
 * `from`. String literals, character literals and comments are skipped.
 */
export function findBlockEnd(content: string, from: number): number | null {
  let depth = 0;
  let opened = false;
  let index = from;

  while (index < content.length) {
    const ch = content.charAt(index);
    const next = content.charAt(index + 1);

    if (ch === '/' && next === '/') {
      const newline = content.indexOf('\n', index);
      index = newline < 0 ? content.length : newline + 1;
      continue;
    }
    if (ch === '/' && next === '*') {
      const close = content.indexOf('*/', index + 2);
      index = close < 0 ? content.length : close + 2;
      continue;
    }
    if (ch === '"' || ch === '`') {
      index += 1;
      while (index < content.length && content.charAt(index) !== ch) {
        index += content.charAt(index) === '\\' ? 2 : 1;
      }
      index += 1;
      continue;
    }
    if (ch === "'") {
      const literal = /^'(?:\\.|[^\\'\n])'/.exec(content.slice(index));
      if (literal) {
        index += literal[0].length;
        continue;
      }
    }

    if (ch === '{') {
      depth += 1;
      opened = true;
    } else if (ch === '}') {
      depth -= 1;
      if (opened && depth === 0) {
        return index + 1;
      }
    }
    index += 1;
  }

  return null;
}

export function templateApplies(filePath: string, content: string, template: RewriteTemplate): boolean {
  return normalizePath(filePath).endsWith(normalizePath(template.fileSuffix)) && content.includes(template.signature);
}

/** Replaces the whole function that starts at the template's signature. */
export function applyTemplate(content: string, template: RewriteTemplate): string | null {
  const start = content.indexOf(template.signature);
  if (start < 0) {
    return null;
  }
  const end = findBlockEnd(content, start);
  if (end === null) {
    return null;
  }
  return `${content.slice(0, start)}${template.replacement}${content.slice(end)}`;
}

export function applyTemplates(filePath: string, content: string, templates: readonly RewriteTemplate[]): TemplateRewrite {
  let current = content;
  const applied: RewriteTemplate[] = [];

  for (const template of templates) {
    if (!templateApplies(filePath, current, template)) {
      continue;
    }
    const rewritten = applyTemplate(current, template);
    if (rewritten !== null && rewritten !== current) {
      current = rewritten;
      applied.push(template);
    }
  }

  return { content: current, applied };
}
