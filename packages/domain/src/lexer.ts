import type { Toolchain } from './types.js';

export interface ScannedLine {
  number: number;
  text: string;
  /** Source with comments removed and string literal contents blanked. */
  code: string;
  /** Comment text on this line, or null when the line carries no comment. */
  comment: string | null;
  /** Index in `text` where the comment running to the end of the line opens; null when code follows every comment. */
  commentColumn: number | null;
}

type ScanMode =
  | { kind: 'code' }
  | { kind: 'line-comment' }
  | { kind: 'block-comment'; depth: number }
  | { kind: 'string'; close: string; escapes: boolean };

const CHAR_LITERAL = /^'(?:\\.|\\u\{[0-9a-fA-F]+\}|[^\\'\n])'/;
const RUST_RAW_STRING = /^(b?r)(#*)"/;
const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;

function openString(rest: string, previous: string, toolchain: Toolchain): { open: string; mode: ScanMode } | null {
  if (toolchain === 'python-uv') {
    const triple = rest.startsWith('"""') ? '"""' : rest.startsWith("'''") ? "'''" : null;
    if (triple) {
      return { open: triple, mode: { kind: 'string', close: triple, escapes: true } };
    }
    if (rest[0] === '"' || rest[0] === "'") {
      return { open: rest.charAt(0), mode: { kind: 'string', close: rest.charAt(0), escapes: true } };
    }
    return null;
  }

  if (toolchain === 'rust' && !IDENTIFIER_CHAR.test(previous)) {
    const raw = RUST_RAW_STRING.exec(rest);
    if (raw) {
      const hashes = raw[2] ?? '';
      return { open: raw[0], mode: { kind: 'string', close: `"${hashes}`, escapes: false } };
    }
  }

  const first = rest.charAt(0);
  if (first === '"') {
    return { open: '"', mode: { kind: 'string', close: '"', escapes: true } };
  }
  if (first === '`' && (toolchain === 'deno' || toolchain === 'go')) {
    return { open: '`', mode: { kind: 'string', close: '`', escapes: toolchain === 'deno' } };
  }
  if (first === "'" && toolchain === 'deno') {
    return { open: "'", mode: { kind: 'string', close: "'", escapes: true } };
  }
  return null;
}

/**
 * Splits source text into per-line code and comment channels. String and
 * character literal contents never reach either channel.
 */
export function scanSource(content: string, toolchain: Toolchain): ScannedLine[] {
  const lines: ScannedLine[] = [];
  const texts = content.split('\n');
  const hashComments = toolchain === 'python-uv';
  const nestedBlocks = toolchain === 'rust';

  let mode: ScanMode = { kind: 'code' };

  for (let index = 0; index < texts.length; index += 1) {
    const text = texts[index] ?? '';
    let code = '';
    let comment: string | null = mode.kind === 'block-comment' ? '' : null;
    let commentColumn: number | null = mode.kind === 'block-comment' ? 0 : null;
    let codeAtComment = 0;
    let i = 0;

    while (i < text.length) {
      const ch = text.charAt(i);
      const next = text.charAt(i + 1);

      if (mode.kind === 'line-comment') {
        comment = (comment ?? '') + text.slice(i);
        break;
      }

      if (mode.kind === 'block-comment') {
        if (nestedBlocks && ch === '/' && next === '*') {
          mode = { kind: 'block-comment', depth: mode.depth + 1 };
          comment = (comment ?? '') + '/*';
          i += 2;
          continue;
        }
        if (ch === '*' && next === '/') {
          const depth: number = mode.depth - 1;
          mode = depth === 0 ? { kind: 'code' } : { kind: 'block-comment', depth };
          i += 2;
          continue;
        }
        comment = (comment ?? '') + ch;
        i += 1;
        continue;
      }

      if (mode.kind === 'string') {
        if (mode.escapes && ch === '\\') {
          i += 2;
          continue;
        }
        if (text.startsWith(mode.close, i)) {
          code += mode.close;
          i += mode.close.length;
          mode = { kind: 'code' };
          continue;
        }
        i += 1;
        continue;
      }

      if (commentColumn === null || code.length > codeAtComment) {
        const opensComment = hashComments ? ch === '#' : ch === '/' && (next === '/' || next === '*');
        if (opensComment) {
          commentColumn = i;
          codeAtComment = code.length;
        }
      }

      if (hashComments && ch === '#') {
        mode = { kind: 'line-comment' };
        comment = '';
        i += 1;
        continue;
      }
      if (!hashComments && ch === '/' && next === '/') {
        mode = { kind: 'line-comment' };
        comment = '//';
        i += 2;
        continue;
      }
      if (!hashComments && ch === '/' && next === '*') {
        mode = { kind: 'block-comment', depth: 1 };
        comment = (comment ?? '') + '/*';
        i += 2;
        continue;
      }

      const rest = text.slice(i);
      if ((toolchain === 'rust' || toolchain === 'go') && ch === "'") {
        const literal = CHAR_LITERAL.exec(rest);
        if (literal) {
          code += "''";
          i += literal[0].length;
          continue;
        }
      }

      const opened = openString(rest, i > 0 ? text.charAt(i - 1) : '', toolchain);
      if (opened) {
        code += opened.open;
        mode = opened.mode;
        i += opened.open.length;
        continue;
      }

      code += ch;
      i += 1;
    }

    if (mode.kind === 'line-comment') {
      mode = { kind: 'code' };
    }

    lines.push({
      number: index + 1,
      text,
      code,
      comment,
      commentColumn: commentColumn !== null && code.length === codeAtComment ? commentColumn : null
    });
  }

  return lines;
}

export function countSloc(lines: readonly ScannedLine[]): number {
  return lines.filter((line) => line.code.trim().length > 0).length;
}
