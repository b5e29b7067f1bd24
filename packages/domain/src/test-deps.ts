import { posix } from 'node:path';

import { normalizePath } from './glob.js';
import type { Toolchain } from './types.js';

const RUST_EXTERNAL_CRATES = new Set(['std', 'core', 'alloc']);
const QUOTED_SOURCE = /["'](src\/[A-Za-z0-9_\-./]+\.(?:rs|ts|js|py))["']/g;
const DENO_EXTENSIONS = ['.ts', '.tsx', '.js', '.jsx'];

function rustModuleCandidates(testFile: string, content: string): string[] {
  const candidates: string[] = [];
  const testDir = posix.dirname(normalizePath(testFile));

  for (const match of content.matchAll(/^\s*(?:pub\s+)?use\s+([A-Za-z_][\w]*(?:::[A-Za-z_][\w]*)*)/gm)) {
    const segments = (match[1] ?? '').split('::');
    const head = segments.shift();
    if (!head || RUST_EXTERNAL_CRATES.has(head) || segments.length === 0) {
      continue;
    }

    let base = 'src';
    if (head === 'self') {
      base = testDir;
    } else if (head === 'super') {
      base = posix.dirname(testDir);
    }

    for (let count = segments.length; count >= 1; count -= 1) {
      const modulePath = segments.slice(0, count).join('/');
      candidates.push(posix.join(base, `${modulePath}.rs`), posix.join(base, modulePath, 'mod.rs'));
    }
  }

  return candidates;
}

function denoCandidates(testFile: string, content: string): string[] {
  const candidates: string[] = [];
  const testDir = posix.dirname(normalizePath(testFile));

  for (const match of content.matchAll(/\bfrom\s+['"](\.{1,2}\/[^'"]+)['"]/g)) {
    const resolved = posix.join(testDir, match[1] ?? '');
    const extension = posix.extname(resolved);
    if (DENO_EXTENSIONS.includes(extension)) {
      candidates.push(resolved);
      if (extension === '.js') {
        candidates.push(`${resolved.slice(0, -3)}.ts`);
      }
      continue;
    }
    candidates.push(...DENO_EXTENSIONS.map((ext) => `${resolved}${ext}`), posix.join(resolved, 'index.ts'));
  }

  return candidates;
}

function pythonCandidates(content: string): string[] {
  const candidates: string[] = [];

  for (const match of content.matchAll(/^\s*(?:from\s+([\w.]+)\s+import|import\s+([\w.]+))/gm)) {
    const dotted = match[1] ?? match[2] ?? '';
    if (!dotted || dotted.startsWith('.')) {
      continue;
    }
    const modulePath = dotted.split('.').join('/');
    candidates.push(`${modulePath}.py`, `src/${modulePath}.py`, `${modulePath}/__init__.py`);
  }

  return candidates;
}

/**
 * Source files a test may depend on, as project-relative candidates. The
 * caller keeps the ones that exist.
 */
export function testDependencyCandidates(testFile: string, content: string, toolchain: Toolchain): string[] {
  const candidates: string[] = [];

  switch (toolchain) {
    case 'rust':
      candidates.push(...rustModuleCandidates(testFile, content));
      break;
    case 'deno':
      candidates.push(...denoCandidates(testFile, content));
      break;
    case 'python-uv':
      candidates.push(...pythonCandidates(content));
      break;
    case 'go':
      break;
  }

  for (const match of content.matchAll(QUOTED_SOURCE)) {
    if (match[1]) {
      candidates.push(match[1]);
    }
  }

  const self = normalizePath(testFile);
  return Array.from(new Set(candidates.map(normalizePath))).filter((candidate) => candidate !== self).sort();
}
