import type { SelectionFilters, Toolchain } from './types.js';

export const SOURCE_EXTENSIONS: Record<Toolchain, string[]> = {
  rust: ['rs'],
  deno: ['ts', 'tsx', 'js', 'jsx'],
  'python-uv': ['py'],
  go: ['go']
};

export const VENDOR_DIRECTORIES = ['target', 'node_modules', '.git', 'vendor', 'dist', 'build'];

export const VENDOR_FILE_PATTERNS = ['**/*.min.*', '**/*.wasm'];

export const DEFAULT_EXCLUDES = ['tests/**', 'benches/**', '**/test_*.rs', '**/*_test.rs', '**/fixtures/**'];

const TOOLCHAIN_MARKERS: Array<[string, Toolchain]> = [
  ['Cargo.toml', 'rust'],
  ['deno.json', 'deno'],
  ['deno.jsonc', 'deno'],
  ['package.json', 'deno'],
  ['tsconfig.json', 'deno'],
  ['pyproject.toml', 'python-uv'],
  ['setup.py', 'python-uv'],
  ['go.mod', 'go']
];

export function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').replace(/^\.\//, '');
}

const compiled = new Map<string, RegExp>();

function escapeRegex(value: string): string {
  return value.replace(/[.+^${}()|[\]\\?]/g, '\\$&');
}

function compileGlob(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) {
    return cached;
  }

  let source = '';
  let index = 0;
  while (index < pattern.length) {
    if (pattern.startsWith('**/', index)) {
      source += '(?:.*/)?';
      index += 3;
    } else if (pattern.startsWith('**', index)) {
      source += '.*';
      index += 2;
    } else if (pattern[index] === '*') {
      source += '[^/]*';
      index += 1;
    } else {
      source += escapeRegex(pattern.charAt(index));
      index += 1;
    }
  }

  const regex = new RegExp(`(?:^|/)${source}$`);
  compiled.set(pattern, regex);
  return regex;
}

/**
 * Minimal matcher shared by every analyzer: `**` spans segments, `*` stays
 * inside one segment, and a pattern without wildcards is a substring test.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  const target = normalizePath(filePath);
  const normalizedPattern = normalizePath(pattern.trim());
  if (!normalizedPattern) {
    return false;
  }

  if (!normalizedPattern.includes('*')) {
    return target.includes(normalizedPattern);
  }

  return compileGlob(normalizedPattern).test(target);
}

export function matchesAny(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => matchesPattern(filePath, pattern));
}

export function isVendorPath(filePath: string): boolean {
  const target = `/${normalizePath(filePath)}`;
  if (VENDOR_DIRECTORIES.some((dir) => target.includes(`/${dir}/`))) {
    return true;
  }
  return matchesAny(filePath, VENDOR_FILE_PATTERNS);
}

export function isSourceFile(filePath: string, toolchain: Toolchain): boolean {
  const dot = filePath.lastIndexOf('.');
  if (dot < 0) {
    return false;
  }
  const extension = filePath.slice(dot + 1).toLowerCase();
  return SOURCE_EXTENSIONS[toolchain].includes(extension);
}

export function detectToolchain(rootEntries: readonly string[]): Toolchain {
  for (const [marker, toolchain] of TOOLCHAIN_MARKERS) {
    if (rootEntries.includes(marker)) {
      return toolchain;
    }
  }
  return 'rust';
}

export function parseIgnoreFile(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function effectiveExcludes(filters: SelectionFilters): string[] {
  if (filters.include.length > 0) {
    return filters.exclude;
  }
  return [...DEFAULT_EXCLUDES, ...filters.exclude];
}

/** Include/exclude filtering plus the vendor skip; explicit includes override the vendor skip. */
export function passesFilters(filePath: string, filters: SelectionFilters): boolean {
  const explicitlyIncluded = filters.include.length > 0 && matchesAny(filePath, filters.include);

  if (filters.include.length > 0 && !explicitlyIncluded) {
    return false;
  }
  if (!explicitlyIncluded && isVendorPath(filePath)) {
    return false;
  }
  return !matchesAny(filePath, effectiveExcludes(filters));
}

export function isNonRefactorableFile(filePath: string): boolean {
  const target = `/${normalizePath(filePath)}`;
  const baseName = target.slice(target.lastIndexOf('/') + 1);

  if (baseName.startsWith('test_')) {
    return true;
  }
  if (/_test\.[a-z]+$/.test(baseName) || /\.(test|spec)\.[a-z]+$/.test(baseName)) {
    return true;
  }
  if (baseName === 'build.rs' || baseName === 'mod.rs' || baseName === 'main.rs') {
    return true;
  }

  return ['/tests/', '/benches/', '/bench/', '/fuzz/', '/examples/'].some((segment) => target.includes(segment)) ||
    target.includes('generated');
}
