import { scanSource } from './lexer.js';
import { findBlockEnd } from './rewrite.js';
import type { QualityProfile, Toolchain, ViolationDetail } from './types.js';

export const MISSING_TESTS_LINT = 'missing_tests';

const PUBLIC_FN = /^\s*pub(?:\([^)]*\))?\s+(?:const\s+)?(?:async\s+)?(?:unsafe\s+)?fn\s+([A-Za-z_][A-Za-z0-9_]*)/;
const TEST_MODULE = /#\[cfg\(test\)\]\s*mod\s+tests\s*\{/;

export function missingTestsViolation(file: string, coverage: number, profile: QualityProfile): ViolationDetail {
  return {
    file,
    line: 1,
    column: 1,
    endLine: 1,
    endColumn: 1,
    lintName: MISSING_TESTS_LINT,
    message: `Coverage ${coverage.toFixed(1)}% is below the minimum of ${profile.coverageMin}%`,
    severity: 'warning',
    suggestion: 'Add tests for the public functions',
    machineApplicable: false
  };
}

/** Public functions of a Rust file in source order. Other toolchains have no stub writer. */
export function publicFunctionNames(content: string, toolchain: Toolchain): string[] {
  if (toolchain !== 'rust') {
    return [];
  }
  const names: string[] = [];
  for (const line of scanSource(content, toolchain)) {
    const name = PUBLIC_FN.exec(line.code)?.[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

function renderStub(name: string): string {
  return ['    #[test]', `    #[ignore = "exercise ${name}"]`, `    fn test_${name}() {}`].join('\n');
}

export interface TestStubEdit {
  content: string;
  added: string[];
}

/**
 * One ignored `#[test]` stub per public function that has no `test_<name>`
 * yet, placed at the end of the file's `mod tests` or in a new one.
 */
export function appendTestStubs(content: string, toolchain: Toolchain): TestStubEdit {
  const missing = publicFunctionNames(content, toolchain).filter(
    (name) => !new RegExp(`\\bfn\\s+test_${name}\\s*\\(`).test(content)
  );
  if (missing.length === 0) {
    return { content, added: [] };
  }
  const stubs = missing.map(renderStub).join('\n\n');

  const module = TEST_MODULE.exec(content);
  const end = module ? findBlockEnd(content, module.index) : null;
  if (end !== null) {
    const close = end - 1;
    return { content: `${content.slice(0, close).trimEnd()}\n\n${stubs}\n${content.slice(close)}`, added: missing };
  }

  const base = content === '' || content.endsWith('\n') ? content : `${content}\n`;
  return { content: `${base}\n#[cfg(test)]\nmod tests {\n    use super::*;\n\n${stubs}\n}\n`, added: missing };
}
