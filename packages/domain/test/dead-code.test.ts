import { describe, expect, it } from 'vitest';

import { analyzeDeadCode, summarizeDeadCode } from '../src/dead-code.js';

const LIB = [
  'pub fn used() -> i32 { helper() }',
  'fn helper() -> i32 { 1 }',
  'fn orphan() -> i32 { 2 }',
  'pub fn exported_only() {}',
  'fn early(x: i32) -> i32 {',
  '    return x;',
  '    let y = 2;',
  '}',
  ''
].join('\n');

const MAIN = 'fn main() { used(); }\n';

describe('dead code analysis', () => {
  it('reports unreferenced functions and unreachable statements', () => {
    const [lib, main] = analyzeDeadCode(
      [
        { path: 'src/lib.rs', content: LIB },
        { path: 'src/main.rs', content: MAIN }
      ],
      'rust'
    );

    expect(lib?.items).toEqual([
      { itemType: 'function', name: 'orphan', line: 3, reason: 'Never referenced' },
      { itemType: 'function', name: 'exported_only', line: 4, reason: 'Exported but never referenced in the project' },
      { itemType: 'function', name: 'early', line: 5, reason: 'Never referenced' },
      { itemType: 'unreachable', name: 'line 7', line: 7, reason: 'Statement follows an unconditional exit' }
    ]);
    expect(lib).toMatchObject({
      deadLines: 7,
      totalLines: 8,
      deadPercentage: 87.5,
      deadFunctions: 3,
      unreachableBlocks: 1,
      confidence: 'High'
    });
    expect(main).toMatchObject({ items: [], deadLines: 0, confidence: 'High' });
  });

  it('rates exported-only findings as medium confidence', () => {
    const [file] = analyzeDeadCode([{ path: 'src/api.rs', content: 'pub fn lonely() {}\n' }], 'rust');

    expect(file?.confidence).toBe('Medium');
  });

  it('skips test functions', () => {
    const source = ['#[cfg(test)]', 'mod tests {', '    #[test]', '    fn checks_things() {}', '}', ''].join('\n');

    expect(analyzeDeadCode([{ path: 'src/lib.rs', content: source }], 'rust')[0]?.items).toEqual([]);
  });

  it('summarizes across files', () => {
    const files = analyzeDeadCode(
      [
        { path: 'src/lib.rs', content: LIB },
        { path: 'src/main.rs', content: MAIN }
      ],
      'rust'
    );

    expect(summarizeDeadCode(files)).toEqual({
      totalFilesAnalyzed: 2,
      filesWithDeadCode: 1,
      totalDeadLines: 7,
      deadPercentage: 77.78,
      deadFunctions: 3,
      deadClasses: 0,
      deadModules: 0,
      unreachableBlocks: 1
    });
  });
});
