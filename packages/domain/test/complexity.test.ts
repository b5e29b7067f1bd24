import { describe, expect, it } from 'vitest';

import {
  analyzeFileComplexity,
  COMPLEXITY_CEILING,
  extractAstMetadata,
  summarizeComplexity
} from '../src/complexity.js';

function rustFunction(name: string, body: string[]): string {
  return [`pub fn ${name}(x: i32) -> i32 {`, '    let mut total = 0;', ...body, '    total', '}', ''].join('\n');
}

function ifBranches(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `    if x > ${index} { total += 1; }`);
}

describe('complexity analyzer', () => {
  it('counts twelve branches as cyclomatic complexity 13', () => {
    const result = analyzeFileComplexity('src/branchy.rs', rustFunction('branchy', ifBranches(12)), 'rust');

    expect(result.functions).toEqual([{ name: 'branchy', line: 1, endLine: 16, cyclomatic: 13, cognitive: 12 }]);
    expect(result.maxCyclomatic).toBe(13);
    expect(result.sloc).toBe(16);
  });

  it('adds exactly one per extra decision point', () => {
    const base = analyzeFileComplexity('a.rs', rustFunction('f', ['    if x > 0 { total += 1; }']), 'rust');
    const withAnd = analyzeFileComplexity('a.rs', rustFunction('f', ['    if x > 0 && x < 9 { total += 1; }']), 'rust');
    const withLoop = analyzeFileComplexity(
      'a.rs',
      rustFunction('f', ['    if x > 0 && x < 9 { total += 1; }', '    while total < 3 { total += 1; }']),
      'rust'
    );

    expect(base.maxCyclomatic).toBe(2);
    expect(withAnd.maxCyclomatic).toBe(3);
    expect(withLoop.maxCyclomatic).toBe(4);
  });

  it('adds nesting to cognitive complexity', () => {
    const source = [
      'fn nested(v: &[i32]) -> i32 {',
      '    let mut n = 0;',
      '    for x in v {',
      '        if *x > 0 {',
      '            n += 1;',
      '        }',
      '    }',
      '    n',
      '}'
    ].join('\n');

    const [fn] = analyzeFileComplexity('src/nested.rs', source, 'rust').functions;

    expect(fn).toEqual({ name: 'nested', line: 1, endLine: 9, cyclomatic: 3, cognitive: 3 });
  });

  it('ignores keywords inside strings and comments', () => {
    const source = ['fn quiet() -> &\'static str {', '    // if this while that', '    "if && || for"', '}'].join('\n');

    expect(analyzeFileComplexity('src/quiet.rs', source, 'rust').maxCyclomatic).toBe(1);
  });

  it('scores python functions by indentation', () => {
    const source = ['def check(x, y):', '    if x and y:', '        return 1', '    return 0', '', 'def other():', '    pass'].join('\n');

    const result = analyzeFileComplexity('pkg/check.py', source, 'python-uv');

    expect(result.functions.map((fn) => [fn.name, fn.cyclomatic])).toEqual([
      ['check', 3],
      ['other', 1]
    ]);
  });

  it('counts nullish coalescing for TypeScript sources', () => {
    const source = ['function pick(a: number, b?: number) {', '  const v = b ?? a;', '  return v;', '}'].join('\n');

    expect(analyzeFileComplexity('src/pick.ts', source, 'deno').functions[0]?.cyclomatic).toBe(2);
  });

  it('saturates at the ceiling', () => {
    const result = analyzeFileComplexity('src/huge.rs', rustFunction('huge', ifBranches(300)), 'rust');

    expect(result.maxCyclomatic).toBe(COMPLEXITY_CEILING);
  });

  it('extracts imports and a stable structure hash', () => {
    const source = ['use std::fmt;', '', 'pub fn id(x: i32) -> i32 { x }', ''].join('\n');

    const first = extractAstMetadata(source, 'rust');
    const second = extractAstMetadata(source, 'rust');

    expect(first.imports).toEqual(['use std::fmt;']);
    expect(first.functions.map((fn) => fn.name)).toEqual(['id']);
    expect(first.structureHash).toHaveLength(16);
    expect(second.structureHash).toBe(first.structureHash);
  });

  it('summarizes the project distribution', () => {
    const files = [
      {
        path: 'a.rs',
        functions: [{ name: 'a', line: 1, endLine: 2, cyclomatic: 1, cognitive: 0 }],
        maxCyclomatic: 1,
        maxCognitive: 0,
        sloc: 3
      },
      {
        path: 'b.rs',
        functions: [
          { name: 'b', line: 1, endLine: 10, cyclomatic: 3, cognitive: 2 },
          { name: 'c', line: 11, endLine: 30, cyclomatic: 13, cognitive: 9 }
        ],
        maxCyclomatic: 13,
        maxCognitive: 9,
        sloc: 30
      }
    ];

    expect(summarizeComplexity(files, 10)).toEqual({
      totalFiles: 2,
      totalFunctions: 3,
      maxCyclomatic: 13,
      maxCognitive: 9,
      medianCyclomatic: 3,
      p90Cyclomatic: 13,
      functionsOverThreshold: 1
    });
  });
});
