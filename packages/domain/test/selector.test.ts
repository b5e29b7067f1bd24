import { describe, expect, it } from 'vitest';

import { emptyMetrics, EXTREME_QUALITY_PROFILE } from '../src/gates.js';
import { selectTarget, type SelectionInput } from '../src/selector.js';
import type { FileComplexity, ViolationDetail } from '../src/types.js';

function makeViolation(overrides: Partial<ViolationDetail> = {}): ViolationDetail {
  return {
    file: 'src/a.rs',
    line: 1,
    column: 1,
    endLine: 1,
    endColumn: 1,
    lintName: 'clippy::needless_return',
    message: 'unneeded return statement',
    severity: 'warning',
    machineApplicable: false,
    ...overrides
  };
}

function makeComplexity(path: string, cyclomatic: number): FileComplexity {
  return {
    path,
    functions: [{ name: 'busy', line: 1, endLine: 30, cyclomatic, cognitive: cyclomatic }],
    maxCyclomatic: cyclomatic,
    maxCognitive: cyclomatic,
    sloc: 30
  };
}

function makeInput(overrides: Partial<SelectionInput> = {}): SelectionInput {
  return {
    profile: EXTREME_QUALITY_PROFILE,
    metrics: { ...emptyMetrics(), coveragePercent: 100 },
    filters: { include: [], exclude: [] },
    filesCompleted: [],
    violations: [],
    coverageByFile: {},
    sourceFiles: [],
    complexity: [],
    satdByFile: {},
    ...overrides
  };
}

describe('tier 1: lint violations', () => {
  it('prefers the file with the most violations', () => {
    const selection = selectTarget(
      makeInput({
        violations: [
          makeViolation({ file: 'src/a.rs', line: 1 }),
          makeViolation({ file: 'src/a.rs', line: 2 }),
          makeViolation({ file: 'src/b.rs', severity: 'error' })
        ]
      })
    );

    expect(selection).toEqual({
      kind: 'selected',
      file: 'src/a.rs',
      tier: 'lint',
      reason: '2 lint violations (severity score 100)'
    });
  });

  it('breaks count ties by severity score', () => {
    const selection = selectTarget(
      makeInput({
        violations: [makeViolation({ file: 'src/a.rs' }), makeViolation({ file: 'src/b.rs', lintName: 'clippy::unwrap_used' })]
      })
    );

    expect(selection.kind === 'selected' ? selection.file : null).toBe('src/b.rs');
  });

  it('breaks severity ties by lower cached coverage, missing counting as 100', () => {
    const violations = [makeViolation({ file: 'src/a.rs' }), makeViolation({ file: 'src/b.rs' })];

    const byCoverage = selectTarget(makeInput({ violations, coverageByFile: { 'src/a.rs': 90, 'src/b.rs': 40 } }));
    const withMissing = selectTarget(makeInput({ violations, coverageByFile: { 'src/b.rs': 99 } }));

    expect(byCoverage.kind === 'selected' ? byCoverage.file : null).toBe('src/b.rs');
    expect(withMissing.kind === 'selected' ? withMissing.file : null).toBe('src/b.rs');
  });

  it('boosts violations that match the issue keywords', () => {
    const violations = [
      makeViolation({ file: 'src/a.rs', lintName: 'custom::security_audit' }),
      makeViolation({ file: 'src/b.rs', lintName: 'clippy::unwrap_used' })
    ];

    const plain = selectTarget(makeInput({ violations }));
    const boosted = selectTarget(
      makeInput({ violations, issueKeywords: [{ category: 'Security', weight: 1, matches: ['security'] }] })
    );

    expect(plain.kind === 'selected' ? plain.file : null).toBe('src/b.rs');
    expect(boosted.kind === 'selected' ? boosted.file : null).toBe('src/a.rs');
  });

  it('skips completed and excluded files', () => {
    const violations = [
      makeViolation({ file: 'src/a.rs', line: 1 }),
      makeViolation({ file: 'src/a.rs', line: 2 }),
      makeViolation({ file: 'src/b.rs', line: 1 }),
      makeViolation({ file: 'src/b.rs', line: 2 }),
      makeViolation({ file: 'src/c.rs' })
    ];

    const selection = selectTarget(
      makeInput({ violations, filesCompleted: ['src/a.rs'], filters: { include: [], exclude: ['src/b.rs'] } })
    );

    expect(selection.kind === 'selected' ? selection.file : null).toBe('src/c.rs');
  });

  it('still offers non-refactorable files for lint fixes', () => {
    const selection = selectTarget(makeInput({ violations: [makeViolation({ file: 'src/main.rs' })] }));

    expect(selection).toMatchObject({ kind: 'selected', file: 'src/main.rs', tier: 'lint' });
  });

  it('restricts candidates to the explicit target set', () => {
    const selection = selectTarget(
      makeInput({
        violations: [
          makeViolation({ file: 'src/a.rs', line: 1 }),
          makeViolation({ file: 'src/a.rs', line: 2 }),
          makeViolation({ file: 'src/b.rs' })
        ],
        targetSet: ['src/b.rs']
      })
    );

    expect(selection.kind === 'selected' ? selection.file : null).toBe('src/b.rs');
  });
});

describe('tier 2: build errors', () => {
  it('is reached only when no lint target exists', () => {
    const compilationErrors = [
      { file: 'src/a.rs', line: 1, column: 1, code: 'E0308', message: 'mismatched types' },
      { file: 'src/b.rs', line: 3, column: 5, code: null, message: 'expected `;`' },
      { file: 'src/b.rs', line: 9, column: 2, code: 'E0425', message: 'cannot find value' }
    ];

    const withLint = selectTarget(makeInput({ compilationErrors, violations: [makeViolation({ file: 'src/z.rs' })] }));
    const buildOnly = selectTarget(makeInput({ compilationErrors }));

    expect(withLint).toMatchObject({ file: 'src/z.rs', tier: 'lint' });
    expect(buildOnly).toEqual({ kind: 'selected', file: 'src/b.rs', tier: 'build', reason: '2 compilation errors' });
  });
});

describe('tier 3: coverage gaps', () => {
  it('takes the first eligible file below the minimum', () => {
    const selection = selectTarget(
      makeInput({
        sourceFiles: [
          { path: 'src/z.rs', sloc: 10 },
          { path: 'src/a.rs', sloc: 30 },
          { path: 'src/main.rs', sloc: 100 }
        ],
        coverageByFile: { 'src/a.rs': 50, 'src/z.rs': 10 }
      })
    );

    expect(selection).toEqual({ kind: 'selected', file: 'src/a.rs', tier: 'coverage', reason: 'coverage 50.0% below 80%' });
  });

  it('prefers the largest lowest-covered file in coverage-driven mode', () => {
    const selection = selectTarget(
      makeInput({
        coverageDriven: true,
        sourceFiles: [
          { path: 'src/a.rs', sloc: 30 },
          { path: 'src/b.rs', sloc: 120 },
          { path: 'src/c.rs', sloc: 200 },
          { path: 'src/d.rs', sloc: 12 }
        ],
        coverageByFile: { 'src/a.rs': 60, 'src/b.rs': 20, 'src/c.rs': 20 }
      })
    );

    expect(selection).toEqual({
      kind: 'selected',
      file: 'src/c.rs',
      tier: 'coverage',
      reason: 'largest file with lowest coverage (20.0%, 200 lines)'
    });
  });
});

describe('tier 4: extreme quality', () => {
  it('picks the file holding the most complex function', () => {
    const selection = selectTarget(
      makeInput({
        metrics: { ...emptyMetrics(), coveragePercent: 100, maxComplexity: 13 },
        complexity: [makeComplexity('src/a.rs', 11), makeComplexity('src/b.rs', 13), makeComplexity('src/c.rs', 4)]
      })
    );

    expect(selection).toEqual({
      kind: 'selected',
      file: 'src/b.rs',
      tier: 'complexity',
      reason: 'function complexity 13 exceeds 10'
    });
  });

  it('falls back to the file with the most SATD items', () => {
    const selection = selectTarget(
      makeInput({
        metrics: { ...emptyMetrics(), coveragePercent: 100, satdCount: 3 },
        satdByFile: { 'src/a.rs': 1, 'src/b.rs': 2 }
      })
    );

    expect(selection).toEqual({ kind: 'selected', file: 'src/b.rs', tier: 'satd', reason: '2 SATD items' });
  });

  it('never selects non-refactorable files', () => {
    const selection = selectTarget(
      makeInput({
        metrics: { ...emptyMetrics(), coveragePercent: 100, maxComplexity: 20 },
        complexity: [makeComplexity('src/main.rs', 20)]
      })
    );

    expect(selection.kind).toBe('exhausted');
  });

  it('reports exhaustion when nothing is left', () => {
    expect(selectTarget(makeInput())).toEqual({ kind: 'exhausted', reason: 'No eligible file remains in any tier' });
  });
});
