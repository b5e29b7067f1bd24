import { describe, expect, it } from 'vitest';

import { buildLintHotspot, compilationErrorToViolation, parseShortDiagnostics } from '../src/diagnostics.js';
import type { ViolationDetail } from '../src/types.js';

function makeViolation(file: string, line: number): ViolationDetail {
  return {
    file,
    line,
    column: 1,
    endLine: line,
    endColumn: 1,
    lintName: 'clippy::needless_return',
    message: 'unneeded return statement',
    severity: 'warning',
    machineApplicable: true
  };
}

describe('compiler diagnostics', () => {
  it('parses short-form errors and ignores everything else', () => {
    const output = [
      '   Compiling demo v0.1.0 (/work/demo)',
      'src/lib.rs:3:5: error[E0308]: mismatched types',
      'src/lib.rs:9:1: error: expected item, found `}`',
      'src/main.rs:2:10: warning: unused variable: `x`',
      'error: could not compile `demo` (lib) due to 2 previous errors'
    ].join('\n');

    expect(parseShortDiagnostics(output)).toEqual([
      { file: 'src/lib.rs', line: 3, column: 5, code: 'E0308', message: 'mismatched types' },
      { file: 'src/lib.rs', line: 9, column: 1, code: null, message: 'expected item, found `}`' }
    ]);
  });

  it('turns errors into compilation violations', () => {
    expect(
      compilationErrorToViolation({ file: 'src/lib.rs', line: 3, column: 5, code: 'E0308', message: 'mismatched types' })
    ).toMatchObject({ lintName: 'compilation_error', severity: 'error', message: '[E0308] mismatched types', line: 3 });
  });
});

describe('lint hotspot', () => {
  it('picks the densest file', () => {
    const result = buildLintHotspot(
      [makeViolation('src/a.rs', 1), makeViolation('src/a.rs', 2), makeViolation('src/a.rs', 3), makeViolation('src/b.rs', 1)],
      { 'src/a.rs': 300, 'src/b.rs': 10 }
    );

    expect(result.totalProjectViolations).toBe(4);
    expect(result.summaryByFile).toEqual({
      'src/a.rs': { defectDensity: 0.01, totalViolations: 3 },
      'src/b.rs': { defectDensity: 0.1, totalViolations: 1 }
    });
    expect(result.hotspot?.file).toBe('src/b.rs');
    expect(result.hotspot?.violations).toHaveLength(1);
  });

  it('assumes a hundred lines for files of unknown size', () => {
    const result = buildLintHotspot([makeViolation('./src/c.rs', 4)], {});

    expect(result.summaryByFile).toEqual({ 'src/c.rs': { defectDensity: 0.01, totalViolations: 1 } });
    expect(result.allViolations[0]?.file).toBe('src/c.rs');
  });

  it('has no hotspot without violations', () => {
    expect(buildLintHotspot([], {}).hotspot).toBeNull();
  });
});
