import { describe, expect, it } from 'vitest';

import { camelCaseKeys, snakeCaseKeys, toCamelCase, toSnakeCase } from '../src/case.js';

describe('key case conversion', () => {
  it('converts identifier keys only', () => {
    expect(toSnakeCase('defectDensity')).toBe('defect_density');
    expect(toSnakeCase('src/a.rs')).toBe('src/a.rs');
    expect(toCamelCase('total_project_violations')).toBe('totalProjectViolations');
    expect(toCamelCase('Alice Smith')).toBe('Alice Smith');
  });

  it('walks nested objects and arrays', () => {
    expect(snakeCaseKeys({ allViolations: [{ endLine: 3, lintName: 'x' }], hotspot: null })).toEqual({
      all_violations: [{ end_line: 3, lint_name: 'x' }],
      hotspot: null
    });
  });

  it('keeps the keys of preserved records but converts their values', () => {
    const value = {
      summaryByFile: { 'src/main.rs': { defectDensity: 0.5 }, helperMod: { defectDensity: 1 } }
    };

    expect(snakeCaseKeys(value, ['summaryByFile'])).toEqual({
      summary_by_file: { 'src/main.rs': { defect_density: 0.5 }, helperMod: { defect_density: 1 } }
    });
  });

  it('drops undefined values', () => {
    expect(snakeCaseKeys({ suggestion: undefined, machineApplicable: false })).toEqual({ machine_applicable: false });
  });

  it('restores camelCase keys', () => {
    expect(camelCaseKeys({ author_contributions: { some_author: 2 } }, ['author_contributions'])).toEqual({
      authorContributions: { some_author: 2 }
    });
  });
});
