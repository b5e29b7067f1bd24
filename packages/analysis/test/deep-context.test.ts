import { describe, expect, it } from 'vitest';

import type { ChurnAnalysis } from '@refactor-gate/domain';

import type { ComplexityAnalysis, DeadCodeAnalysis, SatdAnalysis } from '../src/analyzers/source.js';
import type { TdgAnalysis } from '../src/analyzers/tdg.js';
import { extractFileContext, renderDeepContextMarkdown } from '../src/deep-context/markdown.js';
import { buildDeepContext, defectScore, type DeepContextInput } from '../src/deep-context/model.js';
import { deepContextSarif } from '../src/deep-context/sarif.js';

const complexity: ComplexityAnalysis = {
  threshold: 10,
  files: [
    {
      path: 'src/a.rs',
      functions: [{ name: 'big', line: 1, endLine: 30, cyclomatic: 20, cognitive: 25 }],
      maxCyclomatic: 20,
      maxCognitive: 25,
      sloc: 30
    },
    {
      path: 'src/b.rs',
      functions: [{ name: 'small', line: 1, endLine: 3, cyclomatic: 5, cognitive: 2 }],
      maxCyclomatic: 5,
      maxCognitive: 2,
      sloc: 3
    }
  ],
  summary: {
    totalFiles: 2,
    totalFunctions: 2,
    maxCyclomatic: 20,
    maxCognitive: 25,
    medianCyclomatic: 5,
    p90Cyclomatic: 20,
    functionsOverThreshold: 1
  }
};

const satd: SatdAnalysis = {
  items: [
    { file: 'src/b.rs', line: 2, marker: 'TODO', category: 'requirement', severity: 'low', text: 'TODO: tidy' },
    { file: 'src/b.rs', line: 3, marker: 'TODO', category: 'requirement', severity: 'low', text: 'TODO: rename' }
  ],
  byFile: { 'src/b.rs': 2 },
  summary: {
    totalItems: 2,
    filesWithSatd: 1,
    bySeverity: { high: 0, medium: 0, low: 2 },
    byCategory: { design: 0, defect: 0, requirement: 2, refactor: 0, quality: 0 }
  }
};

const deadCode: DeadCodeAnalysis = {
  files: [],
  summary: {
    totalFilesAnalyzed: 2,
    filesWithDeadCode: 0,
    totalDeadLines: 0,
    deadPercentage: 0,
    deadFunctions: 0,
    deadClasses: 0,
    deadModules: 0,
    unreachableBlocks: 0
  }
};

const churn: ChurnAnalysis = {
  periodDays: 30,
  files: [
    {
      path: 'src/a.rs',
      commitCount: 3,
      uniqueAuthors: ['dev'],
      additions: 10,
      deletions: 2,
      lastModified: '2026-10-01T00:00:00.000Z',
      firstSeen: '2026-09-20T00:00:00.000Z',
      churnScore: 0.5
    }
  ],
  summary: { totalCommits: 3, totalFilesChanged: 1, hotspotFiles: [], stableFiles: [], authorContributions: { dev: 3 } }
};

const tdg: TdgAnalysis = {
  files: [{ path: 'src/a.rs', value: 1.2, band: 'refactor', components: { complexity: 1, churn: 2.5, satd: 0, sizeNormalizer: 1 } }],
  summary: {
    totalFiles: 1,
    criticalFiles: 0,
    warningFiles: 1,
    averageTdg: 0.6,
    p95Tdg: 1.2,
    estimatedDebtHours: 5,
    hotspots: []
  }
};

const input: DeepContextInput = {
  projectPath: '/work/demo',
  toolchain: 'rust',
  threshold: 10,
  generatedAt: '2026-10-18T12:00:00.000Z',
  complexity,
  satd,
  deadCode,
  churn,
  tdg
};

describe('deep context model', () => {
  it('weights complexity, churn and SATD into a defect score', () => {
    expect(defectScore({ maxCyclomatic: 20, churnScore: 0.5, satdItems: 0 }, { cyclomatic: 20, satd: 2 })).toBe(0.55);
    expect(defectScore({ maxCyclomatic: 5, churnScore: 0, satdItems: 2 }, { cyclomatic: 20, satd: 2 })).toBe(0.4);
    expect(defectScore({ maxCyclomatic: 0, churnScore: 0, satdItems: 0 }, { cyclomatic: 0, satd: 0 })).toBe(0);
  });

  it('annotates every file and ranks predicted defects', () => {
    const context = buildDeepContext(input);

    expect(context.files.map((file) => [file.path, file.defectScore, file.satdItems, file.tdgBand])).toEqual([
      ['src/a.rs', 0.55, 0, 'refactor'],
      ['src/b.rs', 0.4, 2, 'healthy']
    ]);
    expect(context.predictedDefects).toEqual([
      { file: 'src/a.rs', defectScore: 0.55, factors: ['max cyclomatic complexity 20', 'churn score 0.5'] },
      { file: 'src/b.rs', defectScore: 0.4, factors: ['2 SATD items'] }
    ]);
    expect(context.scorecard).toEqual({ overallHealth: 67, complexityScore: 50, maintainabilityIndex: 88, technicalDebtHours: 5 });
  });

  it('orders recommendations by priority', () => {
    const context = buildDeepContext(input);

    expect(context.recommendations.map((rec) => [rec.priority, rec.title, rec.files])).toEqual([
      ['high', 'Reduce function complexity', ['src/a.rs']],
      ['medium', 'Resolve self-admitted technical debt', ['src/b.rs']]
    ]);
  });
});

describe('deep context renderings', () => {
  it('renders sections in a fixed order', () => {
    const markdown = renderDeepContextMarkdown(buildDeepContext(input));
    const headings = markdown.split('\n').filter((line) => line.startsWith('## '));

    expect(headings).toEqual([
      '## Executive Summary',
      '## Quality Scorecard',
      '## Project Structure',
      '## Complexity Hotspots',
      '## Code Churn',
      '## Technical Debt (SATD)',
      '## Dead Code',
      '## Predicted Defects',
      '## Recommendations'
    ]);
  });

  it('extracts one file section by path', () => {
    const markdown = renderDeepContextMarkdown(buildDeepContext(input));

    expect(extractFileContext(markdown, 'src/a.rs')).toBe(
      [
        '### ./src/a.rs',
        '',
        '**Defect Score**: 0.550 | **SATD Items**: 0 | **Dead Code Items**: 0 | **TDG**: 1.200 (refactor)',
        '',
        '- **Function**: `big` [complexity: 20]'
      ].join('\n')
    );
    expect(extractFileContext(markdown, 'b.rs')?.split('\n')[0]).toBe('### ./src/b.rs');
    expect(extractFileContext(markdown, 'src/missing.rs')).toBeNull();
  });

  it('carries complexity and SATD findings in SARIF', () => {
    const log = deepContextSarif(buildDeepContext(input));
    const [run] = log.runs;

    expect(log.version).toBe('2.1.0');
    expect(run?.results.map((result) => [result.ruleId, result.level])).toEqual([
      ['complexity/high-cyclomatic', 'warning'],
      ['complexity/high-cognitive', 'warning'],
      ['debt/technical-debt', 'note'],
      ['debt/technical-debt', 'note']
    ]);
    expect(run?.tool.driver.rules.map((rule) => rule.id)).toEqual([
      'complexity/high-cyclomatic',
      'complexity/high-cognitive',
      'debt/technical-debt'
    ]);
  });
});
