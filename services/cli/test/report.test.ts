import { describe, expect, it } from 'vitest';

import { createInitialState } from '@refactor-gate/common';
import type { FileRewritePlan } from '@refactor-gate/domain';

import type { RefactorOutcome } from '../src/orchestrator.js';
import { exitCodeFor, renderPlan, renderProgressBlock, renderSummaryMarkdown, summaryJson } from '../src/report.js';

const startedAt = new Date('2026-10-18T12:00:00.000Z');

function outcome(): RefactorOutcome {
  const state = createInitialState('/work/.refactor-gate', startedAt);
  state.filesCompleted = ['src/a.rs'];
  return {
    status: 'BudgetExhausted',
    iterations: 3,
    state,
    phases: ['Initialization'],
    requests: [],
    message: 'Iteration budget of 3 exhausted'
  };
}

describe('progress block', () => {
  it('shows the initial state with its target and remaining gates', () => {
    const state = createInitialState('/work/.refactor-gate', startedAt);

    expect(
      renderProgressBlock(state, { kind: 'selected', file: 'src/lib.rs', tier: 'coverage', reason: 'coverage 0.0% below 80%' })
    ).toBe(
      [
        'Iteration 0 | Phase: Initialization | Overall 80.0%',
        '  Lint 100.0% | Complexity 100.0% | SATD 100.0% | Coverage 0.0%',
        '  Files completed: 0 (remaining 0) | ETA 0 min',
        '  Target: src/lib.rs [coverage] coverage 0.0% below 80%',
        '  Remaining gates: Improve coverage from 0.0% to ≥ 80%',
        ''
      ].join('\n')
    );
  });
});

describe('renderPlan', () => {
  it('lists each violation with its strategy', () => {
    const plan: FileRewritePlan = {
      filePath: 'src/lib.rs',
      violations: [
        { lintName: 'high_complexity', line: 1, column: 1, message: 'too complex', fixStrategy: { kind: 'ExtractFunction' } },
        {
          lintName: 'clippy::needless_return',
          line: 9,
          column: 5,
          message: 'unneeded `return` statement',
          fixStrategy: { kind: 'ApplySuggestion', suggestion: 'remove `return`' }
        }
      ],
      astMetadata: { functions: [], imports: [], structureHash: '' },
      newContent: ''
    };

    expect(renderPlan(plan)).toBe(
      'Plan for src/lib.rs (2 violations)\n' +
        '  1:1 high_complexity -> ExtractFunction\n' +
        '  9:5 clippy::needless_return -> ApplySuggestion(remove `return`)\n'
    );
  });
});

describe('summary', () => {
  it('renders markdown sections', () => {
    const sections = renderSummaryMarkdown(outcome()).split('\n\n');

    expect(sections[0]).toBe('## Refactor Summary');
    expect(sections[1]).toBe('Status: **BudgetExhausted**\nIterations: 3\nOverall completion: 80.0%\nPhase: Initialization');
    expect(sections[2]).toBe('Iteration budget of 3 exhausted');
    expect(sections[4]).toBe(
      [
        '- Lint violations: 0 in 0 of 0 files',
        '- Coverage: 0.0%',
        '- Max complexity: 0 (0 of 0 functions over the limit)',
        '- SATD items: 0'
      ].join('\n')
    );
    expect(sections[sections.length - 1]).toBe('- `src/a.rs`\n');
  });

  it('serializes JSON with snake_case keys', () => {
    expect(summaryJson(outcome())).toMatchObject({
      status: 'BudgetExhausted',
      iterations: 3,
      files_completed: ['src/a.rs'],
      progress: { overall_completion_percent: 80, current_phase: 'Initialization' },
      metrics: { total_violations: 0, satd_count: 0 },
      message: 'Iteration budget of 3 exhausted'
    });
  });
});

describe('exitCodeFor', () => {
  it('fails only unfinished runs in CI', () => {
    expect(exitCodeFor('Complete', true)).toBe(0);
    expect(exitCodeFor('Canceled', true)).toBe(0);
    expect(exitCodeFor('BudgetExhausted', false)).toBe(0);
    expect(exitCodeFor('BudgetExhausted', true)).toBe(1);
    expect(exitCodeFor('BuildBroken', true)).toBe(1);
  });
});
