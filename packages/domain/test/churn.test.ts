import { describe, expect, it } from 'vitest';

import { isStableFile, parseGitLog } from '../src/churn.js';

const NOW = new Date('2026-10-18T00:00:00Z');

const LOG = [
  'commit:aaa111|alice|2026-10-10T00:00:00Z',
  '3\t1\tsrc/a.rs',
  '10\t0\tsrc/b.rs',
  '',
  'commit:bbb222|bob|2026-10-15T00:00:00Z',
  '1\t1\tsrc/a.rs',
  '-\t-\tassets/logo.png',
  ''
].join('\n');

describe('churn analysis', () => {
  it('aggregates numstat lines per file', () => {
    const analysis = parseGitLog(LOG, 30, NOW);

    expect(analysis.files.map((file) => [file.path, file.commitCount, file.churnScore])).toEqual([
      ['src/a.rs', 2, 1],
      ['assets/logo.png', 1, 0.8289],
      ['src/b.rs', 1, 0.5]
    ]);
    expect(analysis.files[0]).toMatchObject({
      uniqueAuthors: ['alice', 'bob'],
      additions: 4,
      deletions: 2,
      firstSeen: '2026-10-10T00:00:00.000Z',
      lastModified: '2026-10-15T00:00:00.000Z'
    });
  });

  it('summarizes commits and authors', () => {
    const { summary } = parseGitLog(LOG, 30, NOW);

    expect(summary).toEqual({
      totalCommits: 2,
      totalFilesChanged: 3,
      hotspotFiles: [],
      stableFiles: [],
      authorContributions: { alice: 1, bob: 1 }
    });
  });

  it('flags hotspots above five commits', () => {
    const commits = Array.from({ length: 6 }, (_, index) => `commit:c${index}|carol|2026-10-0${index + 1}T00:00:00Z\n1\t0\tsrc/hot.rs`);

    expect(parseGitLog(commits.join('\n'), 30, NOW).summary.hotspotFiles).toEqual(['src/hot.rs']);
  });

  it('treats old single-commit files as stable', () => {
    expect(isStableFile({ commitCount: 1, lastModified: '2026-07-01T00:00:00Z' }, NOW)).toBe(true);
    expect(isStableFile({ commitCount: 2, lastModified: '2026-07-01T00:00:00Z' }, NOW)).toBe(false);
    expect(isStableFile({ commitCount: 1, lastModified: '2026-10-01T00:00:00Z' }, NOW)).toBe(false);
  });

  it('returns nothing for empty output', () => {
    expect(parseGitLog('', 7, NOW).files).toEqual([]);
  });
});
