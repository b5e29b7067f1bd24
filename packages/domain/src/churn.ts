import { normalizePath } from './glob.js';

export const CHURN_LOG_FORMAT = 'commit:%H|%an|%aI';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOTSPOT_COMMITS = 5;
const STABLE_AGE_DAYS = 60;

export interface FileChurn {
  path: string;
  commitCount: number;
  uniqueAuthors: string[];
  additions: number;
  deletions: number;
  lastModified: string;
  firstSeen: string;
  churnScore: number;
}

export interface ChurnSummary {
  totalCommits: number;
  totalFilesChanged: number;
  hotspotFiles: string[];
  stableFiles: string[];
  authorContributions: Record<string, number>;
}

export interface ChurnAnalysis {
  periodDays: number;
  files: FileChurn[];
  summary: ChurnSummary;
}

interface CommitHeader {
  author: string;
  date: Date;
}

interface Accumulator {
  commits: number;
  authors: Set<string>;
  additions: number;
  deletions: number;
  first: Date;
  last: Date;
}

function parseHeader(line: string): CommitHeader | null {
  if (!line.startsWith('commit:')) {
    return null;
  }
  const [, author, iso] = line.slice('commit:'.length).split('|');
  const date = new Date(iso ?? '');
  if (!author || Number.isNaN(date.getTime())) {
    return null;
  }
  return { author, date };
}

export function parseGitLog(output: string, periodDays: number, now: Date = new Date()): ChurnAnalysis {
  const files = new Map<string, Accumulator>();
  const authorContributions: Record<string, number> = {};
  let current: CommitHeader | null = null;
  let totalCommits = 0;

  for (const raw of output.split('\n')) {
    const line = raw.trimEnd();
    const header = parseHeader(line);
    if (header) {
      current = header;
      totalCommits += 1;
      authorContributions[header.author] = (authorContributions[header.author] ?? 0) + 1;
      continue;
    }

    const stat = /^(\d+|-)\t(\d+|-)\t(.+)$/.exec(line);
    if (!current || !stat?.[3]) {
      continue;
    }

    const path = normalizePath(stat[3]);
    const entry = files.get(path) ?? {
      commits: 0,
      authors: new Set<string>(),
      additions: 0,
      deletions: 0,
      first: current.date,
      last: current.date
    };
    entry.commits += 1;
    entry.authors.add(current.author);
    entry.additions += stat[1] === '-' ? 0 : Number(stat[1]);
    entry.deletions += stat[2] === '-' ? 0 : Number(stat[2]);
    if (current.date < entry.first) {
      entry.first = current.date;
    }
    if (current.date > entry.last) {
      entry.last = current.date;
    }
    files.set(path, entry);
  }

  const raws = Array.from(files.entries()).map(([path, entry]) => {
    const daysSinceFirstSeen = Math.max(0, (now.getTime() - entry.first.getTime()) / DAY_MS);
    const rawScore = entry.commits / (1 + daysSinceFirstSeen) + 0.1 * entry.authors.size;
    return { path, entry, rawScore };
  });
  const maxScore = raws.reduce((max, item) => Math.max(max, item.rawScore), 0);

  const churnFiles: FileChurn[] = raws
    .map(({ path, entry, rawScore }) => ({
      path,
      commitCount: entry.commits,
      uniqueAuthors: Array.from(entry.authors).sort(),
      additions: entry.additions,
      deletions: entry.deletions,
      lastModified: entry.last.toISOString(),
      firstSeen: entry.first.toISOString(),
      churnScore: maxScore > 0 ? Number((rawScore / maxScore).toFixed(4)) : 0
    }))
    .sort((left, right) => right.churnScore - left.churnScore || left.path.localeCompare(right.path));

  return {
    periodDays,
    files: churnFiles,
    summary: {
      totalCommits,
      totalFilesChanged: churnFiles.length,
      hotspotFiles: churnFiles.filter(isChurnHotspot).map((file) => file.path),
      stableFiles: churnFiles.filter((file) => isStableFile(file, now)).map((file) => file.path),
      authorContributions
    }
  };
}

export function isChurnHotspot(file: Pick<FileChurn, 'commitCount'>): boolean {
  return file.commitCount > HOTSPOT_COMMITS;
}

export function isStableFile(file: Pick<FileChurn, 'commitCount' | 'lastModified'>, now: Date = new Date()): boolean {
  const ageDays = (now.getTime() - new Date(file.lastModified).getTime()) / DAY_MS;
  return file.commitCount <= 1 && ageDays > STABLE_AGE_DAYS;
}

export function emptyChurn(periodDays: number): ChurnAnalysis {
  return {
    periodDays,
    files: [],
    summary: { totalCommits: 0, totalFilesChanged: 0, hotspotFiles: [], stableFiles: [], authorContributions: {} }
  };
}
