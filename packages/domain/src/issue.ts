import keywordCatalog from '../data/issue-keywords.json' with { type: 'json' };

import type { IssueContext, IssueKeyword } from './types.js';

export interface IssueReference {
  owner: string;
  repo: string;
  number: number;
}

export interface IssueDocument {
  title: string;
  body: string | null;
}

interface KeywordGroup {
  category: string;
  weight: number;
  keywords: string[];
}

const KEYWORD_GROUPS: readonly KeywordGroup[] = keywordCatalog;

const ISSUE_URL = /github\.com\/([^/]+)\/([^/]+)\/issues\/(\d+)/;
const KNOWN_EXTENSIONS = ['rs', 'ts', 'tsx', 'js', 'jsx', 'py', 'go', 'md', 'toml'];
const SUMMARY_LIMIT = 200;

export function parseIssueUrl(url: string): IssueReference | null {
  const match = ISSUE_URL.exec(url);
  if (!match?.[1] || !match[2] || !match[3]) {
    return null;
  }
  return { owner: match[1], repo: match[2], number: Number(match[3]) };
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index >= 0) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Category weights from keyword hits. Repeated words add 20% each up to
 * double weight; a category never exceeds twice its base weight; the result
 * is normalised so the strongest category weighs 1.
 */
export function extractIssueKeywords(text: string): IssueKeyword[] {
  const lower = text.toLowerCase();
  const found: IssueKeyword[] = [];

  for (const group of KEYWORD_GROUPS) {
    let total = 0;
    const matches: string[] = [];
    for (const keyword of group.keywords) {
      const count = countOccurrences(lower, keyword);
      if (count === 0) {
        continue;
      }
      matches.push(keyword);
      total = Math.min(total + group.weight * Math.min(1 + (count - 1) * 0.2, 2), group.weight * 2);
    }
    if (matches.length > 0) {
      found.push({ category: group.category, weight: total, matches });
    }
  }

  const max = found.reduce((current, keyword) => Math.max(current, keyword.weight), 0);
  if (max <= 0) {
    return found;
  }
  return found
    .map((keyword) => ({ ...keyword, weight: Number((keyword.weight / max).toFixed(4)) }))
    .sort((left, right) => right.weight - left.weight || left.category.localeCompare(right.category));
}

export function summarizeIssue(issue: IssueDocument): string {
  const body = issue.body ?? '';
  const firstParagraph = body.split('\n\n')[0] ?? '';
  const trimmed = firstParagraph.length > SUMMARY_LIMIT ? `${firstParagraph.slice(0, SUMMARY_LIMIT)}...` : firstParagraph;
  return trimmed.length === 0 ? issue.title : `${issue.title}\n\n${trimmed}`;
}

function hasKnownExtension(candidate: string): boolean {
  const dot = candidate.lastIndexOf('.');
  return dot > 0 && KNOWN_EXTENSIONS.includes(candidate.slice(dot + 1).toLowerCase());
}

export function extractIssueFilePaths(text: string): string[] {
  const paths = new Set<string>();

  for (const match of text.matchAll(/`([a-zA-Z0-9_\-./]+\.[a-zA-Z0-9]+)`/g)) {
    if (match[1] && hasKnownExtension(match[1])) {
      paths.add(match[1]);
    }
  }
  for (const match of text.matchAll(/\b(?:[a-zA-Z0-9_-]+\/)*[a-zA-Z0-9_-]+\.[a-zA-Z0-9]+\b/g)) {
    if (hasKnownExtension(match[0])) {
      paths.add(match[0]);
    }
  }
  for (const match of text.matchAll(/\b[a-zA-Z0-9_]+(?:::[a-zA-Z0-9_]+)+\b/g)) {
    paths.add(`src/${match[0].replace(/::/g, '/')}.rs`);
  }

  return Array.from(paths).sort();
}

export function buildIssueContext(issue: IssueDocument): IssueContext {
  const text = `${issue.title} ${issue.body ?? ''}`;
  const keywords = extractIssueKeywords(text);

  return {
    title: issue.title,
    summary: summarizeIssue(issue),
    keywords,
    priorityAreas: keywords.map((keyword) => keyword.category),
    files: extractIssueFilePaths(text)
  };
}

export function issuePriorityInstructions(context: IssueContext): string {
  return `PRIORITY: Focus on fixing issues related to: ${context.priorityAreas.join(', ')}. The reporter identified these areas as problematic in the GitHub issue.`;
}

const BUG_REPORT_EXTENSIONS = ['.rs', '.ts', '.js', '.py', '.md'];
const PATH_EDGE = /^[^A-Za-z0-9/._-]+|[^A-Za-z0-9]+$/g;

/** File mentions outside fenced code blocks on lines that look like they reference sources. */
export function extractBugReportFiles(markdown: string): string[] {
  const files = new Set<string>();
  let inFence = false;

  for (const line of markdown.split('\n')) {
    if (line.startsWith('```')) {
      inFence = !inFence;
      continue;
    }
    if (inFence) {
      continue;
    }
    if (!line.includes('src/') && !line.includes('server/') && !line.includes('docs/')) {
      continue;
    }
    for (const word of line.split(/\s+/)) {
      if (word.startsWith('http') || !BUG_REPORT_EXTENSIONS.some((extension) => word.includes(extension))) {
        continue;
      }
      const cleaned = word.replace(PATH_EDGE, '');
      if (cleaned) {
        files.add(cleaned);
      }
    }
  }

  return Array.from(files).sort();
}

export const BUG_REPORT_INSTRUCTIONS =
  'This is a bug report that needs to be analyzed. If the report mentions specific files or code issues, prioritize fixing those referenced problems; if the report itself needs fixing, ensure proper formatting, clear structure and accurate technical details.';
