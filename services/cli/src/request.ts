import path from 'node:path';

import { snakeCaseKeys } from '@refactor-gate/common';
import {
  BUG_REPORT_INSTRUCTIONS,
  describeFixStrategy,
  determineFixStrategy,
  issuePriorityInstructions,
  normalizePath,
  type IssueContext,
  type IssueKeyword,
  type QualityProfile,
  type ViolationDetail
} from '@refactor-gate/domain';

export const REQUEST_START_SENTINEL = 'AI_REWRITE_REQUEST_START';
export const REQUEST_END_SENTINEL = 'AI_REWRITE_REQUEST_END';

export interface RequestViolation {
  line: number;
  column: number;
  lint: string;
  message: string;
  severity: string;
  suggestion?: string;
  fixStrategy: string;
}

export interface OutputFile {
  path: string;
  description: string;
}

export interface IssueRequestContext {
  title: string;
  summary: string;
  keywords: IssueKeyword[];
  priorityAreas: string[];
  instructions: string;
}

export interface BugReportRequestContext {
  type: 'markdown_bug_report';
  content: string;
  instructions: string;
  priority: 'high';
}

export interface RewriteRequest {
  task: 'unified_rewrite';
  file: string;
  currentContent: string;
  context: string;
  violations: RequestViolation[];
  coverage: {
    current: number;
    target: number;
    needsTests: boolean;
  };
  instructions: string[];
  outputFiles: OutputFile[];
  issueContext?: IssueRequestContext;
  bugReportContext?: BugReportRequestContext;
}

export interface RequestInput {
  file: string;
  content: string;
  context: string | null;
  violations: readonly ViolationDetail[];
  coverage: number;
  profile: QualityProfile;
  issue?: IssueContext | null;
  bugReport?: string | null;
}

export function qualityInstructions(profile: QualityProfile): string[] {
  return [
    'Apply rigid quality standards:',
    `1. Functions with complexity > ${profile.complexityMax} MUST be refactored (target: ${profile.complexityTarget})`,
    `2. Coverage MUST be ≥${profile.coverageMin}% with meaningful tests, not placeholders`,
    '3. TDG (Technical Debt Gradient) MUST be < 1.0',
    `4. ZERO duplicate code, at most ${profile.satdAllowed} SATD comments`,
    '5. All algorithms MUST be O(n) or better',
    '6. Fix ALL lint violations',
    '7. Every public item needs documentation',
    'Ensure the fixed code compiles, passes all tests, and meets ALL metrics'
  ];
}

/** Sources under `src/` get a sibling `<stem>_test.<ext>`; anything else goes to `tests/`. */
export function testFilePathFor(file: string): string {
  const normalized = normalizePath(file);
  const extension = path.posix.extname(normalized);
  const stem = path.posix.basename(normalized, extension);
  const name = `${stem}_test${extension}`;

  if (normalized.startsWith('src/') || normalized.includes('/src/')) {
    return path.posix.join(path.posix.dirname(normalized), name);
  }
  return path.posix.join('tests', name);
}

function toRequestViolation(violation: ViolationDetail): RequestViolation {
  const entry: RequestViolation = {
    line: violation.line,
    column: violation.column,
    lint: violation.lintName,
    message: violation.message,
    severity: violation.severity,
    fixStrategy: describeFixStrategy(determineFixStrategy(violation))
  };
  if (violation.suggestion !== undefined) {
    entry.suggestion = violation.suggestion;
  }
  return entry;
}

export function buildRewriteRequest(input: RequestInput): RewriteRequest {
  const request: RewriteRequest = {
    task: 'unified_rewrite',
    file: input.file,
    currentContent: input.content,
    context: input.context ?? '',
    violations: input.violations.map(toRequestViolation),
    coverage: {
      current: input.coverage,
      target: input.profile.coverageMin,
      needsTests: input.coverage < input.profile.coverageMin
    },
    instructions: qualityInstructions(input.profile),
    outputFiles: [
      { path: input.file, description: 'Fixed source file with all violations resolved' },
      { path: testFilePathFor(input.file), description: 'Test file with comprehensive tests if needed' }
    ]
  };

  if (input.issue) {
    request.issueContext = {
      title: input.issue.title,
      summary: input.issue.summary,
      keywords: input.issue.keywords,
      priorityAreas: input.issue.priorityAreas,
      instructions: issuePriorityInstructions(input.issue)
    };
  }

  if (input.bugReport) {
    request.bugReportContext = {
      type: 'markdown_bug_report',
      content: input.bugReport,
      instructions: BUG_REPORT_INSTRUCTIONS,
      priority: 'high'
    };
  }

  return request;
}

export function serializeRewriteRequest(request: RewriteRequest): string {
  return JSON.stringify(snakeCaseKeys(request), null, 2);
}

export function formatRewriteRequest(request: RewriteRequest): string {
  return `${REQUEST_START_SENTINEL}\n${serializeRewriteRequest(request)}\n${REQUEST_END_SENTINEL}\n`;
}
