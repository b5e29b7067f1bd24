import path from 'node:path';

import { ConfigurationError, pathExists, readFileIfExists, type IssueClient } from '@refactor-gate/common';
import {
  buildIssueContext,
  extractBugReportFiles,
  normalizePath,
  parseIssueUrl,
  testDependencyCandidates,
  type IssueContext,
  type RefactorMode,
  type Toolchain
} from '@refactor-gate/domain';

export interface ModeTargets {
  /** Null means every eligible file in the project. */
  targetSet: string[] | null;
  issue: IssueContext | null;
  bugReport: string | null;
}

export interface ModeResolverOptions {
  root: string;
  toolchain: Toolchain;
  issueClient: () => IssueClient;
}

const NO_TARGETS: ModeTargets = { targetSet: null, issue: null, bugReport: null };

function projectRelative(root: string, file: string): string {
  return normalizePath(path.relative(root, path.resolve(root, file)));
}

async function readRequired(root: string, file: string, label: string): Promise<{ relative: string; content: string }> {
  const relative = projectRelative(root, file);
  const content = await readFileIfExists(path.join(root, relative));
  if (content === null) {
    throw new ConfigurationError(`${label} not found: ${file}`);
  }
  return { relative, content };
}

async function existing(root: string, files: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  for (const file of files) {
    const relative = projectRelative(root, file);
    if (await pathExists(path.join(root, relative))) {
      found.push(relative);
    }
  }
  return Array.from(new Set(found)).sort();
}

/** The explicit target set and extra request context for a refactor mode. */
export async function resolveModeTargets(mode: RefactorMode, options: ModeResolverOptions): Promise<ModeTargets> {
  const { root } = options;

  switch (mode.kind) {
    case 'Normal':
      return NO_TARGETS;

    case 'SingleFile': {
      const { relative } = await readRequired(root, mode.file, 'File');
      return { ...NO_TARGETS, targetSet: [relative] };
    }

    case 'TestDriven': {
      const test = await readRequired(root, mode.testFile, 'Test file');
      const dependencies = await existing(root, testDependencyCandidates(test.relative, test.content, options.toolchain));
      return { ...NO_TARGETS, targetSet: [test.relative, ...dependencies.filter((file) => file !== test.relative)] };
    }

    case 'IssueDriven': {
      const reference = parseIssueUrl(mode.issueUrl);
      if (!reference) {
        throw new ConfigurationError(`Not a GitHub issue URL: ${mode.issueUrl}`);
      }
      const issue = buildIssueContext(await options.issueClient().getIssue(reference));
      const files = await existing(root, issue.files);
      return { targetSet: files.length > 0 ? files : null, issue, bugReport: null };
    }

    case 'BugReport': {
      const report = await readRequired(root, mode.reportPath, 'Bug report');
      const files = await existing(root, extractBugReportFiles(report.content));
      return { targetSet: files.length > 0 ? files : null, issue: null, bugReport: report.content };
    }
  }
}
