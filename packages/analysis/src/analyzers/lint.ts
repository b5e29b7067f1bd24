import path from 'node:path';

import { readFileIfExists } from '@refactor-gate/common';
import {
  buildLintHotspot,
  compilationErrorToViolation,
  emptyLintHotspot,
  normalizePath,
  parseShortDiagnostics,
  parseViolationSeverity,
  type CompilationError,
  type LintHotspotResult,
  type ViolationDetail
} from '@refactor-gate/domain';
import { z } from 'zod';

import type { AnalysisDeps, ProjectSnapshot } from '../deps.js';
import { findCargoWorkspaceRoot } from '../project.js';

export const CLIPPY_FLAGS = ['-W', 'clippy::all'];

const spanSchema = z.object({
  file_name: z.string(),
  line_start: z.number().int(),
  line_end: z.number().int(),
  column_start: z.number().int(),
  column_end: z.number().int(),
  is_primary: z.boolean(),
  suggested_replacement: z.string().nullish(),
  suggestion_applicability: z.string().nullish()
});

type DiagnosticSpan = z.output<typeof spanSchema>;

const childSchema = z.object({
  message: z.string(),
  level: z.string(),
  spans: z.array(spanSchema).default([])
});

const compilerMessageSchema = z.object({
  reason: z.literal('compiler-message'),
  message: z.object({
    level: z.string(),
    message: z.string(),
    code: z.object({ code: z.string() }).nullish(),
    spans: z.array(spanSchema),
    children: z.array(childSchema).default([])
  })
});

const REPORTED_LEVELS = new Set(['error', 'warning', 'note']);

function parseLine(line: string): z.output<typeof compilerMessageSchema> | null {
  if (!line.startsWith('{')) {
    return null;
  }
  try {
    const parsed = compilerMessageSchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function relativeTo(root: string, base: string, fileName: string): string {
  return normalizePath(path.relative(root, path.resolve(base, fileName)));
}

/**
 * Compiler messages from `cargo clippy --message-format=json`, one violation
 * per diagnostic at its primary span. Paths are made relative to `root`.
 */
export function parseClippyMessages(output: string, root: string, workspaceRoot: string = root): ViolationDetail[] {
  const violations: ViolationDetail[] = [];

  for (const raw of output.split('\n')) {
    const parsed = parseLine(raw.trim());
    if (!parsed || !REPORTED_LEVELS.has(parsed.message.level)) {
      continue;
    }
    const { message } = parsed;
    const span = message.spans.find((candidate) => candidate.is_primary) ?? message.spans[0];
    if (!span) {
      continue;
    }

    const childSpans: DiagnosticSpan[] = message.children.flatMap((child) => child.spans);
    const replacement = childSpans.find((candidate) => typeof candidate.suggested_replacement === 'string');
    const help = message.children.find((child) => child.level === 'help');
    const suggestion = replacement?.suggested_replacement
      ? `${help?.message ?? 'replace with'}: \`${replacement.suggested_replacement}\``
      : help?.message;

    const violation: ViolationDetail = {
      file: relativeTo(root, workspaceRoot, span.file_name),
      line: span.line_start,
      column: span.column_start,
      endLine: span.line_end,
      endColumn: span.column_end,
      lintName: message.code?.code ?? 'rustc',
      message: message.message,
      severity: parseViolationSeverity(message.level),
      machineApplicable: [span, ...childSpans].some((candidate) => candidate.suggestion_applicability === 'MachineApplicable')
    };
    if (suggestion) {
      violation.suggestion = suggestion;
    }
    violations.push(violation);
  }

  return violations;
}

async function workspaceRootOf(snapshot: ProjectSnapshot): Promise<string> {
  return findCargoWorkspaceRoot(snapshot.root, readFileIfExists);
}

export interface LintHotspotAnalysis extends LintHotspotResult {
  tool: string;
  toolExitCode: number | null;
}

export async function analyzeLintHotspot(
  snapshot: ProjectSnapshot,
  deps: Pick<AnalysisDeps, 'runner' | 'logger'>,
  sloc: Readonly<Record<string, number>>
): Promise<LintHotspotAnalysis> {
  if (snapshot.toolchain !== 'rust') {
    deps.logger.warn({ toolchain: snapshot.toolchain }, 'lint hotspot analysis needs a cargo project; reporting no violations');
    return { ...emptyLintHotspot(), tool: 'none', toolExitCode: null };
  }

  const args = ['clippy', '--all-targets', '--message-format=json', '--', ...CLIPPY_FLAGS];
  const result = await deps.runner('cargo', args, { cwd: snapshot.root });
  const violations = parseClippyMessages(result.stdout, snapshot.root, await workspaceRootOf(snapshot));

  if (result.exitCode !== 0) {
    deps.logger.warn({ tool: 'cargo clippy', exitCode: result.exitCode, violations: violations.length }, 'clippy reported a failure');
  }

  return { ...buildLintHotspot(violations, sloc), tool: 'cargo clippy', toolExitCode: result.exitCode };
}

export interface CompilationAnalysis {
  errors: CompilationError[];
  hotspot: LintHotspotResult;
  buildExitCode: number | null;
}

/** `cargo build --message-format=short`; density is errors per logical line of the file. */
export async function analyzeCompilationErrors(
  snapshot: ProjectSnapshot,
  deps: Pick<AnalysisDeps, 'runner' | 'logger'>,
  sloc: Readonly<Record<string, number>>
): Promise<CompilationAnalysis> {
  if (snapshot.toolchain !== 'rust') {
    return { errors: [], hotspot: emptyLintHotspot(), buildExitCode: null };
  }

  const result = await deps.runner('cargo', ['build', '--message-format=short'], { cwd: snapshot.root });
  const workspaceRoot = await workspaceRootOf(snapshot);
  const errors = parseShortDiagnostics(`${result.stderr}\n${result.stdout}`).map((error) => ({
    ...error,
    file: relativeTo(snapshot.root, workspaceRoot, error.file)
  }));

  if (result.exitCode !== 0 && errors.length === 0) {
    deps.logger.warn({ tool: 'cargo build', exitCode: result.exitCode }, 'build failed without parseable diagnostics');
  }

  return {
    errors,
    hotspot: buildLintHotspot(errors.map(compilationErrorToViolation), sloc, 1),
    buildExitCode: result.exitCode
  };
}
