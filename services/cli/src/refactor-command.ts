import path from 'node:path';

import { z } from 'zod';

import { createAnalysisRuntime, loadRewriteTemplates, resolveProject } from '@refactor-gate/analysis';
import {
  CacheLock,
  ConfigurationError,
  createExecutionContext,
  createProcessRunner,
  GitHubIssueClient,
  readFileIfExists,
  StateStore,
  type AppEnv,
  type Logger,
  type ProcessRunner
} from '@refactor-gate/common';
import {
  EXTREME_QUALITY_PROFILE,
  parseIgnoreFile,
  type QualityProfile,
  type RefactorMode,
  type SelectionFilters
} from '@refactor-gate/domain';

import { createCommandAgent } from './agent.js';
import { AnalysisQualityGauge } from './gauge.js';
import { resolveModeTargets } from './modes.js';
import { RefactorOrchestrator, type RefactorReporter } from './orchestrator.js';
import { exitCodeFor, renderSummary } from './report.js';
import { BuiltInRewriter } from './rewriter.js';
import { createBuildVerifier } from './verify.js';

export const DEFAULT_MAX_ITERATIONS = 10;

export const REFACTOR_OPTIONS = {
  'project-path': { type: 'string' },
  'single-file-mode': { type: 'boolean' },
  file: { type: 'string' },
  'max-iterations': { type: 'string' },
  'cache-dir': { type: 'string' },
  'dry-run': { type: 'boolean' },
  'ci-mode': { type: 'boolean' },
  include: { type: 'string', multiple: true },
  exclude: { type: 'string', multiple: true },
  'ignore-file': { type: 'string' },
  'test-file': { type: 'string' },
  'test-name': { type: 'string' },
  'github-issue-url': { type: 'string' },
  'bug-report-path': { type: 'string' },
  'agent-command': { type: 'string' },
  templates: { type: 'string' },
  toolchain: { type: 'string' },
  format: { type: 'string' },
  'coverage-min': { type: 'string' },
  'complexity-max': { type: 'string' },
  'satd-allowed': { type: 'string' }
} as const;

const refactorFlagsSchema = z.object({
  'project-path': z.string().min(1).default('.'),
  'single-file-mode': z.boolean().default(false),
  file: z.string().min(1).optional(),
  'max-iterations': z.coerce.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  'cache-dir': z.string().min(1).optional(),
  'dry-run': z.boolean().default(false),
  'ci-mode': z.boolean().default(false),
  include: z.array(z.string().min(1)).default([]),
  exclude: z.array(z.string().min(1)).default([]),
  'ignore-file': z.string().min(1).optional(),
  'test-file': z.string().min(1).optional(),
  'test-name': z.string().min(1).optional(),
  'github-issue-url': z.string().min(1).optional(),
  'bug-report-path': z.string().min(1).optional(),
  'agent-command': z.string().min(1).optional(),
  templates: z.string().min(1).optional(),
  toolchain: z.enum(['rust', 'deno', 'python-uv', 'go']).optional(),
  format: z.enum(['json', 'markdown']).default('markdown'),
  'coverage-min': z.coerce.number().min(0).max(100).optional(),
  'complexity-max': z.coerce.number().int().positive().optional(),
  'satd-allowed': z.coerce.number().int().min(0).optional()
});

export type RefactorFlags = z.output<typeof refactorFlagsSchema>;

export function parseRefactorFlags(values: unknown): RefactorFlags {
  const parsed = refactorFlagsSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const flag = issue?.path.join('.') ?? 'flags';
    throw new ConfigurationError(`Invalid --${flag}: ${issue?.message ?? 'unparsable value'}`);
  }
  return parsed.data;
}

/** Exactly one mode; `--file` on its own implies single-file mode. */
export function modeFromFlags(flags: RefactorFlags): RefactorMode {
  const singleFile = flags['single-file-mode'] || flags.file !== undefined;
  const chosen = [
    singleFile ? '--single-file-mode' : null,
    flags['test-file'] ? '--test-file' : null,
    flags['github-issue-url'] ? '--github-issue-url' : null,
    flags['bug-report-path'] ? '--bug-report-path' : null
  ].filter((flag): flag is string => flag !== null);

  if (chosen.length > 1) {
    throw new ConfigurationError(`Conflicting modes: ${chosen.join(', ')}`);
  }
  if (flags['test-name'] && !flags['test-file']) {
    throw new ConfigurationError('--test-name requires --test-file');
  }

  if (singleFile) {
    if (!flags.file) {
      throw new ConfigurationError('--file is required with --single-file-mode');
    }
    return { kind: 'SingleFile', file: flags.file };
  }
  if (flags['test-file']) {
    return flags['test-name']
      ? { kind: 'TestDriven', testFile: flags['test-file'], testName: flags['test-name'] }
      : { kind: 'TestDriven', testFile: flags['test-file'] };
  }
  if (flags['github-issue-url']) {
    return { kind: 'IssueDriven', issueUrl: flags['github-issue-url'] };
  }
  if (flags['bug-report-path']) {
    return { kind: 'BugReport', reportPath: flags['bug-report-path'] };
  }
  return { kind: 'Normal' };
}

export function profileFromFlags(flags: RefactorFlags): QualityProfile {
  return {
    ...EXTREME_QUALITY_PROFILE,
    coverageMin: flags['coverage-min'] ?? EXTREME_QUALITY_PROFILE.coverageMin,
    complexityMax: flags['complexity-max'] ?? EXTREME_QUALITY_PROFILE.complexityMax,
    satdAllowed: flags['satd-allowed'] ?? EXTREME_QUALITY_PROFILE.satdAllowed
  };
}

async function filtersFromFlags(flags: RefactorFlags, cwd: string): Promise<SelectionFilters> {
  const exclude = [...flags.exclude];
  const ignoreFile = flags['ignore-file'];
  if (ignoreFile) {
    const content = await readFileIfExists(path.resolve(cwd, ignoreFile));
    if (content === null) {
      throw new ConfigurationError(`Ignore file not found: ${ignoreFile}`);
    }
    exclude.push(...parseIgnoreFile(content));
  }
  return { include: [...flags.include], exclude };
}

export interface RefactorCommandOptions {
  flags: RefactorFlags;
  env: AppEnv;
  cwd: string;
  processEnv: NodeJS.ProcessEnv;
  logger: Logger;
  reporter: RefactorReporter;
  write: (text: string) => void;
  signal?: AbortSignal;
  runner?: ProcessRunner;
}

/** `refactor auto`: validates the invocation, takes the cache lock and runs the loop to a summary. */
export async function runRefactorAuto(options: RefactorCommandOptions): Promise<number> {
  const { flags, env, logger } = options;
  const mode = modeFromFlags(flags);
  const profile = profileFromFlags(flags);
  const project = await resolveProject(options.cwd, flags['project-path'], flags.toolchain);

  const ctx = createExecutionContext({
    projectPath: project.root,
    cwd: options.cwd,
    env: options.processEnv,
    cacheDir: flags['cache-dir'] ?? env.REFACTOR_CACHE_DIR,
    signal: options.signal
  });

  const lock = new CacheLock(ctx.cacheDir, { staleMs: env.LOCK_STALE_MS });
  await lock.acquire();
  try {
    const filters = await filtersFromFlags(flags, options.cwd);
    const templatesPath = flags.templates ?? env.REWRITE_TEMPLATES_PATH ?? null;
    const templates = await loadRewriteTemplates(templatesPath);
    const runner = options.runner ?? createProcessRunner(ctx);
    const { service, router } = createAnalysisRuntime({ ctx, env, logger, runner, templatesPath });

    const targets = await resolveModeTargets(mode, {
      root: project.root,
      toolchain: project.toolchain,
      issueClient: () => new GitHubIssueClient(env.GITHUB_TOKEN)
    });
    logger.info({ mode: mode.kind, root: project.root, targets: targets.targetSet?.length ?? 'all' }, 'refactor starting');

    const agentCommand = flags['agent-command'] ?? env.REFACTOR_AGENT_COMMAND;
    const orchestrator = new RefactorOrchestrator({
      gauge: new AnalysisQualityGauge({
        service,
        router,
        projectPath: project.root,
        filters,
        profile,
        logger: logger.child({ component: 'gauge' }),
        toolchain: flags.toolchain
      }),
      store: new StateStore(ctx.cacheDir, logger.child({ component: 'state' })),
      rewriter: new BuiltInRewriter({ templates: templates.templates, runner, logger: logger.child({ component: 'rewriter' }) }),
      verifyBuild: createBuildVerifier(runner, project.root, project.toolchain),
      reporter: options.reporter,
      logger: logger.child({ component: 'orchestrator' }),
      cacheDir: ctx.cacheDir,
      agent: agentCommand ? createCommandAgent({ command: agentCommand, runner, cwd: project.root }) : null
    });

    const outcome = await orchestrator.run({
      projectRoot: project.root,
      maxIterations: flags['max-iterations'],
      profile,
      filters,
      dryRun: flags['dry-run'],
      targets,
      signal: options.signal
    });

    options.write(renderSummary(outcome, flags.format));
    return exitCodeFor(outcome.status, flags['ci-mode'] || env.REFACTOR_CI);
  } finally {
    await lock.release();
  }
}
