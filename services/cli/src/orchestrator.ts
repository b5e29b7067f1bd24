import { copyFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';

import { extractFileContext, functionsByFile, renderDeepContextMarkdown, type DeepContext } from '@refactor-gate/analysis';
import {
  CommandFailedError,
  CONTEXT_FILENAME,
  createInitialState,
  errorMessage,
  readFileIfExists,
  writeFileAtomic,
  type Logger,
  type StateStore
} from '@refactor-gate/common';
import {
  buildRewritePlan,
  compilationErrorToViolation,
  computeProgress,
  detectSatd,
  determinePhase,
  extractAstMetadata,
  highComplexityViolations,
  meetsQualityGates,
  missingTestsViolation,
  normalizePath,
  sameMetrics,
  satdToViolation,
  selectTarget,
  type AstMetadata,
  type QualityProfile,
  type RefactorPhase,
  type RefactorState,
  type RefactorStatus,
  type SelectedTarget,
  type Selection,
  type SelectionFilters,
  type Toolchain,
  type ViolationDetail
} from '@refactor-gate/domain';

import { AgentResponseError, type AgentResponse, type RewriteAgent } from './agent.js';
import type { QualityGauge, QualitySample } from './gauge.js';
import type { ModeTargets } from './modes.js';
import { renderPlan, renderProgressBlock } from './report.js';
import { buildRewriteRequest, formatRewriteRequest, type RewriteRequest } from './request.js';
import { CLIPPY_FIX_LABEL, type RewriteOutcome, type Rewriter } from './rewriter.js';
import type { BuildVerifier } from './verify.js';

export const CONTEXT_REFRESH_INTERVAL = 5;
export const BACKUP_SUFFIX = '.backup';

export interface RefactorReporter {
  /** Human-readable progress; the CLI sends it to stderr. */
  progress(text: string): void;
  /** A rewrite request framed by its sentinels; the CLI sends it to stdout. */
  request(text: string): void;
}

export interface RefactorRunConfig {
  projectRoot: string;
  maxIterations: number;
  profile: QualityProfile;
  filters: SelectionFilters;
  dryRun: boolean;
  targets: ModeTargets;
  signal?: AbortSignal;
}

export interface RefactorOrchestratorOptions {
  gauge: QualityGauge;
  store: Pick<StateStore, 'load' | 'save'>;
  rewriter: Rewriter;
  verifyBuild: BuildVerifier;
  reporter: RefactorReporter;
  logger: Logger;
  cacheDir: string;
  agent?: RewriteAgent | null;
  now?: () => Date;
  writeFileFn?: typeof writeFileAtomic;
}

export interface RefactorOutcome {
  status: RefactorStatus;
  iterations: number;
  state: RefactorState;
  phases: RefactorPhase[];
  requests: RewriteRequest[];
  message: string;
}

interface ActiveRun {
  state: RefactorState;
  phases: RefactorPhase[];
  requests: RewriteRequest[];
  iterations: number;
  skipped: string[];
  context: DeepContext | null;
  contextMarkdown: string;
  message: string;
}

export class RefactorCanceledError extends Error {
  constructor(message = 'Refactor canceled') {
    super(message);
    this.name = 'RefactorCanceledError';
  }
}

function assertNotCanceled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RefactorCanceledError('Refactor canceled by signal');
  }
}

function recordPhase(run: ActiveRun, phase: RefactorPhase): void {
  if (run.phases[run.phases.length - 1] !== phase) {
    run.phases.push(phase);
  }
}

/** Findings still present in the rewritten text, plus lint findings the rewrite could not have fixed. */
export function remainingViolations(
  file: string,
  rewrite: RewriteOutcome,
  lintViolations: readonly ViolationDetail[],
  toolchain: Toolchain,
  profile: QualityProfile
): ViolationDetail[] {
  const lintFixed = rewrite.applied.includes(CLIPPY_FIX_LABEL);
  return [
    ...lintViolations.filter((violation) => !(lintFixed && violation.machineApplicable)),
    ...detectSatd(file, rewrite.content, toolchain).map(satdToViolation),
    ...highComplexityViolations(file, extractAstMetadata(rewrite.content, toolchain), profile)
  ];
}

/**
 * Drives measure, select, rewrite, verify and re-measure until the quality
 * gates pass or the iteration budget runs out. State is persisted after every
 * iteration; a failed build or a cancellation restores the file from its
 * `.backup` copy.
 */
export class RefactorOrchestrator {
  private readonly now: () => Date;
  private readonly writeFileFn: typeof writeFileAtomic;

  constructor(private readonly options: RefactorOrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
    this.writeFileFn = options.writeFileFn ?? writeFileAtomic;
  }

  async run(config: RefactorRunConfig): Promise<RefactorOutcome> {
    const loaded = (await this.options.store.load()) ?? createInitialState(this.options.cacheDir, this.now());
    const state: RefactorState = { ...loaded, contextPath: path.join(this.options.cacheDir, CONTEXT_FILENAME) };

    const run: ActiveRun = {
      state,
      phases: [state.progress.currentPhase],
      requests: [],
      iterations: 0,
      skipped: [],
      context: null,
      contextMarkdown: '',
      message: ''
    };

    try {
      const status = await this.loop(config, run);
      return await this.finish(config, run, status);
    } catch (error) {
      if (error instanceof RefactorCanceledError) {
        this.options.logger.info({ iteration: run.state.iteration }, 'refactor canceled');
        run.message = error.message;
        return this.finish(config, run, 'Canceled');
      }
      throw error;
    }
  }

  private async loop(config: RefactorRunConfig, run: ActiveRun): Promise<RefactorStatus> {
    for (let count = 0; count < config.maxIterations; count += 1) {
      assertNotCanceled(config.signal);
      run.iterations += 1;

      const status = await this.iterate(config, run);
      if (status) {
        return status;
      }
      await this.options.store.save(run.state);
    }

    run.message = `Iteration budget of ${config.maxIterations} exhausted`;
    return 'BudgetExhausted';
  }

  private async finish(config: RefactorRunConfig, run: ActiveRun, status: RefactorStatus): Promise<RefactorOutcome> {
    if (status === 'Complete') {
      run.state = { ...run.state, progress: this.progress(config, run.state, 'Complete') };
      recordPhase(run, 'Complete');
    }
    await this.options.store.save(run.state);

    return {
      status,
      iterations: run.iterations,
      state: run.state,
      phases: run.phases,
      requests: run.requests,
      message: run.message
    };
  }

  private async iterate(config: RefactorRunConfig, run: ActiveRun): Promise<RefactorStatus | null> {
    const { gauge, logger, reporter } = this.options;
    const { profile } = config;

    if (!run.context || run.state.iteration % CONTEXT_REFRESH_INTERVAL === 0) {
      run.context = await gauge.generateContext();
      run.contextMarkdown = renderDeepContextMarkdown(run.context);
      await this.writeFileFn(run.state.contextPath, run.contextMarkdown);
      run.state = { ...run.state, contextGenerated: true };
    }
    assertNotCanceled(config.signal);

    const sample = await gauge.measure();
    const metrics = sample.metrics;
    const phase = determinePhase(metrics, profile);
    run.state = {
      ...run.state,
      iteration: run.state.iteration + 1,
      qualityMetrics: metrics,
      satdBaseline: Math.max(run.state.satdBaseline, metrics.satdCount)
    };
    run.state = { ...run.state, progress: this.progress(config, run.state, phase) };
    recordPhase(run, phase);

    if (meetsQualityGates(metrics, profile)) {
      reporter.progress(renderProgressBlock(run.state, null));
      run.message = 'All quality gates passed';
      return 'Complete';
    }

    if (sample.unparsedBuildFailure) {
      logger.warn('build fails without a diagnostic naming a file; selecting by coverage instead');
    }

    const selection = this.select(config, run, sample);
    if (selection.kind === 'exhausted') {
      reporter.progress(renderProgressBlock(run.state, null));
      run.message = selection.reason;
      return 'Complete';
    }

    if (selection.tier === 'build') {
      run.state = { ...run.state, progress: this.progress(config, run.state, 'BuildFixes') };
      recordPhase(run, 'BuildFixes');
    }

    const stalled =
      run.state.lastMetrics !== null && sameMetrics(run.state.lastMetrics, metrics) && run.state.lastTarget === selection.file;
    run.state = { ...run.state, currentFile: selection.file, lastTarget: selection.file, lastMetrics: metrics };
    reporter.progress(renderProgressBlock(run.state, selection));

    if (stalled) {
      run.message = `No progress: ${selection.file} was selected again with unchanged metrics`;
      return 'NoProgress';
    }

    return this.processTarget(config, run, sample, selection);
  }

  private select(config: RefactorRunConfig, run: ActiveRun, sample: QualitySample): Selection {
    const input = {
      profile: config.profile,
      metrics: sample.metrics,
      filters: config.filters,
      filesCompleted: run.state.filesCompleted,
      targetSet: config.targets.targetSet,
      skipped: run.skipped,
      violations: sample.violations,
      compilationErrors: sample.compilationErrors,
      coverageByFile: sample.coverageByFile,
      sourceFiles: sample.sourceFiles,
      complexity: sample.complexity,
      satdByFile: sample.satdByFile,
      issueKeywords: config.targets.issue?.keywords
    };

    const selection = selectTarget({ ...input, coverageDriven: sample.unparsedBuildFailure });
    if (selection.kind === 'exhausted' && sample.unparsedBuildFailure) {
      return selectTarget(input);
    }
    return selection;
  }

  private async processTarget(
    config: RefactorRunConfig,
    run: ActiveRun,
    sample: QualitySample,
    target: SelectedTarget
  ): Promise<RefactorStatus | null> {
    const { logger, reporter } = this.options;
    const { profile, projectRoot: root } = config;
    const file = target.file;
    const filePath = path.join(root, file);

    const original = await readFileIfExists(filePath);
    const content = original ?? '';
    const lintViolations =
      target.tier === 'build'
        ? sample.compilationErrors.filter((error) => normalizePath(error.file) === file).map(compilationErrorToViolation)
        : sample.violations.filter((violation) => normalizePath(violation.file) === file);

    const coverage = sample.coverageByFile[file] ?? 0;
    const needsTests = target.tier !== 'build' && coverage < profile.coverageMin;
    const plan = buildRewritePlan({
      filePath: file,
      content: original,
      toolchain: sample.toolchain,
      violations: needsTests ? [...lintViolations, missingTestsViolation(file, coverage, profile)] : lintViolations,
      astMetadata: this.astMetadataFor(run, file, content, sample.toolchain),
      profile
    });

    if (config.dryRun) {
      reporter.progress(renderPlan(plan));
      run.skipped.push(file);
      return null;
    }

    const backupPath = `${filePath}${BACKUP_SUFFIX}`;
    if (original !== null) {
      await copyFile(filePath, backupPath);
    }

    let awaitingRewrite = false;
    try {
      assertNotCanceled(config.signal);
      const rewrite = await this.options.rewriter.rewrite({
        root,
        file,
        content,
        toolchain: sample.toolchain,
        plan,
        violations: lintViolations
      });
      if (rewrite.applied.length > 0) {
        logger.info({ file, applied: rewrite.applied }, 'built-in rewrite applied');
      }

      const remaining = remainingViolations(file, rewrite, lintViolations, sample.toolchain, profile);
      if (remaining.length > 0 || coverage < profile.coverageMin) {
        const request = buildRewriteRequest({
          file,
          content: rewrite.content,
          context: extractFileContext(run.contextMarkdown, file),
          violations: remaining,
          coverage,
          profile,
          issue: config.targets.issue,
          bugReport: config.targets.bugReport
        });
        run.requests.push(request);
        reporter.request(formatRewriteRequest(request));

        if (this.options.agent) {
          let answer: AgentResponse;
          try {
            answer = await this.options.agent(request);
          } catch (error) {
            if (!(error instanceof CommandFailedError || error instanceof AgentResponseError)) {
              throw error;
            }
            await this.restore(filePath, backupPath, original !== null);
            logger.warn({ file, err: error }, 'rewrite agent failed; file restored from backup');
            run.message = `Rewrite agent failed for ${file}: ${errorMessage(error)}; apply the request and run again`;
            return 'AwaitingRewrite';
          }
          assertNotCanceled(config.signal);
          await this.writeFileFn(filePath, answer.sourceCode);
          const testFile = request.outputFiles[1];
          if (answer.testCode !== null && testFile) {
            await this.writeFileFn(path.join(root, testFile.path), answer.testCode);
          }
        } else {
          awaitingRewrite = true;
        }
      }

      assertNotCanceled(config.signal);
      const build = await this.options.verifyBuild();
      if (!build.ok) {
        await this.restore(filePath, backupPath, original !== null);
        logger.warn({ file, output: build.output.slice(0, 2000) }, 'build check failed; file restored from backup');
        run.message = `Build check failed after rewriting ${file}; the file was restored`;
        return 'BuildBroken';
      }
      await rm(backupPath, { force: true });
    } catch (error) {
      await this.restore(filePath, backupPath, original !== null);
      throw error;
    }

    if (awaitingRewrite) {
      run.message = `Rewrite request emitted for ${file}; apply it and run again`;
      return 'AwaitingRewrite';
    }

    const check = await this.options.gauge.measureFile(file);
    const meetsFileGoals = check.coverage >= profile.coverageMin && check.violations.length === 0;
    if (meetsFileGoals && !run.state.filesCompleted.includes(file)) {
      run.state = { ...run.state, filesCompleted: [...run.state.filesCompleted, file] };
      run.state = { ...run.state, progress: this.progress(config, run.state, run.state.progress.currentPhase) };
    } else if (!meetsFileGoals) {
      logger.info({ file, coverage: check.coverage, violations: check.violations.length }, 'file still short of its goals');
    }
    return null;
  }

  private astMetadataFor(run: ActiveRun, file: string, content: string, toolchain: Toolchain): AstMetadata {
    const extracted = extractAstMetadata(content, toolchain);
    const functions = run.context ? functionsByFile(run.context).get(file) : undefined;
    return functions ? { ...extracted, functions } : extracted;
  }

  private async restore(filePath: string, backupPath: string, hadOriginal: boolean): Promise<void> {
    if (hadOriginal) {
      await rename(backupPath, filePath);
    } else {
      await rm(filePath, { force: true });
    }
  }

  private progress(config: RefactorRunConfig, state: RefactorState, phase: RefactorPhase) {
    return computeProgress({
      metrics: state.qualityMetrics,
      profile: config.profile,
      satdBaseline: state.satdBaseline,
      filesCompleted: state.filesCompleted.length,
      elapsedSeconds: (this.now().getTime() - Date.parse(state.startTime)) / 1000,
      phase
    });
  }
}
