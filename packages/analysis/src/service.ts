import path from 'node:path';

import { CacheLock, DEFAULT_CACHE_DIRNAME } from '@refactor-gate/common';
import type { ChurnAnalysis, SelectionFilters, Toolchain } from '@refactor-gate/domain';

import { analyzeChurn, DEFAULT_CHURN_DAYS } from './analyzers/churn.js';
import { CoverageSampler, type CoverageMeasurement } from './analyzers/coverage.js';
import { analyzeCompilationErrors, analyzeLintHotspot, type CompilationAnalysis, type LintHotspotAnalysis } from './analyzers/lint.js';
import {
  analyzeComplexity,
  analyzeProjectDeadCode,
  analyzeSatd,
  slocByFile,
  type ComplexityAnalysis,
  type DeadCodeAnalysis,
  type SatdAnalysis
} from './analyzers/source.js';
import { analyzeTdg, type TdgAnalysis } from './analyzers/tdg.js';
import { buildDeepContext, type DeepContext } from './deep-context/model.js';
import type { AnalysisDeps, ProjectSnapshot } from './deps.js';
import { loadSourceDocuments } from './files.js';
import { resolveProject } from './project.js';

export const DEFAULT_COMPLEXITY_THRESHOLD = 10;

export interface SnapshotRequest {
  projectPath: string;
  filters?: SelectionFilters;
  toolchain?: Toolchain;
}

export interface HistoryOptions {
  threshold?: number;
  days?: number;
}

/** Every analyzer behind one object; each call works on a snapshot read once per request. */
export class AnalysisService {
  private readonly sampler: CoverageSampler;

  constructor(
    readonly deps: AnalysisDeps,
    private readonly now: () => Date = () => new Date()
  ) {
    this.sampler = new CoverageSampler(deps);
  }

  async snapshot(request: SnapshotRequest): Promise<ProjectSnapshot> {
    const project = await resolveProject(this.deps.ctx.cwd, request.projectPath, request.toolchain);
    const documents = await loadSourceDocuments({
      root: project.root,
      toolchain: project.toolchain,
      filters: request.filters ?? { include: [], exclude: [] },
      concurrency: this.deps.concurrency
    });
    this.deps.logger.debug({ root: project.root, toolchain: project.toolchain, files: documents.length }, 'project snapshot loaded');
    return { root: project.root, toolchain: project.toolchain, documents };
  }

  complexity(snapshot: ProjectSnapshot, threshold: number = DEFAULT_COMPLEXITY_THRESHOLD): ComplexityAnalysis {
    return analyzeComplexity(snapshot, threshold);
  }

  satd(snapshot: ProjectSnapshot): SatdAnalysis {
    return analyzeSatd(snapshot);
  }

  deadCode(snapshot: ProjectSnapshot): DeadCodeAnalysis {
    return analyzeProjectDeadCode(snapshot);
  }

  churn(snapshot: ProjectSnapshot, days: number = DEFAULT_CHURN_DAYS): Promise<ChurnAnalysis> {
    return analyzeChurn(snapshot.root, this.deps, days, this.now());
  }

  async tdg(snapshot: ProjectSnapshot, options: HistoryOptions = {}): Promise<TdgAnalysis> {
    const threshold = options.threshold ?? DEFAULT_COMPLEXITY_THRESHOLD;
    return analyzeTdg({
      complexity: this.complexity(snapshot, threshold).files,
      churn: await this.churn(snapshot, options.days),
      satdItems: this.satd(snapshot).items,
      threshold
    });
  }

  async deepContext(snapshot: ProjectSnapshot, options: HistoryOptions = {}): Promise<DeepContext> {
    const threshold = options.threshold ?? DEFAULT_COMPLEXITY_THRESHOLD;
    const complexity = this.complexity(snapshot, threshold);
    const satd = this.satd(snapshot);
    const churn = await this.churn(snapshot, options.days);
    const tdg = analyzeTdg({ complexity: complexity.files, churn, satdItems: satd.items, threshold });

    return buildDeepContext({
      projectPath: snapshot.root,
      toolchain: snapshot.toolchain,
      threshold,
      generatedAt: this.now().toISOString(),
      complexity,
      satd,
      deadCode: this.deadCode(snapshot),
      churn,
      tdg
    });
  }

  lintHotspot(snapshot: ProjectSnapshot): Promise<LintHotspotAnalysis> {
    return analyzeLintHotspot(snapshot, this.deps, slocByFile(snapshot));
  }

  compilationErrors(snapshot: ProjectSnapshot): Promise<CompilationAnalysis> {
    return analyzeCompilationErrors(snapshot, this.deps, slocByFile(snapshot));
  }

  /** Profiles go under the context's cache when it serves this project, else under the project's own cache. */
  async coverage(snapshot: ProjectSnapshot, file?: string | null): Promise<CoverageMeasurement> {
    const cacheDir =
      path.resolve(snapshot.root) === path.resolve(this.deps.ctx.cwd)
        ? this.deps.ctx.cacheDir
        : path.join(snapshot.root, DEFAULT_CACHE_DIRNAME);
    const request = { file, coverageDir: path.join(cacheDir, 'coverage') };
    if (!this.deps.coverageLock) {
      return this.sampler.measure(snapshot, request);
    }

    // The sampler wipes `<cache>/coverage`, which a running refactor loop also writes.
    const lock = new CacheLock(cacheDir, this.deps.coverageLock);
    await lock.acquire();
    try {
      return await this.sampler.measure(snapshot, request);
    } finally {
      await lock.release();
    }
  }

  generatedAt(): string {
    return this.now().toISOString();
  }
}
