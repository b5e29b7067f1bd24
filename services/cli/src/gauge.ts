import { camelCaseKeys, type Logger } from '@refactor-gate/common';
import {
  ANALYZE_PREFIX,
  type AnalysisService,
  type DeepContext,
  type ProjectSnapshot
} from '@refactor-gate/analysis';
import {
  detectSatd,
  extractAstMetadata,
  highComplexityViolations,
  measuredCoverageForFile,
  parseViolationSeverity,
  satdToViolation,
  type CompilationError,
  type FileComplexity,
  type QualityMetrics,
  type QualityProfile,
  type SelectionFilters,
  type SourceFileStat,
  type Toolchain,
  type ViolationDetail
} from '@refactor-gate/domain';
import { errorMessageOf, type Router, type UnifiedRequest } from '@refactor-gate/protocol';
import { z } from 'zod';

/** Everything one measurement pass learns about the project. */
export interface QualitySample {
  toolchain: Toolchain;
  metrics: QualityMetrics;
  violations: ViolationDetail[];
  compilationErrors: CompilationError[];
  /** The build failed but no diagnostic could be tied to a file. */
  unparsedBuildFailure: boolean;
  coverageByFile: Record<string, number>;
  sourceFiles: SourceFileStat[];
  complexity: FileComplexity[];
  satdByFile: Record<string, number>;
}

export interface FileSample {
  coverage: number;
  violations: ViolationDetail[];
}

/** The orchestrator's view of the analyzers; tests replace it with an in-memory gauge. */
export interface QualityGauge {
  generateContext(): Promise<DeepContext>;
  measure(): Promise<QualitySample>;
  measureFile(file: string): Promise<FileSample>;
}

const violationSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  column: z.number().int(),
  endLine: z.number().int(),
  endColumn: z.number().int(),
  lintName: z.string(),
  message: z.string(),
  severity: z.string().transform(parseViolationSeverity),
  suggestion: z.string().optional(),
  machineApplicable: z.boolean()
});

const lintHotspotBodySchema = z.object({
  totalProjectViolations: z.number().int(),
  summaryByFile: z.record(z.object({ defectDensity: z.number(), totalViolations: z.number().int() })),
  allViolations: z.array(violationSchema),
  toolExitCode: z.number().int().nullable()
});

export type LintHotspotBody = z.output<typeof lintHotspotBodySchema>;

interface LintPass {
  totalViolations: number;
  filesWithIssues: number;
  violations: ViolationDetail[];
  compilationErrors: CompilationError[];
  unparsedBuildFailure: boolean;
}

export interface AnalysisGaugeOptions {
  service: AnalysisService;
  router: Router;
  projectPath: string;
  filters: SelectionFilters;
  profile: QualityProfile;
  logger: Logger;
  toolchain?: Toolchain;
}

/**
 * Measures through the same analyzers the CLI, HTTP and MCP surfaces use. The
 * lint pass goes through the router so it runs the registered handler rather
 * than a second code path.
 */
export class AnalysisQualityGauge implements QualityGauge {
  constructor(private readonly options: AnalysisGaugeOptions) {}

  async generateContext(): Promise<DeepContext> {
    const snapshot = await this.snapshot();
    return this.options.service.deepContext(snapshot, { threshold: this.options.profile.complexityMax });
  }

  async measure(): Promise<QualitySample> {
    const { service, profile, logger } = this.options;
    const snapshot = await this.snapshot();

    const lint = await this.lintPass(snapshot);

    const coverage = await service.coverage(snapshot);
    const coverageByFile: Record<string, number> = {};
    for (const document of snapshot.documents) {
      const measured = measuredCoverageForFile(coverage.report, document.path);
      if (measured !== null) {
        coverageByFile[document.path] = measured;
      }
    }

    const complexity = service.complexity(snapshot, profile.complexityMax);
    const satd = service.satd(snapshot);

    logger.debug(
      { violations: lint.totalViolations, coverage: coverage.percent, satd: satd.summary.totalItems },
      'quality measured'
    );

    return {
      toolchain: snapshot.toolchain,
      metrics: {
        totalViolations: lint.totalViolations,
        filesWithIssues: lint.filesWithIssues,
        totalFiles: snapshot.documents.length,
        coveragePercent: coverage.percent,
        maxComplexity: complexity.summary.maxCyclomatic,
        functionsWithHighComplexity: complexity.summary.functionsOverThreshold,
        totalFunctions: complexity.summary.totalFunctions,
        satdCount: satd.summary.totalItems
      },
      violations: lint.violations,
      compilationErrors: lint.compilationErrors,
      unparsedBuildFailure: lint.unparsedBuildFailure,
      coverageByFile,
      sourceFiles: complexity.files.map((file) => ({ path: file.path, sloc: file.sloc })),
      complexity: complexity.files,
      satdByFile: satd.byFile
    };
  }

  /** Coverage of one file plus every lint, SATD and complexity finding still on it. */
  async measureFile(file: string): Promise<FileSample> {
    const { service, profile } = this.options;
    const snapshot = await this.snapshot();
    const lint = await this.lintPass(snapshot);
    const coverage = await service.coverage(snapshot, file);

    const violations = lint.violations.filter((violation) => violation.file === file);
    const document = snapshot.documents.find((candidate) => candidate.path === file);
    if (document) {
      violations.push(...detectSatd(file, document.content, snapshot.toolchain).map(satdToViolation));
      violations.push(...highComplexityViolations(file, extractAstMetadata(document.content, snapshot.toolchain), profile));
    }

    return { coverage: coverage.percent, violations };
  }

  private snapshot(): Promise<ProjectSnapshot> {
    return this.options.service.snapshot({
      projectPath: this.options.projectPath,
      filters: this.options.filters,
      toolchain: this.options.toolchain
    });
  }

  /** Clippy first; when it fails without diagnostics the build's errors stand in as the lint result. */
  private async lintPass(snapshot: ProjectSnapshot): Promise<LintPass> {
    const lint = await this.lintHotspot();
    const fromLint: LintPass = {
      totalViolations: lint.totalProjectViolations,
      filesWithIssues: Object.keys(lint.summaryByFile).length,
      violations: lint.allViolations,
      compilationErrors: [],
      unparsedBuildFailure: false
    };
    if (lint.allViolations.length > 0 || lint.toolExitCode === null || lint.toolExitCode === 0) {
      return fromLint;
    }

    const build = await this.options.service.compilationErrors(snapshot);
    if (build.errors.length === 0) {
      return { ...fromLint, unparsedBuildFailure: build.buildExitCode !== null && build.buildExitCode !== 0 };
    }

    this.options.logger.info({ errors: build.errors.length }, 'lint failed; using compilation errors');
    return {
      totalViolations: build.hotspot.totalProjectViolations,
      filesWithIssues: Object.keys(build.hotspot.summaryByFile).length,
      violations: build.hotspot.allViolations,
      compilationErrors: build.errors,
      unparsedBuildFailure: false
    };
  }

  private async lintHotspot(): Promise<LintHotspotBody> {
    const request: UnifiedRequest = {
      method: 'POST',
      path: `${ANALYZE_PREFIX}/lint-hotspot`,
      body: JSON.stringify({
        project_path: this.options.projectPath,
        format: 'json',
        include: this.options.filters.include,
        exclude: this.options.filters.exclude,
        toolchain: this.options.toolchain
      }),
      headers: { 'content-type': 'application/json' },
      extensions: { protocol: 'Cli', outputFormat: 'json', cliContext: { command: 'analyze lint-hotspot', args: [] } }
    };

    const response = await this.options.router.handle(request);
    if (response.status >= 400) {
      throw new Error(`lint-hotspot analysis failed: ${errorMessageOf(response)}`);
    }
    return lintHotspotBodySchema.parse(camelCaseKeys(JSON.parse(response.body), ['summary_by_file']));
  }
}
