import { mkdir, readdir, rm } from 'node:fs/promises';
import path from 'node:path';

import type { CommandResult, RunOptions } from '@refactor-gate/common';
import {
  coverageForFile,
  normalizePath,
  parseGrcovFiles,
  parseLlvmCovReport,
  parseTarpaulinSummary,
  projectCoverage,
  type CoverageReport
} from '@refactor-gate/domain';
import { z } from 'zod';

import type { AnalysisDeps, ProjectSnapshot } from '../deps.js';

export type CoverageSource = 'llvm' | 'grcov' | 'tarpaulin' | 'none';

export interface CoverageAttempt {
  tool: string;
  exitCode: number;
  timedOut: boolean;
}

export interface CoverageMeasurement {
  source: CoverageSource;
  file: string | null;
  percent: number;
  report: CoverageReport;
  attempts: CoverageAttempt[];
}

export interface CoverageRequest {
  /** Project-relative file; omitted for the whole project. */
  file?: string | null;
  coverageDir: string;
}

const artifactSchema = z.object({
  reason: z.literal('compiler-artifact'),
  executable: z.string().nullish(),
  profile: z.object({ test: z.boolean() })
});

export function parseTestExecutables(output: string): string[] {
  const executables: string[] = [];
  for (const line of output.split('\n')) {
    if (!line.startsWith('{')) {
      continue;
    }
    try {
      const parsed = artifactSchema.safeParse(JSON.parse(line));
      if (parsed.success && parsed.data.profile.test && parsed.data.executable) {
        executables.push(parsed.data.executable);
      }
    } catch {
      continue;
    }
  }
  return executables;
}

class DeadlineExceeded extends Error {
  constructor() {
    super('coverage time budget exhausted');
    this.name = 'DeadlineExceeded';
  }
}

/**
 * Per-file or project coverage: LLVM source-based coverage first, then
 * grcov, then cargo-tarpaulin. Every tool shares one soft time budget and a
 * total failure reports 0%.
 */
export class CoverageSampler {
  constructor(
    private readonly deps: Pick<AnalysisDeps, 'runner' | 'logger' | 'coverageTimeoutMs'>,
    private readonly clock: () => number = Date.now
  ) {}

  async measure(snapshot: ProjectSnapshot, request: CoverageRequest): Promise<CoverageMeasurement> {
    const file = request.file ? normalizePath(path.isAbsolute(request.file) ? path.relative(snapshot.root, request.file) : request.file) : null;
    const attempts: CoverageAttempt[] = [];

    if (snapshot.toolchain !== 'rust') {
      this.deps.logger.warn({ toolchain: snapshot.toolchain }, 'coverage sampling needs a cargo project; reporting 0%');
      return { source: 'none', file, percent: 0, report: { totalPercent: null, byFile: {} }, attempts };
    }

    const deadline = this.clock() + this.deps.coverageTimeoutMs;
    const run = async (tool: string, command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> => {
      const remaining = deadline - this.clock();
      if (remaining <= 0) {
        throw new DeadlineExceeded();
      }
      const result = await this.deps.runner(command, args, { cwd: snapshot.root, ...options, timeoutMs: remaining });
      attempts.push({ tool, exitCode: result.exitCode, timedOut: result.timedOut });
      return result;
    };

    const strategies: Array<[CoverageSource, () => Promise<CoverageReport | null>]> = [
      ['llvm', () => this.llvm(run, request.coverageDir, file)],
      ['grcov', () => this.grcov(run, request.coverageDir)],
      ['tarpaulin', () => this.tarpaulin(run, file)]
    ];

    for (const [source, strategy] of strategies) {
      let report: CoverageReport | null;
      try {
        report = await strategy();
      } catch (error) {
        if (!(error instanceof DeadlineExceeded)) {
          throw error;
        }
        this.deps.logger.warn({ attempts }, 'coverage time budget exhausted; reporting 0%');
        break;
      }
      const percent = report ? this.percentOf(report, file) : null;
      if (report && percent !== null) {
        return { source, file, percent, report, attempts };
      }
      this.deps.logger.warn({ tool: source, attempts: attempts.length }, 'coverage tool produced no usable report');
    }

    this.deps.logger.warn({ file, attempts }, 'coverage unavailable; reporting 0%');
    return { source: 'none', file, percent: 0, report: { totalPercent: null, byFile: {} }, attempts };
  }

  private percentOf(report: CoverageReport, file: string | null): number | null {
    if (file) {
      return coverageForFile(report, file);
    }
    return Object.keys(report.byFile).length === 0 && report.totalPercent === null ? null : projectCoverage(report);
  }

  private async llvm(
    run: (tool: string, command: string, args: string[], options?: RunOptions) => Promise<CommandResult>,
    coverageDir: string,
    file: string | null
  ): Promise<CoverageReport | null> {
    await rm(coverageDir, { recursive: true, force: true });
    await mkdir(coverageDir, { recursive: true });
    const env = {
      RUSTFLAGS: '-C instrument-coverage',
      LLVM_PROFILE_FILE: path.join(coverageDir, '%p-%m.profraw')
    };

    const build = await run('cargo test --no-run', 'cargo', ['test', '--no-run', '--message-format=json'], { env });
    const executables = parseTestExecutables(build.stdout);
    const [binary, ...others] = executables;
    if (build.exitCode !== 0 || !binary) {
      return null;
    }

    const tests = await run('cargo test', 'cargo', ['test', '--quiet', '--', '--test-threads=4'], { env });
    if (tests.exitCode !== 0) {
      this.deps.logger.warn({ exitCode: tests.exitCode }, 'some tests failed; coverage may be incomplete');
    }

    const profiles = (await readdir(coverageDir)).filter((name) => name.endsWith('.profraw')).map((name) => path.join(coverageDir, name));
    if (profiles.length === 0) {
      return null;
    }

    const merged = path.join(coverageDir, 'merged.profdata');
    const merge = await run('llvm-profdata', 'llvm-profdata', ['merge', '-sparse', ...profiles, '-o', merged]);
    if (merge.exitCode !== 0) {
      return null;
    }

    const args = [
      'report',
      binary,
      ...others.flatMap((object) => ['-object', object]),
      `--instr-profile=${merged}`,
      '--show-region-summary=false',
      ...(file ? [file] : [])
    ];
    const report = await run('llvm-cov', 'llvm-cov', args);
    return report.exitCode === 0 ? parseLlvmCovReport(report.stdout) : null;
  }

  private async grcov(
    run: (tool: string, command: string, args: string[], options?: RunOptions) => Promise<CommandResult>,
    coverageDir: string
  ): Promise<CoverageReport | null> {
    const result = await run('grcov', 'grcov', [
      coverageDir,
      '--binary-path',
      './target/debug/',
      '--source-dir',
      '.',
      '--output-type',
      'files',
      '--ignore',
      'tests/*',
      '--ignore',
      'target/*'
    ]);
    return result.exitCode === 0 ? parseGrcovFiles(result.stdout) : null;
  }

  private async tarpaulin(
    run: (tool: string, command: string, args: string[], options?: RunOptions) => Promise<CommandResult>,
    file: string | null
  ): Promise<CoverageReport | null> {
    const args = ['tarpaulin', '--print-summary', '--skip-clean', ...(file ? ['--include-files', file] : []), '--timeout', '30'];
    const result = await run('cargo tarpaulin', 'cargo', args);
    return result.exitCode === 0 ? parseTarpaulinSummary(`${result.stdout}\n${result.stderr}`) : null;
  }
}
