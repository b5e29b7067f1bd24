import path from 'node:path';

import {
  computeProgress,
  emptyMetrics,
  EXTREME_QUALITY_PROFILE,
  REFACTOR_PHASES,
  type RefactorState
} from '@refactor-gate/domain';
import { z } from 'zod';

import { camelCaseKeys, snakeCaseKeys } from './case.js';
import { readFileIfExists, writeFileAtomic } from './fs.js';
import type { Logger } from './logger.js';

export const STATE_FILENAME = 'refactor-state.json';
export const CONTEXT_FILENAME = 'deep_context.md';

const metricsSchema = z.object({
  totalViolations: z.number().int().nonnegative(),
  filesWithIssues: z.number().int().nonnegative(),
  totalFiles: z.number().int().nonnegative(),
  coveragePercent: z.number().min(0).max(100),
  maxComplexity: z.number().int().nonnegative(),
  functionsWithHighComplexity: z.number().int().nonnegative(),
  totalFunctions: z.number().int().nonnegative(),
  satdCount: z.number().int().nonnegative()
});

const progressSchema = z.object({
  overallCompletionPercent: z.number(),
  lintCompletionPercent: z.number(),
  complexityCompletionPercent: z.number(),
  satdCompletionPercent: z.number(),
  coverageCompletionPercent: z.number(),
  filesCompleted: z.number().int().nonnegative(),
  filesRemaining: z.number().int().nonnegative(),
  estimatedTimeRemainingMinutes: z.number(),
  qualityGatesPassed: z.array(z.string()),
  qualityGatesRemaining: z.array(z.string()),
  currentPhase: z.enum(REFACTOR_PHASES)
});

const stateSchema = z.object({
  iteration: z.number().int().nonnegative(),
  startTime: z.string(),
  contextGenerated: z.boolean(),
  contextPath: z.string(),
  currentFile: z.string().nullable(),
  filesCompleted: z.array(z.string()).refine((files) => new Set(files).size === files.length, {
    message: 'files_completed must not repeat a path'
  }),
  qualityMetrics: metricsSchema,
  progress: progressSchema,
  satdBaseline: z.number().int().nonnegative().default(0),
  lastTarget: z.string().nullable().default(null),
  lastMetrics: metricsSchema.nullable().default(null)
});

export function createInitialState(cacheDir: string, now: Date = new Date()): RefactorState {
  const metrics = emptyMetrics();
  return {
    iteration: 0,
    startTime: now.toISOString(),
    contextGenerated: false,
    contextPath: path.join(cacheDir, CONTEXT_FILENAME),
    currentFile: null,
    filesCompleted: [],
    qualityMetrics: metrics,
    progress: computeProgress({
      metrics,
      profile: EXTREME_QUALITY_PROFILE,
      satdBaseline: 0,
      filesCompleted: 0,
      elapsedSeconds: 0,
      phase: 'Initialization'
    }),
    satdBaseline: 0,
    lastTarget: null,
    lastMetrics: null
  };
}

/** `<cache>/refactor-state.json`, stored with snake_case keys and replaced whole on every save. */
export class StateStore {
  readonly statePath: string;

  constructor(
    cacheDir: string,
    private readonly logger: Logger
  ) {
    this.statePath = path.join(cacheDir, STATE_FILENAME);
  }

  async load(): Promise<RefactorState | null> {
    const raw = await readFileIfExists(this.statePath);
    if (raw === null) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ statePath: this.statePath, err: error }, 'state file is not valid JSON; starting fresh');
      return null;
    }

    const parsed = stateSchema.safeParse(camelCaseKeys(json));
    if (!parsed.success) {
      this.logger.warn(
        { statePath: this.statePath, issues: parsed.error.issues.map((issue) => issue.message) },
        'state file does not match the expected shape; starting fresh'
      );
      return null;
    }

    return parsed.data;
  }

  async save(state: RefactorState): Promise<void> {
    await writeFileAtomic(this.statePath, `${JSON.stringify(snakeCaseKeys(state), null, 2)}\n`);
  }
}
