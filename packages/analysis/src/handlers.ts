import { snakeCaseKeys } from '@refactor-gate/common';
import { OUTPUT_FORMATS, jsonHandler, type HandlerResult, type Router, type ToolInputSchema } from '@refactor-gate/protocol';
import { z } from 'zod';

import { DEFAULT_CHURN_DAYS } from './analyzers/churn.js';
import type { ProjectSnapshot } from './deps.js';
import {
  churnView,
  compilationErrorsView,
  complexityView,
  coverageView,
  deadCodeView,
  deepContextView,
  formatReport,
  lintHotspotView,
  satdView,
  tdgView,
  type ReportMeta
} from './formatters.js';
import { AnalysisService, DEFAULT_COMPLEXITY_THRESHOLD, type SnapshotRequest } from './service.js';
import type { TemplateSource } from './templates.js';

export const ANALYZE_PREFIX = '/api/v1/analyze';
export const TEMPLATES_PATH = '/api/v1/templates';

const patternList = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => {
    if (value === undefined) {
      return [];
    }
    const list = Array.isArray(value) ? value : value.split(',');
    return list.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
  });

const TOOLCHAINS = ['rust', 'deno', 'python-uv', 'go'] as const;

export const analyzeBodySchema = z.object({
  project_path: z.string().min(1),
  format: z.enum(OUTPUT_FORMATS).default('json'),
  include: patternList,
  exclude: patternList,
  toolchain: z.enum(TOOLCHAINS).optional()
});

const threshold = z.coerce.number().int().positive().default(DEFAULT_COMPLEXITY_THRESHOLD);
const days = z.coerce.number().int().positive().default(DEFAULT_CHURN_DAYS);

const complexityBodySchema = analyzeBodySchema.extend({ threshold });
const churnBodySchema = analyzeBodySchema.extend({ days });
const historyBodySchema = analyzeBodySchema.extend({ threshold, days });
const coverageBodySchema = analyzeBodySchema.extend({ file: z.string().min(1).optional() });

const patternListJson = {
  type: 'array',
  items: { type: 'string' },
  description: 'Glob patterns; a comma-separated string is also accepted'
};

/** Argument schema advertised to MCP clients; the zod schemas above stay the validators. */
function toolInputSchema(extra: Record<string, unknown> = {}): ToolInputSchema {
  return {
    type: 'object',
    properties: {
      project_path: { type: 'string', description: 'Project root, relative to the server working directory' },
      format: { type: 'string', enum: [...OUTPUT_FORMATS], default: 'json' },
      include: patternListJson,
      exclude: patternListJson,
      toolchain: { type: 'string', enum: [...TOOLCHAINS] },
      ...extra
    },
    required: ['project_path']
  };
}

const thresholdJson = { type: 'integer', minimum: 1, default: DEFAULT_COMPLEXITY_THRESHOLD };
const daysJson = { type: 'integer', minimum: 1, default: DEFAULT_CHURN_DAYS, description: 'History window in days' };
const fileJson = { type: 'string', description: 'Limit coverage to one file' };

const templatesQuerySchema = z.object({ format: z.enum(OUTPUT_FORMATS).default('json') });

type AnalyzeBody = z.output<typeof analyzeBodySchema>;

function snapshotRequest(body: AnalyzeBody): SnapshotRequest {
  return {
    projectPath: body.project_path,
    filters: { include: body.include, exclude: body.exclude },
    toolchain: body.toolchain
  };
}

export interface AnalysisHandlerOptions {
  templates: () => Promise<TemplateSource>;
}

/** Registers every analyzer under `/api/v1/analyze/<kind>` plus the template listing. */
export function registerAnalysisHandlers(router: Router, service: AnalysisService, options: AnalysisHandlerOptions): Router {
  const meta = (snapshot: ProjectSnapshot): ReportMeta => ({ projectPath: snapshot.root, generatedAt: service.generatedAt() });

  const analyze = <S extends z.ZodType<AnalyzeBody, z.ZodTypeDef, unknown>>(
    kind: string,
    description: string,
    schema: S,
    inputSchema: ToolInputSchema,
    run: (body: z.output<S>, snapshot: ProjectSnapshot, meta: ReportMeta) => Promise<HandlerResult>
  ) => {
    router.register({
      method: 'POST',
      path: `${ANALYZE_PREFIX}/${kind}`,
      description,
      inputSchema,
      handler: jsonHandler(schema, async (body) => {
        const snapshot = await service.snapshot(snapshotRequest(body));
        return run(body, snapshot, meta(snapshot));
      })
    });
  };

  analyze(
    'complexity',
    'Cyclomatic and cognitive complexity per function',
    complexityBodySchema,
    toolInputSchema({ threshold: thresholdJson }),
    async (body, snapshot, info) =>
      formatReport(complexityView, service.complexity(snapshot, body.threshold), info, body.format)
  );

  analyze('satd', 'Self-admitted technical debt comments', analyzeBodySchema, toolInputSchema(), async (body, snapshot, info) =>
    formatReport(satdView, service.satd(snapshot), info, body.format)
  );

  analyze(
    'dead-code',
    'Unreferenced functions and types and unreachable statements',
    analyzeBodySchema,
    toolInputSchema(),
    async (body, snapshot, info) =>
      formatReport(deadCodeView, service.deadCode(snapshot), info, body.format)
  );

  analyze(
    'churn',
    'Git change frequency per file',
    churnBodySchema,
    toolInputSchema({ days: daysJson }),
    async (body, snapshot, info) =>
      formatReport(churnView, await service.churn(snapshot, body.days), info, body.format)
  );

  analyze(
    'tdg',
    'Technical debt gradient per file',
    historyBodySchema,
    toolInputSchema({ threshold: thresholdJson, days: daysJson }),
    async (body, snapshot, info) =>
      formatReport(tdgView, await service.tdg(snapshot, body), info, body.format)
  );

  analyze(
    'deep-context',
    'Aggregated project context with defect scores and recommendations',
    historyBodySchema,
    toolInputSchema({ threshold: thresholdJson, days: daysJson }),
    async (body, snapshot, info) =>
      formatReport(deepContextView, await service.deepContext(snapshot, body), info, body.format)
  );

  analyze(
    'lint-hotspot',
    'Clippy violations grouped by file with the densest file as hotspot',
    analyzeBodySchema,
    toolInputSchema(),
    async (body, snapshot, info) =>
      formatReport(lintHotspotView, await service.lintHotspot(snapshot), info, body.format)
  );

  analyze(
    'compilation-errors',
    'Compiler errors grouped by file',
    analyzeBodySchema,
    toolInputSchema(),
    async (body, snapshot, info) =>
      formatReport(compilationErrorsView, await service.compilationErrors(snapshot), info, body.format)
  );

  analyze(
    'coverage',
    'Line coverage for the project or one file',
    coverageBodySchema,
    toolInputSchema({ file: fileJson }),
    async (body, snapshot, info) =>
      formatReport(coverageView, await service.coverage(snapshot, body.file), info, body.format)
  );

  router.register({
    method: 'GET',
    path: TEMPLATES_PATH,
    description: 'Configured rewrite templates',
    inputSchema: { type: 'object', properties: { format: { type: 'string', enum: [...OUTPUT_FORMATS], default: 'json' } } },
    handler: jsonHandler(templatesQuerySchema, async (query) => {
      const source = await options.templates();
      if (query.format === 'json' || query.format === 'sarif') {
        return {
          json: snakeCaseKeys({
            generatedAt: service.generatedAt(),
            source: source.path,
            templates: source.templates.map((template) => ({
              fileSuffix: template.fileSuffix,
              signature: template.signature,
              replacementLines: template.replacement.split('\n').length
            }))
          })
        };
      }
      const lines = source.templates.map((template) => `${template.fileSuffix}: ${template.signature}`);
      return { text: lines.length === 0 ? 'No rewrite templates configured.' : lines.join('\n') };
    })
  });

  return router;
}
