import { access, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createExecutionContext, createLogger, type ProcessRunner } from '@refactor-gate/common';
import { Router, decodeCli, decodeHttp, decodeMcp, listMcpTools } from '@refactor-gate/protocol';

import { registerAnalysisHandlers } from '../src/handlers.js';
import { AnalysisService } from '../src/service.js';
import { loadRewriteTemplates } from '../src/templates.js';

const logger = createLogger({ level: 'silent' });
const fixedNow = () => new Date('2026-10-18T12:00:00.000Z');

const noProcesses: ProcessRunner = async (command) => {
  throw new Error(`unexpected process: ${command}`);
};

const toolsMissing: ProcessRunner = async () => ({ exitCode: 127, stdout: '', stderr: 'not found', timedOut: false });

describe('analysis handlers', () => {
  let dir: string;
  let router: Router;
  let templatesPath: string | null;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'handlers-'));
    await mkdir(path.join(dir, 'src'));
    await writeFile(path.join(dir, 'Cargo.toml'), '[package]\nname = "demo"\nversion = "0.1.0"\n');
    await writeFile(path.join(dir, 'src', 'lib.rs'), 'pub fn id(x: i32) -> i32 { x }\n\n// TODO: document id\n');
    templatesPath = null;

    const service = new AnalysisService(
      { ctx: createExecutionContext({ projectPath: dir }), runner: noProcesses, logger, concurrency: 2, coverageTimeoutMs: 1000 },
      fixedNow
    );
    router = registerAnalysisHandlers(new Router(logger), service, { templates: () => loadRewriteTemplates(templatesPath) });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the same complexity document over CLI, HTTP and MCP', async () => {
    const cli = await router.handle(
      decodeCli({ command: ['analyze', 'complexity'], args: [], flags: { 'project-path': '.', format: 'json' } })
    );
    const http = await router.handle(
      decodeHttp({
        method: 'POST',
        url: '/api/v1/analyze/complexity',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ project_path: '.', format: 'json' })
      })
    );
    const mcp = await router.handle(
      decodeMcp({ jsonrpc: '2.0', id: 1, method: 'analyze_complexity', params: { project_path: '.', format: 'json' } })
    );

    expect(cli.status).toBe(200);
    expect(http.body).toBe(cli.body);
    expect(mcp.body).toBe(cli.body);
    expect(JSON.parse(cli.body)).toMatchObject({
      generated_at: '2026-10-18T12:00:00.000Z',
      project_path: dir,
      threshold: 10,
      summary: { total_files: 1, total_functions: 1, functions_over_threshold: 0 }
    });
  });

  it('renders SATD as markdown', async () => {
    const response = await router.handle(
      decodeCli({ command: ['analyze', 'satd'], args: [], flags: { 'project-path': '.', format: 'markdown' } })
    );

    expect(response.headers['content-type']).toBe('text/markdown; charset=utf-8');
    expect(response.body.split('\n')[0]).toBe('# Self-Admitted Technical Debt');
    expect(response.body).toContain('- Items: 1');
  });

  it('rejects a body without a project path', async () => {
    const response = await router.handle(
      decodeHttp({ method: 'POST', url: '/api/v1/analyze/tdg', headers: {}, body: JSON.stringify({ format: 'json' }) })
    );

    expect(response.status).toBe(400);
    expect(JSON.parse(response.body)).toEqual({
      error: 'Invalid request: project_path: Required',
      data: { issues: ['project_path: Required'] }
    });
  });

  it('maps a missing project to a client error', async () => {
    const response = await router.handle(
      decodeHttp({ method: 'POST', url: '/api/v1/analyze/satd', headers: {}, body: JSON.stringify({ project_path: 'missing' }) })
    );

    expect(response.status).toBe(400);
    expect(JSON.parse(response.body)).toEqual({ error: `Project path does not exist: ${path.join(dir, 'missing')}` });
  });

  it('lists configured rewrite templates', async () => {
    templatesPath = path.join(dir, 'templates.json');
    await writeFile(
      templatesPath,
      JSON.stringify({ templates: [{ file_suffix: 'src/lib.rs', signature: 'pub fn id(', replacement: ['pub fn id(x: i32) -> i32 {', '    x', '}'] }] })
    );

    const response = await router.handle(decodeHttp({ method: 'GET', url: '/api/v1/templates', headers: {}, body: '' }));

    expect(JSON.parse(response.body)).toEqual({
      generated_at: '2026-10-18T12:00:00.000Z',
      source: templatesPath,
      templates: [{ file_suffix: 'src/lib.rs', signature: 'pub fn id(', replacement_lines: 3 }]
    });
  });

  it('registers one route per analyzer', () => {
    expect(router.list().map((route) => `${route.method} ${route.path}`)).toEqual([
      'POST /api/v1/analyze/complexity',
      'POST /api/v1/analyze/satd',
      'POST /api/v1/analyze/dead-code',
      'POST /api/v1/analyze/churn',
      'POST /api/v1/analyze/tdg',
      'POST /api/v1/analyze/deep-context',
      'POST /api/v1/analyze/lint-hotspot',
      'POST /api/v1/analyze/compilation-errors',
      'POST /api/v1/analyze/coverage',
      'GET /api/v1/templates'
    ]);
  });

  it('advertises argument schemas for every MCP tool', () => {
    const tools = new Map(listMcpTools(router).map((tool) => [tool.name, tool.inputSchema]));

    expect(tools.get('analyze_coverage')?.required).toEqual(['project_path']);
    expect(Object.keys(tools.get('analyze_coverage')?.properties ?? {})).toEqual([
      'project_path',
      'format',
      'include',
      'exclude',
      'toolchain',
      'file'
    ]);
    expect(tools.get('analyze_churn')?.properties.days).toEqual({
      type: 'integer',
      minimum: 1,
      default: 30,
      description: 'History window in days'
    });
    expect(tools.get('list_templates')?.required).toBeUndefined();
  });

  describe('coverage under the cache lock', () => {
    const coverageRequest = () =>
      decodeHttp({
        method: 'POST',
        url: '/api/v1/analyze/coverage',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ project_path: '.' })
      });

    const lockedRouter = () => {
      const service = new AnalysisService(
        {
          ctx: createExecutionContext({ projectPath: dir }),
          runner: toolsMissing,
          logger,
          concurrency: 1,
          coverageTimeoutMs: 1000,
          coverageLock: { staleMs: 60_000 }
        },
        fixedNow
      );
      return registerAnalysisHandlers(new Router(logger), service, { templates: () => loadRewriteTemplates(null) });
    };

    it('refuses to sample while another run holds the lock', async () => {
      const lockPath = path.join(dir, '.refactor-gate', '.lock');
      await mkdir(path.dirname(lockPath));
      await writeFile(lockPath, JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));

      const response = await lockedRouter().handle(coverageRequest());

      expect(response.status).toBe(409);
      expect(JSON.parse(response.body)).toEqual({ error: `Cache is locked by process ${process.pid} (${lockPath})` });
    });

    it('takes and releases the lock around a sample', async () => {
      const response = await lockedRouter().handle(coverageRequest());

      expect(response.status).toBe(200);
      expect(JSON.parse(response.body)).toMatchObject({ source: 'none', percent: 0 });
      await expect(access(path.join(dir, '.refactor-gate', '.lock'))).rejects.toThrow();
    });
  });
});
