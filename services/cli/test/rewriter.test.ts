import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createLogger, type ProcessRunner, type RunOptions } from '@refactor-gate/common';
import type { FileRewritePlan, ViolationDetail } from '@refactor-gate/domain';

import { BuiltInRewriter, CLIPPY_FIX_ARGS } from '../src/rewriter.js';

const logger = createLogger({ level: 'silent' });

const idle: ProcessRunner = async () => ({ exitCode: 0, stdout: '', stderr: '', timedOut: false });

function plan(lintNames: string[]): FileRewritePlan {
  return {
    filePath: 'src/lib.rs',
    violations: lintNames.map((lintName, index) => ({
      lintName,
      line: index + 1,
      column: 1,
      message: lintName,
      fixStrategy: { kind: 'RemoveDeadCode' }
    })),
    astMetadata: { functions: [], imports: [], structureHash: '' },
    newContent: ''
  };
}

const needlessReturn: ViolationDetail = {
  file: 'src/lib.rs',
  line: 1,
  column: 28,
  endLine: 1,
  endColumn: 36,
  lintName: 'clippy::needless_return',
  message: 'unneeded `return` statement',
  severity: 'warning',
  machineApplicable: true
};

describe('BuiltInRewriter', () => {
  let root: string;
  let file: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'rewriter-'));
    await writeFile(path.join(root, 'Cargo.toml'), '[package]\nname = "demo"\n');
    file = path.join(root, 'lib.rs');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('applies templates then drops SATD comments', async () => {
    const content = 'pub fn id(x: i32) -> i32 { x }\n// TODO: fix\n';
    await writeFile(file, content);
    const rewriter = new BuiltInRewriter({
      templates: [{ fileSuffix: 'lib.rs', signature: 'pub fn id(', replacement: 'pub fn id(x: i32) -> i32 {\n    x + 0\n}' }],
      runner: idle,
      logger
    });

    const result = await rewriter.rewrite({ root, file: 'lib.rs', content, toolchain: 'rust', plan: plan(['satd_item']), violations: [] });

    expect(result).toEqual({
      content: 'pub fn id(x: i32) -> i32 {\n    x + 0\n}\n',
      changed: true,
      applied: ['template pub fn id(', 'satd removal']
    });
    expect(await readFile(file, 'utf8')).toBe(result.content);
  });

  it('appends ignored test stubs when the plan asks for tests', async () => {
    const content = 'pub fn id(x: i32) -> i32 { x }\n';
    await writeFile(file, content);
    const rewriter = new BuiltInRewriter({ templates: [], runner: idle, logger });
    const addTests: FileRewritePlan = {
      ...plan([]),
      violations: [{ lintName: 'missing_tests', line: 1, column: 1, message: 'Coverage 40.0% is below the minimum of 80%', fixStrategy: { kind: 'AddTest' } }]
    };

    const result = await rewriter.rewrite({ root, file: 'lib.rs', content, toolchain: 'rust', plan: addTests, violations: [] });

    expect(result.applied).toEqual(['test stubs for id']);
    expect(result.changed).toBe(true);
    expect(await readFile(file, 'utf8')).toBe(
      `${content}\n#[cfg(test)]\nmod tests {\n    use super::*;\n\n    #[test]\n    #[ignore = "exercise id"]\n    fn test_id() {}\n}\n`
    );
  });

  it('runs clippy --fix for machine-applicable lints and rereads the file', async () => {
    await writeFile(file, 'pub fn id(x: i32) -> i32 { return x; }\n');
    const calls: Array<{ command: string; args: readonly string[]; options?: RunOptions }> = [];
    const runner: ProcessRunner = async (command, args, options) => {
      calls.push({ command, args, options });
      await writeFile(file, 'pub fn id(x: i32) -> i32 { x }\n');
      return { exitCode: 0, stdout: '', stderr: '', timedOut: false };
    };
    const rewriter = new BuiltInRewriter({ templates: [], runner, logger });

    const result = await rewriter.rewrite({
      root,
      file: 'lib.rs',
      content: 'pub fn id(x: i32) -> i32 { return x; }\n',
      toolchain: 'rust',
      plan: plan(['clippy::needless_return']),
      violations: [needlessReturn]
    });

    expect(result).toEqual({ content: 'pub fn id(x: i32) -> i32 { x }\n', changed: true, applied: ['cargo clippy --fix'] });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.command).toBe('cargo');
    expect(calls[0]?.args).toEqual(CLIPPY_FIX_ARGS);
  });

  it('leaves the file alone when clippy --fix fails', async () => {
    const content = 'pub fn id(x: i32) -> i32 { return x; }\n';
    await writeFile(file, content);
    const failing: ProcessRunner = async () => ({ exitCode: 101, stdout: '', stderr: 'error: could not compile', timedOut: false });
    const rewriter = new BuiltInRewriter({ templates: [], runner: failing, logger });

    const result = await rewriter.rewrite({
      root,
      file: 'lib.rs',
      content,
      toolchain: 'rust',
      plan: plan(['clippy::needless_return']),
      violations: [needlessReturn]
    });

    expect(result).toEqual({ content, changed: false, applied: [] });
  });
});
