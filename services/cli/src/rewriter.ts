import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { CLIPPY_FLAGS, findCargoWorkspaceRoot } from '@refactor-gate/analysis';
import { readFileIfExists, writeFileAtomic, type Logger, type ProcessRunner } from '@refactor-gate/common';
import {
  appendTestStubs,
  applyTemplates,
  removeSatdComments,
  type FileRewritePlan,
  type RewriteTemplate,
  type Toolchain,
  type ViolationDetail
} from '@refactor-gate/domain';

export interface RewriteInput {
  root: string;
  file: string;
  content: string;
  toolchain: Toolchain;
  plan: FileRewritePlan;
  violations: readonly ViolationDetail[];
}

export interface RewriteOutcome {
  content: string;
  changed: boolean;
  applied: string[];
}

export interface Rewriter {
  rewrite(input: RewriteInput): Promise<RewriteOutcome>;
}

export const CLIPPY_FIX_ARGS = ['clippy', '--fix', '--allow-dirty', '--', ...CLIPPY_FLAGS];
export const CLIPPY_FIX_LABEL = 'cargo clippy --fix';

export interface BuiltInRewriterOptions {
  templates: readonly RewriteTemplate[];
  runner: ProcessRunner;
  logger: Logger;
}

/** Curated templates, SATD line removal, test stubs and `cargo clippy --fix`, applied in that order. */
export class BuiltInRewriter implements Rewriter {
  constructor(private readonly options: BuiltInRewriterOptions) {}

  async rewrite(input: RewriteInput): Promise<RewriteOutcome> {
    const filePath = path.join(input.root, input.file);
    const applied: string[] = [];

    const templated = applyTemplates(input.file, input.content, this.options.templates);
    applied.push(...templated.applied.map((template) => `template ${template.signature}`));
    let content = templated.content;

    if (input.plan.violations.some((violation) => violation.lintName === 'satd_item')) {
      const cleaned = removeSatdComments(content, input.toolchain);
      if (cleaned !== content) {
        applied.push('satd removal');
        content = cleaned;
      }
    }

    if (input.plan.violations.some((violation) => violation.fixStrategy.kind === 'AddTest')) {
      const stubbed = appendTestStubs(content, input.toolchain);
      if (stubbed.added.length > 0) {
        applied.push(`test stubs for ${stubbed.added.join(', ')}`);
        content = stubbed.content;
      }
    }

    if (content !== input.content) {
      await writeFileAtomic(filePath, content);
    }

    if (input.toolchain === 'rust' && input.violations.some((violation) => violation.machineApplicable)) {
      const cwd = await findCargoWorkspaceRoot(input.root, readFileIfExists);
      const result = await this.options.runner('cargo', CLIPPY_FIX_ARGS, { cwd });
      if (result.exitCode === 0) {
        applied.push(CLIPPY_FIX_LABEL);
        content = await readFile(filePath, 'utf8');
      } else {
        this.options.logger.warn({ tool: 'cargo clippy --fix', exitCode: result.exitCode }, 'automatic lint fixes failed');
      }
    }

    return { content, changed: content !== input.content, applied };
  }
}
