import { findCargoWorkspaceRoot } from '@refactor-gate/analysis';
import { readFileIfExists, type ProcessRunner } from '@refactor-gate/common';
import type { Toolchain } from '@refactor-gate/domain';

export interface BuildCheck {
  ok: boolean;
  skipped: boolean;
  output: string;
}

export type BuildVerifier = () => Promise<BuildCheck>;

/** `cargo check` in the workspace root; other toolchains have no build step to run. */
export function createBuildVerifier(runner: ProcessRunner, projectRoot: string, toolchain: Toolchain): BuildVerifier {
  return async () => {
    if (toolchain !== 'rust') {
      return { ok: true, skipped: true, output: '' };
    }
    const cwd = await findCargoWorkspaceRoot(projectRoot, readFileIfExists);
    const result = await runner('cargo', ['check'], { cwd });
    return { ok: result.exitCode === 0, skipped: false, output: `${result.stdout}${result.stderr}` };
  };
}
