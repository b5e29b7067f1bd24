import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, hasErrorCode } from '@refactor-gate/common';
import { detectToolchain, type Toolchain } from '@refactor-gate/domain';

export interface ProjectInfo {
  root: string;
  toolchain: Toolchain;
}

export async function resolveProject(base: string, projectPath: string, toolchain?: Toolchain): Promise<ProjectInfo> {
  const root = path.resolve(base, projectPath);

  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new ConfigurationError(`Project path is not a directory: ${root}`);
    }
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ConfigurationError(`Project path does not exist: ${root}`);
    }
    throw error;
  }

  return { root, toolchain: toolchain ?? detectToolchain(await readdir(root)) };
}

/** The nearest ancestor whose Cargo.toml declares a `[workspace]`, else the project itself. */
export async function findCargoWorkspaceRoot(
  projectRoot: string,
  readText: (file: string) => Promise<string | null>
): Promise<string> {
  let current = projectRoot;
  for (;;) {
    const manifest = await readText(path.join(current, 'Cargo.toml'));
    if (manifest !== null && /^\s*\[workspace\]/m.test(manifest)) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return projectRoot;
    }
    current = parent;
  }
}
