import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { hasErrorCode } from '@refactor-gate/common';
import {
  isSourceFile,
  matchesAny,
  normalizePath,
  passesFilters,
  VENDOR_DIRECTORIES,
  type SelectionFilters,
  type SourceDocument,
  type Toolchain
} from '@refactor-gate/domain';

import { mapWithConcurrency } from './concurrency.js';

export interface DiscoveryOptions {
  root: string;
  toolchain: Toolchain;
  filters: SelectionFilters;
}

function skipDirectory(relative: string, name: string, filters: SelectionFilters): boolean {
  if (!VENDOR_DIRECTORIES.includes(name) && !name.startsWith('.')) {
    return false;
  }
  return !(filters.include.length > 0 && matchesAny(`${relative}/`, filters.include));
}

/** Source files under `root`, relative and sorted, after the vendor skip and include/exclude filters. */
export async function discoverSourceFiles(options: DiscoveryOptions): Promise<string[]> {
  const found: string[] = [];

  const visit = async (relativeDir: string) => {
    const entries = await readdir(path.join(options.root, relativeDir), { withFileTypes: true }).catch((error: unknown) => {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EACCES')) {
        return null;
      }
      throw error;
    });
    if (!entries) {
      return;
    }

    for (const entry of entries) {
      const relative = normalizePath(relativeDir ? `${relativeDir}/${entry.name}` : entry.name);
      if (entry.isDirectory()) {
        if (!skipDirectory(relative, entry.name, options.filters)) {
          await visit(relative);
        }
      } else if (entry.isFile() && isSourceFile(relative, options.toolchain) && passesFilters(relative, options.filters)) {
        found.push(relative);
      }
    }
  };

  await visit('');
  return found.sort();
}

export interface LoadOptions extends DiscoveryOptions {
  concurrency: number;
}

export async function loadSourceDocuments(options: LoadOptions): Promise<SourceDocument[]> {
  const files = await discoverSourceFiles(options);
  return mapWithConcurrency(files, options.concurrency, async (file) => ({
    path: file,
    content: await readFile(path.join(options.root, file), 'utf8')
  }));
}
