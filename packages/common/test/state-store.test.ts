import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { writeFileAtomic } from '../src/fs.js';
import { createLogger } from '../src/logger.js';
import { createInitialState, StateStore } from '../src/state-store.js';

describe('StateStore', () => {
  let cacheDir: string;
  const logger = createLogger({ level: 'silent' });

  beforeEach(async () => {
    cacheDir = await mkdtemp(path.join(os.tmpdir(), 'refactor-gate-state-'));
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  it('returns null before the first save', async () => {
    expect(await new StateStore(cacheDir, logger).load()).toBeNull();
  });

  it('round-trips the state through snake_case JSON', async () => {
    const store = new StateStore(cacheDir, logger);
    const state = {
      ...createInitialState(cacheDir, new Date('2026-03-01T10:00:00.000Z')),
      iteration: 3,
      filesCompleted: ['src/a.rs'],
      lastTarget: 'src/b.rs'
    };

    await store.save(state);

    const raw = JSON.parse(await readFile(store.statePath, 'utf8'));
    expect(raw.files_completed).toEqual(['src/a.rs']);
    expect(raw.quality_metrics.coverage_percent).toBe(0);
    expect(raw.progress.current_phase).toBe('Initialization');
    expect(await store.load()).toEqual(state);
  });

  it('starts fresh from an invalid file', async () => {
    const store = new StateStore(cacheDir, logger);
    await writeFile(store.statePath, '{"iteration": "three"}');

    expect(await store.load()).toBeNull();
  });

  it('rejects a state that repeats a completed file', async () => {
    const store = new StateStore(cacheDir, logger);
    await store.save({ ...createInitialState(cacheDir), filesCompleted: ['src/a.rs', 'src/a.rs'] });

    expect(await store.load()).toBeNull();
  });
});

describe('writeFileAtomic', () => {
  it('leaves only the target file behind', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'refactor-gate-atomic-'));
    try {
      const target = path.join(dir, 'nested', 'out.txt');

      await writeFileAtomic(target, 'first');
      await writeFileAtomic(target, 'second');

      expect(await readFile(target, 'utf8')).toBe('second');
      expect(await readdir(path.dirname(target))).toEqual(['out.txt']);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
