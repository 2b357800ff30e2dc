import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { isRecord } from '../utils/guards.js';
import type { AchievementProgress, Progress } from '../types/index.js';

/** Persisted achievement store: achievement id → { counter, unlocked }. */
export interface ProgressStore {
  /** `null` when nothing has been stored yet. */
  load(): Promise<Progress | null>;
  save(progress: Progress): Promise<void>;
}

/** Keep only well-formed entries of a stored progress document. */
export function parseProgress(value: unknown): Progress {
  const source = isRecord(value) && isRecord(value.achievements) ? value.achievements : value;
  const progress: Progress = {};
  if (!isRecord(source)) return progress;
  for (const [id, entry] of Object.entries(source)) {
    if (!isRecord(entry)) continue;
    const counter = typeof entry.counter === 'number' && Number.isFinite(entry.counter) ? Math.max(0, entry.counter) : 0;
    const item: AchievementProgress = { counter, unlocked: entry.unlocked === true };
    if (typeof entry.unlockedAt === 'string') item.unlockedAt = entry.unlockedAt;
    progress[id] = item;
  }
  return progress;
}

/** Progress as a JSON file, replaced atomically on each save. */
export class JsonProgressStore implements ProgressStore {
  constructor(private readonly path: string) {}

  async load(): Promise<Progress | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isRecord(err) && err.code === 'ENOENT') return null;
      throw err;
    }
    return parseProgress(JSON.parse(raw));
  }

  async save(progress: Progress): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    const document = { version: 1, savedAt: new Date().toISOString(), achievements: progress };
    await writeFile(tmp, JSON.stringify(document, null, 2), 'utf-8');
    await rename(tmp, this.path);
  }
}

/** In-memory store for tests and for running without a data directory. */
export class MemoryProgressStore implements ProgressStore {
  saved: Progress | null;
  saves = 0;

  constructor(initial: Progress | null = null) {
    this.saved = initial;
  }

  async load(): Promise<Progress | null> {
    return this.saved ? structuredClone(this.saved) : null;
  }

  async save(progress: Progress): Promise<void> {
    this.saves++;
    this.saved = structuredClone(progress);
  }
}
