/**
 * Achievement Tracker: folds domain events into persistent progress.
 *
 * Single writer of Progress. Every event is applied at most once (by id,
 * within a bounded history); counters never decrease; an achievement
 * unlocks at most once for the lifetime of the stored progress.
 */

import { logger } from '../logger.js';
import { incrementFor, matchesWhere } from './rules.js';
import type { ProgressStore } from './store.js';
import type {
  AchievementProgress,
  AchievementRule,
  DomainEvent,
  Progress,
  UnlockEvent,
} from '../types/index.js';

export const PROCESSED_HISTORY_SIZE = 2048;

export interface TrackerOptions {
  historySize?: number;
}

export class AchievementTracker {
  private progress: Progress;
  private readonly rules: readonly AchievementRule[];
  private readonly store: ProgressStore | null;
  private readonly historySize: number;

  /** Current uninterrupted run per streak rule (session only). */
  private readonly runs = new Map<string, number>();
  /** Recently applied event ids, oldest first. */
  private readonly processed = new Set<string>();

  private persistenceEnabled = true;
  private flushQueued = false;
  private flushChain: Promise<void> = Promise.resolve();

  constructor(
    rules: readonly AchievementRule[],
    initial: Progress | null,
    store: ProgressStore | null,
    options: TrackerOptions = {},
  ) {
    this.rules = rules;
    this.store = store;
    this.historySize = options.historySize ?? PROCESSED_HISTORY_SIZE;
    this.progress = {};
    const ids = new Set(rules.map(r => r.id));
    for (const [id, entry] of Object.entries(initial ?? {})) {
      if (ids.has(id)) this.progress[id] = { ...entry };
    }
  }

  /**
   * Load progress from the store and build a tracker. A failed read is
   * logged and the tracker starts from zero.
   */
  static async open(
    rules: readonly AchievementRule[],
    store: ProgressStore,
    options: TrackerOptions = {},
  ): Promise<AchievementTracker> {
    let initial: Progress | null = null;
    try {
      initial = await store.load();
    } catch (err) {
      logger.warn('Achievements: could not read stored progress, starting from zero:', err);
    }
    const tracker = new AchievementTracker(rules, initial, store, options);
    const unlocked = Object.values(tracker.progress).filter(p => p.unlocked).length;
    logger.info(`Achievements: ${unlocked}/${rules.length} unlocked`);
    return tracker;
  }

  /** Apply one event; returns the unlocks it caused, in rule order. */
  apply(event: DomainEvent): UnlockEvent[] {
    if (this.processed.has(event.id)) {
      logger.debug(`Achievements: ignoring already applied event ${event.id}`);
      return [];
    }
    this.remember(event.id);

    const unlocks: UnlockEvent[] = [];
    let mutated = false;

    for (const rule of this.rules) {
      if (rule.increment === 'streak' && rule.resetOn?.includes(event.kind) && matchesWhere(event, rule.resetWhere)) {
        this.runs.set(rule.id, 0);
      }
      if (rule.trigger !== event.kind || !matchesWhere(event, rule.where)) continue;

      const entry: AchievementProgress = this.progress[rule.id] ?? { counter: 0, unlocked: false };
      if (entry.unlocked) continue;

      let next: number;
      if (rule.increment === 'streak') {
        const run = (this.runs.get(rule.id) ?? 0) + 1;
        this.runs.set(rule.id, run);
        next = Math.max(entry.counter, run);
      } else {
        next = entry.counter + incrementFor(rule, event);
      }
      if (next <= entry.counter) continue;

      entry.counter = next;
      mutated = true;
      if (next >= rule.threshold) {
        entry.unlocked = true;
        entry.unlockedAt = new Date(event.timestamp).toISOString();
        unlocks.push({
          kind: 'unlock',
          id: `unlock:${rule.id}`,
          timestamp: event.timestamp,
          achievementId: rule.id,
          name: rule.name,
          description: rule.description,
          icon: rule.icon,
          sourceEventId: event.id,
        });
        logger.info(`Achievements: unlocked ${rule.id} (${rule.name})`);
      }
      this.progress[rule.id] = entry;
    }

    if (mutated) this.scheduleFlush();
    return unlocks;
  }

  /** Read-only copy of the current progress. */
  snapshot(): Progress {
    return structuredClone(this.progress);
  }

  /** Persist now; resolves once every pending write has settled. */
  checkpoint(): Promise<void> {
    this.scheduleFlush();
    return this.flushChain;
  }

  /** Spoken progress summary. */
  describe(): string {
    const unlocked = this.rules
      .map(rule => ({ rule, entry: this.progress[rule.id] }))
      .filter(({ entry }) => entry?.unlocked)
      .sort((a, b) => (b.entry?.unlockedAt ?? '').localeCompare(a.entry?.unlockedAt ?? ''));
    let text = `Открыто ${unlocked.length} из ${this.rules.length} достижений.`;
    if (unlocked.length > 0) {
      text += ` Последние: ${unlocked.slice(0, 3).map(u => u.rule.name).join(', ')}.`;
    }
    return text;
  }

  get persistent(): boolean {
    return this.store !== null && this.persistenceEnabled;
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private remember(id: string): void {
    this.processed.add(id);
    while (this.processed.size > this.historySize) {
      const oldest = this.processed.values().next();
      if (oldest.done) break;
      this.processed.delete(oldest.value);
    }
  }

  /** Writes are serialized; bursts of mutations collapse into one write. */
  private scheduleFlush(): void {
    if (!this.persistent || this.flushQueued) return;
    this.flushQueued = true;
    this.flushChain = this.flushChain.then(() => this.flush());
  }

  private async flush(): Promise<void> {
    this.flushQueued = false;
    if (!this.store || !this.persistenceEnabled) return;
    try {
      await this.store.save(this.snapshot());
    } catch (err) {
      this.persistenceEnabled = false;
      logger.error('Achievements: failed to persist progress, continuing in memory only:', err);
    }
  }
}
