/**
 * Wires the pipeline: snapshots → differ → tracker → planner → arbiter,
 * feed events through the same path, and utterances through the
 * interpreter to the mixer or the conversation prompt.
 */

import { logger } from './logger.js';
import { normalizeSnapshot } from './ingest/snapshot.js';
import { isVolumeIntent } from './voice/volume-control.js';
import type { StateDiffer } from './game/differ.js';
import type { AchievementTracker } from './achievements/tracker.js';
import type { CommentaryPlanner } from './commentary/planner.js';
import type { ReactionArbiter } from './speech/arbiter.js';
import type { VoiceCommandInterpreter } from './voice/interpreter.js';
import type { VolumeController } from './voice/volume-control.js';
import type { Transcriber } from './voice/transcriber.js';
import type { IngestHandlers } from './ingest/http-server.js';
import type { DomainEvent, GameEvent, Intent, SpeechInput } from './types/index.js';

const HOUR_MS = 3_600_000;

export interface CohostComponents {
  differ: StateDiffer;
  tracker: AchievementTracker;
  planner: CommentaryPlanner;
  arbiter: ReactionArbiter;
  interpreter: VoiceCommandInterpreter;
  volume: VolumeController;
  transcriber: Transcriber | null;
}

export interface CohostOptions {
  /** 0 disables idle commentary. */
  ambientIntervalMs: number;
  /** How often the session clock is checked for a new full hour. */
  sessionCheckMs?: number;
  now?: () => number;
}

export class Cohost {
  private readonly differ: StateDiffer;
  private readonly tracker: AchievementTracker;
  private readonly planner: CommentaryPlanner;
  private readonly arbiter: ReactionArbiter;
  private readonly interpreter: VoiceCommandInterpreter;
  private readonly volume: VolumeController;
  private readonly transcriber: Transcriber | null;

  private readonly ambientIntervalMs: number;
  private readonly sessionCheckMs: number;
  private readonly now: () => number;

  private ambientTimer: ReturnType<typeof setInterval> | null = null;
  private sessionTimer: ReturnType<typeof setInterval> | null = null;
  private startedAt = 0;
  private hoursAnnounced = 0;
  private running = false;

  private stats = { snapshots: 0, rejected: 0, events: 0, utterances: 0 };
  /** In-flight volume commands; awaited on stop. */
  private commands = new Set<Promise<void>>();

  constructor(components: CohostComponents, options: CohostOptions) {
    this.differ = components.differ;
    this.tracker = components.tracker;
    this.planner = components.planner;
    this.arbiter = components.arbiter;
    this.interpreter = components.interpreter;
    this.volume = components.volume;
    this.transcriber = components.transcriber;
    this.ambientIntervalMs = options.ambientIntervalMs;
    this.sessionCheckMs = options.sessionCheckMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.now();
    this.hoursAnnounced = 0;
    this.arbiter.start();

    if (this.ambientIntervalMs > 0) {
      this.ambientTimer = setInterval(() => this.tickAmbient(), this.ambientIntervalMs);
    }
    this.sessionTimer = setInterval(() => this.tickSession(), this.sessionCheckMs);
    logger.info('Cohost: started');
  }

  /** Stop timers, drain the arbiter and write achievement progress. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.ambientTimer) clearInterval(this.ambientTimer);
    if (this.sessionTimer) clearInterval(this.sessionTimer);
    this.ambientTimer = null;
    this.sessionTimer = null;

    await Promise.allSettled([...this.commands]);
    await this.arbiter.stop();
    await this.tracker.checkpoint();
    logger.info(`Cohost: stopped (${this.stats.events} events, ${this.stats.utterances} utterances)`);
  }

  /** Handlers for the HTTP listener. */
  handlers(): IngestHandlers {
    return {
      snapshot: (document, receivedAt) => {
        this.handleSnapshot(document, receivedAt);
      },
      utterance: text => this.handleUtterance(text),
      voice: this.transcriber ? (audio, filename) => this.handleVoice(audio, filename) : null,
      health: () => this.health(),
    };
  }

  // ── Inputs ──────────────────────────────────────────────────────────────

  /** One pushed snapshot; returns the game events it produced. */
  handleSnapshot(document: unknown, receivedAt: number): GameEvent[] {
    const result = normalizeSnapshot(document, receivedAt);
    if (!result.ok) {
      this.stats.rejected++;
      logger.warn(`Cohost: dropped snapshot: ${result.reason}`);
      return [];
    }
    this.stats.snapshots++;
    const events = this.differ.ingest(result.state);
    for (const event of events) this.dispatch(event);
    return events;
  }

  /**
   * Route one event: progress first, then its own reaction, then a
   * reaction per unlock it caused.
   */
  dispatch(event: DomainEvent): void {
    this.stats.events++;
    const unlocks = this.tracker.apply(event);
    this.submit(this.planner.plan(event));
    for (const unlock of unlocks) {
      logger.debug(`Cohost: reacting to unlock ${unlock.achievementId}`);
      this.submit(this.planner.plan(unlock));
    }
  }

  /** Recognized speech. Returns false when the wake phrase was missing. */
  handleUtterance(text: string): boolean {
    const interpretation = this.interpreter.interpret(text);
    if (!interpretation) {
      logger.debug(`Cohost: ignoring utterance without wake phrase: "${text}"`);
      return false;
    }
    this.stats.utterances++;

    if (interpretation.kind === 'feedback') {
      logger.info(`Cohost: voice command not understood (${interpretation.reason}: ${interpretation.word})`);
      this.submit(this.planner.planFeedback(interpretation.text));
      return true;
    }
    this.handleIntent(interpretation.intent);
    return true;
  }

  /** Transcribe audio and handle the text; resolves the transcript or null. */
  async handleVoice(audio: Buffer, filename: string): Promise<string | null> {
    if (!this.transcriber) return null;
    const text = await this.transcriber.transcribe(audio, filename);
    if (!text) return null;
    logger.debug(`Cohost: heard "${text}"`);
    this.handleUtterance(text);
    return text;
  }

  private handleIntent(intent: Intent): void {
    if (isVolumeIntent(intent)) {
      logger.info(`Cohost: volume command ${intent.kind} → ${intent.target}`);
      const command = this.volume
        .execute(intent)
        .then(feedback => {
          this.submit(this.planner.planFeedback(feedback));
        })
        .catch(err => {
          logger.error('Cohost: volume command failed:', err);
        })
        .finally(() => {
          this.commands.delete(command);
        });
      this.commands.add(command);
      return;
    }

    switch (intent.kind) {
      case 'progress':
        this.submit(this.planner.planFeedback(this.tracker.describe()));
        break;
      case 'converse':
        this.submit(this.planner.planConversation(intent.text));
        break;
    }
  }

  // ── Timers ──────────────────────────────────────────────────────────────

  /** Idle commentary, only when nothing is queued or playing. */
  tickAmbient(): void {
    if (!this.arbiter.isIdle()) return;
    this.submit(this.planner.planAmbient());
  }

  /** Emit a session_time event for each newly completed hour on air. */
  tickSession(): void {
    const now = this.now();
    const hours = Math.floor((now - this.startedAt) / HOUR_MS);
    if (hours <= this.hoursAnnounced) return;
    this.hoursAnnounced = hours;
    this.dispatch({
      kind: 'session_time',
      id: `session_time:${this.startedAt}:${hours}`,
      timestamp: now,
      hours,
    });
  }

  // ── Status ──────────────────────────────────────────────────────────────

  health(): Record<string, unknown> {
    const state = this.differ.current;
    return {
      running: this.running,
      uptimeSeconds: this.running ? Math.round((this.now() - this.startedAt) / 1000) : 0,
      map: state?.mapName ?? null,
      round: state ? state.round + 1 : null,
      queueDepth: this.arbiter.depth,
      speaking: this.arbiter.speaking?.category ?? null,
      achievementsPersistent: this.tracker.persistent,
      ...this.stats,
    };
  }

  private submit(input: SpeechInput | null): void {
    if (!input) return;
    this.arbiter.submit(input);
  }
}
