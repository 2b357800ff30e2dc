/**
 * Reaction Arbiter: serializes every narration request onto one audio output.
 *
 * - Priority first (lower number wins), FIFO by submission within a priority.
 * - A queued request with the same dedup key is replaced in place.
 * - Nothing interrupts the request that is speaking; higher priority only
 *   reorders the queue.
 * - Over capacity, the lowest-priority queued request is dropped; a new
 *   request that is not strictly higher than the lowest queued one is the
 *   one dropped.
 * - A failed or timed-out utterance is marked done and the worker moves on.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';
import type { SpeechOutput } from './output.js';
import type {
  CancelReason,
  SpeechInput,
  SpeechRequest,
} from '../types/index.js';

export type SpeechOutcome = 'spoken' | 'silent' | 'failed';

export interface ArbiterEvents {
  speaking: [request: SpeechRequest];
  done: [request: SpeechRequest, outcome: SpeechOutcome];
  dropped: [request: SpeechRequest, reason: CancelReason];
}

export interface ArbiterOptions {
  maxQueue: number;
  /** Bound on synthesis + playback of one utterance. */
  speechTimeoutMs: number;
  /** Bound on a text producer; defaults to the speech timeout. */
  producerTimeoutMs?: number;
  now?: () => number;
}

export class ReactionArbiter extends EventEmitter<ArbiterEvents> {
  private queue: SpeechRequest[] = [];
  private current: SpeechRequest | null = null;
  private nextId = 1;
  private seq = 0;

  private worker: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private stopping = false;

  private readonly output: SpeechOutput;
  private readonly maxQueue: number;
  private readonly speechTimeoutMs: number;
  private readonly producerTimeoutMs: number;
  private readonly now: () => number;

  constructor(output: SpeechOutput, options: ArbiterOptions) {
    super();
    this.output = output;
    this.maxQueue = Math.max(1, options.maxQueue);
    this.speechTimeoutMs = options.speechTimeoutMs;
    this.producerTimeoutMs = options.producerTimeoutMs ?? options.speechTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  // ── Producers ───────────────────────────────────────────────────────────

  /**
   * Enqueue a request. Never blocks on playback. Returns the queued request,
   * or null when it was rejected (queue full of equal or higher priority, or
   * shutting down).
   */
  submit(input: SpeechInput): SpeechRequest | null {
    if (this.stopping) {
      logger.debug(`Arbiter: rejecting ${input.category} request during shutdown`);
      return null;
    }

    const request: SpeechRequest = {
      id: this.nextId++,
      priority: input.priority,
      category: input.category,
      text: input.text,
      dedupKey: input.dedupKey ?? null,
      emotion: input.emotion ?? 'neutral',
      sourceEventIds: input.sourceEventIds ?? [],
      supersedes: input.supersedes ?? [],
      createdAt: this.now(),
      seq: this.seq++,
      state: 'queued',
    };

    if (request.supersedes.length > 0) {
      const superseded = new Set(request.supersedes);
      this.removeWhere(r => r.sourceEventIds.some(id => superseded.has(id)), 'superseded');
    }

    if (request.dedupKey !== null) {
      const index = this.queue.findIndex(r => r.dedupKey === request.dedupKey);
      if (index !== -1) {
        const replaced = this.queue[index];
        // Keep the queue position of the request being replaced.
        request.seq = replaced.seq;
        request.createdAt = replaced.createdAt;
        this.queue[index] = request;
        this.cancel(replaced, 'replaced');
        this.signal();
        return request;
      }
    }

    if (this.queue.length >= this.maxQueue) {
      let lowestIdx = 0;
      for (let i = 1; i < this.queue.length; i++) {
        if (this.queue[i].priority > this.queue[lowestIdx].priority) {
          lowestIdx = i;
        }
      }
      if (request.priority < this.queue[lowestIdx].priority) {
        const [evicted] = this.queue.splice(lowestIdx, 1);
        this.cancel(evicted, 'overflow');
      } else {
        this.cancel(request, 'overflow');
        return null;
      }
    }

    this.queue.push(request);
    logger.debug(`Arbiter: queued #${request.id} ${request.category} (P${request.priority}, depth ${this.queue.length})`);
    this.signal();
    return request;
  }

  /** Dequeue the most urgent request: lowest priority number, then earliest. */
  next(): SpeechRequest | null {
    if (this.queue.length === 0) return null;
    let best = 0;
    for (let i = 1; i < this.queue.length; i++) {
      const candidate = this.queue[i];
      const current = this.queue[best];
      if (candidate.priority < current.priority
        || (candidate.priority === current.priority && candidate.seq < current.seq)) {
        best = i;
      }
    }
    const [request] = this.queue.splice(best, 1);
    return request;
  }

  // ── Observers ───────────────────────────────────────────────────────────

  /** Nothing queued and nothing speaking. */
  isIdle(): boolean {
    return this.current === null && this.queue.length === 0;
  }

  get depth(): number {
    return this.queue.length;
  }

  get speaking(): SpeechRequest | null {
    return this.current;
  }

  /** Queued requests in speaking order. */
  pending(): SpeechRequest[] {
    return [...this.queue].sort((a, b) => a.priority - b.priority || a.seq - b.seq);
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────

  start(): void {
    if (this.worker || this.stopping) return;
    this.worker = this.run();
    logger.info(`Arbiter started (queue cap=${this.maxQueue}, speech timeout=${this.speechTimeoutMs}ms)`);
  }

  /**
   * Finish the current utterance, discard everything queued, release the
   * output. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true;
      const discarded = this.queue.length;
      this.removeWhere(() => true, 'shutdown');
      if (discarded > 0) logger.info(`Arbiter: discarded ${discarded} queued requests`);
      this.signal();
    }
    if (this.worker) await this.worker;
    await this.output.close();
  }

  // ── Worker ──────────────────────────────────────────────────────────────

  private async run(): Promise<void> {
    while (!this.stopping) {
      const request = this.next();
      if (!request) {
        await new Promise<void>(resolve => {
          this.wake = resolve;
        });
        continue;
      }
      await this.speak(request);
    }
  }

  private async speak(request: SpeechRequest): Promise<void> {
    request.state = 'speaking';
    this.current = request;
    this.emit('speaking', request);

    let outcome: SpeechOutcome = 'spoken';
    try {
      const text = typeof request.text === 'string'
        ? request.text
        : await withTimeout(request.text(), this.producerTimeoutMs, `text for request #${request.id}`);

      if (text === null || text.trim() === '') {
        outcome = 'silent';
      } else {
        const controller = new AbortController();
        try {
          await withTimeout(
            this.output.speak(text, request.emotion, controller.signal),
            this.speechTimeoutMs,
            `speech for request #${request.id}`,
          );
        } catch (err) {
          controller.abort();
          throw err;
        }
      }
    } catch (err) {
      outcome = 'failed';
      if (err instanceof TimeoutError) {
        logger.warn(`Arbiter: ${err.message}, moving on`);
      } else {
        logger.warn(`Arbiter: request #${request.id} (${request.category}) failed, moving on:`, err);
      }
    }

    request.state = 'done';
    this.current = null;
    this.emit('done', request, outcome);
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private removeWhere(predicate: (request: SpeechRequest) => boolean, reason: CancelReason): void {
    const kept: SpeechRequest[] = [];
    const removed: SpeechRequest[] = [];
    for (const request of this.queue) {
      (predicate(request) ? removed : kept).push(request);
    }
    this.queue = kept;
    for (const request of removed) this.cancel(request, reason);
  }

  private cancel(request: SpeechRequest, reason: CancelReason): void {
    request.state = 'cancelled';
    logger.debug(`Arbiter: dropped #${request.id} ${request.category} (${reason})`);
    this.emit('dropped', request, reason);
  }
}
