/**
 * Chat/donation feed over the StreamElements realtime socket.
 * Emits normalized FeedEvents; reconnects with exponential backoff until stopped.
 */

import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { logger } from '../logger.js';
import { encodeEvent, normalizeFeedEvent, parseFeedFrame } from './frames.js';
import type { FeedEvent } from '../types/index.js';

export const STREAMELEMENTS_URL = 'wss://realtime.streamelements.com/socket.io/?EIO=4&transport=websocket';

export interface FeedClientEvents {
  event: [event: FeedEvent];
  authenticated: [];
}

export interface FeedClientOptions {
  url?: string;
  /** First reconnect delay; doubles per attempt. */
  baseDelayMs?: number;
  maxDelayMs?: number;
  now?: () => number;
}

export class StreamElementsFeed extends EventEmitter<FeedClientEvents> {
  private socket: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private attempt = 0;
  private seq = 0;
  private _shuttingDown = false;

  private readonly url: string;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly now: () => number;

  constructor(private readonly jwt: string, options: FeedClientOptions = {}) {
    super();
    this.url = options.url ?? STREAMELEMENTS_URL;
    this.baseDelayMs = options.baseDelayMs ?? 5_000;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    this._shuttingDown = false;
    this.connect();
  }

  /** Close immediately; pending reconnects are cancelled. */
  stop(): void {
    this._shuttingDown = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.on('error', (err: Error) => logger.debug(`Feed: error while closing: ${err.message}`));
      this.socket.terminate();
      this.socket = null;
      logger.info('Feed: disconnected');
    }
  }

  get connected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  private connect(): void {
    const socket = new WebSocket(this.url);
    this.socket = socket;

    socket.on('message', (data: WebSocket.RawData) => {
      this.handleFrame(socket, data.toString());
    });

    socket.on('error', (err: Error) => {
      logger.warn('Feed: socket error:', err);
      // close follows, which schedules the reconnect
    });

    socket.on('close', (code: number) => {
      if (this.socket === socket) this.socket = null;
      if (this._shuttingDown) return;
      logger.warn(`Feed: connection closed (${code}), scheduling reconnect`);
      this.scheduleReconnect();
    });
  }

  private handleFrame(socket: WebSocket, raw: string): void {
    const frame = parseFeedFrame(raw);
    if (!frame) {
      logger.debug(`Feed: ignoring frame ${raw.slice(0, 80)}`);
      return;
    }

    switch (frame.type) {
      case 'open':
        socket.send('40');
        break;
      case 'ping':
        socket.send('3');
        break;
      case 'connect':
        socket.send(encodeEvent('authenticate', { method: 'jwt', token: this.jwt }));
        break;
      case 'connect_error':
        logger.warn(`Feed: socket.io connect error: ${frame.message}`);
        break;
      case 'close':
      case 'disconnect':
        socket.close();
        break;
      case 'event':
        this.handleEvent(frame.name, frame.payload);
        break;
      case 'pong':
        break;
    }
  }

  private handleEvent(name: string, payload: unknown): void {
    if (name === 'authenticated') {
      this.attempt = 0;
      logger.info('Feed: authenticated');
      this.emit('authenticated');
      return;
    }
    if (name === 'unauthorized') {
      logger.error('Feed: authentication rejected, check STREAMELEMENTS_JWT');
      return;
    }

    const receivedAt = this.now();
    const event = normalizeFeedEvent(name, payload, receivedAt, `feed:${receivedAt}:${this.seq++}`);
    if (!event) {
      logger.debug(`Feed: dropped unrecognized '${name}' event`);
      return;
    }
    logger.debug(`Feed: ${event.kind} from ${event.username}`);
    this.emit('event', event);
  }

  private scheduleReconnect(): void {
    if (this._shuttingDown || this.reconnectTimer) return;

    // Exponential backoff: 5s, 10s, 20s, 40s, 60s cap
    this.attempt++;
    const delay = Math.min(this.baseDelayMs * Math.pow(2, this.attempt - 1), this.maxDelayMs);
    logger.info(`Feed: reconnecting in ${delay}ms (attempt ${this.attempt})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }
}
