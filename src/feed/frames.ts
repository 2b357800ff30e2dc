/**
 * StreamElements realtime socket: engine.io v4 / socket.io frame parsing
 * and payload → FeedEvent normalization.
 */

import { isRecord } from '../utils/guards.js';
import type { FeedEvent } from '../types/index.js';

export type FeedFrame =
  | { type: 'open'; pingIntervalMs: number | null }
  | { type: 'close' }
  | { type: 'ping' }
  | { type: 'pong' }
  | { type: 'connect' }
  | { type: 'disconnect' }
  | { type: 'connect_error'; message: string }
  | { type: 'event'; name: string; payload: unknown };

/** Parse one text frame. Unknown or malformed frames → null. */
export function parseFeedFrame(raw: string): FeedFrame | null {
  if (raw === '') return null;

  switch (raw[0]) {
    case '0': {
      const handshake = parseJson(raw.slice(1));
      const interval = isRecord(handshake) && typeof handshake.pingInterval === 'number' ? handshake.pingInterval : null;
      return { type: 'open', pingIntervalMs: interval };
    }
    case '1':
      return { type: 'close' };
    case '2':
      return { type: 'ping' };
    case '3':
      return { type: 'pong' };
    case '4':
      return parseSocketPacket(raw.slice(1));
    default:
      return null;
  }
}

function parseSocketPacket(packet: string): FeedFrame | null {
  switch (packet[0]) {
    case '0':
      return { type: 'connect' };
    case '1':
      return { type: 'disconnect' };
    case '2': {
      // Optional ack id between the packet type and the array.
      const body = parseJson(packet.slice(1).replace(/^\d+/, ''));
      if (!Array.isArray(body) || typeof body[0] !== 'string') return null;
      return { type: 'event', name: body[0], payload: body[1] ?? null };
    }
    case '4': {
      const body = parseJson(packet.slice(1));
      const message = isRecord(body) && typeof body.message === 'string' ? body.message : 'connect error';
      return { type: 'connect_error', message };
    }
    default:
      return null;
  }
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** socket.io event frame. */
export function encodeEvent(name: string, payload: unknown): string {
  return `42${JSON.stringify([name, payload])}`;
}

// ── Payload normalization ──────────────────────────────────────────────────

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function num(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

const ANONYMOUS = 'Аноним';

type ActivityKind = 'tip' | 'subscriber' | 'follower' | 'raid' | 'cheer' | 'host';

const ACTIVITY_KINDS: readonly ActivityKind[] = ['tip', 'subscriber', 'follower', 'raid', 'cheer', 'host'];

function activityKind(listener: string, type: string): ActivityKind | null {
  return ACTIVITY_KINDS.find(kind => listener.includes(kind) || type.includes(kind)) ?? null;
}

/**
 * Normalize a socket event into a FeedEvent. `fallbackId` is used when the
 * payload carries no id of its own. Unknown events → null.
 */
export function normalizeFeedEvent(name: string, payload: unknown, receivedAt: number, fallbackId: string): FeedEvent | null {
  if (!isRecord(payload)) return null;

  if (name === 'message') {
    const data = isRecord(payload.data) ? payload.data : payload;
    const message = str(data.message, str(data.text, ''));
    if (!message) return null;
    return {
      kind: 'chat_message',
      id: str(payload._id, str(data.msgId, fallbackId)),
      timestamp: receivedAt,
      username: str(data.displayName, str(data.username, str(data.nick, ANONYMOUS))),
      message,
    };
  }

  if (name !== 'event' && name !== 'event:test') return null;

  const listener = str(payload.listener, '');
  const type = str(payload.type, '');
  const body = isRecord(payload.event) ? payload.event : isRecord(payload.data) ? payload.data : payload;
  const kind = activityKind(listener, type);
  const id = str(payload._id, str(body._id, str(payload.activityId, fallbackId)));
  const username = str(body.displayName, str(body.username, str(body.name, ANONYMOUS)));
  const base = { id, timestamp: receivedAt, username };

  switch (kind) {
    case 'tip':
      return {
        ...base,
        kind: 'donation',
        amount: num(body.amount, 0),
        currency: str(body.currency, 'USD').toUpperCase(),
        message: str(body.message, ''),
      };
    case 'subscriber': {
      const gifted = body.gifted === true;
      return {
        ...base,
        kind: 'subscription',
        tier: str(body.tier, '1000'),
        months: Math.max(1, num(body.amount, num(body.months, 1))),
        gifted,
        gifter: gifted ? str(body.sender, '') || null : null,
      };
    }
    case 'follower':
      return { ...base, kind: 'follow' };
    case 'raid':
    case 'host':
      return { ...base, kind: 'raid', viewers: num(body.amount, num(body.viewers, 0)) };
    case 'cheer':
      return { ...base, kind: 'cheer', bits: num(body.amount, 0), message: str(body.message, '') };
    case null:
      return null;
  }
}
