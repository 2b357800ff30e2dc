/**
 * State Differ: consecutive GameState snapshots → discrete game events.
 *
 * `deriveEvents` is pure: the same (previous, current, window) triple always
 * yields the same events and the same next window. `StateDiffer` holds the
 * last snapshot and the rolling round window between calls.
 *
 * Rounds are tracked as windows rather than by `map.round` alone, because the
 * game client may bump the round counter in the same snapshot that reports
 * the round as over, or in a later one. A window opens on the first
 * snapshot, a map change, or the first snapshot outside the `over` phase
 * that either leaves `over` or carries a round counter ahead of the window.
 * It closes when the round phase turns `over`. Counter changes in the
 * snapshot that opens a window are credited to the window being closed.
 */

import { logger } from '../logger.js';
import type {
  GameEvent,
  GameState,
  KillEvent,
  DeathEvent,
  PlayerRef,
  PlayerState,
  Scoreboard,
  Team,
} from '../types/index.js';

// ── Thresholds ─────────────────────────────────────────────────────────────

export const LOW_HEALTH_THRESHOLD = 25;
export const NINJA_DEFUSE_HEALTH = 10;
export const ECO_MONEY_THRESHOLD = 2000;
export const CLUTCH_MIN_OPPONENTS = 2;
/** Ace needs this many kills when the enemy roster is unknown. */
export const DEFAULT_ACE_KILLS = 5;

// ── Round window ───────────────────────────────────────────────────────────

export interface RoundWindow {
  mapName: string;
  /** 1-based number of the round being played. */
  round: number;
  /** Match kill totals when each player was first seen this round. */
  openKills: Record<string, number>;
  /** Kill event ids per actor this round, for ace superseding. */
  killEventIds: Record<string, string[]>;
  /** Tracked player lost health this round. */
  localDamaged: boolean;
  /** Tracked player opened the round below the eco threshold. */
  eco: boolean;
  /** Live opponents when the tracked player was left alone, if that happened. */
  clutchOpponents: number | null;
  ended: boolean;
  /** Snapshots derived since the differ started; part of every event id. */
  seq: number;
}

export interface DiffResult {
  events: GameEvent[];
  window: RoundWindow;
  /** Set when the snapshot was out of order and became a new baseline. */
  reset: string | null;
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type EventDraft = DistributiveOmit<GameEvent, 'id' | 'timestamp'>;

function openWindow(state: GameState, seq: number, round = state.round + 1): RoundWindow {
  const openKills: Record<string, number> = {};
  for (const player of Object.values(state.players)) {
    openKills[player.id] = player.kills;
  }
  const local = state.players[state.localPlayerId];
  return {
    mapName: state.mapName,
    round,
    openKills,
    killEventIds: {},
    localDamaged: false,
    eco: local !== undefined && local.money < ECO_MONEY_THRESHOLD,
    clutchOpponents: null,
    ended: state.roundPhase === 'over',
    seq,
  };
}

function copyWindow(window: RoundWindow): RoundWindow {
  const killEventIds: Record<string, string[]> = {};
  for (const [id, ids] of Object.entries(window.killEventIds)) {
    killEventIds[id] = [...ids];
  }
  return { ...window, openKills: { ...window.openKills }, killEventIds };
}

function toRef(state: GameState, player: PlayerState): PlayerRef {
  return {
    id: player.id,
    name: player.name,
    team: player.team,
    local: player.id === state.localPlayerId,
  };
}

function score(state: GameState): Scoreboard {
  return { ct: state.scoreCt, t: state.scoreT };
}

function opposes(a: Team, b: Team): boolean {
  if (a === 'unknown' || b === 'unknown') return true;
  return a !== b;
}

function sortedPlayers(state: GameState): PlayerState[] {
  return Object.values(state.players).sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

function roundKillsOf(window: RoundWindow, player: PlayerState): number {
  const open = window.openKills[player.id] ?? player.kills;
  return Math.max(player.roundKills, player.kills - open);
}

// ── Derivation ─────────────────────────────────────────────────────────────

class EventSink {
  readonly events: GameEvent[] = [];
  private pairs = 0;

  constructor(private readonly prefix: string, private readonly timestamp: number) {}

  push(draft: EventDraft): string {
    const id = `${this.prefix}:${draft.kind}:${this.events.length}`;
    const event: GameEvent = { ...draft, id, timestamp: this.timestamp };
    this.events.push(event);
    return id;
  }

  correlation(): string {
    return `${this.prefix}:pair:${this.pairs++}`;
  }
}

function eventPrefix(state: GameState, window: RoundWindow): string {
  return `${state.mapName}:${window.round}:${state.timestamp}:${window.seq}`;
}

function baseline(
  previous: GameState | null,
  current: GameState,
  seq: number,
  reset: string | null,
): DiffResult {
  const window = openWindow(current, seq);
  if (reset) {
    return { events: [], window, reset };
  }
  const sink = new EventSink(eventPrefix(current, window), current.timestamp);
  if (previous && previous.mapName !== current.mapName) {
    sink.push({ kind: 'map_change', mapName: current.mapName, previousMap: previous.mapName });
  }
  sink.push(roundStartDraft(current, window));
  return { events: sink.events, window, reset: null };
}

function roundStartDraft(state: GameState, window: RoundWindow): EventDraft {
  return {
    kind: 'round_start',
    round: window.round,
    mapName: state.mapName,
    score: score(state),
    eco: window.eco,
  };
}

function matchEndDraft(previous: GameState, current: GameState): EventDraft | null {
  if (previous.mapPhase === 'gameover' || current.mapPhase !== 'gameover') return null;
  const local = current.players[current.localPlayerId];
  const team = local?.team ?? 'unknown';
  const ours = team === 'CT' ? current.scoreCt : current.scoreT;
  const theirs = team === 'CT' ? current.scoreT : current.scoreCt;
  const kills = local?.kills ?? 0;
  const deaths = local?.deaths ?? 0;
  return {
    kind: 'match_end',
    mapName: current.mapName,
    won: team !== 'unknown' && ours > theirs,
    score: score(current),
    kills,
    deaths,
    positiveKd: kills > deaths,
  };
}

function emitKillsAndDeaths(
  previous: GameState,
  current: GameState,
  window: RoundWindow,
  sink: EventSink,
): void {
  const actors: Array<{ player: PlayerState; count: number; headshots: number }> = [];
  const victims: Array<{ player: PlayerState; remaining: number }> = [];

  for (const player of sortedPlayers(current)) {
    const before = previous.players[player.id];
    if (!before) continue;
    const kills = player.kills - before.kills;
    if (kills > 0) {
      const headshots = Math.max(0, player.roundHeadshots - before.roundHeadshots);
      actors.push({ player, count: kills, headshots });
    }
    const deaths = player.deaths - before.deaths;
    if (deaths > 0) {
      victims.push({ player, remaining: deaths });
    }
  }

  const unmatchedKills: Array<() => void> = [];

  for (const actor of actors) {
    const total = roundKillsOf(window, actor.player);
    for (let k = 0; k < actor.count; k++) {
      const roundKills = Math.max(1, total - (actor.count - 1 - k));
      const headshot = k < actor.headshots;
      const victim = victims.find(v => v.remaining > 0 && v.player.id !== actor.player.id
        && opposes(actor.player.team, v.player.team));

      const recordKill = (victimRef: PlayerRef | null, correlationId: string): void => {
        const draft: Omit<KillEvent, 'id' | 'timestamp'> = {
          kind: 'kill',
          actor: toRef(current, actor.player),
          victim: victimRef,
          headshot,
          weapon: actor.player.weapon,
          roundKills,
          round: window.round,
          correlationId,
        };
        const id = sink.push(draft);
        (window.killEventIds[actor.player.id] ??= []).push(id);
      };

      if (victim) {
        victim.remaining--;
        const correlationId = sink.correlation();
        const victimRef = toRef(current, victim.player);
        recordKill(victimRef, correlationId);
        const death: Omit<DeathEvent, 'id' | 'timestamp'> = {
          kind: 'death',
          victim: victimRef,
          killer: toRef(current, actor.player),
          round: window.round,
          correlationId,
        };
        sink.push(death);
      } else {
        unmatchedKills.push(() => recordKill(null, sink.correlation()));
      }
    }
  }

  for (const record of unmatchedKills) record();

  for (const victim of victims) {
    for (let d = 0; d < victim.remaining; d++) {
      sink.push({
        kind: 'death',
        victim: toRef(current, victim.player),
        killer: null,
        round: window.round,
        correlationId: sink.correlation(),
      });
    }
  }
}

function updateClutch(current: GameState, window: RoundWindow): void {
  if (window.clutchOpponents !== null || window.ended || current.roundPhase !== 'live') return;
  const local = current.players[current.localPlayerId];
  if (!local || local.health <= 0 || local.team === 'unknown') return;

  const others = Object.values(current.players).filter(p => p.id !== local.id);
  const teammates = others.filter(p => p.team === local.team);
  if (teammates.length === 0 || teammates.some(p => p.health > 0)) return;

  const opponentsAlive = others.filter(p => p.team !== local.team && p.team !== 'unknown' && p.health > 0).length;
  if (opponentsAlive >= CLUTCH_MIN_OPPONENTS) {
    window.clutchOpponents = opponentsAlive;
  }
}

function aceKillsNeeded(current: GameState, player: PlayerState): number {
  if (player.team === 'unknown') return DEFAULT_ACE_KILLS;
  const opponents = Object.values(current.players)
    .filter(p => p.team !== player.team && p.team !== 'unknown').length;
  return opponents >= 2 ? opponents : DEFAULT_ACE_KILLS;
}

/** Winner reported by the client, else the team whose score went up. */
function roundWinner(previous: GameState, current: GameState): Team | null {
  if (current.winTeam) return current.winTeam;
  if (current.scoreCt > previous.scoreCt) return 'CT';
  if (current.scoreT > previous.scoreT) return 'T';
  return null;
}

function closeRound(previous: GameState, current: GameState, window: RoundWindow, sink: EventSink): void {
  window.ended = true;
  const local = current.players[current.localPlayerId];
  const winner = roundWinner(previous, current);
  const won = local !== undefined && winner !== null && local.team === winner;
  sink.push({
    kind: 'round_end',
    round: window.round,
    winner,
    won,
    roundKills: local ? roundKillsOf(window, local) : 0,
    eco: window.eco,
    flawless: won && !window.localDamaged,
    score: score(current),
  });

  for (const player of sortedPlayers(current)) {
    const kills = roundKillsOf(window, player);
    if (kills > 0 && kills >= aceKillsNeeded(current, player)) {
      sink.push({
        kind: 'ace',
        player: toRef(current, player),
        kills,
        round: window.round,
        supersedes: [...(window.killEventIds[player.id] ?? [])],
      });
    }
  }

  if (won && local && window.clutchOpponents !== null) {
    sink.push({
      kind: 'clutch',
      player: toRef(current, local),
      opponents: window.clutchOpponents,
      round: window.round,
    });
  }
}

/**
 * Derive the events between two snapshots. `window` is the round window
 * returned by the previous call (null on the first call); it is not mutated.
 */
export function deriveEvents(
  previous: GameState | null,
  current: GameState,
  window: RoundWindow | null,
): DiffResult {
  const seq = window ? window.seq + 1 : 0;
  if (!previous || !window || previous.mapName !== current.mapName) {
    return baseline(previous, current, seq, null);
  }
  if (current.round < previous.round) {
    return baseline(previous, current, seq, `round went from ${previous.round} to ${current.round} on ${current.mapName}`);
  }
  if (current.timestamp < previous.timestamp) {
    return baseline(previous, current, seq, `timestamp went backwards (${previous.timestamp} → ${current.timestamp})`);
  }

  const closing = !window.ended && previous.roundPhase !== 'over' && current.roundPhase === 'over';
  const leftOver = window.ended && previous.roundPhase === 'over'
    && (current.roundPhase === 'freezetime' || current.roundPhase === 'live');
  const opening = current.roundPhase !== 'over' && (leftOver || current.round + 1 > window.round);

  const next = copyWindow(window);
  next.seq = seq;
  for (const player of Object.values(current.players)) {
    if (next.openKills[player.id] === undefined) {
      next.openKills[player.id] = previous.players[player.id]?.kills ?? player.kills;
    }
  }
  const sink = new EventSink(eventPrefix(current, next), current.timestamp);

  emitKillsAndDeaths(previous, current, next, sink);

  for (const player of sortedPlayers(current)) {
    const before = previous.players[player.id];
    if (!before) continue;
    for (let a = before.assists; a < player.assists; a++) {
      sink.push({ kind: 'assist', player: toRef(current, player), round: next.round });
    }
  }

  const localBefore = previous.players[current.localPlayerId];
  const local = current.players[current.localPlayerId];
  if (local && localBefore && local.health < localBefore.health) {
    next.localDamaged = true;
    if (localBefore.health > LOW_HEALTH_THRESHOLD && local.health > 0 && local.health <= LOW_HEALTH_THRESHOLD) {
      sink.push({
        kind: 'low_health',
        player: toRef(current, local),
        health: local.health,
        damage: localBefore.health - local.health,
      });
    }
  }

  if (previous.bomb !== current.bomb) {
    switch (current.bomb) {
      case 'planted':
        sink.push({ kind: 'bomb_planted', round: next.round });
        break;
      case 'defused': {
        const ninja = local !== undefined && local.team === 'CT'
          && local.health > 0 && local.health <= NINJA_DEFUSE_HEALTH;
        sink.push({ kind: 'bomb_defused', round: next.round, ninja });
        break;
      }
      case 'exploded':
        sink.push({ kind: 'bomb_exploded', round: next.round });
        break;
      case 'none':
        break;
    }
  }

  if (!opening) updateClutch(current, next);

  // A round counter jump with no `over` snapshot still ends the old round.
  if (closing || (opening && !next.ended)) {
    closeRound(previous, current, next, sink);
  }

  for (const player of sortedPlayers(current)) {
    const before = previous.players[player.id];
    if (before && player.mvps > before.mvps) {
      sink.push({ kind: 'mvp', player: toRef(current, player), mvps: player.mvps, round: next.round });
    }
  }

  const matchEnd = matchEndDraft(previous, current);
  if (matchEnd) sink.push(matchEnd);

  if (!opening) {
    return { events: sink.events, window: next, reset: null };
  }

  const opened = openWindow(current, seq, Math.max(current.round + 1, next.round + 1));
  sink.push(roundStartDraft(current, opened));
  return { events: sink.events, window: opened, reset: null };
}

// ── Stateful wrapper ───────────────────────────────────────────────────────

export class StateDiffer {
  private previous: GameState | null = null;
  private window: RoundWindow | null = null;

  /** Feed the next snapshot; returns the events it produced. */
  ingest(state: GameState): GameEvent[] {
    const result = deriveEvents(this.previous, state, this.window);
    if (result.reset) {
      logger.warn(`Differ: ${result.reset}; treating snapshot as a new baseline`);
    }
    this.previous = state;
    this.window = result.window;
    if (result.events.length > 0) {
      logger.debug(`Differ: ${result.events.map(e => e.kind).join(', ')}`);
    }
    return result.events;
  }

  /** Last accepted snapshot. */
  get current(): GameState | null {
    return this.previous;
  }

  reset(): void {
    this.previous = null;
    this.window = null;
  }
}
