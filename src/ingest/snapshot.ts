/**
 * Game-state-integration document → normalized GameState.
 *
 * The game client posts loosely shaped JSON (provider / map / round / player /
 * allplayers blocks, any of which may be missing). Everything downstream of
 * this module works on the explicit GameState schema only.
 */

import type {
  BombState,
  GameState,
  MapPhase,
  PlayerState,
  RoundPhase,
  Team,
} from '../types/index.js';
import { isRecord } from '../utils/guards.js';

export type NormalizeResult =
  | { ok: true; state: GameState }
  | { ok: false; reason: string };

type Block = Record<string, unknown>;

function block(parent: Block, key: string): Block {
  const value = parent[key];
  return isRecord(value) ? value : {};
}

function num(parent: Block, key: string, fallback: number): number {
  const value = parent[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function str(parent: Block, key: string, fallback: string): string {
  const value = parent[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

function parseTeam(value: unknown): Team {
  return value === 'CT' || value === 'T' ? value : 'unknown';
}

function parseRoundPhase(value: unknown): RoundPhase {
  return value === 'freezetime' || value === 'live' || value === 'over' ? value : 'unknown';
}

function parseMapPhase(value: unknown): MapPhase {
  switch (value) {
    case 'warmup':
    case 'live':
    case 'intermission':
    case 'gameover':
      return value;
    default:
      return 'unknown';
  }
}

function parseBomb(value: unknown): BombState {
  return value === 'planted' || value === 'defused' || value === 'exploded' ? value : 'none';
}

function activeWeapon(weapons: Block): string | null {
  for (const weapon of Object.values(weapons)) {
    if (isRecord(weapon) && weapon.state === 'active' && typeof weapon.name === 'string') {
      return weapon.name;
    }
  }
  return null;
}

function parsePlayer(id: string, data: Block): PlayerState {
  const state = block(data, 'state');
  const stats = block(data, 'match_stats');
  return {
    id,
    name: str(data, 'name', id),
    team: parseTeam(data.team),
    health: num(state, 'health', 100),
    armor: num(state, 'armor', 0),
    money: num(state, 'money', 0),
    kills: num(stats, 'kills', 0),
    deaths: num(stats, 'deaths', 0),
    assists: num(stats, 'assists', 0),
    mvps: num(stats, 'mvps', 0),
    roundKills: num(state, 'round_kills', 0),
    roundHeadshots: num(state, 'round_killhs', 0),
    weapon: activeWeapon(block(data, 'weapons')),
  };
}

/**
 * Normalize one posted document. `receivedAt` (ms) stands in for a missing
 * `provider.timestamp`.
 */
export function normalizeSnapshot(document: unknown, receivedAt: number): NormalizeResult {
  if (!isRecord(document)) {
    return { ok: false, reason: 'document is not an object' };
  }
  const map = document.map;
  if (!isRecord(map)) {
    return { ok: false, reason: 'missing map block' };
  }
  const mapName = str(map, 'name', '');
  if (!mapName) {
    return { ok: false, reason: 'missing map name' };
  }
  const round = num(map, 'round', Number.NaN);
  if (!Number.isInteger(round) || round < 0) {
    return { ok: false, reason: 'missing or invalid map round' };
  }

  const provider = block(document, 'provider');
  const providerSeconds = num(provider, 'timestamp', Number.NaN);
  const timestamp = Number.isFinite(providerSeconds) ? Math.round(providerSeconds * 1000) : receivedAt;

  const roundBlock = block(document, 'round');
  const winTeam = parseTeam(roundBlock.win_team);

  const players: Record<string, PlayerState> = {};
  const allPlayers = block(document, 'allplayers');
  for (const [id, data] of Object.entries(allPlayers)) {
    if (isRecord(data)) players[id] = parsePlayer(id, data);
  }

  // The player block describes whoever the client is watching, possibly a teammate.
  const playerBlock = block(document, 'player');
  const watchedId = str(playerBlock, 'steamid', '');
  if (watchedId) {
    players[watchedId] = parsePlayer(watchedId, playerBlock);
  }

  const localPlayerId = str(provider, 'steamid', '') || watchedId;

  const state: GameState = {
    timestamp,
    mapName,
    mapPhase: parseMapPhase(map.phase),
    round,
    scoreCt: num(block(map, 'team_ct'), 'score', 0),
    scoreT: num(block(map, 'team_t'), 'score', 0),
    roundPhase: parseRoundPhase(roundBlock.phase),
    bomb: parseBomb(roundBlock.bomb),
    winTeam: winTeam === 'unknown' ? null : winTeam,
    localPlayerId,
    players,
  };
  return { ok: true, state };
}

/** Auth token carried by the document, if any. */
export function snapshotToken(document: unknown): string | null {
  if (!isRecord(document)) return null;
  const auth = document.auth;
  if (!isRecord(auth)) return null;
  return typeof auth.token === 'string' ? auth.token : null;
}
