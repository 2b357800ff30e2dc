import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { normalizeSnapshot, snapshotToken } from '../src/ingest/snapshot.js';
import { renderGsiConfig } from '../src/ingest/gsi-config.js';
import { IngestServer } from '../src/ingest/http-server.js';
import type { IngestHandlers } from '../src/ingest/http-server.js';
import { setLogLevel } from '../src/logger.js';

const document = {
  provider: { name: 'Counter-Strike 2', timestamp: 1_700_000_000, steamid: '765' },
  map: { name: 'de_mirage', phase: 'live', round: 4, team_ct: { score: 3 }, team_t: { score: '1' } },
  round: { phase: 'live', bomb: 'planted' },
  player: {
    steamid: '765',
    name: 'streamer',
    team: 'CT',
    state: { health: 80, armor: 50, money: 1200, round_kills: 2, round_killhs: 1 },
    match_stats: { kills: 10, deaths: 4, assists: 2, mvps: 1 },
    weapons: {
      weapon_0: { name: 'weapon_knife', state: 'holstered' },
      weapon_1: { name: 'weapon_m4a1', state: 'active' },
    },
  },
  allplayers: {
    '999': { name: 'enemy', team: 'T', state: { health: 0 }, match_stats: { kills: 3, deaths: 6 } },
  },
  auth: { token: 'test-secret' },
};

describe('normalizeSnapshot', () => {
  it('normalizes a full document', () => {
    const result = normalizeSnapshot(document, 42);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const { state } = result;
    expect(state).toMatchObject({
      timestamp: 1_700_000_000_000,
      mapName: 'de_mirage',
      mapPhase: 'live',
      round: 4,
      scoreCt: 3,
      scoreT: 1,
      roundPhase: 'live',
      bomb: 'planted',
      winTeam: null,
      localPlayerId: '765',
    });
    expect(state.players['765']).toEqual({
      id: '765', name: 'streamer', team: 'CT', health: 80, armor: 50, money: 1200,
      kills: 10, deaths: 4, assists: 2, mvps: 1, roundKills: 2, roundHeadshots: 1, weapon: 'weapon_m4a1',
    });
    expect(state.players['999']).toMatchObject({ team: 'T', health: 0, armor: 0, kills: 3, deaths: 6, weapon: null });
  });

  it('defaults optional blocks and uses the receive time without a provider timestamp', () => {
    const result = normalizeSnapshot({ map: { name: 'de_nuke', round: 0 } }, 1234);
    expect(result).toEqual({
      ok: true,
      state: {
        timestamp: 1234, mapName: 'de_nuke', mapPhase: 'unknown', round: 0, scoreCt: 0, scoreT: 0,
        roundPhase: 'unknown', bomb: 'none', winTeam: null, localPlayerId: '', players: {},
      },
    });
  });

  it('rejects documents without the required keys', () => {
    expect(normalizeSnapshot(null, 0)).toEqual({ ok: false, reason: 'document is not an object' });
    expect(normalizeSnapshot({ provider: {} }, 0)).toEqual({ ok: false, reason: 'missing map block' });
    expect(normalizeSnapshot({ map: { round: 1 } }, 0)).toEqual({ ok: false, reason: 'missing map name' });
    expect(normalizeSnapshot({ map: { name: 'de_nuke', round: -1 } }, 0))
      .toEqual({ ok: false, reason: 'missing or invalid map round' });
  });

  it('reads the auth token', () => {
    expect(snapshotToken(document)).toBe('test-secret');
    expect(snapshotToken({ auth: { token: 5 } })).toBeNull();
  });
});

describe('renderGsiConfig', () => {
  it('points the game client at the listener', () => {
    const config = renderGsiConfig(3000, 'test-secret');
    const lines = config.split('\n');

    expect(lines[0]).toBe('"Stream Cohost"');
    expect(lines).toContain('    "uri"          "http://127.0.0.1:3000/"');
    expect(lines).toContain('        "token"    "test-secret"');
    expect(lines).toContain('        "allplayers_match_stats"  "1"');
    expect(lines).toContain('        "bomb"                    "1"');
  });

  it('omits the auth block without a token', () => {
    expect(renderGsiConfig(3000, '')).not.toContain('"auth"');
  });
});

describe('IngestServer', () => {
  let snapshots: unknown[];
  let utterances: string[];
  let voiceInputs: Array<[number, string]>;
  let handlers: IngestHandlers;
  let server: IngestServer;
  let base: string;

  beforeEach(async () => {
    setLogLevel('error');
    snapshots = [];
    utterances = [];
    voiceInputs = [];
    handlers = {
      snapshot: doc => {
        snapshots.push(doc);
      },
      utterance: text => {
        utterances.push(text);
        return text.startsWith('Ирис');
      },
      voice: async (audio, filename) => {
        voiceInputs.push([audio.length, filename]);
        return 'Ирис тише';
      },
      health: () => ({ map: 'de_mirage', round: 4, queue: 0 }),
    };
    server = new IngestServer(handlers, { authToken: 'test-secret' });
    const port = await server.start(0);
    base = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  it('acknowledges snapshots with a valid token', async () => {
    const res = await fetch(`${base}/`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(document),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
    expect(snapshots).toEqual([document]);
  });

  it('rejects snapshots with a wrong token', async () => {
    const res = await fetch(`${base}/`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ ...document, auth: { token: 'wrong' } }),
    });

    expect(res.status).toBe(401);
    expect(snapshots).toEqual([]);
  });

  it('reports health', async () => {
    const res = await fetch(`${base}/health`);
    expect(await res.json()).toEqual({ status: 'ok', map: 'de_mirage', round: 4, queue: 0 });
  });

  it('accepts utterances', async () => {
    const res = await fetch(`${base}/utterance`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ text: '  Ирис тише ' }),
    });
    expect(await res.json()).toEqual({ status: 'ok', accepted: true });
    expect(utterances).toEqual(['Ирис тише']);

    const empty = await fetch(`${base}/utterance`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({}),
    });
    expect(empty.status).toBe(400);
  });

  it('transcribes posted audio', async () => {
    const res = await fetch(`${base}/voice`, {
      method: 'POST',
      headers: { 'content-type': 'audio/ogg' },
      body: new Uint8Array([1, 2, 3, 4]),
    });

    expect(await res.json()).toEqual({ status: 'ok', text: 'Ирис тише' });
    expect(voiceInputs).toEqual([[4, 'utterance.ogg']]);
  });

  it('answers 503 for audio without a transcriber', async () => {
    await server.stop();
    server = new IngestServer({ ...handlers, voice: null }, { authToken: '' });
    const port = await server.start(0);

    const res = await fetch(`http://127.0.0.1:${port}/voice`, {
      method: 'POST',
      headers: { 'content-type': 'audio/wav' },
      body: new Uint8Array([1]),
    });
    expect(res.status).toBe(503);
  });
});
