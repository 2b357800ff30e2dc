import type { SpeechOutput } from '../src/speech/output.js';
import type { Emotion, GameState, PlayerState } from '../src/types/index.js';

export function makePlayer(id: string, overrides: Partial<PlayerState> = {}): PlayerState {
  return {
    id,
    name: id,
    team: 'CT',
    health: 100,
    armor: 100,
    money: 4000,
    kills: 0,
    deaths: 0,
    assists: 0,
    mvps: 0,
    roundKills: 0,
    roundHeadshots: 0,
    weapon: 'weapon_ak47',
    ...overrides,
  };
}

export function makeState(overrides: Partial<GameState> = {}, players: PlayerState[] = []): GameState {
  const table: Record<string, PlayerState> = {};
  for (const player of players) table[player.id] = player;
  return {
    timestamp: 1_700_000_000_000,
    mapName: 'de_dust2',
    mapPhase: 'live',
    round: 2,
    scoreCt: 1,
    scoreT: 1,
    roundPhase: 'live',
    bomb: 'none',
    winTeam: null,
    localPlayerId: 'p1',
    players: table,
    ...overrides,
  };
}

/** Resolve pending microtasks and zero-delay timers. */
export async function flush(times = 5): Promise<void> {
  for (let i = 0; i < times; i++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

/** Speech output that records lines; in manual mode each line waits for `finish()`. */
export class FakeSpeechOutput implements SpeechOutput {
  readonly spoken: string[] = [];
  readonly emotions: Emotion[] = [];
  readonly signals: AbortSignal[] = [];
  readonly failOn = new Set<string>();
  closed = false;
  private waiting: Array<() => void> = [];

  constructor(private readonly manual = false) {}

  speak(text: string, emotion: Emotion, signal: AbortSignal): Promise<void> {
    this.spoken.push(text);
    this.emotions.push(emotion);
    this.signals.push(signal);
    if (this.failOn.has(text)) {
      return Promise.reject(new Error(`synthesis failed for "${text}"`));
    }
    if (!this.manual) return Promise.resolve();
    return new Promise<void>(resolve => {
      this.waiting.push(resolve);
    });
  }

  /** Complete the oldest utterance still playing. */
  finish(): void {
    this.waiting.shift()?.();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
