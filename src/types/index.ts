// Speech Priority (lower number = higher priority)

export enum SpeechPriority {
  /** Achievement unlock announcements. */
  ACHIEVEMENT = 1,
  /** Donation, subscription and raid acknowledgements. */
  DONATION = 2,
  /** Spoken feedback for voice commands. */
  COMMAND = 3,
  /** Ace, clutch, MVP and match result commentary. */
  HIGHLIGHT = 4,
  /** Ordinary kill/death/bomb/round commentary. */
  COMBAT = 5,
  /** Replies to chat messages. */
  CHAT = 6,
  /** Idle commentary when nothing else is happening. */
  AMBIENT = 7,
}

export type Emotion = 'neutral' | 'excited' | 'happy' | 'supportive' | 'tense' | 'gentle';

// Normalized game state

export type Team = 'CT' | 'T' | 'unknown';
export type RoundPhase = 'freezetime' | 'live' | 'over' | 'unknown';
export type MapPhase = 'warmup' | 'live' | 'intermission' | 'gameover' | 'unknown';
export type BombState = 'none' | 'planted' | 'defused' | 'exploded';

export interface PlayerState {
  id: string;
  name: string;
  team: Team;
  health: number;
  armor: number;
  money: number;
  /** Match totals. */
  kills: number;
  deaths: number;
  assists: number;
  mvps: number;
  /** Current round only. */
  roundKills: number;
  roundHeadshots: number;
  weapon: string | null;
}

export interface GameState {
  /** Snapshot time in milliseconds since epoch. */
  timestamp: number;
  mapName: string;
  mapPhase: MapPhase;
  round: number;
  scoreCt: number;
  scoreT: number;
  roundPhase: RoundPhase;
  bomb: BombState;
  winTeam: Team | null;
  /** The tracked player (streamer); empty when the feed omits it. */
  localPlayerId: string;
  players: Record<string, PlayerState>;
}

// Domain Events

export interface PlayerRef {
  id: string;
  name: string;
  team: Team;
  /** True when this is the tracked player. */
  local: boolean;
}

export interface Scoreboard {
  ct: number;
  t: number;
}

interface EventBase {
  /** Unique, deterministic for game-derived events. */
  id: string;
  /** Milliseconds since epoch. */
  timestamp: number;
}

export interface KillEvent extends EventBase {
  kind: 'kill';
  actor: PlayerRef;
  victim: PlayerRef | null;
  headshot: boolean;
  weapon: string | null;
  roundKills: number;
  round: number;
  correlationId: string;
}

export interface DeathEvent extends EventBase {
  kind: 'death';
  victim: PlayerRef;
  killer: PlayerRef | null;
  round: number;
  correlationId: string;
}

export interface AssistEvent extends EventBase {
  kind: 'assist';
  player: PlayerRef;
  round: number;
}

export interface LowHealthEvent extends EventBase {
  kind: 'low_health';
  player: PlayerRef;
  health: number;
  damage: number;
}

export interface BombPlantedEvent extends EventBase {
  kind: 'bomb_planted';
  round: number;
}

export interface BombDefusedEvent extends EventBase {
  kind: 'bomb_defused';
  round: number;
  /** Tracked player alive on very low health when the bomb was defused. */
  ninja: boolean;
}

export interface BombExplodedEvent extends EventBase {
  kind: 'bomb_exploded';
  round: number;
}

export interface RoundStartEvent extends EventBase {
  kind: 'round_start';
  round: number;
  mapName: string;
  score: Scoreboard;
  eco: boolean;
}

export interface RoundEndEvent extends EventBase {
  kind: 'round_end';
  round: number;
  winner: Team | null;
  won: boolean;
  roundKills: number;
  eco: boolean;
  flawless: boolean;
  score: Scoreboard;
}

export interface ClutchEvent extends EventBase {
  kind: 'clutch';
  player: PlayerRef;
  opponents: number;
  round: number;
}

export interface AceEvent extends EventBase {
  kind: 'ace';
  player: PlayerRef;
  kills: number;
  round: number;
  /** Kill event ids this ace replaces for commentary. */
  supersedes: string[];
}

export interface MvpEvent extends EventBase {
  kind: 'mvp';
  player: PlayerRef;
  mvps: number;
  round: number;
}

export interface MapChangeEvent extends EventBase {
  kind: 'map_change';
  mapName: string;
  previousMap: string | null;
}

export interface MatchEndEvent extends EventBase {
  kind: 'match_end';
  mapName: string;
  won: boolean;
  score: Scoreboard;
  kills: number;
  deaths: number;
  positiveKd: boolean;
}

export interface SessionTimeEvent extends EventBase {
  kind: 'session_time';
  hours: number;
}

export interface ChatMessageEvent extends EventBase {
  kind: 'chat_message';
  username: string;
  message: string;
}

export interface DonationEvent extends EventBase {
  kind: 'donation';
  username: string;
  amount: number;
  currency: string;
  message: string;
}

export interface SubscriptionEvent extends EventBase {
  kind: 'subscription';
  username: string;
  tier: string;
  months: number;
  gifted: boolean;
  gifter: string | null;
}

export interface RaidEvent extends EventBase {
  kind: 'raid';
  username: string;
  viewers: number;
}

export interface FollowEvent extends EventBase {
  kind: 'follow';
  username: string;
}

export interface CheerEvent extends EventBase {
  kind: 'cheer';
  username: string;
  bits: number;
  message: string;
}

export interface UnlockEvent extends EventBase {
  kind: 'unlock';
  achievementId: string;
  name: string;
  description: string;
  icon: string;
  /** Id of the event that crossed the threshold. */
  sourceEventId: string;
}

export type GameEvent =
  | KillEvent
  | DeathEvent
  | AssistEvent
  | LowHealthEvent
  | BombPlantedEvent
  | BombDefusedEvent
  | BombExplodedEvent
  | RoundStartEvent
  | RoundEndEvent
  | ClutchEvent
  | AceEvent
  | MvpEvent
  | MapChangeEvent
  | MatchEndEvent;

export type FeedEvent =
  | ChatMessageEvent
  | DonationEvent
  | SubscriptionEvent
  | RaidEvent
  | FollowEvent
  | CheerEvent;

export type DomainEvent = GameEvent | FeedEvent | SessionTimeEvent | UnlockEvent;

export type EventKind = DomainEvent['kind'];

export const EVENT_KINDS: readonly EventKind[] = [
  'kill', 'death', 'assist', 'low_health',
  'bomb_planted', 'bomb_defused', 'bomb_exploded',
  'round_start', 'round_end', 'clutch', 'ace', 'mvp', 'map_change', 'match_end',
  'session_time',
  'chat_message', 'donation', 'subscription', 'raid', 'follow', 'cheer',
  'unlock',
];

export function isEventKind(value: unknown): value is EventKind {
  return typeof value === 'string' && EVENT_KINDS.some(kind => kind === value);
}

// Achievements

export type IncrementKind = 'count' | 'when' | 'atLeast' | 'atMost' | 'sum' | 'donationAtLeast' | 'streak';

export interface AchievementRule {
  id: string;
  name: string;
  description: string;
  icon: string;
  trigger: EventKind;
  threshold: number;
  increment: IncrementKind;
  /** Dotted event path → required value, checked before incrementing. */
  where?: Record<string, string | number | boolean>;
  /** Field read by `when`, `atLeast`, `atMost` and `sum`. */
  field?: string;
  /** Value for `when`, bound for `atLeast` / `atMost`. */
  value?: string | number | boolean;
  /** Per-currency minimum for `donationAtLeast`. */
  minimums?: Record<string, number>;
  /** Event kinds that reset a `streak` run. */
  resetOn?: EventKind[];
  /** `where` filter applied to reset events. */
  resetWhere?: Record<string, string | number | boolean>;
}

export interface AchievementProgress {
  counter: number;
  unlocked: boolean;
  unlockedAt?: string; // ISO 8601
}

/** Achievement id → progress. */
export type Progress = Record<string, AchievementProgress>;

// Voice Intents

export type VolumeTarget = string;

export type Intent =
  | { kind: 'set_volume'; target: VolumeTarget; value: number }
  | { kind: 'set_volume'; target: VolumeTarget; delta: number }
  | { kind: 'mute'; target: VolumeTarget }
  | { kind: 'unmute'; target: VolumeTarget }
  | { kind: 'progress' }
  | { kind: 'converse'; text: string };

export type Interpretation =
  | { kind: 'intent'; intent: Intent }
  | { kind: 'feedback'; text: string; reason: 'target_not_found'; word: string };

// Speech Requests

export type SpeechCategory =
  | 'achievement'
  | 'donation'
  | 'command'
  | 'highlight'
  | 'combat'
  | 'chat'
  | 'ambient';

export type SpeechState = 'queued' | 'speaking' | 'done' | 'cancelled';

/** Produces the text at speaking time; `null` completes the request silently. */
export type TextProducer = () => Promise<string | null>;

export interface SpeechInput {
  priority: SpeechPriority;
  category: SpeechCategory;
  text: string | TextProducer;
  dedupKey?: string;
  emotion?: Emotion;
  /** Ids of the events this request was created from. */
  sourceEventIds?: string[];
  /** Source event ids whose queued requests this one cancels. */
  supersedes?: string[];
}

export interface SpeechRequest {
  id: number;
  priority: SpeechPriority;
  category: SpeechCategory;
  text: string | TextProducer;
  dedupKey: string | null;
  emotion: Emotion;
  sourceEventIds: string[];
  supersedes: string[];
  /** Milliseconds since epoch. */
  createdAt: number;
  /** Submission order; FIFO tiebreaker within a priority. */
  seq: number;
  state: SpeechState;
}

export type CancelReason = 'replaced' | 'superseded' | 'overflow' | 'shutdown';
