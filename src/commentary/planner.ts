/**
 * Commentary planner: domain event → at most one speech request.
 *
 * Decides whether an event is worth saying anything about (tracked player
 * only, cooldowns, chat sampling), at what priority, and which prompt the
 * generator gets. Text is produced lazily when the request starts speaking.
 */

import { logger } from '../logger.js';
import { SpeechPriority } from '../types/index.js';
import type { DomainEvent, Emotion, SpeechCategory, SpeechInput, Scoreboard } from '../types/index.js';
import { fillTemplate, pick } from './reactions.js';
import type { ReactionTemplates } from './reactions.js';

/** Milliseconds between two spoken reactions of the same kind. */
export const COOLDOWNS_MS: Readonly<Record<string, number>> = {
  kill: 3_000,
  death: 5_000,
  round_end: 2_000,
  bomb_planted: 10_000,
  bomb_defused: 10_000,
  bomb_exploded: 10_000,
  chat_message: 8_000,
  ambient: 25_000,
  general: 12_000,
};

/** Generates the spoken line; see ResponseGenerator. */
export interface Commentator {
  generate(kind: string, prompt: string, context?: string): Promise<string>;
  fallback(kind: string): string;
}

export interface PlannerOptions {
  personaName: string;
  /** Probability of answering a chat message not addressed to the persona. */
  chatReplyChance: number;
  random?: () => number;
  now?: () => number;
}

interface Reaction {
  /** Prompt template key. */
  key: string;
  /** Fallback list and generator label. */
  kind: string;
  priority: SpeechPriority;
  category: SpeechCategory;
  emotion: Emotion;
  vars: Record<string, string | number>;
  /** Cooldown bucket; omitted for reactions that are never cooled down. */
  cooldown?: string;
  dedupKey?: string;
  supersedes?: string[];
}

interface StreamContext {
  mapName: string | null;
  round: number | null;
  score: Scoreboard | null;
  kills: number;
  deaths: number;
}

function weaponName(weapon: string | null): string {
  return weapon ? weapon.replace(/^weapon_/, '') : 'оружием';
}

function formatScore(score: Scoreboard): string {
  return `${score.ct}:${score.t}`;
}

/** Russian plural: 1 час, 2 часа, 5 часов. */
export function pluralRu(n: number, one: string, few: string, many: string): string {
  const mod10 = n % 10;
  const mod100 = n % 100;
  if (mod10 === 1 && mod100 !== 11) return one;
  if (mod10 >= 2 && mod10 <= 4 && (mod100 < 12 || mod100 > 14)) return few;
  return many;
}

export class CommentaryPlanner {
  private readonly commentator: Commentator;
  private readonly reactions: ReactionTemplates;
  private readonly persona: string;
  private readonly chatReplyChance: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private lastSpoken = new Map<string, number>();
  private stream: StreamContext = { mapName: null, round: null, score: null, kills: 0, deaths: 0 };

  constructor(commentator: Commentator, reactions: ReactionTemplates, options: PlannerOptions) {
    this.commentator = commentator;
    this.reactions = reactions;
    this.persona = options.personaName.toLowerCase().replace(/ё/g, 'е');
    this.chatReplyChance = options.chatReplyChance;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /** Plan the reaction to one event, or null when it should pass silently. */
  plan(event: DomainEvent): SpeechInput | null {
    this.observe(event);

    switch (event.kind) {
      case 'unlock':
        return {
          priority: SpeechPriority.ACHIEVEMENT,
          category: 'achievement',
          text: `Достижение разблокировано: ${event.name}! ${event.description}`,
          emotion: 'excited',
          sourceEventIds: [event.id],
        };
      case 'session_time':
        return {
          priority: SpeechPriority.AMBIENT,
          category: 'ambient',
          text: `Мы в эфире уже ${event.hours} ${pluralRu(event.hours, 'час', 'часа', 'часов')}! Спасибо, что вы с нами.`,
          emotion: 'happy',
          sourceEventIds: [event.id],
        };
    }

    const reaction = this.reactionFor(event);
    if (!reaction) return null;
    if (!this.takeCooldown(reaction)) return null;
    return this.toRequest(reaction, [event.id]);
  }

  /** Idle commentary; null while on cooldown. */
  planAmbient(): SpeechInput | null {
    const prompt = pick(this.reactions.ambient, this.random) ?? '';
    const reaction: Reaction = {
      key: 'ambient',
      kind: 'ambient',
      priority: SpeechPriority.AMBIENT,
      category: 'ambient',
      emotion: 'neutral',
      vars: {},
      cooldown: 'ambient',
      dedupKey: 'ambient',
    };
    if (!this.takeCooldown(reaction)) return null;
    return this.toRequest(reaction, [], prompt);
  }

  /** Reply to something the streamer said to the persona. */
  planConversation(text: string): SpeechInput {
    if (!text.trim()) {
      return {
        priority: SpeechPriority.COMMAND,
        category: 'command',
        text: 'Да? Я слушаю.',
        emotion: 'gentle',
      };
    }
    return this.toRequest({
      key: 'converse',
      kind: 'converse',
      priority: SpeechPriority.COMMAND,
      category: 'command',
      emotion: 'neutral',
      vars: { text },
    }, []);
  }

  /** Fixed spoken feedback (voice commands, progress summary). */
  planFeedback(text: string): SpeechInput {
    return {
      priority: SpeechPriority.COMMAND,
      category: 'command',
      text,
      emotion: 'neutral',
    };
  }

  /** One-line summary of the stream so far, prepended to prompts. */
  context(): string {
    const parts: string[] = [];
    if (this.stream.mapName) parts.push(`Карта: ${this.stream.mapName}.`);
    if (this.stream.score) parts.push(`Счёт: CT ${this.stream.score.ct} — T ${this.stream.score.t}.`);
    if (this.stream.round !== null) parts.push(`Раунд: ${this.stream.round}.`);
    if (this.stream.kills > 0 || this.stream.deaths > 0) {
      parts.push(`У стримера ${this.stream.kills} убийств и ${this.stream.deaths} смертей.`);
    }
    return parts.length > 0 ? `Контекст стрима: ${parts.join(' ')}` : '';
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private observe(event: DomainEvent): void {
    switch (event.kind) {
      case 'round_start':
        this.stream.mapName = event.mapName;
        this.stream.round = event.round;
        this.stream.score = event.score;
        break;
      case 'round_end':
        this.stream.round = event.round;
        this.stream.score = event.score;
        break;
      case 'map_change':
        this.stream = { mapName: event.mapName, round: null, score: null, kills: 0, deaths: 0 };
        break;
      case 'kill':
        if (event.actor.local) this.stream.kills++;
        break;
      case 'death':
        if (event.victim.local) this.stream.deaths++;
        break;
      case 'match_end':
        this.stream.kills = event.kills;
        this.stream.deaths = event.deaths;
        this.stream.score = event.score;
        break;
    }
  }

  private reactionFor(event: DomainEvent): Reaction | null {
    const combat = { priority: SpeechPriority.COMBAT, category: 'combat' } as const;
    const highlight = { priority: SpeechPriority.HIGHLIGHT, category: 'highlight' } as const;
    const support = { priority: SpeechPriority.DONATION, category: 'donation' } as const;

    switch (event.kind) {
      case 'kill': {
        if (!event.actor.local) return null;
        const key = event.roundKills >= 3 ? 'kill_multi' : event.headshot ? 'kill_headshot' : 'kill';
        return {
          ...combat, key, kind: 'kill', emotion: 'excited', cooldown: 'kill', dedupKey: 'kill',
          vars: { victim: event.victim?.name ?? 'противника', weapon: weaponName(event.weapon), roundKills: event.roundKills },
        };
      }
      case 'death':
        if (!event.victim.local) return null;
        return {
          ...combat, key: 'death', kind: 'death', emotion: 'supportive', cooldown: 'death', dedupKey: 'death',
          vars: { killer: event.killer?.name ?? 'противник' },
        };
      case 'low_health':
        return {
          ...combat, key: 'low_health', kind: 'low_health', emotion: 'tense', cooldown: 'general', dedupKey: 'low_health',
          vars: { health: event.health },
        };
      case 'round_start':
        if (!event.eco) return null;
        return {
          ...combat, key: 'round_start_eco', kind: 'round_start', emotion: 'happy', cooldown: 'general',
          vars: { round: event.round },
        };
      case 'round_end': {
        const key = !event.won ? 'round_end_lost' : event.flawless ? 'round_end_flawless' : 'round_end_won';
        return {
          ...combat, key, kind: 'round_end', emotion: event.won ? 'happy' : 'supportive', cooldown: 'round_end', dedupKey: 'round',
          vars: { round: event.round, roundKills: event.roundKills },
        };
      }
      case 'bomb_planted':
        return { ...combat, key: 'bomb_planted', kind: 'bomb_planted', emotion: 'tense', cooldown: 'bomb_planted', dedupKey: 'bomb', vars: { round: event.round } };
      case 'bomb_defused':
        return {
          ...combat, key: event.ninja ? 'bomb_defused_ninja' : 'bomb_defused', kind: 'bomb_defused',
          emotion: 'excited', cooldown: 'bomb_defused', dedupKey: 'bomb', vars: { round: event.round },
        };
      case 'bomb_exploded':
        return { ...combat, key: 'bomb_exploded', kind: 'bomb_exploded', emotion: 'neutral', cooldown: 'bomb_exploded', dedupKey: 'bomb', vars: { round: event.round } };
      case 'ace':
        if (!event.player.local) return null;
        return {
          ...highlight, key: 'ace', kind: 'ace', emotion: 'excited', supersedes: event.supersedes,
          vars: { kills: event.kills, round: event.round },
        };
      case 'clutch':
        if (!event.player.local) return null;
        return { ...highlight, key: 'clutch', kind: 'clutch', emotion: 'excited', vars: { opponents: event.opponents } };
      case 'mvp':
        if (!event.player.local) return null;
        return { ...highlight, key: 'mvp', kind: 'mvp', emotion: 'happy', vars: { mvps: event.mvps } };
      case 'match_end':
        return {
          ...highlight, key: event.won ? 'match_end_won' : 'match_end_lost', kind: 'match_end',
          emotion: event.won ? 'happy' : 'supportive',
          vars: { mapName: event.mapName, score: formatScore(event.score), kills: event.kills, deaths: event.deaths },
        };
      case 'map_change':
        return { ...combat, key: 'map_change', kind: 'map_change', emotion: 'neutral', cooldown: 'general', vars: { mapName: event.mapName } };
      case 'chat_message': {
        const addressed = this.isAddressed(event.message);
        if (!addressed && this.random() >= this.chatReplyChance) return null;
        return {
          priority: SpeechPriority.CHAT, category: 'chat',
          key: addressed ? 'chat_message_addressed' : 'chat_message', kind: 'chat_message',
          emotion: 'neutral', cooldown: 'chat_message', dedupKey: 'chat',
          vars: { username: event.username, message: event.message },
        };
      }
      case 'donation':
        return {
          ...support, key: 'donation', kind: 'donation', emotion: 'happy',
          vars: { username: event.username, amount: event.amount, currency: event.currency, message: event.message || 'без сообщения' },
        };
      case 'subscription': {
        const key = event.gifted ? 'subscription_gift' : event.months > 1 ? 'subscription_resub' : 'subscription';
        return {
          ...support, key, kind: 'subscription', emotion: 'happy',
          vars: { username: event.username, months: event.months, gifter: event.gifter ?? 'Кто-то', tier: event.tier },
        };
      }
      case 'raid':
        return { ...support, key: 'raid', kind: 'raid', emotion: 'excited', vars: { username: event.username, viewers: event.viewers } };
      case 'cheer':
        return {
          ...support, key: 'cheer', kind: 'cheer', emotion: 'happy',
          vars: { username: event.username, bits: event.bits, message: event.message || 'без сообщения' },
        };
      case 'follow':
        return {
          priority: SpeechPriority.CHAT, category: 'chat', key: 'follow', kind: 'follow',
          emotion: 'happy', cooldown: 'general', dedupKey: 'follow', vars: { username: event.username },
        };
      case 'assist':
      case 'unlock':
      case 'session_time':
        return null;
    }
  }

  private isAddressed(message: string): boolean {
    return this.persona !== '' && message.toLowerCase().replace(/ё/g, 'е').includes(this.persona);
  }

  /** True (and the bucket is restarted) when the reaction may speak now. */
  private takeCooldown(reaction: Reaction): boolean {
    if (!reaction.cooldown) return true;
    const now = this.now();
    const last = this.lastSpoken.get(reaction.cooldown);
    const cooldown = COOLDOWNS_MS[reaction.cooldown] ?? COOLDOWNS_MS.general;
    if (last !== undefined && now - last < cooldown) {
      logger.debug(`Planner: ${reaction.kind} on cooldown (${cooldown - (now - last)}ms left)`);
      return false;
    }
    this.lastSpoken.set(reaction.cooldown, now);
    return true;
  }

  private toRequest(reaction: Reaction, sourceEventIds: string[], promptOverride?: string): SpeechInput {
    const template = promptOverride ?? this.reactions.prompts[reaction.key] ?? this.reactions.prompts[reaction.kind];
    const prompt = template ? fillTemplate(template, reaction.vars) : '';
    const commentator = this.commentator;
    const kind = reaction.kind;

    return {
      priority: reaction.priority,
      category: reaction.category,
      text: prompt
        ? () => commentator.generate(kind, prompt, this.context())
        : () => Promise.resolve(commentator.fallback(kind)),
      emotion: reaction.emotion,
      dedupKey: reaction.dedupKey,
      sourceEventIds,
      supersedes: reaction.supersedes,
    };
  }
}
