import { describe, it, expect, beforeEach } from 'vitest';
import { CommentaryPlanner, pluralRu } from '../src/commentary/planner.js';
import type { Commentator } from '../src/commentary/planner.js';
import { ResponseGenerator, cleanReply } from '../src/commentary/generator.js';
import type { ChatMessage, CompletionClient } from '../src/commentary/generator.js';
import { ConversationMemory } from '../src/commentary/memory.js';
import { fillTemplate, parseReactions } from '../src/commentary/reactions.js';
import type { ReactionTemplates } from '../src/commentary/reactions.js';
import { setLogLevel } from '../src/logger.js';
import { SpeechPriority } from '../src/types/index.js';
import type { ChatMessageEvent, DomainEvent, KillEvent, PlayerRef, SpeechInput } from '../src/types/index.js';

const me: PlayerRef = { id: 'p1', name: 'streamer', team: 'CT', local: true };
const enemy: PlayerRef = { id: 'p9', name: 'enemy', team: 'T', local: false };

function kill(overrides: Partial<KillEvent> = {}): KillEvent {
  return {
    kind: 'kill',
    id: 'de_dust2:3:1000:kill:0',
    timestamp: 1000,
    actor: me,
    victim: enemy,
    headshot: false,
    weapon: 'weapon_ak47',
    roundKills: 1,
    round: 3,
    correlationId: 'de_dust2:3:1000:pair:0',
    ...overrides,
  };
}

function chat(message: string, id = 'chat-1'): ChatMessageEvent {
  return { kind: 'chat_message', id, timestamp: 1000, username: 'viewer', message };
}

const reactions: ReactionTemplates = {
  prompts: {
    kill: 'Убил {victim} с {weapon}',
    kill_multi: 'Уже {roundKills} за раунд',
    chat_message: '{username}: {message}',
    chat_message_addressed: 'Обращение от {username}: {message}',
    donation: '{username} задонатил {amount} {currency}: {message}',
    converse: 'Стример: {text}',
  },
  ambient: ['Скажи что-нибудь'],
  fallbacks: { kill: ['Красиво!'], death: ['Бывает...'] },
};

class FakeCommentator implements Commentator {
  readonly calls: Array<[string, string, string | undefined]> = [];

  async generate(kind: string, prompt: string, context?: string): Promise<string> {
    this.calls.push([kind, prompt, context]);
    return `line for ${kind}`;
  }

  fallback(kind: string): string {
    return `fallback for ${kind}`;
  }
}

async function textOf(input: SpeechInput | null): Promise<string | null> {
  if (!input) return null;
  return typeof input.text === 'string' ? input.text : input.text();
}

describe('CommentaryPlanner', () => {
  let commentator: FakeCommentator;
  let clock: number;
  let roll: number;
  let planner: CommentaryPlanner;

  beforeEach(() => {
    setLogLevel('error');
    commentator = new FakeCommentator();
    clock = 0;
    roll = 0.5;
    planner = new CommentaryPlanner(commentator, reactions, {
      personaName: 'Ирис',
      chatReplyChance: 0.2,
      random: () => roll,
      now: () => clock,
    });
  });

  it('plans a kill by the tracked player as combat commentary', async () => {
    const input = planner.plan(kill());

    expect(input).toMatchObject({
      priority: SpeechPriority.COMBAT,
      category: 'combat',
      dedupKey: 'kill',
      emotion: 'excited',
      sourceEventIds: ['de_dust2:3:1000:kill:0'],
    });
    expect(commentator.calls).toEqual([]);
    expect(await textOf(input)).toBe('line for kill');
    expect(commentator.calls).toEqual([['kill', 'Убил enemy с ak47', 'Контекст стрима: У стримера 1 убийств и 0 смертей.']]);
  });

  it('uses the multi-kill prompt from the third kill of a round', async () => {
    const input = planner.plan(kill({ roundKills: 3 }));
    await textOf(input);
    expect(commentator.calls[0][1]).toBe('Уже 3 за раунд');
  });

  it('ignores kills by other players', () => {
    expect(planner.plan(kill({ actor: enemy, victim: me }))).toBeNull();
  });

  it('applies the kill cooldown', () => {
    expect(planner.plan(kill())).not.toBeNull();
    clock = 2_999;
    expect(planner.plan(kill({ id: 'k2' }))).toBeNull();
    clock = 3_000;
    expect(planner.plan(kill({ id: 'k3' }))).not.toBeNull();
  });

  it('falls back to a canned line when no prompt exists for the event', async () => {
    const input = planner.plan({
      kind: 'death', id: 'd1', timestamp: 1000, victim: me, killer: enemy, round: 3, correlationId: 'c',
    });
    expect(input?.emotion).toBe('supportive');
    expect(await textOf(input)).toBe('fallback for death');
  });

  it('samples chat replies but always answers messages addressed to the persona', () => {
    expect(planner.plan(chat('всем привет'))).toBeNull();

    roll = 0.1;
    expect(planner.plan(chat('всем привет', 'chat-2'))).toMatchObject({ priority: SpeechPriority.CHAT, dedupKey: 'chat' });

    roll = 0.9;
    clock = 10_000;
    const addressed = planner.plan(chat('Ирис, как тебе игра?', 'chat-3'));
    expect(addressed).not.toBeNull();
  });

  it('never cools down donations', async () => {
    const donation: DomainEvent = {
      kind: 'donation', id: 'don-1', timestamp: 1000, username: 'fan', amount: 500, currency: 'RUB', message: '',
    };
    expect(planner.plan(donation)).toMatchObject({ priority: SpeechPriority.DONATION, category: 'donation' });
    const second = planner.plan({ ...donation, id: 'don-2' });
    expect(second).not.toBeNull();
    await textOf(second);
    expect(commentator.calls[0][1]).toBe('fan задонатил 500 RUB: без сообщения');
  });

  it('announces unlocks with a fixed line at achievement priority', async () => {
    const input = planner.plan({
      kind: 'unlock', id: 'unlock:first_blood', timestamp: 1000, achievementId: 'first_blood',
      name: 'Первая кровь', description: 'Сделай первое убийство', icon: '🩸', sourceEventId: 'k1',
    });
    expect(input?.priority).toBe(SpeechPriority.ACHIEVEMENT);
    expect(await textOf(input)).toBe('Достижение разблокировано: Первая кровь! Сделай первое убийство');
    expect(commentator.calls).toEqual([]);
  });

  it('lets an ace supersede the round kill commentary', () => {
    const input = planner.plan({
      kind: 'ace', id: 'ace-1', timestamp: 1000, player: me, kills: 5, round: 4, supersedes: ['k1', 'k2'],
    });
    expect(input).toMatchObject({ priority: SpeechPriority.HIGHLIGHT, supersedes: ['k1', 'k2'] });
  });

  it('skips round starts unless it is an eco round', () => {
    const start = {
      kind: 'round_start' as const, id: 'rs', timestamp: 1000, round: 4, mapName: 'de_inferno', score: { ct: 2, t: 1 }, eco: false,
    };
    expect(planner.plan(start)).toBeNull();
    expect(planner.context()).toBe('Контекст стрима: Карта: de_inferno. Счёт: CT 2 — T 1. Раунд: 4.');
    expect(planner.plan({ ...start, id: 'rs2', eco: true })).not.toBeNull();
  });

  it('plans conversation and ambient lines', async () => {
    expect(await textOf(planner.planConversation(''))).toBe('Да? Я слушаю.');
    const reply = planner.planConversation('как дела?');
    expect(reply.priority).toBe(SpeechPriority.COMMAND);
    await textOf(reply);
    expect(commentator.calls[0].slice(0, 2)).toEqual(['converse', 'Стример: как дела?']);

    expect(planner.planAmbient()).not.toBeNull();
    clock = 24_999;
    expect(planner.planAmbient()).toBeNull();
  });

  it('reports session time with Russian plurals', async () => {
    const input = planner.plan({ kind: 'session_time', id: 's2', timestamp: 1000, hours: 2 });
    expect(await textOf(input)).toBe('Мы в эфире уже 2 часа! Спасибо, что вы с нами.');
    expect([1, 3, 5, 11, 21].map(n => pluralRu(n, 'час', 'часа', 'часов')))
      .toEqual(['час', 'часа', 'часов', 'часов', 'час']);
  });
});

class FakeCompletionClient implements CompletionClient {
  readonly requests: Array<{ system: string; messages: ChatMessage[]; signal: AbortSignal }> = [];
  replies: Array<string | Error | 'hang'> = [];

  complete(system: string, messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    this.requests.push({ system, messages, signal });
    const next = this.replies.shift() ?? '';
    if (next === 'hang') return new Promise<string>(() => {});
    if (next instanceof Error) return Promise.reject(next);
    return Promise.resolve(next);
  }
}

describe('ResponseGenerator', () => {
  let client: FakeCompletionClient;
  let memory: ConversationMemory;
  let generator: ResponseGenerator;

  beforeEach(() => {
    setLogLevel('error');
    client = new FakeCompletionClient();
    memory = new ConversationMemory(4);
    generator = new ResponseGenerator(client, {
      systemPrompt: 'persona',
      timeoutMs: 20,
      memory,
      reactions,
      random: () => 0,
    });
  });

  it('returns the cleaned model reply and remembers the exchange', async () => {
    client.replies = ['**Красивый выстрел!**'];

    expect(await generator.generate('kill', 'Убил enemy', 'Контекст')).toBe('Красивый выстрел!');
    expect(client.requests[0].system).toBe('persona');
    expect(client.requests[0].messages).toEqual([{ role: 'user', content: 'Контекст\n\nУбил enemy' }]);
    expect(memory.toMessages()).toEqual([
      { role: 'user', content: 'Убил enemy' },
      { role: 'assistant', content: 'Красивый выстрел!' },
    ]);
    expect(generator.stats).toEqual({ llm: 1, fallback: 0 });
  });

  it('sends remembered turns as history', async () => {
    client.replies = ['Первый', 'Второй'];
    await generator.generate('kill', 'a');
    await generator.generate('kill', 'b');

    expect(client.requests[1].messages).toEqual([
      { role: 'user', content: 'a' },
      { role: 'assistant', content: 'Первый' },
      { role: 'user', content: 'b' },
    ]);
  });

  it('falls back on errors, empty replies and repeats', async () => {
    client.replies = [new Error('overloaded'), '   ', 'Отлично!', 'Отлично!!'];

    expect(await generator.generate('kill', 'a')).toBe('Красиво!');
    expect(await generator.generate('kill', 'b')).toBe('Красиво!');
    expect(await generator.generate('kill', 'c')).toBe('Отлично!');
    expect(await generator.generate('kill', 'd')).toBe('Красиво!');
    expect(generator.stats).toEqual({ llm: 1, fallback: 3 });
  });

  it('falls back and aborts the call when the model times out', async () => {
    client.replies = ['hang'];

    expect(await generator.generate('death', 'a')).toBe('Бывает...');
    expect(client.requests[0].signal.aborted).toBe(true);
  });

  it('uses generic lines for unknown kinds and without a client', async () => {
    const offline = new ResponseGenerator(null, { systemPrompt: '', timeoutMs: 20, memory, reactions, random: () => 0 });
    expect(await offline.generate('raid', 'x')).toBe('Ок!');
  });
});

describe('reply and template helpers', () => {
  it('cleans replies for speech', () => {
    expect(cleanReply('  «Привет,   чат!» ')).toBe('Привет, чат!');
    expect(cleanReply('# Заголовок')).toBe('Заголовок');
  });

  it('fills known placeholders only', () => {
    expect(fillTemplate('{a} и {b}', { a: 1 })).toBe('1 и {b}');
  });

  it('parses reaction files leniently', () => {
    expect(parseReactions({ prompts: { kill: 'x', bad: 3 }, ambient: ['y', ''], fallbacks: { kill: ['z'], death: [] } }))
      .toEqual({ prompts: { kill: 'x' }, ambient: ['y'], fallbacks: { kill: ['z'] } });
  });

  it('evicts the oldest exchange when memory is full', () => {
    const memory = new ConversationMemory(2);
    memory.push('a', 'A');
    memory.push('b', 'B');
    expect(memory.toMessages()).toEqual([
      { role: 'user', content: 'b' },
      { role: 'assistant', content: 'B' },
    ]);
    expect(memory.isRepeat('b!')).toBe(true);
    expect(memory.isRepeat('a')).toBe(false);
  });
});
