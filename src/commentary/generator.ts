/**
 * Response generator: persona prompt + rolling memory + event prompt → one
 * short spoken line. Any failure downgrades to a canned line for the event
 * kind, so callers always get text back.
 */

import { readFileSync } from 'node:fs';
import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';
import { ConversationMemory } from './memory.js';
import { GENERIC_FALLBACKS, fillTemplate, pick } from './reactions.js';
import type { ReactionTemplates } from './reactions.js';

const DEFAULT_SYSTEM_PROMPT = `Ты — {persona}, голосовой соведущий стрима. Отвечай по-русски, одной-двумя короткими фразами, без эмодзи и markdown.`;

/** Longest reply we will send to speech synthesis. */
const MAX_REPLY_CHARS = 400;

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

/** The language-model call, kept narrow so tests can stand in for it. */
export interface CompletionClient {
  complete(system: string, messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

export class AnthropicCompletionClient implements CompletionClient {
  private client: Anthropic;

  constructor(apiKey: string, private readonly model: string, private readonly maxTokens: number) {
    this.client = new Anthropic({ apiKey, maxRetries: 1 });
  }

  async complete(system: string, messages: ChatMessage[], signal: AbortSignal): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        system,
        messages,
      },
      { signal },
    );
    const textBlocks = response.content.filter(
      (block): block is Anthropic.Messages.TextBlock => block.type === 'text',
    );
    return textBlocks.map(b => b.text).join('\n').trim();
  }
}

export function loadSystemPrompt(path: string, persona: string): string {
  let template: string;
  try {
    template = readFileSync(path, 'utf-8');
    logger.info(`Generator: loaded system prompt from ${path}`);
  } catch (err) {
    logger.warn('Generator: failed to load system prompt, using default:', err);
    template = DEFAULT_SYSTEM_PROMPT;
  }
  return fillTemplate(template, { persona });
}

/** Strip what does not read aloud well: markdown, quotes around the whole reply, overlong tails. */
export function cleanReply(text: string): string {
  let reply = text.replace(/[*_`#>]+/g, '').replace(/\s+/g, ' ').trim();
  if (/^["«].*["»]$/.test(reply)) reply = reply.slice(1, -1).trim();
  if (reply.length > MAX_REPLY_CHARS) {
    const cut = reply.slice(0, MAX_REPLY_CHARS);
    const end = Math.max(cut.lastIndexOf('.'), cut.lastIndexOf('!'), cut.lastIndexOf('?'));
    reply = end > 0 ? cut.slice(0, end + 1) : cut;
  }
  return reply;
}

export interface GeneratorOptions {
  systemPrompt: string;
  timeoutMs: number;
  memory: ConversationMemory;
  reactions: ReactionTemplates;
  random?: () => number;
}

export interface GeneratorStats {
  llm: number;
  fallback: number;
}

export class ResponseGenerator {
  private readonly client: CompletionClient | null;
  private readonly options: GeneratorOptions;
  private readonly random: () => number;
  readonly stats: GeneratorStats = { llm: 0, fallback: 0 };

  /** A null client means every line comes from the fallbacks. */
  constructor(client: CompletionClient | null, options: GeneratorOptions) {
    this.client = client;
    this.options = options;
    this.random = options.random ?? Math.random;
    if (!client) {
      logger.warn('Generator: no language model configured, using canned lines only');
    }
  }

  /**
   * Generate a line for `prompt`. `kind` selects the fallback list.
   * Never rejects.
   */
  async generate(kind: string, prompt: string, context = ''): Promise<string> {
    if (!this.client) return this.fallback(kind);

    const content = context ? `${context}\n\n${prompt}` : prompt;
    const messages: ChatMessage[] = [...this.options.memory.toMessages(), { role: 'user', content }];
    const controller = new AbortController();

    try {
      const raw = await withTimeout(
        this.client.complete(this.options.systemPrompt, messages, controller.signal),
        this.options.timeoutMs,
        `completion for ${kind}`,
      );
      const reply = cleanReply(raw);
      if (!reply) {
        logger.warn(`Generator: empty reply for ${kind}, using fallback`);
        return this.fallback(kind);
      }
      if (this.options.memory.isRepeat(reply)) {
        logger.debug(`Generator: repeated line for ${kind}, using fallback`);
        return this.fallback(kind);
      }
      this.options.memory.push(prompt, reply);
      this.stats.llm++;
      return reply;
    } catch (err) {
      controller.abort();
      logger.warn(`Generator: completion for ${kind} failed, using fallback:`, err);
      return this.fallback(kind);
    }
  }

  fallback(kind: string): string {
    this.stats.fallback++;
    const lines = this.options.reactions.fallbacks[kind] ?? GENERIC_FALLBACKS;
    return pick(lines, this.random) ?? GENERIC_FALLBACKS[0];
  }
}
