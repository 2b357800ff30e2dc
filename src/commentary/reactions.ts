import { readFileSync } from 'node:fs';
import { logger } from '../logger.js';
import { isRecord } from '../utils/guards.js';

export interface ReactionTemplates {
  /** Prompt template per reaction key, `{name}` placeholders. */
  prompts: Record<string, string>;
  /** Prompts for idle commentary. */
  ambient: string[];
  /** Canned lines per event kind, used when the generator fails. */
  fallbacks: Record<string, string[]>;
}

export const GENERIC_FALLBACKS = ['Ок!', 'Понятно!', 'Хорошо!'];

export function parseReactions(document: unknown): ReactionTemplates {
  const reactions: ReactionTemplates = { prompts: {}, ambient: [], fallbacks: {} };
  if (!isRecord(document)) return reactions;

  if (isRecord(document.prompts)) {
    for (const [key, value] of Object.entries(document.prompts)) {
      if (typeof value === 'string' && value.trim()) reactions.prompts[key] = value;
    }
  }
  if (Array.isArray(document.ambient)) {
    reactions.ambient = document.ambient.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
  }
  if (isRecord(document.fallbacks)) {
    for (const [key, value] of Object.entries(document.fallbacks)) {
      if (!Array.isArray(value)) continue;
      const lines = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
      if (lines.length > 0) reactions.fallbacks[key] = lines;
    }
  }
  return reactions;
}

export function loadReactions(path: string): ReactionTemplates {
  try {
    const reactions = parseReactions(JSON.parse(readFileSync(path, 'utf-8')));
    logger.info(`Reactions: loaded ${Object.keys(reactions.prompts).length} prompts from ${path}`);
    return reactions;
  } catch (err) {
    logger.warn(`Reactions: failed to load ${path}, commentary uses generic lines:`, err);
    return { prompts: {}, ambient: [], fallbacks: {} };
  }
}

/** Replace `{name}` placeholders; unknown names are left as written. */
export function fillTemplate(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in vars ? String(vars[name]) : match,
  );
}

export function pick<T>(items: readonly T[], random: () => number): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}
