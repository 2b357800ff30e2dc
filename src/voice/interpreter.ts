/**
 * Voice-Command Interpreter: recognized utterance → Intent.
 *
 * Utterances must open with the wake phrase. What follows is read as a
 * volume command when it parses cleanly; anything ambiguous becomes a
 * conversation request so the assistant still answers.
 */

import { readFileSync } from 'node:fs';
import { logger } from '../logger.js';
import { isRecord } from '../utils/guards.js';
import type { Intent, Interpretation } from '../types/index.js';

export type VolumeAction = 'quieter' | 'louder' | 'mute' | 'unmute';

const VOLUME_ACTIONS: readonly VolumeAction[] = ['quieter', 'louder', 'mute', 'unmute'];

export interface VolumeTargetSpec {
  id: string;
  /** Accusative form used in spoken feedback ("музыку"). */
  label: string;
  aliases: string[];
  /** Process names the mixer adjusts; empty means the master volume. */
  processes: string[];
}

export interface VoiceVocabulary {
  wakeWords: string[];
  targets: VolumeTargetSpec[];
  actions: Record<VolumeAction, string[]>;
  presets: Array<{ stems: string[]; value: number }>;
  fillers: string[];
  progressStems: string[];
}

export const MASTER_TARGET = 'master';

/** Shorter aliases must match a whole word ("кс" must not match "кстати"). */
const MIN_PREFIX_ALIAS = 4;

export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/ё/g, 'е');
}

export function tokenize(text: string): string[] {
  return normalizeWord(text)
    .replace(/[^\p{L}\p{N}%\s]+/gu, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

// ── Vocabulary loading ─────────────────────────────────────────────────────

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map(normalizeWord)
    : [];
}

export function emptyVocabulary(wakeWords: string[] = []): VoiceVocabulary {
  return {
    wakeWords: wakeWords.map(normalizeWord),
    targets: [],
    actions: { quieter: [], louder: [], mute: [], unmute: [] },
    presets: [],
    fillers: [],
    progressStems: [],
  };
}

export function parseVoiceVocabulary(document: unknown): VoiceVocabulary {
  const vocabulary = emptyVocabulary();
  if (!isRecord(document)) return vocabulary;

  vocabulary.wakeWords = stringList(document.wakeWords);
  vocabulary.fillers = stringList(document.fillers);
  vocabulary.progressStems = stringList(document.progressStems);

  if (Array.isArray(document.targets)) {
    for (const entry of document.targets) {
      if (!isRecord(entry) || typeof entry.id !== 'string') continue;
      vocabulary.targets.push({
        id: entry.id,
        label: typeof entry.label === 'string' ? entry.label : entry.id,
        aliases: stringList(entry.aliases),
        processes: Array.isArray(entry.processes)
          ? entry.processes.filter((p): p is string => typeof p === 'string')
          : [],
      });
    }
  }

  const actions = isRecord(document.actions) ? document.actions : {};
  for (const action of VOLUME_ACTIONS) {
    vocabulary.actions[action] = stringList(actions[action]);
  }

  if (Array.isArray(document.presets)) {
    for (const entry of document.presets) {
      if (isRecord(entry) && typeof entry.value === 'number') {
        vocabulary.presets.push({ stems: stringList(entry.stems), value: entry.value });
      }
    }
  }

  return vocabulary;
}

/**
 * Load the vocabulary file. On failure only the fallback wake words are
 * recognized, so every command degrades to conversation.
 */
export function loadVoiceVocabulary(path: string, fallbackWakeWords: string[]): VoiceVocabulary {
  try {
    const vocabulary = parseVoiceVocabulary(JSON.parse(readFileSync(path, 'utf-8')));
    if (vocabulary.wakeWords.length === 0) {
      vocabulary.wakeWords = fallbackWakeWords.map(normalizeWord);
    }
    logger.info(`Voice: loaded ${vocabulary.wakeWords.length} wake words, ${vocabulary.targets.length} targets from ${path}`);
    return vocabulary;
  } catch (err) {
    logger.error(`Voice: failed to load vocabulary from ${path}:`, err);
    return emptyVocabulary(fallbackWakeWords);
  }
}

// ── Interpretation ─────────────────────────────────────────────────────────

type Token =
  | { kind: 'action'; action: VolumeAction }
  | { kind: 'value'; value: number }
  | { kind: 'target'; target: string }
  | { kind: 'filler' }
  | { kind: 'progress' }
  | { kind: 'unknown'; word: string };

const NUMBER_PATTERN = /^(\d{1,3})%?$/;

export interface InterpreterOptions {
  /** Step applied by "quieter" / "louder", in percent. */
  stepPercent: number;
}

export class VoiceCommandInterpreter {
  private readonly vocabulary: VoiceVocabulary;
  private readonly wakeWords: ReadonlySet<string>;
  private readonly fillers: ReadonlySet<string>;
  private readonly step: number;

  constructor(vocabulary: VoiceVocabulary, options: InterpreterOptions) {
    this.vocabulary = vocabulary;
    this.wakeWords = new Set(vocabulary.wakeWords);
    this.fillers = new Set(vocabulary.fillers);
    this.step = options.stepPercent;
  }

  /** Interpret one utterance. No wake phrase → null. */
  interpret(text: string): Interpretation | null {
    const tokens = tokenize(text);
    if (tokens.length === 0 || !this.wakeWords.has(tokens[0])) return null;

    const words = tokens.slice(1);
    const remainder = stripWakeWord(text);
    const converse: Interpretation = { kind: 'intent', intent: { kind: 'converse', text: remainder } };
    if (words.length === 0) return converse;

    const classified = words.map(word => this.classify(word));
    const actions = unique(classified.flatMap(t => (t.kind === 'action' ? [t.action] : [])));
    const values = classified.flatMap(t => (t.kind === 'value' ? [t.value] : []));
    const targets = unique(classified.flatMap(t => (t.kind === 'target' ? [t.target] : [])));
    const unknown = classified.flatMap(t => (t.kind === 'unknown' ? [t.word] : []));
    const progress = classified.some(t => t.kind === 'progress');

    if (actions.length === 0 && values.length === 0) {
      if (progress && targets.length === 0 && unknown.length <= 1) {
        return { kind: 'intent', intent: { kind: 'progress' } };
      }
      return converse;
    }

    if (actions.length > 1 || values.length > 1 || targets.length > 1 || unknown.length > 1) {
      return converse;
    }

    if (targets.length === 0 && unknown.length === 1) {
      const word = unknown[0];
      return {
        kind: 'feedback',
        reason: 'target_not_found',
        word,
        text: `Не нашла приложение «${word}».`,
      };
    }

    const target = targets[0] ?? MASTER_TARGET;
    const intent = this.buildIntent(actions[0], values[0], target);
    return intent ? { kind: 'intent', intent } : converse;
  }

  private buildIntent(action: VolumeAction | undefined, value: number | undefined, target: string): Intent | null {
    switch (action) {
      case 'mute':
        return { kind: 'mute', target };
      case 'unmute':
        return value === undefined
          ? { kind: 'unmute', target }
          : { kind: 'set_volume', target, value };
      case 'quieter':
        return { kind: 'set_volume', target, delta: -(value ?? this.step) };
      case 'louder':
        return { kind: 'set_volume', target, delta: value ?? this.step };
      case undefined:
        return value === undefined ? null : { kind: 'set_volume', target, value };
    }
  }

  private classify(word: string): Token {
    for (const action of VOLUME_ACTIONS) {
      if (this.vocabulary.actions[action].some(stem => word.startsWith(stem))) {
        return { kind: 'action', action };
      }
    }
    const number = NUMBER_PATTERN.exec(word);
    if (number) {
      return { kind: 'value', value: Number(number[1]) };
    }
    const preset = this.vocabulary.presets.find(p => p.stems.some(stem => word.startsWith(stem)));
    if (preset) {
      return { kind: 'value', value: preset.value };
    }
    if (this.fillers.has(word)) {
      return { kind: 'filler' };
    }
    const target = this.vocabulary.targets.find(t => t.aliases.some(alias => matchesAlias(word, alias)));
    if (target) {
      return { kind: 'target', target: target.id };
    }
    if (this.vocabulary.progressStems.some(stem => word.startsWith(stem))) {
      return { kind: 'progress' };
    }
    return { kind: 'unknown', word };
  }

  /** Spoken label for a target id. */
  labelFor(target: string): string {
    return this.vocabulary.targets.find(t => t.id === target)?.label ?? target;
  }

  /** Process names for a target id; empty for the master volume. */
  processesFor(target: string): string[] {
    return this.vocabulary.targets.find(t => t.id === target)?.processes ?? [];
  }
}

function matchesAlias(word: string, alias: string): boolean {
  return alias.length >= MIN_PREFIX_ALIAS ? word.startsWith(alias) : word === alias;
}

function unique<T>(items: T[]): T[] {
  return [...new Set(items)];
}

/** The utterance minus its first token, split the way `tokenize` splits. */
function stripWakeWord(text: string): string {
  return text.replace(/^[^\p{L}\p{N}%]*[\p{L}\p{N}%]+[^\p{L}\p{N}%]*/u, '').trim();
}
