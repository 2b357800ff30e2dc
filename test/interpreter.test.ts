import { describe, it, expect, beforeAll } from 'vitest';
import { fileURLToPath } from 'node:url';
import {
  VoiceCommandInterpreter,
  loadVoiceVocabulary,
  parseVoiceVocabulary,
  tokenize,
} from '../src/voice/interpreter.js';
import { setLogLevel } from '../src/logger.js';

const VOCABULARY_PATH = fileURLToPath(new URL('../config/voice-commands.json', import.meta.url));

describe('VoiceCommandInterpreter (shipped vocabulary)', () => {
  let interpreter: VoiceCommandInterpreter;

  beforeAll(() => {
    setLogLevel('error');
    interpreter = new VoiceCommandInterpreter(loadVoiceVocabulary(VOCABULARY_PATH, ['ирис']), { stepPercent: 20 });
  });

  it('lowers the music by one step', () => {
    expect(interpreter.interpret('Ирис сделай музыку тише')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'music', delta: -20 },
    });
  });

  it('raises by an explicit amount', () => {
    expect(interpreter.interpret('Ирис, прибавь дискорд на 15%')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'discord', delta: 15 },
    });
  });

  it('sets an absolute level from a number or a preset', () => {
    expect(interpreter.interpret('ирис громкость 40')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'master', value: 40 },
    });
    expect(interpreter.interpret('ирис браузер на половину')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'browser', value: 50 },
    });
  });

  it('mutes and unmutes, defaulting to the master volume', () => {
    expect(interpreter.interpret('Ирис выключи звук')).toEqual({
      kind: 'intent',
      intent: { kind: 'mute', target: 'master' },
    });
    expect(interpreter.interpret('Ирис, выключи!')).toEqual({
      kind: 'intent',
      intent: { kind: 'mute', target: 'master' },
    });
    expect(interpreter.interpret('ирис включи игру')).toEqual({
      kind: 'intent',
      intent: { kind: 'unmute', target: 'game' },
    });
  });

  it('treats unmute with a level as setting the level', () => {
    expect(interpreter.interpret('ирис верни музыку на 30')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'music', value: 30 },
    });
  });

  it('matches short aliases only as whole words', () => {
    expect(interpreter.interpret('ирис кс тише')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'game', delta: -20 },
    });
    expect(interpreter.interpret('ирис кстати тише')).toEqual({
      kind: 'feedback',
      reason: 'target_not_found',
      word: 'кстати',
      text: 'Не нашла приложение «кстати».',
    });
  });

  it('reports an unknown application', () => {
    expect(interpreter.interpret('Ирис убавь телеграм')).toEqual({
      kind: 'feedback',
      reason: 'target_not_found',
      word: 'телеграм',
      text: 'Не нашла приложение «телеграм».',
    });
  });

  it('recognizes a progress question', () => {
    expect(interpreter.interpret('Ирис, какие достижения?')).toEqual({
      kind: 'intent',
      intent: { kind: 'progress' },
    });
  });

  it('falls back to conversation for anything else', () => {
    expect(interpreter.interpret('Ирис, как дела?')).toEqual({
      kind: 'intent',
      intent: { kind: 'converse', text: 'как дела?' },
    });
    expect(interpreter.interpret('ирис')).toEqual({
      kind: 'intent',
      intent: { kind: 'converse', text: '' },
    });
  });

  it('keeps the first word when punctuation joins it to the wake word', () => {
    expect(interpreter.interpret('Ирис,расскажи анекдот')).toEqual({
      kind: 'intent',
      intent: { kind: 'converse', text: 'расскажи анекдот' },
    });
  });

  it('converses when the command is ambiguous', () => {
    expect(interpreter.interpret('ирис музыку тише а дискорд громче')).toEqual({
      kind: 'intent',
      intent: { kind: 'converse', text: 'музыку тише а дискорд громче' },
    });
  });

  it('ignores utterances without the wake word', () => {
    expect(interpreter.interpret('сделай музыку тише')).toBeNull();
    expect(interpreter.interpret('')).toBeNull();
  });

  it('accepts wake-word variants and ё spelling', () => {
    expect(interpreter.interpret('Айрис, ещё тише')).toEqual({
      kind: 'intent',
      intent: { kind: 'set_volume', target: 'master', delta: -20 },
    });
  });

  it('exposes labels and processes for targets', () => {
    expect(interpreter.labelFor('music')).toBe('музыку');
    expect(interpreter.processesFor('music')).toEqual(['spotify', 'yandexmusic']);
    expect(interpreter.processesFor('master')).toEqual([]);
    expect(interpreter.labelFor('unknown')).toBe('unknown');
  });
});

describe('vocabulary loading', () => {
  it('falls back to wake words only when the file is missing', () => {
    setLogLevel('error');
    const vocabulary = loadVoiceVocabulary('/nonexistent/voice.json', ['Ирис']);
    const interpreter = new VoiceCommandInterpreter(vocabulary, { stepPercent: 10 });

    expect(vocabulary.targets).toEqual([]);
    expect(interpreter.interpret('ирис музыку тише')).toEqual({
      kind: 'intent',
      intent: { kind: 'converse', text: 'музыку тише' },
    });
  });

  it('skips malformed entries', () => {
    const vocabulary = parseVoiceVocabulary({
      wakeWords: ['Бот', 3],
      targets: [{ id: 'chat', aliases: ['Чат'] }, { aliases: ['x'] }],
      actions: { quieter: ['тише'], louder: 'громче' },
      presets: [{ stems: ['макс'], value: 100 }, { stems: ['мин'] }],
    });

    expect(vocabulary.wakeWords).toEqual(['бот']);
    expect(vocabulary.targets).toEqual([{ id: 'chat', label: 'chat', aliases: ['чат'], processes: [] }]);
    expect(vocabulary.actions).toEqual({ quieter: ['тише'], louder: [], mute: [], unmute: [] });
    expect(vocabulary.presets).toEqual([{ stems: ['макс'], value: 100 }]);
  });

  it('tokenizes punctuation away but keeps percentages', () => {
    expect(tokenize('Ирис, ЧУТЬ-ЧУТЬ тише: 10%!')).toEqual(['ирис', 'чуть', 'чуть', 'тише', '10%']);
  });
});
