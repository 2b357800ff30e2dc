import OpenAI from 'openai';
import { logger } from '../logger.js';
import type { Emotion } from '../types/index.js';

export interface SpeechSynthesizer {
  /** Synthesize `text` into a playable audio buffer (mp3). */
  synthesize(text: string, emotion: Emotion, signal?: AbortSignal): Promise<Buffer>;
}

const VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
type Voice = typeof VOICES[number];

function parseVoice(raw: string): Voice {
  const match = VOICES.find(v => v === raw.trim().toLowerCase());
  if (!match) {
    logger.warn(`Synthesizer: unknown voice "${raw}", using nova`);
    return 'nova';
  }
  return match;
}

/** Playback speed per emotion; 1.0 is the voice's normal rate. */
export const EMOTION_SPEED: Record<Emotion, number> = {
  neutral: 1.0,
  excited: 1.15,
  happy: 1.1,
  supportive: 0.95,
  tense: 1.2,
  gentle: 0.85,
};

/** Longest input the speech endpoint accepts. */
const MAX_INPUT_CHARS = 4096;

export interface OpenAISynthesizerOptions {
  apiKey: string;
  model: string;
  voice: string;
  /** Injected client (tests). */
  client?: OpenAI;
}

export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly voice: Voice;

  constructor(options: OpenAISynthesizerOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 1 });
    this.model = options.model;
    this.voice = parseVoice(options.voice);
  }

  async synthesize(text: string, emotion: Emotion, signal?: AbortSignal): Promise<Buffer> {
    const input = text.trim().slice(0, MAX_INPUT_CHARS);
    if (!input) {
      throw new Error('Speech synthesis requires non-empty text');
    }
    const response = await this.client.audio.speech.create(
      {
        model: this.model,
        voice: this.voice,
        input,
        speed: EMOTION_SPEED[emotion],
        response_format: 'mp3',
      },
      { signal },
    );
    const audio = Buffer.from(await response.arrayBuffer());
    if (audio.length === 0) {
      throw new Error('Speech synthesis returned empty audio');
    }
    logger.debug(`Synthesizer: ${input.length} chars → ${audio.length} bytes (${emotion})`);
    return audio;
  }
}
