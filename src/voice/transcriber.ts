import OpenAI, { toFile } from 'openai';
import { logger } from '../logger.js';
import { withTimeout } from '../utils/timeout.js';

/** Speech-to-text collaborator. Resolves null when nothing usable was heard. */
export interface Transcriber {
  transcribe(audio: Buffer, filename?: string): Promise<string | null>;
}

export interface OpenAITranscriberOptions {
  apiKey: string;
  model: string;
  language: string;
  timeoutMs: number;
  client?: OpenAI;
}

export class OpenAITranscriber implements Transcriber {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAITranscriberOptions) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 1 });
  }

  async transcribe(audio: Buffer, filename = 'utterance.wav'): Promise<string | null> {
    if (audio.length === 0) return null;
    try {
      const controller = new AbortController();
      const file = await toFile(audio, filename);
      const response = await withTimeout(
        this.client.audio.transcriptions.create(
          { model: this.options.model, file, language: this.options.language },
          { signal: controller.signal },
        ),
        this.options.timeoutMs,
        'transcription',
      ).finally(() => controller.abort());
      const text = response.text.trim();
      if (!text) return null;
      logger.debug(`Transcriber: "${text}"`);
      return text;
    } catch (err) {
      logger.warn('Transcriber: transcription failed:', err);
      return null;
    }
  }
}
