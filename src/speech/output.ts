import { logger } from '../logger.js';
import type { AudioPlayer } from './player.js';
import type { SpeechSynthesizer } from './synthesizer.js';
import type { Emotion } from '../types/index.js';

/** The single audio channel the arbiter speaks through. */
export interface SpeechOutput {
  /** Speak one utterance; resolves after playback. Aborting stops it. */
  speak(text: string, emotion: Emotion, signal: AbortSignal): Promise<void>;
  /** Release the playback resource. */
  close(): Promise<void>;
}

/** Text-to-speech followed by local playback. */
export class SynthesizedSpeechOutput implements SpeechOutput {
  constructor(
    private readonly synthesizer: SpeechSynthesizer,
    private readonly player: AudioPlayer,
  ) {}

  async speak(text: string, emotion: Emotion, signal: AbortSignal): Promise<void> {
    const audio = await this.synthesizer.synthesize(text, emotion, signal);
    await this.player.play(audio, signal);
  }

  async close(): Promise<void> {
    this.player.stop();
  }
}

/** Logs lines instead of speaking them (no speech API key configured). */
export class LogSpeechOutput implements SpeechOutput {
  constructor(private readonly persona: string) {}

  async speak(text: string, emotion: Emotion): Promise<void> {
    logger.info(`${this.persona} (${emotion}): ${text}`);
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
