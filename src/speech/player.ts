import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { logger } from '../logger.js';

export interface AudioPlayer {
  /** Play one encoded clip; resolves when playback ends. Aborting kills playback. */
  play(audio: Buffer, signal?: AbortSignal): Promise<void>;
  /** Kill whatever is playing. */
  stop(): void;
}

/** ffplay flags: no window, exit at end of stream, read from stdin. */
export const FFPLAY_ARGS = ['-nodisp', '-autoexit', '-loglevel', 'error', '-i', 'pipe:0'];

/** Plays clips through an external player process fed on stdin. */
export class ProcessAudioPlayer implements AudioPlayer {
  private child: ChildProcess | null = null;

  constructor(
    private readonly command: string,
    private readonly args: readonly string[] = FFPLAY_ARGS,
  ) {}

  play(audio: Buffer, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new Error('Playback aborted before start'));
        return;
      }

      const child = spawn(this.command, [...this.args], { stdio: ['pipe', 'ignore', 'pipe'] });
      this.child = child;
      let stderr = '';

      const onAbort = (): void => {
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        signal?.removeEventListener('abort', onAbort);
        if (this.child === child) this.child = null;
      };

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (err: Error) => {
        cleanup();
        reject(err);
      });

      child.on('close', (code: number | null, sig: NodeJS.Signals | null) => {
        cleanup();
        if (code === 0) {
          resolve();
        } else {
          reject(new Error(`${this.command} exited with ${code ?? sig}: ${stderr.trim()}`));
        }
      });

      // The player may exit before reading everything (killed, bad input).
      child.stdin.on('error', (err: Error) => {
        logger.debug(`Player: stdin closed early: ${err.message}`);
      });
      child.stdin.end(audio);
    });
  }

  stop(): void {
    if (this.child) {
      logger.debug('Player: stopping playback');
      this.child.kill('SIGTERM');
    }
  }
}
