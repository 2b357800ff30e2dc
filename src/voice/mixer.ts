import { execFile } from 'node:child_process';
import { logger } from '../logger.js';
import { errorMessage } from '../utils/timeout.js';

export interface MixerTarget {
  id: string;
  /** Process names; empty for the master volume. */
  processes: string[];
}

/** OS-level volume control. Resolves false on failure, never rejects. */
export interface AudioMixer {
  setLevel(target: MixerTarget, percent: number): Promise<boolean>;
}

/** Process name substituted into the command for the master volume. */
export const MASTER_PROCESS = 'master';

/**
 * Runs a command template per process, e.g.
 * `nircmd setappvolume {process} {level}`. `{level}` is 0.0–1.0.
 * Succeeds when at least one process was adjusted.
 */
export class CommandAudioMixer implements AudioMixer {
  private readonly template: string[];

  constructor(template: string, private readonly timeoutMs: number) {
    this.template = template.trim().split(/\s+/).filter(Boolean);
  }

  async setLevel(target: MixerTarget, percent: number): Promise<boolean> {
    if (this.template.length === 0) return false;
    const level = (Math.min(100, Math.max(0, percent)) / 100).toFixed(2);
    const processes = target.processes.length > 0 ? target.processes : [MASTER_PROCESS];

    const results = await Promise.all(processes.map(name => this.run(name, level)));
    const ok = results.some(Boolean);
    if (ok) {
      logger.info(`Mixer: ${target.id} → ${Math.round(percent)}%`);
    }
    return ok;
  }

  private run(processName: string, level: string): Promise<boolean> {
    const [command, ...args] = this.template.map(part =>
      part.replaceAll('{process}', processName).replaceAll('{level}', level),
    );
    return new Promise(resolve => {
      execFile(command, args, { timeout: this.timeoutMs, windowsHide: true }, (err, _stdout, stderr) => {
        if (err) {
          logger.warn(`Mixer: ${command} failed for ${processName}: ${errorMessage(err)} ${String(stderr).trim()}`);
          resolve(false);
          return;
        }
        resolve(true);
      });
    });
  }
}

/** Used when no mixer command is configured: records the change, always succeeds. */
export class LoggingAudioMixer implements AudioMixer {
  async setLevel(target: MixerTarget, percent: number): Promise<boolean> {
    logger.info(`Mixer (log only): ${target.id} → ${Math.round(percent)}%`);
    return true;
  }
}
