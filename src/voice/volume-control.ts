import { logger } from '../logger.js';
import type { Intent } from '../types/index.js';
import type { AudioMixer, MixerTarget } from './mixer.js';

export type VolumeIntent = Extract<Intent, { kind: 'set_volume' | 'mute' | 'unmute' }>;

export interface TargetResolver {
  labelFor(target: string): string;
  processesFor(target: string): string[];
}

const DEFAULT_LEVEL = 100;

function clamp(percent: number): number {
  return Math.min(100, Math.max(0, Math.round(percent)));
}

export function isVolumeIntent(intent: Intent): intent is VolumeIntent {
  return intent.kind === 'set_volume' || intent.kind === 'mute' || intent.kind === 'unmute';
}

/**
 * Executes volume intents against the mixer and returns the spoken feedback.
 * Levels are remembered per target since the mixer cannot be queried.
 */
export class VolumeController {
  private levels = new Map<string, number>();
  /** Level each muted target had before muting. */
  private muted = new Map<string, number>();

  constructor(
    private readonly mixer: AudioMixer,
    private readonly targets: TargetResolver,
  ) {}

  levelOf(target: string): number {
    return this.levels.get(target) ?? DEFAULT_LEVEL;
  }

  async execute(intent: VolumeIntent): Promise<string> {
    const label = this.targets.labelFor(intent.target);
    const mixerTarget: MixerTarget = { id: intent.target, processes: this.targets.processesFor(intent.target) };

    switch (intent.kind) {
      case 'mute': {
        const ok = await this.apply(mixerTarget, 0);
        if (!ok) return `Не смогла выключить ${label}.`;
        this.muted.set(intent.target, this.muted.get(intent.target) ?? this.levelOf(intent.target));
        this.levels.set(intent.target, 0);
        return `Выключила ${label}.`;
      }
      case 'unmute': {
        const restored = this.muted.get(intent.target) ?? DEFAULT_LEVEL;
        const level = restored > 0 ? restored : DEFAULT_LEVEL;
        const ok = await this.apply(mixerTarget, level);
        if (!ok) return `Не смогла включить ${label}.`;
        this.muted.delete(intent.target);
        this.levels.set(intent.target, level);
        return `Включила ${label}.`;
      }
      case 'set_volume': {
        const level = 'value' in intent
          ? clamp(intent.value)
          : clamp(this.levelOf(intent.target) + intent.delta);
        const ok = await this.apply(mixerTarget, level);
        if (!ok) return `Не смогла поменять громкость: ${label}.`;
        this.muted.delete(intent.target);
        this.levels.set(intent.target, level);
        if ('value' in intent) return `Поставила ${label} на ${level}%.`;
        return intent.delta < 0
          ? `Сделала ${label} тише, теперь ${level}%.`
          : `Сделала ${label} громче, теперь ${level}%.`;
      }
    }
  }

  private async apply(target: MixerTarget, level: number): Promise<boolean> {
    try {
      return await this.mixer.setLevel(target, level);
    } catch (err) {
      logger.warn(`Volume: mixer failed for ${target.id}:`, err);
      return false;
    }
  }
}
