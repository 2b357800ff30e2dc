import { config as dotenvConfig } from 'dotenv';
import { parseLogLevel, registerSecret, setLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

dotenvConfig();

export interface CohostConfig {
  personaName: string;

  // LLM response generator
  anthropicApiKey: string;
  anthropicModel: string;
  llmMaxTokens: number;
  llmTimeoutSeconds: number;
  conversationMemorySize: number;
  systemPromptPath: string;
  reactionsPath: string;

  // Speech in / out
  openaiApiKey: string;
  ttsModel: string;
  ttsVoice: string;
  sttModel: string;
  sttLanguage: string;
  speechTimeoutSeconds: number;
  sttTimeoutSeconds: number;
  /** Executable fed synthesized audio on stdin (ffplay-compatible flags). */
  playerCommand: string;

  // Audio mixer
  /**
   * Command template run for volume changes. `{process}` and `{level}` (0.0–1.0)
   * are substituted; empty means log-only mixer.
   */
  mixerCommand: string;
  mixerTimeoutSeconds: number;
  volumeStepPercent: number;
  voiceCommandsPath: string;

  // Snapshot ingest
  gsiPort: number;
  gsiAuthToken: string;
  gsiConfigPath: string;

  // Chat/donation feed
  streamElementsJwt: string;

  // Arbiter / commentary
  maxSpeechQueue: number;
  ambientIntervalSeconds: number;
  chatReplyChance: number;

  // Achievements
  achievementsPath: string;
  progressPath: string;

  logLevel: LogLevel;
}

function parseInt10(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

function parseRatio(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const n = parseFloat(raw);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(1, Math.max(0, n));
}

let _config: CohostConfig | null = null;

export function getConfig(): CohostConfig {
  if (_config) return _config;

  const anthropicApiKey = process.env.ANTHROPIC_API_KEY ?? '';
  const openaiApiKey = process.env.OPENAI_API_KEY ?? '';
  const streamElementsJwt = process.env.STREAMELEMENTS_JWT ?? '';
  const gsiAuthToken = process.env.GSI_AUTH_TOKEN ?? '';

  // Register secrets for log redaction
  if (anthropicApiKey) registerSecret(anthropicApiKey);
  if (openaiApiKey) registerSecret(openaiApiKey);
  if (streamElementsJwt) registerSecret(streamElementsJwt);
  if (gsiAuthToken) registerSecret(gsiAuthToken);

  const logLevel = parseLogLevel(process.env.LOG_LEVEL) ?? (process.env.DEBUG ? 'debug' : 'info');
  setLogLevel(logLevel);

  _config = {
    personaName: process.env.PERSONA_NAME ?? 'Ирис',

    anthropicApiKey,
    anthropicModel: process.env.ANTHROPIC_MODEL ?? 'claude-3-5-haiku-20241022',
    llmMaxTokens: parseInt10(process.env.LLM_MAX_TOKENS, 150),
    llmTimeoutSeconds: parseInt10(process.env.LLM_TIMEOUT_SECONDS, 10),
    conversationMemorySize: parseInt10(process.env.CONVERSATION_MEMORY_SIZE, 12),
    systemPromptPath: process.env.SYSTEM_PROMPT_PATH ?? './prompts/system.md',
    reactionsPath: process.env.REACTIONS_PATH ?? './config/reactions.json',

    openaiApiKey,
    ttsModel: process.env.TTS_MODEL ?? 'tts-1',
    ttsVoice: process.env.TTS_VOICE ?? 'nova',
    sttModel: process.env.STT_MODEL ?? 'whisper-1',
    sttLanguage: process.env.STT_LANGUAGE ?? 'ru',
    speechTimeoutSeconds: parseInt10(process.env.SPEECH_TIMEOUT_SECONDS, 30),
    sttTimeoutSeconds: parseInt10(process.env.STT_TIMEOUT_SECONDS, 15),
    playerCommand: process.env.PLAYER_COMMAND ?? 'ffplay',

    mixerCommand: process.env.MIXER_COMMAND ?? '',
    mixerTimeoutSeconds: parseInt10(process.env.MIXER_TIMEOUT_SECONDS, 5),
    volumeStepPercent: parseInt10(process.env.VOLUME_STEP_PERCENT, 20),
    voiceCommandsPath: process.env.VOICE_COMMANDS_PATH ?? './config/voice-commands.json',

    gsiPort: parseInt10(process.env.GSI_PORT, 3000),
    gsiAuthToken,
    gsiConfigPath: process.env.GSI_CONFIG_PATH ?? '',

    streamElementsJwt,

    maxSpeechQueue: parseInt10(process.env.MAX_SPEECH_QUEUE, 8),
    ambientIntervalSeconds: parseInt10(process.env.AMBIENT_INTERVAL_SECONDS, 120),
    chatReplyChance: parseRatio(process.env.CHAT_REPLY_CHANCE, 0.2),

    achievementsPath: process.env.ACHIEVEMENTS_PATH ?? './config/achievements.json',
    progressPath: process.env.PROGRESS_PATH ?? './data/progress.json',

    logLevel,
  };

  return _config;
}

/** Reset cached config (for testing). */
export function resetConfig(): void {
  _config = null;
}
