/**
 * Stream co-host entry point.
 *
 * Loads configuration and data files, builds the pipeline, opens the
 * snapshot listener and the chat/donation feed, and shuts everything
 * down in order on a signal.
 */

import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

import { getConfig } from './config.js';
import { logger } from './logger.js';
import { Cohost } from './orchestrator.js';
import { StateDiffer } from './game/differ.js';
import { loadAchievementRules } from './achievements/rules.js';
import { JsonProgressStore } from './achievements/store.js';
import { AchievementTracker } from './achievements/tracker.js';
import { loadReactions } from './commentary/reactions.js';
import { ConversationMemory } from './commentary/memory.js';
import { AnthropicCompletionClient, ResponseGenerator, loadSystemPrompt } from './commentary/generator.js';
import { CommentaryPlanner } from './commentary/planner.js';
import { ReactionArbiter } from './speech/arbiter.js';
import { LogSpeechOutput, SynthesizedSpeechOutput } from './speech/output.js';
import type { SpeechOutput } from './speech/output.js';
import { FFPLAY_ARGS, ProcessAudioPlayer } from './speech/player.js';
import { OpenAISpeechSynthesizer } from './speech/synthesizer.js';
import { VoiceCommandInterpreter, loadVoiceVocabulary } from './voice/interpreter.js';
import { CommandAudioMixer, LoggingAudioMixer } from './voice/mixer.js';
import type { AudioMixer } from './voice/mixer.js';
import { VolumeController } from './voice/volume-control.js';
import { OpenAITranscriber } from './voice/transcriber.js';
import { IngestServer } from './ingest/http-server.js';
import { writeGsiConfig } from './ingest/gsi-config.js';
import { StreamElementsFeed } from './feed/streamelements.js';

const config = getConfig();

// ── Core components ────────────────────────────────────────────────────────

let cohost: Cohost | null = null;
let ingest: IngestServer | null = null;
let feed: StreamElementsFeed | null = null;

// ── Graceful shutdown ──────────────────────────────────────────────────────

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown...`);

  try {
    if (feed) feed.stop();
    if (ingest) await ingest.stop();
    if (cohost) await cohost.stop();
    logger.info('Shutdown complete. Пока!');
  } catch (err) {
    logger.error('Error during shutdown:', err);
  }

  process.exit(0);
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  gracefulShutdown('uncaughtException');
});

// ── Component construction ─────────────────────────────────────────────────

function createSpeechOutput(): SpeechOutput {
  if (!config.openaiApiKey) {
    logger.warn('  OPENAI_API_KEY not set: lines are logged instead of spoken.');
    return new LogSpeechOutput(config.personaName);
  }
  const synthesizer = new OpenAISpeechSynthesizer({
    apiKey: config.openaiApiKey,
    model: config.ttsModel,
    voice: config.ttsVoice,
  });
  return new SynthesizedSpeechOutput(synthesizer, new ProcessAudioPlayer(config.playerCommand, FFPLAY_ARGS));
}

function createMixer(): AudioMixer {
  if (!config.mixerCommand) {
    logger.warn('  MIXER_COMMAND not set: volume commands are logged only.');
    return new LoggingAudioMixer();
  }
  return new CommandAudioMixer(config.mixerCommand, config.mixerTimeoutSeconds * 1000);
}

async function main(): Promise<void> {
  logger.info(`Stream co-host starting (persona: ${config.personaName})`);

  // ── Step 1: Data files ───────────────────────────────────────────────
  const rules = loadAchievementRules(config.achievementsPath);
  const tracker = await AchievementTracker.open(rules, new JsonProgressStore(config.progressPath));
  const reactions = loadReactions(config.reactionsPath);
  const systemPrompt = loadSystemPrompt(config.systemPromptPath, config.personaName);
  const vocabulary = loadVoiceVocabulary(config.voiceCommandsPath, [config.personaName]);

  // ── Step 2: Commentary ───────────────────────────────────────────────
  if (!config.anthropicApiKey) {
    logger.warn('  ANTHROPIC_API_KEY not set: commentary uses canned lines only.');
  }
  const completion = config.anthropicApiKey
    ? new AnthropicCompletionClient(config.anthropicApiKey, config.anthropicModel, config.llmMaxTokens)
    : null;
  const generator = new ResponseGenerator(completion, {
    systemPrompt,
    timeoutMs: config.llmTimeoutSeconds * 1000,
    memory: new ConversationMemory(config.conversationMemorySize),
    reactions,
  });
  const planner = new CommentaryPlanner(generator, reactions, {
    personaName: config.personaName,
    chatReplyChance: config.chatReplyChance,
  });

  // ── Step 3: Speech and voice ─────────────────────────────────────────
  const arbiter = new ReactionArbiter(createSpeechOutput(), {
    maxQueue: config.maxSpeechQueue,
    speechTimeoutMs: config.speechTimeoutSeconds * 1000,
    producerTimeoutMs: (config.llmTimeoutSeconds + 2) * 1000,
  });
  const interpreter = new VoiceCommandInterpreter(vocabulary, { stepPercent: config.volumeStepPercent });
  const volume = new VolumeController(createMixer(), interpreter);
  const transcriber = config.openaiApiKey
    ? new OpenAITranscriber({
      apiKey: config.openaiApiKey,
      model: config.sttModel,
      language: config.sttLanguage,
      timeoutMs: config.sttTimeoutSeconds * 1000,
    })
    : null;

  cohost = new Cohost(
    { differ: new StateDiffer(), tracker, planner, arbiter, interpreter, volume, transcriber },
    { ambientIntervalMs: config.ambientIntervalSeconds * 1000 },
  );
  cohost.start();

  // ── Step 4: Snapshot listener ────────────────────────────────────────
  if (!config.gsiAuthToken) {
    logger.warn('  GSI_AUTH_TOKEN not set: snapshots are accepted without a token.');
  }
  ingest = new IngestServer(cohost.handlers(), { authToken: config.gsiAuthToken });
  const port = await ingest.start(config.gsiPort);

  if (config.gsiConfigPath) {
    try {
      await writeGsiConfig(config.gsiConfigPath, port, config.gsiAuthToken);
      logger.info(`  Game client config written to ${config.gsiConfigPath}`);
    } catch (err) {
      logger.warn(`  Could not write game client config to ${config.gsiConfigPath}:`, err);
    }
  }

  // ── Step 5: Chat/donation feed ───────────────────────────────────────
  if (config.streamElementsJwt) {
    const activeCohost = cohost;
    feed = new StreamElementsFeed(config.streamElementsJwt);
    feed.on('event', event => activeCohost.dispatch(event));
    feed.start();
  } else {
    logger.warn('  STREAMELEMENTS_JWT not set: chat and donation reactions are disabled.');
  }

  logger.info(`Stream co-host ready, listening for snapshots on port ${port}`);
}

main().catch((err) => {
  logger.error('Fatal startup error:', err);
  process.exit(1);
});
