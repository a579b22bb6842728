// Voice Command Relay - Public API and application wiring
// Builds the Deepgram source, trigger configuration, relay and server from a RelayConfig.

import { createClient as createDeepgramClient } from "@deepgram/sdk";
import { createAppServer, type AppServer } from "./server.js";
import { VoiceRelay } from "./voice-relay.js";
import { DeepgramTranscriptionSource, type DeepgramListenClient } from "./transcription-source.js";
import { BroadcastTextSink } from "./text-sink.js";
import { FileTriggerConfig } from "./trigger-config.js";
import type { RelayConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

export const APP_NAME = "Voice Command Relay";
export const APP_VERSION = "0.1.0";

export { SessionLifecycleController, DEFAULT_CONTROLLER_OPTIONS } from "./session-controller.js";
export { WakeWordDetector, DEFAULT_DETECTOR_OPTIONS } from "./wake-word-detector.js";
export { FuzzyMatcher, similarity, matchTrigger } from "./fuzzy-matcher.js";
export { IncrementalDiffer, applyEdit } from "./incremental-differ.js";
export { EventBus, createRelayEventBus } from "./event-bus.js";
export type { RelayEvent, RelayEventBus } from "./event-bus.js";
export { VoiceRelay } from "./voice-relay.js";
export { DeepgramTranscriptionSource } from "./transcription-source.js";
export type { TranscriptionSource, SourceHandlers, SessionHandle } from "./transcription-source.js";
export { BroadcastTextSink } from "./text-sink.js";
export type { TextSink } from "./text-sink.js";
export { FileTriggerConfig, StaticTriggerConfig } from "./trigger-config.js";
export type { TriggerConfigProvider } from "./trigger-config.js";
export { KoreanPunctuator } from "./punctuation.js";
export { resolveConfig, validateConfig } from "./config.js";
export type { RelayConfig } from "./config.js";
export * from "./errors.js";
export * from "./types.js";

export interface RelayApp {
  server: AppServer;
  relay: VoiceRelay;
  sink: BroadcastTextSink;
  triggers: FileTriggerConfig;
  /** Stops listening, the trigger file watcher and the server. */
  shutdown(): Promise<void>;
}

export interface CreateRelayAppDeps {
  /** Defaults to a Deepgram client built from config.deepgramApiKey. */
  deepgramClient?: DeepgramListenClient;
  logger?: (scope: string) => Logger;
}

/**
 * Wires every component for `config`. Loads the trigger file but does not
 * start listening or bind a port.
 */
export async function createRelayApp(config: RelayConfig, deps: CreateRelayAppDeps = {}): Promise<RelayApp> {
  const scoped = deps.logger ?? ((scope: string) => createConsoleLogger(scope, config.logLevel));

  const deepgramClient = deps.deepgramClient ?? createDeepgramClient(config.deepgramApiKey);
  const source = new DeepgramTranscriptionSource(
    deepgramClient,
    { model: config.deepgramModel },
    scoped("Deepgram"),
  );

  const triggers = new FileTriggerConfig(config.triggerConfigPath, scoped("Triggers"));
  await triggers.load();
  if (config.watchTriggers) {
    triggers.watch();
  }

  const sink = new BroadcastTextSink();
  const relay = new VoiceRelay(
    { source, sink, triggers, logger: scoped("VoiceRelay") },
    {
      resetOnTrigger: config.resetOnTrigger,
      punctuationStyle: config.punctuationStyle,
      controller: {
        maxSessionDurationMs: config.maxSessionDurationMs,
        warningThresholdMs: config.warningThresholdMs,
        settleDelayMs: config.settleDelayMs,
        retryBackoffMs: config.retryBackoffMs,
        sourceAckTimeoutMs: config.sourceAckTimeoutMs,
        sourceOptions: { language: config.language },
      },
      detector: {
        minScanLength: config.minScanLength,
        maxScanLength: config.maxScanLength,
        threshold: config.matchThreshold,
        maxCommandLength: config.maxCommandLength,
      },
      matcher: { phoneticSubstitutionCost: config.phoneticSubstitutionCost },
    },
  );

  const server = createAppServer({ relay, sink, triggers, logger: scoped("Server") });

  return {
    server,
    relay,
    sink,
    triggers,
    async shutdown() {
      triggers.close();
      await relay.close();
      await server.close();
    },
  };
}
