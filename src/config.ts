// Voice Command Relay - Configuration
// Resolves environment variables (loaded from .env by dotenv) into a typed config.

import path from "node:path";
import { fileURLToPath } from "node:url";
import type { LogLevel } from "./logger.js";
import { isLogLevel } from "./logger.js";
import type { PunctuationStyle } from "./punctuation.js";
import { isPunctuationStyle } from "./punctuation.js";

export interface RelayConfig {
  port: number;
  deepgramApiKey: string;
  deepgramModel: string;
  /** Recognition language handed to the transcription source. */
  language: string;
  logLevel: LogLevel;
  triggerConfigPath: string;
  watchTriggers: boolean;
  /** Start listening as soon as the server is up. */
  autoStart: boolean;
  resetOnTrigger: boolean;
  punctuationStyle: PunctuationStyle;

  maxSessionDurationMs: number;
  warningThresholdMs: number;
  settleDelayMs: number;
  retryBackoffMs: number;
  sourceAckTimeoutMs: number;

  matchThreshold: number;
  phoneticSubstitutionCost: number;
  minScanLength: number;
  maxScanLength: number;
  maxCommandLength: number;
}

type Env = Record<string, string | undefined>;

const rootDir = fileURLToPath(new URL("..", import.meta.url));

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === "") {
    return fallback;
  }

  return value.toLowerCase() === "true";
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  const level = value?.toLowerCase();
  return level && isLogLevel(level) ? level : "info";
};

const resolvePunctuationStyle = (value: string | undefined): PunctuationStyle => {
  return value && isPunctuationStyle(value) ? value : "none";
};

export const resolveConfig = (env: Env = process.env): RelayConfig => {
  return {
    port: parseIntOrDefault(env.PORT, 3000),
    deepgramApiKey: env.DEEPGRAM_API_KEY ?? "",
    deepgramModel: env.VOICE_RELAY_DEEPGRAM_MODEL ?? "nova-2",
    language: env.VOICE_RELAY_LANGUAGE ?? "ko",
    logLevel: resolveLogLevel(env.VOICE_RELAY_LOG_LEVEL),
    triggerConfigPath: path.resolve(rootDir, env.VOICE_RELAY_TRIGGERS ?? path.join("config", "triggers.json")),
    watchTriggers: parseBoolOrDefault(env.VOICE_RELAY_WATCH_TRIGGERS, true),
    autoStart: parseBoolOrDefault(env.VOICE_RELAY_AUTO_START, false),
    resetOnTrigger: parseBoolOrDefault(env.VOICE_RELAY_RESET_ON_TRIGGER, true),
    punctuationStyle: resolvePunctuationStyle(env.VOICE_RELAY_PUNCTUATION),

    maxSessionDurationMs: parseIntOrDefault(env.VOICE_RELAY_MAX_SESSION_MS, 58_000),
    warningThresholdMs: parseIntOrDefault(env.VOICE_RELAY_WARNING_MS, 10_000),
    settleDelayMs: parseIntOrDefault(env.VOICE_RELAY_SETTLE_MS, 400),
    retryBackoffMs: parseIntOrDefault(env.VOICE_RELAY_RETRY_BACKOFF_MS, 1_000),
    sourceAckTimeoutMs: parseIntOrDefault(env.VOICE_RELAY_ACK_TIMEOUT_MS, 1_000),

    matchThreshold: parseFloatOrDefault(env.VOICE_RELAY_MATCH_THRESHOLD, 0.8),
    phoneticSubstitutionCost: parseFloatOrDefault(env.VOICE_RELAY_PHONETIC_COST, 0.2),
    minScanLength: parseIntOrDefault(env.VOICE_RELAY_MIN_SCAN_LENGTH, 2),
    maxScanLength: parseIntOrDefault(env.VOICE_RELAY_MAX_SCAN_LENGTH, 10),
    maxCommandLength: parseIntOrDefault(env.VOICE_RELAY_MAX_COMMAND_LENGTH, 200),
  };
};

export const validateConfig = (config: RelayConfig): string[] => {
  const errors: string[] = [];

  if (!config.deepgramApiKey) {
    errors.push("DEEPGRAM_API_KEY is not set. Add it to your .env file.");
  }

  if (config.port < 1 || config.port > 65535) {
    errors.push("PORT must be between 1 and 65535.");
  }

  if (config.maxSessionDurationMs <= 0) {
    errors.push("VOICE_RELAY_MAX_SESSION_MS must be greater than 0.");
  }

  if (config.warningThresholdMs < 0 || config.warningThresholdMs >= config.maxSessionDurationMs) {
    errors.push("VOICE_RELAY_WARNING_MS must be at least 0 and below VOICE_RELAY_MAX_SESSION_MS.");
  }

  if (config.settleDelayMs < 0 || config.retryBackoffMs < 0) {
    errors.push("VOICE_RELAY_SETTLE_MS and VOICE_RELAY_RETRY_BACKOFF_MS must not be negative.");
  }

  if (config.sourceAckTimeoutMs <= 0) {
    errors.push("VOICE_RELAY_ACK_TIMEOUT_MS must be greater than 0.");
  }

  if (config.matchThreshold <= 0 || config.matchThreshold > 1) {
    errors.push("VOICE_RELAY_MATCH_THRESHOLD must be in (0, 1].");
  }

  if (config.phoneticSubstitutionCost < 0 || config.phoneticSubstitutionCost > 1) {
    errors.push("VOICE_RELAY_PHONETIC_COST must be in [0, 1].");
  }

  if (config.minScanLength < 1 || config.maxScanLength < config.minScanLength) {
    errors.push("VOICE_RELAY_MIN_SCAN_LENGTH must be at least 1 and not above VOICE_RELAY_MAX_SCAN_LENGTH.");
  }

  if (config.maxCommandLength <= 0) {
    errors.push("VOICE_RELAY_MAX_COMMAND_LENGTH must be greater than 0.");
  }

  return errors;
};
