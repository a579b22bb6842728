// Voice Command Relay - Transcription Source
// The contract the session controller drives, and its Deepgram live implementation.
//
// Privacy: audio chunks are forwarded to Deepgram in memory only, never written to disk.

import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import type { TranscriptFragment } from "./types.js";
import {
  EngineUnavailableError,
  PermissionUnavailableError,
  RelayError,
  SessionStartFailedError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

// ─── Source contract ────────────────────────────────────────────────────────────

export interface SourceSessionOptions {
  /** BCP-47 language code, e.g. "ko" or "en-US". */
  language: string;
}

export interface SourceHandlers {
  onFragment(fragment: TranscriptFragment): void;
  /** A runtime failure of an already running session. */
  onError(error: Error): void;
  onAvailabilityChange(available: boolean): void;
}

export interface SessionHandle {
  readonly sessionId: string;
}

export interface TranscriptionSource {
  /**
   * Begins a recognition session. Resolves once the engine acknowledged it.
   * Rejects with PermissionUnavailableError or EngineUnavailableError.
   */
  beginSession(sessionId: string, options: SourceSessionOptions, handlers: SourceHandlers): Promise<SessionHandle>;
  /** Ends a session. A session that was never acknowledged is abandoned and its beginSession() rejects. */
  endSession(handle: SessionHandle): Promise<void>;
  /** Forwards PCM audio to the running session. Returns false when none is running. */
  feedAudio(chunk: Buffer): boolean;
}

// ─── Deepgram client surface (for testability / dependency injection) ───────────

/**
 * The part of a Deepgram live connection this source uses.
 * `ListenLiveClient` from @deepgram/sdk satisfies it.
 */
export interface DeepgramLiveConnection {
  on(event: string, handler: (data: unknown) => void): void;
  send(data: ArrayBuffer): void;
  requestClose(): void;
}

/** The part of `DeepgramClient` this source uses. */
export interface DeepgramListenClient {
  listen: {
    live(schema: LiveSchema): DeepgramLiveConnection;
  };
}

/**
 * Default configuration for the Deepgram live transcription connection.
 * Mono LINEAR16 at 16kHz, interim results on so commands stream as they are spoken.
 */
const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  language: "ko",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  interim_results: true,
  punctuate: false,
  smart_format: false,
};

interface ActiveConnection {
  sessionId: string;
  connection: DeepgramLiveConnection;
  handlers: SourceHandlers;
  opened: boolean;
  closing: boolean;
  /** Finalized segments of this session, joined with spaces. */
  finalized: string;
  /** Rejects the pending beginSession(); null once the connection opened. */
  abandon: (() => void) | null;
}

// ─── Deepgram source ────────────────────────────────────────────────────────────

/**
 * Live transcription over one Deepgram WebSocket per recognition session.
 *
 * Deepgram finalizes audio in short segments, so fragments carry the finalized
 * segments of the session plus the current interim result: the text only ever
 * grows within a session, the way the detector expects.
 */
export class DeepgramTranscriptionSource implements TranscriptionSource {
  private readonly client: DeepgramListenClient;
  private readonly liveConfig: LiveSchema;
  private readonly logger: Logger;
  private active: ActiveConnection | null = null;

  constructor(client: DeepgramListenClient, config: Partial<LiveSchema> = {}, logger: Logger = silentLogger) {
    this.client = client;
    this.liveConfig = { ...DEFAULT_LIVE_CONFIG, ...config };
    this.logger = logger;
  }

  get activeSessionId(): string | null {
    return this.active?.sessionId ?? null;
  }

  beginSession(sessionId: string, options: SourceSessionOptions, handlers: SourceHandlers): Promise<SessionHandle> {
    if (this.active) {
      return Promise.reject(
        new SessionStartFailedError(
          `Live transcription session ${this.active.sessionId} is still active. End it before beginning ${sessionId}.`,
        ),
      );
    }

    const connection = this.client.listen.live({ ...this.liveConfig, language: options.language });
    const active: ActiveConnection = {
      sessionId,
      connection,
      handlers,
      opened: false,
      closing: false,
      finalized: "",
      abandon: null,
    };
    this.active = active;

    return new Promise<SessionHandle>((resolve, reject) => {
      const fail = (error: RelayError) => {
        if (this.active === active) this.active = null;
        reject(error);
      };
      active.abandon = () => {
        fail(new EngineUnavailableError(`Deepgram session ${sessionId} was abandoned before it opened`));
      };

      connection.on(LiveTranscriptionEvents.Open, () => {
        if (active.closing) return;
        active.opened = true;
        active.abandon = null;
        this.logger.info(`Deepgram connection opened for session ${sessionId}`);
        resolve({ sessionId });
      });

      connection.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
        this.handleTranscriptEvent(active, data);
      });

      connection.on(LiveTranscriptionEvents.Error, (data: unknown) => {
        const error = toSourceError(data);
        if (!active.opened) {
          fail(error);
          return;
        }
        if (active.closing) return;

        if (error instanceof PermissionUnavailableError) {
          this.logger.error(`Deepgram rejected session ${sessionId}: ${error.message}`);
          active.handlers.onAvailabilityChange(false);
        } else {
          this.logger.warn(`Deepgram error in session ${sessionId}: ${error.message}`);
          active.handlers.onError(error);
        }
      });

      connection.on(LiveTranscriptionEvents.Close, () => {
        if (!active.opened) {
          fail(new EngineUnavailableError(`Deepgram closed the connection for session ${sessionId} before it opened`));
          return;
        }
        if (active.closing) return;

        // We did not initiate the close: the session dropped
        if (this.active === active) this.active = null;
        active.handlers.onError(new EngineUnavailableError(`Deepgram connection for session ${sessionId} dropped`));
      });
    });
  }

  async endSession(handle: SessionHandle): Promise<void> {
    const active = this.active;
    if (!active || active.sessionId !== handle.sessionId) {
      return; // Already ended, no-op
    }

    active.closing = true;
    this.active = null;
    active.abandon?.();

    try {
      active.connection.requestClose();
    } catch (err) {
      this.logger.warn(`Closing Deepgram connection for session ${handle.sessionId} failed: ${describeError(err)}`);
    }
  }

  /**
   * Forwards an audio chunk to the active Deepgram WebSocket connection.
   * Audio must be mono LINEAR16 16kHz.
   */
  feedAudio(chunk: Buffer): boolean {
    const active = this.active;
    if (!active || !active.opened) {
      return false;
    }

    // Copy into a standalone ArrayBuffer for the SDK's socket
    const copy = new ArrayBuffer(chunk.byteLength);
    new Uint8Array(copy).set(chunk);
    active.connection.send(copy);
    return true;
  }

  /**
   * Converts a Deepgram transcript event into a fragment of the session's text
   * so far and hands it to the session's handlers.
   */
  private handleTranscriptEvent(active: ActiveConnection, data: unknown): void {
    if (active.closing) return;

    const result = parseTranscriptEvent(data);
    // Deepgram sends empty transcripts for silence
    if (!result || !result.transcript.trim()) {
      return;
    }

    const text = joinSegments(active.finalized, result.transcript);
    if (result.isFinal) {
      active.finalized = text;
    }

    active.handlers.onFragment({ text, isFinal: result.isFinal, sessionId: active.sessionId });
  }
}

// ─── Event parsing ──────────────────────────────────────────────────────────────

/**
 * Pulls the top alternative out of a Deepgram "Results" event.
 * Returns null for anything that does not have that shape.
 */
export function parseTranscriptEvent(data: unknown): { transcript: string; isFinal: boolean } | null {
  if (typeof data !== "object" || data === null || !("channel" in data)) return null;

  const channel = data.channel;
  if (typeof channel !== "object" || channel === null || !("alternatives" in channel)) return null;

  const alternatives = channel.alternatives;
  if (!Array.isArray(alternatives) || alternatives.length === 0) return null;

  const first: unknown = alternatives[0];
  if (typeof first !== "object" || first === null || !("transcript" in first)) return null;
  if (typeof first.transcript !== "string") return null;

  const isFinal = "is_final" in data && data.is_final === true;
  return { transcript: first.transcript, isFinal };
}

function joinSegments(finalized: string, segment: string): string {
  const trimmed = segment.trim();
  return finalized ? `${finalized} ${trimmed}` : trimmed;
}

function describeError(data: unknown): string {
  if (data instanceof Error) return data.message;
  if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return String(data);
}

const PERMISSION_PATTERN = /\b(401|403)\b|unauthori[sz]ed|forbidden|invalid credentials/i;

/** Maps a Deepgram error payload onto the relay's error taxonomy. */
export function toSourceError(data: unknown): RelayError {
  const message = describeError(data);
  if (PERMISSION_PATTERN.test(message)) {
    return new PermissionUnavailableError(`Deepgram refused the credentials: ${message}`, { cause: data });
  }
  return new EngineUnavailableError(`Deepgram is unavailable: ${message}`, { cause: data });
}
