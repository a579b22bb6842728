// Voice Command Relay - Relay
// Wires the transcription source, session controller, wake word detector,
// incremental differ and text sink together over the event bus.
//
// Ownership: the controller owns sessions and timers; this class owns the
// detector and the differ. Every differ and sink operation runs on one
// promise chain, so edits reach the sink in the order they were produced.

import { v4 as uuidv4 } from "uuid";
import type {
  DetectorEvent,
  RelayStatus,
  ResetOutcome,
  ResetRequest,
  TranscriptFragment,
} from "./types.js";
import { ControllerState } from "./types.js";
import type { RelayEventBus } from "./event-bus.js";
import { createRelayEventBus } from "./event-bus.js";
import { SessionLifecycleController } from "./session-controller.js";
import type { SessionControllerOptions } from "./session-controller.js";
import { DEFAULT_DETECTOR_OPTIONS, WakeWordDetector } from "./wake-word-detector.js";
import type { WakeWordDetectorOptions } from "./wake-word-detector.js";
import { FuzzyMatcher } from "./fuzzy-matcher.js";
import type { FuzzyMatcherOptions } from "./fuzzy-matcher.js";
import { IncrementalDiffer } from "./incremental-differ.js";
import type { TranscriptionSource } from "./transcription-source.js";
import type { TextSink } from "./text-sink.js";
import type { TriggerConfigProvider } from "./trigger-config.js";
import { KoreanPunctuator } from "./punctuation.js";
import type { PunctuationStyle } from "./punctuation.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { toErrorMessage } from "./errors.js";

export interface VoiceRelayOptions {
  /** Restart the source when a trigger fires, so the command gets a full session. */
  resetOnTrigger: boolean;
  punctuationStyle: PunctuationStyle;
  controller: Partial<SessionControllerOptions>;
  detector: Partial<WakeWordDetectorOptions>;
  matcher: Partial<FuzzyMatcherOptions>;
}

export interface VoiceRelayDeps {
  source: TranscriptionSource;
  sink: TextSink;
  triggers: TriggerConfigProvider;
  bus?: RelayEventBus;
  logger?: Logger;
  /** Required only when punctuationStyle is not "none"; loaded from data/ otherwise. */
  punctuator?: KoreanPunctuator;
  now?: () => number;
  createId?: () => string;
}

export class VoiceRelay {
  readonly bus: RelayEventBus;
  readonly controller: SessionLifecycleController;
  readonly detector: WakeWordDetector;

  private readonly sink: TextSink;
  private readonly source: TranscriptionSource;
  private readonly triggers: TriggerConfigProvider;
  private readonly logger: Logger;
  private readonly createId: () => string;
  private readonly resetOnTrigger: boolean;
  private readonly punctuationStyle: PunctuationStyle;
  private readonly punctuator: KoreanPunctuator | null;

  private readonly differ = new IncrementalDiffer();
  /** Span during which the differ mirrors the sink; renewed whenever the sink empties. */
  private editSessionId: string;
  private sinkChain: Promise<void> = Promise.resolve();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(deps: VoiceRelayDeps, options: Partial<VoiceRelayOptions> = {}) {
    this.logger = deps.logger ?? silentLogger;
    this.bus = deps.bus ?? createRelayEventBus(this.logger);
    this.sink = deps.sink;
    this.source = deps.source;
    this.triggers = deps.triggers;
    this.createId = deps.createId ?? uuidv4;
    this.resetOnTrigger = options.resetOnTrigger ?? true;
    this.punctuationStyle = options.punctuationStyle ?? "none";
    this.punctuator =
      this.punctuationStyle === "none" ? null : (deps.punctuator ?? new KoreanPunctuator());

    const detectorOptions = { ...DEFAULT_DETECTOR_OPTIONS, ...options.detector };
    const matcher = new FuzzyMatcher({
      minCandidateLength: detectorOptions.minScanLength,
      maxCandidateLength: detectorOptions.maxScanLength,
      threshold: detectorOptions.threshold,
      ...options.matcher,
    });
    this.detector = new WakeWordDetector(detectorOptions, { matcher, logger: this.logger });

    this.controller = new SessionLifecycleController(
      {
        source: deps.source,
        bus: this.bus,
        clearSink: () => this.clearSink(),
        logger: this.logger,
        now: deps.now,
        createId: deps.createId,
      },
      options.controller,
    );

    this.editSessionId = this.createId();

    this.unsubscribers.push(
      this.bus.on("transcript", (event) => {
        this.handleFragment(event.fragment);
      }),
      this.bus.on("reset_started", (event) => {
        this.handleResetStarted(event.request);
      }),
      this.bus.on("reset_coalesced", (event) => {
        this.handleResetCoalesced(event.request, event.sinkStepTaken);
      }),
    );
  }

  // ─── Commands ─────────────────────────────────────────────────────────────────

  start(): Promise<void> {
    return this.controller.start();
  }

  /** Stops listening and drops any command in progress. */
  async stop(): Promise<void> {
    await this.controller.stop();
    this.detector.reset();
    this.enqueueSink(async () => {
      this.renewEditSession();
    });
    await this.sinkChain;
  }

  async toggle(): Promise<void> {
    if (this.controller.state === ControllerState.STOPPED) {
      await this.start();
    } else {
      await this.stop();
    }
  }

  /** Submits the command in progress and restarts the source. */
  commit(): Promise<ResetOutcome> {
    return this.controller.requestReset("external_commit", false, "external-commit");
  }

  /** Restarts the source with an empty field and no command in progress. */
  refresh(): Promise<ResetOutcome> {
    return this.controller.requestReset("user_toggle", true, "user");
  }

  /** Forwards PCM audio to the source. Returns false when no session runs. */
  feedAudio(chunk: Buffer): boolean {
    return this.source.feedAudio(chunk);
  }

  /** Resolves once every queued sink operation has run. */
  flush(): Promise<void> {
    return this.sinkChain;
  }

  getStatus(sinkText: string): RelayStatus {
    return {
      state: this.controller.state,
      listening: this.controller.listening,
      session: this.controller.session,
      remainingMs: this.controller.getRemainingMs(),
      detector: this.detector.state,
      sinkText,
    };
  }

  async close(): Promise<void> {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    await this.controller.stop();
    await this.sinkChain;
  }

  // ─── Fragment pipeline ────────────────────────────────────────────────────────

  private handleFragment(fragment: TranscriptFragment): void {
    const active = this.controller.session;
    if (!active || fragment.sessionId !== active.sessionId) {
      this.logger.debug(`Dropping fragment from inactive session ${fragment.sessionId}`);
      return;
    }

    let text = fragment.text;
    if (this.punctuator && (fragment.isFinal || this.detector.activeOwner !== null)) {
      text = this.punctuator.addPunctuation(text, this.punctuationStyle);
    }

    const events = this.detector.onTranscript({ ...fragment, text }, this.triggers.getTriggers());
    this.dispatch(events);
  }

  private dispatch(events: DetectorEvent[]): void {
    for (const event of events) {
      this.bus.publish({ type: "detector", event });

      switch (event.type) {
        case "trigger_fired":
          this.handleTrigger(event.supersededOwner !== null);
          break;
        case "buffer_updated":
          this.emitCommand(event.text);
          break;
        case "command_committed":
          this.handleCommitted(event.owner, event.cause === "explicit");
          break;
      }
    }
  }

  private handleTrigger(superseded: boolean): void {
    if (!this.resetOnTrigger) {
      // No reset will clear the field, and the superseded command must leave it
      this.enqueueSink(async () => {
        if (superseded) {
          await this.sink.clear();
        }
        this.renewEditSession();
      });
      return;
    }

    this.enqueueSink(async () => {
      this.renewEditSession();
    });
    this.controller.requestReset("trigger_detected", superseded, "wake-word-detector").catch((err: unknown) => {
      this.logger.error(`Trigger reset failed: ${toErrorMessage(err)}`);
    });
  }

  private handleCommitted(ownerId: string, explicit: boolean): void {
    const owner = this.triggers.getOwner(ownerId);
    const submit = explicit || owner?.autoSubmit === true;
    this.logger.info(`Command for "${owner?.name ?? ownerId}" committed${submit ? ", submitting" : ""}`);

    this.enqueueSink(async () => {
      if (submit) {
        await this.sink.commit();
      }
      this.renewEditSession();
    });
  }

  private handleResetStarted(request: ResetRequest): void {
    switch (request.reason) {
      case "timeout":
      case "engine_error":
      case "trigger_detected":
        this.detector.markSessionBoundary();
        break;
      case "external_commit":
        this.dispatch(this.detector.commit());
        break;
      case "user_toggle":
        this.detector.reset();
        this.enqueueSink(async () => {
          this.renewEditSession();
        });
        break;
    }
  }

  /**
   * A request folded into another reset still needs its own effect on the
   * detector, and a sink clear the running reset will no longer perform.
   */
  private handleResetCoalesced(request: ResetRequest, sinkStepTaken: boolean): void {
    switch (request.reason) {
      case "external_commit":
        this.dispatch(this.detector.commit());
        break;
      case "user_toggle":
        this.detector.reset();
        this.enqueueSink(async () => {
          this.renewEditSession();
        });
        break;
      case "timeout":
      case "engine_error":
      case "trigger_detected":
        break;
    }

    if (request.clearSink && sinkStepTaken) {
      this.enqueueSink(() => this.clearAndRetype());
    }
  }

  // ─── Sink chain ───────────────────────────────────────────────────────────────

  private emitCommand(text: string): void {
    this.enqueueSink(() => this.applyCommandText(text));
  }

  /** Runs on the sink chain only. */
  private async applyCommandText(text: string): Promise<void> {
    const editSessionId = this.editSessionId;
    const edit = this.differ.diff(editSessionId, text);
    if (edit.deleteCount === 0 && edit.appendText === "") return;

    this.bus.publish({ type: "edit", edit, editSessionId });
    await this.sink.applyEdit(edit);
  }

  /**
   * Sink-clear step of a reset. The field is emptied, and the command still in
   * progress (kept across timeouts and engine errors) is typed out again.
   */
  private clearSink(): Promise<void> {
    this.enqueueSink(() => this.clearAndRetype());
    return this.sinkChain;
  }

  /** Runs on the sink chain only. */
  private async clearAndRetype(): Promise<void> {
    await this.sink.clear();
    this.renewEditSession();
    const command = this.detector.commandText;
    if (command) {
      await this.applyCommandText(command);
    }
  }

  private renewEditSession(): void {
    this.editSessionId = this.createId();
    this.differ.reset();
  }

  /** Appends a job to the sink chain. A failing job is reported and the chain carries on. */
  private enqueueSink(job: () => Promise<void>): void {
    this.sinkChain = this.sinkChain.then(job).catch((err: unknown) => {
      const error = err instanceof Error ? err : new Error(toErrorMessage(err));
      this.logger.error(`Text sink operation failed: ${error.message}`);
      this.bus.publish({ type: "error", error, recoverable: true });
    });
  }
}
