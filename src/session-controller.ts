// Voice Command Relay - Session Lifecycle Controller
// Owns listening state, drives the transcription source and the deadline timer,
// and serializes every reset.
//
// The speech engine refuses sessions longer than about a minute, so the
// controller restarts the source before the ceiling and funnels every other
// restart (trigger, explicit commit, engine error, user toggle) through the
// same serial mailbox. Timers and source handlers are tagged with the session
// id they were created for; a callback whose session is gone is a no-op.

import { v4 as uuidv4 } from "uuid";
import { ControllerState } from "./types.js";
import type { ResetOutcome, ResetReason, ResetRequest, SessionDescriptor } from "./types.js";
import type { RelayEventBus } from "./event-bus.js";
import type { SessionHandle, SourceHandlers, SourceSessionOptions, TranscriptionSource } from "./transcription-source.js";
import { EngineUnavailableError, RelayError, SessionStartFailedError, toErrorMessage } from "./errors.js";
import { AckTimeoutError, createDeferred, delay, withTimeout } from "./utils/async.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface SessionControllerOptions {
  /** Restart the source this long after a session began. */
  maxSessionDurationMs: number;
  /** Publish a deadline_warning this long before the deadline. 0 disables it. */
  warningThresholdMs: number;
  /** Pause between stopping and restarting the source during a reset. */
  settleDelayMs: number;
  /** Wait before the single retry after a transient start failure. */
  retryBackoffMs: number;
  /** Upper bound on beginSession/endSession acknowledgements. */
  sourceAckTimeoutMs: number;
  sourceOptions: SourceSessionOptions;
}

export const DEFAULT_CONTROLLER_OPTIONS: SessionControllerOptions = {
  maxSessionDurationMs: 58_000,
  warningThresholdMs: 10_000,
  settleDelayMs: 400,
  retryBackoffMs: 1_000,
  sourceAckTimeoutMs: 1_000,
  sourceOptions: { language: "ko" },
};

export interface SessionControllerDeps {
  source: TranscriptionSource;
  bus: RelayEventBus;
  /** Clears the text sink during a reset with clearSink=true. */
  clearSink?: () => Promise<void>;
  logger?: Logger;
  now?: () => number;
  createId?: () => string;
}

/**
 * Valid state transitions for the controller.
 *
 * STOPPED → STARTING:   start()
 * STARTING → RUNNING:   source acknowledged the session
 * STARTING → STOPPED:   start failed
 * RUNNING → RESETTING:  requestReset()
 * RUNNING → STOPPING:   stop()
 * RESETTING → STARTING: settle delay elapsed
 * RESETTING → STOPPED:  stop() cancelled the settle delay
 * STOPPING → STOPPED:   source ended
 */
const VALID_TRANSITIONS: ReadonlyMap<ControllerState, readonly ControllerState[]> = new Map([
  [ControllerState.STOPPED, [ControllerState.STARTING]],
  [ControllerState.STARTING, [ControllerState.RUNNING, ControllerState.STOPPED]],
  [ControllerState.RUNNING, [ControllerState.RESETTING, ControllerState.STOPPING]],
  [ControllerState.RESETTING, [ControllerState.STARTING, ControllerState.STOPPED]],
  [ControllerState.STOPPING, [ControllerState.STOPPED]],
]);

interface PendingReset {
  request: ResetRequest;
  promise: Promise<ResetOutcome>;
  coalesced: number;
  /** Once the sink-clear decision has been taken, coalesced requests can no longer change it. */
  sinkStepDone: boolean;
}

// ─── Controller ─────────────────────────────────────────────────────────────────

export class SessionLifecycleController {
  private readonly options: SessionControllerOptions;
  private readonly source: TranscriptionSource;
  private readonly bus: RelayEventBus;
  private readonly clearSinkHook: (() => Promise<void>) | null;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly createId: () => string;

  private _state: ControllerState = ControllerState.STOPPED;
  private _listening = false;
  private _session: SessionDescriptor | null = null;
  private handle: SessionHandle | null = null;
  private deadlineTimer: ReturnType<typeof setTimeout> | null = null;
  private warningTimer: ReturnType<typeof setTimeout> | null = null;

  /** Serial mailbox: start, stop and reset jobs run one at a time, in call order. */
  private mailbox: Promise<void> = Promise.resolve();
  private startPromise: Promise<void> | null = null;
  private pendingReset: PendingReset | null = null;
  private settleAbort: AbortController | null = null;
  private stopRequested = false;

  constructor(deps: SessionControllerDeps, options: Partial<SessionControllerOptions> = {}) {
    this.options = { ...DEFAULT_CONTROLLER_OPTIONS, ...options };
    this.source = deps.source;
    this.bus = deps.bus;
    this.clearSinkHook = deps.clearSink ?? null;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.createId = deps.createId ?? uuidv4;
  }

  get state(): ControllerState {
    return this._state;
  }

  get listening(): boolean {
    return this._listening;
  }

  get session(): SessionDescriptor | null {
    return this._session;
  }

  get resetInProgress(): boolean {
    return this.pendingReset !== null;
  }

  /** Milliseconds until the current session's deadline, or null when no session runs. */
  getRemainingMs(): number | null {
    if (!this._session) return null;
    return Math.max(0, this._session.deadline - this.now());
  }

  /**
   * Starts listening. A no-op while running or mid-transition; a second call
   * while starting returns the first call's promise.
   *
   * @throws PermissionUnavailableError, EngineUnavailableError (after one retry)
   *         or SessionStartFailedError. The controller is stopped afterwards.
   */
  start(): Promise<void> {
    if (this._state === ControllerState.STARTING) {
      return this.startPromise ?? Promise.resolve();
    }
    if (this._state !== ControllerState.STOPPED) {
      this.logger.debug(`start() ignored in state "${this._state}"`);
      return Promise.resolve();
    }

    this.transition(ControllerState.STARTING);
    this.startPromise = this.enqueue(async () => {
      try {
        await this.runStart();
      } finally {
        this.startPromise = null;
      }
    });
    return this.startPromise;
  }

  /**
   * Stops listening. A no-op when already stopped. During a reset the settle
   * delay is cancelled and the reset ends in "stopped".
   */
  stop(): Promise<void> {
    switch (this._state) {
      case ControllerState.STOPPED:
      case ControllerState.STOPPING:
        return Promise.resolve();
      case ControllerState.RESETTING:
        this.stopRequested = true;
        this.settleAbort?.abort();
        break;
      case ControllerState.RUNNING:
        this.transition(ControllerState.STOPPING);
        break;
      case ControllerState.STARTING:
        this.stopRequested = true;
        break;
    }
    return this.enqueue(() => this.runStop());
  }

  /**
   * The single entry point for restarting the source. Never rejects: failures
   * come back as a "failed" outcome and an `error` event.
   *
   * While a reset is queued or running, further requests coalesce into it and
   * share its outcome. Their clearSink wins as long as the sink has not been
   * handled yet.
   */
  requestReset(reason: ResetReason, clearSink: boolean, source: string): Promise<ResetOutcome> {
    const request: ResetRequest = { reason, clearSink, source };

    const pending = this.pendingReset;
    if (pending) {
      pending.coalesced++;
      if (!pending.sinkStepDone) {
        pending.request = { ...pending.request, clearSink };
      }
      this.logger.info(`Reset (${reason}) from ${source} coalesced into in-flight reset (${pending.request.reason})`);
      this.bus.publish({ type: "reset_coalesced", request, sinkStepTaken: pending.sinkStepDone });
      return pending.promise;
    }

    if (this._state !== ControllerState.RUNNING) {
      this.logger.debug(`Reset (${reason}) from ${source} ignored in state "${this._state}"`);
      return Promise.resolve({ status: "ignored", request, state: this._state });
    }

    this.transition(ControllerState.RESETTING);
    const deferred = createDeferred<ResetOutcome>();
    const entry: PendingReset = { request, promise: deferred.promise, coalesced: 0, sinkStepDone: false };
    this.pendingReset = entry;
    this.enqueue(() => this.runReset(entry)).then(deferred.resolve, deferred.reject);
    return entry.promise;
  }

  /**
   * Deadline timer callback. Returns false, doing nothing, when `sessionId` is
   * not the running session.
   */
  onDeadline(sessionId: string): boolean {
    if (!this.isCurrent(sessionId)) {
      this.logger.debug(`Stale deadline timer for session ${sessionId} ignored`);
      return false;
    }

    this.logger.info(`Session ${sessionId} reached its ${this.options.maxSessionDurationMs}ms deadline`);
    this.requestReset("timeout", true, "deadline-timer").catch((err: unknown) => {
      this.logger.error(`Deadline reset failed: ${toErrorMessage(err)}`);
    });
    return true;
  }

  /** Warning timer callback. Same staleness rule as onDeadline(). */
  onDeadlineWarning(sessionId: string): boolean {
    if (!this.isCurrent(sessionId)) return false;

    const remainingMs = this.getRemainingMs() ?? 0;
    this.logger.info(`Session ${sessionId} ends in ${remainingMs}ms`);
    this.bus.publish({ type: "deadline_warning", sessionId, remainingMs });
    return true;
  }

  // ─── Mailbox jobs ─────────────────────────────────────────────────────────────

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const result = this.mailbox.then(job);
    this.mailbox = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async runStart(): Promise<void> {
    try {
      await this.beginWithRetry();
    } catch (err) {
      const error = classifyStartError(err);
      this.transition(ControllerState.STOPPED);
      this.logger.error(`Failed to start listening: ${error.message}`);
      throw error;
    }
  }

  private async runStop(): Promise<void> {
    this.stopRequested = false;
    if (this._state !== ControllerState.RUNNING && this._state !== ControllerState.STOPPING) {
      return;
    }
    if (this._state === ControllerState.RUNNING) {
      this.transition(ControllerState.STOPPING);
    }

    await this.teardown();
    this.transition(ControllerState.STOPPED);
    this.logger.info("Stopped listening");
  }

  private async runReset(entry: PendingReset): Promise<ResetOutcome> {
    let outcome: ResetOutcome;
    try {
      const { reason, source } = entry.request;
      this.logger.info(`Reset (${reason}) requested by ${source}`);

      await this.teardown();
      this.bus.publish({ type: "reset_started", request: entry.request });

      entry.sinkStepDone = true;
      if (entry.request.clearSink) {
        if (this.clearSinkHook) {
          await this.clearSinkHook();
        }
        this.bus.publish({ type: "sink_cleared", request: entry.request });
      }

      this.settleAbort = new AbortController();
      const settled = await delay(this.options.settleDelayMs, this.settleAbort.signal);
      this.settleAbort = null;

      if (!settled || this.stopRequested) {
        this.transition(ControllerState.STOPPED);
        this.logger.info(`Reset (${reason}) cancelled by stop()`);
        outcome = { status: "stopped", request: entry.request, coalesced: entry.coalesced };
      } else {
        this.transition(ControllerState.STARTING);
        const session = await this.beginWithRetry();
        outcome = { status: "completed", request: entry.request, sessionId: session.sessionId, coalesced: entry.coalesced };
      }
    } catch (err) {
      const error = classifyStartError(err);
      this.settleAbort = null;
      if (this._state !== ControllerState.STOPPED) {
        this.transition(ControllerState.STOPPED);
      }
      this.logger.error(`Reset (${entry.request.reason}) failed: ${error.message}`);
      this.bus.publish({ type: "error", error, recoverable: false });
      outcome = { status: "failed", request: entry.request, error, coalesced: entry.coalesced };
    }

    this.pendingReset = null;
    this.bus.publish({ type: "reset_completed", outcome });
    return outcome;
  }

  // ─── Session plumbing ─────────────────────────────────────────────────────────

  private async beginWithRetry(): Promise<SessionDescriptor> {
    try {
      return await this.beginSession();
    } catch (err) {
      const error = classifyStartError(err);
      if (!error.transient) throw error;

      this.logger.warn(`${error.message}. Retrying in ${this.options.retryBackoffMs}ms`);
      await delay(this.options.retryBackoffMs);
      return await this.beginSession();
    }
  }

  private async beginSession(): Promise<SessionDescriptor> {
    const sessionId = this.createId();
    const startedAt = this.now();
    const session: SessionDescriptor = {
      sessionId,
      startedAt,
      deadline: startedAt + this.options.maxSessionDurationMs,
    };

    const pending = this.source.beginSession(sessionId, this.options.sourceOptions, this.handlersFor(sessionId));
    let handle: SessionHandle;
    try {
      handle = await withTimeout(
        pending,
        this.options.sourceAckTimeoutMs,
        `Transcription source did not acknowledge session ${sessionId} within ${this.options.sourceAckTimeoutMs}ms`,
      );
    } catch (err) {
      if (err instanceof AckTimeoutError) {
        // Release the half-open session before any retry, and end it again if
        // the source acknowledges after all
        pending
          .then((late) => this.source.endSession(late))
          .catch((lateErr: unknown) => {
            this.logger.debug(`Late session ${sessionId} could not be ended: ${toErrorMessage(lateErr)}`);
          });
        await this.endQuietly({ sessionId });
        throw new EngineUnavailableError(err.message, { cause: err });
      }
      throw err;
    }

    this._session = session;
    this.handle = handle;
    this.transition(ControllerState.RUNNING);
    this.armTimers(session);
    this.logger.info(`Session ${sessionId} started (deadline in ${this.options.maxSessionDurationMs}ms)`);
    this.bus.publish({ type: "session_started", session });
    this.publishListening(true);
    return session;
  }

  private handlersFor(sessionId: string): SourceHandlers {
    return {
      onFragment: (fragment) => {
        this.bus.publish({ type: "transcript", fragment });
      },
      onError: (error) => {
        if (!this.isCurrent(sessionId)) return;
        this.logger.warn(`Transcription source error in session ${sessionId}: ${error.message}`);
        this.bus.publish({ type: "error", error, recoverable: true });
        this.requestReset("engine_error", false, "transcription-source").catch((err: unknown) => {
          this.logger.error(`Engine error reset failed: ${toErrorMessage(err)}`);
        });
      },
      onAvailabilityChange: (available) => {
        if (available || this._session?.sessionId !== sessionId) return;
        this.logger.warn(`Transcription source became unavailable during session ${sessionId}, stopping`);
        this.stop().catch((err: unknown) => {
          this.logger.error(`Stop after unavailability failed: ${toErrorMessage(err)}`);
        });
      },
    };
  }

  private async teardown(): Promise<void> {
    this.disarmTimers();
    const session = this._session;
    const handle = this.handle;
    this._session = null;
    this.handle = null;

    if (handle) {
      await this.endQuietly(handle);
    }

    if (session) {
      this.bus.publish({ type: "session_ended", sessionId: session.sessionId });
    }
    this.publishListening(false);
  }

  /** Ends a source session; a failure or a missing acknowledgement is only logged. */
  private async endQuietly(handle: SessionHandle): Promise<void> {
    try {
      await withTimeout(
        this.source.endSession(handle),
        this.options.sourceAckTimeoutMs,
        `Transcription source did not acknowledge the end of session ${handle.sessionId}`,
      );
    } catch (err) {
      this.logger.warn(`Ending session ${handle.sessionId}: ${toErrorMessage(err)}`);
    }
  }

  private armTimers(session: SessionDescriptor): void {
    this.disarmTimers();
    const { sessionId } = session;
    const remaining = Math.max(0, session.deadline - this.now());

    this.deadlineTimer = setTimeout(() => {
      this.onDeadline(sessionId);
    }, remaining);

    const warning = this.options.warningThresholdMs;
    if (warning > 0 && remaining > warning) {
      this.warningTimer = setTimeout(() => {
        this.onDeadlineWarning(sessionId);
      }, remaining - warning);
    }
  }

  private disarmTimers(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = null;
    }
    if (this.warningTimer) {
      clearTimeout(this.warningTimer);
      this.warningTimer = null;
    }
  }

  private isCurrent(sessionId: string): boolean {
    return this._state === ControllerState.RUNNING && this._session?.sessionId === sessionId;
  }

  private publishListening(listening: boolean): void {
    if (this._listening === listening) return;
    this._listening = listening;
    this.bus.publish({ type: "listening", listening });
  }

  private transition(to: ControllerState): void {
    const allowed = VALID_TRANSITIONS.get(this._state) ?? [];
    if (!allowed.includes(to)) {
      throw new Error(`Invalid controller transition: "${this._state}" → "${to}"`);
    }
    this.logger.debug(`${this._state} → ${to}`);
    this._state = to;
  }
}

/** Anything that is not already a RelayError is a non-retryable start failure. */
function classifyStartError(err: unknown): RelayError {
  if (err instanceof RelayError) return err;
  return new SessionStartFailedError(`Session start failed: ${toErrorMessage(err)}`, { cause: err });
}
