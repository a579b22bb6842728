// In-process TranscriptionSource for tests: acknowledges sessions on demand and
// lets a test push fragments and failures through a session's handlers.

import type { SessionHandle, SourceHandlers, SourceSessionOptions, TranscriptionSource } from "../transcription-source.js";
import type { Deferred } from "../types.js";
import { createDeferred } from "../utils/async.js";
import { EngineUnavailableError } from "../errors.js";

export class FakeTranscriptionSource implements TranscriptionSource {
  readonly begun: string[] = [];
  readonly ended: string[] = [];
  readonly fed: Buffer[] = [];
  readonly options: SourceSessionOptions[] = [];
  /** Errors the next beginSession calls reject with, in order. */
  readonly failures: Error[] = [];
  /** When set, beginSession waits for acknowledge(). */
  holdAcknowledgement = false;

  private readonly handlers = new Map<string, SourceHandlers>();
  private readonly held = new Map<string, Deferred<SessionHandle>>();
  private active: string | null = null;

  get activeSessionId(): string | null {
    return this.active;
  }

  beginSession(sessionId: string, options: SourceSessionOptions, handlers: SourceHandlers): Promise<SessionHandle> {
    this.begun.push(sessionId);
    this.options.push(options);
    this.handlers.set(sessionId, handlers);

    const failure = this.failures.shift();
    if (failure) return Promise.reject(failure);

    if (this.holdAcknowledgement) {
      const deferred = createDeferred<SessionHandle>();
      this.held.set(sessionId, deferred);
      return deferred.promise;
    }

    this.active = sessionId;
    return Promise.resolve({ sessionId });
  }

  /** Acknowledges a session held back by holdAcknowledgement. */
  acknowledge(sessionId: string): void {
    const deferred = this.held.get(sessionId);
    if (!deferred) throw new Error(`Session ${sessionId} is not waiting for an acknowledgement`);
    this.held.delete(sessionId);
    this.active = sessionId;
    deferred.resolve({ sessionId });
  }

  async endSession(handle: SessionHandle): Promise<void> {
    this.ended.push(handle.sessionId);
    const held = this.held.get(handle.sessionId);
    if (held) {
      this.held.delete(handle.sessionId);
      held.reject(new EngineUnavailableError(`Session ${handle.sessionId} was abandoned before it was acknowledged`));
    }
    if (this.active === handle.sessionId) this.active = null;
  }

  feedAudio(chunk: Buffer): boolean {
    if (!this.active) return false;
    this.fed.push(chunk);
    return true;
  }

  emitFragment(sessionId: string, text: string, isFinal = false): void {
    this.handlersOf(sessionId).onFragment({ text, isFinal, sessionId });
  }

  emitError(sessionId: string, error: Error): void {
    this.handlersOf(sessionId).onError(error);
  }

  emitUnavailable(sessionId: string): void {
    this.handlersOf(sessionId).onAvailabilityChange(false);
  }

  private handlersOf(sessionId: string): SourceHandlers {
    const handlers = this.handlers.get(sessionId);
    if (!handlers) throw new Error(`Session ${sessionId} was never begun`);
    return handlers;
  }
}
