// Voice Command Relay - Event Bus
// Typed in-process publish/subscribe. Dispatch is synchronous and in
// subscription order; a failing subscriber is logged and never reaches the publisher.

import type {
  DetectorEvent,
  IncrementalEdit,
  ResetOutcome,
  ResetRequest,
  SessionDescriptor,
  TranscriptFragment,
} from "./types.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

// ─── Relay events ───────────────────────────────────────────────────────────────

export type RelayEvent =
  | { type: "listening"; listening: boolean }
  | { type: "session_started"; session: SessionDescriptor }
  | { type: "session_ended"; sessionId: string }
  | { type: "transcript"; fragment: TranscriptFragment }
  /** Published after the source stopped and before the sink is cleared: transient buffers must be dropped. */
  | { type: "reset_started"; request: ResetRequest }
  | { type: "sink_cleared"; request: ResetRequest }
  /**
   * A request folded into the reset in flight. `sinkStepTaken` means the running
   * reset has already made its sink-clear decision and will not clear for it.
   */
  | { type: "reset_coalesced"; request: ResetRequest; sinkStepTaken: boolean }
  | { type: "reset_completed"; outcome: ResetOutcome }
  | { type: "deadline_warning"; sessionId: string; remainingMs: number }
  | { type: "detector"; event: DetectorEvent }
  | { type: "edit"; edit: IncrementalEdit; editSessionId: string }
  | { type: "error"; error: Error; recoverable: boolean };

export type RelayEventType = RelayEvent["type"];

// ─── Bus ────────────────────────────────────────────────────────────────────────

type Handler<E> = (event: E) => void | Promise<void>;

export class EventBus<E extends { type: string }> {
  private readonly handlers = new Map<E["type"], Array<Handler<E>>>();
  private readonly anyHandlers: Array<Handler<E>> = [];
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  /**
   * Subscribes to one event type. The handler receives the narrowed event.
   * Returns an unsubscribe function.
   */
  on<T extends E["type"]>(type: T, handler: Handler<Extract<E, { type: T }>>): () => void {
    const wrapped: Handler<E> = (event) => {
      if (isOfType(event, type)) {
        return handler(event);
      }
    };
    const list = this.handlers.get(type) ?? [];
    list.push(wrapped);
    this.handlers.set(type, list);

    return () => {
      const current = this.handlers.get(type);
      if (!current) return;
      const index = current.indexOf(wrapped);
      if (index !== -1) current.splice(index, 1);
    };
  }

  /** Subscribes to every event, after the type-specific subscribers. */
  onAny(handler: Handler<E>): () => void {
    this.anyHandlers.push(handler);
    return () => {
      const index = this.anyHandlers.indexOf(handler);
      if (index !== -1) this.anyHandlers.splice(index, 1);
    };
  }

  publish(event: E): void {
    // Copy so that subscribing or unsubscribing during dispatch does not skip anyone
    const targets = [...(this.handlers.get(event.type) ?? []), ...this.anyHandlers];
    for (const handler of targets) {
      this.invoke(handler, event);
    }
  }

  listenerCount(type?: E["type"]): number {
    if (type === undefined) {
      let total = this.anyHandlers.length;
      for (const list of this.handlers.values()) total += list.length;
      return total;
    }
    return this.handlers.get(type)?.length ?? 0;
  }

  private invoke(handler: Handler<E>, event: E): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          this.logger.error(`Async subscriber for "${event.type}" failed`, err);
        });
      }
    } catch (err) {
      this.logger.error(`Subscriber for "${event.type}" threw`, err);
    }
  }
}

function isOfType<E extends { type: string }, T extends E["type"]>(
  event: E,
  type: T,
): event is Extract<E, { type: T }> {
  return event.type === type;
}

export type RelayEventBus = EventBus<RelayEvent>;

export function createRelayEventBus(logger?: Logger): RelayEventBus {
  return new EventBus<RelayEvent>(logger);
}
