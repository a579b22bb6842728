// Voice Command Relay - Shared TypeScript interfaces and types
// Transcript, trigger, detector, reset and edit shapes shared by every component.

// ─── Controller State Machine ───────────────────────────────────────────────────

export enum ControllerState {
  STOPPED = "stopped",
  STARTING = "starting",
  RUNNING = "running",
  RESETTING = "resetting",
  STOPPING = "stopping",
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptFragment {
  /** Full text of the current recognition session so far (partials supersede earlier partials). */
  text: string;
  isFinal: boolean;
  sessionId: string;
}

// ─── Triggers ───────────────────────────────────────────────────────────────────

export interface TriggerPhrase {
  phrase: string;
  /** Opaque owner id; several phrases may share one owner (aliases). */
  owner: string;
}

export interface TriggerOwner {
  id: string;
  name: string;
  wakeWords: string[];
  enabled: boolean;
  /** Send a commit (submit) to the sink when a command auto-commits. */
  autoSubmit: boolean;
}

// ─── Match Result ───────────────────────────────────────────────────────────────

export type MatchStrategy = "substring" | "whole" | "token" | "window";

export type MatchResult =
  | { kind: "exact"; matched: true; score: 1; matchedText: string; strategy: MatchStrategy }
  | { kind: "fuzzy"; matched: true; score: number; matchedText: string; strategy: MatchStrategy }
  | { kind: "none"; matched: false; score: number };

// ─── Detector ───────────────────────────────────────────────────────────────────

export type DetectorState =
  | { kind: "idle" }
  /** Capturing the command for `owner`; `command` is the text so far. */
  | { kind: "trigger_detected"; owner: string; command: string };

export type CommitCause = "length_limit" | "explicit";

export type DetectorEvent =
  | {
      type: "trigger_fired";
      owner: string;
      phrase: string;
      match: Extract<MatchResult, { matched: true }>;
      supersededOwner: string | null;
    }
  | { type: "buffer_updated"; owner: string; text: string }
  | { type: "command_committed"; owner: string; command: string; cause: CommitCause };

// ─── Sessions & Resets ──────────────────────────────────────────────────────────

export interface SessionDescriptor {
  readonly sessionId: string;
  readonly startedAt: number; // epoch ms
  readonly deadline: number; // startedAt + maxSessionDurationMs
}

export type ResetReason =
  | "timeout"
  | "trigger_detected"
  | "external_commit"
  | "engine_error"
  | "user_toggle";

export interface ResetRequest {
  reason: ResetReason;
  clearSink: boolean;
  /** Component that issued the request, for logs. */
  source: string;
}

export type ResetOutcome =
  | { status: "completed"; request: ResetRequest; sessionId: string; coalesced: number }
  | { status: "stopped"; request: ResetRequest; coalesced: number }
  | { status: "failed"; request: ResetRequest; error: Error; coalesced: number }
  | { status: "ignored"; request: ResetRequest; state: ControllerState };

// ─── Async helpers ──────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

// ─── Incremental Edit ───────────────────────────────────────────────────────────

export interface IncrementalEdit {
  deleteCount: number;
  appendText: string;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "start_listening" }
  | { type: "stop_listening" }
  | { type: "commit" }
  | { type: "toggle" }
  /** Restart the source and start over with an empty field. */
  | { type: "refresh" }
  | { type: "get_status" };

export interface RelayStatus {
  state: ControllerState;
  listening: boolean;
  session: SessionDescriptor | null;
  remainingMs: number | null;
  detector: DetectorState;
  sinkText: string;
}

export type ServerMessage =
  | { type: "state_change"; state: ControllerState; listening: boolean }
  | { type: "snapshot"; text: string }
  | { type: "edit"; deleteCount: number; appendText: string }
  | { type: "clear" }
  | { type: "commit"; text: string }
  | { type: "trigger_fired"; owner: string; ownerName: string; score: number }
  | { type: "buffer_updated"; owner: string; text: string }
  | { type: "command_committed"; owner: string; command: string }
  | { type: "deadline_warning"; remainingMs: number }
  | { type: "status"; status: RelayStatus }
  | { type: "error"; message: string; recoverable: boolean };
