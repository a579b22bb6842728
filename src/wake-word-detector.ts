// Voice Command Relay - Wake Word Detector
// Idle → TriggerDetected → CommandReady → Idle state machine over transcript fragments.
// CommandReady lasts only for the commit itself: committing emits `command_committed`
// and returns to idle in the same call, so the observable states are idle and
// trigger_detected (which carries the command captured so far).
//
// The detector never publishes anything itself: onTranscript() returns the events
// a fragment produced and the caller decides where they go. At most one owner is
// active; a different owner's trigger supersedes it and discards its buffer.

import type {
  DetectorEvent,
  DetectorState,
  MatchResult,
  TranscriptFragment,
  TriggerPhrase,
} from "./types.js";
import { FuzzyMatcher } from "./fuzzy-matcher.js";
import { InvalidTriggerConfigError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface WakeWordDetectorOptions {
  /** Fragments (and trigger phrases) shorter than this are never scanned for triggers. */
  minScanLength: number;
  /** Fragments (and trigger phrases) longer than this are never scanned for triggers. */
  maxScanLength: number;
  threshold: number;
  /** A command longer than this commits on its own. */
  maxCommandLength: number;
}

export const DEFAULT_DETECTOR_OPTIONS: WakeWordDetectorOptions = {
  minScanLength: 2,
  maxScanLength: 10,
  threshold: 0.8,
  maxCommandLength: 200,
};

/** A fragment shorter than this fraction of the previous one starts a new sub-session. */
const SHRINK_RATIO = 0.5;

interface TriggerHit {
  trigger: TriggerPhrase;
  match: Extract<MatchResult, { matched: true }>;
}

function codePointLength(text: string): number {
  return Array.from(text).length;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ─── Detector ───────────────────────────────────────────────────────────────────

export class WakeWordDetector {
  private readonly options: WakeWordDetectorOptions;
  private readonly matcher: FuzzyMatcher;
  private readonly logger: Logger;

  private _state: DetectorState = { kind: "idle" };
  /** Text folded in from earlier sub-sessions of the current command. */
  private accumulated = "";
  /** Latest fragment text of the current sub-session. */
  private lastSessionText = "";
  /** Exact text the trigger matched, stripped from the command along with the owner's phrases. */
  private matchedText = "";
  private ownerPhrases: string[] = [];
  private lastCommand = "";
  private readonly warnedPhrases = new Set<string>();

  constructor(
    options: Partial<WakeWordDetectorOptions> = {},
    deps: { matcher?: FuzzyMatcher; logger?: Logger } = {},
  ) {
    this.options = { ...DEFAULT_DETECTOR_OPTIONS, ...options };
    this.matcher = deps.matcher ?? new FuzzyMatcher();
    this.logger = deps.logger ?? silentLogger;
  }

  get state(): DetectorState {
    return this._state;
  }

  get activeOwner(): string | null {
    return this._state.kind === "idle" ? null : this._state.owner;
  }

  /** Current command text, with trigger phrases removed. Empty when idle. */
  get commandText(): string {
    return this._state.kind === "idle" ? "" : this.buildCommand();
  }

  /**
   * Feeds one transcript fragment through the state machine.
   * Never throws; a fragment that cannot be used produces no events.
   */
  onTranscript(fragment: TranscriptFragment, activeTriggers: readonly TriggerPhrase[]): DetectorEvent[] {
    const text = fragment.text.trim();
    if (!text) return [];

    const hit = this.scan(text, this.validTriggers(activeTriggers));

    if (this._state.kind === "idle") {
      return hit ? this.enterTriggerDetected(hit, text, activeTriggers, null) : [];
    }

    const owner = this._state.owner;
    if (hit && hit.trigger.owner !== owner) {
      return this.enterTriggerDetected(hit, text, activeTriggers, owner);
    }

    this.merge(text);
    return this.emitBuffer(owner);
  }

  /**
   * Ends the current command explicitly. Emits `command_committed` when there is
   * command text, then returns to idle either way.
   */
  commit(): DetectorEvent[] {
    if (this._state.kind === "idle") return [];

    const owner = this._state.owner;
    const command = this.buildCommand();
    this.reset();

    return command ? [{ type: "command_committed", owner, command, cause: "explicit" }] : [];
  }

  /**
   * Folds the current sub-session's text into the accumulation, so the next
   * recognition session continues the same command instead of replacing it.
   */
  markSessionBoundary(): void {
    if (this._state.kind === "idle" || !this.lastSessionText) return;
    this.accumulated += this.lastSessionText + " ";
    this.lastSessionText = "";
  }

  reset(): void {
    this._state = { kind: "idle" };
    this.clearBuffer();
    this.ownerPhrases = [];
  }

  // ─── Internals ────────────────────────────────────────────────────────────────

  private enterTriggerDetected(
    hit: TriggerHit,
    text: string,
    triggers: readonly TriggerPhrase[],
    supersededOwner: string | null,
  ): DetectorEvent[] {
    const owner = hit.trigger.owner;
    this._state = { kind: "trigger_detected", owner, command: "" };
    this.clearBuffer();
    this.ownerPhrases = triggers.filter((t) => t.owner === owner).map((t) => t.phrase);
    this.matchedText = hit.match.matchedText;
    // Words spoken after the trigger in the same fragment already belong to the command
    this.lastSessionText = text;

    if (supersededOwner) {
      this.logger.info(`Trigger for "${owner}" supersedes active owner "${supersededOwner}"`);
    } else {
      this.logger.info(`Trigger for "${owner}" fired (${hit.match.kind}, score=${hit.match.score.toFixed(2)})`);
    }

    const events: DetectorEvent[] = [
      { type: "trigger_fired", owner, phrase: hit.trigger.phrase, match: hit.match, supersededOwner },
    ];
    return events.concat(this.emitBuffer(owner));
  }

  private merge(text: string): void {
    const previousLength = codePointLength(this.lastSessionText);
    if (previousLength > 0 && codePointLength(text) < previousLength * SHRINK_RATIO) {
      this.accumulated += this.lastSessionText + " ";
    }
    this.lastSessionText = text;
  }

  private emitBuffer(owner: string): DetectorEvent[] {
    const command = this.buildCommand();
    if (command === this.lastCommand) return [];
    this.lastCommand = command;

    if (codePointLength(command) > this.options.maxCommandLength) {
      this.logger.info(`Command for "${owner}" reached ${this.options.maxCommandLength} characters, committing`);
      this.reset();
      return [
        { type: "buffer_updated", owner, text: command },
        { type: "command_committed", owner, command, cause: "length_limit" },
      ];
    }

    this._state = { kind: "trigger_detected", owner, command };
    return [{ type: "buffer_updated", owner, text: command }];
  }

  private buildCommand(): string {
    let command = this.accumulated + this.lastSessionText;
    const strip = [...this.ownerPhrases, this.matchedText].filter((p) => p.trim().length > 0);
    for (const phrase of strip) {
      command = command.replace(new RegExp(escapeRegExp(phrase.trim()), "giu"), " ");
    }
    return command.replace(/\s+/g, " ").trim();
  }

  private clearBuffer(): void {
    this.accumulated = "";
    this.lastSessionText = "";
    this.matchedText = "";
    this.lastCommand = "";
  }

  private scan(text: string, triggers: readonly TriggerPhrase[]): TriggerHit | null {
    const length = codePointLength(text);
    if (length < this.options.minScanLength || length > this.options.maxScanLength) {
      return null;
    }

    let best: TriggerHit | null = null;
    for (const trigger of triggers) {
      const match = this.matcher.matchTrigger(trigger.phrase, text, this.options.threshold);
      if (!match.matched) continue;
      if (match.kind === "exact") return { trigger, match };
      if (best === null || match.score > best.match.score) {
        best = { trigger, match };
      }
    }
    return best;
  }

  private validTriggers(triggers: readonly TriggerPhrase[]): TriggerPhrase[] {
    return triggers.filter((trigger) => {
      const length = codePointLength(trigger.phrase.trim());
      if (length >= this.options.minScanLength && length <= this.options.maxScanLength) {
        return true;
      }
      if (!this.warnedPhrases.has(trigger.phrase)) {
        this.warnedPhrases.add(trigger.phrase);
        const error = new InvalidTriggerConfigError(
          `Trigger phrase "${trigger.phrase}" of "${trigger.owner}" must be ${this.options.minScanLength}-${this.options.maxScanLength} characters; skipping it`,
          trigger.phrase,
        );
        this.logger.warn(error.message);
      }
      return false;
    });
  }
}
