// Voice Command Relay - Incremental Differ
// Turns successive full-text snapshots of a command into small
// delete-then-append edits, so a live text field only ever sees the changed tail.
// All lengths are counted in Unicode code points, not UTF-16 units.

import type { IncrementalEdit } from "./types.js";

/** Length of the longest common prefix of two code-point arrays. */
function commonPrefixLength(a: string[], b: string[]): number {
  const limit = Math.min(a.length, b.length);
  let i = 0;
  while (i < limit && a[i] === b[i]) {
    i++;
  }
  return i;
}

/**
 * Applies an edit to the text a sink currently holds: drops `deleteCount`
 * code points from the end, then appends `appendText`.
 */
export function applyEdit(text: string, edit: IncrementalEdit): string {
  const units = Array.from(text);
  const keep = Math.max(0, units.length - edit.deleteCount);
  return units.slice(0, keep).join("") + edit.appendText;
}

export class IncrementalDiffer {
  private lastEmittedText = "";
  private sessionId: string | null = null;

  /**
   * Computes the edit that turns the previously emitted text into `newFullText`.
   *
   * A call with a different `sessionId` than the previous one starts from an
   * empty text, so the returned edit never deletes anything.
   */
  diff(sessionId: string, newFullText: string): IncrementalEdit {
    if (sessionId !== this.sessionId) {
      this.sessionId = sessionId;
      this.lastEmittedText = "";
    }

    const previous = Array.from(this.lastEmittedText);
    const next = Array.from(newFullText);
    const prefix = commonPrefixLength(previous, next);

    this.lastEmittedText = newFullText;

    return {
      deleteCount: previous.length - prefix,
      appendText: next.slice(prefix).join(""),
    };
  }

  get lastText(): string {
    return this.lastEmittedText;
  }

  get currentSessionId(): string | null {
    return this.sessionId;
  }

  reset(): void {
    this.lastEmittedText = "";
    this.sessionId = null;
  }
}
