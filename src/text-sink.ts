// Voice Command Relay - Text Sink
// The destination of incremental edits. BroadcastTextSink mirrors the text a
// remote field holds and fans every operation out to subscribers (the
// WebSocket server forwards them to connected clients).

import type { IncrementalEdit } from "./types.js";
import { applyEdit } from "./incremental-differ.js";

export interface TextSink {
  applyEdit(edit: IncrementalEdit): Promise<void>;
  clear(): Promise<void>;
  /** Submits the current text (the "Enter" of the target field). */
  commit(): Promise<void>;
}

export type SinkOperation =
  | { type: "edit"; edit: IncrementalEdit }
  | { type: "clear" }
  | { type: "commit"; text: string };

export type SinkListener = (operation: SinkOperation, text: string) => void;

export class BroadcastTextSink implements TextSink {
  private _text = "";
  private readonly listeners = new Set<SinkListener>();

  /** Text the field holds after every operation so far. */
  get text(): string {
    return this._text;
  }

  subscribe(listener: SinkListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async applyEdit(edit: IncrementalEdit): Promise<void> {
    if (edit.deleteCount === 0 && edit.appendText === "") return;
    this._text = applyEdit(this._text, edit);
    this.notify({ type: "edit", edit });
  }

  async clear(): Promise<void> {
    this._text = "";
    this.notify({ type: "clear" });
  }

  async commit(): Promise<void> {
    const text = this._text;
    // A submitted field is empty again
    this._text = "";
    this.notify({ type: "commit", text });
  }

  private notify(operation: SinkOperation): void {
    for (const listener of this.listeners) {
      listener(operation, this._text);
    }
  }
}
