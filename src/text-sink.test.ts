// Unit tests for BroadcastTextSink

import { describe, it, expect, vi } from "vitest";
import { BroadcastTextSink } from "./text-sink.js";

describe("BroadcastTextSink", () => {
  it("applies edits to the mirrored text", async () => {
    const sink = new BroadcastTextSink();
    await sink.applyEdit({ deleteCount: 0, appendText: "오늘 날씨" });
    await sink.applyEdit({ deleteCount: 0, appendText: " 어때" });
    expect(sink.text).toBe("오늘 날씨 어때");
  });

  it("notifies subscribers with the operation and the resulting text", async () => {
    const sink = new BroadcastTextSink();
    const listener = vi.fn();
    sink.subscribe(listener);

    await sink.applyEdit({ deleteCount: 0, appendText: "안녕" });
    await sink.clear();

    expect(listener).toHaveBeenNthCalledWith(1, { type: "edit", edit: { deleteCount: 0, appendText: "안녕" } }, "안녕");
    expect(listener).toHaveBeenNthCalledWith(2, { type: "clear" }, "");
  });

  it("skips empty edits", async () => {
    const sink = new BroadcastTextSink();
    const listener = vi.fn();
    sink.subscribe(listener);

    await sink.applyEdit({ deleteCount: 0, appendText: "" });
    expect(listener).not.toHaveBeenCalled();
  });

  it("commit submits the current text and empties the field", async () => {
    const sink = new BroadcastTextSink();
    const listener = vi.fn();
    await sink.applyEdit({ deleteCount: 0, appendText: "메모" });
    sink.subscribe(listener);

    await sink.commit();

    expect(listener).toHaveBeenCalledWith({ type: "commit", text: "메모" }, "");
    expect(sink.text).toBe("");
  });

  it("stops notifying after unsubscribe", async () => {
    const sink = new BroadcastTextSink();
    const listener = vi.fn();
    const unsubscribe = sink.subscribe(listener);
    unsubscribe();

    await sink.clear();
    expect(listener).not.toHaveBeenCalled();
  });
});
