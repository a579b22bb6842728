// Unit tests for VoiceRelay
// Wake word → source restart → command typed into the sink as incremental edits.

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { VoiceRelay } from "./voice-relay.js";
import type { VoiceRelayOptions } from "./voice-relay.js";
import { BroadcastTextSink } from "./text-sink.js";
import type { SinkOperation, TextSink } from "./text-sink.js";
import { StaticTriggerConfig } from "./trigger-config.js";
import { ControllerState } from "./types.js";
import type { TriggerOwner } from "./types.js";
import type { RelayEvent, RelayEventBus } from "./event-bus.js";
import { FakeTranscriptionSource } from "./testing/fake-transcription-source.js";
import { EngineUnavailableError } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const CLAUDE: TriggerOwner = { id: "claude", name: "Claude", wakeWords: ["Claude", "클로드"], enabled: true, autoSubmit: true };
const CHATGPT: TriggerOwner = { id: "chatgpt", name: "ChatGPT", wakeWords: ["ChatGPT", "챗지피티"], enabled: true, autoSubmit: true };
const NOTES: TriggerOwner = { id: "notes", name: "Notes", wakeWords: ["메모장"], enabled: true, autoSubmit: false };

function createRelay(
  options: Partial<VoiceRelayOptions> = {},
  owners: TriggerOwner[] = [CLAUDE, CHATGPT],
  sink: TextSink = new BroadcastTextSink(),
) {
  const source = new FakeTranscriptionSource();
  let counter = 0;
  const relay = new VoiceRelay(
    {
      source,
      sink,
      triggers: new StaticTriggerConfig(owners),
      now: () => Date.now(),
      createId: () => `id-${++counter}`,
    },
    options,
  );
  const events: RelayEvent[] = [];
  relay.bus.onAny((event) => {
    events.push(event);
  });
  return { relay, source, events };
}

function createRecordingSink() {
  const sink = new BroadcastTextSink();
  const operations: SinkOperation[] = [];
  sink.subscribe((operation) => {
    operations.push(operation);
  });
  return { sink, operations };
}

function currentSessionId(relay: VoiceRelay): string {
  const session = relay.controller.session;
  if (!session) throw new Error("No session is running");
  return session.sessionId;
}

function nextEvent<T extends RelayEvent["type"]>(
  bus: RelayEventBus,
  type: T,
): Promise<Extract<RelayEvent, { type: T }>> {
  return new Promise((resolve) => {
    const off = bus.on(type, (event) => {
      off();
      resolve(event);
    });
  });
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("VoiceRelay", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("restarts the source on a wake word and types the command incrementally", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({}, [CLAUDE, CHATGPT], sink);
    await relay.start();
    const first = currentSessionId(relay);

    const restarted = nextEvent(relay.bus, "reset_completed");
    source.emitFragment(first, "Claude");
    await vi.advanceTimersByTimeAsync(400);
    const { outcome } = await restarted;
    expect(outcome).toMatchObject({
      status: "completed",
      request: { reason: "trigger_detected", clearSink: false, source: "wake-word-detector" },
    });

    const second = currentSessionId(relay);
    expect(second).not.toBe(first);
    source.emitFragment(second, "오늘 날씨");
    source.emitFragment(second, "오늘 날씨 어때");
    await relay.flush();

    expect(sink.text).toBe("오늘 날씨 어때");
    expect(operations).toEqual([
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘 날씨" } },
      { type: "edit", edit: { deleteCount: 0, appendText: " 어때" } },
    ]);
    expect(relay.detector.state).toEqual({ kind: "trigger_detected", owner: "claude", command: "오늘 날씨 어때" });
  });

  it("submits the command on an explicit commit and restarts the source", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE], sink);
    await relay.start();
    const session = currentSessionId(relay);
    source.emitFragment(session, "Claude");
    source.emitFragment(session, "Claude 오늘 날씨 어때");

    const committed = relay.commit();
    await vi.advanceTimersByTimeAsync(400);
    await expect(committed).resolves.toMatchObject({
      status: "completed",
      request: { reason: "external_commit", clearSink: false, source: "external-commit" },
    });
    await relay.flush();

    expect(operations).toEqual([
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘 날씨 어때" } },
      { type: "commit", text: "오늘 날씨 어때" },
    ]);
    expect(sink.text).toBe("");
    expect(relay.detector.state).toEqual({ kind: "idle" });
  });

  it("keeps the command across a deadline restart and retypes it into the cleared field", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE], sink);
    await relay.start();
    const first = currentSessionId(relay);
    source.emitFragment(first, "Claude");
    source.emitFragment(first, "Claude 오늘");

    const restarted = nextEvent(relay.bus, "reset_completed");
    await vi.advanceTimersByTimeAsync(58_000);
    await vi.advanceTimersByTimeAsync(400);
    await restarted;

    const second = currentSessionId(relay);
    source.emitFragment(second, "날씨");
    await relay.flush();

    expect(sink.text).toBe("오늘 날씨");
    expect(operations).toEqual([
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘" } },
      { type: "clear" },
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘" } },
      { type: "edit", edit: { deleteCount: 0, appendText: " 날씨" } },
    ]);
  });

  it("submits a command committed while a deadline restart is settling", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE], sink);
    await relay.start();
    const session = currentSessionId(relay);
    source.emitFragment(session, "Claude");
    source.emitFragment(session, "Claude 오늘 날씨 어때");

    await vi.advanceTimersByTimeAsync(58_000);
    await flush();
    expect(relay.controller.state).toBe(ControllerState.RESETTING);

    const committed = relay.commit();
    await vi.advanceTimersByTimeAsync(400);
    await expect(committed).resolves.toMatchObject({
      status: "completed",
      request: { reason: "timeout", clearSink: true, source: "deadline-timer" },
      coalesced: 1,
    });
    await relay.flush();

    expect(operations).toEqual([
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘 날씨 어때" } },
      { type: "clear" },
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘 날씨 어때" } },
      { type: "commit", text: "오늘 날씨 어때" },
    ]);
    expect(sink.text).toBe("");
    expect(relay.detector.state).toEqual({ kind: "idle" });
  });

  it("clears the field for a refresh folded into an engine-error restart", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE], sink);
    await relay.start();
    const session = currentSessionId(relay);
    source.emitFragment(session, "Claude");
    source.emitFragment(session, "Claude 오늘");

    source.emitError(session, new EngineUnavailableError("connection dropped"));
    await flush();
    const refreshed = relay.refresh();
    await vi.advanceTimersByTimeAsync(400);
    await expect(refreshed).resolves.toMatchObject({
      status: "completed",
      request: { reason: "engine_error", clearSink: false },
      coalesced: 1,
    });
    await relay.flush();

    expect(operations).toEqual([{ type: "edit", edit: { deleteCount: 0, appendText: "오늘" } }, { type: "clear" }]);
    expect(sink.text).toBe("");
    expect(relay.detector.state).toEqual({ kind: "idle" });
  });

  it("clears the field on supersession when triggers do not restart the source", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE, CHATGPT], sink);
    await relay.start();
    const session = currentSessionId(relay);

    source.emitFragment(session, "Claude");
    source.emitFragment(session, "Claude 오늘 날씨");
    source.emitFragment(session, "ChatGPT");
    source.emitFragment(session, "ChatGPT 안녕");
    await relay.flush();

    expect(operations).toEqual([
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘 날씨" } },
      { type: "clear" },
      { type: "edit", edit: { deleteCount: 0, appendText: "안녕" } },
    ]);
    expect(sink.text).toBe("안녕");
    expect(relay.detector.commandText).toBe("안녕");
  });

  it("drops fragments from a session that is no longer running", async () => {
    const { relay, source } = createRelay();
    await relay.start();
    const first = currentSessionId(relay);

    const restarted = nextEvent(relay.bus, "reset_completed");
    source.emitFragment(first, "Claude");
    await vi.advanceTimersByTimeAsync(400);
    await restarted;

    source.emitFragment(first, "Claude 늦은 결과");
    await relay.flush();
    expect(relay.detector.commandText).toBe("");
  });

  it("clears the field when another owner's wake word supersedes the command", async () => {
    const { sink } = createRecordingSink();
    const { relay, source, events } = createRelay({}, [CLAUDE, CHATGPT], sink);
    await relay.start();

    let restarted = nextEvent(relay.bus, "reset_completed");
    source.emitFragment(currentSessionId(relay), "Claude");
    await vi.advanceTimersByTimeAsync(400);
    await restarted;
    source.emitFragment(currentSessionId(relay), "오늘 날씨");
    await relay.flush();
    expect(sink.text).toBe("오늘 날씨");

    restarted = nextEvent(relay.bus, "reset_completed");
    source.emitFragment(currentSessionId(relay), "챗지피티");
    await vi.advanceTimersByTimeAsync(400);
    const { outcome } = await restarted;
    await relay.flush();

    expect(outcome.request).toEqual({ reason: "trigger_detected", clearSink: true, source: "wake-word-detector" });
    expect(sink.text).toBe("");
    expect(relay.detector.state).toEqual({ kind: "trigger_detected", owner: "chatgpt", command: "" });
    expect(events).toContainEqual({
      type: "detector",
      event: expect.objectContaining({ type: "trigger_fired", owner: "chatgpt", supersededOwner: "claude" }),
    });
  });

  it("auto-submits a command that reaches the length limit", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false, detector: { maxCommandLength: 5 } }, [CLAUDE], sink);
    await relay.start();
    const session = currentSessionId(relay);

    source.emitFragment(session, "Claude");
    source.emitFragment(session, "Claude 오늘 날씨 어때");
    await relay.flush();

    expect(operations).toEqual([
      { type: "edit", edit: { deleteCount: 0, appendText: "오늘 날씨 어때" } },
      { type: "commit", text: "오늘 날씨 어때" },
    ]);
    expect(relay.detector.state).toEqual({ kind: "idle" });
  });

  it("does not submit for an owner without autoSubmit", async () => {
    const { sink, operations } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false, detector: { maxCommandLength: 5 } }, [NOTES], sink);
    await relay.start();
    const session = currentSessionId(relay);

    source.emitFragment(session, "메모장");
    source.emitFragment(session, "메모장 장보기 목록");
    await relay.flush();

    expect(operations).toEqual([{ type: "edit", edit: { deleteCount: 0, appendText: "장보기 목록" } }]);
    expect(sink.text).toBe("장보기 목록");
  });

  it("refresh clears the field and drops the command", async () => {
    const { sink } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE], sink);
    await relay.start();
    source.emitFragment(currentSessionId(relay), "Claude 메모");
    await relay.flush();
    expect(sink.text).toBe("메모");

    const refreshed = relay.refresh();
    await vi.advanceTimersByTimeAsync(400);
    await expect(refreshed).resolves.toMatchObject({
      status: "completed",
      request: { reason: "user_toggle", clearSink: true, source: "user" },
    });
    await relay.flush();

    expect(sink.text).toBe("");
    expect(relay.detector.state).toEqual({ kind: "idle" });
  });

  it("refresh is ignored while stopped", async () => {
    const { relay } = createRelay();
    await expect(relay.refresh()).resolves.toMatchObject({ status: "ignored", state: ControllerState.STOPPED });
  });

  it("adds punctuation when a punctuation style is set", async () => {
    const { sink } = createRecordingSink();
    const { relay, source } = createRelay({ resetOnTrigger: false, punctuationStyle: "conservative" }, [CLAUDE], sink);
    await relay.start();
    const session = currentSessionId(relay);

    source.emitFragment(session, "Claude");
    source.emitFragment(session, "Claude 밥 먹었니", true);
    await relay.flush();

    expect(sink.text).toBe("밥 먹었니?");
  });

  it("publishes each edit with its edit session", async () => {
    const { relay, source, events } = createRelay({ resetOnTrigger: false }, [CLAUDE]);
    await relay.start();
    source.emitFragment(currentSessionId(relay), "Claude 메모");
    await relay.flush();

    const edits = events.filter((event) => event.type === "edit");
    expect(edits).toHaveLength(1);
    expect(edits[0]).toMatchObject({ type: "edit", edit: { deleteCount: 0, appendText: "메모" } });
  });

  it("reports a failing sink and keeps going", async () => {
    const failing: TextSink = {
      applyEdit: vi.fn(async () => {
        throw new Error("field is read-only");
      }),
      clear: vi.fn(async () => {}),
      commit: vi.fn(async () => {}),
    };
    const { relay, source, events } = createRelay({ resetOnTrigger: false }, [CLAUDE], failing);
    await relay.start();
    const session = currentSessionId(relay);

    source.emitFragment(session, "Claude 메모");
    source.emitFragment(session, "Claude 메모 추가");
    await relay.flush();

    expect(failing.applyEdit).toHaveBeenCalledTimes(2);
    const errors = events.filter((event) => event.type === "error");
    expect(errors).toHaveLength(2);
    expect(errors[0]).toMatchObject({ type: "error", recoverable: true, error: { message: "field is read-only" } });
  });

  describe("listening controls", () => {
    it("toggle starts and stops listening", async () => {
      const { relay } = createRelay();

      await relay.toggle();
      expect(relay.controller.state).toBe(ControllerState.RUNNING);

      await relay.toggle();
      expect(relay.controller.state).toBe(ControllerState.STOPPED);
    });

    it("stop drops the command in progress", async () => {
      const { relay, source } = createRelay({ resetOnTrigger: false }, [CLAUDE]);
      await relay.start();
      source.emitFragment(currentSessionId(relay), "Claude 메모");

      await relay.stop();
      expect(relay.detector.state).toEqual({ kind: "idle" });
      expect(relay.controller.listening).toBe(false);
    });

    it("forwards audio only while a session runs", async () => {
      const { relay, source } = createRelay();
      expect(relay.feedAudio(Buffer.alloc(2))).toBe(false);

      await relay.start();
      expect(relay.feedAudio(Buffer.alloc(2))).toBe(true);
      expect(source.fed).toHaveLength(1);
    });

    it("reports its status", async () => {
      const { relay } = createRelay();
      await relay.start();
      const session = relay.controller.session;

      expect(relay.getStatus("메모")).toEqual({
        state: ControllerState.RUNNING,
        listening: true,
        session,
        remainingMs: 58_000,
        detector: { kind: "idle" },
        sinkText: "메모",
      });
    });

    it("close stops listening and unsubscribes", async () => {
      const { relay, source } = createRelay();
      await relay.start();
      const session = currentSessionId(relay);

      await relay.close();
      await flush();
      expect(relay.controller.state).toBe(ControllerState.STOPPED);
      expect(source.ended).toEqual([session]);
    });
  });
});
