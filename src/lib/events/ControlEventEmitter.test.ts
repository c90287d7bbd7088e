import { describe, it, expect, vi, afterEach } from "vitest";
import {
  ControlEventEmitter,
  type ControlEvent,
  type ControlEventSink,
} from "./ControlEventEmitter";

class RecordingSink implements ControlEventSink {
  events: ControlEvent[] = [];
  dispatch(event: ControlEvent): void {
    this.events.push(event);
  }
}

describe("ControlEventEmitter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("delivers nothing until commit", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);

    emitter.stageStroke({ direction: "left", timestamp: 100, intensity: 1.2 }, 0.6);
    expect(sink.events).toHaveLength(0);
    expect(emitter.getPendingCount()).toBe(1);

    emitter.commit();
    expect(sink.events).toEqual([
      { type: "PaddleLeft", seq: 1, timestamp: 100, intensity: 1.2, confidence: 0.6 },
    ]);
  });

  it("numbers events in staging order with increasing seq", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);

    emitter.stageStroke({ direction: "right", timestamp: 10, intensity: 1 }, 0.5);
    emitter.stageState("turn-right", 10, 0.8, "consecutive-strokes");
    emitter.commit();
    emitter.stageGesture({ gesture: "start", timestamp: 30, accelY: 9000 });
    emitter.commit();

    expect(sink.events.map((e) => [e.seq, e.type])).toEqual([
      [1, "PaddleRight"],
      [2, "TurnRight"],
      [3, "StartGame"],
    ]);
    expect(emitter.getSeq()).toBe(3);
    expect(emitter.getLastEvent()?.type).toBe("StartGame");
  });

  it("emits states only on transitions", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);

    expect(emitter.stageState("idle", 0, 0, "dead-zone")).toBe(false);
    expect(emitter.stageState("forward", 20, 1, "alternating")).toBe(true);
    expect(emitter.stageState("forward", 40, 1, "alternating")).toBe(false);
    emitter.commit();

    expect(sink.events.map((e) => e.type)).toEqual(["Forward"]);
    expect(emitter.getEmittedState()).toBe("forward");
  });

  it("swaps paddle sides when inverted", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink, { invertPaddles: true });

    emitter.stageStroke({ direction: "right", timestamp: 0, intensity: 1 }, 0);
    emitter.stageStroke({ direction: "left", timestamp: 20, intensity: 1 }, 0);
    emitter.commit();

    expect(sink.events.map((e) => e.type)).toEqual(["PaddleLeft", "PaddleRight"]);
  });

  it("stages a single Idle on reset only after a non-idle state", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);

    expect(emitter.stageResetIdle(0)).toBe(false);

    emitter.stageState("turn-left", 20, 0.7, "sustained-turn");
    emitter.commit();
    expect(emitter.stageResetIdle(40)).toBe(true);
    expect(emitter.stageResetIdle(40)).toBe(false);
    emitter.commit();

    const last = sink.events[sink.events.length - 1];
    expect(last).toEqual({ type: "Idle", seq: 2, timestamp: 40, confidence: 0, reason: "reset" });
  });

  it("restores the state tracking on discard", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);

    emitter.stageState("forward", 0, 1, "alternating");
    emitter.discard();
    emitter.commit();
    expect(sink.events).toHaveLength(0);

    expect(emitter.stageState("forward", 20, 1, "alternating")).toBe(true);
  });

  it("keeps delivering when a listener throws", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);
    const received: string[] = [];

    emitter.subscribe(() => {
      throw new Error("listener broke");
    });
    emitter.subscribe((event) => received.push(event.type));

    emitter.stageGesture({ gesture: "restart", timestamp: 0, accelY: -9000 });
    emitter.commit();

    expect(received).toEqual(["RestartGame"]);
    expect(sink.events).toHaveLength(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("stops notifying unsubscribed listeners", () => {
    const emitter = new ControlEventEmitter(new RecordingSink());
    const listener = vi.fn();
    const unsubscribe = emitter.subscribe(listener);
    unsubscribe();

    emitter.stageGesture({ gesture: "start", timestamp: 0, accelY: 9000 });
    emitter.commit();
    expect(listener).not.toHaveBeenCalled();
  });

  it("freezes committed events", () => {
    const sink = new RecordingSink();
    const emitter = new ControlEventEmitter(sink);
    emitter.stageGesture({ gesture: "start", timestamp: 0, accelY: 9000 });
    const [event] = emitter.commit();
    expect(Object.isFrozen(event)).toBe(true);
  });
});
