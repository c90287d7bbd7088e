/**
 * ControlEventEmitter - Ordered, de-duplicated control output
 *
 * Events are staged while a tick runs and committed together at the tick
 * boundary, so the controller never sees a half-applied tick.
 *
 * - Classifier states go out only on transitions (no repeated Idle).
 * - Strokes and gestures go out on every accepted occurrence.
 * - Every committed event carries a strictly increasing `seq`.
 */

import { emitterLog } from "../logger";
import type { StrokeDirection } from "../math/conventions";
import type {
  GestureEvent,
  MovementEvent,
  PaddleState,
  TransitionReason,
} from "../../analysis/PaddlePhase";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type StrokeEventType = "PaddleLeft" | "PaddleRight";
export type StateEventType = "TurnLeft" | "TurnRight" | "Forward" | "Idle";
export type GestureEventType = "StartGame" | "RestartGame";
export type ControlEventType = StrokeEventType | StateEventType | GestureEventType;

interface ControlEventBase {
  seq: number;
  /** Sample timestamp (ms) of the tick that produced the event */
  timestamp: number;
  intensity?: number;
  confidence?: number;
}

export interface StrokeControlEvent extends ControlEventBase {
  type: StrokeEventType;
  intensity: number;
  confidence: number;
}

export interface StateControlEvent extends ControlEventBase {
  type: StateEventType;
  confidence: number;
  reason: TransitionReason;
}

export interface GestureControlEvent extends ControlEventBase {
  type: GestureEventType;
  accelY: number;
}

export type ControlEvent =
  | StrokeControlEvent
  | StateControlEvent
  | GestureControlEvent;

/** Staged event, before the commit assigns its sequence number */
type StagedEvent =
  | Omit<StrokeControlEvent, "seq">
  | Omit<StateControlEvent, "seq">
  | Omit<GestureControlEvent, "seq">;

/**
 * The game or boat controller. Supplied explicitly at construction.
 */
export interface ControlEventSink {
  dispatch(event: ControlEvent): void;
}

export interface ControlEventEmitterOptions {
  /** Swap PaddleLeft and PaddleRight */
  invertPaddles?: boolean;
}

type ControlEventListener = (event: ControlEvent) => void;

const STATE_EVENT: Record<PaddleState, StateEventType> = {
  idle: "Idle",
  forward: "Forward",
  "turn-left": "TurnLeft",
  "turn-right": "TurnRight",
};

// ─────────────────────────────────────────────────────────────────────────────
// Emitter
// ─────────────────────────────────────────────────────────────────────────────
export class ControlEventEmitter {
  private readonly sink: ControlEventSink;
  private readonly invertPaddles: boolean;

  private staged: StagedEvent[] = [];
  private seq = 0;
  private committedState: PaddleState = "idle";
  private stagedState: PaddleState = "idle";
  private lastEvent: ControlEvent | null = null;
  private listeners: ControlEventListener[] = [];

  constructor(sink: ControlEventSink, options: ControlEventEmitterOptions = {}) {
    this.sink = sink;
    this.invertPaddles = options.invertPaddles ?? false;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Staging
  // ─────────────────────────────────────────────────────────────────────────
  stageStroke(stroke: MovementEvent, confidence: number): void {
    this.staged.push({
      type: this.strokeEventType(stroke.direction),
      timestamp: stroke.timestamp,
      intensity: stroke.intensity,
      confidence,
    });
  }

  /**
   * Stage a classifier state. Dropped unless it differs from the last
   * state staged or emitted.
   */
  stageState(
    state: PaddleState,
    timestamp: number,
    confidence: number,
    reason: TransitionReason,
  ): boolean {
    if (state === this.stagedState) return false;
    this.stagedState = state;
    this.staged.push({
      type: STATE_EVENT[state],
      timestamp,
      confidence,
      reason,
    });
    return true;
  }

  stageGesture(gesture: GestureEvent): void {
    this.staged.push({
      type: gesture.gesture === "start" ? "StartGame" : "RestartGame",
      timestamp: gesture.timestamp,
      accelY: gesture.accelY,
    });
  }

  /**
   * Stage a single Idle when the controller was left in a non-idle state.
   */
  stageResetIdle(timestamp: number): boolean {
    return this.stageState("idle", timestamp, 0, "reset");
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Commit
  // ─────────────────────────────────────────────────────────────────────────
  /**
   * Number every staged event and deliver them in order: sink first, then
   * listeners. Returns the committed events.
   */
  commit(): ControlEvent[] {
    if (this.staged.length === 0) return [];

    const committed = this.staged.map(
      (event): ControlEvent => Object.freeze({ ...event, seq: ++this.seq }),
    );
    this.staged = [];
    this.committedState = this.stagedState;

    for (const event of committed) {
      this.lastEvent = event;
      this.deliver(event);
    }
    return committed;
  }

  /** Drop everything staged since the last commit */
  discard(): void {
    this.staged = [];
    this.stagedState = this.committedState;
  }

  private deliver(event: ControlEvent): void {
    try {
      this.sink.dispatch(event);
    } catch (err) {
      emitterLog.error(`Sink failed on ${event.type} #${event.seq}`, err);
    }
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        emitterLog.error(`Listener failed on ${event.type} #${event.seq}`, err);
      }
    }
  }

  private strokeEventType(direction: StrokeDirection): StrokeEventType {
    const left = direction === "left";
    return left !== this.invertPaddles ? "PaddleLeft" : "PaddleRight";
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Subscriptions & queries
  // ─────────────────────────────────────────────────────────────────────────
  subscribe(listener: ControlEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  getLastEvent(): ControlEvent | null {
    return this.lastEvent;
  }

  /** Last state the controller has been told about */
  getEmittedState(): PaddleState {
    return this.committedState;
  }

  getSeq(): number {
    return this.seq;
  }

  getPendingCount(): number {
    return this.staged.length;
  }
}
