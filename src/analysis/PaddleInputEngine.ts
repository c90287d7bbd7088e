/**
 * Paddle Input Engine
 * ===================
 *
 * Orchestrates the paddle input pipeline, one tick per accepted sample:
 * 1. Boundary: validation, then the SPSC sample queue.
 * 2. Calibration: zero-point or three-point baseline.
 * 3. Gestures: accelerometer jolts (StartGame / RestartGame).
 * 4. Conditioning + classification: strokes, turns, forward, idle.
 * 5. Emission: staged during the tick, committed at its end.
 *
 * Every collaborator is constructed here and passed explicitly; the engine
 * holds no global state. Reset and recalibration requested while a tick
 * runs (e.g. from an event listener) wait for the tick boundary.
 *
 * @module analysis/PaddleInputEngine
 */

import type * as THREE from "three";
import { engineLog } from "../lib/logger";
import {
  resolvePaddleConfig,
  type PaddleConfig,
  type PaddleConfigInput,
  type PresetName,
} from "../lib/config/paddleConfig";
import { SampleValidator } from "../lib/connection/sampleValidation";
import { SampleQueue } from "../lib/connection/SampleQueue";
import type { SampleSource, SensorSample } from "../lib/connection/SensorSample";
import { SignalConditioner, type ConditionedSignal } from "../lib/signal/SignalConditioner";
import {
  ControlEventEmitter,
  type ControlEvent,
  type ControlEventSink,
} from "../lib/events/ControlEventEmitter";
import { GyroCalibrator, type CalibrationInstruction } from "../calibration/GyroCalibrator";
import type {
  CalibrationMode,
  CalibrationProfile,
} from "../calibration/calibrationTypes";
import type { CalibrationTimeoutError } from "../lib/errors";
import { createPaddleStatusStore, type PaddleStatusStore } from "../store/paddleStatusStore";
import { GestureDetector } from "./GestureDetector";
import { PaddlePatternClassifier } from "./PaddlePatternClassifier";
import type { PaddleState } from "./PaddlePhase";

// ============================================================================
// TYPES
// ============================================================================

export interface PaddleInputEngineOptions {
  /** The controller receiving events */
  sink: ControlEventSink;
  /** Overrides on top of the preset */
  config?: PaddleConfigInput;
  preset?: PresetName;
}

// ============================================================================
// ENGINE CLASS
// ============================================================================

export class PaddleInputEngine {
  readonly config: Readonly<PaddleConfig>;
  /** Diagnostics, written at each tick commit */
  readonly status: PaddleStatusStore;

  // Pipeline stages
  private readonly validator: SampleValidator;
  private readonly queue: SampleQueue;
  private readonly calibrator: GyroCalibrator;
  private readonly conditioner: SignalConditioner;
  private readonly classifier: PaddlePatternClassifier;
  private readonly gestures: GestureDetector;
  private readonly emitter: ControlEventEmitter;

  // Tick state
  private lastT: number | null = null;
  private ticking = false;
  private ticks = 0;
  private eventCount = 0;
  private lastSignal: ConditionedSignal | null = null;
  /** Seconds of gesture ticks the conditioner has not seen yet */
  private unconditionedDt = 0;

  // Commands deferred to the tick boundary
  private pendingReset = false;
  private pendingCalibration: CalibrationMode | null = null;

  constructor(options: PaddleInputEngineOptions) {
    this.config = resolvePaddleConfig(options.config, options.preset);
    const cfg = this.config;

    this.validator = new SampleValidator({ maxGyroRate: cfg.maxGyroRate });
    this.queue = new SampleQueue(cfg.queueCapacity);
    this.calibrator = new GyroCalibrator(cfg.calibration);
    this.conditioner = new SignalConditioner(cfg);
    this.classifier = new PaddlePatternClassifier(cfg);
    this.gestures = new GestureDetector(cfg);
    this.emitter = new ControlEventEmitter(options.sink, {
      invertPaddles: cfg.invertPaddles,
    });

    if (cfg.autoCalibrate) {
      this.calibrator.startSession();
    }

    this.status = createPaddleStatusStore(
      this.calibrator.getProgress(),
      this.queue.getStats(),
    );

    engineLog.info(
      `Engine ready (calibration ${cfg.calibration.mode}, turn axis ${cfg.turnAxis})`,
    );
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  /**
   * Validate a candidate and queue it. Malformed candidates are dropped and
   * counted. Returns whether the sample was accepted.
   */
  push(candidate: unknown): boolean {
    const result = this.validator.validate(candidate);
    if (!result.ok) return false;

    if (!this.queue.push(result.sample)) {
      engineLog.warn(`Sample queue full, oldest sample dropped`);
    }
    return true;
  }

  /**
   * Run one tick per queued sample, in FIFO order. Returns the events
   * committed along the way.
   */
  drain(): ControlEvent[] {
    if (this.ticking) return [];

    const events: ControlEvent[] = [];
    let sample = this.queue.shift();
    while (sample) {
      events.push(...this.tick(sample), ...this.applyPending());
      sample = this.queue.shift();
    }
    return events;
  }

  /** push() then drain() */
  process(candidate: unknown): ControlEvent[] {
    this.push(candidate);
    return this.drain();
  }

  /**
   * Wire an external sample source. Samples are queued on arrival and
   * drained immediately. Returns a detach function.
   */
  attach(source: SampleSource): () => void {
    engineLog.info(`Source attached (${source.status})`);
    return source.onSample((candidate) => {
      this.process(candidate);
    });
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Start a calibration session. While it runs no events are emitted.
   */
  requestCalibration(mode: CalibrationMode = this.config.calibration.mode): void {
    if (this.ticking) {
      this.pendingCalibration = mode;
      return;
    }
    this.applyCalibration(mode);
  }

  /** Finalise the running calibration collection now */
  forceFinishCalibration(): void {
    if (this.ticking) {
      engineLog.warn("forceFinishCalibration ignored inside a tick");
      return;
    }
    this.calibrator.forceFinish();
    this.publish();
  }

  /**
   * Back to uncalibrated / idle. Idempotent.
   */
  reset(): void {
    if (this.ticking) {
      this.pendingReset = true;
      return;
    }
    this.applyReset();
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  private tick(sample: SensorSample): ControlEvent[] {
    this.ticking = true;
    try {
      return this.runTick(sample);
    } finally {
      this.ticking = false;
    }
  }

  private runTick(sample: SensorSample): ControlEvent[] {
    const dtMs = this.lastT === null ? 0 : sample.t - this.lastT;
    this.lastT = sample.t;
    this.ticks++;

    if (this.calibrator.isCalibrating()) {
      this.calibrator.feed(sample);
    } else if (this.calibrator.isCalibrated()) {
      this.classify(sample, dtMs / 1000);
    }

    const events = this.emitter.commit();
    this.eventCount += events.length;
    this.publish();
    return events;
  }

  private classify(sample: SensorSample, dt: number): void {
    const gesture = this.gestures.update(sample.accelY, sample.t);
    if (gesture) {
      // Gesture and stroke are mutually exclusive within one tick
      this.emitter.stageGesture(gesture);
      this.unconditionedDt += dt;
      return;
    }

    const signal = this.conditioner.condition(
      this.calibrator.calibrated(sample),
      this.classifier.getState() === "idle",
      { dt: dt + this.unconditionedDt, accelY: sample.accelY },
    );
    this.unconditionedDt = 0;
    this.lastSignal = signal;

    const result = this.classifier.update({
      smoothed: signal.smoothed,
      combinedMagnitude: signal.combinedMagnitude,
      t: sample.t,
    });

    if (result.stroke) {
      this.emitter.stageStroke(result.stroke, result.confidence);
    }
    if (result.changed && result.reason) {
      this.emitter.stageState(result.state, sample.t, result.confidence, result.reason);
    }
  }

  private applyPending(): ControlEvent[] {
    const events: ControlEvent[] = [];
    if (this.pendingReset) {
      this.pendingReset = false;
      this.pendingCalibration = null;
      events.push(...this.applyReset());
    }
    if (this.pendingCalibration !== null) {
      const mode = this.pendingCalibration;
      this.pendingCalibration = null;
      events.push(...this.applyCalibration(mode));
    }
    return events;
  }

  // ==========================================================================
  // State replacement (tick boundary only)
  // ==========================================================================

  private resetPipeline(): ControlEvent[] {
    this.emitter.discard();
    this.classifier.reset();
    this.conditioner.reset();
    this.gestures.reset();
    this.lastSignal = null;
    this.unconditionedDt = 0;

    this.emitter.stageResetIdle(this.lastT ?? 0);
    const events = this.emitter.commit();
    this.eventCount += events.length;
    return events;
  }

  private applyReset(): ControlEvent[] {
    const events = this.resetPipeline();
    this.calibrator.clear();
    if (this.config.autoCalibrate) {
      this.calibrator.startSession();
    }
    engineLog.info("Reset");
    this.publish();
    return events;
  }

  private applyCalibration(mode: CalibrationMode): ControlEvent[] {
    const events = this.resetPipeline();
    this.calibrator.startSession(mode);
    this.publish();
    return events;
  }

  private publish(): void {
    this.status.getState().publish({
      calibration: this.calibrator.getProgress(),
      state: this.classifier.getState(),
      confidence: this.classifier.getConfidence(),
      combinedMagnitude: this.lastSignal?.combinedMagnitude ?? 0,
      driftCorrected: this.lastSignal?.driftCorrected ?? false,
      lastEvent: this.emitter.getLastEvent(),
      eventCount: this.eventCount,
      ticks: this.ticks,
      lastTickAt: this.lastT,
      drops: this.validator.getDropCounts(),
      queue: this.queue.getStats(),
    });
  }

  // ==========================================================================
  // Subscriptions & queries
  // ==========================================================================

  /** Additional listener next to the sink. Returns an unsubscribe function. */
  subscribe(listener: (event: ControlEvent) => void): () => void {
    return this.emitter.subscribe(listener);
  }

  onCalibrationInstruction(callback: (instruction: CalibrationInstruction) => void): () => void {
    return this.calibrator.onInstruction(callback);
  }

  onCalibrationComplete(callback: (profile: CalibrationProfile) => void): () => void {
    return this.calibrator.onComplete(callback);
  }

  onCalibrationFailure(callback: (error: CalibrationTimeoutError) => void): () => void {
    return this.calibrator.onFailure(callback);
  }

  getState(): PaddleState {
    return this.classifier.getState();
  }

  getProfile(): CalibrationProfile | null {
    return this.calibrator.getProfile();
  }

  getDriftBias(): THREE.Vector3 {
    return this.conditioner.getDriftBias();
  }
}
