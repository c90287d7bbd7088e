/**
 * Signal Conditioner
 *
 * Turns a calibrated gyro vector into the smoothed signal the classifier
 * reads: per-component deadzone, exponential smoothing and, while the
 * paddle rests, a slow pull of the baseline toward the accelerometer tilt.
 */

import * as THREE from "three";
import { signalLog } from "../logger";
import { RAD_TO_DEG } from "../math/conventions";
import { applyDeadZone, fromTuple, weightedAbsSum, type FrozenVector3 } from "../math/vector";
import type { PaddleConfig, SmoothingMode } from "../config/paddleConfig";

// ============================================
// Types
// ============================================

export interface ConditionedSignal {
  smoothed: THREE.Vector3;
  /** Calibrated input, before deadzone and smoothing */
  raw: THREE.Vector3;
  /** Σ weight_i · |smoothed_i| */
  combinedMagnitude: number;
  /** True when idle drift correction moved the baseline this tick */
  driftCorrected: boolean;
}

/** Per-tick context. Without it, ticks are treated as fixed-rate. */
export interface ConditionFrame {
  /** Tick duration (s) */
  dt: number;
  /** Raw accelerometer count on the tilt axis */
  accelY: number;
}

export type SignalConditionerConfig = Pick<
  PaddleConfig,
  | "deadZone"
  | "smoothingFactor"
  | "smoothingMode"
  | "referenceRateHz"
  | "axisWeights"
  | "enableDriftCorrection"
  | "idleFollowSmoothing"
  | "accelCountsPerG"
  | "turnAxis"
  | "idleTimeout"
>;

// ============================================
// Helpers
// ============================================

/**
 * Per-tick lerp factor.
 * `time-scaled` keeps the response identical whatever the tick rate:
 * α = 1 − (1 − factor)^(dt / referenceDt).
 */
export function smoothingAlpha(
  factor: number,
  mode: SmoothingMode,
  dt: number,
  referenceRateHz: number,
): number {
  if (mode === "fixed") return factor;
  const referenceDt = 1 / referenceRateHz;
  return 1 - Math.pow(1 - factor, dt / referenceDt);
}

/**
 * Tilt angle (degrees) from a single accelerometer axis.
 */
export function tiltAngleFromAccel(accelY: number, countsPerG: number): number {
  const ratio = Math.min(1, Math.max(-1, accelY / countsPerG));
  return Math.asin(ratio) * RAD_TO_DEG;
}

// ============================================
// Signal Conditioner
// ============================================

export class SignalConditioner {
  private readonly config: SignalConditionerConfig;
  private readonly weights: FrozenVector3;

  private smoothed = new THREE.Vector3();
  private driftBias = new THREE.Vector3();
  private idleTime = 0; // s
  private correcting = false;
  private lastTilt: number | null = null;

  constructor(config: SignalConditionerConfig) {
    this.config = config;
    this.weights = Object.freeze(fromTuple(config.axisWeights));
  }

  condition(
    rawCalibrated: FrozenVector3,
    idle: boolean,
    frame?: ConditionFrame,
  ): ConditionedSignal {
    const cfg = this.config;
    const dt = frame?.dt ?? 1 / cfg.referenceRateHz;

    const raw = new THREE.Vector3(rawCalibrated.x, rawCalibrated.y, rawCalibrated.z);
    const corrected = raw.clone().sub(this.driftBias);
    const target = applyDeadZone(corrected, cfg.deadZone);

    const alpha = smoothingAlpha(cfg.smoothingFactor, cfg.smoothingMode, dt, cfg.referenceRateHz);
    this.smoothed.lerp(target, alpha);

    // Tilt rate from the accelerometer: the at-rest reference for the turn axis
    let tiltRate = 0;
    if (frame) {
      const tilt = tiltAngleFromAccel(frame.accelY, cfg.accelCountsPerG);
      if (this.lastTilt !== null && frame.dt > 0) {
        tiltRate = (tilt - this.lastTilt) / frame.dt;
      }
      this.lastTilt = tilt;
    }

    this.idleTime = idle ? this.idleTime + dt : 0;

    let driftCorrected = false;
    if (cfg.enableDriftCorrection && this.idleTime > cfg.idleTimeout) {
      if (!this.correcting) {
        signalLog.debug(`Idle for ${this.idleTime.toFixed(2)}s, drift correction engaged`);
        this.correcting = true;
      }
      driftCorrected = this.followReference(tiltRate, dt);
    } else {
      this.correcting = false;
    }

    return {
      smoothed: this.smoothed.clone(),
      raw,
      combinedMagnitude: weightedAbsSum(this.smoothed, this.weights),
      driftCorrected,
    };
  }

  /**
   * Pull the smoothed signal toward the at-rest reference and fold the
   * residual into the baseline bias.
   */
  private followReference(tiltRate: number, dt: number): boolean {
    const k = Math.min(1, this.config.idleFollowSmoothing * dt);
    if (k <= 0) return false;

    const reference = new THREE.Vector3();
    reference[this.config.turnAxis] = tiltRate;

    const residual = this.smoothed.clone().sub(reference);
    this.driftBias.addScaledVector(residual, k);
    this.smoothed.lerp(reference, k);
    return true;
  }

  getSmoothed(): THREE.Vector3 {
    return this.smoothed.clone();
  }

  getDriftBias(): THREE.Vector3 {
    return this.driftBias.clone();
  }

  /** Seconds the classifier has reported idle, as seen by the conditioner */
  getIdleTime(): number {
    return this.idleTime;
  }

  reset(): void {
    this.smoothed.set(0, 0, 0);
    this.driftBias.set(0, 0, 0);
    this.idleTime = 0;
    this.correcting = false;
    this.lastTilt = null;
  }
}
