/**
 * Core calibration type definitions.
 *
 * Kept in a dedicated module to avoid circular imports between
 * the configuration layer, stability helpers and GyroCalibrator.
 */

import type { Axis } from "../lib/math/conventions";
import type { FrozenVector3 } from "../lib/math/vector";
import type { CalibrationTimeoutError } from "../lib/errors";

export type CalibrationMode = "zero-point" | "three-point";

export type CalibrationStatus =
  | "uncalibrated"
  | "calibrating"
  | "calibrated"
  | "failed";

/** Sub-sessions of a three-point session, in the order they run. */
export type CalibrationPhase = "neutral" | "left" | "right";

export const THREE_POINT_PHASES: readonly CalibrationPhase[] = [
  "neutral",
  "left",
  "right",
];

/** Zero-point sessions run a single collection, reported as "neutral". */
export const ZERO_POINT_PHASES: readonly CalibrationPhase[] = ["neutral"];

export const PHASE_INSTRUCTIONS: Record<CalibrationPhase, string> = {
  neutral: "Hold the paddle flat and still",
  left: "Tilt the paddle to the LEFT and hold",
  right: "Tilt the paddle to the RIGHT and hold",
};

export interface CalibrationPoints {
  neutral: FrozenVector3;
  left: FrozenVector3;
  right: FrozenVector3;
}

/**
 * Result of a completed session. Frozen; replaced wholesale by the next
 * completed session.
 */
export interface CalibrationProfile {
  readonly offset: FrozenVector3;
  readonly mode: CalibrationMode;
  /** Three-point only */
  readonly points: Readonly<CalibrationPoints> | null;
  /** Three-point only: mean |tilt − neutral| per axis. Diagnostic. */
  readonly sensitivity: FrozenVector3 | null;
  readonly dominantAxis: Axis | null;
  readonly sampleCount: number;
  /** Sample timestamp (ms) of the completing tick */
  readonly completedAt: number;
}

export interface CalibrationProgress {
  status: CalibrationStatus;
  mode: CalibrationMode | null;
  phase: CalibrationPhase | null;
  /** Operator-facing instruction for the active phase */
  instruction: string | null;
  /** True while the settle delay of the active phase runs */
  settling: boolean;
  collected: number;
  required: number;
  /** 0-1 over the whole session */
  progress: number;
  /** Failed attempts in the current session chain */
  retryCount: number;
  /** Sample timestamp (ms) of the next automatic retry, if scheduled */
  retryAt: number | null;
  /** Retries used up; operator intervention needed */
  exhausted: boolean;
  error: CalibrationTimeoutError | null;
}
