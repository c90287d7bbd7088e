/**
 * Error taxonomy for the paddle input core.
 *
 * Messages carry a bracketed component prefix, e.g. `[Config] ...`.
 */

export type MalformedSampleReason =
  | "shape"
  | "non-finite"
  | "out-of-range"
  | "out-of-order";

/**
 * A candidate sample that failed boundary validation.
 * Never thrown past the boundary: it is returned, counted and logged.
 */
export class MalformedSampleError extends Error {
  readonly reason: MalformedSampleReason;

  constructor(reason: MalformedSampleReason, detail: string) {
    super(`[Sample] ${reason}: ${detail}`);
    this.name = "MalformedSampleError";
    this.reason = reason;
  }
}

/**
 * Calibration could not collect enough stable samples, and the automatic
 * retries are used up. Needs operator intervention.
 */
export class CalibrationTimeoutError extends Error {
  readonly attempts: number;
  readonly collected: number;
  readonly required: number;

  constructor(attempts: number, collected: number, required: number) {
    super(
      `[Calib] Calibration failed after ${attempts} attempt(s): ` +
        `${collected}/${required} stable samples`,
    );
    this.name = "CalibrationTimeoutError";
    this.attempts = attempts;
    this.collected = collected;
    this.required = required;
  }
}

/**
 * Invalid configuration. Fatal at construction; values are never clamped.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`[Config] Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}
