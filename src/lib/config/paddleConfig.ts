/**
 * Paddle Input Configuration
 *
 * Pure, side-effect-free defaults, presets and validation for every
 * threshold the pipeline reads. Durations are seconds; sample timestamps
 * are milliseconds.
 */

import presetsJson from "./presets.json";
import { ConfigurationError } from "../errors";
import { isAxis, type Axis, DEFAULT_ACCEL_COUNTS_PER_G } from "../math/conventions";
import type { Vec3Tuple } from "../math/vector";
import type { CalibrationMode } from "../../calibration/calibrationTypes";

// ============================================================================
// TYPES
// ============================================================================

export type SmoothingMode = "fixed" | "time-scaled";
export type IdleMode = "immediate" | "sustained";

export interface CalibrationConfig {
  mode: CalibrationMode;
  /** Stable samples per collection */
  requiredSamples: number;
  /** Fewest samples that still count as a success at timeout */
  minSamples: number;
  /** Gyro magnitude (or per-sample change, tilt phases) below which a sample is stable */
  stabilityThreshold: number;
  /** Collection timeout (s) */
  duration: number;
  /** Three-point: wait after each instruction before collecting (s) */
  settleTime: number;
  /** Delay before the first automatic retry (s) */
  retryDelay: number;
  /** Multiplier applied to the delay on each further retry */
  retryBackoff: number;
  maxRetries: number;
}

export interface PaddleConfig {
  // Signal conditioning
  deadZone: number;
  smoothingFactor: number;
  smoothingMode: SmoothingMode;
  /** Tick rate at which smoothingFactor is defined (time-scaled mode) */
  referenceRateHz: number;
  axisWeights: Vec3Tuple;
  enableDriftCorrection: boolean;
  idleFollowSmoothing: number;
  accelCountsPerG: number;

  // Classification
  turnAxis: Axis;
  invertTurnAxis: boolean;
  strokeThreshold: number;
  strokeCooldown: number;
  consecutiveWindow: number;
  consecutiveStrokesForTurn: number;
  turnThreshold: number;
  turnStabilityTime: number;
  alternatingWindow: number;
  minAlternatingStrokes: number;
  idleMode: IdleMode;
  idleTimeout: number;
  idleThreshold: number;
  idleAngleTolerance: number;
  recencyWindow: number;

  // Gestures
  gestureStartThreshold: number;
  gestureRestartThreshold: number;
  gestureCooldown: number;

  // Output & boundary
  invertPaddles: boolean;
  maxGyroRate: number;
  queueCapacity: number;
  autoCalibrate: boolean;

  calibration: CalibrationConfig;
}

export type PaddleConfigInput = Partial<Omit<PaddleConfig, "calibration">> & {
  calibration?: Partial<CalibrationConfig>;
};

export type PresetName = "default" | "responsive" | "steady";

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_CALIBRATION_CONFIG: CalibrationConfig = {
  mode: "zero-point",
  requiredSamples: 30,
  minSamples: 15,
  stabilityThreshold: 3,
  duration: 3,
  settleTime: 1,
  retryDelay: 1,
  retryBackoff: 2,
  maxRetries: 3,
};

export const DEFAULT_PADDLE_CONFIG: PaddleConfig = {
  deadZone: 2,
  smoothingFactor: 0.3,
  smoothingMode: "fixed",
  referenceRateHz: 50,
  axisWeights: [1, 1, 1],
  enableDriftCorrection: true,
  idleFollowSmoothing: 5,
  accelCountsPerG: DEFAULT_ACCEL_COUNTS_PER_G,

  turnAxis: "x",
  invertTurnAxis: false,
  strokeThreshold: 15,
  strokeCooldown: 0.5,
  consecutiveWindow: 1.5,
  consecutiveStrokesForTurn: 2,
  turnThreshold: 10,
  turnStabilityTime: 2,
  alternatingWindow: 1.5,
  minAlternatingStrokes: 3,
  idleMode: "immediate",
  idleTimeout: 3,
  idleThreshold: 8,
  idleAngleTolerance: 3,
  recencyWindow: 1,

  gestureStartThreshold: 8000,
  gestureRestartThreshold: -8000,
  gestureCooldown: 2,

  invertPaddles: false,
  maxGyroRate: 2000,
  queueCapacity: 256,
  autoCalibrate: false,

  calibration: DEFAULT_CALIBRATION_CONFIG,
};

// ============================================================================
// KEY TABLES
// ============================================================================

const NUMERIC_KEYS = [
  "deadZone",
  "smoothingFactor",
  "referenceRateHz",
  "idleFollowSmoothing",
  "accelCountsPerG",
  "strokeThreshold",
  "strokeCooldown",
  "consecutiveWindow",
  "consecutiveStrokesForTurn",
  "turnThreshold",
  "turnStabilityTime",
  "alternatingWindow",
  "minAlternatingStrokes",
  "idleTimeout",
  "idleThreshold",
  "idleAngleTolerance",
  "recencyWindow",
  "gestureStartThreshold",
  "gestureRestartThreshold",
  "gestureCooldown",
  "maxGyroRate",
  "queueCapacity",
] as const;

const BOOLEAN_KEYS = [
  "enableDriftCorrection",
  "invertTurnAxis",
  "invertPaddles",
  "autoCalibrate",
] as const;

const CALIBRATION_NUMERIC_KEYS = [
  "requiredSamples",
  "minSamples",
  "stabilityThreshold",
  "duration",
  "settleTime",
  "retryDelay",
  "retryBackoff",
  "maxRetries",
] as const;

type NumericKey = (typeof NUMERIC_KEYS)[number];
type BooleanKey = (typeof BOOLEAN_KEYS)[number];
type CalibrationNumericKey = (typeof CALIBRATION_NUMERIC_KEYS)[number];

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEYS.some((k) => k === key);
}

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((k) => k === key);
}

function isCalibrationNumericKey(key: string): key is CalibrationNumericKey {
  return CALIBRATION_NUMERIC_KEYS.some((k) => k === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// PARSING (untyped sources: JSON presets, files)
// ============================================================================

function parseCalibrationInput(
  value: unknown,
  issues: string[],
  path: string,
): Partial<CalibrationConfig> {
  const out: Partial<CalibrationConfig> = {};
  if (!isRecord(value)) {
    issues.push(`${path} must be an object`);
    return out;
  }
  for (const [key, raw] of Object.entries(value)) {
    if (isCalibrationNumericKey(key)) {
      if (typeof raw === "number") out[key] = raw;
      else issues.push(`${path}.${key} must be a number`);
    } else if (key === "mode") {
      if (raw === "zero-point" || raw === "three-point") out.mode = raw;
      else issues.push(`${path}.mode must be "zero-point" or "three-point"`);
    } else {
      issues.push(`${path}.${key} is not a recognised option`);
    }
  }
  return out;
}

/**
 * Turn an untyped object (JSON) into a config input, rejecting unknown keys
 * and wrongly typed values.
 */
export function parsePaddleConfigInput(
  value: unknown,
  source = "config",
): PaddleConfigInput {
  const issues: string[] = [];
  const out: PaddleConfigInput = {};

  if (!isRecord(value)) {
    throw new ConfigurationError([`${source} must be an object`]);
  }

  for (const [key, raw] of Object.entries(value)) {
    if (isNumericKey(key)) {
      if (typeof raw === "number") out[key] = raw;
      else issues.push(`${source}.${key} must be a number`);
    } else if (isBooleanKey(key)) {
      if (typeof raw === "boolean") out[key] = raw;
      else issues.push(`${source}.${key} must be a boolean`);
    } else if (key === "smoothingMode") {
      if (raw === "fixed" || raw === "time-scaled") out.smoothingMode = raw;
      else issues.push(`${source}.smoothingMode must be "fixed" or "time-scaled"`);
    } else if (key === "idleMode") {
      if (raw === "immediate" || raw === "sustained") out.idleMode = raw;
      else issues.push(`${source}.idleMode must be "immediate" or "sustained"`);
    } else if (key === "turnAxis") {
      if (isAxis(raw)) out.turnAxis = raw;
      else issues.push(`${source}.turnAxis must be "x", "y" or "z"`);
    } else if (key === "axisWeights") {
      if (
        Array.isArray(raw) &&
        raw.length === 3 &&
        raw.every((w) => typeof w === "number")
      ) {
        out.axisWeights = [raw[0], raw[1], raw[2]];
      } else {
        issues.push(`${source}.axisWeights must be three numbers`);
      }
    } else if (key === "calibration") {
      out.calibration = parseCalibrationInput(raw, issues, `${source}.calibration`);
    } else {
      issues.push(`${source}.${key} is not a recognised option`);
    }
  }

  if (issues.length > 0) throw new ConfigurationError(issues);
  return out;
}

// ============================================================================
// PRESETS
// ============================================================================

export const PRESET_NAMES: readonly PresetName[] = ["default", "responsive", "steady"];

const presets = new Map<PresetName, PaddleConfigInput>();

export function getPreset(name: PresetName): PaddleConfigInput {
  let preset = presets.get(name);
  if (!preset) {
    const raw: unknown = isRecord(presetsJson) ? presetsJson[name] : undefined;
    preset = parsePaddleConfigInput(raw, `presets.${name}`);
    presets.set(name, preset);
  }
  return preset;
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Every problem with a fully-merged config. Empty means valid.
 */
export function validatePaddleConfig(config: PaddleConfig): string[] {
  const issues: string[] = [];

  const check = (ok: boolean, message: string) => {
    if (!ok) issues.push(message);
  };
  const finite = (name: string, value: number) => {
    const ok = Number.isFinite(value);
    check(ok, `${name} must be a finite number (got ${value})`);
    return ok;
  };
  const positive = (name: string, value: number) => {
    if (finite(name, value)) check(value > 0, `${name} must be > 0 (got ${value})`);
  };
  const nonNegative = (name: string, value: number) => {
    if (finite(name, value)) check(value >= 0, `${name} must be >= 0 (got ${value})`);
  };
  const integerAtLeast = (name: string, value: number, min: number) => {
    if (finite(name, value)) {
      check(
        Number.isInteger(value) && value >= min,
        `${name} must be an integer >= ${min} (got ${value})`,
      );
    }
  };

  nonNegative("deadZone", config.deadZone);
  if (finite("smoothingFactor", config.smoothingFactor)) {
    check(
      config.smoothingFactor > 0 && config.smoothingFactor <= 1,
      `smoothingFactor must be in (0, 1] (got ${config.smoothingFactor})`,
    );
  }
  check(
    config.smoothingMode === "fixed" || config.smoothingMode === "time-scaled",
    `smoothingMode must be "fixed" or "time-scaled"`,
  );
  positive("referenceRateHz", config.referenceRateHz);
  config.axisWeights.forEach((w, i) => nonNegative(`axisWeights[${i}]`, w));
  check(
    config.axisWeights.some((w) => w > 0),
    "axisWeights must have at least one positive weight",
  );
  nonNegative("idleFollowSmoothing", config.idleFollowSmoothing);
  positive("accelCountsPerG", config.accelCountsPerG);

  check(isAxis(config.turnAxis), `turnAxis must be "x", "y" or "z"`);
  positive("strokeThreshold", config.strokeThreshold);
  nonNegative("strokeCooldown", config.strokeCooldown);
  positive("consecutiveWindow", config.consecutiveWindow);
  integerAtLeast("consecutiveStrokesForTurn", config.consecutiveStrokesForTurn, 2);
  positive("turnThreshold", config.turnThreshold);
  nonNegative("turnStabilityTime", config.turnStabilityTime);
  positive("alternatingWindow", config.alternatingWindow);
  integerAtLeast("minAlternatingStrokes", config.minAlternatingStrokes, 2);
  check(
    config.idleMode === "immediate" || config.idleMode === "sustained",
    `idleMode must be "immediate" or "sustained"`,
  );
  nonNegative("idleTimeout", config.idleTimeout);
  positive("idleThreshold", config.idleThreshold);
  nonNegative("idleAngleTolerance", config.idleAngleTolerance);
  nonNegative("recencyWindow", config.recencyWindow);

  if (finite("gestureStartThreshold", config.gestureStartThreshold)) {
    check(
      config.gestureStartThreshold > 0,
      `gestureStartThreshold must be > 0 (got ${config.gestureStartThreshold})`,
    );
  }
  if (finite("gestureRestartThreshold", config.gestureRestartThreshold)) {
    check(
      config.gestureRestartThreshold < 0,
      `gestureRestartThreshold must be < 0 (got ${config.gestureRestartThreshold})`,
    );
  }
  nonNegative("gestureCooldown", config.gestureCooldown);

  positive("maxGyroRate", config.maxGyroRate);
  integerAtLeast("queueCapacity", config.queueCapacity, 1);

  const cal = config.calibration;
  check(
    cal.mode === "zero-point" || cal.mode === "three-point",
    `calibration.mode must be "zero-point" or "three-point"`,
  );
  integerAtLeast("calibration.requiredSamples", cal.requiredSamples, 1);
  integerAtLeast("calibration.minSamples", cal.minSamples, 1);
  check(
    cal.minSamples <= cal.requiredSamples,
    `calibration.minSamples (${cal.minSamples}) must not exceed requiredSamples (${cal.requiredSamples})`,
  );
  positive("calibration.stabilityThreshold", cal.stabilityThreshold);
  positive("calibration.duration", cal.duration);
  nonNegative("calibration.settleTime", cal.settleTime);
  nonNegative("calibration.retryDelay", cal.retryDelay);
  if (finite("calibration.retryBackoff", cal.retryBackoff)) {
    check(cal.retryBackoff >= 1, `calibration.retryBackoff must be >= 1 (got ${cal.retryBackoff})`);
  }
  integerAtLeast("calibration.maxRetries", cal.maxRetries, 0);

  return issues;
}

// ============================================================================
// RESOLUTION
// ============================================================================

function merge(base: PaddleConfig, input: PaddleConfigInput): PaddleConfig {
  const { calibration, axisWeights, ...rest } = input;
  return {
    ...base,
    ...rest,
    axisWeights: axisWeights ? [axisWeights[0], axisWeights[1], axisWeights[2]] : base.axisWeights,
    calibration: { ...base.calibration, ...calibration },
  };
}

/**
 * Defaults → preset → overrides, validated and frozen.
 * Throws ConfigurationError listing every issue.
 */
export function resolvePaddleConfig(
  overrides: PaddleConfigInput = {},
  preset: PresetName = "default",
): Readonly<PaddleConfig> {
  const config = merge(merge(DEFAULT_PADDLE_CONFIG, getPreset(preset)), overrides);
  const issues = validatePaddleConfig(config);
  if (issues.length > 0) throw new ConfigurationError(issues);

  Object.freeze(config.axisWeights);
  Object.freeze(config.calibration);
  return Object.freeze(config);
}
