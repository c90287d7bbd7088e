/**
 * replaySession - Offline replay of a recorded paddle session
 *
 * Feeds a recording (usually parsed from JSON) through a fresh
 * PaddleInputEngine and collects what a live controller would have seen:
 * the emitted events, the final status snapshot and the drop count.
 */

import { PaddleInputEngine } from "../../analysis/PaddleInputEngine";
import type { CalibrationMode, CalibrationProfile } from "../../calibration/calibrationTypes";
import {
  parsePaddleConfigInput,
  type PaddleConfigInput,
  type PresetName,
} from "../config/paddleConfig";
import type { ControlEvent } from "../events/ControlEventEmitter";
import type { PaddleStatus } from "../../store/paddleStatusStore";

export interface RecordedSample {
  gyro: [number, number, number];
  accelY: number;
  t: number;
}

export interface PaddleRecording {
  name?: string;
  sampleRateHz?: number;
  /** Config the session was recorded with */
  config?: PaddleConfigInput;
  /** Entries are validated by the engine, malformed ones are dropped */
  samples: unknown[];
}

export interface ReplaySessionOptions {
  /** Applied on top of the recording's own config */
  config?: PaddleConfigInput;
  preset?: PresetName;
  /** Calibration to run before the first sample; false skips it */
  calibrate?: CalibrationMode | false;
}

export interface ReplaySessionResult {
  events: ControlEvent[];
  status: PaddleStatus;
  profile: CalibrationProfile | null;
  accepted: number;
  dropped: number;
}

/**
 * Read a recording from parsed JSON. Throws on a malformed container; the
 * samples themselves are left for the engine's validator.
 */
export function parseRecording(value: unknown): PaddleRecording {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("[Replay] recording must be an object");
  }
  const samples = "samples" in value ? value.samples : undefined;
  if (!Array.isArray(samples)) {
    throw new Error("[Replay] recording.samples must be an array");
  }

  const recording: PaddleRecording = { samples };
  if ("name" in value && typeof value.name === "string") {
    recording.name = value.name;
  }
  if ("sampleRateHz" in value && typeof value.sampleRateHz === "number") {
    recording.sampleRateHz = value.sampleRateHz;
  }
  if ("config" in value && value.config !== undefined) {
    recording.config = parsePaddleConfigInput(value.config, "recording.config");
  }
  return recording;
}

/**
 * Feed a recorded session through a fresh engine, one tick per sample,
 * and collect what the controller would have received.
 */
export function replaySession(
  recording: PaddleRecording | RecordedSample[],
  options: ReplaySessionOptions = {},
): ReplaySessionResult {
  const { samples, config: recordedConfig = {} } = Array.isArray(recording)
    ? { samples: recording, config: undefined }
    : recording;
  const { config = {}, preset, calibrate = false } = options;

  const events: ControlEvent[] = [];
  const engine = new PaddleInputEngine({
    sink: { dispatch: (event) => events.push(event) },
    config: {
      ...recordedConfig,
      ...config,
      calibration: { ...recordedConfig.calibration, ...config.calibration },
    },
    preset,
  });

  if (calibrate) {
    engine.requestCalibration(calibrate);
  }

  let accepted = 0;
  for (const sample of samples) {
    if (engine.push(sample)) accepted++;
    engine.drain();
  }

  return {
    events,
    status: engine.status.getState(),
    profile: engine.getProfile(),
    accepted,
    dropped: samples.length - accepted,
  };
}
