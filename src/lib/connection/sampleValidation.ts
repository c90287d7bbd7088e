/**
 * Boundary validation for candidate samples.
 *
 * Every candidate handed over by the transport passes through here before it
 * is queued. Rejected candidates are dropped, counted per reason and logged
 * (throttled); nothing malformed reaches the calibrator or the classifier.
 */

import * as THREE from "three";
import { MalformedSampleError, type MalformedSampleReason } from "../errors";
import { engineLog } from "../logger";
import { freezeVector } from "../math/vector";
import type { SensorSample } from "./SensorSample";

const log = engineLog.child("Sample");

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/** Log the first drop of each reason, then every Nth */
const DROP_LOG_INTERVAL = 100;

export type SampleValidationResult =
  | { ok: true; sample: SensorSample }
  | { ok: false; error: MalformedSampleError };

export type DropCounts = Record<MalformedSampleReason, number>;

export function emptyDropCounts(): DropCounts {
  return { shape: 0, "non-finite": 0, "out-of-range": 0, "out-of-order": 0 };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Gyro payload to a number triple, or null when the shape is wrong.
 * Accepts a THREE.Vector3, a [x, y, z] tuple or an {x, y, z} object.
 */
function readGyro(value: unknown): [number, number, number] | null {
  if (value instanceof THREE.Vector3) {
    return [value.x, value.y, value.z];
  }
  if (Array.isArray(value)) {
    if (value.length !== 3) return null;
    const [x, y, z]: unknown[] = value;
    if (typeof x !== "number" || typeof y !== "number" || typeof z !== "number") {
      return null;
    }
    return [x, y, z];
  }
  if (isRecord(value)) {
    const { x, y, z } = value;
    if (typeof x !== "number" || typeof y !== "number" || typeof z !== "number") {
      return null;
    }
    return [x, y, z];
  }
  return null;
}

export interface SampleValidatorOptions {
  /** Largest accepted |gyro| component */
  maxGyroRate: number;
}

/**
 * Stateful validator: remembers the last accepted timestamp so that
 * out-of-order and duplicate samples are rejected.
 */
export class SampleValidator {
  private readonly maxGyroRate: number;
  private lastT: number | null = null;
  private accepted = 0;
  private drops: DropCounts = emptyDropCounts();

  constructor(options: SampleValidatorOptions) {
    this.maxGyroRate = options.maxGyroRate;
  }

  validate(candidate: unknown): SampleValidationResult {
    const result = this.check(candidate);
    if (result.ok) {
      this.lastT = result.sample.t;
      this.accepted++;
    } else {
      const reason = result.error.reason;
      this.drops[reason]++;
      if (this.drops[reason] % DROP_LOG_INTERVAL === 1) {
        log.warn(`Dropped sample (${this.drops[reason]} ${reason} so far)`, result.error.message);
      }
    }
    return result;
  }

  private check(candidate: unknown): SampleValidationResult {
    const fail = (reason: MalformedSampleReason, detail: string): SampleValidationResult => ({
      ok: false,
      error: new MalformedSampleError(reason, detail),
    });

    if (!isRecord(candidate)) {
      return fail("shape", "sample must be an object");
    }

    const gyro = readGyro(candidate.gyro);
    if (!gyro) return fail("shape", "gyro must hold three numbers");

    const { accelY, t } = candidate;
    if (typeof accelY !== "number") return fail("shape", "accelY must be a number");
    if (typeof t !== "number") return fail("shape", "t must be a number");

    if (!gyro.every(Number.isFinite)) {
      return fail("non-finite", `gyro [${gyro.join(", ")}]`);
    }
    if (!Number.isFinite(accelY)) return fail("non-finite", `accelY ${accelY}`);
    if (!Number.isFinite(t)) return fail("non-finite", `t ${t}`);

    const limit = this.maxGyroRate;
    if (gyro.some((v) => Math.abs(v) > limit)) {
      return fail("out-of-range", `gyro [${gyro.join(", ")}] exceeds ±${limit}`);
    }
    if (!Number.isInteger(accelY) || accelY < INT32_MIN || accelY > INT32_MAX) {
      return fail("out-of-range", `accelY ${accelY} is not an int32`);
    }

    if (this.lastT !== null && t <= this.lastT) {
      return fail("out-of-order", `t ${t} after ${this.lastT}`);
    }

    return {
      ok: true,
      sample: Object.freeze({
        gyro: freezeVector(new THREE.Vector3(gyro[0], gyro[1], gyro[2])),
        accelY,
        t,
      }),
    };
  }

  getDropCounts(): Readonly<DropCounts> {
    return { ...this.drops };
  }

  getAcceptedCount(): number {
    return this.accepted;
  }

  /** Timestamp of the last accepted sample */
  getLastTimestamp(): number | null {
    return this.lastT;
  }

  /** Zero the counters. The timestamp watermark is kept. */
  resetCounters(): void {
    this.accepted = 0;
    this.drops = emptyDropCounts();
  }
}
