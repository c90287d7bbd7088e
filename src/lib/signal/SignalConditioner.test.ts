import { describe, it, expect } from "vitest";
import * as THREE from "three";
import {
  SignalConditioner,
  smoothingAlpha,
  tiltAngleFromAccel,
  type SignalConditionerConfig,
} from "./SignalConditioner";
import { DEFAULT_PADDLE_CONFIG } from "../config/paddleConfig";

const makeConditioner = (overrides: Partial<SignalConditionerConfig> = {}) =>
  new SignalConditioner({ ...DEFAULT_PADDLE_CONFIG, ...overrides });

const v = (x: number, y: number, z: number) => new THREE.Vector3(x, y, z);

describe("SignalConditioner", () => {
  it("zeroes components inside the deadzone before smoothing", () => {
    const conditioner = makeConditioner({ deadZone: 2, smoothingFactor: 1 });
    const out = conditioner.condition(v(1.5, -3, 2), false);

    expect(out.smoothed.toArray()).toEqual([0, -3, 2]);
    expect(out.raw.toArray()).toEqual([1.5, -3, 2]);
    expect(out.combinedMagnitude).toBe(5);
  });

  it("applies fixed exponential smoothing", () => {
    const conditioner = makeConditioner({ deadZone: 0, smoothingFactor: 0.5 });

    expect(conditioner.condition(v(10, 0, 0), false).smoothed.x).toBe(5);
    expect(conditioner.condition(v(10, 0, 0), false).smoothed.x).toBe(7.5);
  });

  it("gives the same time-scaled response for two half ticks as for one full tick", () => {
    const config: Partial<SignalConditionerConfig> = {
      deadZone: 0,
      smoothingFactor: 0.5,
      smoothingMode: "time-scaled",
      referenceRateHz: 50,
      enableDriftCorrection: false,
    };
    const full = makeConditioner(config);
    const halves = makeConditioner(config);

    const a = full.condition(v(10, 0, 0), false, { dt: 0.02, accelY: 0 });
    halves.condition(v(10, 0, 0), false, { dt: 0.01, accelY: 0 });
    const b = halves.condition(v(10, 0, 0), false, { dt: 0.01, accelY: 0 });

    expect(a.smoothed.x).toBeCloseTo(5, 10);
    expect(b.smoothed.x).toBeCloseTo(5, 10);
  });

  it("weights the combined magnitude per axis", () => {
    const conditioner = makeConditioner({
      deadZone: 0,
      smoothingFactor: 1,
      axisWeights: [2, 0, 1],
    });
    expect(conditioner.condition(v(3, 4, -5), false).combinedMagnitude).toBe(11);
  });

  describe("idle drift correction", () => {
    const config: Partial<SignalConditionerConfig> = {
      deadZone: 0,
      smoothingFactor: 1,
      idleTimeout: 1,
      idleFollowSmoothing: 5,
      turnAxis: "x",
    };
    const frame = { dt: 0.25, accelY: 0 };

    it("folds a resting residual into the baseline once idle outlasts idleTimeout", () => {
      const conditioner = makeConditioner(config);

      for (let i = 0; i < 4; i++) {
        const out = conditioner.condition(v(4, 0, 0), true, frame);
        expect(out.driftCorrected).toBe(false);
        expect(out.smoothed.x).toBe(4);
      }

      // idle for 1.25s > 1s, k = min(1, 5 * 0.25) = 1
      const corrected = conditioner.condition(v(4, 0, 0), true, frame);
      expect(corrected.driftCorrected).toBe(true);
      expect(corrected.smoothed.x).toBe(0);
      expect(corrected.combinedMagnitude).toBe(0);
      expect(conditioner.getDriftBias().x).toBe(4);

      const next = conditioner.condition(v(4, 0, 0), true, frame);
      expect(next.smoothed.x).toBe(0);

      const active = conditioner.condition(v(4, 0, 0), false, frame);
      expect(active.driftCorrected).toBe(false);
      expect(active.smoothed.x).toBe(0);
      expect(conditioner.getIdleTime()).toBe(0);
    });

    it("leaves the baseline alone when disabled", () => {
      const conditioner = makeConditioner({ ...config, enableDriftCorrection: false });

      for (let i = 0; i < 6; i++) {
        const out = conditioner.condition(v(4, 0, 0), true, frame);
        expect(out.driftCorrected).toBe(false);
        expect(out.smoothed.x).toBe(4);
      }
      expect(conditioner.getDriftBias().toArray()).toEqual([0, 0, 0]);
    });

    it("clears bias and smoothing state on reset", () => {
      const conditioner = makeConditioner(config);
      for (let i = 0; i < 5; i++) conditioner.condition(v(4, 0, 0), true, frame);

      conditioner.reset();

      expect(conditioner.getDriftBias().toArray()).toEqual([0, 0, 0]);
      expect(conditioner.getSmoothed().toArray()).toEqual([0, 0, 0]);
      expect(conditioner.getIdleTime()).toBe(0);
    });
  });

  it("returns copies of its internal vectors", () => {
    const conditioner = makeConditioner({ deadZone: 0, smoothingFactor: 1 });
    const out = conditioner.condition(v(1, 1, 1), false);
    out.smoothed.set(9, 9, 9);
    expect(conditioner.getSmoothed().toArray()).toEqual([1, 1, 1]);
  });
});

describe("smoothingAlpha", () => {
  it("returns the factor unchanged in fixed mode", () => {
    expect(smoothingAlpha(0.3, "fixed", 0.5, 50)).toBe(0.3);
  });

  it("matches the factor at the reference tick rate", () => {
    expect(smoothingAlpha(0.3, "time-scaled", 0.02, 50)).toBeCloseTo(0.3, 10);
  });
});

describe("tiltAngleFromAccel", () => {
  it("converts counts to degrees and clamps beyond 1 g", () => {
    expect(tiltAngleFromAccel(8192, 8192)).toBeCloseTo(90, 10);
    expect(tiltAngleFromAccel(4096, 8192)).toBeCloseTo(30, 10);
    expect(tiltAngleFromAccel(-4096, 8192)).toBeCloseTo(-30, 10);
    expect(tiltAngleFromAccel(20000, 8192)).toBeCloseTo(90, 10);
  });
});
