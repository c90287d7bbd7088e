import { describe, it, expect, vi } from 'vitest';
import * as THREE from 'three';
import { GyroCalibrator, type CalibrationInstruction } from './GyroCalibrator';
import { DEFAULT_CALIBRATION_CONFIG, type CalibrationConfig } from '../lib/config/paddleConfig';
import { freezeVector } from '../lib/math/vector';
import type { SensorSample } from '../lib/connection/SensorSample';

const sample = (x: number, y: number, z: number, t: number): SensorSample => ({
    gyro: freezeVector(new THREE.Vector3(x, y, z)),
    accelY: 0,
    t,
});

const makeCalibrator = (overrides: Partial<CalibrationConfig> = {}) =>
    new GyroCalibrator({ ...DEFAULT_CALIBRATION_CONFIG, ...overrides });

/** Feed a constant gyro every 20ms from `from` to `to` inclusive. */
const feedConstant = (
    cal: GyroCalibrator,
    gyro: [number, number, number],
    from: number,
    to: number
) => {
    for (let t = from; t <= to; t += 20) {
        cal.feed(sample(gyro[0], gyro[1], gyro[2], t));
    }
};

describe('GyroCalibrator', () => {

    describe('zero-point', () => {
        it('should average ±0.5 noise to a zero offset', () => {
            const cal = makeCalibrator({ requiredSamples: 50 });
            cal.startSession('zero-point');

            for (let i = 0; i < 100; i++) {
                const v = i % 2 === 0 ? 0.5 : -0.5;
                cal.feed(sample(v, v, v, i * 20));
            }

            const profile = cal.getProfile();
            expect(cal.getStatus()).toBe('calibrated');
            expect(profile?.mode).toBe('zero-point');
            expect(profile?.sampleCount).toBe(50);
            expect(profile?.offset.x).toBeCloseTo(0, 10);
            expect(profile?.offset.y).toBeCloseTo(0, 10);
            expect(profile?.offset.z).toBeCloseTo(0, 10);
            // 50th sample is index 49
            expect(profile?.completedAt).toBe(980);
        });

        it('should skip samples at or above the stability threshold', () => {
            const cal = makeCalibrator({ requiredSamples: 30, stabilityThreshold: 3 });
            cal.startSession();

            feedConstant(cal, [10, 0, 0], 0, 180);
            expect(cal.getProgress().collected).toBe(0);

            feedConstant(cal, [1, 2, 0], 200, 780);

            const profile = cal.getProfile();
            expect(profile?.sampleCount).toBe(30);
            expect(profile?.offset.x).toBeCloseTo(1, 10);
            expect(profile?.offset.y).toBeCloseTo(2, 10);
            expect(profile?.points).toBeNull();
            expect(profile?.sensitivity).toBeNull();
        });

        it('should complete at timeout when at least minSamples were buffered', () => {
            const cal = makeCalibrator({ requiredSamples: 100, minSamples: 15, duration: 1 });
            cal.startSession();

            feedConstant(cal, [1, 0, 0], 0, 1000);

            expect(cal.getStatus()).toBe('calibrated');
            expect(cal.getProfile()?.sampleCount).toBe(51);
            expect(cal.getProfile()?.offset.x).toBeCloseTo(1, 10);
        });

        it('should freeze the completed profile', () => {
            const cal = makeCalibrator({ requiredSamples: 5, minSamples: 1 });
            cal.startSession();
            feedConstant(cal, [1, 0, 0], 0, 80);

            const profile = cal.getProfile();
            expect(Object.isFrozen(profile)).toBe(true);
            expect(Object.isFrozen(profile?.offset)).toBe(true);
        });
    });

    describe('retry and failure', () => {
        const config: Partial<CalibrationConfig> = {
            requiredSamples: 30,
            minSamples: 15,
            duration: 1,
            retryDelay: 1,
            retryBackoff: 2,
            maxRetries: 2,
        };

        it('should schedule a retry after a failed attempt', () => {
            const cal = makeCalibrator(config);
            cal.startSession();

            feedConstant(cal, [20, 0, 0], 0, 1000);

            const progress = cal.getProgress();
            expect(progress.status).toBe('failed');
            expect(progress.retryCount).toBe(1);
            expect(progress.retryAt).toBe(2000);
            expect(progress.exhausted).toBe(false);
            expect(cal.isCalibrating()).toBe(true);
        });

        it('should restart on the tick clock and back off between retries', () => {
            const cal = makeCalibrator(config);
            cal.startSession();

            feedConstant(cal, [20, 0, 0], 0, 1980);
            expect(cal.getStatus()).toBe('failed');

            cal.feed(sample(20, 0, 0, 2000));
            expect(cal.getStatus()).toBe('calibrating');

            feedConstant(cal, [20, 0, 0], 2020, 3000);
            expect(cal.getProgress().retryCount).toBe(2);
            // second delay is 1s * 2^1
            expect(cal.getProgress().retryAt).toBe(5000);
        });

        it('should surface CalibrationTimeoutError once retries are used up', () => {
            const cal = makeCalibrator(config);
            const onFailure = vi.fn();
            cal.onFailure(onFailure);
            cal.startSession();

            feedConstant(cal, [20, 0, 0], 0, 8000);

            const progress = cal.getProgress();
            expect(progress.status).toBe('failed');
            expect(progress.exhausted).toBe(true);
            expect(progress.retryAt).toBeNull();
            expect(progress.error?.name).toBe('CalibrationTimeoutError');
            expect(progress.error?.attempts).toBe(3);
            expect(progress.error?.collected).toBe(0);
            expect(progress.error?.required).toBe(30);
            expect(onFailure).toHaveBeenCalledTimes(1);
            expect(cal.isCalibrating()).toBe(false);
        });

        it('should start a fresh chain on startSession after exhaustion', () => {
            const cal = makeCalibrator(config);
            cal.startSession();
            feedConstant(cal, [20, 0, 0], 0, 8000);

            cal.startSession();
            expect(cal.getStatus()).toBe('calibrating');
            expect(cal.getRetryCount()).toBe(0);

            feedConstant(cal, [0, 1, 0], 8020, 8600);
            expect(cal.getStatus()).toBe('calibrated');
        });
    });

    describe('forceFinish', () => {
        it('should succeed with at least minSamples buffered', () => {
            const cal = makeCalibrator({ requiredSamples: 30, minSamples: 15 });
            cal.startSession();
            feedConstant(cal, [2, 0, 0], 0, 380);

            const progress = cal.forceFinish();
            expect(progress.status).toBe('calibrated');
            expect(cal.getProfile()?.sampleCount).toBe(20);
            expect(cal.getProfile()?.completedAt).toBe(380);
        });

        it('should count as a failed attempt below minSamples', () => {
            const cal = makeCalibrator({ requiredSamples: 30, minSamples: 15 });
            cal.startSession();
            feedConstant(cal, [2, 0, 0], 0, 80);

            const progress = cal.forceFinish();
            expect(progress.status).toBe('failed');
            expect(progress.retryCount).toBe(1);
            expect(progress.collected).toBe(5);
        });
    });

    describe('three-point', () => {
        it('should collect neutral, left and right phases in order', () => {
            const cal = makeCalibrator({
                mode: 'three-point',
                requiredSamples: 10,
                minSamples: 5,
                settleTime: 0.5,
                duration: 3,
            });
            const gyroByPhase: Record<string, [number, number, number]> = {
                neutral: [1, 0, 0],
                left: [-30, 0, 0],
                right: [40, 2, 0],
            };
            const instructions: CalibrationInstruction[] = [];
            let current = gyroByPhase.neutral;
            cal.onInstruction((instruction) => {
                instructions.push(instruction);
                current = gyroByPhase[instruction.phase];
            });

            cal.startSession();
            expect(cal.getProgress().settling).toBe(true);

            for (let t = 0; t <= 5000 && cal.getStatus() !== 'calibrated'; t += 20) {
                cal.feed(sample(current[0], current[1], current[2], t));
            }

            expect(instructions.map((i) => i.phase)).toEqual(['neutral', 'left', 'right']);

            const profile = cal.getProfile();
            expect(profile?.mode).toBe('three-point');
            expect(profile?.sampleCount).toBe(30);
            expect(profile?.offset.x).toBeCloseTo(1, 10);
            expect(profile?.points?.left.x).toBeCloseTo(-30, 10);
            expect(profile?.points?.right.y).toBeCloseTo(2, 10);
            // mean of |−30 − 1| and |40 − 1|
            expect(profile?.sensitivity?.x).toBeCloseTo(35, 10);
            expect(profile?.sensitivity?.y).toBeCloseTo(1, 10);
            expect(profile?.dominantAxis).toBe('x');
        });

        it('should ignore samples during the settle delay', () => {
            const cal = makeCalibrator({ mode: 'three-point', settleTime: 1 });
            cal.startSession();

            feedConstant(cal, [0, 0, 0], 0, 980);
            expect(cal.getProgress().collected).toBe(0);
            expect(cal.getProgress().settling).toBe(true);

            cal.feed(sample(0, 0, 0, 1000));
            expect(cal.getProgress().collected).toBe(1);
            expect(cal.getProgress().settling).toBe(false);
        });
    });

    describe('reset and clear', () => {
        const calibrate = () => {
            const cal = makeCalibrator({ requiredSamples: 5, minSamples: 1 });
            cal.startSession();
            feedConstant(cal, [2, -1, 0.5], 0, 80);
            return cal;
        };

        it('should keep the completed profile across reset', () => {
            const cal = calibrate();
            const profile = cal.getProfile();

            cal.startSession();
            cal.reset();
            cal.reset();

            expect(cal.getStatus()).toBe('calibrated');
            expect(cal.getProfile()).toBe(profile);
        });

        it('should drop the profile on clear', () => {
            const cal = calibrate();
            cal.clear();
            cal.clear();

            expect(cal.getStatus()).toBe('uncalibrated');
            expect(cal.getProfile()).toBeNull();
        });

        it('should keep the old offset while a new session runs', () => {
            const cal = calibrate();
            cal.startSession();
            cal.feed(sample(0, 0, 0, 100));

            expect(cal.getStatus()).toBe('calibrating');
            expect(cal.getProfile()?.offset.x).toBeCloseTo(2, 10);
            expect(cal.calibrated(sample(2, -1, 0.5, 120)).length()).toBeCloseTo(0, 10);
        });
    });

    describe('calibrated()', () => {
        it('should return a copy of the raw gyro before calibration', () => {
            const cal = makeCalibrator();
            const s = sample(4, 5, 6, 0);
            const out = cal.calibrated(s);

            expect(out).not.toBe(s.gyro);
            expect(out.toArray()).toEqual([4, 5, 6]);
        });

        it('should subtract the offset once calibrated', () => {
            const cal = makeCalibrator({ requiredSamples: 5, minSamples: 1 });
            cal.startSession();
            feedConstant(cal, [1, 2, 0], 0, 80);

            const out = cal.calibrated(sample(11, 2, -3, 100));
            expect(out.x).toBeCloseTo(10, 10);
            expect(out.y).toBeCloseTo(0, 10);
            expect(out.z).toBeCloseTo(-3, 10);
        });
    });

    it('should stop notifying after unsubscribe', () => {
        const cal = makeCalibrator({ requiredSamples: 5, minSamples: 1 });
        const onComplete = vi.fn();
        const unsubscribe = cal.onComplete(onComplete);
        unsubscribe();

        cal.startSession();
        feedConstant(cal, [0, 0, 0], 0, 80);

        expect(cal.getStatus()).toBe('calibrated');
        expect(onComplete).not.toHaveBeenCalled();
    });
});
