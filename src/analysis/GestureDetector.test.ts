import { describe, it, expect, vi, afterEach } from 'vitest';
import { GestureDetector } from './GestureDetector';

const makeDetector = () =>
    new GestureDetector({
        gestureStartThreshold: 8000,
        gestureRestartThreshold: -8000,
        gestureCooldown: 2,
    });

describe('GestureDetector', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should detect a start spike once per cooldown', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        const detector = makeDetector();

        expect(detector.update(9000, 0)).toEqual({ gesture: 'start', timestamp: 0, accelY: 9000 });
        expect(detector.update(0, 20)).toBeNull();
        expect(detector.update(9000, 1000)).toBeNull();
        expect(detector.getCooldownRemaining()).toBe(1000);
        expect(detector.update(9000, 2000)?.gesture).toBe('start');
    });

    it('should detect a restart spike below the negative threshold', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        const detector = makeDetector();
        expect(detector.update(-9000, 0)?.gesture).toBe('restart');
    });

    it('should share one cooldown between start and restart', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        const detector = makeDetector();
        detector.update(9000, 0);
        expect(detector.update(-9000, 500)).toBeNull();
    });

    it('should use strict thresholds', () => {
        const detector = makeDetector();
        expect(detector.update(8000, 0)).toBeNull();
        expect(detector.update(-8000, 20)).toBeNull();
    });

    it('should clear the cooldown on reset', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        const detector = makeDetector();
        detector.update(9000, 0);
        detector.reset();
        expect(detector.getCooldownRemaining()).toBe(0);
        expect(detector.update(9000, 20)?.gesture).toBe('start');
    });
});
