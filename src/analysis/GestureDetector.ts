/**
 * GestureDetector
 * ===============
 *
 * Threshold test on the raw accelerometer count: a hard upward jolt starts
 * the game, a hard downward jolt restarts it. Both share one cooldown, so a
 * single physical jolt yields at most one gesture.
 *
 * @module analysis/GestureDetector
 */

import { gestureLog } from '../lib/logger';
import { secondsToMs } from '../lib/math/conventions';
import type { PaddleConfig } from '../lib/config/paddleConfig';
import { CooldownTimer } from './CooldownTimer';
import type { GestureEvent } from './PaddlePhase';

export type GestureConfig = Pick<
    PaddleConfig,
    'gestureStartThreshold' | 'gestureRestartThreshold' | 'gestureCooldown'
>;

export class GestureDetector {
    private readonly config: GestureConfig;
    private readonly cooldown: CooldownTimer;
    private lastT: number | null = null;

    constructor(config: GestureConfig) {
        this.config = config;
        this.cooldown = new CooldownTimer(secondsToMs(config.gestureCooldown));
    }

    /**
     * Returns the gesture detected on this tick, or null.
     */
    update(accelY: number, t: number): GestureEvent | null {
        const dtMs = this.lastT === null ? 0 : Math.max(0, t - this.lastT);
        this.lastT = t;
        this.cooldown.advance(dtMs);

        let gesture: GestureEvent['gesture'] | null = null;
        if (accelY > this.config.gestureStartThreshold) {
            gesture = 'start';
        } else if (accelY < this.config.gestureRestartThreshold) {
            gesture = 'restart';
        }

        if (!gesture) return null;

        if (this.cooldown.active) {
            gestureLog.debug(`${gesture} ignored (${this.cooldown.remainingMs}ms cooldown)`);
            return null;
        }

        this.cooldown.arm();
        gestureLog.info(`${gesture} gesture (accelY=${accelY})`);
        return { gesture, timestamp: t, accelY };
    }

    getCooldownRemaining(): number {
        return this.cooldown.remainingMs;
    }

    reset(): void {
        this.cooldown.reset();
        this.lastT = null;
    }
}
