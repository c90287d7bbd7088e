/**
 * PaddlePatternClassifier - Stroke Pattern State Machine
 * ======================================================
 *
 * Turns the conditioned gyro signal into one of four paddling states:
 * idle, forward, turn-left, turn-right.
 *
 * Rules run every tick in fixed priority order:
 * 1. Dead zone: low combined magnitude forces idle (in sustained mode, only
 *    once it has lasted idleTimeout with the turn axis steady)
 * 2. Sustained turn: turn-axis tilt held past turnStabilityTime
 * 3. Stroke accounting: threshold crossings with per-direction cooldowns;
 *    repeated same-side strokes are an alternate path to a turn
 * 4. Alternating strokes inside alternatingWindow: forward
 * 5. Otherwise the current state holds
 *
 * Timing uses sample timestamps only, so the result does not depend on the
 * tick rate. The classifier never throws on a tick: bad samples are dropped
 * before they get here.
 *
 * @module analysis/PaddlePatternClassifier
 */

import { classifierLog } from '../lib/logger';
import { directionFromSign, secondsToMs, type StrokeDirection } from '../lib/math/conventions';
import type { FrozenVector3 } from '../lib/math/vector';
import type { PaddleConfig } from '../lib/config/paddleConfig';
import { CooldownTimer } from './CooldownTimer';
import {
    turnStateFor,
    type MovementEvent,
    type PaddleState,
    type TransitionReason,
} from './PaddlePhase';

// ============================================================================
// TYPES
// ============================================================================

export type ClassifierConfig = Pick<
    PaddleConfig,
    | 'turnAxis'
    | 'invertTurnAxis'
    | 'strokeThreshold'
    | 'strokeCooldown'
    | 'consecutiveWindow'
    | 'consecutiveStrokesForTurn'
    | 'turnThreshold'
    | 'turnStabilityTime'
    | 'alternatingWindow'
    | 'minAlternatingStrokes'
    | 'idleMode'
    | 'idleTimeout'
    | 'idleThreshold'
    | 'idleAngleTolerance'
    | 'recencyWindow'
>;

export interface ClassifierInput {
    smoothed: FrozenVector3;
    combinedMagnitude: number;
    /** Sample timestamp (ms) */
    t: number;
}

export interface ClassifierResult {
    state: PaddleState;
    previousState: PaddleState;
    changed: boolean;
    /** Rule that produced the state this tick, null when it held */
    reason: TransitionReason | null;
    confidence: number;
    /** Stroke recorded this tick */
    stroke: MovementEvent | null;
    /** Crossing consumed this tick but suppressed by the direction's cooldown */
    blockedStroke: StrokeDirection | null;
}

interface Candidate {
    state: PaddleState;
    reason: TransitionReason;
}

// ============================================================================
// HELPERS
// ============================================================================

/** True when consecutive entries (time order) always differ in direction. */
export function isAlternating(strokes: readonly MovementEvent[]): boolean {
    for (let i = 1; i < strokes.length; i++) {
        if (strokes[i].direction === strokes[i - 1].direction) return false;
    }
    return true;
}

// ============================================================================
// PADDLE PATTERN CLASSIFIER CLASS
// ============================================================================

export class PaddlePatternClassifier {
    private readonly config: ClassifierConfig;

    // Durations in ms
    private readonly consecutiveWindowMs: number;
    private readonly turnStabilityMs: number;
    private readonly alternatingWindowMs: number;
    private readonly idleTimeoutMs: number;
    private readonly recencyWindowMs: number;

    private state: PaddleState = 'idle';
    private confidence = 0;
    private lastT: number | null = null;

    private readonly leftCooldown: CooldownTimer;
    private readonly rightCooldown: CooldownTimer;

    // Stroke accounting
    private history: MovementEvent[] = [];
    private lastStroke: MovementEvent | null = null;
    private consecutiveCount = 0;
    /** Direction currently beyond strokeThreshold; a crossing needs a change */
    private aboveDirection: StrokeDirection | null = null;

    // Sustained turn
    private turnSign = 0;
    private turnStartedAt: number | null = null;

    // Dead zone; turn-axis range seen since quietSince
    private quietSince: number | null = null;
    private quietMin = 0;
    private quietMax = 0;

    constructor(config: ClassifierConfig) {
        this.config = config;
        this.consecutiveWindowMs = secondsToMs(config.consecutiveWindow);
        this.turnStabilityMs = secondsToMs(config.turnStabilityTime);
        this.alternatingWindowMs = secondsToMs(config.alternatingWindow);
        this.idleTimeoutMs = secondsToMs(config.idleTimeout);
        this.recencyWindowMs = secondsToMs(config.recencyWindow);

        const strokeCooldownMs = secondsToMs(config.strokeCooldown);
        this.leftCooldown = new CooldownTimer(strokeCooldownMs);
        this.rightCooldown = new CooldownTimer(strokeCooldownMs);
    }

    /**
     * Process one conditioned tick.
     */
    update(input: ClassifierInput): ClassifierResult {
        const { t } = input;
        const cfg = this.config;
        const previousState = this.state;

        // 0. Timers and history upkeep
        const dtMs = this.lastT === null ? 0 : Math.max(0, t - this.lastT);
        this.lastT = t;
        this.leftCooldown.advance(dtMs);
        this.rightCooldown.advance(dtMs);

        const horizon = 2 * this.alternatingWindowMs;
        this.history = this.history.filter(e => t - e.timestamp <= horizon);
        if (this.lastStroke && t - this.lastStroke.timestamp > this.consecutiveWindowMs) {
            this.consecutiveCount = 0;
        }

        const axisValue = input.smoothed[cfg.turnAxis];
        const magnitude = Math.abs(axisValue);
        const direction = directionFromSign(axisValue, cfg.invertTurnAxis);

        let candidate: Candidate | null = null;
        let stroke: MovementEvent | null = null;
        let blockedStroke: StrokeDirection | null = null;

        // 1. Dead zone
        if (input.combinedMagnitude < cfg.idleThreshold) {
            if (this.quietSince === null) {
                this.quietSince = t;
                this.quietMin = axisValue;
                this.quietMax = axisValue;
            } else {
                this.quietMin = Math.min(this.quietMin, axisValue);
                this.quietMax = Math.max(this.quietMax, axisValue);
            }
            this.clearTurnTimer();

            const quietFor = t - this.quietSince;
            const sustained = quietFor >= this.idleTimeoutMs;
            if (sustained && (this.history.length > 0 || this.consecutiveCount > 0)) {
                classifierLog.debug(`Quiet for ${quietFor}ms, stroke history cleared`);
                this.history = [];
                this.consecutiveCount = 0;
            }

            const angleStable = this.quietMax - this.quietMin <= cfg.idleAngleTolerance;
            const forceIdle = cfg.idleMode === 'immediate' || (sustained && angleStable);
            if (forceIdle) {
                candidate = { state: 'idle', reason: 'dead-zone' };
            }
        } else {
            this.quietSince = null;
        }

        if (!candidate) {
            // 2. Sustained turn
            if (magnitude > cfg.turnThreshold) {
                const sign = Math.sign(axisValue);
                if (sign !== this.turnSign || this.turnStartedAt === null) {
                    this.turnSign = sign;
                    this.turnStartedAt = t;
                }
                if (t - this.turnStartedAt >= this.turnStabilityMs) {
                    candidate = { state: turnStateFor(direction), reason: 'sustained-turn' };
                }
            } else {
                this.clearTurnTimer();
            }

            // 3. Stroke accounting
            if (magnitude > cfg.strokeThreshold && this.aboveDirection !== direction) {
                const cooldown = direction === 'left' ? this.leftCooldown : this.rightCooldown;
                if (cooldown.active) {
                    blockedStroke = direction;
                    classifierLog.debug(`${direction} stroke suppressed (${cooldown.remainingMs}ms cooldown)`);
                } else {
                    stroke = this.recordStroke(direction, t, magnitude / cfg.strokeThreshold);
                    cooldown.arm();
                    if (!candidate && this.consecutiveCount >= cfg.consecutiveStrokesForTurn) {
                        candidate = { state: turnStateFor(direction), reason: 'consecutive-strokes' };
                    }
                }
            }
        }

        this.aboveDirection = magnitude > cfg.strokeThreshold ? direction : null;

        // 4. Alternating pattern
        const windowed = this.history.filter(e => t - e.timestamp <= this.alternatingWindowMs);
        const alternating = windowed.length >= 2 && isAlternating(windowed);
        let clearHistory = false;
        if (!candidate && alternating && windowed.length >= cfg.minAlternatingStrokes) {
            candidate = { state: 'forward', reason: 'alternating' };
            clearHistory = true;
        }

        this.confidence = this.computeConfidence(t, windowed, alternating);

        if (clearHistory) {
            this.history = [];
        }

        // 5. Hold
        if (candidate) {
            this.state = candidate.state;
        }

        const changed = this.state !== previousState;
        if (changed) {
            classifierLog.debug(`${previousState} → ${this.state} (${candidate?.reason})`);
        }

        return {
            state: this.state,
            previousState,
            changed,
            reason: candidate?.reason ?? null,
            confidence: this.confidence,
            stroke,
            blockedStroke,
        };
    }

    private recordStroke(direction: StrokeDirection, t: number, intensity: number): MovementEvent {
        const event: MovementEvent = Object.freeze({ direction, timestamp: t, intensity });

        const last = this.lastStroke;
        if (last && last.direction === direction && t - last.timestamp <= this.consecutiveWindowMs) {
            this.consecutiveCount++;
        } else {
            this.consecutiveCount = 1;
        }

        this.history.push(event);
        this.lastStroke = event;
        return event;
    }

    private clearTurnTimer(): void {
        this.turnSign = 0;
        this.turnStartedAt = null;
    }

    /**
     * Diagnostic score in [0, 1]:
     * 0.4 · intensity + 0.4 · consistency + 0.2 · recency
     */
    private computeConfidence(t: number, windowed: readonly MovementEvent[], alternating: boolean): number {
        const meanIntensity = windowed.length > 0
            ? windowed.reduce((sum, e) => sum + e.intensity, 0) / windowed.length
            : 0;
        const consistent = this.consecutiveCount >= this.config.consecutiveStrokesForTurn || alternating;
        const recent = this.lastStroke !== null && t - this.lastStroke.timestamp <= this.recencyWindowMs;

        const score = 0.4 * Math.min(1, meanIntensity) + 0.4 * (consistent ? 1 : 0) + 0.2 * (recent ? 1 : 0);
        return Math.max(0, Math.min(1, score));
    }

    // ========================================================================
    // Queries
    // ========================================================================

    getState(): PaddleState {
        return this.state;
    }

    getConfidence(): number {
        return this.confidence;
    }

    getHistory(): readonly MovementEvent[] {
        return [...this.history];
    }

    getConsecutiveCount(): number {
        return this.consecutiveCount;
    }

    /** Remaining cooldown per direction (ms) */
    getCooldowns(): Record<StrokeDirection, number> {
        return {
            left: this.leftCooldown.remainingMs,
            right: this.rightCooldown.remainingMs,
        };
    }

    reset(): void {
        this.state = 'idle';
        this.confidence = 0;
        this.lastT = null;
        this.leftCooldown.reset();
        this.rightCooldown.reset();
        this.history = [];
        this.lastStroke = null;
        this.consecutiveCount = 0;
        this.aboveDirection = null;
        this.clearTurnTimer();
        this.quietSince = null;
    }
}
