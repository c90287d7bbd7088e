/**
 * Gyro Calibrator
 * ===============
 *
 * Establishes the at-rest gyro baseline before any classification runs.
 *
 * Two session modes share one parameterised state machine:
 * - zero-point: a single collection of samples held still.
 * - three-point: neutral, left tilt and right tilt, each announced to the
 *   operator, given a settle delay, then collected.
 *
 * All timing runs on sample timestamps (ms), never the wall clock, so a
 * replayed session behaves exactly like the live one.
 *
 * @module calibration/GyroCalibrator
 */

import * as THREE from 'three';
import { CalibrationTimeoutError } from '../lib/errors';
import { calibLog } from '../lib/logger';
import { secondsToMs } from '../lib/math/conventions';
import { dominantAxis, freezeVector, type FrozenVector3 } from '../lib/math/vector';
import type { CalibrationConfig } from '../lib/config/paddleConfig';
import type { SensorSample } from '../lib/connection/SensorSample';
import {
    checkHoldStability,
    checkRestStability,
    estimateSensitivity,
    summarizeBuffer,
} from './stability';
import {
    PHASE_INSTRUCTIONS,
    THREE_POINT_PHASES,
    ZERO_POINT_PHASES,
    type CalibrationMode,
    type CalibrationPhase,
    type CalibrationProfile,
    type CalibrationProgress,
    type CalibrationStatus,
} from './calibrationTypes';

// ============================================================================
// TYPES
// ============================================================================

export interface CalibrationInstruction {
    phase: CalibrationPhase;
    instruction: string;
    /** Sample timestamp (ms) when announced, null when announced by a command */
    at: number | null;
}

interface SessionState {
    mode: CalibrationMode;
    phases: readonly CalibrationPhase[];
    phaseIndex: number;
    /** Timestamp of the first sample seen in the phase (settle starts here) */
    phaseStartedAt: number | null;
    /** Timestamp of the first collected-window sample (timeout starts here) */
    collectStartedAt: number | null;
    buffer: FrozenVector3[];
    previous: FrozenVector3 | null;
    means: FrozenVector3[];
    totalSamples: number;
}

// ============================================================================
// GYRO CALIBRATOR CLASS
// ============================================================================

export class GyroCalibrator {
    private readonly config: CalibrationConfig;

    private status: CalibrationStatus = 'uncalibrated';
    private profile: CalibrationProfile | null = null;
    private session: SessionState | null = null;
    private pendingMode: CalibrationMode | null = null;

    private retryCount = 0;
    private retryAt: number | null = null;
    private exhausted = false;
    private lastError: CalibrationTimeoutError | null = null;
    private lastCollected = 0;
    private lastSampleT: number | null = null;

    private instructionCallbacks: ((instruction: CalibrationInstruction) => void)[] = [];
    private completeCallbacks: ((profile: CalibrationProfile) => void)[] = [];
    private failureCallbacks: ((error: CalibrationTimeoutError) => void)[] = [];

    constructor(config: CalibrationConfig) {
        this.config = config;
    }

    // ------------------------------------------------------------------------
    // Commands
    // ------------------------------------------------------------------------

    /**
     * Begin a new session chain. Clears any retry state from a previous chain;
     * the existing profile stays in force until the new session completes.
     */
    startSession(mode: CalibrationMode = this.config.mode): void {
        this.retryCount = 0;
        this.retryAt = null;
        this.exhausted = false;
        this.lastError = null;
        this.lastCollected = 0;
        this.pendingMode = mode;
        calibLog.info(`Session started (${mode})`);
        this.beginAttempt(null);
    }

    /**
     * Finalise the active collection immediately.
     */
    forceFinish(): CalibrationProgress {
        if (this.session) {
            this.finishPhase(this.lastSampleT ?? 0);
        }
        return this.getProgress();
    }

    /**
     * Abandon any session in progress. The last completed profile is kept.
     */
    reset(): void {
        this.session = null;
        this.pendingMode = null;
        this.retryCount = 0;
        this.retryAt = null;
        this.exhausted = false;
        this.lastError = null;
        this.lastCollected = 0;
        this.status = this.profile ? 'calibrated' : 'uncalibrated';
    }

    /**
     * reset() plus dropping the profile.
     */
    clear(): void {
        this.reset();
        this.profile = null;
        this.status = 'uncalibrated';
    }

    // ------------------------------------------------------------------------
    // Per-tick input
    // ------------------------------------------------------------------------

    feed(sample: SensorSample): CalibrationProgress {
        this.lastSampleT = sample.t;

        if (this.status === 'failed') {
            if (this.retryAt === null || sample.t < this.retryAt) {
                return this.getProgress();
            }
            calibLog.info(`Retry ${this.retryCount}/${this.config.maxRetries}`);
            this.beginAttempt(sample.t);
        }

        const session = this.session;
        if (this.status !== 'calibrating' || !session) {
            return this.getProgress();
        }

        if (session.phaseStartedAt === null) {
            session.phaseStartedAt = sample.t;
        }

        const settleMs = session.mode === 'three-point' ? secondsToMs(this.config.settleTime) : 0;
        if (sample.t - session.phaseStartedAt < settleMs) {
            session.previous = sample.gyro;
            return this.getProgress();
        }

        if (session.collectStartedAt === null) {
            session.collectStartedAt = sample.t;
        }

        const phase = session.phases[session.phaseIndex];
        const stability = phase === 'neutral'
            ? checkRestStability(sample.gyro, this.config.stabilityThreshold)
            : checkHoldStability(sample.gyro, session.previous, this.config.stabilityThreshold);
        session.previous = sample.gyro;

        if (stability.isStable) {
            session.buffer.push(sample.gyro);
        } else {
            calibLog.debug(`Rejected ${phase} sample`, stability.magnitude);
        }

        const timedOut = sample.t - session.collectStartedAt >= secondsToMs(this.config.duration);
        if (session.buffer.length >= this.config.requiredSamples || timedOut) {
            this.finishPhase(sample.t);
        }

        return this.getProgress();
    }

    /**
     * Apply the baseline offset. Before the first completed session the raw
     * gyro is returned unchanged (as a copy).
     */
    calibrated(sample: SensorSample): THREE.Vector3 {
        const out = new THREE.Vector3(sample.gyro.x, sample.gyro.y, sample.gyro.z);
        return this.profile ? out.sub(this.profile.offset) : out;
    }

    // ------------------------------------------------------------------------
    // Session internals
    // ------------------------------------------------------------------------

    private beginAttempt(at: number | null): void {
        const mode = this.pendingMode ?? this.config.mode;
        this.session = {
            mode,
            phases: mode === 'three-point' ? THREE_POINT_PHASES : ZERO_POINT_PHASES,
            phaseIndex: 0,
            phaseStartedAt: at,
            collectStartedAt: null,
            buffer: [],
            previous: null,
            means: [],
            totalSamples: 0,
        };
        this.status = 'calibrating';
        this.retryAt = null;
        this.announce(at);
    }

    private announce(at: number | null): void {
        const session = this.session;
        if (!session) return;
        const phase = session.phases[session.phaseIndex];
        const instruction: CalibrationInstruction = {
            phase,
            instruction: PHASE_INSTRUCTIONS[phase],
            at,
        };
        calibLog.info(instruction.instruction);
        for (const cb of this.instructionCallbacks) cb(instruction);
    }

    private finishPhase(t: number): void {
        const session = this.session;
        if (!session) return;

        if (session.buffer.length < this.config.minSamples) {
            this.failAttempt(t, session.buffer.length);
            return;
        }

        const stats = summarizeBuffer(session.buffer);
        session.means.push(freezeVector(stats.mean));
        session.totalSamples += stats.count;
        session.phaseIndex++;

        if (session.phaseIndex >= session.phases.length) {
            this.completeSession(t, session);
            return;
        }

        session.phaseStartedAt = t;
        session.collectStartedAt = null;
        session.buffer = [];
        this.announce(t);
    }

    private completeSession(t: number, session: SessionState): void {
        const [neutral, left, right] = session.means;
        const hasTilt = session.mode === 'three-point' && left !== undefined && right !== undefined;
        const sensitivity = hasTilt ? freezeVector(estimateSensitivity(neutral, left, right)) : null;

        const profile: CalibrationProfile = Object.freeze({
            offset: neutral,
            mode: session.mode,
            points: hasTilt ? Object.freeze({ neutral, left, right }) : null,
            sensitivity,
            dominantAxis: sensitivity ? dominantAxis(sensitivity) : null,
            sampleCount: session.totalSamples,
            completedAt: t,
        });

        this.profile = profile;
        this.session = null;
        this.pendingMode = null;
        this.status = 'calibrated';
        this.retryCount = 0;
        this.lastCollected = session.totalSamples;

        calibLog.info(
            `Calibrated (${profile.mode}) offset=[${neutral.x.toFixed(2)}, ${neutral.y.toFixed(2)}, ${neutral.z.toFixed(2)}]`
        );
        for (const cb of this.completeCallbacks) cb(profile);
    }

    private failAttempt(t: number, collected: number): void {
        this.session = null;
        this.status = 'failed';
        this.retryCount++;
        this.lastCollected = collected;

        if (this.retryCount <= this.config.maxRetries) {
            const delayS = this.config.retryDelay * Math.pow(this.config.retryBackoff, this.retryCount - 1);
            this.retryAt = t + secondsToMs(delayS);
            calibLog.warn(
                `Attempt failed (${collected}/${this.config.requiredSamples} stable), retrying in ${delayS.toFixed(2)}s`
            );
            return;
        }

        this.retryAt = null;
        this.exhausted = true;
        this.lastError = new CalibrationTimeoutError(this.retryCount, collected, this.config.requiredSamples);
        calibLog.error(this.lastError.message);
        for (const cb of this.failureCallbacks) cb(this.lastError);
    }

    // ------------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------------

    getProgress(): CalibrationProgress {
        const session = this.session;
        const required = this.config.requiredSamples;

        if (!session) {
            return {
                status: this.status,
                mode: this.profile?.mode ?? null,
                phase: null,
                instruction: null,
                settling: false,
                collected: this.lastCollected,
                required,
                progress: this.status === 'calibrated' ? 1 : 0,
                retryCount: this.retryCount,
                retryAt: this.retryAt,
                exhausted: this.exhausted,
                error: this.lastError,
            };
        }

        const phase = session.phases[session.phaseIndex];
        const collected = session.buffer.length;
        const done = session.phaseIndex * required + collected;
        return {
            status: this.status,
            mode: session.mode,
            phase,
            instruction: PHASE_INSTRUCTIONS[phase],
            settling: session.mode === 'three-point' && session.collectStartedAt === null,
            collected,
            required,
            progress: Math.min(1, done / (session.phases.length * required)),
            retryCount: this.retryCount,
            retryAt: null,
            exhausted: false,
            error: null,
        };
    }

    getStatus(): CalibrationStatus {
        return this.status;
    }

    getProfile(): CalibrationProfile | null {
        return this.profile;
    }

    getRetryCount(): number {
        return this.retryCount;
    }

    isCalibrated(): boolean {
        return this.profile !== null;
    }

    isCalibrating(): boolean {
        return this.status === 'calibrating' || (this.status === 'failed' && !this.exhausted);
    }

    // ------------------------------------------------------------------------
    // Subscriptions
    // ------------------------------------------------------------------------

    onInstruction(callback: (instruction: CalibrationInstruction) => void): () => void {
        this.instructionCallbacks.push(callback);
        return () => {
            this.instructionCallbacks = this.instructionCallbacks.filter(cb => cb !== callback);
        };
    }

    onComplete(callback: (profile: CalibrationProfile) => void): () => void {
        this.completeCallbacks.push(callback);
        return () => {
            this.completeCallbacks = this.completeCallbacks.filter(cb => cb !== callback);
        };
    }

    onFailure(callback: (error: CalibrationTimeoutError) => void): () => void {
        this.failureCallbacks.push(callback);
        return () => {
            this.failureCallbacks = this.failureCallbacks.filter(cb => cb !== callback);
        };
    }
}
