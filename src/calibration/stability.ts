/**
 * Stability Detection Module
 * ==========================
 *
 * Utilities for deciding whether a gyro sample is quiet enough to be used
 * as a calibration sample, and for reducing the collected buffer.
 *
 * Stability is a per-sample rejection test, not the passage of time:
 * a session only completes when the sensor actually stays quiet.
 *
 * @module calibration/stability
 */

import * as THREE from 'three';
import { absVector, meanVector, type FrozenVector3 } from '../lib/math/vector';

// ============================================================================
// TYPES
// ============================================================================

export interface StabilityResult {
    isStable: boolean;
    /** The value compared against the threshold */
    magnitude: number;
}

export interface BufferStats {
    mean: THREE.Vector3;
    minMagnitude: number;
    maxMagnitude: number;
    count: number;
}

// ============================================================================
// FUNCTIONS
// ============================================================================

/**
 * Zero-rate test: the gyro magnitude itself must be below threshold.
 * Used by zero-point sessions and the neutral phase.
 */
export function checkRestStability(gyro: FrozenVector3, threshold: number): StabilityResult {
    const magnitude = gyro.length();
    return { isStable: magnitude < threshold, magnitude };
}

/**
 * Hold test: the change since the previous sample must be below threshold.
 * Used by tilt phases, where the sensor is deliberately held off-neutral.
 * The first sample of a phase has nothing to compare with and is rejected.
 */
export function checkHoldStability(
    gyro: FrozenVector3,
    previous: FrozenVector3 | null,
    threshold: number
): StabilityResult {
    if (!previous) {
        return { isStable: false, magnitude: Infinity };
    }
    const magnitude = gyro.distanceTo(previous);
    return { isStable: magnitude < threshold, magnitude };
}

/**
 * Mean and magnitude range of a calibration buffer.
 */
export function summarizeBuffer(samples: readonly FrozenVector3[]): BufferStats {
    let minMagnitude = Infinity;
    let maxMagnitude = 0;
    for (const s of samples) {
        const mag = s.length();
        if (mag < minMagnitude) minMagnitude = mag;
        if (mag > maxMagnitude) maxMagnitude = mag;
    }
    return {
        mean: meanVector(samples),
        minMagnitude: samples.length > 0 ? minMagnitude : 0,
        maxMagnitude,
        count: samples.length,
    };
}

/**
 * Per-axis sensitivity from three-point means:
 * the average of |left − neutral| and |right − neutral|.
 */
export function estimateSensitivity(
    neutral: FrozenVector3,
    left: FrozenVector3,
    right: FrozenVector3
): THREE.Vector3 {
    const leftSpan = absVector(new THREE.Vector3().subVectors(left, neutral));
    const rightSpan = absVector(new THREE.Vector3().subVectors(right, neutral));
    return leftSpan.add(rightSpan).multiplyScalar(0.5);
}
