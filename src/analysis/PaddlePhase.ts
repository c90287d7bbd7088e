/**
 * PaddlePhase
 * ===========
 *
 * Definitions for the paddling states and stroke records shared by the
 * classifier, the gesture detector and the event emitter.
 *
 * @module analysis/PaddlePhase
 */

import type { StrokeDirection } from '../lib/math/conventions';

// ============================================================================
// CLASSIFIER STATES
// ============================================================================

export type PaddleState =
    | 'idle'          // No meaningful motion
    | 'forward'       // Alternating strokes
    | 'turn-left'     // Sustained left tilt or repeated left strokes
    | 'turn-right';

export type TransitionReason =
    | 'dead-zone'
    | 'sustained-turn'
    | 'consecutive-strokes'
    | 'alternating'
    | 'reset';

export function turnStateFor(direction: StrokeDirection): PaddleState {
    return direction === 'left' ? 'turn-left' : 'turn-right';
}

// ============================================================================
// STROKES
// ============================================================================

export interface MovementEvent {
    direction: StrokeDirection;
    /** Sample timestamp (ms) */
    timestamp: number;
    /** |axis| / strokeThreshold at the crossing */
    intensity: number;
}

// ============================================================================
// GESTURES
// ============================================================================

export type GestureType = 'start' | 'restart';

export interface GestureEvent {
    gesture: GestureType;
    timestamp: number;
    accelY: number;
}
