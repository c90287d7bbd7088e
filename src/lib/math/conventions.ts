/**
 * Paddle Sensor Convention Definitions
 * ====================================
 * SINGLE SOURCE OF TRUTH for axis naming, units and the left/right sign
 * convention. Calibration, conditioning and classification all read their
 * axis and direction rules from here.
 *
 * @module conventions
 */

// ============================================================================
// SENSOR FRAME
// ============================================================================

// Sensor frame (paddle-mounted IMU):
//   X: roll of the paddle shaft (default turn/stroke axis)
//   Y: pitch of the blade
//   Z: yaw around the operator
// Gyro values arrive in deg/s-like units and are never converted; thresholds
// use the same units. The only accelerometer channel is Y, as a raw count.

/** Raw accelerometer counts per 1 g (±4 g range, 16-bit). */
export const DEFAULT_ACCEL_COUNTS_PER_G = 8192;

export const RAD_TO_DEG = 180 / Math.PI;

// ============================================================================
// AXES & DIRECTIONS
// ============================================================================

export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

export type StrokeDirection = 'left' | 'right';

/**
 * Positive values on the turn axis mean RIGHT unless inverted.
 */
export function directionFromSign(value: number, inverted = false): StrokeDirection {
    const positive = value > 0;
    return positive !== inverted ? 'right' : 'left';
}

export function isAxis(value: unknown): value is Axis {
    return value === 'x' || value === 'y' || value === 'z';
}

// ============================================================================
// TIME
// ============================================================================

/**
 * Configured durations are seconds; sample timestamps are whole
 * milliseconds. Rounding keeps window comparisons exact.
 */
export function secondsToMs(seconds: number): number {
    return Math.round(seconds * 1000);
}
