/**
 * Vector helpers over THREE.Vector3.
 *
 * Every helper returns a new vector; inputs are never mutated.
 */

import * as THREE from "three";
import { AXES, type Axis } from "./conventions";

/** A vector handed out by the core that must not be mutated. */
export type FrozenVector3 = Readonly<THREE.Vector3>;

export type Vec3Tuple = [number, number, number];

export function freezeVector(v: THREE.Vector3): FrozenVector3 {
  return Object.freeze(v.clone());
}

export function fromTuple(tuple: Vec3Tuple): THREE.Vector3 {
  return new THREE.Vector3(tuple[0], tuple[1], tuple[2]);
}

/**
 * Arithmetic mean. Empty input yields the zero vector.
 */
export function meanVector(samples: readonly FrozenVector3[]): THREE.Vector3 {
  const sum = new THREE.Vector3();
  if (samples.length === 0) return sum;
  for (const s of samples) sum.add(s);
  return sum.divideScalar(samples.length);
}

/**
 * Zero every component whose magnitude is below the deadzone.
 */
export function applyDeadZone(
  v: FrozenVector3,
  deadZone: number,
): THREE.Vector3 {
  const out = new THREE.Vector3(v.x, v.y, v.z);
  for (const axis of AXES) {
    if (Math.abs(out[axis]) < deadZone) out[axis] = 0;
  }
  return out;
}

/**
 * Σ weight_i * |v_i|
 */
export function weightedAbsSum(
  v: FrozenVector3,
  weights: FrozenVector3,
): number {
  return (
    weights.x * Math.abs(v.x) +
    weights.y * Math.abs(v.y) +
    weights.z * Math.abs(v.z)
  );
}

/**
 * Per-axis absolute value.
 */
export function absVector(v: FrozenVector3): THREE.Vector3 {
  return new THREE.Vector3(Math.abs(v.x), Math.abs(v.y), Math.abs(v.z));
}

/**
 * Axis with the largest component, or null for the zero vector.
 */
export function dominantAxis(v: FrozenVector3): Axis | null {
  let best: Axis | null = null;
  let bestValue = 0;
  for (const axis of AXES) {
    const value = Math.abs(v[axis]);
    if (value > bestValue) {
      bestValue = value;
      best = axis;
    }
  }
  return best;
}
