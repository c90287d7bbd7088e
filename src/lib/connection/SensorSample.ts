/**
 * SensorSample.ts - Sample type definitions for the paddle input pipeline
 *
 * The transport (serial/BLE framing, pairing, reconnection) lives outside
 * the core. It decodes packets into candidate samples and pushes them in;
 * the boundary validator turns candidates into SensorSamples or drops them.
 */

import type { FrozenVector3 } from "../math/vector";

// ============================================================================
// Accepted sample
// ============================================================================

/** One validated reading. Immutable, consumed once. */
export interface SensorSample {
  readonly gyro: FrozenVector3; // [x, y, z] deg/s-like
  readonly accelY: number; // raw int32 count
  readonly t: number; // monotonic, milliseconds
}

// ============================================================================
// Candidate sample (as handed over by the transport)
// ============================================================================

/**
 * What the transport hands over. Fields are unchecked until the
 * validator has seen them; gyro may be a THREE.Vector3, an [x, y, z]
 * tuple or an {x, y, z} object.
 */
export interface CandidateSample {
  gyro: unknown;
  accelY: unknown;
  t: unknown;
}

// ============================================================================
// Sample source (external collaborator)
// ============================================================================

export type SourceStatus = "disconnected" | "connecting" | "connected" | "error";

export interface SampleSource {
  status: SourceStatus;

  /** Register the sample callback. Returns an unsubscribe function. */
  onSample(callback: (sample: CandidateSample) => void): () => void;
}
