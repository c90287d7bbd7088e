/**
 * Math Module Barrel Export
 * =========================
 */

// Axis, sign and time conventions (single source of truth)
export * from './conventions';

// THREE.Vector3 helpers
export * from './vector';
