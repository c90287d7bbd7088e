/**
 * Calibration Module Barrel Export
 */
export * from "./calibrationTypes";
export * from "./stability";
export { GyroCalibrator, type CalibrationInstruction } from "./GyroCalibrator";
