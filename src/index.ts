/**
 * Paddle input core: IMU samples in, control events out.
 */
export * from "./analysis";
export * from "./calibration";
export * from "./lib/math";
export * from "./lib/errors";
export { createLogger, type Logger } from "./lib/logger";
export * from "./lib/config/paddleConfig";
export * from "./lib/connection/SensorSample";
export * from "./lib/connection/sampleValidation";
export { SampleQueue, type QueueStats } from "./lib/connection/SampleQueue";
export * from "./lib/signal/SignalConditioner";
export * from "./lib/events/ControlEventEmitter";
export * from "./lib/playback/replaySession";
export {
  createPaddleStatusStore,
  type PaddleStatus,
  type PaddleStatusStore,
} from "./store/paddleStatusStore";
