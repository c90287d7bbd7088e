/**
 * Prefixed console logging for the pipeline stages
 *
 * - Outside production: all levels are visible
 * - In production: only warnings and errors
 *
 * Usage:
 *   import { calibLog } from './logger';
 *   calibLog.debug('Sample rejected', magnitude);  // Silent in production
 *   calibLog.warn('Retrying');                     // Always visible
 *   calibLog.child('Retry').error('Gave up', err); // "[Calib:Retry] Gave up"
 */

const isDev = process.env.NODE_ENV !== "production";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Error lines carry an ISO timestamp */
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;
  return {
    debug(message, ...args) {
      if (isDev) console.debug(`${tag} ${message}`, ...args);
    },

    info(message, ...args) {
      if (isDev) console.info(`${tag} ${message}`, ...args);
    },

    warn(message, ...args) {
      console.warn(`${tag} ${message}`, ...args);
    },

    error(message, ...args) {
      console.error(`[${new Date().toISOString()}] ${tag} ${message}`, ...args);
    },

    child(subPrefix) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// One logger per pipeline stage
export const calibLog = createLogger("Calib");
export const signalLog = createLogger("Signal");
export const classifierLog = createLogger("Classifier");
export const gestureLog = createLogger("Gesture");
export const emitterLog = createLogger("Emitter");
export const engineLog = createLogger("Engine");

export { createLogger };
