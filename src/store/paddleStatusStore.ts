/**
 * Paddle Status Store - Diagnostics published by one input engine
 *
 * A vanilla zustand store, created per engine (never a module singleton),
 * so several engines can run side by side and tests stay isolated.
 * Written only at tick commit.
 */

import { createStore } from "zustand/vanilla";
import type { CalibrationProgress } from "../calibration/calibrationTypes";
import type { PaddleState } from "../analysis/PaddlePhase";
import type { ControlEvent } from "../lib/events/ControlEventEmitter";
import { emptyDropCounts, type DropCounts } from "../lib/connection/sampleValidation";
import type { QueueStats } from "../lib/connection/SampleQueue";

export interface PaddleStatus {
  calibration: CalibrationProgress;
  state: PaddleState;
  confidence: number;
  combinedMagnitude: number;
  driftCorrected: boolean;
  lastEvent: ControlEvent | null;
  eventCount: number;
  ticks: number;
  /** Sample timestamp (ms) of the last processed tick */
  lastTickAt: number | null;
  drops: DropCounts;
  queue: QueueStats;
}

interface PaddleStatusState extends PaddleStatus {
  // Actions
  publish: (update: Partial<PaddleStatus>) => void;
}

export type PaddleStatusStore = ReturnType<typeof createPaddleStatusStore>;

function initialStatus(calibration: CalibrationProgress, queue: QueueStats): PaddleStatus {
  return {
    calibration,
    state: "idle",
    confidence: 0,
    combinedMagnitude: 0,
    driftCorrected: false,
    lastEvent: null,
    eventCount: 0,
    ticks: 0,
    lastTickAt: null,
    drops: emptyDropCounts(),
    queue,
  };
}

export const createPaddleStatusStore = (
  calibration: CalibrationProgress,
  queue: QueueStats,
) =>
  createStore<PaddleStatusState>()((set) => ({
    ...initialStatus(calibration, queue),

    publish: (update) => {
      set(update);
    },
  }));
