/**
 * Analysis Module Barrel Export
 */
export { PaddleInputEngine, type PaddleInputEngineOptions } from './PaddleInputEngine';
export {
    PaddlePatternClassifier,
    isAlternating,
    type ClassifierConfig,
    type ClassifierInput,
    type ClassifierResult,
} from './PaddlePatternClassifier';
export { GestureDetector, type GestureConfig } from './GestureDetector';
export { CooldownTimer } from './CooldownTimer';
export {
    turnStateFor,
    type PaddleState,
    type TransitionReason,
    type MovementEvent,
    type GestureType,
    type GestureEvent,
} from './PaddlePhase';
