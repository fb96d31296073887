// =============================================================================
// PUZZLE ENGINE - PUBLIC API
// =============================================================================
// Stable entry point for hosts (server session layer, UIs, scripts). Hosts
// should import from this file rather than from individual modules.
// =============================================================================

// =============================================================================
// GEOMETRY
// =============================================================================

export {
  Step,
  STEP_DELTAS,
  ALL_STEPS,
  position,
  positionsEqual,
  positionKey,
  takeStep,
  stepTo,
  isAdjacentTo,
  parseStep,
} from './geometry';
export type { Position, StepDelta } from './geometry';

// =============================================================================
// STRANDS & BOARDS
// =============================================================================

export { Strand } from './strand';
export { Board } from './board';

// =============================================================================
// LOADING
// =============================================================================

export { loadGame, splitGameText } from './gameLoader';
export { formatPosition, formatStrand, formatAnswerLine, serializeGame } from './notation';

// =============================================================================
// GAMEPLAY
// =============================================================================

export { GameEngine } from './GameEngine';
export { createWordSetDictionary, EMPTY_DICTIONARY } from './dictionary';
export type { WordSetDictionary } from './dictionary';
export { MIN_ANSWER_WORD_LENGTH, MIN_SUBMITTED_WORD_LENGTH, DEFAULT_HINT_THRESHOLD } from './rulesConfig';
export { NO_ACTIVE_HINT, describeSubmitOutcome, describeHintOutcome } from './types';
export type {
  Answer,
  LoadedGame,
  Dictionary,
  GameStatus,
  SubmitOutcome,
  SubmitOutcomeKind,
  Hint,
  ActiveHint,
  HintOutcome,
} from './types';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  NotAdjacent,
  OutOfBounds,
  InvalidBoard,
  InvalidGame,
  InvalidState,
  isEngineError,
  isNotAdjacent,
  isOutOfBounds,
  isInvalidBoard,
  isInvalidGame,
  isInvalidState,
  wrapEngineError,
  ERROR_CATEGORY_DESCRIPTIONS,
} from './errors';
export type { EngineErrorJSON } from './errors';
