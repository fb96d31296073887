/**
 * Engine Domain Errors - Structured error types for the puzzle engine
 *
 * These errors signal caller or input mistakes: a geometry query between
 * cells that are not neighbours, a lookup outside the board, or a board /
 * game file that breaks the structural rules. Ordinary gameplay results
 * ("Too short", "Already found", ...) are outcomes, not errors, and live in
 * `types.ts`.
 *
 * Error Categories:
 * - **NotAdjacent**: step computed between positions that are not one king-move apart
 * - **OutOfBounds**: position outside the board during letter/strand evaluation
 * - **InvalidBoard**: letter grid that is empty, ragged, or holds non-letters
 * - **InvalidGame**: game file that fails to parse or validate
 * - **InvalidState**: bad engine options or internal inconsistencies
 *
 * Usage:
 * ```typescript
 * import { InvalidGame, EngineErrorCode } from './errors';
 *
 * throw new InvalidGame(
 *   EngineErrorCode.GAME_WORD_TOO_SHORT,
 *   'Line 6: answer word "ab" must have at least 3 letters',
 *   { line: 6, word: 'ab' }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - GEOMETRY_*: Position/step arithmetic
 * - BOARD_*: Board construction and bounds
 * - GAME_*: Game file parsing and validation
 * - STATE_*: Engine options and session state
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Positions are equal or more than one step apart */
  GEOMETRY_NOT_ADJACENT = 'GEOMETRY_NOT_ADJACENT',

  /** Board has no rows, or a row with no cells */
  BOARD_EMPTY = 'BOARD_EMPTY',
  /** Board rows differ in length */
  BOARD_RAGGED_ROWS = 'BOARD_RAGGED_ROWS',
  /** Cell is not a single alphabetic character */
  BOARD_INVALID_LETTER = 'BOARD_INVALID_LETTER',
  /** Position lies outside the board */
  BOARD_OUT_OF_BOUNDS = 'BOARD_OUT_OF_BOUNDS',

  /** First line is blank or missing */
  GAME_MISSING_THEME = 'GAME_MISSING_THEME',
  /** Expected a single blank line between sections */
  GAME_MISSING_SEPARATOR = 'GAME_MISSING_SEPARATOR',
  /** No board rows after the theme */
  GAME_MISSING_BOARD = 'GAME_MISSING_BOARD',
  /** Board rows do not form a valid board */
  GAME_INVALID_BOARD = 'GAME_INVALID_BOARD',
  /** No answer lines after the board */
  GAME_MISSING_ANSWERS = 'GAME_MISSING_ANSWERS',
  /** Answer line does not have the WORD ROW COL STEP... shape */
  GAME_MALFORMED_ANSWER = 'GAME_MALFORMED_ANSWER',
  /** Answer word shorter than the minimum */
  GAME_WORD_TOO_SHORT = 'GAME_WORD_TOO_SHORT',
  /** Unknown step name */
  GAME_INVALID_STEP = 'GAME_INVALID_STEP',
  /** Answer start or a derived position is off the board */
  GAME_POSITION_OUT_OF_BOUNDS = 'GAME_POSITION_OUT_OF_BOUNDS',
  /** Strand letters do not spell the answer word */
  GAME_WORD_MISMATCH = 'GAME_WORD_MISMATCH',
  /** Answer covers exactly the cells of an earlier answer */
  GAME_DUPLICATE_ANSWER = 'GAME_DUPLICATE_ANSWER',
  /** Some board cells are not part of any answer */
  GAME_BOARD_NOT_FILLED = 'GAME_BOARD_NOT_FILLED',

  /** Engine options failed validation */
  STATE_INVALID_OPTIONS = 'STATE_INVALID_OPTIONS',
  /** Strand path has no positions */
  STATE_EMPTY_PATH = 'STATE_EMPTY_PATH',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  GEOMETRY_: 'Position geometry violation',
  BOARD_: 'Board construction or bounds violation',
  GAME_: 'Invalid game file',
  STATE_: 'Invalid engine options or state',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Board', 'GameLoader') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown by `stepTo` when two positions are not exactly one king-move apart
 * (including a position and itself).
 */
export class NotAdjacent extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Geometry') {
    super(EngineErrorCode.GEOMETRY_NOT_ADJACENT, message, context, domain);
    this.name = 'NotAdjacent';
    Object.setPrototypeOf(this, NotAdjacent.prototype);
  }
}

/**
 * Thrown when a letter lookup or strand evaluation leaves the board.
 * Positions are never clamped.
 */
export class OutOfBounds extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Board') {
    super(EngineErrorCode.BOARD_OUT_OF_BOUNDS, message, context, domain);
    this.name = 'OutOfBounds';
    Object.setPrototypeOf(this, OutOfBounds.prototype);
  }
}

/**
 * Thrown by the Board constructor for empty, ragged, or non-alphabetic grids.
 */
export class InvalidBoard extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidBoard';
    Object.setPrototypeOf(this, InvalidBoard.prototype);
  }
}

/**
 * Thrown by the game loader. Loading is all-or-nothing, so catching this
 * error means no game was produced.
 */
export class InvalidGame extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'GameLoader'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidGame';
    Object.setPrototypeOf(this, InvalidGame.prototype);
  }
}

/**
 * Error for invalid engine options or unexpected internal state.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isNotAdjacent(error: unknown): error is NotAdjacent {
  return error instanceof NotAdjacent;
}

export function isOutOfBounds(error: unknown): error is OutOfBounds {
  return error instanceof OutOfBounds;
}

export function isInvalidBoard(error: unknown): error is InvalidBoard {
  return error instanceof InvalidBoard;
}

export function isInvalidGame(error: unknown): error is InvalidGame {
  return error instanceof InvalidGame;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries (for
 * example when a game file cannot be read from disk).
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
