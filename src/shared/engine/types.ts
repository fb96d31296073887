import type { Board } from './board';
import type { Strand } from './strand';

export type { Position } from './geometry';

/**
 * A theme word and the strand that spells it on the board. Words are stored
 * lowercase regardless of how the game file wrote them.
 */
export interface Answer {
  readonly word: string;
  readonly strand: Strand;
}

/**
 * Result of parsing a game file: everything the engine needs, already
 * validated.
 */
export interface LoadedGame {
  readonly theme: string;
  readonly board: Board;
  readonly answers: readonly Answer[];
}

/**
 * Word-list oracle for non-theme words. Callers pass lowercase words.
 */
export interface Dictionary {
  contains(word: string): boolean;
}

/**
 * Session phase. The transition is one-way.
 */
export type GameStatus = 'in_progress' | 'complete';

// =============================================================================
// SUBMISSION OUTCOMES
// =============================================================================

/**
 * Every result of submitting a strand. None of these are errors: a guess
 * that misses is a normal part of play.
 */
export type SubmitOutcome =
  | { kind: 'theme_word'; word: string; answerIndex: number }
  | { kind: 'dictionary_word'; word: string }
  | { kind: 'already_found'; word: string }
  | { kind: 'too_short'; word: string }
  | { kind: 'not_in_word_list'; word: string };

export type SubmitOutcomeKind = SubmitOutcome['kind'];

/**
 * Player-facing text for a submission outcome.
 */
export function describeSubmitOutcome(outcome: SubmitOutcome): string {
  switch (outcome.kind) {
    case 'theme_word':
    case 'dictionary_word':
      return outcome.word;
    case 'already_found':
      return 'Already found';
    case 'too_short':
      return 'Too short';
    case 'not_in_word_list':
      return 'Not in word list';
  }
}

// =============================================================================
// HINTS
// =============================================================================

/**
 * An active hint points at the answer with the given index. While
 * `revealed` is false only the answer's letters are highlighted; once
 * revealed, its first and last letters are shown as well.
 */
export interface Hint {
  readonly kind: 'hint';
  readonly index: number;
  readonly revealed: boolean;
}

export type ActiveHint = { readonly kind: 'none' } | Hint;

export const NO_ACTIVE_HINT: ActiveHint = { kind: 'none' };

export type HintOutcome = Hint | { kind: 'no_hint_yet' } | { kind: 'use_current_hint' };

export function describeHintOutcome(outcome: HintOutcome): string {
  switch (outcome.kind) {
    case 'hint':
      return outcome.revealed ? `Hint ${outcome.index} revealed` : `Hint ${outcome.index}`;
    case 'no_hint_yet':
      return 'No hint yet';
    case 'use_current_hint':
      return 'Use your current hint';
  }
}
