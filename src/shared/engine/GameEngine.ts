import type { Board } from './board';
import { EMPTY_DICTIONARY } from './dictionary';
import { EngineErrorCode, InvalidState } from './errors';
import { loadGame } from './gameLoader';
import { MIN_SUBMITTED_WORD_LENGTH } from './rulesConfig';
import type { Strand } from './strand';
import {
  ActiveHint,
  Answer,
  Dictionary,
  GameStatus,
  Hint,
  HintOutcome,
  LoadedGame,
  NO_ACTIVE_HINT,
  SubmitOutcome,
} from './types';
import { GameOptionsSchema, type GameOptionsInput, toSchemaIssues } from '../validation/schemas';
import {
  GameSessionStatus,
  deriveGameSessionStatus,
  deriveGameStatus,
} from '../stateMachines/gameSession';
import { debugLog, isEngineTraceEnabled } from '../utils/envFlags';

function reverse(word: string): string {
  return word.split('').reverse().join('');
}

/**
 * Gameplay state machine for a single puzzle.
 *
 * The board and answers are fixed at construction; the engine tracks the
 * strands found so far (in discovery order), the non-theme words found,
 * the hint meter and the active hint. The session is `in_progress` until
 * every answer has been found and `complete` afterwards.
 */
export class GameEngine {
  private readonly game: LoadedGame;
  private readonly dictionary: Dictionary;
  private readonly threshold: number;

  private readonly found: Strand[] = [];
  private readonly foundAnswerOrder: number[] = [];
  private readonly foundDictionaryWords: string[] = [];
  private meter = 0;
  private hint: ActiveHint = NO_ACTIVE_HINT;

  /**
   * @throws InvalidState when the options fail validation
   */
  constructor(game: LoadedGame, options: GameOptionsInput = {}) {
    const parsed = GameOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new InvalidState(EngineErrorCode.STATE_INVALID_OPTIONS, 'Invalid game options', {
        issues: toSchemaIssues(parsed.error),
      });
    }
    this.game = game;
    this.threshold = parsed.data.hintThreshold;
    this.dictionary = parsed.data.dictionary ?? EMPTY_DICTIONARY;
  }

  /**
   * Parse a game file and start a session on it.
   *
   * @throws InvalidGame when the lines do not describe a valid game
   */
  static fromLines(lines: readonly string[], options: GameOptionsInput = {}): GameEngine {
    return new GameEngine(loadGame(lines), options);
  }

  theme(): string {
    return this.game.theme;
  }

  board(): Board {
    return this.game.board;
  }

  answers(): readonly Answer[] {
    return this.game.answers;
  }

  /** Theme strands as submitted, in the order they were found. */
  foundStrands(): readonly Strand[] {
    return [...this.found];
  }

  /** Answers matched so far, in the order they were found. */
  foundAnswers(): readonly Answer[] {
    return this.foundAnswerOrder.map((idx) => this.game.answers[idx]);
  }

  /** Non-theme dictionary words, in the order they were found. */
  foundWords(): readonly string[] {
    return [...this.foundDictionaryWords];
  }

  gameOver(): boolean {
    return this.status() === 'complete';
  }

  status(): GameStatus {
    return deriveGameStatus(this.found.length, this.game.answers.length);
  }

  sessionStatus(): GameSessionStatus {
    return deriveGameSessionStatus({
      foundCount: this.found.length,
      totalAnswers: this.game.answers.length,
      hintMeter: this.meter,
      hintThreshold: this.threshold,
      activeHint: this.hint,
    });
  }

  hintThreshold(): number {
    return this.threshold;
  }

  hintMeter(): number {
    return this.meter;
  }

  activeHint(): ActiveHint {
    return this.hint;
  }

  /**
   * Play a traced strand.
   *
   * Theme answers match in either direction and only on exactly the
   * answer's cells. Anything else must be at least four letters long and
   * new to be looked up in the dictionary.
   *
   * @throws OutOfBounds when the strand leaves the board
   */
  submitStrand(strand: Strand): SubmitOutcome {
    const letters = this.game.board.evaluateStrand(strand);
    const outcome = this.classify(strand, letters);
    debugLog(isEngineTraceEnabled(), '[GameEngine] submitStrand', letters, outcome.kind);
    return outcome;
  }

  private classify(strand: Strand, letters: string): SubmitOutcome {
    const reversed = reverse(letters);
    const answerIndex = this.game.answers.findIndex(
      (answer) => (answer.word === letters || answer.word === reversed) && answer.strand.coversSameCells(strand)
    );

    if (answerIndex >= 0) {
      const word = this.game.answers[answerIndex].word;
      if (this.foundAnswerOrder.includes(answerIndex)) {
        return { kind: 'already_found', word };
      }
      this.found.push(strand);
      this.foundAnswerOrder.push(answerIndex);
      if (this.hint.kind === 'hint' && this.hint.index === answerIndex) {
        this.hint = NO_ACTIVE_HINT;
      }
      return { kind: 'theme_word', word, answerIndex };
    }

    if (letters.length < MIN_SUBMITTED_WORD_LENGTH) {
      return { kind: 'too_short', word: letters };
    }

    if (this.isWordFound(letters)) {
      return { kind: 'already_found', word: letters };
    }

    if (this.dictionary.contains(letters)) {
      this.foundDictionaryWords.push(letters);
      this.meter += 1;
      return { kind: 'dictionary_word', word: letters };
    }

    return { kind: 'not_in_word_list', word: letters };
  }

  private isWordFound(word: string): boolean {
    if (this.foundDictionaryWords.includes(word)) {
      return true;
    }
    for (const idx of this.foundAnswerOrder) {
      if (this.game.answers[idx].word === word) return true;
    }
    return false;
  }

  /**
   * Spend the hint meter.
   *
   * The first use points at the earliest unfound answer and costs one full
   * meter; a second use reveals that answer's first and last letters.
   */
  useHint(): HintOutcome {
    const outcome = this.nextHint();
    debugLog(isEngineTraceEnabled(), '[GameEngine] useHint', outcome);
    return outcome;
  }

  private nextHint(): HintOutcome {
    if (this.meter < this.threshold) {
      return { kind: 'no_hint_yet' };
    }

    if (this.hint.kind === 'hint') {
      if (this.hint.revealed) {
        return { kind: 'use_current_hint' };
      }
      const revealed: Hint = { kind: 'hint', index: this.hint.index, revealed: true };
      this.hint = revealed;
      return revealed;
    }

    const index = this.game.answers.findIndex((_answer, idx) => !this.foundAnswerOrder.includes(idx));
    if (index < 0) {
      return { kind: 'no_hint_yet' };
    }
    const hint: Hint = { kind: 'hint', index, revealed: false };
    this.hint = hint;
    this.meter -= this.threshold;
    return hint;
  }
}
