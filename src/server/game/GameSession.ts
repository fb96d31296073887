import { v4 as uuidv4 } from 'uuid';
import type { GameEngine } from '../../shared/engine/GameEngine';
import type { Position } from '../../shared/engine/geometry';
import { Strand } from '../../shared/engine/strand';
import {
  ActiveHint,
  HintOutcome,
  SubmitOutcome,
  describeHintOutcome,
  describeSubmitOutcome,
} from '../../shared/engine/types';
import type { GameSessionStatus } from '../../shared/stateMachines/gameSession';
import { parseStrandPayload, type SchemaIssue } from '../../shared/validation/schemas';
import { logger, type LogMeta } from '../utils/logger';

/**
 * Result of submitting an untrusted payload: either an engine outcome or a
 * rejection before the engine was consulted.
 */
export type PayloadSubmitResult = SubmitOutcome | { kind: 'rejected'; errors: SchemaIssue[] };

/**
 * Serializable view of a session for a UI collaborator.
 */
export interface GameSessionSnapshot {
  sessionId: string;
  theme: string;
  rows: string[];
  totalAnswers: number;
  foundThemeWords: string[];
  foundDictionaryWords: string[];
  hintMeter: number;
  hintThreshold: number;
  activeHint: ActiveHint;
  /** Cells of the hinted answer; only present while a hint is active. */
  hintCells?: Position[];
  /** First and last cells of the hinted answer, once revealed. */
  hintEndpoints?: [Position, Position];
  status: GameSessionStatus;
}

/**
 * GameSession manages a single player's puzzle:
 * - owns the GameEngine for the loaded game file
 * - turns traced cell paths and wire payloads into strands
 * - logs every submission and hint request
 * - projects a snapshot for rendering
 */
export class GameSession {
  public readonly sessionId: string;
  private readonly engine: GameEngine;

  constructor(engine: GameEngine, sessionId: string = uuidv4()) {
    this.engine = engine;
    this.sessionId = sessionId;
    logger.info('Game session started', this.logMeta({ theme: engine.theme(), answers: engine.answers().length }));
  }

  getEngine(): GameEngine {
    return this.engine;
  }

  submitStrand(strand: Strand): SubmitOutcome {
    const outcome = this.engine.submitStrand(strand);
    logger.info(
      'Strand submitted',
      this.logMeta({ outcome: outcome.kind, word: outcome.word, message: describeSubmitOutcome(outcome) })
    );
    if (outcome.kind === 'theme_word' && this.engine.gameOver()) {
      logger.info('Game session complete', this.logMeta({ answers: this.engine.answers().length }));
    }
    return outcome;
  }

  /**
   * Submit the cells a player traced, in order.
   *
   * @throws NotAdjacent when consecutive cells are not neighbours
   */
  submitPath(path: readonly Position[]): SubmitOutcome {
    return this.submitStrand(Strand.fromPositions(path));
  }

  /**
   * Submit an untrusted payload (`{ start, steps }` or `{ path }`).
   * Malformed payloads and off-board strands are rejected without changing
   * session state.
   */
  submitPayload(payload: unknown): PayloadSubmitResult {
    const parsed = parseStrandPayload(payload);
    if (!parsed.success) {
      logger.warn('Rejected strand payload', this.logMeta({ errors: parsed.errors }));
      return { kind: 'rejected', errors: parsed.errors };
    }

    const board = this.engine.board();
    const offBoard = parsed.data.positions().findIndex((pos) => !board.contains(pos));
    if (offBoard >= 0) {
      const errors = [{ path: `positions.${offBoard}`, message: 'Position is outside the board' }];
      logger.warn('Rejected strand payload', this.logMeta({ errors }));
      return { kind: 'rejected', errors };
    }

    return this.submitStrand(parsed.data);
  }

  useHint(): HintOutcome {
    const outcome = this.engine.useHint();
    logger.info('Hint requested', this.logMeta({ outcome: describeHintOutcome(outcome) }));
    return outcome;
  }

  snapshot(): GameSessionSnapshot {
    const engine = this.engine;
    const activeHint = engine.activeHint();
    const snapshot: GameSessionSnapshot = {
      sessionId: this.sessionId,
      theme: engine.theme(),
      rows: engine.board().rows(),
      totalAnswers: engine.answers().length,
      foundThemeWords: engine.foundAnswers().map((answer) => answer.word),
      foundDictionaryWords: [...engine.foundWords()],
      hintMeter: engine.hintMeter(),
      hintThreshold: engine.hintThreshold(),
      activeHint,
      status: engine.sessionStatus(),
    };

    if (activeHint.kind === 'hint') {
      const cells = engine.answers()[activeHint.index].strand.positions();
      snapshot.hintCells = cells;
      if (activeHint.revealed) {
        snapshot.hintEndpoints = [cells[0], cells[cells.length - 1]];
      }
    }

    return snapshot;
  }

  private logMeta(meta: LogMeta): LogMeta {
    return { sessionId: this.sessionId, ...meta };
  }
}
