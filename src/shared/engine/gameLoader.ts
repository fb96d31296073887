import { Board } from './board';
import { EngineErrorCode, InvalidGame, isInvalidBoard } from './errors';
import { Position, Step, parseStep, positionKey } from './geometry';
import { MIN_ANSWER_WORD_LENGTH } from './rulesConfig';
import { Strand } from './strand';
import type { Answer, LoadedGame } from './types';

/**
 * Game-file parsing.
 *
 * A game file has three sections separated by single blank lines: a theme
 * line, the board rows (whitespace-separated letters), and the answer lines
 * (`WORD ROW COL STEP...`, with 1-indexed ROW and COL). An optional blank
 * line after the answers starts a free-form trailer that is ignored.
 *
 * Leading and trailing whitespace on every line is ignored, as is the case
 * of letters, words and step names.
 *
 * Answer strands may fold over themselves and may share cells with other
 * answers, but no two answers may cover exactly the same cells.
 */

const WORD_PATTERN = /^[a-z]+$/;
const INDEX_PATTERN = /^[0-9]+$/;

function isBlank(line: string | undefined): boolean {
  return line === undefined || line.trim() === '';
}

function tokenize(line: string): string[] {
  return line.trim().split(/\s+/);
}

/** 1-indexed line number for messages. */
function lineNo(idx: number): number {
  return idx + 1;
}

function fail(code: EngineErrorCode, idx: number | undefined, message: string, context: Record<string, unknown> = {}): never {
  const prefix = idx === undefined ? '' : `Line ${lineNo(idx)}: `;
  throw new InvalidGame(code, `${prefix}${message}`, idx === undefined ? context : { line: lineNo(idx), ...context });
}

function parseBoard(rows: readonly string[], firstIdx: number): Board {
  try {
    return new Board(rows.map(tokenize));
  } catch (error) {
    if (isInvalidBoard(error)) {
      const boardRow = typeof error.context.row === 'number' ? error.context.row : 0;
      fail(EngineErrorCode.GAME_INVALID_BOARD, firstIdx + boardRow, error.message, {
        boardCode: error.code,
        ...error.context,
      });
    }
    throw error;
  }
}

function parseIndex(token: string, idx: number, label: 'row' | 'column'): number {
  if (!INDEX_PATTERN.test(token) || Number(token) < 1) {
    fail(EngineErrorCode.GAME_MALFORMED_ANSWER, idx, `${label} "${token}" must be a positive integer`, {
      token,
    });
  }
  return Number(token) - 1;
}

function parseAnswer(line: string, idx: number, board: Board): Answer {
  const tokens = tokenize(line);
  if (tokens.length < 3) {
    fail(EngineErrorCode.GAME_MALFORMED_ANSWER, idx, 'answer must have the form WORD ROW COL STEP...', { text: line.trim() });
  }

  const [rawWord, rawRow, rawCol, ...rawSteps] = tokens;
  const word = rawWord.toLowerCase();
  if (!WORD_PATTERN.test(word)) {
    fail(EngineErrorCode.GAME_MALFORMED_ANSWER, idx, `answer word "${rawWord}" must contain only letters`, {
      word: rawWord,
    });
  }
  if (word.length < MIN_ANSWER_WORD_LENGTH) {
    fail(
      EngineErrorCode.GAME_WORD_TOO_SHORT,
      idx,
      `answer word "${word}" must have at least ${MIN_ANSWER_WORD_LENGTH} letters`,
      { word }
    );
  }

  const start: Position = {
    row: parseIndex(rawRow, idx, 'row'),
    col: parseIndex(rawCol, idx, 'column'),
  };

  const steps: Step[] = rawSteps.map((token) => {
    const step = parseStep(token);
    if (step === undefined) {
      fail(EngineErrorCode.GAME_INVALID_STEP, idx, `unknown step "${token}"`, { token });
    }
    return step;
  });

  const strand = new Strand(start, steps);
  const offBoard = strand.positions().find((pos) => !board.contains(pos));
  if (offBoard !== undefined) {
    fail(
      EngineErrorCode.GAME_POSITION_OUT_OF_BOUNDS,
      idx,
      `answer "${word}" leaves the board at row ${offBoard.row + 1}, column ${offBoard.col + 1}`,
      { word, position: offBoard }
    );
  }

  const spelled = board.evaluateStrand(strand);
  if (spelled !== word) {
    fail(EngineErrorCode.GAME_WORD_MISMATCH, idx, `strand spells "${spelled}", not "${word}"`, {
      word,
      spelled,
    });
  }

  return { word, strand };
}

/**
 * Parse and validate a game from its text lines.
 *
 * @param lines - file contents split into lines (line endings may remain)
 * @throws InvalidGame describing the first problem found; nothing is
 *   returned for a file that fails any check
 */
export function loadGame(lines: readonly string[]): LoadedGame {
  let idx = 0;

  if (isBlank(lines[idx])) {
    fail(EngineErrorCode.GAME_MISSING_THEME, idx, 'expected a theme on the first line');
  }
  const theme = lines[idx].trim();
  idx++;

  const expectSeparator = (section: string): void => {
    if (idx >= lines.length) {
      return;
    }
    if (!isBlank(lines[idx])) {
      fail(EngineErrorCode.GAME_MISSING_SEPARATOR, idx, `expected a blank line before the ${section}`);
    }
    idx++;
  };

  expectSeparator('board');
  const boardStart = idx;
  const boardRows: string[] = [];
  while (idx < lines.length && !isBlank(lines[idx])) {
    boardRows.push(lines[idx]);
    idx++;
  }
  if (boardRows.length === 0) {
    fail(EngineErrorCode.GAME_MISSING_BOARD, idx < lines.length ? idx : undefined, 'expected board rows after the theme');
  }
  const board = parseBoard(boardRows, boardStart);

  expectSeparator('answers');
  const answers: Answer[] = [];
  const answerLines: number[] = [];
  while (idx < lines.length && !isBlank(lines[idx])) {
    const answer = parseAnswer(lines[idx], idx, board);
    const earlier = answers.findIndex((other) => other.strand.coversSameCells(answer.strand));
    if (earlier >= 0) {
      fail(
        EngineErrorCode.GAME_DUPLICATE_ANSWER,
        idx,
        `answer "${answer.word}" covers the same cells as "${answers[earlier].word}" on line ${lineNo(answerLines[earlier])}`,
        { word: answer.word, duplicateOf: answers[earlier].word }
      );
    }
    answers.push(answer);
    answerLines.push(idx);
    idx++;
  }
  if (answers.length === 0) {
    fail(EngineErrorCode.GAME_MISSING_ANSWERS, idx < lines.length ? idx : undefined, 'expected answer lines after the board');
  }

  const covered = new Set<string>();
  for (const answer of answers) {
    for (const key of answer.strand.positionKeys()) {
      covered.add(key);
    }
  }
  const uncovered = board.allPositions().filter((pos) => !covered.has(positionKey(pos)));
  if (uncovered.length > 0) {
    fail(
      EngineErrorCode.GAME_BOARD_NOT_FILLED,
      undefined,
      `answers leave ${uncovered.length} board cell(s) uncovered`,
      { uncovered }
    );
  }

  return { theme, board, answers };
}

/**
 * Split raw file text into lines for {@link loadGame}.
 */
export function splitGameText(text: string): string[] {
  return text.split(/\r?\n/);
}
