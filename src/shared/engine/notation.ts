import type { Position } from './geometry';
import type { Strand } from './strand';
import type { Answer, LoadedGame } from './types';

/**
 * Shared notation helpers.
 *
 * Positions are printed 0-indexed as "(row, col)" for logs and debugging.
 * Answer lines use the game-file convention: 1-indexed row and column
 * followed by lowercase step names.
 */

export function formatPosition(pos: Position): string {
  return `(${pos.row}, ${pos.col})`;
}

/**
 * One-line debug notation, e.g. "(1, 1) e e ne s". A strand without steps
 * prints as its start position alone.
 */
export function formatStrand(strand: Strand): string {
  return [formatPosition(strand.start), ...strand.steps].join(' ');
}

/**
 * Game-file answer line, e.g. "forty 2 2 e e ne s".
 */
export function formatAnswerLine(answer: Answer): string {
  const { word, strand } = answer;
  return [word, String(strand.start.row + 1), String(strand.start.col + 1), ...strand.steps].join(' ');
}

/**
 * Render a loaded game back into game-file lines. Board letters are written
 * uppercase and space-separated, matching the usual hand-written layout;
 * loading the result yields the same theme, board and answers.
 */
export function serializeGame(game: LoadedGame): string[] {
  const boardLines = game.board.rows().map((row) => row.toUpperCase().split('').join(' '));
  return [game.theme, '', ...boardLines, '', ...game.answers.map(formatAnswerLine)];
}
