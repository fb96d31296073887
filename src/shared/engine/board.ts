import { EngineErrorCode, InvalidBoard, OutOfBounds } from './errors';
import { Position, position } from './geometry';
import type { Strand } from './strand';

const LETTER_PATTERN = /^[a-z]$/;

/**
 * Immutable rectangular grid of single lowercase letters.
 */
export class Board {
  private readonly letters: readonly (readonly string[])[];

  /**
   * @param letters - row-major grid; uppercase letters are stored lowercase
   * @throws InvalidBoard for an empty grid, an empty or ragged row, or a cell
   *   that is not exactly one alphabetic character
   */
  constructor(letters: readonly (readonly string[])[]) {
    if (letters.length === 0) {
      throw new InvalidBoard(EngineErrorCode.BOARD_EMPTY, 'Board must have at least one row');
    }

    const width = letters[0].length;
    const normalized: string[][] = [];

    letters.forEach((row, rowIdx) => {
      if (row.length === 0) {
        throw new InvalidBoard(EngineErrorCode.BOARD_EMPTY, `Board row ${rowIdx} is empty`, { row: rowIdx });
      }
      if (row.length !== width) {
        throw new InvalidBoard(
          EngineErrorCode.BOARD_RAGGED_ROWS,
          `Board row ${rowIdx} has ${row.length} cells, expected ${width}`,
          { row: rowIdx, expected: width, actual: row.length }
        );
      }
      normalized.push(
        row.map((cell, colIdx) => {
          const letter = cell.toLowerCase();
          if (!LETTER_PATTERN.test(letter)) {
            throw new InvalidBoard(
              EngineErrorCode.BOARD_INVALID_LETTER,
              `Board cell (${rowIdx}, ${colIdx}) must be a single letter, got "${cell}"`,
              { row: rowIdx, col: colIdx, cell }
            );
          }
          return letter;
        })
      );
    });

    this.letters = normalized;
  }

  numRows(): number {
    return this.letters.length;
  }

  numCols(): number {
    return this.letters[0].length;
  }

  contains(pos: Position): boolean {
    return pos.row >= 0 && pos.row < this.numRows() && pos.col >= 0 && pos.col < this.numCols();
  }

  /**
   * @throws OutOfBounds when the position is off the board
   */
  getLetter(pos: Position): string {
    if (!this.contains(pos)) {
      throw new OutOfBounds(
        `Position (${pos.row}, ${pos.col}) is outside the ${this.numRows()}x${this.numCols()} board`,
        { position: pos, numRows: this.numRows(), numCols: this.numCols() }
      );
    }
    return this.letters[pos.row][pos.col];
  }

  /**
   * Letters under the strand, in path order.
   *
   * @throws OutOfBounds when any strand position is off the board
   */
  evaluateStrand(strand: Strand): string {
    return strand
      .positions()
      .map((pos) => this.getLetter(pos))
      .join('');
  }

  /** Row strings, top to bottom. */
  rows(): string[] {
    return this.letters.map((row) => row.join(''));
  }

  allPositions(): Position[] {
    const result: Position[] = [];
    for (let row = 0; row < this.numRows(); row++) {
      for (let col = 0; col < this.numCols(); col++) {
        result.push(position(row, col));
      }
    }
    return result;
  }
}
