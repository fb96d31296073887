import { Board } from '../../../src/shared/engine/board';
import { EngineErrorCode, InvalidBoard, OutOfBounds, isInvalidBoard } from '../../../src/shared/engine/errors';
import { Step } from '../../../src/shared/engine/geometry';
import { CS_142_ANSWERS, CS_142_WORDS, strand } from '../../helpers/puzzleFixtures';

function grid(...rows: string[]): string[][] {
  return rows.map((row) => row.split(''));
}

function boardErrorCode(build: () => unknown): EngineErrorCode | undefined {
  try {
    build();
  } catch (error) {
    return isInvalidBoard(error) ? error.code : undefined;
  }
  return undefined;
}

describe('Board', () => {
  const board = new Board(grid('CSMCT', 'OFORY', 'NEOWT'));

  it('reports its dimensions', () => {
    expect(board.numRows()).toBe(3);
    expect(board.numCols()).toBe(5);
  });

  it('stores letters lowercase', () => {
    expect(board.getLetter({ row: 0, col: 0 })).toBe('c');
    expect(board.getLetter({ row: 2, col: 4 })).toBe('t');
    expect(board.rows()).toEqual(['csmct', 'ofory', 'neowt']);
  });

  describe('contains', () => {
    it('accepts corners', () => {
      expect(board.contains({ row: 0, col: 0 })).toBe(true);
      expect(board.contains({ row: 2, col: 4 })).toBe(true);
    });

    it('rejects positions just off each edge', () => {
      expect(board.contains({ row: -1, col: 0 })).toBe(false);
      expect(board.contains({ row: 0, col: -1 })).toBe(false);
      expect(board.contains({ row: 3, col: 0 })).toBe(false);
      expect(board.contains({ row: 0, col: 5 })).toBe(false);
    });
  });

  it('throws OutOfBounds instead of clamping', () => {
    expect(() => board.getLetter({ row: 3, col: 0 })).toThrow(OutOfBounds);
    expect(() => board.getLetter({ row: 3, col: 0 })).toThrow('Position (3, 0) is outside the 3x5 board');
  });

  describe('evaluateStrand', () => {
    it('reads letters in path order', () => {
      expect(board.evaluateStrand(CS_142_ANSWERS.forty)).toBe('forty');
      expect(board.evaluateStrand(CS_142_ANSWERS.cmsc)).toBe('cmsc');
      expect(board.evaluateStrand(CS_142_WORDS.roof)).toBe('roof');
      expect(board.evaluateStrand(CS_142_WORDS.worm)).toBe('worm');
    });

    it('reads a single-cell strand', () => {
      expect(board.evaluateStrand(strand(1, 1))).toBe('f');
    });

    it('throws when the strand leaves the board', () => {
      expect(() => board.evaluateStrand(strand(0, 0, Step.N))).toThrow(OutOfBounds);
    });
  });

  it('lists every position in row-major order', () => {
    const small = new Board(grid('ab', 'cd'));
    expect(small.allPositions()).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
  });

  describe('construction errors', () => {
    it('rejects an empty grid', () => {
      expect(() => new Board([])).toThrow(InvalidBoard);
      expect(boardErrorCode(() => new Board([]))).toBe(EngineErrorCode.BOARD_EMPTY);
    });

    it('rejects an empty row', () => {
      expect(boardErrorCode(() => new Board([[]]))).toBe(EngineErrorCode.BOARD_EMPTY);
    });

    it('rejects ragged rows', () => {
      expect(boardErrorCode(() => new Board(grid('abc', 'ab')))).toBe(EngineErrorCode.BOARD_RAGGED_ROWS);
      expect(() => new Board(grid('abc', 'ab'))).toThrow('Board row 1 has 2 cells, expected 3');
    });

    it('rejects digits, punctuation and multi-letter cells', () => {
      expect(boardErrorCode(() => new Board(grid('a1')))).toBe(EngineErrorCode.BOARD_INVALID_LETTER);
      expect(boardErrorCode(() => new Board(grid('a?')))).toBe(EngineErrorCode.BOARD_INVALID_LETTER);
      expect(boardErrorCode(() => new Board([['a', 'bc']]))).toBe(EngineErrorCode.BOARD_INVALID_LETTER);
      expect(boardErrorCode(() => new Board([['a', '']]))).toBe(EngineErrorCode.BOARD_INVALID_LETTER);
    });

    it('reports the offending cell', () => {
      try {
        new Board(grid('ab', 'c!'));
        throw new Error('expected InvalidBoard');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidBoard);
        expect(error).toMatchObject({ context: { row: 1, col: 1, cell: '!' } });
      }
    });
  });
});
