/**
 * Test suite for src/shared/engine/notation.ts
 */

import {
  formatAnswerLine,
  formatPosition,
  formatStrand,
  serializeGame,
} from '../../../src/shared/engine/notation';
import { loadGame } from '../../../src/shared/engine/gameLoader';
import { CS_142_ANSWERS, CS_142_LINES, strand } from '../../helpers/puzzleFixtures';

describe('notation', () => {
  it('formats positions 0-indexed', () => {
    expect(formatPosition({ row: 0, col: 3 })).toBe('(0, 3)');
  });

  describe('formatStrand', () => {
    it('prints the start and each step', () => {
      expect(formatStrand(CS_142_ANSWERS.forty)).toBe('(1, 1) e e ne s');
    });

    it('prints a single cell as its position', () => {
      expect(formatStrand(strand(2, 0))).toBe('(2, 0)');
    });
  });

  it('formats answer lines 1-indexed', () => {
    expect(formatAnswerLine({ word: 'forty', strand: CS_142_ANSWERS.forty })).toBe('forty 2 2 e e ne s');
    expect(formatAnswerLine({ word: 'two', strand: CS_142_ANSWERS.two })).toBe('two 3 5 w w');
  });

  describe('serializeGame', () => {
    it('writes the game-file layout', () => {
      expect(serializeGame(loadGame(CS_142_LINES))).toEqual([...CS_142_LINES]);
    });

    it('writes a file that loads back to the same game', () => {
      const game = loadGame(CS_142_LINES);
      const reloaded = loadGame(serializeGame(game));

      expect(reloaded.theme).toBe(game.theme);
      expect(reloaded.board.rows()).toEqual(game.board.rows());
      expect(reloaded.answers.map((answer) => answer.word)).toEqual(game.answers.map((answer) => answer.word));
      reloaded.answers.forEach((answer, idx) => {
        expect(answer.strand.equals(game.answers[idx].strand)).toBe(true);
      });
    });
  });
});
