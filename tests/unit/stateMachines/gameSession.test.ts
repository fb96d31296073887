/**
 * Unit tests for gameSession.ts state machine
 * Covers deriveGameStatus, deriveGameSessionStatus and both session variants
 */
import {
  deriveGameSessionStatus,
  deriveGameStatus,
  type GameSessionCounters,
} from '../../../src/shared/stateMachines/gameSession';
import { NO_ACTIVE_HINT } from '../../../src/shared/engine/types';

describe('gameSession state machine', () => {
  const counters = (overrides: Partial<GameSessionCounters> = {}): GameSessionCounters => ({
    foundCount: 0,
    totalAnswers: 4,
    hintMeter: 0,
    hintThreshold: 3,
    activeHint: NO_ACTIVE_HINT,
    ...overrides,
  });

  describe('deriveGameStatus', () => {
    it('is in progress until every answer is found', () => {
      expect(deriveGameStatus(0, 4)).toBe('in_progress');
      expect(deriveGameStatus(3, 4)).toBe('in_progress');
      expect(deriveGameStatus(4, 4)).toBe('complete');
    });
  });

  describe('deriveGameSessionStatus', () => {
    it('reports progress and the active hint', () => {
      const activeHint = { kind: 'hint', index: 2, revealed: false } as const;
      expect(deriveGameSessionStatus(counters({ foundCount: 1, activeHint }))).toEqual({
        kind: 'in_progress',
        foundCount: 1,
        totalAnswers: 4,
        hintAvailable: false,
        activeHint,
      });
    });

    it('offers a hint once the meter reaches the threshold', () => {
      const status = deriveGameSessionStatus(counters({ hintMeter: 3 }));
      expect(status.kind === 'in_progress' && status.hintAvailable).toBe(true);
    });

    it('offers a reveal while the active hint is hidden', () => {
      const status = deriveGameSessionStatus(
        counters({ hintMeter: 3, activeHint: { kind: 'hint', index: 0, revealed: false } })
      );
      expect(status.kind === 'in_progress' && status.hintAvailable).toBe(true);
    });

    it('offers nothing once the active hint is revealed', () => {
      const status = deriveGameSessionStatus(
        counters({ hintMeter: 3, activeHint: { kind: 'hint', index: 0, revealed: true } })
      );
      expect(status.kind === 'in_progress' && status.hintAvailable).toBe(false);
    });

    it('is always available with a zero threshold', () => {
      const status = deriveGameSessionStatus(counters({ hintThreshold: 0 }));
      expect(status.kind === 'in_progress' && status.hintAvailable).toBe(true);
    });

    it('collapses to complete once every answer is found', () => {
      expect(deriveGameSessionStatus(counters({ foundCount: 4, hintMeter: 5 }))).toEqual({
        kind: 'complete',
        totalAnswers: 4,
      });
    });
  });
});
