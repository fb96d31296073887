import type { ActiveHint, GameStatus } from '../engine/types';

/**
 * Explicit session-level view of a puzzle, derived from the engine's
 * counters. It does not replace the engine as the source of truth; it gives
 * a UI a small, intent-focused lens for choosing what to render.
 */

export interface InProgressSession {
  kind: 'in_progress';
  foundCount: number;
  totalAnswers: number;
  hintAvailable: boolean;
  activeHint: ActiveHint;
}

export interface CompleteSession {
  kind: 'complete';
  totalAnswers: number;
}

export type GameSessionStatus = InProgressSession | CompleteSession;

export interface GameSessionCounters {
  foundCount: number;
  totalAnswers: number;
  hintMeter: number;
  hintThreshold: number;
  activeHint: ActiveHint;
}

export function deriveGameStatus(foundCount: number, totalAnswers: number): GameStatus {
  return foundCount >= totalAnswers ? 'complete' : 'in_progress';
}

/**
 * Pure derivation of a {@link GameSessionStatus}; callers decide when to
 * recompute it.
 */
export function deriveGameSessionStatus(counters: GameSessionCounters): GameSessionStatus {
  const { foundCount, totalAnswers } = counters;

  if (deriveGameStatus(foundCount, totalAnswers) === 'complete') {
    return { kind: 'complete', totalAnswers };
  }

  return {
    kind: 'in_progress',
    foundCount,
    totalAnswers,
    hintAvailable:
      counters.hintMeter >= counters.hintThreshold &&
      !(counters.activeHint.kind === 'hint' && counters.activeHint.revealed),
    activeHint: counters.activeHint,
  };
}
