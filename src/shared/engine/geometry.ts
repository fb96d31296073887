import { NotAdjacent } from './errors';

/**
 * Board-agnostic grid geometry.
 *
 * Positions are 0-indexed (row, col) pairs. Row indices grow downwards and
 * column indices grow to the right, so (0, 0) is the top-left corner of any
 * board. Nothing in this module knows about board extents; bounds are only
 * enforced where a Board is involved.
 */

export interface Position {
  readonly row: number;
  readonly col: number;
}

/**
 * The eight neighbouring directions: four cardinal (N, S, E, W) and four
 * intercardinal (NW, NE, SW, SE). Values are the lowercase names used in
 * game files.
 */
export enum Step {
  N = 'n',
  S = 's',
  E = 'e',
  W = 'w',
  NW = 'nw',
  NE = 'ne',
  SW = 'sw',
  SE = 'se',
}

export interface StepDelta {
  readonly dRow: -1 | 0 | 1;
  readonly dCol: -1 | 0 | 1;
}

/**
 * Canonical 8-direction Moore neighbourhood.
 */
export const STEP_DELTAS: Readonly<Record<Step, StepDelta>> = {
  [Step.N]: { dRow: -1, dCol: 0 },
  [Step.S]: { dRow: 1, dCol: 0 },
  [Step.E]: { dRow: 0, dCol: 1 },
  [Step.W]: { dRow: 0, dCol: -1 },
  [Step.NW]: { dRow: -1, dCol: -1 },
  [Step.NE]: { dRow: -1, dCol: 1 },
  [Step.SW]: { dRow: 1, dCol: -1 },
  [Step.SE]: { dRow: 1, dCol: 1 },
};

export const ALL_STEPS: readonly Step[] = [
  Step.N,
  Step.S,
  Step.E,
  Step.W,
  Step.NW,
  Step.NE,
  Step.SW,
  Step.SE,
];

export function position(row: number, col: number): Position {
  return { row, col };
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Stable string key for set/map membership.
 */
export function positionKey(pos: Position): string {
  return `${pos.row},${pos.col}`;
}

export function takeStep(pos: Position, step: Step): Position {
  const { dRow, dCol } = STEP_DELTAS[step];
  return { row: pos.row + dRow, col: pos.col + dCol };
}

function findStep(from: Position, to: Position): Step | undefined {
  const dRow = to.row - from.row;
  const dCol = to.col - from.col;
  return ALL_STEPS.find((step) => STEP_DELTAS[step].dRow === dRow && STEP_DELTAS[step].dCol === dCol);
}

/**
 * The step that leads from `from` to `to`.
 *
 * @throws NotAdjacent when the positions are equal or not neighbours.
 */
export function stepTo(from: Position, to: Position): Step {
  const step = findStep(from, to);
  if (step === undefined) {
    throw new NotAdjacent(`Position (${to.row}, ${to.col}) is not adjacent to (${from.row}, ${from.col})`, {
      from,
      to,
    });
  }
  return step;
}

export function isAdjacentTo(a: Position, b: Position): boolean {
  return findStep(a, b) !== undefined;
}

const STEPS_BY_NAME: ReadonlyMap<string, Step> = new Map(
  ALL_STEPS.map((step): [string, Step] => [step, step])
);

/**
 * Parse a step name such as "ne" or "SW". Returns undefined for anything
 * that is not one of the eight direction names.
 */
export function parseStep(token: string): Step | undefined {
  return STEPS_BY_NAME.get(token.trim().toLowerCase());
}
