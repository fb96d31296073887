import { EngineErrorCode, InvalidState } from './errors';
import { Position, Step, positionKey, positionsEqual, stepTo, takeStep } from './geometry';

/**
 * A strand is a path of adjacent cells, stored as a start position plus the
 * steps taken from it. Absolute positions are derived on demand and assume
 * an unbounded board.
 */
export class Strand {
  readonly start: Position;
  readonly steps: readonly Step[];

  constructor(start: Position, steps: readonly Step[] = []) {
    this.start = { row: start.row, col: start.col };
    this.steps = [...steps];
  }

  /**
   * Rebuild a strand from an explicit path of positions, e.g. the cells a
   * player dragged across.
   *
   * @throws InvalidState for an empty path
   * @throws NotAdjacent when two consecutive positions are not neighbours
   */
  static fromPositions(path: readonly Position[]): Strand {
    const [first, ...rest] = path;
    if (first === undefined) {
      throw new InvalidState(EngineErrorCode.STATE_EMPTY_PATH, 'Cannot build a strand from an empty path', {}, 'Strand');
    }
    const steps: Step[] = [];
    let previous = first;
    for (const next of rest) {
      steps.push(stepTo(previous, next));
      previous = next;
    }
    return new Strand(first, steps);
  }

  get length(): number {
    return this.steps.length + 1;
  }

  positions(): Position[] {
    const result: Position[] = [this.start];
    let current = this.start;
    for (const step of this.steps) {
      current = takeStep(current, step);
      result.push(current);
    }
    return result;
  }

  /** Keys of every cell the strand covers, duplicates collapsed. */
  positionKeys(): Set<string> {
    return new Set(this.positions().map(positionKey));
  }

  isCyclic(): boolean {
    return this.positionKeys().size < this.length;
  }

  /**
   * True when two non-consecutive connections of the strand share a point
   * other than a common endpoint. On the unit lattice that happens when two
   * diagonals of the same square cross at its centre, or when a connection
   * is retraced.
   */
  isFolded(): boolean {
    const cells = this.positions();
    for (let i = 0; i + 1 < cells.length; i++) {
      for (let j = i + 2; j + 1 < cells.length; j++) {
        if (edgesCross(cells[i], cells[i + 1], cells[j], cells[j + 1])) {
          return true;
        }
      }
    }
    return false;
  }

  /** Structural equality over (start, steps). */
  equals(other: Strand): boolean {
    return (
      positionsEqual(this.start, other.start) &&
      this.steps.length === other.steps.length &&
      this.steps.every((step, idx) => step === other.steps[idx])
    );
  }

  /** True when both strands cover exactly the same set of cells. */
  coversSameCells(other: Strand): boolean {
    const mine = this.positionKeys();
    const theirs = other.positionKeys();
    if (mine.size !== theirs.size) {
      return false;
    }
    for (const key of mine) {
      if (!theirs.has(key)) return false;
    }
    return true;
  }
}

function orientation(p: Position, q: Position, r: Position): number {
  return (q.row - p.row) * (r.col - p.col) - (q.col - p.col) * (r.row - p.row);
}

function dot(from: Position, a: Position, b: Position): number {
  return (a.row - from.row) * (b.row - from.row) + (a.col - from.col) * (b.col - from.col);
}

/**
 * Segment test for two unit connections. Touching at a single lattice point
 * is not a crossing: unit segments contain no interior lattice points, so
 * such a point is always a shared endpoint.
 */
function edgesCross(a1: Position, a2: Position, b1: Position, b2: Position): boolean {
  const d1 = orientation(b1, b2, a1);
  const d2 = orientation(b1, b2, a2);
  const d3 = orientation(a1, a2, b1);
  const d4 = orientation(a1, a2, b2);

  if (d1 * d2 < 0 && d3 * d4 < 0) {
    return true;
  }

  if (d1 === 0 && d2 === 0 && d3 === 0 && d4 === 0) {
    // Collinear: project b onto a and check for an overlap of positive length.
    const span = dot(a1, a2, a2);
    const t1 = dot(a1, a2, b1);
    const t2 = dot(a1, a2, b2);
    const overlap = Math.min(span, Math.max(t1, t2)) - Math.max(0, Math.min(t1, t2));
    return overlap > 0;
  }

  return false;
}
