import type { ControlKey } from '../core/types.js';

// Named compass points for the 8-way heading. Index grows clockwise on
// screen because canvas +y points down.
export const CompassDirection = {
  E: 0,
  NE: 1,
  N: 2,
  NW: 3,
  W: 4,
  SW: 5,
  S: 6,
  SE: 7,
} as const;

export type CompassDirection = (typeof CompassDirection)[keyof typeof CompassDirection];

export const COMPASS_DIVISIONS = 8;

/**
 * Discrete orientation: an index in [0, divisions). Immutable; stepping
 * returns a new heading wrapped with modulo arithmetic.
 */
export class Heading {
  public readonly index: number;

  constructor(
    public readonly divisions: number,
    index = 0
  ) {
    if (!Number.isInteger(divisions) || divisions <= 0) {
      throw new Error(`Heading divisions must be a positive integer, got ${divisions}`);
    }
    this.index = wrap(Math.trunc(index), divisions);
  }

  static compass(direction: CompassDirection): Heading {
    return new Heading(COMPASS_DIVISIONS, direction);
  }

  // Angular size of one step (radians)
  get unit(): number {
    return (2 * Math.PI) / this.divisions;
  }

  step(delta: number): Heading {
    return new Heading(this.divisions, this.index + delta);
  }

  angle(): number {
    return this.unit * this.index;
  }
}

function wrap(index: number, divisions: number): number {
  return ((index % divisions) + divisions) % divisions;
}

/**
 * Direction implied by the held arrow keys. Up wins over Down and Left
 * wins over Right; no arrow key maps to East.
 */
export function compassDirectionFromKeys(keys: ReadonlySet<ControlKey>): CompassDirection {
  const left = keys.has('ArrowLeft');
  const right = keys.has('ArrowRight');
  if (keys.has('ArrowUp')) {
    if (left) return CompassDirection.NW;
    if (right) return CompassDirection.NE;
    return CompassDirection.N;
  }
  if (keys.has('ArrowDown')) {
    if (left) return CompassDirection.SW;
    if (right) return CompassDirection.SE;
    return CompassDirection.S;
  }
  return left ? CompassDirection.W : CompassDirection.E;
}
