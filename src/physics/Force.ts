import { Vector2 } from './Vector2.js';

// Constant acceleration (units/s²), e.g. moon gravity or the thruster
// when the lander points East.
export class Force {
  constructor(
    public readonly x: number,
    public readonly y: number
  ) {}

  /**
   * Velocity change produced by this force over an elapsed time
   * @param seconds Elapsed time (s)
   */
  toVelocity(seconds: number): Vector2 {
    return new Vector2(this.x * seconds, this.y * seconds);
  }

  perSecond(): Vector2 {
    return this.toVelocity(1);
  }
}
