import { Force } from './Force.js';
import { COMPASS_DIVISIONS } from './Heading.js';
import { Vector2 } from './Vector2.js';

export type SteeringMode = 'compass' | 'rotary';

export function isSteeringMode(value: unknown): value is SteeringMode {
  return value === 'compass' || value === 'rotary';
}

// World parameters for one steering variant. Read-only; passed to the
// lander and terrain at construction.
export class WorldParameters {
  // Moon gravity, pulling toward +y (down the screen)
  public readonly gravity: Force = new Force(0, 8);
  // Thruster force when the lander points East
  public readonly thruster: Force;

  public readonly headingDivisions: number;
  // Time for a full turn while Left/Right is held (rotary only)
  public readonly rotationPeriod: number = 3; // s
  public readonly spawnPosition: Vector2 = new Vector2(100, 100);

  // Terrain random walk
  public readonly terrainEnabled: boolean;
  public readonly mapLength: number = 64;
  public readonly maxTerrainDelta: number = 80;
  public readonly terrainFloor: number = 120;

  constructor(public readonly steering: SteeringMode = 'rotary') {
    if (steering === 'compass') {
      this.thruster = new Force(30, 0);
      this.headingDivisions = COMPASS_DIVISIONS;
      this.terrainEnabled = false;
    } else {
      this.thruster = new Force(50, 0);
      this.headingDivisions = 32;
      this.terrainEnabled = true;
    }
  }

  /**
   * Cooldown between two rotary heading steps
   * @returns Seconds per step (3 / 32 s by default)
   */
  getRotationStepDuration(): number {
    return this.rotationPeriod / this.headingDivisions;
  }
}
