import { PhysicsIntegrator } from '../physics/PhysicsIntegrator.js';
import { Heading, compassDirectionFromKeys } from '../physics/Heading.js';
import { Vector2 } from '../physics/Vector2.js';
import type { WorldParameters } from '../physics/WorldParameters.js';
import type { FrameHandler, InputState, PolygonCommand, Renderer } from './types.js';

// Hull outline in local space, nose along +x
const HULL_LENGTH = 30;
const HULL_WIDTH = 15;
const HULL: readonly Vector2[] = [
  new Vector2(HULL_LENGTH / 2, 0),
  new Vector2(-HULL_LENGTH / 2, HULL_WIDTH / 2),
  new Vector2(-HULL_LENGTH / 2, -HULL_WIDTH / 2),
];

const ARROW_KEYS = ['ArrowUp', 'ArrowDown', 'ArrowLeft', 'ArrowRight'] as const;

/**
 * The craft: position, velocity and a discrete heading.
 *
 * Each frame the heading reacts to the arrow keys (snap for the compass
 * variant, timed steps for the rotary one), then gravity and, while Space is
 * held, the thruster change the velocity.
 */
export class Lander implements FrameHandler {
  public position: Vector2;
  public velocity: Vector2;
  public heading: Heading;

  // Seconds until the next rotary step is allowed
  private rotationCooldown = 0;

  constructor(private readonly world: WorldParameters) {
    this.position = world.spawnPosition.clone();
    this.velocity = Vector2.zero();
    this.heading = new Heading(world.headingDivisions);
  }

  get cooldown(): number {
    return this.rotationCooldown;
  }

  /**
   * Advance one frame
   * @param deltaTime Time since the previous frame (seconds)
   * @param input Keys held this frame
   */
  update(deltaTime: number, input: InputState): void {
    if (deltaTime <= 0) return;

    this.steer(deltaTime, input);

    let deltaV = this.world.gravity.toVelocity(deltaTime);
    if (input.has('Space')) {
      const thrust = this.world.thruster.perSecond().rotate(this.heading.angle());
      deltaV = deltaV.add(thrust.multiply(deltaTime));
    }

    PhysicsIntegrator.integrateMotion(this.position, this.velocity, deltaV, deltaTime);
  }

  private steer(deltaTime: number, input: InputState): void {
    if (this.world.steering === 'compass') {
      if (ARROW_KEYS.some((key) => input.has(key))) {
        this.heading = Heading.compass(compassDirectionFromKeys(input));
      }
      return;
    }

    this.rotationCooldown = Math.max(0, this.rotationCooldown - deltaTime);
    if (this.rotationCooldown > 0) return;

    const turn = (input.has('ArrowRight') ? 1 : 0) - (input.has('ArrowLeft') ? 1 : 0);
    if (turn !== 0) {
      this.heading = this.heading.step(turn);
      this.rotationCooldown = this.world.getRotationStepDuration();
    }
  }

  toDrawCommand(): PolygonCommand {
    return {
      kind: 'polygon',
      points: HULL.map((p) => p.clone()),
      dest: this.position.clone(),
      rotation: this.heading.angle(),
      color: '#ffffff',
    };
  }

  draw(renderer: Renderer): void {
    renderer.draw(this.toDrawCommand());
  }
}
