import type { Vector2 } from './Vector2.js';

// Explicit per-frame Euler step used by the lander
export class PhysicsIntegrator {
  /**
   * Apply a velocity change, then move by the updated velocity.
   * @param position Current position (modified in place)
   * @param velocity Current velocity (modified in place)
   * @param deltaVelocity Velocity change accumulated this frame
   * @param deltaTime Frame time (seconds)
   */
  static integrateMotion(
    position: Vector2,
    velocity: Vector2,
    deltaVelocity: Vector2,
    deltaTime: number
  ): void {
    // v(t+dt) = v(t) + dv
    velocity.x += deltaVelocity.x;
    velocity.y += deltaVelocity.y;

    // x(t+dt) = x(t) + v(t+dt) * dt
    position.x += velocity.x * deltaTime;
    position.y += velocity.y * deltaTime;
  }

  /**
   * Clamp a frame time into [0, maxDeltaTime]. Non-finite values become 0.
   * @param deltaTime Raw frame time (seconds)
   * @param maxDeltaTime Upper bound (seconds)
   */
  static clampFrameTime(deltaTime: number, maxDeltaTime = 0.1): number {
    if (!Number.isFinite(deltaTime) || deltaTime < 0) return 0;
    return Math.min(deltaTime, maxDeltaTime);
  }
}
