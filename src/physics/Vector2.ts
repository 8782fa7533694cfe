// Small 2D vector in canvas coordinates (+x right, +y down).
export class Vector2 {
  constructor(
    public x = 0,
    public y = 0
  ) {}

  static zero(): Vector2 {
    return new Vector2(0, 0);
  }

  // Immutable operations (return new vectors)
  add(other: Vector2): Vector2 {
    return new Vector2(this.x + other.x, this.y + other.y);
  }

  multiply(scalar: number): Vector2 {
    return new Vector2(this.x * scalar, this.y * scalar);
  }

  /**
   * Rotate by an angle in radians. Positive angles turn +x toward +y,
   * which is clockwise on screen.
   */
  rotate(angle: number): Vector2 {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return new Vector2(this.x * cos - this.y * sin, this.x * sin + this.y * cos);
  }

  clone(): Vector2 {
    return new Vector2(this.x, this.y);
  }
}
