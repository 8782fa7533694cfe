import { Vector2 } from '../physics/Vector2.js';
import type { WorldParameters } from '../physics/WorldParameters.js';
import type { PolylineCommand, Renderer } from './types.js';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
// Running total used when a step leaves the 32-bit range
const OVERFLOW_FALLBACK = 10;

// Uniform signed 32-bit integer from a [0, 1) source
function randomInt32(random: () => number): number {
  return Math.floor(random() * 2 ** 32) + INT32_MIN;
}

/**
 * Random walk of terrain heights.
 * @param length Number of segments; the result has length + 1 samples
 * @param maxDelta Step size bound (exclusive)
 * @param floorHeight Lowest allowed height
 * @param random Source of uniform numbers in [0, 1)
 */
export function generateHeightmap(
  length: number,
  maxDelta: number,
  floorHeight: number,
  random: () => number = Math.random
): number[] {
  const heights: number[] = [];
  let last = 0;
  for (let i = 0; i <= length; i++) {
    const step = randomInt32(random) % maxDelta;
    const next = last + step;
    last = next < INT32_MIN || next > INT32_MAX ? OVERFLOW_FALLBACK : next;
    last = Math.max(last, floorHeight);
    heights.push(last);
  }
  return heights;
}

// Background ridge, generated once and never changed
export class Terrain {
  constructor(public readonly heights: readonly number[]) {}

  static generate(world: WorldParameters, random: () => number = Math.random): Terrain {
    return new Terrain(
      generateHeightmap(world.mapLength, world.maxTerrainDelta, world.terrainFloor, random)
    );
  }

  get length(): number {
    return this.heights.length - 1;
  }

  /**
   * Polyline spread across the viewport width, hanging up from its bottom edge
   * @param viewport Viewport size in CSS pixels
   */
  toDrawCommand(viewport: Vector2): PolylineCommand {
    const spacing = this.length > 0 ? viewport.x / this.length : 0;
    return {
      kind: 'polyline',
      points: this.heights.map((height, i) => new Vector2(i * spacing, -height)),
      offset: new Vector2(0, viewport.y),
      color: '#ffffff',
    };
  }

  draw(renderer: Renderer): void {
    renderer.draw(this.toDrawCommand(renderer.getSize()));
  }
}
