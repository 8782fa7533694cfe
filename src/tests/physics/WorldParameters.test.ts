import { Force } from '@/physics/Force';
import { Vector2 } from '@/physics/Vector2';
import { WorldParameters, isSteeringMode } from '@/physics/WorldParameters';
import { describe, expect, it } from 'vitest';

describe('Force', () => {
  it('scales by elapsed time', () => {
    const g = new Force(0, 8);
    expect(g.toVelocity(0.25)).toEqual(new Vector2(0, 2));
    expect(g.perSecond()).toEqual(new Vector2(0, 8));
  });
});

describe('WorldParameters', () => {
  it('compass variant: 8 headings, thruster 30, no terrain', () => {
    const w = new WorldParameters('compass');
    expect(w.headingDivisions).toBe(8);
    expect(w.thruster.perSecond()).toEqual(new Vector2(30, 0));
    expect(w.terrainEnabled).toBe(false);
  });

  it('rotary variant is the default: 32 headings, thruster 50, terrain', () => {
    const w = new WorldParameters();
    expect(w.steering).toBe('rotary');
    expect(w.headingDivisions).toBe(32);
    expect(w.thruster.perSecond()).toEqual(new Vector2(50, 0));
    expect(w.terrainEnabled).toBe(true);
    expect(w.getRotationStepDuration()).toBe(0.09375);
  });

  it('shares gravity and spawn point', () => {
    for (const w of [new WorldParameters('compass'), new WorldParameters('rotary')]) {
      expect(w.gravity.perSecond()).toEqual(new Vector2(0, 8));
      expect(w.spawnPosition).toEqual(new Vector2(100, 100));
    }
  });

  it('isSteeringMode narrows strings', () => {
    expect(isSteeringMode('compass')).toBe(true);
    expect(isSteeringMode('rotary')).toBe(true);
    expect(isSteeringMode('tank')).toBe(false);
    expect(isSteeringMode(null)).toBe(false);
  });
});
