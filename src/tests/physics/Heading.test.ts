import type { ControlKey } from '@/core/types';
import { CompassDirection, Heading, compassDirectionFromKeys } from '@/physics/Heading';
import { describe, expect, it } from 'vitest';

const keys = (...k: ControlKey[]) => new Set<ControlKey>(k);

describe('Heading', () => {
  it('wraps steps in both directions', () => {
    const h = new Heading(32);
    expect(h.step(-1).index).toBe(31);
    expect(h.step(33).index).toBe(1);
    expect(new Heading(8, -9).index).toBe(7);
  });

  it('maps index to angle', () => {
    expect(new Heading(32).angle()).toBe(0);
    expect(Heading.compass(CompassDirection.N).angle()).toBeCloseTo(Math.PI / 2, 12);
    expect(Heading.compass(CompassDirection.W).angle()).toBeCloseTo(Math.PI, 12);
    expect(new Heading(32, 8).angle()).toBeCloseTo(Math.PI / 2, 12);
  });

  it('rejects non-positive divisions', () => {
    expect(() => new Heading(0)).toThrow('Heading divisions must be a positive integer, got 0');
  });
});

describe('compassDirectionFromKeys', () => {
  it('looks up the eight directions', () => {
    expect(compassDirectionFromKeys(keys('ArrowUp'))).toBe(CompassDirection.N);
    expect(compassDirectionFromKeys(keys('ArrowUp', 'ArrowRight'))).toBe(CompassDirection.NE);
    expect(compassDirectionFromKeys(keys('ArrowUp', 'ArrowLeft'))).toBe(CompassDirection.NW);
    expect(compassDirectionFromKeys(keys('ArrowDown'))).toBe(CompassDirection.S);
    expect(compassDirectionFromKeys(keys('ArrowDown', 'ArrowLeft'))).toBe(CompassDirection.SW);
    expect(compassDirectionFromKeys(keys('ArrowDown', 'ArrowRight'))).toBe(CompassDirection.SE);
    expect(compassDirectionFromKeys(keys('ArrowLeft'))).toBe(CompassDirection.W);
    expect(compassDirectionFromKeys(keys('ArrowRight'))).toBe(CompassDirection.E);
  });

  it('defaults to East with no arrow keys', () => {
    expect(compassDirectionFromKeys(keys())).toBe(CompassDirection.E);
    expect(compassDirectionFromKeys(keys('Space'))).toBe(CompassDirection.E);
  });

  it('prefers Up over Down and Left over Right', () => {
    expect(compassDirectionFromKeys(keys('ArrowUp', 'ArrowDown'))).toBe(CompassDirection.N);
    expect(compassDirectionFromKeys(keys('ArrowLeft', 'ArrowRight'))).toBe(CompassDirection.W);
  });
});
