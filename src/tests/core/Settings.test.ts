import {
  applyUrlSettings,
  getSteeringMode,
  getTerrainPreference,
  isDebugEnabled,
  setDebugEnabled,
  setSteeringMode,
  setTerrainEnabled,
} from '@/core/Settings';
import { describe, expect, it } from 'vitest';

describe('Settings', () => {
  it('defaults when nothing is stored', () => {
    expect(getSteeringMode()).toBe('rotary');
    expect(getTerrainPreference()).toBeNull();
    expect(isDebugEnabled()).toBe(false);
  });

  it('round-trips stored values', () => {
    setSteeringMode('compass');
    setTerrainEnabled(false);
    setDebugEnabled(true);
    expect(getSteeringMode()).toBe('compass');
    expect(getTerrainPreference()).toBe(false);
    expect(isDebugEnabled()).toBe(true);
  });

  it('ignores an unknown stored steering mode', () => {
    localStorage.setItem('settings.steering', 'hover');
    expect(getSteeringMode()).toBe('rotary');
  });

  it('stores the options given in the page URL', () => {
    applyUrlSettings('?steering=compass&terrain=on&debug=1');
    expect(localStorage.getItem('settings.steering')).toBe('compass');
    expect(getSteeringMode()).toBe('compass');
    expect(getTerrainPreference()).toBe(true);
    expect(isDebugEnabled()).toBe(true);

    applyUrlSettings('?terrain=off&debug=0');
    expect(getSteeringMode()).toBe('compass');
    expect(getTerrainPreference()).toBe(false);
    expect(isDebugEnabled()).toBe(false);
  });

  it('ignores unknown URL values', () => {
    setSteeringMode('rotary');
    applyUrlSettings('?steering=sideways&terrain=maybe');
    expect(getSteeringMode()).toBe('rotary');
    expect(getTerrainPreference()).toBeNull();
    applyUrlSettings('');
    expect(localStorage.length).toBe(1);
  });
});
