// Simple settings backed by localStorage
import { isSteeringMode, type SteeringMode } from '../physics/WorldParameters.js';

const KEY_STEERING = 'settings.steering';
const KEY_TERRAIN = 'settings.terrainEnabled';
const KEY_DEBUG = 'settings.debug';

export function getSteeringMode(): SteeringMode {
  try {
    const v = localStorage.getItem(KEY_STEERING);
    return isSteeringMode(v) ? v : 'rotary';
  } catch {
    return 'rotary';
  }
}

export function setSteeringMode(mode: SteeringMode): void {
  try {
    localStorage.setItem(KEY_STEERING, mode);
  } catch (error) {
    console.warn('Could not persist steering mode:', error);
  }
}

// null when the player never chose; the variant default applies then
export function getTerrainPreference(): boolean | null {
  try {
    const v = localStorage.getItem(KEY_TERRAIN);
    return v === null ? null : v === '1';
  } catch {
    return null;
  }
}

export function setTerrainEnabled(on: boolean): void {
  try {
    localStorage.setItem(KEY_TERRAIN, on ? '1' : '0');
  } catch (error) {
    console.warn('Could not persist terrain setting:', error);
  }
}

export function isDebugEnabled(): boolean {
  try {
    return localStorage.getItem(KEY_DEBUG) === '1';
  } catch {
    return false;
  }
}

export function setDebugEnabled(on: boolean): void {
  try {
    localStorage.setItem(KEY_DEBUG, on ? '1' : '0');
  } catch (error) {
    console.warn('Could not persist debug setting:', error);
  }
}

function parseFlag(value: string | null): boolean | null {
  if (value === '1' || value === 'on') return true;
  if (value === '0' || value === 'off') return false;
  return null;
}

/**
 * Store the options given in the page URL
 * (`?steering=compass|rotary&terrain=on|off&debug=on|off`).
 * Unknown values are ignored and leave the stored setting as it was.
 */
export function applyUrlSettings(search: string): void {
  const params = new URLSearchParams(search);
  const steering = params.get('steering');
  if (isSteeringMode(steering)) setSteeringMode(steering);
  const terrain = parseFlag(params.get('terrain'));
  if (terrain !== null) setTerrainEnabled(terrain);
  const debug = parseFlag(params.get('debug'));
  if (debug !== null) setDebugEnabled(debug);
}
