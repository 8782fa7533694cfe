// Core type definitions
import type { Vector2 } from '../physics/Vector2.js';

// Keys the game reacts to (KeyboardEvent.code values)
export type ControlKey = 'ArrowUp' | 'ArrowDown' | 'ArrowLeft' | 'ArrowRight' | 'Space';

export const CONTROL_KEYS: readonly ControlKey[] = [
  'ArrowUp',
  'ArrowDown',
  'ArrowLeft',
  'ArrowRight',
  'Space',
];

export function isControlKey(code: string): code is ControlKey {
  return CONTROL_KEYS.some((key) => key === code);
}

// Keys held during the current frame
export type InputState = ReadonlySet<ControlKey>;

// Outlined closed polygon in local space, placed at `dest` and rotated
export interface PolygonCommand {
  kind: 'polygon';
  points: readonly Vector2[];
  dest: Vector2;
  rotation: number; // radians
  color: string;
}

// Open polyline shifted by `offset`
export interface PolylineCommand {
  kind: 'polyline';
  points: readonly Vector2[];
  offset: Vector2;
  color: string;
}

export type DrawCommand = PolygonCommand | PolylineCommand;

export interface Renderer {
  draw(command: DrawCommand): void;
  // Viewport size in CSS pixels
  getSize(): Vector2;
}

// Anything the frame loop advances and draws
export interface FrameHandler {
  update(deltaTime: number, input: InputState): void;
  draw(renderer: Renderer): void;
}
