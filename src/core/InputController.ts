import { isControlKey, type ControlKey, type InputState } from './types.js';

/**
 * Keyboard state for the lander.
 *
 * Listens to DOM key events and keeps the set of held control keys; the
 * engine reads a snapshot once per frame.
 */
export class InputController {
  private held = new Set<ControlKey>();

  constructor(
    private target: Pick<Document, 'addEventListener' | 'removeEventListener'> = document,
    private focusTarget: Pick<Window, 'addEventListener' | 'removeEventListener'> = window
  ) {}

  init(): void {
    this.target.addEventListener('keydown', this.onKeyDown);
    this.target.addEventListener('keyup', this.onKeyUp);
    this.focusTarget.addEventListener('blur', this.onBlur);
  }

  dispose(): void {
    this.target.removeEventListener('keydown', this.onKeyDown);
    this.target.removeEventListener('keyup', this.onKeyUp);
    this.focusTarget.removeEventListener('blur', this.onBlur);
    this.held.clear();
  }

  pressedKeys(): InputState {
    return new Set(this.held);
  }

  private onKeyDown = (event: KeyboardEvent) => {
    if (!isControlKey(event.code)) return;
    // arrows and space would scroll the page
    event.preventDefault();
    this.held.add(event.code);
  };

  private onKeyUp = (event: KeyboardEvent) => {
    if (!isControlKey(event.code)) return;
    this.held.delete(event.code);
  };

  // keyup never arrives once focus is gone
  private onBlur = () => {
    this.held.clear();
  };
}
