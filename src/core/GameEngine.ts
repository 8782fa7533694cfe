import { PhysicsIntegrator } from '../physics/PhysicsIntegrator.js';
import { WorldParameters, type SteeringMode } from '../physics/WorldParameters.js';
import { CanvasRenderer } from '../rendering/CanvasRenderer.js';
import { InputController } from './InputController.js';
import { Lander } from './Lander.js';
import { Terrain } from './Terrain.js';
import type { FrameHandler, InputState, Renderer } from './types.js';

export const GAME_TITLE = 'Moon Lander';

export interface GameEngineOptions {
  steering?: SteeringMode;
  // Defaults to the steering variant's choice
  terrain?: boolean;
  debug?: boolean;
  random?: () => number;
}

// Main game engine: owns the lander, the terrain and the frame loop
export class GameEngine implements FrameHandler {
  private renderer: CanvasRenderer;
  private input: InputController;
  private world: WorldParameters;
  private lander: Lander;
  private terrain: Terrain | null;

  private isRunning = false;
  private lastTime: number | null = null;
  private animationFrameId = 0;

  private debugEnabled: boolean;
  // simple logger for dev: prints only when debugEnabled
  private debugLog(...args: unknown[]): void {
    if (this.debugEnabled) console.log(...args);
  }

  constructor(canvas: HTMLCanvasElement, options: GameEngineOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.renderer = new CanvasRenderer(canvas);
    this.world = new WorldParameters(options.steering);
    this.lander = new Lander(this.world);
    const terrainEnabled = options.terrain ?? this.world.terrainEnabled;
    this.terrain = terrainEnabled ? Terrain.generate(this.world, options.random) : null;

    this.input = new InputController();
    this.input.init();
    window.addEventListener('resize', this.onResize);

    document.title = GAME_TITLE;
    console.log(this.renderer.describe());
    this.debugLog(
      `Steering: ${this.world.steering}, terrain: ${this.terrain ? 'on' : 'off'}`
    );
  }

  getLander(): Lander {
    return this.lander;
  }

  getTerrain(): Terrain | null {
    return this.terrain;
  }

  isStarted(): boolean {
    return this.isRunning;
  }

  /**
   * Start the game loop
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.lastTime = null;
    this.animationFrameId = requestAnimationFrame(this.gameLoop);
    this.debugLog('Game started');
  }

  /**
   * Stop the game loop
   */
  stop(): void {
    this.isRunning = false;
    if (this.animationFrameId) {
      cancelAnimationFrame(this.animationFrameId);
      this.animationFrameId = 0;
    }
  }

  dispose(): void {
    this.stop();
    this.input.dispose();
    window.removeEventListener('resize', this.onResize);
  }

  /**
   * Run one update + render pass. Any failure stops the loop and is rethrown.
   * @param deltaTime Frame time in seconds
   */
  runFrame(deltaTime: number): void {
    try {
      this.update(deltaTime, this.input.pressedKeys());
      this.render();
    } catch (error) {
      this.stop();
      console.error('Frame failed, stopping game loop:', error);
      throw error;
    }
  }

  update(deltaTime: number, input: InputState): void {
    this.lander.update(deltaTime, input);
  }

  draw(renderer: Renderer): void {
    this.terrain?.draw(renderer);
    this.lander.draw(renderer);
  }

  render(): void {
    this.renderer.clear('#000000');
    this.draw(this.renderer);
  }

  /**
   * Main game loop, driven by animation frame timestamps (ms)
   */
  private gameLoop = (now: number): void => {
    if (!this.isRunning) return;

    const deltaTime = this.lastTime === null ? 0 : (now - this.lastTime) / 1000;
    this.lastTime = now;

    this.runFrame(PhysicsIntegrator.clampFrameTime(deltaTime));

    if (this.isRunning) {
      this.animationFrameId = requestAnimationFrame(this.gameLoop);
    }
  };

  private onResize = () => {
    this.renderer.handleResize();
  };
}
