// Main entry point for Moon Lander
import { GAME_TITLE, GameEngine } from './core/GameEngine.js';
import {
  applyUrlSettings,
  getSteeringMode,
  getTerrainPreference,
  isDebugEnabled,
} from './core/Settings.js';

console.log(`${GAME_TITLE} - Initializing...`);

const canvas = document.getElementById('gameCanvas');
if (!(canvas instanceof HTMLCanvasElement)) {
  throw new Error('Canvas element not found');
}

function startGame(target: HTMLCanvasElement): GameEngine | null {
  try {
    applyUrlSettings(window.location.search);
    const steering = getSteeringMode();
    const engine = new GameEngine(target, {
      steering,
      terrain: getTerrainPreference() ?? undefined,
      debug: isDebugEnabled(),
    });
    engine.start();

    console.log('Game started successfully!');
    console.log('Controls:');
    if (steering === 'compass') {
      console.log('  ARROWS - Point the lander (combine for diagonals)');
    } else {
      console.log('  LEFT/RIGHT - Rotate the lander');
    }
    console.log('  SPACE - Fire thruster');
    return engine;
  } catch (error) {
    console.error('Failed to start game:', error);
    return null;
  }
}

startGame(canvas);
