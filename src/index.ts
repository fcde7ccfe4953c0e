/**
 * terminal-invaders
 *
 * Space Invaders for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runInvadersGame, setTheme } from 'terminal-invaders';
 *   setTheme('green');
 *   const controller = runInvadersGame(terminal);
 *
 * CLI usage:
 *   INVADERS_THEME=amber invaders
 */

export {
  runInvadersGame,
  type InvadersController,
  type InvadersOptions,
  type InvadersResult,
} from './games/invaders';

export {
  DEFAULT_CONFIG,
  ConfigError,
  createConfig,
  createGameState,
  resetGame,
  tick,
  buildDrawList,
  type GameConfig,
  type GameState,
  type GamePhase,
  type InputFrame,
  type TickEvent,
  type DrawList,
  type Renderable,
} from './games/invaders/engine';

export {
  createInputTracker,
  parseKey,
  type InputTracker,
  type PolledInput,
} from './games/invaders/input';

export {
  // Theme utilities
  setTheme,
  getTheme,
  getCurrentThemeColor,

  // Terminal buffer management
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
  type GameKeyEvent,
} from './games/utils';

export {
  getThemeModes,
  isValidThemeMode,
  type PhosphorMode,
} from './themes';

export { createNodeTerminal, type NodeTerminal } from './terminal';
