/**
 * Invaders
 *
 * Terminal Space Invaders: fixed-rate loop around the pure engine,
 * with a start screen, pause menu, hit effects and a session high score.
 */

import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  type GameTerminal,
} from '../utils';
import { PAUSE_MENU_ITEMS, checkShortcut, navigateMenu } from '../shared/menu';
import {
  PARTICLE_CHARS,
  addScorePopup,
  createEffectsState,
  spawnBurst,
  spawnFirework,
  stepEffects,
  triggerFlash,
  triggerShake,
} from '../shared/effects';
import {
  buildDrawList,
  createConfig,
  createGameState,
  resetGame,
  tick,
  type GameConfig,
  type TickEvent,
} from './engine';
import { createInputTracker } from './input';
import { computeLayout, projectPoint, renderFrame, renderTooSmall, type Overlay } from './render';

export interface InvadersResult {
  score: number;
  level: number;
  highScore: number;
}

export interface InvadersOptions {
  config?: GameConfig;
  random?: () => number;
  /** Called once when the game stops, for any reason */
  onQuit?: (result: InvadersResult) => void;
}

/**
 * Invaders Game Controller
 */
export interface InvadersController {
  stop: () => void;
  readonly isRunning: boolean;
}

const BUFFER_REASON = 'invaders';
const INVADER_COLORS = ['\x1b[1;92m', '\x1b[1;93m', '\x1b[1;95m'];
const HIT_COLOR = '\x1b[1;91m';

export function runInvadersGame(terminal: GameTerminal, options: InvadersOptions = {}): InvadersController {
  // Throws ConfigError before the terminal is touched
  const config = createConfig(options.config);
  const random = options.random ?? Math.random;
  const world = { width: config.width, height: config.height };
  const input = createInputTracker();

  let game = createGameState(config, random);
  let effects = createEffectsState();
  let running = true;
  let started = false;
  let paused = false;
  let pauseSelection = 0;
  let highScore = 0;
  let animFrame = 0;

  function restart() {
    game = resetGame(game);
    effects = createEffectsState();
    input.reset();
    paused = false;
    started = true;
  }

  function applyEvents(events: readonly TickEvent[]) {
    for (const event of events) {
      if (event.type === 'gameOver') {
        highScore = Math.max(highScore, event.score);
      }
    }

    // Effects are laid out in cells; skip them while the terminal is too small
    const layout = computeLayout(terminal.cols, terminal.rows);
    if (!layout) return;

    for (const event of events) {
      switch (event.type) {
        case 'invaderDestroyed': {
          const { col, row } = projectPoint(event.x, event.y, world, layout);
          spawnBurst(effects, col, row, 6, INVADER_COLORS[event.kind], PARTICLE_CHARS.explosion, random);
          addScorePopup(effects, col, row - 1, `+${event.points}`);
          break;
        }
        case 'playerHit': {
          const { col, row } = projectPoint(event.x, event.y, world, layout);
          spawnBurst(effects, col, row, 10, HIT_COLOR, PARTICLE_CHARS.death, random);
          triggerShake(effects, 12, 3);
          triggerFlash(effects, 15);
          break;
        }
        case 'levelCleared':
          spawnFirework(effects, Math.floor(layout.width / 2), Math.floor(layout.height / 2), random);
          break;
        case 'gameOver':
          triggerShake(effects, 20, 4);
          break;
        case 'fired':
          break;
      }
    }
  }

  function overlay(): Overlay {
    if (!started) return { kind: 'start' };
    if (paused) return { kind: 'paused', selection: pauseSelection };
    if (game.phase === 'gameOver') return { kind: 'gameOver', highScore };
    return { kind: 'none' };
  }

  function render() {
    const layout = computeLayout(terminal.cols, terminal.rows);
    if (!layout) {
      terminal.write(renderTooSmall(terminal.cols, terminal.rows));
      return;
    }
    const shake = stepEffects(effects, random);
    terminal.write(renderFrame(buildDrawList(game), {
      layout,
      world,
      overlay: overlay(),
      effects,
      shake,
      animFrame,
    }));
  }

  function frame() {
    if (!running) return;
    animFrame = (animFrame + 1) % 60;

    if (started && !paused && game.phase === 'playing') {
      const polled = input.poll(Date.now());
      if (polled.quit) {
        controller.stop();
        return;
      }
      if (polled.pause) {
        paused = true;
        pauseSelection = 0;
      } else {
        applyEvents(tick(game, polled));
      }
    }

    render();
  }

  function confirmPause(selection: number) {
    switch (selection) {
      case 0: // Resume
        paused = false;
        input.reset();
        break;
      case 1: // Restart
        restart();
        break;
      case 2: // Quit
        controller.stop();
        break;
    }
  }

  function onKey(key: string) {
    if (!running) return;
    const lower = key.length === 1 ? key.toLowerCase() : key;

    if (!started) {
      if (lower === 'q') {
        controller.stop();
      } else if (key !== 'Escape') {
        started = true;
        input.reset();
      }
      return;
    }

    if (paused) {
      if (key === 'Escape') {
        confirmPause(0);
        return;
      }
      const { newSelection, confirmed } = navigateMenu(pauseSelection, PAUSE_MENU_ITEMS.length, key);
      if (confirmed) {
        confirmPause(pauseSelection);
        return;
      }
      if (newSelection !== pauseSelection) {
        pauseSelection = newSelection;
        return;
      }
      const shortcut = checkShortcut(PAUSE_MENU_ITEMS, key);
      if (shortcut !== -1) confirmPause(shortcut);
      return;
    }

    if (game.phase === 'gameOver') {
      if (lower === 'r') restart();
      else if (lower === 'q') controller.stop();
      return;
    }

    // Quit and pause are picked up by the next frame's poll
    input.press(key, Date.now());
  }

  enterAlternateBuffer(terminal, BUFFER_REASON);
  const keyListener = terminal.onKey(({ domEvent }) => onKey(domEvent.key));
  const loop = setInterval(frame, Math.round(1000 / config.fps));

  const controller: InvadersController = {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(loop);
      keyListener.dispose();
      exitAlternateBuffer(terminal, BUFFER_REASON);
      options.onQuit?.({
        score: game.score,
        level: game.level,
        highScore: Math.max(highScore, game.score),
      });
    },
    get isRunning() { return running; },
  };

  render();
  return controller;
}
