/**
 * Invaders Renderer
 *
 * Projects the engine's draw list from world units onto a boxed play
 * area in terminal cells and composes one ANSI frame per call.
 */

import { getCurrentThemeColor } from '../utils';
import { PAUSE_MENU_ITEMS, renderSimpleMenu } from '../shared/menu';
import { isFlashVisible, type EffectsState, type ShakeOffset } from '../shared/effects';
import type { DrawList, Renderable } from './engine';

// Minimum terminal size
export const MIN_COLS = 34;
export const MIN_ROWS = 17;

export interface Layout {
  cols: number;
  rows: number;
  width: number;  // Play area cells, inside the border
  height: number;
  left: number;   // 1-based column of the left border
  top: number;    // 1-based row of the top border
}

export interface WorldSize {
  width: number;
  height: number;
}

export type Overlay =
  | { kind: 'none' }
  | { kind: 'start' }
  | { kind: 'paused'; selection: number }
  | { kind: 'gameOver'; highScore: number };

export interface FrameOptions {
  layout: Layout;
  world: WorldSize;
  overlay: Overlay;
  effects: EffectsState;
  shake: ShakeOffset;
  animFrame: number;
}

const TITLE = [
  '█ █▄ █ █ █ ▄▀█ █▀▄ █▀▀ █▀█ █▀',
  '█ █ ▀█ ▀▄▀ █▀█ █▄▀ ██▄ █▀▄ ▄█',
];

// Two animation frames per invader kind (bottom, middle, top rows)
const INVADER_SPRITES = [
  ['<O>', '<o>'],
  ['/V\\', '\\^/'],
  ['|=|', '|#|'],
];
const INVADER_COLORS = ['\x1b[92m', '\x1b[93m', '\x1b[95m']; // Green, Yellow, Magenta

const PLAYER_SPRITE = '/█\\';
const PLAYER_BULLET = '│';
const INVADER_BULLET = '●';
const HIT_COLOR = '\x1b[1;91m';

/**
 * Fit the play area to the terminal, or null when it is too small.
 */
export function computeLayout(cols: number, rows: number): Layout | null {
  if (cols < MIN_COLS || rows < MIN_ROWS) return null;

  const width = Math.min(50, Math.max(30, cols - 4));
  const height = Math.min(20, Math.max(10, rows - 8));
  return {
    cols,
    rows,
    width,
    height,
    left: Math.max(1, Math.floor((cols - width - 2) / 2) + 1),
    top: Math.max(5, Math.floor((rows - height - 2) / 2) + 1),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function projectX(x: number, world: WorldSize, layout: Layout): number {
  return clamp(Math.floor((x / world.width) * layout.width), 0, layout.width - 1);
}

export function projectY(y: number, world: WorldSize, layout: Layout): number {
  return clamp(Math.floor((y / world.height) * layout.height), 0, layout.height - 1);
}

/**
 * Play-area cell holding the centre of a world-space point
 */
export function projectPoint(
  x: number,
  y: number,
  world: WorldSize,
  layout: Layout,
): { col: number; row: number } {
  return { col: projectX(x, world, layout), row: projectY(y, world, layout) };
}

export function renderHud(hud: DrawList['hud']): string {
  const livesDisplay = '♥'.repeat(hud.lives);
  return `SCORE: ${hud.score.toString().padStart(5, '0')}  LVL: ${hud.level}  ${livesDisplay}`;
}

function spriteFor(entity: Renderable, animFrame: number): { text: string; color: string } | null {
  const themeColor = getCurrentThemeColor();
  switch (entity.kind) {
    case 'invader': {
      const frames = INVADER_SPRITES[entity.variant];
      if (!frames) return null;
      return { text: frames[Math.floor(animFrame / 15) % 2], color: INVADER_COLORS[entity.variant] };
    }
    case 'playerBullet':
      return { text: PLAYER_BULLET, color: '\x1b[97m' };
    case 'invaderBullet':
      return { text: INVADER_BULLET, color: '\x1b[91m' };
    case 'player':
      return { text: PLAYER_SPRITE, color: themeColor };
  }
}

export function renderTooSmall(cols: number, rows: number): string {
  const themeColor = getCurrentThemeColor();
  const msg1 = 'Terminal too small!';
  const needWidth = cols < MIN_COLS;
  const needHeight = rows < MIN_ROWS;
  let hint: string;
  if (needWidth && needHeight) {
    hint = 'Make pane larger';
  } else if (needWidth) {
    hint = 'Make pane wider →';
  } else {
    hint = 'Make pane taller ↓';
  }
  const msg2 = `Need: ${MIN_COLS}×${MIN_ROWS}  Have: ${cols}×${rows}`;
  const centerX = Math.floor(cols / 2);
  const centerY = Math.max(2, Math.floor(rows / 2));

  let output = '\x1b[2J\x1b[H';
  output += `\x1b[${centerY - 1};${Math.max(1, centerX - Math.floor(msg1.length / 2))}H${themeColor}${msg1}\x1b[0m`;
  output += `\x1b[${centerY + 1};${Math.max(1, centerX - Math.floor(msg2.length / 2))}H\x1b[2m${msg2}\x1b[0m`;
  output += `\x1b[${centerY + 3};${Math.max(1, centerX - Math.floor(hint.length / 2))}H\x1b[1m${themeColor}${hint}\x1b[0m`;
  return output;
}

export function renderFrame(drawList: DrawList, options: FrameOptions): string {
  const { layout, world, overlay, effects, shake, animFrame } = options;
  const themeColor = getCurrentThemeColor();
  const flashing = isFlashVisible(effects);

  let output = '\x1b[2J\x1b[H';

  // Title
  for (let i = 0; i < TITLE.length; i++) {
    const titleX = Math.max(1, Math.floor((layout.cols - TITLE[i].length) / 2));
    output += `\x1b[${i + 1};${titleX}H${themeColor}\x1b[1m${TITLE[i]}\x1b[0m`;
  }

  // Stats bar
  const stats = renderHud(drawList.hud);
  const statsX = Math.max(1, Math.floor((layout.cols - stats.length) / 2));
  output += `\x1b[${layout.top - 1};${statsX}H${themeColor}${stats}\x1b[0m`;

  const left = Math.max(1, layout.left + shake.offsetX);
  const top = Math.max(3, layout.top + shake.offsetY);

  // Border, red while the hit flash strobes
  const borderColor = flashing ? HIT_COLOR : themeColor;
  output += `\x1b[${top};${left}H${borderColor}╔${'═'.repeat(layout.width)}╗\x1b[0m`;
  for (let y = 0; y < layout.height; y++) {
    output += `\x1b[${top + 1 + y};${left}H${borderColor}║\x1b[0m`;
    output += `\x1b[${top + 1 + y};${left + layout.width + 1}H${borderColor}║\x1b[0m`;
  }
  output += `\x1b[${top + layout.height + 1};${left}H${borderColor}╚${'═'.repeat(layout.width)}╝\x1b[0m`;

  const centerX = layout.left + Math.floor(layout.width / 2) + 1;
  const centerY = layout.top + Math.floor(layout.height / 2);
  const centered = (text: string) => layout.left + 1 + Math.floor((layout.width - text.length) / 2);

  switch (overlay.kind) {
    case 'start': {
      const startMsg = '[ PRESS ANY KEY TO PLAY ]';
      output += `\x1b[${centerY};${centered(startMsg)}H\x1b[5m${themeColor}${startMsg}\x1b[0m`;
      const controls = '←→ MOVE  SPC FIRE  ESC MENU';
      output += `\x1b[${centerY + 2};${centered(controls)}H\x1b[2m${themeColor}${controls}\x1b[0m`;
      break;
    }

    case 'paused': {
      const pauseMsg = '══ PAUSED ══';
      const pauseY = centerY - 3;
      output += `\x1b[${pauseY};${centered(pauseMsg)}H\x1b[5m${themeColor}${pauseMsg}\x1b[0m`;
      output += renderSimpleMenu(PAUSE_MENU_ITEMS, overlay.selection, {
        centerX,
        startY: pauseY + 2,
        showShortcuts: false,
      });
      const navHint = '↑↓ select   ENTER confirm';
      output += `\x1b[${pauseY + 6};${centered(navHint)}H\x1b[2m${themeColor}${navHint}\x1b[0m`;
      break;
    }

    case 'gameOver': {
      const overMsg = '╔══ GAME OVER ══╗';
      const overY = centerY - 1;
      output += `\x1b[${overY};${centered(overMsg)}H${HIT_COLOR}${overMsg}\x1b[0m`;
      const scoreLine = `SCORE: ${drawList.hud.score}  HIGH: ${overlay.highScore}`;
      output += `\x1b[${overY + 1};${centered(scoreLine)}H${themeColor}${scoreLine}\x1b[0m`;
      const restart = '╚ [R] RESTART  [Q] QUIT ╝';
      output += `\x1b[${overY + 2};${centered(restart)}H\x1b[2m${themeColor}${restart}\x1b[0m`;
      break;
    }

    case 'none': {
      for (const entity of drawList.entities) {
        const sprite = spriteFor(entity, animFrame);
        if (!sprite) continue;

        const col = projectX(entity.x + entity.width / 2, world, layout);
        const row = projectY(entity.y + entity.height / 2, world, layout);
        const start = clamp(col - Math.floor(sprite.text.length / 2), 0, layout.width - sprite.text.length);
        const color = entity.kind === 'player' && flashing ? HIT_COLOR : sprite.color;
        output += `\x1b[${top + 1 + row};${left + 1 + start}H${color}${sprite.text}\x1b[0m`;
      }

      for (const p of effects.particles) {
        const col = Math.round(p.x);
        const row = Math.round(p.y);
        if (col < 0 || col >= layout.width || row < 0 || row >= layout.height) continue;
        const alpha = p.life > 5 ? '' : '\x1b[2m';
        output += `\x1b[${top + 1 + row};${left + 1 + col}H${alpha}${p.color}${p.char}\x1b[0m`;
      }

      for (const popup of effects.popups) {
        const col = clamp(Math.round(popup.x), 0, Math.max(0, layout.width - popup.text.length));
        const row = Math.round(popup.y);
        if (row < 0 || row >= layout.height) continue;
        const alpha = popup.frames > 10 ? '\x1b[1m' : '\x1b[2m';
        output += `\x1b[${top + 1 + row};${left + 1 + col}H${alpha}${popup.color}${popup.text}\x1b[0m`;
      }

      const hint = '[ ESC ] MENU  [ Q ] QUIT';
      const hintY = layout.top + layout.height + 2;
      if (hintY <= layout.rows) {
        output += `\x1b[${hintY};${centered(hint)}H\x1b[2m${themeColor}${hint}\x1b[0m`;
      }
      break;
    }
  }

  return output;
}
