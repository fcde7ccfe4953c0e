/**
 * Keyboard input for Invaders
 *
 * Raw terminals report key presses, never releases. Movement keys are
 * treated as held for a short window after each press (auto-repeat keeps
 * them alive); fire, quit and pause latch until the next poll.
 */

import type { InputFrame } from './engine';

export type GameKey = 'left' | 'right' | 'fire' | 'quit' | 'pause';

export interface PolledInput extends InputFrame {
  pause: boolean;
}

export interface InputTracker {
  press: (key: string, now: number) => void;
  poll: (now: number) => PolledInput;
  reset: () => void;
}

/** How long a movement key counts as held after a press (ms) */
export const DEFAULT_HOLD_MS = 80;

/**
 * Parse raw stdin escape sequences into key names
 * compatible with DOM KeyboardEvent.key values
 */
export function parseKey(data: string): string {
  if (data === '\x1b[A' || data === '\x1bOA') return 'ArrowUp';
  if (data === '\x1b[B' || data === '\x1bOB') return 'ArrowDown';
  if (data === '\x1b[C' || data === '\x1bOC') return 'ArrowRight';
  if (data === '\x1b[D' || data === '\x1bOD') return 'ArrowLeft';
  if (data === '\r' || data === '\n') return 'Enter';
  if (data === '\x1b') return 'Escape';
  if (data === '\x7f' || data === '\b') return 'Backspace';
  if (data === '\t') return 'Tab';
  if (data === '\x03') return 'q'; // Ctrl+C quits cleanly
  return data;
}

export function mapKey(key: string): GameKey | null {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  switch (normalized) {
    case 'ArrowLeft':
    case 'a':
      return 'left';
    case 'ArrowRight':
    case 'd':
      return 'right';
    case ' ':
      return 'fire';
    case 'q':
      return 'quit';
    case 'Escape':
      return 'pause';
    default:
      return null;
  }
}

export function createInputTracker(holdMs: number = DEFAULT_HOLD_MS): InputTracker {
  let leftUntil = 0;
  let rightUntil = 0;
  let fire = false;
  let quit = false;
  let pause = false;

  return {
    press(key, now) {
      switch (mapKey(key)) {
        case 'left':
          leftUntil = now + holdMs;
          rightUntil = 0;
          break;
        case 'right':
          rightUntil = now + holdMs;
          leftUntil = 0;
          break;
        case 'fire':
          fire = true;
          break;
        case 'quit':
          quit = true;
          break;
        case 'pause':
          pause = true;
          break;
      }
    },

    poll(now) {
      const polled: PolledInput = {
        moveLeft: now < leftUntil,
        moveRight: now < rightUntil,
        fire,
        quit,
        pause,
      };
      fire = false;
      quit = false;
      pause = false;
      return polled;
    },

    reset() {
      leftUntil = 0;
      rightUntil = 0;
      fire = false;
      quit = false;
      pause = false;
    },
  };
}
