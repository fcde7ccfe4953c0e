/**
 * Node Terminal Adapter
 *
 * Maps a raw-mode stdin/stdout pair onto the GameTerminal surface,
 * so games run directly in any terminal emulator.
 */

import type { IDisposable } from '@xterm/xterm';
import type { GameKeyEvent, GameTerminal } from './games/utils';
import { parseKey } from './games/invaders/input';

/** The parts of process.stdin the adapter uses */
export interface TerminalInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (data: string) => void): unknown;
  off(event: 'data', listener: (data: string) => void): unknown;
}

/** The parts of process.stdout the adapter uses */
export interface TerminalOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(data: string): unknown;
}

export interface NodeTerminal extends GameTerminal {
  /** Restore cooked mode, the main screen and the cursor */
  close(): void;
}

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
export const SYNC_START = '\x1b[?2026h';
export const SYNC_END = '\x1b[?2026l';

export function createNodeTerminal(input: TerminalInput, output: TerminalOutput): NodeTerminal {
  if (!input.isTTY || !input.setRawMode) {
    throw new Error('Invaders needs an interactive terminal (stdin is not a TTY)');
  }
  const setRawMode = input.setRawMode.bind(input);

  const keyListeners: ((event: GameKeyEvent) => void)[] = [];
  let closed = false;

  const onData = (data: string) => {
    const key = parseKey(data);
    for (const listener of [...keyListeners]) {
      listener({ key, domEvent: { key } });
    }
  };

  setRawMode(true);
  input.setEncoding('utf8');
  input.resume();
  input.on('data', onData);

  return {
    get cols() { return output.columns || 80; },
    get rows() { return output.rows || 24; },
    write: (data: string) => {
      if (closed) return;
      output.write(SYNC_START + data + SYNC_END);
    },
    onKey: (callback): IDisposable => {
      keyListeners.push(callback);
      return {
        dispose: () => {
          const idx = keyListeners.indexOf(callback);
          if (idx !== -1) keyListeners.splice(idx, 1);
        },
      };
    },
    close: () => {
      if (closed) return;
      closed = true;
      keyListeners.length = 0;
      input.off('data', onData);
      setRawMode(false);
      input.pause();
      output.write('\x1b[?1049l');
      output.write('\x1b[?25h');
      output.write('\x1b[0m');
    },
  };
}
