/**
 * Shared utilities for games
 *
 * Theme selection, the terminal surface games draw on,
 * and alternate screen buffer bookkeeping.
 */

import type { IDisposable } from '@xterm/xterm';
import { type PhosphorMode, getAnsiColor } from '../themes';

// ============================================================================
// Terminal Surface
// ============================================================================

export interface GameKeyEvent {
  key: string;
  domEvent: { key: string };
}

/**
 * The slice of an xterm.js Terminal that games use. A real Terminal
 * satisfies it, and so does the Node stdin/stdout adapter.
 */
export interface GameTerminal {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
  onKey(listener: (event: GameKeyEvent) => void): IDisposable;
}

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

export function getTheme(): PhosphorMode {
  return currentTheme;
}

export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}
