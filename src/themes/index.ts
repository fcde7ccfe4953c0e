/**
 * Terminal color themes
 *
 * Phosphor-style accent colors as ANSI escape codes.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'bladerunner'
  | 'daylight';

/**
 * ANSI escape codes for terminal text coloring
 */
const ansiCodes: Record<PhosphorMode, string> = {
  cyan: '\x1b[96m',
  amber: '\x1b[93m',
  green: '\x1b[92m',
  white: '\x1b[97m',
  hotpink: '\x1b[95m',
  blood: '\x1b[91m',
  bladerunner: '\x1b[38;5;208m',
  daylight: '\x1b[34m',
};

const THEME_MODES = Object.keys(ansiCodes);

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return ansiCodes[mode];
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return THEME_MODES.filter(isValidThemeMode);
}

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return Object.prototype.hasOwnProperty.call(ansiCodes, value);
}
