/**
 * Shared Menu Helpers
 *
 * Index-based menu navigation (arrow keys / W S + Enter or Space)
 * with single-key shortcuts.
 */

import { getCurrentThemeColor } from '../utils';

export interface SimpleMenuItem {
  label: string;
  shortcut?: string; // e.g., 'ESC', 'R', 'Q'
}

/**
 * Pause menu entries, in display order
 */
export const PAUSE_MENU_ITEMS: SimpleMenuItem[] = [
  { label: 'RESUME', shortcut: 'ESC' },
  { label: 'RESTART', shortcut: 'R' },
  { label: 'QUIT', shortcut: 'Q' },
];

/**
 * Handle menu navigation without callbacks
 * Returns new selection index and whether it was confirmed
 */
export function navigateMenu(
  currentSelection: number,
  itemCount: number,
  key: string,
): { newSelection: number; confirmed: boolean } {
  let newSelection = currentSelection;
  let confirmed = false;
  const lower = key.toLowerCase();

  if (key === 'ArrowUp' || lower === 'w') {
    newSelection = (currentSelection - 1 + itemCount) % itemCount;
  } else if (key === 'ArrowDown' || lower === 's') {
    newSelection = (currentSelection + 1) % itemCount;
  } else if (key === 'Enter' || key === ' ') {
    confirmed = true;
  }

  return { newSelection, confirmed };
}

/**
 * Index of the item whose shortcut matches the key, or -1
 */
export function checkShortcut(items: SimpleMenuItem[], key: string): number {
  const lower = key.toLowerCase();
  for (let i = 0; i < items.length; i++) {
    const shortcut = items[i].shortcut;
    if (shortcut && lower === shortcut.toLowerCase()) {
      return i;
    }
  }
  return -1;
}

/**
 * Render a simple menu (index-based, no callbacks)
 * Returns ANSI escape sequence string
 */
export function renderSimpleMenu(
  items: SimpleMenuItem[],
  selection: number,
  options: {
    centerX: number;
    startY: number;
    showShortcuts?: boolean;
  },
): string {
  const themeColor = getCurrentThemeColor();
  const { centerX, startY, showShortcuts = true } = options;

  let output = '';

  items.forEach((item, i) => {
    const isSelected = i === selection;

    let displayText = item.label;
    if (showShortcuts && item.shortcut) {
      displayText += ` [${item.shortcut}]`;
    }

    const text = isSelected ? `► ${displayText} ◄` : `  ${displayText}  `;
    const style = isSelected ? '\x1b[1;93m' : `\x1b[2m${themeColor}`;

    const itemX = centerX - Math.floor(text.length / 2);
    output += `\x1b[${startY + i};${itemX}H${style}${text}\x1b[0m`;
  });

  return output;
}
