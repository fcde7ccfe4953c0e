import { describe, it, expect } from 'vitest';
import {
  navigateMenu,
  checkShortcut,
  renderSimpleMenu,
  PAUSE_MENU_ITEMS,
  type SimpleMenuItem,
} from './menu';

describe('navigateMenu', () => {
  it('moves down with ArrowDown and s', () => {
    expect(navigateMenu(0, 3, 'ArrowDown')).toEqual({ newSelection: 1, confirmed: false });
    expect(navigateMenu(1, 3, 's')).toEqual({ newSelection: 2, confirmed: false });
  });

  it('moves up with ArrowUp and w', () => {
    expect(navigateMenu(2, 3, 'ArrowUp').newSelection).toBe(1);
    expect(navigateMenu(1, 3, 'W').newSelection).toBe(0);
  });

  it('wraps at both ends', () => {
    expect(navigateMenu(0, 3, 'ArrowUp').newSelection).toBe(2);
    expect(navigateMenu(2, 3, 'ArrowDown').newSelection).toBe(0);
  });

  it('confirms with Enter and Space', () => {
    expect(navigateMenu(1, 3, 'Enter')).toEqual({ newSelection: 1, confirmed: true });
    expect(navigateMenu(1, 3, ' ').confirmed).toBe(true);
  });

  it('leaves the selection alone for other keys', () => {
    expect(navigateMenu(1, 3, 'x')).toEqual({ newSelection: 1, confirmed: false });
  });
});

describe('checkShortcut', () => {
  it('matches shortcuts case-insensitively', () => {
    expect(checkShortcut(PAUSE_MENU_ITEMS, 'r')).toBe(1);
    expect(checkShortcut(PAUSE_MENU_ITEMS, 'Q')).toBe(2);
    expect(checkShortcut(PAUSE_MENU_ITEMS, 'Escape')).toBe(-1);
  });

  it('skips items without shortcuts', () => {
    const items: SimpleMenuItem[] = [{ label: 'NONE' }, { label: 'GO', shortcut: 'G' }];
    expect(checkShortcut(items, 'g')).toBe(1);
    expect(checkShortcut(items, 'n')).toBe(-1);
  });
});

describe('PAUSE_MENU_ITEMS', () => {
  it('offers resume, restart and quit', () => {
    expect(PAUSE_MENU_ITEMS.map(item => item.label)).toEqual(['RESUME', 'RESTART', 'QUIT']);
  });
});

describe('renderSimpleMenu', () => {
  it('highlights the selected item and centres each line', () => {
    const items: SimpleMenuItem[] = [{ label: 'AB' }, { label: 'CD', shortcut: 'C' }];
    const output = renderSimpleMenu(items, 0, { centerX: 20, startY: 5 });

    // '► AB ◄' is 6 wide, '  CD [C]  ' is 10 wide
    expect(output).toBe(
      '\x1b[5;17H\x1b[1;93m► AB ◄\x1b[0m' +
      '\x1b[6;15H\x1b[2m\x1b[96m  CD [C]  \x1b[0m',
    );
  });

  it('can hide shortcuts', () => {
    const output = renderSimpleMenu(PAUSE_MENU_ITEMS, 2, { centerX: 20, startY: 1, showShortcuts: false });
    expect(output).toContain('► QUIT ◄');
    expect(output).not.toContain('[Q]');
  });
});
