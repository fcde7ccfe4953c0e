import { describe, it, expect } from 'vitest';
import { createInputTracker, mapKey, parseKey } from './input';

describe('parseKey', () => {
  it('decodes arrow escape sequences', () => {
    expect(parseKey('\x1b[D')).toBe('ArrowLeft');
    expect(parseKey('\x1bOC')).toBe('ArrowRight');
    expect(parseKey('\x1b[A')).toBe('ArrowUp');
  });

  it('decodes enter, escape and ctrl+c', () => {
    expect(parseKey('\r')).toBe('Enter');
    expect(parseKey('\x1b')).toBe('Escape');
    expect(parseKey('\x03')).toBe('q');
  });

  it('passes printable keys through', () => {
    expect(parseKey(' ')).toBe(' ');
    expect(parseKey('a')).toBe('a');
  });
});

describe('mapKey', () => {
  it('maps arrows and WASD to movement', () => {
    expect(mapKey('ArrowLeft')).toBe('left');
    expect(mapKey('A')).toBe('left');
    expect(mapKey('d')).toBe('right');
  });

  it('maps fire, quit and pause', () => {
    expect(mapKey(' ')).toBe('fire');
    expect(mapKey('Q')).toBe('quit');
    expect(mapKey('Escape')).toBe('pause');
  });

  it('ignores everything else', () => {
    expect(mapKey('x')).toBeNull();
    expect(mapKey('Enter')).toBeNull();
  });
});

describe('createInputTracker', () => {
  it('holds a movement key for the hold window', () => {
    const input = createInputTracker(80);
    input.press('ArrowLeft', 1000);

    expect(input.poll(1000).moveLeft).toBe(true);
    expect(input.poll(1079).moveLeft).toBe(true);
    expect(input.poll(1080).moveLeft).toBe(false);
  });

  it('releases the opposite direction on press', () => {
    const input = createInputTracker(80);
    input.press('a', 1000);
    input.press('d', 1010);

    const polled = input.poll(1020);
    expect(polled.moveLeft).toBe(false);
    expect(polled.moveRight).toBe(true);
  });

  it('reports fire once per press', () => {
    const input = createInputTracker();
    input.press(' ', 0);

    expect(input.poll(1).fire).toBe(true);
    expect(input.poll(2).fire).toBe(false);
  });

  it('latches quit and pause until polled', () => {
    const input = createInputTracker();
    input.press('q', 0);
    input.press('Escape', 0);

    expect(input.poll(500)).toEqual({
      moveLeft: false,
      moveRight: false,
      fire: false,
      quit: true,
      pause: true,
    });
    expect(input.poll(501).quit).toBe(false);
  });

  it('forgets everything on reset', () => {
    const input = createInputTracker();
    input.press('ArrowRight', 0);
    input.press(' ', 0);
    input.reset();

    const polled = input.poll(1);
    expect(polled.moveRight).toBe(false);
    expect(polled.fire).toBe(false);
  });
});
