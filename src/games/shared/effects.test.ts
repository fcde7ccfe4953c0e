import { describe, it, expect } from 'vitest';
import {
  createEffectsState,
  spawnBurst,
  spawnFirework,
  addScorePopup,
  triggerShake,
  triggerFlash,
  isFlashVisible,
  stepEffects,
  MAX_PARTICLES,
} from './effects';

const fixed = (value: number) => () => value;

describe('spawnBurst', () => {
  it('adds the requested number of particles at the origin', () => {
    const state = createEffectsState();
    spawnBurst(state, 10, 5, 6, '\x1b[92m', ['*'], fixed(0));

    expect(state.particles).toHaveLength(6);
    expect(state.particles[0]).toMatchObject({ x: 10, y: 5, char: '*', color: '\x1b[92m', life: 10 });
  });

  it('never exceeds MAX_PARTICLES', () => {
    const state = createEffectsState();
    spawnBurst(state, 0, 0, MAX_PARTICLES - 2, '\x1b[92m');
    spawnBurst(state, 0, 0, 10, '\x1b[92m');
    expect(state.particles).toHaveLength(MAX_PARTICLES);
  });
});

describe('spawnFirework', () => {
  it('adds a ring of twelve particles', () => {
    const state = createEffectsState();
    spawnFirework(state, 20, 8, fixed(0));
    expect(state.particles).toHaveLength(12);
    expect(state.particles[0]).toMatchObject({ char: '★', color: '\x1b[1;93m', life: 20 });
  });
});

describe('stepEffects', () => {
  it('removes particles when their life runs out', () => {
    const state = createEffectsState();
    spawnBurst(state, 0, 0, 3, '\x1b[92m', ['*'], fixed(0));
    for (let i = 0; i < 9; i++) stepEffects(state);
    expect(state.particles).toHaveLength(3);
    stepEffects(state);
    expect(state.particles).toHaveLength(0);
  });

  it('floats popups upward and expires them', () => {
    const state = createEffectsState();
    addScorePopup(state, 4, 10, '+10');
    stepEffects(state);
    expect(state.popups[0]).toMatchObject({ y: 9.75, frames: 17, text: '+10' });
    for (let i = 0; i < 17; i++) stepEffects(state);
    expect(state.popups).toHaveLength(0);
  });

  it('returns a shake offset only while shaking', () => {
    const state = createEffectsState();
    triggerShake(state, 1, 3);
    expect(stepEffects(state, fixed(0))).toEqual({ offsetX: -3, offsetY: -2 });
    expect(stepEffects(state, fixed(0))).toEqual({ offsetX: 0, offsetY: 0 });
  });

  it('strobes the flash while it counts down', () => {
    const state = createEffectsState();
    triggerFlash(state, 5);
    const visible: boolean[] = [];
    for (let i = 0; i < 6; i++) {
      visible.push(isFlashVisible(state));
      stepEffects(state);
    }
    expect(visible).toEqual([true, true, false, false, true, false]);
  });
});
