/**
 * Shared Visual Effects
 *
 * Particles, floating score popups, screen shake and hit flash,
 * all in play-area cell coordinates. One EffectsState per game;
 * call stepEffects() once per frame.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface Particle {
  x: number;
  y: number;
  char: string;
  color: string;
  vx: number;
  vy: number;
  life: number;
}

export interface ScorePopup {
  x: number;
  y: number;
  text: string;
  frames: number;
  color: string;
}

export interface EffectsState {
  particles: Particle[];
  popups: ScorePopup[];
  shakeFrames: number;
  shakeIntensity: number;
  flashFrames: number;
}

export interface ShakeOffset {
  offsetX: number;
  offsetY: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Maximum particles alive at once */
export const MAX_PARTICLES = 100;

export const PARTICLE_CHARS = {
  explosion: ['✦', '★', '◆', '×'],
  death: ['✗', '☠', '×', '▓', '░'],
  firework: ['★', '✦', '◆', '●', '✶', '✴', '◇', '♦', '•', '○'],
} as const;

export const FIREWORK_COLORS = [
  '\x1b[1;93m', '\x1b[1;92m', '\x1b[1;96m',
  '\x1b[1;95m', '\x1b[1;91m', '\x1b[1;97m',
];

const POPUP_FRAMES = 18;

export function createEffectsState(): EffectsState {
  return {
    particles: [],
    popups: [],
    shakeFrames: 0,
    shakeIntensity: 0,
    flashFrames: 0,
  };
}

function pick<T>(items: readonly T[], random: () => number): T {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))];
}

// ============================================================================
// PARTICLES
// ============================================================================

/**
 * Radial burst. Stops adding once MAX_PARTICLES are alive.
 */
export function spawnBurst(
  state: EffectsState,
  x: number,
  y: number,
  count: number,
  color: string,
  chars: readonly string[] = PARTICLE_CHARS.explosion,
  random: () => number = Math.random,
): void {
  const room = Math.min(count, MAX_PARTICLES - state.particles.length);
  for (let i = 0; i < room; i++) {
    const angle = (Math.PI * 2 * i) / count + random() * 0.5;
    const speed = 0.2 + random() * 0.4;
    state.particles.push({
      x,
      y,
      char: pick(chars, random),
      color,
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed * 0.5,
      life: 10 + Math.floor(random() * 8),
    });
  }
}

/**
 * Multicolor burst for clearing a wave
 */
export function spawnFirework(
  state: EffectsState,
  x: number,
  y: number,
  random: () => number = Math.random,
): void {
  const count = Math.min(12, MAX_PARTICLES - state.particles.length);
  for (let i = 0; i < count; i++) {
    const angle = (Math.PI * 2 * i) / 12;
    const speed = 0.4 + random() * 0.4;
    state.particles.push({
      x,
      y,
      char: pick(PARTICLE_CHARS.firework, random),
      color: pick(FIREWORK_COLORS, random),
      vx: Math.cos(angle) * speed,
      vy: Math.sin(angle) * speed - 0.2,
      life: 20 + Math.floor(random() * 15),
    });
  }
}

// ============================================================================
// POPUPS, SHAKE, FLASH
// ============================================================================

export function addScorePopup(
  state: EffectsState,
  x: number,
  y: number,
  text: string,
  color: string = '\x1b[1;33m',
): void {
  state.popups.push({ x, y, text, frames: POPUP_FRAMES, color });
}

/**
 * Intensity: 1 light hit, 2 medium, 3-4 big explosion
 */
export function triggerShake(state: EffectsState, frames: number, intensity: number): void {
  state.shakeFrames = frames;
  state.shakeIntensity = intensity;
}

export function triggerFlash(state: EffectsState, frames: number): void {
  state.flashFrames = frames;
}

/**
 * Strobe: visible two frames out of every four
 */
export function isFlashVisible(state: EffectsState): boolean {
  return state.flashFrames > 0 && state.flashFrames % 4 < 2;
}

// ============================================================================
// FRAME STEP
// ============================================================================

/**
 * Age every effect by one frame and return this frame's shake offset.
 */
export function stepEffects(state: EffectsState, random: () => number = Math.random): ShakeOffset {
  for (let i = state.particles.length - 1; i >= 0; i--) {
    const p = state.particles[i];
    p.x += p.vx;
    p.y += p.vy;
    p.vy += 0.02;
    p.life--;
    if (p.life <= 0) state.particles.splice(i, 1);
  }

  for (let i = state.popups.length - 1; i >= 0; i--) {
    const popup = state.popups[i];
    popup.y -= 0.25;
    popup.frames--;
    if (popup.frames <= 0) state.popups.splice(i, 1);
  }

  if (state.flashFrames > 0) state.flashFrames--;

  if (state.shakeFrames > 0) {
    state.shakeFrames--;
    return {
      offsetX: Math.floor((random() - 0.5) * state.shakeIntensity * 2),
      offsetY: Math.floor((random() - 0.5) * state.shakeIntensity),
    };
  }
  return { offsetX: 0, offsetY: 0 };
}
