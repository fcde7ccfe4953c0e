/**
 * Invaders Engine — Pure Game Logic
 *
 * World state, input intents, bullets, formation stepping,
 * collisions, wave/level progression and the per-frame draw list.
 * Positions are in world units; the renderer projects them onto cells.
 */

// ============================================================================
// Types
// ============================================================================

export type GamePhase = 'playing' | 'gameOver';
export type BulletOwner = 'player' | 'invader';
export type InvaderKind = 0 | 1 | 2;
export type Direction = 1 | -1;

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Player extends Rect {
  lives: number;
  cooldown: number; // Ticks until the next shot is allowed
}

export interface Bullet extends Rect {
  owner: BulletOwner;
  direction: Direction; // -1 = up, 1 = down
}

export interface Invader extends Rect {
  row: number;
  col: number;
  kind: InvaderKind;
  alive: boolean;
}

export interface Formation {
  direction: Direction;
  speed: number;
  descentStep: number;
}

/**
 * Intents sampled once per frame from the input source
 */
export interface InputFrame {
  moveLeft: boolean;
  moveRight: boolean;
  fire: boolean;
  quit: boolean;
}

export type TickEvent =
  | { type: 'fired'; owner: BulletOwner; x: number; y: number }
  | { type: 'invaderDestroyed'; x: number; y: number; kind: InvaderKind; points: number }
  | { type: 'playerHit'; x: number; y: number; livesLeft: number }
  | { type: 'levelCleared'; level: number }
  | { type: 'gameOver'; score: number; level: number };

export interface GameConfig {
  width: number;
  height: number;
  fps: number;

  playerWidth: number;
  playerHeight: number;
  playerBottomOffset: number;
  playerSpeed: number;
  startingLives: number;
  fireCooldown: number;
  respawnCooldown: number;

  bulletWidth: number;
  bulletHeight: number;
  bulletSpeed: number;

  invaderRows: number;
  invaderCols: number;
  invaderWidth: number;
  invaderHeight: number;
  invaderSpacingX: number;
  invaderSpacingY: number;
  invaderPaddingX: number;
  invaderPaddingY: number;
  baseInvaderSpeed: number;
  levelSpeedMultiplier: number;
  descentSpeedMultiplier: number;
  descentStep: number;
  descentStepPerLevel: number;
  edgeMargin: number;
  invasionLineOffset: number;
  pointsPerInvader: number;

  invaderFireInterval: number; // 0 disables invader fire
  invaderBulletSpeed: number;
  maxInvaderBullets: number;
}

export interface GameState {
  config: GameConfig;
  phase: GamePhase;
  player: Player;
  bullets: Bullet[];
  invaders: Invader[];
  formation: Formation;
  score: number;
  level: number;
  tick: number;
  events: TickEvent[];
  random: () => number;
}

export type EntityKind = 'player' | 'invader' | 'playerBullet' | 'invaderBullet';

export interface Renderable extends Rect {
  kind: EntityKind;
  variant: number;
}

export interface DrawList {
  phase: GamePhase;
  entities: Renderable[];
  hud: {
    score: number;
    lives: number;
    level: number;
  };
}

// ============================================================================
// Configuration
// ============================================================================

const FPS = 60;

export const DEFAULT_CONFIG: GameConfig = {
  width: 800,
  height: 600,
  fps: FPS,

  playerWidth: 50,
  playerHeight: 30,
  playerBottomOffset: 60,
  playerSpeed: 5,
  startingLives: 3,
  fireCooldown: Math.floor(FPS / 4),
  respawnCooldown: Math.floor(FPS / 2),

  bulletWidth: 6,
  bulletHeight: 12,
  bulletSpeed: 8,

  invaderRows: 4,
  invaderCols: 8,
  invaderWidth: 40,
  invaderHeight: 30,
  invaderSpacingX: 60,
  invaderSpacingY: 50,
  invaderPaddingX: 60,
  invaderPaddingY: 50,
  baseInvaderSpeed: 1,
  levelSpeedMultiplier: 1.25,
  descentSpeedMultiplier: 1.1,
  descentStep: 20,
  descentStepPerLevel: 2,
  edgeMargin: 10,
  invasionLineOffset: 80,
  pointsPerInvader: 10,

  invaderFireInterval: 90,
  invaderBulletSpeed: 4,
  maxInvaderBullets: 3,
};

export class ConfigError extends Error {
  constructor(
    readonly field: keyof GameConfig,
    message: string,
  ) {
    super(`Invalid config "${field}": ${message}`);
    this.name = 'ConfigError';
  }
}

const POSITIVE_FIELDS: (keyof GameConfig)[] = [
  'width', 'height', 'fps',
  'playerWidth', 'playerHeight', 'playerSpeed',
  'bulletWidth', 'bulletHeight', 'bulletSpeed',
  'invaderWidth', 'invaderHeight', 'invaderSpacingX', 'invaderSpacingY',
  'baseInvaderSpeed', 'invaderBulletSpeed',
];

const INTEGER_FIELDS: (keyof GameConfig)[] = [
  'startingLives', 'fireCooldown', 'respawnCooldown',
  'invaderRows', 'invaderCols', 'invaderFireInterval', 'maxInvaderBullets',
];

/**
 * Merge overrides onto the defaults and reject configurations
 * the simulation cannot run.
 */
export function createConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = { ...DEFAULT_CONFIG, ...overrides };

  for (const field of POSITIVE_FIELDS) {
    const value = config[field];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(field, `must be a positive number, got ${value}`);
    }
  }
  for (const field of INTEGER_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(field, `must be a non-negative integer, got ${value}`);
    }
  }
  if (config.startingLives < 1) {
    throw new ConfigError('startingLives', 'at least one life is required');
  }
  if (config.invaderRows < 1 || config.invaderCols < 1) {
    throw new ConfigError('invaderRows', 'the wave needs at least one invader');
  }
  if (config.levelSpeedMultiplier < 1) {
    throw new ConfigError('levelSpeedMultiplier', 'waves must not get slower');
  }
  if (config.descentSpeedMultiplier < 1) {
    throw new ConfigError('descentSpeedMultiplier', 'descents must not slow the formation');
  }
  if (config.descentStep <= 0 || config.descentStepPerLevel < 0) {
    throw new ConfigError('descentStep', 'descent must move the formation down');
  }
  if (config.playerWidth > config.width) {
    throw new ConfigError('playerWidth', 'player is wider than the world');
  }

  const origin = formationOrigin(config);
  if (origin.x + gridWidth(config) > config.width - config.edgeMargin) {
    throw new ConfigError('invaderCols', 'the wave does not fit between the edge margins');
  }
  const gridBottom = origin.y + (config.invaderRows - 1) * config.invaderSpacingY + config.invaderHeight;
  if (gridBottom >= invasionLine(config)) {
    throw new ConfigError('invaderRows', 'the wave spawns past the invasion line');
  }

  return config;
}

// ============================================================================
// Geometry
// ============================================================================

export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function gridWidth(config: GameConfig): number {
  return (config.invaderCols - 1) * config.invaderSpacingX + config.invaderWidth;
}

function formationOrigin(config: GameConfig): { x: number; y: number } {
  return {
    x: Math.max(config.invaderPaddingX, Math.floor((config.width - gridWidth(config)) / 2)),
    y: config.invaderPaddingY,
  };
}

/**
 * Invaders whose bottom edge reaches this y have landed
 */
export function invasionLine(config: GameConfig): number {
  return config.height - config.invasionLineOffset;
}

// ============================================================================
// Waves
// ============================================================================

/**
 * Horizontal step per tick for a fresh wave. Grows geometrically with
 * level and has no ceiling.
 */
export function waveSpeed(config: GameConfig, level: number): number {
  return config.baseInvaderSpeed * Math.pow(config.levelSpeedMultiplier, level - 1);
}

export function waveDescentStep(config: GameConfig, level: number): number {
  return config.descentStep + config.descentStepPerLevel * (level - 1);
}

function invaderKindForRow(row: number): InvaderKind {
  return row === 0 ? 2 : row === 1 ? 1 : 0;
}

/**
 * Replace the grid with a full wave for the current level
 */
export function spawnWave(state: GameState): void {
  const { config, level } = state;
  const origin = formationOrigin(config);

  state.invaders = [];
  for (let row = 0; row < config.invaderRows; row++) {
    for (let col = 0; col < config.invaderCols; col++) {
      state.invaders.push({
        x: origin.x + col * config.invaderSpacingX,
        y: origin.y + row * config.invaderSpacingY,
        width: config.invaderWidth,
        height: config.invaderHeight,
        row,
        col,
        kind: invaderKindForRow(row),
        alive: true,
      });
    }
  }

  state.formation = {
    direction: 1,
    speed: waveSpeed(config, level),
    descentStep: waveDescentStep(config, level),
  };
}

export function countAlive(invaders: Invader[]): number {
  let count = 0;
  for (const invader of invaders) {
    if (invader.alive) count++;
  }
  return count;
}

// ============================================================================
// State Creation
// ============================================================================

function createPlayer(config: GameConfig): Player {
  return {
    x: Math.floor((config.width - config.playerWidth) / 2),
    y: config.height - config.playerBottomOffset,
    width: config.playerWidth,
    height: config.playerHeight,
    lives: config.startingLives,
    cooldown: 0,
  };
}

export function createGameState(
  config: GameConfig = DEFAULT_CONFIG,
  random: () => number = Math.random,
): GameState {
  const state: GameState = {
    config,
    phase: 'playing',
    player: createPlayer(config),
    bullets: [],
    invaders: [],
    formation: { direction: 1, speed: 0, descentStep: 0 },
    score: 0,
    level: 1,
    tick: 0,
    events: [],
    random,
  };
  spawnWave(state);
  return state;
}

/**
 * Fresh run on the same config and random source (replay)
 */
export function resetGame(state: GameState): GameState {
  return createGameState(state.config, state.random);
}

// ============================================================================
// Input
// ============================================================================

export function canFire(state: GameState): boolean {
  if (state.player.cooldown > 0) return false;
  return !state.bullets.some(b => b.owner === 'player');
}

/**
 * Fire from the cannon. Returns the new bullet, or null while gated.
 */
export function firePlayerBullet(state: GameState): Bullet | null {
  if (!canFire(state)) return null;

  const { player, config } = state;
  const bullet: Bullet = {
    x: player.x + player.width / 2 - config.bulletWidth / 2,
    y: player.y - config.bulletHeight,
    width: config.bulletWidth,
    height: config.bulletHeight,
    owner: 'player',
    direction: -1,
  };
  state.bullets.push(bullet);
  player.cooldown = config.fireCooldown;
  state.events.push({ type: 'fired', owner: 'player', x: bullet.x, y: bullet.y });
  return bullet;
}

export function handleInput(state: GameState, input: InputFrame): void {
  const { player, config } = state;

  const dx = Number(input.moveRight) - Number(input.moveLeft);
  if (dx !== 0) {
    player.x = clamp(player.x + dx * config.playerSpeed, 0, config.width - player.width);
  }

  if (input.fire) {
    firePlayerBullet(state);
  }
}

// ============================================================================
// Movement
// ============================================================================

export function advanceBullets(state: GameState): void {
  const { config } = state;
  state.bullets = state.bullets.filter(bullet => {
    const speed = bullet.owner === 'player' ? config.bulletSpeed : config.invaderBulletSpeed;
    bullet.y += bullet.direction * speed;
    return bullet.y + bullet.height > 0 && bullet.y < config.height;
  });
}

/**
 * Move the formation one fixed step. A step that would cross an edge
 * margin is clamped onto it, then the formation reverses, descends
 * and speeds up.
 */
export function advanceFormation(state: GameState): void {
  const { formation, config } = state;

  let left = Infinity;
  let right = -Infinity;
  for (const invader of state.invaders) {
    if (!invader.alive) continue;
    left = Math.min(left, invader.x);
    right = Math.max(right, invader.x + invader.width);
  }
  if (left === Infinity) return;

  let shift = formation.direction * formation.speed;
  let reversed = false;
  if (formation.direction < 0 && left + shift <= config.edgeMargin) {
    shift = config.edgeMargin - left;
    reversed = true;
  } else if (formation.direction > 0 && right + shift >= config.width - config.edgeMargin) {
    shift = config.width - config.edgeMargin - right;
    reversed = true;
  }

  // Dead invaders move with the grid so cells never collide
  for (const invader of state.invaders) {
    invader.x += shift;
    if (reversed) invader.y += formation.descentStep;
  }

  if (reversed) {
    formation.direction = formation.direction === 1 ? -1 : 1;
    formation.speed *= config.descentSpeedMultiplier;
  }
}

/**
 * Lowest live invader of each column, eligible to shoot
 */
export function frontlineInvaders(invaders: Invader[]): Invader[] {
  const byCol = new Map<number, Invader>();
  for (const invader of invaders) {
    if (!invader.alive) continue;
    const current = byCol.get(invader.col);
    if (!current || invader.y > current.y) byCol.set(invader.col, invader);
  }
  return Array.from(byCol.values());
}

function invaderFire(state: GameState): void {
  const { config } = state;
  if (config.invaderFireInterval === 0 || state.tick % config.invaderFireInterval !== 0) return;

  const inFlight = state.bullets.filter(b => b.owner === 'invader').length;
  if (inFlight >= config.maxInvaderBullets) return;

  const shooters = frontlineInvaders(state.invaders);
  if (shooters.length === 0) return;

  const index = Math.min(shooters.length - 1, Math.floor(state.random() * shooters.length));
  const shooter = shooters[index];
  const bullet: Bullet = {
    x: shooter.x + shooter.width / 2 - config.bulletWidth / 2,
    y: shooter.y + shooter.height,
    width: config.bulletWidth,
    height: config.bulletHeight,
    owner: 'invader',
    direction: 1,
  };
  state.bullets.push(bullet);
  state.events.push({ type: 'fired', owner: 'invader', x: bullet.x, y: bullet.y });
}

export function update(state: GameState): void {
  if (state.player.cooldown > 0) state.player.cooldown--;
  advanceBullets(state);
  advanceFormation(state);
  invaderFire(state);
}

// ============================================================================
// Collisions
// ============================================================================

/**
 * Take one life. With lives left the round restarts on the same level;
 * the last life is left for checkTerminal to end the game.
 */
export function loseLife(state: GameState): void {
  const { player, config } = state;
  player.lives = Math.max(0, player.lives - 1);
  state.events.push({
    type: 'playerHit',
    x: player.x + player.width / 2,
    y: player.y + player.height / 2,
    livesLeft: player.lives,
  });
  if (player.lives === 0) return;

  player.x = Math.floor((config.width - player.width) / 2);
  player.cooldown = config.respawnCooldown;
  state.bullets = [];
  spawnWave(state);
}

export function resolveCollisions(state: GameState): void {
  const { config, player } = state;

  // Player bullets vs invaders: one invader per bullet
  const survivors: Bullet[] = [];
  let playerShot = false;
  for (const bullet of state.bullets) {
    if (bullet.owner === 'invader') {
      if (rectsOverlap(bullet, player)) {
        playerShot = true;
      } else {
        survivors.push(bullet);
      }
      continue;
    }

    const target = state.invaders.find(invader => invader.alive && rectsOverlap(bullet, invader));
    if (!target) {
      survivors.push(bullet);
      continue;
    }
    target.alive = false;
    state.score += config.pointsPerInvader;
    state.events.push({
      type: 'invaderDestroyed',
      x: target.x + target.width / 2,
      y: target.y + target.height / 2,
      kind: target.kind,
      points: config.pointsPerInvader,
    });
  }
  state.bullets = survivors;

  const line = invasionLine(config);
  const invaded = state.invaders.some(
    invader => invader.alive && (rectsOverlap(invader, player) || invader.y + invader.height >= line),
  );

  if (playerShot || invaded) {
    loseLife(state);
  }
}

// ============================================================================
// Terminal Conditions
// ============================================================================

export function checkTerminal(state: GameState): void {
  if (state.phase === 'gameOver') return;

  if (state.player.lives === 0) {
    state.phase = 'gameOver';
    state.events.push({ type: 'gameOver', score: state.score, level: state.level });
    return;
  }

  if (countAlive(state.invaders) === 0) {
    state.level++;
    state.events.push({ type: 'levelCleared', level: state.level });
    spawnWave(state);
  }
}

// ============================================================================
// Tick
// ============================================================================

/**
 * Advance the simulation one step. Game over is terminal: the state is
 * left untouched and no events are produced.
 */
export function tick(state: GameState, input: InputFrame): readonly TickEvent[] {
  if (state.phase === 'gameOver') {
    state.events = [];
    return state.events;
  }

  state.events = [];
  state.tick++;

  handleInput(state, input);
  update(state);
  resolveCollisions(state);
  checkTerminal(state);

  return state.events;
}

// ============================================================================
// Draw List
// ============================================================================

export function buildDrawList(state: GameState): DrawList {
  const entities: Renderable[] = [];

  for (const invader of state.invaders) {
    if (!invader.alive) continue;
    entities.push({
      kind: 'invader',
      x: invader.x,
      y: invader.y,
      width: invader.width,
      height: invader.height,
      variant: invader.kind,
    });
  }

  for (const bullet of state.bullets) {
    entities.push({
      kind: bullet.owner === 'player' ? 'playerBullet' : 'invaderBullet',
      x: bullet.x,
      y: bullet.y,
      width: bullet.width,
      height: bullet.height,
      variant: 0,
    });
  }

  const { player } = state;
  entities.push({
    kind: 'player',
    x: player.x,
    y: player.y,
    width: player.width,
    height: player.height,
    variant: 0,
  });

  return {
    phase: state.phase,
    entities,
    hud: { score: state.score, lives: player.lives, level: state.level },
  };
}
