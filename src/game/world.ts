import { runCollisionPass } from './collision.ts'
import { DEFAULT_RULES, type GameRules } from './config.ts'
import {
  advance,
  createBullet,
  createPlayer,
  isAlive,
  type Bullet,
  type Enemy,
  type Explosion,
  type Player,
} from './entities.ts'
import { buildLevelConfig, levelForScore, type LevelConfig } from './levels.ts'
import type { Random } from './random.ts'
import { createSpawner, spawnEnemy, tickSpawner, type SpawnerState } from './spawner.ts'

export type SoundCue = 'shoot' | 'hit' | 'explosion' | 'game_over' | 'level_up'

export type InputState = {
  left: boolean
  right: boolean
  up: boolean
  down: boolean
  fire: boolean
}

export const NO_INPUT: InputState = { left: false, right: false, up: false, down: false, fire: false }

/** Everything one game session mutates. Passed through `tick`; nothing lives at module scope. */
export type World = {
  rules: GameRules
  levels: LevelConfig[]
  random: Random
  player: Player
  enemies: Enemy[]
  bullets: Bullet[]
  explosions: Explosion[]
  spawner: SpawnerState
  level: number
  ticks: number
  over: boolean
}

export type TickResult = {
  cues: SoundCue[]
  scored: number
  livesLost: number
  levelUp: boolean
  over: boolean
}

export type WorldOptions = {
  rules?: GameRules
  random?: Random
}

export function createWorld(options: WorldOptions = {}): World {
  const rules = options.rules ?? DEFAULT_RULES
  const world: World = {
    rules,
    levels: buildLevelConfig(rules),
    random: options.random ?? Math.random,
    player: createPlayer(rules),
    enemies: [],
    bullets: [],
    explosions: [],
    spawner: createSpawner(),
    level: 1,
    ticks: 0,
    over: false,
  }
  for (let i = 0; i < rules.initialEnemies; i++) spawnEnemy(world)
  return world
}

/** Starts a fresh session on the same world object, keeping rules and random source. */
export function resetWorld(world: World): void {
  const fresh = createWorld({ rules: world.rules, random: world.random })
  Object.assign(world, fresh)
}

const clamp = (v: number, a: number, b: number) => Math.max(a, Math.min(b, v))

export function movePlayer(world: World, input: InputState): void {
  const p = world.player
  const { playerSpeed, screenWidth, screenHeight } = world.rules
  const dx = (input.right ? 1 : 0) - (input.left ? 1 : 0)
  const dy = (input.down ? 1 : 0) - (input.up ? 1 : 0)
  p.vel.x = dx * playerSpeed
  p.vel.y = dy * playerSpeed
  p.pos.x = clamp(p.pos.x + p.vel.x, p.w / 2, screenWidth - p.w / 2)
  p.pos.y = clamp(p.pos.y + p.vel.y, p.h / 2, screenHeight - p.h / 2)
}

/** Fires from the ship's nose when the cooldown allows. */
export function tryFire(world: World, input: InputState): Bullet | null {
  const p = world.player
  if (!input.fire || p.cooldown > 0) return null
  const { h } = world.rules.bulletSize
  const bullet = createBullet(world.rules, { x: p.pos.x, y: p.pos.y - p.h / 2 - h / 2 })
  world.bullets.push(bullet)
  p.cooldown = world.rules.shootCooldown
  return bullet
}

function advanceAll(world: World) {
  const { rules } = world
  for (const b of world.bullets) advance(b, rules)
  for (const e of world.enemies) advance(e, rules)
  for (const x of world.explosions) advance(x, rules)
  world.bullets = world.bullets.filter(isAlive)
  world.enemies = world.enemies.filter(isAlive)
  world.explosions = world.explosions.filter(isAlive)
}

function updateLevel(world: World, out: TickResult) {
  const next = levelForScore(world.rules, world.player.score)
  if (next > world.level) {
    world.level = next
    out.levelUp = true
    out.cues.push('level_up')
  }
}

/**
 * Advances the world one step: player, entities, spawner, collisions,
 * difficulty, game over. A world that is over does nothing until reset.
 */
export function tick(world: World, input: InputState): TickResult {
  const out: TickResult = { cues: [], scored: 0, livesLost: 0, levelUp: false, over: world.over }
  if (world.over) return out

  world.ticks += 1
  const p = world.player
  if (p.invincible > 0) p.invincible -= 1
  if (p.cooldown > 0) p.cooldown -= 1

  movePlayer(world, input)
  if (tryFire(world, input)) out.cues.push('shoot')

  advanceAll(world)
  tickSpawner(world)
  runCollisionPass(world, out)
  updateLevel(world, out)

  if (p.lives <= 0) {
    world.over = true
    p.alive = false
    out.over = true
    out.cues.push('game_over')
  }
  return out
}
