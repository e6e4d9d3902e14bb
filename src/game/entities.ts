import { ENEMY_KINDS, type EnemyKind, type GameRules } from './config.ts'

export type Vec = { x: number; y: number }

/** Axis-aligned box, top-left corner plus size. */
export type Box = { x: number; y: number; w: number; h: number }

// Shared by every entity: centre position, per-tick velocity, box size.
type Body = { pos: Vec; vel: Vec; w: number; h: number; alive: boolean }

export type Player = Body & {
  kind: 'player'
  lives: number
  score: number
  invincible: number // ticks left, 0 = vulnerable
  cooldown: number // ticks until the next shot
}

export type Enemy = Body & { kind: 'enemy'; type: EnemyKind }

export type Bullet = Body & { kind: 'bullet' }

export type Explosion = Body & {
  kind: 'explosion'
  frame: number
  frameTicks: number // ticks left on the current frame
}

export type Entity = Player | Enemy | Bullet | Explosion

export function createPlayer(rules: GameRules): Player {
  const { w, h } = rules.playerSize
  return {
    kind: 'player',
    pos: { x: rules.screenWidth / 2, y: rules.screenHeight - 10 - h / 2 },
    vel: { x: 0, y: 0 },
    w,
    h,
    alive: true,
    lives: rules.playerLives,
    score: 0,
    invincible: 0,
    cooldown: 0,
  }
}

export function createEnemy(type: EnemyKind, pos: Vec, vel: Vec): Enemy {
  const { w, h } = ENEMY_KINDS[type]
  return { kind: 'enemy', type, pos: { ...pos }, vel: { ...vel }, w, h, alive: true }
}

export function createBullet(rules: GameRules, pos: Vec, vel: Vec = { x: 0, y: -rules.bulletSpeed }): Bullet {
  const { w, h } = rules.bulletSize
  return { kind: 'bullet', pos: { ...pos }, vel: { ...vel }, w, h, alive: true }
}

export function createExplosion(rules: GameRules, at: Vec, w: number, h: number): Explosion {
  return {
    kind: 'explosion',
    pos: { ...at },
    vel: { x: 0, y: 0 },
    w,
    h,
    alive: true,
    frame: 0,
    frameTicks: rules.explosionFrameTicks,
  }
}

export function boundsOf(e: Body): Box {
  return { x: e.pos.x - e.w / 2, y: e.pos.y - e.h / 2, w: e.w, h: e.h }
}

export function isAlive(e: Entity): boolean {
  return e.alive
}

/**
 * Moves an entity one tick and updates its liveness. The player is driven by
 * input instead, see `movePlayer` in world.ts.
 */
export function advance(e: Entity, rules: GameRules): void {
  switch (e.kind) {
    case 'bullet':
      e.pos.x += e.vel.x
      e.pos.y += e.vel.y
      if (e.pos.y + e.h / 2 < 0) e.alive = false
      break
    case 'enemy': {
      e.pos.x += e.vel.x
      e.pos.y += e.vel.y
      const left = e.pos.x - e.w / 2
      const right = e.pos.x + e.w / 2
      if (left < 0 || right > rules.screenWidth) e.vel.x = -e.vel.x
      if (e.pos.y - e.h / 2 > rules.screenHeight) e.alive = false
      break
    }
    case 'explosion':
      e.frameTicks -= 1
      if (e.frameTicks <= 0) {
        e.frame += 1
        e.frameTicks = rules.explosionFrameTicks
      }
      if (e.frame >= rules.explosionFrames) e.alive = false
      break
    case 'player':
      break
  }
}
