import { boundsOf, createExplosion, isAlive, type Box, type Enemy } from './entities.ts'
import { spawnEnemy } from './spawner.ts'
import type { TickResult, World } from './world.ts'

/** Strict overlap: boxes that only share an edge do not intersect. */
export function rectsIntersect(a: Box, b: Box): boolean {
  return a.x < b.x + b.w && a.x + a.w > b.x && a.y < b.y + b.h && a.y + a.h > b.y
}

function explodeAt(world: World, enemy: Enemy) {
  world.explosions.push(createExplosion(world.rules, enemy.pos, enemy.w, enemy.h))
}

/**
 * Bullet × enemy. Each bullet takes the first live enemy it overlaps; both die,
 * the player scores and a replacement enemy spawns above the screen. Returns
 * the number of enemies destroyed.
 */
export function resolveBulletHits(world: World, out: TickResult): number {
  let kills = 0
  for (const bullet of world.bullets) {
    if (!bullet.alive) continue
    const box = boundsOf(bullet)
    const target = world.enemies.find((e) => e.alive && rectsIntersect(box, boundsOf(e)))
    if (!target) continue
    bullet.alive = false
    target.alive = false
    world.player.score += world.rules.scorePerKill
    out.scored += world.rules.scorePerKill
    explodeAt(world, target)
    out.cues.push('explosion')
    spawnEnemy(world)
    kills += 1
  }
  return kills
}

/**
 * Enemy × player, only while the player is vulnerable. The first overlapping
 * enemy costs a life, is replaced by a fresh spawn and opens the
 * invincibility window, which shields the player from the rest.
 */
export function resolvePlayerHits(world: World, out: TickResult): boolean {
  const p = world.player
  if (p.invincible > 0 || p.lives <= 0) return false
  const box = boundsOf(p)
  const enemy = world.enemies.find((e) => e.alive && rectsIntersect(box, boundsOf(e)))
  if (!enemy) return false
  enemy.alive = false
  p.lives = Math.max(0, p.lives - 1)
  p.invincible = world.rules.invincibilityTicks
  out.livesLost += 1
  explodeAt(world, enemy)
  out.cues.push('hit')
  spawnEnemy(world)
  return true
}

export function runCollisionPass(world: World, out: TickResult): void {
  resolveBulletHits(world, out)
  resolvePlayerHits(world, out)
  world.bullets = world.bullets.filter(isAlive)
  world.enemies = world.enemies.filter(isAlive)
}
