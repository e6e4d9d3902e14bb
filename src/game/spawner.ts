import { ENEMY_KINDS } from './config.ts'
import { createEnemy, type Enemy } from './entities.ts'
import { ENEMY_KIND_ORDER, levelAt } from './levels.ts'
import { pickWeighted, randInt } from './random.ts'
import type { World } from './world.ts'

export type SpawnerState = { timer: number }

export function createSpawner(): SpawnerState {
  return { timer: 0 }
}

/** Places a new enemy just above the top edge at a random column. */
export function spawnEnemy(world: World): Enemy {
  const { rules, random } = world
  const cfg = levelAt(world.levels, world.level)
  const type = pickWeighted(random, ENEMY_KIND_ORDER, cfg.enemyWeights, 'normal')
  const { w, h, speedModifier } = ENEMY_KINDS[type]
  const left = randInt(random, 0, Math.max(0, rules.screenWidth - w))
  const top = randInt(random, -100, -41)
  const vy = cfg.enemySpeed + speedModifier + randInt(random, 0, 1)
  const vx = randInt(random, -1, 1)
  const enemy = createEnemy(type, { x: left + w / 2, y: top + h / 2 }, { x: vx, y: vy })
  world.enemies.push(enemy)
  return enemy
}

/** Counts one tick; spawns when the level's delay has elapsed. */
export function tickSpawner(world: World): Enemy | null {
  const s = world.spawner
  s.timer += 1
  if (s.timer < levelAt(world.levels, world.level).spawnDelay) return null
  s.timer = 0
  return spawnEnemy(world)
}
