import { vi } from 'vitest'
import { createRules } from '../src/game/config.ts'
import { createBullet, createEnemy, type Vec } from '../src/game/entities.ts'
import { seededRandom } from '../src/game/random.ts'
import type { FrameScheduler } from '../src/game/loop.ts'
import { createWorld, type World } from '../src/game/world.ts'
import type { Logger } from '../src/lib/logger.ts'

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

// No starting enemies and no timed spawns within a test's horizon
export const quietRules = createRules({ initialEnemies: 0, spawnDelay: 1000 })

export function quietWorld(seed = 1): World {
  return createWorld({ rules: quietRules, random: seededRandom(seed) })
}

export function addEnemy(world: World, pos: Vec, vel: Vec = { x: 0, y: 0 }) {
  const e = createEnemy('normal', pos, vel)
  world.enemies.push(e)
  return e
}

export function addBullet(world: World, pos: Vec, vel: Vec = { x: 0, y: 0 }) {
  const b = createBullet(world.rules, pos, vel)
  world.bullets.push(b)
  return b
}

/** Frame scheduler driven by hand: `frame(t)` runs whatever is queued at time t. */
export class ManualScheduler implements FrameScheduler {
  private pending = new Map<number, (time: number) => void>()
  private nextId = 1
  time = 0

  now = () => this.time
  request = (cb: (time: number) => void) => {
    const id = this.nextId++
    this.pending.set(id, cb)
    return id
  }
  cancel = (handle: number) => {
    this.pending.delete(handle)
  }

  get queued() {
    return this.pending.size
  }

  frame(time: number) {
    this.time = time
    const due = [...this.pending.values()]
    this.pending.clear()
    due.forEach((cb) => cb(time))
  }
}
