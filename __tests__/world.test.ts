import { describe, expect, it } from 'vitest'
import { DEFAULT_RULES } from '../src/game/config.ts'
import { seededRandom } from '../src/game/random.ts'
import { createWorld, NO_INPUT, resetWorld, tick, type InputState } from '../src/game/world.ts'
import { addBullet, addEnemy, quietWorld } from './helpers.ts'

const hold = (keys: Partial<InputState>): InputState => ({ ...NO_INPUT, ...keys })

describe('createWorld', () => {
  it('starts a session with the ship at the bottom centre and the opening wave', () => {
    const world = createWorld({ random: seededRandom(3) })
    expect(world.player.pos).toEqual({ x: 240, y: 670 })
    expect(world.player.lives).toBe(3)
    expect(world.player.score).toBe(0)
    expect(world.player.invincible).toBe(0)
    expect(world.enemies).toHaveLength(DEFAULT_RULES.initialEnemies)
    expect(world.level).toBe(1)
    expect(world.over).toBe(false)
  })
})

describe('player movement', () => {
  it('stops at the left and top edges', () => {
    const world = quietWorld()
    for (let i = 0; i < 100; i++) tick(world, hold({ left: true, up: true }))
    expect(world.player.pos).toEqual({ x: 25, y: 20 })
  })

  it('stops at the right and bottom edges', () => {
    const world = quietWorld()
    for (let i = 0; i < 100; i++) tick(world, hold({ right: true, down: true }))
    expect(world.player.pos).toEqual({ x: 455, y: 680 })
  })

  it('never leaves the screen under random input', () => {
    const world = createWorld({ random: seededRandom(11) })
    const keys = seededRandom(99)
    for (let i = 0; i < 2000; i++) {
      tick(world, {
        left: keys() < 0.5,
        right: keys() < 0.5,
        up: keys() < 0.5,
        down: keys() < 0.5,
        fire: keys() < 0.5,
      })
      const { x, y } = world.player.pos
      expect(x).toBeGreaterThanOrEqual(0)
      expect(x).toBeLessThanOrEqual(world.rules.screenWidth)
      expect(y).toBeGreaterThanOrEqual(0)
      expect(y).toBeLessThanOrEqual(world.rules.screenHeight)
      expect(world.player.lives).toBeGreaterThanOrEqual(0)
      expect(world.player.lives).toBeLessThanOrEqual(3)
    }
  })
})

describe('firing', () => {
  it('launches a bullet from the nose of the ship', () => {
    const world = quietWorld()
    const res = tick(world, hold({ fire: true }))
    expect(res.cues).toEqual(['shoot'])
    expect(world.bullets).toHaveLength(1)
    // spawned at y 645 and already moved one step
    expect(world.bullets[0]?.pos).toEqual({ x: 240, y: 635 })
  })

  it('waits out the cooldown between shots', () => {
    const world = quietWorld()
    for (let i = 0; i < 10; i++) tick(world, hold({ fire: true }))
    expect(world.bullets).toHaveLength(1)
    tick(world, hold({ fire: true }))
    expect(world.bullets).toHaveLength(2)
  })

  it('drops bullets that leave the top of the screen', () => {
    const world = quietWorld()
    addBullet(world, { x: 100, y: 8 }, { x: 0, y: -10 })
    tick(world, NO_INPUT)
    expect(world.bullets).toHaveLength(1)
    tick(world, NO_INPUT)
    expect(world.bullets).toHaveLength(0)
  })
})

describe('enemies', () => {
  it('are dropped once they pass the bottom edge', () => {
    const world = quietWorld()
    addEnemy(world, { x: 100, y: 710 }, { x: 0, y: 5 })
    tick(world, NO_INPUT)
    expect(world.enemies).toHaveLength(1)
    tick(world, NO_INPUT)
    expect(world.enemies).toHaveLength(0)
    expect(world.player.lives).toBe(3)
  })

  it('bounce off the side walls', () => {
    const world = quietWorld()
    const e = addEnemy(world, { x: 21, y: 100 }, { x: -2, y: 0 })
    tick(world, NO_INPUT)
    expect(e.pos.x).toBe(19)
    expect(e.vel.x).toBe(2)
  })
})

describe('difficulty', () => {
  it('raises the level when the score crosses a hundred', () => {
    const world = quietWorld()
    world.player.score = 90
    addEnemy(world, { x: 100, y: 300 })
    addBullet(world, { x: 100, y: 300 })

    const res = tick(world, NO_INPUT)

    expect(world.player.score).toBe(100)
    expect(world.level).toBe(2)
    expect(res.levelUp).toBe(true)
    expect(res.cues).toEqual(['explosion', 'level_up'])
  })
})

describe('game over', () => {
  it('ends the session on the last life and freezes the world', () => {
    const world = quietWorld()
    world.player.lives = 1
    const { x, y } = world.player.pos
    addEnemy(world, { x, y })

    const res = tick(world, NO_INPUT)
    expect(res.over).toBe(true)
    expect(res.cues).toEqual(['hit', 'game_over'])
    expect(world.over).toBe(true)
    expect(world.player.lives).toBe(0)

    const ticks = world.ticks
    const after = tick(world, hold({ right: true, fire: true }))
    expect(after.over).toBe(true)
    expect(after.cues).toEqual([])
    expect(world.player.pos).toEqual({ x, y })
    expect(world.bullets).toHaveLength(0)
    expect(world.ticks).toBe(ticks)
  })

  it('starts over on reset with the same rules and random source', () => {
    const world = quietWorld()
    const { random, rules } = world
    world.player.lives = 0
    world.player.score = 70
    world.over = true

    resetWorld(world)

    expect(world.over).toBe(false)
    expect(world.player.lives).toBe(3)
    expect(world.player.score).toBe(0)
    expect(world.random).toBe(random)
    expect(world.rules).toBe(rules)
    expect(world.enemies).toHaveLength(0)
  })
})
