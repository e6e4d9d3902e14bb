import type { EnemyKind, GameRules } from './config.ts'

export type LevelConfig = {
  level: number
  enemySpeed: number // base downward speed, px per tick
  spawnDelay: number // ticks between spawns
  enemyWeights: Record<EnemyKind, number>
}

export const ENEMY_KIND_ORDER: readonly EnemyKind[] = ['normal', 'fast', 'heavy']

function getEnemyWeights(level: number): Record<EnemyKind, number> {
  if (level <= 2) return { normal: 80, fast: 15, heavy: 5 }
  if (level <= 5) return { normal: 60, fast: 25, heavy: 15 }
  return { normal: 50, fast: 30, heavy: 20 }
}

function getEnemySpeed(rules: GameRules, level: number): number {
  return Math.min(rules.maxEnemySpeed, rules.enemyBaseSpeed + (level - 1) * rules.enemySpeedStep)
}

function getSpawnDelay(rules: GameRules, level: number): number {
  return Math.max(rules.minSpawnDelay, rules.spawnDelay - (level - 1) * rules.spawnDelayStep)
}

// One entry per level, 1-based level numbers.
export function buildLevelConfig(rules: GameRules): LevelConfig[] {
  return Array.from({ length: rules.maxLevel }, (_, i) => {
    const level = i + 1
    return {
      level,
      enemySpeed: getEnemySpeed(rules, level),
      spawnDelay: getSpawnDelay(rules, level),
      enemyWeights: getEnemyWeights(level),
    }
  })
}

export function levelForScore(rules: GameRules, score: number): number {
  return Math.min(rules.maxLevel, Math.floor(score / rules.pointsPerLevel) + 1)
}

export function levelAt(levels: readonly LevelConfig[], level: number): LevelConfig {
  const idx = Math.min(levels.length, Math.max(1, level)) - 1
  const cfg = levels[idx]
  if (!cfg) throw new RangeError(`no level table entry for level ${level}`)
  return cfg
}
