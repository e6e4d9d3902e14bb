import { z } from 'zod'
import { getLogger, type LogLevel, type Logger } from '../lib/logger.ts'

export type EnemyKind = 'normal' | 'fast' | 'heavy'

export type EnemyKindConfig = {
  speedModifier: number // added to the level's base speed
  w: number
  h: number
  color: string
}

export const ENEMY_KINDS: Record<EnemyKind, EnemyKindConfig> = {
  normal: { speedModifier: 0, w: 40, h: 30, color: '#ff4040' },
  fast: { speedModifier: 2, w: 35, h: 25, color: '#ffe000' },
  heavy: { speedModifier: -1, w: 50, h: 40, color: '#4a6bff' },
}

const size = z.object({ w: z.number().positive(), h: z.number().positive() })

/** Simulation constants. Velocities and timers are per tick. */
export const GameRulesSchema = z.object({
  screenWidth: z.number().int().positive().default(480),
  screenHeight: z.number().int().positive().default(700),
  playerSpeed: z.number().positive().default(8),
  playerSize: size.default({ w: 50, h: 40 }),
  playerLives: z.number().int().min(1).max(3).default(3),
  invincibilityTicks: z.number().int().nonnegative().default(180),
  shootCooldown: z.number().int().nonnegative().default(10),
  bulletSpeed: z.number().positive().default(10),
  bulletSize: size.default({ w: 5, h: 10 }),
  enemyBaseSpeed: z.number().positive().default(2),
  maxEnemySpeed: z.number().positive().default(8),
  enemySpeedStep: z.number().nonnegative().default(0.5),
  spawnDelay: z.number().int().positive().default(60),
  minSpawnDelay: z.number().int().positive().default(20),
  spawnDelayStep: z.number().int().nonnegative().default(5),
  initialEnemies: z.number().int().nonnegative().default(8),
  scorePerKill: z.literal(10).default(10),
  pointsPerLevel: z.number().int().positive().default(100),
  maxLevel: z.number().int().positive().default(10),
  explosionFrames: z.number().int().positive().default(8),
  explosionFrameTicks: z.number().int().positive().default(3),
})

export type GameRules = z.infer<typeof GameRulesSchema>

export function createRules(overrides: Partial<GameRules> = {}): GameRules {
  return GameRulesSchema.parse(overrides)
}

export const DEFAULT_RULES: GameRules = createRules()

export type RuntimeSettings = {
  fps: number
  soundVolume: number
  musicVolume: number
  muted: boolean
  showFps: boolean
  seed: number | null
  assetBase: string
  logLevel: LogLevel
}

export const DEFAULT_SETTINGS: RuntimeSettings = {
  fps: 60,
  soundVolume: 0.5,
  musicVolume: 0.2,
  muted: false,
  showFps: false,
  seed: null,
  assetBase: '/',
  logLevel: 'info',
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')

const volume = z.coerce.number().min(0).max(1)

type SettingSource<T> = { env: string; schema: z.ZodType<T, z.ZodTypeDef, unknown> }

const settingSources: { [K in keyof RuntimeSettings]: SettingSource<RuntimeSettings[K]> } = {
  fps: { env: 'VITE_FPS', schema: z.coerce.number().int().min(15).max(240) },
  soundVolume: { env: 'VITE_SOUND_VOLUME', schema: volume },
  musicVolume: { env: 'VITE_MUSIC_VOLUME', schema: volume },
  muted: { env: 'VITE_MUTED', schema: flag },
  showFps: { env: 'VITE_SHOW_FPS', schema: flag },
  seed: { env: 'VITE_SEED', schema: z.coerce.number().int().nonnegative() },
  assetBase: { env: 'VITE_ASSET_BASE', schema: z.string().min(1).transform((s) => (s.endsWith('/') ? s : `${s}/`)) },
  logLevel: { env: 'VITE_LOG_LEVEL', schema: z.string().toLowerCase().pipe(z.enum(['debug', 'info', 'warn', 'error'])) },
}

const SETTING_KEYS: (keyof RuntimeSettings)[] = [
  'fps',
  'soundVolume',
  'musicVolume',
  'muted',
  'showFps',
  'seed',
  'assetBase',
  'logLevel',
]

/**
 * Builds runtime settings from `VITE_*` variables. A value that fails
 * validation is logged and the default is kept.
 */
export function readSettings(
  env: Record<string, unknown>,
  log: Logger = getLogger('config'),
): RuntimeSettings {
  const settings: RuntimeSettings = { ...DEFAULT_SETTINGS }
  const apply = <K extends keyof RuntimeSettings>(key: K) => {
    const { env: name, schema } = settingSources[key]
    const raw = env[name]
    if (raw === undefined || raw === '') return
    const parsed = schema.safeParse(raw)
    if (parsed.success) {
      settings[key] = parsed.data
    } else {
      log.warn('ignoring invalid setting', { name, value: raw, issue: parsed.error.issues[0]?.message })
    }
  }
  SETTING_KEYS.forEach(apply)
  return settings
}
