import { AssetError } from '../lib/errors.ts'
import { getLogger, type Logger } from '../lib/logger.ts'
import type { SoundCue } from '../game/world.ts'
import { createSynth, type Synth } from './synth.ts'
import type { SoundName } from './tones.ts'

/** The part of HTMLAudioElement the manager uses. */
export type AudioClip = {
  volume: number
  loop: boolean
  currentTime: number
  readonly paused: boolean
  readonly ended: boolean
  play: () => Promise<void>
  pause: () => void
}

export type ClipFactory = (url: string, onError: () => void) => AudioClip

export const SOUND_FILES: Record<SoundName, string> = {
  shoot: 'sounds/shoot.wav',
  hit: 'sounds/hit.wav',
  explosion: 'sounds/explosion.wav',
  game_over: 'sounds/game_over.wav',
  level_up: 'sounds/level_up.wav',
  music: 'sounds/music.wav',
}

// Overlapping copies per cue, so rapid fire doesn't cut itself off
const POOL_SIZES: Record<SoundCue, number> = {
  shoot: 8,
  explosion: 6,
  hit: 4,
  game_over: 2,
  level_up: 2,
}

export const browserClip: ClipFactory = (url, onError) => {
  const a = new Audio(url)
  a.preload = 'auto'
  a.addEventListener('error', onError, { once: true })
  return a
}

export type SoundManagerOptions = {
  basePath?: string
  soundVolume: number
  musicVolume: number
  muted?: boolean
  createClip?: ClipFactory
  synth?: Synth
  logger?: Logger
}

export type SoundManager = {
  play: (cue: SoundCue) => void
  playMusic: () => void
  stopMusic: () => void
  setMuted: (muted: boolean) => void
  readonly muted: boolean
  readonly missing: ReadonlySet<SoundName>
  dispose: () => void
}

type AudioPool = { play: () => Promise<void>; dispose: () => void }

/**
 * Named sound effects plus a looping background track. A clip that is missing
 * or refuses to play is reported once and then replaced by a synthesized tone;
 * nothing here throws into the game loop.
 */
export function createSoundManager(options: SoundManagerOptions): SoundManager {
  const base = options.basePath ?? '/'
  const createClip = options.createClip ?? browserClip
  const synth = options.synth ?? createSynth()
  const log = options.logger ?? getLogger('sound')
  const missing = new Set<SoundName>()
  let muted = options.muted ?? false

  const reportMissing = (name: SoundName, reason: string) => {
    if (missing.has(name)) return
    missing.add(name)
    const err = new AssetError(base + SOUND_FILES[name], reason)
    log.warn(err.message, { sound: name })
  }

  const fallback = (name: SoundName) => {
    try {
      if (!synth.play(name, options.soundVolume)) log.debug('no audio output, staying silent', { sound: name })
    } catch (error) {
      log.warn('synthesized sound failed', { sound: name, error })
    }
  }

  function createAudioPool(name: SoundCue, size: number): AudioPool {
    let items: AudioClip[] = []
    let idx = 0
    for (let i = 0; i < size; i++) {
      const a = createClip(base + SOUND_FILES[name], () => reportMissing(name, 'failed to load'))
      a.volume = options.soundVolume
      items.push(a)
    }
    const play = async (): Promise<void> => {
      if (missing.has(name) || items.length === 0) {
        fallback(name)
        return
      }
      const cand = items.find((x) => x.ended || x.paused) ?? items[idx]
      idx = (idx + 1) % items.length
      if (!cand) return
      cand.currentTime = 0
      try {
        await cand.play()
      } catch (error) {
        reportMissing(name, error instanceof Error ? error.message : 'playback refused')
        fallback(name)
      }
    }
    const dispose = (): void => {
      items.forEach((a) => a.pause())
      items = []
    }
    return { play, dispose }
  }

  const pools = new Map<SoundCue, AudioPool>()
  for (const [name, size] of Object.entries<number>(POOL_SIZES)) {
    if (isCue(name)) pools.set(name, createAudioPool(name, size))
  }

  const music = createClip(base + SOUND_FILES.music, () => reportMissing('music', 'failed to load'))
  music.loop = true
  music.volume = options.musicVolume

  return {
    play(cue) {
      if (muted) return
      const pool = pools.get(cue)
      if (pool) void pool.play()
    },
    playMusic() {
      if (muted || missing.has('music') || !music.paused) return
      music.play().catch((error: unknown) => {
        // autoplay policies reject until the first key press; that is not a missing file
        log.debug('background music did not start', { error })
      })
    },
    stopMusic() {
      music.pause()
    },
    setMuted(m) {
      muted = m
      if (m) music.pause()
    },
    get muted() {
      return muted
    },
    get missing() {
      return missing
    },
    dispose() {
      pools.forEach((p) => p.dispose())
      pools.clear()
      music.pause()
      synth.dispose()
    },
  }
}

function isCue(name: string): name is SoundCue {
  return name in POOL_SIZES
}
