import { useEffect, useRef } from 'react'
import type { SoundManager } from '../audio/soundManager.ts'
import type { ImageSet } from '../assets/images.ts'
import type { GameRules } from '../game/config.ts'
import { normalizeKey, readInput, type KeyMap } from '../game/input.ts'
import { createFixedStepLoop, type FrameScheduler } from '../game/loop.ts'
import type { Random } from '../game/random.ts'
import { drawWorld, type Painter } from '../game/render.ts'
import { createWorld, resetWorld, tick, type World } from '../game/world.ts'
import { FatalGameError } from '../lib/errors.ts'
import { getLogger } from '../lib/logger.ts'

const log = getLogger('canvas')

// keys the page would otherwise scroll on
const CAPTURED = new Set(['arrowleft', 'arrowright', 'arrowup', 'arrowdown', 'space'])

export type Progress = { score: number; level: number; lives: number }

type Props = {
  running: boolean
  session: number
  rules: GameRules
  random: Random
  fps: number
  showFps: boolean
  images: ImageSet
  sound: SoundManager
  onProgress: (progress: Progress) => void
  onGameOver: (progress: Progress) => void
  onFatal: (err: Error) => void
  scheduler?: FrameScheduler
  contextFor?: (canvas: HTMLCanvasElement) => Painter | null
}

const context2d = (canvas: HTMLCanvasElement): Painter | null => canvas.getContext('2d')

export default function GameCanvas(props: Readonly<Props>) {
  const { running, session, rules, random, fps, showFps, scheduler, contextFor = context2d } = props
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const scaleRef = useRef(1)
  const keysRef = useRef<KeyMap>({})
  const worldRef = useRef<World | null>(null)
  // latest props for the loop callbacks without restarting the loop
  const propsRef = useRef(props)
  propsRef.current = props

  if (worldRef.current === null) worldRef.current = createWorld({ rules, random })

  // Responsive resize: fit window while preserving aspect, scale draw only
  useEffect(() => {
    const canvas = canvasRef.current
    if (!canvas) return
    const onResize = () => {
      const dpr = window.devicePixelRatio || 1
      const scale = Math.max(0.5, Math.min(window.innerWidth / rules.screenWidth, window.innerHeight / rules.screenHeight))
      scaleRef.current = scale
      canvas.width = Math.floor(rules.screenWidth * scale * dpr)
      canvas.height = Math.floor(rules.screenHeight * scale * dpr)
      canvas.style.width = Math.floor(rules.screenWidth * scale) + 'px'
      canvas.style.height = Math.floor(rules.screenHeight * scale) + 'px'
    }
    onResize()
    window.addEventListener('resize', onResize)
    return () => window.removeEventListener('resize', onResize)
  }, [rules])

  // Input handling
  useEffect(() => {
    const down = (e: KeyboardEvent) => {
      const k = normalizeKey(e.key)
      if (CAPTURED.has(k)) e.preventDefault()
      keysRef.current[k] = true
    }
    const up = (e: KeyboardEvent) => {
      keysRef.current[normalizeKey(e.key)] = false
    }
    const clear = () => {
      keysRef.current = {}
    }
    window.addEventListener('keydown', down)
    window.addEventListener('keyup', up)
    window.addEventListener('blur', clear)
    return () => {
      window.removeEventListener('keydown', down)
      window.removeEventListener('keyup', up)
      window.removeEventListener('blur', clear)
    }
  }, [])

  // New session (start or restart): fresh world, no held keys carried over
  useEffect(() => {
    const world = worldRef.current
    if (world && session > 0 && world.ticks > 0) resetWorld(world)
    keysRef.current = {}
    log.debug('session started', { session })
  }, [session])

  // Main loop, only while playing
  useEffect(() => {
    if (!running) return
    const canvas = canvasRef.current
    const ctx = canvas ? contextFor(canvas) : null
    const world = worldRef.current
    if (!ctx || !world) {
      propsRef.current.onFatal(new FatalGameError('2D canvas context is unavailable'))
      return
    }

    const snapshot = (w: World) => ({ score: w.player.score, level: w.level, lives: w.player.lives })

    const loop = createFixedStepLoop({
      fps,
      scheduler,
      onTick: () => {
        const res = tick(world, readInput(keysRef.current))
        const p = propsRef.current
        res.cues.forEach((cue) => p.sound.play(cue))
        if (res.scored > 0 || res.livesLost > 0 || res.levelUp) p.onProgress(snapshot(world))
        if (res.over) {
          loop.stop()
          p.onGameOver(snapshot(world))
        }
      },
      onFrame: ({ fps: measured }) => {
        drawWorld(ctx, world, propsRef.current.images, {
          scale: scaleRef.current,
          dpr: window.devicePixelRatio || 1,
          showFps,
          fps: measured,
        })
      },
      onError: (err) => {
        const fatal = new FatalGameError('game loop crashed', { cause: err })
        log.error(fatal.message, { error: err })
        propsRef.current.onFatal(fatal)
      },
    })
    loop.start()
    return () => loop.stop()
  }, [running, fps, showFps, scheduler, contextFor])

  return (
    <div className="relative flex h-full w-full items-center justify-center select-none">
      <canvas ref={canvasRef} className="block mx-auto" style={{ touchAction: 'none' }} />
    </div>
  )
}
