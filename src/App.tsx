import { useCallback, useEffect, useMemo, useReducer, useRef, useState } from 'react'
import GameCanvas, { type Progress } from './components/GameCanvas.tsx'
import UiHud from './components/UiHud.tsx'
import StartScreen from './components/StartScreen.tsx'
import PauseMenu from './components/PauseMenu.tsx'
import GameOverScreen from './components/GameOverScreen.tsx'
import ExitScreen from './components/ExitScreen.tsx'
import FatalScreen from './components/FatalScreen.tsx'
import { createSoundManager, type SoundManager } from './audio/soundManager.ts'
import { EMPTY_IMAGES, loadImages, type ImageLoader, type ImageSet } from './assets/images.ts'
import { DEFAULT_RULES, type GameRules, type RuntimeSettings } from './game/config.ts'
import { normalizeKey } from './game/input.ts'
import type { FrameScheduler } from './game/loop.ts'
import { seededRandom } from './game/random.ts'
import { initialState, reducer } from './game/state.ts'
import { getLogger } from './lib/logger.ts'

const log = getLogger('app')

type Props = {
  settings: RuntimeSettings
  rules?: GameRules
  sound?: SoundManager
  imageLoader?: ImageLoader
  scheduler?: FrameScheduler
}

export default function App({ settings, rules = DEFAULT_RULES, sound: injectedSound, imageLoader, scheduler }: Props) {
  const [state, dispatch] = useReducer(reducer, undefined, initialState)
  const [images, setImages] = useState<ImageSet>(EMPTY_IMAGES)
  const [fatal, setFatal] = useState<Error | null>(null)
  const [muted, setMuted] = useState(settings.muted)

  const random = useMemo(() => (settings.seed === null ? Math.random : seededRandom(settings.seed)), [settings.seed])

  const soundRef = useRef<SoundManager | null>(null)
  if (soundRef.current === null) {
    soundRef.current =
      injectedSound ??
      createSoundManager({
        basePath: settings.assetBase,
        soundVolume: settings.soundVolume,
        musicVolume: settings.musicVolume,
        muted: settings.muted,
      })
  }
  const sound = soundRef.current

  useEffect(() => {
    let cancelled = false
    loadImages(settings.assetBase, imageLoader).then(
      (set) => {
        if (!cancelled) setImages(set)
      },
      (error: unknown) => log.warn('image loading failed, drawing placeholders', { error }),
    )
    return () => {
      cancelled = true
    }
  }, [settings.assetBase, imageLoader])

  // M toggles; the manager may already match when it was built muted
  useEffect(() => {
    if (sound.muted === muted) return
    sound.setMuted(muted)
    log.info('sound toggled', { muted })
  }, [muted, sound])

  // Background music plays only during gameplay
  useEffect(() => {
    if (state.mode === 'playing' && !muted) sound.playMusic()
    else sound.stopMusic()
  }, [state.mode, muted, sound])

  useEffect(() => {
    if (state.mode !== 'exited') return
    log.info('player quit', { score: state.score })
    sound.dispose()
    // only works for windows the page opened itself; otherwise the exit screen stays
    window.close()
  }, [state.mode, state.score, sound])

  useEffect(() => {
    const onKey = (e: KeyboardEvent) => {
      if (e.repeat) return
      switch (normalizeKey(e.key)) {
        case 'space':
          dispatch({ type: 'START' })
          break
        case 'p':
          dispatch({ type: 'TOGGLE_PAUSE' })
          break
        case 'h':
          dispatch({ type: 'TOGGLE_HELP' })
          break
        case 'escape':
          dispatch({ type: 'EXIT' })
          break
        case 'm':
          setMuted((m) => !m)
          break
      }
    }
    window.addEventListener('keydown', onKey)
    return () => window.removeEventListener('keydown', onKey)
  }, [])

  const onProgress = useCallback((p: Progress) => dispatch({ type: 'PROGRESS', ...p }), [])
  const onGameOver = useCallback((p: Progress) => {
    dispatch({ type: 'PROGRESS', ...p })
    dispatch({ type: 'GAME_OVER' })
  }, [])
  const onFatal = useCallback(
    (err: Error) => {
      log.error('fatal error', { error: err })
      sound.stopMusic()
      setFatal(err)
    },
    [sound],
  )

  if (fatal) return <FatalScreen message={fatal.message} />

  return (
    <div className="min-h-dvh w-full bg-[#0b1021] text-white" style={{ fontFamily: '"Press Start 2P", cursive' }}>
      {state.mode === 'start' && (
        <StartScreen onPlay={() => dispatch({ type: 'START' })} highScore={state.highScore} showHelp={state.showHelp} />
      )}
      {(state.mode === 'playing' || state.mode === 'paused' || state.mode === 'gameover') && (
        <div className="relative h-dvh w-full overflow-hidden">
          <GameCanvas
            running={state.mode === 'playing'}
            session={state.session}
            rules={rules}
            random={random}
            fps={settings.fps}
            showFps={settings.showFps}
            images={images}
            sound={sound}
            scheduler={scheduler}
            onProgress={onProgress}
            onGameOver={onGameOver}
            onFatal={onFatal}
          />
          <UiHud
            score={state.score}
            level={state.level}
            lives={state.lives}
            maxLives={rules.playerLives}
            highScore={state.highScore}
            muted={muted}
          />
          {state.mode === 'paused' && (
            <PauseMenu onResume={() => dispatch({ type: 'TOGGLE_PAUSE' })} onQuit={() => dispatch({ type: 'EXIT' })} />
          )}
          {state.mode === 'gameover' && (
            <GameOverScreen
              score={state.score}
              highScore={state.highScore}
              showHelp={state.showHelp}
              onRestart={() => dispatch({ type: 'START' })}
              onQuit={() => dispatch({ type: 'EXIT' })}
            />
          )}
        </div>
      )}
      {state.mode === 'exited' && <ExitScreen score={state.score} />}
    </div>
  )
}
