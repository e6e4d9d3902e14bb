import { act, cleanup, fireEvent, render, screen } from '@testing-library/react'
import type { ComponentProps } from 'react'
import { afterEach, describe, expect, it, vi } from 'vitest'
import App from '../src/App.tsx'
import type { SoundManager } from '../src/audio/soundManager.ts'
import type { ImageLoader } from '../src/assets/images.ts'
import type GameCanvas from '../src/components/GameCanvas.tsx'
import { DEFAULT_SETTINGS } from '../src/game/config.ts'

type CanvasProps = ComponentProps<typeof GameCanvas>

const canvas = vi.hoisted(() => {
  const holder: { latest?: CanvasProps } = {}
  return holder
})

// The real canvas needs a 2D context jsdom doesn't have; the screens only care about its callbacks
vi.mock('../src/components/GameCanvas.tsx', () => ({
  default: (props: CanvasProps) => {
    canvas.latest = props
    return null
  },
}))

function fakeSound() {
  let muted = false
  return {
    play: vi.fn(),
    playMusic: vi.fn(),
    stopMusic: vi.fn(),
    setMuted: vi.fn((m: boolean) => {
      muted = m
    }),
    get muted() {
      return muted
    },
    missing: new Set<never>(),
    dispose: vi.fn(),
  } satisfies SoundManager
}

const imageLoader: ImageLoader = async () => new Image()

function renderApp() {
  const sound = fakeSound()
  render(<App settings={DEFAULT_SETTINGS} sound={sound} imageLoader={imageLoader} />)
  return { sound }
}

const press = (key: string) => fireEvent.keyDown(window, { key })

function latestCanvas(): CanvasProps {
  const props = canvas.latest
  if (!props) throw new Error('GameCanvas was not rendered')
  return props
}

describe('App', () => {
  afterEach(() => {
    cleanup()
    canvas.latest = undefined
    vi.restoreAllMocks()
  })

  it('opens on the start screen', () => {
    renderApp()
    expect(screen.getByText('Plane Strike')).toBeTruthy()
    expect(screen.getByRole('button', { name: 'PRESS SPACE TO START' })).toBeTruthy()
    expect(canvas.latest).toBeUndefined()
  })

  it('starts a session on space and plays the music', () => {
    const { sound } = renderApp()
    press(' ')

    expect(latestCanvas()).toMatchObject({ running: true, session: 1 })
    expect(screen.getByText('LEVEL 1')).toBeTruthy()
    expect(screen.getByRole('img', { name: 'Lives: 3' })).toBeTruthy()
    expect(sound.playMusic).toHaveBeenCalled()
  })

  it('pauses and resumes on P', () => {
    const { sound } = renderApp()
    press(' ')
    press('p')

    expect(screen.getByText('PAUSED')).toBeTruthy()
    expect(latestCanvas().running).toBe(false)
    expect(sound.stopMusic).toHaveBeenCalled()

    press('P')
    expect(screen.queryByText('PAUSED')).toBeNull()
    expect(latestCanvas().running).toBe(true)
  })

  it('shows progress reported by the canvas', () => {
    renderApp()
    press(' ')
    act(() => latestCanvas().onProgress({ score: 30, level: 1, lives: 2 }))

    expect(screen.getByTestId('score').textContent).toBe('30')
    expect(screen.getByRole('img', { name: 'Lives: 2' })).toBeTruthy()
    expect(screen.getByText('Best: 30')).toBeTruthy()
  })

  it('shows the final score and restarts with a new session', () => {
    renderApp()
    press(' ')
    act(() => latestCanvas().onGameOver({ score: 40, level: 1, lives: 0 }))

    expect(screen.getByText('GAME OVER')).toBeTruthy()
    expect(screen.getByText('Final Score: 40')).toBeTruthy()
    expect(latestCanvas().running).toBe(false)

    fireEvent.click(screen.getByRole('button', { name: 'RESTART' }))
    expect(screen.queryByText('GAME OVER')).toBeNull()
    expect(latestCanvas()).toMatchObject({ running: true, session: 2 })
    expect(screen.getByText('Best: 40')).toBeTruthy()
  })

  it('mutes and unmutes on M', () => {
    const { sound } = renderApp()
    press(' ')
    expect(sound.playMusic).toHaveBeenCalledTimes(1)

    press('m')
    expect(sound.setMuted).toHaveBeenLastCalledWith(true)
    expect(sound.stopMusic).toHaveBeenCalled()
    expect(screen.getByText('MUTED')).toBeTruthy()

    press('M')
    expect(sound.setMuted).toHaveBeenLastCalledWith(false)
    expect(sound.playMusic).toHaveBeenCalledTimes(2)
    expect(screen.queryByText('MUTED')).toBeNull()
  })

  it('toggles the instructions on H', () => {
    renderApp()
    press('h')
    expect(screen.getByText('INSTRUCTIONS')).toBeTruthy()
    expect(screen.queryByRole('button', { name: 'PRESS SPACE TO START' })).toBeNull()

    press('h')
    expect(screen.queryByText('INSTRUCTIONS')).toBeNull()
  })

  it('quits on escape and releases the audio', () => {
    const close = vi.spyOn(window, 'close').mockImplementation(() => {})
    const { sound } = renderApp()
    press(' ')
    press('Escape')

    expect(screen.getByText('THANKS FOR PLAYING')).toBeTruthy()
    expect(sound.dispose).toHaveBeenCalledTimes(1)
    expect(close).toHaveBeenCalledTimes(1)
  })

  it('replaces the game with the fatal screen when the canvas fails', () => {
    const { sound } = renderApp()
    press(' ')
    act(() => latestCanvas().onFatal(new Error('2D canvas context is unavailable')))

    const alert = screen.getByRole('alert')
    expect(alert.textContent).toContain('SOMETHING BROKE')
    expect(alert.textContent).toContain('2D canvas context is unavailable')
    expect(sound.stopMusic).toHaveBeenCalled()
  })
})
