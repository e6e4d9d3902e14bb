import { getLogger, type Logger } from '../lib/logger.ts'
import { renderTone, type SoundName, type ToneSpec, SOUND_TONES } from './tones.ts'

export type Synth = {
  /** Returns false when no audio context is available. */
  play: (name: SoundName, volume: number) => boolean
  dispose: () => void
}

type AudioContextCtor = new () => AudioContext

function findAudioContext(): AudioContextCtor | undefined {
  return typeof globalThis.AudioContext === 'function' ? globalThis.AudioContext : undefined
}

function playOscillator(ctx: AudioContext, spec: Extract<ToneSpec, { shape: 'beep' | 'sweep' }>, volume: number) {
  const t0 = ctx.currentTime
  const osc = ctx.createOscillator()
  osc.type = spec.wave
  if (spec.shape === 'beep') {
    osc.frequency.value = spec.freq
  } else {
    osc.frequency.setValueAtTime(spec.from, t0)
    osc.frequency.exponentialRampToValueAtTime(spec.to, t0 + spec.duration)
  }
  const gain = ctx.createGain()
  const level = spec.gain * volume
  gain.gain.setValueAtTime(Math.max(0.0001, level), t0)
  gain.gain.exponentialRampToValueAtTime(0.001, t0 + spec.duration)
  osc.connect(gain).connect(ctx.destination)
  osc.start(t0)
  osc.stop(t0 + spec.duration)
}

function playBuffer(ctx: AudioContext, spec: ToneSpec, volume: number) {
  const samples = renderTone(spec, ctx.sampleRate)
  const buffer = ctx.createBuffer(1, samples.length, ctx.sampleRate)
  buffer.copyToChannel(samples, 0)
  const src = ctx.createBufferSource()
  src.buffer = buffer
  const gain = ctx.createGain()
  gain.gain.value = volume
  src.connect(gain).connect(ctx.destination)
  src.start()
}

/**
 * Web Audio stand-in for sound files that failed to load. The context is
 * created lazily on first use, since browsers only allow it after a gesture.
 */
export function createSynth(
  ctor: AudioContextCtor | undefined = findAudioContext(),
  log: Logger = getLogger('synth'),
): Synth {
  let ctx: AudioContext | null = null

  const ensure = (): AudioContext | null => {
    if (!ctor) return null
    if (!ctx) ctx = new ctor()
    if (ctx.state === 'suspended') {
      ctx.resume().catch((error: unknown) => log.debug('audio context not resumed yet', { error }))
    }
    return ctx
  }

  return {
    play(name, volume) {
      const c = ensure()
      if (!c) return false
      const spec = SOUND_TONES[name]
      if (spec.shape === 'beep' || spec.shape === 'sweep') playOscillator(c, spec, volume)
      else playBuffer(c, spec, volume)
      return true
    },
    dispose() {
      ctx?.close().catch((error: unknown) => log.debug('audio context close failed', { error }))
      ctx = null
    },
  }
}
