import type { Random } from '../game/random.ts'
import type { SoundCue } from '../game/world.ts'

export type SoundName = SoundCue | 'music'

export type Waveform = 'sine' | 'square' | 'triangle' | 'sawtooth'

/** How a sound is synthesized when its file is missing, and how the asset script renders it. */
export type ToneSpec =
  | { shape: 'beep'; freq: number; duration: number; wave: Waveform; gain: number }
  | { shape: 'sweep'; from: number; to: number; duration: number; wave: Waveform; gain: number }
  | { shape: 'noise'; duration: number; gain: number }
  | { shape: 'melody'; notes: number[]; noteDuration: number; wave: Waveform; gain: number }

export const SOUND_TONES: Record<SoundName, ToneSpec> = {
  shoot: { shape: 'beep', freq: 800, duration: 0.1, wave: 'square', gain: 0.18 },
  hit: { shape: 'beep', freq: 200, duration: 0.2, wave: 'square', gain: 0.25 },
  explosion: { shape: 'noise', duration: 0.3, gain: 0.25 },
  game_over: { shape: 'sweep', from: 400, to: 100, duration: 1.0, wave: 'triangle', gain: 0.3 },
  level_up: { shape: 'sweep', from: 200, to: 800, duration: 0.5, wave: 'triangle', gain: 0.3 },
  // A minor arpeggio, two bars
  music: {
    shape: 'melody',
    notes: [220, 261.63, 329.63, 440, 329.63, 261.63, 196, 246.94, 293.66, 392, 293.66, 246.94],
    noteDuration: 0.25,
    wave: 'triangle',
    gain: 0.12,
  },
}

export const SOUND_NAMES: readonly SoundName[] = ['shoot', 'hit', 'explosion', 'game_over', 'level_up', 'music']

export function toneDuration(spec: ToneSpec): number {
  return spec.shape === 'melody' ? spec.notes.length * spec.noteDuration : spec.duration
}

function oscillate(wave: Waveform, phase: number): number {
  const p = phase - Math.floor(phase)
  switch (wave) {
    case 'sine':
      return Math.sin(2 * Math.PI * p)
    case 'square':
      return p < 0.5 ? 1 : -1
    case 'triangle':
      return 1 - 4 * Math.abs(p - 0.5)
    case 'sawtooth':
      return 2 * p - 1
  }
}

/**
 * Renders a tone to mono samples in [-1, 1]. Beeps and noise decay linearly,
 * sweeps rise and fall on a half-sine envelope.
 */
export function renderTone(spec: ToneSpec, sampleRate: number, random: Random = Math.random) {
  const frames = Math.floor(toneDuration(spec) * sampleRate)
  const out = new Float32Array(frames)
  let phase = 0
  for (let i = 0; i < frames; i++) {
    const t = i / frames
    let v: number
    switch (spec.shape) {
      case 'beep':
        phase += spec.freq / sampleRate
        v = oscillate(spec.wave, phase) * (1 - t)
        break
      case 'sweep':
        phase += (spec.from + (spec.to - spec.from) * t) / sampleRate
        v = oscillate(spec.wave, phase) * Math.sin(Math.PI * t)
        break
      case 'noise':
        v = (random() * 2 - 1) * (1 - t)
        break
      case 'melody': {
        const noteFrames = spec.noteDuration * sampleRate
        const note = Math.min(spec.notes.length - 1, Math.floor(i / noteFrames))
        const local = (i - note * noteFrames) / noteFrames
        phase += (spec.notes[note] ?? 0) / sampleRate
        v = oscillate(spec.wave, phase) * (1 - local * 0.8)
        break
      }
    }
    out[i] = v * spec.gain
  }
  return out
}
