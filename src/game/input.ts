import type { InputState } from './world.ts'

export type KeyMap = Record<string, boolean>

/** Normalizes a KeyboardEvent key so ' ' and 'Spacebar' read the same. */
export function normalizeKey(key: string): string {
  const k = key.toLowerCase()
  if (k === ' ' || k === 'spacebar') return 'space'
  if (k === 'esc') return 'escape'
  return k
}

// Only the arrows and space drive the ship; any other held key is ignored.
export function readInput(keys: KeyMap): InputState {
  return {
    left: !!keys['arrowleft'],
    right: !!keys['arrowright'],
    up: !!keys['arrowup'],
    down: !!keys['arrowdown'],
    fire: !!keys['space'],
  }
}
