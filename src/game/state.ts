import { DEFAULT_RULES } from './config.ts'

export type GameMode = 'start' | 'playing' | 'paused' | 'gameover' | 'exited'

export type State = {
  mode: GameMode
  showHelp: boolean
  score: number
  highScore: number
  session: number
  level: number
  lives: number
}

export type Action =
  | { type: 'START' }
  | { type: 'TOGGLE_PAUSE' }
  | { type: 'TOGGLE_HELP' }
  | { type: 'PROGRESS'; score: number; level: number; lives: number }
  | { type: 'GAME_OVER' }
  | { type: 'EXIT' }

export const START_LIVES = DEFAULT_RULES.playerLives

export function initialState(): State {
  return { mode: 'start', showHelp: false, score: 0, highScore: 0, session: 0, level: 1, lives: START_LIVES }
}

/** Actions that don't apply to the current mode leave the state untouched. */
export function reducer(state: State, action: Action): State {
  switch (action.type) {
    case 'START':
      if (state.mode !== 'start' && state.mode !== 'gameover') return state
      // bumping session makes the canvas reset its world
      return { ...state, mode: 'playing', showHelp: false, score: 0, level: 1, lives: START_LIVES, session: state.session + 1 }
    case 'TOGGLE_PAUSE':
      if (state.mode === 'playing') return { ...state, mode: 'paused' }
      if (state.mode === 'paused') return { ...state, mode: 'playing' }
      return state
    case 'TOGGLE_HELP':
      if (state.mode !== 'start' && state.mode !== 'gameover') return state
      return { ...state, showHelp: !state.showHelp }
    case 'PROGRESS': {
      if (state.mode !== 'playing') return state
      const score = Math.max(state.score, action.score)
      return { ...state, score, level: action.level, lives: action.lives, highScore: Math.max(state.highScore, score) }
    }
    case 'GAME_OVER':
      if (state.mode !== 'playing') return state
      return { ...state, mode: 'gameover', lives: 0 }
    case 'EXIT':
      return { ...state, mode: 'exited' }
    default:
      return state
  }
}
