import { Component, type ErrorInfo, type ReactNode } from 'react'
import { describeError } from '../lib/errors.ts'
import { getLogger } from '../lib/logger.ts'
import FatalScreen from './FatalScreen.tsx'

const log = getLogger('fatal')

type Props = { children: ReactNode }
type State = { error: unknown; failed: boolean }

/** Last line of defence: an exception while rendering ends the game on the fatal screen. */
export default class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null, failed: false }

  static getDerivedStateFromError(error: unknown): State {
    return { error, failed: true }
  }

  componentDidCatch(error: unknown, info: ErrorInfo) {
    log.error('render failed', { error, componentStack: info.componentStack })
  }

  render() {
    if (this.state.failed) return <FatalScreen message={describeError(this.state.error)} />
    return this.props.children
  }
}
