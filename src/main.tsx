import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import './style.css'
import App from './App.tsx'
import ErrorBoundary from './components/ErrorBoundary.tsx'
import FatalScreen from './components/FatalScreen.tsx'
import { readSettings } from './game/config.ts'
import { describeError, FatalGameError } from './lib/errors.ts'
import { getLogger, setLogLevel } from './lib/logger.ts'

const log = getLogger('main')

const settings = readSettings(import.meta.env)
setLogLevel(settings.logLevel)

const rootEl = document.getElementById('root')
if (!rootEl) throw new FatalGameError('missing #root element')
const root = createRoot(rootEl)

// Anything that escapes React (event handlers, async work) ends the game too
const fail = (error: unknown) => {
  log.error('uncaught error', { error })
  root.render(<FatalScreen message={describeError(error)} />)
}
window.addEventListener('error', (e) => fail(e.error ?? e.message))
window.addEventListener('unhandledrejection', (e) => fail(e.reason))

log.info('starting', { fps: settings.fps, seed: settings.seed, muted: settings.muted })
root.render(
  <StrictMode>
    <ErrorBoundary>
      <App settings={settings} />
    </ErrorBoundary>
  </StrictMode>
)
