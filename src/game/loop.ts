export type FrameScheduler = {
  now: () => number
  request: (cb: (time: number) => void) => number
  cancel: (handle: number) => void
}

export const browserScheduler: FrameScheduler = {
  now: () => performance.now(),
  request: (cb) => requestAnimationFrame(cb),
  cancel: (handle) => cancelAnimationFrame(handle),
}

export type LoopOptions = {
  fps: number
  onTick: () => void
  onFrame: (info: { ticks: number; fps: number }) => void
  onError: (err: unknown) => void
  scheduler?: FrameScheduler
  maxTicksPerFrame?: number
}

export type Loop = {
  start: () => void
  stop: () => void
  readonly running: boolean
}

/**
 * Fixed-step loop on top of a frame callback. Elapsed time accumulates and is
 * spent in whole ticks of 1000/fps ms; a long stall runs at most
 * `maxTicksPerFrame` ticks and drops the rest.
 */
export function createFixedStepLoop(options: LoopOptions): Loop {
  const { fps, onTick, onFrame, onError } = options
  const scheduler = options.scheduler ?? browserScheduler
  const maxTicks = options.maxTicksPerFrame ?? 5
  const step = 1000 / fps
  let handle: number | null = null
  let last = 0
  let acc = 0
  // measured frame rate, smoothed
  let measured = fps

  const frame = (time: number) => {
    const elapsed = Math.max(0, time - last)
    last = time
    acc += elapsed
    if (elapsed > 0) measured = measured * 0.9 + (1000 / elapsed) * 0.1
    let ticks = 0
    try {
      // stop() from inside onTick ends the frame here
      while (handle !== null && acc >= step && ticks < maxTicks) {
        onTick()
        acc -= step
        ticks += 1
      }
      if (handle === null) return
      if (ticks === maxTicks) acc = 0
      onFrame({ ticks, fps: measured })
    } catch (err) {
      handle = null
      onError(err)
      return
    }
    if (handle !== null) handle = scheduler.request(frame)
  }

  return {
    start() {
      if (handle !== null) return
      last = scheduler.now()
      acc = 0
      handle = scheduler.request(frame)
    },
    stop() {
      if (handle === null) return
      scheduler.cancel(handle)
      handle = null
    },
    get running() {
      return handle !== null
    },
  }
}
