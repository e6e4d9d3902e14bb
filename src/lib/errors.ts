/** A file under images/ or sounds/ could not be loaded. Never fatal: callers substitute a placeholder. */
export class AssetError extends Error {
  readonly url: string

  constructor(url: string, reason?: string) {
    super(reason ? `asset unavailable: ${url} (${reason})` : `asset unavailable: ${url}`)
    this.name = 'AssetError'
    this.url = url
  }
}

/** The engine cannot continue (no canvas context, an exception inside a tick). */
export class FatalGameError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FatalGameError'
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  return 'Unknown error'
}
