import { AssetError } from '../lib/errors.ts'
import { getLogger, type Logger } from '../lib/logger.ts'

export type ImageName =
  | 'background'
  | 'player'
  | 'enemy'
  | 'enemy_fast'
  | 'enemy_heavy'
  | 'bullet'

export const IMAGE_NAMES: readonly ImageName[] = ['background', 'player', 'enemy', 'enemy_fast', 'enemy_heavy', 'bullet']

export const EXPLOSION_FRAMES = 8

export const IMAGE_FILES: Record<ImageName, string> = {
  background: 'images/background.svg',
  player: 'images/player.svg',
  enemy: 'images/enemy.svg',
  enemy_fast: 'images/enemy_fast.svg',
  enemy_heavy: 'images/enemy_heavy.svg',
  bullet: 'images/bullet.svg',
}

export const explosionFile = (frame: number) => `images/explosion${frame}.svg`

/** Whatever the renderer can draw; HTMLImageElement in the browser. */
export type Drawable = CanvasImageSource

/** `null` marks a missing file; the renderer draws a placeholder for it. */
export type ImageSet = {
  sprites: Record<ImageName, Drawable | null>
  explosion: (Drawable | null)[]
}

export type ImageLoader = (url: string) => Promise<Drawable>

export const browserImageLoader: ImageLoader = (url) =>
  new Promise((resolve, reject) => {
    const img = new Image()
    img.onload = () => resolve(img)
    img.onerror = () => reject(new AssetError(url, 'failed to load'))
    img.src = url
  })

export const EMPTY_IMAGES: ImageSet = {
  sprites: { background: null, player: null, enemy: null, enemy_fast: null, enemy_heavy: null, bullet: null },
  explosion: Array.from({ length: EXPLOSION_FRAMES }, () => null),
}

async function loadOne(load: ImageLoader, url: string, log: Logger): Promise<Drawable | null> {
  try {
    return await load(url)
  } catch (err) {
    const reason = err instanceof AssetError ? err.message : new AssetError(url, String(err)).message
    log.warn(reason, { url })
    return null
  }
}

/** Loads every image in parallel. Never rejects: failures come back as `null`. */
export async function loadImages(
  basePath: string,
  load: ImageLoader = browserImageLoader,
  log: Logger = getLogger('assets'),
): Promise<ImageSet> {
  const [sprites, explosion] = await Promise.all([
    Promise.all(IMAGE_NAMES.map((n) => loadOne(load, basePath + IMAGE_FILES[n], log))),
    Promise.all(Array.from({ length: EXPLOSION_FRAMES }, (_, i) => loadOne(load, basePath + explosionFile(i), log))),
  ])
  const set: ImageSet = { sprites: { ...EMPTY_IMAGES.sprites }, explosion }
  IMAGE_NAMES.forEach((n, i) => {
    set.sprites[n] = sprites[i] ?? null
  })
  const missing = [...sprites, ...explosion].filter((x) => x === null).length
  if (missing > 0) log.info('some images missing, using placeholders', { missing })
  return set
}
