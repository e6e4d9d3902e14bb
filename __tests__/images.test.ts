import { describe, expect, it, vi } from 'vitest'
import { EXPLOSION_FRAMES, loadImages, type ImageLoader } from '../src/assets/images.ts'
import { AssetError } from '../src/lib/errors.ts'
import { silentLogger } from './helpers.ts'

describe('loadImages', () => {
  it('loads sprites and explosion frames under the asset base', async () => {
    const load = vi.fn<ImageLoader>(async () => new Image())
    const log = silentLogger()
    const set = await loadImages('/game/', load, log)

    expect(load).toHaveBeenCalledTimes(6 + EXPLOSION_FRAMES)
    expect(load).toHaveBeenCalledWith('/game/images/player.svg')
    expect(load).toHaveBeenCalledWith('/game/images/explosion7.svg')
    expect(set.sprites.player).toBeInstanceOf(HTMLImageElement)
    expect(set.explosion).toHaveLength(EXPLOSION_FRAMES)
    expect(log.warn).not.toHaveBeenCalled()
    expect(log.info).not.toHaveBeenCalled()
  })

  it('substitutes null for files that fail and reports each one', async () => {
    const load: ImageLoader = async (url) => {
      if (url.endsWith('enemy_fast.svg')) throw new AssetError(url, 'not found')
      if (url.endsWith('explosion3.svg')) throw 'decode failed'
      return new Image()
    }
    const log = silentLogger()
    const set = await loadImages('/', load, log)

    expect(set.sprites.enemy_fast).toBeNull()
    expect(set.sprites.enemy).not.toBeNull()
    expect(set.explosion[3]).toBeNull()
    expect(set.explosion[2]).not.toBeNull()
    expect(log.warn).toHaveBeenCalledWith('asset unavailable: /images/enemy_fast.svg (not found)', {
      url: '/images/enemy_fast.svg',
    })
    expect(log.warn).toHaveBeenCalledWith('asset unavailable: /images/explosion3.svg (decode failed)', {
      url: '/images/explosion3.svg',
    })
    expect(log.info).toHaveBeenCalledWith('some images missing, using placeholders', { missing: 2 })
  })
})
