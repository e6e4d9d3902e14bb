import { mkdir, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { EXPLOSION_FRAMES, IMAGE_FILES, IMAGE_NAMES, explosionFile, type ImageName } from '../src/assets/images.ts'
import { SOUND_FILES } from '../src/audio/soundManager.ts'
import { renderTone, SOUND_NAMES, SOUND_TONES } from '../src/audio/tones.ts'
import { encodeWav } from '../src/audio/wav.ts'
import { DEFAULT_RULES } from '../src/game/config.ts'
import { seededRandom } from '../src/game/random.ts'
import { getLogger } from '../src/lib/logger.ts'
import { backgroundSvg, bulletSvg, enemySvg, explosionSvg, playerSvg } from './artwork.ts'

const log = getLogger('create-resources')

const SAMPLE_RATE = 22050
const publicDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'public')

const IMAGES: Record<ImageName, () => string> = {
  background: () => backgroundSvg(DEFAULT_RULES.screenWidth, DEFAULT_RULES.screenHeight),
  player: () => playerSvg(DEFAULT_RULES.playerSize.w, DEFAULT_RULES.playerSize.h),
  enemy: () => enemySvg('normal'),
  enemy_fast: () => enemySvg('fast'),
  enemy_heavy: () => enemySvg('heavy'),
  bullet: () => bulletSvg(DEFAULT_RULES.bulletSize.w, DEFAULT_RULES.bulletSize.h),
}

async function write(relative: string, data: string | Uint8Array) {
  const file = join(publicDir, relative)
  await mkdir(dirname(file), { recursive: true })
  await writeFile(file, data)
  log.info('wrote', { file: relative })
}

async function main() {
  for (const name of IMAGE_NAMES) {
    await write(IMAGE_FILES[name], IMAGES[name]())
  }
  for (let i = 0; i < EXPLOSION_FRAMES; i++) {
    await write(explosionFile(i), explosionSvg(i, EXPLOSION_FRAMES))
  }
  const random = seededRandom(42)
  for (const name of SOUND_NAMES) {
    await write(SOUND_FILES[name], encodeWav(renderTone(SOUND_TONES[name], SAMPLE_RATE, random), SAMPLE_RATE))
  }
}

main().catch((error: unknown) => {
  log.error('resource generation failed', { error })
  process.exitCode = 1
})
