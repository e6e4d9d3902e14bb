import { ENEMY_KINDS, type EnemyKind } from '../src/game/config.ts'
import { seededRandom } from '../src/game/random.ts'

const svg = (w: number, h: number, body: string) =>
  `<svg xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}" viewBox="0 0 ${w} ${h}">${body}</svg>\n`

export function backgroundSvg(w: number, h: number, seed = 7): string {
  const random = seededRandom(seed)
  const stars: string[] = []
  for (let i = 0; i < 100; i++) {
    const x = Math.round(random() * w)
    const y = Math.round(random() * h)
    const r = random() < 0.5 ? 1 : 2
    const b = 150 + Math.floor(random() * 106)
    stars.push(`<circle cx="${x}" cy="${y}" r="${r}" fill="rgb(${b},${b},${b})"/>`)
  }
  return svg(w, h, `<rect width="${w}" height="${h}" fill="rgb(0,0,30)"/>${stars.join('')}`)
}

export function playerSvg(w = 50, h = 40): string {
  const cx = w / 2
  return svg(
    w,
    h,
    `<polygon points="${cx},0 0,${h} ${w},${h}" fill="rgb(200,200,255)"/>` +
      `<ellipse cx="${cx}" cy="${h / 2 + 5}" rx="10" ry="10" fill="rgb(100,100,200)"/>` +
      `<rect x="${cx - 5}" y="${h - 5}" width="10" height="5" fill="rgb(255,100,100)"/>`,
  )
}

export function enemySvg(kind: EnemyKind): string {
  const { w, h, color } = ENEMY_KINDS[kind]
  const cx = w / 2
  return svg(
    w,
    h,
    `<polygon points="0,0 ${w},0 ${cx},${h}" fill="${color}"/>` +
      `<rect x="${cx - 4}" y="2" width="8" height="${Math.round(h / 3)}" fill="rgb(40,40,40)"/>`,
  )
}

export function bulletSvg(w = 5, h = 10): string {
  return svg(w, h, `<rect width="${w}" height="${h}" rx="2" fill="rgb(255,255,0)"/>`)
}

/** One frame of the explosion: an expanding orange ring that fades. */
export function explosionSvg(frame: number, frames = 8, size = 48): string {
  const t = (frame + 1) / frames
  const r = Math.max(2, Math.round((size / 2 - 2) * t))
  const opacity = (1 - t * 0.8).toFixed(2)
  const c = size / 2
  return svg(
    size,
    size,
    `<circle cx="${c}" cy="${c}" r="${r}" fill="rgb(255,160,0)" fill-opacity="${opacity}"/>` +
      `<circle cx="${c}" cy="${c}" r="${Math.round(r / 2)}" fill="rgb(255,240,120)" fill-opacity="${opacity}"/>`,
  )
}
