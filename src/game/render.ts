import type { Drawable, ImageName, ImageSet } from '../assets/images.ts'
import { ENEMY_KINDS, type EnemyKind } from './config.ts'
import { boundsOf, type Entity } from './entities.ts'
import type { World } from './world.ts'

const BG = '#0b1021'
const PLAYER_COLOR = '#e0e6ff'
const BULLET_COLOR = '#ffe000'
const EXPLOSION_COLOR = '#ff3b30'

const ENEMY_IMAGES: Record<EnemyKind, ImageName> = {
  normal: 'enemy',
  fast: 'enemy_fast',
  heavy: 'enemy_heavy',
}

/** The slice of the 2D canvas API the painter uses. */
export type Painter = Pick<
  CanvasRenderingContext2D,
  'save' | 'restore' | 'setTransform' | 'drawImage' | 'fillRect' | 'fillText' | 'fillStyle' | 'font' | 'textAlign'
>

export type DrawOptions = {
  scale: number
  dpr: number
  showFps: boolean
  fps: number
}

function drawSprite(ctx: Painter, e: Entity, img: Drawable | null, color: string) {
  const b = boundsOf(e)
  if (img) {
    ctx.drawImage(img, b.x, b.y, b.w, b.h)
    return
  }
  ctx.fillStyle = color
  ctx.fillRect(b.x, b.y, b.w, b.h)
}

function drawBackground(ctx: Painter, world: World, img: Drawable | null) {
  const { screenWidth: w, screenHeight: h } = world.rules
  if (img) {
    ctx.drawImage(img, 0, 0, w, h)
    return
  }
  ctx.fillStyle = BG
  ctx.fillRect(0, 0, w, h)
  // drifting star field, positions derived from the index so frames agree
  ctx.fillStyle = '#1a2244'
  for (let i = 0; i < 60; i++) {
    const x = (i * 97) % w
    const y = (i * 53 + world.ticks * (1 + (i % 3))) % h
    ctx.fillRect(x, y, 2, 2)
  }
}

/** Paints one frame of the world in virtual (unscaled) coordinates. */
export function drawWorld(ctx: Painter, world: World, images: ImageSet, opts: DrawOptions) {
  ctx.save()
  ctx.setTransform(opts.dpr * opts.scale, 0, 0, opts.dpr * opts.scale, 0, 0)
  drawBackground(ctx, world, images.sprites.background)

  for (const x of world.explosions) {
    const img = images.explosion[x.frame] ?? null
    if (img) {
      drawSprite(ctx, x, img, EXPLOSION_COLOR)
    } else {
      const size = 5 + x.frame * 2
      ctx.fillStyle = EXPLOSION_COLOR
      ctx.fillRect(x.pos.x - size / 2, x.pos.y - size / 2, size, size)
    }
  }

  for (const e of world.enemies) {
    drawSprite(ctx, e, images.sprites[ENEMY_IMAGES[e.type]], ENEMY_KINDS[e.type].color)
  }

  for (const b of world.bullets) drawSprite(ctx, b, images.sprites.bullet, BULLET_COLOR)

  const p = world.player
  // blink while invincible
  const visible = p.invincible === 0 || Math.floor(p.invincible / 6) % 2 === 0
  if (p.alive && visible) drawSprite(ctx, p, images.sprites.player, PLAYER_COLOR)

  if (opts.showFps) {
    ctx.fillStyle = '#39ff14'
    ctx.font = '10px "Press Start 2P", monospace'
    ctx.textAlign = 'right'
    ctx.fillText(`FPS ${Math.round(opts.fps)}`, world.rules.screenWidth - 8, world.rules.screenHeight - 8)
  }
  ctx.restore()
}
