type Props = Readonly<{ score: number; level: number; lives: number; maxLives: number; highScore: number; muted: boolean }>

const PIXEL_FONT = { fontFamily: '"Press Start 2P", cursive' }

// Small ship silhouettes, one per life; lost lives stay as outlines
function LifeIcons({ lives, maxLives }: { lives: number; maxLives: number }) {
  return (
    <span className="flex gap-1" role="img" aria-label={`Lives: ${lives}`}>
      {Array.from({ length: maxLives }, (_, i) => (
        <svg key={i} width="14" height="12" viewBox="0 0 14 12" aria-hidden="true">
          <polygon
            points="7,0 0,12 14,12"
            fill={i < lives ? '#c8c8ff' : 'none'}
            stroke="#c8c8ff"
            strokeWidth="1"
          />
        </svg>
      ))}
    </span>
  )
}

export default function UiHud({ score, level, lives, maxLives, highScore, muted }: Props) {
  return (
    <div
      className="pointer-events-none absolute left-0 top-0 grid w-full grid-cols-3 items-start p-4 text-[10px] md:text-xs text-[#39ff14]"
      style={PIXEL_FONT}
    >
      <div className="space-y-2">
        <div>LEVEL {level}</div>
        <LifeIcons lives={lives} maxLives={maxLives} />
      </div>
      <div className="text-center">
        <div className="text-[#ffe000]">SCORE</div>
        <div className="text-lg md:text-2xl" data-testid="score">{score}</div>
      </div>
      <div className="space-y-2 text-right">
        <div>Best: {highScore}</div>
        {muted && <div className="opacity-70">MUTED</div>}
      </div>
    </div>
  )
}
