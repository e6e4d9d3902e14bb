import HelpPanel from './HelpPanel.tsx'

type Props = {
  highScore: number
  showHelp: boolean
  onPlay: () => void
}

export default function StartScreen({ highScore, showHelp, onPlay }: Props) {
  return (
    <div className="grid h-dvh place-items-center bg-[#0b1021] text-white">
      <div className="text-center space-y-6 p-6">
        <h1 className="text-[#39ff14] text-xl md:text-3xl" style={{ fontFamily: '"Press Start 2P", cursive' }}>Plane Strike</h1>
        {highScore > 0 && <p className="text-xs md:text-sm opacity-80">Best: {highScore}</p>}
        {showHelp ? (
          <HelpPanel />
        ) : (
          <>
            <button
              className="mx-auto block rounded border border-[#39ff14] px-4 py-3 text-[10px] md:text-xs text-[#39ff14] hover:bg-[#39ff14] hover:text-black"
              onClick={onPlay}
            >
              PRESS SPACE TO START
            </button>
            <p className="text-[9px] md:text-xs opacity-70">H: Instructions • ESC: Quit</p>
          </>
        )}
      </div>
    </div>
  )
}
