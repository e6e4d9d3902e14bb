type Props = { score: number }

export default function ExitScreen({ score }: Props) {
  return (
    <div className="grid h-dvh place-items-center bg-[#0b1021] text-white">
      <div className="text-center space-y-4">
        <div className="text-[#39ff14]" style={{ fontFamily: '"Press Start 2P", cursive' }}>THANKS FOR PLAYING</div>
        {score > 0 && <div className="text-xs">Last score: {score}</div>}
        <div className="text-[10px] opacity-70">You can close this tab.</div>
      </div>
    </div>
  )
}
