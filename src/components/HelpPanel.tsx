const LINES = [
  'Arrows: Move',
  'Space: Fire',
  'P: Pause / Resume',
  'H: Show / Hide instructions',
  'M: Sound on / off',
  'ESC: Quit',
]

export default function HelpPanel() {
  return (
    <div className="space-y-2 text-[10px] md:text-xs" aria-label="Instructions">
      <div className="text-[#ffe000]">INSTRUCTIONS</div>
      {LINES.map((line) => (
        <div key={line}>{line}</div>
      ))}
      <div className="pt-2 text-[#39ff14]">Press SPACE to start</div>
    </div>
  )
}
