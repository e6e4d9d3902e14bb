type Props = { message: string }

export default function FatalScreen({ message }: Props) {
  return (
    <div role="alert" className="grid h-dvh place-items-center bg-[#0b1021] text-white">
      <div className="max-w-md space-y-4 rounded border border-red-500 p-6 text-center">
        <div className="text-red-400" style={{ fontFamily: '"Press Start 2P", cursive' }}>SOMETHING BROKE</div>
        <div className="text-xs break-words">{message}</div>
        <div className="text-[10px] opacity-70">Reload the page to start over.</div>
      </div>
    </div>
  )
}
