import { useGameStore, getStatusText, getDiscColor } from '../stores/gameStore'

export function StatusLine() {
  const { snapshot, newGame } = useGameStore()

  const indicator = snapshot.gameOver
    ? snapshot.winner === 'none' ? null : snapshot.winner
    : snapshot.currentPlayer

  return (
    <div className="flex flex-col items-center space-y-3">
      <div className="flex items-center space-x-2 text-lg font-semibold text-gray-800">
        {indicator && (
          <span
            className="inline-block w-4 h-4 rounded-full border border-gray-500"
            style={{ backgroundColor: getDiscColor(indicator) }}
          />
        )}
        <span>{getStatusText(snapshot)}</span>
      </div>

      <button
        onClick={newGame}
        className="bg-blue-600 hover:bg-blue-700 text-white px-6 py-2 rounded-lg font-medium transition-colors"
      >
        New Game
      </button>
    </div>
  )
}
