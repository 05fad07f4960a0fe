import { ConnectFourBoard } from './components/ConnectFourBoard'
import { StatusLine } from './components/StatusLine'
import { useGameStore } from './stores/gameStore'

function App() {
  const { gameId, snapshot } = useGameStore()

  return (
    <div className="min-h-screen bg-gradient-to-br from-blue-50 to-indigo-100 p-4">
      <div className="container mx-auto max-w-4xl">
        <header className="text-center mb-8 pt-8">
          <h1 className="text-4xl font-bold text-gray-800 mb-2">
            Connect Four
          </h1>
          <p className="text-gray-600">
            Two players, one screen. Click a column to drop a disc.
          </p>
        </header>

        <main className="flex flex-col items-center space-y-6">
          <ConnectFourBoard />
          <StatusLine />
        </main>

        {import.meta.env.DEV && (
          <footer className="text-center mt-12 text-xs text-gray-500 font-mono space-x-4">
            <span>game: {gameId.split('_').pop()}</span>
            <span>moves: {snapshot.movesMade}</span>
            <span>status: {snapshot.status}</span>
          </footer>
        )}
      </div>
    </div>
  )
}

export default App
