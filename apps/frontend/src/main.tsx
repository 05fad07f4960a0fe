import React from 'react'
import ReactDOM from 'react-dom/client'
import App from './App'
import { ErrorBoundary } from './components/ErrorBoundary'
import { useGameStore } from './stores/gameStore'
import './index.css'

const container = document.getElementById('root')
if (!container) {
  throw new Error('Root element #root not found')
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <ErrorBoundary onReset={() => useGameStore.getState().newGame()}>
      <App />
    </ErrorBoundary>
  </React.StrictMode>
)
