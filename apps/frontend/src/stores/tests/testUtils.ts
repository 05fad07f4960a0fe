import { useGameStore } from '../gameStore'

export const resetStore = () => {
  useGameStore.getState().newGame()
}

export const playColumns = (columns: number[]) => {
  for (const col of columns) {
    useGameStore.getState().dropPiece(col)
  }
}
