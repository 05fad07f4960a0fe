import { create } from 'zustand'
import { GameService, playerNumber } from '@connect-four/engine'
import type { Cell, DropResult, GameSnapshot, GameServiceOptions, Move } from '@connect-four/engine'
import { CELL_SIZE, COLORS, LOG_EVENTS } from '../config'

export interface GameState {
  service: GameService
  gameId: string
  snapshot: GameSnapshot
  moves: Move[]

  // Actions
  dropPiece: (col: number) => DropResult
  dropAtPixel: (pixelX: number) => DropResult
  newGame: () => void
}

// Store helper functions
export const columnFromPixel = (pixelX: number, cellSize: number = CELL_SIZE): number => {
  return Math.floor(pixelX / cellSize)
}

export const getStatusText = (snapshot: Pick<GameSnapshot, 'gameOver' | 'winner' | 'currentPlayer'>): string => {
  if (snapshot.gameOver) {
    return snapshot.winner === 'none' ? 'Draw!' : `Player ${playerNumber(snapshot.winner)} wins!`
  }
  return `Player ${playerNumber(snapshot.currentPlayer)}'s turn`
}

export const getDiscColor = (cell: Cell): string => {
  if (cell === 'P1') return COLORS.P1
  if (cell === 'P2') return COLORS.P2
  return COLORS.empty
}

export const isWinningCell = (snapshot: GameSnapshot, row: number, col: number): boolean => {
  return snapshot.winningLine?.some(pos => pos.row === row && pos.col === col) ?? false
}

export const createGameStore = (options: GameServiceOptions = {}) =>
  create<GameState>((set, get) => {
    const service = new GameService(options)

    return {
      service,
      gameId: service.getSession().id,
      snapshot: service.getSnapshot(),
      moves: [],

      dropPiece: (col: number) => {
        const result = get().service.dropPiece(col)

        // Rejected drops leave the board as it is; the click is simply ignored
        if (!result.success) {
          return result
        }

        set({
          snapshot: get().service.getSnapshot(),
          moves: get().service.getSession().moves,
        })
        return result
      },

      dropAtPixel: (pixelX: number) => {
        return get().dropPiece(columnFromPixel(pixelX))
      },

      newGame: () => {
        const session = get().service.newGame()
        set({
          gameId: session.id,
          snapshot: get().service.getSnapshot(),
          moves: [],
        })
      },
    }
  })

export const useGameStore = createGameStore({ logEvents: LOG_EVENTS })
