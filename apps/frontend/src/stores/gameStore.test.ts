import { describe, test, expect, beforeEach, vi } from 'vitest'
import {
  useGameStore,
  createGameStore,
  columnFromPixel,
  getStatusText,
  getDiscColor,
  isWinningCell,
} from './gameStore'
import { resetStore, playColumns } from './tests/testUtils'
import { CELL_SIZE, COLORS } from '../config'

describe('GameStore', () => {
  beforeEach(() => {
    resetStore()
  })

  describe('Helpers', () => {
    test('maps pixel offsets to column indexes', () => {
      expect(CELL_SIZE).toBe(80)
      expect(columnFromPixel(0)).toBe(0)
      expect(columnFromPixel(79)).toBe(0)
      expect(columnFromPixel(80)).toBe(1)
      expect(columnFromPixel(559)).toBe(6)
      expect(columnFromPixel(560)).toBe(7)
      expect(columnFromPixel(-1)).toBe(-1)
      expect(columnFromPixel(95, 40)).toBe(2)
    })

    test('formats the status line', () => {
      expect(getStatusText({ gameOver: false, winner: 'none', currentPlayer: 'P1' })).toBe("Player 1's turn")
      expect(getStatusText({ gameOver: false, winner: 'none', currentPlayer: 'P2' })).toBe("Player 2's turn")
      expect(getStatusText({ gameOver: true, winner: 'P2', currentPlayer: 'P2' })).toBe('Player 2 wins!')
      expect(getStatusText({ gameOver: true, winner: 'none', currentPlayer: 'P2' })).toBe('Draw!')
    })

    test('picks disc colors per player', () => {
      expect(getDiscColor('P1')).toBe(COLORS.P1)
      expect(getDiscColor('P2')).toBe(COLORS.P2)
      expect(getDiscColor(null)).toBe(COLORS.empty)
    })
  })

  describe('Dropping discs', () => {
    test('dropAtPixel drops into the clicked column', () => {
      const result = useGameStore.getState().dropAtPixel(3 * CELL_SIZE + 10)

      expect(result).toEqual({ success: true, row: 5, col: 3, player: 'P1' })

      const state = useGameStore.getState()
      expect(state.snapshot.board[5][3]).toBe('P1')
      expect(state.snapshot.currentPlayer).toBe('P2')
      expect(state.snapshot.movesMade).toBe(1)
      expect(state.moves).toHaveLength(1)
      expect(getStatusText(state.snapshot)).toBe("Player 2's turn")
    })

    test('clicks outside the board are ignored', () => {
      const before = useGameStore.getState().snapshot

      expect(useGameStore.getState().dropAtPixel(-10)).toEqual({ success: false, reason: 'invalid_column' })
      expect(useGameStore.getState().dropAtPixel(7 * CELL_SIZE + 1)).toEqual({ success: false, reason: 'invalid_column' })
      expect(useGameStore.getState().snapshot).toBe(before)
    })

    test('full columns are ignored', () => {
      playColumns([4, 4, 4, 4, 4, 4])
      const before = useGameStore.getState().snapshot

      expect(useGameStore.getState().dropPiece(4)).toEqual({ success: false, reason: 'column_full' })
      expect(useGameStore.getState().snapshot).toBe(before)
      expect(useGameStore.getState().moves).toHaveLength(6)
    })

    test('moves after a win are ignored and the winner is shown', () => {
      playColumns([0, 1, 0, 1, 0, 1, 0])
      const state = useGameStore.getState()

      expect(state.snapshot.gameOver).toBe(true)
      expect(getStatusText(state.snapshot)).toBe('Player 1 wins!')
      expect(isWinningCell(state.snapshot, 2, 0)).toBe(true)
      expect(isWinningCell(state.snapshot, 5, 1)).toBe(false)

      expect(state.dropPiece(6)).toEqual({ success: false, reason: 'invalid_state' })
      expect(useGameStore.getState().snapshot).toBe(state.snapshot)
    })
  })

  describe('New game', () => {
    test('clears the board and starts a new session', () => {
      playColumns([2, 3, 2])
      const previousId = useGameStore.getState().gameId

      useGameStore.getState().newGame()
      const state = useGameStore.getState()

      expect(state.gameId).not.toBe(previousId)
      expect(state.moves).toEqual([])
      expect(state.snapshot.movesMade).toBe(0)
      expect(state.snapshot.board.flat().every(cell => cell === null)).toBe(true)
      expect(getStatusText(state.snapshot)).toBe("Player 1's turn")
    })
  })

  describe('Isolated stores', () => {
    test('pass logging options through to the game service', () => {
      const logger = vi.fn<(line: string) => void>()
      const store = createGameStore({ logger })

      store.getState().dropPiece(0)

      expect(logger).toHaveBeenCalledTimes(2)
      expect(JSON.parse(logger.mock.calls[1][0])).toMatchObject({ evt: 'drop', col: 0, row: 5, player: 'P1' })
      // the shared store is untouched
      expect(useGameStore.getState().snapshot.movesMade).toBe(0)
    })
  })
})
