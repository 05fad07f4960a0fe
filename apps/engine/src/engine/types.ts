// Engine types for the 6x7 Connect Four grid
export const ROWS = 6
export const COLS = 7
export const CONNECT = 4 // winning run length

export type Player = 'P1' | 'P2'
export type Cell = Player | null // null = empty

// Row 0 is the top of the grid, discs stack upward from row ROWS - 1
export type Board = Cell[][]

// 'none' with gameOver = true is a draw, with gameOver = false the game is still running
export type Winner = Player | 'none'

export type GameStatus = 'active' | 'finished'

export interface Position {
  row: number
  col: number
}

export interface EngineState {
  board: Board
  nextFreeRow: number[] // per column, -1 once the column is full
  currentPlayer: Player
  movesMade: number
  gameOver: boolean
  winner: Winner
  winningLine: Position[] | null
  lastMove: Position | null
}

export type DropFailureReason = 'invalid_column' | 'column_full' | 'invalid_state'

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: DropFailureReason }

export type DropResult =
  | { success: true; row: number; col: number; player: Player }
  | { success: false; reason: DropFailureReason }

export interface ResultCheck {
  status: GameStatus
  winner: Winner
  winningLine?: Position[]
}

// Read-only view handed to front-ends after every call
export interface GameSnapshot {
  board: readonly (readonly Cell[])[]
  currentPlayer: Player
  movesMade: number
  gameOver: boolean
  winner: Winner
  status: GameStatus
  winningLine: readonly Position[] | null
  lastMove: Position | null
}
