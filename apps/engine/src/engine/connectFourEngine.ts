import {
  ROWS,
  COLS,
  CONNECT,
  Board,
  Cell,
  DropResult,
  EngineState,
  GameSnapshot,
  GameStatus,
  Player,
  Position,
  ResultCheck,
  ValidationResult,
  Winner,
} from './types.js'

// Direction vectors checked through the last disc: horizontal, vertical, both diagonals
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
]

export const otherPlayer = (player: Player): Player => (player === 'P1' ? 'P2' : 'P1')

export const playerNumber = (player: Player): 1 | 2 => (player === 'P1' ? 1 : 2)

const inBounds = (row: number, col: number): boolean =>
  row >= 0 && row < ROWS && col >= 0 && col < COLS

/**
 * Rules engine for a single Connect Four game.
 *
 * Sole owner of the board: callers mutate it only through `dropPiece` and
 * `reset`, and read it back through the getters or `getSnapshot()`.
 * Failed drops are reported as `{ success: false, reason }` and never touch state.
 */
export class ConnectFourEngine {
  private state: EngineState

  constructor() {
    this.state = this.initState()
  }

  initState(): EngineState {
    return {
      board: Array.from({ length: ROWS }, () => Array<Cell>(COLS).fill(null)),
      nextFreeRow: Array<number>(COLS).fill(ROWS - 1),
      currentPlayer: 'P1', // P1 always starts
      movesMade: 0,
      gameOver: false,
      winner: 'none',
      winningLine: null,
      lastMove: null,
    }
  }

  /** Start a fresh game. Safe to call at any point, including mid-game. */
  reset(): void {
    this.state = this.initState()
  }

  validateDrop(col: number): ValidationResult {
    if (this.state.gameOver) {
      return { valid: false, reason: 'invalid_state' }
    }

    if (!Number.isInteger(col) || col < 0 || col >= COLS) {
      return { valid: false, reason: 'invalid_column' }
    }

    if (this.state.nextFreeRow[col] < 0) {
      return { valid: false, reason: 'column_full' }
    }

    return { valid: true }
  }

  /**
   * Drop a disc for the current player into `col` (0-based).
   * On success returns the cell the disc landed in.
   */
  dropPiece(col: number): DropResult {
    const validation = this.validateDrop(col)
    if (!validation.valid) {
      return { success: false, reason: validation.reason }
    }

    const state = this.state
    const player = state.currentPlayer
    const row = state.nextFreeRow[col]

    state.board[row][col] = player
    state.nextFreeRow[col] = row - 1
    state.movesMade++
    state.lastMove = { row, col }

    const result = this.checkResult(row, col)
    if (result.status === 'finished') {
      state.gameOver = true
      state.winner = result.winner
      state.winningLine = result.winningLine ?? null
    } else {
      state.currentPlayer = otherPlayer(player)
    }

    return { success: true, row, col, player }
  }

  // Only the runs through the disc just placed can have changed
  checkResult(row: number, col: number): ResultCheck {
    const player = this.state.board[row][col]
    if (player !== null) {
      for (const [dr, dc] of DIRECTIONS) {
        const line = this.collectRun(row, col, dr, dc, player)
        if (line.length >= CONNECT) {
          return { status: 'finished', winner: player, winningLine: line }
        }
      }
    }

    if (this.state.movesMade === ROWS * COLS) {
      return { status: 'finished', winner: 'none' }
    }

    return { status: 'active', winner: 'none' }
  }

  /**
   * Contiguous `player` discs through (row, col) along (dr, dc) and its opposite,
   * ordered from the far end of the reverse walk to the far end of the forward walk.
   */
  private collectRun(row: number, col: number, dr: number, dc: number, player: Player): Position[] {
    const board = this.state.board
    const line: Position[] = [{ row, col }]

    let r = row + dr
    let c = col + dc
    while (inBounds(r, c) && board[r][c] === player) {
      line.push({ row: r, col: c })
      r += dr
      c += dc
    }

    r = row - dr
    c = col - dc
    while (inBounds(r, c) && board[r][c] === player) {
      line.unshift({ row: r, col: c })
      r -= dr
      c -= dc
    }

    return line
  }

  get board(): Board {
    return this.state.board.map(row => [...row])
  }

  get currentPlayer(): Player {
    return this.state.currentPlayer
  }

  get movesMade(): number {
    return this.state.movesMade
  }

  get gameOver(): boolean {
    return this.state.gameOver
  }

  get winner(): Winner {
    return this.state.winner
  }

  get status(): GameStatus {
    return this.state.gameOver ? 'finished' : 'active'
  }

  get isDraw(): boolean {
    return this.state.gameOver && this.state.winner === 'none'
  }

  get winningLine(): Position[] | null {
    return this.state.winningLine ? this.state.winningLine.map(pos => ({ ...pos })) : null
  }

  get lastMove(): Position | null {
    return this.state.lastMove ? { ...this.state.lastMove } : null
  }

  cellAt(row: number, col: number): Cell {
    if (!Number.isInteger(row) || !Number.isInteger(col) || !inBounds(row, col)) {
      throw new RangeError(`Cell (${row}, ${col}) is outside the ${ROWS}x${COLS} board`)
    }
    return this.state.board[row][col]
  }

  /** Columns that can still take a disc; empty once the game is over. */
  legalColumns(): number[] {
    if (this.state.gameOver) return []
    const columns: number[] = []
    for (let col = 0; col < COLS; col++) {
      if (this.state.nextFreeRow[col] >= 0) columns.push(col)
    }
    return columns
  }

  getSnapshot(): GameSnapshot {
    return {
      board: this.board,
      currentPlayer: this.state.currentPlayer,
      movesMade: this.state.movesMade,
      gameOver: this.state.gameOver,
      winner: this.state.winner,
      status: this.status,
      winningLine: this.winningLine,
      lastMove: this.lastMove,
    }
  }

  // Debug rendering: one line per row, top row first
  toString(): string {
    return this.state.board
      .map(row => row.map(cell => (cell === null ? '.' : String(playerNumber(cell)))).join(' '))
      .join('\n')
  }
}
