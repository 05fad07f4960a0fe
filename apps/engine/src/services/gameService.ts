import { v4 as uuidv4 } from 'uuid'
import { ConnectFourEngine } from '../engine/connectFourEngine.js'
import { DropResult, GameSnapshot, Player } from '../engine/types.js'

export interface Move {
  player: Player
  row: number
  col: number
  moveNumber: number
  timestamp: Date
}

export interface GameSession {
  id: string
  moves: Move[]
  startedAt: Date
  finishedAt?: Date
}

export type EventLogger = (line: string) => void

export interface GameServiceOptions {
  logEvents?: boolean
  logger?: EventLogger
}

// Wraps one engine with a session id, a move list and structured event logging.
export class GameService {
  private engine = new ConnectFourEngine()
  private session: GameSession
  private readonly logEvents: boolean
  private readonly logger: EventLogger

  constructor(options: GameServiceOptions = {}) {
    this.logEvents = options.logEvents ?? true
    this.logger = options.logger ?? (line => console.log(line))
    this.session = this.startSession()
  }

  newGame(): GameSession {
    this.engine.reset()
    this.session = this.startSession()
    return this.getSession()
  }

  dropPiece(col: number): DropResult {
    const result = this.engine.dropPiece(col)

    if (!result.success) {
      this.logDropDecision({ col, player: this.engine.currentPlayer, reason: result.reason })
      return result
    }

    const move: Move = {
      player: result.player,
      row: result.row,
      col: result.col,
      moveNumber: this.engine.movesMade,
      timestamp: new Date(),
    }
    this.session.moves.push(move)

    if (this.engine.gameOver) {
      this.session.finishedAt = move.timestamp
      const outcome = this.engine.isDraw ? 'draw' : 'win'
      this.logDropDecision({ col, row: result.row, player: result.player, result: outcome })
      this.log({
        evt: 'game.finished',
        gameId: this.session.id,
        winner: this.engine.winner,
        moves: this.engine.movesMade,
      })
    } else {
      this.logDropDecision({ col, row: result.row, player: result.player })
    }

    return result
  }

  getSnapshot(): GameSnapshot {
    return this.engine.getSnapshot()
  }

  getSession(): GameSession {
    return { ...this.session, moves: [...this.session.moves] }
  }

  legalColumns(): number[] {
    return this.engine.legalColumns()
  }

  private startSession(): GameSession {
    const session: GameSession = {
      id: `game_${Date.now()}_${uuidv4()}`,
      moves: [],
      startedAt: new Date(),
    }

    this.log({
      evt: 'game.init',
      gameId: session.id,
      starter: this.engine.currentPlayer,
    })
    return session
  }

  private logDropDecision(params: {
    col: number
    player: Player
    row?: number
    reason?: string
    result?: 'win' | 'draw'
  }): void {
    this.log({
      evt: 'drop',
      gameId: this.session.id,
      player: params.player,
      col: params.col,
      ...(params.row !== undefined && { row: params.row }),
      movesMade: this.engine.movesMade,
      ...(params.reason && { reason: params.reason }),
      ...(params.result && { result: params.result }),
      timestamp: new Date().toISOString(),
    })
  }

  private log(entry: Record<string, unknown>): void {
    if (!this.logEvents) return
    this.logger(JSON.stringify(entry))
  }
}
