export { ConnectFourEngine, otherPlayer, playerNumber } from './engine/connectFourEngine.js'
export { ROWS, COLS, CONNECT } from './engine/types.js'
export type {
  Board,
  Cell,
  DropFailureReason,
  DropResult,
  EngineState,
  GameSnapshot,
  GameStatus,
  Player,
  Position,
  ResultCheck,
  ValidationResult,
  Winner,
} from './engine/types.js'
export { GameService } from './services/gameService.js'
export type { EventLogger, GameServiceOptions, GameSession, Move } from './services/gameService.js'
