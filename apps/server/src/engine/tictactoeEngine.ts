import { FirstTurnPolicy, MoveResult, RoomState, accepted, assertRoomCode, firstRoleStarts, rejected } from './types.js'

export type Mark = 'X' | 'O'
export type TicTacToeCell = Mark | null

export type TicTacToeRejection =
  | 'invalid_square'
  | 'square_occupied'
  | 'not_your_turn'
  | 'match_finished'
  | 'waiting_for_opponent'

// Precomputed winning triplets (indices for 3x3 board)
export const WINNING_LINES: readonly (readonly [number, number, number])[] = [
  [0, 1, 2], // Top row
  [3, 4, 5], // Middle row
  [6, 7, 8], // Bottom row
  [0, 3, 6], // Left column
  [1, 4, 7], // Middle column
  [2, 5, 8], // Right column
  [0, 4, 8], // Diagonal top-left to bottom-right
  [2, 4, 6], // Diagonal top-right to bottom-left
]

export interface TicTacToeSnapshot {
  roomCode: string
  cells: TicTacToeCell[]
  playerXId: string | null
  playerOId: string | null
  currentPlayerId: string | null
  isGameOver: boolean
  winnerPlayerId: string | null
  isDraw: boolean
  winningLine: number[] | null
  moveCount: number
  message: string
}

export interface TicTacToeOptions {
  firstTurn?: FirstTurnPolicy
}

export class TicTacToeRoomState implements RoomState {
  readonly roomCode: string
  private cells: TicTacToeCell[] = Array<TicTacToeCell>(9).fill(null)
  private readonly firstTurn: FirstTurnPolicy

  playerXId: string | null = null
  playerOId: string | null = null
  currentPlayerId: string | null = null
  isGameOver = false
  winnerPlayerId: string | null = null
  isDraw = false
  winningLine: number[] | null = null
  moveCount = 0

  constructor(roomCode: string, options: TicTacToeOptions = {}) {
    this.roomCode = assertRoomCode(roomCode)
    this.firstTurn = options.firstTurn ?? firstRoleStarts
  }

  get board(): readonly TicTacToeCell[] {
    return this.cells
  }

  markFor(playerId: string): Mark | null {
    if (this.playerXId === playerId) return 'X'
    if (this.playerOId === playerId) return 'O'
    return null
  }

  /**
   * First joiner takes X, second O. Returns the player's mark,
   * or null when both marks belong to other players.
   */
  seatPlayer(playerId: string): Mark | null {
    const existing = this.markFor(playerId)
    if (existing) return existing

    if (this.playerXId === null) {
      this.playerXId = playerId
    } else if (this.playerOId === null) {
      this.playerOId = playerId
    } else {
      return null
    }

    // Host holds the turn while waiting; the policy decides once both are bound.
    // A replacement player inherits the turn of the mark it took over.
    if (this.playerXId !== null && this.playerOId !== null && this.moveCount === 0) {
      this.currentPlayerId = this.firstTurn(this.playerXId, this.playerOId)
    } else if (this.currentPlayerId === null || this.markFor(this.currentPlayerId) === null) {
      this.currentPlayerId = playerId
    }
    return this.markFor(playerId)
  }

  unseatPlayer(playerId: string): void {
    if (this.playerXId === playerId) this.playerXId = null
    if (this.playerOId === playerId) this.playerOId = null
  }

  applyMove(playerId: string, cellIndex: number): MoveResult<TicTacToeRejection> {
    if (this.isGameOver) {
      return rejected('match_finished')
    }
    if (this.playerXId === null || this.playerOId === null) {
      return rejected('waiting_for_opponent')
    }
    if (!Number.isInteger(cellIndex) || cellIndex < 0 || cellIndex > 8) {
      return rejected('invalid_square')
    }
    const mark = this.markFor(playerId)
    if (mark === null || this.currentPlayerId !== playerId) {
      return rejected('not_your_turn')
    }
    if (this.cells[cellIndex] !== null) {
      return rejected('square_occupied')
    }

    this.cells[cellIndex] = mark
    this.moveCount++

    const line = this.findWinningLine(mark)
    if (line) {
      this.isGameOver = true
      this.winnerPlayerId = playerId
      this.winningLine = line
      this.isDraw = false
    } else if (this.cells.every(cell => cell !== null)) {
      this.isGameOver = true
      this.isDraw = true
      this.winnerPlayerId = null
    } else {
      this.currentPlayerId = playerId === this.playerXId ? this.playerOId : this.playerXId
    }
    return accepted()
  }

  // Fresh board for the same two players
  restart(): void {
    this.cells = Array<TicTacToeCell>(9).fill(null)
    this.isGameOver = false
    this.winnerPlayerId = null
    this.isDraw = false
    this.winningLine = null
    this.moveCount = 0
    this.currentPlayerId = this.playerXId !== null && this.playerOId !== null
      ? this.firstTurn(this.playerXId, this.playerOId)
      : this.playerXId ?? this.playerOId
  }

  toSnapshot(): TicTacToeSnapshot {
    return {
      roomCode: this.roomCode,
      cells: [...this.cells],
      playerXId: this.playerXId,
      playerOId: this.playerOId,
      currentPlayerId: this.isGameOver ? null : this.currentPlayerId,
      isGameOver: this.isGameOver,
      winnerPlayerId: this.winnerPlayerId,
      isDraw: this.isDraw,
      winningLine: this.winningLine ? [...this.winningLine] : null,
      moveCount: this.moveCount,
      message: this.statusMessage()
    }
  }

  private findWinningLine(mark: Mark): number[] | null {
    for (const line of WINNING_LINES) {
      if (line.every(index => this.cells[index] === mark)) {
        return [...line]
      }
    }
    return null
  }

  private statusMessage(): string {
    if (this.isGameOver) {
      return this.isDraw ? 'Game over: draw.' : `Game over: ${this.winnerPlayerId} wins.`
    }
    if (this.playerXId === null || this.playerOId === null) {
      return 'Waiting for opponent...'
    }
    return `${this.currentPlayerId}'s turn.`
  }
}
