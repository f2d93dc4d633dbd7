import { Board, Coordinate, sameCoordinate } from '../board/board.js'
import { RandomSource } from '../utils/random.js'
import {
  FirstTurnPolicy,
  MoveResult,
  RoomState,
  SideAssignmentPolicy,
  accepted,
  assertRoomCode,
  randomFirstTurn,
  randomSides,
  rejected
} from './types.js'

export type CheckersPiece = 'empty' | 'red-man' | 'red-king' | 'black-man' | 'black-king'
export type CheckersSide = 'red' | 'black'

export type CheckersRejection =
  | 'match_finished'
  | 'not_started'
  | 'not_your_turn'
  | 'unknown_player'
  | 'out_of_bounds'
  | 'same_square'
  | 'no_piece'
  | 'not_your_piece'
  | 'must_continue_capture'
  | 'destination_occupied'
  | 'not_diagonal'
  | 'invalid_distance'
  | 'men_move_forward'
  | 'capture_required'
  | 'no_piece_to_capture'

export type CheckersResignRejection = 'match_finished' | 'not_started' | 'unknown_player'

export interface CheckersMove {
  from: Coordinate
  to: Coordinate
}

export interface CheckersSnapshot {
  roomCode: string
  // Flattened 8x8, index = row * 8 + col
  cells: CheckersPiece[]
  redPlayerId: string | null
  blackPlayerId: string | null
  isStarted: boolean
  currentTurnPlayerId: string | null
  currentSide: CheckersSide | null
  isGameOver: boolean
  winnerPlayerId: string | null
  forcedFrom: Coordinate | null
  lastMove: CheckersMove | null
  moveNumber: number
  message: string
}

export interface CheckersOptions {
  rng?: RandomSource
  sides?: SideAssignmentPolicy
  firstTurn?: FirstTurnPolicy
}

export const CHECKERS_BOARD_SIZE = 8

const KING_DIRECTIONS: readonly (readonly [number, number])[] = [
  [-1, -1], [-1, 1],
  [1, -1], [1, 1]
]

export function sideOfPiece(piece: CheckersPiece): CheckersSide | null {
  if (piece === 'red-man' || piece === 'red-king') return 'red'
  if (piece === 'black-man' || piece === 'black-king') return 'black'
  return null
}

export function isKing(piece: CheckersPiece): boolean {
  return piece === 'red-king' || piece === 'black-king'
}

export function opponentOf(side: CheckersSide): CheckersSide {
  return side === 'red' ? 'black' : 'red'
}

// Red starts on rows 5-7 and moves toward row 0; black the reverse
export function forwardDirection(side: CheckersSide): number {
  return side === 'red' ? -1 : 1
}

export function promotionRow(side: CheckersSide): number {
  return side === 'red' ? 0 : CHECKERS_BOARD_SIZE - 1
}

/**
 * Server-side state for a single Checkers room.
 *
 * NotStarted -> Active once a second distinct player joins (sides are
 * assigned by the side policy, the board gets the standard layout) ->
 * GameOver when a side runs out of pieces or of legal moves, or resigns.
 *
 * Captures are mandatory. After a capture, if the same piece can capture
 * again, `forcedFrom` pins the next move's origin to that piece and the
 * turn does not pass.
 */
export class CheckersRoomState implements RoomState {
  readonly roomCode: string
  readonly board = Board.create8x8()

  redPlayerId: string | null = null
  blackPlayerId: string | null = null
  isStarted = false
  currentTurnPlayerId: string | null = null
  isGameOver = false
  winnerPlayerId: string | null = null
  forcedFrom: Coordinate | null = null
  lastMove: CheckersMove | null = null
  moveNumber = 0

  private grid: CheckersPiece[][]
  private waitingPlayerId: string | null = null
  // Side whose player left while holding the turn
  private vacatedTurn: CheckersSide | null = null
  private readonly assignSides: SideAssignmentPolicy
  private readonly pickFirstTurn: FirstTurnPolicy

  constructor(roomCode: string, options: CheckersOptions = {}) {
    this.roomCode = assertRoomCode(roomCode)
    const rng = options.rng ?? Math.random
    this.assignSides = options.sides ?? randomSides(rng)
    this.pickFirstTurn = options.firstTurn ?? randomFirstTurn(rng)
    this.grid = emptyGrid()
  }

  pieceAt(row: number, col: number): CheckersPiece {
    if (!this.board.isInside(row, col)) {
      throw new RangeError(`Cell (${row},${col}) is outside the board`)
    }
    return this.grid[row][col]
  }

  sideOf(playerId: string): CheckersSide | null {
    if (this.redPlayerId !== null && this.redPlayerId === playerId) return 'red'
    if (this.blackPlayerId !== null && this.blackPlayerId === playerId) return 'black'
    return null
  }

  get currentSide(): CheckersSide | null {
    return this.currentTurnPlayerId === null ? null : this.sideOf(this.currentTurnPlayerId)
  }

  countPieces(side: CheckersSide): number {
    let count = 0
    for (const { row, col } of this.board.allCells()) {
      if (sideOfPiece(this.grid[row][col]) === side) count++
    }
    return count
  }

  /**
   * Returns the joining player's side, or null while waiting for an
   * opponent (and for spectators once both sides are taken).
   */
  join(playerId: string): CheckersSide | null {
    const existing = this.sideOf(playerId)
    if (existing) return existing

    if (this.isStarted) {
      // A vacated side is taken over by the next joiner
      const side: CheckersSide | null =
        this.redPlayerId === null ? 'red' : this.blackPlayerId === null ? 'black' : null
      if (side === null) return null

      if (side === 'red') this.redPlayerId = playerId
      else this.blackPlayerId = playerId
      if (this.vacatedTurn === side) {
        this.currentTurnPlayerId = playerId
        this.vacatedTurn = null
      }
      return side
    }

    if (this.waitingPlayerId === null || this.waitingPlayerId === playerId) {
      this.waitingPlayerId = playerId
      return null
    }

    const [red, black] = this.assignSides(this.waitingPlayerId, playerId)
    this.redPlayerId = red
    this.blackPlayerId = black
    this.waitingPlayerId = null
    this.startGame()
    return this.sideOf(playerId)
  }

  leave(playerId: string): void {
    if (this.waitingPlayerId === playerId) {
      this.waitingPlayerId = null
      return
    }
    const side = this.sideOf(playerId)
    if (side === null) return
    if (side === 'red') this.redPlayerId = null
    else this.blackPlayerId = null
    if (this.currentTurnPlayerId === playerId) {
      this.currentTurnPlayerId = null
      this.vacatedTurn = side
    }
  }

  applyMove(playerId: string, from: Coordinate, to: Coordinate): MoveResult<CheckersRejection> {
    if (this.isGameOver) return rejected('match_finished')
    if (!this.isStarted) return rejected('not_started')
    if (this.currentTurnPlayerId === null || playerId !== this.currentTurnPlayerId) {
      return rejected('not_your_turn')
    }
    const side = this.sideOf(playerId)
    if (side === null) return rejected('unknown_player')

    if (!this.board.isInside(from.row, from.col) || !this.board.isInside(to.row, to.col)) {
      return rejected('out_of_bounds')
    }
    if (this.forcedFrom !== null && !sameCoordinate(this.forcedFrom, from)) {
      return rejected('must_continue_capture')
    }
    if (sameCoordinate(from, to)) return rejected('same_square')

    const piece = this.grid[from.row][from.col]
    if (piece === 'empty') return rejected('no_piece')
    if (sideOfPiece(piece) !== side) return rejected('not_your_piece')
    if (this.grid[to.row][to.col] !== 'empty') return rejected('destination_occupied')

    const dRow = to.row - from.row
    const dCol = to.col - from.col
    if (Math.abs(dRow) !== Math.abs(dCol)) return rejected('not_diagonal')

    const distance = Math.abs(dRow)
    if (distance !== 1 && distance !== 2) return rejected('invalid_distance')
    const isCapture = distance === 2

    if (!isKing(piece) && Math.sign(dRow) !== forwardDirection(side)) {
      return rejected('men_move_forward')
    }
    if (!isCapture && this.hasAnyCapture(side)) {
      return rejected('capture_required')
    }

    let jumped: Coordinate | null = null
    if (isCapture) {
      jumped = { row: from.row + dRow / 2, col: from.col + dCol / 2 }
      if (sideOfPiece(this.grid[jumped.row][jumped.col]) !== opponentOf(side)) {
        return rejected('no_piece_to_capture')
      }
    }

    // Validation complete; from here on every write belongs to this move
    if (jumped !== null) {
      this.grid[jumped.row][jumped.col] = 'empty'
    }
    const landed = to.row === promotionRow(side) ? promote(piece) : piece
    this.grid[from.row][from.col] = 'empty'
    this.grid[to.row][to.col] = landed

    this.lastMove = { from: { ...from }, to: { ...to } }
    this.moveNumber++

    if (jumped !== null && this.hasCaptureFrom(to.row, to.col)) {
      this.forcedFrom = { ...to }
    } else {
      this.forcedFrom = null
      this.passTurn(side)
    }

    this.updateGameOver(side)
    return accepted()
  }

  resign(playerId: string): MoveResult<CheckersResignRejection> {
    if (this.isGameOver) return rejected('match_finished')
    if (!this.isStarted) return rejected('not_started')
    const side = this.sideOf(playerId)
    if (side === null) return rejected('unknown_player')

    this.finish(side === 'red' ? this.blackPlayerId : this.redPlayerId)
    return accepted()
  }

  // New game for the same two players; colours are drawn again
  restart(): void {
    if (this.redPlayerId === null || this.blackPlayerId === null) {
      this.isStarted = false
      this.isGameOver = false
      this.winnerPlayerId = null
      this.currentTurnPlayerId = null
      this.forcedFrom = null
      this.lastMove = null
      this.moveNumber = 0
      this.grid = emptyGrid()
      this.vacatedTurn = null
      this.waitingPlayerId = this.redPlayerId ?? this.blackPlayerId
      this.redPlayerId = null
      this.blackPlayerId = null
      return
    }
    const [red, black] = this.assignSides(this.redPlayerId, this.blackPlayerId)
    this.redPlayerId = red
    this.blackPlayerId = black
    this.startGame()
  }

  hasAnyCapture(side: CheckersSide): boolean {
    for (const { row, col } of this.board.allCells()) {
      if (sideOfPiece(this.grid[row][col]) === side && this.hasCaptureFrom(row, col)) {
        return true
      }
    }
    return false
  }

  hasAnyMove(side: CheckersSide): boolean {
    for (const { row, col } of this.board.allCells()) {
      if (sideOfPiece(this.grid[row][col]) !== side) continue
      if (this.hasSimpleMoveFrom(row, col) || this.hasCaptureFrom(row, col)) {
        return true
      }
    }
    return false
  }

  hasCaptureFrom(row: number, col: number): boolean {
    const piece = this.grid[row][col]
    const side = sideOfPiece(piece)
    if (side === null) return false

    return this.directionsFor(piece, side).some(([dRow, dCol]) => {
      const midRow = row + dRow
      const midCol = col + dCol
      const toRow = row + 2 * dRow
      const toCol = col + 2 * dCol
      if (!this.board.isInside(midRow, midCol) || !this.board.isInside(toRow, toCol)) {
        return false
      }
      return sideOfPiece(this.grid[midRow][midCol]) === opponentOf(side) &&
        this.grid[toRow][toCol] === 'empty'
    })
  }

  toSnapshot(): CheckersSnapshot {
    const cells: CheckersPiece[] = []
    for (const { row, col } of this.board.allCells()) {
      cells[this.board.toIndex(row, col)] = this.grid[row][col]
    }
    return {
      roomCode: this.roomCode,
      cells,
      redPlayerId: this.redPlayerId,
      blackPlayerId: this.blackPlayerId,
      isStarted: this.isStarted,
      currentTurnPlayerId: this.currentTurnPlayerId,
      currentSide: this.currentSide,
      isGameOver: this.isGameOver,
      winnerPlayerId: this.winnerPlayerId,
      forcedFrom: this.forcedFrom ? { ...this.forcedFrom } : null,
      lastMove: this.lastMove
        ? { from: { ...this.lastMove.from }, to: { ...this.lastMove.to } }
        : null,
      moveNumber: this.moveNumber,
      message: this.statusMessage()
    }
  }

  /**
   * Rebuild a room from a snapshot (e.g. one broadcast earlier). The
   * snapshot must describe a consistent position; a forced square that
   * does not hold a piece of the side to move is rejected.
   */
  static restore(snapshot: CheckersSnapshot, options: CheckersOptions = {}): CheckersRoomState {
    const state = new CheckersRoomState(snapshot.roomCode, options)
    if (snapshot.cells.length !== CHECKERS_BOARD_SIZE * CHECKERS_BOARD_SIZE) {
      throw new RangeError(`Expected ${CHECKERS_BOARD_SIZE * CHECKERS_BOARD_SIZE} cells, got ${snapshot.cells.length}`)
    }
    snapshot.cells.forEach((piece, index) => {
      const { row, col } = state.board.fromIndex(index)
      state.grid[row][col] = piece
    })
    state.redPlayerId = snapshot.redPlayerId
    state.blackPlayerId = snapshot.blackPlayerId
    state.isStarted = snapshot.isStarted
    state.currentTurnPlayerId = snapshot.currentTurnPlayerId
    state.isGameOver = snapshot.isGameOver
    state.winnerPlayerId = snapshot.winnerPlayerId
    state.lastMove = snapshot.lastMove
      ? { from: { ...snapshot.lastMove.from }, to: { ...snapshot.lastMove.to } }
      : null
    state.moveNumber = snapshot.moveNumber

    if (snapshot.forcedFrom !== null) {
      const { row, col } = snapshot.forcedFrom
      const forcedSide = state.board.isInside(row, col) ? sideOfPiece(state.grid[row][col]) : null
      if (forcedSide === null || forcedSide !== state.currentSide) {
        throw new Error(`Forced square (${row},${col}) does not hold a piece of the side to move`)
      }
      state.forcedFrom = { row, col }
    }
    return state
  }

  private startGame(): void {
    if (this.redPlayerId === null || this.blackPlayerId === null) {
      throw new Error('Cannot start checkers without both sides bound')
    }
    this.grid = startingGrid(this.board)
    this.isStarted = true
    this.isGameOver = false
    this.winnerPlayerId = null
    this.forcedFrom = null
    this.lastMove = null
    this.moveNumber = 0
    this.vacatedTurn = null
    this.currentTurnPlayerId = this.pickFirstTurn(this.redPlayerId, this.blackPlayerId)
  }

  private passTurn(mover: CheckersSide): void {
    const next = opponentOf(mover)
    this.currentTurnPlayerId = next === 'red' ? this.redPlayerId : this.blackPlayerId
    if (this.currentTurnPlayerId === null) {
      this.vacatedTurn = next
    }
  }

  private updateGameOver(mover: CheckersSide): void {
    const opponent = opponentOf(mover)
    const moverId = mover === 'red' ? this.redPlayerId : this.blackPlayerId

    // Losing the last piece ends the game even mid-chain
    if (this.countPieces(opponent) === 0) {
      this.finish(moverId)
      return
    }

    // Side to move next is stuck
    if (this.forcedFrom === null && !this.hasAnyMove(opponent)) {
      this.finish(moverId)
    }
  }

  private finish(winnerPlayerId: string | null): void {
    this.isGameOver = true
    this.winnerPlayerId = winnerPlayerId
    this.currentTurnPlayerId = null
    this.forcedFrom = null
  }

  private hasSimpleMoveFrom(row: number, col: number): boolean {
    const piece = this.grid[row][col]
    const side = sideOfPiece(piece)
    if (side === null) return false

    return this.directionsFor(piece, side).some(([dRow, dCol]) => {
      const toRow = row + dRow
      const toCol = col + dCol
      return this.board.isInside(toRow, toCol) && this.grid[toRow][toCol] === 'empty'
    })
  }

  private directionsFor(piece: CheckersPiece, side: CheckersSide): readonly (readonly [number, number])[] {
    if (isKing(piece)) return KING_DIRECTIONS
    const forward = forwardDirection(side)
    return [[forward, -1], [forward, 1]]
  }

  private statusMessage(): string {
    if (this.isGameOver) {
      return this.winnerPlayerId ? `${this.winnerPlayerId} wins!` : 'Game over.'
    }
    if (!this.isStarted) return 'Waiting for opponent...'
    if (this.currentTurnPlayerId === null) return 'Waiting for a player to return...'
    if (this.forcedFrom !== null) return `${this.currentTurnPlayerId} must continue capturing.`
    return `${this.currentTurnPlayerId}'s turn.`
  }
}

function emptyGrid(): CheckersPiece[][] {
  return Array.from({ length: CHECKERS_BOARD_SIZE }, () =>
    Array<CheckersPiece>(CHECKERS_BOARD_SIZE).fill('empty'))
}

// Black men on rows 0-2, red men on rows 5-7, dark squares only
function startingGrid(board: Board): CheckersPiece[][] {
  const grid = emptyGrid()
  for (const { row, col } of board.allCells()) {
    if (!board.isDarkSquare(row, col)) continue
    if (row <= 2) grid[row][col] = 'black-man'
    else if (row >= board.rows - 3) grid[row][col] = 'red-man'
  }
  return grid
}

function promote(piece: CheckersPiece): CheckersPiece {
  if (piece === 'red-man') return 'red-king'
  if (piece === 'black-man') return 'black-king'
  return piece
}
