import { RandomSource, randomInt } from '../utils/random.js'

// The only thing the dispatcher needs to know about a game session
export interface RoomState {
  readonly roomCode: string
}

export type GameType = 'tictactoe' | 'checkers' | 'blackjack'

// Validation failures are values, not exceptions
export type MoveResult<Reason extends string> =
  | { ok: true }
  | { ok: false; reason: Reason }

export function accepted<Reason extends string>(): MoveResult<Reason> {
  return { ok: true }
}

export function rejected<Reason extends string>(reason: Reason): MoveResult<Reason> {
  return { ok: false, reason }
}

export function assertRoomCode(roomCode: string): string {
  if (roomCode.trim().length === 0) {
    throw new Error('Room code cannot be empty')
  }
  return roomCode
}

/**
 * Chooses which of two joiners takes the first role (X, Red...).
 * Returns the pair reordered as [first role, second role].
 */
export type SideAssignmentPolicy = (first: string, second: string) => [string, string]

/**
 * Chooses who moves first given the two bound players, in role order.
 */
export type FirstTurnPolicy = (first: string, second: string) => string

export const joinOrderSides: SideAssignmentPolicy = (first, second) => [first, second]

export const firstRoleStarts: FirstTurnPolicy = (first) => first

export function randomSides(rng: RandomSource): SideAssignmentPolicy {
  return (first, second) => randomInt(rng, 2) === 0 ? [first, second] : [second, first]
}

export function randomFirstTurn(rng: RandomSource): FirstTurnPolicy {
  return (first, second) => randomInt(rng, 2) === 0 ? first : second
}
