import { Mutex } from 'async-mutex'
import { v4 as uuidv4 } from 'uuid'
import { BlackjackActionRejection, BlackjackStartRejection } from '../engine/blackjackEngine.js'
import { BLACKJACK_SEATS, BlackjackRoomState, BlackjackSnapshot } from '../engine/blackjackRoomState.js'
import {
  CheckersOptions,
  CheckersRejection,
  CheckersResignRejection,
  CheckersRoomState,
  CheckersSnapshot
} from '../engine/checkersEngine.js'
import { TicTacToeOptions, TicTacToeRejection, TicTacToeRoomState, TicTacToeSnapshot } from '../engine/tictactoeEngine.js'
import { GameType, MoveResult } from '../engine/types.js'
import { Room } from '../types/room.js'
import { logEvent } from '../utils/log.js'
import { RandomSource, mulberry32, seedFromId } from '../utils/random.js'
import { GameAction } from './actions.js'

export type GameRoom =
  | { type: 'tictactoe'; state: TicTacToeRoomState }
  | { type: 'checkers'; state: CheckersRoomState }
  | { type: 'blackjack'; state: BlackjackRoomState }

export type GameSnapshot =
  | { type: 'tictactoe'; state: TicTacToeSnapshot }
  | { type: 'checkers'; state: CheckersSnapshot }
  | { type: 'blackjack'; state: BlackjackSnapshot }

export type ActionRejection =
  | TicTacToeRejection
  | CheckersRejection
  | CheckersResignRejection
  | BlackjackStartRejection
  | BlackjackActionRejection
  | 'room_not_found'
  | 'wrong_game'
  | 'not_host'

export type ActionResult =
  | { ok: true; snapshot: GameSnapshot }
  | { ok: false; reason: ActionRejection; snapshot?: GameSnapshot }

export const HOST_PLAYER_ID = 'P1'

const roomNotFound = (): ActionResult => ({ ok: false, reason: 'room_not_found' })

export interface GameServiceOptions {
  // Builds the random source for a new room from its seed
  rngFactory?: (seed: number) => RandomSource
  tictactoe?: TicTacToeOptions
  checkers?: Omit<CheckersOptions, 'rng'>
}

/**
 * Owns one game state per room and serializes every mutation of it
 * through that room's mutex.
 */
export class GameService {
  private games = new Map<string, GameRoom>()
  private mutexes = new Map<string, Mutex>()
  private readonly rngFactory: (seed: number) => RandomSource

  constructor(private readonly options: GameServiceOptions = {}) {
    this.rngFactory = options.rngFactory ?? mulberry32
  }

  createRoomState(room: Room): GameRoom {
    const existing = this.games.get(room.code)
    if (existing) return existing

    const seed = seedFromId(uuidv4())
    const rng = this.rngFactory(seed)
    const game = this.buildGame(room.code, room.gameType, rng)

    this.games.set(room.code, game)
    this.mutexes.set(room.code, new Mutex())
    logEvent('game.create', { roomCode: room.code, gameType: room.gameType, seed })
    return game
  }

  async onPlayerJoined(room: Room, playerId: string): Promise<GameSnapshot> {
    const created = this.createRoomState(room)
    return this.withRoomLock(room.code, game => {
      switch (game.type) {
        case 'tictactoe': {
          const mark = game.state.seatPlayer(playerId)
          logEvent('game.seat', { roomCode: room.code, playerId, role: mark })
          break
        }
        case 'checkers': {
          const side = game.state.join(playerId)
          logEvent('game.seat', { roomCode: room.code, playerId, role: side })
          break
        }
        case 'blackjack': {
          if (game.state.tryGetSeatIndex(playerId) === undefined && game.state.seatedCount >= BLACKJACK_SEATS) {
            logEvent('game.seat', { roomCode: room.code, playerId, role: null })
            break
          }
          const seat = game.state.getOrAssignSeatForPlayer(playerId)
          game.state.engine.ensurePlayer(playerId)
          logEvent('game.seat', { roomCode: room.code, playerId, role: `seat${seat}` })
          break
        }
      }
      return this.snapshotOf(game)
    }, () => this.snapshotOf(created))
  }

  async onPlayerLeft(room: Room, playerId: string): Promise<GameSnapshot | undefined> {
    return this.withRoomLock(room.code, (game): GameSnapshot | undefined => {
      switch (game.type) {
        case 'tictactoe':
          game.state.unseatPlayer(playerId)
          break
        case 'checkers':
          game.state.leave(playerId)
          break
        case 'blackjack':
          game.state.unseatPlayer(playerId)
          game.state.engine.removePlayer(playerId)
          break
      }
      logEvent('game.unseat', { roomCode: room.code, playerId })
      return this.snapshotOf(game)
    }, () => undefined)
  }

  async handleAction(code: string, playerId: string, action: GameAction): Promise<ActionResult> {
    return this.withRoomLock(code, (game): ActionResult => {
      const result = this.dispatch(game, playerId, action)
      const snapshot = this.snapshotOf(game)

      logEvent('game.action', {
        roomCode: code,
        playerId,
        action: action.type,
        ok: result.ok,
        reason: result.ok ? null : result.reason
      })

      if (!result.ok) {
        return { ok: false, reason: result.reason, snapshot }
      }
      return { ok: true, snapshot }
    }, roomNotFound)
  }

  // Fresh game for the same players; for blackjack that is the host dealing the next round
  async restartRoom(code: string, playerId: string): Promise<ActionResult> {
    return this.withRoomLock(code, (game): ActionResult => {
      let result: MoveResult<ActionRejection> = { ok: true }
      switch (game.type) {
        case 'tictactoe':
        case 'checkers':
          game.state.restart()
          break
        case 'blackjack':
          result = playerId === HOST_PLAYER_ID ? game.state.engine.startRound() : { ok: false, reason: 'not_host' }
          break
      }

      logEvent('game.restart', { roomCode: code, gameType: game.type, playerId, ok: result.ok })
      const snapshot = this.snapshotOf(game)
      return result.ok ? { ok: true, snapshot } : { ok: false, reason: result.reason, snapshot }
    }, roomNotFound)
  }

  getSnapshot(code: string): GameSnapshot | undefined {
    const game = this.games.get(code)
    return game ? this.snapshotOf(game) : undefined
  }

  removeRoom(code: string): void {
    if (this.games.delete(code)) {
      this.mutexes.delete(code)
      logEvent('game.remove', { roomCode: code })
    }
  }

  getActiveGameCount(): number {
    return this.games.size
  }

  snapshotOf(game: GameRoom): GameSnapshot {
    switch (game.type) {
      case 'tictactoe':
        return { type: 'tictactoe', state: game.state.toSnapshot() }
      case 'checkers':
        return { type: 'checkers', state: game.state.toSnapshot() }
      case 'blackjack':
        return { type: 'blackjack', state: game.state.toSnapshot() }
    }
  }

  private buildGame(code: string, gameType: GameType, rng: RandomSource): GameRoom {
    switch (gameType) {
      case 'tictactoe':
        return { type: 'tictactoe', state: new TicTacToeRoomState(code, this.options.tictactoe) }
      case 'checkers':
        return { type: 'checkers', state: new CheckersRoomState(code, { ...this.options.checkers, rng }) }
      case 'blackjack':
        return { type: 'blackjack', state: new BlackjackRoomState(code, rng) }
    }
  }

  private dispatch(game: GameRoom, playerId: string, action: GameAction): MoveResult<ActionRejection> {
    switch (action.type) {
      case 'tictactoe.move':
        if (game.type !== 'tictactoe') return { ok: false, reason: 'wrong_game' }
        return game.state.applyMove(playerId, action.cellIndex)
      case 'checkers.move':
        if (game.type !== 'checkers') return { ok: false, reason: 'wrong_game' }
        return game.state.applyMove(playerId, action.from, action.to)
      case 'checkers.resign':
        if (game.type !== 'checkers') return { ok: false, reason: 'wrong_game' }
        return game.state.resign(playerId)
      case 'blackjack.start':
        if (game.type !== 'blackjack') return { ok: false, reason: 'wrong_game' }
        if (playerId !== HOST_PLAYER_ID) return { ok: false, reason: 'not_host' }
        return game.state.engine.startRound()
      case 'blackjack.action':
        if (game.type !== 'blackjack') return { ok: false, reason: 'wrong_game' }
        return game.state.engine.applyAction(playerId, action.action)
    }
  }

  // Runs fn on the room's game under its mutex; a room removed before the lock is taken gets onMissing
  private async withRoomLock<T>(code: string, fn: (game: GameRoom) => T, onMissing: () => T): Promise<T> {
    const mutex = this.mutexes.get(code)
    if (!mutex) return onMissing()
    return mutex.runExclusive(() => {
      const game = this.games.get(code)
      return game ? fn(game) : onMissing()
    })
  }
}
