import { Card, Rank, Suit, formatCard } from '../cards/card.js'
import { RandomSource } from '../utils/random.js'
import { BlackjackEngine, BlackjackPhase, BlackjackResult, computeHandValue } from './blackjackEngine.js'
import { RoomState, assertRoomCode } from './types.js'

export const BLACKJACK_SEATS = 4

export type BlackjackCardView =
  | { faceDown: false; suit: Suit; rank: Rank; label: string }
  | { faceDown: true }

export interface BlackjackSeatView {
  seatIndex: number
  playerId: string | null
  cards: BlackjackCardView[]
  handValue: number
  chips: number
  bet: number
  result: BlackjackResult
  isInRound: boolean
  hasStood: boolean
  isBust: boolean
  isCurrentTurn: boolean
}

export interface BlackjackSnapshot {
  roomCode: string
  phase: BlackjackPhase
  round: number
  gameStarted: boolean
  seatedCount: number
  seats: BlackjackSeatView[]
  currentPlayerId: string | null
  dealerCards: BlackjackCardView[]
  // Only the visible cards count until the dealer reveals
  dealerValue: number
  message: string
}

function faceUp(card: Card): BlackjackCardView {
  return { faceDown: false, suit: card.suit, rank: card.rank, label: formatCard(card) }
}

const FACE_DOWN: BlackjackCardView = { faceDown: true }

/**
 * Seat bookkeeping around the round engine. Dealing, scoring and betting
 * live in the engine; this owns the room identity and the 4-seat table.
 */
export class BlackjackRoomState implements RoomState {
  readonly roomCode: string
  readonly engine: BlackjackEngine
  private readonly seats: (string | null)[] = Array<string | null>(BLACKJACK_SEATS).fill(null)

  constructor(roomCode: string, rng: RandomSource = Math.random) {
    this.roomCode = assertRoomCode(roomCode)
    this.engine = new BlackjackEngine(rng)
  }

  get seatPlayerIds(): readonly (string | null)[] {
    return this.seats
  }

  get seatedCount(): number {
    return this.seats.filter(id => id !== null && id !== '').length
  }

  get gameStarted(): boolean {
    return this.engine.phase !== 'lobby'
  }

  /**
   * Idempotent. When every seat is taken this returns 0 without claiming
   * it; callers cap room occupancy at four before getting here.
   */
  getOrAssignSeatForPlayer(playerId: string): number {
    const existing = this.tryGetSeatIndex(playerId)
    if (existing !== undefined) return existing

    const free = this.seats.indexOf(null)
    if (free < 0) return 0
    this.seats[free] = playerId
    return free
  }

  unseatPlayer(playerId: string): void {
    for (let i = 0; i < this.seats.length; i++) {
      if (this.seats[i] === playerId) {
        this.seats[i] = null
      }
    }
  }

  tryGetSeatIndex(playerId: string): number | undefined {
    const index = this.seats.indexOf(playerId)
    return index < 0 ? undefined : index
  }

  toSnapshot(): BlackjackSnapshot {
    const currentPlayerId = this.engine.currentPlayerId
    const seats = this.seats.map((playerId, seatIndex): BlackjackSeatView => {
      const player = playerId === null ? undefined : this.engine.getPlayer(playerId)
      return {
        seatIndex,
        playerId,
        cards: player ? player.hand.map(faceUp) : [],
        handValue: player ? computeHandValue(player.hand) : 0,
        chips: player?.chips ?? 0,
        bet: player?.bet ?? 0,
        result: player?.result ?? 'pending',
        isInRound: player?.isInRound ?? false,
        hasStood: player?.hasStood ?? false,
        isBust: player?.isBust ?? false,
        isCurrentTurn: playerId !== null && playerId === currentPlayerId
      }
    })

    const revealed = this.engine.dealerRevealed
    const dealer = this.engine.dealerHand
    const visible = revealed ? dealer : dealer.slice(0, 1)
    // Hole card stays hidden until the dealer plays
    const dealerCards = dealer.map((card, index) =>
      revealed || index === 0 ? faceUp(card) : FACE_DOWN)

    return {
      roomCode: this.roomCode,
      phase: this.engine.phase,
      round: this.engine.round,
      gameStarted: this.gameStarted,
      seatedCount: this.seatedCount,
      seats,
      currentPlayerId,
      dealerCards,
      dealerValue: computeHandValue(visible),
      message: this.statusMessage(currentPlayerId)
    }
  }

  private statusMessage(currentPlayerId: string | null): string {
    switch (this.engine.phase) {
      case 'lobby':
        return this.seatedCount === 0 ? 'Waiting for players...' : 'Waiting for P1 to start the round.'
      case 'player-turns':
        return `${currentPlayerId}'s turn.`
      case 'round-results':
        return 'Round over.'
      default:
        return 'Dealing...'
    }
  }
}
