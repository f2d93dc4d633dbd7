import { Card } from '../cards/card.js'
import { Deck } from '../cards/deck.js'
import { RandomSource } from '../utils/random.js'
import { MoveResult, accepted, rejected } from './types.js'

export type BlackjackPhase = 'lobby' | 'dealing' | 'player-turns' | 'dealer-turn' | 'round-results'
export type BlackjackResult = 'pending' | 'win' | 'lose' | 'push' | 'blackjack'
export type BlackjackAction = 'hit' | 'stand'

export type BlackjackStartRejection = 'no_players' | 'round_in_progress'
export type BlackjackActionRejection = 'not_player_turns' | 'not_your_turn' | 'unknown_player'

export const STARTING_CHIPS = 100
export const FIXED_BET = 1
export const DEALER_STANDS_ON = 17

export interface BlackjackPlayerState {
  playerId: string
  isInRound: boolean
  hasStood: boolean
  isBust: boolean
  chips: number
  bet: number
  result: BlackjackResult
  hand: Card[]
}

// Best total: aces count 11 until that would bust, then 1
export function computeHandValue(hand: readonly Card[]): number {
  let total = 0
  let aces = 0
  for (const card of hand) {
    if (card.rank === 14) {
      aces++
      total += 11
    } else if (card.rank >= 11) {
      total += 10
    } else {
      total += card.rank
    }
  }
  while (total > 21 && aces > 0) {
    total -= 10
    aces--
  }
  return total
}

export function isNaturalBlackjack(hand: readonly Card[]): boolean {
  return hand.length === 2 && computeHandValue(hand) === 21
}

/**
 * Round engine for 1-4 players against the dealer. Players act in join
 * order; the dealer draws to 17 or more, then results are settled at a
 * fixed bet.
 */
export class BlackjackEngine {
  private readonly deck: Deck
  private readonly playerStates: BlackjackPlayerState[] = []
  private readonly dealer: Card[] = []
  private currentIndex = -1

  phase: BlackjackPhase = 'lobby'
  round = 0

  constructor(rng: RandomSource = Math.random) {
    this.deck = new Deck(rng)
  }

  get players(): readonly BlackjackPlayerState[] {
    return this.playerStates
  }

  get dealerHand(): readonly Card[] {
    return this.dealer
  }

  get dealerRevealed(): boolean {
    return this.phase === 'dealer-turn' || this.phase === 'round-results'
  }

  get cardsRemaining(): number {
    return this.deck.count
  }

  get currentPlayerId(): string | null {
    if (this.phase !== 'player-turns') return null
    return this.playerStates[this.currentIndex]?.playerId ?? null
  }

  getPlayer(playerId: string): BlackjackPlayerState | undefined {
    return this.playerStates.find(p => p.playerId === playerId)
  }

  ensurePlayer(playerId: string): void {
    if (this.getPlayer(playerId)) return
    this.playerStates.push({
      playerId,
      isInRound: false,
      hasStood: false,
      isBust: false,
      chips: STARTING_CHIPS,
      bet: FIXED_BET,
      result: 'pending',
      hand: []
    })
  }

  removePlayer(playerId: string): void {
    const index = this.playerStates.findIndex(p => p.playerId === playerId)
    if (index < 0) return

    this.playerStates.splice(index, 1)

    if (this.playerStates.length === 0) {
      this.phase = 'lobby'
      this.dealer.length = 0
      this.currentIndex = -1
      return
    }

    if (this.phase !== 'player-turns') return
    if (index < this.currentIndex) {
      this.currentIndex--
    } else if (index === this.currentIndex) {
      this.advanceFrom(index - 1)
    }
  }

  startRound(): MoveResult<BlackjackStartRejection> {
    if (this.playerStates.length === 0) return rejected('no_players')
    if (this.phase !== 'lobby' && this.phase !== 'round-results') {
      return rejected('round_in_progress')
    }

    this.phase = 'dealing'
    this.round++
    this.deck.reset()
    this.dealer.length = 0
    for (const p of this.playerStates) {
      p.hand = []
      p.isInRound = true
      p.hasStood = false
      p.isBust = false
      p.result = 'pending'
      p.bet = FIXED_BET
    }

    // Two passes: one card to each player, then the dealer
    for (let pass = 0; pass < 2; pass++) {
      for (const p of this.playerStates) {
        const card = this.deck.tryDraw()
        if (card) p.hand.push(card)
      }
      const dealerCard = this.deck.tryDraw()
      if (dealerCard) this.dealer.push(dealerCard)
    }

    this.phase = 'player-turns'
    this.advanceFrom(-1)
    return accepted()
  }

  applyAction(playerId: string, action: BlackjackAction): MoveResult<BlackjackActionRejection> {
    if (this.phase !== 'player-turns') return rejected('not_player_turns')

    const index = this.playerStates.findIndex(p => p.playerId === playerId)
    if (index < 0) return rejected('unknown_player')
    if (index !== this.currentIndex) return rejected('not_your_turn')

    const player = this.playerStates[index]
    if (action === 'hit') {
      const card = this.deck.tryDraw()
      if (card) {
        player.hand.push(card)
        if (computeHandValue(player.hand) > 21) {
          player.isBust = true
        }
      }
    } else {
      player.hasStood = true
    }

    if (player.isBust || player.hasStood) {
      this.advanceFrom(index)
    }
    return accepted()
  }

  private advanceFrom(index: number): void {
    for (let i = index + 1; i < this.playerStates.length; i++) {
      const p = this.playerStates[i]
      if (p.isInRound && !p.isBust && !p.hasStood) {
        this.currentIndex = i
        return
      }
    }
    this.currentIndex = -1
    this.playDealer()
  }

  private playDealer(): void {
    this.phase = 'dealer-turn'
    while (computeHandValue(this.dealer) < DEALER_STANDS_ON) {
      const card = this.deck.tryDraw()
      if (!card) break
      this.dealer.push(card)
    }
    this.settle()
    this.phase = 'round-results'
  }

  private settle(): void {
    const dealerValue = computeHandValue(this.dealer)
    const dealerBust = dealerValue > 21
    const dealerNatural = isNaturalBlackjack(this.dealer)

    for (const p of this.playerStates) {
      if (!p.isInRound) {
        p.result = 'pending'
        continue
      }
      const value = computeHandValue(p.hand)
      if (p.isBust) {
        p.result = 'lose'
      } else if (isNaturalBlackjack(p.hand)) {
        p.result = dealerNatural ? 'push' : 'blackjack'
      } else if (dealerBust || value > dealerValue) {
        p.result = 'win'
      } else if (value < dealerValue) {
        p.result = 'lose'
      } else {
        p.result = 'push'
      }

      if (p.result === 'win' || p.result === 'blackjack') p.chips += p.bet
      else if (p.result === 'lose') p.chips -= p.bet
    }
  }
}
