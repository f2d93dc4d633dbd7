import { Card, RANKS, SUITS, createCard } from './card.js'
import { RandomSource, randomInt } from '../utils/random.js'

/**
 * Standard 52-card deck. One instance per room; the random source is
 * owned by the deck so seeded rooms shuffle reproducibly.
 * The top of the deck is the end of the stock array.
 */
export class Deck {
  private cards: Card[] = []
  private readonly rng: RandomSource

  constructor(rng: RandomSource = Math.random) {
    this.rng = rng
    this.reset()
  }

  get count(): number {
    return this.cards.length
  }

  // Canonical order (clubs..spades, 2..A) then shuffled
  reset(): void {
    this.cards = []
    for (const suit of SUITS) {
      for (const rank of RANKS) {
        this.cards.push(createCard(suit, rank))
      }
    }
    this.shuffle()
  }

  // Fisher-Yates, last index down to 1
  shuffle(): void {
    for (let i = this.cards.length - 1; i > 0; i--) {
      const j = randomInt(this.rng, i + 1)
      const tmp = this.cards[i]
      this.cards[i] = this.cards[j]
      this.cards[j] = tmp
    }
  }

  tryDraw(): Card | undefined {
    return this.cards.pop()
  }

  drawMany(count: number): Card[] {
    const drawn: Card[] = []
    while (drawn.length < count) {
      const card = this.cards.pop()
      if (!card) break
      drawn.push(card)
    }
    return drawn
  }

  peekAll(): readonly Card[] {
    return [...this.cards]
  }
}
