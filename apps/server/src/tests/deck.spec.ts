import { describe, test, expect } from 'vitest'
import { createCard, formatCard } from '../cards/card.js'
import { Deck } from '../cards/deck.js'
import { mulberry32 } from '../utils/random.js'

// j === i on every Fisher-Yates step, so the shuffle leaves canonical order
const noSwap = () => 0.999999

describe('Card', () => {
  test('cards are immutable values', () => {
    const card = createCard('hearts', 12)
    expect(Object.isFrozen(card)).toBe(true)
    expect(card).toEqual(createCard('hearts', 12))
    expect(card).not.toEqual(createCard('spades', 12))
  })

  test('formatCard uses face labels and suit symbols', () => {
    expect(formatCard(createCard('spades', 14))).toBe('A♠')
    expect(formatCard(createCard('hearts', 10))).toBe('10♥')
    expect(formatCard(createCard('diamonds', 11))).toBe('J♦')
    expect(formatCard(createCard('clubs', 2))).toBe('2♣')
  })
})

describe('Deck', () => {
  test('a fresh deck holds 52 distinct cards', () => {
    const deck = new Deck(mulberry32(7))
    const cards = deck.peekAll()
    expect(deck.count).toBe(52)
    const keys = new Set(cards.map(c => `${c.suit}:${c.rank}`))
    expect(keys.size).toBe(52)
  })

  test('draws from the top (end of the stock)', () => {
    const deck = new Deck(noSwap)
    expect(deck.tryDraw()).toEqual({ suit: 'spades', rank: 14 })
    expect(deck.tryDraw()).toEqual({ suit: 'spades', rank: 13 })
    expect(deck.count).toBe(50)
  })

  test('tryDraw on an empty deck returns undefined', () => {
    const deck = new Deck(noSwap)
    expect(deck.drawMany(52)).toHaveLength(52)
    expect(deck.count).toBe(0)
    expect(deck.tryDraw()).toBeUndefined()
  })

  test('drawMany never hands out more than 52 cards', () => {
    const deck = new Deck(mulberry32(11))
    expect(deck.drawMany(60)).toHaveLength(52)
    expect(deck.count).toBe(0)
  })

  test('52 single draws give every card once, then nothing', () => {
    const deck = new Deck(mulberry32(3))
    const keys = new Set<string>()
    for (let i = 0; i < 52; i++) {
      const card = deck.tryDraw()
      expect(card).toBeDefined()
      if (card) keys.add(`${card.suit}:${card.rank}`)
    }
    expect(keys.size).toBe(52)
    expect(deck.tryDraw()).toBeUndefined()
  })

  test('drawMany stops when the deck runs out', () => {
    const deck = new Deck(noSwap)
    deck.drawMany(50)
    const rest = deck.drawMany(5)
    expect(rest).toEqual([{ suit: 'clubs', rank: 3 }, { suit: 'clubs', rank: 2 }])
  })

  test('same seed gives the same order; reset restores 52 cards', () => {
    const a = new Deck(mulberry32(42))
    const b = new Deck(mulberry32(42))
    expect(a.peekAll()).toEqual(b.peekAll())

    a.drawMany(10)
    a.reset()
    expect(a.count).toBe(52)
  })

  test('peekAll returns a copy', () => {
    const deck = new Deck(noSwap)
    const copy = deck.peekAll()
    deck.tryDraw()
    expect(copy).toHaveLength(52)
  })
})
