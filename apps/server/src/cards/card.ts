export const SUITS = ['clubs', 'diamonds', 'hearts', 'spades'] as const
export type Suit = typeof SUITS[number]

// 11 = Jack, 12 = Queen, 13 = King, 14 = Ace
export const RANKS = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const
export type Rank = typeof RANKS[number]

export interface Card {
  readonly suit: Suit
  readonly rank: Rank
}

const RANK_LABELS: Partial<Record<Rank, string>> = {
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A'
}

const SUIT_SYMBOLS: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠'
}

export function createCard(suit: Suit, rank: Rank): Card {
  return Object.freeze({ suit, rank })
}

// "A♠", "10♥", "J♦"
export function formatCard(card: Card): string {
  return `${RANK_LABELS[card.rank] ?? String(card.rank)}${SUIT_SYMBOLS[card.suit]}`
}
