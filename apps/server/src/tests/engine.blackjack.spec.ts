import { describe, it, test, expect } from 'vitest'
import { createCard } from '../cards/card.js'
import { BlackjackEngine, computeHandValue, isNaturalBlackjack } from '../engine/blackjackEngine.js'
import { BlackjackRoomState } from '../engine/blackjackRoomState.js'

// Shuffle leaves canonical order, so draws come off as A♠, K♠, Q♠, J♠, 10♠, ...
const noSwap = () => 0.999999

describe('computeHandValue', () => {
  test('counts faces as ten and aces as eleven when they fit', () => {
    expect(computeHandValue([createCard('hearts', 13), createCard('clubs', 12), createCard('spades', 5)])).toBe(25)
    expect(computeHandValue([createCard('hearts', 14), createCard('clubs', 5)])).toBe(16)
    expect(computeHandValue([createCard('hearts', 14), createCard('clubs', 14), createCard('spades', 9)])).toBe(21)
    expect(computeHandValue([])).toBe(0)
  })

  test('a natural is exactly two cards worth 21', () => {
    expect(isNaturalBlackjack([createCard('hearts', 14), createCard('clubs', 13)])).toBe(true)
    expect(isNaturalBlackjack([createCard('hearts', 7), createCard('clubs', 7), createCard('spades', 7)])).toBe(false)
  })
})

describe('BlackjackEngine', () => {
  it('refuses to start without players', () => {
    const engine = new BlackjackEngine(noSwap)
    expect(engine.startRound()).toEqual({ ok: false, reason: 'no_players' })
    expect(engine.applyAction('P1', 'hit')).toEqual({ ok: false, reason: 'not_player_turns' })
  })

  it('deals two cards to each player and the dealer', () => {
    const engine = new BlackjackEngine(noSwap)
    engine.ensurePlayer('P1')
    engine.ensurePlayer('P2')
    engine.ensurePlayer('P2')

    expect(engine.startRound()).toEqual({ ok: true })
    expect(engine.players).toHaveLength(2)
    expect(engine.players[0].hand).toEqual([createCard('spades', 14), createCard('spades', 11)])
    expect(engine.players[1].hand).toEqual([createCard('spades', 13), createCard('spades', 10)])
    expect(engine.dealerHand).toEqual([createCard('spades', 12), createCard('spades', 9)])
    expect(engine.cardsRemaining).toBe(46)
    expect(engine.phase).toBe('player-turns')
    expect(engine.round).toBe(1)
    expect(engine.currentPlayerId).toBe('P1')
    expect(engine.startRound()).toEqual({ ok: false, reason: 'round_in_progress' })
  })

  it('plays a round through to settlement', () => {
    const engine = new BlackjackEngine(noSwap)
    engine.ensurePlayer('P1')
    engine.ensurePlayer('P2')
    engine.startRound()

    expect(engine.applyAction('P2', 'stand')).toEqual({ ok: false, reason: 'not_your_turn' })
    expect(engine.applyAction('P9', 'stand')).toEqual({ ok: false, reason: 'unknown_player' })

    expect(engine.applyAction('P1', 'stand')).toEqual({ ok: true })
    expect(engine.currentPlayerId).toBe('P2')

    // 20 + 8♠ busts
    expect(engine.applyAction('P2', 'hit')).toEqual({ ok: true })
    expect(engine.getPlayer('P2')?.isBust).toBe(true)

    expect(engine.phase).toBe('round-results')
    expect(engine.dealerRevealed).toBe(true)
    expect(computeHandValue(engine.dealerHand)).toBe(19)
    expect(engine.getPlayer('P1')?.result).toBe('blackjack')
    expect(engine.getPlayer('P1')?.chips).toBe(101)
    expect(engine.getPlayer('P2')?.result).toBe('lose')
    expect(engine.getPlayer('P2')?.chips).toBe(99)
  })

  it('starts the next round from results', () => {
    const engine = new BlackjackEngine(noSwap)
    engine.ensurePlayer('P1')
    engine.startRound()
    engine.applyAction('P1', 'stand')

    expect(engine.phase).toBe('round-results')
    expect(engine.startRound()).toEqual({ ok: true })
    expect(engine.round).toBe(2)
    expect(engine.getPlayer('P1')?.result).toBe('pending')
    expect(engine.getPlayer('P1')?.hand).toHaveLength(2)
  })

  it('moves the turn on when the current player leaves', () => {
    const engine = new BlackjackEngine(noSwap)
    engine.ensurePlayer('P1')
    engine.ensurePlayer('P2')
    engine.startRound()

    engine.removePlayer('P1')
    expect(engine.currentPlayerId).toBe('P2')

    engine.removePlayer('P2')
    expect(engine.phase).toBe('lobby')
    expect(engine.dealerHand).toHaveLength(0)
  })
})

describe('BlackjackRoomState', () => {
  test('seats players in the first free seat, idempotently', () => {
    const room = new BlackjackRoomState('ROOM-BJ0001', noSwap)
    expect(room.getOrAssignSeatForPlayer('P1')).toBe(0)
    expect(room.getOrAssignSeatForPlayer('P2')).toBe(1)
    expect(room.getOrAssignSeatForPlayer('P1')).toBe(0)
    expect(room.seatedCount).toBe(2)

    room.unseatPlayer('P1')
    expect(room.tryGetSeatIndex('P1')).toBeUndefined()
    expect(room.getOrAssignSeatForPlayer('P3')).toBe(0)
  })

  test('a full table answers seat 0 without claiming it', () => {
    const room = new BlackjackRoomState('ROOM-BJ0002', noSwap)
    for (const id of ['P1', 'P2', 'P3', 'P4']) {
      room.getOrAssignSeatForPlayer(id)
    }
    expect(room.getOrAssignSeatForPlayer('P5')).toBe(0)
    expect(room.seatPlayerIds).toEqual(['P1', 'P2', 'P3', 'P4'])
    expect(room.tryGetSeatIndex('P5')).toBeUndefined()
  })

  test('gameStarted follows the engine phase', () => {
    const room = new BlackjackRoomState('ROOM-BJ0003', noSwap)
    room.getOrAssignSeatForPlayer('P1')
    room.engine.ensurePlayer('P1')
    expect(room.gameStarted).toBe(false)
    expect(room.toSnapshot().message).toBe('Waiting for P1 to start the round.')

    room.engine.startRound()
    expect(room.gameStarted).toBe(true)
  })

  test('hides the dealer hole card until the dealer plays', () => {
    const room = new BlackjackRoomState('ROOM-BJ0004', noSwap)
    room.getOrAssignSeatForPlayer('P1')
    room.engine.ensurePlayer('P1')
    room.engine.startRound()

    const during = room.toSnapshot()
    expect(during.dealerCards).toEqual([
      { faceDown: false, suit: 'spades', rank: 13, label: 'K♠' },
      { faceDown: true },
    ])
    expect(during.dealerValue).toBe(10)
    expect(during.seats[0].handValue).toBe(21)
    expect(during.seats[0].isCurrentTurn).toBe(true)
    expect(during.message).toBe("P1's turn.")

    room.engine.applyAction('P1', 'stand')
    const after = room.toSnapshot()
    expect(after.dealerCards).toHaveLength(2)
    expect(after.dealerValue).toBe(20)
    expect(after.seats[0].result).toBe('blackjack')
    expect(after.message).toBe('Round over.')
  })

  test('rejects an empty room code', () => {
    expect(() => new BlackjackRoomState('')).toThrow('Room code cannot be empty')
  })
})
