import { z } from 'zod'

const coordinate = z.object({
  row: z.number().int(),
  col: z.number().int()
})

export const gameTypeSchema = z.enum(['tictactoe', 'checkers', 'blackjack'])

// Codes are matched case-insensitively: "room-abc123" finds "ROOM-ABC123"
export const roomCodeSchema = z.string().trim().min(1).max(32).transform(code => code.toUpperCase())

export const gameActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('tictactoe.move'), cellIndex: z.number().int() }),
  z.object({ type: z.literal('checkers.move'), from: coordinate, to: coordinate }),
  z.object({ type: z.literal('checkers.resign') }),
  z.object({ type: z.literal('blackjack.start') }),
  z.object({ type: z.literal('blackjack.action'), action: z.enum(['hit', 'stand']) })
])

export type GameAction = z.infer<typeof gameActionSchema>
