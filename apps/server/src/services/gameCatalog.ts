import type { GameType } from '../engine/types.js'

export interface GameInfo {
  type: GameType
  maxPlayers: number
}

export const GAME_CATALOG: Record<GameType, GameInfo> = {
  tictactoe: { type: 'tictactoe', maxPlayers: 2 },
  checkers: { type: 'checkers', maxPlayers: 2 },
  blackjack: { type: 'blackjack', maxPlayers: 4 },
}

export function getGameInfo(type: GameType): GameInfo {
  return GAME_CATALOG[type]
}
