import type { GameType } from '../engine/types.js'
import type { GameAction } from '../services/actions.js'
import type { ActionRejection, GameSnapshot } from '../services/gameService.js'

export interface Player {
  id: string // seat label inside the room: "P1".."P4"
  socketId: string
  joinedAt: Date
}

export interface Room {
  code: string // human-readable code like "ROOM-ABC123"
  gameType: GameType
  players: Player[]
  maxPlayers: number
  createdAt: Date
  lastActivity: Date
}

export type RoomView = Omit<Room, 'players'> & { players: Omit<Player, 'socketId'>[] }

export interface RoomUpdate {
  room: RoomView
  type: 'player_joined' | 'player_left' | 'game_restarted'
}

export type JoinRejection = 'room_not_found' | 'room_full' | 'already_in_room'

export interface ActionRejectedEvent {
  roomCode: string | null
  action: GameAction['type'] | null
  reason: ActionRejection | 'invalid_payload' | 'not_in_room'
}

// Socket event types
export interface ServerToClientEvents {
  welcome: (message: string) => void
  roomJoined: (data: { room: RoomView; playerId: string }) => void
  roomUpdate: (update: RoomUpdate) => void
  roomLeft: () => void
  gameState: (snapshot: GameSnapshot) => void
  actionRejected: (data: ActionRejectedEvent) => void
  error: (message: string) => void
  pong: () => void
}

export interface ClientToServerEvents {
  createRoom: (gameType: GameType) => void
  joinRoom: (code: string) => void
  leaveRoom: () => void
  gameAction: (action: GameAction) => void
  restartGame: () => void
  ping: () => void
}
