import type { GameType } from '../engine/types.js'
import { JoinRejection, Player, Room, RoomUpdate } from '../types/room.js'
import { logEvent } from '../utils/log.js'
import { randomInt } from '../utils/random.js'
import { getGameInfo } from './gameCatalog.js'

const CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789'
const CODE_LENGTH = 6

export type JoinResult =
  | { ok: true; room: Room; player: Player }
  | { ok: false; reason: JoinRejection }

export interface LeaveResult {
  room: Room
  player: Player
  roomClosed: boolean
}

export interface RoomManagerOptions {
  // Rooms untouched for longer than this are swept; 0 disables the sweep
  idleTtlMs?: number
  sweepIntervalMs?: number
  onRoomExpired?: (room: Room) => void
}

/**
 * Registry of live rooms keyed by code. Owns code uniqueness and the
 * socket -> room binding; game state lives in the GameService.
 */
export class RoomManager {
  private rooms = new Map<string, Room>()
  private socketRooms = new Map<string, string>() // socketId -> room code
  private sweepTimer: NodeJS.Timeout | null = null
  private readonly idleTtlMs: number
  private readonly onRoomExpired?: (room: Room) => void

  constructor(options: RoomManagerOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? 0
    this.onRoomExpired = options.onRoomExpired
    const interval = options.sweepIntervalMs ?? 0
    if (this.idleTtlMs > 0 && interval > 0) {
      this.sweepTimer = setInterval(() => this.sweepIdleRooms(), interval)
      this.sweepTimer.unref()
    }
  }

  createRoom(gameType: GameType, socketId: string): { room: Room; player: Player } {
    const now = new Date()
    const player: Player = { id: 'P1', socketId, joinedAt: now }
    const room: Room = {
      code: this.generateCode(),
      gameType,
      players: [player],
      maxPlayers: getGameInfo(gameType).maxPlayers,
      createdAt: now,
      lastActivity: now
    }

    this.rooms.set(room.code, room)
    this.socketRooms.set(socketId, room.code)
    logEvent('room.create', { roomCode: room.code, gameType, playerId: player.id })
    return { room, player }
  }

  joinRoom(code: string, socketId: string): JoinResult {
    const room = this.rooms.get(code.toUpperCase())
    if (!room) {
      return { ok: false, reason: 'room_not_found' }
    }
    if (room.players.some(p => p.socketId === socketId)) {
      return { ok: false, reason: 'already_in_room' }
    }
    if (room.players.length >= room.maxPlayers) {
      return { ok: false, reason: 'room_full' }
    }

    const player: Player = { id: this.nextPlayerId(room), socketId, joinedAt: new Date() }
    room.players.push(player)
    room.lastActivity = player.joinedAt
    this.socketRooms.set(socketId, room.code)
    logEvent('room.join', { roomCode: room.code, playerId: player.id, playerCount: room.players.length })
    return { ok: true, room, player }
  }

  leaveRoom(socketId: string): LeaveResult | null {
    const code = this.socketRooms.get(socketId)
    if (!code) return null
    this.socketRooms.delete(socketId)

    const room = this.rooms.get(code)
    if (!room) return null

    const player = room.players.find(p => p.socketId === socketId)
    if (!player) return null

    room.players = room.players.filter(p => p.socketId !== socketId)
    room.lastActivity = new Date()

    const roomClosed = room.players.length === 0
    if (roomClosed) {
      this.rooms.delete(code)
    }
    logEvent('room.leave', { roomCode: code, playerId: player.id, playerCount: room.players.length, roomClosed })
    return { room, player, roomClosed }
  }

  getRoom(code: string): Room | undefined {
    return this.rooms.get(code.toUpperCase())
  }

  getRoomBySocketId(socketId: string): Room | undefined {
    const code = this.socketRooms.get(socketId)
    return code ? this.rooms.get(code) : undefined
  }

  getPlayerBySocketId(socketId: string): Player | undefined {
    return this.getRoomBySocketId(socketId)?.players.find(p => p.socketId === socketId)
  }

  getAllRooms(): Room[] {
    return Array.from(this.rooms.values())
  }

  getRoomCount(): number {
    return this.rooms.size
  }

  touch(code: string): void {
    const room = this.rooms.get(code)
    if (room) room.lastActivity = new Date()
  }

  createRoomUpdate(room: Room, type: RoomUpdate['type']): RoomUpdate {
    return {
      type,
      room: {
        code: room.code,
        gameType: room.gameType,
        maxPlayers: room.maxPlayers,
        createdAt: room.createdAt,
        lastActivity: room.lastActivity,
        players: room.players.map(({ id, joinedAt }) => ({ id, joinedAt }))
      }
    }
  }

  sweepIdleRooms(now: number = Date.now()): Room[] {
    if (this.idleTtlMs <= 0) return []

    const expired = this.getAllRooms().filter(room => now - room.lastActivity.getTime() > this.idleTtlMs)
    for (const room of expired) {
      this.rooms.delete(room.code)
      for (const player of room.players) {
        this.socketRooms.delete(player.socketId)
      }
      logEvent('room.expired', { roomCode: room.code, idleMs: now - room.lastActivity.getTime() })
      this.onRoomExpired?.(room)
    }
    return expired
  }

  destroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
    this.rooms.clear()
    this.socketRooms.clear()
  }

  // Lowest free "P<n>" so a returning player takes back the vacated label
  private nextPlayerId(room: Room): string {
    for (let n = 1; n <= room.maxPlayers; n++) {
      const id = `P${n}`
      if (!room.players.some(p => p.id === id)) return id
    }
    throw new Error(`Room ${room.code} has no free player slot`)
  }

  private generateCode(): string {
    let code: string
    do {
      let suffix = ''
      for (let i = 0; i < CODE_LENGTH; i++) {
        suffix += CODE_ALPHABET[randomInt(Math.random, CODE_ALPHABET.length)]
      }
      code = `ROOM-${suffix}`
    } while (this.rooms.has(code))
    return code
  }
}
