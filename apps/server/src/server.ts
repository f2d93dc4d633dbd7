import Fastify, { FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import fastifySocketIO from 'fastify-socket.io'
import { Socket } from 'socket.io'
import { ServerConfig } from './config.js'
import { gameActionSchema, gameTypeSchema, roomCodeSchema } from './services/actions.js'
import { GameService, GameServiceOptions } from './services/gameService.js'
import { RoomManager } from './services/roomManager.js'
import { ClientToServerEvents, ServerToClientEvents } from './types/room.js'
import { logError, logEvent } from './utils/log.js'

type HubSocket = Socket<ClientToServerEvents, ServerToClientEvents>

export interface GameServer {
  fastify: FastifyInstance
  roomManager: RoomManager
  gameService: GameService
}

export async function createServer(config: ServerConfig, gameOptions: GameServiceOptions = {}): Promise<GameServer> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  })

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
    credentials: true,
  })

  await fastify.register(fastifySocketIO, {
    cors: {
      origin: true,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  })

  const hub = fastify.io.of(config.namespace)
  const gameService = new GameService(gameOptions)
  const roomManager = new RoomManager({
    idleTtlMs: config.roomIdleTtlMs,
    sweepIntervalMs: config.roomSweepIntervalMs,
    onRoomExpired: room => {
      gameService.removeRoom(room.code)
      hub.to(room.code).emit('roomLeft')
      hub.in(room.code).socketsLeave(room.code)
    }
  })

  fastify.addHook('onClose', async () => {
    roomManager.destroy()
  })

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      rooms: roomManager.getRoomCount(),
    }
  })

  // Debug endpoints (dev only)
  if (config.nodeEnv !== 'production') {
    fastify.get('/debug/rooms', async () => {
      return {
        rooms: roomManager.getAllRooms().map(room => ({
          ...roomManager.createRoomUpdate(room, 'player_joined').room,
          game: gameService.getSnapshot(room.code) ?? null
        })),
        activeGames: gameService.getActiveGameCount()
      }
    })
  }

  // Runs an async handler so a failure is logged and reported instead of escaping
  function guarded<A extends unknown[]>(socket: HubSocket, evt: string, handler: (...args: A) => Promise<void>) {
    return (...args: A): void => {
      handler(...args).catch((err: unknown) => {
        logError('socket.handler.error', err, { socketId: socket.id, event: evt })
        socket.emit('error', 'Internal server error')
      })
    }
  }

  async function leaveCurrentRoom(socket: HubSocket): Promise<void> {
    const left = roomManager.leaveRoom(socket.id)
    if (!left) return

    const { room, player, roomClosed } = left
    await socket.leave(room.code)
    const snapshot = await gameService.onPlayerLeft(room, player.id)

    if (roomClosed) {
      gameService.removeRoom(room.code)
      return
    }

    hub.to(room.code).emit('roomUpdate', roomManager.createRoomUpdate(room, 'player_left'))
    if (snapshot) {
      hub.to(room.code).emit('gameState', snapshot)
    }
  }

  hub.on('connection', (socket: HubSocket) => {
    logEvent('socket.connect', { socketId: socket.id, namespace: config.namespace })
    socket.emit('welcome', 'Connected to game hub')

    socket.on('createRoom', guarded(socket, 'createRoom', async (gameType: unknown) => {
      const parsed = gameTypeSchema.safeParse(gameType)
      if (!parsed.success) {
        socket.emit('error', 'Unknown game type')
        return
      }

      await leaveCurrentRoom(socket)

      const { room, player } = roomManager.createRoom(parsed.data, socket.id)
      await socket.join(room.code)
      gameService.createRoomState(room)
      const snapshot = await gameService.onPlayerJoined(room, player.id)

      socket.emit('roomJoined', { room: roomManager.createRoomUpdate(room, 'player_joined').room, playerId: player.id })
      socket.emit('gameState', snapshot)
    }))

    socket.on('joinRoom', guarded(socket, 'joinRoom', async (code: unknown) => {
      const parsed = roomCodeSchema.safeParse(code)
      if (!parsed.success) {
        socket.emit('error', 'Invalid room code')
        return
      }

      // Switching rooms: drop the old seat first
      const current = roomManager.getRoomBySocketId(socket.id)
      if (current && current.code !== parsed.data) {
        await leaveCurrentRoom(socket)
      }

      const result = roomManager.joinRoom(parsed.data, socket.id)
      if (!result.ok) {
        logEvent('room.join.rejected', { socketId: socket.id, roomCode: parsed.data, reason: result.reason })
        socket.emit('error', result.reason)
        return
      }

      const { room, player } = result
      await socket.join(room.code)
      const snapshot = await gameService.onPlayerJoined(room, player.id)
      const update = roomManager.createRoomUpdate(room, 'player_joined')

      socket.emit('roomJoined', { room: update.room, playerId: player.id })
      hub.to(room.code).emit('roomUpdate', update)
      hub.to(room.code).emit('gameState', snapshot)
    }))

    socket.on('leaveRoom', guarded(socket, 'leaveRoom', async () => {
      await leaveCurrentRoom(socket)
      socket.emit('roomLeft')
    }))

    socket.on('gameAction', guarded(socket, 'gameAction', async (payload: unknown) => {
      const room = roomManager.getRoomBySocketId(socket.id)
      const player = roomManager.getPlayerBySocketId(socket.id)
      const parsed = gameActionSchema.safeParse(payload)

      if (!parsed.success) {
        socket.emit('actionRejected', { roomCode: room?.code ?? null, action: null, reason: 'invalid_payload' })
        return
      }
      if (!room || !player) {
        socket.emit('actionRejected', { roomCode: null, action: parsed.data.type, reason: 'not_in_room' })
        return
      }

      const result = await gameService.handleAction(room.code, player.id, parsed.data)
      if (!result.ok) {
        socket.emit('actionRejected', { roomCode: room.code, action: parsed.data.type, reason: result.reason })
        return
      }

      roomManager.touch(room.code)
      hub.to(room.code).emit('gameState', result.snapshot)
    }))

    socket.on('restartGame', guarded(socket, 'restartGame', async () => {
      const room = roomManager.getRoomBySocketId(socket.id)
      const player = roomManager.getPlayerBySocketId(socket.id)
      if (!room || !player) {
        socket.emit('actionRejected', { roomCode: null, action: null, reason: 'not_in_room' })
        return
      }

      const result = await gameService.restartRoom(room.code, player.id)
      if (!result.ok) {
        socket.emit('actionRejected', { roomCode: room.code, action: null, reason: result.reason })
        return
      }

      roomManager.touch(room.code)
      hub.to(room.code).emit('roomUpdate', roomManager.createRoomUpdate(room, 'game_restarted'))
      hub.to(room.code).emit('gameState', result.snapshot)
    }))

    socket.on('ping', () => {
      socket.emit('pong')
    })

    socket.on('disconnect', guarded(socket, 'disconnect', async (reason: string) => {
      logEvent('socket.disconnect', { socketId: socket.id, reason })
      await leaveCurrentRoom(socket)
    }))
  })

  return { fastify, roomManager, gameService }
}
