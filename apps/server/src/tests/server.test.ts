import { test, expect, describe, beforeAll, afterAll, vi } from 'vitest'
import { loadConfig } from '../config.js'
import { GameServer, createServer } from '../server.js'

describe('Server Health Check', () => {
  let server: GameServer

  beforeAll(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    server = await createServer(loadConfig({ NODE_ENV: 'test', ROOM_SWEEP_INTERVAL_MS: '0' }))
    await server.fastify.ready()
  })

  afterAll(async () => {
    await server.fastify.close()
    vi.restoreAllMocks()
  })

  test('GET /health returns 200 and correct response', async () => {
    const response = await server.fastify.inject({
      method: 'GET',
      url: '/health'
    })

    expect(response.statusCode).toBe(200)

    const body = JSON.parse(response.body)
    expect(body).toHaveProperty('status', 'ok')
    expect(body).toHaveProperty('rooms', 0)
    expect(typeof body.uptime).toBe('number')
    expect(new Date(body.timestamp).getTime()).not.toBeNaN()
  })

  test('Health endpoint counts open rooms', async () => {
    server.roomManager.createRoom('checkers', 'socket-health')

    const response = await server.fastify.inject({ method: 'GET', url: '/health' })
    expect(JSON.parse(response.body).rooms).toBe(1)
  })

  test('Debug endpoint lists rooms outside production', async () => {
    const { room } = server.roomManager.createRoom('tictactoe', 'socket-debug')
    server.gameService.createRoomState(room)

    const response = await server.fastify.inject({ method: 'GET', url: '/debug/rooms' })
    const body = JSON.parse(response.body)
    const listed = body.rooms.find((r: { code: string }) => r.code === room.code)
    expect(listed.gameType).toBe('tictactoe')
    expect(listed.game.type).toBe('tictactoe')
  })
})

describe('Configuration', () => {
  test('parses environment values with defaults', () => {
    const config = loadConfig({ NODE_ENV: 'production', PORT: '8123', ROOM_IDLE_TTL_MS: 'soon' })
    expect(config.port).toBe(8123)
    expect(config.host).toBe('0.0.0.0')
    expect(config.logLevel).toBe('warn')
    expect(config.roomIdleTtlMs).toBe(1800000)
    expect(config.namespace).toBe('/hub')
  })

  test('logs at info in development and stays quiet under test', () => {
    expect(loadConfig({}).logLevel).toBe('info')
    expect(loadConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent')
  })
})
