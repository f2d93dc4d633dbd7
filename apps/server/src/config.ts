import 'dotenv/config'

export type LogLevel = 'info' | 'warn' | 'silent'

export interface ServerConfig {
  port: number
  host: string
  nodeEnv: string
  logLevel: LogLevel
  roomIdleTtlMs: number
  roomSweepIntervalMs: number
  namespace: string
}

// Single namespace for every game
export const NAMESPACE = '/hub'

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv = env.NODE_ENV || 'development'
  return {
    port: parseIntOr(env.PORT, 9001),
    host: env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: nodeEnv === 'test' ? 'silent' : nodeEnv === 'development' ? 'info' : 'warn',
    roomIdleTtlMs: parseIntOr(env.ROOM_IDLE_TTL_MS, 30 * 60 * 1000),
    roomSweepIntervalMs: parseIntOr(env.ROOM_SWEEP_INTERVAL_MS, 60 * 1000),
    namespace: NAMESPACE
  }
}
