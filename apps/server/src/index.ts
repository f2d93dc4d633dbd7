import { loadConfig } from './config.js'
import { createServer } from './server.js'
import { logError, logEvent } from './utils/log.js'

const config = loadConfig()
const { fastify } = await createServer(config)

async function shutdown(signal: string): Promise<void> {
  logEvent('server.shutdown', { signal })
  await fastify.close()
  console.log('Server closed gracefully')
  process.exit(0)
}

// Graceful shutdown handling
for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logError('server.shutdown.error', err, { signal })
      process.exit(1)
    })
  })
}

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE'
}

try {
  await fastify.listen({ port: config.port, host: config.host })
  logEvent('server.start', {
    port: config.port,
    host: config.host,
    namespace: config.namespace,
    nodeEnv: config.nodeEnv
  })
} catch (err) {
  if (isAddressInUse(err)) {
    logEvent('server.error', {
      error: 'EADDRINUSE',
      port: config.port,
      message: `Port ${config.port} is already in use`
    })
  } else {
    fastify.log.error(err)
  }
  process.exit(1)
}
