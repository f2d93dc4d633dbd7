import type { Server as SocketIOServer } from 'socket.io'

// Decorated by fastify-socket.io once the plugin is registered
declare module 'fastify' {
  interface FastifyInstance {
    io: SocketIOServer
  }
}
