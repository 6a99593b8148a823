import express, { type Express } from 'express'
import type { Bridge } from './bridge.js'
import { createApiKeyAuth } from './middleware/auth.js'
import { createChatRoutes } from './routes/chats.js'
import { createContactRoutes } from './routes/contacts.js'
import { createMessageRoutes } from './routes/messages.js'
import { createRedisHealthHandler, type RedisHealthClient } from './routes/redisHealth.js'
import { createSendRoutes } from './routes/send.js'

export interface AppOptions {
  apiTokens: string[]
  /** Present when the store is Redis-backed */
  redis?: RedisHealthClient
}

export function createApp(bridge: Bridge, options: AppOptions): Express {
  const app = express()

  app.use(express.json())
  app.use(createApiKeyAuth(options.apiTokens))

  app.get('/health', async (_req, res) => {
    res.json({
      status: bridge.session.isConnected() ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
      store: {
        backend: bridge.store.getBackendType(),
        healthy: await bridge.store.isHealthy()
      },
      inFlight: bridge.dispatcher.inFlightCount
    })
  })

  app.get('/health/redis', createRedisHealthHandler(options.redis))

  app.use(createChatRoutes(bridge.queries))
  app.use(createContactRoutes(bridge.contacts, bridge.queries))
  app.use(createMessageRoutes(bridge.queries))
  app.use(createSendRoutes(bridge.messenger))

  return app
}
