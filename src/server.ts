import type { Server } from 'http'
import { createApp } from './app.js'
import { Bridge } from './bridge.js'
import { loadConfigFromEnvFile, type BridgeConfig } from './config.js'
import type { ProtocolSession } from './core/interfaces.js'
import { createMessageStore } from './storage/index.js'
import { createLogger } from './utils/logger.js'

const logger = createLogger('server')

export interface RunningServer {
  bridge: Bridge
  server: Server
  close: () => Promise<void>
}

/**
 * Starts the bridge on an authenticated session and serves the HTTP API.
 * Configuration comes from `.env` / the environment unless given.
 */
export async function startServer(
  session: ProtocolSession,
  config: BridgeConfig = loadConfigFromEnvFile()
): Promise<RunningServer> {
  const { store, redis } = await createMessageStore(config.redisUrl)
  const bridge = new Bridge({ session, config, store })

  if (!session.isConnected()) {
    await session.connect()
  }
  bridge.start()

  const app = createApp(bridge, { apiTokens: config.apiTokens, ...(redis ? { redis } : {}) })
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening))
  })
  logger.info(`Server listening on http://localhost:${config.port}`)

  const close = async (): Promise<void> => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()))
    })
    await bridge.stop()
    await store.close()
    logger.info('Server stopped')
  }

  return { bridge, server, close }
}
