import type { RequestHandler } from 'express'
import { randomBytes } from 'crypto'
import { performance } from 'perf_hooks'
import { errorMessage } from '../core/errors.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('redisHealth')

export interface RedisHealthClient {
  status: string
  connect: () => Promise<unknown>
  ping: () => Promise<unknown>
  set: (key: string, value: string, mode: 'EX', seconds: number, condition: 'NX') => Promise<'OK' | null>
  del: (key: string) => Promise<number>
}

/**
 * Write/delete round trip against Redis. 503 when the store is not
 * Redis-backed or the check fails.
 */
export function createRedisHealthHandler(redis?: RedisHealthClient, keyPrefix = 'bridge:'): RequestHandler {
  if (!redis) {
    return (_req, res) => {
      res.status(503).json({ redis: 'fail', reason: 'Redis not configured' })
    }
  }

  return async (_req, res) => {
    const start = performance.now()
    const key = `${keyPrefix}health:${randomBytes(8).toString('hex')}`
    try {
      if (redis.status !== 'ready') {
        await redis.connect()
      }

      await redis.ping()

      if ((await redis.set(key, 'ok', 'EX', 5, 'NX')) !== 'OK') {
        throw new Error('Failed to write test key')
      }
      if ((await redis.del(key)) !== 1) {
        throw new Error('Failed to delete test key')
      }

      res.json({ redis: 'ok', writeDelete: 'ok', latencyMs: performance.now() - start })
    } catch (err) {
      logger.warn({ err }, 'Redis health check failed')
      // the key expires on its own if this delete fails too
      await redis.del(key).catch((cleanupErr: unknown) => {
        logger.debug({ err: cleanupErr }, 'Health key cleanup failed')
      })
      res.status(503).json({ redis: 'fail', reason: errorMessage(err) })
    }
  }
}
