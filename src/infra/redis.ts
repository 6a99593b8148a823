import { Redis } from 'ioredis'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('redis')

export function validateRedisUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return ['redis:', 'rediss:', 'redis+tls:'].includes(parsed.protocol)
  } catch {
    return false
  }
}

export function createRedisClient(url: string): Redis {
  if (!validateRedisUrl(url)) {
    logger.warn({ url }, 'REDIS_URL appears to be invalid')
  }

  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: null,
    // Don't queue commands while offline; callers see the failure instead
    enableOfflineQueue: false,
    retryStrategy: (times: number) => {
      if (times > 3) {
        return null
      }
      return Math.min(times * 1000, 3000)
    }
  })

  client.on('error', (err: Error) => {
    logger.error({ err }, 'Redis connection error')
  })

  return client
}
