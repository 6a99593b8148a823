import { Router } from 'express'
import { z } from 'zod'
import type { ChatQueries } from '../services/chatQueries.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('routes:messages')

const contextQuerySchema = z.object({
  size: z.coerce.number().int().min(0).max(100).default(5)
})

export function createMessageRoutes(queries: ChatQueries): Router {
  const router = Router()

  router.get('/messages/:messageId/context', async (req, res) => {
    const parsed = contextQuerySchema.safeParse(req.query)
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: 'size must be 0-100' })
    }
    try {
      const messages = await queries.getMessageContext(req.params.messageId, parsed.data.size)
      if (!messages) {
        return res.status(404).json({ success: false, error: 'Message not found' })
      }
      return res.json({ success: true, messages })
    } catch (err) {
      logger.error({ err, messageId: req.params.messageId }, 'Failed to get message context')
      return res.status(500).json({ success: false, error: 'Failed to get message context' })
    }
  })

  return router
}
