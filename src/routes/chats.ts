import { Router } from 'express'
import { z } from 'zod'
import type { ChatQueries } from '../services/chatQueries.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('routes:chats')

export const pageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0)
})

export function createChatRoutes(queries: ChatQueries): Router {
  const router = Router()

  router.get('/chats', async (_req, res) => {
    try {
      const chats = await queries.listChats()
      return res.json({ success: true, chats })
    } catch (err) {
      logger.error({ err }, 'Failed to list chats')
      return res.status(500).json({ success: false, error: 'Failed to list chats' })
    }
  })

  router.get('/chats/:chatId', async (req, res) => {
    try {
      const chat = await queries.getChat(req.params.chatId)
      if (!chat) {
        return res.status(404).json({ success: false, error: 'Chat not found' })
      }
      return res.json({ success: true, chat })
    } catch (err) {
      logger.error({ err, chatId: req.params.chatId }, 'Failed to get chat')
      return res.status(500).json({ success: false, error: 'Failed to get chat' })
    }
  })

  router.get('/chats/:chatId/messages', async (req, res) => {
    const page = pageQuerySchema.safeParse(req.query)
    if (!page.success) {
      return res.status(400).json({ success: false, error: 'limit must be 1-500 and offset >= 0' })
    }
    try {
      const messages = await queries.listMessages(req.params.chatId, page.data.limit, page.data.offset)
      return res.json({ success: true, messages })
    } catch (err) {
      logger.error({ err, chatId: req.params.chatId }, 'Failed to list messages')
      return res.status(500).json({ success: false, error: 'Failed to list messages' })
    }
  })

  return router
}
