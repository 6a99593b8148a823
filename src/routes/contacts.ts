import { Router } from 'express'
import type { ChatQueries } from '../services/chatQueries.js'
import type { ContactDirectory } from '../services/contactDirectory.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('routes:contacts')

export function createContactRoutes(directory: ContactDirectory, queries: ChatQueries): Router {
  const router = Router()

  router.get('/contacts', async (req, res) => {
    const query = typeof req.query.query === 'string' ? req.query.query : ''
    try {
      const contacts = await directory.search(query)
      return res.json({ success: true, contacts })
    } catch (err) {
      logger.error({ err, query }, 'Contact search failed')
      return res.status(500).json({ success: false, error: 'Contact search failed' })
    }
  })

  router.get('/contacts/:contactId/chats', async (req, res) => {
    try {
      const chats = await queries.getChatsByContact(req.params.contactId)
      return res.json({ success: true, chats })
    } catch (err) {
      logger.error({ err, contactId: req.params.contactId }, 'Failed to list contact chats')
      return res.status(500).json({ success: false, error: 'Failed to list contact chats' })
    }
  })

  router.get('/contacts/:contactId/last-interaction', async (req, res) => {
    try {
      const message = await queries.getLastInteraction(req.params.contactId)
      if (!message) {
        return res.status(404).json({ success: false, error: 'No interaction with this contact' })
      }
      return res.json({ success: true, message })
    } catch (err) {
      logger.error({ err, contactId: req.params.contactId }, 'Failed to get last interaction')
      return res.status(500).json({ success: false, error: 'Failed to get last interaction' })
    }
  })

  return router
}
