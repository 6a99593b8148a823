import { Router } from 'express'
import { z } from 'zod'
import type { Messenger } from '../services/messenger.js'
import { toJid } from '../utils/jid.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('routes:send')

const recipientSchema = z.object({
  number: z.string().min(1).optional(),
  jid: z.string().min(1).optional()
})

const sendBodySchema = recipientSchema
  .extend({ message: z.string().min(1) })
  .refine((data) => data.number || data.jid, {
    message: "Either 'number' or 'jid' must be provided"
  })

const sendFileBodySchema = recipientSchema
  .extend({ filePath: z.string().min(1), caption: z.string().optional() })
  .refine((data) => data.number || data.jid, {
    message: "Either 'number' or 'jid' must be provided"
  })

export interface ResolvedRecipient {
  jid: string
  warning?: string
}

/**
 * Accepts a phone number or a JID in either field, preferring `jid`.
 * Mixed-up fields still resolve, with a warning for the caller.
 */
export function resolveRecipient(body: z.infer<typeof recipientSchema>): ResolvedRecipient | undefined {
  if (body.jid) {
    if (!body.jid.includes('@')) {
      return {
        jid: toJid(body.jid),
        warning: `Phone number detected in 'jid' field. Automatically formatted. Please use 'number' field for phone numbers (e.g., ${body.jid}).`
      }
    }
    return { jid: body.jid }
  }
  if (body.number) {
    if (body.number.includes('@')) {
      return {
        jid: body.number,
        warning: `JID detected in 'number' field. Please use 'jid' field for group/broadcast identifiers (e.g., ${body.number}).`
      }
    }
    return { jid: toJid(body.number) }
  }
  return undefined
}

export function createSendRoutes(messenger: Messenger): Router {
  const router = Router()

  router.post('/send', async (req, res) => {
    const parse = sendBodySchema.safeParse(req.body)
    const recipient = parse.success ? resolveRecipient(parse.data) : undefined
    if (!parse.success || !recipient) {
      return res.status(400).json({ success: false, error: 'Invalid request parameters. Either number or jid must be provided.' })
    }
    if (recipient.warning) {
      logger.warn({ jid: recipient.jid }, recipient.warning)
    }

    const messageId = await messenger.sendText(recipient.jid, parse.data.message)
    if (!messageId) {
      return res.status(502).json({ success: false, error: 'Failed to send message' })
    }
    return res.json({
      success: true,
      message: 'Message sent successfully',
      messageId,
      ...(recipient.warning ? { warning: recipient.warning } : {})
    })
  })

  router.post('/send-file', async (req, res) => {
    const parse = sendFileBodySchema.safeParse(req.body)
    const recipient = parse.success ? resolveRecipient(parse.data) : undefined
    if (!parse.success || !recipient) {
      return res.status(400).json({ success: false, error: 'Invalid request parameters. filePath and number or jid are required.' })
    }

    try {
      const messageId = await messenger.sendFile(recipient.jid, parse.data.filePath, parse.data.caption)
      return res.json({
        success: true,
        message: 'File sent successfully',
        messageId,
        ...(recipient.warning ? { warning: recipient.warning } : {})
      })
    } catch (err) {
      logger.error({ err, jid: recipient.jid }, 'Failed to send file')
      return res.status(500).json({ success: false, error: 'Failed to send file' })
    }
  })

  return router
}
