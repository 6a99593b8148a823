import request from 'supertest'
import type express from 'express'
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { createApp } from '../app.js'
import { Bridge } from '../bridge.js'
import { MemoryMessageStore } from '../storage/memoryMessageStore.js'
import { FakeSession, testConfig } from './fakes.js'

const KEY = 'test-secret'

describe('HTTP API', () => {
  let dir: string
  let session: FakeSession
  let store: MemoryMessageStore
  let bridge: Bridge
  let app: express.Express

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'api-'))
    session = new FakeSession()
    store = new MemoryMessageStore()
    bridge = new Bridge({ session, config: testConfig(dir), store, sleep: async () => undefined })
    app = createApp(bridge, { apiTokens: [KEY] })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('authentication', () => {
    it('rejects requests without a key', async () => {
      const response = await request(app).get('/chats').expect(401)

      expect(response.body).toEqual({ success: false, error: 'Invalid or missing API key' })
    })

    it('accepts the key as header, bearer token or query parameter', async () => {
      await request(app).get('/chats').set('x-api-key', KEY).expect(200)
      await request(app).get('/chats').set('Authorization', `Bearer ${KEY}`).expect(200)
      await request(app).get('/chats').query({ api_key: KEY }).expect(200)
    })

    it('denies everything but health when no tokens are configured', async () => {
      const open = createApp(bridge, { apiTokens: [] })

      const response = await request(open).get('/chats').set('x-api-key', KEY).expect(401)

      expect(response.body.error).toBe('API not configured: missing API_TOKENS')
      await request(open).get('/health').expect(200)
    })
  })

  it('reports health without a key', async () => {
    session.connected = false

    const response = await request(app).get('/health').expect(200)

    expect(response.body).toMatchObject({
      status: 'disconnected',
      store: { backend: 'memory', healthy: true },
      inFlight: 0
    })
    expect(typeof response.body.timestamp).toBe('string')
  })

  describe('POST /send', () => {
    it('normalises a phone number into a user id', async () => {
      const response = await request(app)
        .post('/send')
        .set('x-api-key', KEY)
        .send({ number: '+1 (555) 123-4567', message: 'hello from the api' })
        .expect(200)

      expect(response.body).toEqual({ success: true, message: 'Message sent successfully', messageId: 'SENT1' })
      expect(session.sent[0]).toMatchObject({
        recipient: '15551234567@s.whatsapp.net',
        content: { type: 'text', text: 'hello from the api' }
      })
    })

    it('warns when a phone number arrives in the jid field', async () => {
      const response = await request(app)
        .post('/send')
        .set('x-api-key', KEY)
        .send({ jid: '15551234567', message: 'hi' })
        .expect(200)

      expect(response.body.warning).toMatch(/^Phone number detected in 'jid' field/)
      expect(session.sent[0]?.recipient).toBe('15551234567@s.whatsapp.net')
    })

    it('rejects a body without a recipient', async () => {
      await request(app).post('/send').set('x-api-key', KEY).send({ message: 'hi' }).expect(400)
      expect(session.sent).toEqual([])
    })

    it('returns 502 when the session cannot send', async () => {
      session.sendError = new Error('socket closed')

      const response = await request(app)
        .post('/send')
        .set('x-api-key', KEY)
        .send({ number: '15551234567', message: 'hi' })
        .expect(502)

      expect(response.body).toEqual({ success: false, error: 'Failed to send message' })
    })
  })

  describe('POST /send-file', () => {
    it('sends a document with its caption', async () => {
      const file = path.join(dir, 'statement.pdf')
      await writeFile(file, 'pdf-bytes')

      const response = await request(app)
        .post('/send-file')
        .set('x-api-key', KEY)
        .send({ number: '15551234567', filePath: file, caption: 'March' })
        .expect(200)

      expect(response.body.messageId).toBe('SENT1')
      expect(session.sent[0]?.content).toMatchObject({
        type: 'document',
        fileName: 'statement.pdf',
        caption: 'March',
        mimetype: 'application/octet-stream'
      })
    })

    it('returns 500 for a missing file', async () => {
      await request(app)
        .post('/send-file')
        .set('x-api-key', KEY)
        .send({ number: '15551234567', filePath: path.join(dir, 'missing.png') })
        .expect(500)
    })
  })

  describe('reads', () => {
    const JID = '15551234567@s.whatsapp.net'

    beforeEach(async () => {
      await request(app).post('/send').set('x-api-key', KEY).send({ jid: JID, message: 'first' }).expect(200)
    })

    it('lists chats and their messages', async () => {
      const chats = await request(app).get('/chats').set('x-api-key', KEY).expect(200)
      expect(chats.body.chats).toHaveLength(1)
      expect(chats.body.chats[0]).toMatchObject({ id: JID, lastMessage: 'first', isGroup: false })

      const messages = await request(app).get(`/chats/${JID}/messages`).set('x-api-key', KEY).expect(200)
      expect(messages.body.messages).toHaveLength(1)
      expect(messages.body.messages[0]).toMatchObject({ messageId: 'SENT1', content: 'first', isFromMe: true })
    })

    it('validates paging', async () => {
      await request(app).get(`/chats/${JID}/messages`).query({ limit: 0 }).set('x-api-key', KEY).expect(400)
      await request(app).get(`/chats/${JID}/messages`).query({ offset: -1 }).set('x-api-key', KEY).expect(400)
    })

    it('returns 404 for unknown chats, messages and contacts', async () => {
      const chat = await request(app).get('/chats/nobody@s.whatsapp.net').set('x-api-key', KEY).expect(404)
      expect(chat.body.error).toBe('Chat not found')

      const context = await request(app).get('/messages/NOPE/context').set('x-api-key', KEY).expect(404)
      expect(context.body.error).toBe('Message not found')

      const last = await request(app)
        .get('/contacts/nobody@s.whatsapp.net/last-interaction')
        .set('x-api-key', KEY)
        .expect(404)
      expect(last.body.error).toBe('No interaction with this contact')
    })

    it('returns the context around a message', async () => {
      const response = await request(app).get('/messages/SENT1/context').query({ size: 2 }).set('x-api-key', KEY).expect(200)

      expect(response.body.messages.map((m: { messageId: string }) => m.messageId)).toEqual(['SENT1'])
    })

    it('returns the last interaction with a contact', async () => {
      const response = await request(app).get(`/contacts/${JID}/last-interaction`).set('x-api-key', KEY).expect(200)

      expect(response.body.message).toMatchObject({ messageId: 'SENT1', chatId: JID })
    })
  })
})
