/**
 * @fileoverview HTTP API tests
 *
 * @description
 * Drives the Hono app through `app.request` against the in-process store:
 * session creation, login, submissions, status and the results gate.
 *
 * @architecture
 * Tests: src/routes/__tests__/api.test.ts
 * Tests: app.ts, routes/core-api.ts, routes/sessions.ts, routes/participants.ts
 */

import { beforeEach, describe, it, expect } from 'vitest'
import { z } from 'zod'
import { apiResponseSchema, pairingResultsSchema, submissionStatusSchema } from '@pairup/schema'
import { createApp } from '../../app.js'
import { MemoryPairingStore } from '../../services/__tests__/fixtures/memory-pairing-store.js'

const createdSchema = apiResponseSchema(
  z.object({
    sessionId: z.string(),
    sessionName: z.string(),
    users: z.array(z.object({ username: z.string(), password: z.string() })),
  }),
)

const receiptSchema = apiResponseSchema(
  z.object({ submittedCount: z.number(), totalCount: z.number(), allSubmitted: z.boolean() }),
)

const errorSchema = apiResponseSchema(z.unknown())

describe('pairing API', () => {
  let app: ReturnType<typeof createApp>

  beforeEach(() => {
    app = createApp({ store: new MemoryPairingStore() })
  })

  function post(path: string, body: unknown) {
    return app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })
  }

  async function createSession(usernames: string[]) {
    const res = await post('/api/v1/sessions', {
      sessionName: 'Team Event',
      usernames,
      password: 'test-secret',
    })
    const body = createdSchema.parse(await res.json())
    if (!body.data) {
      throw new Error('session creation failed')
    }
    return body.data.sessionId
  }

  it('reports health', async () => {
    const res = await app.request('/api/v1/health')
    const body = apiResponseSchema(z.object({ status: z.string() })).parse(await res.json())

    expect(res.status).toBe(200)
    expect(body.data?.status).toBe('healthy')
  })

  it('echoes the caller request id', async () => {
    const res = await app.request('/api/v1/health', { headers: { 'x-request-id': 'req-test-1' } })
    const body = errorSchema.parse(await res.json())

    expect(res.headers.get('x-request-id')).toBe('req-test-1')
    expect(body.meta.requestId).toBe('req-test-1')
  })

  it('creates a session and returns credentials', async () => {
    const res = await post('/api/v1/sessions', {
      sessionName: 'Team Event',
      users: [
        { username: 'Alice', password: 'alice-secret' },
        { username: 'Bob', password: 'bob-secret' },
      ],
    })
    const body = createdSchema.parse(await res.json())

    expect(res.status).toBe(201)
    expect(body.success).toBe(true)
    expect(body.data?.users).toEqual([
      { username: 'Alice', password: 'alice-secret' },
      { username: 'Bob', password: 'bob-secret' },
    ])
  })

  it('rejects an invalid session body', async () => {
    const res = await post('/api/v1/sessions', { sessionName: 'Team Event', usernames: ['Alice'], password: 'x' })
    const body = errorSchema.parse(await res.json())

    expect(res.status).toBe(400)
    expect(body.error?.code).toBe('VALIDATION_ERROR')
  })

  it('rejects duplicate usernames with 409', async () => {
    const res = await post('/api/v1/sessions', {
      sessionName: 'Team Event',
      usernames: ['Alice', 'Alice'],
      password: 'test-secret',
    })
    const body = errorSchema.parse(await res.json())

    expect(res.status).toBe(409)
    expect(body.error).toEqual({
      code: 'CONFLICT',
      message: 'Usernames must be unique within a session',
      details: { duplicates: ['Alice'] },
    })
  })

  it('logs a participant in', async () => {
    const sessionId = await createSession(['Alice', 'Bob', 'Charlie'])

    const res = await post(`/api/v1/sessions/${sessionId}/login`, { username: 'Alice', password: 'test-secret' })
    const body = apiResponseSchema(z.object({ otherUsers: z.array(z.string()), hasSubmitted: z.boolean() })).parse(
      await res.json(),
    )

    expect(res.status).toBe(200)
    expect(body.data).toEqual({ otherUsers: ['Bob', 'Charlie'], hasSubmitted: false })

    const denied = await post(`/api/v1/sessions/${sessionId}/login`, { username: 'Alice', password: 'nope' })
    expect(denied.status).toBe(401)
  })

  it('returns 404 for the status of an unknown session', async () => {
    const res = await app.request('/api/v1/sessions/session_missing/status')
    const body = errorSchema.parse(await res.json())

    expect(res.status).toBe(404)
    expect(body.error?.code).toBe('NOT_FOUND')
  })

  it('rejects an empty ratings mapping', async () => {
    const sessionId = await createSession(['Alice', 'Bob'])

    const res = await post(`/api/v1/sessions/${sessionId}/ratings`, { username: 'Alice', ratings: {} })
    const body = errorSchema.parse(await res.json())

    expect(res.status).toBe(400)
    expect(body.error?.code).toBe('INVALID_INPUT')
  })

  it('gates results until everyone has submitted, then pairs the roster', async () => {
    const sessionId = await createSession(['Alice', 'Bob', 'Charlie'])

    const early = await app.request(`/api/v1/sessions/${sessionId}/results`)
    const earlyBody = errorSchema.parse(await early.json())
    expect(early.status).toBe(409)
    expect(earlyBody.error).toEqual({
      code: 'NOT_READY',
      message: 'Not all preferences submitted',
      details: { submitted: 0, total: 3 },
    })

    const first = receiptSchema.parse(
      await (await post(`/api/v1/sessions/${sessionId}/ratings`, {
        username: 'Alice',
        ratings: { Bob: 100, Charlie: 150 },
      })).json(),
    )
    expect(first.data).toEqual({ submittedCount: 1, totalCount: 3, allSubmitted: false })

    await post(`/api/v1/sessions/${sessionId}/ratings`, { username: 'Bob', ratings: { Alice: 100, Bob: 100 } })
    const last = receiptSchema.parse(
      await (await post(`/api/v1/sessions/${sessionId}/ratings`, {
        username: 'Charlie',
        ratings: { Alice: 0, Bob: 0 },
      })).json(),
    )
    expect(last.data).toEqual({ submittedCount: 3, totalCount: 3, allSubmitted: true })

    const status = apiResponseSchema(submissionStatusSchema).parse(
      await (await app.request(`/api/v1/sessions/${sessionId}/status`)).json(),
    )
    expect(status.data?.allSubmitted).toBe(true)
    expect(status.data?.submittedUsers).toBe(3)

    const res = await app.request(`/api/v1/sessions/${sessionId}/results`)
    const body = apiResponseSchema(pairingResultsSchema).parse(await res.json())

    expect(res.status).toBe(200)
    expect(body.data).toEqual({
      strategy: 'greedy',
      pairs: [{ pair: ['Alice', 'Bob'], compatibility: 100, ratings: { Alice: 100, Bob: 100 } }],
      unpaired: 'Charlie',
      totalCompatibility: 100,
      averageCompatibility: 100,
      numPairs: 1,
    })
  })

  it('rejects an unknown strategy', async () => {
    const sessionId = await createSession(['Alice', 'Bob'])

    const res = await app.request(`/api/v1/sessions/${sessionId}/results?strategy=random`)

    expect(res.status).toBe(400)
  })

  it('answers unknown routes with the error envelope', async () => {
    const res = await app.request('/api/v1/nowhere')
    const body = errorSchema.parse(await res.json())

    expect(res.status).toBe(404)
    expect(body.success).toBe(false)
    expect(body.error?.code).toBe('NOT_FOUND')
  })
})
