import { randomUUID } from 'node:crypto'
import type { Context } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { isPairingError } from '../lib/errors.js'

export function requestMeta(c: Context) {
  return {
    requestId: c.get('requestId') ?? randomUUID(),
    timestamp: new Date().toISOString(),
  }
}

export function ok<T>(c: Context, data: T, status: ContentfulStatusCode = 200) {
  return c.json(
    {
      success: true,
      data,
      meta: requestMeta(c),
    },
    status,
  )
}

export function fail(
  c: Context,
  code: string,
  message: string,
  status: ContentfulStatusCode = 400,
  details?: unknown,
) {
  return c.json(
    {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
      meta: requestMeta(c),
    },
    status,
  )
}

/** Maps a `PairingError` to its envelope; anything else is rethrown to `onError`. */
export function failWithError(c: Context, error: unknown) {
  if (isPairingError(error)) {
    return fail(c, error.code, error.message, error.status, error.details)
  }
  throw error
}

export async function readJsonBody(c: Context): Promise<unknown> {
  return c.req.json().catch(() => null)
}
