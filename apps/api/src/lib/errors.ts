export type PairingErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'NOT_READY'
  | 'CONFLICT'
  | 'UNAUTHORIZED'

export const PAIRING_ERROR_CODES = {
  INVALID_INPUT: 'INVALID_INPUT',
  NOT_FOUND: 'NOT_FOUND',
  NOT_READY: 'NOT_READY',
  CONFLICT: 'CONFLICT',
  UNAUTHORIZED: 'UNAUTHORIZED',
} as const satisfies Record<PairingErrorCode, PairingErrorCode>

const DEFAULT_STATUS: Record<PairingErrorCode, 400 | 401 | 404 | 409> = {
  INVALID_INPUT: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  NOT_READY: 409,
  CONFLICT: 409,
}

export type PairingErrorOptions = {
  status?: 400 | 401 | 404 | 409
  details?: unknown
  cause?: unknown
}

/**
 * Typed failure raised by the pairing services.
 *
 * Routes translate it into the `{ success: false, error }` envelope; anything
 * that is not a `PairingError` is treated as a 500.
 */
export class PairingError extends Error {
  readonly code: PairingErrorCode
  readonly status: 400 | 401 | 404 | 409
  readonly details: unknown

  constructor(code: PairingErrorCode, message: string, options: PairingErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'PairingError'
    this.code = code
    this.status = options.status ?? DEFAULT_STATUS[code]
    this.details = options.details
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      status: this.status,
      ...(this.details !== undefined ? { details: this.details } : {}),
    }
  }
}

export function isPairingError(error: unknown): error is PairingError {
  return error instanceof PairingError
}

export function sessionNotFound(sessionId: string): PairingError {
  return new PairingError(PAIRING_ERROR_CODES.NOT_FOUND, 'Session not found', {
    details: { sessionId },
  })
}
