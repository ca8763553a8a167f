import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto'

const HASH_PREFIX = 'scrypt'
const KEY_LENGTH = 64
const SALT_BYTES = 16

function deriveKey(password: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, KEY_LENGTH, (error, derivedKey) => {
      if (error) {
        reject(error)
        return
      }
      resolve(derivedKey)
    })
  })
}

/**
 * Participant credentials are stored as `scrypt$<salt hex>$<hash hex>`.
 */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES)
  const derived = await deriveKey(password, salt)
  return `${HASH_PREFIX}$${salt.toString('hex')}$${derived.toString('hex')}`
}

/** Returns false for any stored value that is not in the expected format. */
export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [prefix, saltHex, hashHex] = stored.split('$')
  if (prefix !== HASH_PREFIX || !saltHex || !hashHex) {
    return false
  }

  const expected = Buffer.from(hashHex, 'hex')
  if (expected.length !== KEY_LENGTH) {
    return false
  }

  const derived = await deriveKey(password, Buffer.from(saltHex, 'hex'))
  return timingSafeEqual(derived, expected)
}
