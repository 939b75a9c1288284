import { timingSafeEqual } from 'crypto'
import { customAlphabet } from 'nanoid'
import { ConfigError } from './errors.js'
import { logger } from './logger.js'

const log = logger.child({ component: 'auth' })

export const SERVER_SECRET_LENGTH = 64

// Printable ASCII without space: '!' (0x21) through '~' (0x7e).
const SECRET_ALPHABET = Array.from({ length: 0x7e - 0x21 + 1 }, (_, i) => String.fromCharCode(0x21 + i)).join('')
const SECRET_PATTERN = /^[!-~]{64}$/

const nextSecret = customAlphabet(SECRET_ALPHABET, SERVER_SECRET_LENGTH)

export function generateServerSecret(): string {
  return nextSecret()
}

export function isValidServerSecret(secret: string): boolean {
  return SECRET_PATTERN.test(secret)
}

/** Use `configured` when present (validated), otherwise generate a fresh secret. */
export function resolveServerSecret(configured?: string): string {
  if (configured === undefined) {
    const secret = generateServerSecret()
    log.debug({ event: 'server_secret_generated', secretLength: secret.length }, 'Generated server secret')
    return secret
  }
  if (!isValidServerSecret(configured)) {
    throw new ConfigError(`Server secret must be ${SERVER_SECRET_LENGTH} printable ASCII characters without spaces`)
  }
  log.info({ event: 'server_secret_configured' }, 'Security: server secret configured')
  return configured
}

export function timingSafeCompare(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8')
  const bufB = Buffer.from(b, 'utf8')
  if (bufA.length !== bufB.length) return false
  return timingSafeEqual(bufA, bufB)
}
