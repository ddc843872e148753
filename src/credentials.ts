import { createHash, pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto'
import { promisify } from 'node:util'

const pbkdf2Async = promisify(pbkdf2)

export const PBKDF2_ITERATIONS = 260_000
const SALT_BYTES = 16
const KEY_BYTES = 32
const DIGEST = 'sha256'

export interface CredentialCheck {
	matches: boolean
	/** Set when a legacy value matched and should be re-hashed */
	needsUpgrade: boolean
}

async function derive(candidate: string, salt: Buffer): Promise<Buffer> {
	return pbkdf2Async(candidate, salt, PBKDF2_ITERATIONS, KEY_BYTES, DIGEST)
}

function sameHex(a: string, b: string): boolean {
	const left = Buffer.from(a, 'utf8')
	const right = Buffer.from(b.toLowerCase(), 'utf8')
	if (left.length !== right.length) return false
	return timingSafeEqual(left, right)
}

function isHex(value: string): boolean {
	return value.length > 0 && value.length % 2 === 0 && /^[0-9a-fA-F]+$/.test(value)
}

/**
 * Returns `saltHex$hashHex` for a fresh random salt.
 */
export async function hashCredential(candidate: string): Promise<string> {
	const salt = randomBytes(SALT_BYTES)
	const key = await derive(candidate, salt)
	return `${salt.toString('hex')}$${key.toString('hex')}`
}

export function legacyHash(candidate: string): string {
	return createHash(DIGEST).update(candidate, 'utf8').digest('hex')
}

export async function verifyCredential(candidate: string, stored: string): Promise<CredentialCheck> {
	if (!stored) return { matches: false, needsUpgrade: false }

	if (!stored.includes('$')) {
		const matches = sameHex(legacyHash(candidate), stored)
		return { matches, needsUpgrade: matches }
	}

	const separator = stored.indexOf('$')
	const saltHex = stored.slice(0, separator)
	const hashHex = stored.slice(separator + 1)
	if (!isHex(saltHex) || !isHex(hashHex)) return { matches: false, needsUpgrade: false }
	const key = await derive(candidate, Buffer.from(saltHex, 'hex'))
	return { matches: sameHex(key.toString('hex'), hashHex), needsUpgrade: false }
}
