import { z } from 'zod'
import { createStore } from 'zustand/vanilla'
import { MIN_CREDENTIAL_LENGTH } from './config'
import { hashCredential, verifyCredential } from './credentials'
import type { EntityStore } from './entityStore'
import { AttendanceError } from './errors'

const LOG_PREFIX = '[Auth]'
const CREDENTIAL_KEY = 'credential'

export const MAX_ATTEMPTS = 5

export const CredentialSchema = z
	.string()
	.min(MIN_CREDENTIAL_LENGTH, `Credential must be at least ${MIN_CREDENTIAL_LENGTH} characters`)

export interface AuthFlowState {
	attempts: number
	locked: boolean
}

/**
 * Guards administrative actions behind the stored credential. The failure
 * counter lives for the process; `restartFlow` starts a new dialog.
 */
export class Authenticator {
	readonly flow = createStore<AuthFlowState>()(() => ({ attempts: 0, locked: false }))

	constructor(private readonly store: EntityStore) {}

	remainingAttempts(): number {
		return Math.max(0, MAX_ATTEMPTS - this.flow.getState().attempts)
	}

	async isConfigured(): Promise<boolean> {
		const stored = await this.store.getSetting(CREDENTIAL_KEY)
		return !!stored
	}

	async verify(candidate: string): Promise<boolean> {
		if (this.flow.getState().locked) {
			throw new AttendanceError('AuthLockout', 'Too many failed attempts. Restart the flow to try again.')
		}
		const stored = (await this.store.getSetting(CREDENTIAL_KEY)) ?? ''
		const { matches, needsUpgrade } = await verifyCredential(candidate, stored)

		if (!matches) {
			const attempts = this.flow.getState().attempts + 1
			const locked = attempts >= MAX_ATTEMPTS
			this.flow.setState({ attempts, locked })
			console.warn(LOG_PREFIX, 'Verification failed', { attempts, locked })
			return false
		}

		this.flow.setState({ attempts: 0 })
		if (needsUpgrade) {
			const upgraded = await hashCredential(candidate)
			await this.store.putSetting(CREDENTIAL_KEY, upgraded)
			console.log(LOG_PREFIX, 'Legacy credential upgraded to salted format')
		}
		return true
	}

	restartFlow(): void {
		this.flow.setState({ attempts: 0, locked: false })
	}

	/**
	 * Replaces the credential once `current` verifies. A wrong `current`
	 * counts toward the lockout like any other failed attempt.
	 */
	async changeCredential(current: string, next: string): Promise<boolean> {
		const value = CredentialSchema.parse(next)
		if (!(await this.verify(current))) return false
		await this.store.putSetting(CREDENTIAL_KEY, await hashCredential(value))
		console.log(LOG_PREFIX, 'Credential changed')
		return true
	}

	/**
	 * First-run setup. Returns false and leaves the store alone when a
	 * credential already exists.
	 */
	async setInitialCredential(value: string): Promise<boolean> {
		const hashed = await hashCredential(CredentialSchema.parse(value))
		const written = await this.store.transaction(async () => {
			if (await this.store.getSetting(CREDENTIAL_KEY)) return false
			await this.store.putSetting(CREDENTIAL_KEY, hashed)
			return true
		})
		if (written) console.log(LOG_PREFIX, 'Initial credential set')
		else console.warn(LOG_PREFIX, 'Initial credential rejected, one is already configured')
		return written
	}
}
