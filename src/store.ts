import { createStore } from 'zustand/vanilla'
import { isAttendanceError } from './errors'
import type { AttendanceErrorKind } from './errors'
import type { TapResolver } from './tapResolver'
import type { TapOutcome } from './types'

const LOG_PREFIX = '[Kiosk]'

export const RECENT_LIMIT = 10

interface KioskState {
	lastOutcome?: TapOutcome
	message?: string
	recent: TapOutcome[]
	isBusy: boolean
	error?: string
	errorKind?: AttendanceErrorKind
}

interface Actions {
	tap: (token: string) => Promise<TapOutcome | undefined>
	clearError: () => void
	reset: () => void
}

type Store = KioskState & Actions

export function describeOutcome(outcome: TapOutcome): string {
	switch (outcome.kind) {
		case 'InvalidToken':
			return `Card not read correctly: ${outcome.reason}`
		case 'UnknownToken':
			return `Unknown card ${outcome.token}`
		case 'NoEnrollment':
			return `${outcome.participant.displayName} is not enrolled in any group`
		case 'Duplicate':
			return outcome.groups.length
				? `${outcome.participant.displayName} is already recorded for ${outcome.groups.join(', ')}`
				: `${outcome.participant.displayName} has no group today`
		case 'Recorded': {
			const base = `${outcome.participant.displayName}: ${outcome.recorded.join(', ')} (${outcome.attended}/${outcome.totalSessions})`
			return outcome.warning === 'inactive' ? `${base}, marked inactive` : base
		}
	}
}

/**
 * State behind the tap screen. Store failures end up in `error` for the
 * operator instead of propagating to the reader loop.
 */
export function createKioskStore(resolver: Pick<TapResolver, 'resolveTap'>) {
	return createStore<Store>()((set, get) => ({
		recent: [],
		isBusy: false,
		async tap(token: string) {
			set({ isBusy: true, error: undefined, errorKind: undefined })
			try {
				const outcome = await resolver.resolveTap(token)
				set({
					lastOutcome: outcome,
					message: describeOutcome(outcome),
					recent: [outcome, ...get().recent].slice(0, RECENT_LIMIT),
				})
				return outcome
			} catch (e) {
				if (!isAttendanceError(e)) throw e
				console.error(LOG_PREFIX, 'Tap could not be processed', { kind: e.kind, message: e.message })
				set({ error: e.message, errorKind: e.kind })
				return undefined
			} finally {
				set({ isBusy: false })
			}
		},
		clearError() {
			set({ error: undefined, errorKind: undefined })
		},
		reset() {
			set({ lastOutcome: undefined, message: undefined, recent: [], error: undefined, errorKind: undefined })
		},
	}))
}

export type KioskStore = ReturnType<typeof createKioskStore>
