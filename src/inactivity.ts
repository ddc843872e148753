import type { EntityStore } from './entityStore'
import type { SessionEntity } from './types'

const LOG_PREFIX = '[Inactivity]'

export interface InactivityReport {
	evaluated: number
	flagged: number
	cleared: number
}

/**
 * Length of the run of most recent sessions without a `present` mark.
 * Sessions are walked newest first; ties on date go to the later start.
 */
export function trailingAbsences(sessions: SessionEntity[], presentSessionIds: Set<string>): number {
	const ordered = [...sessions].sort((a, b) => b.date.localeCompare(a.date) || b.startAt.localeCompare(a.startAt))
	let run = 0
	for (const session of ordered) {
		if (presentSessionIds.has(session.id)) break
		run += 1
	}
	return run
}

export class InactivityEvaluator {
	constructor(private readonly store: EntityStore) {}

	async recomputeAll(threshold: number): Promise<InactivityReport> {
		if (!Number.isInteger(threshold) || threshold < 1) {
			throw new RangeError(`Inactivity threshold must be a whole number of at least 1, got ${threshold}`)
		}
		const report = await this.store.transaction(async () => {
			const participants = await this.store.listParticipants()
			let flagged = 0
			let cleared = 0
			for (const participant of participants) {
				const groupIds = await this.store.enrollmentGroupIds(participant.id)
				let inactive = false
				if (groupIds.length) {
					const sessions = await this.store.listSessionsForGroups(groupIds)
					const records = await this.store.listRecordsForParticipant(participant.id)
					const present = new Set(records.filter((r) => r.status === 'present').map((r) => r.sessionId))
					inactive = trailingAbsences(sessions, present) >= threshold
				}
				if (inactive === participant.inactive) continue
				await this.store.setInactive(participant.id, inactive)
				if (inactive) flagged += 1
				else cleared += 1
			}
			return { evaluated: participants.length, flagged, cleared }
		})
		console.log(LOG_PREFIX, 'Recomputed inactivity flags', { threshold, ...report })
		return report
	}
}
