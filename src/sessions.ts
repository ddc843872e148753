import { v4 as uuidv4 } from 'uuid'
import { parseIsoDate } from './calendar'
import type { EntityStore } from './entityStore'
import type { AttendanceRecordEntity, LiveAttendanceRow, SessionEntity, SessionSummary } from './types'

const LOG_PREFIX = '[Session]'

export class SessionLifecycleManager {
	constructor(
		private readonly store: EntityStore,
		private readonly now: () => Date = () => new Date(),
	) {}

	/**
	 * The session for `groupId` on `date`, created on first use. Calling it any
	 * number of times for the same pair leaves exactly one row.
	 */
	async resolveSession(groupId: string, date: string): Promise<SessionEntity> {
		if (!parseIsoDate(date)) throw new RangeError(`Invalid session date: ${date}`)
		return this.store.transaction(async () => {
			await this.store.getGroup(groupId)
			const existing = await this.store.findSession(groupId, date)
			if (existing) return existing
			const session = await this.store.insertSessionOrReselect({
				id: uuidv4(),
				groupId,
				date,
				startAt: this.now().toISOString(),
				endAt: null,
				status: 'open',
			})
			console.log(LOG_PREFIX, 'Session resolved', { id: session.id, groupId, date })
			return session
		})
	}

	/**
	 * Closes the session, writing a manual absence for every active enrolled
	 * participant that has no record yet.
	 */
	async closeSession(sessionId: string): Promise<SessionSummary> {
		const summary = await this.store.transaction(async () => {
			const session = await this.store.getSession(sessionId)
			const group = await this.store.getGroup(session.groupId)
			const enrolled = (await this.store.participantsInGroup(group.id)).filter((p) => !p.inactive)
			const records = await this.store.listRecordsForSession(sessionId)
			const byParticipant = new Map<string, AttendanceRecordEntity>(records.map((r) => [r.participantId, r]))
			const at = this.now().toISOString()

			const absentParticipants: SessionSummary['absentParticipants'] = []
			let presentCount = 0
			for (const participant of enrolled) {
				const record = byParticipant.get(participant.id)
				if (record?.status === 'present') {
					presentCount += 1
					continue
				}
				if (!record && session.status === 'open') {
					await this.store.insertRecord(sessionId, participant.id, { status: 'absent', origin: 'manual', at })
				}
				absentParticipants.push({ participantId: participant.id, displayName: participant.displayName })
			}
			if (session.status === 'open') await this.store.markSessionClosed(sessionId, at)

			return {
				sessionId,
				groupName: group.name,
				totalEnrolled: enrolled.length,
				presentCount,
				absentCount: absentParticipants.length,
				absentParticipants,
			}
		})
		console.log(LOG_PREFIX, 'Session closed', {
			sessionId,
			present: summary.presentCount,
			absent: summary.absentCount,
		})
		return summary
	}

	async liveAttendance(sessionId: string): Promise<LiveAttendanceRow[]> {
		return this.store.read(async () => {
			const session = await this.store.getSession(sessionId)
			const enrolled = await this.store.participantsInGroup(session.groupId)
			const records = await this.store.listRecordsForSession(sessionId)
			const byParticipant = new Map<string, AttendanceRecordEntity>(records.map((r) => [r.participantId, r]))
			return enrolled.map((p): LiveAttendanceRow => {
				const record = byParticipant.get(p.id)
				return {
					participantId: p.id,
					displayName: p.displayName,
					token: p.token,
					status: record ? record.status : 'unrecorded',
					origin: record?.origin,
				}
			})
		})
	}
}
