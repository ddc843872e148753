import { parseIsoDate } from './calendar'
import type { EntityStore } from './entityStore'
import type {
	AttendanceExportRow,
	AttendanceRecordEntity,
	DailyReportRow,
	GroupSessionRow,
	SessionEntity,
	SummaryRow,
} from './types'

export interface AttendanceTotals {
	attended: number
	totalSessions: number
}

/**
 * Sessions held by the participant's enrolled groups, and how many of them
 * carry a `present` record for the participant.
 */
export async function participantTotals(store: EntityStore, participantId: string): Promise<AttendanceTotals> {
	return store.read(async () => {
		const groupIds = await store.enrollmentGroupIds(participantId)
		const sessions = await store.listSessionsForGroups(groupIds)
		const sessionIds = new Set(sessions.map((s) => s.id))
		const records = await store.listRecordsForParticipant(participantId)
		const attended = records.filter((r) => r.status === 'present' && sessionIds.has(r.sessionId)).length
		return { attended, totalSessions: sessions.length }
	})
}

export async function buildSummaryRows(store: EntityStore): Promise<SummaryRow[]> {
	return store.read(async () => {
		const participants = await store.listParticipants()
		const rows: SummaryRow[] = []
		for (const p of participants) {
			const { attended, totalSessions } = await participantTotals(store, p.id)
			rows.push({
				participantId: p.id,
				displayName: p.displayName,
				token: p.token,
				attended,
				totalSessions,
				summary: `${attended}/${totalSessions}`,
			})
		}
		return rows
	})
}

function countByStatus(records: AttendanceRecordEntity[], participantIds: Set<string>) {
	let present = 0
	let absent = 0
	for (const r of records) {
		if (!participantIds.has(r.participantId)) continue
		if (r.status === 'present') present += 1
		else absent += 1
	}
	return { present, absent }
}

export async function dailyReport(store: EntityStore, date: string): Promise<DailyReportRow[]> {
	if (!parseIsoDate(date)) throw new RangeError(`Invalid report date: ${date}`)
	return store.read(async () => {
		const sessions = await store.listSessionsOnDate(date)
		const rows: DailyReportRow[] = []
		for (const session of sessions) {
			const group = await store.getGroup(session.groupId)
			const enrolled = await store.participantsInGroup(group.id)
			const records = await store.listRecordsForSession(session.id)
			const { present, absent } = countByStatus(records, new Set(enrolled.map((p) => p.id)))
			rows.push({
				sessionId: session.id,
				groupName: group.name,
				status: session.status,
				present,
				absent,
				unrecorded: enrolled.length - present - absent,
			})
		}
		return rows.sort((a, b) => a.groupName.localeCompare(b.groupName))
	})
}

/**
 * One row per session of the group, newest first. Counts include records of
 * participants who have since left the group.
 */
export async function groupReport(store: EntityStore, groupId: string): Promise<GroupSessionRow[]> {
	return store.read(async () => {
		await store.getGroup(groupId)
		const sessions = await store.listSessionsForGroups([groupId])
		const records = await store.listRecordsForSessions(sessions.map((s) => s.id))
		return sessions
			.sort((a, b) => b.date.localeCompare(a.date))
			.map((session): GroupSessionRow => {
				const own = records.filter((r) => r.sessionId === session.id)
				return {
					sessionId: session.id,
					date: session.date,
					status: session.status,
					present: own.filter((r) => r.status === 'present').length,
					absent: own.filter((r) => r.status === 'absent').length,
				}
			})
	})
}

export interface ExportRange {
	from?: string
	to?: string
}

function inRange(session: SessionEntity, range: ExportRange): boolean {
	if (range.from && session.date < range.from) return false
	if (range.to && session.date > range.to) return false
	return true
}

export async function attendanceExportRows(store: EntityStore, range: ExportRange = {}): Promise<AttendanceExportRow[]> {
	for (const bound of [range.from, range.to]) {
		if (bound !== undefined && !parseIsoDate(bound)) throw new RangeError(`Invalid export date: ${bound}`)
	}
	return store.read(async () => {
		const groups = await store.listGroups()
		const groupName = new Map<string, string>(groups.map((g) => [g.id, g.name]))
		const sessions = (await store.listSessionsForGroups(groups.map((g) => g.id))).filter((s) => inRange(s, range))
		const sessionById = new Map<string, SessionEntity>(sessions.map((s) => [s.id, s]))
		const participants = await store.listParticipants()
		const participantName = new Map<string, string>(participants.map((p) => [p.id, p.displayName]))
		const records = await store.listRecordsForSessions(sessions.map((s) => s.id))

		const rows: AttendanceExportRow[] = []
		for (const r of records) {
			const session = sessionById.get(r.sessionId)
			if (!session) continue
			rows.push({
				date: session.date,
				participant: participantName.get(r.participantId) ?? '',
				group: groupName.get(session.groupId) ?? '',
				status: r.status,
				origin: r.origin,
				timestamp: r.at,
			})
		}
		return rows.sort(
			(a, b) =>
				a.date.localeCompare(b.date) || a.group.localeCompare(b.group) || a.participant.localeCompare(b.participant),
		)
	})
}
