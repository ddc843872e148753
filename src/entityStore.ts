import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import type { AttendanceDB } from './db'
import { parseWeekday } from './calendar'
import { AttendanceError, notFound, toAttendanceError } from './errors'
import type {
	AttendanceRecordEntity,
	AttendanceStatus,
	GroupEntity,
	ParticipantEntity,
	RecordOrigin,
	SessionEntity,
	SettingEntity,
} from './types'

const LOG_PREFIX = '[Store]'

export const GroupInputSchema = z.object({
	name: z.string().trim().min(1, 'Group name cannot be empty'),
	category: z.string().trim().min(1, 'Category cannot be empty'),
	level: z.string().trim().min(1, 'Level cannot be empty'),
	weekday: z.string().transform((value, ctx) => {
		const day = parseWeekday(value)
		if (!day) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Weekday must be a full English day name (e.g. 'Monday')" })
			return z.NEVER
		}
		return day
	}),
	time: z
		.string()
		.trim()
		.regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Time must be HH:MM'),
})

export type GroupInput = z.input<typeof GroupInputSchema>

export interface NewParticipant {
	displayName: string
	token?: string | null
}

export interface ReassignOptions {
	/**
	 * Take the token away from its current holder instead of failing.
	 */
	takeOver?: boolean
}

export interface GroupDeletion {
	records: number
	sessions: number
	enrollments: number
}

export interface RecordChanges {
	status: AttendanceStatus
	origin: RecordOrigin
	at: string
}

function cleanName(displayName: string): string {
	const name = displayName.trim()
	if (!name) throw new RangeError('Display name cannot be empty')
	return name
}

/**
 * Owns every persisted row. Each public call runs in a Dexie transaction over
 * all tables; calls made inside `transaction()` join the outer one, so a
 * failure anywhere rolls the whole unit back.
 */
export class EntityStore {
	constructor(
		readonly db: AttendanceDB,
		private readonly now: () => Date = () => new Date(),
	) {}

	private tables() {
		const { participants, groups, enrollments, sessions, records, settings } = this.db
		return [participants, groups, enrollments, sessions, records, settings]
	}

	async transaction<T>(scope: () => Promise<T>): Promise<T> {
		try {
			return await this.db.transaction('rw', this.tables(), scope)
		} catch (err) {
			throw toAttendanceError(err)
		}
	}

	async read<T>(scope: () => Promise<T>): Promise<T> {
		try {
			return await this.db.transaction('r', this.tables(), scope)
		} catch (err) {
			throw toAttendanceError(err)
		}
	}

	async open(): Promise<void> {
		try {
			await this.db.open()
		} catch (err) {
			throw toAttendanceError(err)
		}
	}

	close(): void {
		this.db.close()
	}

	// Participants

	async createParticipant(input: NewParticipant): Promise<ParticipantEntity> {
		const participant: ParticipantEntity = {
			id: uuidv4(),
			token: input.token ?? null,
			displayName: cleanName(input.displayName),
			inactive: false,
			createdAt: this.now().toISOString(),
		}
		await this.transaction(async () => {
			if (participant.token !== null) {
				const holder = await this.db.participants.where('token').equals(participant.token).first()
				if (holder) {
					throw new AttendanceError(
						'UniquenessViolation',
						`Token ${participant.token} is already assigned to ${holder.displayName}`,
					)
				}
			}
			await this.db.participants.add(participant)
		})
		console.log(LOG_PREFIX, 'Participant created', { id: participant.id, hasToken: participant.token !== null })
		return { ...participant }
	}

	async getParticipant(id: string): Promise<ParticipantEntity> {
		return this.read(() => this.requireParticipant(id))
	}

	async findParticipantByToken(token: string): Promise<ParticipantEntity | undefined> {
		return this.read(() => this.db.participants.where('token').equals(token).first())
	}

	async listParticipants(): Promise<ParticipantEntity[]> {
		return this.read(() => this.db.participants.orderBy('displayName').toArray())
	}

	async renameParticipant(id: string, displayName: string): Promise<ParticipantEntity> {
		const name = cleanName(displayName)
		return this.transaction(async () => {
			await this.requireParticipant(id)
			await this.db.participants.update(id, { displayName: name })
			return this.requireParticipant(id)
		})
	}

	async setInactive(id: string, inactive: boolean): Promise<void> {
		await this.transaction(async () => {
			const updated = await this.db.participants.update(id, { inactive })
			if (updated === 0) await this.requireParticipant(id)
		})
	}

	/**
	 * Links `token` to the participant. The participant's old token is cleared
	 * first, and with `takeOver` so is the token's current holder, so the
	 * unique token index never sees two rows with the same value.
	 */
	async reassignToken(id: string, token: string, options: ReassignOptions = {}): Promise<ParticipantEntity> {
		const value = token.trim()
		if (!value) throw new RangeError('Token cannot be empty')
		const result = await this.transaction(async () => {
			const participant = await this.requireParticipant(id)
			const holder = await this.db.participants.where('token').equals(value).first()
			if (holder && holder.id !== id) {
				if (!options.takeOver) {
					throw new AttendanceError('UniquenessViolation', `Token ${value} is already assigned to ${holder.displayName}`)
				}
				await this.db.participants.update(holder.id, { token: null })
				console.warn(LOG_PREFIX, 'Token taken over from previous holder', { from: holder.id, to: id })
			}
			if (participant.token !== null) await this.db.participants.update(id, { token: null })
			await this.db.participants.update(id, { token: value })
			return this.requireParticipant(id)
		})
		console.log(LOG_PREFIX, 'Token reassigned', { id })
		return result
	}

	async clearToken(id: string): Promise<void> {
		await this.transaction(async () => {
			await this.requireParticipant(id)
			await this.db.participants.update(id, { token: null })
		})
	}

	async deleteParticipant(id: string): Promise<void> {
		await this.transaction(async () => {
			await this.requireParticipant(id)
			await this.db.records.where('participantId').equals(id).delete()
			await this.db.enrollments.where('participantId').equals(id).delete()
			await this.db.participants.delete(id)
		})
		console.log(LOG_PREFIX, 'Participant deleted', { id })
	}

	// Groups

	async createGroup(input: GroupInput): Promise<GroupEntity> {
		const group: GroupEntity = { id: uuidv4(), ...GroupInputSchema.parse(input) }
		await this.transaction(async () => {
			await this.db.groups.add(group)
		})
		console.log(LOG_PREFIX, 'Group created', { id: group.id, name: group.name, weekday: group.weekday })
		return { ...group }
	}

	async getGroup(id: string): Promise<GroupEntity> {
		return this.read(() => this.requireGroup(id))
	}

	async listGroups(): Promise<GroupEntity[]> {
		return this.read(() => this.db.groups.orderBy('name').toArray())
	}

	async updateGroup(id: string, input: GroupInput): Promise<GroupEntity> {
		const fields = GroupInputSchema.parse(input)
		return this.transaction(async () => {
			await this.requireGroup(id)
			await this.db.groups.put({ id, ...fields })
			return this.requireGroup(id)
		})
	}

	/**
	 * Removes records, then sessions, then enrollments, then the group itself.
	 */
	async deleteGroup(id: string): Promise<GroupDeletion> {
		const deletion = await this.transaction(async () => {
			await this.requireGroup(id)
			const sessionIds = await this.db.sessions.where('groupId').equals(id).primaryKeys()
			const records = await this.db.records.where('sessionId').anyOf(sessionIds).delete()
			await this.db.sessions.bulkDelete(sessionIds)
			const enrollments = await this.db.enrollments.where('groupId').equals(id).delete()
			await this.db.groups.delete(id)
			return { records, sessions: sessionIds.length, enrollments }
		})
		console.log(LOG_PREFIX, 'Group deleted', { id, ...deletion })
		return deletion
	}

	// Enrollments

	async enroll(participantId: string, groupIds: string[]): Promise<void> {
		await this.transaction(async () => {
			await this.requireParticipant(participantId)
			for (const groupId of groupIds) await this.requireGroup(groupId)
			await this.db.enrollments.bulkPut(groupIds.map((groupId) => ({ participantId, groupId })))
		})
		console.log(LOG_PREFIX, 'Enrolled', { participantId, groupIds })
	}

	async unenroll(participantId: string, groupId: string): Promise<void> {
		await this.transaction(async () => {
			await this.db.enrollments.delete([participantId, groupId])
		})
	}

	async groupsForParticipant(participantId: string): Promise<GroupEntity[]> {
		return this.read(async () => {
			const groupIds = await this.db.enrollments.where('participantId').equals(participantId).toArray()
			const groups = await this.db.groups.bulkGet(groupIds.map((e) => e.groupId))
			return groups
				.filter((g): g is GroupEntity => !!g)
				.sort((a, b) => a.name.localeCompare(b.name))
		})
	}

	async participantsInGroup(groupId: string): Promise<ParticipantEntity[]> {
		return this.read(async () => {
			const enrollments = await this.db.enrollments.where('groupId').equals(groupId).toArray()
			const participants = await this.db.participants.bulkGet(enrollments.map((e) => e.participantId))
			return participants
				.filter((p): p is ParticipantEntity => !!p)
				.sort((a, b) => a.displayName.localeCompare(b.displayName))
		})
	}

	async enrollmentGroupIds(participantId: string): Promise<string[]> {
		return this.read(async () => {
			const enrollments = await this.db.enrollments.where('participantId').equals(participantId).toArray()
			return enrollments.map((e) => e.groupId)
		})
	}

	// Sessions

	async getSession(id: string): Promise<SessionEntity> {
		return this.read(async () => {
			const session = await this.db.sessions.get(id)
			if (!session) throw notFound('Session', id)
			return session
		})
	}

	async findSession(groupId: string, date: string): Promise<SessionEntity | undefined> {
		return this.read(() => this.db.sessions.where('[groupId+date]').equals([groupId, date]).first())
	}

	/**
	 * Inserts `session` unless a row for the same (group, date) already exists;
	 * a unique-index violation is answered by reselecting the existing row.
	 */
	async insertSessionOrReselect(session: SessionEntity): Promise<SessionEntity> {
		return this.transaction(async () => {
			try {
				await this.db.sessions.add(session)
				return { ...session }
			} catch (err) {
				const translated = toAttendanceError(err)
				if (!(translated instanceof AttendanceError) || translated.kind !== 'UniquenessViolation') throw translated
				const existing = await this.db.sessions.where('[groupId+date]').equals([session.groupId, session.date]).first()
				if (!existing) throw translated
				console.warn(LOG_PREFIX, 'Session insert collided, reusing existing row', {
					groupId: session.groupId,
					date: session.date,
				})
				return existing
			}
		})
	}

	async listSessionsForGroups(groupIds: string[]): Promise<SessionEntity[]> {
		if (!groupIds.length) return []
		return this.read(() => this.db.sessions.where('groupId').anyOf(groupIds).toArray())
	}

	async listSessionsOnDate(date: string): Promise<SessionEntity[]> {
		return this.read(() => this.db.sessions.where('date').equals(date).toArray())
	}

	async markSessionClosed(id: string, endAt: string): Promise<void> {
		await this.transaction(async () => {
			const updated = await this.db.sessions.update(id, { status: 'closed', endAt })
			if (updated === 0) throw notFound('Session', id)
		})
	}

	// Attendance records

	async findRecord(sessionId: string, participantId: string): Promise<AttendanceRecordEntity | undefined> {
		return this.read(() =>
			this.db.records.where('[sessionId+participantId]').equals([sessionId, participantId]).first(),
		)
	}

	async insertRecord(
		sessionId: string,
		participantId: string,
		changes: RecordChanges,
	): Promise<AttendanceRecordEntity> {
		const record: AttendanceRecordEntity = { id: uuidv4(), sessionId, participantId, ...changes }
		await this.transaction(async () => {
			await this.db.records.add(record)
		})
		return { ...record }
	}

	async updateRecord(id: string, changes: RecordChanges): Promise<AttendanceRecordEntity> {
		return this.transaction(async () => {
			const updated = await this.db.records.update(id, changes)
			if (updated === 0) throw notFound('AttendanceRecord', id)
			const record = await this.db.records.get(id)
			if (!record) throw notFound('AttendanceRecord', id)
			return record
		})
	}

	async listRecordsForSession(sessionId: string): Promise<AttendanceRecordEntity[]> {
		return this.read(() => this.db.records.where('sessionId').equals(sessionId).toArray())
	}

	async listRecordsForParticipant(participantId: string): Promise<AttendanceRecordEntity[]> {
		return this.read(() => this.db.records.where('participantId').equals(participantId).toArray())
	}

	async listRecordsForSessions(sessionIds: string[]): Promise<AttendanceRecordEntity[]> {
		if (!sessionIds.length) return []
		return this.read(() => this.db.records.where('sessionId').anyOf(sessionIds).toArray())
	}

	// Settings

	async getSetting(key: string): Promise<string | undefined> {
		return this.read(async () => (await this.db.settings.get(key))?.value)
	}

	async putSetting(key: string, value: string): Promise<void> {
		await this.transaction(async () => {
			await this.db.settings.put({ key, value })
		})
	}

	async listSettings(): Promise<SettingEntity[]> {
		return this.read(() => this.db.settings.toArray())
	}

	private async requireParticipant(id: string): Promise<ParticipantEntity> {
		const participant = await this.db.participants.get(id)
		if (!participant) throw notFound('Participant', id)
		return participant
	}

	private async requireGroup(id: string): Promise<GroupEntity> {
		const group = await this.db.groups.get(id)
		if (!group) throw notFound('Group', id)
		return group
	}
}
