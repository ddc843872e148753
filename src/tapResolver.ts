import { parseIsoDate, toIsoDate, weekdayOf } from './calendar'
import type { AppConfig } from './config'
import type { EntityStore } from './entityStore'
import { toAttendanceError } from './errors'
import { participantTotals } from './reports'
import type { SessionLifecycleManager } from './sessions'
import type { AttendanceRecordEntity, AttendanceStatus, TapOutcome } from './types'

const LOG_PREFIX = '[Tap]'

export type TokenCheck = { ok: true; token: string } | { ok: false; reason: string }

export interface TapResolverDeps {
	store: EntityStore
	sessions: SessionLifecycleManager
	config: Pick<AppConfig, 'tokenLength'>
	now?: () => Date
}

/**
 * Structural check mandated by the card readers: a fixed number of ASCII digits.
 */
export function checkToken(raw: string, length: number): TokenCheck {
	const token = raw.trim()
	if (!token) return { ok: false, reason: 'Empty token' }
	if (!/^[0-9]+$/.test(token)) return { ok: false, reason: 'Token must contain digits only' }
	if (token.length !== length) return { ok: false, reason: `Token must be exactly ${length} digits` }
	return { ok: true, token }
}

export class TapResolver {
	private readonly store: EntityStore
	private readonly sessions: SessionLifecycleManager
	private readonly tokenLength: number
	private readonly now: () => Date

	constructor(deps: TapResolverDeps) {
		this.store = deps.store
		this.sessions = deps.sessions
		this.tokenLength = deps.config.tokenLength
		this.now = deps.now ?? (() => new Date())
	}

	async resolveTap(raw: string): Promise<TapOutcome> {
		const check = checkToken(raw, this.tokenLength)
		if (!check.ok) {
			console.warn(LOG_PREFIX, 'Rejected token', { reason: check.reason })
			return { kind: 'InvalidToken', token: raw.trim(), reason: check.reason }
		}
		const { token } = check
		const now = this.now()
		const today = toIsoDate(now)
		const weekday = weekdayOf(now)

		try {
			const outcome = await this.store.transaction(async (): Promise<TapOutcome> => {
				const participant = await this.store.findParticipantByToken(token)
				if (!participant) return { kind: 'UnknownToken', token }

				const groups = await this.store.groupsForParticipant(participant.id)
				if (!groups.length) return { kind: 'NoEnrollment', participant }

				const recorded: string[] = []
				const alreadyRecorded: string[] = []
				for (const group of groups.filter((g) => g.weekday === weekday)) {
					const session = await this.sessions.resolveSession(group.id, today)
					const existing = await this.store.findRecord(session.id, participant.id)
					if (existing) {
						alreadyRecorded.push(group.name)
						continue
					}
					await this.store.insertRecord(session.id, participant.id, {
						status: 'present',
						origin: 'automatic',
						at: now.toISOString(),
					})
					recorded.push(group.name)
				}

				if (!recorded.length) return { kind: 'Duplicate', participant, groups: alreadyRecorded }

				const totals = await participantTotals(this.store, participant.id)
				return {
					kind: 'Recorded',
					participant,
					recorded,
					alreadyRecorded,
					...(participant.inactive ? { warning: 'inactive' as const } : {}),
					...totals,
				}
			})
			console.log(LOG_PREFIX, 'Tap resolved', { kind: outcome.kind, token, date: today, weekday })
			return outcome
		} catch (err) {
			const translated = toAttendanceError(err)
			console.error(LOG_PREFIX, 'Tap failed', { token, error: translated })
			throw translated
		}
	}

	/**
	 * Operator override: writes a manual record for (participant, group, date)
	 * whatever the weekday and whatever was recorded before.
	 */
	async setAttendance(
		participantId: string,
		groupId: string,
		date: string,
		status: AttendanceStatus,
	): Promise<AttendanceRecordEntity> {
		if (!parseIsoDate(date)) throw new RangeError(`Invalid attendance date: ${date}`)
		const record = await this.store.transaction(async () => {
			await this.store.getParticipant(participantId)
			const session = await this.sessions.resolveSession(groupId, date)
			const changes = { status, origin: 'manual' as const, at: this.now().toISOString() }
			const existing = await this.store.findRecord(session.id, participantId)
			if (existing) return this.store.updateRecord(existing.id, changes)
			return this.store.insertRecord(session.id, participantId, changes)
		})
		console.log(LOG_PREFIX, 'Attendance set manually', { participantId, groupId, date, status })
		return record
	}
}
