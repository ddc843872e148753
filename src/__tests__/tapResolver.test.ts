import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { EntityStore } from '../entityStore'
import { SessionLifecycleManager } from '../sessions'
import { checkToken, TapResolver } from '../tapResolver'
import type { GroupEntity } from '../types'
import { groupInput, openTestStore, seedEnrolled, testClock } from './helpers'

describe('checkToken', () => {
	it('trims and accepts exactly the configured number of digits', () => {
		expect(checkToken(' 0123456789 ', 10)).toEqual({ ok: true, token: '0123456789' })
		expect(checkToken('012345678', 10)).toEqual({ ok: false, reason: 'Token must be exactly 10 digits' })
		expect(checkToken('01234x6789', 10)).toEqual({ ok: false, reason: 'Token must contain digits only' })
		expect(checkToken('   ', 10)).toEqual({ ok: false, reason: 'Empty token' })
	})
})

describe('TapResolver', () => {
	let store: EntityStore
	let resolver: TapResolver
	let monday: GroupEntity
	let tuesday: GroupEntity

	beforeEach(async () => {
		const clock = testClock()
		store = await openTestStore(clock)
		const sessions = new SessionLifecycleManager(store, clock.now)
		resolver = new TapResolver({ store, sessions, config: { tokenLength: 10 }, now: clock.now })
		monday = await store.createGroup(groupInput('Chess', 'Monday'))
		tuesday = await store.createGroup(groupInput('Art', 'Tuesday'))
	})

	it('rejects malformed tokens without touching the store', async () => {
		const lookup = vi.spyOn(store, 'findParticipantByToken')

		const outcome = await resolver.resolveTap('12ab')

		expect(outcome).toEqual({ kind: 'InvalidToken', token: '12ab', reason: 'Token must contain digits only' })
		expect(lookup).not.toHaveBeenCalled()
	})

	it('reports tokens nobody holds', async () => {
		expect(await resolver.resolveTap('0000000009')).toEqual({ kind: 'UnknownToken', token: '0000000009' })
		expect(await store.db.records.count()).toBe(0)
	})

	it('reports participants without enrollments', async () => {
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [])

		expect(await resolver.resolveTap('0000000001')).toEqual({ kind: 'NoEnrollment', participant: ada })
		expect(await store.db.sessions.count()).toBe(0)
	})

	it('records the groups scheduled today, then reports a duplicate', async () => {
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday, tuesday])

		const first = await resolver.resolveTap('0000000001')
		expect(first).toEqual({
			kind: 'Recorded',
			participant: ada,
			recorded: ['Chess'],
			alreadyRecorded: [],
			attended: 1,
			totalSessions: 1,
		})

		const second = await resolver.resolveTap(' 0000000001 ')
		expect(second).toEqual({ kind: 'Duplicate', participant: ada, groups: ['Chess'] })

		const session = await store.findSession(monday.id, '2024-01-15')
		expect(session).toBeDefined()
		expect(await store.db.records.toArray()).toEqual([
			expect.objectContaining({ participantId: ada.id, status: 'present', origin: 'automatic' }),
		])
	})

	it('records every group scheduled today in one tap', async () => {
		const robotics = await store.createGroup(groupInput('Robotics', 'Monday', '19:00'))
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [robotics, monday])

		const outcome = await resolver.resolveTap('0000000001')

		expect(outcome).toMatchObject({ kind: 'Recorded', recorded: ['Chess', 'Robotics'], totalSessions: 2 })
		expect(await store.listRecordsForParticipant(ada.id)).toHaveLength(2)
	})

	it('treats a participant with no group today as a duplicate without writing', async () => {
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [tuesday])

		expect(await resolver.resolveTap('0000000001')).toEqual({ kind: 'Duplicate', participant: ada, groups: [] })
		expect(await store.db.sessions.count()).toBe(0)
	})

	it('warns when the participant is flagged inactive', async () => {
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday])
		await store.setInactive(ada.id, true)

		const outcome = await resolver.resolveTap('0000000001')

		expect(outcome).toMatchObject({ kind: 'Recorded', warning: 'inactive' })
	})

	it('counts earlier sessions in the totals', async () => {
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday])
		await resolver.setAttendance(ada.id, monday.id, '2024-01-08', 'absent')

		const outcome = await resolver.resolveTap('0000000001')

		expect(outcome).toMatchObject({ kind: 'Recorded', attended: 1, totalSessions: 2 })
	})

	it('reports a closed store as StoreUnavailable', async () => {
		await seedEnrolled(store, 'Ada', '0000000001', [monday])
		store.close()

		await expect(resolver.resolveTap('0000000001')).rejects.toMatchObject({
			name: 'AttendanceError',
			kind: 'StoreUnavailable',
		})
	})

	describe('setAttendance', () => {
		it('pre-empts automatic recording for the day', async () => {
			const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday])

			const record = await resolver.setAttendance(ada.id, monday.id, '2024-01-15', 'absent')
			expect(record).toMatchObject({ participantId: ada.id, status: 'absent', origin: 'manual' })

			expect(await resolver.resolveTap('0000000001')).toEqual({ kind: 'Duplicate', participant: ada, groups: ['Chess'] })
			expect(await store.db.records.count()).toBe(1)
		})

		it('upserts a single record regardless of weekday', async () => {
			const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday])

			// Wednesday, not a scheduled day for the group
			const first = await resolver.setAttendance(ada.id, monday.id, '2024-01-10', 'present')
			const second = await resolver.setAttendance(ada.id, monday.id, '2024-01-10', 'absent')

			expect(second.id).toBe(first.id)
			expect(second.status).toBe('absent')
			expect(await store.db.records.count()).toBe(1)
			expect(await store.findSession(monday.id, '2024-01-10')).toBeDefined()
		})

		it('raises NotFound for unknown participants and groups', async () => {
			const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday])
			await expect(resolver.setAttendance('missing', monday.id, '2024-01-15', 'present')).rejects.toMatchObject({
				kind: 'NotFound',
			})
			await expect(resolver.setAttendance(ada.id, 'missing', '2024-01-15', 'present')).rejects.toMatchObject({
				kind: 'NotFound',
			})
		})

		it('rejects an invalid date', async () => {
			const ada = await seedEnrolled(store, 'Ada', '0000000001', [monday])
			await expect(resolver.setAttendance(ada.id, monday.id, 'yesterday', 'present')).rejects.toThrow(RangeError)
		})
	})
})
