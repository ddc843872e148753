import { beforeEach, describe, expect, it } from 'vitest'
import type { EntityStore } from '../entityStore'
import { SessionLifecycleManager } from '../sessions'
import type { GroupEntity } from '../types'
import type { TestClock } from './helpers'
import { groupInput, MONDAY, openTestStore, seedEnrolled, testClock } from './helpers'

describe('SessionLifecycleManager', () => {
	let clock: TestClock
	let store: EntityStore
	let sessions: SessionLifecycleManager
	let chess: GroupEntity

	beforeEach(async () => {
		clock = testClock()
		store = await openTestStore(clock)
		sessions = new SessionLifecycleManager(store, clock.now)
		chess = await store.createGroup(groupInput('Chess', 'Monday'))
	})

	describe('resolveSession', () => {
		it('creates the session once and returns it afterwards', async () => {
			const first = await sessions.resolveSession(chess.id, '2024-01-15')
			const second = await sessions.resolveSession(chess.id, '2024-01-15')

			expect(second.id).toBe(first.id)
			expect(first).toMatchObject({ groupId: chess.id, date: '2024-01-15', status: 'open', endAt: null })
			expect(first.startAt).toBe(MONDAY.toISOString())
		})

		it('leaves a single row under concurrent calls', async () => {
			const resolved = await Promise.all(Array.from({ length: 6 }, () => sessions.resolveSession(chess.id, '2024-01-15')))

			expect(new Set(resolved.map((s) => s.id)).size).toBe(1)
			expect(await store.db.sessions.count()).toBe(1)
		})

		it('keeps separate sessions per date', async () => {
			await sessions.resolveSession(chess.id, '2024-01-15')
			await sessions.resolveSession(chess.id, '2024-01-22')
			expect(await store.db.sessions.count()).toBe(2)
		})

		it('rejects invalid dates and unknown groups', async () => {
			await expect(sessions.resolveSession(chess.id, '2024-13-01')).rejects.toThrow(RangeError)
			await expect(sessions.resolveSession('missing', '2024-01-15')).rejects.toMatchObject({ kind: 'NotFound' })
			expect(await store.db.sessions.count()).toBe(0)
		})
	})

	describe('closeSession', () => {
		it('writes manual absences for active participants without a record', async () => {
			const ada = await seedEnrolled(store, 'Ada', '0000000001', [chess])
			const ben = await seedEnrolled(store, 'Ben', '0000000002', [chess])
			const cem = await seedEnrolled(store, 'Cem', '0000000003', [chess])
			await store.setInactive(cem.id, true)
			const session = await sessions.resolveSession(chess.id, '2024-01-15')
			await store.insertRecord(session.id, ada.id, { status: 'present', origin: 'automatic', at: MONDAY.toISOString() })

			clock.set(new Date(2024, 0, 15, 11, 0))
			const summary = await sessions.closeSession(session.id)

			expect(summary).toEqual({
				sessionId: session.id,
				groupName: 'Chess',
				totalEnrolled: 2,
				presentCount: 1,
				absentCount: 1,
				absentParticipants: [{ participantId: ben.id, displayName: 'Ben' }],
			})
			expect(await store.findRecord(session.id, ben.id)).toMatchObject({ status: 'absent', origin: 'manual' })
			expect(await store.findRecord(session.id, cem.id)).toBeUndefined()
			expect(await store.getSession(session.id)).toMatchObject({
				status: 'closed',
				endAt: new Date(2024, 0, 15, 11, 0).toISOString(),
			})
		})

		it('does not write again when the session is already closed', async () => {
			await seedEnrolled(store, 'Ada', null, [chess])
			const session = await sessions.resolveSession(chess.id, '2024-01-15')
			const first = await sessions.closeSession(session.id)
			await seedEnrolled(store, 'Ben', null, [chess])

			const second = await sessions.closeSession(session.id)

			expect(first.absentCount).toBe(1)
			expect(second).toMatchObject({ totalEnrolled: 2, presentCount: 0, absentCount: 2 })
			expect(await store.listRecordsForSession(session.id)).toHaveLength(1)
		})

		it('raises NotFound for an unknown session', async () => {
			await expect(sessions.closeSession('missing')).rejects.toMatchObject({ kind: 'NotFound' })
		})
	})

	it('lists live attendance for every enrolled participant', async () => {
		const ada = await seedEnrolled(store, 'Ada', '0000000001', [chess])
		const ben = await seedEnrolled(store, 'Ben', null, [chess])
		const session = await sessions.resolveSession(chess.id, '2024-01-15')
		await store.insertRecord(session.id, ada.id, { status: 'present', origin: 'automatic', at: MONDAY.toISOString() })

		expect(await sessions.liveAttendance(session.id)).toEqual([
			{ participantId: ada.id, displayName: 'Ada', token: '0000000001', status: 'present', origin: 'automatic' },
			{ participantId: ben.id, displayName: 'Ben', token: null, status: 'unrecorded', origin: undefined },
		])
	})
})
