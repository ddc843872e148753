import { IDBFactory, IDBKeyRange } from 'fake-indexeddb'
import { v4 as uuidv4 } from 'uuid'
import { AttendanceDB } from '../db'
import { EntityStore } from '../entityStore'
import type { GroupInput } from '../entityStore'
import type { GroupEntity, ParticipantEntity } from '../types'

export interface TestClock {
	now: () => Date
	set: (date: Date) => void
}

// Monday 15 January 2024, 09:30 local time
export const MONDAY = new Date(2024, 0, 15, 9, 30)

export function testClock(start: Date = MONDAY): TestClock {
	let current = new Date(start.getTime())
	return {
		now: () => new Date(current.getTime()),
		set: (date) => {
			current = new Date(date.getTime())
		},
	}
}

export async function openTestStore(clock: TestClock = testClock()): Promise<EntityStore> {
	const db = new AttendanceDB({ name: `test-${uuidv4()}`, indexedDB: new IDBFactory(), IDBKeyRange })
	const store = new EntityStore(db, clock.now)
	await store.open()
	return store
}

export function groupInput(name: string, weekday: string, time = '17:00'): GroupInput {
	return { name, category: 'Chess', level: 'Beginner', weekday, time }
}

export async function seedEnrolled(
	store: EntityStore,
	displayName: string,
	token: string | null,
	groups: GroupEntity[],
): Promise<ParticipantEntity> {
	const participant = await store.createParticipant({ displayName, token })
	if (groups.length) await store.enroll(participant.id, groups.map((g) => g.id))
	return participant
}
