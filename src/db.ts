import Dexie from 'dexie'
import type { DexieOptions, Table } from 'dexie'
import type {
	AttendanceRecordEntity,
	EnrollmentEntity,
	GroupEntity,
	ParticipantEntity,
	SessionEntity,
	SettingEntity,
} from './types'

export const DEFAULT_DB_NAME = 'AttendanceDB'

/**
 * Rows written the first time a database is created. Existing values are never
 * overwritten on later opens.
 */
export const DEFAULT_SETTINGS: SettingEntity[] = [
	{ key: 'inactivityThreshold', value: '3' },
	{ key: 'credential', value: '' },
	{ key: 'language', value: 'en' },
	{ key: 'tokenLength', value: '10' },
	{ key: 'spreadsheetId', value: '' },
]

/**
 * The IndexedDB implementation is injected so the same handle works over a
 * browser factory or `fake-indexeddb` under Node.
 */
export interface AttendanceDBOptions extends Pick<DexieOptions, 'indexedDB' | 'IDBKeyRange'> {
	name?: string
}

export class AttendanceDB extends Dexie {
	participants!: Table<ParticipantEntity, string>
	groups!: Table<GroupEntity, string>
	enrollments!: Table<EnrollmentEntity, [string, string]>
	sessions!: Table<SessionEntity, string>
	records!: Table<AttendanceRecordEntity, string>
	settings!: Table<SettingEntity, string>

	constructor(options: AttendanceDBOptions) {
		super(options.name ?? DEFAULT_DB_NAME, {
			indexedDB: options.indexedDB,
			IDBKeyRange: options.IDBKeyRange,
		})
		this.version(1).stores({
			participants: 'id, &token, displayName',
			groups: 'id, name, weekday',
			enrollments: '[participantId+groupId], participantId, groupId',
			sessions: 'id, &[groupId+date], groupId, date',
			records: 'id, &[sessionId+participantId], sessionId, participantId',
			settings: 'key',
		})
		this.on('populate', (tx) => {
			console.log('[DB]', 'Seeding default settings', { keys: DEFAULT_SETTINGS.map((s) => s.key) })
			return tx.table<SettingEntity, string>('settings').bulkAdd(DEFAULT_SETTINGS)
		})
	}
}
