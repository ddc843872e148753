import { IDBKeyRange as FakeIDBKeyRange, indexedDB as fakeIndexedDB } from 'fake-indexeddb'
import { Authenticator } from './auth'
import { loadConfig } from './config'
import type { AppConfig } from './config'
import { AttendanceDB } from './db'
import type { AttendanceDBOptions } from './db'
import { EntityStore } from './entityStore'
import { GoogleSheetsCollaborator } from './google'
import type { AccessTokenProvider } from './google'
import { InactivityEvaluator } from './inactivity'
import type { InactivityReport } from './inactivity'
import { buildSummaryRows } from './reports'
import { SessionLifecycleManager } from './sessions'
import { createKioskStore } from './store'
import type { KioskStore } from './store'
import { TapResolver } from './tapResolver'
import type { PushResult } from './types'

const LOG_PREFIX = '[Core]'

export interface CoreOptions extends AttendanceDBOptions {
	now?: () => Date
	env?: NodeJS.ProcessEnv
	/** Enables the Sheets collaborator when a spreadsheet id is configured */
	getAccessToken?: AccessTokenProvider
}

export interface AttendanceCore {
	db: AttendanceDB
	store: EntityStore
	config: AppConfig
	sessions: SessionLifecycleManager
	taps: TapResolver
	inactivity: InactivityEvaluator
	auth: Authenticator
	kiosk: KioskStore
	sheets?: GoogleSheetsCollaborator
	recomputeInactivity: (threshold?: number) => Promise<InactivityReport>
	pushSummary: () => Promise<PushResult>
	close: () => void
}

/**
 * Opens the store, loads the configuration snapshot and wires every
 * component to the same database handle. Without an injected factory the
 * store lives in memory on `fake-indexeddb`.
 */
export async function createAttendanceCore(options: CoreOptions = {}): Promise<AttendanceCore> {
	const now = options.now ?? (() => new Date())
	const db = new AttendanceDB({
		name: options.name,
		indexedDB: options.indexedDB ?? fakeIndexedDB,
		IDBKeyRange: options.IDBKeyRange ?? FakeIDBKeyRange,
	})
	const store = new EntityStore(db, now)
	await store.open()
	const config = await loadConfig(store, options.env)

	const sessions = new SessionLifecycleManager(store, now)
	const taps = new TapResolver({ store, sessions, config, now })
	const inactivity = new InactivityEvaluator(store)
	const auth = new Authenticator(store)
	const kiosk = createKioskStore(taps)
	const sheets =
		config.spreadsheetId && options.getAccessToken
			? new GoogleSheetsCollaborator({
					spreadsheetId: config.spreadsheetId,
					getAccessToken: options.getAccessToken,
					timeoutMs: config.sheetsTimeoutMs,
				})
			: undefined

	console.log(LOG_PREFIX, 'Attendance core ready', { db: db.name, sheets: !!sheets })

	return {
		db,
		store,
		config,
		sessions,
		taps,
		inactivity,
		auth,
		kiosk,
		sheets,
		recomputeInactivity: (threshold = config.inactivityThreshold) => inactivity.recomputeAll(threshold),
		async pushSummary() {
			if (!sheets) return { ok: false, message: 'Google Sheets is not configured', rowsWritten: 0 }
			const rows = await buildSummaryRows(store)
			return sheets.pushSummary(rows)
		},
		close: () => store.close(),
	}
}

export * from './types'
export * from './errors'
export * from './calendar'
export * from './config'
export * from './credentials'
export * from './db'
export * from './entityStore'
export * from './sessions'
export * from './tapResolver'
export * from './inactivity'
export * from './auth'
export * from './reports'
export * from './roster'
export * from './store'
export * from './google'
export * from './utils/csv'
