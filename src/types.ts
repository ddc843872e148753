export const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const

export type Weekday = (typeof WEEKDAYS)[number]

export interface ParticipantEntity {
	id: string
	/**
	 * Card token read by the hardware reader. Null until a card is linked.
	 */
	token: string | null
	displayName: string
	inactive: boolean
	createdAt: string // ISO string
}

export interface GroupEntity {
	id: string
	name: string
	category: string
	level: string
	weekday: Weekday
	time: string // HH:MM
}

export interface EnrollmentEntity {
	participantId: string
	groupId: string
}

export type SessionStatus = 'open' | 'closed'

export interface SessionEntity {
	id: string
	groupId: string
	date: string // YYYY-MM-DD
	startAt: string // ISO string
	endAt: string | null
	status: SessionStatus
}

export type AttendanceStatus = 'present' | 'absent'

export type RecordOrigin = 'automatic' | 'manual'

export interface AttendanceRecordEntity {
	id: string
	sessionId: string
	participantId: string
	status: AttendanceStatus
	origin: RecordOrigin
	at: string // ISO string
}

export interface SettingEntity {
	key: string
	value: string
}

export type TapOutcome =
	| { kind: 'InvalidToken'; token: string; reason: string }
	| { kind: 'UnknownToken'; token: string }
	| { kind: 'NoEnrollment'; participant: ParticipantEntity }
	| {
			kind: 'Recorded'
			participant: ParticipantEntity
			/** Groups that received a new record on this tap */
			recorded: string[]
			/** Groups scheduled today that already had a record */
			alreadyRecorded: string[]
			warning?: 'inactive'
			attended: number
			totalSessions: number
	  }
	| { kind: 'Duplicate'; participant: ParticipantEntity; groups: string[] }

export type TapOutcomeKind = TapOutcome['kind']

/**
 * Supplied by the UI layer. Invoked on `UnknownToken`, never by the core.
 */
export type OnUnknownToken = (token: string) => Promise<ParticipantEntity>

/**
 * Supplied by the UI layer. Invoked on `NoEnrollment`, returns the chosen group ids.
 */
export type OnNoEnrollment = (participant: ParticipantEntity) => Promise<string[]>

export interface AbsentParticipant {
	participantId: string
	displayName: string
}

export interface SessionSummary {
	sessionId: string
	groupName: string
	totalEnrolled: number
	presentCount: number
	absentCount: number
	absentParticipants: AbsentParticipant[]
}

export type LiveStatus = AttendanceStatus | 'unrecorded'

export interface LiveAttendanceRow {
	participantId: string
	displayName: string
	token: string | null
	status: LiveStatus
	origin?: RecordOrigin
}

export interface SummaryRow {
	participantId: string
	displayName: string
	token: string | null
	attended: number
	totalSessions: number
	summary: string
}

export interface PushResult {
	ok: boolean
	message: string
	rowsWritten: number
}

export interface RosterImportRow {
	displayName: string
	token: string | null
	attendedCount: number
	include: boolean
}

export interface ImportPreview {
	totalRows: number
	withToken: number
	withoutToken: number
	sessionCount: number
	willImport: number
	willSkip: number
	rows: RosterImportRow[]
}

export interface ImportCommitResult {
	imported: number
	skipped: number
}

/**
 * Spreadsheet side of the system. The core pushes snapshots through it and
 * reads raw roster rows from it; it never holds a store transaction open while
 * one of these calls is in flight.
 */
export interface SpreadsheetCollaborator {
	pushSummary(rows: SummaryRow[]): Promise<PushResult>
	readRosterRows(): Promise<Record<string, string>[]>
}

export interface DailyReportRow {
	sessionId: string
	groupName: string
	status: SessionStatus
	present: number
	absent: number
	unrecorded: number
}

export interface GroupSessionRow {
	sessionId: string
	date: string
	status: SessionStatus
	present: number
	absent: number
}

export interface AttendanceExportRow {
	date: string
	participant: string
	group: string
	status: AttendanceStatus
	origin: RecordOrigin
	timestamp: string
}
