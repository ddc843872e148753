import { writeFile } from 'node:fs/promises'
import Papa from 'papaparse'
import type { AttendanceExportRow } from '../types'

const LOG_PREFIX = '[CSV]'
const BOM = '\uFEFF'

export const ATTENDANCE_COLUMNS = ['date', 'participant', 'group', 'status', 'origin', 'timestamp'] as const

export type RosterRecord = Record<string, string>

/**
 * Header-keyed rows from roster CSV text. A leading BOM is ignored and header
 * cells are trimmed.
 */
export function parseRosterCsv(text: string): RosterRecord[] {
	const res = Papa.parse<RosterRecord>(text.startsWith(BOM) ? text.slice(1) : text, {
		header: true,
		skipEmptyLines: true,
		transformHeader: (h) => h.trim(),
	})
	if (res.errors.length) {
		console.warn(LOG_PREFIX, 'Roster CSV parsed with errors', {
			errors: res.errors.slice(0, 5).map((e) => ({ row: e.row, message: e.message })),
		})
	}
	return res.data
}

export function attendanceCsv(rows: AttendanceExportRow[]): string {
	const csv = Papa.unparse(
		rows.map((r) => ATTENDANCE_COLUMNS.map((c) => r[c])),
		{ header: false },
	)
	const header = ATTENDANCE_COLUMNS.join(',')
	return `${BOM}${header}${csv ? `\r\n${csv}` : ''}`
}

export async function writeAttendanceCsv(path: string, rows: AttendanceExportRow[]): Promise<void> {
	await writeFile(path, attendanceCsv(rows), 'utf8')
	console.log(LOG_PREFIX, 'Attendance exported', { path, rows: rows.length })
}
