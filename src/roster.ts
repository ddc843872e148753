import type { EntityStore } from './entityStore'
import type { ImportCommitResult, ImportPreview, RosterImportRow, SpreadsheetCollaborator } from './types'
import { parseRosterCsv } from './utils/csv'

const LOG_PREFIX = '[Roster]'

const DATE_COLUMN = /^d_\d{4}_\d{2}_\d{2}$/i

function findKey(keys: string[], ...names: string[]): string | undefined {
	return keys.find((k) => names.includes(k.trim().toLowerCase()))
}

function cell(row: Record<string, string>, key: string | undefined): string {
	if (!key) return ''
	return String(row[key] ?? '').trim()
}

/**
 * Builds an import preview without touching the store. A row is kept when it
 * carries a card token or attended at least `minSessions` dated sessions.
 */
export function importRoster(rows: Record<string, string>[], minSessions: number): ImportPreview {
	if (!Number.isInteger(minSessions) || minSessions < 0) {
		throw new RangeError(`minSessions must be a whole number of at least 0, got ${minSessions}`)
	}
	const keys = rows.length ? Object.keys(rows[0]) : []
	const dateKeys = keys.filter((k) => DATE_COLUMN.test(k.trim()))
	const nameKey = findKey(keys, 'name')
	const firstKey = findKey(keys, 'first_name')
	const lastKey = findKey(keys, 'last_name')
	const tokenKey = findKey(keys, 'rfid', 'token')
	const splitNames = !!firstKey && !!lastKey
	if (rows.length && !splitNames && !nameKey) {
		throw new RangeError("Roster must have a 'name' column or both 'first_name' and 'last_name' columns")
	}

	const parsed: RosterImportRow[] = []
	for (const row of rows) {
		const displayName = splitNames
			? [cell(row, firstKey), cell(row, lastKey)].filter(Boolean).join(' ')
			: cell(row, nameKey).replace(/\s+/g, ' ')
		if (!displayName) continue
		const token = cell(row, tokenKey) || null
		const attendedCount = dateKeys.filter((k) => {
			const value = cell(row, k)
			return value !== '' && value !== '0'
		}).length
		parsed.push({ displayName, token, attendedCount, include: token !== null || attendedCount >= minSessions })
	}

	const withToken = parsed.filter((r) => r.token !== null).length
	const willImport = parsed.filter((r) => r.include).length
	const preview: ImportPreview = {
		totalRows: parsed.length,
		withToken,
		withoutToken: parsed.length - withToken,
		sessionCount: dateKeys.length,
		willImport,
		willSkip: parsed.length - willImport,
		rows: parsed,
	}
	console.log(LOG_PREFIX, 'Import preview built', {
		rows: preview.totalRows,
		willImport: preview.willImport,
		willSkip: preview.willSkip,
	})
	return preview
}

export function previewRosterCsv(text: string, minSessions: number): ImportPreview {
	return importRoster(parseRosterCsv(text), minSessions)
}

export async function previewRosterSheet(sheets: SpreadsheetCollaborator, minSessions: number): Promise<ImportPreview> {
	return importRoster(await sheets.readRosterRows(), minSessions)
}

/**
 * Writes the included rows in one transaction. Rows whose name (ignoring
 * case) or token is already taken, by the store or an earlier row of the
 * batch, are skipped.
 */
export async function commitImport(store: EntityStore, preview: ImportPreview): Promise<ImportCommitResult> {
	const toImport = preview.rows.filter((r) => r.include)
	if (!toImport.length) return { imported: 0, skipped: 0 }

	const result = await store.transaction(async () => {
		const existing = await store.listParticipants()
		const knownNames = new Set(existing.map((p) => p.displayName.toLowerCase()))
		const knownTokens = new Set(existing.flatMap((p) => (p.token === null ? [] : [p.token])))
		let imported = 0
		let skipped = 0
		for (const row of toImport) {
			const nameKey = row.displayName.toLowerCase()
			if (knownNames.has(nameKey)) {
				console.warn(LOG_PREFIX, 'Import skip (name exists)', { displayName: row.displayName })
				skipped += 1
				continue
			}
			if (row.token !== null && knownTokens.has(row.token)) {
				console.warn(LOG_PREFIX, 'Import skip (token taken)', { displayName: row.displayName, token: row.token })
				skipped += 1
				continue
			}
			await store.createParticipant({ displayName: row.displayName, token: row.token })
			knownNames.add(nameKey)
			if (row.token !== null) knownTokens.add(row.token)
			imported += 1
		}
		return { imported, skipped }
	})
	console.log(LOG_PREFIX, 'Import committed', result)
	return result
}
