import { z } from 'zod'
import type { PushResult, SpreadsheetCollaborator, SummaryRow } from './types'

const LOG_PREFIX = '[Sheets]'
const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets'

export const SUMMARY_SHEET = 'Attendance Summary'
export const ROSTER_SHEET = 'Roster'
export const SUMMARY_HEADERS = ['Name', 'Card', 'Attended', 'Total', 'Summary']

/**
 * Supplies a bearer token with the spreadsheets scope. Token acquisition and
 * refresh belong to the host application.
 */
export type AccessTokenProvider = () => Promise<string>

export interface GoogleSheetsOptions {
	spreadsheetId: string
	getAccessToken: AccessTokenProvider
	timeoutMs: number
	summarySheet?: string
	rosterSheet?: string
}

const SheetTitlesResponse = z.object({
	sheets: z.array(z.object({ properties: z.object({ title: z.string() }) })).default([]),
})

const ValuesResponse = z.object({
	values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).default([]),
})

export function parseSpreadsheetId(input: string): string {
	const trimmed = (input || '').trim()
	const m = trimmed.match(/\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/)
	if (m && m[1]) return m[1]
	return trimmed
}

export function isLikelySpreadsheetId(id: string): boolean {
	// URL-safe base64-like: letters, digits, '-', '_'
	return /^[a-zA-Z0-9-_]{20,}$/.test(id)
}

export function normalizeAndValidateSpreadsheetId(input: string): string {
	const id = parseSpreadsheetId(input)
	if (!isLikelySpreadsheetId(id)) {
		throw new Error('Invalid Spreadsheet ID. Paste the full sheet URL or the ID from /spreadsheets/d/<ID>/...')
	}
	return id
}

// Sheet names with spaces or quotes must be quoted in A1 notation
export function a1Range(sheet: string, cells?: string): string {
	const quoted = `'${sheet.replace(/'/g, "''")}'`
	return cells ? `${quoted}!${cells}` : quoted
}

// AbortSignal.timeout rejects with a DOMException, so match on the name alone
function isTimeout(err: unknown): boolean {
	return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError'
}

function describeFailure(err: unknown, timeoutMs: number): string {
	if (isTimeout(err)) return `Google Sheets did not respond within ${timeoutMs} ms`
	if (err instanceof Error) return err.message
	return String(err)
}

async function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	signal.throwIfAborted()
	let onAbort = () => {}
	const aborted = new Promise<never>((_, reject) => {
		onAbort = () => reject(signal.reason)
		signal.addEventListener('abort', onAbort, { once: true })
	})
	try {
		return await Promise.race([promise, aborted])
	} finally {
		signal.removeEventListener('abort', onAbort)
	}
}

export class GoogleSheetsCollaborator implements SpreadsheetCollaborator {
	readonly spreadsheetId: string
	private readonly getAccessToken: AccessTokenProvider
	private readonly timeoutMs: number
	private readonly summarySheet: string
	private readonly rosterSheet: string

	constructor(options: GoogleSheetsOptions) {
		this.spreadsheetId = normalizeAndValidateSpreadsheetId(options.spreadsheetId)
		this.getAccessToken = options.getAccessToken
		this.timeoutMs = options.timeoutMs
		this.summarySheet = options.summarySheet ?? SUMMARY_SHEET
		this.rosterSheet = options.rosterSheet ?? ROSTER_SHEET
	}

	private url(path: string): string {
		return `${SHEETS_API}/${encodeURIComponent(this.spreadsheetId)}${path}`
	}

	private async fetchJson(url: string, signal: AbortSignal, init?: RequestInit): Promise<unknown> {
		// The token provider counts against the same deadline as the request
		const token = await untilAborted(this.getAccessToken(), signal)
		console.log(LOG_PREFIX, 'HTTP', init?.method || 'GET', url)
		const res = await fetch(url, {
			...init,
			signal,
			headers: {
				'Content-Type': 'application/json',
				Authorization: `Bearer ${token}`,
			},
		})
		const status = res.status
		if (!res.ok) {
			const text = await res.text().catch(() => '')
			console.error(LOG_PREFIX, 'HTTP error', status, text || res.statusText)
			throw new Error(`HTTP ${status}: ${text || res.statusText}`)
		}
		const json: unknown = await res.json()
		console.log(LOG_PREFIX, 'HTTP', status, 'OK')
		return json
	}

	private async getSheetTitles(signal: AbortSignal): Promise<Set<string>> {
		const data = SheetTitlesResponse.parse(
			await this.fetchJson(this.url('?fields=sheets(properties(title))'), signal, { method: 'GET' }),
		)
		return new Set(data.sheets.map((s) => s.properties.title))
	}

	private async ensureSheet(title: string, signal: AbortSignal): Promise<void> {
		const existing = await this.getSheetTitles(signal)
		if (existing.has(title)) return
		console.log(LOG_PREFIX, 'Adding missing sheet', { title })
		await this.fetchJson(this.url(':batchUpdate'), signal, {
			method: 'POST',
			body: JSON.stringify({ requests: [{ addSheet: { properties: { title } } }] }),
		})
	}

	/**
	 * Replaces the summary sheet with a header row plus one row per
	 * participant. Network failures and timeouts come back as `ok: false`.
	 */
	async pushSummary(rows: SummaryRow[]): Promise<PushResult> {
		const signal = AbortSignal.timeout(this.timeoutMs)
		const sheet = this.summarySheet
		try {
			await this.ensureSheet(sheet, signal)
			await this.fetchJson(this.url(`/values/${encodeURIComponent(a1Range(sheet))}:clear`), signal, {
				method: 'POST',
				body: JSON.stringify({}),
			})
			const values = [
				SUMMARY_HEADERS,
				...rows.map((r) => [r.displayName, r.token ?? '', r.attended, r.totalSessions, r.summary]),
			]
			const range = a1Range(sheet, 'A1')
			await this.fetchJson(this.url(`/values/${encodeURIComponent(range)}?valueInputOption=RAW`), signal, {
				method: 'PUT',
				body: JSON.stringify({ range, majorDimension: 'ROWS', values }),
			})
			console.log(LOG_PREFIX, 'Summary pushed', { sheet, rows: rows.length })
			return { ok: true, message: `Wrote ${rows.length} rows to ${sheet}`, rowsWritten: rows.length }
		} catch (err) {
			const message = describeFailure(err, this.timeoutMs)
			console.error(LOG_PREFIX, 'Summary push failed', { sheet, message })
			return { ok: false, message, rowsWritten: 0 }
		}
	}

	/**
	 * Reads the roster sheet and keys every row by the header row. Cells
	 * missing at the end of a row read as ''.
	 */
	async readRosterRows(): Promise<Record<string, string>[]> {
		const signal = AbortSignal.timeout(this.timeoutMs)
		try {
			const data = ValuesResponse.parse(
				await this.fetchJson(this.url(`/values/${encodeURIComponent(a1Range(this.rosterSheet))}`), signal, {
					method: 'GET',
				}),
			)
			const [header = [], ...body] = data.values
			const keys = header.map((h) => String(h).trim())
			const rows = body.map((cells) => {
				const row: Record<string, string> = {}
				keys.forEach((key, i) => {
					if (key) row[key] = i < cells.length ? String(cells[i]).trim() : ''
				})
				return row
			})
			console.log(LOG_PREFIX, 'Roster rows read', { sheet: this.rosterSheet, rows: rows.length })
			return rows
		} catch (err) {
			throw new Error(`Reading roster failed: ${describeFailure(err, this.timeoutMs)}`, { cause: err })
		}
	}
}
