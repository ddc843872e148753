import Dexie from 'dexie'

export type AttendanceErrorKind =
	| 'InvalidToken'
	| 'NotFound'
	| 'UniquenessViolation'
	| 'StoreUnavailable'
	| 'AuthLockout'

export class AttendanceError extends Error {
	readonly kind: AttendanceErrorKind

	constructor(kind: AttendanceErrorKind, message: string, cause?: unknown) {
		super(message, { cause })
		this.name = 'AttendanceError'
		this.kind = kind
	}
}

export function isAttendanceError(err: unknown, kind?: AttendanceErrorKind): err is AttendanceError {
	return err instanceof AttendanceError && (kind === undefined || err.kind === kind)
}

export function notFound(entity: string, id: string): AttendanceError {
	return new AttendanceError('NotFound', `${entity} ${id} does not exist`)
}

const UNAVAILABLE_NAMES = new Set([
	'OpenFailedError',
	'DatabaseClosedError',
	'MissingAPIError',
	'QuotaExceededError',
	'InvalidStateError',
	'VersionError',
	'UpgradeError',
	'TimeoutError',
	'AbortError',
	'PrematureCommitError',
	'UnknownError',
])

function errorName(err: unknown): string | undefined {
	if (err instanceof Error) return err.name
	if (typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string') return err.name
	return undefined
}

function innerError(err: unknown): unknown {
	if (err instanceof Dexie.DexieError && err.inner) return err.inner
	return undefined
}

/**
 * Maps store-layer failures onto the error taxonomy. Errors that did not come
 * from the store (validation, programming errors) are returned untouched.
 */
export function toAttendanceError(err: unknown): unknown {
	if (err instanceof AttendanceError) return err
	const inner = innerError(err)
	if (inner instanceof AttendanceError) return inner
	const name = errorName(err)
	const innerName = errorName(inner)
	if (name === 'ConstraintError' || innerName === 'ConstraintError') {
		return new AttendanceError('UniquenessViolation', 'A row with the same unique key already exists', err)
	}
	if (name === 'BulkError' && err instanceof Dexie.BulkError) {
		const first = Object.values(err.failuresByPos)[0]
		if (errorName(first) === 'ConstraintError') {
			return new AttendanceError('UniquenessViolation', 'A row with the same unique key already exists', err)
		}
	}
	if (err instanceof Dexie.DexieError || (name !== undefined && UNAVAILABLE_NAMES.has(name))) {
		const message = err instanceof Error ? err.message : String(err)
		return new AttendanceError('StoreUnavailable', `Attendance store unavailable: ${message}`, err)
	}
	return err
}
