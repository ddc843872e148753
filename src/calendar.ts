import { format, getDay, isValid, parse } from 'date-fns'
import { WEEKDAYS } from './types'
import type { Weekday } from './types'

const ISO_DATE = 'yyyy-MM-dd'

/**
 * Weekday of `date` in local time, from the fixed English vocabulary the
 * groups are stored with. Never derived from a locale-rendered name.
 */
export function weekdayOf(date: Date): Weekday {
	return WEEKDAYS[getDay(date)]
}

export function toIsoDate(date: Date): string {
	return format(date, ISO_DATE)
}

export function parseIsoDate(value: string): Date | null {
	if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null
	const parsed = parse(value, ISO_DATE, new Date(0))
	return isValid(parsed) ? parsed : null
}

export function weekdayOfIsoDate(value: string): Weekday | null {
	const parsed = parseIsoDate(value)
	return parsed ? weekdayOf(parsed) : null
}

// Case-insensitive, so 'monday' and ' MONDAY ' both resolve to 'Monday'
export function parseWeekday(value: string): Weekday | null {
	const needle = value.trim().toLowerCase()
	return WEEKDAYS.find((d) => d.toLowerCase() === needle) ?? null
}
