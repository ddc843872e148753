import { z } from 'zod'
import type { EntityStore } from './entityStore'

const LOG_PREFIX = '[Config]'

export const MIN_CREDENTIAL_LENGTH = 4

const intFromString = (min: number) =>
	z.union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a whole number')])
		.transform((v) => Number(v))
		.pipe(z.number().int().min(min))

export const SettingsSchema = z.object({
	inactivityThreshold: intFromString(1).default(3),
	tokenLength: intFromString(1).default(10),
	spreadsheetId: z
		.string()
		.trim()
		.optional()
		.transform((v) => (v ? v : undefined)),
	sheetsTimeoutMs: intFromString(1).default(15_000),
})

/**
 * Startup snapshot of the settings the core consumes. The operator credential
 * is not part of it: `Authenticator` re-reads the `credential` row on every
 * check so a change applies at once. `language` is a stored row for the host UI.
 */
export type AppConfig = z.output<typeof SettingsSchema>

export type SettingKey = keyof typeof SettingsSchema.shape

export const SETTING_KEYS: readonly SettingKey[] = SettingsSchema.keyof().options

const ENV_OVERRIDES: Partial<Record<SettingKey, string>> = {
	spreadsheetId: 'ATTENDANCE_SPREADSHEET_ID',
	sheetsTimeoutMs: 'ATTENDANCE_SHEETS_TIMEOUT_MS',
}

function isSettingKey(key: string): key is SettingKey {
	return SETTING_KEYS.some((k) => k === key)
}

/**
 * Reads the settings table once and returns a validated snapshot. Environment
 * variables listed in ENV_OVERRIDES win over stored values.
 */
export async function loadConfig(store: EntityStore, env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
	const stored = await store.listSettings()
	const raw: Record<string, string> = {}
	for (const row of stored) {
		if (isSettingKey(row.key)) raw[row.key] = row.value
	}
	for (const [key, envName] of Object.entries(ENV_OVERRIDES)) {
		if (!envName) continue
		const value = env[envName]
		if (value !== undefined && value !== '') raw[key] = value
	}
	const config = SettingsSchema.parse(raw)
	console.log(LOG_PREFIX, 'Loaded config', {
		inactivityThreshold: config.inactivityThreshold,
		tokenLength: config.tokenLength,
		spreadsheetConfigured: !!config.spreadsheetId,
	})
	return config
}

/**
 * Validates a single value against its field schema before persisting it.
 */
export async function saveSetting(store: EntityStore, key: SettingKey, value: string): Promise<void> {
	SettingsSchema.shape[key].parse(value)
	await store.putSetting(key, value)
	console.log(LOG_PREFIX, 'Setting saved', { key, value })
}
