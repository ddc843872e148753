import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		include: ['src/**/*.test.ts'],
		// PBKDF2 at full cost takes a few hundred ms per derivation
		testTimeout: 20_000,
	},
})
