import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		include: ['test/**/*.test.ts'],
		exclude: ['node_modules', 'dist'],
		setupFiles: ['./test/setup.ts'],
		testTimeout: 10000,
		// Test files share process-wide env state
		fileParallelism: false,
	},
})
