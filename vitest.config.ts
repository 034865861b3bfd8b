import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		setupFiles: ['source/test-setup.ts'],
		testTimeout: 30_000,
		pool: 'forks',
	},
});
