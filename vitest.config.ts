import { defineConfig } from 'vitest/config';

export default defineConfig({
	esbuild: {
		target: 'node20',
	},
	test: {
		environment: 'node',
		include: ['packages/*/src/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		coverage: {
			provider: 'v8',
			reporter: ['text', 'json', 'html'],
			include: ['packages/*/src/**/*.ts'],
			exclude: ['**/node_modules/**', '**/dist/**', '**/*.test.ts', '**/__tests__/**'],
		},
		testTimeout: 20000,
		hookTimeout: 20000,
	},
});
