import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: [
			'packages/*/src/**/*.test.ts',
			'sinks/*/src/**/*.test.ts',
			'filters/*/src/**/*.test.ts',
		],
		testTimeout: 10_000,
	},
});
