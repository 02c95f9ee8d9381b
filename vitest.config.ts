import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		name: 'node',
		root: 'test',
		include: ['node/**/*.test.ts'],
		environment: 'node',
	},
});
