import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// describe/it/expect are also imported explicitly in each test file
		globals: true,
		environment: 'node',
		include: ['src/**/*.test.ts'],
	},
});
