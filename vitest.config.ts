import { defineConfig, configDefaults } from 'vitest/config';

export default defineConfig({
	test: {
		name: 'node',
		globals: true,
		environment: 'node',
		include: ['test/**/*.test.ts'],
		exclude: [...configDefaults.exclude],
		// pairing checks on BLS12-381 are slow in pure JS
		testTimeout: 30_000,
	},
});
