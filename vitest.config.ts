import { defineConfig } from 'vitest/config';

// Reset boundaries and reset labels are computed in local time.
process.env.TZ = 'UTC';

export default defineConfig({
	test: {
		include: ['test/**/*.test.ts'],
		env: {
			TZ: 'UTC',
		},
	},
});
