import { defineConfig } from 'vitest/config';

// workspace packages load from their TypeScript sources
const conditions = ['source'];

export default defineConfig({
	resolve: { conditions },
	ssr: { resolve: { conditions } },
	test: {
		include: ['packages/*/src/**/__tests__/**/*.test.ts'],
		environment: 'node',
	},
});
