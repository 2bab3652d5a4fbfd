import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		name: 'calculator',
		include: ['test/**/*.spec.ts'],
		environment: 'node',
	},
})
