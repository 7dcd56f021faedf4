import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const resolvePackage = (name: string) =>
	fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
	test: {
		environment: 'node',
		include: ['packages/*/src/**/*.test.ts'],
	},
	resolve: {
		alias: {
			'@iimkit/core': resolvePackage('core'),
			'@iimkit/metadata': resolvePackage('metadata'),
		},
	},
})
