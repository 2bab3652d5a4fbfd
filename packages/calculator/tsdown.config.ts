import { defineConfig } from 'tsdown/config'

export default defineConfig({
	entry: ['src/index.ts', 'src/bin.ts'],
	format: ['esm'],
	dts: {
		sourcemap: true,
	},
	fixedExtension: true,
	noExternal: ['@safe-arith/expr-tree'],
	clean: true,
	minify: false,
	platform: 'node',
	sourcemap: true,
	treeshake: true,
})
