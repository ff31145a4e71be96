import { defineConfig } from 'tsup'

export default defineConfig({
	entry: [
		'src/index.ts',
		'src/cli/index.ts',
	],
	format: ['esm'],
	target: 'node20',
	dts: {
		entry: 'src/index.ts',
	},
	clean: true,
	sourcemap: true,
	splitting: true,
	treeshake: true,
	minify: false,
})
