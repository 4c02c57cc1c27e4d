import { defineConfig } from 'vite';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
	root,
	logLevel: 'warn',
	build: {
		lib: {
			entry: resolve(root, 'src/bundles/index.ts'),
			formats: ['es'],
			fileName: () => 'grid-layout-engine.js',
		},
		outDir: 'dist',
		emptyOutDir: true,
		sourcemap: true,
		minify: false,
		target: 'es2022',
	},
});
