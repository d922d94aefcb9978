import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		include: ['src/**/*.test.ts', 'libs/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**', '.k8s-cdk/**'],
		environment: 'node',
		env: { K8S_CDK_LOG_LEVEL: 'silent' },
	},
})
