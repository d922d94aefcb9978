import path from 'node:path'

import { Config, ConfigError, type ConfigAdapter, FileConfigAdapter, K8sConfigAdapter, type KubeClient } from '@zenserver/k8s-cdk'

const secretRef = /^([a-z0-9]([-a-z0-9]*[a-z0-9])?)\/([a-z0-9]([-.a-z0-9]*[a-z0-9])?)$/

/**
 * `ZEN_SERVER_VALUES_SECRET=<namespace>/<name>` keeps the values in a
 * Kubernetes secret. Otherwise they live in `ZEN_SERVER_VALUES_FILE`, or
 * `values.json` in the working directory.
 */
export function createConfigAdapter (env: NodeJS.ProcessEnv = process.env, client?: KubeClient): ConfigAdapter {
	const secret = env.ZEN_SERVER_VALUES_SECRET
	if (secret) {
		const match = secretRef.exec(secret)
		if (!match?.[1] || !match[3]) throw new ConfigError(`ZEN_SERVER_VALUES_SECRET must look like <namespace>/<name>, got ${secret}`)
		return new K8sConfigAdapter({ namespace: match[1], name: match[3], client })
	}
	return new FileConfigAdapter(env.ZEN_SERVER_VALUES_FILE ?? path.resolve(process.cwd(), 'values.json'))
}

export function createServerConfig (env: NodeJS.ProcessEnv = process.env) {
	const adapter = createConfigAdapter(env)
	const name = adapter instanceof FileConfigAdapter ? adapter.filePath : `secret ${env.ZEN_SERVER_VALUES_SECRET}`
	return Config.of({ name, adapter })
}

export * from './variables'
