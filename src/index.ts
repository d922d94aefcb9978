import { type Config, logger, setLogLevel } from '@zenserver/k8s-cdk'
import { K8sApp } from '@zenserver/k8s-cdk/k8s'

import { createCommands } from './cli'
import { createServerConfig, loadVariables } from './envs'
import { createServerStack, type ServerStack } from './stack'

function stackLoader (config: Config) {
	let stack: Promise<ServerStack> | undefined
	return () => {
		stack ??= loadVariables(config).then((variables) => {
			if (!process.env.K8S_CDK_LOG_LEVEL) setLogLevel(variables.log_level)
			return createServerStack(variables)
		})
		return stack
	}
}

async function main () {
	const config = createServerConfig()
	const loadStack = stackLoader(config)
	const app = new K8sApp(async () => (await loadStack()).charts)
	createCommands(loadStack, config).forEach((command) => app.command.addCommand(command))
	await app.process()
}

main().catch((err: unknown) => {
	logger.error({ err }, err instanceof Error ? err.message : 'command failed')
	process.exitCode = 1
})
