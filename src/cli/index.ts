import { Command } from 'commander'

import { type Config, createLogger } from '@zenserver/k8s-cdk'

import { mergeKnownVariables, parseAssignments, redactVariables, variablesSchema } from '../envs/variables'
import { collectOutputs, redactOutputs } from '../outputs'
import type { ServerStack } from '../stack'
import { waitForHealthy } from '../utils'

const log = createLogger('cli')

export function createCommands (loadStack: () => Promise<ServerStack>, config: Config) {
	const outputsCommand = new Command('outputs')
		.description('print namespace, release, server url and tls material of the deployment')
		.option('--show-secrets', 'print sensitive outputs', false)
		.action(async (options: { showSecrets: boolean }) => {
			const { server } = await loadStack()
			const outputs = await collectOutputs(server)
			console.log(JSON.stringify(options.showSecrets ? outputs : redactOutputs(outputs), null, 2))
		})

	const healthCommand = new Command('health')
		.description('wait for the deployed server to report healthy')
		.action(async () => {
			const { server } = await loadStack()
			const { serverUrl } = await collectOutputs(server)
			await waitForHealthy(serverUrl)
		})

	const varsCommand = new Command('vars')
		.description('show or update deployment variables')
		.option('--set <assignments...>', 'key=value pairs to store', [])
		.action(async (options: { set: string[] }) => {
			const current = await config.toJSON()
			if (!options.set.length) {
				console.log(JSON.stringify(redactVariables(current), null, 2))
				return
			}
			const { merged, ignored } = mergeKnownVariables(current, parseAssignments(options.set))
			if (ignored.length) log.warn({ ignored }, 'ignoring unknown variables')
			const result = variablesSchema.safeParse(merged)
			if (!result.success) log.warn({ issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) }, 'variables are not complete yet')
			await config.put(merged)
			log.info({ keys: Object.keys(merged).length }, 'saved variables')
		})

	return [outputsCommand, healthCommand, varsCommand]
}
