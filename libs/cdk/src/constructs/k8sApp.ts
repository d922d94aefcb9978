import * as fs from 'node:fs/promises'
import * as path from 'node:path'

import { Command } from 'commander'

import { createLogger } from '../common/logger'
import { type CommandRunner, createFolderIfNotExists, runWithTrials, shellRunner, upsertNamespace } from '../common/utils'
import type { K8sChart } from './k8sChart'

const log = createLogger('app')

export type K8sChartsLoader = () => K8sChart[] | Promise<K8sChart[]>

export interface K8sAppOptions {
	runner?: CommandRunner
	/** Where built charts are written, `.k8s-cdk` in the working directory by default. */
	outDir?: string
	applyTrials?: { tries: number, delayMs: number }
}

export class K8sApp {
	readonly command: Command
	#charts?: Promise<K8sChart[]>
	readonly #runner: CommandRunner
	readonly #outDir: string
	readonly #applyTrials: { tries: number, delayMs: number }

	constructor (private readonly charts: K8sChart[] | K8sChartsLoader, options: K8sAppOptions = {}) {
		this.#runner = options.runner ?? shellRunner
		this.#outDir = options.outDir ?? path.resolve(process.cwd(), '.k8s-cdk')
		this.#applyTrials = options.applyTrials ?? { tries: 3, delayMs: 2000 }

		const listCommand = new Command('list')
			.description('list charts')
			.action(async (options: CommonOptions) => {
				const charts = await this.#filterCharts(options)
				const data = charts.map((chart) => ({ Id: chart.node.id, Name: chart.constructor.name, Namespace: chart.namespace }))
				console.table(data)
			})

		const buildCommand = new Command('build')
			.description('build yaml representation of code')
			.action(async (options: BuildOptions) => {
				for (const chart of await this.#filterCharts(options)) await this.#buildChart(chart, options)
			})

		const deployCommand = new Command('deploy')
			.description('deploy code changes to k8s cluster')
			.option('--fresh', 'run fresh installation', false)
			.action(async (options: DeployOptions) => {
				for (const chart of await this.#filterCharts(options)) await this.#deployChart(chart, options)
			})

		const diffCommand = new Command('diff')
			.description('show diff between code and k8s cluster')
			.action(async (options: DiffOptions) => {
				for (const chart of await this.#filterCharts(options)) await this.#diffChart(chart, options)
			})

		const deleteCommand = new Command('delete')
			.description('delete chart')
			.requiredOption('--chart-id <value>', 'id of chart to delete')
			.action(async (options: DeleteOptions) => {
				const chart = (await this.#filterCharts(options)).find((c) => c.node.id === options.chartId)
				if (!chart) throw new Error(`no chart with id ${options.chartId}`)
				await this.#deleteChart(chart, options)
			})

		this.command = new Command('k8s-cli')
			.description('Cli to manage your k8s application')

		const commands = [listCommand, buildCommand, deployCommand, diffCommand, deleteCommand]
		commands.forEach((c) => {
			c
				.option('--include <include>', 'include charts in this list', '')
				.option('--exclude <exclude>', 'exclude charts in this list', '')
			this.command.addCommand(c)
		})
	}

	async process (argv: string[] = process.argv) {
		await this.command.parseAsync(argv)
	}

	async loadCharts () {
		const charts = this.charts
		this.#charts ??= Promise.resolve(typeof charts === 'function' ? charts() : charts)
		return this.#charts
	}

	async #filterCharts (options: CommonOptions) {
		return filterCharts(await this.loadCharts(), options)
	}

	async #buildChart (chart: K8sChart, _options: BuildOptions) {
		await createFolderIfNotExists(this.#outDir)
		const filePath = path.resolve(this.#outDir, `${chart.node.id}.yaml`)
		await fs.rm(filePath, { recursive: true, force: true })
		await chart.runHook('pre:build')
		const result = chart.app.synthYaml()
		await fs.writeFile(filePath, result)
		await chart.runHook('post:build')
		log.info({ chart: chart.node.id, file: filePath }, 'built chart')
		return result
	}

	async #deployChart (chart: K8sChart, options: DeployOptions) {
		// resources created in pre:deploy feed the release values
		await chart.runHook('pre:deploy')
		const result = await this.#buildChart(chart, options)
		if (options.fresh) await this.#runner.exec(`kubectl delete ns ${chart.namespace} --wait --ignore-not-found`)
		const applySetName = `configmaps/${chart.namespace}-${chart.node.id}`
		await upsertNamespace(chart.namespaceManifest, this.#runner)
		await runWithTrials(
			async (trial: number) => {
				if (trial > 1) log.warn({ chart: chart.node.id, trial }, 'retrying apply')
				await this.#runner.exec(`KUBECTL_APPLYSET=true kubectl apply --prune -n=${chart.namespace} --applyset=${applySetName} -f -`, result)
			},
			this.#applyTrials
		)
		await chart.runHook('post:deploy')
		log.info({ chart: chart.node.id, namespace: chart.namespace }, 'deployed chart')
	}

	async #diffChart (chart: K8sChart, options: DiffOptions) {
		const result = await this.#buildChart(chart, options)
		await chart.runHook('pre:diff')
		await this.#runner.exec(`kubectl diff --prune -n=${chart.namespace} -f -`, result, true)
		await chart.runHook('post:diff')
	}

	async #deleteChart (chart: K8sChart, _options: DeleteOptions) {
		await chart.runHook('pre:delete')
		await this.#runner.exec(`kubectl delete ns ${chart.namespace} --wait --ignore-not-found`)
		await chart.runHook('post:delete')
		log.info({ chart: chart.node.id, namespace: chart.namespace }, 'deleted chart')
	}
}

export function filterCharts (charts: K8sChart[], options: Partial<CommonOptions>) {
	const include = options.include?.split(',').filter(Boolean) ?? []
	const exclude = options.exclude?.split(',').filter(Boolean) ?? []
	return charts.filter((chart) => {
		if (exclude.includes(chart.node.id)) return false
		if (!include.length) return true
		return include.includes(chart.node.id)
	})
}

export interface CommonOptions {
	include: string
	exclude: string
}

interface BuildOptions extends CommonOptions {}

interface DeployOptions extends CommonOptions {
	fresh: boolean
}

interface DiffOptions extends CommonOptions {}

interface DeleteOptions extends CommonOptions {
	chartId: string
}
