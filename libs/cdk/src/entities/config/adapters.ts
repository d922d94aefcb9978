import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { randomUUID } from 'node:crypto'

import { z } from 'zod'

import { type CommandRunner, shellRunner, upsertNamespace } from '../../common/utils'
import { type KubeClient, KubectlClient } from '../kubectl'

export type ConfigValues = Record<string, unknown>

export abstract class ConfigAdapter {
	abstract load (): Promise<ConfigValues>
	abstract save (values: ConfigValues): Promise<void>
}

interface K8sConfigProps {
	name: string
	namespace: string
	client?: KubeClient
	runner?: CommandRunner
}

const secretSchema = z.object({ data: z.record(z.string()).optional() })

/** Keeps values in a Kubernetes secret, one key per value. */
export class K8sConfigAdapter extends ConfigAdapter {
	readonly #client: KubeClient
	readonly #runner: CommandRunner

	constructor (private readonly props: K8sConfigProps) {
		super()
		this.#client = props.client ?? new KubectlClient()
		this.#runner = props.runner ?? shellRunner
	}

	async load () {
		const secret = await this.#client.get('secret', this.props.name, this.props.namespace)
		if (secret === undefined) return {}
		const values = secretSchema.parse(secret).data ?? {}
		return Object.fromEntries(
			Object.entries(values).map(([key, value]) => [key, Buffer.from(value, 'base64').toString('utf-8')])
		)
	}

	async save (values: ConfigValues) {
		const { name, namespace } = this.props
		await upsertNamespace({ apiVersion: 'v1', kind: 'Namespace', metadata: { name: namespace } }, this.#runner)
		await this.#runner.exec(`kubectl get secret -n=${namespace} ${name} > /dev/null 2>&1 || kubectl create secret generic -n=${namespace} ${name}`)

		const stringData = Object.fromEntries(
			Object.entries(values).map(([key, value]) => [key, typeof value === 'string' ? value : JSON.stringify(value)])
		)
		const filePath = path.resolve(os.tmpdir(), '.k8s', randomUUID())
		await fs.mkdir(path.dirname(filePath), { recursive: true })
		await fs.writeFile(filePath, JSON.stringify({ stringData }))
		try {
			await this.#runner.exec(`kubectl patch secret -n=${namespace} ${name} --type merge --patch-file ${filePath}`)
		} finally {
			await fs.rm(filePath, { force: true })
		}
	}
}

const fileValuesSchema = z.record(z.unknown())

export class FileConfigAdapter extends ConfigAdapter {
	constructor (readonly filePath: string) {
		super()
	}

	async load () {
		const content = await fs.readFile(this.filePath, 'utf-8').catch((err: NodeJS.ErrnoException) => {
			if (err.code === 'ENOENT') return '{}'
			throw err
		})
		return fileValuesSchema.parse(JSON.parse(content))
	}

	async save (values: ConfigValues) {
		await fs.mkdir(path.dirname(this.filePath), { recursive: true })
		await fs.writeFile(this.filePath, `${JSON.stringify(values, null, 2)}\n`)
	}
}
