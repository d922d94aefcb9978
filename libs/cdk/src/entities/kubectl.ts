import { $ } from 'zx'

export interface KubeClient {
	/** Resolves to undefined when the object does not exist */
	get (kind: string, name: string, namespace: string): Promise<unknown>
}

export class KubectlClient implements KubeClient {
	constructor (private readonly context?: string) {}

	get #contextArgs () {
		return this.context ? ['--context', this.context] : []
	}

	async get (kind: string, name: string, namespace: string): Promise<unknown> {
		const output = await $`kubectl get ${kind} ${name} -n ${namespace} --ignore-not-found -o json ${this.#contextArgs}`
		const text = output.stdout.trim()
		if (!text) return undefined
		return JSON.parse(text)
	}
}
