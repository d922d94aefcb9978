import { Construct } from 'constructs'
import { z } from 'zod'

import { LookupError } from '../common/errors'
import { createLogger } from '../common/logger'
import { runWithTrials } from '../common/utils'
import { type KubeClient, KubectlClient } from '../entities/kubectl'
import { K8sConstruct } from './k8sConstruct'

const log = createLogger('lookup')

interface K8sLookupProps {
	name: string
	namespace: string
	client?: KubeClient
	tries?: number
	delayMs?: number
}

const serviceSchema = z.object({
	status: z.object({
		loadBalancer: z.object({
			ingress: z.array(z.object({
				hostname: z.string().optional(),
				ip: z.string().optional(),
			})).optional(),
		}).optional(),
	}).optional(),
})

/** Reads the address a cloud load balancer assigned to a service. */
export class K8sServiceLookup extends K8sConstruct {
	readonly client: KubeClient

	constructor (scope: Construct, id: string, private readonly props: K8sLookupProps) {
		super(scope, id)
		this.client = props.client ?? new KubectlClient()
	}

	get ref () {
		return `service ${this.props.namespace}/${this.props.name}`
	}

	async loadBalancerHostname () {
		const { name, namespace } = this.props
		return runWithTrials(async () => {
			const service = await this.client.get('service', name, namespace)
			if (service === undefined) throw new LookupError(`${this.ref} not found`, this.ref)
			const ingress = serviceSchema.parse(service).status?.loadBalancer?.ingress?.[0]
			const hostname = ingress?.hostname || ingress?.ip
			if (!hostname) throw new LookupError(`${this.ref} has no load balancer address yet`, this.ref)
			return hostname
		}, { tries: this.props.tries ?? 30, delayMs: this.props.delayMs ?? 10_000 })
	}
}

export interface K8sSecretLookupProps extends K8sLookupProps {
	defaults: Record<string, string>
	optional?: boolean
}

const secretSchema = z.object({ data: z.record(z.string()).optional() })

/**
 * Read-only view of a secret some other resource produces. Only the keys of
 * `defaults` are read, each keeps its base64 encoding and falls back to its
 * default when the secret does not carry it.
 */
export class K8sSecretLookup extends K8sConstruct {
	readonly client: KubeClient
	#data?: Record<string, string>

	constructor (scope: Construct, id: string, private readonly props: K8sSecretLookupProps) {
		super(scope, id)
		this.client = props.client ?? new KubectlClient()

		this.addHook('post:deploy', async () => {
			this.#data = await runWithTrials(
				() => this.read(),
				{ tries: this.props.tries ?? 6, delayMs: this.props.delayMs ?? 5_000 }
			)
			log.info({ secret: this.ref, keys: Object.keys(this.#data) }, 'read secret')
		})
	}

	get ref () {
		return `secret ${this.props.namespace}/${this.props.name}`
	}

	get data () {
		return this.#data
	}

	async read () {
		const { name, namespace, defaults, optional } = this.props
		const secret = await this.client.get('secret', name, namespace)
		if (secret === undefined) {
			if (!optional) throw new LookupError(`${this.ref} not found`, this.ref)
			this.#data = { ...defaults }
			return this.#data
		}
		const data = secretSchema.parse(secret).data ?? {}
		this.#data = Object.fromEntries(
			Object.entries(defaults).map(([key, fallback]) => [key, data[key] ?? fallback])
		)
		return this.#data
	}
}
