import { Helm, type HelmProps } from 'cdk8s'

import type { HelmValues } from '../entities/helmValues'
import type { K8sChart } from './k8sChart'
import { K8sConstruct } from './k8sConstruct'

export interface K8sHelmProps extends Omit<HelmProps, 'releaseName' | 'namespace' | 'values'> {
	releaseName?: string
	values?: HelmValues | (() => Promise<HelmValues>)
}

export interface K8sStaticHelmProps extends Omit<K8sHelmProps, 'chart' | 'version' | 'repo'> {}

const versions = {
	ingressNginx: '4.11.2',
}

export class K8sHelm extends K8sConstruct {
	#helm?: Helm
	#values?: HelmValues

	constructor (private readonly scope: K8sChart, private readonly id: string, private readonly props: K8sHelmProps) {
		super(scope, id)

		this.addHook('pre:build', async () => {
			this.#values = await this.resolveValues()
			this.render()
		})
	}

	get releaseName () {
		return this.props.releaseName ?? this.scope.node.id
	}

	get chart () {
		return this.props.chart
	}

	async resolveValues (): Promise<HelmValues> {
		const { values } = this.props
		if (typeof values === 'function') return values()
		return values ?? {}
	}

	/**
	 * Templates the release with `helm template`. Values can depend on lookups,
	 * so rendering waits for the `pre:build` hook to resolve them.
	 */
	render () {
		if (!this.#values) throw new Error(`values for helm release ${this.releaseName} are not resolved, run the pre:build hook first`)
		if (!this.#helm) {
			const { values: _values, releaseName: _releaseName, ...props } = this.props
			this.#helm = new Helm(this.scope, `${this.id}-release`, {
				...props,
				namespace: this.scope.namespace,
				releaseName: this.releaseName,
				values: this.#values,
			})
		}
		return this.#helm
	}

	get apiObjects () {
		return this.render().apiObjects
	}

	static ingressNginx (scope: K8sChart, id: string, props: K8sStaticHelmProps) {
		return new K8sHelm(scope, id, {
			...props,
			chart: 'ingress-nginx',
			repo: 'https://kubernetes.github.io/ingress-nginx',
			version: versions.ingressNginx,
		})
	}
}
