import { App, Chart } from 'cdk8s'

import type { K8sManifest } from '../common/utils'
import { K8sConstruct } from './k8sConstruct'
import { AddK8sHooks, type K8sConstructHook } from './k8sHooks'

export interface K8sChartProps {
	namespace: string
}

const labelKey = 'k8s.chart.scope'

export class K8sChart extends AddK8sHooks(Chart) {
	readonly app: App
	readonly namespace: string

	constructor (id: string, props: K8sChartProps) {
		const app = new App()
		super(app, id, {
			disableResourceNameHashes: true,
			labels: { [labelKey]: `${props.namespace}.${id}` }
		})
		this.namespace = props.namespace
		this.app = app
	}

	get namespaceManifest (): K8sManifest {
		return {
			apiVersion: 'v1',
			kind: 'Namespace',
			metadata: {
				name: this.namespace,
				labels: { [labelKey]: this.labels[labelKey] },
			},
		}
	}

	async runHook (hook: K8sConstructHook) {
		const nodes = this.app.node.findAll().filter((node): node is K8sConstruct => node instanceof K8sConstruct)
		for (const node of nodes) await node.runHook(hook)
		await super.runHook(hook)
	}
}
