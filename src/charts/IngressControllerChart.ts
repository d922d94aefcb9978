import { K8sChart, K8sHelm } from '@zenserver/k8s-cdk/k8s'

export function ingressControllerNames (name: string) {
	return {
		namespace: `${name}-ingress`,
		releaseName: name,
		serviceName: `${name}-ingress-nginx-controller`,
	}
}

interface IngressControllerChartProps {
	name: string
}

export class IngressControllerChart extends K8sChart {
	readonly controller: K8sHelm

	constructor (props: IngressControllerChartProps) {
		const names = ingressControllerNames(props.name)
		super('ingress', { namespace: names.namespace })

		this.controller = K8sHelm.ingressNginx(this, 'ingress-nginx', {
			releaseName: names.releaseName,
			values: {
				controller: {
					service: { type: 'LoadBalancer' },
				},
			},
		})
	}
}
