import { toHelmValues, type KubeClient, type RdsClient } from '@zenserver/k8s-cdk'
import { AwsRdsDatabase, K8sChart, K8sHelm, K8sSecretLookup, K8sServiceLookup } from '@zenserver/k8s-cdk/k8s'

import type { ServerVariables } from '../envs/variables'
import { resolveServerOverrides } from './commons/overrides'
import { ingressControllerNames } from './IngressControllerChart'

export const certificateKeys = {
	tlsCrt: 'tls.crt',
	tlsKey: 'tls.key',
	caCrt: 'ca.crt',
} as const

interface ServerChartProps {
	variables: ServerVariables
	kubeClient?: KubeClient
	rdsClient?: RdsClient
	lookupTrials?: { tries: number, delayMs: number }
}

export class ServerChart extends K8sChart {
	readonly release: K8sHelm
	readonly certificates: K8sSecretLookup
	readonly database?: AwsRdsDatabase
	readonly ingressController?: K8sServiceLookup

	constructor (private readonly props: ServerChartProps) {
		const { variables } = props
		super('server', { namespace: `${variables.name}-${variables.namespace}` })

		if (variables.create_rds) this.database = new AwsRdsDatabase(this, 'metadata-store', {
			identifier: `${variables.name}-${variables.rds_name}`,
			engineVersion: variables.rds_engine_version,
			instanceClass: variables.rds_instance_class,
			allocatedStorage: variables.rds_allocated_storage,
			dbName: variables.db_name,
			username: variables.db_username,
			password: variables.db_password,
			region: variables.region,
			client: props.rdsClient,
		})

		if (variables.create_ingress_controller) {
			const names = ingressControllerNames(variables.name)
			this.ingressController = new K8sServiceLookup(this, 'ingress-controller', {
				name: names.serviceName,
				namespace: names.namespace,
				client: props.kubeClient,
				...props.lookupTrials,
			})
		}

		this.release = new K8sHelm(this, 'zenml-server', {
			chart: variables.helm_chart,
			repo: variables.helm_chart_repo || undefined,
			version: variables.helm_chart_version || undefined,
			releaseName: `${variables.name}-zenmlserver`,
			values: async () => toHelmValues(await this.resolveOverrides()),
		})

		this.certificates = new K8sSecretLookup(this, 'certificates', {
			name: variables.ingress_tls_secret_name,
			namespace: this.namespace,
			defaults: {
				[certificateKeys.tlsCrt]: '',
				[certificateKeys.tlsKey]: '',
				[certificateKeys.caCrt]: '',
			},
			optional: !variables.ingress_tls,
			client: props.kubeClient,
			...props.lookupTrials,
		})
	}

	get variables () {
		return this.props.variables
	}

	async ingressHost () {
		if (this.ingressController) return this.ingressController.loadBalancerHostname()
		return this.variables.ingress_controller_hostname
	}

	async resolveOverrides () {
		return resolveServerOverrides(this.variables, {
			ingressHost: await this.ingressHost(),
			database: await this.database?.outputs(),
		})
	}
}
