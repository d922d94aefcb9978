import type { KubeClient, RdsClient } from '@zenserver/k8s-cdk'
import type { K8sChart } from '@zenserver/k8s-cdk/k8s'

import { IngressControllerChart } from './charts/IngressControllerChart'
import { ServerChart } from './charts/ServerChart'
import type { ServerVariables } from './envs/variables'

export interface ServerStack {
	variables: ServerVariables
	server: ServerChart
	ingress?: IngressControllerChart
	charts: K8sChart[]
}

interface ServerStackClients {
	kubeClient?: KubeClient
	rdsClient?: RdsClient
}

/** Charts in deployment order, the ingress controller has to exist before the server reads its address. */
export function createServerStack (variables: ServerVariables, clients: ServerStackClients = {}): ServerStack {
	const ingress = variables.create_ingress_controller ? new IngressControllerChart({ name: variables.name }) : undefined
	const server = new ServerChart({ variables, ...clients })
	return {
		variables,
		server,
		ingress,
		charts: ingress ? [ingress, server] : [server],
	}
}
