import type { ServerVariables } from './envs/variables'
import { certificateKeys, type ServerChart } from './charts/ServerChart'

export interface ServerOutputs {
	namespace: string
	releaseName: string
	serverUrl: string
	caCrt: string
	tlsCrt: string
	tlsKey: string
}

const sensitiveOutputs: ReadonlyArray<keyof ServerOutputs> = ['caCrt', 'tlsCrt', 'tlsKey']

export function serverUrl (variables: ServerVariables, host: string) {
	const scheme = variables.ingress_tls ? 'https' : 'http'
	const rootUrlPath = variables.ingress_path ? `/${variables.ingress_path}` : ''
	return `${scheme}://${host}${rootUrlPath}`
}

export async function collectOutputs (chart: ServerChart): Promise<ServerOutputs> {
	const certificates = chart.certificates.data ?? await chart.certificates.read()
	return {
		namespace: chart.namespace,
		releaseName: chart.release.releaseName,
		serverUrl: serverUrl(chart.variables, await chart.ingressHost()),
		caCrt: certificates[certificateKeys.caCrt] ?? '',
		tlsCrt: certificates[certificateKeys.tlsCrt] ?? '',
		tlsKey: certificates[certificateKeys.tlsKey] ?? '',
	}
}

export function redactOutputs (outputs: ServerOutputs): ServerOutputs {
	const redacted = { ...outputs }
	for (const key of sensitiveOutputs) if (redacted[key]) redacted[key] = '<sensitive>'
	return redacted
}
