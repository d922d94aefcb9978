import type { HelmValue } from '@zenserver/k8s-cdk'
import type { RdsDatabaseOutputs } from '@zenserver/k8s-cdk/k8s'

import type { ServerVariables } from '../../envs/variables'

export type ServerOverrides = Map<string, HelmValue>

export interface OverrideInputs {
	ingressHost: string
	database?: RdsDatabaseOutputs
}

export const rewriteTargetKey = 'ingress.annotations.nginx\\.ingress\\.kubernetes\\.io/rewrite-target'

const mysqlPort = 3306

export function resolveRouting (ingressPath: string) {
	if (!ingressPath) return { rootUrlPath: '', path: '/', rewriteTarget: '' }
	return {
		rootUrlPath: `/${ingressPath}`,
		path: `/${ingressPath}/?(.*)`,
		rewriteTarget: '/$1',
	}
}

export function resolveDatabase (variables: ServerVariables, database: RdsDatabaseOutputs | undefined) {
	if (!variables.create_rds) {
		return {
			url: variables.database_url,
			sslCa: variables.database_ssl_ca,
			sslCert: variables.database_ssl_cert,
			sslKey: variables.database_ssl_key,
			sslVerifyServerCert: variables.database_ssl_verify_server_cert,
		}
	}
	if (!database) throw new Error('create_rds is enabled but no managed database outputs were resolved')
	const { dbInstanceUsername, dbInstancePassword, dbInstanceAddress } = database
	return {
		url: `mysql://${dbInstanceUsername}:${dbInstancePassword}@${dbInstanceAddress}:${mysqlPort}/${variables.db_name}`,
		sslCa: '',
		sslCert: '',
		sslKey: '',
		sslVerifyServerCert: false,
	}
}

/** Ordered `--set` overrides for the server release. */
export function resolveServerOverrides (variables: ServerVariables, inputs: OverrideInputs): ServerOverrides {
	const routing = resolveRouting(variables.ingress_path)
	const database = resolveDatabase(variables, inputs.database)

	return new Map<string, HelmValue>([
		['zenml.image.repository', variables.image_repo],
		['zenml.image.tag', variables.image_tag],
		['zenml.defaultUsername', variables.username],
		['zenml.defaultPassword', variables.password],
		['zenml.deploymentType', variables.deployment_type],
		['zenml.serverId', variables.server_id],
		['zenml.analyticsOptIn', variables.analytics_opt_in],

		['zenml.rootUrlPath', routing.rootUrlPath],
		['ingress.path', routing.path],
		[rewriteTargetKey, routing.rewriteTarget],
		['ingress.host', inputs.ingressHost],

		['ingress.tls.enabled', variables.ingress_tls],
		['ingress.tls.generateCerts', variables.ingress_tls_generate_certs],
		['ingress.tls.secretName', variables.ingress_tls_secret_name],

		['zenml.database.url', database.url],
		['zenml.database.sslCa', database.sslCa],
		['zenml.database.sslCert', database.sslCert],
		['zenml.database.sslKey', database.sslKey],
		['zenml.database.sslVerifyServerCert', database.sslVerifyServerCert],
	])
}
