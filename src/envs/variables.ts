import { z } from 'zod'

import type { Config, ConfigValues } from '@zenserver/k8s-cdk'

const booleanValue = z.preprocess((value) => {
	if (value === 'true') return true
	if (value === 'false') return false
	return value
}, z.boolean())

const integerValue = z.preprocess((value) => {
	if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number.parseInt(value, 10)
	return value
}, z.number().int().positive())

const logLevels = {
	TRACE: 'trace',
	DEBUG: 'debug',
	INFO: 'info',
	WARN: 'warn',
	ERROR: 'error',
} as const

const logLevelValue = z
	.string()
	.transform((value) => value.toUpperCase())
	.pipe(z.enum(['TRACE', 'DEBUG', 'INFO', 'WARN', 'ERROR']))
	.transform((value) => logLevels[value])

// names end up in kubectl commands and object names, so they must be RFC 1123 labels
const labelValue = (key: string) => z
	.string()
	.max(63, `${key} must be at most 63 characters`)
	.regex(/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/, `${key} must be a lowercase RFC 1123 label`)

const maxNamespaceLength = 63
const maxReleaseNameLength = 53

const variablesShape = z.object({
	name: labelValue('name').default('zenmlserver'),
	namespace: labelValue('namespace').default('zenmlserver'),

	helm_chart: z.string().min(1).default('zenml'),
	helm_chart_repo: z.string().default(''),
	helm_chart_version: z.string().default(''),
	image_repo: z.string().default('zenmldocker/zenml-server'),
	image_tag: z.string().default('latest'),

	username: z.string().min(1).default('admin'),
	password: z.string().min(1, 'password is required'),
	server_id: z.string().default(''),
	deployment_type: z.string().default('aws'),
	analytics_opt_in: booleanValue.default(true),

	ingress_path: z.string().default(''),
	create_ingress_controller: booleanValue.default(true),
	ingress_controller_hostname: z.string().default(''),
	ingress_tls: booleanValue.default(false),
	ingress_tls_generate_certs: booleanValue.default(true),
	ingress_tls_secret_name: labelValue('ingress_tls_secret_name').default('zenml-tls-certs'),

	create_rds: booleanValue.default(true),
	rds_name: z.string().min(1).default('metadata'),
	db_name: z.string().min(1).default('zenmlserver'),
	db_username: z.string().min(1).default('admin'),
	db_password: z.string().default(''),
	rds_engine_version: z.string().min(1).default('5.7.38'),
	rds_instance_class: z.string().min(1).default('db.t3.micro'),
	rds_allocated_storage: integerValue.default(5),
	region: z.string().min(1).default('eu-west-1'),

	database_url: z.string().default(''),
	database_ssl_ca: z.string().default(''),
	database_ssl_cert: z.string().default(''),
	database_ssl_key: z.string().default(''),
	database_ssl_verify_server_cert: booleanValue.default(true),

	log_level: logLevelValue.default('INFO'),
})

export const variablesSchema = variablesShape.superRefine((variables, ctx) => {
	const namespace = `${variables.name}-${variables.namespace}`
	if (namespace.length > maxNamespaceLength) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['namespace'], message: `${namespace} is longer than ${maxNamespaceLength} characters` })
	}
	const releaseName = `${variables.name}-zenmlserver`
	if (releaseName.length > maxReleaseNameLength) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['name'], message: `${releaseName} is longer than ${maxReleaseNameLength} characters` })
	}
	if (variables.create_rds && !variables.db_password) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['db_password'], message: 'db_password is required when create_rds is enabled' })
	}
})

export type ServerVariables = z.output<typeof variablesSchema>

export const knownVariables: readonly string[] = Object.keys(variablesShape.shape)

export const sensitiveVariables: readonly string[] = ['password', 'db_password', 'database_url', 'database_ssl_key']

export function parseVariables (values: unknown): ServerVariables {
	return variablesSchema.parse(values)
}

export async function loadVariables (config: Config) {
	return config.parse(variablesSchema)
}

/**
 * Copies the updates whose keys are known variables over the current values.
 * Anything else is returned as ignored rather than written.
 */
export function mergeKnownVariables (current: Readonly<ConfigValues>, updates: Readonly<ConfigValues>) {
	const merged: ConfigValues = { ...current }
	const ignored: string[] = []
	for (const [key, value] of Object.entries(updates)) {
		if (knownVariables.includes(key)) merged[key] = value
		else ignored.push(key)
	}
	return { merged, ignored }
}

export function parseAssignments (assignments: string[]): ConfigValues {
	return Object.fromEntries(assignments.map((assignment) => {
		const index = assignment.indexOf('=')
		if (index <= 0) throw new Error(`expected key=value, got ${assignment}`)
		return [assignment.slice(0, index).trim(), assignment.slice(index + 1)]
	}))
}

export function redactVariables (variables: Readonly<ConfigValues>) {
	return Object.fromEntries(
		Object.entries(variables).map(([key, value]) => [key, sensitiveVariables.includes(key) && value ? '<sensitive>' : value])
	)
}
