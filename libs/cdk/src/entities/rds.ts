import { $ } from 'zx'
import { z } from 'zod'

export interface RdsInstance {
	identifier: string
	status: string
	address?: string
}

export interface CreateRdsInstanceParams {
	identifier: string
	engine: string
	engineVersion: string
	instanceClass: string
	allocatedStorage: number
	dbName: string
	username: string
	password: string
	port: number
}

export interface RdsClient {
	/** Resolves to undefined when no instance has the identifier */
	describe (identifier: string): Promise<RdsInstance | undefined>
	create (params: CreateRdsInstanceParams): Promise<void>
	waitUntilAvailable (identifier: string): Promise<void>
	delete (identifier: string): Promise<void>
}

const describeOutputSchema = z.object({
	DBInstances: z.array(z.object({
		DBInstanceIdentifier: z.string(),
		DBInstanceStatus: z.string(),
		Endpoint: z.object({
			Address: z.string(),
		}).optional(),
	})),
})

export class AwsCliRdsClient implements RdsClient {
	constructor (private readonly region?: string) {}

	get #regionArgs () {
		return this.region ? ['--region', this.region] : []
	}

	async describe (identifier: string) {
		const output = await $`aws rds describe-db-instances --db-instance-identifier ${identifier} --output json ${this.#regionArgs}`.nothrow()
		if (output.exitCode !== 0) {
			if (output.stderr.includes('DBInstanceNotFound')) return undefined
			throw new Error(output.stderr.trim())
		}
		const [instance] = describeOutputSchema.parse(JSON.parse(output.stdout)).DBInstances
		if (!instance) return undefined
		return {
			identifier: instance.DBInstanceIdentifier,
			status: instance.DBInstanceStatus,
			address: instance.Endpoint?.Address,
		}
	}

	async create (params: CreateRdsInstanceParams) {
		await $`aws rds create-db-instance ${[
			'--db-instance-identifier', params.identifier,
			'--engine', params.engine,
			'--engine-version', params.engineVersion,
			'--db-instance-class', params.instanceClass,
			'--allocated-storage', String(params.allocatedStorage),
			'--db-name', params.dbName,
			'--master-username', params.username,
			'--master-user-password', params.password,
			'--port', String(params.port),
			...this.#regionArgs,
		]}`
	}

	async waitUntilAvailable (identifier: string) {
		await $`aws rds wait db-instance-available --db-instance-identifier ${identifier} ${this.#regionArgs}`
	}

	async delete (identifier: string) {
		await $`aws rds delete-db-instance --db-instance-identifier ${identifier} --skip-final-snapshot ${this.#regionArgs}`
		await $`aws rds wait db-instance-deleted --db-instance-identifier ${identifier} ${this.#regionArgs}`
	}
}
