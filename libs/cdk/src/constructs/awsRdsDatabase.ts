import { Construct } from 'constructs'

import { LookupError } from '../common/errors'
import { createLogger } from '../common/logger'
import { AwsCliRdsClient, type RdsClient } from '../entities/rds'
import { K8sConstruct } from './k8sConstruct'

const log = createLogger('rds')

export interface AwsRdsDatabaseProps {
	identifier: string
	engineVersion: string
	instanceClass: string
	allocatedStorage: number
	dbName: string
	username: string
	password: string
	engine?: string
	port?: number
	region?: string
	client?: RdsClient
}

export interface RdsDatabaseOutputs {
	dbInstanceUsername: string
	dbInstancePassword: string
	dbInstanceAddress: string
}

/**
 * Managed database living outside the cluster. Created before the chart is
 * deployed and removed after the chart is deleted.
 */
export class AwsRdsDatabase extends K8sConstruct {
	readonly client: RdsClient

	constructor (scope: Construct, id: string, private readonly props: AwsRdsDatabaseProps) {
		super(scope, id)
		this.client = props.client ?? new AwsCliRdsClient(props.region)

		this.addHook('pre:deploy', () => this.ensure())
		this.addHook('post:delete', () => this.destroy())
	}

	get identifier () {
		return this.props.identifier
	}

	get port () {
		return this.props.port ?? 3306
	}

	async ensure () {
		const existing = await this.client.describe(this.identifier)
		if (!existing) {
			log.info({ identifier: this.identifier }, 'creating database instance')
			const { identifier, engineVersion, instanceClass, allocatedStorage, dbName, username, password } = this.props
			await this.client.create({
				identifier, engineVersion, instanceClass, allocatedStorage, dbName, username, password,
				engine: this.props.engine ?? 'mysql',
				port: this.port,
			})
		}
		if (existing?.status !== 'available') {
			log.info({ identifier: this.identifier }, 'waiting for database instance')
			await this.client.waitUntilAvailable(this.identifier)
		}
	}

	async outputs (): Promise<RdsDatabaseOutputs> {
		const instance = await this.client.describe(this.identifier)
		if (!instance?.address) throw new LookupError(`database instance ${this.identifier} is not provisioned yet, deploy it first`, this.identifier)
		return {
			dbInstanceUsername: this.props.username,
			dbInstancePassword: this.props.password,
			dbInstanceAddress: instance.address,
		}
	}

	async destroy () {
		const existing = await this.client.describe(this.identifier)
		if (!existing) return
		log.info({ identifier: this.identifier }, 'deleting database instance')
		await this.client.delete(this.identifier)
	}
}
