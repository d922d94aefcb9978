import type { z } from 'zod'

import { ConfigError } from '../../common/errors'
import type { ConfigAdapter, ConfigValues } from './adapters'

export * from './adapters'

interface ConfigProps {
	name?: string
	adapter: ConfigAdapter
}

export class Config {
	#values?: Promise<ConfigValues>

	private constructor (private readonly props: ConfigProps) {}

	#load () {
		this.#values ??= this.props.adapter.load()
		return this.#values
	}

	async toJSON (): Promise<Readonly<ConfigValues>> {
		return Object.freeze({ ...(await this.#load()) })
	}

	async parse<S extends z.ZodTypeAny> (schema: S): Promise<z.output<S>> {
		const result = schema.safeParse(await this.toJSON())
		if (!result.success) throw ConfigError.fromZod(`invalid values for ${this.name}`, result.error)
		return result.data
	}

	get name () {
		return this.props.name ?? 'config'
	}

	async put (values: ConfigValues) {
		this.#values = Promise.resolve(values)
		await this.props.adapter.save(values)
	}

	static of (props: ConfigProps) {
		return new Config(props)
	}
}
