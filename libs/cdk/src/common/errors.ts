import type { ZodError } from 'zod'

export class LookupError extends Error {
	constructor (message: string, readonly resource: string) {
		super(message)
		this.name = 'LookupError'
	}
}

export class ConfigError extends Error {
	constructor (message: string, readonly issues: string[] = []) {
		super(issues.length ? `${message}\n${issues.join('\n')}` : message)
		this.name = 'ConfigError'
	}

	static fromZod (message: string, error: ZodError) {
		const issues = error.issues.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join('.') : 'values'
			return `- ${path}: ${issue.message}`
		})
		return new ConfigError(message, issues)
	}
}
