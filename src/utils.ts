import { createLogger, runWithTrials } from '@zenserver/k8s-cdk'

const log = createLogger('health')

export const healthCheckPath = 'health'

export type Fetcher = (url: string, init: { signal: AbortSignal }) => Promise<{ ok: boolean, status: number }>

export interface HealthCheckOptions {
	fetcher?: Fetcher
	tries?: number
	delayMs?: number
	timeoutMs?: number
}

export function healthCheckUrl (serverUrl: string) {
	return `${serverUrl.replace(/\/+$/, '')}/${healthCheckPath}`
}

/** Polls the server health endpoint, 12 tries 5s apart by default, each request cut off after 5s. */
export async function waitForHealthy (serverUrl: string, options: HealthCheckOptions = {}) {
	const fetcher: Fetcher = options.fetcher ?? ((url, init) => fetch(url, init))
	const url = healthCheckUrl(serverUrl)
	const timeoutMs = options.timeoutMs ?? 5_000
	return runWithTrials(async (trial) => {
		const response = await fetcher(url, { signal: AbortSignal.timeout(timeoutMs) })
		if (!response.ok) throw new Error(`${url} answered with status ${response.status}`)
		log.info({ url, trial }, 'server is healthy')
		return response.status
	}, { tries: options.tries ?? 12, delayMs: options.delayMs ?? 5_000 })
}
