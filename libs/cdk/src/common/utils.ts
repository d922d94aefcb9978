import { access, constants, mkdir } from 'node:fs/promises'

import { Yaml } from 'cdk8s'
import { $ } from 'zx'

import { createLogger } from './logger'

const log = createLogger('exec')

export interface K8sManifest {
	apiVersion: string
	kind: string
	metadata: {
		name: string
		namespace?: string
		labels?: Record<string, string>
	}
}

/** Runs shell commands against the cluster. Swapped out in tests. */
export interface CommandRunner {
	exec (command: string, injectInput?: string, allowNonZeroCodes?: boolean): Promise<void>
}

export async function upsertNamespace (manifest: K8sManifest, runner: CommandRunner = shellRunner) {
	await runner.exec('kubectl apply -f -', Yaml.stringify(manifest))
}

export async function exec (command: string, injectInput?: string, allowNonZeroCodes?: boolean) {
	log.debug({ command }, 'running command')
	return new Promise<void>((res, rej) => {
		let stderr = ''
		const child = $.spawn(command, { stdio: ['pipe', 'inherit', 'pipe'], shell: true })
		if (injectInput) {
			child.stdin?.write(injectInput)
			child.stdin?.end()
		}

		child.stderr?.on('data', (data: Buffer) => stderr += data.toString())

		child.on('close', (code) => {
			if (code === 0 || allowNonZeroCodes) return res()
			return rej(new Error(stderr.trim() || `${command} exited with code ${code}`))
		})

		child.on('error', (e) => rej(e))
	})
}

export const shellRunner: CommandRunner = { exec }

export async function createFolderIfNotExists (folderPath: string) {
	try {
		await access(folderPath, constants.F_OK)
	} catch {
		await mkdir(folderPath, { recursive: true })
	}
}

export const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms))

export async function runWithTrials<T> (fn: (trial: number) => T | Promise<T>, opts: { tries: number, delayMs: number }): Promise<T> {
	let error: unknown
	for (const trial of new Array(opts.tries).fill(0).map((_, i) => i + 1)) {
		try {
			return await fn(trial)
		} catch (err) {
			error = err
			log.debug({ trial, tries: opts.tries, err }, 'trial failed')
			if (trial < opts.tries) await sleep(opts.delayMs)
		}
	}
	throw error ?? new Error('failed to execute trials')
}
