import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'

import type { CommandRunner } from '../../common/utils'
import { FakeCommandRunner, FakeKubeClient } from '../../testing'
import { Config, ConfigAdapter, type ConfigValues, FileConfigAdapter, K8sConfigAdapter } from '.'

class MemoryConfigAdapter extends ConfigAdapter {
	readonly saved: ConfigValues[] = []

	constructor (private readonly values: ConfigValues) {
		super()
	}

	async load () {
		return this.values
	}

	async save (values: ConfigValues) {
		this.saved.push(values)
	}
}

describe('Config', () => {
	it('validates values with a schema', async () => {
		const config = Config.of({ adapter: new MemoryConfigAdapter({ port: '8080' }) })

		await expect(config.parse(z.object({ port: z.coerce.number() }))).resolves.toEqual({ port: 8080 })
		await expect(config.parse(z.object({ port: z.number() })))
			.rejects.toThrow('invalid values for config\n- port: Expected number, received string')
	})

	it('names itself in validation errors', async () => {
		const config = Config.of({ name: 'values.json', adapter: new MemoryConfigAdapter({}) })

		await expect(config.parse(z.object({ port: z.number() })))
			.rejects.toThrow('invalid values for values.json\n- port: Required')
	})

	it('saves and serves new values', async () => {
		const adapter = new MemoryConfigAdapter({ name: 'acme' })
		const config = Config.of({ adapter })

		await config.put({ name: 'other' })

		expect(adapter.saved).toEqual([{ name: 'other' }])
		await expect(config.toJSON()).resolves.toEqual({ name: 'other' })
	})
})

describe('FileConfigAdapter', () => {
	let dir: string

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'k8s-cdk-config-'))
	})

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true })
	})

	it('treats a missing file as empty', async () => {
		await expect(new FileConfigAdapter(path.join(dir, 'values.json')).load()).resolves.toEqual({})
	})

	it('writes json it can read back', async () => {
		const adapter = new FileConfigAdapter(path.join(dir, 'nested', 'values.json'))

		await adapter.save({ name: 'acme', create_rds: false })

		await expect(adapter.load()).resolves.toEqual({ name: 'acme', create_rds: false })
		await expect(fs.readFile(path.join(dir, 'nested', 'values.json'), 'utf-8'))
			.resolves.toBe('{\n  "name": "acme",\n  "create_rds": false\n}\n')
	})
})

describe('K8sConfigAdapter', () => {
	it('decodes secret values', async () => {
		const client = new FakeKubeClient().set('secret', 'zenml', 'zenml-config', {
			data: { password: Buffer.from('test-password').toString('base64') },
		})
		const adapter = new K8sConfigAdapter({ name: 'zenml', namespace: 'zenml-config', client })

		await expect(adapter.load()).resolves.toEqual({ password: 'test-password' })
		await expect(new K8sConfigAdapter({ name: 'missing', namespace: 'zenml-config', client }).load()).resolves.toEqual({})
	})

	it('creates the secret and patches in the values as strings', async () => {
		const runner = new FakeCommandRunner()
		const patches: unknown[] = []
		const readingRunner: CommandRunner = {
			async exec (command, injectInput) {
				await runner.exec(command, injectInput)
				const patchFile = /--patch-file (\S+)$/.exec(command)?.[1]
				if (patchFile) patches.push(JSON.parse(await fs.readFile(patchFile, 'utf-8')))
			},
		}
		const adapter = new K8sConfigAdapter({ name: 'zenml', namespace: 'zenml-config', client: new FakeKubeClient(), runner: readingRunner })

		await adapter.save({ password: 'test-password', create_rds: false })

		expect(runner.commands[0]).toBe('kubectl apply -f -')
		expect(runner.calls[0]?.input).toContain('name: zenml-config')
		expect(runner.commands[1]).toBe('kubectl get secret -n=zenml-config zenml > /dev/null 2>&1 || kubectl create secret generic -n=zenml-config zenml')
		expect(runner.commands[2]).toMatch(/^kubectl patch secret -n=zenml-config zenml --type merge --patch-file \S+$/)
		expect(patches).toEqual([{ stringData: { password: 'test-password', create_rds: 'false' } }])
	})
})
