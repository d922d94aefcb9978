import { describe, expect, it } from 'vitest'

import { LookupError } from '../common/errors'
import { FakeKubeClient } from '../testing'
import { K8sChart } from './k8sChart'
import { K8sSecretLookup, K8sServiceLookup } from './k8sLookup'

const trials = { tries: 2, delayMs: 0 }

function serviceLookup (client: FakeKubeClient) {
	const chart = new K8sChart('server', { namespace: 'acme-ns' })
	return new K8sServiceLookup(chart, 'ingress-controller', { name: 'acme-ingress-nginx-controller', namespace: 'acme-ingress', client, ...trials })
}

function secretLookup (client: FakeKubeClient, optional = false) {
	const chart = new K8sChart('server', { namespace: 'acme-ns' })
	return new K8sSecretLookup(chart, 'certificates', {
		name: 'zenml-tls-certs',
		namespace: 'acme-ns',
		defaults: { 'tls.crt': '', 'tls.key': '', 'ca.crt': '' },
		optional,
		client,
		...trials,
	})
}

describe('K8sServiceLookup', () => {
	it('reads the load balancer hostname', async () => {
		const client = new FakeKubeClient().set('service', 'acme-ingress-nginx-controller', 'acme-ingress', {
			status: { loadBalancer: { ingress: [{ hostname: 'lb.example.com' }] } },
		})

		await expect(serviceLookup(client).loadBalancerHostname()).resolves.toBe('lb.example.com')
		expect(client.requests).toEqual(['service/acme-ingress/acme-ingress-nginx-controller'])
	})

	it('falls back to the load balancer ip', async () => {
		const client = new FakeKubeClient().set('service', 'acme-ingress-nginx-controller', 'acme-ingress', {
			status: { loadBalancer: { ingress: [{ ip: '10.0.0.1' }] } },
		})

		await expect(serviceLookup(client).loadBalancerHostname()).resolves.toBe('10.0.0.1')
	})

	it('retries while the load balancer is pending', async () => {
		const client = new FakeKubeClient().set('service', 'acme-ingress-nginx-controller', 'acme-ingress', {
			status: { loadBalancer: {} },
		})

		const lookup = serviceLookup(client).loadBalancerHostname()
		await expect(lookup).rejects.toThrow('service acme-ingress/acme-ingress-nginx-controller has no load balancer address yet')
		await expect(lookup).rejects.toBeInstanceOf(LookupError)
		expect(client.requests).toHaveLength(2)
	})

	it('fails when the service does not exist', async () => {
		await expect(serviceLookup(new FakeKubeClient()).loadBalancerHostname())
			.rejects.toThrow('service acme-ingress/acme-ingress-nginx-controller not found')
	})
})

describe('K8sSecretLookup', () => {
	it('reads only the declared keys and defaults the missing ones', async () => {
		const client = new FakeKubeClient().set('secret', 'zenml-tls-certs', 'acme-ns', {
			data: { 'tls.crt': 'Y2VydA==', 'ca.crt': 'Y2E=', extra: 'eA==' },
		})

		await expect(secretLookup(client).read()).resolves.toEqual({ 'tls.crt': 'Y2VydA==', 'tls.key': '', 'ca.crt': 'Y2E=' })
	})

	it('fails on a missing secret unless optional', async () => {
		await expect(secretLookup(new FakeKubeClient()).read()).rejects.toThrow('secret acme-ns/zenml-tls-certs not found')
		await expect(secretLookup(new FakeKubeClient(), true).read()).resolves.toEqual({ 'tls.crt': '', 'tls.key': '', 'ca.crt': '' })
	})

	it('keeps the defaults it fell back to', async () => {
		const lookup = secretLookup(new FakeKubeClient(), true)

		await lookup.runHook('post:deploy')

		expect(lookup.data).toEqual({ 'tls.crt': '', 'tls.key': '', 'ca.crt': '' })
	})

	it('reads the secret after deploy', async () => {
		const client = new FakeKubeClient().set('secret', 'zenml-tls-certs', 'acme-ns', {
			data: { 'tls.crt': 'Y2VydA==', 'tls.key': 'a2V5', 'ca.crt': 'Y2E=' },
		})
		const lookup = secretLookup(client)

		expect(lookup.data).toBeUndefined()
		await lookup.runHook('post:deploy')

		expect(lookup.data).toEqual({ 'tls.crt': 'Y2VydA==', 'tls.key': 'a2V5', 'ca.crt': 'Y2E=' })
	})
})
