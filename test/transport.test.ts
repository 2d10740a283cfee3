/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Pooled Transport Tests                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Status and retry handling run against undici's MockAgent; connection
 * reuse and deadlines run against an in-process HTTP server.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest'
import { MockAgent } from 'undici'
import {
	PooledTransport,
	TransportRegistry,
	backoffDelay,
	buildPath,
	isTransientError,
	parseRetryAfter,
} from '../src/utils/transport.js'
import { TransportError, UpstreamRateLimitedError } from '../src/utils/errors.js'
import type { UpstreamProfile } from '../src/types/transport.js'
import { startUpstreamServer, type UpstreamServer } from './helpers/upstreamServer.js'

const ORIGIN = 'http://upstream.test'

function profile(overrides: Partial<UpstreamProfile> = {}): UpstreamProfile {
	return {
		name: 'test',
		origin: ORIGIN,
		maxConnections: 2,
		keepAliveTimeoutMs: 1000,
		keepAliveMaxTimeoutMs: 5000,
		connectTimeoutMs: 1000,
		readTimeoutMs: 1000,
		maxRetries: 2,
		retryBaseDelayMs: 1,
		...overrides,
	}
}

describe('PooledTransport with a mock upstream', () => {
	let agent: MockAgent
	let transport: PooledTransport

	beforeEach(() => {
		agent = new MockAgent()
		agent.disableNetConnect()
		transport = new PooledTransport(profile(), (p) => agent.get(p.origin))
	})

	afterEach(async () => {
		await agent.close()
	})

	test('should send query params and return the body', async () => {
		agent
			.get(ORIGIN)
			.intercept({ path: '/complete/search?client=firefox&q=hello', method: 'GET' })
			.reply(200, '["hello",["hello world"]]')

		const response = await transport.request({
			path: '/complete/search',
			query: { client: 'firefox', q: 'hello', hl: undefined },
		})

		expect(response.status).toBe(200)
		expect(response.body).toBe('["hello",["hello world"]]')
	})

	test('should retry a 5xx and succeed', async () => {
		const pool = agent.get(ORIGIN)
		pool.intercept({ path: '/data' }).reply(503, 'busy')
		pool.intercept({ path: '/data' }).reply(200, 'ok')

		const response = await transport.request({ path: '/data' })

		expect(response.body).toBe('ok')
		expect(transport.getStats()).toEqual({
			name: 'test',
			origin: ORIGIN,
			maxConnections: 2,
			requests: 1,
			successes: 1,
			failures: 0,
			retries: 1,
		})
	})

	test('should give up after maxRetries', async () => {
		agent.get(ORIGIN).intercept({ path: '/data' }).reply(502, 'bad').times(3)

		const error = await transport.request({ path: '/data' }).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(TransportError)
		expect(error).toMatchObject({ message: 'Upstream test responded 502', status: 502 })
		expect(transport.getStats().retries).toBe(2)
	})

	test('should surface 429 without retrying', async () => {
		const pool = agent.get(ORIGIN)
		pool.intercept({ path: '/data' }).reply(429, 'slow down', {
			headers: { 'retry-after': '7' },
		})
		pool.intercept({ path: '/data' }).reply(200, 'ok')

		const error = await transport.request({ path: '/data' }).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(UpstreamRateLimitedError)
		expect(error).toMatchObject({ retryAfterMs: 7000, status: 429 })
		expect(agent.pendingInterceptors()).toHaveLength(1)
	})

	test('should not retry other 4xx responses', async () => {
		const pool = agent.get(ORIGIN)
		pool.intercept({ path: '/missing' }).reply(404, 'not found')
		pool.intercept({ path: '/missing' }).reply(200, 'ok')

		await expect(transport.request({ path: '/missing' })).rejects.toThrow(
			'Upstream test responded 404'
		)
		expect(transport.getStats().retries).toBe(0)
	})

	test('should retry transient network errors', async () => {
		const pool = agent.get(ORIGIN)
		pool
			.intercept({ path: '/data' })
			.replyWithError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))
		pool.intercept({ path: '/data' }).reply(200, 'ok')

		const response = await transport.request({ path: '/data' })

		expect(response.body).toBe('ok')
		expect(transport.getStats().retries).toBe(1)
	})

	test('should fail fast on other network errors', async () => {
		agent.get(ORIGIN).intercept({ path: '/data' }).replyWithError(new Error('boom'))

		await expect(transport.request({ path: '/data' })).rejects.toThrow(
			'Request to test failed: boom'
		)
		expect(transport.getStats()).toMatchObject({ failures: 1, retries: 0 })
	})

	test('should refuse requests once closed', async () => {
		await transport.close()

		await expect(transport.request({ path: '/data' })).rejects.toThrow(
			'Transport test is closed'
		)
	})
})

describe('PooledTransport with a real pool', () => {
	let upstream: UpstreamServer

	beforeEach(async () => {
		upstream = await startUpstreamServer((req, res) => {
			if (req.url === '/slow') {
				setTimeout(() => res.end('late'), 300)
				return
			}
			res.end('ok')
		})
	})

	afterEach(async () => {
		await upstream.close()
	})

	test('should reuse one connection for sequential requests', async () => {
		const transport = new PooledTransport(
			profile({ name: 'local', origin: upstream.origin, maxConnections: 4 })
		)

		for (let i = 0; i < 10; i++) {
			const response = await transport.request({ path: '/ok' })
			expect(response.body).toBe('ok')
		}
		await transport.close()

		expect(upstream.connections()).toBe(1)
	})

	test('should never open more than maxConnections for parallel requests', async () => {
		const transport = new PooledTransport(
			profile({ name: 'local', origin: upstream.origin, maxConnections: 2 })
		)

		const responses = await Promise.all(
			Array.from({ length: 10 }, () => transport.request({ path: '/ok' }))
		)
		await transport.close()

		expect(responses.every((response) => response.body === 'ok')).toBe(true)
		expect(upstream.connections()).toBeLessThanOrEqual(2)
	})

	test('should abort a request past its deadline', async () => {
		const transport = new PooledTransport(
			profile({ name: 'local', origin: upstream.origin, maxRetries: 0 })
		)

		await expect(transport.request({ path: '/slow', timeoutMs: 30 })).rejects.toThrow(
			'Request to local timed out after 30ms'
		)
		await transport.close()
	})

	test('should abort a request cancelled by the caller', async () => {
		const transport = new PooledTransport(
			profile({ name: 'local', origin: upstream.origin, maxRetries: 0 })
		)
		const controller = new AbortController()
		setTimeout(() => controller.abort(new Error('caller went away')), 20)

		await expect(
			transport.request({ path: '/slow', signal: controller.signal })
		).rejects.toThrow('Request to local aborted')
		await transport.close()
	})
})

describe('TransportRegistry', () => {
	test('should keep one transport per upstream name', async () => {
		const agent = new MockAgent()
		const registry = new TransportRegistry((p) => agent.get(p.origin))

		const first = registry.getTransport(profile())
		const second = registry.getTransport(profile({ maxConnections: 8 }))

		expect(second).toBe(first)
		expect(registry.size).toBe(1)
		expect(() => registry.getTransport(profile({ origin: 'http://other.test' }))).toThrow(
			'Upstream test is already registered for http://upstream.test'
		)

		await registry.closeAll()
		expect(registry.size).toBe(0)
		await agent.close()
	})
})

describe('Transport helpers', () => {
	test('parseRetryAfter should read seconds and HTTP dates', () => {
		const now = Date.parse('Wed, 21 Oct 2015 07:28:00 GMT') - 5000

		expect(parseRetryAfter('7')).toBe(7000)
		expect(parseRetryAfter(['3'])).toBe(3000)
		expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', now)).toBe(5000)
		expect(parseRetryAfter('soon')).toBeUndefined()
		expect(parseRetryAfter(undefined)).toBeUndefined()
	})

	test('backoffDelay should double per attempt', () => {
		expect(backoffDelay(250, 1)).toBe(250)
		expect(backoffDelay(250, 2)).toBe(500)
		expect(backoffDelay(250, 3)).toBe(1000)
	})

	test('buildPath should encode params and skip undefined ones', () => {
		expect(buildPath('/p', { a: 'x y', b: undefined, c: 1 })).toBe('/p?a=x+y&c=1')
		expect(buildPath('/p?z=1', { a: 'b' })).toBe('/p?z=1&a=b')
		expect(buildPath('/p', {})).toBe('/p')
	})

	test('isTransientError should match known network codes only', () => {
		expect(isTransientError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true)
		expect(isTransientError(Object.assign(new Error('bad'), { code: 'ERR_INVALID_URL' }))).toBe(
			false
		)
		expect(isTransientError('ECONNRESET')).toBe(false)
	})
})
