/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Orchestrator Tests                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Rate limit, cache key, get-or-compute and deadline, end to end with
 * in-memory tiers.
 */

import { describe, test, expect, beforeEach, vi } from 'vitest'
import {
	DEFAULT_OPERATION_TTL_MS,
	OperationRegistry,
	Orchestrator,
	toOrchestrationError,
} from '../src/orchestrator.js'
import { LocalCache } from '../src/utils/cache.js'
import { TieredCache } from '../src/utils/tieredCache.js'
import { FixedWindowRateLimiter } from '../src/utils/rateLimiter.js'
import { ConcurrencyGate } from '../src/utils/concurrency.js'
import {
	OperationTimeoutError,
	RateLimitedError,
	TransportError,
	UpstreamError,
	UpstreamRateLimitedError,
} from '../src/utils/errors.js'
import type { OperationDefinition } from '../src/types/core.js'
import type { RateLimitStatus } from '../src/utils/rateLimiter.js'
import {
	FakeRateStore,
	FakeSharedStore,
	decodeNumber,
	decodeString,
} from './helpers/fakes.js'

const lookup: OperationDefinition<string> = {
	name: 'weather.current',
	namespace: 'weather',
	ttlMs: 60_000,
	decode: decodeString,
}

describe('Orchestrator', () => {
	let now: number
	const clock = () => now
	let cache: TieredCache

	function createOrchestrator(
		options: {
			limit?: number
			windowMs?: number
			defaultTimeoutMs?: number
			rateStore?: FakeRateStore
			storeTimeoutMs?: number
			shared?: FakeSharedStore
		} = {}
	) {
		cache = new TieredCache({
			local: new LocalCache<unknown>({ maxEntries: 100, now: clock }),
			shared: options.shared,
			sharedTimeoutMs: 20,
			now: clock,
		})
		const orchestrator = new Orchestrator({
			cache,
			limiter: new FixedWindowRateLimiter({
				limit: options.limit ?? 100,
				windowMs: options.windowMs ?? 60_000,
				store: options.rateStore,
				storeTimeoutMs: options.storeTimeoutMs,
				now: clock,
			}),
			operations: new OperationRegistry(),
			defaultTimeoutMs: options.defaultTimeoutMs ?? 1000,
		})
		orchestrator.operations.register(lookup)
		return orchestrator
	}

	beforeEach(() => {
		now = 0
	})

	test('should serve a repeated call within the TTL from the cache', async () => {
		const orchestrator = createOrchestrator()
		const fetch = vi.fn(async () => 'sunny')

		const first = await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, {
			identity: 'caller',
		})
		now = 30_000
		const second = await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, {
			identity: 'caller',
		})

		expect(first).toBe('sunny')
		expect(second).toBe('sunny')
		expect(fetch).toHaveBeenCalledTimes(1)
		expect(orchestrator.getStats()).toEqual({
			executions: 2,
			succeeded: 2,
			rateLimited: 0,
			upstreamErrors: 0,
			timeouts: 0,
		})
	})

	test('should pass the cache key and operation to the fetch function', async () => {
		const orchestrator = createOrchestrator()
		const fetch = vi.fn(async () => 'cloudy')

		await orchestrator.execute(lookup, { city: 'Oslo', units: 'metric' }, fetch, {
			identity: 'caller',
		})

		expect(fetch).toHaveBeenCalledWith(
			expect.objectContaining({
				operation: 'weather.current',
				key: 'weather:weather.current:city=s.Oslo&units=s.metric',
			})
		)
	})

	test('should fetch again after the TTL', async () => {
		const orchestrator = createOrchestrator()
		const fetch = vi.fn(async () => 'rain')

		await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller' })
		now = 60_001
		await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller' })

		expect(fetch).toHaveBeenCalledTimes(2)
	})

	test('should block the sixth call of five per minute before fetching', async () => {
		const orchestrator = createOrchestrator({ limit: 5, windowMs: 60_000 })
		let calls = 0
		const fetch = vi.fn(async () => `value-${++calls}`)

		for (let i = 0; i < 5; i++) {
			now = i * 1000
			await orchestrator.execute(lookup, { city: `city-${i}` }, fetch, { identity: 'caller' })
		}

		now = 10_000
		const error = await orchestrator
			.execute(lookup, { city: 'city-5' }, fetch, { identity: 'caller' })
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(RateLimitedError)
		expect(error).toMatchObject({
			kind: 'rate_limited',
			retryAfterMs: 50_000,
			source: 'caller',
			operation: 'weather.current',
		})
		expect(fetch).toHaveBeenCalledTimes(5)
		expect(orchestrator.getStats().rateLimited).toBe(1)
	})

	test('should count cache hits against the rate limit', async () => {
		const orchestrator = createOrchestrator({ limit: 1 })
		const fetch = vi.fn(async () => 'sunny')

		await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller' })

		await expect(
			orchestrator.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller' })
		).rejects.toBeInstanceOf(RateLimitedError)
	})

	test('should return a batch with one failed task among ten', async () => {
		const orchestrator = createOrchestrator()
		const gate = new ConcurrencyGate({ maxConcurrency: 10, defaultMaxParallel: 4 })
		const batch: OperationDefinition<string[]> = {
			name: 'weather.batch',
			namespace: 'weather',
			ttlMs: 1000,
			decode: (raw) => {
				if (!Array.isArray(raw)) throw new Error('not a list')
				return raw.map(String)
			},
		}
		orchestrator.operations.register(batch)

		const result = await orchestrator.execute(
			batch,
			{ cities: 'ten' },
			async ({ signal }) => {
				const settled = await gate.runAll(
					Array.from({ length: 10 }, (_, index) => async () => {
						if (index === 3) throw new Error('station offline')
						return `city-${index}`
					}),
					{ signal }
				)
				return settled.map((outcome) =>
					outcome.status === 'fulfilled' ? outcome.value : 'error'
				)
			},
			{ identity: 'caller' }
		)

		expect(result).toEqual([
			'city-0',
			'city-1',
			'city-2',
			'error',
			'city-4',
			'city-5',
			'city-6',
			'city-7',
			'city-8',
			'city-9',
		])
	})

	test('should wrap fetch failures in UpstreamError and cache nothing', async () => {
		const orchestrator = createOrchestrator()
		const cause = new TransportError('Upstream weather responded 500', 'weather', 500)

		const error = await orchestrator
			.execute(lookup, { city: 'Oslo' }, async () => Promise.reject(cause), {
				identity: 'caller',
			})
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(UpstreamError)
		expect(error).toMatchObject({
			kind: 'upstream',
			message: 'Upstream call for weather.current failed: Upstream weather responded 500',
			upstreamStatus: 500,
			cause,
		})

		const fetch = vi.fn(async () => 'recovered')
		expect(
			await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller' })
		).toBe('recovered')
		expect(fetch).toHaveBeenCalledTimes(1)
		expect(orchestrator.getStats().upstreamErrors).toBe(1)
	})

	test('should map an upstream 429 to RateLimitedError', async () => {
		const orchestrator = createOrchestrator()

		const withHint = await orchestrator
			.execute(
				lookup,
				{ city: 'a' },
				async () => Promise.reject(new UpstreamRateLimitedError('weather', 5000)),
				{ identity: 'caller' }
			)
			.catch((e: unknown) => e)
		const withoutHint = await orchestrator
			.execute(
				lookup,
				{ city: 'b' },
				async () => Promise.reject(new UpstreamRateLimitedError('weather', undefined)),
				{ identity: 'caller' }
			)
			.catch((e: unknown) => e)

		expect(withHint).toMatchObject({ kind: 'rate_limited', source: 'upstream', retryAfterMs: 5000 })
		expect(withoutHint).toMatchObject({ source: 'upstream', retryAfterMs: 60_000 })
	})

	test('should time out and abort the fetch signal', async () => {
		const orchestrator = createOrchestrator({ defaultTimeoutMs: 20 })
		let fetchSignal: AbortSignal | undefined

		const error = await orchestrator
			.execute(
				lookup,
				{ city: 'Oslo' },
				({ signal }) => {
					fetchSignal = signal
					return new Promise<string>(() => {})
				},
				{ identity: 'caller' }
			)
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(OperationTimeoutError)
		expect(error).toMatchObject({
			kind: 'timeout',
			message: 'weather.current did not complete within 20ms',
		})
		expect(fetchSignal?.aborted).toBe(true)
		expect(fetchSignal?.reason).toBe(error)
		expect(orchestrator.getStats().timeouts).toBe(1)
	})

	test('should honour a per-call timeout', async () => {
		const orchestrator = createOrchestrator({ defaultTimeoutMs: 10_000 })

		await expect(
			orchestrator.execute(lookup, { city: 'Oslo' }, () => new Promise<string>(() => {}), {
				identity: 'caller',
				timeoutMs: 10,
			})
		).rejects.toThrow('weather.current did not complete within 10ms')
	})

	test('should map caller cancellation to UpstreamError', async () => {
		const orchestrator = createOrchestrator()
		const controller = new AbortController()
		controller.abort(new Error('client disconnected'))

		const error = await orchestrator
			.execute(lookup, { city: 'Oslo' }, async () => 'never used', {
				identity: 'caller',
				signal: controller.signal,
			})
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(UpstreamError)
		expect(error).toMatchObject({
			message: 'Upstream call for weather.current failed: client disconnected',
		})
	})

	test('should report the caller quota on allowed and blocked calls', async () => {
		const orchestrator = createOrchestrator({ limit: 2, windowMs: 60_000 })
		const statuses: RateLimitStatus[] = []
		const options = {
			identity: 'caller',
			onRateLimit: (status: RateLimitStatus) => statuses.push(status),
		}

		await orchestrator.execute(lookup, { city: 'Oslo' }, async () => 'sunny', options)
		now = 15_000
		await orchestrator.execute(lookup, { city: 'Oslo' }, async () => 'sunny', options)
		now = 20_000
		await orchestrator
			.execute(lookup, { city: 'Oslo' }, async () => 'sunny', options)
			.catch(() => undefined)

		expect(statuses).toEqual([
			{ limit: 2, remaining: 1, resetAfterMs: 60_000 },
			{ limit: 2, remaining: 0, resetAfterMs: 45_000 },
			{ limit: 2, remaining: 0, resetAfterMs: 40_000 },
		])
	})

	test('should time out while the rate store does not answer', async () => {
		const rateStore = new FakeRateStore()
		rateStore.hanging = true
		const orchestrator = createOrchestrator({ rateStore, storeTimeoutMs: 5_000 })
		const fetch = vi.fn(async () => 'sunny')

		const error = await orchestrator
			.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller', timeoutMs: 50 })
			.catch((e: unknown) => e)

		expect(error).toBeInstanceOf(OperationTimeoutError)
		expect(error).toMatchObject({ message: 'weather.current did not complete within 50ms' })
		expect(fetch).not.toHaveBeenCalled()
		expect(orchestrator.getStats().timeouts).toBe(1)
	})

	test('should stop waiting on the rate store when the caller cancels', async () => {
		const rateStore = new FakeRateStore()
		rateStore.hanging = true
		const orchestrator = createOrchestrator({ rateStore, storeTimeoutMs: 5_000 })
		const controller = new AbortController()

		const pending = orchestrator.execute(lookup, { city: 'Oslo' }, async () => 'sunny', {
			identity: 'caller',
			signal: controller.signal,
		})
		controller.abort(new Error('client disconnected'))

		await expect(pending).rejects.toBeInstanceOf(UpstreamError)
	})

	test('should return the fetched value while the shared tier hangs', async () => {
		const shared = new FakeSharedStore()
		shared.hanging = true
		const orchestrator = createOrchestrator({ shared })

		const value = await orchestrator.execute(lookup, { city: 'Oslo' }, async () => 'fresh', {
			identity: 'caller',
			timeoutMs: 500,
		})

		expect(value).toBe('fresh')
		expect(cache.getStats()).toMatchObject({ sharedFailures: 1, sharedDegraded: true })

		const fetch = vi.fn(async () => 'again')
		expect(
			await orchestrator.execute(lookup, { city: 'Oslo' }, fetch, { identity: 'caller' })
		).toBe('fresh')
		expect(fetch).not.toHaveBeenCalled()
	})

	test('should reject unknown operations and invalid timeouts with plain errors', async () => {
		const orchestrator = createOrchestrator()
		const unknown: OperationDefinition<number> = {
			name: 'weather.unknown',
			namespace: 'weather',
			decode: decodeNumber,
		}

		await expect(
			orchestrator.execute(unknown, {}, async () => 1, { identity: 'caller' })
		).rejects.toThrow('Unknown operation: weather.unknown')
		await expect(
			orchestrator.execute(lookup, {}, async () => 'x', { identity: 'caller', timeoutMs: 0 })
		).rejects.toThrow(RangeError)
	})
})

describe('OperationRegistry', () => {
	test('should prefer overrides, then the operation TTL, then the fallback', () => {
		const registry = new OperationRegistry(new Map([['a.one', 5]]), 99)

		registry.register({ name: 'a.one', namespace: 'a', ttlMs: 10, decode: decodeNumber })
		registry.register({ name: 'a.two', namespace: 'a', ttlMs: 20, decode: decodeNumber })
		registry.register({ name: 'a.three', namespace: 'a', decode: decodeNumber })

		expect(registry.list()).toEqual([
			{ name: 'a.one', namespace: 'a', ttlMs: 5 },
			{ name: 'a.two', namespace: 'a', ttlMs: 20 },
			{ name: 'a.three', namespace: 'a', ttlMs: 99 },
		])
	})

	test('should default the fallback to one hour', () => {
		const registry = new OperationRegistry()
		registry.register({ name: 'x', namespace: 'n', decode: decodeNumber })

		expect(registry.policyFor('x').ttlMs).toBe(DEFAULT_OPERATION_TTL_MS)
		expect(DEFAULT_OPERATION_TTL_MS).toBe(3_600_000)
	})

	test('should reject a name reused under another namespace', () => {
		const registry = new OperationRegistry()
		registry.register({ name: 'x', namespace: 'n', decode: decodeNumber })

		expect(registry.has('x')).toBe(true)
		expect(() => registry.register({ name: 'x', namespace: 'm', decode: decodeNumber })).toThrow(
			'Operation x is already registered under n'
		)
	})
})

describe('toOrchestrationError', () => {
	test('should pass orchestration errors through', () => {
		const timeout = new OperationTimeoutError('op', 5)
		expect(toOrchestrationError('op', timeout)).toBe(timeout)
	})

	test('should wrap non-Error values', () => {
		expect(toOrchestrationError('op', 'broken').message).toBe(
			'Upstream call for op failed: broken'
		)
	})
})
