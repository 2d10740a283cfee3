/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Request Orchestrator                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Cache-aside execution pipeline wrapped around every upstream operation:
 *
 * 1. Build the cache key from the operation's namespace and the params
 * 2. Count the call against the caller's rate limit; blocked calls fail
 *    with RateLimitedError before any cache lookup or fetch
 * 3. Get-or-compute through the tiered cache; the fetch function receives
 *    a signal that aborts on deadline or caller cancel
 *
 * The deadline covers steps 2 and 3.
 *
 * Every failure reaching the caller is an {@link OrchestrationError}.
 *
 * @packageDocumentation
 */

import { createLogger, diagnostic } from './utils/logger.js'
import { buildCacheKey } from './utils/cacheKey.js'
import {
	OperationTimeoutError,
	OrchestrationError,
	RateLimitedError,
	UpstreamError,
	UpstreamRateLimitedError,
} from './utils/errors.js'
import type { TieredCache } from './utils/tieredCache.js'
import type { FixedWindowRateLimiter } from './utils/rateLimiter.js'
import type { CacheParams } from './types/cache.js'
import type {
	ExecuteOptions,
	FetchFunction,
	OperationDefinition,
	OperationPolicy,
} from './types/core.js'

const logger = createLogger('Orchestrator')

/** Retry hint used when an upstream 429 carries no Retry-After header. */
export const DEFAULT_UPSTREAM_RETRY_AFTER_MS = 60 * 1000

/** TTL of operations that define none, unless the registry is given another. */
export const DEFAULT_OPERATION_TTL_MS = 60 * 60 * 1000

/**
 * Registered operations and their effective caching policy.
 *
 * A TTL override, when present, wins over the operation's default, which
 * wins over the registry fallback.
 */
export class OperationRegistry {
	private readonly policies = new Map<string, OperationPolicy>()

	constructor(
		private readonly ttlOverrides: ReadonlyMap<string, number> = new Map(),
		private readonly fallbackTtlMs: number = DEFAULT_OPERATION_TTL_MS
	) {}

	/**
	 * Registers an operation.
	 * @returns The same definition, for use with `Orchestrator.execute`
	 * @throws Error when the name is taken by a different namespace
	 */
	register<V>(definition: OperationDefinition<V>): OperationDefinition<V> {
		const existing = this.policies.get(definition.name)
		if (existing && existing.namespace !== definition.namespace) {
			throw new Error(
				`Operation ${definition.name} is already registered under ${existing.namespace}`
			)
		}

		const ttlMs =
			this.ttlOverrides.get(definition.name) ??
			definition.ttlMs ??
			this.fallbackTtlMs
		this.policies.set(definition.name, {
			name: definition.name,
			namespace: definition.namespace,
			ttlMs,
		})

		logger.debug(`Operation registered: ${definition.name}`, {
			namespace: definition.namespace,
			ttlMs,
			overridden: this.ttlOverrides.has(definition.name),
		})

		return definition
	}

	/**
	 * @throws Error for an operation that was never registered
	 */
	policyFor(name: string): OperationPolicy {
		const policy = this.policies.get(name)
		if (!policy) {
			throw new Error(`Unknown operation: ${name}`)
		}
		return policy
	}

	has(name: string): boolean {
		return this.policies.has(name)
	}

	list(): OperationPolicy[] {
		return [...this.policies.values()]
	}
}

export interface OrchestratorOptions {
	cache: TieredCache
	limiter: FixedWindowRateLimiter
	operations: OperationRegistry
	/** Deadline applied when a call does not give one */
	defaultTimeoutMs: number
}

export interface OrchestratorStats {
	executions: number
	succeeded: number
	rateLimited: number
	upstreamErrors: number
	timeouts: number
}

/**
 * Maps any failure of a fetch into the orchestration taxonomy.
 */
export function toOrchestrationError(
	operation: string,
	error: unknown
): OrchestrationError {
	if (error instanceof OrchestrationError) {
		return error
	}
	if (error instanceof UpstreamRateLimitedError) {
		return new RateLimitedError(
			operation,
			error.retryAfterMs ?? DEFAULT_UPSTREAM_RETRY_AFTER_MS,
			'upstream',
			{ cause: error }
		)
	}
	return new UpstreamError(operation, error)
}

/**
 * Single entry point for cached, rate-limited upstream calls.
 */
export class Orchestrator {
	private readonly cache: TieredCache
	private readonly limiter: FixedWindowRateLimiter
	readonly operations: OperationRegistry
	private readonly defaultTimeoutMs: number

	private stats: OrchestratorStats = {
		executions: 0,
		succeeded: 0,
		rateLimited: 0,
		upstreamErrors: 0,
		timeouts: 0,
	}

	constructor(options: OrchestratorOptions) {
		this.cache = options.cache
		this.limiter = options.limiter
		this.operations = options.operations
		this.defaultTimeoutMs = options.defaultTimeoutMs
	}

	/**
	 * Runs one operation through rate limit, cache and deadline.
	 *
	 * @param operation - A registered operation
	 * @param params - Flat scalar params identifying the call
	 * @param fetch - Produces the value on a cache miss
	 * @param options - Caller identity, deadline and cancellation
	 * @returns The cached or freshly fetched value
	 *
	 * @throws {@link RateLimitedError} when the caller is over its limit, or
	 * the upstream answered 429
	 * @throws {@link OperationTimeoutError} when the deadline passes first
	 * @throws {@link UpstreamError} when the fetch fails for any other reason
	 *
	 * Unknown operations and non-scalar params are programming errors and
	 * throw plain errors.
	 */
	async execute<V>(
		operation: OperationDefinition<V>,
		params: CacheParams,
		fetch: FetchFunction<V>,
		options: ExecuteOptions
	): Promise<V> {
		const policy = this.operations.policyFor(operation.name)
		const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs
		if (!(timeoutMs > 0)) {
			throw new RangeError(`timeoutMs must be positive, got ${timeoutMs}`)
		}

		const key = buildCacheKey(policy.namespace, policy.name, params)

		this.stats.executions++
		diagnostic.trace('Executing operation', { operation: policy.name, key, timeoutMs })

		try {
			const value = await this.withDeadline(
				policy.name,
				timeoutMs,
				options.signal,
				async (signal) => {
					await this.admit(policy.name, options)
					// The deadline may have passed while the limiter answered
					signal.throwIfAborted()
					return this.cache.getOrCompute(
						key,
						policy.ttlMs,
						() => fetch({ signal, operation: policy.name, key }),
						operation.decode
					)
				}
			)
			this.stats.succeeded++
			return value
		} catch (error) {
			const failure = toOrchestrationError(policy.name, error)
			switch (failure.kind) {
				case 'rate_limited':
					this.stats.rateLimited++
					break
				case 'timeout':
					this.stats.timeouts++
					break
				case 'upstream':
					this.stats.upstreamErrors++
					break
			}
			throw failure
		}
	}

	getStats(): OrchestratorStats {
		return { ...this.stats }
	}

	/**
	 * Counts the call against the caller's limit and reports the quota.
	 * @throws {@link RateLimitedError} when the caller is over its limit
	 */
	private async admit(operation: string, options: ExecuteOptions): Promise<void> {
		const decision = await this.limiter.checkAndIncrement(options.identity)
		options.onRateLimit?.(this.limiter.statusOf(decision))

		if (!decision.allowed) {
			logger.debug(`Caller blocked on ${operation}`, {
				retryAfterMs: decision.retryAfterMs,
			})
			throw new RateLimitedError(operation, decision.retryAfterMs, 'caller')
		}
	}

	/**
	 * Starts `work` with a signal that aborts on deadline or caller cancel,
	 * and settles as soon as either happens. Late outcomes of abandoned work
	 * are logged and dropped.
	 */
	private withDeadline<V>(
		operation: string,
		timeoutMs: number,
		callerSignal: AbortSignal | undefined,
		work: (signal: AbortSignal) => Promise<V>
	): Promise<V> {
		const controller = new AbortController()

		return new Promise<V>((resolve, reject) => {
			let settled = false

			const settle = () => {
				settled = true
				clearTimeout(timer)
				callerSignal?.removeEventListener('abort', onCallerAbort)
			}

			const timer = setTimeout(() => {
				if (settled) return
				settle()
				const timeout = new OperationTimeoutError(operation, timeoutMs)
				controller.abort(timeout)
				reject(timeout)
			}, timeoutMs)

			const onCallerAbort = () => {
				if (settled) return
				settle()
				const reason: unknown =
					callerSignal?.reason ?? new Error('Cancelled by caller')
				controller.abort(reason)
				reject(new UpstreamError(operation, reason))
			}

			if (callerSignal?.aborted) {
				onCallerAbort()
				return
			}
			callerSignal?.addEventListener('abort', onCallerAbort, { once: true })

			work(controller.signal).then(
				(value) => {
					if (settled) return
					settle()
					resolve(value)
				},
				(error: unknown) => {
					if (settled) {
						diagnostic.debug('Abandoned operation failed after settling', {
							operation,
							error: error instanceof Error ? error.message : String(error),
						})
						return
					}
					settle()
					reject(error)
				}
			)
		})
	}
}
