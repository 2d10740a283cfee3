/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                       Orchestration Type Definitions                      ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Types shared by the orchestrator, its operation registry and the sources
 * that call it.
 *
 * @packageDocumentation
 */

import type { Decoder } from './cache.js'
import type { RateLimitStatus } from '../utils/rateLimiter.js'

/**
 * A cacheable upstream operation.
 *
 * The namespace and default TTL belong to the operation, never to the call
 * site. The type parameter is the value the operation produces.
 */
export interface OperationDefinition<V> {
	/** Unique operation name, part of every cache key */
	name: string
	/** Cache key prefix, usually the source name */
	namespace: string
	/** Default lifetime of a cached result; the registry fallback when omitted */
	ttlMs?: number
	/** Restores a cached result, throwing when its shape is wrong */
	decode: Decoder<V>
}

/**
 * Effective caching policy of a registered operation.
 */
export interface OperationPolicy {
	name: string
	namespace: string
	ttlMs: number
}

/**
 * Passed to every fetch function.
 */
export interface FetchContext {
	/** Aborts on deadline or caller cancellation */
	signal: AbortSignal
	operation: string
	/** Cache key of this call */
	key: string
}

/** Produces an operation's value on a cache miss. */
export type FetchFunction<V> = (context: FetchContext) => Promise<V>

/**
 * Per-call options of `Orchestrator.execute`.
 */
export interface ExecuteOptions {
	/** Caller identity the rate limit is counted against */
	identity: string
	/** Deadline for the whole call, defaults to the orchestrator's */
	timeoutMs?: number
	/** Caller cancellation */
	signal?: AbortSignal
	/** Called with the caller's quota once the rate limit check has run */
	onRateLimit?: (status: RateLimitStatus) => void
}
