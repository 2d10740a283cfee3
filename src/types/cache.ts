/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Cache Type Definitions                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Type definitions for the cache key builder and the cache tiers.
 *
 * @packageDocumentation
 */

/** A value allowed in a cache key param. */
export type CacheScalar = string | number | boolean

/** Call params as seen by the key builder; undefined entries are skipped. */
export type CacheParams = Readonly<Record<string, CacheScalar | undefined>>

/**
 * A cached value with the data needed to decide whether it is still fresh.
 */
export interface CacheEntry<T> {
	/** The cached value */
	value: T
	/** Unix timestamp (ms) when the value was first computed */
	createdAt: number
	/** Lifetime in milliseconds, counted from `createdAt` */
	ttlMs: number
}

/**
 * Statistics about the local cache tier.
 */
export interface CacheStats {
	/** Total number of entries held */
	total: number
	/** Number of valid (non-expired) entries */
	valid: number
	/** Number of expired entries not yet evicted */
	expired: number
	/** Capacity before least-recently-used entries are evicted */
	maxEntries: number
}

/**
 * Counters kept by the tiered cache.
 */
export interface TieredCacheStats {
	/** Whether caching is active at all */
	enabled: boolean
	/** Hits served by the local tier */
	localHits: number
	/** Hits served by the shared tier */
	sharedHits: number
	/** Lookups that fell through to compute */
	misses: number
	/** Values written after a successful compute */
	stores: number
	/** Shared tier operations that failed */
	sharedFailures: number
	/** Whether a shared tier is configured */
	sharedConfigured: boolean
	/** Whether the shared tier is currently being skipped after a failure */
	sharedDegraded: boolean
	/** Local tier statistics */
	local: CacheStats
}

/**
 * Networked key/value store backing the shared cache tier.
 *
 * Implementations reject on any transport or server failure; the tiered
 * cache decides what to do with that.
 */
export interface SharedStore {
	/** Human-readable name for logs and health output */
	readonly name: string
	/** Returns the raw stored string, or null when absent */
	get(key: string): Promise<string | null>
	/** Stores a raw string that expires after `ttlMs` */
	set(key: string, value: string, ttlMs: number): Promise<void>
	/** Removes a key; absent keys are not an error */
	delete(key: string): Promise<void>
	/** Checks that the store answers */
	ping(): Promise<void>
}

/**
 * Turns a value read back from a cache tier into the caller's type.
 * Throws when the value does not have the expected shape.
 */
export type Decoder<V> = (raw: unknown) => V

/**
 * Health of one cache tier as reported by the detailed health check.
 */
export interface TierHealth {
	status: 'healthy' | 'unhealthy' | 'not_configured'
	response_time_ms?: number
	error?: string
}
