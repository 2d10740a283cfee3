/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                           Tiered Cache                                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Cache-aside get-or-compute over two tiers: the bounded local cache, then
 * an optional shared store. Writes go to both tiers. Every shared call is
 * bounded by a short timeout; a failure or timeout is logged and absorbed,
 * and the tier is skipped for a cool-down period.
 *
 * Concurrent misses for the same key each run `compute`; there is no
 * single-flight coalescing.
 *
 * @packageDocumentation
 */

import { createLogger, diagnostic } from './logger.js'
import { isFresh, type LocalCache } from './cache.js'
import { CacheTierUnavailableError } from './errors.js'
import { withTimeout } from './timeout.js'
import type {
	CacheEntry,
	Decoder,
	SharedStore,
	TierHealth,
	TieredCacheStats,
} from '../types/cache.js'

const logger = createLogger('TieredCache')

export interface TieredCacheOptions {
	/** Local tier */
	local: LocalCache<unknown>
	/** Shared tier, omitted when not configured */
	shared?: SharedStore
	/** When false, getOrCompute always computes and stores nothing */
	enabled?: boolean
	/** How long the shared tier is skipped after a failure */
	sharedRetryMs?: number
	/** Deadline of one shared tier call */
	sharedTimeoutMs?: number
	/** Clock, injectable for tests */
	now?: () => number
}

type Decoded<V> = { ok: true; value: V } | { ok: false }

/**
 * Parses the JSON envelope the shared tier stores.
 * @returns The entry, or undefined when the payload is malformed
 */
export function parseSharedEntry(raw: string): CacheEntry<unknown> | undefined {
	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch {
		return undefined
	}

	if (
		typeof parsed !== 'object' ||
		parsed === null ||
		!('v' in parsed) ||
		!('c' in parsed) ||
		!('t' in parsed)
	) {
		return undefined
	}

	const { v, c, t } = parsed
	if (typeof c !== 'number' || typeof t !== 'number') {
		return undefined
	}
	return { value: v, createdAt: c, ttlMs: t }
}

/**
 * Serializes an entry into the shared tier envelope.
 */
export function serializeSharedEntry(entry: CacheEntry<unknown>): string {
	return JSON.stringify({ v: entry.value, c: entry.createdAt, t: entry.ttlMs })
}

/**
 * Two-tier cache with get-or-compute semantics.
 */
export class TieredCache {
	private readonly local: LocalCache<unknown>
	private readonly shared: SharedStore | undefined
	private readonly enabled: boolean
	private readonly sharedRetryMs: number
	private readonly sharedTimeoutMs: number
	private readonly now: () => number
	private pruneTimer: NodeJS.Timeout | undefined

	private sharedRetryAt = 0
	private sharedDegraded = false

	private localHits = 0
	private sharedHits = 0
	private misses = 0
	private stores = 0
	private sharedFailures = 0

	constructor(options: TieredCacheOptions) {
		this.local = options.local
		this.shared = options.shared
		this.enabled = options.enabled ?? true
		this.sharedRetryMs = options.sharedRetryMs ?? 30000
		this.sharedTimeoutMs = options.sharedTimeoutMs ?? 250
		this.now = options.now ?? Date.now
	}

	/**
	 * Returns the cached value for `key`, or computes, stores and returns it.
	 *
	 * A failing `compute` rejects with its own error and nothing is stored.
	 * An `undefined` result is returned but not stored.
	 *
	 * @param key - Cache key, see `buildCacheKey`
	 * @param ttlMs - Lifetime of a newly computed value
	 * @param compute - Produces the value on a miss
	 * @param decode - Restores a cached value to the caller's type
	 */
	async getOrCompute<V>(
		key: string,
		ttlMs: number,
		compute: () => Promise<V>,
		decode: Decoder<V>
	): Promise<V> {
		if (!this.enabled) {
			return compute()
		}

		const cached = await this.lookup(key, decode)
		if (cached.ok) {
			return cached.value
		}

		this.misses++
		diagnostic.debug('Cache miss', { key })

		const value = await compute()
		if (value !== undefined) {
			await this.store(key, value, ttlMs)
		}
		return value
	}

	/**
	 * Removes a key from both tiers.
	 */
	async delete(key: string): Promise<void> {
		this.local.delete(key)
		if (!this.isSharedAvailable() || !this.shared) return
		try {
			await this.bounded(this.shared.delete(key))
			this.markSharedHealthy()
		} catch (error) {
			this.markSharedFailure(error)
		}
	}

	/**
	 * Clears the local tier, optionally only keys under one namespace.
	 * Shared entries expire on their own TTL.
	 * @returns Number of local entries removed
	 */
	clear(namespace?: string): number {
		return this.local.clear(namespace === undefined ? undefined : namespace + ':')
	}

	/**
	 * Drops expired local entries.
	 * @returns Number of entries removed
	 */
	prune(): number {
		return this.local.prune()
	}

	/**
	 * Prunes the local tier every `intervalMs`. The timer does not keep the
	 * process alive. A zero interval leaves pruning to reads.
	 */
	startPruning(intervalMs: number): void {
		this.stopPruning()
		if (intervalMs <= 0) return

		this.pruneTimer = setInterval(() => {
			const removed = this.prune()
			if (removed > 0) {
				diagnostic.debug('Pruned expired cache entries', { removed })
			}
		}, intervalMs)
		this.pruneTimer.unref()
	}

	stopPruning(): void {
		if (this.pruneTimer) {
			clearInterval(this.pruneTimer)
			this.pruneTimer = undefined
		}
	}

	getStats(): TieredCacheStats {
		return {
			enabled: this.enabled,
			localHits: this.localHits,
			sharedHits: this.sharedHits,
			misses: this.misses,
			stores: this.stores,
			sharedFailures: this.sharedFailures,
			sharedConfigured: this.shared !== undefined,
			sharedDegraded: this.sharedDegraded,
			local: this.local.getStats(),
		}
	}

	/**
	 * Pings the shared tier.
	 */
	async checkShared(): Promise<TierHealth> {
		if (!this.shared) {
			return { status: 'not_configured' }
		}
		const start = this.now()
		try {
			await this.bounded(this.shared.ping())
			return { status: 'healthy', response_time_ms: this.now() - start }
		} catch (error) {
			return {
				status: 'unhealthy',
				error: error instanceof Error ? error.message : String(error),
			}
		}
	}

	private async lookup<V>(key: string, decode: Decoder<V>): Promise<Decoded<V>> {
		const localEntry = this.local.getEntry(key)
		if (localEntry) {
			const decoded = this.decode(key, localEntry.value, decode)
			if (decoded.ok) {
				this.localHits++
				diagnostic.trace('Cache hit', { key, tier: 'local' })
				return decoded
			}
			this.local.delete(key)
		}

		if (!this.isSharedAvailable() || !this.shared) {
			return { ok: false }
		}

		let raw: string | null
		try {
			raw = await this.bounded(this.shared.get(key))
			this.markSharedHealthy()
		} catch (error) {
			this.markSharedFailure(error)
			return { ok: false }
		}

		if (raw === null) {
			return { ok: false }
		}

		const entry = parseSharedEntry(raw)
		if (!entry || !isFresh(entry, this.now())) {
			return { ok: false }
		}

		const decoded = this.decode(key, entry.value, decode)
		if (decoded.ok) {
			this.sharedHits++
			// Promote with the original timestamps so expiry stays aligned
			this.local.set(key, decoded.value, entry.ttlMs, entry.createdAt)
			diagnostic.trace('Cache hit', { key, tier: 'shared' })
		}
		return decoded
	}

	private decode<V>(key: string, raw: unknown, decode: Decoder<V>): Decoded<V> {
		try {
			return { ok: true, value: decode(raw) }
		} catch (error) {
			logger.warn('Discarding cached value that failed to decode', {
				key,
				error: error instanceof Error ? error.message : String(error),
			})
			return { ok: false }
		}
	}

	private async store(key: string, value: unknown, ttlMs: number): Promise<void> {
		const entry: CacheEntry<unknown> = { value, createdAt: this.now(), ttlMs }
		this.local.set(key, value, ttlMs, entry.createdAt)
		this.stores++

		if (!this.isSharedAvailable() || !this.shared) return

		let payload: string
		try {
			payload = serializeSharedEntry(entry)
		} catch (error) {
			logger.warn('Value not serializable, kept in local tier only', {
				key,
				error: error instanceof Error ? error.message : String(error),
			})
			return
		}

		try {
			await this.bounded(this.shared.set(key, payload, ttlMs))
			this.markSharedHealthy()
		} catch (error) {
			this.markSharedFailure(error)
		}
	}

	private bounded<T>(call: Promise<T>): Promise<T> {
		return withTimeout(call, this.sharedTimeoutMs, this.shared?.name ?? 'shared')
	}

	private isSharedAvailable(): boolean {
		return this.shared !== undefined && this.now() >= this.sharedRetryAt
	}

	private markSharedHealthy(): void {
		if (this.sharedDegraded) {
			this.sharedDegraded = false
			logger.info('Shared cache tier recovered')
		}
	}

	private markSharedFailure(error: unknown): void {
		const failure = new CacheTierUnavailableError(
			this.shared?.name ?? 'shared',
			error
		)
		this.sharedFailures++
		this.sharedDegraded = true
		this.sharedRetryAt = this.now() + this.sharedRetryMs
		logger.warn(`${failure.message}; using local tier for ${this.sharedRetryMs}ms`)
	}
}
