/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Local Cache Tier                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bounded in-memory cache with per-entry TTL.
 * Capacity is enforced by lru-cache; freshness is checked here against each
 * entry's own `createdAt` and `ttlMs`.
 *
 * @packageDocumentation
 */

import { LRUCache } from 'lru-cache'
import type { CacheEntry, CacheStats } from '../types/cache.js'

/**
 * Returns true while the entry may still be served.
 * An entry is fresh up to and including `createdAt + ttlMs`.
 */
export function isFresh(entry: CacheEntry<unknown>, now: number): boolean {
	return now - entry.createdAt <= entry.ttlMs
}

export interface LocalCacheOptions {
	/** Maximum number of entries before least-recently-used eviction */
	maxEntries: number
	/** Clock, injectable for tests */
	now?: () => number
}

/**
 * Generic bounded cache with TTL support.
 * Type parameter T: The type of values stored in the cache
 */
export class LocalCache<T> {
	private cache: LRUCache<string, CacheEntry<T>>
	private readonly maxEntries: number
	private readonly now: () => number

	/**
	 * Creates a new cache instance.
	 */
	constructor(options: LocalCacheOptions) {
		if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
			throw new RangeError('maxEntries must be a positive integer')
		}
		this.maxEntries = options.maxEntries
		this.now = options.now ?? Date.now
		this.cache = new LRUCache<string, CacheEntry<T>>({
			max: options.maxEntries,
		})
	}

	/**
	 * Get an entry from the cache, with its timestamps.
	 * Expired entries are removed and reported as absent.
	 * @param key - Cache key
	 */
	getEntry(key: string): CacheEntry<T> | undefined {
		const entry = this.cache.get(key)

		if (!entry) {
			return undefined
		}

		if (!isFresh(entry, this.now())) {
			this.cache.delete(key)
			return undefined
		}

		return entry
	}

	/**
	 * Get a value from the cache.
	 * Returns undefined if not found or expired, so null is a valid cached value.
	 * @param key - Cache key
	 */
	get(key: string): T | undefined {
		return this.getEntry(key)?.value
	}

	/**
	 * Store a value in the cache, replacing any previous entry.
	 * @param key - Cache key
	 * @param value - Value to cache (cannot be undefined; use null instead)
	 * @param ttlMs - Lifetime in milliseconds
	 * @param createdAt - When the value was computed, defaults to now
	 * @throws Error if attempting to cache undefined
	 */
	set(key: string, value: T, ttlMs: number, createdAt?: number): void {
		if (value === undefined) {
			throw new Error(
				'Cannot cache undefined values. Use null to represent missing data.'
			)
		}

		this.cache.set(key, {
			value,
			createdAt: createdAt ?? this.now(),
			ttlMs,
		})
	}

	/**
	 * Check if a key exists and is not expired.
	 * @param key - Cache key
	 */
	has(key: string): boolean {
		return this.getEntry(key) !== undefined
	}

	/**
	 * Remove one entry.
	 * @returns True if an entry was removed
	 */
	delete(key: string): boolean {
		return this.cache.delete(key)
	}

	/**
	 * Clear entries from the cache.
	 * @param prefix - Only clear keys starting with this prefix
	 * @returns Number of entries cleared
	 */
	clear(prefix?: string): number {
		if (prefix === undefined) {
			const size = this.cache.size
			this.cache.clear()
			return size
		}

		const matching = [...this.cache.keys()].filter((key) =>
			key.startsWith(prefix)
		)
		for (const key of matching) {
			this.cache.delete(key)
		}
		return matching.length
	}

	/**
	 * Get cache statistics.
	 */
	getStats(): CacheStats {
		const now = this.now()
		let valid = 0
		let expired = 0

		for (const entry of this.cache.values()) {
			if (isFresh(entry, now)) {
				valid++
			} else {
				expired++
			}
		}

		return {
			total: this.cache.size,
			valid,
			expired,
			maxEntries: this.maxEntries,
		}
	}

	/**
	 * Remove expired entries from the cache.
	 * @returns Number of entries removed
	 */
	prune(): number {
		const now = this.now()
		const stale: string[] = []

		for (const [key, entry] of this.cache.entries()) {
			if (!isFresh(entry, now)) {
				stale.push(key)
			}
		}
		for (const key of stale) {
			this.cache.delete(key)
		}

		return stale.length
	}
}
