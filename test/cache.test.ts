/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Local Cache Tier Tests                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Unit tests for the LRU + TTL local tier.
 * The clock is injected so TTL boundaries are exact.
 */

import { describe, test, expect, beforeEach } from 'vitest'
import { LocalCache, isFresh } from '../src/utils/cache.js'

describe('Local Cache', () => {
	let now: number
	const clock = () => now

	beforeEach(() => {
		now = 1_000_000
	})

	describe('Basic Operations', () => {
		test('should store and retrieve values', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })

			cache.set('key1', 'value1', 1000)
			cache.set('key2', 'value2', 1000)

			expect(cache.get('key1')).toBe('value1')
			expect(cache.get('key2')).toBe('value2')
		})

		test('should return undefined for non-existent keys', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })

			expect(cache.get('nonexistent')).toBeUndefined()
		})

		test('should overwrite existing keys', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })

			cache.set('key', 'value1', 1000)
			cache.set('key', 'value2', 1000)

			expect(cache.get('key')).toBe('value2')
		})

		test('should cache null but refuse undefined', () => {
			const cache = new LocalCache<string | null | undefined>({
				maxEntries: 10,
				now: clock,
			})

			cache.set('null', null, 1000)
			expect(cache.has('null')).toBe(true)
			expect(cache.get('null')).toBeNull()

			expect(() => cache.set('undef', undefined, 1000)).toThrow(
				'Cannot cache undefined values'
			)
		})

		test('should reject a capacity below one', () => {
			expect(() => new LocalCache<string>({ maxEntries: 0 })).toThrow(RangeError)
		})
	})

	describe('TTL (Time-To-Live)', () => {
		test('should hit at exactly the TTL and miss one millisecond later', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })
			cache.set('key', 'value', 500)

			now += 500
			expect(cache.get('key')).toBe('value')

			now += 1
			expect(cache.get('key')).toBeUndefined()
		})

		test('should remove an expired entry on read', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })
			cache.set('key', 'value', 10)

			now += 11
			expect(cache.has('key')).toBe(false)
			expect(cache.getStats().total).toBe(0)
		})

		test('should honour an explicit creation time', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })
			cache.set('key', 'value', 100, now - 90)

			expect(cache.getEntry('key')).toEqual({
				value: 'value',
				createdAt: 999_910,
				ttlMs: 100,
			})

			now += 11
			expect(cache.get('key')).toBeUndefined()
		})

		test('isFresh should compare age with the TTL inclusively', () => {
			const entry = { value: 1, createdAt: 100, ttlMs: 50 }

			expect(isFresh(entry, 150)).toBe(true)
			expect(isFresh(entry, 151)).toBe(false)
		})
	})

	describe('LRU eviction', () => {
		test('should evict the least recently used entry at capacity', () => {
			const cache = new LocalCache<number>({ maxEntries: 2, now: clock })

			cache.set('a', 1, 1000)
			cache.set('b', 2, 1000)
			cache.get('a')
			cache.set('c', 3, 1000)

			expect(cache.has('a')).toBe(true)
			expect(cache.has('b')).toBe(false)
			expect(cache.has('c')).toBe(true)
		})
	})

	describe('delete() and clear()', () => {
		test('should delete one entry', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })
			cache.set('key', 'value', 1000)

			expect(cache.delete('key')).toBe(true)
			expect(cache.delete('key')).toBe(false)
		})

		test('should clear everything and report the count', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })
			cache.set('a', '1', 1000)
			cache.set('b', '2', 1000)

			expect(cache.clear()).toBe(2)
			expect(cache.getStats().total).toBe(0)
		})

		test('should clear only keys with a prefix', () => {
			const cache = new LocalCache<string>({ maxEntries: 10, now: clock })
			cache.set('autocomplete:suggest:q=s.a', '1', 1000)
			cache.set('autocomplete:batch:q=s.b', '2', 1000)
			cache.set('other:op:q=s.c', '3', 1000)

			expect(cache.clear('autocomplete:')).toBe(2)
			expect(cache.has('other:op:q=s.c')).toBe(true)
		})
	})

	describe('Statistics and pruning', () => {
		test('should count valid and expired entries', () => {
			const cache = new LocalCache<string>({ maxEntries: 5, now: clock })
			cache.set('short', 'a', 10)
			cache.set('long', 'b', 1000)

			now += 20

			expect(cache.getStats()).toEqual({
				total: 2,
				valid: 1,
				expired: 1,
				maxEntries: 5,
			})
		})

		test('should prune expired entries only', () => {
			const cache = new LocalCache<string>({ maxEntries: 5, now: clock })
			cache.set('short1', 'a', 10)
			cache.set('short2', 'b', 10)
			cache.set('long', 'c', 1000)

			now += 20

			expect(cache.prune()).toBe(2)
			expect(cache.getStats().total).toBe(1)
			expect(cache.get('long')).toBe('c')
		})
	})
})
