/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Cache Key Builder Tests                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { createHash } from 'node:crypto'
import { describe, test, expect } from 'vitest'
import { buildCacheKey, isCacheScalar, MAX_KEY_LENGTH } from '../src/utils/cacheKey.js'
import { CacheKeyError } from '../src/utils/errors.js'
import type { CacheParams } from '../src/types/cache.js'

describe('buildCacheKey', () => {
	test('should lay out namespace, operation and sorted params', () => {
		expect(buildCacheKey('autocomplete', 'suggest', { q: 'python', hl: 'en' })).toBe(
			'autocomplete:suggest:hl=s.en&q=s.python'
		)
	})

	test('should not depend on param insertion order', () => {
		const a = buildCacheKey('ns', 'op', { b: 2, a: 'x', c: true })
		const b = buildCacheKey('ns', 'op', { c: true, a: 'x', b: 2 })

		expect(a).toBe(b)
		expect(a).toBe('ns:op:a=s.x&b=i.2&c=b.1')
	})

	test('should keep numbers and numeric strings apart', () => {
		expect(buildCacheKey('ns', 'op', { n: 5 })).toBe('ns:op:n=i.5')
		expect(buildCacheKey('ns', 'op', { n: '5' })).toBe('ns:op:n=s.5')
		expect(buildCacheKey('ns', 'op', { n: 1.5 })).toBe('ns:op:n=f.1.5')
		expect(buildCacheKey('ns', 'op', { n: false })).toBe('ns:op:n=b.0')
	})

	test('should leave out undefined params', () => {
		expect(buildCacheKey('ns', 'op', { q: 'a', gl: undefined })).toBe('ns:op:q=s.a')
	})

	test('should build a key without params', () => {
		expect(buildCacheKey('ns', 'op', {})).toBe('ns:op:')
	})

	test('should percent-encode separators in values', () => {
		expect(buildCacheKey('ns', 'op', { q: 'a b&c=d' })).toBe('ns:op:q=s.a%20b%26c%3Dd')
	})

	test('should give different keys to different operations', () => {
		const params = { q: 'python' }
		expect(buildCacheKey('ns', 'suggest', params)).not.toBe(
			buildCacheKey('ns', 'variations', params)
		)
	})

	test('should hash the param segment of long keys', () => {
		const query = 'x'.repeat(300)
		const expected =
			'ns:op:#' + createHash('sha256').update('q=s.' + query).digest('hex')

		const key = buildCacheKey('ns', 'op', { q: query })

		expect(key).toBe(expected)
		expect(key.length).toBeLessThanOrEqual(MAX_KEY_LENGTH)
	})

	test('should reject non-finite numbers', () => {
		expect(() => buildCacheKey('ns', 'op', { n: Number.NaN })).toThrow(CacheKeyError)
		expect(() => buildCacheKey('ns', 'op', { n: Infinity })).toThrow(
			'Param n must be a finite number'
		)
	})

	test('should reject non-scalar params', () => {
		const params: CacheParams = JSON.parse('{"list":[1,2]}')

		expect(() => buildCacheKey('ns', 'op', params)).toThrow(
			'Param list must be a string, number or boolean, got array'
		)
	})
})

describe('isCacheScalar', () => {
	test('should accept strings, booleans and finite numbers', () => {
		expect(isCacheScalar('a')).toBe(true)
		expect(isCacheScalar(false)).toBe(true)
		expect(isCacheScalar(0)).toBe(true)
	})

	test('should reject everything else', () => {
		expect(isCacheScalar(Number.NaN)).toBe(false)
		expect(isCacheScalar(null)).toBe(false)
		expect(isCacheScalar({})).toBe(false)
		expect(isCacheScalar(undefined)).toBe(false)
	})
})
