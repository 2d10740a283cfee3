/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                         Cache Key Builder                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Deterministic, order-independent cache keys.
 *
 * Key layout: `namespace:operation:name=tag.value&name=tag.value`, with
 * params sorted by name and every name and value percent-encoded. The type
 * tag keeps `5` and `"5"` apart.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto'
import { CacheKeyError } from './errors.js'
import type { CacheParams, CacheScalar } from '../types/cache.js'

/** Keys longer than this get their param segment hashed. */
export const MAX_KEY_LENGTH = 250

function encodeScalar(name: string, value: unknown): string {
	switch (typeof value) {
		case 'string':
			return `s.${encodeURIComponent(value)}`
		case 'boolean':
			return `b.${value ? 1 : 0}`
		case 'number':
			if (!Number.isFinite(value)) {
				throw new CacheKeyError(`Param ${name} must be a finite number`, name)
			}
			return Number.isInteger(value) ? `i.${value}` : `f.${value}`
		default:
			throw new CacheKeyError(
				`Param ${name} must be a string, number or boolean, got ${
					value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value
				}`,
				name
			)
	}
}

/**
 * Returns true if the value can be used as a cache key param.
 */
export function isCacheScalar(value: unknown): value is CacheScalar {
	return (
		typeof value === 'string' ||
		typeof value === 'boolean' ||
		(typeof value === 'number' && Number.isFinite(value))
	)
}

/**
 * Builds the cache key for one call of an operation.
 *
 * Pure: the same inputs always give the same key, whatever the insertion
 * order of `params`. Params whose value is `undefined` are left out.
 *
 * @throws {@link CacheKeyError} when a param is not a finite scalar
 *
 * @example
 * ```typescript
 * buildCacheKey('autocomplete', 'suggest', { q: 'python', hl: 'en' })
 * // 'autocomplete:suggest:hl=s.en&q=s.python'
 * ```
 */
export function buildCacheKey(
	namespace: string,
	operation: string,
	params: CacheParams
): string {
	const names = Object.keys(params)
		.filter((name) => params[name] !== undefined)
		// Code-unit order, independent of locale
		.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))

	const segment = names
		.map((name) => `${encodeURIComponent(name)}=${encodeScalar(name, params[name])}`)
		.join('&')

	const prefix = `${namespace}:${operation}:`
	const key = prefix + segment

	if (key.length <= MAX_KEY_LENGTH) {
		return key
	}

	return prefix + '#' + createHash('sha256').update(segment).digest('hex')
}
