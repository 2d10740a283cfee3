/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                         Cache Configuration                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Centralized cache configuration settings for the application.
 *
 * Operation TTLs have an in-code default next to each operation definition.
 * CACHE_TTL_OVERRIDES takes precedence over those defaults, so a TTL can be
 * tuned per deployment without a release.
 *
 * @packageDocumentation
 */

const MINUTE = 60 * 1000
const HOUR = 60 * MINUTE

/**
 * Default TTL of single-query autocomplete suggestions.
 * Value: 3,600,000 milliseconds (1 hour)
 */
export const AUTOCOMPLETE_CACHE_TTL = HOUR

/**
 * Default TTL of keyword variation fan-outs.
 * Value: 3,600,000 milliseconds (1 hour)
 */
export const VARIATIONS_CACHE_TTL = HOUR

/**
 * Default TTL of batch lookups.
 * Value: 1,800,000 milliseconds (30 minutes)
 */
export const BATCH_CACHE_TTL = 30 * MINUTE

/**
 * Parses CACHE_TTL_OVERRIDES ("operation=ms" pairs separated by commas).
 * Blank entries are ignored; malformed ones are rejected by the env schema.
 *
 * @example
 * ```typescript
 * parseTtlOverrides('autocomplete.suggest=600000, autocomplete.batch=0')
 * // Map { 'autocomplete.suggest' => 600000, 'autocomplete.batch' => 0 }
 * ```
 */
export function parseTtlOverrides(value: string): Map<string, number> {
	const overrides = new Map<string, number>()

	for (const pair of value.split(',')) {
		const trimmed = pair.trim()
		if (!trimmed) continue

		const separator = trimmed.indexOf('=')
		if (separator < 1) continue

		const ttl = parseInt(trimmed.slice(separator + 1))
		if (!isNaN(ttl) && ttl >= 0) {
			overrides.set(trimmed.slice(0, separator).trim(), ttl)
		}
	}

	return overrides
}
