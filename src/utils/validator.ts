/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Validation Utility                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Lightweight input validation for relay endpoints.
 * Provides type-safe validation with detailed error reporting.
 *
 * Features:
 * - Search query validation with length and pattern checks
 * - ISO language and country code normalization
 * - Keyword category and batch list validation
 * - Bounded integer params
 *
 * @packageDocumentation
 */

import { createLogger, diagnostic } from './logger.js'

/** Logger instance for validation module */
const logger = createLogger('Validator')

/** Longest accepted search query. */
export const MAX_QUERY_LENGTH = 200

/** Largest accepted batch. */
export const MAX_BATCH_SIZE = 50

/** Patterns rejected in free-text input. */
const SUSPICIOUS_PATTERNS: RegExp[] = [
	/<script/i,
	/javascript:/i,
	/onload=/i,
	/onerror=/i,
	/eval\(/i,
	/alert\(/i,
]

/**
 * Validation error with detailed context
 */
export class ValidationError extends Error {
	constructor(
		message: string,
		public field: string,
		public value: unknown,
		public context?: Record<string, unknown>
	) {
		super(message)
		this.name = 'ValidationError'
	}
}

/**
 * Validates a search query and returns it trimmed.
 */
export function validateQuery(value: unknown, fieldName: string = 'q'): string {
	if (typeof value !== 'string') {
		throw new ValidationError(
			value === undefined ? 'Query is required' : 'Query must be a string',
			fieldName,
			value,
			{ receivedType: Array.isArray(value) ? 'array' : typeof value }
		)
	}

	const query = value.trim()
	if (!query) {
		throw new ValidationError('Query cannot be empty', fieldName, value)
	}

	if (query.length > MAX_QUERY_LENGTH) {
		throw new ValidationError(
			`Query too long (max ${MAX_QUERY_LENGTH} characters)`,
			fieldName,
			value,
			{ length: query.length, maxLength: MAX_QUERY_LENGTH }
		)
	}

	// eslint-disable-next-line no-control-regex
	if (/[\u0000-\u001f\u007f]/.test(query)) {
		throw new ValidationError(
			'Query contains control characters',
			fieldName,
			value
		)
	}

	const suspicious = SUSPICIOUS_PATTERNS.find((pattern) => pattern.test(query))
	if (suspicious) {
		diagnostic.debug('Suspicious query rejected', {
			field: fieldName,
			pattern: suspicious.source,
		})
		throw new ValidationError('Query contains a disallowed pattern', fieldName, value)
	}

	return query
}

/**
 * Validates an ISO 639 language code, returned lowercase.
 */
export function validateLanguageCode(
	value: unknown,
	defaultValue: string = 'en'
): string {
	if (value === undefined || value === '') return defaultValue
	if (typeof value !== 'string' || !/^[a-z]{2,3}$/i.test(value.trim())) {
		throw new ValidationError(
			'Language must be a 2-3 letter ISO code',
			'hl',
			value
		)
	}
	return value.trim().toLowerCase()
}

/**
 * Validates an ISO 3166 country code, returned uppercase.
 */
export function validateCountryCode(
	value: unknown,
	defaultValue: string = 'US'
): string {
	if (value === undefined || value === '') return defaultValue
	if (typeof value !== 'string' || !/^[a-z]{2,3}$/i.test(value.trim())) {
		throw new ValidationError(
			'Country must be a 2-3 letter ISO code',
			'gl',
			value
		)
	}
	return value.trim().toUpperCase()
}

/**
 * Validates an optional integer param within bounds.
 */
export function validateBoundedInteger(
	value: unknown,
	fieldName: string,
	bounds: { min: number; max: number; defaultValue: number }
): number {
	if (value === undefined || value === '') return bounds.defaultValue

	const parsed =
		typeof value === 'number'
			? value
			: typeof value === 'string' && /^-?\d+$/.test(value.trim())
				? parseInt(value)
				: NaN

	if (!Number.isInteger(parsed)) {
		throw new ValidationError(`${fieldName} must be an integer`, fieldName, value)
	}

	if (parsed < bounds.min || parsed > bounds.max) {
		throw new ValidationError(
			`${fieldName} must be between ${bounds.min} and ${bounds.max}`,
			fieldName,
			value,
			{ min: bounds.min, max: bounds.max }
		)
	}

	return parsed
}

/**
 * Validates a comma-separated list of keyword categories.
 * Names are matched case-insensitively and returned in their catalog spelling.
 */
export function validateCategories(
	value: unknown,
	known: readonly string[],
	defaults: readonly string[]
): string[] {
	if (value === undefined || value === '') return [...defaults]

	if (typeof value !== 'string') {
		throw new ValidationError(
			'categories must be a comma-separated string',
			'categories',
			value
		)
	}

	const byLowerName = new Map(known.map((name) => [name.toLowerCase(), name]))
	const selected: string[] = []
	const unknown: string[] = []

	for (const raw of value.split(',')) {
		const name = raw.trim()
		if (!name) continue
		const match = byLowerName.get(name.toLowerCase())
		if (!match) {
			unknown.push(name)
		} else if (!selected.includes(match)) {
			selected.push(match)
		}
	}

	if (unknown.length > 0) {
		throw new ValidationError('Unknown keyword categories', 'categories', value, {
			unknown,
			available: known,
		})
	}

	if (selected.length === 0) {
		throw new ValidationError('No keyword categories selected', 'categories', value)
	}

	return selected
}

/**
 * Validates the query list of a batch request.
 */
export function validateQueryList(value: unknown): string[] {
	if (!Array.isArray(value)) {
		throw new ValidationError('queries must be an array of strings', 'queries', value)
	}

	if (value.length === 0) {
		throw new ValidationError('queries cannot be empty', 'queries', value)
	}

	if (value.length > MAX_BATCH_SIZE) {
		throw new ValidationError(
			`Too many queries (max ${MAX_BATCH_SIZE})`,
			'queries',
			value.length,
			{ maxItems: MAX_BATCH_SIZE }
		)
	}

	return value.map((item: unknown, index) => validateQuery(item, `queries[${index}]`))
}

/**
 * Maps a thrown error to an HTTP error payload.
 */
export function handleValidationError(error: unknown): {
	status: number
	error: string
	details?: unknown
} {
	if (error instanceof ValidationError) {
		logger.debug('Validation error:', {
			field: error.field,
			value: error.value,
			context: error.context,
		})
		return {
			status: 400,
			error: error.message,
			details: {
				field: error.field,
				context: error.context,
			},
		}
	}

	return {
		status: 500,
		error: error instanceof Error ? error.message : 'Unknown validation error',
	}
}
