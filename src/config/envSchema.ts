/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                    Environment Variable Schema                            ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Defines the schema for all environment variables read by the relay.
 * This schema is used to validate configuration at startup.
 *
 * @packageDocumentation
 */

import type { EnvVariable } from '../types/setup.js'

function integerAtLeast(min: number) {
	return (value: string): boolean | string => {
		if (!/^\d+$/.test(value.trim())) {
			return 'Must be an integer'
		}
		return parseInt(value) >= min || `Must be at least ${min}`
	}
}

const toInt = (value: string) => parseInt(value)

/** Anything other than 'false' enables the flag. */
const toBoolean = (value: string) => value.toLowerCase() !== 'false'

const isBooleanString = (value: string) =>
	['true', 'false'].includes(value.toLowerCase()) || "Must be 'true' or 'false'"

const isHttpUrl = (value: string) => {
	try {
		const url = new URL(value)
		return (
			url.protocol === 'http:' ||
			url.protocol === 'https:' ||
			'Must be an http(s) URL'
		)
	} catch {
		return 'Must be a valid URL'
	}
}

/**
 * Environment variable schema defining all configuration requirements.
 * Each entry describes a variable's validation rules, transformations, and metadata.
 */
export const envSchema: EnvVariable[] = [
	{
		name: 'PORT',
		required: false,
		type: 'number',
		description: 'Port for the HTTP server',
		defaultValue: 8000,
		validator: (value) => {
			const port = parseInt(value)
			if (isNaN(port) || port < 1 || port > 65535) {
				return 'Port must be a number between 1 and 65535'
			}
			return true
		},
		transformer: toInt,
	},
	{
		name: 'LOG_LEVEL',
		required: false,
		type: 'number',
		description: 'Log verbosity, 0 (silly) to 6 (fatal)',
		defaultValue: 3,
		validator: (value) => {
			const level = parseInt(value)
			if (isNaN(level) || level < 0 || level > 6) {
				return 'Log level must be between 0 and 6'
			}
			return true
		},
		transformer: toInt,
	},
	{
		name: 'DIAGNOSTIC_LOGGER',
		required: false,
		type: 'boolean',
		description: 'Enable JSON diagnostic logging with source locations',
		defaultValue: false,
		validator: isBooleanString,
		transformer: (value) => value.toLowerCase() === 'true',
	},
	{
		name: 'API_KEYS',
		required: false,
		type: 'list',
		description: 'Comma-separated API keys accepted on protected endpoints',
		defaultValue: [],
		sensitive: true,
		transformer: (value) =>
			value
				.split(',')
				.map((key) => key.trim())
				.filter((key) => key.length > 0),
	},
	{
		name: 'ENABLE_API_KEY_AUTH',
		required: false,
		type: 'boolean',
		description: 'Require an API key on protected endpoints',
		defaultValue: true,
		validator: isBooleanString,
		transformer: toBoolean,
	},
	{
		name: 'RATE_LIMIT_ENABLED',
		required: false,
		type: 'boolean',
		description: 'Enable per-caller rate limiting and the per-IP guard',
		defaultValue: true,
		validator: isBooleanString,
		transformer: toBoolean,
	},
	{
		name: 'RATE_LIMIT_REQUESTS',
		required: false,
		type: 'number',
		description: 'Requests allowed per caller per window',
		defaultValue: 100,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'RATE_LIMIT_WINDOW_MS',
		required: false,
		type: 'number',
		description: 'Rate limit window in milliseconds',
		defaultValue: 3600000,
		validator: integerAtLeast(1000),
		transformer: toInt,
	},
	{
		name: 'RATE_LIMIT_IP_MAX',
		required: false,
		type: 'number',
		description: 'Requests allowed per IP address per window (coarse guard)',
		defaultValue: 1000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'CACHE_ENABLED',
		required: false,
		type: 'boolean',
		description: 'Cache upstream responses',
		defaultValue: true,
		validator: isBooleanString,
		transformer: toBoolean,
	},
	{
		name: 'CACHE_TTL_MS',
		required: false,
		type: 'number',
		description: 'Fallback cache TTL in milliseconds',
		defaultValue: 3600000,
		validator: integerAtLeast(0),
		transformer: toInt,
	},
	{
		name: 'CACHE_MAX_ENTRIES',
		required: false,
		type: 'number',
		description: 'Maximum entries in the local cache tier',
		defaultValue: 1000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'CACHE_TTL_OVERRIDES',
		required: false,
		type: 'string',
		description:
			'Per-operation TTLs as "operation=ms" pairs, e.g. "autocomplete=600000"',
		defaultValue: '',
		validator: (value) =>
			value
				.split(',')
				.map((pair) => pair.trim())
				.filter((pair) => pair.length > 0)
				.every((pair) => /^[\w.-]+=\d+$/.test(pair)) ||
			'Each entry must look like operation=milliseconds',
	},
	{
		name: 'SHARED_CACHE_RETRY_MS',
		required: false,
		type: 'number',
		description: 'How long the shared cache tier is skipped after a failure',
		defaultValue: 30000,
		validator: integerAtLeast(0),
		transformer: toInt,
	},
	{
		name: 'SHARED_STORE_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Deadline for one call to the shared cache or rate limit store',
		defaultValue: 250,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'CACHE_PRUNE_INTERVAL_MS',
		required: false,
		type: 'number',
		description: 'How often expired local cache entries are dropped, 0 to disable',
		defaultValue: 60000,
		validator: integerAtLeast(0),
		transformer: toInt,
	},
	{
		name: 'UPSTASH_REDIS_REST_URL',
		required: false,
		type: 'url',
		description: 'REST URL of the shared cache and rate limit store',
		defaultValue: '',
		sensitive: true,
		validator: isHttpUrl,
	},
	{
		name: 'UPSTASH_REDIS_REST_TOKEN',
		required: false,
		type: 'string',
		description: 'REST token of the shared cache and rate limit store',
		defaultValue: '',
		sensitive: true,
	},
	{
		name: 'HTTP_MAX_CONNECTIONS',
		required: false,
		type: 'number',
		description: 'Maximum open connections per upstream pool',
		defaultValue: 20,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'HTTP_KEEPALIVE_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Idle keep-alive timeout for pooled connections',
		defaultValue: 30000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'HTTP_KEEPALIVE_MAX_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Upper bound on the keep-alive timeout a server may advertise',
		defaultValue: 600000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'HTTP_CONNECT_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Connect timeout for upstream connections',
		defaultValue: 10000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'HTTP_READ_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Timeout waiting for upstream response headers and body',
		defaultValue: 30000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'HTTP_MAX_RETRIES',
		required: false,
		type: 'number',
		description: 'Extra attempts for transient upstream failures',
		defaultValue: 2,
		validator: integerAtLeast(0),
		transformer: toInt,
	},
	{
		name: 'HTTP_RETRY_BASE_DELAY_MS',
		required: false,
		type: 'number',
		description: 'Base delay for exponential retry backoff',
		defaultValue: 250,
		validator: integerAtLeast(0),
		transformer: toInt,
	},
	{
		name: 'REQUEST_TIMEOUT_MS',
		required: false,
		type: 'number',
		description: 'Deadline for a single orchestrated call',
		defaultValue: 30000,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'GATE_MAX_CONCURRENCY',
		required: false,
		type: 'number',
		description: 'Ceiling on fan-out tasks running across all batches',
		defaultValue: 50,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'AUTOCOMPLETE_MAX_PARALLEL',
		required: false,
		type: 'number',
		description: 'Parallel sub-requests per autocomplete fan-out',
		defaultValue: 10,
		validator: integerAtLeast(1),
		transformer: toInt,
	},
	{
		name: 'AUTOCOMPLETE_BASE_URL',
		required: false,
		type: 'url',
		description: 'Origin of the autocomplete upstream',
		defaultValue: 'https://suggestqueries.google.com',
		validator: isHttpUrl,
	},
]
