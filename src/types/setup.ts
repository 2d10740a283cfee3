/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                       Service Setup Type Definitions                      ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for service setup and configuration.
 * Includes environment validation, configuration schemas, and initialization types.
 *
 * @packageDocumentation
 */

/** Value an environment variable holds after transformation. */
export type EnvValue = string | number | boolean | string[]

/**
 * Defines the schema for an environment variable.
 * Used to validate and transform environment configuration at startup.
 */
export interface EnvVariable {
	/** The environment variable name (e.g., 'PORT') */
	name: keyof EnvironmentConfig
	/** Whether this variable is required for the service to function */
	required: boolean
	/** The expected data type of the variable */
	type: 'string' | 'number' | 'boolean' | 'url' | 'list'
	/** Human-readable description of what this variable configures */
	description: string
	/** Optional validation function that returns true or an error message */
	validator?: (value: string) => boolean | string
	/** Optional transformer to convert the string value to the appropriate type */
	transformer?: (value: string) => EnvValue
	/** Default value if the environment variable is not set (only for optional vars) */
	defaultValue?: EnvValue
	/** Whether this value should be masked in logs (e.g., API keys, tokens) */
	sensitive?: boolean
}

/**
 * Result of environment validation process.
 * Contains validation status, errors, and the processed configuration.
 */
export interface EnvValidationResult {
	/** Whether all required environment variables passed validation */
	valid: boolean
	/** List of validation errors that must be fixed before startup */
	errors: Array<{
		/** The environment variable that failed validation */
		variable: string
		/** The specific error that occurred */
		error: string
		/** Description of what this variable is used for */
		description: string
	}>
	/** The validated and transformed values, keyed by variable name */
	config: Partial<Record<keyof EnvironmentConfig, EnvValue>>
}

/**
 * Strongly-typed environment configuration after validation.
 * All values are guaranteed to exist and be the correct type.
 */
export interface EnvironmentConfig {
	/** Port number for the Express server (default: 8000) */
	PORT: number
	/** Logging verbosity level 0-6 (default: 3/info) */
	LOG_LEVEL: number
	/** Whether to enable detailed diagnostic logging (default: false) */
	DIAGNOSTIC_LOGGER: boolean
	/** Accepted API keys */
	API_KEYS: string[]
	/** Whether protected endpoints require an API key (default: true) */
	ENABLE_API_KEY_AUTH: boolean
	/** Whether the per-caller limiter and IP guard are active (default: true) */
	RATE_LIMIT_ENABLED: boolean
	/** Requests allowed per caller per window (default: 100) */
	RATE_LIMIT_REQUESTS: number
	/** Rate limit window in milliseconds (default: 1 hour) */
	RATE_LIMIT_WINDOW_MS: number
	/** Requests allowed per IP per window by the coarse guard (default: 1000) */
	RATE_LIMIT_IP_MAX: number
	/** Whether responses are cached (default: true) */
	CACHE_ENABLED: boolean
	/** Fallback TTL for operations without a configured one (default: 1 hour) */
	CACHE_TTL_MS: number
	/** Maximum entries held by the local cache tier (default: 1000) */
	CACHE_MAX_ENTRIES: number
	/** Per-operation TTL overrides, "operation=ms" pairs separated by commas */
	CACHE_TTL_OVERRIDES: string
	/** How long the shared tier is skipped after a failure (default: 30s) */
	SHARED_CACHE_RETRY_MS: number
	/** Deadline for one shared store call in milliseconds (default: 250) */
	SHARED_STORE_TIMEOUT_MS: number
	/** Interval of the local tier prune, 0 disables it (default: 1 min) */
	CACHE_PRUNE_INTERVAL_MS: number
	/** REST URL of the shared key/value store (optional) */
	UPSTASH_REDIS_REST_URL: string
	/** REST token of the shared key/value store (optional) */
	UPSTASH_REDIS_REST_TOKEN: string
	/** Connections per upstream pool (default: 20) */
	HTTP_MAX_CONNECTIONS: number
	/** Idle keep-alive timeout in milliseconds (default: 30s) */
	HTTP_KEEPALIVE_TIMEOUT_MS: number
	/** Upper bound on server-advertised keep-alive in milliseconds (default: 10min) */
	HTTP_KEEPALIVE_MAX_TIMEOUT_MS: number
	/** TCP/TLS connect timeout in milliseconds (default: 10s) */
	HTTP_CONNECT_TIMEOUT_MS: number
	/** Response headers and body timeout in milliseconds (default: 30s) */
	HTTP_READ_TIMEOUT_MS: number
	/** Extra attempts for transient upstream failures (default: 2) */
	HTTP_MAX_RETRIES: number
	/** Base delay for exponential retry backoff in milliseconds (default: 250) */
	HTTP_RETRY_BASE_DELAY_MS: number
	/** Deadline for one orchestrated call in milliseconds (default: 30s) */
	REQUEST_TIMEOUT_MS: number
	/** Ceiling on fan-out tasks running across all batches (default: 50) */
	GATE_MAX_CONCURRENCY: number
	/** Parallel sub-requests per autocomplete fan-out (default: 10) */
	AUTOCOMPLETE_MAX_PARALLEL: number
	/** Origin of the autocomplete upstream */
	AUTOCOMPLETE_BASE_URL: string
}
