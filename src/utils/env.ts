/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                     Environment Configuration Utilities                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Provides utilities for validating, caching, and accessing environment
 * configuration. Ensures all required variables are present and valid at
 * startup, with cached access throughout the application lifecycle.
 *
 * @packageDocumentation
 */

import dotenv from 'dotenv'
import { logger, LogLevel } from './logger.js'
import { envSchema } from '../config/envSchema.js'
import type {
	EnvValidationResult,
	EnvironmentConfig,
	EnvValue,
} from '../types/setup.js'

/**
 * Obfuscates sensitive values based on the current log level.
 * Uses process.env.LOG_LEVEL directly to avoid circular dependency during validation.
 *
 * - SILLY (0): Shows full unobfuscated value
 * - TRACE/DEBUG (1-2): Shows partial obfuscation (last 4 chars)
 * - INFO and above (3+): Shows full obfuscation
 *
 * @param value - The sensitive value to obfuscate
 * @param isSensitive - Whether the value is marked as sensitive
 * @returns The obfuscated or original value based on log level
 * @public
 */
export function obfuscateSensitiveValue(
	value: string,
	isSensitive: boolean
): string {
	if (!isSensitive) {
		return value
	}

	// Runs during env validation, before getEnvConfig() is available
	const logLevel = parseInt(process.env.LOG_LEVEL || String(LogLevel.INFO))

	if (logLevel === LogLevel.SILLY) {
		return value
	} else if (logLevel <= LogLevel.DEBUG) {
		return '***' + value.slice(-4)
	} else {
		return '********'
	}
}

/**
 * Validates all environment variables against the schema.
 * @param env - Source of raw values, process.env by default
 * @returns Validation result containing errors and processed config
 */
export function validateEnv(
	env: NodeJS.ProcessEnv = process.env
): EnvValidationResult {
	const errors: EnvValidationResult['errors'] = []
	const config: EnvValidationResult['config'] = {}

	logger.info('🔍 Validating environment configuration...')

	for (const envVar of envSchema) {
		const value = env[envVar.name]
		const displayName = envVar.sensitive
			? `${envVar.name} (sensitive)`
			: envVar.name

		if (!value && envVar.required) {
			errors.push({
				variable: envVar.name,
				error: 'Missing required environment variable',
				description: envVar.description,
			})
			logger.error(`✗ ${displayName}: Missing`)
			continue
		}

		if (!value) {
			config[envVar.name] = envVar.defaultValue
			logger.debug(
				`○ ${displayName}: Using default (${String(envVar.defaultValue)})`
			)
			continue
		}

		if (envVar.validator) {
			const validationResult = envVar.validator(value)
			if (validationResult !== true) {
				const message =
					typeof validationResult === 'string'
						? validationResult
						: 'Invalid value'
				errors.push({
					variable: envVar.name,
					error: message,
					description: envVar.description,
				})
				logger.error(`✗ ${displayName}: ${message}`)
				continue
			}
		}

		const transformed = envVar.transformer ? envVar.transformer(value) : value
		config[envVar.name] = transformed

		const displayValue = obfuscateSensitiveValue(
			String(transformed),
			envVar.sensitive || false
		)
		logger.info(`✓ ${displayName}: ${displayValue}`)
	}

	return {
		valid: errors.length === 0,
		errors,
		config,
	}
}

function readNumber(
	values: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): number {
	const value: EnvValue | undefined = values[name]
	if (typeof value !== 'number') {
		throw new Error(`Environment variable ${name} did not resolve to a number`)
	}
	return value
}

function readBoolean(
	values: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): boolean {
	const value = values[name]
	if (typeof value !== 'boolean') {
		throw new Error(`Environment variable ${name} did not resolve to a boolean`)
	}
	return value
}

function readString(
	values: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): string {
	const value = values[name]
	if (typeof value !== 'string') {
		throw new Error(`Environment variable ${name} did not resolve to a string`)
	}
	return value
}

function readList(
	values: EnvValidationResult['config'],
	name: keyof EnvironmentConfig
): string[] {
	const value = values[name]
	if (!Array.isArray(value)) {
		throw new Error(`Environment variable ${name} did not resolve to a list`)
	}
	return value
}

/**
 * Builds the typed configuration from validated values.
 * @param values - The `config` of a successful {@link validateEnv} result
 * @returns Strongly-typed environment configuration
 */
export function toEnvironmentConfig(
	values: EnvValidationResult['config']
): EnvironmentConfig {
	return {
		PORT: readNumber(values, 'PORT'),
		LOG_LEVEL: readNumber(values, 'LOG_LEVEL'),
		DIAGNOSTIC_LOGGER: readBoolean(values, 'DIAGNOSTIC_LOGGER'),
		API_KEYS: readList(values, 'API_KEYS'),
		ENABLE_API_KEY_AUTH: readBoolean(values, 'ENABLE_API_KEY_AUTH'),
		RATE_LIMIT_ENABLED: readBoolean(values, 'RATE_LIMIT_ENABLED'),
		RATE_LIMIT_REQUESTS: readNumber(values, 'RATE_LIMIT_REQUESTS'),
		RATE_LIMIT_WINDOW_MS: readNumber(values, 'RATE_LIMIT_WINDOW_MS'),
		RATE_LIMIT_IP_MAX: readNumber(values, 'RATE_LIMIT_IP_MAX'),
		CACHE_ENABLED: readBoolean(values, 'CACHE_ENABLED'),
		CACHE_TTL_MS: readNumber(values, 'CACHE_TTL_MS'),
		CACHE_MAX_ENTRIES: readNumber(values, 'CACHE_MAX_ENTRIES'),
		CACHE_TTL_OVERRIDES: readString(values, 'CACHE_TTL_OVERRIDES'),
		SHARED_CACHE_RETRY_MS: readNumber(values, 'SHARED_CACHE_RETRY_MS'),
		SHARED_STORE_TIMEOUT_MS: readNumber(values, 'SHARED_STORE_TIMEOUT_MS'),
		CACHE_PRUNE_INTERVAL_MS: readNumber(values, 'CACHE_PRUNE_INTERVAL_MS'),
		UPSTASH_REDIS_REST_URL: readString(values, 'UPSTASH_REDIS_REST_URL'),
		UPSTASH_REDIS_REST_TOKEN: readString(values, 'UPSTASH_REDIS_REST_TOKEN'),
		HTTP_MAX_CONNECTIONS: readNumber(values, 'HTTP_MAX_CONNECTIONS'),
		HTTP_KEEPALIVE_TIMEOUT_MS: readNumber(values, 'HTTP_KEEPALIVE_TIMEOUT_MS'),
		HTTP_KEEPALIVE_MAX_TIMEOUT_MS: readNumber(
			values,
			'HTTP_KEEPALIVE_MAX_TIMEOUT_MS'
		),
		HTTP_CONNECT_TIMEOUT_MS: readNumber(values, 'HTTP_CONNECT_TIMEOUT_MS'),
		HTTP_READ_TIMEOUT_MS: readNumber(values, 'HTTP_READ_TIMEOUT_MS'),
		HTTP_MAX_RETRIES: readNumber(values, 'HTTP_MAX_RETRIES'),
		HTTP_RETRY_BASE_DELAY_MS: readNumber(values, 'HTTP_RETRY_BASE_DELAY_MS'),
		REQUEST_TIMEOUT_MS: readNumber(values, 'REQUEST_TIMEOUT_MS'),
		GATE_MAX_CONCURRENCY: readNumber(values, 'GATE_MAX_CONCURRENCY'),
		AUTOCOMPLETE_MAX_PARALLEL: readNumber(values, 'AUTOCOMPLETE_MAX_PARALLEL'),
		AUTOCOMPLETE_BASE_URL: readString(values, 'AUTOCOMPLETE_BASE_URL'),
	}
}

/**
 * Prints a formatted validation report to the console.
 * @param result - The validation result to display
 */
export function printEnvValidationReport(result: EnvValidationResult): void {
	const separator = '═'.repeat(60)

	if (result.errors.length > 0) {
		const errorDetails = result.errors
			.map(
				(error) =>
					`  • ${error.variable}:\n    Error: ${error.error}\n    Description: ${error.description}`
			)
			.join('\n\n')

		const errorMessage = `❌ Environment Validation Failed\n${separator}\nFound ${result.errors.length} error(s):\n\n${errorDetails}\n${separator}`
		logger.fatal(errorMessage)

		logger.warn('Please fix the errors above and restart the application.')
	} else {
		const successMessage = `✅ Environment configuration is valid!\n${separator}\nStarting application...`
		logger.info(successMessage)
	}
}

// Cache for validated configuration
let cachedConfig: EnvironmentConfig | null = null

/**
 * Sets the validated configuration cache.
 * Called by index.ts after successful validation.
 * @param config - The validated environment configuration
 */
export function setEnvConfigCache(config: EnvironmentConfig | null): void {
	cachedConfig = config
}

/**
 * Returns the cached environment configuration.
 * Validates as fallback if not already cached (with warning).
 * Exits the process if validation fails.
 * @returns Validated environment configuration
 */
export function getEnvConfig(): EnvironmentConfig {
	if (cachedConfig) {
		return cachedConfig
	}

	logger.warn(
		'⚠️  getEnvConfig() called before environment validation completed in index.ts'
	)
	logger.warn(
		'Running fallback validation - this may indicate an initialization order issue'
	)

	const result = validateEnv()
	if (!result.valid) {
		printEnvValidationReport(result)
		process.exit(1)
	}

	cachedConfig = toEnvironmentConfig(result.config)
	return cachedConfig
}

/**
 * Sets up and validates the environment configuration.
 * Loads .env file, validates all variables, and caches the config.
 * @returns Validated environment configuration
 */
export function setupEnvironment(): EnvironmentConfig {
	dotenv.config()

	const result = validateEnv()
	printEnvValidationReport(result)

	if (!result.valid) {
		process.exit(1)
	}

	const config = toEnvironmentConfig(result.config)
	setEnvConfigCache(config)
	return config
}
