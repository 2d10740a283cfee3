/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Services Container                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Builds every process-wide singleton from the validated configuration:
 * the cache tiers, the rate limiter, the concurrency gate, the transport
 * pools and the orchestrator. Handlers receive the container instead of
 * importing module-level state, and `close()` releases everything.
 *
 * @packageDocumentation
 */

import { createLogger } from './utils/logger.js'
import { LocalCache } from './utils/cache.js'
import { TieredCache } from './utils/tieredCache.js'
import { createSharedRedis, UpstashSharedStore } from './utils/sharedCache.js'
import {
	FixedWindowRateLimiter,
	UpstashRateStore,
	type RateStore,
} from './utils/rateLimiter.js'
import { ConcurrencyGate } from './utils/concurrency.js'
import { createPool, TransportRegistry } from './utils/transport.js'
import { OperationRegistry, Orchestrator } from './orchestrator.js'
import { parseTtlOverrides } from './config/cacheSettings.js'
import { AutocompleteSource } from './sources/autocomplete.js'
import { loadKeywordCatalog, type KeywordCatalog } from './sources/keywords.js'
import type { EnvironmentConfig } from './types/setup.js'
import type { SharedStore } from './types/cache.js'
import type { DispatcherFactory, UpstreamProfile } from './types/transport.js'

const logger = createLogger('Services')

/**
 * Replacements for the parts of the container that reach the network or
 * the filesystem.
 */
export interface ServiceOverrides {
	/** Builds the dispatcher of every upstream pool */
	dispatcherFactory?: DispatcherFactory
	/** Shared cache tier, instead of the Upstash one */
	sharedStore?: SharedStore
	/** Rate limit store, instead of the Upstash one */
	rateStore?: RateStore
	catalog?: KeywordCatalog
	/** Clock of the cache tiers and the limiter */
	now?: () => number
}

export interface Services {
	config: EnvironmentConfig
	cache: TieredCache
	limiter: FixedWindowRateLimiter
	gate: ConcurrencyGate
	transports: TransportRegistry
	orchestrator: Orchestrator
	autocomplete: AutocompleteSource
	/** Epoch milliseconds at which the container was built */
	startedAt: number
	/** Stops the cache prune timer and closes every upstream pool */
	close(): Promise<void>
}

/**
 * Connection settings of the autocomplete upstream.
 */
export function autocompleteProfile(config: EnvironmentConfig): UpstreamProfile {
	return {
		name: 'autocomplete',
		origin: config.AUTOCOMPLETE_BASE_URL,
		maxConnections: config.HTTP_MAX_CONNECTIONS,
		keepAliveTimeoutMs: config.HTTP_KEEPALIVE_TIMEOUT_MS,
		keepAliveMaxTimeoutMs: config.HTTP_KEEPALIVE_MAX_TIMEOUT_MS,
		connectTimeoutMs: config.HTTP_CONNECT_TIMEOUT_MS,
		readTimeoutMs: config.HTTP_READ_TIMEOUT_MS,
		maxRetries: config.HTTP_MAX_RETRIES,
		retryBaseDelayMs: config.HTTP_RETRY_BASE_DELAY_MS,
		defaultHeaders: { 'user-agent': 'upstream-relay' },
	}
}

/**
 * Builds the services container.
 *
 * @param config - Validated environment configuration
 * @param overrides - Test doubles for network-facing parts
 */
export function createServices(
	config: EnvironmentConfig,
	overrides: ServiceOverrides = {}
): Services {
	const now = overrides.now ?? Date.now

	const needsRedis = !overrides.sharedStore || !overrides.rateStore
	const redis = needsRedis
		? createSharedRedis(config.UPSTASH_REDIS_REST_URL, config.UPSTASH_REDIS_REST_TOKEN)
		: undefined

	const cache = new TieredCache({
		local: new LocalCache<unknown>({ maxEntries: config.CACHE_MAX_ENTRIES, now }),
		shared: overrides.sharedStore ?? (redis && new UpstashSharedStore(redis)),
		enabled: config.CACHE_ENABLED,
		sharedRetryMs: config.SHARED_CACHE_RETRY_MS,
		sharedTimeoutMs: config.SHARED_STORE_TIMEOUT_MS,
		now,
	})
	cache.startPruning(config.CACHE_PRUNE_INTERVAL_MS)

	const limiter = new FixedWindowRateLimiter({
		limit: config.RATE_LIMIT_REQUESTS,
		windowMs: config.RATE_LIMIT_WINDOW_MS,
		store: overrides.rateStore ?? (redis && new UpstashRateStore(redis)),
		storeTimeoutMs: config.SHARED_STORE_TIMEOUT_MS,
		enabled: config.RATE_LIMIT_ENABLED,
		now,
	})

	const gate = new ConcurrencyGate({
		maxConcurrency: config.GATE_MAX_CONCURRENCY,
		defaultMaxParallel: config.AUTOCOMPLETE_MAX_PARALLEL,
	})

	const transports = new TransportRegistry(overrides.dispatcherFactory ?? createPool)

	const orchestrator = new Orchestrator({
		cache,
		limiter,
		operations: new OperationRegistry(
			parseTtlOverrides(config.CACHE_TTL_OVERRIDES),
			config.CACHE_TTL_MS
		),
		defaultTimeoutMs: config.REQUEST_TIMEOUT_MS,
	})

	const autocomplete = new AutocompleteSource({
		orchestrator,
		transport: transports.getTransport(autocompleteProfile(config)),
		gate,
		catalog: overrides.catalog ?? loadKeywordCatalog(),
		maxParallel: config.AUTOCOMPLETE_MAX_PARALLEL,
	})

	logger.debug('Services ready', {
		cacheEnabled: config.CACHE_ENABLED,
		sharedTier: cache.getStats().sharedConfigured,
		rateLimitEnabled: config.RATE_LIMIT_ENABLED,
		operations: orchestrator.operations.list().map((policy) => policy.name),
	})

	return {
		config,
		cache,
		limiter,
		gate,
		transports,
		orchestrator,
		autocomplete,
		startedAt: now(),
		close: async () => {
			cache.stopPruning()
			await transports.closeAll()
		},
	}
}
