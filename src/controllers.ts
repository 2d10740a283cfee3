/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                            Controllers                                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Request handlers for health, metrics and autocomplete endpoints.
 *
 * Handlers validate input, call the services container, and map failures:
 * validation errors to 400, orchestration errors through
 * {@link handleOrchestrationError}, anything else to 500.
 *
 * @packageDocumentation
 */

import type { Request, RequestHandler, Response } from 'express'
import { createLogger, diagnostic } from './utils/logger.js'
import {
	handleValidationError,
	validateBoundedInteger,
	validateCategories,
	validateCountryCode,
	validateLanguageCode,
	validateQuery,
	validateQueryList,
	ValidationError,
} from './utils/validator.js'
import { handleOrchestrationError, OrchestrationError } from './utils/errors.js'
import { callerIdentity } from './auth.js'
import type { Services } from './services.js'
import type { ExecuteOptions } from './types/core.js'
import type { RateLimitStatus } from './utils/rateLimiter.js'
import type { TierHealth } from './types/cache.js'

/** Logger instance for controllers module */
const logger = createLogger('Controller')

export const SERVICE_NAME = 'upstream-relay'
export const SERVICE_VERSION = '1.0.0'

export interface Controllers {
	healthCheck: RequestHandler
	detailedHealthCheck: RequestHandler
	getInfo: RequestHandler
	getMetrics: RequestHandler
	getSuggestions: RequestHandler
	getVariations: RequestHandler
	postBatch: RequestHandler
}

/**
 * Sends the response for a failed request.
 */
function respondWithError(error: unknown, res: Response): void {
	if (error instanceof ValidationError) {
		const errorResponse = handleValidationError(error)
		diagnostic.debug('Request validation failed', errorResponse)
		res.status(errorResponse.status).json(errorResponse)
		return
	}

	if (error instanceof OrchestrationError) {
		handleOrchestrationError(error, res)
		return
	}

	logger.error('Unhandled error in request handler:', error)
	res.status(500).json({ error: 'Internal Server Error' })
}

/**
 * Sends the caller's quota; the reset is in seconds from now.
 */
function setRateLimitHeaders(res: Response, status: RateLimitStatus): void {
	if (res.headersSent) return
	res.setHeader('X-RateLimit-Limit', String(status.limit))
	res.setHeader('X-RateLimit-Remaining', String(status.remaining))
	res.setHeader('X-RateLimit-Reset', String(Math.ceil(status.resetAfterMs / 1000)))
}

/**
 * Execute options for a request: caller identity, quota headers, and a
 * signal that aborts when the client disconnects before the response is
 * written.
 */
function executeOptions(req: Request, res: Response): ExecuteOptions {
	const controller = new AbortController()
	res.on('close', () => {
		if (!res.writableFinished) {
			controller.abort(new Error('Client disconnected'))
		}
	})
	return {
		identity: callerIdentity(req),
		signal: controller.signal,
		onRateLimit: (status) => setRateLimitHeaders(res, status),
	}
}

function bodyField(body: unknown, name: string): unknown {
	return typeof body === 'object' && body !== null ? Reflect.get(body, name) : undefined
}

const toMb = (bytes: number) => (bytes / 1024 / 1024).toFixed(2)

/**
 * Creates the request handlers bound to a services container.
 */
export function createControllers(services: Services): Controllers {
	const { autocomplete, cache, gate, limiter, orchestrator, transports } = services
	const knownCategories = Object.keys(autocomplete.catalog.categories)

	/**
	 * GET /health
	 * Liveness probe for load balancers.
	 */
	const healthCheck: RequestHandler = (req, res) => {
		res.status(200).json({ status: 'healthy' })
	}

	/**
	 * GET /health/detailed
	 * Cache tiers, upstream pools, limiter and gate.
	 */
	const detailedHealthCheck: RequestHandler = async (req, res) => {
		const startTime = Date.now()
		const cacheStats = cache.getStats()

		const checks: Record<string, TierHealth & Record<string, unknown>> = {
			local_cache: {
				status: 'healthy',
				entries: cacheStats.local.total,
				max_entries: cacheStats.local.maxEntries,
			},
			shared_cache: {
				...(await cache.checkShared()),
				degraded: cacheStats.sharedDegraded,
			},
			rate_limiter: {
				status: limiter.getStats().storeFailures > 0 ? 'unhealthy' : 'healthy',
				store: limiter.getStats().store,
			},
			gate: {
				status: 'healthy',
				active: gate.getStats().active,
				queued: gate.getStats().queued,
			},
		}

		for (const transport of transports.getStats()) {
			checks[`upstream_${transport.name}`] = {
				status: 'healthy',
				origin: transport.origin,
				max_connections: transport.maxConnections,
			}
		}

		const allHealthy = Object.values(checks).every(
			(check) => check.status !== 'unhealthy'
		)

		res.status(allHealthy ? 200 : 503).json({
			status: allHealthy ? 'healthy' : 'degraded',
			checks,
			total_check_time_ms: Date.now() - startTime,
			timestamp: new Date().toISOString(),
		})
	}

	/**
	 * GET /info
	 * Service metadata and uptime.
	 */
	const getInfo: RequestHandler = (req, res) => {
		res.status(200).json({
			name: SERVICE_NAME,
			version: SERVICE_VERSION,
			uptime: Math.floor((Date.now() - services.startedAt) / 1000),
			started: new Date(services.startedAt).toISOString(),
			operations: orchestrator.operations.list().map((policy) => policy.name),
		})
	}

	/**
	 * GET /metrics
	 * Counters of every orchestration component.
	 */
	const getMetrics: RequestHandler = (req, res) => {
		const memory = process.memoryUsage()
		res.status(200).json({
			orchestrator: orchestrator.getStats(),
			cache: cache.getStats(),
			rate_limiter: limiter.getStats(),
			gate: gate.getStats(),
			transports: transports.getStats(),
			memory: {
				heap_used_mb: toMb(memory.heapUsed),
				heap_total_mb: toMb(memory.heapTotal),
				rss_mb: toMb(memory.rss),
			},
			uptime_seconds: Math.floor(process.uptime()),
		})
	}

	/**
	 * GET /autocomplete?q&hl&gl
	 */
	const getSuggestions: RequestHandler = async (req, res) => {
		try {
			const input = {
				q: validateQuery(req.query.q),
				hl: validateLanguageCode(req.query.hl),
				gl: validateCountryCode(req.query.gl),
			}
			const result = await autocomplete.suggest(input, executeOptions(req, res))
			res.status(200).json(result)
		} catch (error) {
			respondWithError(error, res)
		}
	}

	/**
	 * GET /autocomplete/variations?q&hl&gl&categories&maxParallel
	 */
	const getVariations: RequestHandler = async (req, res) => {
		try {
			const input = {
				q: validateQuery(req.query.q),
				hl: validateLanguageCode(req.query.hl),
				gl: validateCountryCode(req.query.gl),
				categories: validateCategories(
					req.query.categories,
					knownCategories,
					autocomplete.catalog.defaultCategories
				),
				maxParallel: validateBoundedInteger(req.query.maxParallel, 'maxParallel', {
					min: 1,
					max: autocomplete.maxParallel,
					defaultValue: autocomplete.maxParallel,
				}),
			}
			const result = await autocomplete.variations(input, executeOptions(req, res))
			res.status(200).json(result)
		} catch (error) {
			respondWithError(error, res)
		}
	}

	/**
	 * POST /autocomplete/batch
	 * Body: `{ queries: string[], hl?, gl? }`
	 */
	const postBatch: RequestHandler = async (req, res) => {
		const body: unknown = req.body
		try {
			const input = {
				queries: validateQueryList(bodyField(body, 'queries')),
				hl: validateLanguageCode(bodyField(body, 'hl')),
				gl: validateCountryCode(bodyField(body, 'gl')),
			}
			const result = await autocomplete.batch(input, executeOptions(req, res))
			res.status(200).json(result)
		} catch (error) {
			respondWithError(error, res)
		}
	}

	return {
		healthCheck,
		detailedHealthCheck,
		getInfo,
		getMetrics,
		getSuggestions,
		getVariations,
		postBatch,
	}
}
