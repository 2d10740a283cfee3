/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Rate Limiting Middleware                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Coarse per-IP guard in front of every endpoint. It runs before API key
 * auth, so unauthenticated floods are turned away early. The per-caller
 * limit that protects upstream quota lives in the orchestrator.
 *
 * Features:
 * - In-memory store, per process
 * - IPv6 addresses grouped by subnet through `ipKeyGenerator`
 * - Standards-compliant RateLimit-* headers
 * - Global enable/disable via environment variable
 *
 * @packageDocumentation
 */

import rateLimit, { ipKeyGenerator } from 'express-rate-limit'
import type { Request, RequestHandler } from 'express'
import { logger } from '../utils/logger.js'

/**
 * IP guard configuration
 * @public
 */
export interface IpRateLimitConfig {
	enabled: boolean
	/** Requests per IP per window */
	max: number
	windowMs: number
}

/**
 * Rate limit key of a request: its client IP, IPv6-safe.
 * @internal
 */
function generateRateLimitKey(req: Request): string {
	const ip = req.ip || req.socket.remoteAddress || 'unknown'
	return `ip:${ipKeyGenerator(ip)}`
}

/**
 * Creates the per-IP guard.
 *
 * @example
 * ```typescript
 * app.use(createIpRateLimiter({ enabled: true, max: 1000, windowMs: 3600000 }))
 * ```
 *
 * @public
 */
export function createIpRateLimiter(config: IpRateLimitConfig): RequestHandler {
	if (!config.enabled) {
		logger.info('⚠️  Rate limiting is disabled (RATE_LIMIT_ENABLED=false)')
		const passThrough: RequestHandler = (req, res, next) => next()
		return passThrough
	}

	const { max, windowMs } = config

	logger.debug(`IP rate limiter created: ${max} requests per ${windowMs}ms`)

	return rateLimit({
		windowMs,
		limit: max,
		standardHeaders: true,
		legacyHeaders: false,
		keyGenerator: generateRateLimitKey,
		handler: (req, res) => {
			logger.warn('IP rate limit exceeded', {
				key: generateRateLimitKey(req),
				path: req.path,
				method: req.method,
			})
			res.status(429).json({
				error: 'Too many requests',
				message: 'Rate limit exceeded. Please try again later.',
				retryAfter: Math.ceil(windowMs / 1000),
			})
		},
	})
}
