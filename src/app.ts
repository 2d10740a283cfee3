/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Express Application Factory                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Creates and configures the Express application with all middleware and routes.
 * Separated from index.ts to enable testing without starting the server.
 *
 * @packageDocumentation
 */

import express from 'express'
import bppkg from 'body-parser'
import { logger, logAvailableEndpoints } from './utils/logger.js'
import { createRouteMounts } from './routes.js'
import { createControllers } from './controllers.js'
import { diagnosticLogger } from './middleware/diagnostic.js'
import { createIpRateLimiter } from './middleware/rateLimit.js'
import { createApiKeyAuth, isPublicPath } from './auth.js'
import type { Services } from './services.js'

const { json } = bppkg

/**
 * Creates and configures the Express application.
 *
 * Sets up:
 * - JSON body parsing
 * - Diagnostic logging
 * - Per-IP rate limiting
 * - API key authentication
 * - Route handlers
 *
 * @param services - Services container the handlers run against
 * @returns Configured Express application instance
 * @public
 */
export function createApp(services: Services): express.Application {
	const { config } = services
	const app = express()

	// Parse JSON request bodies
	app.use(json({ limit: '100kb' }))

	// Diagnostic logging for all requests/responses
	app.use(diagnosticLogger)

	// Coarse per-IP guard, ahead of auth
	app.use(
		createIpRateLimiter({
			enabled: config.RATE_LIMIT_ENABLED,
			max: config.RATE_LIMIT_IP_MAX,
			windowMs: config.RATE_LIMIT_WINDOW_MS,
		})
	)

	app.use(
		createApiKeyAuth({
			keys: config.API_KEYS,
			enabled: config.ENABLE_API_KEY_AUTH,
		})
	)

	// Mount route handlers
	const routeMounts = createRouteMounts(createControllers(services))
	logger.debug('Mounting route handlers')
	for (const { basePath, router } of routeMounts) {
		app.use(basePath, router)
	}
	logger.debug('All routes mounted successfully')

	// Log available endpoints in debug mode
	logAvailableEndpoints(
		routeMounts,
		(path) => config.ENABLE_API_KEY_AUTH && !isPublicPath(path)
	)

	return app
}
