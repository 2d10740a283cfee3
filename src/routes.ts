/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                            Route Handlers                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Express routers for every API endpoint.
 *
 * Route groups:
 * - /health - Liveness and detailed health
 * - /info - Service metadata
 * - /metrics - Orchestration counters
 * - /autocomplete - Suggestions, variations and batch lookups
 *
 * Note: everything except /health and /info sits behind API key auth,
 * applied globally in app.ts.
 *
 * @packageDocumentation
 */

import { Router } from 'express'
import type { RouteMount } from './types/routes.js'
import type { Controllers } from './controllers.js'

/**
 * Route mount configuration
 *
 * Single source of truth for all route mounts. Used by:
 * - app.ts to mount routes on the Express app
 * - logger.ts to display available endpoints
 *
 * @public
 */
export function createRouteMounts(controllers: Controllers): RouteMount[] {
	return [
		{
			basePath: '/health',
			router: Router()
				.get('/', controllers.healthCheck)
				.get('/detailed', controllers.detailedHealthCheck),
		},
		{
			basePath: '/info',
			router: Router().get('/', controllers.getInfo),
		},
		{
			basePath: '/metrics',
			router: Router().get('/', controllers.getMetrics),
		},
		{
			basePath: '/autocomplete',
			router: Router()
				.get('/', controllers.getSuggestions)
				.get('/variations', controllers.getVariations)
				.post('/batch', controllers.postBatch),
		},
	]
}
