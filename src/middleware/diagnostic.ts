/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                      Diagnostic Logging Middleware                        ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Middleware for diagnostic logging of HTTP requests and responses.
 * Tracks request metadata, timing, and response status for debugging.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto'
import type { Request, Response, NextFunction } from 'express'
import type { IncomingHttpHeaders } from 'node:http'
import { diagnostic } from '../utils/logger.js'

/** Headers carrying credentials, never logged verbatim. */
const REDACTED_HEADERS: ReadonlySet<string> = new Set([
	'authorization',
	'x-api-key',
	'cookie',
])

/**
 * Copy of the request headers with credentials replaced by `[redacted]`.
 */
export function redactHeaders(
	headers: IncomingHttpHeaders
): Record<string, string | string[] | undefined> {
	const redacted: Record<string, string | string[] | undefined> = {}
	for (const [name, value] of Object.entries(headers)) {
		redacted[name] = REDACTED_HEADERS.has(name) ? '[redacted]' : value
	}
	return redacted
}

/**
 * Diagnostic logging middleware for all HTTP requests.
 * Logs request details on receipt and response details on completion.
 */
export function diagnosticLogger(
	req: Request,
	res: Response,
	next: NextFunction
): void {
	const startTime = Date.now()
	const requestId = randomUUID().substring(0, 8)

	diagnostic.trace('HTTP request received', {
		requestId,
		method: req.method,
		path: req.path,
		query: req.query,
		headers: redactHeaders(req.headers),
		bodySize: req.body ? JSON.stringify(req.body).length : 0,
	})

	// Capture response on finish
	res.on('finish', () => {
		diagnostic.debug('HTTP response sent', {
			requestId,
			method: req.method,
			path: req.path,
			statusCode: res.statusCode,
			responseTime: Date.now() - startTime,
		})
	})

	next()
}
