/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Error Taxonomy                                   ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Typed errors raised by the orchestration core and the transport, plus the
 * mapping from orchestration failures to HTTP responses.
 *
 * Callers of `Orchestrator.execute` only ever see {@link OrchestrationError}
 * subclasses. The remaining classes stay internal to the layer that raises
 * them: the tiered cache absorbs {@link CacheTierUnavailableError}, and
 * transport errors are wrapped in {@link UpstreamError}.
 *
 * @packageDocumentation
 */

import type { Response } from 'express'
import { createLogger } from './logger.js'

const logger = createLogger('Errors')

/** Discriminant of the orchestration failure variants. */
export type OrchestrationErrorKind = 'rate_limited' | 'upstream' | 'timeout'

/**
 * Base class of every failure `Orchestrator.execute` can reject with.
 */
export abstract class OrchestrationError extends Error {
	abstract readonly kind: OrchestrationErrorKind

	constructor(
		message: string,
		public readonly operation: string,
		options?: { cause?: unknown }
	) {
		super(message, options)
	}
}

/**
 * The caller, or the upstream itself, exceeded its request budget.
 */
export class RateLimitedError extends OrchestrationError {
	readonly kind = 'rate_limited'

	constructor(
		operation: string,
		public readonly retryAfterMs: number,
		public readonly source: 'caller' | 'upstream' = 'caller',
		options?: { cause?: unknown }
	) {
		super(
			`Rate limit exceeded for ${operation}; retry after ${retryAfterMs}ms`,
			operation,
			options
		)
		this.name = 'RateLimitedError'
	}
}

/**
 * The fetch function failed for any reason other than a deadline.
 */
export class UpstreamError extends OrchestrationError {
	readonly kind = 'upstream'

	constructor(operation: string, cause: unknown) {
		super(
			`Upstream call for ${operation} failed: ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			operation,
			{ cause }
		)
		this.name = 'UpstreamError'
	}

	/** HTTP status reported by the upstream, when the failure carried one. */
	get upstreamStatus(): number | undefined {
		return this.cause instanceof TransportError ? this.cause.status : undefined
	}
}

/**
 * The orchestrated call did not settle before its deadline.
 */
export class OperationTimeoutError extends OrchestrationError {
	readonly kind = 'timeout'

	constructor(
		operation: string,
		public readonly timeoutMs: number
	) {
		super(`${operation} did not complete within ${timeoutMs}ms`, operation)
		this.name = 'OperationTimeoutError'
	}
}

/**
 * The shared cache tier could not be reached. Never escapes the cache.
 */
export class CacheTierUnavailableError extends Error {
	constructor(
		public readonly tier: string,
		cause: unknown
	) {
		super(
			`Cache tier ${tier} unavailable: ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			{ cause }
		)
		this.name = 'CacheTierUnavailableError'
	}
}

/**
 * A params record could not be turned into a cache key.
 */
export class CacheKeyError extends Error {
	constructor(
		message: string,
		public readonly param: string
	) {
		super(message)
		this.name = 'CacheKeyError'
	}
}

/**
 * An upstream request failed after the transport gave up on it.
 */
export class TransportError extends Error {
	constructor(
		message: string,
		public readonly upstream: string,
		public readonly status?: number,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'TransportError'
	}
}

/**
 * The upstream answered 429. Never retried by the transport.
 */
export class UpstreamRateLimitedError extends TransportError {
	constructor(
		upstream: string,
		public readonly retryAfterMs: number | undefined
	) {
		super(`Upstream ${upstream} responded 429`, upstream, 429)
		this.name = 'UpstreamRateLimitedError'
	}
}

/**
 * Sends the HTTP response matching an orchestration failure.
 *
 * - RateLimitedError: 429 with a Retry-After header in whole seconds
 * - OperationTimeoutError: 504
 * - UpstreamError: 502
 *
 * @param error - The failure raised by `Orchestrator.execute`
 * @param res - Express response
 */
export function handleOrchestrationError(
	error: OrchestrationError,
	res: Response
): void {
	switch (error.kind) {
		case 'rate_limited': {
			const retryAfter =
				error instanceof RateLimitedError
					? Math.ceil(error.retryAfterMs / 1000)
					: 0
			res.setHeader('Retry-After', String(retryAfter))
			res.status(429).json({
				error: 'Too many requests',
				message: error.message,
				retryAfter,
			})
			return
		}
		case 'timeout':
			logger.warn(error.message)
			res.status(504).json({ error: 'Gateway Timeout', message: error.message })
			return
		case 'upstream':
			logger.error(error.message)
			res.status(502).json({ error: 'Bad Gateway', message: error.message })
			return
	}
}
