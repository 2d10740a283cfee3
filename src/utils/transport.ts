/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                         Pooled HTTP Transport                             ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Reusable outbound HTTP clients built on undici connection pools.
 *
 * - One pool per upstream profile, created on first use by the registry
 * - Keep-alive, connect and read timeouts per profile
 * - Retries transient network errors and 5xx with exponential backoff
 * - 429 is surfaced as UpstreamRateLimitedError and never retried
 * - Caller aborts reach the in-flight request and any backoff sleep
 *
 * @packageDocumentation
 */

import { setTimeout as sleep } from 'node:timers/promises'
import { Pool, type Dispatcher } from 'undici'
import { createLogger, diagnostic } from './logger.js'
import { TransportError, UpstreamRateLimitedError } from './errors.js'
import type {
	DispatcherFactory,
	TransportRequest,
	TransportResponse,
	TransportStats,
	UpstreamProfile,
} from '../types/transport.js'

const logger = createLogger('Transport')

/** Network error codes worth another attempt. */
export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
	'UND_ERR_SOCKET',
	'UND_ERR_CONNECT_TIMEOUT',
	'UND_ERR_HEADERS_TIMEOUT',
	'UND_ERR_BODY_TIMEOUT',
	'ECONNRESET',
	'ECONNREFUSED',
	'ETIMEDOUT',
	'EPIPE',
	'EAI_AGAIN',
])

/**
 * Returns true for network failures that a retry may fix.
 */
export function isTransientError(error: unknown): boolean {
	return (
		error instanceof Error &&
		'code' in error &&
		typeof error.code === 'string' &&
		TRANSIENT_ERROR_CODES.has(error.code)
	)
}

/**
 * Parses a Retry-After header, given in seconds or as an HTTP date.
 * @returns Delay in milliseconds, or undefined when absent or unparseable
 */
export function parseRetryAfter(
	header: string | string[] | undefined,
	now: number = Date.now()
): number | undefined {
	const value = Array.isArray(header) ? header[0] : header
	if (value === undefined || value.trim() === '') return undefined

	if (/^\d+$/.test(value.trim())) {
		return parseInt(value.trim()) * 1000
	}

	const date = Date.parse(value)
	return isNaN(date) ? undefined : Math.max(0, date - now)
}

/**
 * Exponential backoff delay before retry number `attempt` (1-based).
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
	return baseDelayMs * 2 ** (attempt - 1)
}

/**
 * Appends query params to a path. Undefined values are skipped.
 */
export function buildPath(
	path: string,
	query?: TransportRequest['query']
): string {
	if (!query) return path

	const search = new URLSearchParams()
	for (const [name, value] of Object.entries(query)) {
		if (value !== undefined) {
			search.append(name, String(value))
		}
	}
	const qs = search.toString()
	if (!qs) return path
	return path + (path.includes('?') ? '&' : '?') + qs
}

/**
 * Default dispatcher: an undici Pool sized and timed by the profile.
 */
export const createPool: DispatcherFactory = (profile) =>
	new Pool(profile.origin, {
		connections: profile.maxConnections,
		keepAliveTimeout: profile.keepAliveTimeoutMs,
		keepAliveMaxTimeout: profile.keepAliveMaxTimeoutMs,
		connect: { timeout: profile.connectTimeoutMs },
		headersTimeout: profile.readTimeoutMs,
		bodyTimeout: profile.readTimeoutMs,
	})

/**
 * Combines an optional deadline and an optional caller signal.
 * @internal
 */
function linkSignal(
	upstream: string,
	timeoutMs: number | undefined,
	parent: AbortSignal | undefined
): { signal: AbortSignal; dispose: () => void } {
	const controller = new AbortController()
	const onAbort = () => controller.abort(parent?.reason)

	if (parent?.aborted) {
		controller.abort(parent.reason)
	} else {
		parent?.addEventListener('abort', onAbort, { once: true })
	}

	const timer =
		timeoutMs === undefined
			? undefined
			: setTimeout(
					() =>
						controller.abort(
							new TransportError(
								`Request to ${upstream} timed out after ${timeoutMs}ms`,
								upstream
							)
						),
					timeoutMs
				)

	return {
		signal: controller.signal,
		dispose: () => {
			clearTimeout(timer)
			parent?.removeEventListener('abort', onAbort)
		},
	}
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * HTTP client for one upstream, backed by a single connection pool.
 */
export class PooledTransport {
	readonly profile: UpstreamProfile
	private readonly dispatcher: Dispatcher
	private closed = false

	private requests = 0
	private successes = 0
	private failures = 0
	private retries = 0

	constructor(
		profile: UpstreamProfile,
		dispatcherFactory: DispatcherFactory = createPool
	) {
		this.profile = profile
		this.dispatcher = dispatcherFactory(profile)
		logger.debug(`Pool created for ${profile.name}`, {
			origin: profile.origin,
			maxConnections: profile.maxConnections,
		})
	}

	/**
	 * Sends a request, retrying transient failures.
	 *
	 * @throws {@link UpstreamRateLimitedError} on 429
	 * @throws {@link TransportError} on other 4xx, on 5xx or network failure
	 * once retries are exhausted, and on abort
	 */
	async request(request: TransportRequest): Promise<TransportResponse> {
		if (this.closed) {
			throw new TransportError(
				`Transport ${this.profile.name} is closed`,
				this.profile.name
			)
		}

		this.requests++
		const { signal, dispose } = linkSignal(
			this.profile.name,
			request.timeoutMs,
			request.signal
		)

		try {
			const response = await this.attempt(request, signal)
			this.successes++
			return response
		} catch (error) {
			this.failures++
			throw error
		} finally {
			dispose()
		}
	}

	/**
	 * Closes the pool. In-flight requests finish first.
	 */
	async close(): Promise<void> {
		if (this.closed) return
		this.closed = true
		await this.dispatcher.close()
		logger.debug(`Pool closed for ${this.profile.name}`)
	}

	getStats(): TransportStats {
		return {
			name: this.profile.name,
			origin: this.profile.origin,
			maxConnections: this.profile.maxConnections,
			requests: this.requests,
			successes: this.successes,
			failures: this.failures,
			retries: this.retries,
		}
	}

	private async attempt(
		request: TransportRequest,
		signal: AbortSignal
	): Promise<TransportResponse> {
		const { name, maxRetries, retryBaseDelayMs } = this.profile
		const path = buildPath(request.path, request.query)

		for (let attempt = 0; ; attempt++) {
			let retryReason: string

			try {
				const { statusCode, headers, body } = await this.dispatcher.request({
					method: request.method ?? 'GET',
					path,
					headers: { ...this.profile.defaultHeaders, ...request.headers },
					body: request.body,
					signal,
				})
				const text = await body.text()

				diagnostic.trace('Upstream response', {
					upstream: name,
					path,
					status: statusCode,
					attempt,
				})

				if (statusCode === 429) {
					throw new UpstreamRateLimitedError(
						name,
						parseRetryAfter(headers['retry-after'])
					)
				}
				if (statusCode < 400) {
					return { status: statusCode, headers, body: text }
				}
				if (statusCode < 500 || attempt >= maxRetries) {
					throw new TransportError(
						`Upstream ${name} responded ${statusCode}`,
						name,
						statusCode
					)
				}
				retryReason = `status ${statusCode}`
			} catch (error) {
				if (error instanceof TransportError) throw error
				if (signal.aborted) {
					const reason: unknown = signal.reason
					throw reason instanceof TransportError
						? reason
						: new TransportError(`Request to ${name} aborted`, name, undefined, {
								cause: reason,
							})
				}
				if (!isTransientError(error) || attempt >= maxRetries) {
					throw new TransportError(
						`Request to ${name} failed: ${errorMessage(error)}`,
						name,
						undefined,
						{ cause: error }
					)
				}
				retryReason = errorMessage(error)
			}

			this.retries++
			const delay = backoffDelay(retryBaseDelayMs, attempt + 1)
			logger.warn(
				`Retrying ${name} ${path} in ${delay}ms (attempt ${attempt + 2}/${maxRetries + 1}): ${retryReason}`
			)

			try {
				await sleep(delay, undefined, { signal })
			} catch (error) {
				const reason: unknown = signal.reason
				throw reason instanceof TransportError
					? reason
					: new TransportError(`Request to ${name} aborted`, name, undefined, {
							cause: reason ?? error,
						})
			}
		}
	}
}

/**
 * Owns one {@link PooledTransport} per upstream profile.
 */
export class TransportRegistry {
	private readonly transports = new Map<string, PooledTransport>()

	constructor(private readonly dispatcherFactory: DispatcherFactory = createPool) {}

	/**
	 * Returns the transport for a profile, creating its pool on first use.
	 * @throws Error when the name is already registered with another origin
	 */
	getTransport(profile: UpstreamProfile): PooledTransport {
		const existing = this.transports.get(profile.name)
		if (existing) {
			if (existing.profile.origin !== profile.origin) {
				throw new Error(
					`Upstream ${profile.name} is already registered for ${existing.profile.origin}`
				)
			}
			return existing
		}

		const transport = new PooledTransport(profile, this.dispatcherFactory)
		this.transports.set(profile.name, transport)
		return transport
	}

	get size(): number {
		return this.transports.size
	}

	getStats(): TransportStats[] {
		return [...this.transports.values()].map((transport) => transport.getStats())
	}

	/**
	 * Closes every pool. Failures are logged and do not stop the others.
	 */
	async closeAll(): Promise<void> {
		const results = await Promise.allSettled(
			[...this.transports.values()].map((transport) => transport.close())
		)
		for (const result of results) {
			if (result.status === 'rejected') {
				logger.error('Error closing transport:', result.reason)
			}
		}
		this.transports.clear()
	}
}
