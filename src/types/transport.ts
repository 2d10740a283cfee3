/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                       Transport Type Definitions                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Type definitions for pooled upstream HTTP transports.
 *
 * @packageDocumentation
 */

import type { Dispatcher } from 'undici'

/**
 * Connection and retry settings for one upstream.
 * One pool exists per profile name.
 *
 * The pool keeps every open connection alive, up to `maxConnections`; there
 * is no separate cap on idle connections. Connections have no maximum age,
 * and writes have no timeout of their own: a stalled upload ends at the
 * orchestrator deadline.
 */
export interface UpstreamProfile {
	/** Unique name, used as the registry key and in logs */
	name: string
	/** Scheme, host and port, e.g. https://suggestqueries.google.com */
	origin: string
	/** Maximum open connections */
	maxConnections: number
	/** Idle time after which a kept-alive connection is closed */
	keepAliveTimeoutMs: number
	/**
	 * Upper bound on the keep-alive timeout a server may advertise in its
	 * Keep-Alive header. Not a limit on connection age.
	 */
	keepAliveMaxTimeoutMs: number
	/** Timeout for establishing a connection */
	connectTimeoutMs: number
	/** Timeout waiting for response headers, and between body chunks */
	readTimeoutMs: number
	/** Extra attempts for transient failures and 5xx responses */
	maxRetries: number
	/** Base delay of the exponential backoff between attempts */
	retryBaseDelayMs: number
	/** Headers sent with every request */
	defaultHeaders?: Record<string, string>
}

/** Builds the dispatcher behind a transport. */
export type DispatcherFactory = (profile: UpstreamProfile) => Dispatcher

/**
 * One outbound request.
 */
export interface TransportRequest {
	method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD'
	/** Path below the origin, starting with '/' */
	path: string
	/** Query params, appended to the path; undefined entries are skipped */
	query?: Record<string, string | number | boolean | undefined>
	headers?: Record<string, string>
	body?: string
	/** Deadline for the whole request, retries and backoff included */
	timeoutMs?: number
	/** Caller cancellation */
	signal?: AbortSignal
}

/**
 * A fully read upstream response.
 */
export interface TransportResponse {
	status: number
	headers: Record<string, string | string[] | undefined>
	body: string
}

export interface TransportStats {
	name: string
	origin: string
	maxConnections: number
	requests: number
	successes: number
	failures: number
	retries: number
}
