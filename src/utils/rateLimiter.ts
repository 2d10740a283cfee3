/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                       Fixed Window Rate Limiter                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Per-identity fixed-window request counter.
 *
 * Every check increments the caller's counter; the call is blocked once the
 * counter exceeds the limit. The window resets when `now >= windowStart +
 * windowMs`, so bursts straddling a window edge can reach twice the limit.
 *
 * Stores:
 * - MemoryRateStore: process-local, increments synchronously
 * - UpstashRateStore: shared across processes, one server-side script per check
 *
 * @packageDocumentation
 */

import type { Redis } from '@upstash/redis'
import { createLogger, diagnostic } from './logger.js'
import { withTimeout } from './timeout.js'

const logger = createLogger('RateLimiter')

/**
 * Counter state of one identity after an increment.
 */
export interface RateWindowState {
	count: number
	windowStart: number
}

/**
 * Outcome of a rate limit check.
 */
export type RateDecision =
	| { allowed: true; remaining: number; resetAt: number }
	| { allowed: false; retryAfterMs: number }

/**
 * Quota left to a caller after a check, as sent in X-RateLimit headers.
 */
export interface RateLimitStatus {
	limit: number
	remaining: number
	/** Time until the window resets */
	resetAfterMs: number
}

/**
 * Backing store for window counters.
 * `increment` must be atomic per identity.
 */
export interface RateStore {
	readonly name: string
	increment(
		identity: string,
		windowMs: number,
		now: number
	): Promise<RateWindowState>
	reset(identity: string): Promise<void>
}

/**
 * In-process window counters.
 */
export class MemoryRateStore implements RateStore {
	readonly name = 'memory'
	private windows = new Map<string, RateWindowState>()
	private incrementsSincePrune = 0

	constructor(private readonly pruneEvery = 1000) {}

	async increment(
		identity: string,
		windowMs: number,
		now: number
	): Promise<RateWindowState> {
		return this.incrementSync(identity, windowMs, now)
	}

	/**
	 * Read-modify-write with no suspension point in between.
	 */
	incrementSync(identity: string, windowMs: number, now: number): RateWindowState {
		if (++this.incrementsSincePrune >= this.pruneEvery) {
			this.prune(windowMs, now)
		}

		const current = this.windows.get(identity)
		if (!current || now >= current.windowStart + windowMs) {
			const fresh = { count: 1, windowStart: now }
			this.windows.set(identity, fresh)
			return { ...fresh }
		}

		current.count++
		return { ...current }
	}

	async reset(identity: string): Promise<void> {
		this.windows.delete(identity)
	}

	/** Drops all counters. */
	clear(): void {
		this.windows.clear()
	}

	get size(): number {
		return this.windows.size
	}

	/**
	 * Removes windows that have already rolled over.
	 * @returns Number of windows removed
	 */
	prune(windowMs: number, now: number): number {
		this.incrementsSincePrune = 0
		let removed = 0
		for (const [identity, state] of this.windows) {
			if (now >= state.windowStart + windowMs) {
				this.windows.delete(identity)
				removed++
			}
		}
		return removed
	}
}

/**
 * INCR the window counter, start its expiry on the first hit, and report
 * the remaining lifetime. Runs atomically on the server.
 */
export const FIXED_WINDOW_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
	redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
	redis.call('PEXPIRE', KEYS[1], ARGV[1])
	ttl = tonumber(ARGV[1])
end
return {count, ttl}
`

/**
 * Converts the script reply into window state.
 * @throws Error when the reply is not a pair of numbers
 */
export function parseWindowReply(
	reply: unknown,
	windowMs: number,
	now: number
): RateWindowState {
	if (!Array.isArray(reply) || reply.length < 2) {
		throw new Error('Unexpected rate window reply from shared store')
	}

	const count = Number(reply[0])
	const ttlMs = Number(reply[1])
	if (!Number.isFinite(count) || !Number.isFinite(ttlMs)) {
		throw new Error('Unexpected rate window reply from shared store')
	}

	const remainingMs = Math.min(Math.max(ttlMs, 0), windowMs)
	return { count, windowStart: now - (windowMs - remainingMs) }
}

/**
 * Window counters kept in Upstash Redis, shared by every process.
 */
export class UpstashRateStore implements RateStore {
	readonly name = 'upstash'

	constructor(
		private readonly redis: Redis,
		private readonly prefix = 'relay:ratelimit:'
	) {}

	async increment(
		identity: string,
		windowMs: number,
		now: number
	): Promise<RateWindowState> {
		const reply = await this.redis.eval<[string], unknown>(
			FIXED_WINDOW_SCRIPT,
			[this.prefix + identity],
			[String(windowMs)]
		)
		return parseWindowReply(reply, windowMs, now)
	}

	async reset(identity: string): Promise<void> {
		await this.redis.del(this.prefix + identity)
	}
}

export interface RateLimiterOptions {
	/** Calls allowed per identity per window */
	limit: number
	/** Window length in milliseconds */
	windowMs: number
	/** Primary store, in-memory by default */
	store?: RateStore
	/** Deadline of one call to a primary store other than memory */
	storeTimeoutMs?: number
	/** When false, every check is allowed and nothing is counted */
	enabled?: boolean
	/** Clock, injectable for tests */
	now?: () => number
}

export interface RateLimiterStats {
	enabled: boolean
	limit: number
	windowMs: number
	store: string
	checks: number
	blocked: number
	storeFailures: number
}

/**
 * Fixed-window limiter keyed by caller identity.
 *
 * If the primary store fails or does not answer within `storeTimeoutMs`,
 * the check is answered by an in-memory store so limits still hold within
 * this process.
 */
export class FixedWindowRateLimiter {
	readonly limit: number
	readonly windowMs: number
	private readonly store: RateStore
	private readonly fallback: MemoryRateStore
	private readonly enabled: boolean
	private readonly storeTimeoutMs: number
	private readonly now: () => number

	private checks = 0
	private blocked = 0
	private storeFailures = 0

	constructor(options: RateLimiterOptions) {
		if (!Number.isInteger(options.limit) || options.limit < 0) {
			throw new RangeError('limit must be a non-negative integer')
		}
		if (!(options.windowMs > 0)) {
			throw new RangeError('windowMs must be positive')
		}

		this.limit = options.limit
		this.windowMs = options.windowMs
		this.fallback = new MemoryRateStore()
		this.store = options.store ?? this.fallback
		this.enabled = options.enabled ?? true
		this.storeTimeoutMs = options.storeTimeoutMs ?? 250
		this.now = options.now ?? Date.now
	}

	/**
	 * Counts one call for `identity` and decides whether it may proceed.
	 */
	async checkAndIncrement(identity: string): Promise<RateDecision> {
		const now = this.now()

		if (!this.enabled) {
			return { allowed: true, remaining: this.limit, resetAt: now + this.windowMs }
		}

		this.checks++
		const state = await this.increment(identity, now)

		if (state.count > this.limit) {
			this.blocked++
			const retryAfterMs = Math.max(0, state.windowStart + this.windowMs - now)
			diagnostic.debug('Rate limit exceeded', {
				identity,
				count: state.count,
				limit: this.limit,
				retryAfterMs,
			})
			return { allowed: false, retryAfterMs }
		}

		return {
			allowed: true,
			remaining: this.limit - state.count,
			resetAt: state.windowStart + this.windowMs,
		}
	}

	/**
	 * Quota view of a decision this limiter returned.
	 */
	statusOf(decision: RateDecision): RateLimitStatus {
		if (!decision.allowed) {
			return { limit: this.limit, remaining: 0, resetAfterMs: decision.retryAfterMs }
		}
		return {
			limit: this.limit,
			remaining: decision.remaining,
			resetAfterMs: Math.max(0, decision.resetAt - this.now()),
		}
	}

	/**
	 * Forgets the counter of one identity.
	 */
	async reset(identity: string): Promise<void> {
		await this.fallback.reset(identity)
		if (this.store !== this.fallback) {
			await this.store.reset(identity)
		}
	}

	getStats(): RateLimiterStats {
		return {
			enabled: this.enabled,
			limit: this.limit,
			windowMs: this.windowMs,
			store: this.store.name,
			checks: this.checks,
			blocked: this.blocked,
			storeFailures: this.storeFailures,
		}
	}

	private async increment(identity: string, now: number): Promise<RateWindowState> {
		if (this.store === this.fallback) {
			return this.fallback.incrementSync(identity, this.windowMs, now)
		}

		try {
			return await withTimeout(
				this.store.increment(identity, this.windowMs, now),
				this.storeTimeoutMs,
				this.store.name
			)
		} catch (error) {
			this.storeFailures++
			logger.warn(`Rate store ${this.store.name} failed, counting in memory`, {
				error: error instanceof Error ? error.message : String(error),
			})
			return this.fallback.incrementSync(identity, this.windowMs, now)
		}
	}
}
