/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                         Shared Cache Tier                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Upstash Redis client setup and the {@link SharedStore} adapter that backs
 * the shared cache tier. The same client is reused by the shared rate store.
 *
 * @packageDocumentation
 */

import { Redis } from '@upstash/redis'
import { createLogger } from './logger.js'
import type { SharedStore } from '../types/cache.js'

const logger = createLogger('SharedCache')

/**
 * Creates the Upstash Redis client, or returns undefined when the shared
 * store is not configured.
 *
 * Values are stored and read as raw strings; the cache owns serialization.
 * Requests are not retried: callers bound each call and fall back locally.
 */
export function createSharedRedis(
	url: string,
	token: string
): Redis | undefined {
	if (!url || !token) {
		logger.info('Shared store not configured - running with local tiers only')
		return undefined
	}

	logger.info('Shared store configured', { host: new URL(url).host })
	return new Redis({
		url,
		token,
		automaticDeserialization: false,
		retry: { retries: 0 },
	})
}

/**
 * Shared cache tier on Upstash Redis.
 */
export class UpstashSharedStore implements SharedStore {
	readonly name = 'upstash'

	constructor(
		private readonly redis: Redis,
		private readonly prefix = 'relay:cache:'
	) {}

	async get(key: string): Promise<string | null> {
		const value = await this.redis.get<string>(this.prefix + key)
		return typeof value === 'string' ? value : null
	}

	async set(key: string, value: string, ttlMs: number): Promise<void> {
		// Redis rejects a zero expiry
		await this.redis.set(this.prefix + key, value, {
			px: Math.max(1, Math.round(ttlMs)),
		})
	}

	async delete(key: string): Promise<void> {
		await this.redis.del(this.prefix + key)
	}

	async ping(): Promise<void> {
		await this.redis.ping()
	}
}
