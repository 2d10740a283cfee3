/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Authentication Module                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * API key authentication middleware for protected endpoints.
 *
 * Security features:
 * - Key accepted from `X-API-Key` or `Authorization: Bearer <key>`
 * - Constant-time comparison against every configured key
 * - Caller identity derived from a digest of the key, never the key itself
 *
 * @packageDocumentation
 */

import { createHash, timingSafeEqual } from 'node:crypto'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { ipKeyGenerator } from 'express-rate-limit'
import { diagnostic, logger } from './utils/logger.js'

export interface ApiKeyAuthOptions {
	/** Accepted keys */
	keys: readonly string[]
	/** When false, every request passes */
	enabled: boolean
	/** Paths that never require a key */
	publicPaths?: readonly string[]
}

/** Paths open to unauthenticated callers. */
export const PUBLIC_PATHS: readonly string[] = ['/health', '/info']

function digest(value: string): Buffer {
	return createHash('sha256').update(value).digest()
}

/**
 * Extracts the API key from a request.
 * @returns The key, or undefined when none was sent
 */
export function extractApiKey(req: Request): string | undefined {
	const headerKey = req.headers['x-api-key']
	if (typeof headerKey === 'string' && headerKey) {
		return headerKey
	}

	const authHeader = req.headers['authorization']
	if (typeof authHeader === 'string') {
		const [scheme, token] = authHeader.split(' ')
		if (scheme === 'Bearer' && token) {
			return token
		}
	}

	return undefined
}

/**
 * Compares a presented key against the configured ones in constant time.
 * Both sides are hashed first so lengths always match.
 */
export function isValidApiKey(presented: string, keys: readonly string[]): boolean {
	const presentedDigest = digest(presented)
	let valid = false
	for (const key of keys) {
		if (timingSafeEqual(presentedDigest, digest(key))) {
			valid = true
		}
	}
	return valid
}

/**
 * Identity the per-caller rate limit is counted against.
 *
 * `key:` plus the first 16 hex characters of the key's SHA-256 when a key
 * was sent, otherwise `ip:` plus the client address.
 */
export function callerIdentity(req: Request): string {
	const apiKey = extractApiKey(req)
	if (apiKey) {
		return `key:${digest(apiKey).toString('hex').substring(0, 16)}`
	}

	const ip = req.ip || req.socket.remoteAddress || 'unknown'
	return `ip:${ipKeyGenerator(ip)}`
}

/**
 * Exact match against the public paths, trailing slash allowed.
 * `/health/detailed` stays protected.
 */
export function isPublicPath(path: string, publicPaths: readonly string[] = PUBLIC_PATHS): boolean {
	return publicPaths.some((publicPath) => path === publicPath || path === publicPath + '/')
}

/**
 * Creates the API key middleware.
 *
 * - No key: 401
 * - Unknown key: 403
 */
export function createApiKeyAuth(options: ApiKeyAuthOptions): RequestHandler {
	const publicPaths = options.publicPaths ?? PUBLIC_PATHS

	if (!options.enabled) {
		logger.warn('⚠️  API key authentication is disabled (ENABLE_API_KEY_AUTH=false)')
		return (req: Request, res: Response, next: NextFunction) => next()
	}

	if (options.keys.length === 0) {
		logger.warn('No API keys configured - every protected endpoint will answer 403')
	}

	return (req: Request, res: Response, next: NextFunction) => {
		if (isPublicPath(req.path, publicPaths)) {
			next()
			return
		}

		const startTime = Date.now()
		const apiKey = extractApiKey(req)

		if (!apiKey) {
			diagnostic.debug('Auth failed - missing key', {
				path: req.path,
				method: req.method,
			})
			res.status(401).json({ error: 'Missing API key' })
			return
		}

		const valid = isValidApiKey(apiKey, options.keys)

		diagnostic.trace('API key check', {
			path: req.path,
			method: req.method,
			authTime: Date.now() - startTime,
			authenticated: valid,
		})

		if (!valid) {
			diagnostic.info('Auth failed - invalid key', {
				path: req.path,
				method: req.method,
				keyLength: apiKey.length,
			})
			res.status(403).json({ error: 'Invalid API key' })
			return
		}

		next()
	}
}
