/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                       Test Server Utilities                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Utilities for running the Express app in the test environment, wired to
 * in-process stand-ins for Upstash and the autocomplete upstream.
 */

import type { Server } from 'node:http'
import type { Application } from 'express'
import { MockAgent } from 'undici'
import { createApp } from '../../src/app.js'
import { createServices, type ServiceOverrides, type Services } from '../../src/services.js'
import { toEnvironmentConfig, validateEnv } from '../../src/utils/env.js'
import type { EnvironmentConfig } from '../../src/types/setup.js'
import type { KeywordCatalog } from '../../src/sources/keywords.js'
import { FakeRateStore, FakeSharedStore } from './fakes.js'

/** Key accepted by the test configuration (see test/.env.test). */
export const TEST_API_KEY = 'test-secret'

/** Small catalog so variation fan-outs stay easy to mock. */
export const TEST_CATALOG: KeywordCatalog = {
	categories: {
		Questions: ['what', 'how'],
		Alphabet: ['a', 'b'],
	},
	defaultCategories: ['Questions'],
}

/**
 * Configuration from test/.env.test, with optional overrides.
 */
export function testConfig(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
	const result = validateEnv(process.env)
	if (!result.valid) {
		throw new Error(
			`Invalid test environment: ${result.errors.map((e) => e.variable).join(', ')}`
		)
	}
	return { ...toEnvironmentConfig(result.config), ...overrides }
}

export interface TestServices {
	services: Services
	/** Answers every autocomplete upstream request */
	agent: MockAgent
	sharedStore: FakeSharedStore
	rateStore: FakeRateStore
}

/**
 * Builds the services container against in-process stand-ins.
 */
export function createTestServices(
	config: EnvironmentConfig = testConfig(),
	overrides: ServiceOverrides = {}
): TestServices {
	const agent = new MockAgent()
	agent.disableNetConnect()
	const sharedStore = new FakeSharedStore()
	const rateStore = new FakeRateStore()

	const services = createServices(config, {
		dispatcherFactory: (profile) => agent.get(profile.origin),
		sharedStore,
		rateStore,
		catalog: TEST_CATALOG,
		...overrides,
	})

	return { services, agent, sharedStore, rateStore }
}

/**
 * Starts an app on a random available port.
 *
 * @returns Promise resolving to server instance and base URL
 */
export async function startAppServer(app: Application): Promise<{
	server: Server
	baseURL: string
}> {
	return new Promise((resolve, reject) => {
		// Use port 0 to let the OS assign a random available port
		const server = app.listen(0, '127.0.0.1', () => {
			const address = server.address()
			if (!address || typeof address === 'string') {
				reject(new Error('Failed to get server address'))
				return
			}

			resolve({ server, baseURL: `http://127.0.0.1:${address.port}` })
		})

		server.on('error', reject)
	})
}

/**
 * Starts the relay app for a services container.
 */
export async function startTestServer(services: Services): Promise<{
	server: Server
	baseURL: string
}> {
	return startAppServer(createApp(services))
}

/**
 * Stops a running test server.
 */
export async function stopTestServer(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close((err) => {
			if (err) reject(err)
			else resolve()
		})
		server.closeAllConnections()
	})
}

/**
 * Request helper that sends the test API key unless told otherwise.
 *
 * @param options.apiKey - Key to send, or null to send none
 */
export async function request(
	baseURL: string,
	path: string,
	options: { method?: string; body?: unknown; apiKey?: string | null } = {}
): Promise<Response> {
	const headers: Record<string, string> = {}

	const apiKey = options.apiKey === undefined ? TEST_API_KEY : options.apiKey
	if (apiKey !== null) {
		headers['X-API-Key'] = apiKey
	}

	if (options.body !== undefined) {
		headers['Content-Type'] = 'application/json'
	}

	return fetch(`${baseURL}${path}`, {
		method: options.method ?? 'GET',
		headers,
		body: options.body === undefined ? undefined : JSON.stringify(options.body),
	})
}

/**
 * Helper to make GET requests.
 */
export async function get(
	baseURL: string,
	path: string,
	apiKey?: string | null
): Promise<Response> {
	return request(baseURL, path, { apiKey })
}

/**
 * Helper to make POST requests with JSON body.
 */
export async function post(
	baseURL: string,
	path: string,
	body: unknown,
	apiKey?: string | null
): Promise<Response> {
	return request(baseURL, path, { method: 'POST', body, apiKey })
}
