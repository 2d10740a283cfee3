/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                           Logger Utility                                  ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Centralized logging utility providing structured output with tslog.
 *
 * - Main logger: Branded console output controlled by LOG_LEVEL
 * - Diagnostic logger: JSON output with source locations via DIAGNOSTIC_LOGGER
 * - Child loggers: Module-specific loggers with name prefixes
 *
 * @packageDocumentation
 */

import { Logger, type ILogObj } from 'tslog'
import type { RouteMount, RouterLayer, EndpointInfo } from '../types/routes.js'

/**
 * Base log template used by all loggers
 * @internal
 */
const BASE_LOG_TEMPLATE =
	'\x1b[36m[\x1b[1mRELAY ⇄ \x1b[22m]\x1b[0m [{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}] [{{logLevelName}}] '

/**
 * Main application logger instance
 *
 * Provides structured logging with branded output format.
 * Log level controlled by LOG_LEVEL environment variable.
 *
 * @example
 * ```typescript
 * logger.info('Cache tier recovered', { tier: 'shared' })
 * // Output: [RELAY ⇄] [2025-03-14 15:30:45] [INFO] Cache tier recovered { tier: 'shared' }
 * ```
 *
 * @public
 */
export const logger = new Logger<ILogObj>({
	type: 'pretty',
	prettyLogTemplate: BASE_LOG_TEMPLATE,
	minLevel: parseInt(process.env.LOG_LEVEL || '3'), // 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
	hideLogPositionForProduction: true,
	stylePrettyLogs: true,
	prettyLogTimeZone: 'UTC',
	prettyErrorTemplate: '\n{{errorName}} {{errorMessage}}\n{{errorStack}}',
	prettyErrorStackTemplate:
		'  • {{fileName}}\t{{method}}\n\t{{filePathWithLine}}',
	prettyErrorParentNamesSeparator: ' → ',
	prettyLogStyles: {
		logLevelName: {
			'*': ['bold', 'dim'],
			ERROR: ['bold', 'red'],
			WARN: ['bold', 'yellow'],
			INFO: ['bold', 'green'],
			DEBUG: ['bold', 'blue'],
			TRACE: ['bold', 'magenta'],
			FATAL: ['bold', 'bgRed', 'white'],
		},
	},
})

/**
 * Check if diagnostic mode is enabled
 *
 * @internal
 */
const diagnosticEnabled = process.env.DIAGNOSTIC_LOGGER === 'true'

/**
 * Diagnostic logger for detailed output
 *
 * Outputs detailed JSON logs with source locations when DIAGNOSTIC_LOGGER
 * environment variable is set to 'true'. When disabled, the logger is
 * created with the hidden transport and prints nothing.
 *
 * @example
 * ```typescript
 * // Enable with: DIAGNOSTIC_LOGGER=true
 * diagnostic.trace('Cache probe', { key, tier: 'local' })
 * // Output (JSON): {"_meta": {"date": "...", "path": {...}}, "0": "Cache probe", ...}
 * ```
 *
 * @public
 */
export const diagnostic = new Logger<ILogObj>(
	diagnosticEnabled
		? {
				name: 'DIAGNOSTIC',
				type: 'json',
				minLevel: 0, // Show all levels
				hideLogPositionForProduction: false, // Always show source locations
				prettyInspectOptions: {
					depth: null, // Unlimited object inspection depth
					colors: false,
				},
			}
		: { name: 'DIAGNOSTIC', type: 'hidden', minLevel: 7 }
)

/**
 * Create a child logger with additional context
 *
 * Creates a sub-logger that inherits configuration from the main logger
 * but includes additional contextual information in every log message.
 *
 * @param name - Name for the child logger (e.g., 'Orchestrator', 'Transport')
 * @param metadata - Optional metadata to include with every log
 * @returns Child logger instance
 *
 * @example
 * ```typescript
 * const transportLogger = createLogger('Transport', { upstream: 'autocomplete' })
 * transportLogger.info('Pool created')
 * // Output: [RELAY ⇄] [2025-03-14 15:30:45] [INFO] [Transport] Pool created
 * ```
 *
 * @public
 */
export function createLogger(
	name: string,
	metadata?: Record<string, unknown>
): Logger<ILogObj> {
	const childLogger = logger.getSubLogger({
		name,
		...(metadata && { defaultMeta: metadata }),
	})

	// Override the template to include the child name
	childLogger.settings.prettyLogTemplate = BASE_LOG_TEMPLATE + '[' + name + '] '

	return childLogger
}

/**
 * Log level enum for reference
 *
 * @public
 */
export enum LogLevel {
	SILLY = 0,
	TRACE = 1,
	DEBUG = 2,
	INFO = 3,
	WARN = 4,
	ERROR = 5,
	FATAL = 6,
}

function isRouterLayer(value: unknown): value is RouterLayer {
	return typeof value === 'object' && value !== null
}

/**
 * Collects the method and path of every route registered on the mounts.
 *
 * @param mounts - Array of route mount configurations
 * @param isProtected - Decides whether a full path sits behind API key auth
 * @returns Endpoints sorted by path, then by method
 *
 * @public
 */
export function listEndpoints(
	mounts: RouteMount[],
	isProtected: (path: string) => boolean
): EndpointInfo[] {
	const endpoints: EndpointInfo[] = []

	for (const { basePath, router } of mounts) {
		const stack: unknown = Reflect.get(router, 'stack')
		if (!Array.isArray(stack)) continue

		for (const layer of stack) {
			if (!isRouterLayer(layer) || !layer.route) continue
			const route = layer.route
			const path =
				route.path === '/' ? basePath : basePath + route.path
			for (const method of Object.keys(route.methods)) {
				endpoints.push({
					method: method.toUpperCase(),
					path,
					protected: isProtected(path),
				})
			}
		}
	}

	endpoints.sort((a, b) => {
		const pathCompare = a.path.localeCompare(b.path)
		return pathCompare !== 0 ? pathCompare : a.method.localeCompare(b.method)
	})

	return endpoints
}

/**
 * Log all available API endpoints
 *
 * Displays all registered routes with their HTTP methods and protection
 * status. Only runs when LOG_LEVEL is DEBUG (2) or lower.
 *
 * @param mounts - Array of route mount configurations
 * @param isProtected - Decides whether a full path sits behind API key auth
 *
 * @public
 */
export function logAvailableEndpoints(
	mounts: RouteMount[],
	isProtected: (path: string) => boolean
): void {
	const logLevel = parseInt(process.env.LOG_LEVEL || '3')

	// Only log in debug mode (2) or lower
	if (logLevel > 2) return

	for (const { method, path, protected: guarded } of listEndpoints(
		mounts,
		isProtected
	)) {
		const protection = guarded ? ' 🔒 (protected)' : ''
		logger.debug(
			`☑️ Registered endpoint: ${method.padEnd(6)} ${path}${protection}`
		)
	}
}
