/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                       Graceful Shutdown Utility                           ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Handles graceful shutdown of the application, ensuring all resources
 * are properly cleaned up before process termination.
 *
 * @packageDocumentation
 */

import { logger } from './logger.js'
import type { ShutdownConfig } from '../types/shutdown.js'

/**
 * Performs graceful shutdown of all application resources.
 * Stops accepting new connections, runs cleanup handlers, and exits.
 *
 * @param signal - The signal that triggered the shutdown
 * @param config - Configuration containing resources to clean up
 */
export async function gracefulShutdown(
	signal: string,
	config: ShutdownConfig
): Promise<void> {
	logger.info(`Received ${signal} signal, starting graceful shutdown...`)

	// Stop accepting new connections
	await new Promise<void>((resolve) => {
		config.server.close((error) => {
			if (error) {
				logger.warn('HTTP server was not running:', error.message)
			} else {
				logger.info('HTTP server closed')
			}
			resolve()
		})
		// Idle keep-alive sockets would hold close() open
		config.server.closeIdleConnections()
	})

	let exitCode = 0
	for (const handler of config.cleanupHandlers ?? []) {
		try {
			await handler()
		} catch (error) {
			exitCode = 1
			logger.error('Error in cleanup handler:', error)
		}
	}

	logger.info('Graceful shutdown completed')
	if (config.exit) {
		config.exit(exitCode)
	} else {
		process.exit(exitCode)
	}
}

/**
 * Registers process signal handlers for graceful shutdown.
 * Sets up handlers for SIGTERM and SIGINT signals; a second signal while
 * shutting down is ignored.
 *
 * @param config - Configuration containing resources to clean up
 */
export function registerShutdownHandlers(config: ShutdownConfig): void {
	let shuttingDown = false

	const onSignal = (signal: string) => {
		if (shuttingDown) return
		shuttingDown = true
		gracefulShutdown(signal, config).catch((error: unknown) => {
			logger.fatal('Graceful shutdown failed:', error)
			process.exit(1)
		})
	}

	process.on('SIGTERM', () => onSignal('SIGTERM'))
	process.on('SIGINT', () => onSignal('SIGINT'))
	logger.debug('Shutdown handlers registered')
}
