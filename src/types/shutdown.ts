/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Shutdown Type Definitions                          ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * TypeScript type definitions for the graceful shutdown process.
 *
 * @packageDocumentation
 */

import type { Server } from 'node:http'

/**
 * Configuration for graceful shutdown process.
 * Contains all resources that need to be cleaned up on shutdown.
 */
export interface ShutdownConfig {
	/** Express HTTP server instance */
	server: Server
	/** Cleanup functions run in order after the server stops accepting connections */
	cleanupHandlers?: Array<() => Promise<void> | void>
	/** Exit code reporter, replaced in tests */
	exit?: (code: number) => void
}
