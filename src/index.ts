/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                            Main Entry Point                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Main entry point for the relay.
 * Validates the environment, builds the services container, and starts
 * the Express server.
 *
 * @packageDocumentation
 */

import { displayBanner } from './utils/banner.js'
import { logger } from './utils/logger.js'
import { setupEnvironment } from './utils/env.js'
import { registerShutdownHandlers } from './utils/gracefulShutdown.js'
import { createServices, type Services } from './services.js'
import { createApp } from './app.js'
import { SERVICE_NAME, SERVICE_VERSION } from './controllers.js'

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          ENVIRONMENT SETUP                                ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

displayBanner(SERVICE_NAME, SERVICE_VERSION)

// Initialize and validate environment
const envConfig = setupEnvironment()
const { PORT } = envConfig

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          SERVICES INITIALIZATION                          ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

let services: Services
try {
	services = createServices(envConfig)
} catch (error) {
	logger.fatal('Failed to initialize services:', error)
	process.exit(1)
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                           SERVER STARTUP                                  ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

const app = createApp(services)

const server = app.listen(PORT, () => {
	logger.info(`Server running on port ${PORT}`)
})

// Register graceful shutdown handlers
registerShutdownHandlers({
	server,
	cleanupHandlers: [services.close],
})
