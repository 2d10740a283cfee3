/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Test Setup                                       ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Global test setup that runs before all tests.
 * Loads test-specific environment variables.
 */

import dotenv from 'dotenv'
import { fileURLToPath } from 'node:url'
import { logger } from '../src/utils/logger.js'

// Load test environment variables from test/.env.test
const testEnvPath = fileURLToPath(new URL('.env.test', import.meta.url))
dotenv.config({ path: testEnvPath, override: true })

process.env.NODE_ENV = 'test'

// The logger reads LOG_LEVEL when its module loads, ahead of dotenv
if (process.env.LOG_LEVEL) {
	logger.settings.minLevel = parseInt(process.env.LOG_LEVEL)
}
