/**
 * Shared command utilities
 * Common helpers used across all CLI command modules
 */

import { getConfig } from '../utils/config.js';
import { log, logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { BrainliftClient } from '../client/BrainliftClient.js';

/**
 * Creates a BrainliftClient from the resolved configuration.
 * CLI commands never start browser consent implicitly; `auth login` does that.
 */
export function createClient(): BrainliftClient {
    const config = getConfig();
    logger.setLevel(config.logLevel);
    return new BrainliftClient({ ...config, interactive: false });
}

/**
 * Report a failed command and exit non-zero
 */
export function fail(action: string, error: unknown): never {
    log.error(`${action}: ${errorMessage(error)}`);
    process.exit(1);
}
