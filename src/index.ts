/**
 * BrainLift MCP library barrel export
 */

// Client
export { BrainliftClient, type BrainliftClientConfig, type Identity } from './client/BrainliftClient.js';
export { HttpClient, type HttpClientConfig, type AuthHeaderSource, type RequestOptions } from './client/HttpClient.js';

// Auth
export * from './auth/index.js';

// APIs
export * from './api/index.js';

// Formatting
export { toSummaries, toBrainliftInfo, toDokDump, orderNodes, type BrainliftSummary, type BrainliftInfo, type DokDump } from './mcp/format.js';

// Utils
export { getConfig, resolveConfig, type Config, type OwnershipMode } from './utils/config.js';
export * from './utils/errors.js';
