/**
 * Shared MCP tool utilities
 * Common helpers used across all MCP tool registrars
 */

import { errorMessage } from '../../utils/errors.js';

/**
 * Build a standard MCP error response.
 * Every tool handler catch block should return this, with the operation's prefix.
 */
export function mcpError(prefix: string, error: unknown) {
    return {
        content: [{ type: 'text' as const, text: `${prefix}: ${errorMessage(error)}` }],
        isError: true as const,
    };
}

/** Standard MCP success response carrying pretty-printed JSON */
export function mcpJson(value: unknown) {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    };
}
