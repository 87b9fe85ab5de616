/**
 * MCP Tool Registrar: Identity tools
 * whoami
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { BrainliftClient } from '../../client/BrainliftClient.js';
import { mcpError, mcpJson } from './shared.js';

export function registerIdentityTools(server: McpServer, client: BrainliftClient) {
    server.registerTool(
        'whoami',
        {
            title: 'Who Am I',
            description:
                'Returns the BrainLift user id the server is acting as, and whether it is serving demo data. Use this first to confirm authentication is working; the first call may open a browser for Google sign-in.',
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                return mcpJson(await client.whoami());
            } catch (error) {
                return mcpError('Failed to resolve user', error);
            }
        },
    );
}
