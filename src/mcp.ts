#!/usr/bin/env node
/**
 * BrainLift MCP Server
 * Exposes the user's BrainLifts to agents via Model Context Protocol (stdio)
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig } from './utils/config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { BrainliftClient } from './client/BrainliftClient.js';
import { registerBrainliftTools, registerIdentityTools } from './mcp/tools/index.js';
import { registerPrompts } from './mcp/prompts.js';
import { VERSION } from './version.js';

class BrainliftMcpServer {
    private readonly server: McpServer;
    private readonly client: BrainliftClient;

    constructor() {
        this.server = new McpServer({
            name: 'brainlift-mcp',
            version: VERSION,
        });

        const config = getConfig();
        logger.setLevel(config.logLevel);

        // Tool calls may block on browser consent the first time; CredentialManager logs it
        this.client = new BrainliftClient({ ...config, interactive: true });

        if (config.demoMode) {
            logger.warn('Demo mode is on: serving sample BrainLifts, no sign-in required');
        }

        registerIdentityTools(this.server, this.client);
        registerBrainliftTools(this.server, this.client);
        registerPrompts(this.server);
    }

    async start() {
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        logger.info('BrainLift MCP Server running on stdio');
    }
}

try {
    const server = new BrainliftMcpServer();
    await server.start();
} catch (err) {
    logger.error(`Failed to start: ${errorMessage(err)}`);
    process.exitCode = 1;
}
