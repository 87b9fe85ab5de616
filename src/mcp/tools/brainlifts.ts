/**
 * MCP Tool Registrar: BrainLift tools
 * get_brainlifts, get_brainlift_info, get_brainlift_doks
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { BrainliftClient } from '../../client/BrainliftClient.js';
import { toBrainliftInfo, toDokDump, toSummaries } from '../format.js';
import { mcpError, mcpJson } from './shared.js';

const brainliftId = z.string().min(1).describe('The ID of the BrainLift, as returned by get_brainlifts');

export function registerBrainliftTools(server: McpServer, client: BrainliftClient) {
    server.registerTool(
        'get_brainlifts',
        {
            title: 'List BrainLifts',
            description:
                "Get an overview of the user's BrainLifts: each one's id, title, quality score and last update. Use this to learn the user's BrainLift topics and to focus on improving the lower-quality ones.",
            annotations: { readOnlyHint: true },
        },
        async () => {
            try {
                const brainlifts = await client.brainlifts.listBrainlifts();
                return mcpJson(toSummaries(brainlifts));
            } catch (error) {
                return mcpError('Failed to get BrainLifts', error);
            }
        },
    );

    server.registerTool(
        'get_brainlift_info',
        {
            title: 'Get BrainLift Info',
            description:
                'Get the content of one of the user\'s BrainLifts together with its statistics: created/updated timestamps, quality score, per-dimension quality scores (gaps, spiky_pov, consistent, topic_focus, dok_coverage, digest_quality, link_discipline) and visibility. Contents are returned one node per line as "DoK Level <n>: <content>".',
            inputSchema: {
                brainlift_id: brainliftId,
            },
            annotations: { readOnlyHint: true },
        },
        async ({ brainlift_id }) => {
            try {
                const [brainlift, nodes] = await Promise.all([
                    client.brainlifts.getBrainlift(brainlift_id),
                    client.brainlifts.getNodes(brainlift_id),
                ]);
                return mcpJson(toBrainliftInfo(brainlift, nodes));
            } catch (error) {
                return mcpError('Failed to get BrainLift info', error);
            }
        },
    );

    server.registerTool(
        'get_brainlift_doks',
        {
            title: 'Get BrainLift DOK Nodes',
            description:
                'Get the DOK 1, 2, 3 or 4 nodes of a BrainLift, grouped by level. Useful to confirm a recommendation is relevant to the BrainLift and that the same or similar information is not already present.',
            inputSchema: {
                brainlift_id: brainliftId,
                dok_levels: z
                    .array(z.number().int().min(1).max(4))
                    .min(1)
                    .describe('DOK levels to retrieve, e.g. [1, 2, 3, 4]'),
            },
            annotations: { readOnlyHint: true },
        },
        async ({ brainlift_id, dok_levels }) => {
            try {
                const [brainlift, nodes] = await Promise.all([
                    client.brainlifts.getBrainlift(brainlift_id),
                    client.brainlifts.getNodes(brainlift_id),
                ]);
                return mcpJson(toDokDump(brainlift, nodes, dok_levels));
            } catch (error) {
                return mcpError('Failed to get BrainLift DOK nodes', error);
            }
        },
    );
}
