/**
 * MCP Prompt Registrar
 * Guided workflows for working on the user's BrainLifts
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

export function registerPrompts(server: McpServer) {
    // ── Improve a BrainLift ─────────────────────────────

    server.registerPrompt(
        'improve-brainlift',
        {
            title: 'Improve a BrainLift',
            description:
                "Reviews one of the user's BrainLifts (or picks the weakest one), finds its lowest quality dimensions, and proposes concrete additions that are not already present.",
            argsSchema: {
                brainlift_id: z
                    .string()
                    .optional()
                    .describe('BrainLift to work on; omit to pick the lowest-scoring one'),
            },
        },
        async ({ brainlift_id }) => ({
            messages: [
                {
                    role: 'user' as const,
                    content: {
                        type: 'text' as const,
                        text: `Help me improve ${brainlift_id ? `the BrainLift "${brainlift_id}"` : 'my weakest BrainLift'}:

1. **Pick the target**: ${
                            brainlift_id
                                ? `Use get_brainlift_info with brainlift_id "${brainlift_id}".`
                                : 'Use get_brainlifts, choose the one with the lowest quality_score, then use get_brainlift_info on it.'
                        }
2. **Diagnose**: From stats.quality_dimensions, list the two or three lowest-scoring dimensions and explain what each one measures.
3. **Check coverage**: Use get_brainlift_doks with dok_levels [1, 2, 3, 4] and count how many nodes sit at each level. Flag levels that are thin or empty.
4. **Propose additions**: Suggest up to five new nodes, each with its DOK level, that address the weak dimensions. Compare each against the existing DOK nodes and drop any that repeat what is already there.

Keep the proposals specific to the BrainLift's topic and quote the existing nodes you build on.`,
                    },
                },
            ],
        }),
    );
}
