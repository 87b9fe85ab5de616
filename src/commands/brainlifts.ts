/**
 * BrainLift CLI Commands
 * brainlift brainlifts list | show <id> | doks <id>
 */

import { Command } from 'commander';
import { log } from '../utils/logger.js';
import { formatDate, formatScore, printTable } from '../utils/formatter.js';
import { toBrainliftInfo, toDokDump, toSummaries } from '../mcp/format.js';
import { createClient, fail } from './shared.js';

function parseLevels(value: string): number[] {
    return value
        .split(',')
        .map((part) => part.trim())
        .filter(Boolean)
        .map(Number);
}

export function createBrainliftsCommand(): Command {
    const brainlifts = new Command('brainlifts').description("Read the signed-in user's BrainLifts");

    brainlifts
        .command('list')
        .description('List BrainLifts with their quality scores')
        .option('--json', 'Output raw JSON')
        .action(async (opts: { json?: boolean }) => {
            try {
                const summaries = toSummaries(await createClient().brainlifts.listBrainlifts());

                if (opts.json) {
                    console.log(JSON.stringify(summaries, null, 2));
                    return;
                }

                if (summaries.length === 0) {
                    log.info('No BrainLifts found');
                    return;
                }

                log.header(`BrainLifts (${summaries.length})`);
                printTable(
                    ['Title', 'Score', 'Updated', 'ID'],
                    summaries.map((s) => [s.title, formatScore(s.quality_score), formatDate(s.updated_at), s.id]),
                );
            } catch (error) {
                fail('Failed to get BrainLifts', error);
            }
        });

    brainlifts
        .command('show <id>')
        .description('Show one BrainLift with its stats and contents')
        .option('--json', 'Output raw JSON')
        .action(async (id: string, opts: { json?: boolean }) => {
            try {
                const client = createClient();
                const [brainlift, nodes] = await Promise.all([
                    client.brainlifts.getBrainlift(id),
                    client.brainlifts.getNodes(id),
                ]);
                const info = toBrainliftInfo(brainlift, nodes);

                if (opts.json) {
                    console.log(JSON.stringify(info, null, 2));
                    return;
                }

                log.header(info.brainlift_title || id);
                log.kv('Quality Score', formatScore(info.stats.quality_score));
                log.kv('Visibility', info.stats.visibility || '-');
                log.kv('Created', formatDate(info.stats.created_at));
                log.kv('Updated', formatDate(info.stats.updated_at));
                for (const [dimension, score] of Object.entries(info.stats.quality_dimensions)) {
                    log.kv(`  ${dimension}`, formatScore(score));
                }
                console.log();
                console.log(info.brainlift_contents);
            } catch (error) {
                fail('Failed to get BrainLift info', error);
            }
        });

    brainlifts
        .command('doks <id>')
        .description('Show the nodes of a BrainLift at the given DOK levels')
        .option('-l, --levels <levels>', 'Comma-separated DOK levels', '1,2,3,4')
        .action(async (id: string, opts: { levels: string }) => {
            try {
                const client = createClient();
                const levels = parseLevels(opts.levels);
                const [brainlift, nodes] = await Promise.all([
                    client.brainlifts.getBrainlift(id),
                    client.brainlifts.getNodes(id),
                ]);
                console.log(JSON.stringify(toDokDump(brainlift, nodes, levels), null, 2));
            } catch (error) {
                fail('Failed to get BrainLift DOK nodes', error);
            }
        });

    return brainlifts;
}
