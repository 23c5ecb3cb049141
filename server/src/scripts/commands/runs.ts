import type { Command } from 'commander';
import { listLimitSchema } from '@orderhub/shared';
import { cleanupStaleRuns } from '../../utils/runTracker.js';
import { parseOption, withDatabase, type OutputOptions } from '../lib/context.js';
import { heading, json, success, table } from '../lib/format.js';

export function registerRunCommands(program: Command): void {
    program
        .command('runs')
        .description('Recent reconciliation runs')
        .option('--limit <n>', 'Maximum runs to list', '20')
        .option('--json', 'Print the list as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { limit: string }) => {
            const limit = parseOption(listLimitSchema, opts.limit, '--limit');
            const runs = await ctx.runLog.listRecentRuns(limit);
            if (opts.json) return json(runs);

            heading('Reconciliation runs');
            table(
                runs.map((r) => ({
                    ID: r.id,
                    Trigger: r.triggeredBy,
                    Status: r.status,
                    Started: r.startedAt.toISOString(),
                    Duration: r.durationMs === null ? null : `${r.durationMs}ms`,
                    Error: r.error,
                }))
            );
            console.log();
        }));

    program
        .command('runs:cleanup')
        .description('Mark runs left "running" by an interrupted process as failed')
        .action(withDatabase(async (ctx) => {
            const count = await cleanupStaleRuns(ctx.runLog);
            success(`Marked ${count} stale run${count === 1 ? '' : 's'} as failed`);
        }));
}
