import type { Command } from 'commander';
import chalk from 'chalk';
import {
    ORDER_KIND_LABELS,
    ORDER_KINDS,
    runTriggerSchema,
    type OrderKind,
    type OrderSyncResult,
    type ReconciliationReport,
} from '@orderhub/shared';
import { env } from '../../config/env.js';
import {
    detectConversions,
    extractCustomers,
    recomputeCustomerStats,
    runFullReconciliation,
    syncAllOrders,
    syncOrders,
} from '../../services/reconciliation/index.js';
import { cleanupStaleRuns, trackReconciliationRun } from '../../utils/runTracker.js';
import { parseKind, parseOption, withDatabase, type OutputOptions } from '../lib/context.js';
import { field, heading, json, statusColor, table, warn } from '../lib/format.js';

function syncRow(kind: OrderKind, result: OrderSyncResult | null) {
    return {
        Kind: ORDER_KIND_LABELS[kind],
        Inserted: result?.inserted,
        Updated: result?.updated,
        Errors: result?.errors,
    };
}

function printReport(report: ReconciliationReport): void {
    heading('Reconciliation');
    field('Status', statusColor(report.status));
    field('Blocking', report.blocking ? chalk.red('yes') : 'no');
    field('Duration', `${report.durationMs}ms`);
    if (report.failure) {
        const scope = report.failure.kind ? `${report.failure.stage} (${report.failure.kind})` : report.failure.stage;
        field('Failed stage', chalk.red(scope));
        field('Error', report.failure.message);
    }

    heading('Orders');
    table(ORDER_KINDS.map((kind) => syncRow(kind, report.sync[kind])));

    heading('Customers');
    table(
        ORDER_KINDS.map((kind) => ({
            Kind: ORDER_KIND_LABELS[kind],
            Created: report.customers[kind]?.created,
            Updated: report.customers[kind]?.updated,
            Relations: report.customers[kind]?.relations,
            'Stats updated': report.stats[kind]?.customersUpdated,
            Errors: (report.customers[kind]?.errors ?? 0) + (report.stats[kind]?.errors ?? 0),
        }))
    );

    heading('Conversions');
    field('New', report.conversions?.conversions);
    field('Errors', report.conversions?.errors);
    console.log();
}

export function registerPipelineCommands(program: Command): void {
    // --- Full run ---
    program
        .command('run')
        .description('Full resync: sync, extract, conversions, stats')
        .option('--trigger <trigger>', 'import | manual | scheduled', 'manual')
        .option('--json', 'Print the report as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { trigger: string }) => {
            const triggeredBy = parseOption(runTriggerSchema, opts.trigger, '--trigger');
            const execute = () => runFullReconciliation(ctx.repo, { policy: ctx.policy });

            let report: ReconciliationReport;
            if (env.RECONCILE_TRACK_RUNS) {
                await cleanupStaleRuns(ctx.runLog);
                report = await trackReconciliationRun(ctx.runLog, triggeredBy, execute);
            } else {
                report = await execute();
            }

            if (opts.json) {
                json(report);
            } else {
                printReport(report);
                if (report.blocking) warn('Typed order tables may not reflect the import');
            }
            if (report.status === 'failed') process.exitCode = 1;
        }));

    // --- Single stages ---
    program
        .command('sync')
        .description('Copy new and changed canonical orders into the typed tables')
        .option('--kind <kind>', 'sample | bulk (default: both)')
        .option('--json', 'Print the result as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { kind?: string }) => {
            if (opts.kind === undefined) {
                const result = await syncAllOrders(ctx.repo);
                if (opts.json) return json(result);
                heading('Order sync');
                table(ORDER_KINDS.map((kind) => syncRow(kind, result[kind])));
                return;
            }

            const kind = parseKind(opts.kind);
            const result = await syncOrders(ctx.repo, kind);
            if (opts.json) return json(result);
            heading(`Order sync: ${ORDER_KIND_LABELS[kind]}`);
            table([syncRow(kind, result)]);
        }));

    program
        .command('extract')
        .description('Create customers and order links from one typed table')
        .requiredOption('--kind <kind>', 'sample | bulk')
        .option('--json', 'Print the result as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { kind: string }) => {
            const kind = parseKind(opts.kind);
            const result = await extractCustomers(ctx.repo, kind, { policy: ctx.policy });
            if (opts.json) return json(result);

            heading(`Customer extraction: ${ORDER_KIND_LABELS[kind]}`);
            field('Created', result.created);
            field('Updated', result.updated);
            field('Relations', result.relations);
            field('Errors', result.errors);
            console.log();
        }));

    program
        .command('conversions')
        .description('Link sample customers to bulk customers of the same name')
        .option('--json', 'Print the result as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions) => {
            const result = await detectConversions(ctx.repo, { policy: ctx.policy });
            if (opts.json) return json(result);

            heading('Conversion detection');
            field('New', result.conversions);
            field('Errors', result.errors);
            console.log();
        }));

    program
        .command('stats')
        .description('Recompute order counts, totals and order dates of one registry')
        .requiredOption('--kind <kind>', 'sample | bulk')
        .option('--json', 'Print the result as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { kind: string }) => {
            const kind = parseKind(opts.kind);
            const result = await recomputeCustomerStats(ctx.repo, kind);
            if (opts.json) return json(result);

            heading(`Customer statistics: ${ORDER_KIND_LABELS[kind]}`);
            field('Updated', result.customersUpdated);
            field('Errors', result.errors);
            console.log();
        }));
}
