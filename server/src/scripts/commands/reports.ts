import type { Command } from 'commander';
import { listLimitSchema, ORDER_KIND_LABELS } from '@orderhub/shared';
import {
    findOrphanedTypedOrders,
    findUnconvertedCustomers,
    getCustomerSummary,
    listCustomersByHandler,
} from '../../services/reconciliation/index.js';
import { parseKind, parseOption, withDatabase, type OutputOptions } from '../lib/context.js';
import { field, heading, json, table } from '../lib/format.js';

export function registerReportCommands(program: Command): void {
    program
        .command('summary')
        .description('Registry sizes and conversion rate')
        .option('--json', 'Print the summary as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions) => {
            const summary = await getCustomerSummary(ctx.repo);
            if (opts.json) return json(summary);

            heading('Customers');
            field('Sample customers', summary.sampleCustomers);
            field('Bulk customers', summary.bulkCustomers);
            field('Total', summary.totalCustomers);
            field('Converted', summary.convertedCustomers);
            field('Conversion rate', `${summary.conversionRate}%`);
            console.log();
        }));

    program
        .command('unconverted')
        .description('Sample customers without a bulk order, most recent first')
        .option('--limit <n>', 'Maximum customers to list', '50')
        .option('--json', 'Print the list as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { limit: string }) => {
            const limit = parseOption(listLimitSchema, opts.limit, '--limit');
            const customers = await findUnconvertedCustomers(ctx.repo, { limit });
            if (opts.json) return json(customers);

            heading(`Unconverted sample customers (${customers.length})`);
            table(
                customers.map((c) => ({
                    ID: c.id,
                    Customer: c.customerName,
                    Shop: c.shop,
                    Handler: c.handler,
                    Orders: c.ordersCount,
                    Total: c.totalAmount.toFixed(2),
                    'First order': c.firstOrderDate,
                    'Last order': c.lastOrderDate,
                }))
            );
            console.log();
        }));

    program
        .command('handler')
        .description('Customers of one registry, optionally for one handler')
        .requiredOption('--kind <kind>', 'sample | bulk')
        .option('--handler <name>', 'Only customers owned by this handler')
        .option('--json', 'Print the list as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { kind: string; handler?: string }) => {
            const kind = parseKind(opts.kind);
            const customers = await listCustomersByHandler(ctx.repo, kind, opts.handler);
            if (opts.json) return json(customers);

            heading(`${ORDER_KIND_LABELS[kind]} customers${opts.handler ? ` of ${opts.handler}` : ''}`);
            table(
                customers.map((c) => ({
                    ID: c.id,
                    Customer: c.customerName,
                    Shop: c.shop,
                    Handler: c.handler,
                    Region: c.region,
                    Orders: c.ordersCount,
                    Converted: c.converted ? 'yes' : 'no',
                }))
            );
            console.log();
        }));

    program
        .command('orphans')
        .description('Typed rows whose canonical order is gone or now classifies elsewhere')
        .requiredOption('--kind <kind>', 'sample | bulk')
        .option('--json', 'Print the list as JSON')
        .action(withDatabase(async (ctx, opts: OutputOptions & { kind: string }) => {
            const kind = parseKind(opts.kind);
            const orphans = await findOrphanedTypedOrders(ctx.repo, kind);
            if (opts.json) return json(orphans);

            heading(`Orphaned ${ORDER_KIND_LABELS[kind].toLowerCase()} orders (${orphans.length})`);
            table(
                orphans.map((o) => ({
                    'Order ID': o.orderId,
                    Reason: o.reason,
                    'Current type': o.canonicalOrderType,
                }))
            );
            console.log();
        }));
}
