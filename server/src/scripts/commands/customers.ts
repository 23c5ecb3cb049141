import type { Command } from 'commander';
import { customerIdSchema, ORDER_KIND_LABELS } from '@orderhub/shared';
import { updateCustomerProfile } from '../../services/reconciliation/index.js';
import { ValidationError } from '../../utils/errors.js';
import { parseKind, parseOption, withDatabase, type OutputOptions } from '../lib/context.js';
import { error, field, heading, json } from '../lib/format.js';
import { buildProfilePatch, type ProfileFlags } from '../lib/profilePatch.js';

export function registerCustomerCommands(program: Command): void {
    program
        .command('customer:update')
        .description('Edit the profile fields of one customer')
        .argument('<id>', 'Customer id')
        .requiredOption('--kind <kind>', 'sample | bulk')
        .option('--name <name>', 'Customer name')
        .option('--shop <shop>', 'Shop')
        .option('--handler <name>', 'Handler')
        .option('--region <region>', 'Region')
        .option('--notes <text>', 'Free-form notes')
        .option('--wechat <id>', 'WeChat id (sample customers only)')
        .option('--tags <tags>', 'Comma-separated tags, replacing the current ones')
        .option('--clear <fields>', 'Comma-separated fields to set to null, e.g. shop,notes')
        .option('--json', 'Print the customer as JSON')
        .action(withDatabase(async (ctx, idArg: string, opts: OutputOptions & ProfileFlags & { kind: string }) => {
            const kind = parseKind(opts.kind);
            const id = parseOption(customerIdSchema, idArg, '<id>');

            const customer = await updateCustomerProfile(ctx.repo, kind, id, buildProfilePatch(opts)).catch(
                (err: unknown) => {
                    if (err instanceof ValidationError && Array.isArray(err.details)) {
                        for (const issue of err.details) error(JSON.stringify(issue));
                    }
                    throw err;
                }
            );

            if (!customer) {
                error(`No ${kind} customer with id ${id}`);
                process.exitCode = 1;
                return;
            }
            if (opts.json) return json(customer);

            heading(`${ORDER_KIND_LABELS[kind]} customer ${customer.id}`);
            field('Customer', customer.customerName);
            field('Shop', customer.shop);
            field('Handler', customer.handler);
            field('Region', customer.region);
            if (kind === 'sample') field('WeChat', customer.wechat);
            field('Tags', customer.tags.join(', '));
            field('Notes', customer.notes);
            console.log();
        }));
}
