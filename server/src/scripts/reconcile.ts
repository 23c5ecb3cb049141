#!/usr/bin/env node
/**
 * Reconciliation maintenance job
 *
 * Runs the full resync or a single stage against DATABASE_URL, prints the
 * read-only customer reports, and edits customer profiles.
 *
 * Usage:
 *   npm run reconcile -- run
 *   npm run reconcile -- sync --kind sample
 *   npm run reconcile -- unconverted --limit 20 --json
 *   npm run reconcile -- customer:update 12 --kind sample --region 广州 --tags vip
 */

import { Command } from 'commander';
import { registerPipelineCommands } from './commands/pipeline.js';
import { registerReportCommands } from './commands/reports.js';
import { registerCustomerCommands } from './commands/customers.js';
import { registerRunCommands } from './commands/runs.js';

const program = new Command();

program
    .name('reconcile')
    .description('Order reconciliation: typed order sync, customer registries and conversions')
    .version('1.0.0');

registerPipelineCommands(program);
registerReportCommands(program);
registerCustomerCommands(program);
registerRunCommands(program);

// Filter out bare '--' that npm forwards with script arguments
const args = process.argv.filter((a) => a !== '--');
await program.parseAsync(args);
