/**
 * Output formatting utilities for the reconcile CLI
 */

import chalk from 'chalk';

export type Cell = string | number | boolean | Date | null | undefined;

export function heading(text: string): void {
    console.log(chalk.bold.cyan(`\n${text}`));
    console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: Cell): void {
    const display = value === null || value === undefined ? chalk.dim('—') : cellText(value);
    console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
    console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
    console.error(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
    console.log(chalk.yellow(`! ${text}`));
}

export function statusColor(status: string): string {
    if (status === 'completed') return chalk.green(status);
    if (status === 'partial' || status === 'running') return chalk.yellow(status);
    if (status === 'failed') return chalk.red(status);
    return status;
}

/** yyyy-mm-dd in UTC */
export function formatDate(date: Date | null | undefined): string {
    return date ? date.toISOString().slice(0, 10) : '';
}

function cellText(value: Cell): string {
    if (value instanceof Date) return formatDate(value);
    return String(value ?? '');
}

export function json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
}

export function table(rows: Record<string, Cell>[], columns?: string[]): void {
    if (rows.length === 0) {
        console.log(chalk.dim('  No results'));
        return;
    }

    const cols = columns || Object.keys(rows[0]);
    const widths = cols.map((c) =>
        Math.max(c.length, ...rows.map((r) => cellText(r[c]).length))
    );

    // Header
    const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ');
    console.log(chalk.bold(`  ${header}`));
    console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

    // Rows
    for (const row of rows) {
        const line = cols.map((c, i) => cellText(row[c]).padEnd(widths[i])).join('  ');
        console.log(`  ${line}`);
    }
}
