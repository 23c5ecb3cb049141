/**
 * Date Utilities
 *
 * Server-timezone agnostic: everything works on epoch milliseconds.
 */

import { DAY_MS } from '../domain/constants.js';

/**
 * Whole days from `from` to `to`, rounded toward negative infinity.
 * Negative when `to` precedes `from`.
 *
 * @example
 * daysBetween(new Date('2024-01-01'), new Date('2024-01-31')) // => 30
 */
export function daysBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

/**
 * Latest of two dates, ignoring nulls.
 */
export function maxDate(a: Date | null, b: Date | null): Date | null {
    if (a === null) return b;
    if (b === null) return a;
    return a.getTime() >= b.getTime() ? a : b;
}
