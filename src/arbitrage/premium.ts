/**
 * Premium Calculator
 * Percentage premium of futures over spot and the decision rule built on it
 */

import { Strategy } from './types.js';

/**
 * Round to a fixed number of decimals using the exact binary value, so
 * 0.00144999... stays 0.0014. Exact binary ties go away from zero.
 */
export function roundTo(value: number, decimals: number): number {
    const rounded = Number(value.toFixed(decimals));
    // toFixed keeps the sign of tiny negatives ("-0.0000")
    return rounded === 0 ? 0 : rounded;
}

/**
 * ((futures - spot) / spot) * 100, rounded to 4 decimals.
 * Null when a quote is missing or spot is zero.
 */
export function calculatePremium(
    spot: number | null | undefined,
    futures: number | null | undefined
): number | null {
    if (spot === null || spot === undefined || futures === null || futures === undefined) {
        return null;
    }
    if (!spot || Number.isNaN(futures)) {
        return null;
    }
    return roundTo(((futures - spot) / spot) * 100, 4);
}

/**
 * Strict: a premium exactly at the threshold is not profitable
 */
export function isProfitable(premiumPercent: number, minProfitThreshold: number): boolean {
    return Math.abs(premiumPercent) > minProfitThreshold;
}

/**
 * Futures rich -> short futures, buy spot. Futures cheap -> the reverse.
 */
export function selectStrategy(premiumPercent: number): Strategy | null {
    if (premiumPercent > 0) return 'sell futures, buy spot';
    if (premiumPercent < 0) return 'buy futures, sell spot';
    return null;
}
