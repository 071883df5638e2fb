/**
 * Basis arbitrage domain types
 */

export type Strategy = 'sell futures, buy spot' | 'buy futures, sell spot';

export const STRATEGIES: readonly Strategy[] = ['sell futures, buy spot', 'buy futures, sell spot'];

/**
 * One spot/futures observation for a symbol in a cycle.
 * `strategy` is non-null exactly when `profitable` is true.
 */
export interface Opportunity {
    readonly timestamp: string;         // cycle time, ISO-8601
    readonly symbol: string;
    readonly spotPrice: number;
    readonly futuresPrice: number;
    readonly premiumPercent: number;    // signed, 4 decimals
    readonly fundingRate: number | null;
    readonly profitable: boolean;
    readonly strategy: Strategy | null;
}

export interface RunConfig {
    symbols: string[];
    minProfitThreshold: number;         // percent
    tradeAmount: number;                // asset units, both legs
    intervalSeconds: number;
    durationSeconds?: number;           // unset = run until stopped
    simulate: boolean;
    snapshotPath: string;
    snapshotEvery: number;              // iterations between periodic snapshots
    restoreOnStart: boolean;
}
