/**
 * Opportunity Store
 * Append-only history of every observation, snapshotted to a JSON file
 *
 * Snapshots always carry the full history and replace the previous file.
 */

import fs from 'fs';
import path from 'path';
import { Opportunity, STRATEGIES, Strategy } from '../arbitrage/types.js';
import { logger } from '../logger.js';

export interface SymbolSummary {
    observations: number;
    profitable: number;
    maxAbsPremium: number;
    lastPremium: number;
}

export interface HistorySummary {
    total: number;
    profitable: number;
    bySymbol: Record<string, SymbolSummary>;
}

function isStrategy(value: unknown): value is Strategy {
    return typeof value === 'string' && STRATEGIES.some(s => s === value);
}

/**
 * Shape check for records read back from disk
 */
export function isOpportunityRecord(value: unknown): value is Opportunity {
    if (typeof value !== 'object' || value === null) return false;
    const field = (key: keyof Opportunity): unknown => Reflect.get(value, key);

    if (typeof field('timestamp') !== 'string' || typeof field('symbol') !== 'string') return false;
    if (typeof field('spotPrice') !== 'number' || typeof field('futuresPrice') !== 'number') return false;
    if (typeof field('premiumPercent') !== 'number' || typeof field('profitable') !== 'boolean') return false;

    const fundingRate = field('fundingRate');
    if (fundingRate !== null && typeof fundingRate !== 'number') return false;

    // strategy present iff profitable
    if (field('profitable')) return isStrategy(field('strategy'));
    return field('strategy') === null;
}

function toRecord(o: Opportunity): Opportunity {
    return Object.freeze({
        timestamp: o.timestamp,
        symbol: o.symbol,
        spotPrice: o.spotPrice,
        futuresPrice: o.futuresPrice,
        premiumPercent: o.premiumPercent,
        fundingRate: o.fundingRate,
        profitable: o.profitable,
        strategy: o.strategy,
    });
}

export class OpportunityStore {
    private history: Opportunity[] = [];

    /**
     * Add observations in the order given
     */
    append(opportunities: readonly Opportunity[]): void {
        for (const o of opportunities) {
            this.history.push(o);
        }
    }

    getHistory(): readonly Opportunity[] {
        return this.history;
    }

    get size(): number {
        return this.history.length;
    }

    /**
     * Write the full history to `destination`, replacing any earlier snapshot
     */
    snapshot(destination: string): number {
        const dir = path.dirname(destination);
        if (!fs.existsSync(dir)) {
            logger.info(`[OpportunityStore] Creating snapshot directory: ${dir}`);
            fs.mkdirSync(dir, { recursive: true });
        }

        // Rename over the target so a crash mid-write never leaves a truncated file
        const tempFile = `${destination}.tmp`;
        fs.writeFileSync(tempFile, JSON.stringify(this.history.map(toRecord), null, 2));
        fs.renameSync(tempFile, destination);

        logger.info(`[OpportunityStore] Saved ${this.history.length} opportunities to ${destination}`);
        return this.history.length;
    }

    /**
     * Replace the history with the content of `source`.
     * A missing or unreadable file leaves the current history untouched and returns 0.
     */
    restore(source: string): number {
        if (!fs.existsSync(source)) {
            logger.info(`[OpportunityStore] No snapshot at ${source}, starting with current history`);
            return 0;
        }

        let data: unknown;
        try {
            data = JSON.parse(fs.readFileSync(source, 'utf-8'));
        } catch (e) {
            logger.warn(`[OpportunityStore] Could not read snapshot ${source}: ${(e as Error).message}`);
            return 0;
        }

        if (!Array.isArray(data)) {
            logger.warn(`[OpportunityStore] Snapshot ${source} is not a list, ignoring`);
            return 0;
        }

        const records: Opportunity[] = [];
        for (const [index, item] of data.entries()) {
            if (!isOpportunityRecord(item)) {
                logger.warn(`[OpportunityStore] Snapshot ${source} has a malformed record at index ${index}, ignoring file`);
                return 0;
            }
            records.push(toRecord(item));
        }

        this.history = records;
        logger.info(`[OpportunityStore] Loaded ${records.length} opportunities from ${source}`);
        return records.length;
    }

    /**
     * Per-symbol statistics over the whole history
     */
    getSummary(): HistorySummary {
        const bySymbol: Record<string, SymbolSummary> = {};
        let profitable = 0;

        for (const o of this.history) {
            const entry = bySymbol[o.symbol] ?? {
                observations: 0,
                profitable: 0,
                maxAbsPremium: 0,
                lastPremium: 0,
            };
            entry.observations++;
            if (o.profitable) {
                entry.profitable++;
                profitable++;
            }
            entry.maxAbsPremium = Math.max(entry.maxAbsPremium, Math.abs(o.premiumPercent));
            entry.lastPremium = o.premiumPercent;
            bySymbol[o.symbol] = entry;
        }

        return { total: this.history.length, profitable, bySymbol };
    }
}
