/**
 * Opportunity Detector
 * Compares spot and futures quotes per symbol to find basis opportunities
 */

import { MarketDataPort } from '../exchange/types.js';
import { Opportunity } from '../arbitrage/types.js';
import { calculatePremium, isProfitable, selectStrategy } from '../arbitrage/premium.js';
import { logger, rateLimitedLogger } from '../logger.js';
import { OpportunityStore } from './opportunity-store.js';

type Signal = 'spot' | 'futures' | 'funding';

interface SymbolQuotes {
    spot: number | null;
    futures: number | null;
    fundingRate: number | null;
}

export class OpportunityDetector {
    private marketData: MarketDataPort;
    private store: OpportunityStore;
    private minProfitThreshold: number;

    constructor(marketData: MarketDataPort, store: OpportunityStore, minProfitThreshold: number) {
        this.marketData = marketData;
        this.store = store;
        this.minProfitThreshold = minProfitThreshold;
    }

    setThreshold(minProfitThreshold: number): void {
        this.minProfitThreshold = minProfitThreshold;
    }

    /**
     * Run one detection pass.
     * Every observation goes to the store; only profitable ones are returned.
     */
    async detect(symbols: readonly string[], cycleTime: Date = new Date()): Promise<Opportunity[]> {
        const timestamp = cycleTime.toISOString();
        const profitable: Opportunity[] = [];

        for (const symbol of symbols) {
            const opportunity = await this.evaluate(symbol, timestamp);
            if (!opportunity) continue;

            this.store.append([opportunity]);

            if (opportunity.profitable) {
                profitable.push(opportunity);
                logger.info(`💰 ${symbol} premium ${opportunity.premiumPercent}% -> ${opportunity.strategy}`, {
                    spot: opportunity.spotPrice,
                    futures: opportunity.futuresPrice,
                    fundingRate: opportunity.fundingRate,
                });
            } else {
                logger.debug(`${symbol} premium ${opportunity.premiumPercent}% below threshold ${this.minProfitThreshold}%`, {
                    spot: opportunity.spotPrice,
                    futures: opportunity.futuresPrice,
                    fundingRate: opportunity.fundingRate,
                });
            }
        }

        return profitable;
    }

    /**
     * Build the observation for one symbol, or null when a quote is missing
     */
    private async evaluate(symbol: string, timestamp: string): Promise<Opportunity | null> {
        const { spot, futures, fundingRate } = await this.fetchQuotes(symbol);

        // Partial data never produces a record
        if (spot === null || futures === null) {
            logger.debug(`Skipping ${symbol}: missing ${spot === null ? 'spot' : 'futures'} price`);
            return null;
        }

        const premiumPercent = calculatePremium(spot, futures);
        if (premiumPercent === null) {
            logger.debug(`Skipping ${symbol}: premium undefined for spot=${spot}`);
            return null;
        }

        const profitable = isProfitable(premiumPercent, this.minProfitThreshold);

        return Object.freeze({
            timestamp,
            symbol,
            spotPrice: spot,
            futuresPrice: futures,
            premiumPercent,
            fundingRate,
            profitable,
            strategy: profitable ? selectStrategy(premiumPercent) : null,
        });
    }

    /**
     * Fetch the three signals concurrently; a failed call becomes null
     */
    private async fetchQuotes(symbol: string): Promise<SymbolQuotes> {
        const [spot, futures, fundingRate] = await Promise.all([
            this.fetchSignal(symbol, 'spot', () => this.marketData.getSpotPrice(symbol)),
            this.fetchSignal(symbol, 'futures', () => this.marketData.getFuturesPrice(symbol)),
            this.fetchSignal(symbol, 'funding', () => this.marketData.getFundingRate(symbol)),
        ]);
        return { spot, futures, fundingRate };
    }

    private async fetchSignal(symbol: string, signal: Signal, request: () => Promise<number>): Promise<number | null> {
        try {
            return await request();
        } catch (error) {
            rateLimitedLogger.warn(`fetch-${signal}-${symbol}`, `Failed to fetch ${signal} for ${symbol}`, {
                error: (error as Error).message,
            });
            return null;
        }
    }
}
