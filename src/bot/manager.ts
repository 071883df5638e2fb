/**
 * Bot Manager
 * Drives detection-then-dispatch cycles on a fixed interval
 *
 * Lifecycle: idle -> running -> stopping -> stopped. Whatever ends the run
 * (duration bound, stop(), or an error escaping the loop), the history is
 * snapshotted once more before reaching `stopped`.
 */

import { MarketDataPort, OrderExecutionPort } from '../exchange/types.js';
import { RunConfig } from '../arbitrage/types.js';
import { validateRunConfig } from '../config.js';
import { logger } from '../logger.js';
import { OpportunityDetector } from './opportunity-detector.js';
import { OrderExecutor } from './order-executor.js';
import { OpportunityStore } from './opportunity-store.js';

export type SchedulerState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface BotStats {
    startTime: Date | null;
    iterations: number;
    opportunitiesFound: number;
    dispatched: number;
    dispatchFailures: number;
    cycleErrors: number;
    snapshotsWritten: number;
}

export interface BotDependencies {
    marketData: MarketDataPort;
    orderPort?: OrderExecutionPort;
    store?: OpportunityStore;
    config: RunConfig;
}

export class SchedulerStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SchedulerStateError';
    }
}

// The symbol list is owned here so callers cannot change it mid-cycle
function copyRunConfig(source: RunConfig): RunConfig {
    return { ...source, symbols: [...source.symbols] };
}

export class BotManager {
    private runConfig: RunConfig;
    private store: OpportunityStore;
    private opportunityDetector: OpportunityDetector;
    private orderExecutor: OrderExecutor;

    private state: SchedulerState = 'idle';
    private stats: BotStats;
    private currentDelayTimeout: NodeJS.Timeout | null = null;
    private delayResolve: (() => void) | null = null;

    constructor(deps: BotDependencies) {
        this.runConfig = copyRunConfig(deps.config);
        validateRunConfig(this.runConfig);
        this.store = deps.store ?? new OpportunityStore();
        this.opportunityDetector = new OpportunityDetector(deps.marketData, this.store, this.runConfig.minProfitThreshold);
        this.orderExecutor = new OrderExecutor(deps.orderPort ?? null, this.runConfig.tradeAmount);

        this.stats = {
            startTime: null,
            iterations: 0,
            opportunitiesFound: 0,
            dispatched: 0,
            dispatchFailures: 0,
            cycleErrors: 0,
            snapshotsWritten: 0,
        };
    }

    /**
     * Adjust settings before the run starts. Frozen once running.
     * An invalid result throws ConfigError and leaves the current settings in place.
     */
    updateConfig(patch: Partial<RunConfig>): void {
        if (this.state !== 'idle') {
            throw new SchedulerStateError(`Cannot change configuration while ${this.state}`);
        }
        const next = copyRunConfig({ ...this.runConfig, ...patch });
        validateRunConfig(next);
        this.runConfig = next;
        this.opportunityDetector.setThreshold(this.runConfig.minProfitThreshold);
        this.orderExecutor.setTradeAmount(this.runConfig.tradeAmount);
    }

    /**
     * Simulating, either by choice or for lack of an order port
     */
    isSimulating(): boolean {
        return this.runConfig.simulate || this.orderExecutor.isReadOnly();
    }

    /**
     * Run until the duration elapses or stop() is called
     */
    async start(): Promise<void> {
        if (this.state !== 'idle') {
            throw new SchedulerStateError(`Cannot start from state ${this.state}`);
        }

        this.state = 'running';
        const loopStart = Date.now();
        this.stats.startTime = new Date(loopStart);

        logger.info('='.repeat(60));
        logger.info('Basis Monitor - Starting');
        logger.info(`Mode: ${this.isSimulating() ? 'SIMULATION' : 'LIVE'}`);
        logger.info(`Symbols: ${this.runConfig.symbols.join(', ')} | threshold ${this.runConfig.minProfitThreshold}% | ` +
            `interval ${this.runConfig.intervalSeconds}s | duration ${this.runConfig.durationSeconds ?? '∞'}s`);
        logger.info('='.repeat(60));

        try {
            if (this.runConfig.restoreOnStart) {
                this.store.restore(this.runConfig.snapshotPath);
            }

            while (this.state === 'running') {
                await this.runCycle();

                if (this.stats.iterations % this.runConfig.snapshotEvery === 0) {
                    this.saveSnapshot();
                }

                if (this.durationElapsed(loopStart)) {
                    logger.info(`Run duration of ${this.runConfig.durationSeconds}s reached`);
                    this.state = 'stopping';
                    break;
                }

                if (this.state === 'running') {
                    await this.delay(this.runConfig.intervalSeconds * 1000);
                }
            }
        } finally {
            this.state = 'stopping';
            this.clearDelay();
            this.finalSnapshot();
            this.state = 'stopped';
            this.logSummary();
            logger.info('Bot stopped');
        }
    }

    /**
     * Request a stop. Cuts the current sleep short; an in-flight dispatch completes first.
     */
    stop(): void {
        if (this.state === 'idle') {
            this.state = 'stopped';
            return;
        }
        if (this.state !== 'running') return;

        logger.info('Stopping bot...');
        this.state = 'stopping';
        this.clearDelay();
    }

    /**
     * One detection-then-dispatch pass. Errors are logged and counted, never rethrown.
     */
    async runCycle(): Promise<void> {
        this.stats.iterations++;
        const cycleStart = Date.now();

        try {
            const opportunities = await this.opportunityDetector.detect(this.runConfig.symbols);
            this.stats.opportunitiesFound += opportunities.length;

            if (this.isSimulating()) {
                return;
            }

            for (const opportunity of opportunities) {
                const success = await this.orderExecutor.dispatch(opportunity, this.runConfig.simulate);
                this.stats.dispatched++;
                if (success) {
                    logger.info(`Dispatched ${opportunity.strategy} for ${opportunity.symbol}`);
                } else {
                    this.stats.dispatchFailures++;
                    logger.warn(`Dispatch failed for ${opportunity.symbol}`);
                }

                // Let the current hedge finish, but start no new one once stopping
                if (this.state !== 'running') {
                    logger.info('Stop requested, skipping remaining dispatches this cycle');
                    break;
                }
            }
        } catch (error) {
            this.stats.cycleErrors++;
            logger.error('Cycle error', { error: (error as Error).message });
        } finally {
            const duration = Date.now() - cycleStart;
            if (duration > 1000) {
                logger.debug(`Cycle ${this.stats.iterations} completed in ${(duration / 1000).toFixed(1)}s`);
            }
        }
    }

    getState(): SchedulerState {
        return this.state;
    }

    getStats(): BotStats {
        return { ...this.stats };
    }

    getStore(): OpportunityStore {
        return this.store;
    }

    private durationElapsed(loopStart: number): boolean {
        const duration = this.runConfig.durationSeconds;
        if (duration === undefined) return false;
        return (Date.now() - loopStart) / 1000 >= duration;
    }

    private saveSnapshot(): void {
        try {
            this.store.snapshot(this.runConfig.snapshotPath);
            this.stats.snapshotsWritten++;
        } catch (error) {
            logger.error('Failed to save opportunity snapshot', {
                path: this.runConfig.snapshotPath,
                error: (error as Error).message,
            });
        }
    }

    private finalSnapshot(): void {
        logger.info('Writing final opportunity snapshot...');
        this.saveSnapshot();
    }

    private logSummary(): void {
        const summary = this.store.getSummary();
        logger.info(`Run summary: ${this.stats.iterations} cycles, ${summary.total} observations, ` +
            `${summary.profitable} profitable, ${this.stats.dispatched} dispatched (${this.stats.dispatchFailures} failed)`);
        for (const [symbol, s] of Object.entries(summary.bySymbol)) {
            logger.info(`  ${symbol}: ${s.observations} obs, ${s.profitable} profitable, ` +
                `max |premium| ${s.maxAbsPremium}%, last ${s.lastPremium}%`);
        }
    }

    /**
     * Interruptible delay: stop() resolves it early
     */
    private delay(ms: number): Promise<void> {
        return new Promise(resolve => {
            this.delayResolve = resolve;
            this.currentDelayTimeout = setTimeout(() => {
                this.currentDelayTimeout = null;
                this.delayResolve = null;
                resolve();
            }, ms);
        });
    }

    private clearDelay(): void {
        if (this.currentDelayTimeout) {
            clearTimeout(this.currentDelayTimeout);
            this.currentDelayTimeout = null;
        }
        if (this.delayResolve) {
            this.delayResolve();
            this.delayResolve = null;
        }
    }
}
