/**
 * Order Executor
 * Turns a profitable opportunity into the two offsetting market orders
 */

import { MarketType, OrderExecutionPort, OrderResult, OrderSide } from '../exchange/types.js';
import { Opportunity, Strategy } from '../arbitrage/types.js';
import { logger } from '../logger.js';

interface OrderLeg {
    market: MarketType;
    side: OrderSide;
}

export interface ExecutionStats {
    dispatched: number;
    succeeded: number;
    failed: number;
    simulated: number;
}

// Futures leg always goes first
const LEGS: Record<Strategy, [OrderLeg, OrderLeg]> = {
    'sell futures, buy spot': [
        { market: 'futures', side: 'SELL' },
        { market: 'spot', side: 'BUY' },
    ],
    'buy futures, sell spot': [
        { market: 'futures', side: 'BUY' },
        { market: 'spot', side: 'SELL' },
    ],
};

export class OrderExecutor {
    private orderPort: OrderExecutionPort | null;
    private tradeAmount: number;
    private warnedReadOnly: boolean = false;
    private stats: ExecutionStats = { dispatched: 0, succeeded: 0, failed: 0, simulated: 0 };

    /**
     * Without an order port the executor is read-only whatever `simulate` says
     */
    constructor(orderPort: OrderExecutionPort | null, tradeAmount: number) {
        this.orderPort = orderPort;
        this.tradeAmount = tradeAmount;
    }

    setTradeAmount(tradeAmount: number): void {
        this.tradeAmount = tradeAmount;
    }

    isReadOnly(): boolean {
        return this.orderPort === null;
    }

    /**
     * Execute (or simulate) the hedge for an opportunity.
     * Returns false when the opportunity has no strategy or a leg fails.
     * A filled first leg is never unwound.
     */
    async dispatch(opportunity: Opportunity, simulate: boolean): Promise<boolean> {
        const strategy = opportunity.strategy;
        if (!opportunity.profitable || strategy === null) {
            logger.warn(`Refusing to dispatch non-profitable ${opportunity.symbol} opportunity`);
            return false;
        }

        this.stats.dispatched++;
        const legs = LEGS[strategy];

        if (simulate || this.orderPort === null) {
            if (!simulate && !this.warnedReadOnly) {
                logger.warn('No exchange credentials configured - order dispatch is read-only');
                this.warnedReadOnly = true;
            }
            this.stats.simulated++;
            logger.info(`[SIMULATION] ${opportunity.symbol}: ${strategy}`, {
                legs: legs.map(l => `${l.side} ${l.market}`),
                quantity: this.tradeAmount,
                premium: `${opportunity.premiumPercent}%`,
            });
            return true;
        }

        const filled: OrderResult[] = [];
        try {
            for (const leg of legs) {
                const result = await this.orderPort.submitMarketOrder(
                    leg.market,
                    opportunity.symbol,
                    leg.side,
                    this.tradeAmount
                );
                filled.push(result);
                logger.info(`Order filled: ${leg.side} ${this.tradeAmount} ${opportunity.symbol} ${leg.market}`, {
                    orderId: result.orderId,
                    status: result.status,
                });
            }
        } catch (error) {
            this.stats.failed++;
            logger.error(`Order execution failed for ${opportunity.symbol}`, {
                error: (error as Error).message,
                strategy,
                legsFilled: filled.length,
            });
            if (filled.length > 0) {
                const leg = filled[0];
                logger.error(`🚨 Unhedged exposure: ${leg.side} ${leg.quantity} ${leg.symbol} ${leg.market} filled without its offsetting leg`, {
                    orderId: leg.orderId,
                });
            }
            return false;
        }

        this.stats.succeeded++;
        return true;
    }

    getStats(): ExecutionStats {
        return { ...this.stats };
    }
}
