/**
 * Order Executor Test Suite
 *
 * - Simulation never reaches the order port
 * - Leg ordering per strategy
 * - Partial fills are reported, not unwound
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { OrderExecutor } from '../bot/order-executor.js';
import { logger } from '../logger.js';
import { createOpportunity, FakeOrderPort } from './fakes.js';

// Mock the logger to avoid console noise during tests
jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

describe('OrderExecutor', () => {
    let port: FakeOrderPort;
    let executor: OrderExecutor;

    beforeEach(() => {
        jest.clearAllMocks();
        port = new FakeOrderPort();
        executor = new OrderExecutor(port, 0.01);
    });

    describe('Simulation', () => {
        it('should succeed without touching the order port', async () => {
            const sellFutures = createOpportunity();
            const buyFutures = createOpportunity({ premiumPercent: -1, strategy: 'buy futures, sell spot' });

            expect(await executor.dispatch(sellFutures, true)).toBe(true);
            expect(await executor.dispatch(buyFutures, true)).toBe(true);

            expect(port.orders).toHaveLength(0);
            expect(executor.getStats()).toEqual({ dispatched: 2, succeeded: 0, failed: 0, simulated: 2 });
        });

        it('should stay read-only without an order port even when not simulating', async () => {
            const readOnly = new OrderExecutor(null, 0.01);

            expect(readOnly.isReadOnly()).toBe(true);
            expect(await readOnly.dispatch(createOpportunity(), false)).toBe(true);
            expect(await readOnly.dispatch(createOpportunity(), false)).toBe(true);

            expect(logger.warn).toHaveBeenCalledTimes(1);
            expect(logger.warn).toHaveBeenCalledWith('No exchange credentials configured - order dispatch is read-only');
        });
    });

    describe('Live dispatch', () => {
        it('should sell futures then buy spot for a positive premium', async () => {
            const ok = await executor.dispatch(createOpportunity({ symbol: 'BTC' }), false);

            expect(ok).toBe(true);
            expect(port.orders).toEqual([
                { market: 'futures', symbol: 'BTC', side: 'SELL', quantity: 0.01 },
                { market: 'spot', symbol: 'BTC', side: 'BUY', quantity: 0.01 },
            ]);
        });

        it('should buy futures then sell spot for a negative premium', async () => {
            const opportunity = createOpportunity({
                symbol: 'ETH',
                spotPrice: 3000,
                futuresPrice: 2970,
                premiumPercent: -1,
                strategy: 'buy futures, sell spot',
            });

            expect(await executor.dispatch(opportunity, false)).toBe(true);
            expect(port.orders).toEqual([
                { market: 'futures', symbol: 'ETH', side: 'BUY', quantity: 0.01 },
                { market: 'spot', symbol: 'ETH', side: 'SELL', quantity: 0.01 },
            ]);
        });

        it('should use the updated trade amount for both legs', async () => {
            executor.setTradeAmount(0.5);

            await executor.dispatch(createOpportunity(), false);

            expect(port.orders.map(o => o.quantity)).toEqual([0.5, 0.5]);
        });

        it('should refuse a non-profitable opportunity', async () => {
            const flat = createOpportunity({ premiumPercent: 0.1, profitable: false, strategy: null });

            expect(await executor.dispatch(flat, false)).toBe(false);
            expect(port.orders).toHaveLength(0);
        });
    });

    describe('Failures', () => {
        it('should return false and skip the spot leg when the futures leg fails', async () => {
            port.failOn.add(1);

            expect(await executor.dispatch(createOpportunity(), false)).toBe(false);
            expect(port.orders).toHaveLength(1);
            expect(executor.getStats().failed).toBe(1);
        });

        it('should report an unhedged futures fill when the spot leg fails', async () => {
            port.failOn.add(2);

            expect(await executor.dispatch(createOpportunity(), false)).toBe(false);
            expect(port.orders).toHaveLength(2);
            expect(logger.error).toHaveBeenCalledWith(
                '🚨 Unhedged exposure: SELL 0.01 BTC futures filled without its offsetting leg',
                { orderId: 'order-1' }
            );
        });

        it('should not retry a failed dispatch', async () => {
            port.failAll = true;

            await executor.dispatch(createOpportunity(), false);

            expect(port.orders).toHaveLength(1);
        });
    });
});
