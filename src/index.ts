/**
 * Spot/Futures Basis Monitor
 * Entry point
 */

import { BotManager } from './bot/manager.js';
import { BinanceClient } from './exchange/binance-client.js';
import { buildRunConfig, config, getApiCredentials, validateRunConfig } from './config.js';
import { logger } from './logger.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Promise Rejection', {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
        error: error.message,
        stack: error.stack,
    });
    process.exit(1);
});

async function main(): Promise<void> {
    const runConfig = buildRunConfig();
    validateRunConfig(runConfig);

    const credentials = getApiCredentials();
    const client = new BinanceClient({
        spotHost: config.spotHost,
        futuresHost: config.futuresHost,
        quoteAsset: config.quoteAsset,
        timeoutMs: config.httpTimeoutMs,
        recvWindowMs: config.recvWindowMs,
        credentials,
    });

    if (!credentials && !runConfig.simulate) {
        logger.warn('SIMULATION_MODE=false but no BINANCE_API_KEY/BINANCE_API_SECRET - running read-only');
    }

    const bot = new BotManager({
        marketData: client,
        orderPort: credentials ? client : undefined,
        config: runConfig,
    });

    // Graceful shutdown: the run loop writes the final snapshot before start() resolves
    process.on('SIGINT', () => {
        logger.info('Received SIGINT, shutting down...');
        bot.stop();
    });

    process.on('SIGTERM', () => {
        logger.info('Received SIGTERM, shutting down...');
        bot.stop();
    });

    await bot.start();
}

main()
    .then(() => process.exit(0))
    .catch(error => {
        logger.error('Fatal error', { error: (error as Error).message, stack: (error as Error).stack });
        process.exit(1);
    });
