import dotenv from 'dotenv';
import { RunConfig } from './arbitrage/types.js';

dotenv.config();

export interface ExchangeCredentials {
    apiKey: string;
    apiSecret: string;
}

export interface Config {
    // Binance
    binanceApiKey: string;
    binanceApiSecret: string;
    spotHost: string;
    futuresHost: string;
    quoteAsset: string;
    httpTimeoutMs: number;
    recvWindowMs: number;

    // Bot settings
    symbols: string[];
    minProfitThreshold: number;           // Percent, strict inequality
    tradeAmount: number;                  // Asset units per leg
    pollIntervalSeconds: number;
    runDurationSeconds: number | undefined;
    simulationMode: boolean;

    // Persistence
    snapshotPath: string;
    snapshotEvery: number;                // Iterations between periodic snapshots (default: 10)
    restoreOnStart: boolean;

    // Logging
    logLevel: string;
    logDir: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

function getEnvVarOptional(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

function getEnvVarBool(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true';
}

export function getEnvVarNumber(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    if (isNaN(parsed)) return defaultValue;
    return parsed;
}

function getEnvVarOptionalNumber(name: string): number | undefined {
    const value = process.env[name];
    if (!value) return undefined;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? undefined : parsed;
}

export function getEnvVarList(name: string, defaultValue: string[]): string[] {
    const value = process.env[name];
    if (!value) return defaultValue;
    return value.split(',').map(s => s.trim().toUpperCase()).filter(s => s.length > 0);
}

export const config: Config = {
    // Binance configuration
    binanceApiKey: getEnvVarOptional('BINANCE_API_KEY', ''),
    binanceApiSecret: getEnvVarOptional('BINANCE_API_SECRET', ''),
    spotHost: getEnvVarOptional('BINANCE_SPOT_HOST', 'https://api.binance.com'),
    futuresHost: getEnvVarOptional('BINANCE_FUTURES_HOST', 'https://fapi.binance.com'),
    quoteAsset: getEnvVarOptional('QUOTE_ASSET', 'USDT').toUpperCase(),
    httpTimeoutMs: getEnvVarNumber('HTTP_TIMEOUT_MS', 10000),
    recvWindowMs: getEnvVarNumber('RECV_WINDOW_MS', 5000),

    // Bot settings
    symbols: getEnvVarList('SYMBOLS', ['BTC', 'ETH']),
    minProfitThreshold: getEnvVarNumber('MIN_PROFIT_THRESHOLD', 0.5),
    tradeAmount: getEnvVarNumber('TRADE_AMOUNT', 0.001),
    pollIntervalSeconds: getEnvVarNumber('POLL_INTERVAL_SECONDS', 60),
    runDurationSeconds: getEnvVarOptionalNumber('RUN_DURATION_SECONDS'),
    simulationMode: getEnvVarBool('SIMULATION_MODE', true),

    // Persistence
    snapshotPath: getEnvVarOptional('SNAPSHOT_PATH', 'data/opportunities.json'),
    snapshotEvery: getEnvVarNumber('SNAPSHOT_EVERY', 10),
    restoreOnStart: getEnvVarBool('RESTORE_ON_START', false),

    // Logging
    logLevel: getEnvVarOptional('LOG_LEVEL', 'info'),
    logDir: getEnvVarOptional('LOG_DIR', 'logs'),
};

/**
 * Check if we have API credentials for order placement
 */
export function hasApiCredentials(source: Config = config): boolean {
    return !!(source.binanceApiKey && source.binanceApiSecret);
}

/**
 * Get configured credentials if available
 */
export function getApiCredentials(source: Config = config): ExchangeCredentials | null {
    if (!hasApiCredentials(source)) return null;
    return {
        apiKey: source.binanceApiKey,
        apiSecret: source.binanceApiSecret,
    };
}

/**
 * Project the process config onto the settings a single run reads
 */
export function buildRunConfig(source: Config = config): RunConfig {
    return {
        symbols: [...source.symbols],
        minProfitThreshold: source.minProfitThreshold,
        tradeAmount: source.tradeAmount,
        intervalSeconds: source.pollIntervalSeconds,
        durationSeconds: source.runDurationSeconds,
        simulate: source.simulationMode,
        snapshotPath: source.snapshotPath,
        snapshotEvery: source.snapshotEvery,
        restoreOnStart: source.restoreOnStart,
    };
}

export function validateRunConfig(run: RunConfig): void {
    if (run.symbols.length === 0) {
        throw new ConfigError('SYMBOLS must name at least one asset');
    }
    if (!(run.minProfitThreshold >= 0)) {
        throw new ConfigError(`MIN_PROFIT_THRESHOLD must be >= 0, got ${run.minProfitThreshold}`);
    }
    if (!(run.tradeAmount > 0)) {
        throw new ConfigError(`TRADE_AMOUNT must be > 0, got ${run.tradeAmount}`);
    }
    if (!(run.intervalSeconds > 0)) {
        throw new ConfigError(`POLL_INTERVAL_SECONDS must be > 0, got ${run.intervalSeconds}`);
    }
    if (run.durationSeconds !== undefined && !(run.durationSeconds > 0)) {
        throw new ConfigError(`RUN_DURATION_SECONDS must be > 0 when set, got ${run.durationSeconds}`);
    }
    if (!Number.isInteger(run.snapshotEvery) || run.snapshotEvery < 1) {
        throw new ConfigError(`SNAPSHOT_EVERY must be a positive integer, got ${run.snapshotEvery}`);
    }
}
