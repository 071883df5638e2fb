import { describe, it, expect, afterEach } from '@jest/globals';
import {
    buildRunConfig,
    config,
    ConfigError,
    getApiCredentials,
    getEnvVarList,
    getEnvVarNumber,
    hasApiCredentials,
    validateRunConfig,
} from '../config.js';
import { RunConfig } from '../arbitrage/types.js';
import { createRunConfig } from './fakes.js';

describe('config', () => {
    const touched: string[] = [];

    function setEnv(name: string, value: string): void {
        touched.push(name);
        process.env[name] = value;
    }

    afterEach(() => {
        for (const name of touched.splice(0)) {
            delete process.env[name];
        }
    });

    describe('environment readers', () => {
        it('should parse numbers and fall back on garbage', () => {
            setEnv('TEST_BASIS_NUMBER', '0.75');
            setEnv('TEST_BASIS_GARBAGE', 'abc');

            expect(getEnvVarNumber('TEST_BASIS_NUMBER', 1)).toBe(0.75);
            expect(getEnvVarNumber('TEST_BASIS_GARBAGE', 1)).toBe(1);
            expect(getEnvVarNumber('TEST_BASIS_UNSET', 2)).toBe(2);
        });

        it('should split, trim and upper-case symbol lists', () => {
            setEnv('TEST_BASIS_SYMBOLS', ' btc, eth ,,sol ');

            expect(getEnvVarList('TEST_BASIS_SYMBOLS', [])).toEqual(['BTC', 'ETH', 'SOL']);
            expect(getEnvVarList('TEST_BASIS_UNSET', ['BTC'])).toEqual(['BTC']);
        });
    });

    describe('buildRunConfig', () => {
        it('should map the process config onto run settings', () => {
            const run = buildRunConfig({
                ...config,
                symbols: ['BTC'],
                minProfitThreshold: 0.3,
                tradeAmount: 0.002,
                pollIntervalSeconds: 30,
                runDurationSeconds: 600,
                simulationMode: false,
                snapshotPath: 'out/history.json',
                snapshotEvery: 5,
                restoreOnStart: true,
            });

            expect(run).toEqual({
                symbols: ['BTC'],
                minProfitThreshold: 0.3,
                tradeAmount: 0.002,
                intervalSeconds: 30,
                durationSeconds: 600,
                simulate: false,
                snapshotPath: 'out/history.json',
                snapshotEvery: 5,
                restoreOnStart: true,
            });
        });

        it('should default the minimum profit threshold to 0.5%', () => {
            expect(config.minProfitThreshold).toBe(0.5);
        });
    });

    describe('credentials', () => {
        it('should require both key and secret', () => {
            expect(hasApiCredentials({ ...config, binanceApiKey: 'test-key', binanceApiSecret: '' })).toBe(false);
            expect(getApiCredentials({ ...config, binanceApiKey: 'test-key', binanceApiSecret: 'test-secret' }))
                .toEqual({ apiKey: 'test-key', apiSecret: 'test-secret' });
        });
    });

    describe('validateRunConfig', () => {
        it('should accept a sane configuration', () => {
            expect(() => validateRunConfig(createRunConfig({ durationSeconds: 60 }))).not.toThrow();
        });

        it.each<{ label: string; patch: Partial<RunConfig> }>([
            { label: 'an empty symbol list', patch: { symbols: [] } },
            { label: 'a negative threshold', patch: { minProfitThreshold: -0.1 } },
            { label: 'a zero trade amount', patch: { tradeAmount: 0 } },
            { label: 'a zero interval', patch: { intervalSeconds: 0 } },
            { label: 'a zero duration', patch: { durationSeconds: 0 } },
            { label: 'a fractional snapshot cadence', patch: { snapshotEvery: 2.5 } },
        ])('should reject $label', ({ patch }) => {
            expect(() => validateRunConfig(createRunConfig(patch))).toThrow(ConfigError);
        });
    });
});
