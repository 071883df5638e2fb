import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import { config } from './config.js';

const logDir = path.resolve(process.cwd(), config.logDir);

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
});

export const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
    ),
    transports: [
        new winston.transports.Console({
            format: combine(
                colorize(),
                timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                logFormat
            ),
        }),
        // File rotation: 10MB per file, keep 5 files max
        new DailyRotateFile({
            filename: path.join(logDir, 'combined-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: config.logLevel,
        }),
        new DailyRotateFile({
            filename: path.join(logDir, 'error-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '10m',
            maxFiles: '5',
            level: 'error',
        }),
    ],
});

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Rate-limited logger wrapper
 * A quote source that is down fails every cycle; this keeps one line per key per interval.
 */
export class RateLimitedLogger {
    private lastLogTime: Map<string, number> = new Map();
    private logCounts: Map<string, number> = new Map();
    private readonly minIntervalMs: number;
    private readonly burstLimit: number;

    constructor(minIntervalMs: number = 60000, burstLimit: number = 5) {
        this.minIntervalMs = minIntervalMs;
        this.burstLimit = burstLimit;
    }

    log(key: string, level: LogLevel, message: string, meta?: Record<string, unknown>): void {
        const now = Date.now();
        const lastTime = this.lastLogTime.get(key) || 0;
        const count = (this.logCounts.get(key) || 0) + 1;

        this.logCounts.set(key, count);

        const shouldLog =
            count <= this.burstLimit ||
            (now - lastTime) >= this.minIntervalMs;

        if (shouldLog) {
            if (count > this.burstLimit) {
                message = `${message} (repeated ${count} times)`;
                this.logCounts.set(key, 0);
            }
            this.lastLogTime.set(key, now);
            logger.log(level, message, meta);
        }
    }

    warn(key: string, message: string, meta?: Record<string, unknown>): void {
        this.log(key, 'warn', message, meta);
    }
}

/**
 * Global rate-limited logger instance (5 min default interval)
 */
export const rateLimitedLogger = new RateLimitedLogger(300000, 3);
