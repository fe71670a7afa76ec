import path from 'path';
import winston from 'winston';
import 'winston-daily-rotate-file';
import { CardOutcome, SkipReason } from '../../types';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const isTestRun = () => process.env.NODE_ENV === 'test';

export class Logger {
    private logger: winston.Logger;
    private fileTransportDir: string | null = null;

    constructor() {
        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: [
                new winston.transports.Console({ format: winston.format.simple(), silent: isTestRun() })
            ]
        });
    }

    /**
     * Applies the configured level and, outside of tests, attaches the
     * rotating file transport. Safe to call more than once.
     */
    configure(options: { level: LogLevel; dir: string }) {
        this.logger.level = options.level;
        if (isTestRun() || this.fileTransportDir === options.dir) return;

        this.logger.add(new winston.transports.DailyRotateFile({
            filename: path.join(options.dir, 'lead-finder-%DATE%.log'),
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: '14d'
        }));
        this.fileTransportDir = options.dir;
    }

    log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
        this.logger.log(level, message, meta);
    }
}

export const logger = new Logger();

export type RunSummary = {
    accepted: number;
    skipped: Record<SkipReason, number>;
    avg_card_latency: number;
};

/** Per-run card counters, reported once the harvester stops. */
export class RunMetrics {
    private accepted = 0;
    private skipped: Record<SkipReason, number> = {
        'missing-label': 0,
        'duplicate': 0,
        'activation-failed': 0,
        'extraction-failed': 0,
    };
    private timedCards = 0;
    private totalLatency = 0;

    record(outcome: CardOutcome, latencyMs?: number) {
        if (outcome.kind === 'extracted') {
            this.accepted++;
        } else {
            this.skipped[outcome.reason]++;
        }
        if (latencyMs !== undefined) {
            this.timedCards++;
            this.totalLatency += latencyMs;
        }
    }

    getSummary(): RunSummary {
        return {
            accepted: this.accepted,
            skipped: { ...this.skipped },
            avg_card_latency: this.timedCards > 0 ? Math.round(this.totalLatency / this.timedCards) : 0
        };
    }
}
