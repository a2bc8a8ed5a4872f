import path from 'path';
import winston from 'winston';
import 'winston-daily-rotate-file';
import { getConfig } from '../../config';
import { ContactOutcome, ContactResult } from '../../types';
import { categorizeError, ErrorCategory } from '../../utils/errors';

export interface LogContext {
    company?: string;
    domain?: string;
    row?: number;
    error?: unknown;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

export interface LoggerOptions {
    level: string;
    silent: boolean;
    file_dir: string;
}

export class Logger {
    private logger: winston.Logger;

    constructor(options: LoggerOptions) {
        this.logger = this.build(options);
    }

    /** Rebuilds the transports, e.g. after a config file given on the command line was loaded. */
    configure(options: LoggerOptions) {
        this.logger.close();
        this.logger = this.build(options);
    }

    private build(options: LoggerOptions): winston.Logger {
        const instance = winston.createLogger({
            level: options.level,
            silent: options.silent,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports: [
                new winston.transports.Console({ format: winston.format.simple() }),
            ],
        });

        if (options.file_dir) {
            instance.add(new winston.transports.DailyRotateFile({
                filename: path.join(options.file_dir, 'mailsleuth-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
            }));
        }
        return instance;
    }

    log(level: string, message: string, context?: LogContext) {
        if (!context) {
            this.logger.log(level, message);
            return;
        }

        // Error objects do not survive JSON formatting, flatten them first
        const { error, ...rest } = context;
        if (error === undefined) {
            this.logger.log(level, message, rest);
            return;
        }
        this.logger.log(level, message, {
            ...rest,
            error_message: error instanceof Error ? error.message : String(error),
            error_category: rest.error_category || categorizeError(error),
            ...(error instanceof Error && level === 'error' ? { error_stack: error.stack } : {}),
        });
    }
}

export const logger = new Logger(getConfig().logging);

export type RunSummary = {
    total: number;
    found: number;
    verified: number;
    catch_all: number;
    best_guess: number;
    no_domain: number;
    no_candidates: number;
    not_found: number;
    lookup_failed: number;
    cancelled: number;
    errors: number;
    attempts: number;
    avg_latency: number;
    success_rate: number;
};

export class RunMetrics {
    private stats = {
        total: 0,
        verified: 0,
        catch_all: 0,
        best_guess: 0,
        no_domain: 0,
        no_candidates: 0,
        not_found: 0,
        lookup_failed: 0,
        cancelled: 0,
        errors: 0,
        attempts: 0,
        total_latency: 0,
    };

    record(result: ContactResult, latencyMs: number) {
        this.stats.total++;
        this.stats.attempts += result.attempts.length;
        this.stats.total_latency += latencyMs;

        switch (result.outcome) {
            case ContactOutcome.VERIFIED: this.stats.verified++; break;
            case ContactOutcome.CATCH_ALL: this.stats.catch_all++; break;
            case ContactOutcome.BEST_GUESS: this.stats.best_guess++; break;
            case ContactOutcome.NO_DOMAIN: this.stats.no_domain++; break;
            case ContactOutcome.NO_CANDIDATES: this.stats.no_candidates++; break;
            case ContactOutcome.NOT_FOUND: this.stats.not_found++; break;
            case ContactOutcome.LOOKUP_FAILED: this.stats.lookup_failed++; break;
            case ContactOutcome.CANCELLED: this.stats.cancelled++; break;
            case ContactOutcome.ERROR: this.stats.errors++; break;
        }
    }

    getSummary(): RunSummary {
        const { total_latency, ...counts } = this.stats;
        const found = counts.verified + counts.catch_all + counts.best_guess;
        return {
            ...counts,
            found,
            avg_latency: counts.total > 0 ? Math.round(total_latency / counts.total) : 0,
            success_rate: counts.total > 0 ? found / counts.total : 0,
        };
    }
}
