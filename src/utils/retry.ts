import { RetryConfig } from '../config';
import { errnoOf, TransientNetworkError } from './errors';

export interface RetryOptions {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterMs: number;
    factor?: number;
    retryCondition?: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
    signal?: AbortSignal;
    random?: () => number;
}

const TRANSIENT_ERRNOS = new Set([
    'ETIMEDOUT', 'ETIMEOUT', 'ECONNREFUSED', 'ECONNRESET', 'EPIPE', 'EAI_AGAIN', 'ESERVFAIL', 'ECONNABORTED',
]);

/** Timeouts, resets and refused connections; never protocol answers. */
export function isTransient(error: unknown): boolean {
    if (error instanceof TransientNetworkError) return true;
    const code = errnoOf(error);
    return code !== undefined && TRANSIENT_ERRNOS.has(code);
}

export function retryOptionsFrom(config: RetryConfig, overrides: Partial<RetryOptions> = {}): RetryOptions {
    return {
        attempts: config.attempts,
        baseDelayMs: config.base_delay_ms,
        maxDelayMs: config.max_delay_ms,
        jitterMs: config.jitter_ms,
        retryCondition: isTransient,
        ...overrides,
    };
}

export function backoffDelay(attempt: number, options: RetryOptions): number {
    const factor = options.factor || 2;
    const random = options.random || Math.random;
    const exponential = Math.min(options.maxDelayMs, options.baseDelayMs * Math.pow(factor, attempt));
    return exponential + Math.floor(random() * options.jitterMs);
}

/**
 * Resolves after `ms`, or early (without rejecting) once the signal aborts,
 * so a cancelled run never waits out a backoff.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve();
    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Runs `fn` up to `attempts` times with exponential backoff and jitter.
 * Errors rejected by `retryCondition` are thrown immediately.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
    const attempts = Math.max(1, options.attempts);
    let lastError: unknown;

    for (let i = 0; i < attempts; i++) {
        try {
            return await fn(i);
        } catch (error) {
            lastError = error;

            if (options.retryCondition && !options.retryCondition(error)) {
                throw error;
            }

            const isLastAttempt = i === attempts - 1;
            if (isLastAttempt || options.signal?.aborted) break;

            const waitTime = backoffDelay(i, options);
            options.onRetry?.(error, i + 1, waitTime);
            await sleep(waitTime, options.signal);
        }
    }

    throw lastError;
}

/** Rejects with a TransientNetworkError when `promise` has not settled within `ms`. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        let settled = false;
        const timer = setTimeout(() => {
            if (settled) return;
            settled = true;
            reject(new TransientNetworkError(`${label} timed out after ${ms}ms`, 'ETIMEDOUT'));
        }, ms);

        promise.then(
            (value) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}
