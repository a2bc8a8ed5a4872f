import { ContactResult } from '../types';

/**
 * Error taxonomy shared by the resolver, verifier and pipeline.
 */

export class MailSleuthError extends Error {
    constructor(message: string, public readonly code: string, public readonly context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export enum ResolutionErrorKind {
    NO_VALID_DOMAIN = 'NO_VALID_DOMAIN',
    LOOKUP_UNAVAILABLE = 'LOOKUP_UNAVAILABLE',
}

export class ResolutionError extends MailSleuthError {
    constructor(
        public readonly kind: ResolutionErrorKind,
        public readonly company: string,
        message?: string,
        public readonly cause?: unknown
    ) {
        super(message || `No mail domain for "${company}" (${kind})`, `RESOLUTION_${kind}`, { company });
    }

    /** True when the lookup failed because DNS itself could not be reached. */
    get dnsUnreachable(): boolean {
        return this.cause instanceof CapabilityError && this.cause.capability === 'dns';
    }
}

/** A whole capability (DNS server, outbound network) cannot be reached. */
export class CapabilityError extends MailSleuthError {
    constructor(public readonly capability: 'dns' | 'smtp' | 'search', message: string, public readonly cause?: unknown) {
        super(message, 'CAPABILITY_ERROR', { capability });
    }
}

/** One call failed in a way that may succeed on retry (timeout, reset, refused). */
export class TransientNetworkError extends MailSleuthError {
    constructor(message: string, public readonly errno?: string) {
        super(message, 'TRANSIENT_NETWORK_ERROR', { errno });
    }
}

/** The run was cancelled before this operation could start. */
export class CancelledError extends MailSleuthError {
    constructor(message = 'Operation cancelled') {
        super(message, 'CANCELLED');
    }
}

/** The SMTP server cannot take a probe for this address at all. */
export class SmtpUnsupportedError extends MailSleuthError {
    constructor(message: string) {
        super(message, 'SMTP_UNSUPPORTED');
    }
}

export class ConfigurationError extends MailSleuthError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

/** The input file cannot be turned into contacts. */
export class IngestError extends MailSleuthError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INGEST_ERROR', context);
    }
}

/** The run stopped early; `results` still holds one row per input contact. */
export class RunAbortedError extends MailSleuthError {
    constructor(message: string, public readonly results: readonly ContactResult[] = [], context?: Record<string, unknown>) {
        super(message, 'RUN_ABORTED', context);
    }
}

export enum ErrorCategory {
    NETWORK = 'NETWORK', // Timeout, connection refused, unreachable
    DNS = 'DNS',
    SMTP = 'SMTP',
    PARSING = 'PARSING',
    CONFIG = 'CONFIG',
    LOGIC = 'LOGIC', // Programmer error
}

export function categorizeError(error: unknown): ErrorCategory {
    if (error instanceof ConfigurationError) return ErrorCategory.CONFIG;
    if (error instanceof SmtpUnsupportedError) return ErrorCategory.SMTP;
    if (error instanceof IngestError) return ErrorCategory.PARSING;
    if (error instanceof CapabilityError) {
        if (error.capability === 'dns') return ErrorCategory.DNS;
        if (error.capability === 'smtp') return ErrorCategory.SMTP;
        return ErrorCategory.NETWORK;
    }
    if (error instanceof ResolutionError || error instanceof TransientNetworkError) return ErrorCategory.NETWORK;
    if (!(error instanceof Error)) return ErrorCategory.LOGIC;

    const msg = error.message.toLowerCase();
    if (msg.includes('querymx') || msg.includes('enodata') || msg.includes('servfail')) {
        return ErrorCategory.DNS;
    }
    if (msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('socket')) {
        return ErrorCategory.NETWORK;
    }
    if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json') || msg.includes('csv')) {
        return ErrorCategory.PARSING;
    }
    return ErrorCategory.LOGIC;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** Node system errors carry a string `code` such as ETIMEDOUT. */
export function errnoOf(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error) {
        const code = error.code;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
