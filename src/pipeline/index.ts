import crypto from 'crypto';
import pLimit from 'p-limit';
import { Config, getConfig } from '../config';
import { RunCache } from '../modules/cache/run-cache';
import { candidateEmail, PatternGenerator } from '../modules/generator';
import { logger, RunMetrics } from '../modules/observability';
import { DomainRateLimiter } from '../modules/rate-limiter';
import { DomainCache, DomainResolver } from '../modules/resolver';
import { DOMAIN_WIDE_REASONS, Verifier } from '../modules/verifier';
import {
    Candidate,
    Clock,
    Contact,
    ContactOutcome,
    ContactResult,
    DnsClient,
    DomainSearch,
    SmtpTransport,
    VerdictReason,
    VerdictStatus,
    VerificationAttempt,
    VerificationVerdict,
} from '../types';
import { errorMessage, ResolutionError, ResolutionErrorKind, RunAbortedError } from '../utils/errors';
import { retryOptionsFrom } from '../utils/retry';

export interface PipelineOptions {
    bestGuess: boolean;
    capabilityFailureThreshold: number;
    unknownConfidence: number;
    clock?: Clock;
}

export interface RunOptions {
    concurrency?: number;
    signal?: AbortSignal;
}

export interface PipelineDeps {
    resolver: DomainResolver;
    generator: PatternGenerator;
    verifier: Verifier;
    options: PipelineOptions;
}

interface RunState {
    consecutiveCapabilityFailures: number;
    abortReason: string | null;
}

function isCapabilityFailure(result: ContactResult): boolean {
    return result.verdict.reason === VerdictReason.CAPABILITY_UNAVAILABLE;
}

function isAccepted(verdict: VerificationVerdict): boolean {
    return verdict.status === VerdictStatus.VALID || verdict.status === VerdictStatus.CATCH_ALL;
}

/**
 * Runs every contact through resolve, generate and verify on a bounded worker
 * pool. Results come back in input order and every contact gets exactly one,
 * whatever happened to it.
 */
export class Pipeline {
    readonly metrics = new RunMetrics();
    private readonly clock: Clock;

    constructor(private readonly deps: PipelineDeps) {
        this.clock = deps.options.clock || (() => new Date());
    }

    async run(contacts: readonly Contact[], options: RunOptions = {}): Promise<ContactResult[]> {
        const concurrency = Math.max(1, options.concurrency || 1);
        const { signal } = options;
        const limit = pLimit(concurrency);
        const state: RunState = { consecutiveCapabilityFailures: 0, abortReason: null };
        const stopped = () => signal?.aborted === true || state.abortReason !== null;

        const runId = `run-${crypto.randomUUID()}`;
        logger.log('info', `Run ${runId} started`, { contacts: contacts.length, concurrency });

        const results = await Promise.all(contacts.map((contact) => limit(async () => {
            const start = Date.now();
            const result = stopped()
                ? this.finish(contact, null, null, this.unknown(VerdictReason.CANCELLED), [], ContactOutcome.CANCELLED)
                : await this.processContact(contact, stopped);
            this.metrics.record(result, Date.now() - start);
            this.trackCapability(result, state);
            return result;
        })));

        const summary = this.metrics.getSummary();
        logger.log('info', `Run ${runId} finished`, summary);

        if (state.abortReason !== null) {
            throw new RunAbortedError(state.abortReason, results, { run_id: runId, ...summary });
        }
        return results;
    }

    private trackCapability(result: ContactResult, state: RunState): void {
        if (result.outcome === ContactOutcome.CANCELLED) return;
        if (!isCapabilityFailure(result)) {
            state.consecutiveCapabilityFailures = 0;
            return;
        }

        state.consecutiveCapabilityFailures++;
        const threshold = this.deps.options.capabilityFailureThreshold;
        if (state.consecutiveCapabilityFailures >= threshold && state.abortReason === null) {
            state.abortReason = `Aborting run: ${threshold} consecutive contacts failed because DNS or SMTP is unreachable. ` +
                'Check network access to port 25 and the configured DNS servers.';
            logger.log('error', state.abortReason, { row: result.contact.index });
        }
    }

    /** Never throws: unexpected failures become an ERROR row. */
    async processContact(contact: Contact, stopped: () => boolean = () => false): Promise<ContactResult> {
        try {
            return await this.findForContact(contact, stopped);
        } catch (e) {
            logger.log('error', `Row ${contact.index} failed: ${errorMessage(e)}`, { row: contact.index, company: contact.company, error: e });
            return this.finish(contact, null, null, this.unknown(VerdictReason.INTERNAL_ERROR), [], ContactOutcome.ERROR);
        }
    }

    private async findForContact(contact: Contact, stopped: () => boolean): Promise<ContactResult> {
        const { resolver, generator, verifier, options } = this.deps;

        let domain: string;
        try {
            domain = (await resolver.resolve(contact.company)).domain;
        } catch (e) {
            if (!(e instanceof ResolutionError)) throw e;
            if (e.kind === ResolutionErrorKind.NO_VALID_DOMAIN) {
                return this.finish(contact, null, null, this.unknown(VerdictReason.NO_DOMAIN), [], ContactOutcome.NO_DOMAIN);
            }
            logger.log('warn', `Row ${contact.index}: ${e.message}`, { row: contact.index, company: contact.company, error: e.cause });
            // Only an unreachable resolver counts towards aborting the run
            const reason = e.dnsUnreachable ? VerdictReason.CAPABILITY_UNAVAILABLE : VerdictReason.LOOKUP_UNAVAILABLE;
            return this.finish(contact, null, null, this.unknown(reason), [], ContactOutcome.LOOKUP_FAILED);
        }

        const candidates = generator.generate(contact.first_name, contact.last_name, domain);
        if (candidates.length === 0) {
            return this.finish(contact, domain, null, this.unknown(VerdictReason.NOT_FOUND), [], ContactOutcome.NO_CANDIDATES);
        }

        const attempts: VerificationAttempt[] = [];
        let cancelled = false;

        for (const candidate of candidates) {
            if (stopped()) {
                cancelled = true;
                break;
            }
            const verdict = await verifier.verify(candidate);
            if (verdict.reason === VerdictReason.CANCELLED) {
                cancelled = true;
                break;
            }
            attempts.push({ candidate, verdict });

            if (isAccepted(verdict)) {
                const outcome = verdict.status === VerdictStatus.VALID ? ContactOutcome.VERIFIED : ContactOutcome.CATCH_ALL;
                return this.finish(contact, domain, candidateEmail(candidate), verdict, attempts, outcome);
            }
            if (DOMAIN_WIDE_REASONS.has(verdict.reason)) break;
        }

        if (cancelled) {
            return this.finish(contact, domain, null, this.unknown(VerdictReason.CANCELLED), attempts, ContactOutcome.CANCELLED);
        }

        if (options.bestGuess && attempts.length > 0 && attempts.every((a) => a.verdict.reason === VerdictReason.PROBE_DISABLED)) {
            return this.finish(contact, domain, candidateEmail(candidates[0]), attempts[0].verdict, attempts, ContactOutcome.BEST_GUESS);
        }

        return this.finish(contact, domain, null, this.summarize(attempts), attempts, ContactOutcome.NOT_FOUND);
    }

    /**
     * Contact verdict when nothing was accepted: INVALID at the weakest attempt's
     * confidence when every attempt was INVALID, otherwise UNKNOWN.
     */
    private summarize(attempts: readonly VerificationAttempt[]): VerificationVerdict {
        if (attempts.length > 0 && attempts.every((a) => a.verdict.status === VerdictStatus.INVALID)) {
            return attempts.reduce((weakest, a) => (a.verdict.confidence < weakest.confidence ? a.verdict : weakest), attempts[0].verdict);
        }
        const reasons = new Set(attempts.map((a) => a.verdict.reason));
        const [only] = Array.from(reasons);
        return this.unknown(reasons.size === 1 ? only : VerdictReason.NOT_FOUND);
    }

    private unknown(reason: VerdictReason): VerificationVerdict {
        return { status: VerdictStatus.UNKNOWN, confidence: this.deps.options.unknownConfidence, checked_at: this.clock(), reason };
    }

    private finish(
        contact: Contact,
        domain: string | null,
        chosenEmail: string | null,
        verdict: VerificationVerdict,
        attempts: readonly VerificationAttempt[],
        outcome: ContactOutcome
    ): ContactResult {
        return Object.freeze({
            contact,
            domain,
            chosen_email: chosenEmail,
            verdict,
            attempts: Object.freeze([...attempts]),
            outcome,
        });
    }
}

export interface Capabilities {
    dns: DnsClient;
    smtp?: SmtpTransport | null;
    search?: DomainSearch | null;
}

export interface FindOptions {
    config?: Config;
    concurrency?: number;
    perDomainRate?: number;
    bestGuess?: boolean;
    signal?: AbortSignal;
    clock?: Clock;
    limiter?: DomainRateLimiter;
    knownDomains?: Map<string, string>;
    probeLocalPart?: (domain: string) => string;
}

/**
 * Wires a pipeline for one run: fresh domain, MX and catch-all caches and a
 * fresh rate limiter, so nothing leaks between runs.
 */
export function createPipeline(capabilities: Capabilities, options: FindOptions = {}): Pipeline {
    const config = options.config || getConfig();
    const retry = retryOptionsFrom(config.retry, {
        signal: options.signal,
        onRetry: (error, attempt, waitMs) => {
            logger.log('debug', `Retry ${attempt} in ${waitMs}ms`, { error });
        },
    });

    const limiter = options.limiter || new DomainRateLimiter({
        ratePerSecond: options.perDomainRate ?? config.pipeline.per_domain_rate,
        burst: config.pipeline.per_domain_burst,
    });

    const domainCache: DomainCache = new RunCache();
    const resolver = new DomainResolver({
        dns: capabilities.dns,
        search: capabilities.search || null,
        cache: domainCache,
        config: config.resolver,
        retry,
        knownDomains: options.knownDomains,
    });

    const verifier = new Verifier({
        dns: capabilities.dns,
        smtp: capabilities.smtp || null,
        limiter,
        config: config.verifier,
        retry,
        clock: options.clock,
        probeLocalPart: options.probeLocalPart,
    });

    return new Pipeline({
        resolver,
        generator: new PatternGenerator(config.generator.max_candidates),
        verifier,
        options: {
            bestGuess: options.bestGuess ?? config.pipeline.best_guess,
            capabilityFailureThreshold: config.pipeline.capability_failure_threshold,
            unknownConfidence: config.verifier.confidence.unknown,
            clock: options.clock,
        },
    });
}

/** Candidate emails for every contact, in input order. */
export async function findEmails(
    contacts: readonly Contact[],
    capabilities: Capabilities,
    options: FindOptions = {}
): Promise<ContactResult[]> {
    const config = options.config || getConfig();
    const pipeline = createPipeline(capabilities, { ...options, config });
    return pipeline.run(contacts, {
        concurrency: options.concurrency ?? config.pipeline.concurrency,
        signal: options.signal,
    });
}

export type { Candidate, Contact, ContactResult };
