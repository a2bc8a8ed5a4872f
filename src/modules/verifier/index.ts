import { VerifierConfig } from '../../config';
import {
    Candidate,
    Clock,
    DnsClient,
    SmtpProbeResponse,
    SmtpTransport,
    VerdictReason,
    VerdictStatus,
    VerificationVerdict,
} from '../../types';
import { CancelledError, CapabilityError, SmtpUnsupportedError } from '../../utils/errors';
import { isTransient, RetryOptions, withRetry } from '../../utils/retry';
import { RunCache } from '../cache/run-cache';
import { candidateEmail } from '../generator';
import { logger } from '../observability';
import { DomainRateLimiter } from '../rate-limiter';

type CatchAllState = 'yes' | 'no' | 'undetermined';

type ProbeOutcome =
    | { kind: 'reply'; response: SmtpProbeResponse }
    | { kind: 'unreachable'; capability: boolean }
    | { kind: 'unsupported' };

/** Verdicts that hold for the whole domain, so later candidates would get the same one. */
export const DOMAIN_WIDE_REASONS: ReadonlySet<VerdictReason> = new Set([
    VerdictReason.NO_MX,
    VerdictReason.PROBE_DISABLED,
    VerdictReason.CAPABILITY_UNAVAILABLE,
]);

export function randomProbeLocalPart(): string {
    return `mailsleuth-${Math.random().toString(36).slice(2, 12)}`;
}

export interface VerifierDeps {
    dns: DnsClient;
    smtp: SmtpTransport | null;
    limiter: DomainRateLimiter;
    config: VerifierConfig;
    retry: RetryOptions;
    clock?: Clock;
    /** Local part used to test whether a domain accepts every recipient. */
    probeLocalPart?: (domain: string) => string;
    mxCache?: RunCache<string[]>;
    catchAllCache?: RunCache<CatchAllState>;
}

/**
 * Turns a candidate address into a verdict through an MX lookup and, when
 * enabled, an SMTP RCPT probe. Expected network conditions become UNKNOWN
 * verdicts; only programming errors propagate.
 */
export class Verifier {
    private readonly mxCache: RunCache<string[]>;
    private readonly catchAllCache: RunCache<CatchAllState>;
    private readonly clock: Clock;
    private readonly probeLocalPart: (domain: string) => string;

    constructor(private readonly deps: VerifierDeps) {
        this.mxCache = deps.mxCache || new RunCache<string[]>();
        this.catchAllCache = deps.catchAllCache || new RunCache<CatchAllState>();
        this.clock = deps.clock || (() => new Date());
        this.probeLocalPart = deps.probeLocalPart || (
            deps.config.catch_all_probe === 'sentinel'
                ? () => deps.config.catch_all_sentinel
                : randomProbeLocalPart
        );
    }

    /** Number of catch-all probes started in this run. */
    get catchAllChecks(): number {
        return this.catchAllCache.computeCount;
    }

    async verify(candidate: Candidate): Promise<VerificationVerdict> {
        const { confidence } = this.deps.config;
        const domain = candidate.domain;

        let hosts: string[];
        try {
            hosts = await this.mxCache.getOrCompute(domain, () => withRetry(() => this.deps.dns.lookupMx(domain), this.deps.retry));
        } catch (e) {
            if (e instanceof CapabilityError) {
                logger.log('warn', `DNS unavailable while verifying ${candidateEmail(candidate)}`, { domain, error: e });
                return this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.CAPABILITY_UNAVAILABLE);
            }
            if (isTransient(e)) {
                logger.log('warn', `MX lookup failed for ${domain}`, { domain, error: e });
                return this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.DNS_FAILURE);
            }
            throw e;
        }

        if (hosts.length === 0) {
            return this.verdict(VerdictStatus.INVALID, confidence.invalid_no_mx, VerdictReason.NO_MX);
        }

        const smtp = this.deps.smtp;
        if (!smtp || !this.deps.config.smtp_enabled) {
            return this.verdict(VerdictStatus.UNKNOWN, confidence.mx_only, VerdictReason.PROBE_DISABLED);
        }

        try {
            const outcome = await this.probe(smtp, hosts, candidate.local_part, domain);
            switch (outcome.kind) {
                case 'unsupported':
                    return this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.UNSUPPORTED);
                case 'unreachable':
                    return outcome.capability
                        ? this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.CAPABILITY_UNAVAILABLE)
                        : this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.CONNECTION_FAILED);
                case 'reply':
                    return await this.classifyReply(outcome.response, smtp, hosts, domain);
            }
        } catch (e) {
            if (!(e instanceof CancelledError)) throw e;
            return this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.CANCELLED);
        }
    }

    private async classifyReply(
        response: SmtpProbeResponse,
        smtp: SmtpTransport,
        hosts: string[],
        domain: string
    ): Promise<VerificationVerdict> {
        const { confidence } = this.deps.config;

        if (response.stage !== 'rcpt') {
            logger.log('debug', `${domain} refused the probe at ${response.stage}`, { domain, code: response.code, reply: response.message });
            return this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.SENDER_REJECTED);
        }

        if (response.code >= 200 && response.code < 300) {
            switch (await this.catchAllState(smtp, hosts, domain)) {
                case 'yes':
                    return this.verdict(VerdictStatus.CATCH_ALL, confidence.catch_all, VerdictReason.CATCH_ALL_DOMAIN);
                case 'no':
                    return this.verdict(VerdictStatus.VALID, confidence.valid, VerdictReason.MAILBOX_ACCEPTED);
                case 'undetermined':
                    return this.verdict(VerdictStatus.VALID, confidence.valid_unconfirmed, VerdictReason.CATCH_ALL_UNDETERMINED);
            }
        }
        if (response.code >= 500) {
            return this.verdict(VerdictStatus.INVALID, confidence.invalid_rejected, VerdictReason.MAILBOX_REJECTED);
        }
        // 4xx: greylisting or throttling, says nothing about the mailbox
        return this.verdict(VerdictStatus.UNKNOWN, confidence.unknown, VerdictReason.TEMPORARY_FAILURE);
    }

    /**
     * Whether the domain accepts a recipient that cannot exist. Runs at most
     * once per domain. Only a 5xx at RCPT proves it is not catch-all; a
     * temporary reply or a failed connection leaves it undetermined.
     */
    private catchAllState(smtp: SmtpTransport, hosts: string[], domain: string): Promise<CatchAllState> {
        return this.catchAllCache.getOrCompute(domain, async () => {
            const outcome = await this.probe(smtp, hosts, this.probeLocalPart(domain), domain);
            let state: CatchAllState = 'undetermined';
            if (outcome.kind === 'reply' && outcome.response.stage === 'rcpt') {
                if (outcome.response.code >= 200 && outcome.response.code < 300) state = 'yes';
                else if (outcome.response.code >= 500) state = 'no';
            }
            logger.log('debug', `Catch-all check for ${domain}: ${state}`, { domain });
            return state;
        });
    }

    /** Probes MX hosts in preference order, moving on when a host cannot be reached. */
    private async probe(smtp: SmtpTransport, hosts: string[], localPart: string, domain: string): Promise<ProbeOutcome> {
        const { limiter, retry, config } = this.deps;

        for (const host of hosts.slice(0, config.max_mx_hosts)) {
            try {
                const response = await withRetry(async () => {
                    await limiter.acquire(domain, retry.signal);
                    return smtp.probe(host, localPart, domain);
                }, retry);
                return { kind: 'reply', response };
            } catch (e) {
                if (e instanceof SmtpUnsupportedError) return { kind: 'unsupported' };
                if (e instanceof CapabilityError) {
                    logger.log('warn', `SMTP unavailable reaching ${host}`, { domain, host, error: e });
                    return { kind: 'unreachable', capability: true };
                }
                if (!isTransient(e)) throw e;
                logger.log('debug', `SMTP probe to ${host} failed, trying next host`, { domain, host, error: e });
            }
        }
        return { kind: 'unreachable', capability: false };
    }

    private verdict(status: VerdictStatus, confidence: number, reason: VerdictReason): VerificationVerdict {
        return { status, confidence, checked_at: this.clock(), reason };
    }
}
