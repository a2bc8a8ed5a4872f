import { Config } from '../../config';
import knownDomainsTable from '../../config/known_domains.json';
import { DnsClient, DomainResult, DomainSearch, DomainSource } from '../../types';
import { CapabilityError, errorMessage, ResolutionError, ResolutionErrorKind } from '../../utils/errors';
import { isTransient, RetryOptions, withRetry } from '../../utils/retry';
import { RunCache } from '../cache/run-cache';
import { Normalizer } from '../normalizer';
import { logger } from '../observability';

/** Settled lookups per normalized company; null records a definitive "no valid domain". */
export type DomainCache = RunCache<DomainResult | null>;

const HOSTNAME = /^(?=.{1,253}$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)+$/;

/**
 * Known-company table keyed by normalized name. When two entries normalize to
 * the same key the first one is kept.
 */
export function loadKnownDomains(table: Record<string, string> = knownDomainsTable): Map<string, string> {
    const known = new Map<string, string>();
    for (const [name, domain] of Object.entries(table)) {
        const key = Normalizer.normalizeCompany(name);
        if (key && !known.has(key)) known.set(key, domain.trim().toLowerCase());
    }
    return known;
}

type DomainCheck =
    | { status: 'accepted'; result: DomainResult }
    | { status: 'rejected' }
    | { status: 'unavailable'; error: unknown };

export interface DomainResolverDeps {
    dns: DnsClient;
    search: DomainSearch | null;
    cache: DomainCache;
    config: Config['resolver'];
    retry: RetryOptions;
    knownDomains?: Map<string, string>;
}

export class DomainResolver {
    private readonly knownDomains: Map<string, string>;

    constructor(private readonly deps: DomainResolverDeps) {
        this.knownDomains = deps.knownDomains || loadKnownDomains();
    }

    /**
     * Mail domain for a company, tried in order: known table, web search, name
     * guess. A candidate is accepted on an MX record, or failing that an A/AAAA
     * record.
     *
     * @throws ResolutionError NO_VALID_DOMAIN when every step answered and none
     * matched, LOOKUP_UNAVAILABLE when some step could not get an answer. The
     * latter carries the failure as `cause`.
     */
    async resolve(company: string): Promise<DomainResult> {
        const key = Normalizer.normalizeCompany(company);
        if (!key) {
            throw new ResolutionError(ResolutionErrorKind.NO_VALID_DOMAIN, company, `Company name "${company}" is empty after normalization`);
        }

        const result = await this.deps.cache.getOrCompute(key, () => this.lookup(key, company));
        if (!result) throw new ResolutionError(ResolutionErrorKind.NO_VALID_DOMAIN, company);
        return result;
    }

    private async lookup(key: string, company: string): Promise<DomainResult | null> {
        const failures: unknown[] = [];
        const tried = new Set<string>();

        const attempt = async (domain: string | null | undefined, source: DomainSource): Promise<DomainResult | null> => {
            const d = (domain || '').trim().toLowerCase().replace(/\.$/, '');
            if (!d || tried.has(d)) return null;
            tried.add(d);
            if (!HOSTNAME.test(d)) {
                logger.log('debug', `Discarding malformed domain "${d}" from ${source}`, { company });
                return null;
            }

            const check = await this.checkDomain(d, source);
            if (check.status === 'accepted') {
                logger.log('debug', `Resolved "${company}" to ${d}`, { company, domain: d, source, mx_confirmed: check.result.mx_confirmed });
                return check.result;
            }
            if (check.status === 'unavailable') failures.push(check.error);
            return null;
        };

        // 1. Known table
        const known = await attempt(this.knownDomains.get(key), DomainSource.KNOWN_DB);
        if (known) return known;

        // 2. Web search
        const { search } = this.deps;
        if (search && this.deps.config.search_enabled) {
            try {
                const found = await withRetry(() => search.searchDomain(company), this.deps.retry);
                const viaSearch = await attempt(found, DomainSource.SEARCH_FALLBACK);
                if (viaSearch) return viaSearch;
            } catch (e) {
                if (!(e instanceof CapabilityError) && !isTransient(e)) throw e;
                failures.push(e);
                logger.log('warn', `Search ${search.name} failed for "${company}"`, { company, error: e });
            }
        }

        // 3. Guess from the name itself
        if (this.deps.config.guess_from_name) {
            const compact = Normalizer.transliterate(key).replace(/[^a-z0-9]/g, '');
            if (compact) {
                const guessed = await attempt(`${compact}.${this.deps.config.guess_tld}`, DomainSource.NAME_GUESS);
                if (guessed) return guessed;
            }
        }

        if (failures.length > 0) {
            // An unreachable resolver outranks a throttled search or a single timeout
            const cause = failures.find((f) => f instanceof CapabilityError && f.capability === 'dns')
                || failures[failures.length - 1];
            // Not cached: a later contact for this company may get through
            throw new ResolutionError(
                ResolutionErrorKind.LOOKUP_UNAVAILABLE,
                company,
                `Domain lookup for "${company}" could not complete: ${errorMessage(cause)}`,
                cause
            );
        }

        logger.log('info', `No valid domain for "${company}"`, { company, tried: Array.from(tried) });
        return null;
    }

    private async checkDomain(domain: string, source: DomainSource): Promise<DomainCheck> {
        const { dns, retry } = this.deps;
        try {
            const mx = await withRetry(() => dns.lookupMx(domain), retry);
            if (mx.length > 0) return { status: 'accepted', result: { domain, source, mx_confirmed: true } };

            const hasAddress = await withRetry(() => dns.lookupA(domain), retry);
            if (hasAddress) return { status: 'accepted', result: { domain, source, mx_confirmed: false } };
            return { status: 'rejected' };
        } catch (e) {
            if (e instanceof CapabilityError || isTransient(e)) {
                logger.log('warn', `DNS check for ${domain} failed`, { domain, error: e });
                return { status: 'unavailable', error: e };
            }
            throw e;
        }
    }
}
