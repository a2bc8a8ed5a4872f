import { promises as dnsPromises } from 'dns';
import { Config } from '../../config';
import { DnsClient } from '../../types';
import { CapabilityError, errnoOf, errorMessage, TransientNetworkError } from '../../utils/errors';
import { withTimeout } from '../../utils/retry';

// The name exists but has no record of the asked type, or does not exist at all
const NO_RECORD_CODES = new Set(['ENODATA', 'ENOTFOUND', 'NXDOMAIN', 'ENONAME']);
// The resolver itself cannot be reached
const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENETUNREACH', 'EHOSTUNREACH', 'ENOTINITIALIZED']);

type MxRecord = { exchange: string; priority: number };

export interface DnsResolverLike {
    resolveMx(hostname: string): Promise<MxRecord[]>;
    resolve4(hostname: string): Promise<string[]>;
    resolve6(hostname: string): Promise<string[]>;
}

/**
 * DNS capability backed by Node's resolver. Every query carries the
 * resolver's own per-try timeout plus an outer deadline.
 */
export class NodeDnsClient implements DnsClient {
    private resolver: DnsResolverLike;
    private readonly timeoutMs: number;

    constructor(config: Config['dns'], resolver?: DnsResolverLike) {
        this.timeoutMs = config.timeout_ms;
        if (resolver) {
            this.resolver = resolver;
        } else {
            const nodeResolver = new dnsPromises.Resolver({ timeout: config.timeout_ms, tries: config.tries });
            if (config.servers.length > 0) nodeResolver.setServers(config.servers);
            this.resolver = nodeResolver;
        }
    }

    async lookupMx(domain: string): Promise<string[]> {
        const records = await this.query(`MX ${domain}`, () => this.resolver.resolveMx(domain));
        if (!records) return [];
        return records
            .filter((r) => r.exchange && r.exchange !== '.')
            .sort((a, b) => a.priority - b.priority || a.exchange.localeCompare(b.exchange))
            .map((r) => r.exchange.replace(/\.$/, '').toLowerCase());
    }

    async lookupA(domain: string): Promise<boolean> {
        const v4 = await this.query(`A ${domain}`, () => this.resolver.resolve4(domain));
        if (v4 && v4.length > 0) return true;
        const v6 = await this.query(`AAAA ${domain}`, () => this.resolver.resolve6(domain));
        return !!v6 && v6.length > 0;
    }

    /** null when the record does not exist; throws when the answer is unknown. */
    private async query<T>(label: string, run: () => Promise<T>): Promise<T | null> {
        // Outer deadline covers all resolver tries plus a small margin
        const deadline = this.timeoutMs * 2 + 250;
        try {
            return await withTimeout(run(), deadline, `DNS ${label}`);
        } catch (error) {
            const code = errnoOf(error);
            if (code && NO_RECORD_CODES.has(code)) return null;
            if (code && UNREACHABLE_CODES.has(code)) {
                throw new CapabilityError('dns', `DNS resolver unreachable during ${label}: ${code}`, error);
            }
            if (error instanceof TransientNetworkError) throw error;
            throw new TransientNetworkError(`DNS ${label} failed: ${errorMessage(error)}`, code);
        }
    }
}
