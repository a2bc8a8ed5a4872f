import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { Config } from '../../config';
import { DomainSearch } from '../../types';
import { CapabilityError, errorMessage, TransientNetworkError } from '../../utils/errors';
import { Normalizer } from '../normalizer';

const DDG_HTML_ENDPOINT = 'https://html.duckduckgo.com/html/';

export type SearchHit = { url: string; title: string };

/**
 * Result links from DuckDuckGo's HTML endpoint, redirect wrappers decoded.
 */
export function parseDuckDuckGoResults(html: string, limit: number): SearchHit[] {
    const $ = cheerio.load(html);
    const results: SearchHit[] = [];

    $('.result__a').each((_, el) => {
        let link = $(el).attr('href');
        const title = $(el).text().trim();
        if (!link) return;

        // format: //duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com&rut=...
        const match = link.match(/uddg=([^&]+)/);
        if (match) {
            try {
                link = decodeURIComponent(match[1]);
            } catch {
                return;
            }
        }
        if (!link.startsWith('/')) results.push({ url: link, title });
    });

    if (results.length === 0) {
        $('h2 a').each((_, el) => {
            const link = $(el).attr('href');
            if (link && !link.startsWith('/')) results.push({ url: link, title: $(el).text().trim() });
        });
    }

    return results.slice(0, limit);
}

function hostnameOf(url: string): string | null {
    try {
        return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
    } catch {
        return null;
    }
}

/** A dotted entry matches that host and its subdomains; a bare word matches any label. */
function isSkipped(host: string, skip: string): boolean {
    if (skip.includes('.')) return host === skip || host.endsWith(`.${skip}`);
    return host.split('.').includes(skip);
}

/** Words of the normalized company name long enough to identify it in a hostname. */
export function companyWords(company: string): string[] {
    return Normalizer.normalizeCompany(company)
        .split(/[\s&.-]+/)
        .map((w) => Normalizer.transliterate(w))
        .filter((w) => w.length > 2);
}

/**
 * First result hostname that looks like the company's own site: not a search
 * engine, social network or job board, and containing one of the company's
 * words.
 */
export function pickCompanyDomain(hits: SearchHit[], company: string, skipDomains: string[]): string | null {
    const words = companyWords(company);
    if (words.length === 0) return null;

    for (const hit of hits) {
        const host = hostnameOf(hit.url);
        if (!host) continue;
        if (skipDomains.some((skip) => isSkipped(host, skip))) continue;
        const compact = host.replace(/[^a-z0-9.]/g, '');
        if (words.some((w) => compact.includes(w))) return host;
    }
    return null;
}

export class DuckDuckGoDomainSearch implements DomainSearch {
    readonly name = 'duckduckgo';
    private client: AxiosInstance;

    constructor(private readonly config: Config['search'], client?: AxiosInstance) {
        this.client = client || axios.create({
            timeout: config.timeout_ms,
            headers: {
                'User-Agent': config.user_agent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            },
        });
    }

    async searchDomain(company: string): Promise<string | null> {
        const html = await this.fetchResults(`${company} official website`);
        return pickCompanyDomain(parseDuckDuckGoResults(html, this.config.max_results), company, this.config.skip_domains);
    }

    private async fetchResults(query: string): Promise<string> {
        try {
            const response = await this.client.get<string>(DDG_HTML_ENDPOINT, {
                params: { q: query },
                responseType: 'text',
            });
            return typeof response.data === 'string' ? response.data : String(response.data);
        } catch (e) {
            if (axios.isAxiosError(e)) {
                const status = e.response?.status;
                if (status !== undefined && (status >= 500 || status === 429)) {
                    throw new TransientNetworkError(`Search returned HTTP ${status}`);
                }
                if (e.code === 'ECONNABORTED' || e.code === 'ETIMEDOUT' || e.code === 'ECONNRESET') {
                    throw new TransientNetworkError(`Search request failed: ${e.message}`, e.code);
                }
            }
            throw new CapabilityError('search', `Search endpoint unreachable: ${errorMessage(e)}`, e);
        }
    }
}
