import { Config, parseConfig } from '../../src/config';
import { Contact, DnsClient, DomainSearch, SmtpProbeResponse, SmtpStage, SmtpTransport } from '../../src/types';

export const FIXED_NOW = new Date('2024-01-01T00:00:00.000Z');
export const fixedClock = () => FIXED_NOW;

/** Defaults from default.yaml with no rate limiting and instant retries. */
export function testConfig(): Config {
  const base = parseConfig(undefined, {});
  return {
    ...base,
    pipeline: { ...base.pipeline, per_domain_rate: 0 },
    retry: { attempts: 2, base_delay_ms: 0, max_delay_ms: 0, jitter_ms: 0 },
  };
}

export function contact(index: number, first_name: string, last_name: string, company: string): Contact {
  return {
    index,
    first_name,
    last_name,
    company,
    raw_row: { 'First Name': first_name, 'Last Name': last_name, Company: company },
  };
}

interface DnsRecords {
  mx?: Record<string, string[]>;
  a?: string[];
  fail?: Record<string, Error>;
  failAll?: Error;
}

export class FakeDnsClient implements DnsClient {
  mxCalls: string[] = [];
  aCalls: string[] = [];

  constructor(private readonly records: DnsRecords = {}) {}

  private failure(domain: string): Error | undefined {
    return this.records.failAll || this.records.fail?.[domain];
  }

  async lookupMx(domain: string): Promise<string[]> {
    this.mxCalls.push(domain);
    const failure = this.failure(domain);
    if (failure) throw failure;
    return this.records.mx?.[domain] || [];
  }

  async lookupA(domain: string): Promise<boolean> {
    this.aCalls.push(domain);
    const failure = this.failure(domain);
    if (failure) throw failure;
    return (this.records.a || []).includes(domain);
  }
}

export type SmtpHandler = (host: string, localPart: string, domain: string) => SmtpProbeResponse | Error;

export function reply(code: number, stage: SmtpStage = 'rcpt'): SmtpProbeResponse {
  return { code, message: `${code} test reply`, stage };
}

export class FakeSmtpTransport implements SmtpTransport {
  probes: { host: string; localPart: string; domain: string }[] = [];

  constructor(
    private readonly handler: SmtpHandler,
    private readonly delayMs: (localPart: string, domain: string) => number = () => 0
  ) {}

  async probe(host: string, localPart: string, domain: string): Promise<SmtpProbeResponse> {
    this.probes.push({ host, localPart, domain });
    const ms = this.delayMs(localPart, domain);
    if (ms > 0) await new Promise((resolve) => setTimeout(resolve, ms));
    const outcome = this.handler(host, localPart, domain);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

export class FakeDomainSearch implements DomainSearch {
  readonly name = 'fake';
  queries: string[] = [];

  constructor(private readonly answers: Record<string, string | Error> = {}) {}

  async searchDomain(company: string): Promise<string | null> {
    this.queries.push(company);
    const answer = this.answers[company];
    if (answer instanceof Error) throw answer;
    return answer || null;
  }
}
