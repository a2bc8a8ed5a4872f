export type RawRow = Record<string, string>;

export type Contact = {
    index: number; // Row position in the input batch; duplicates are independent
    first_name: string;
    last_name: string;
    company: string;
    raw_row: RawRow;
};

export enum DomainSource {
    KNOWN_DB = 'KNOWN_DB',
    SEARCH_FALLBACK = 'SEARCH_FALLBACK',
    NAME_GUESS = 'NAME_GUESS',
}

export type DomainResult = {
    domain: string;
    source: DomainSource;
    mx_confirmed: boolean; // false when accepted through an A/AAAA record only
};

export type Candidate = {
    local_part: string;
    domain: string;
    pattern_rank: number;
    pattern: string;
};

export enum VerdictStatus {
    VALID = 'VALID',
    CATCH_ALL = 'CATCH_ALL',
    INVALID = 'INVALID',
    UNKNOWN = 'UNKNOWN',
}

export enum VerdictReason {
    NO_MX = 'NO_MX',
    MAILBOX_ACCEPTED = 'MAILBOX_ACCEPTED',
    CATCH_ALL_DOMAIN = 'CATCH_ALL_DOMAIN',
    MAILBOX_REJECTED = 'MAILBOX_REJECTED',
    TEMPORARY_FAILURE = 'TEMPORARY_FAILURE',
    SENDER_REJECTED = 'SENDER_REJECTED',
    CONNECTION_FAILED = 'CONNECTION_FAILED',
    UNSUPPORTED = 'UNSUPPORTED',
    PROBE_DISABLED = 'PROBE_DISABLED',
    DNS_FAILURE = 'DNS_FAILURE',
    LOOKUP_UNAVAILABLE = 'LOOKUP_UNAVAILABLE',
    CATCH_ALL_UNDETERMINED = 'CATCH_ALL_UNDETERMINED',
    CAPABILITY_UNAVAILABLE = 'CAPABILITY_UNAVAILABLE',
    NO_DOMAIN = 'NO_DOMAIN',
    NOT_FOUND = 'NOT_FOUND',
    CANCELLED = 'CANCELLED',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type VerificationVerdict = {
    status: VerdictStatus;
    confidence: number;
    checked_at: Date;
    reason: VerdictReason;
};

export type VerificationAttempt = {
    candidate: Candidate;
    verdict: VerificationVerdict;
};

export enum ContactOutcome {
    VERIFIED = 'VERIFIED',
    CATCH_ALL = 'CATCH_ALL',
    BEST_GUESS = 'BEST_GUESS',
    NO_DOMAIN = 'NO_DOMAIN',
    NO_CANDIDATES = 'NO_CANDIDATES',
    NOT_FOUND = 'NOT_FOUND',
    LOOKUP_FAILED = 'LOOKUP_FAILED',
    CANCELLED = 'CANCELLED',
    ERROR = 'ERROR',
}

export type ContactResult = {
    readonly contact: Contact;
    readonly domain: string | null;
    readonly chosen_email: string | null;
    readonly verdict: VerificationVerdict;
    readonly attempts: readonly VerificationAttempt[];
    readonly outcome: ContactOutcome;
};

/**
 * Capability contracts. The engine depends on these and never on a concrete
 * network client, so every collaborator can be replaced in tests.
 */
export interface DnsClient {
    /** Mail exchangers ordered by preference (lowest value first); empty when the domain has none. */
    lookupMx(domain: string): Promise<string[]>;
    /** True when the name has an A or AAAA record. */
    lookupA(domain: string): Promise<boolean>;
}

export type SmtpStage = 'greeting' | 'helo' | 'mail' | 'rcpt';

export type SmtpProbeResponse = {
    code: number;
    message: string;
    stage: SmtpStage; // Stage that produced the deciding reply
};

export interface SmtpTransport {
    probe(host: string, localPart: string, domain: string): Promise<SmtpProbeResponse>;
}

export interface DomainSearch {
    name: string;
    searchDomain(company: string): Promise<string | null>;
}

/** Outbound consumer of finished results (CSV file, contact-sync service, ...). */
export interface ContactSink {
    write(result: ContactResult): Promise<void>;
    close(): Promise<void>;
}

export type Clock = () => Date;
