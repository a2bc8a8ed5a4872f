import { Candidate } from '../../types';
import { Normalizer } from '../normalizer';

type NameParts = { first: string; last: string; f: string };

type PatternTemplate = {
    name: string;
    needsFirst: boolean;
    needsLast: boolean;
    build: (p: NameParts) => string;
};

/**
 * Ranked local-part templates, most common business convention first.
 * The array position is the rank.
 */
export const PATTERNS: readonly PatternTemplate[] = [
    { name: 'first.last', needsFirst: true, needsLast: true, build: (p) => `${p.first}.${p.last}` },
    { name: 'firstlast', needsFirst: true, needsLast: true, build: (p) => `${p.first}${p.last}` },
    { name: 'first', needsFirst: true, needsLast: false, build: (p) => p.first },
    { name: 'flast', needsFirst: true, needsLast: true, build: (p) => `${p.f}${p.last}` },
    { name: 'first_last', needsFirst: true, needsLast: true, build: (p) => `${p.first}_${p.last}` },
    { name: 'last.first', needsFirst: true, needsLast: true, build: (p) => `${p.last}.${p.first}` },
    { name: 'lastfirst', needsFirst: true, needsLast: true, build: (p) => `${p.last}${p.first}` },
    { name: 'f.last', needsFirst: true, needsLast: true, build: (p) => `${p.f}.${p.last}` },
];

export const DEFAULT_MAX_CANDIDATES = 8;

const MAX_LOCAL_PART_LENGTH = 64;

function toParts(first: string, last: string): NameParts {
    return { first, last, f: Array.from(first)[0] || '' };
}

export function isPlausibleLocalPart(localPart: string): boolean {
    if (!localPart || localPart.length > MAX_LOCAL_PART_LENGTH) return false;
    if (localPart.startsWith('.') || localPart.endsWith('.')) return false;
    if (localPart.includes('..')) return false;
    return /^[\p{L}\p{N}._-]+$/u.test(localPart);
}

export class PatternGenerator {
    constructor(private readonly maxCandidates: number = DEFAULT_MAX_CANDIDATES) { }

    /**
     * Candidate addresses in the order they should be tried. Pure and
     * deterministic: the same (first, last, domain) always yields the same list.
     * Each pattern is emitted in the diacritic-preserving form, followed by its
     * ASCII fallback when the two differ.
     */
    generate(firstName: string, lastName: string, domain: string): Candidate[] {
        const d = (domain || '').trim().toLowerCase();
        if (!d) return [];

        const first = Normalizer.firstName(firstName);
        const last = Normalizer.lastName(lastName);
        const native = toParts(first, last);
        const ascii = toParts(Normalizer.transliterate(first), Normalizer.transliterate(last));

        const seen = new Set<string>();
        const candidates: Candidate[] = [];

        for (const pattern of PATTERNS) {
            const variants: { parts: NameParts; label: string }[] = [{ parts: native, label: pattern.name }];
            if (!Normalizer.isAscii(first + last)) {
                variants.push({ parts: ascii, label: `${pattern.name}:ascii` });
            }

            for (const { parts, label } of variants) {
                if (pattern.needsFirst && !parts.first) continue;
                if (pattern.needsLast && !parts.last) continue;

                const localPart = pattern.build(parts);
                if (!isPlausibleLocalPart(localPart) || seen.has(localPart)) continue;

                seen.add(localPart);
                candidates.push({
                    local_part: localPart,
                    domain: d,
                    pattern_rank: candidates.length,
                    pattern: label,
                });

                if (candidates.length >= this.maxCandidates) return candidates;
            }
        }

        return candidates;
    }
}

export function candidateEmail(candidate: Candidate): string {
    return `${candidate.local_part}@${candidate.domain}`;
}
