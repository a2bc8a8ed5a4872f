// Trailing words that never identify a company: legal forms and generic corporate nouns
const CORPORATE_SUFFIX = new RegExp(
    '\\s+(?:inc|llc|llp|ltd|limited|corp|corporation|co|company|gmbh|plc|ag|sa|srl|spa|bv|nv|pty|' +
    'group|holdings?|technologies|technology|solutions|services|international|worldwide|global|&|and)\\.?$'
);

// Letters with no canonical decomposition under NFD
const TRANSLITERATIONS: Record<string, string> = {
    'ß': 'ss',
    'æ': 'ae',
    'ø': 'o',
    'œ': 'oe',
    'ł': 'l',
    'đ': 'd',
    'þ': 'th',
    'ð': 'd',
    'ı': 'i',
};

export class Normalizer {

    /**
     * Canonical lookup key for a company: "Acme, Inc." and "ACME Inc" both become "acme".
     */
    static normalizeCompany(name: string): string {
        if (!name) return '';
        let n = name.normalize('NFKC').toLowerCase().trim();
        // "Acme, a Delaware corporation" -> "acme"
        n = n.replace(/,.*$/, '');
        n = n.replace(/[^\p{L}\p{N}&\s.-]/gu, ' ');
        n = n.replace(/\s+/g, ' ').trim();

        let previous: string;
        do {
            previous = n;
            n = n.replace(CORPORATE_SUFFIX, '').trim();
        } while (n !== previous);

        return n.replace(/[.-]+$/, '').trim();
    }

    /**
     * Lowercased name keeping letters (with diacritics), digits, "." and "-".
     * Whitespace is removed, so "Mary Ann" becomes "maryann".
     */
    static normalizeNamePart(part: string): string {
        if (!part) return '';
        return part
            .normalize('NFKC')
            .toLowerCase()
            .replace(/[^\p{L}\p{N}.-]/gu, '')
            .replace(/([.-])[.-]+/g, '$1')
            .replace(/^[.-]+|[.-]+$/g, '');
    }

    static firstName(raw: string): string {
        const token = (raw || '').trim().split(/\s+/)[0] || '';
        return this.normalizeNamePart(token);
    }

    static lastName(raw: string): string {
        return this.normalizeNamePart(raw || '');
    }

    static transliterate(value: string): string {
        return value
            .normalize('NFD')
            .replace(/\p{M}/gu, '')
            .replace(/[ßæøœłđþðı]/g, (ch) => TRANSLITERATIONS[ch] || '')
            .replace(/[^a-z0-9.-]/g, '')
            .replace(/([.-])[.-]+/g, '$1')
            .replace(/^[.-]+|[.-]+$/g, '');
    }

    static isAscii(value: string): boolean {
        return /^[\x00-\x7f]*$/.test(value);
    }
}
