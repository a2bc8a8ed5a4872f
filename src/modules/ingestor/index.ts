import fs from 'fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { Contact } from '../../types';
import { IngestError } from '../../utils/errors';
import { logger } from '../observability';

export type ContactField = 'first_name' | 'last_name' | 'company';

export interface IngestedFile {
    headers: string[];
    contacts: Contact[];
    delimiter: string;
    header_line: number; // 1-based line of the header row
}

export interface IngestOptions {
    maxPreambleLines: number;
}

const RawRowSchema = z.record(z.string());

const HEADER_ALIASES: [ContactField, string[]][] = [
    ['first_name', ['firstname', 'first', 'givenname', 'forename']],
    ['last_name', ['lastname', 'last', 'surname', 'familyname']],
    ['company', ['company', 'companyname', 'organization', 'organisation', 'employer', 'accountname']],
];

export function canonicalHeader(header: string): ContactField | null {
    const slug = header.replace(/^\uFEFF/, '').toLowerCase().replace(/[^a-z0-9]/g, '');
    const match = HEADER_ALIASES.find(([, aliases]) => aliases.includes(slug));
    return match ? match[0] : null;
}

export function sniffDelimiter(line: string): string {
    const commas = (line.match(/,/g) || []).length;
    const semicolons = (line.match(/;/g) || []).length;
    const tabs = (line.match(/\t/g) || []).length;

    if (semicolons > commas && semicolons >= tabs) return ';';
    if (tabs > commas && tabs > semicolons) return '\t';
    return ',';
}

/**
 * Locates the header row among the first lines of an export. LinkedIn
 * connection exports start with a few "Notes:" lines before the header.
 */
export function findHeaderRow(lines: string[], maxPreambleLines: number): { index: number; delimiter: string } | null {
    const limit = Math.min(lines.length, maxPreambleLines + 1);
    for (let i = 0; i < limit; i++) {
        const delimiter = sniffDelimiter(lines[i]);
        const fields = new Set(
            lines[i]
                .split(delimiter)
                .map((cell) => canonicalHeader(cell.trim().replace(/^"|"$/g, '')))
        );
        if (fields.has('company') && (fields.has('first_name') || fields.has('last_name'))) {
            return { index: i, delimiter };
        }
    }
    return null;
}

function columnFor(headers: string[], field: ContactField): string | null {
    return headers.find((h) => canonicalHeader(h) === field) || null;
}

/**
 * Reads a contact export. Every data row becomes a contact, in file order;
 * the original columns are kept on `raw_row` for the export.
 *
 * @throws IngestError when no header row with a company column and a name
 * column is found within the preamble window.
 */
export async function ingestContacts(filePath: string, options: IngestOptions): Promise<IngestedFile> {
    if (!fs.existsSync(filePath)) {
        throw new IngestError(`Input file not found: ${filePath}`, { file: filePath });
    }

    const text = await fs.promises.readFile(filePath, 'utf8');
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
    const header = findHeaderRow(lines, options.maxPreambleLines);
    if (!header) {
        throw new IngestError(
            `No header row with a company column and a first or last name column in the first ${options.maxPreambleLines + 1} lines of ${filePath}`,
            { file: filePath }
        );
    }

    let headers: string[] = [];
    const parser = parse(lines.slice(header.index).join('\n'), {
        columns: (row: string[]) => {
            headers = row.map((h) => h.trim());
            return headers;
        },
        delimiter: header.delimiter,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
    });

    const contacts: Contact[] = [];
    let columns: Record<ContactField, string | null> | null = null;
    let lineCount = 0;
    for await (const record of parser) {
        lineCount++;
        const parsed = RawRowSchema.safeParse(record);
        if (!parsed.success) {
            logger.log('warn', `Skipping malformed row ${lineCount} of ${filePath}`);
            continue;
        }

        // Header callback has run by the time the first record arrives
        columns = columns || {
            first_name: columnFor(headers, 'first_name'),
            last_name: columnFor(headers, 'last_name'),
            company: columnFor(headers, 'company'),
        };
        const raw = parsed.data;
        const value = (col: string | null) => (col ? raw[col] || '' : '');

        contacts.push({
            index: contacts.length,
            first_name: value(columns.first_name),
            last_name: value(columns.last_name),
            company: value(columns.company),
            raw_row: raw,
        });
    }

    logger.log('info', `Loaded ${contacts.length} contacts from ${filePath}`, { header_line: header.index + 1 });
    return { headers, contacts, delimiter: header.delimiter, header_line: header.index + 1 };
}
