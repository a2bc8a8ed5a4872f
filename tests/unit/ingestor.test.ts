import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { canonicalHeader, findHeaderRow, ingestContacts, sniffDelimiter } from '../../src/modules/ingestor';
import { IngestError } from '../../src/utils/errors';

const FIXTURE = path.join(__dirname, '..', 'fixtures', 'linkedin_connections.csv');
const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailsleuth-ingest-'));

function writeCsv(name: string, contents: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, contents);
  return file;
}

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('canonicalHeader', () => {
  it('maps common spellings to contact fields', () => {
    expect(canonicalHeader('First Name')).toBe('first_name');
    expect(canonicalHeader('\uFEFFfirst_name')).toBe('first_name');
    expect(canonicalHeader('Surname')).toBe('last_name');
    expect(canonicalHeader('Organisation')).toBe('company');
    expect(canonicalHeader('Connected On')).toBeNull();
  });
});

describe('sniffDelimiter', () => {
  it('picks the most frequent separator', () => {
    expect(sniffDelimiter('a,b,c')).toBe(',');
    expect(sniffDelimiter('a;b;c')).toBe(';');
    expect(sniffDelimiter('a\tb\tc')).toBe('\t');
    expect(sniffDelimiter('single')).toBe(',');
  });
});

describe('findHeaderRow', () => {
  it('skips preamble lines', () => {
    const lines = ['Notes:', 'some text, with a comma', 'First Name,Last Name,Company'];

    expect(findHeaderRow(lines, 5)).toEqual({ index: 2, delimiter: ',' });
    expect(findHeaderRow(lines, 1)).toBeNull();
  });

  it('requires a name column next to the company', () => {
    expect(findHeaderRow(['Company,Position'], 5)).toBeNull();
    expect(findHeaderRow(['Last Name,Company'], 5)).toEqual({ index: 0, delimiter: ',' });
  });
});

describe('ingestContacts', () => {
  it('reads a connections export with a notes preamble', async () => {
    const file = await ingestContacts(FIXTURE, { maxPreambleLines: 10 });

    expect(file.header_line).toBe(4);
    expect(file.delimiter).toBe(',');
    expect(file.headers).toEqual(['First Name', 'Last Name', 'URL', 'Email Address', 'Company', 'Position', 'Connected On']);
    expect(file.contacts).toHaveLength(2);
    expect(file.contacts[0]).toMatchObject({ index: 0, first_name: 'John', last_name: 'Smith', company: 'Acme Inc' });
    expect(file.contacts[1]).toMatchObject({ index: 1, first_name: 'Jane', last_name: 'Doe', company: 'Globex, Corp' });
    expect(file.contacts[1].raw_row.Position).toBe('Director');
  });

  it('reads a semicolon separated file with alternate headers', async () => {
    const csv = writeCsv('semicolon.csv', 'given name;surname;organization\nAnna;Berg;Berg AB\n\nLi;Wei;Wei Ltd\n');
    const file = await ingestContacts(csv, { maxPreambleLines: 10 });

    expect(file.delimiter).toBe(';');
    expect(file.contacts.map((c) => [c.first_name, c.last_name, c.company])).toEqual([
      ['Anna', 'Berg', 'Berg AB'],
      ['Li', 'Wei', 'Wei Ltd'],
    ]);
  });

  it('keeps duplicate rows as separate contacts', async () => {
    const csv = writeCsv('dupes.csv', 'First Name,Last Name,Company\nJohn,Smith,Acme\nJohn,Smith,Acme\n');
    const file = await ingestContacts(csv, { maxPreambleLines: 0 });

    expect(file.contacts.map((c) => c.index)).toEqual([0, 1]);
  });

  it('fills absent name columns with empty strings', async () => {
    const csv = writeCsv('lastonly.csv', 'Last Name,Company\nSmith,Acme\n');
    const file = await ingestContacts(csv, { maxPreambleLines: 0 });

    expect(file.contacts[0]).toMatchObject({ first_name: '', last_name: 'Smith', company: 'Acme' });
  });

  it('rejects a file without a recognizable header', async () => {
    const csv = writeCsv('noheader.csv', 'foo,bar\n1,2\n');

    await expect(ingestContacts(csv, { maxPreambleLines: 10 })).rejects.toBeInstanceOf(IngestError);
  });

  it('rejects a missing file', async () => {
    await expect(ingestContacts(path.join(tmpDir, 'missing.csv'), { maxPreambleLines: 10 })).rejects.toThrow(/Input file not found/);
  });
});
