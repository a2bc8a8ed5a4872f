import fs from 'fs';
import { once } from 'events';
import { Writable } from 'stream';
import { pipeline } from 'stream/promises';
import * as fastcsv from 'fast-csv';
import { ContactResult, ContactSink } from '../../types';

export type OutputRow = Record<string, string>;

export const RESULT_COLUMNS = ['chosen_email', 'verdict_status', 'confidence', 'domain', 'outcome', 'patterns_tried'] as const;

/**
 * Input columns first, untouched, then the result columns. A result column
 * overrides an input column of the same name.
 */
export function toOutputRow(result: ContactResult, inputHeaders: readonly string[]): OutputRow {
    const row: OutputRow = {};
    for (const header of inputHeaders) {
        row[header] = result.contact.raw_row[header] ?? '';
    }
    row.chosen_email = result.chosen_email || '';
    row.verdict_status = result.verdict.status;
    row.confidence = result.verdict.confidence.toFixed(2);
    row.domain = result.domain || '';
    row.outcome = result.outcome;
    row.patterns_tried = String(result.attempts.length);
    return row;
}

export function outputHeaders(inputHeaders: readonly string[]): string[] {
    const resultColumns: readonly string[] = RESULT_COLUMNS;
    return [...inputHeaders.filter((h) => !resultColumns.includes(h)), ...RESULT_COLUMNS];
}

/**
 * Backpressure-safe CSV writer. Rows go out one after another; a full buffer
 * holds the next row until 'drain'. Once the stream has failed every call
 * rejects with its error.
 */
export class AsyncCsvWriter {
    private tail: Promise<void> = Promise.resolve();

    constructor(private readonly stream: Writable) { }

    write(row: OutputRow): Promise<void> {
        this.tail = this.tail.then(async () => {
            this.assertWritable();
            if (!this.stream.write(row)) await once(this.stream, 'drain');
        });
        return this.tail;
    }

    async end(): Promise<void> {
        await this.tail;
        this.assertWritable();
        const finished = once(this.stream, 'finish');
        this.stream.end();
        await finished;
    }

    private assertWritable(): void {
        if (this.stream.destroyed) throw this.stream.errored || new Error('CSV output stream is closed');
    }
}

/**
 * Writes results to a CSV file in the order they are handed in. Open it with
 * `CsvContactSink.open`, which fails before any work is done when the file
 * cannot be created.
 */
export class CsvContactSink implements ContactSink {
    private readonly writer: AsyncCsvWriter;
    private readonly done: Promise<void>;
    private failure: Error | null = null;

    private constructor(fileStream: fs.WriteStream, private readonly inputHeaders: readonly string[]) {
        const csvStream = fastcsv.format<OutputRow, OutputRow>({ headers: outputHeaders(inputHeaders) });
        this.writer = new AsyncCsvWriter(csvStream);
        // pipeline destroys both streams on a file error, which fails the writer's pending call
        this.done = pipeline(csvStream, fileStream).catch((e: unknown) => {
            this.failure = e instanceof Error ? e : new Error(String(e));
        });
    }

    static async open(outputPath: string, inputHeaders: readonly string[]): Promise<CsvContactSink> {
        const fileStream = fs.createWriteStream(outputPath);
        await once(fileStream, 'open');
        return new CsvContactSink(fileStream, inputHeaders);
    }

    async write(result: ContactResult): Promise<void> {
        if (this.failure) throw this.failure;
        await this.writer.write(toOutputRow(result, this.inputHeaders));
    }

    async close(): Promise<void> {
        if (!this.failure) await this.writer.end();
        await this.done;
        if (this.failure) throw this.failure;
    }
}
