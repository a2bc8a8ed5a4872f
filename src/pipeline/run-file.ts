import { Config, getConfig } from '../config';
import { NodeDnsClient } from '../modules/dns';
import { CsvContactSink } from '../modules/exporter';
import { ingestContacts } from '../modules/ingestor';
import { logger, RunSummary } from '../modules/observability';
import { DuckDuckGoDomainSearch } from '../modules/search';
import { NetSmtpTransport } from '../modules/smtp';
import { ContactResult, ContactSink } from '../types';
import { RunAbortedError } from '../utils/errors';
import { Capabilities, createPipeline } from './index';

export interface RunFileOptions {
    config?: Config;
    concurrency?: number;
    perDomainRate?: number;
    smtp?: boolean;
    search?: boolean;
    bestGuess?: boolean;
    signal?: AbortSignal;
    /** Replaces the network-backed capabilities. */
    capabilities?: Capabilities;
}

export function defaultCapabilities(config: Config, options: { smtp: boolean; search: boolean }): Capabilities {
    return {
        dns: new NodeDnsClient(config.dns),
        smtp: options.smtp ? new NetSmtpTransport(config.smtp) : null,
        search: options.search ? new DuckDuckGoDomainSearch(config.search) : null,
    };
}

async function writeAll(sink: ContactSink, results: readonly ContactResult[]): Promise<void> {
    try {
        for (const result of results) {
            await sink.write(result);
        }
    } finally {
        await sink.close();
    }
}

/**
 * CSV in, CSV out. The output always holds one row per input contact, also
 * when the run is cancelled or aborted.
 */
export async function runFile(inputPath: string, outputPath: string, options: RunFileOptions = {}): Promise<RunSummary> {
    const config = options.config || getConfig();
    const input = await ingestContacts(inputPath, { maxPreambleLines: config.ingest.max_preamble_lines });
    // Fail on an unwritable output before any lookup goes out
    const sink = await CsvContactSink.open(outputPath, input.headers);

    const smtpEnabled = (options.smtp ?? true) && config.verifier.smtp_enabled;
    const searchEnabled = (options.search ?? true) && config.resolver.search_enabled;
    const capabilities = options.capabilities || defaultCapabilities(config, { smtp: smtpEnabled, search: searchEnabled });

    const pipeline = createPipeline(capabilities, {
        config,
        perDomainRate: options.perDomainRate,
        bestGuess: options.bestGuess,
        signal: options.signal,
    });

    let results: ContactResult[];
    try {
        results = await pipeline.run(input.contacts, {
            concurrency: options.concurrency ?? config.pipeline.concurrency,
            signal: options.signal,
        });
    } catch (e) {
        if (e instanceof RunAbortedError) {
            await writeAll(sink, e.results);
            logger.log('warn', `Partial results written to ${outputPath}`);
        } else {
            await sink.close();
        }
        throw e;
    }

    await writeAll(sink, results);
    const summary = pipeline.metrics.getSummary();
    logger.log('info', `Results saved to ${outputPath}`, summary);
    return summary;
}
