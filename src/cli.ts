#!/usr/bin/env node
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config';
import { logger } from './modules/observability';
import { runFile } from './pipeline/run-file';
import { errorMessage } from './utils/errors';
import { ShutdownHandler } from './utils/shutdown';

function positiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Expected a positive integer.');
    return n;
}

function nonNegativeNumber(value: string): number {
    const n = Number(value);
    if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError('Expected a number >= 0.');
    return n;
}

interface FindCommandOptions {
    config?: string;
    concurrency?: number;
    rate?: number;
    smtp: boolean;
    search: boolean;
    bestGuess?: boolean;
}

const program = new Command();

program
    .name('mailsleuth')
    .description('Find and verify probable email addresses for contacts at named companies')
    .version('1.0.0');

program
    .command('find')
    .description('Find emails for every contact in a CSV export')
    .argument('<input>', 'Input CSV (First Name, Last Name, Company columns)')
    .argument('<output>', 'Output CSV path')
    .option('-c, --config <path>', 'Path to custom config YAML')
    .option('--concurrency <n>', 'Contacts processed in parallel', positiveInt)
    .option('--rate <n>', 'SMTP probes per second per domain, 0 disables limiting', nonNegativeNumber)
    .option('--no-smtp', 'Skip SMTP probing, check MX records only')
    .option('--no-search', 'Do not search the web for unknown companies')
    .option('--best-guess', 'Emit the top-ranked candidate when it could not be probed')
    .action(async (input: string, output: string, options: FindCommandOptions) => {
        const controller = new AbortController();
        try {
            const config = loadConfig(options.config ? path.resolve(options.config) : undefined);
            logger.configure(config.logging);
            new ShutdownHandler(controller).init();

            const inputPath = path.resolve(input);
            const outputPath = path.resolve(output);
            console.log(`Input: ${inputPath}`);
            console.log(`Output: ${outputPath}`);

            const summary = await runFile(inputPath, outputPath, {
                config,
                concurrency: options.concurrency,
                perDomainRate: options.rate,
                smtp: options.smtp,
                search: options.search,
                bestGuess: options.bestGuess,
                signal: controller.signal,
            });

            console.log(`Contacts: ${summary.total}, found: ${summary.found} (verified ${summary.verified}, catch-all ${summary.catch_all}, best guess ${summary.best_guess})`);
            console.log(`No domain: ${summary.no_domain}, not found: ${summary.not_found}, lookup failed: ${summary.lookup_failed}, cancelled: ${summary.cancelled}`);
            console.log(`Success rate: ${(summary.success_rate * 100).toFixed(1)}%`);
            process.exit(0);
        } catch (e) {
            console.error('Fatal Error:', errorMessage(e));
            process.exit(1);
        }
    });

program.parseAsync(process.argv).catch((e: unknown) => {
    console.error('Fatal Error:', errorMessage(e));
    process.exit(1);
});
