import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { runFile } from '../../src/pipeline/run-file';
import { CapabilityError, RunAbortedError } from '../../src/utils/errors';
import { FakeDnsClient, FakeSmtpTransport, reply, testConfig } from '../helpers/fakes';

const FIXTURE = path.join(__dirname, '..', 'fixtures', 'linkedin_connections.csv');
const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailsleuth-run-'));
const HEADER = 'First Name,Last Name,URL,Email Address,Company,Position,Connected On,' +
  'chosen_email,verdict_status,confidence,domain,outcome,patterns_tried';

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function readRows(file: string): string[] {
  return fs.readFileSync(file, 'utf8').trim().split('\n');
}

describe('runFile', () => {
  it('enriches every row of a connections export', async () => {
    const output = path.join(tmpDir, 'enriched.csv');
    const summary = await runFile(FIXTURE, output, {
      config: testConfig(),
      search: false,
      capabilities: {
        dns: new FakeDnsClient({ mx: { 'acme.com': ['mx.acme.com'] } }),
        smtp: new FakeSmtpTransport((_host, localPart) => (localPart === 'john.smith' ? reply(250) : reply(550))),
      },
    });

    expect(readRows(output)).toEqual([
      HEADER,
      'John,Smith,https://www.example.com/in/example-1,,Acme Inc,Engineer,01 Jan 2024,john.smith@acme.com,VALID,0.90,acme.com,VERIFIED,1',
      'Jane,Doe,https://www.example.com/in/example-2,,"Globex, Corp",Director,02 Jan 2024,,UNKNOWN,0.00,,NO_DOMAIN,0',
    ]);
    expect(summary.total).toBe(2);
    expect(summary.verified).toBe(1);
    expect(summary.no_domain).toBe(1);
  });

  it('writes partial results before reporting an aborted run', async () => {
    const output = path.join(tmpDir, 'aborted.csv');
    const base = testConfig();
    const config = { ...base, pipeline: { ...base.pipeline, capability_failure_threshold: 1 } };

    await expect(runFile(FIXTURE, output, {
      config,
      concurrency: 1,
      capabilities: { dns: new FakeDnsClient({ failAll: new CapabilityError('dns', 'resolver refused') }) },
    })).rejects.toBeInstanceOf(RunAbortedError);

    expect(readRows(output)).toEqual([
      HEADER,
      'John,Smith,https://www.example.com/in/example-1,,Acme Inc,Engineer,01 Jan 2024,,UNKNOWN,0.00,,LOOKUP_FAILED,0',
      'Jane,Doe,https://www.example.com/in/example-2,,"Globex, Corp",Director,02 Jan 2024,,UNKNOWN,0.00,,CANCELLED,0',
    ]);
  });

  it('refuses an unwritable output before looking anything up', async () => {
    const dns = new FakeDnsClient({ mx: { 'acme.com': ['mx.acme.com'] } });
    const smtp = new FakeSmtpTransport(() => reply(250));

    await expect(runFile(FIXTURE, path.join(tmpDir, 'missing', 'out.csv'), {
      config: testConfig(),
      search: false,
      capabilities: { dns, smtp },
    })).rejects.toThrow(/ENOENT/);

    expect(dns.mxCalls).toEqual([]);
    expect(smtp.probes).toEqual([]);
  });
});
