import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, describe, expect, it } from 'vitest';
import { parseConfig } from '../../src/config';
import { ConfigurationError } from '../../src/utils/errors';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailsleuth-config-'));

function writeYaml(name: string, contents: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, contents);
  return file;
}

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('parseConfig', () => {
  it('loads the bundled defaults', () => {
    const config = parseConfig(undefined, {});

    expect(config.pipeline.concurrency).toBe(5);
    expect(config.pipeline.per_domain_rate).toBe(2);
    expect(config.generator.max_candidates).toBe(8);
    expect(config.verifier.confidence).toEqual({
      valid: 0.9,
      valid_unconfirmed: 0.7,
      catch_all: 0.5,
      invalid_rejected: 0.85,
      invalid_no_mx: 1.0,
      mx_only: 0.3,
      unknown: 0,
    });
    expect(config.smtp.port).toBe(25);
  });

  it('fills missing sections from schema defaults', () => {
    const config = parseConfig(writeYaml('partial.yaml', 'pipeline:\n  concurrency: 3\n'), {});

    expect(config.pipeline.concurrency).toBe(3);
    expect(config.pipeline.best_guess).toBe(false);
    expect(config.retry.attempts).toBe(3);
  });

  it('treats an empty file as all defaults', () => {
    expect(parseConfig(writeYaml('empty.yaml', ''), {}).dns.timeout_ms).toBe(5000);
  });

  it('applies environment overrides on top of the file', () => {
    const config = parseConfig(undefined, {
      CONCURRENCY_LIMIT: '12',
      SMTP_ENABLED: 'false',
      SMTP_PORT: '2525',
      LOG_LEVEL: 'debug',
    });

    expect(config.pipeline.concurrency).toBe(12);
    expect(config.verifier.smtp_enabled).toBe(false);
    expect(config.smtp.port).toBe(2525);
    expect(config.logging.level).toBe('debug');
  });

  it('lists every invalid field', () => {
    const file = writeYaml('invalid.yaml', 'pipeline:\n  concurrency: 0\nsmtp:\n  port: 70000\n');

    expect(() => parseConfig(file, {})).toThrow(ConfigurationError);
    expect(() => parseConfig(file, {})).toThrow(/- pipeline\.concurrency: /);
    expect(() => parseConfig(file, {})).toThrow(/- smtp\.port: /);
  });

  it('rejects a malformed environment value', () => {
    expect(() => parseConfig(undefined, { CONCURRENCY_LIMIT: 'many' })).toThrow(/Invalid environment configuration/);
  });

  it('rejects a file that is not a mapping of sections', () => {
    expect(() => parseConfig(writeYaml('list.yaml', '- a\n- b\n'), {})).toThrow(ConfigurationError);
  });

  it('reports a missing file', () => {
    expect(() => parseConfig(path.join(tmpDir, 'missing.yaml'), {})).toThrow(/Cannot read config file/);
  });
});
