import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { secret } from '@payroute/masking';
import { createLogger } from '../src/logger.js';

function capture() {
  const lines: string[] = [];
  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString('utf8'));
      callback();
    },
  });
  return { lines, destination };
}

describe('createLogger', () => {
  it('writes structured JSON with the level label', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ name: 'test', destination });

    logger.info({ connector: 'opayo' }, 'request built');

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.level).toBe('info');
    expect(entry.name).toBe('test');
    expect(entry.connector).toBe('opayo');
    expect(entry.msg).toBe('request built');
  });

  it('redacts raw credential fields', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ destination });

    logger.info({ auth: { apiKey: 'test-secret' }, headers: { authorization: 'Basic test-secret' } });

    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.auth.apiKey).toBe('[REDACTED]');
    expect(entry.headers.authorization).toBe('[REDACTED]');
  });

  it('never prints values held in secret containers', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ destination });

    logger.info({ card: { number: secret('4111111111111111') } });

    expect(lines[0]).toContain('"number":"[REDACTED]"');
    expect(lines[0]).not.toContain('4111111111111111');
  });

  it('respects the configured level', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ level: 'warn', destination });

    logger.info('dropped');
    logger.warn('kept');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}').msg).toBe('kept');
  });
});
