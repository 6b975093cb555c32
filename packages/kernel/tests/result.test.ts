import { describe, it, expect } from 'vitest';
import { ok, err, map, mapErr, chain, unwrap, type Result } from '../src/result.js';

const parseMinorUnits = (input: string): Result<number, string> => {
  const amount = Number(input);
  return Number.isSafeInteger(amount) ? ok(amount) : err(`not minor units: ${input}`);
};

describe('Result', () => {
  it('tags successes and failures', () => {
    expect(ok(1999)).toEqual({ ok: true, value: 1999 });
    expect(err('declined')).toEqual({ ok: false, error: 'declined' });
  });

  describe('map', () => {
    it('transforms a success', () => {
      expect(map(parseMinorUnits('1999'), (amount) => amount / 100)).toEqual({ ok: true, value: 19.99 });
    });

    it('passes a failure through', () => {
      expect(map(parseMinorUnits('19.99'), (amount) => amount / 100)).toEqual({
        ok: false,
        error: 'not minor units: 19.99',
      });
    });
  });

  describe('mapErr', () => {
    it('lifts the error and keeps the lower one reachable', () => {
      const lower = new Error('connection reset');
      const result: Result<number, Error> = err(lower);

      const lifted = mapErr(result, (error) => new Error('step failed', { cause: error }));

      expect(!lifted.ok && lifted.error.message).toBe('step failed');
      expect(!lifted.ok && lifted.error.cause).toBe(lower);
    });

    it('leaves a success alone', () => {
      expect(mapErr(ok(5), () => 'unused')).toEqual({ ok: true, value: 5 });
    });
  });

  describe('chain', () => {
    it('feeds the value into the next step', () => {
      expect(chain(ok('250'), parseMinorUnits)).toEqual({ ok: true, value: 250 });
    });

    it('stops at the first failure', () => {
      expect(chain(ok('abc'), parseMinorUnits)).toEqual({ ok: false, error: 'not minor units: abc' });
    });
  });

  describe('unwrap', () => {
    it('returns the value of a success', () => {
      expect(unwrap(ok('x'))).toBe('x');
    });

    it('throws the error of a failure', () => {
      const error = new Error('bad env');
      expect(() => unwrap(err(error))).toThrow(error);
    });
  });
});
