/**
 * Result Type Tests
 */

import { describe, it, expect } from 'vitest';
import {
  Ok,
  Err,
  isOk,
  isErr,
  unwrap,
  mapErr,
  match,
  fromPromise,
  type Result,
} from '../../../src/types/result.js';

describe('Result Type', () => {
  describe('Constructors', () => {
    it('Ok creates a success result', () => {
      const result: Result<number, string> = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
    });

    it('Err creates a failure result', () => {
      const result: Result<number, string> = Err('boom');
      expect(result).toEqual({ ok: false, error: 'boom' });
    });
  });

  describe('Type guards', () => {
    it('should narrow success results', () => {
      const result: Result<number, string> = Ok(1);
      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
      if (isOk(result)) {
        expect(result.value).toBe(1);
      }
    });

    it('should narrow failure results', () => {
      const result: Result<number, string> = Err('bad');
      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBe('bad');
      }
    });
  });

  describe('unwrap', () => {
    it('should return the value of a success', () => {
      expect(unwrap(Ok('done'))).toBe('done');
    });

    it('should throw the error of a failure', () => {
      const error = new Error('failed');
      expect(() => unwrap(Err(error))).toThrow(error);
    });
  });

  describe('mapErr', () => {
    it('should map the error value', () => {
      const result: Result<number, string> = Err('x');
      expect(mapErr(result, (e) => e.length)).toEqual({ ok: false, error: 1 });
    });

    it('should pass success results through', () => {
      const result: Result<number, string> = Ok(7);
      expect(mapErr(result, (e) => e.length)).toEqual({ ok: true, value: 7 });
    });
  });

  describe('match', () => {
    it('should call the handler for the variant', () => {
      const handlers = { ok: (v: number) => `ok:${v}`, err: (e: string) => `err:${e}` };
      expect(match<number, string, string>(Ok(3), handlers)).toBe('ok:3');
      expect(match<number, string, string>(Err('no'), handlers)).toBe('err:no');
    });
  });

  describe('fromPromise', () => {
    it('should wrap a resolved promise', async () => {
      const result = await fromPromise(Promise.resolve(5), () => 'never');
      expect(result).toEqual({ ok: true, value: 5 });
    });

    it('should map a rejection', async () => {
      const result = await fromPromise(Promise.reject(new Error('io')), (e) =>
        e instanceof Error ? e.message : 'unknown'
      );
      expect(result).toEqual({ ok: false, error: 'io' });
    });
  });
});
