/**
 * Tests for failure classification.
 */

import { describe, it, expect } from 'vitest';
import {
  classify,
  isTransient,
  isTransientSqlState,
  TRANSIENT_SQL_STATES,
} from '../classifier/index.js';
import { MAX_CAUSE_DEPTH } from '../errors/index.js';
import { FailureClass, RawFailure } from '../types/index.js';

const sql = (sqlState: string, cause?: RawFailure): RawFailure => ({
  kind: 'sql',
  message: `sql ${sqlState}`,
  sqlState,
  ...(cause ? { cause } : {}),
});

describe('classify', () => {
  describe('SQLSTATE table', () => {
    const transientCodes = [
      '08000',
      '08003',
      '08006',
      '08001',
      '08004',
      '40001',
      '40P01',
      '53000',
      '53100',
      '53200',
      '53300',
    ];

    it.each(transientCodes)('should classify %s as transient', (code) => {
      expect(classify(sql(code))).toEqual({
        kind: FailureClass.Transient,
        diagnosticCode: code,
        isNetworkLevel: false,
      });
    });

    it.each(['23505', '42601', '42P01', '28P01', '57014', '22012'])(
      'should classify %s as permanent',
      (code) => {
        expect(classify(sql(code))).toEqual({
          kind: FailureClass.Permanent,
          diagnosticCode: code,
          isNetworkLevel: false,
        });
      }
    );

    it('should export exactly the tabled codes', () => {
      expect([...TRANSIENT_SQL_STATES].sort()).toEqual([...transientCodes].sort());
      expect(isTransientSqlState('40P01')).toBe(true);
      expect(isTransientSqlState('23505')).toBe(false);
    });
  });

  describe('network-level failures', () => {
    it.each(['socket', 'io', 'timeout'] as const)('should classify %s as transient', (kind) => {
      expect(classify({ kind, message: 'boom' })).toEqual({
        kind: FailureClass.Transient,
        isNetworkLevel: true,
      });
    });

    it.each(['not-found', 'handle-unusable', 'invalid-request', 'unknown'] as const)(
      'should classify %s without a cause as permanent',
      (kind) => {
        expect(classify({ kind, message: 'boom' })).toEqual({
          kind: FailureClass.Permanent,
          isNetworkLevel: false,
        });
      }
    );
  });

  describe('cause chain', () => {
    it('should be transient when a wrapped cause is transient', () => {
      const failure: RawFailure = {
        kind: 'unknown',
        message: 'outer',
        cause: { kind: 'unknown', message: 'middle', cause: { kind: 'socket', message: 'reset' } },
      };
      expect(classify(failure)).toEqual({ kind: FailureClass.Transient, isNetworkLevel: true });
    });

    it('should let the first SQLSTATE decide', () => {
      const failure: RawFailure = {
        kind: 'unknown',
        message: 'outer',
        cause: sql('23505', { kind: 'socket', message: 'reset' }),
      };
      expect(classify(failure)).toEqual({
        kind: FailureClass.Permanent,
        diagnosticCode: '23505',
        isNetworkLevel: false,
      });
    });

    it('should report the SQLSTATE of a transient wrapped cause', () => {
      const failure: RawFailure = { kind: 'unknown', message: 'outer', cause: sql('40001') };
      expect(classify(failure)).toEqual({
        kind: FailureClass.Transient,
        diagnosticCode: '40001',
        isNetworkLevel: false,
      });
    });

    it('should stop after the depth cap', () => {
      let failure: RawFailure = { kind: 'socket', message: 'deep' };
      for (let i = 0; i < MAX_CAUSE_DEPTH; i++) {
        failure = { kind: 'unknown', message: `wrapper ${i}`, cause: failure };
      }
      expect(classify(failure).kind).toBe(FailureClass.Permanent);

      let shallow: RawFailure = { kind: 'socket', message: 'deep' };
      for (let i = 0; i < MAX_CAUSE_DEPTH - 1; i++) {
        shallow = { kind: 'unknown', message: `wrapper ${i}`, cause: shallow };
      }
      expect(classify(shallow).kind).toBe(FailureClass.Transient);
    });

    it('should terminate on a cyclic chain', () => {
      const a: { kind: 'unknown'; message: string; cause?: RawFailure } = {
        kind: 'unknown',
        message: 'a',
      };
      const b: RawFailure = { kind: 'unknown', message: 'b', cause: a };
      a.cause = b;
      expect(classify(a)).toEqual({ kind: FailureClass.Permanent, isNetworkLevel: false });
    });
  });

  it('should be a pure function of its input', () => {
    const failure = sql('53300');
    expect(classify(failure)).toEqual(classify(failure));
    expect(isTransient(failure)).toBe(true);
  });
});
