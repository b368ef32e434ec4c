/**
 * Tests for type guards
 */

import { describe, it, expect } from 'vitest';
import {
  isRecord,
  isStringRecord,
  asStringRecord,
  isProviderKind,
  isHealthStatus,
  isProbeSuccess,
  describeProbeOutcome,
  describeRedeployOutcome,
} from '../type-guards.js';

describe('Type Guards', () => {
  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord({})).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('targets')).toBe(false);
    });
  });

  describe('isStringRecord', () => {
    it('should require every value to be a string', () => {
      expect(isStringRecord({ Authorization: 'Bearer test-secret' })).toBe(true);
      expect(isStringRecord({ retries: 3 })).toBe(false);
    });

    it('should narrow or throw through asStringRecord', () => {
      expect(asStringRecord({ a: 'b' })).toEqual({ a: 'b' });
      expect(() => asStringRecord({ a: 1 })).toThrow('Invalid value: expected Record<string, string>');
    });
  });

  describe('enums', () => {
    it('should recognize provider kinds', () => {
      expect(isProviderKind('RENDER')).toBe(true);
      expect(isProviderKind('render')).toBe(false);
      expect(isProviderKind(undefined)).toBe(false);
    });

    it('should recognize health statuses', () => {
      expect(isHealthStatus('REDEPLOYING')).toBe(true);
      expect(isHealthStatus('OFFLINE')).toBe(false);
    });
  });

  describe('outcomes', () => {
    it('should only treat SUCCESS as a probe success', () => {
      expect(isProbeSuccess({ kind: 'SUCCESS', statusCode: 204 })).toBe(true);
      expect(isProbeSuccess({ kind: 'HTTP_ERROR', statusCode: 503 })).toBe(false);
      expect(isProbeSuccess({ kind: 'TIMEOUT' })).toBe(false);
    });

    it('should describe probe outcomes', () => {
      expect(describeProbeOutcome({ kind: 'SUCCESS', statusCode: 200 })).toBe('HTTP 200');
      expect(describeProbeOutcome({ kind: 'HTTP_ERROR', statusCode: 502 })).toBe('HTTP 502');
      expect(describeProbeOutcome({ kind: 'TIMEOUT' })).toBe('timed out');
      expect(describeProbeOutcome({ kind: 'CONNECTION_ERROR', message: 'ECONNREFUSED' })).toBe(
        'connection error: ECONNREFUSED'
      );
    });

    it('should describe redeploy outcomes', () => {
      expect(describeRedeployOutcome({ kind: 'SUCCEEDED' })).toBe('succeeded');
      expect(describeRedeployOutcome({ kind: 'FAILED', reason: 'HTTP 500' })).toBe('failed: HTTP 500');
      expect(describeRedeployOutcome({ kind: 'THROTTLED', reason: 'cooldown' })).toBe('throttled: cooldown');
    });
  });
});
