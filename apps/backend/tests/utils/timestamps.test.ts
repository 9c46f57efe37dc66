import { describe, expect, it } from 'vitest';

import { auditMonthKey, isAuditMonthKey, normalizeTimestamp } from '../../src/utils/timestamps.js';

describe('normalizeTimestamp', () => {
  it('converts unix seconds to ISO string', () => {
    const seconds = 1_700_000_000;
    const expected = new Date(seconds * 1000).toISOString();
    expect(normalizeTimestamp(seconds)).toBe(expected);
    expect(normalizeTimestamp(String(seconds))).toBe(expected);
  });

  it('converts unix milliseconds to ISO string', () => {
    const millis = 1_700_000_000_000;
    const expected = new Date(millis).toISOString();
    expect(normalizeTimestamp(millis)).toBe(expected);
    expect(normalizeTimestamp(String(millis))).toBe(expected);
  });

  it('keeps ISO-like strings intact', () => {
    const iso = '2024-03-01T12:34:56.000Z';
    expect(normalizeTimestamp(iso)).toBe(iso);
  });

  it('returns null for invalid input', () => {
    expect(normalizeTimestamp(null)).toBeNull();
    expect(normalizeTimestamp('not-a-date')).toBeNull();
    expect(normalizeTimestamp('')).toBeNull();
  });
});

describe('auditMonthKey', () => {
  it('formats the UTC year and month', () => {
    expect(auditMonthKey(new Date('2026-02-10T12:00:00.000Z'))).toBe('2026_02');
    expect(auditMonthKey(new Date('2025-12-31T23:59:59.000Z'))).toBe('2025_12');
  });
});

describe('isAuditMonthKey', () => {
  it('accepts YYYY_MM keys only', () => {
    expect(isAuditMonthKey('2026_02')).toBe(true);
    expect(isAuditMonthKey('2026-02')).toBe(false);
    expect(isAuditMonthKey('2026_13')).toBe(false);
    expect(isAuditMonthKey('2026_00')).toBe(false);
  });
});
