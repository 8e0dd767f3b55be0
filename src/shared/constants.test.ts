import { describe, it, expect } from 'vitest';
import { COMMON_XRAY_USER_HEADER_BITS, DEFAULT_BUDGET_PLAN, PACKET_ENVELOPE, SECONDS_PER_DAY } from './constants';

describe('PACKET_ENVELOPE', () => {
  it('allows 4096 octets of data behind 16 octets of headers', () => {
    expect(PACKET_ENVELOPE).toEqual({ headerBits: 48, dataHeaderBits: 80, maxPayloadBits: 32768 });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(PACKET_ENVELOPE)).toBe(true);
  });
});

describe('COMMON_XRAY_USER_HEADER_BITS', () => {
  it('totals 19 octets', () => {
    expect(COMMON_XRAY_USER_HEADER_BITS).toBe(152);
  });
});

describe('DEFAULT_BUDGET_PLAN', () => {
  it('has unique labels', () => {
    const labels = DEFAULT_BUDGET_PLAN.map((e) => e.label);
    expect(new Set(labels).size).toBe(labels.length);
  });

  it('uses cadences that tile the day', () => {
    for (const entry of DEFAULT_BUDGET_PLAN) {
      expect(Number.isInteger(SECONDS_PER_DAY / entry.integrationPeriodS)).toBe(true);
    }
  });

  it('covers the quicklook products only', () => {
    expect(DEFAULT_BUDGET_PLAN.every((e) => e.product.startsWith('ql-'))).toBe(true);
  });
});
