import { describe, expect, it } from 'vitest';
import { computeEpochRequests, computeRequiredDailyRequests } from '../../../src/staking/target.js';

describe('computeRequiredDailyRequests', () => {
  it('rounds a ratio just under one request per day up to one', () => {
    expect(computeRequiredDailyRequests(11_574_074_074_074n)).toBe(1);
  });

  it('rounds any remainder up', () => {
    expect(computeRequiredDailyRequests(115_740_740_740_740n)).toBe(10);
    expect(computeRequiredDailyRequests(115_740_740_740_741n)).toBe(11);
  });

  it('returns zero for a zero ratio', () => {
    expect(computeRequiredDailyRequests(0n)).toBe(0);
  });

  it('rejects a negative ratio', () => {
    expect(() => computeRequiredDailyRequests(-1n)).toThrow(RangeError);
  });
});

describe('computeEpochRequests', () => {
  it('subtracts the checkpoint baseline', () => {
    expect(computeEpochRequests(15n, 10n)).toBe(5);
  });

  it('keeps a negative difference', () => {
    expect(computeEpochRequests(3n, 8n)).toBe(-5);
  });

  it('rejects differences a JS number cannot hold exactly', () => {
    const past = BigInt(Number.MAX_SAFE_INTEGER) + 1n;
    expect(() => computeEpochRequests(past, 0n)).toThrow(RangeError);
    expect(() => computeEpochRequests(0n, past)).toThrow(RangeError);
    expect(computeEpochRequests(BigInt(Number.MAX_SAFE_INTEGER), 0n)).toBe(Number.MAX_SAFE_INTEGER);
  });
});
