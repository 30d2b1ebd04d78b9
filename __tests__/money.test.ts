/**
 * Money display: whole units, decimals truncated, "." thousands separator.
 */

import { formatMoneyInt, formatPct } from '@/lib/utils/money';

describe('formatMoneyInt', () => {
  it('truncates decimals and groups thousands with "."', () => {
    expect(formatMoneyInt(123456.78)).toBe('123.456');
    expect(formatMoneyInt(1000000)).toBe('1.000.000');
    expect(formatMoneyInt(999.99)).toBe('999');
  });

  it('formats zero and negatives', () => {
    expect(formatMoneyInt(0)).toBe('0');
    expect(formatMoneyInt(-1234.5)).toBe('-1.234');
  });

  it('right-aligns to a width', () => {
    expect(formatMoneyInt(1500, 7)).toBe('  1.500');
  });

  it('returns "—" for non-finite input', () => {
    expect(formatMoneyInt(NaN)).toBe('—');
    expect(formatMoneyInt(Infinity)).toBe('—');
  });
});

describe('formatPct', () => {
  it('uses two decimals by default', () => {
    expect(formatPct(10.5)).toBe('10.50%');
    expect(formatPct(7, 1)).toBe('7.0%');
  });
});
