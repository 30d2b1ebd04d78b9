/**
 * Sale timestamps: strict "YYYY-MM-DD HH:MM:SS" in local time.
 */

import { formatDisplayDate, formatIsoDateLocal, formatSaleTimestamp, parseSaleTimestamp } from '@/lib/time/parse';

describe('parseSaleTimestamp', () => {
  it('parses a valid timestamp as local time', () => {
    const d = parseSaleTimestamp('2024-06-08 23:59:59');
    expect(d).not.toBeNull();
    expect(d?.getFullYear()).toBe(2024);
    expect(d?.getMonth()).toBe(5);
    expect(d?.getDate()).toBe(8);
    expect(d?.getHours()).toBe(23);
    expect(d?.getSeconds()).toBe(59);
  });

  it('rejects other formats', () => {
    expect(parseSaleTimestamp('2024-06-08')).toBeNull();
    expect(parseSaleTimestamp('2024-06-08T10:00:00')).toBeNull();
    expect(parseSaleTimestamp('08/06/2024 10:00:00')).toBeNull();
    expect(parseSaleTimestamp('')).toBeNull();
    expect(parseSaleTimestamp(null)).toBeNull();
    expect(parseSaleTimestamp(20240608)).toBeNull();
  });

  it('rejects impossible calendar values', () => {
    expect(parseSaleTimestamp('2024-02-30 10:00:00')).toBeNull();
    expect(parseSaleTimestamp('2023-02-29 10:00:00')).toBeNull();
    expect(parseSaleTimestamp('2024-13-01 10:00:00')).toBeNull();
    expect(parseSaleTimestamp('2024-06-08 24:00:00')).toBeNull();
  });

  it('accepts Feb 29 in a leap year', () => {
    expect(parseSaleTimestamp('2024-02-29 00:00:00')).not.toBeNull();
  });
});

describe('formatting', () => {
  const d = new Date(2024, 0, 5, 7, 3, 9);

  it('writes the stored timestamp format', () => {
    expect(formatSaleTimestamp(d)).toBe('2024-01-05 07:03:09');
  });

  it('writes ISO and display dates', () => {
    expect(formatIsoDateLocal(d)).toBe('2024-01-05');
    expect(formatDisplayDate(d)).toBe('05/01/2024');
  });

  it('reads back what it writes', () => {
    expect(parseSaleTimestamp(formatSaleTimestamp(d))?.getTime()).toBe(d.getTime());
  });
});
