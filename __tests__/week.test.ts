/**
 * Sunday–Saturday week buckets in local time.
 */

import { formatIsoDateLocal, formatSaleTimestamp } from '@/lib/time/parse';
import {
  currentWeekBounds,
  formatWeekLabel,
  getWeekEndSaturday,
  getWeekStartSunday,
  pastWeeks,
  salesInWeek,
  weekdayMon0,
} from '@/lib/utils/week';
import { sale } from './helpers/fixtures';

describe('getWeekStartSunday', () => {
  it('returns the Sunday on or before the date at midnight', () => {
    const start = getWeekStartSunday(new Date(2024, 5, 12, 15, 0, 0));
    expect(formatSaleTimestamp(start)).toBe('2024-06-09 00:00:00');
  });

  it('keeps a Sunday in its own week', () => {
    expect(formatIsoDateLocal(getWeekStartSunday(new Date(2024, 5, 9, 10, 0, 0)))).toBe('2024-06-09');
  });

  it('puts a Saturday at the end of the week', () => {
    expect(formatIsoDateLocal(getWeekStartSunday(new Date(2024, 5, 15, 23, 0, 0)))).toBe('2024-06-09');
  });

  it('crosses month boundaries', () => {
    expect(formatIsoDateLocal(getWeekStartSunday(new Date(2024, 2, 1, 8, 0, 0)))).toBe('2024-02-25');
  });
});

describe('week bounds', () => {
  it('ends on Saturday 23:59:59', () => {
    expect(formatSaleTimestamp(getWeekEndSaturday(new Date(2024, 5, 12)))).toBe('2024-06-15 23:59:59');
  });

  it('labels the week as DD/MM/YYYY - DD/MM/YYYY', () => {
    expect(formatWeekLabel(currentWeekBounds(new Date(2024, 5, 10)))).toBe('09/06/2024 - 15/06/2024');
  });

  it('numbers weekdays from Monday', () => {
    expect(weekdayMon0(new Date(2024, 5, 10))).toBe(0);
    expect(weekdayMon0(new Date(2024, 5, 9))).toBe(6);
  });
});

describe('salesInWeek', () => {
  it('includes both ends and skips unparseable timestamps', () => {
    const { start, end } = currentWeekBounds(new Date(2024, 5, 12));
    const sales = [
      sale({ id: 1, timestamp: '2024-06-08 23:59:59' }),
      sale({ id: 2, timestamp: '2024-06-09 00:00:00' }),
      sale({ id: 3, timestamp: '2024-06-15 23:59:59' }),
      sale({ id: 4, timestamp: '2024-06-16 00:00:00' }),
      sale({ id: 5, timestamp: 'not a date' }),
    ];
    expect(salesInWeek(sales, start, end).map((s) => s.id)).toEqual([2, 3]);
  });
});

describe('pastWeeks', () => {
  const now = new Date(2024, 5, 10, 9, 0, 0);
  const sales = [
    sale({ id: 1, timestamp: '2024-06-08 23:59:59' }),
    sale({ id: 2, timestamp: '2024-06-09 00:00:00' }),
    sale({ id: 3, timestamp: '2024-05-28 10:00:00' }),
    sale({ id: 4, timestamp: 'garbage' }),
    sale({ id: 5, timestamp: '2024-06-03 12:00:00' }),
  ];

  it('groups earlier weeks most recent first and leaves out the current week', () => {
    const weeks = pastWeeks(sales, now);
    expect(weeks.map((w) => w.key)).toEqual(['2024-06-02', '2024-05-26']);
    expect(weeks[0].sales.map((s) => s.id)).toEqual([1, 5]);
    expect(weeks[1].sales.map((s) => s.id)).toEqual([3]);
    expect(formatWeekLabel(weeks[0])).toBe('02/06/2024 - 08/06/2024');
  });

  it('is empty when every sale is in the current week', () => {
    expect(pastWeeks([sale({ timestamp: '2024-06-10 08:00:00' })], now)).toEqual([]);
  });
});
