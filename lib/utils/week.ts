import type { Sale } from '../store/types';
import { formatDisplayDate, formatIsoDateLocal, parseSaleTimestamp } from '../time/parse';

/** Sunday 00:00:00 through Saturday 23:59:59, local time, both inclusive. */
export type WeekBounds = {
  start: Date;
  end: Date;
};

export type WeekBucket = WeekBounds & {
  /** Week start as YYYY-MM-DD, used as the bucket key and export file suffix. */
  key: string;
  sales: Sale[];
};

/** Monday=0..Sunday=6, the convention the week rule is written against. */
export function weekdayMon0(date: Date): number {
  return (date.getDay() + 6) % 7;
}

export function getWeekStartSunday(date: Date): Date {
  const d = new Date(date);
  const diff = (weekdayMon0(d) + 1) % 7;
  d.setDate(d.getDate() - diff);
  d.setHours(0, 0, 0, 0);
  return d;
}

export function getWeekEndSaturday(date: Date): Date {
  const end = getWeekStartSunday(date);
  end.setDate(end.getDate() + 6);
  end.setHours(23, 59, 59, 0);
  return end;
}

export function getWeekBounds(date: Date): WeekBounds {
  return { start: getWeekStartSunday(date), end: getWeekEndSaturday(date) };
}

export function currentWeekBounds(now: Date = new Date()): WeekBounds {
  return getWeekBounds(now);
}

/** Sales whose timestamp parses and falls in [start, end]. Unparseable rows are skipped. */
export function salesInWeek(sales: readonly Sale[], start: Date, end: Date): Sale[] {
  const from = start.getTime();
  const to = end.getTime();
  return sales.filter((sale) => {
    const at = parseSaleTimestamp(sale.timestamp);
    if (!at) return false;
    const t = at.getTime();
    return t >= from && t <= to;
  });
}

/**
 * Every week before the current one that has at least one sale, most recent first.
 * Buckets come only from existing sales, so empty weeks never appear.
 */
export function pastWeeks(sales: readonly Sale[], now: Date = new Date()): WeekBucket[] {
  const currentStart = getWeekStartSunday(now).getTime();
  const buckets = new Map<string, WeekBucket>();

  for (const sale of sales) {
    const at = parseSaleTimestamp(sale.timestamp);
    if (!at || at.getTime() >= currentStart) continue;
    const bounds = getWeekBounds(at);
    const key = formatIsoDateLocal(bounds.start);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.sales.push(sale);
    } else {
      buckets.set(key, { ...bounds, key, sales: [sale] });
    }
  }

  return Array.from(buckets.values()).sort((a, b) => b.start.getTime() - a.start.getTime());
}

export function formatWeekLabel(bounds: WeekBounds): string {
  return `${formatDisplayDate(bounds.start)} - ${formatDisplayDate(bounds.end)}`;
}
