/**
 * Report aggregation over a snapshot of sales. Pure functions.
 * Groupings use the names stored on each sale, not a live catalog lookup,
 * so a renamed or deleted product still reports under the name it was sold as.
 */

import type { Sale } from '../store/types';
import { currentWeekBounds, salesInWeek } from '../utils/week';
import type { WeekBounds } from '../utils/week';

export const DEFAULT_TOP_N = 5;

export type SalesTotals = {
  revenue: number;
  profit: number;
  commission: number;
};

export type ClientRanking = { clientId: number; clientName: string; totalSpent: number };
export type ProductRanking = { productId: number; productName: string; totalQuantity: number };
export type VendorCommission = { vendorId: number; vendorName: string; commission: number };

export function totals(sales: readonly Sale[]): SalesTotals {
  return sales.reduce<SalesTotals>(
    (acc, s) => ({
      revenue: acc.revenue + s.total,
      profit: acc.profit + s.profitTotal,
      commission: acc.commission + s.commission,
    }),
    { revenue: 0, profit: 0, commission: 0 }
  );
}

/**
 * Sum `value` per (id, name) key. Map keeps first-seen order, which the
 * stable sort below preserves for ties.
 */
function groupSum<R>(
  sales: readonly Sale[],
  keyOf: (s: Sale) => [number, string],
  value: (s: Sale) => number,
  build: (id: number, name: string, sum: number) => R
): R[] {
  const groups = new Map<string, { id: number; name: string; sum: number }>();
  for (const sale of sales) {
    const [id, name] = keyOf(sale);
    const key = JSON.stringify([id, name]);
    const g = groups.get(key);
    if (g) g.sum += value(sale);
    else groups.set(key, { id, name, sum: value(sale) });
  }
  return Array.from(groups.values()).map((g) => build(g.id, g.name, g.sum));
}

export function topClients(sales: readonly Sale[], n: number = DEFAULT_TOP_N): ClientRanking[] {
  return groupSum(
    sales,
    (s) => [s.clientId, s.clientName],
    (s) => s.total,
    (clientId, clientName, totalSpent): ClientRanking => ({ clientId, clientName, totalSpent })
  )
    .sort((a, b) => b.totalSpent - a.totalSpent)
    .slice(0, Math.max(0, n));
}

export function topProducts(sales: readonly Sale[], n: number = DEFAULT_TOP_N): ProductRanking[] {
  return groupSum(
    sales,
    (s) => [s.productId, s.productName],
    (s) => s.quantity,
    (productId, productName, totalQuantity): ProductRanking => ({ productId, productName, totalQuantity })
  )
    .sort((a, b) => b.totalQuantity - a.totalQuantity)
    .slice(0, Math.max(0, n));
}

/** Commission owed per vendor, in the order vendors first appear. Not sorted. */
export function commissionByVendor(sales: readonly Sale[]): VendorCommission[] {
  return groupSum(
    sales,
    (s) => [s.vendorId, s.vendorName],
    (s) => s.commission,
    (vendorId, vendorName, commission): VendorCommission => ({ vendorId, vendorName, commission })
  );
}

export type PeriodReport = {
  bounds: WeekBounds;
  sales: Sale[];
  totals: SalesTotals;
};

export type VendorPayoutReport = {
  bounds: WeekBounds;
  payouts: VendorCommission[];
  totalCommission: number;
};

export function periodReport(sales: readonly Sale[], bounds: WeekBounds): PeriodReport {
  const inWeek = salesInWeek(sales, bounds.start, bounds.end);
  return { bounds, sales: inWeek, totals: totals(inWeek) };
}

export function weeklyReport(sales: readonly Sale[], now: Date = new Date()): PeriodReport {
  return periodReport(sales, currentWeekBounds(now));
}

export function vendorPayoutReport(sales: readonly Sale[], now: Date = new Date()): VendorPayoutReport {
  const bounds = currentWeekBounds(now);
  const payouts = commissionByVendor(salesInWeek(sales, bounds.start, bounds.end));
  return {
    bounds,
    payouts,
    totalCommission: payouts.reduce((sum, p) => sum + p.commission, 0),
  };
}
