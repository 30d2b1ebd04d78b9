/**
 * Fixed-width text tables for the menus.
 */

import { totals } from '../lib/sales/reports';
import type { Client, Product, Sale, Vendor } from '../lib/store/types';
import type { Formatter } from './format';
import { cell, rule } from './format';

export function productTable(products: readonly Product[], fmt: Formatter): string[] {
  const lines = [
    fmt.menu(`${cell('ID', 5)}${cell('Product', 16)}${cell('Cost', 9)}${cell('Profit', 8)}${cell('Price', 9)}${cell('Stock', 6)}`),
  ];
  for (const p of products) {
    lines.push(
      `${cell(p.id, 5)}${cell(p.name, 16, 14)}` +
        `${fmt.value(fmt.money(p.purchasePrice, 7))} ${fmt.profit(fmt.money(p.profit, 6))} ` +
        `${fmt.price(fmt.money(p.salePrice, 7))} ${cell(p.stock, 6)}`
    );
  }
  return lines;
}

export function clientTable(clients: readonly Client[], fmt: Formatter): string[] {
  const lines = [fmt.menu(`${cell('ID', 5)}${cell('Name', 26)}${cell('Tax ID', 16)}${cell('Phone', 15)}`)];
  for (const c of clients) {
    lines.push(`${cell(c.id, 5)}${cell(c.name, 26, 24)}${cell(c.taxId, 16, 15)}${cell(c.phone, 15, 15)}`);
  }
  return lines;
}

/** ID and name only, for picking a client during a sale. */
export function clientPickList(clients: readonly Client[], fmt: Formatter): string[] {
  const lines = [fmt.menu(`${cell('ID', 5)}${cell('Name', 20)}`)];
  for (const c of clients) lines.push(`${cell(c.id, 5)}${cell(c.name, 20, 19)}`);
  return lines;
}

export function vendorTable(vendors: readonly Vendor[], fmt: Formatter): string[] {
  const lines = [fmt.menu(`${cell('ID', 5)}${cell('Name', 26)}Profit commission (%)`)];
  for (const v of vendors) {
    lines.push(`${cell(v.id, 5)}${cell(v.name, 26, 24)}${fmt.value(`${v.commissionPct.toFixed(2).padStart(20)}%`)}`);
  }
  return lines;
}

/** Ledger rows followed by revenue / profit / commission totals. */
export function salesTable(sales: readonly Sale[], fmt: Formatter, totalsLabel: string): string[] {
  const width = 88;
  const lines = [
    fmt.menu(
      `${cell('ID', 5)}${cell('Date-Time', 12)}${cell('Product', 16)}${cell('Qty', 5)}` +
        `${cell('Subtotal', 11)}${cell('Profit', 11)}${cell('Commission', 11)}${cell('Total', 11)}`
    ),
    fmt.separator(rule('-', width)),
  ];
  for (const s of sales) {
    lines.push(
      `${cell(s.id, 5)}${cell(s.timestamp.slice(5, 16), 12, 11)}${cell(s.productName, 16, 14)}${cell(s.quantity, 5)}` +
        `${fmt.money(s.subtotal, 9)} ${fmt.profit(fmt.money(s.profitTotal, 9))} ` +
        `${fmt.cost(fmt.money(s.commission, 9))} ${fmt.value(fmt.money(s.total, 9))}`
    );
  }
  const t = totals(sales);
  lines.push(fmt.separator(rule('-', width)));
  lines.push(
    `${fmt.menu(`${totalsLabel}: `)}${fmt.value(fmt.money(t.revenue))} | ` +
      `${fmt.profit(`Profit: ${fmt.money(t.profit)}`)} | ${fmt.cost(`Commissions: ${fmt.money(t.commission)}`)}`
  );
  return lines;
}
