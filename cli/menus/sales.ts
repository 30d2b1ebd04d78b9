import { findClient } from '../../lib/catalog/clients';
import { findProduct } from '../../lib/catalog/products';
import { findVendor } from '../../lib/catalog/vendors';
import { exportWeekWorkbook } from '../../lib/export/weekWorkbook';
import { quoteSale, recordSale } from '../../lib/sales/recordSale';
import type { RecordSaleInput, SaleQuote } from '../../lib/sales/recordSale';
import { periodReport, topClients, topProducts, vendorPayoutReport, weeklyReport } from '../../lib/sales/reports';
import type { PeriodReport } from '../../lib/sales/reports';
import { GENERAL_CLIENT_NAME } from '../../lib/store/types';
import { formatWeekLabel, pastWeeks } from '../../lib/utils/week';
import { formatPct } from '../../lib/utils/money';
import { center, cell, rule } from '../format';
import { confirm, heading, pause, runMenu, unwrap } from '../menu';
import type { CliContext } from '../menu';
import { clientPickList, productTable, salesTable } from '../tables';

function printQuote(ctx: CliContext, q: SaleQuote): void {
  const { term, fmt } = ctx;
  term.print(`\n${fmt.separator(rule('=', 40))}`);
  term.print(fmt.title('   SALE SUMMARY'));
  term.print(fmt.separator(rule('=', 40)));
  term.print(`Product:         ${fmt.value(q.product.name.slice(0, 20))}`);
  term.print(`Client:          ${fmt.value(q.client.name.slice(0, 20))}`);
  term.print(`Vendor:          ${fmt.value(q.vendor.name.slice(0, 20))}`);
  term.print(`Quantity:        ${fmt.value(String(q.quantity))}`);
  term.print(`Unit price:      ${fmt.value(fmt.money(q.unitPrice))}`);
  term.print(fmt.separator(rule('-', 40)));
  term.print(`Subtotal:        ${fmt.value(fmt.money(q.subtotal))}`);
  term.print(`Total profit:    ${fmt.profit(fmt.money(q.profitTotal))}`);
  term.print(`Commission (${formatPct(q.commissionPct, 1)}): ${fmt.value(fmt.money(q.commission))}`);
  term.print(fmt.title(`TOTAL TO PAY:    ${fmt.money(q.total)}`));
  term.print(fmt.separator(rule('=', 40)));
}

export async function recordSaleFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '        RECORD NEW SALE', 40);

  if (catalog.products.size === 0) {
    term.print(fmt.warning('No products registered.'));
    return pause(ctx);
  }
  term.print(fmt.menu('\nAvailable products:'));
  productTable(Array.from(catalog.products.values()), fmt).forEach((l) => term.print(l));

  const productId = await term.ask('\nProduct ID to sell: ');
  if (unwrap(ctx, findProduct(catalog, productId)) === null) return pause(ctx);

  let clientId: string = '0';
  if (catalog.clients.size === 0) {
    term.print(fmt.warning(`No clients registered. The sale will be recorded as '${GENERAL_CLIENT_NAME}'.`));
  } else {
    term.print(fmt.menu('\nAvailable clients:'));
    clientPickList(Array.from(catalog.clients.values()), fmt).forEach((l) => term.print(l));
    clientId = (await term.ask(`\nClient ID (${fmt.value('0 for General')}): `)).trim();
    if (clientId !== '0' && unwrap(ctx, findClient(catalog, clientId)) === null) return pause(ctx);
  }

  if (catalog.vendors.size === 0) {
    term.print(fmt.error('No vendors registered.'));
    return pause(ctx);
  }
  term.print(fmt.menu('\nAvailable vendors:'));
  for (const v of catalog.vendors.values()) {
    term.print(`ID: ${v.id} - ${v.name.slice(0, 15)} - Com: ${formatPct(v.commissionPct, 1)}`);
  }
  const vendorId = await term.ask('\nVendor ID: ');
  if (unwrap(ctx, findVendor(catalog, vendorId)) === null) return pause(ctx);

  // Quantity is asked again until it is valid and in stock; blank cancels.
  let input: RecordSaleInput | null = null;
  let quote: SaleQuote | null = null;
  while (!quote) {
    const quantity = (await term.ask(`Quantity (max 999, ${fmt.value('blank to cancel')}): `)).trim();
    if (!quantity) {
      term.print(fmt.warning('Sale cancelled.'));
      return pause(ctx);
    }
    input = { productId, clientId, vendorId, quantity };
    quote = unwrap(ctx, quoteSale(catalog, input));
  }

  printQuote(ctx, quote);
  if (!input || !(await confirm(ctx, '\nConfirm sale?'))) {
    term.print(fmt.warning('\nSale cancelled.'));
    return pause(ctx);
  }
  const sale = unwrap(ctx, await recordSale(catalog, input, ctx.now()));
  if (sale) term.print(fmt.success(`\nSale #${sale.id} recorded successfully!`));
  return pause(ctx);
}

export async function listSales(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, center('SALES HISTORY', 88), 88);
  const sales = catalog.saleList();
  if (sales.length === 0) {
    term.print(fmt.warning('No sales recorded.'));
    return pause(ctx);
  }
  salesTable(sales, fmt, 'All-time revenue').forEach((l) => term.print(l));
  return pause(ctx);
}

async function showPeriodReport(ctx: CliContext, report: PeriodReport): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, center(`SALES: ${formatWeekLabel(report.bounds)}`, 88), 88);
  salesTable(report.sales, fmt, 'Period revenue').forEach((l) => term.print(l));
  return pause(ctx);
}

export async function currentWeekReport(ctx: CliContext): Promise<void> {
  const report = weeklyReport(ctx.catalog.saleList(), ctx.now());
  if (report.sales.length === 0) {
    ctx.term.clear();
    ctx.term.print(ctx.fmt.title('== WEEKLY REPORT =='));
    ctx.term.print(ctx.fmt.warning(`No sales recorded this week (${formatWeekLabel(report.bounds)}).`));
    return pause(ctx);
  }
  return showPeriodReport(ctx, report);
}

export async function vendorPayout(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, '  VENDOR COMMISSION PAYOUT', 45);
  const report = vendorPayoutReport(ctx.catalog.saleList(), ctx.now());
  term.print(fmt.menu(`Period: ${formatWeekLabel(report.bounds)}`));
  term.print(fmt.menu('\n--- WEEKLY PAYOUT ---'));
  if (report.payouts.length === 0) {
    term.print(fmt.warning('No commissions to pay this week.'));
    return pause(ctx);
  }
  term.print(fmt.menu(`${cell('Vendor', 21)}Commission due`));
  term.print(fmt.separator(rule('-', 40)));
  for (const p of report.payouts) {
    term.print(`${cell(p.vendorName, 21, 19)}${fmt.cost(fmt.money(p.commission, 17))}`);
  }
  term.print(fmt.separator(rule('-', 40)));
  term.print(`${fmt.menu('Total weekly commissions:')} ${fmt.cost(fmt.money(report.totalCommission))}`);
  return pause(ctx);
}

export async function topReport(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog, config } = ctx;
  term.clear();
  heading(ctx, '  TOP CLIENTS AND PRODUCTS', 45);
  const sales = catalog.saleList();
  if (sales.length === 0) {
    term.print(fmt.warning('No sales recorded to build the report.'));
    return pause(ctx);
  }

  term.print(fmt.menu(`\n--- TOP ${config.topN} CLIENTS (total spent, all time) ---`));
  term.print(fmt.menu(`${cell('Client', 21)}Total spent`));
  term.print(fmt.separator(rule('-', 40)));
  for (const c of topClients(sales, config.topN)) {
    term.print(`${cell(c.clientName, 21, 19)}${fmt.value(fmt.money(c.totalSpent, 17))}`);
  }

  term.print(fmt.menu(`\n--- TOP ${config.topN} PRODUCTS (quantity sold, all time) ---`));
  term.print(fmt.menu(`${cell('Product', 26)}Total quantity`));
  term.print(fmt.separator(rule('-', 40)));
  for (const p of topProducts(sales, config.topN)) {
    term.print(`${cell(p.productName, 26, 24)}${fmt.value(String(p.totalQuantity))}`);
  }
  return pause(ctx);
}

export async function pastWeeksMenu(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  for (;;) {
    term.clear();
    heading(ctx, '   SALES FROM PAST WEEKS', 50);
    const sales = ctx.catalog.saleList();
    const weeks = pastWeeks(sales, ctx.now());
    if (weeks.length === 0) {
      term.print(fmt.warning('No sales recorded in previous weeks.'));
      return pause(ctx);
    }

    term.print(fmt.menu('Select a period (Sunday to Saturday):'));
    weeks.forEach((w, i) => term.print(fmt.menu(`${i + 1}. ${formatWeekLabel(w)} (${w.sales.length} sales)`)));
    term.print(fmt.warning('\n0. Back to reports'));
    term.print(fmt.separator(rule('-', 50)));

    const choice = (await term.ask(`Select an option (${fmt.value(`0-${weeks.length}`)}): `)).trim();
    if (choice === '0') return;
    const week = /^\d+$/.test(choice) ? weeks[Number(choice) - 1] : undefined;
    if (!week) {
      term.print(fmt.error('Invalid option. Please try again.'));
      await pause(ctx);
      continue;
    }

    const report = periodReport(sales, { start: week.start, end: week.end });
    await showPeriodReport(ctx, report);
    if (await confirm(ctx, 'Export this week to Excel?')) {
      const filePath = await exportWeekWorkbook(report, ctx.config.exportDir);
      term.print(fmt.success(`Exported to ${filePath}`));
      await pause(ctx);
    }
  }
}

export function reportsMenu(ctx: CliContext): Promise<void> {
  return runMenu(
    ctx,
    '   SALES AND PERFORMANCE REPORTS',
    [
      { label: 'Current week sales (profit and margin)', run: currentWeekReport },
      { label: 'Top clients and products (all time)', run: topReport },
      { label: 'Vendor payout (weekly)', run: vendorPayout },
      { label: 'Sales from past weeks', run: pastWeeksMenu },
    ],
    'Back to Sales menu'
  );
}

export function salesMenu(ctx: CliContext): Promise<void> {
  return runMenu(
    ctx,
    '     SALES',
    [
      { label: 'Record sale', run: recordSaleFlow },
      { label: 'List sales (history)', run: listSales },
      { label: 'Reports', run: reportsMenu },
    ],
    'Back to main menu'
  );
}
