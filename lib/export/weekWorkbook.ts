/**
 * Export one week of sales to xlsx: "Sales" (one row per sale + totals row)
 * and "Payout" (commission per vendor, first-seen order).
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import * as XLSX from 'xlsx';
import { commissionByVendor } from '../sales/reports';
import type { PeriodReport } from '../sales/reports';
import { formatIsoDateLocal } from '../time/parse';

const SALES_SHEET = 'Sales';
const PAYOUT_SHEET = 'Payout';

export const SALES_HEADER = [
  'ID',
  'Date',
  'Product',
  'Client',
  'Vendor',
  'Qty',
  'Unit Price',
  'Subtotal',
  'Profit',
  'Commission %',
  'Commission',
  'Total',
] as const;

type Cell = string | number;

export function buildSalesRows(report: PeriodReport): Cell[][] {
  const rows: Cell[][] = [[...SALES_HEADER]];
  for (const s of report.sales) {
    rows.push([
      s.id,
      s.timestamp,
      s.productName,
      s.clientName,
      s.vendorName,
      s.quantity,
      s.unitPrice,
      s.subtotal,
      s.profitTotal,
      s.commissionPct,
      s.commission,
      s.total,
    ]);
  }
  const { revenue, profit, commission } = report.totals;
  rows.push(['TOTAL', '', '', '', '', '', '', '', profit, '', commission, revenue]);
  return rows;
}

export function buildPayoutRows(report: PeriodReport): Cell[][] {
  const rows: Cell[][] = [['Vendor ID', 'Vendor', 'Commission']];
  for (const p of commissionByVendor(report.sales)) rows.push([p.vendorId, p.vendorName, p.commission]);
  return rows;
}

export function buildWeekWorkbook(report: PeriodReport): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(buildSalesRows(report)), SALES_SHEET);
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(buildPayoutRows(report)), PAYOUT_SHEET);
  return wb;
}

export function weekWorkbookFileName(report: PeriodReport): string {
  return `sales_week_${formatIsoDateLocal(report.bounds.start)}.xlsx`;
}

/** Writes the workbook and returns its absolute path. */
export async function exportWeekWorkbook(report: PeriodReport, exportDir: string): Promise<string> {
  await mkdir(exportDir, { recursive: true });
  const filePath = path.join(exportDir, weekWorkbookFileName(report));
  const buf: Buffer = XLSX.write(buildWeekWorkbook(report), { type: 'buffer', bookType: 'xlsx' });
  await writeFile(filePath, buf);
  return filePath;
}
