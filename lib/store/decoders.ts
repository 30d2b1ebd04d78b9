/**
 * Shape checks for records read from disk. A decoder returns null for a record
 * it cannot trust; the store skips that record with a warning.
 */
import type { Client, Product, Sale, Vendor } from './types';

type Raw = Record<string, unknown>;

function isRaw(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Raw | null {
  return isRaw(value) ? value : null;
}

function num(r: Raw, key: string): number | null {
  const v = r[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

function int(r: Raw, key: string): number | null {
  const v = num(r, key);
  return v !== null && Number.isInteger(v) ? v : null;
}

function str(r: Raw, key: string): string | null {
  const v = r[key];
  return typeof v === 'string' ? v : null;
}

export function decodeProduct(value: unknown): Product | null {
  const r = asRecord(value);
  if (!r) return null;
  const id = int(r, 'id');
  const name = str(r, 'name');
  const purchasePrice = num(r, 'purchasePrice');
  const profit = num(r, 'profit');
  const salePrice = num(r, 'salePrice');
  const stock = int(r, 'stock');
  if (id === null || name === null || purchasePrice === null || profit === null || salePrice === null || stock === null) {
    return null;
  }
  return { id, name, purchasePrice, profit, salePrice, stock };
}

export function decodeClient(value: unknown): Client | null {
  const r = asRecord(value);
  if (!r) return null;
  const id = int(r, 'id');
  const name = str(r, 'name');
  if (id === null || name === null) return null;
  return { id, name, taxId: str(r, 'taxId') ?? '', phone: str(r, 'phone') ?? '' };
}

export function decodeVendor(value: unknown): Vendor | null {
  const r = asRecord(value);
  if (!r) return null;
  const id = int(r, 'id');
  const name = str(r, 'name');
  const commissionPct = num(r, 'commissionPct');
  if (id === null || name === null || commissionPct === null) return null;
  return { id, name, commissionPct };
}

const SALE_NUMBER_FIELDS = [
  'purchasePrice',
  'unitProfit',
  'unitPrice',
  'subtotal',
  'profitTotal',
  'commission',
  'commissionPct',
  'total',
] as const;

const SALE_INT_FIELDS = ['id', 'productId', 'clientId', 'vendorId', 'quantity'] as const;

const SALE_STRING_FIELDS = ['timestamp', 'productName', 'clientName', 'vendorName'] as const;

export function decodeSale(value: unknown): Sale | null {
  const r = asRecord(value);
  if (!r) return null;
  const ints = SALE_INT_FIELDS.map((k) => int(r, k));
  const nums = SALE_NUMBER_FIELDS.map((k) => num(r, k));
  const strs = SALE_STRING_FIELDS.map((k) => str(r, k));
  const [id, productId, clientId, vendorId, quantity] = ints;
  const [purchasePrice, unitProfit, unitPrice, subtotal, profitTotal, commission, commissionPct, total] = nums;
  const [timestamp, productName, clientName, vendorName] = strs;
  if (
    id === null || productId === null || clientId === null || vendorId === null || quantity === null ||
    purchasePrice === null || unitProfit === null || unitPrice === null || subtotal === null ||
    profitTotal === null || commission === null || commissionPct === null || total === null ||
    timestamp === null || productName === null || clientName === null || vendorName === null
  ) {
    return null;
  }
  return {
    id,
    timestamp,
    productId,
    productName,
    purchasePrice,
    unitProfit,
    clientId,
    clientName,
    vendorId,
    vendorName,
    quantity,
    unitPrice,
    subtotal,
    profitTotal,
    commission,
    commissionPct,
    total,
  };
}
