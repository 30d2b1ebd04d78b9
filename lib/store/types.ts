/**
 * Flat record types persisted as JSON collections.
 * Money fields are plain decimals; rounding happens only at display time.
 */

export type Product = {
  id: number;
  name: string;
  purchasePrice: number;
  /** Fixed per-unit margin added on top of the purchase price. */
  profit: number;
  /** Always purchasePrice + profit. Re-derived on every edit. */
  salePrice: number;
  stock: number;
};

export type Client = {
  id: number;
  name: string;
  taxId: string;
  phone: string;
};

export type Vendor = {
  id: number;
  name: string;
  /** Percentage of a sale's profit (not revenue) owed to the vendor. */
  commissionPct: number;
};

/**
 * Immutable ledger row. Names and unit figures are snapshots taken at creation,
 * so reports never drift when the catalog is edited or a record is deleted.
 */
export type Sale = {
  id: number;
  /** "YYYY-MM-DD HH:MM:SS", local time. */
  timestamp: string;
  productId: number;
  productName: string;
  purchasePrice: number;
  unitProfit: number;
  clientId: number;
  clientName: string;
  vendorId: number;
  vendorName: string;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  profitTotal: number;
  commission: number;
  commissionPct: number;
  total: number;
};

export type CollectionName = 'products' | 'clients' | 'vendors' | 'sales';

/** Walk-in customer used when no registered client is chosen. Never persisted. */
export const GENERAL_CLIENT_ID = 0;
export const GENERAL_CLIENT_NAME = 'General Customer';

export const MAX_STOCK = 999;
export const MAX_SALE_QUANTITY = 999;
