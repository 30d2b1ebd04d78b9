/**
 * Sale recording: validate the selection, compute the money fields, decrement stock,
 * append to the ledger, then save Sales and Products (in that order).
 *
 * Money: commission is paid out of profit and is NOT added to what the customer pays,
 * so total === subtotal. No rounding; display code truncates.
 *
 * The two saves are sequential, not a transaction. A crash between them leaves the
 * ledger ahead of the stock count.
 */

import { InsufficientStockError, InvalidInputError, NotFoundError, fail, ok } from '../errors';
import type { SalesResult } from '../errors';
import { nextId } from '../catalog/catalog';
import type { Catalog } from '../catalog/catalog';
import { findProduct } from '../catalog/products';
import { findVendor } from '../catalog/vendors';
import { formatSaleTimestamp } from '../time/parse';
import { GENERAL_CLIENT_ID, GENERAL_CLIENT_NAME, MAX_SALE_QUANTITY } from '../store/types';
import type { Product, Sale, Vendor } from '../store/types';
import { parseInteger, parseIntegerInRange } from '../validation';

/** Raw values as typed at the prompt. clientId 0 selects the walk-in customer. */
export type RecordSaleInput = {
  productId: unknown;
  clientId: unknown;
  vendorId: unknown;
  quantity: unknown;
};

export type SaleQuote = {
  product: Product;
  client: { id: number; name: string };
  vendor: Vendor;
  quantity: number;
  unitPrice: number;
  subtotal: number;
  profitTotal: number;
  commissionPct: number;
  commission: number;
  total: number;
};

export function computeSaleAmounts(
  product: Pick<Product, 'salePrice' | 'profit'>,
  commissionPct: number,
  quantity: number
): Pick<SaleQuote, 'unitPrice' | 'subtotal' | 'profitTotal' | 'commission' | 'total'> {
  const subtotal = product.salePrice * quantity;
  const profitTotal = product.profit * quantity;
  const commission = (profitTotal * commissionPct) / 100;
  return { unitPrice: product.salePrice, subtotal, profitTotal, commission, total: subtotal };
}

function resolveClient(catalog: Catalog, rawId: unknown): SalesResult<{ id: number; name: string }> {
  const id = parseInteger(rawId, 'Client ID');
  if (!id.ok) return fail(new InvalidInputError(id.error));
  if (id.value === GENERAL_CLIENT_ID) return ok({ id: GENERAL_CLIENT_ID, name: GENERAL_CLIENT_NAME });
  const client = catalog.clients.get(id.value);
  if (!client) return fail(new NotFoundError('Client', id.value));
  return ok({ id: client.id, name: client.name });
}

/**
 * Validate and price a sale without touching any state. Checks run in order:
 * product, client, vendor, quantity range, stock. The first failure wins.
 */
export function quoteSale(catalog: Catalog, input: RecordSaleInput): SalesResult<SaleQuote> {
  const product = findProduct(catalog, input.productId);
  if (!product.ok) return product;
  const client = resolveClient(catalog, input.clientId);
  if (!client.ok) return client;
  const vendor = findVendor(catalog, input.vendorId);
  if (!vendor.ok) return vendor;

  const quantity = parseIntegerInRange(input.quantity, 'Quantity', 1, MAX_SALE_QUANTITY);
  if (!quantity.ok) return fail(new InvalidInputError(quantity.error));
  if (quantity.value > product.value.stock) {
    return fail(new InsufficientStockError(product.value.name, product.value.stock));
  }

  const amounts = computeSaleAmounts(product.value, vendor.value.commissionPct, quantity.value);
  if (!Object.values(amounts).every(Number.isFinite)) {
    return fail(new InvalidInputError('Sale amounts are too large to record'));
  }

  return ok({
    product: product.value,
    client: client.value,
    vendor: vendor.value,
    quantity: quantity.value,
    commissionPct: vendor.value.commissionPct,
    ...amounts,
  });
}

/**
 * Record a confirmed sale. Write failures are thrown: the in-memory state has already
 * changed by then and the caller must surface it.
 */
export async function recordSale(
  catalog: Catalog,
  input: RecordSaleInput,
  now: Date = new Date()
): Promise<SalesResult<Sale>> {
  const quoted = quoteSale(catalog, input);
  if (!quoted.ok) return quoted;
  const q = quoted.value;

  const sale: Sale = {
    id: nextId(catalog.sales.values()),
    timestamp: formatSaleTimestamp(now),
    productId: q.product.id,
    productName: q.product.name,
    purchasePrice: q.product.purchasePrice,
    unitProfit: q.product.profit,
    clientId: q.client.id,
    clientName: q.client.name,
    vendorId: q.vendor.id,
    vendorName: q.vendor.name,
    quantity: q.quantity,
    unitPrice: q.unitPrice,
    subtotal: q.subtotal,
    profitTotal: q.profitTotal,
    commission: q.commission,
    commissionPct: q.commissionPct,
    total: q.total,
  };

  catalog.sales.set(sale.id, sale);
  q.product.stock -= q.quantity;

  await catalog.persist('sales');
  await catalog.persist('products');
  return ok(sale);
}
