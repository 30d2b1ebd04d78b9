/**
 * Product catalog operations. Sale price is always purchase price + fixed profit.
 */

import { InvalidInputError, NotFoundError, ReferentialConflictError, fail, ok } from '../errors';
import type { SalesResult } from '../errors';
import { MAX_STOCK } from '../store/types';
import type { Product } from '../store/types';
import { isBlank, parseDecimal, parseInteger, parseIntegerInRange, parseRequiredText } from '../validation';
import type { Parsed } from '../validation';
import { nextId } from './catalog';
import type { Catalog } from './catalog';

/** Lowest purchase price a bulk decrease may leave behind. */
export const MIN_PURCHASE_PRICE = 0.01;

export type ProductInput = {
  name: unknown;
  purchasePrice: unknown;
  profit: unknown;
  stock: unknown;
};

export type ProductPatch = Partial<ProductInput>;

function invalid<T>(error: string): SalesResult<T> {
  return fail(new InvalidInputError(error));
}

function parsePurchasePrice(value: unknown): Parsed<number> {
  const r = parseDecimal(value, 'Purchase price');
  if (r.ok && r.value <= 0) return { ok: false, error: 'Purchase price must be positive' };
  return r;
}

function parseProfit(value: unknown): Parsed<number> {
  const r = parseDecimal(value, 'Profit');
  if (r.ok && r.value < 0) return { ok: false, error: 'Profit cannot be negative' };
  return r;
}

function parseStock(value: unknown): Parsed<number> {
  return parseIntegerInRange(value, 'Stock', 0, MAX_STOCK);
}

export function findProduct(catalog: Catalog, rawId: unknown): SalesResult<Product> {
  const id = parseInteger(rawId, 'Product ID');
  if (!id.ok) return invalid(id.error);
  const product = catalog.products.get(id.value);
  return product ? ok(product) : fail(new NotFoundError('Product', id.value));
}

export async function addProduct(catalog: Catalog, input: ProductInput): Promise<SalesResult<Product>> {
  const name = parseRequiredText(input.name, 'Name');
  if (!name.ok) return invalid(name.error);
  const purchasePrice = parsePurchasePrice(input.purchasePrice);
  if (!purchasePrice.ok) return invalid(purchasePrice.error);
  const profit = parseProfit(input.profit);
  if (!profit.ok) return invalid(profit.error);
  const stock = parseStock(input.stock);
  if (!stock.ok) return invalid(stock.error);
  if (!Number.isFinite(purchasePrice.value + profit.value)) return invalid('Sale price is too large');

  const product: Product = {
    id: nextId(catalog.products.values()),
    name: name.value,
    purchasePrice: purchasePrice.value,
    profit: profit.value,
    salePrice: purchasePrice.value + profit.value,
    stock: stock.value,
  };
  catalog.products.set(product.id, product);
  await catalog.persist('products');
  return ok(product);
}

/** Blank fields keep their current value. Nothing changes unless every provided field is valid. */
export async function editProduct(catalog: Catalog, rawId: unknown, patch: ProductPatch): Promise<SalesResult<Product>> {
  const found = findProduct(catalog, rawId);
  if (!found.ok) return found;
  const product = found.value;

  const next: Product = { ...product };
  if (!isBlank(patch.name)) {
    const name = parseRequiredText(patch.name, 'Name');
    if (!name.ok) return invalid(name.error);
    next.name = name.value;
  }
  if (!isBlank(patch.purchasePrice)) {
    const r = parsePurchasePrice(patch.purchasePrice);
    if (!r.ok) return invalid(r.error);
    next.purchasePrice = r.value;
  }
  if (!isBlank(patch.profit)) {
    const r = parseProfit(patch.profit);
    if (!r.ok) return invalid(r.error);
    next.profit = r.value;
  }
  if (!isBlank(patch.stock)) {
    const r = parseStock(patch.stock);
    if (!r.ok) return invalid(r.error);
    next.stock = r.value;
  }
  next.salePrice = next.purchasePrice + next.profit;
  if (!Number.isFinite(next.salePrice)) return invalid('Sale price is too large');

  catalog.products.set(next.id, next);
  await catalog.persist('products');
  return ok(next);
}

/**
 * Apply a percentage change to every positive purchase price and re-derive sale prices.
 * Returns how many products changed.
 */
export async function bulkUpdateCost(catalog: Catalog, rawPct: unknown): Promise<SalesResult<number>> {
  const pct = parseDecimal(rawPct, 'Percentage');
  if (!pct.ok) return invalid(pct.error);
  if (pct.value === 0) return invalid('Percentage must not be zero');

  const factor = 1 + pct.value / 100;
  const changes: Array<[Product, number]> = [];
  for (const product of catalog.products.values()) {
    if (product.purchasePrice <= 0) continue;
    let purchasePrice = product.purchasePrice * factor;
    if (pct.value < 0 && purchasePrice < MIN_PURCHASE_PRICE) purchasePrice = MIN_PURCHASE_PRICE;
    if (!Number.isFinite(purchasePrice + product.profit)) return invalid('Percentage is too large');
    changes.push([product, purchasePrice]);
  }
  for (const [product, purchasePrice] of changes) {
    product.purchasePrice = purchasePrice;
    product.salePrice = purchasePrice + product.profit;
  }
  const updated = changes.length;
  await catalog.persist('products');
  return ok(updated);
}

/** A product referenced by any sale cannot be deleted. Checked before the lookup. */
export function checkDeletableProduct(catalog: Catalog, rawId: unknown): SalesResult<Product> {
  const id = parseInteger(rawId, 'Product ID');
  if (!id.ok) return invalid(id.error);
  if (catalog.hasSalesFor('productId', id.value)) return fail(new ReferentialConflictError('Product', id.value));
  const product = catalog.products.get(id.value);
  return product ? ok(product) : fail(new NotFoundError('Product', id.value));
}

export async function deleteProduct(catalog: Catalog, rawId: unknown): Promise<SalesResult<Product>> {
  const checked = checkDeletableProduct(catalog, rawId);
  if (!checked.ok) return checked;
  catalog.products.delete(checked.value.id);
  await catalog.persist('products');
  return checked;
}

/** A numeric term matching an id returns that product; otherwise case-insensitive name match. */
export function searchProducts(catalog: Catalog, term: string): Product[] {
  const trimmed = term.trim();
  if (!trimmed) return [];
  if (/^\d+$/.test(trimmed)) {
    const byId = catalog.products.get(Number(trimmed));
    if (byId) return [byId];
  }
  const needle = trimmed.toLowerCase();
  return Array.from(catalog.products.values()).filter((p) => p.name.toLowerCase().includes(needle));
}
