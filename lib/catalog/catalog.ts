/**
 * In-memory catalog: the four collections keyed by id, in file order.
 * Every mutation is followed by a full save of the collection it touched.
 */

import type { Repositories } from '../store/collections';
import type { Client, CollectionName, Product, Sale, Vendor } from '../store/types';

type WithId = { id: number };

function toMap<T extends WithId>(records: readonly T[], label: string): Map<number, T> {
  const map = new Map<number, T>();
  for (const record of records) {
    if (map.has(record.id)) {
      console.warn(`[catalog] ${label}: duplicate id ${record.id}, keeping the first record`);
      continue;
    }
    map.set(record.id, record);
  }
  return map;
}

/** Next id: current max + 1, or 1 when empty. Ids are never reused below the max. */
export function nextId(records: Iterable<WithId>): number {
  let max = 0;
  for (const r of records) if (r.id > max) max = r.id;
  return max + 1;
}

export class Catalog {
  private constructor(
    private readonly repos: Repositories,
    readonly products: Map<number, Product>,
    readonly clients: Map<number, Client>,
    readonly vendors: Map<number, Vendor>,
    readonly sales: Map<number, Sale>
  ) {}

  static async load(repos: Repositories): Promise<Catalog> {
    const [products, clients, vendors, sales] = await Promise.all([
      repos.products.loadAll(),
      repos.clients.loadAll(),
      repos.vendors.loadAll(),
      repos.sales.loadAll(),
    ]);
    return new Catalog(
      repos,
      toMap(products, 'products'),
      toMap(clients, 'clients'),
      toMap(vendors, 'vendors'),
      toMap(sales, 'sales')
    );
  }

  saleList(): Sale[] {
    return Array.from(this.sales.values());
  }

  hasSalesFor(field: 'productId' | 'clientId' | 'vendorId', id: number): boolean {
    for (const sale of this.sales.values()) if (sale[field] === id) return true;
    return false;
  }

  async persist(collection: CollectionName): Promise<void> {
    switch (collection) {
      case 'products':
        return this.repos.products.saveAll(Array.from(this.products.values()));
      case 'clients':
        return this.repos.clients.saveAll(Array.from(this.clients.values()));
      case 'vendors':
        return this.repos.vendors.saveAll(Array.from(this.vendors.values()));
      case 'sales':
        return this.repos.sales.saveAll(this.saleList());
    }
  }
}
