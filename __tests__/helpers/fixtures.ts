import { Catalog } from '@/lib/catalog/catalog';
import { clientCodec, productCodec, saleCodec, vendorCodec } from '@/lib/store/collections';
import { MemoryRepository } from '@/lib/store/recordStore';
import type { Client, Product, Sale, Vendor } from '@/lib/store/types';

export type MemoryRepositories = {
  products: MemoryRepository<Product>;
  clients: MemoryRepository<Client>;
  vendors: MemoryRepository<Vendor>;
  sales: MemoryRepository<Sale>;
};

export type Seed = {
  products?: unknown[];
  clients?: unknown[];
  vendors?: unknown[];
  sales?: unknown[];
};

export function memoryRepositories(seed: Seed = {}): MemoryRepositories {
  return {
    products: new MemoryRepository('products', productCodec, seed.products),
    clients: new MemoryRepository('clients', clientCodec, seed.clients),
    vendors: new MemoryRepository('vendors', vendorCodec, seed.vendors),
    sales: new MemoryRepository('sales', saleCodec, seed.sales),
  };
}

export async function loadCatalog(seed: Seed = {}): Promise<{ catalog: Catalog; repos: MemoryRepositories }> {
  const repos = memoryRepositories(seed);
  return { catalog: await Catalog.load(repos), repos };
}

export function product(overrides: Partial<Product> = {}): Product {
  const purchasePrice = overrides.purchasePrice ?? 100;
  const profit = overrides.profit ?? 50;
  return {
    id: 1,
    name: 'Desk Lamp',
    stock: 10,
    ...overrides,
    purchasePrice,
    profit,
    salePrice: overrides.salePrice ?? purchasePrice + profit,
  };
}

export function client(overrides: Partial<Client> = {}): Client {
  return { id: 1, name: 'Acme Ltd', taxId: 'TAX-001', phone: '555-0100', ...overrides };
}

export function vendor(overrides: Partial<Vendor> = {}): Vendor {
  return { id: 1, name: 'Ana', commissionPct: 10, ...overrides };
}

export function sale(overrides: Partial<Sale> = {}): Sale {
  return {
    id: 1,
    timestamp: '2024-06-10 12:00:00',
    productId: 1,
    productName: 'Desk Lamp',
    purchasePrice: 100,
    unitProfit: 50,
    clientId: 1,
    clientName: 'Acme Ltd',
    vendorId: 1,
    vendorName: 'Ana',
    quantity: 1,
    unitPrice: 150,
    subtotal: 150,
    profitTotal: 50,
    commission: 5,
    commissionPct: 10,
    total: 150,
    ...overrides,
  };
}
