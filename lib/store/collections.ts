import { decodeClient, decodeProduct, decodeSale, decodeVendor } from './decoders';
import { upgradeClients, upgradeProducts, upgradeVendors } from './migrations';
import { JsonFileRepository } from './recordStore';
import type { RecordCodec, RecordRepository } from './recordStore';
import type { Client, Product, Sale, Vendor } from './types';

export const productCodec: RecordCodec<Product> = { decode: decodeProduct, upgrade: upgradeProducts };
export const clientCodec: RecordCodec<Client> = { decode: decodeClient, upgrade: upgradeClients };
export const vendorCodec: RecordCodec<Vendor> = { decode: decodeVendor, upgrade: upgradeVendors };
export const saleCodec: RecordCodec<Sale> = { decode: decodeSale };

export type Repositories = {
  products: RecordRepository<Product>;
  clients: RecordRepository<Client>;
  vendors: RecordRepository<Vendor>;
  sales: RecordRepository<Sale>;
};

export function createFileRepositories(dataDir: string): Repositories {
  return {
    products: new JsonFileRepository('products', dataDir, productCodec),
    clients: new JsonFileRepository('clients', dataDir, clientCodec),
    vendors: new JsonFileRepository('vendors', dataDir, vendorCodec),
    sales: new JsonFileRepository('sales', dataDir, saleCodec),
  };
}
