/**
 * JSON record stores: round trip, missing and corrupt files, legacy upgrade.
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { clientCodec, createFileRepositories, productCodec, vendorCodec } from '@/lib/store/collections';
import { JsonFileRepository, MemoryRepository, serializeRecords } from '@/lib/store/recordStore';
import { client, product, sale, vendor } from './helpers/fixtures';

describe('JsonFileRepository', () => {
  let dir: string;
  let warn: jest.SpyInstance;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'sales-ledger-'));
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    warn.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips every collection', async () => {
    const repos = createFileRepositories(dir);
    const products = [product({ id: 1, name: 'Café Ñandú' }), product({ id: 2, stock: 0 })];
    const clients = [client()];
    const vendors = [vendor()];
    const sales = [sale()];
    await repos.products.saveAll(products);
    await repos.clients.saveAll(clients);
    await repos.vendors.saveAll(vendors);
    await repos.sales.saveAll(sales);

    const reloaded = createFileRepositories(dir);
    expect(await reloaded.products.loadAll()).toEqual(products);
    expect(await reloaded.clients.loadAll()).toEqual(clients);
    expect(await reloaded.vendors.loadAll()).toEqual(vendors);
    expect(await reloaded.sales.loadAll()).toEqual(sales);
    expect(warn).not.toHaveBeenCalled();
  });

  it('round-trips empty collections', async () => {
    const repos = createFileRepositories(dir);
    await repos.products.saveAll([]);
    await repos.clients.saveAll([]);
    await repos.vendors.saveAll([]);
    await repos.sales.saveAll([]);

    const reloaded = createFileRepositories(dir);
    expect(await reloaded.products.loadAll()).toEqual([]);
    expect(await reloaded.clients.loadAll()).toEqual([]);
    expect(await reloaded.vendors.loadAll()).toEqual([]);
    expect(await reloaded.sales.loadAll()).toEqual([]);
    expect((await readdir(dir)).sort()).toEqual(['clients.json', 'products.json', 'sales.json', 'vendors.json']);
    expect(warn).not.toHaveBeenCalled();
  });

  it('writes 4-space JSON with non-ASCII kept as-is and leaves no temp files', async () => {
    const repo = new JsonFileRepository('vendors', dir, vendorCodec);
    await repo.saveAll([vendor({ name: 'Zoë' })]);
    const body = await readFile(path.join(dir, 'vendors.json'), 'utf8');
    expect(body).toBe('[\n    {\n        "id": 1,\n        "name": "Zoë",\n        "commissionPct": 10\n    }\n]\n');
    expect(await readdir(dir)).toEqual(['vendors.json']);
  });

  it('creates a missing file as an empty collection', async () => {
    const repo = new JsonFileRepository('products', dir, productCodec);
    expect(await repo.loadAll()).toEqual([]);
    expect(await readFile(path.join(dir, 'products.json'), 'utf8')).toBe('[]\n');
  });

  it('recovers a corrupt file as empty and logs it', async () => {
    await writeFile(path.join(dir, 'products.json'), '{not json', 'utf8');
    const repo = new JsonFileRepository('products', dir, productCodec);
    expect(await repo.loadAll()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      '[recordStore] File products.json is corrupt or empty. Starting with an empty collection.'
    );
  });

  it('treats a non-array body as corrupt', async () => {
    await writeFile(path.join(dir, 'clients.json'), '{"id": 1}', 'utf8');
    const repo = new JsonFileRepository('clients', dir, clientCodec);
    expect(await repo.loadAll()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('skips malformed records', async () => {
    const body = JSON.stringify([{ id: 1, name: 'Ana', commissionPct: 5 }, { id: 'x', name: 'Bad' }]);
    await writeFile(path.join(dir, 'vendors.json'), body, 'utf8');
    const repo = new JsonFileRepository('vendors', dir, vendorCodec);
    expect(await repo.loadAll()).toEqual([{ id: 1, name: 'Ana', commissionPct: 5 }]);
    expect(warn).toHaveBeenCalledWith('[recordStore] vendors: skipping malformed record at index 1');
  });

  it('upgrades legacy clients once and writes them back', async () => {
    await writeFile(path.join(dir, 'clients.json'), JSON.stringify([{ id: 1, name: 'Acme Ltd', email: 'TAX-001' }]));
    const repo = new JsonFileRepository('clients', dir, clientCodec);

    expect(await repo.loadAll()).toEqual([{ id: 1, name: 'Acme Ltd', taxId: 'TAX-001', phone: '' }]);
    const stored: unknown = JSON.parse(await readFile(path.join(dir, 'clients.json'), 'utf8'));
    expect(stored).toEqual([{ id: 1, name: 'Acme Ltd', taxId: 'TAX-001', phone: '' }]);
    expect(warn).toHaveBeenCalledTimes(1);

    warn.mockClear();
    expect(await repo.loadAll()).toEqual([{ id: 1, name: 'Acme Ltd', taxId: 'TAX-001', phone: '' }]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('fills in a missing sale price from purchase price and profit', async () => {
    await writeFile(
      path.join(dir, 'products.json'),
      JSON.stringify([{ id: 1, name: 'Lamp', purchasePrice: 10, profit: 4, stock: 3 }])
    );
    const repo = new JsonFileRepository('products', dir, productCodec);
    expect(await repo.loadAll()).toEqual([{ id: 1, name: 'Lamp', purchasePrice: 10, profit: 4, salePrice: 14, stock: 3 }]);
  });
});

describe('MemoryRepository', () => {
  it('returns fresh copies and counts saves', async () => {
    const repo = new MemoryRepository('vendors', vendorCodec, [vendor()]);
    const first = await repo.loadAll();
    first[0].name = 'Changed';
    expect((await repo.loadAll())[0].name).toBe('Ana');

    await repo.saveAll(first);
    expect(repo.saveCount).toBe(1);
    expect(repo.snapshot()).toEqual([{ id: 1, name: 'Changed', commissionPct: 10 }]);
  });
});

describe('serializeRecords', () => {
  it('writes an empty collection as []', () => {
    expect(serializeRecords([])).toBe('[]\n');
  });
});
