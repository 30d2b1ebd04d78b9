/**
 * Versionless schema upgrade, run once per load before decoding.
 * Each upgrader returns the same object when nothing changed, so callers can
 * detect whether the collection needs saving back. Idempotent.
 */

export type RawRecord = Record<string, unknown>;

export type UpgradeResult = {
  records: unknown[];
  changed: boolean;
};

type Upgrader = (record: RawRecord) => RawRecord;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Legacy clients stored the tax id under "email". */
export function upgradeClient(record: RawRecord): RawRecord {
  if ('taxId' in record && 'phone' in record && !('email' in record)) return record;
  const { email, ...rest } = record;
  const next: RawRecord = { ...rest };
  if (!('taxId' in next)) next.taxId = typeof email === 'string' ? email : '';
  if (!('phone' in next)) next.phone = '';
  return next;
}

export function upgradeProduct(record: RawRecord): RawRecord {
  if ('salePrice' in record && 'stock' in record) return record;
  const next: RawRecord = { ...record };
  if (!('salePrice' in next) && typeof next.purchasePrice === 'number' && typeof next.profit === 'number') {
    next.salePrice = next.purchasePrice + next.profit;
  }
  if (!('stock' in next)) next.stock = 0;
  return next;
}

export function upgradeVendor(record: RawRecord): RawRecord {
  if ('commissionPct' in record) return record;
  return { ...record, commissionPct: 0 };
}

function runUpgrade(records: readonly unknown[], upgrade: Upgrader): UpgradeResult {
  let changed = false;
  const out = records.map((r) => {
    if (!isRecord(r)) return r;
    const next = upgrade(r);
    if (next !== r) changed = true;
    return next;
  });
  return { records: out, changed };
}

export const upgradeClients = (records: readonly unknown[]) => runUpgrade(records, upgradeClient);
export const upgradeProducts = (records: readonly unknown[]) => runUpgrade(records, upgradeProduct);
export const upgradeVendors = (records: readonly unknown[]) => runUpgrade(records, upgradeVendor);
