import { InvalidInputError, NotFoundError, ReferentialConflictError, fail, ok } from '../errors';
import type { SalesResult } from '../errors';
import type { Vendor } from '../store/types';
import { isBlank, parseDecimal, parseInteger, parseRequiredText } from '../validation';
import type { Parsed } from '../validation';
import { nextId } from './catalog';
import type { Catalog } from './catalog';

export type VendorInput = {
  name: unknown;
  commissionPct: unknown;
};

export type VendorPatch = Partial<VendorInput>;

function parseCommissionPct(value: unknown): Parsed<number> {
  const r = parseDecimal(value, 'Commission');
  if (r.ok && r.value < 0) return { ok: false, error: 'Commission cannot be negative' };
  return r;
}

export function findVendor(catalog: Catalog, rawId: unknown): SalesResult<Vendor> {
  const id = parseInteger(rawId, 'Vendor ID');
  if (!id.ok) return fail(new InvalidInputError(id.error));
  const vendor = catalog.vendors.get(id.value);
  return vendor ? ok(vendor) : fail(new NotFoundError('Vendor', id.value));
}

export async function addVendor(catalog: Catalog, input: VendorInput): Promise<SalesResult<Vendor>> {
  const name = parseRequiredText(input.name, 'Name');
  if (!name.ok) return fail(new InvalidInputError(name.error));
  const pct = parseCommissionPct(input.commissionPct);
  if (!pct.ok) return fail(new InvalidInputError(pct.error));
  const vendor: Vendor = { id: nextId(catalog.vendors.values()), name: name.value, commissionPct: pct.value };
  catalog.vendors.set(vendor.id, vendor);
  await catalog.persist('vendors');
  return ok(vendor);
}

export async function editVendor(catalog: Catalog, rawId: unknown, patch: VendorPatch): Promise<SalesResult<Vendor>> {
  const found = findVendor(catalog, rawId);
  if (!found.ok) return found;
  const next: Vendor = { ...found.value };
  if (!isBlank(patch.name)) {
    const name = parseRequiredText(patch.name, 'Name');
    if (!name.ok) return fail(new InvalidInputError(name.error));
    next.name = name.value;
  }
  if (!isBlank(patch.commissionPct)) {
    const pct = parseCommissionPct(patch.commissionPct);
    if (!pct.ok) return fail(new InvalidInputError(pct.error));
    next.commissionPct = pct.value;
  }
  catalog.vendors.set(next.id, next);
  await catalog.persist('vendors');
  return ok(next);
}

/** A vendor referenced by any sale cannot be deleted. Checked before the lookup. */
export function checkDeletableVendor(catalog: Catalog, rawId: unknown): SalesResult<Vendor> {
  const id = parseInteger(rawId, 'Vendor ID');
  if (!id.ok) return fail(new InvalidInputError(id.error));
  if (catalog.hasSalesFor('vendorId', id.value)) return fail(new ReferentialConflictError('Vendor', id.value));
  const vendor = catalog.vendors.get(id.value);
  return vendor ? ok(vendor) : fail(new NotFoundError('Vendor', id.value));
}

export async function deleteVendor(catalog: Catalog, rawId: unknown): Promise<SalesResult<Vendor>> {
  const checked = checkDeletableVendor(catalog, rawId);
  if (!checked.ok) return checked;
  catalog.vendors.delete(checked.value.id);
  await catalog.persist('vendors');
  return checked;
}
