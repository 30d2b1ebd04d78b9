import { InvalidInputError, NotFoundError, ReferentialConflictError, fail, ok } from '../errors';
import type { SalesResult } from '../errors';
import type { Client } from '../store/types';
import { isBlank, optionalText, parseInteger, parseRequiredText } from '../validation';
import { nextId } from './catalog';
import type { Catalog } from './catalog';

export type ClientInput = {
  name: unknown;
  taxId?: unknown;
  phone?: unknown;
};

export type ClientPatch = Partial<ClientInput>;

export function findClient(catalog: Catalog, rawId: unknown): SalesResult<Client> {
  const id = parseInteger(rawId, 'Client ID');
  if (!id.ok) return fail(new InvalidInputError(id.error));
  const client = catalog.clients.get(id.value);
  return client ? ok(client) : fail(new NotFoundError('Client', id.value));
}

export async function addClient(catalog: Catalog, input: ClientInput): Promise<SalesResult<Client>> {
  const name = parseRequiredText(input.name, 'Name');
  if (!name.ok) return fail(new InvalidInputError(name.error));
  const client: Client = {
    id: nextId(catalog.clients.values()),
    name: name.value,
    taxId: optionalText(input.taxId),
    phone: optionalText(input.phone),
  };
  catalog.clients.set(client.id, client);
  await catalog.persist('clients');
  return ok(client);
}

export async function editClient(catalog: Catalog, rawId: unknown, patch: ClientPatch): Promise<SalesResult<Client>> {
  const found = findClient(catalog, rawId);
  if (!found.ok) return found;
  const next: Client = { ...found.value };
  if (!isBlank(patch.name)) next.name = optionalText(patch.name);
  if (!isBlank(patch.taxId)) next.taxId = optionalText(patch.taxId);
  if (!isBlank(patch.phone)) next.phone = optionalText(patch.phone);
  catalog.clients.set(next.id, next);
  await catalog.persist('clients');
  return ok(next);
}

/** A client referenced by any sale cannot be deleted. Checked before the lookup. */
export function checkDeletableClient(catalog: Catalog, rawId: unknown): SalesResult<Client> {
  const id = parseInteger(rawId, 'Client ID');
  if (!id.ok) return fail(new InvalidInputError(id.error));
  if (catalog.hasSalesFor('clientId', id.value)) return fail(new ReferentialConflictError('Client', id.value));
  const client = catalog.clients.get(id.value);
  return client ? ok(client) : fail(new NotFoundError('Client', id.value));
}

export async function deleteClient(catalog: Catalog, rawId: unknown): Promise<SalesResult<Client>> {
  const checked = checkDeletableClient(catalog, rawId);
  if (!checked.ok) return checked;
  catalog.clients.delete(checked.value.id);
  await catalog.persist('clients');
  return checked;
}

/** Exact id, or a case-insensitive match on name, tax id or phone. One row per client. */
export function searchClients(catalog: Catalog, term: string): Client[] {
  const trimmed = term.trim();
  if (!trimmed) return [];
  if (/^\d+$/.test(trimmed)) {
    const byId = catalog.clients.get(Number(trimmed));
    if (byId) return [byId];
  }
  const needle = trimmed.toLowerCase();
  return Array.from(catalog.clients.values()).filter(
    (c) =>
      c.name.toLowerCase().includes(needle) ||
      c.taxId.toLowerCase().includes(needle) ||
      c.phone.toLowerCase().includes(needle)
  );
}
