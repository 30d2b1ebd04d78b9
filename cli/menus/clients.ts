import {
  addClient,
  checkDeletableClient,
  deleteClient,
  editClient,
  findClient,
  searchClients,
} from '../../lib/catalog/clients';
import type { Client } from '../../lib/store/types';
import { confirm, heading, pause, runMenu, unwrap } from '../menu';
import type { CliContext } from '../menu';
import { clientPickList, clientTable } from '../tables';

function printClients(ctx: CliContext, clients: readonly Client[], empty: string): void {
  if (clients.length === 0) {
    ctx.term.print(ctx.fmt.warning(empty));
    return;
  }
  clientTable(clients, ctx.fmt).forEach((l) => ctx.term.print(l));
}

async function listClients(ctx: CliContext): Promise<void> {
  ctx.term.clear();
  heading(ctx, '                        CLIENT LIST', 75);
  printClients(ctx, Array.from(ctx.catalog.clients.values()), 'No clients registered.');
  return pause(ctx);
}

async function addClientFlow(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, '         ADD CLIENT', 40);
  const name = await term.ask('Client name: ');
  const taxId = await term.ask('Tax ID (optional): ');
  const phone = await term.ask('Phone (optional): ');
  const client = unwrap(ctx, await addClient(ctx.catalog, { name, taxId, phone }));
  if (client) term.print(fmt.success(`\nClient '${client.name}' added successfully!`));
  return pause(ctx);
}

/** Returns false (after telling the user) when there is nothing to pick from. */
function showPickList(ctx: CliContext): boolean {
  if (ctx.catalog.clients.size === 0) {
    ctx.term.print(ctx.fmt.warning('No clients registered.'));
    return false;
  }
  clientPickList(Array.from(ctx.catalog.clients.values()), ctx.fmt).forEach((l) => ctx.term.print(l));
  return true;
}

async function editClientFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '         EDIT CLIENT', 40);
  if (!showPickList(ctx)) return pause(ctx);
  const id = await term.ask('\nClient ID to edit: ');
  const current = unwrap(ctx, findClient(catalog, id));
  if (!current) return pause(ctx);

  term.print(fmt.menu(`\nEditing: ${current.name}`));
  term.print(fmt.separator('(Leave blank to keep the current value)'));
  const name = await term.ask(`New name [${current.name}]: `);
  const taxId = await term.ask(`New tax ID [${current.taxId}]: `);
  const phone = await term.ask(`New phone [${current.phone}]: `);
  const client = unwrap(ctx, await editClient(catalog, id, { name, taxId, phone }));
  if (client) term.print(fmt.success(`\nClient '${client.name}' updated successfully!`));
  return pause(ctx);
}

async function searchClientsFlow(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, '     SEARCH CLIENTS', 45);
  const query = (await term.ask('Enter ID, name, tax ID or phone: ')).trim();
  if (!query) {
    term.print(fmt.warning('Search cancelled.'));
    return pause(ctx);
  }
  printClients(ctx, searchClients(ctx.catalog, query), `No clients found for '${query}'.`);
  return pause(ctx);
}

async function deleteClientFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '         DELETE CLIENT', 40);
  if (!showPickList(ctx)) return pause(ctx);
  const id = await term.ask('\nClient ID to delete: ');
  const target = unwrap(ctx, checkDeletableClient(catalog, id));
  if (!target) return pause(ctx);
  if (!(await confirm(ctx, `Delete '${target.name}'?`))) {
    term.print(fmt.warning('\nDeletion cancelled.'));
    return pause(ctx);
  }
  const deleted = unwrap(ctx, await deleteClient(catalog, id));
  if (deleted) term.print(fmt.success(`\nClient '${deleted.name}' deleted.`));
  return pause(ctx);
}

export function clientsMenu(ctx: CliContext): Promise<void> {
  return runMenu(
    ctx,
    '     CLIENTS',
    [
      { label: 'List clients', run: listClients },
      { label: 'Add client', run: addClientFlow },
      { label: 'Edit client', run: editClientFlow },
      { label: 'Search clients', run: searchClientsFlow },
      { label: 'Delete client', run: deleteClientFlow, tone: 'danger' },
    ],
    'Back to main menu'
  );
}
