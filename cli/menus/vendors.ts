import { addVendor, checkDeletableVendor, deleteVendor, editVendor, findVendor } from '../../lib/catalog/vendors';
import { formatPct } from '../../lib/utils/money';
import { confirm, heading, pause, runMenu, unwrap } from '../menu';
import type { CliContext } from '../menu';
import { vendorTable } from '../tables';

/** Returns false when there are no vendors. */
function printVendors(ctx: CliContext): boolean {
  if (ctx.catalog.vendors.size === 0) {
    ctx.term.print(ctx.fmt.warning('No vendors registered.'));
    return false;
  }
  vendorTable(Array.from(ctx.catalog.vendors.values()), ctx.fmt).forEach((l) => ctx.term.print(l));
  return true;
}

async function listVendors(ctx: CliContext): Promise<void> {
  ctx.term.clear();
  heading(ctx, '          VENDOR LIST', 60);
  printVendors(ctx);
  return pause(ctx);
}

async function addVendorFlow(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, '       ADD VENDOR', 40);
  const name = await term.ask('Vendor name: ');
  const commissionPct = await term.ask('Commission on profit (e.g. 10.5): ');
  const vendor = unwrap(ctx, await addVendor(ctx.catalog, { name, commissionPct }));
  if (vendor) {
    term.print(fmt.success(`\nVendor '${vendor.name}' added with ${formatPct(vendor.commissionPct)} commission.`));
  }
  return pause(ctx);
}

async function editVendorFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '         EDIT VENDOR', 40);
  if (!printVendors(ctx)) return pause(ctx);
  const id = await term.ask('\nVendor ID to edit: ');
  const current = unwrap(ctx, findVendor(catalog, id));
  if (!current) return pause(ctx);

  term.print(fmt.menu(`\nEditing: ${current.name}`));
  term.print(fmt.separator('(Leave blank to keep the current value)'));
  const name = await term.ask(`New name [${current.name}]: `);
  const commissionPct = await term.ask(`New commission % [${formatPct(current.commissionPct)}]: `);
  const vendor = unwrap(ctx, await editVendor(catalog, id, { name, commissionPct }));
  if (vendor) {
    term.print(fmt.success('\nVendor updated successfully!'));
    term.print(`New commission: ${fmt.value(formatPct(vendor.commissionPct))}`);
  }
  return pause(ctx);
}

async function deleteVendorFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '         DELETE VENDOR', 40);
  if (!printVendors(ctx)) return pause(ctx);
  const id = await term.ask('\nVendor ID to delete: ');
  const target = unwrap(ctx, checkDeletableVendor(catalog, id));
  if (!target) return pause(ctx);
  if (!(await confirm(ctx, `Delete '${target.name}'?`))) {
    term.print(fmt.warning('\nDeletion cancelled.'));
    return pause(ctx);
  }
  const deleted = unwrap(ctx, await deleteVendor(catalog, id));
  if (deleted) term.print(fmt.success(`\nVendor '${deleted.name}' deleted.`));
  return pause(ctx);
}

export function vendorsMenu(ctx: CliContext): Promise<void> {
  return runMenu(
    ctx,
    '     VENDORS',
    [
      { label: 'List vendors', run: listVendors },
      { label: 'Add vendor', run: addVendorFlow },
      { label: 'Edit vendor', run: editVendorFlow },
      { label: 'Delete vendor', run: deleteVendorFlow, tone: 'danger' },
    ],
    'Back to main menu'
  );
}
