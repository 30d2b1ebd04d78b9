import {
  addProduct,
  bulkUpdateCost,
  checkDeletableProduct,
  deleteProduct,
  editProduct,
  findProduct,
  searchProducts,
} from '../../lib/catalog/products';
import { formatPct } from '../../lib/utils/money';
import { confirm, heading, pause, runMenu, unwrap } from '../menu';
import type { CliContext } from '../menu';
import { productTable } from '../tables';

function printProducts(ctx: CliContext, empty: string, products = Array.from(ctx.catalog.products.values())): void {
  if (products.length === 0) {
    ctx.term.print(ctx.fmt.warning(empty));
    return;
  }
  productTable(products, ctx.fmt).forEach((l) => ctx.term.print(l));
}

async function listProducts(ctx: CliContext): Promise<void> {
  ctx.term.clear();
  heading(ctx, '           PRODUCT LIST', 60);
  printProducts(ctx, 'No products registered.');
  return pause(ctx);
}

async function addProductFlow(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, '         ADD PRODUCT', 40);
  const name = await term.ask('Product name: ');
  const purchasePrice = await term.ask('Purchase price ($): ');
  const profit = await term.ask('Profit per unit ($): ');
  const stock = await term.ask('Initial stock (max 999): ');
  const product = unwrap(ctx, await addProduct(ctx.catalog, { name, purchasePrice, profit, stock }));
  if (product) {
    term.print(fmt.success(`\nProduct '${product.name}' added successfully!`));
    term.print(`Initial stock: ${fmt.value(String(product.stock))}`);
    term.print(`Sale price: ${fmt.value(fmt.money(product.salePrice))}`);
  }
  return pause(ctx);
}

async function editProductFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '         EDIT PRODUCT', 40);
  if (catalog.products.size === 0) {
    term.print(fmt.warning('No products registered.'));
    return pause(ctx);
  }
  printProducts(ctx, '');
  const id = await term.ask('\nProduct ID to edit: ');
  const current = unwrap(ctx, findProduct(catalog, id));
  if (!current) return pause(ctx);

  term.print(fmt.menu(`\nEditing: ${current.name}`));
  term.print(fmt.separator('(Leave blank to keep the current value)'));
  const name = await term.ask(`New name [${current.name}]: `);
  const purchasePrice = await term.ask(`New purchase price [${fmt.money(current.purchasePrice)}]: $`);
  const profit = await term.ask(`New profit [${fmt.money(current.profit)}]: $`);
  const stock = await term.ask(`New stock [${current.stock}] (max 999): `);
  const product = unwrap(ctx, await editProduct(catalog, id, { name, purchasePrice, profit, stock }));
  if (product) {
    term.print(fmt.success('\nProduct updated successfully!'));
    term.print(`New stock: ${fmt.value(String(product.stock))}`);
    term.print(`New sale price: ${fmt.value(fmt.money(product.salePrice))}`);
  }
  return pause(ctx);
}

async function bulkCostFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, ' BULK COST UPDATE', 45);
  if (catalog.products.size === 0) {
    term.print(fmt.warning('No products registered to update.'));
    return pause(ctx);
  }
  const pct = await term.ask(`Cost increase/decrease (${fmt.value('%')}): `);
  const asNumber = Number(pct.trim());
  const label = Number.isFinite(asNumber) ? formatPct(asNumber) : pct.trim();
  if (Number.isFinite(asNumber) && asNumber !== 0) {
    if (!(await confirm(ctx, `\nApply ${fmt.value(label)} to ${catalog.products.size} products?`))) {
      term.print(fmt.warning('Bulk update cancelled.'));
      return pause(ctx);
    }
  }
  const updated = unwrap(ctx, await bulkUpdateCost(catalog, pct));
  if (updated !== null) {
    term.print(fmt.success('\nBulk update completed!'));
    term.print(`Products updated: ${fmt.value(String(updated))}`);
  }
  return pause(ctx);
}

async function searchProductsFlow(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  term.clear();
  heading(ctx, '     SEARCH PRODUCTS', 40);
  const query = (await term.ask('Enter ID or name (partial match): ')).trim();
  if (!query) {
    term.print(fmt.warning('Search cancelled.'));
    return pause(ctx);
  }
  printProducts(ctx, `No products found for '${query}'.`, searchProducts(ctx.catalog, query));
  return pause(ctx);
}

async function deleteProductFlow(ctx: CliContext): Promise<void> {
  const { term, fmt, catalog } = ctx;
  term.clear();
  heading(ctx, '         DELETE PRODUCT', 40);
  if (catalog.products.size === 0) {
    term.print(fmt.warning('No products registered.'));
    return pause(ctx);
  }
  printProducts(ctx, '');
  const id = await term.ask('\nProduct ID to delete: ');
  const target = unwrap(ctx, checkDeletableProduct(catalog, id));
  if (!target) return pause(ctx);
  if (!(await confirm(ctx, `Delete '${target.name}'?`))) {
    term.print(fmt.warning('\nDeletion cancelled.'));
    return pause(ctx);
  }
  const deleted = unwrap(ctx, await deleteProduct(catalog, id));
  if (deleted) term.print(fmt.success(`\nProduct '${deleted.name}' deleted.`));
  return pause(ctx);
}

export function productsMenu(ctx: CliContext): Promise<void> {
  return runMenu(
    ctx,
    '     PRODUCTS',
    [
      { label: 'List products', run: listProducts },
      { label: 'Add product', run: addProductFlow },
      { label: 'Edit product', run: editProductFlow },
      { label: 'Update cost (bulk, %)', run: bulkCostFlow },
      { label: 'Search products', run: searchProductsFlow },
      { label: 'Delete product', run: deleteProductFlow, tone: 'danger' },
    ],
    'Back to main menu'
  );
}
