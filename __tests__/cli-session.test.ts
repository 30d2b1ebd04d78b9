/**
 * Menu flows driven through a scripted terminal.
 */

import { createFormatter } from '@/cli/format';
import type { CliContext } from '@/cli/menu';
import { runSession } from '@/cli/menus/main';
import { TerminalClosedError } from '@/cli/terminal';
import type { Terminal } from '@/cli/terminal';
import { loadConfig } from '@/lib/config';
import * as reports from '@/lib/sales/reports';
import { loadCatalog, product, sale, vendor } from './helpers/fixtures';
import type { MemoryRepositories, Seed } from './helpers/fixtures';

const NOW = new Date(2024, 5, 10, 14, 30, 5);

function scriptedTerminal(answers: string[]): { term: Terminal; output: string[] } {
  const output: string[] = [];
  const term: Terminal = {
    ask: jest.fn(async (question: string) => {
      output.push(question);
      const next = answers.shift();
      if (next === undefined) throw new TerminalClosedError(false);
      return next;
    }),
    print: (text = '') => {
      output.push(text);
    },
    clear: () => {},
    close: jest.fn(),
  };
  return { term, output };
}

async function session(seed: Seed, answers: string[], prepare?: (repos: MemoryRepositories) => void) {
  const { catalog, repos } = await loadCatalog(seed);
  prepare?.(repos);
  const { term, output } = scriptedTerminal(answers);
  const ctx: CliContext = {
    catalog,
    config: loadConfig({}),
    term,
    fmt: createFormatter(false),
    now: () => NOW,
  };
  await runSession(ctx);
  return { catalog, repos, output };
}

describe('runSession', () => {
  it('adds a vendor and exits', async () => {
    const { catalog, output } = await session({}, ['4', '2', 'Ana', '10', '', '5', '5']);
    expect(Array.from(catalog.vendors.values())).toEqual([{ id: 1, name: 'Ana', commissionPct: 10 }]);
    expect(output).toContain("\nVendor 'Ana' added with 10.00% commission.");
    expect(output[output.length - 1]).toBe('\nThank you for using the system. See you soon!');
  });

  it('records a sale to the General Customer after re-asking the quantity', async () => {
    const { catalog, repos, output } = await session(
      { products: [product({ id: 1, stock: 10 })], vendors: [vendor({ id: 1 })] },
      ['1', '1', '1', '1', '20', '2', 'y', '', '4', '5']
    );
    expect(output).toContain('Only 10 units of Desk Lamp left in stock.');
    expect(output).toContain('\nSale #1 recorded successfully!');
    expect(catalog.sales.get(1)?.clientName).toBe('General Customer');
    expect(catalog.sales.get(1)?.timestamp).toBe('2024-06-10 14:30:05');
    expect(catalog.products.get(1)?.stock).toBe(8);
    expect(repos.sales.saveCount).toBe(1);
  });

  it('refuses to delete a product with sales before asking for confirmation', async () => {
    const { catalog, output } = await session(
      { products: [product({ id: 1 })], sales: [sale({ productId: 1 })] },
      ['2', '6', '1', '', '7', '5']
    );
    expect(output).toContain('Product 1 has associated sales and cannot be deleted.');
    expect(output.some((line) => line.startsWith("Delete 'Desk Lamp'?"))).toBe(false);
    expect(catalog.products.has(1)).toBe(true);
  });

  it('reports a failed save and returns to the menu', async () => {
    const logged = jest.spyOn(console, 'error').mockImplementation(() => {});
    const { catalog, output } = await session(
      { products: [product({ id: 1, stock: 10 })], vendors: [vendor({ id: 1 })] },
      ['1', '1', '1', '1', '2', 'y', '', '4', '5'],
      (repos) => {
        jest.spyOn(repos.sales, 'saveAll').mockRejectedValue(new Error('disk full'));
      }
    );
    expect(output).toContain('Operation failed: disk full');
    expect(output).not.toContain('\nSale #1 recorded successfully!');
    expect(logged).toHaveBeenCalledTimes(1);
    expect(catalog.sales.size).toBe(1);
    expect(output[output.length - 1]).toBe('\nThank you for using the system. See you soon!');
    logged.mockRestore();
  });

  it('reports a past week over its own bounds only', async () => {
    const periodReport = jest.spyOn(reports, 'periodReport');
    const { output } = await session(
      { sales: [sale({ id: 1, timestamp: '2024-06-03 12:00:00' })] },
      ['1', '3', '4', '1', '', 'n', '0', '5', '4', '5']
    );
    expect(output).toContain('1. 02/06/2024 - 08/06/2024 (1 sales)');
    expect(periodReport).toHaveBeenCalledTimes(1);
    expect(periodReport).toHaveBeenCalledWith(expect.any(Array), {
      start: new Date(2024, 5, 2, 0, 0, 0),
      end: new Date(2024, 5, 8, 23, 59, 59),
    });
    periodReport.mockRestore();
  });

  it('reports an invalid option and keeps going', async () => {
    const { output } = await session({}, ['9', '', '5']);
    expect(output).toContain('Invalid option. Please try again.');
    expect(output[output.length - 1]).toBe('\nThank you for using the system. See you soon!');
  });

  it('ends quietly when input runs out', async () => {
    const { output } = await session({}, ['1']);
    expect(output[output.length - 1]).toBe('\n\nInput closed. Goodbye!');
  });
});
