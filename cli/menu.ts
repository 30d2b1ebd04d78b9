import type { Catalog } from '../lib/catalog/catalog';
import type { SalesConfig } from '../lib/config';
import type { SalesResult } from '../lib/errors';
import type { Formatter } from './format';
import { rule } from './format';
import { TerminalClosedError } from './terminal';
import type { Terminal } from './terminal';

export type CliContext = {
  catalog: Catalog;
  config: SalesConfig;
  term: Terminal;
  fmt: Formatter;
  now: () => Date;
};

export type MenuItem = {
  label: string;
  run: (ctx: CliContext) => Promise<void>;
  tone?: 'danger';
};

export async function pause(ctx: CliContext): Promise<void> {
  await ctx.term.ask(ctx.fmt.separator('\nPress Enter to continue...'));
}

export function heading(ctx: CliContext, title: string, width: number): void {
  ctx.term.print(ctx.fmt.title(rule('=', width)));
  ctx.term.print(ctx.fmt.title(title));
  ctx.term.print(ctx.fmt.title(rule('=', width)));
}

/** Print the error of a failed result. Returns the value on success. */
export function unwrap<T>(ctx: CliContext, result: SalesResult<T>): T | null {
  if (result.ok) return result.value;
  ctx.term.print(ctx.fmt.error(result.error.message));
  return null;
}

export async function confirm(ctx: CliContext, question: string): Promise<boolean> {
  const answer = await ctx.term.ask(`${question} (${ctx.fmt.value('y/n')}): `);
  return answer.trim().toLowerCase() === 'y';
}

/**
 * Numbered menu loop. The last option returns to the caller. A failing action
 * (e.g. a store that cannot be written) is reported and the menu continues.
 */
export async function runMenu(
  ctx: CliContext,
  title: string,
  items: readonly MenuItem[],
  backLabel: string
): Promise<void> {
  const back = items.length + 1;
  for (;;) {
    ctx.term.clear();
    heading(ctx, title, 35);
    items.forEach((item, i) => {
      const paint = item.tone === 'danger' ? ctx.fmt.error : ctx.fmt.menu;
      ctx.term.print(paint(`${i + 1}. ${item.label}`));
    });
    ctx.term.print(ctx.fmt.warning(`${back}. ${backLabel}`));
    ctx.term.print(ctx.fmt.separator(rule('=', 35)));

    const choice = (await ctx.term.ask(`Select an option (${ctx.fmt.value(`1-${back}`)}): `)).trim();
    if (choice === String(back)) return;
    const item = /^\d+$/.test(choice) ? items[Number(choice) - 1] : undefined;
    if (!item) {
      ctx.term.print(ctx.fmt.error('Invalid option. Please try again.'));
      await pause(ctx);
      continue;
    }

    try {
      await item.run(ctx);
    } catch (e) {
      if (e instanceof TerminalClosedError) throw e;
      console.error(`[cli] ${item.label} failed:`, e);
      ctx.term.print(ctx.fmt.error(`Operation failed: ${e instanceof Error ? e.message : String(e)}`));
      await pause(ctx);
    }
  }
}
