import { runMenu } from '../menu';
import type { CliContext } from '../menu';
import { rule } from '../format';
import { TerminalClosedError } from '../terminal';
import { clientsMenu } from './clients';
import { productsMenu } from './products';
import { salesMenu } from './sales';
import { vendorsMenu } from './vendors';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function welcome(ctx: CliContext): void {
  const { term, fmt } = ctx;
  const now = ctx.now();
  term.clear();
  term.print(fmt.title(rule('=', 50)));
  term.print(fmt.title('      SALES MANAGEMENT SYSTEM'));
  term.print(fmt.title(rule('=', 50)));
  term.print(`Date: ${fmt.value(`${pad2(now.getDate())}-${pad2(now.getMonth() + 1)}-${now.getFullYear()}`)}`);
  term.print(`Time: ${fmt.value(`${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`)}`);
  term.print(fmt.title(rule('=', 50)));
}

export function mainMenu(ctx: CliContext): Promise<void> {
  return runMenu(
    ctx,
    '      MAIN MENU',
    [
      { label: 'Sales', run: salesMenu },
      { label: 'Products', run: productsMenu },
      { label: 'Clients', run: clientsMenu },
      { label: 'Vendors', run: vendorsMenu },
    ],
    'Exit'
  );
}

/** Whole interactive session. Closed input ends it like Exit does. */
export async function runSession(ctx: CliContext): Promise<void> {
  const { term, fmt } = ctx;
  try {
    welcome(ctx);
    await mainMenu(ctx);
    term.print(fmt.success('\nThank you for using the system. See you soon!'));
  } catch (e) {
    if (!(e instanceof TerminalClosedError)) throw e;
    term.print(fmt.warning(e.interrupted ? '\n\nProgram interrupted by the user.' : '\n\nInput closed. Goodbye!'));
  }
}
