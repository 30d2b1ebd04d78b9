#!/usr/bin/env node
import { Catalog } from '../lib/catalog/catalog';
import { loadConfig } from '../lib/config';
import { createFileRepositories } from '../lib/store/collections';
import { createFormatter } from './format';
import { runSession } from './menus/main';
import { createConsoleTerminal } from './terminal';

async function main(): Promise<void> {
  const config = loadConfig();
  const catalog = await Catalog.load(createFileRepositories(config.dataDir));
  const term = createConsoleTerminal();
  const fmt = createFormatter(config.color && Boolean(process.stdout.isTTY), config.currencySymbol);
  try {
    await runSession({ catalog, config, term, fmt, now: () => new Date() });
  } finally {
    term.close();
  }
}

main().catch((e) => {
  console.error('[cli]', e);
  process.exit(1);
});
