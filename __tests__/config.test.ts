/**
 * Env config: defaults and clamping.
 */

import path from 'path';
import { loadConfig } from '@/lib/config';

describe('loadConfig', () => {
  it('uses defaults relative to the working directory', () => {
    expect(loadConfig({})).toEqual({
      dataDir: path.resolve(process.cwd(), 'data'),
      exportDir: path.resolve(process.cwd(), 'exports'),
      topN: 5,
      currencySymbol: '$',
      color: true,
    });
  });

  it('clamps the ranking size', () => {
    expect(loadConfig({ SALES_TOP_N: '100' }).topN).toBe(50);
    expect(loadConfig({ SALES_TOP_N: '-3' }).topN).toBe(1);
    expect(loadConfig({ SALES_TOP_N: 'abc' }).topN).toBe(5);
  });

  it('reads directories, currency and NO_COLOR', () => {
    const config = loadConfig({
      SALES_DATA_DIR: '/srv/ledger',
      SALES_EXPORT_DIR: ' /srv/xlsx ',
      SALES_CURRENCY_SYMBOL: '€',
      NO_COLOR: '1',
    });
    expect(config.dataDir).toBe('/srv/ledger');
    expect(config.exportDir).toBe('/srv/xlsx');
    expect(config.currencySymbol).toBe('€');
    expect(config.color).toBe(false);
  });
});
