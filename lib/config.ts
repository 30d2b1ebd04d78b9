/**
 * Runtime config from env.
 * Defaults: ./data for the JSON stores, ./exports for workbooks, top 5 rankings.
 */
import path from 'path';

const env: Record<string, string | undefined> = typeof process !== 'undefined' ? process.env : {};

export type SalesConfig = {
  dataDir: string;
  exportDir: string;
  topN: number;
  currencySymbol: string;
  color: boolean;
};

function clampInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, parseInt(raw ?? String(fallback), 10) || fallback));
}

export function loadConfig(source: Record<string, string | undefined> = env): SalesConfig {
  const cwd = process.cwd();
  return {
    dataDir: path.resolve(cwd, source.SALES_DATA_DIR?.trim() || 'data'),
    exportDir: path.resolve(cwd, source.SALES_EXPORT_DIR?.trim() || 'exports'),
    topN: clampInt(source.SALES_TOP_N, 5, 1, 50),
    currencySymbol: source.SALES_CURRENCY_SYMBOL ?? '$',
    color: source.NO_COLOR === undefined || source.NO_COLOR === '',
  };
}
