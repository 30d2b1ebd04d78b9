/**
 * Canonical money display: whole units, decimals truncated, "." as thousands separator.
 * Stored amounts keep their decimals; only the display drops them.
 */

/**
 * Format a value for display (e.g. 123456.78 → "123.456").
 * With `width`, the result is right-aligned to that many characters.
 */
export function formatMoneyInt(value: number, width?: number): string {
  const n = Number(value);
  const text = Number.isFinite(n) ? groupThousands(Math.trunc(n)) : '—';
  return width === undefined ? text : text.padStart(width);
}

function groupThousands(whole: number): string {
  const sign = whole < 0 ? '-' : '';
  const digits = String(Math.abs(whole));
  return sign + digits.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

/** Percentage with fixed decimals, e.g. 10.5 → "10.50%". */
export function formatPct(value: number, decimals = 2): string {
  return `${Number(value).toFixed(decimals)}%`;
}
