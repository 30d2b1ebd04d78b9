/**
 * Parsing of values typed at the prompt. Accepts numbers or strings; strings are trimmed.
 * Returns { ok, value } or { ok: false, error } with a message the menu can print.
 */

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

const INTEGER_REGEX = /^[+-]?\d+$/;
const DECIMAL_REGEX = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

function toText(value: unknown): string | null {
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : null;
  if (typeof value === 'string') return value.trim();
  return null;
}

/** Blank input, used by edit forms to mean "keep the current value". */
export function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function parseInteger(value: unknown, label: string): Parsed<number> {
  const text = toText(value);
  if (text === null || text === '') return { ok: false, error: `${label} is required` };
  const n = Number(text);
  if (!INTEGER_REGEX.test(text) || !Number.isSafeInteger(n)) return { ok: false, error: `${label} must be a whole number` };
  return { ok: true, value: n };
}

export function parseIntegerInRange(value: unknown, label: string, min: number, max: number): Parsed<number> {
  const r = parseInteger(value, label);
  if (!r.ok) return r;
  if (r.value < min || r.value > max) {
    return { ok: false, error: `${label} must be between ${min} and ${max}` };
  }
  return r;
}

export function parseDecimal(value: unknown, label: string): Parsed<number> {
  const text = toText(value);
  if (text === null || text === '') return { ok: false, error: `${label} is required` };
  const n = Number(text);
  // Long digit runs overflow to Infinity, which JSON cannot store.
  if (!DECIMAL_REGEX.test(text) || !Number.isFinite(n)) return { ok: false, error: `${label} must be a number` };
  return { ok: true, value: n };
}

export function parseRequiredText(value: unknown, label: string): Parsed<string> {
  const text = typeof value === 'string' ? value.trim() : '';
  if (!text) return { ok: false, error: `${label} cannot be empty` };
  return { ok: true, value: text };
}

export function optionalText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}
