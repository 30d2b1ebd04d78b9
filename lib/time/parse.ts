/**
 * Sale timestamp parsing. Accept ONLY "YYYY-MM-DD HH:MM:SS" in local time.
 * Anything else is unparseable and callers skip it.
 */

const SALE_TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Parse a strict sale timestamp. Returns null on a wrong format or an impossible
 * calendar value (2024-02-30, 25:00:00).
 */
export function parseSaleTimestamp(input: unknown): Date | null {
  if (typeof input !== 'string') return null;
  const match = input.match(SALE_TIMESTAMP_REGEX);
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;
  const lastDay = new Date(year, month, 0).getDate();
  if (day < 1 || day > lastDay) return null;
  return new Date(year, month - 1, day, hour, minute, second, 0);
}

export function formatSaleTimestamp(date: Date): string {
  return `${formatIsoDateLocal(date)} ${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/** YYYY-MM-DD in local time. */
export function formatIsoDateLocal(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** DD/MM/YYYY, the label format used in menus and report headers. */
export function formatDisplayDate(date: Date): string {
  return `${pad2(date.getDate())}/${pad2(date.getMonth() + 1)}/${date.getFullYear()}`;
}
