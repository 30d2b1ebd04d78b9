/**
 * Stateless presentation helpers: ANSI colours and money with the currency prefix.
 * Nothing under lib/ imports this.
 */

import { formatMoneyInt } from '../lib/utils/money';

const ANSI = {
  header: '\x1b[95m',
  blue: '\x1b[94m',
  cyan: '\x1b[96m',
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  red: '\x1b[91m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  gray: '\x1b[37m',
  reset: '\x1b[0m',
} as const;

export type Formatter = {
  title: (text: string) => string;
  menu: (text: string) => string;
  separator: (text: string) => string;
  success: (text: string) => string;
  warning: (text: string) => string;
  error: (text: string) => string;
  value: (text: string) => string;
  profit: (text: string) => string;
  cost: (text: string) => string;
  price: (text: string) => string;
  money: (amount: number, width?: number) => string;
};

export function createFormatter(color: boolean, currencySymbol = '$'): Formatter {
  const paint =
    (...codes: string[]) =>
    (text: string) =>
      color ? `${codes.join('')}${text}${ANSI.reset}` : text;

  return {
    title: paint(ANSI.bold, ANSI.cyan, ANSI.underline),
    menu: paint(ANSI.blue),
    separator: paint(ANSI.gray),
    success: paint(ANSI.bold, ANSI.green),
    warning: paint(ANSI.bold, ANSI.yellow),
    error: paint(ANSI.bold, ANSI.red),
    value: paint(ANSI.bold),
    profit: paint(ANSI.green),
    cost: paint(ANSI.red),
    price: paint(ANSI.cyan),
    money: (amount, width) => `${currencySymbol}${formatMoneyInt(amount, width)}`,
  };
}

export function rule(char: string, width: number): string {
  return char.repeat(width);
}

/** Truncate to `max` characters, then pad on the right to `width`. */
export function cell(text: string | number, width: number, max = width - 1): string {
  return String(text).slice(0, max).padEnd(width);
}

export function center(text: string, width: number): string {
  const pad = Math.max(0, width - text.length);
  const left = Math.floor(pad / 2);
  return ' '.repeat(left) + text + ' '.repeat(pad - left);
}
