/**
 * SYMBOL NORMALIZER
 * =================
 *
 * Canonical ticker form to prevent cache fragmentation:
 *   " aapl " → AAPL, "brk-b" → BRK.B, "BRK/B" → BRK.B
 *
 * Providers translate the canonical form into their own notation
 * (Yahoo uses BRK-B, Alpha Vantage BRK.B).
 */

import { ValidationError } from '../../common/errors.js';

const SYMBOL_PATTERN = /^[A-Z0-9^][A-Z0-9.\-=^]{0,14}$/;

// Share-class separators seen in the wild
const CLASS_SEPARATOR = /^([A-Z]{1,5})[-/ ]([A-Z])$/;

export function normalizeSymbol(raw: string): string {
  if (typeof raw !== 'string') {
    throw new ValidationError('Symbol must be a string');
  }
  let s = raw.trim().toUpperCase();
  const m = CLASS_SEPARATOR.exec(s);
  if (m) s = `${m[1]}.${m[2]}`;

  if (!SYMBOL_PATTERN.test(s)) {
    throw new ValidationError(`Invalid symbol "${raw}"`);
  }
  return s;
}

export function toYahooSymbol(symbol: string): string {
  const m = /^([A-Z]{1,5})\.([A-Z])$/.exec(symbol);
  return m ? `${m[1]}-${m[2]}` : symbol;
}
