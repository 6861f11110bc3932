/**
 * Numeric helpers for ERP cell text.
 *
 * Cells are stored as text (13-digit location codes, leading zeros) and only
 * parsed when a computation needs them. Both `.` and `,` are accepted as the
 * decimal separator; there is no thousands grouping in these exports.
 */

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export const MIN_DECIMALS = 2;
export const MAX_DECIMALS = 8;
export const DEFAULT_DECIMALS = 6;

/**
 * parseDecimalLike
 *
 * - Empty / whitespace-only input is absent (`null`), never zero.
 * - Every comma is read as a decimal point, so "1,234,5" is not a number.
 * - Infinity / NaN spellings are rejected.
 */
export function parseDecimalLike(raw: string | null | undefined): number | null {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return null;

  const normalized = trimmed.replace(/,/g, '.');
  if (!DECIMAL_RE.test(normalized)) return null;

  const n = Number(normalized);
  return Number.isFinite(n) ? n : null;
}

export function isWholeNumber(n: number): boolean {
  return Number.isFinite(n) && Math.trunc(n) === n;
}

export function clampDecimals(decimals: number): number {
  if (!Number.isFinite(decimals)) return DEFAULT_DECIMALS;
  return Math.min(MAX_DECIMALS, Math.max(MIN_DECIMALS, Math.round(decimals)));
}

// toFixed(100) prints every digit of any double a price can hold
const EXACT_DIGITS = 100;

/**
 * Fixed-point text rounded to nearest, exact ties to even ("0.125" → "0.12").
 * `toFixed` alone settles ties away from zero.
 */
export function toFixedText(n: number, decimals: number): string {
  const d = clampDecimals(decimals);
  const text = n.toFixed(d);

  const [intPart, fraction = ''] = Math.abs(n).toFixed(EXACT_DIGITS).split('.');
  const isTie = fraction[d] === '5' && /^0*$/.test(fraction.slice(d + 1));
  if (!isTie) return text;

  const kept = fraction.slice(0, d);
  const lastDigit = Number(kept[kept.length - 1] ?? intPart[intPart.length - 1]);
  if (lastDigit % 2 !== 0) return text;
  return `${n < 0 ? '-' : ''}${intPart}.${kept}`;
}

function wholeText(n: number): string {
  return BigInt(n).toString();
}

// "22" rather than "22.0"; 18.5 stays "18.5"
export function formatPackagingCount(n: number): string {
  return isWholeNumber(n) ? wholeText(n) : String(n);
}

// Whole products collapse to integer text whatever the configured precision
export function formatUnitQuantity(n: number, decimals: number): string {
  return isWholeNumber(n) ? wholeText(n) : toFixedText(n, decimals);
}
