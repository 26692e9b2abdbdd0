/**
 * Money helpers. Amounts are held as integer minor units so repeated
 * accruals never pick up floating-point drift.
 */

const AMOUNT_PATTERN = /^[£$€]?(\d{1,9})(?:\.(\d{1,2}))?$/;

export function toMinor(major: number): number {
  return Math.round(major * 100);
}

/**
 * Parse user input such as "5", "2.5", "£2.50".
 * @returns minor units, or null when the text is not a non-negative amount
 */
export function parseAmount(text: string): number | null {
  const match = AMOUNT_PATTERN.exec(text.trim());
  if (!match) return null;

  const whole = Number(match[1]);
  const fraction = (match[2] ?? '').padEnd(2, '0');
  return whole * 100 + Number(fraction);
}

export function formatMoney(minor: number, symbol: string): string {
  const sign = minor < 0 ? '-' : '';
  const abs = Math.abs(minor);
  const pence = String(abs % 100).padStart(2, '0');
  return `${sign}${symbol}${Math.floor(abs / 100)}.${pence}`;
}
