import { ethers, FixedNumber } from 'ethers';
import { requireThat } from './errors';

/**
 * Decimals of the execution asset; sizes are stored in 10^-18 units (wei)
 */
export const TOKEN_DECIMALS = 18;

/**
 * Convert a whole-unit amount (e.g. 1.5 ETH) to minor units.
 * Digits past the 18th decimal are truncated.
 */
export function toMinorUnits(amount: number): bigint {
  requireThat(Number.isFinite(amount) && amount >= 0, `Amount must be a non-negative number, got ${amount}`);

  // Beyond 1e21 the decimal form switches to exponent notation; such values are integers
  if (amount >= 1e21) {
    return BigInt(amount) * 10n ** BigInt(TOKEN_DECIMALS);
  }

  const text = /e/i.test(String(amount)) ? amount.toFixed(TOKEN_DECIMALS + 2) : String(amount);
  const [whole, fraction = ''] = text.split('.');
  const truncated = fraction.slice(0, TOKEN_DECIMALS);

  return ethers.parseUnits(truncated ? `${whole}.${truncated}` : whole, TOKEN_DECIMALS);
}

/**
 * Convert minor units back to a whole-unit number
 */
export function fromMinorUnits(value: bigint): number {
  return Number(ethers.formatUnits(value, TOKEN_DECIMALS));
}

/**
 * Stored execution sizes are minor-unit amounts that may carry a fraction;
 * in memory they are fixed-point values in this format
 */
export const SIZE_FORMAT = { signed: false, width: 512, decimals: 18 } as const;

const SIZE_PATTERN = /^\s*(\d+)(?:\.(\d*))?\s*$/;
const MAX_SIZE_DIGITS = 100;

export function sizeFromMinorUnits(value: bigint): FixedNumber {
  return FixedNumber.fromValue(value, 0, SIZE_FORMAT);
}

/**
 * Parse a stored minor-unit size.
 *
 * Lenient: decimal and exponent forms are accepted, keeping up to 18
 * fractional digits; anything unparseable or negative reads as zero.
 */
export function parseSize(text: string): FixedNumber {
  const match = SIZE_PATTERN.exec(text) ?? SIZE_PATTERN.exec(exponentToDecimal(text));
  if (!match || match[1].length > MAX_SIZE_DIGITS) {
    return sizeFromMinorUnits(0n);
  }

  const fraction = (match[2] ?? '').slice(0, SIZE_FORMAT.decimals);
  return FixedNumber.fromString(fraction ? `${match[1]}.${fraction}` : match[1], SIZE_FORMAT);
}

function exponentToDecimal(text: string): string {
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value) || value < 0) {
    return '';
  }
  return value >= 1e21 ? BigInt(value).toString() : value.toFixed(SIZE_FORMAT.decimals);
}

/**
 * Format a size for storage: an integer string unless it has a fraction
 */
export function formatSize(value: FixedNumber): string {
  const scale = 10n ** BigInt(SIZE_FORMAT.decimals);
  const whole = value.value / scale;
  const fraction = (value.value % scale).toString().padStart(SIZE_FORMAT.decimals, '0').replace(/0+$/, '');
  return fraction ? `${whole}.${fraction}` : whole.toString();
}

/**
 * Convert a stored size back to whole units
 */
export function sizeToWholeUnits(value: FixedNumber): number {
  return Number(ethers.formatUnits(value.value, TOKEN_DECIMALS + SIZE_FORMAT.decimals));
}
