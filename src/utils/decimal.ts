/**
 * Fixed-point decimal helpers
 *
 * Prices and multipliers are non-negative decimals with up to 18 fractional
 * digits, backed by big.js so that no value ever passes through a float.
 */

import { Big } from 'big.js';
import { invalidInput } from './oracle-error.js';

// ============================================================================
// Constants
// ============================================================================

export type Decimal = Big;

/** Number of fractional digits a Decimal can carry */
export const DECIMAL_FRACTIONAL_DIGITS = 18;

/** Largest representable value (u128::MAX scaled by 10^18) */
export const DECIMAL_MAX = new Big('340282366920938463463.374607431768211455');

export const DECIMAL_ZERO = new Big(0);
export const DECIMAL_ONE = new Big(1);

/** Plain decimal notation: digits with an optional fractional part */
const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

// ============================================================================
// Parsing & Formatting
// ============================================================================

/**
 * Parse a decimal string such as "1.2" or "100".
 *
 * @throws OracleError (INVALID_INPUT) for negatives, exponents, empty input,
 *   more than 18 fractional digits or values above DECIMAL_MAX
 *
 * @example
 * decimalToString(parseDecimal('1.20')) // => '1.2'
 */
export function parseDecimal(input: string): Decimal {
  const match = DECIMAL_PATTERN.exec(input);
  if (!match) {
    throw invalidInput(`not a decimal: '${input}'`);
  }

  const fractional = match[2] ?? '';
  if (fractional.length > DECIMAL_FRACTIONAL_DIGITS) {
    throw invalidInput(
      `cannot parse more than ${DECIMAL_FRACTIONAL_DIGITS} fractional digits: '${input}'`
    );
  }

  const value = new Big(input);
  if (value.gt(DECIMAL_MAX)) {
    throw invalidInput(`value too big: '${input}'`);
  }
  return value;
}

/**
 * Render a decimal in plain notation without trailing zeros.
 */
export function decimalToString(value: Decimal): string {
  return value.toFixed();
}

export function decimalEquals(a: Decimal, b: Decimal): boolean {
  return a.eq(b);
}
