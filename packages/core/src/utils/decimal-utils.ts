import { Decimal } from 'decimal.js';

// Configure Decimal.js for cryptocurrency precision
// Exchange amounts carry at most 8 fraction digits, intermediate products need headroom
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28, // High precision for crypto calculations
  rounding: Decimal.ROUND_HALF_UP, // Standard rounding
  toExpNeg: -7, // Use exponential notation for numbers smaller than 1e-7
  toExpPos: 21, // Use exponential notation for numbers larger than 1e+21
});

/**
 * Number of fraction digits every stored monetary value is rounded to
 */
export const QUANTIZED_DECIMAL_PLACES = 8;

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(
  value: string | number | Decimal | undefined | null,
  out?: { value: Decimal }
): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Round a monetary value to 8 fraction digits, ties to even.
 * Fees and net amounts must pass through here before they reach a Trade or Transaction.
 */
export function quantize(value: Decimal.Value): Decimal {
  return new Decimal(value).toDecimalPlaces(QUANTIZED_DECIMAL_PLACES, Decimal.ROUND_HALF_EVEN);
}

/**
 * Render a value quantized, always with exactly 8 fraction digits
 */
export function formatQuantized(value: Decimal.Value): string {
  return quantize(value).toFixed(QUANTIZED_DECIMAL_PLACES);
}

/**
 * Convert Decimal to a plain (non-exponential) string suitable for request payloads
 */
export function decimalToString(decimal: Decimal.Value): string {
  return new Decimal(decimal).toFixed();
}
