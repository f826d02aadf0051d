import { z } from 'zod';

import { parseDecimal, tryParseDecimal } from '../utils/decimal-utils.js';

// Plain decimal literal; rejects NaN, Infinity and hex text that decimal.js would otherwise accept
const DECIMAL_LITERAL = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;

const isNumericText = (val: string | number): boolean => {
  const parsed = { value: parseDecimal(0) };
  return DECIMAL_LITERAL.test(String(val)) && tryParseDecimal(val, parsed) && parsed.value.isFinite();
};

// Numeric text schema - accepts string or number, keeps the exact text it was given
// Used where the literal digits matter (amount comparison during reconciliation)
export const NumericTextSchema = z
  .union([z.string(), z.number()])
  .refine(isNumericText, { message: 'Must be a valid numeric string or number' })
  .transform((val) => String(val));

// Decimal schema - accepts string or number, transforms to Decimal without passing through a float
export const DecimalSchema = z
  .union([z.string(), z.number()])
  .refine(isNumericText, { message: 'Must be a valid numeric string or number' })
  .transform((val) => parseDecimal(val));

// Integer schema - accepts integer numbers or integer strings ("1", "1700000000")
export const IntegerSchema = z
  .union([z.number(), z.string().regex(/^-?\d+$/, { message: 'Must be an integer string' })])
  .transform((val) => Number(val))
  .pipe(z.number().int());

// Identifier schema - exchanges send ids as numbers or strings, normalized to string
export const IdentifierSchema = z.union([z.string().min(1), z.number()]).transform((val) => String(val));

// Currency code schema - normalized to uppercase
export const CurrencyCodeSchema = z
  .string()
  .trim()
  .min(1)
  .transform((val) => val.toUpperCase());
