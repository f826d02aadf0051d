import { describe, expect, it } from 'vitest';

import { CurrencyCodeSchema, DecimalSchema, IdentifierSchema, IntegerSchema, NumericTextSchema } from '../primitives.js';

describe('primitive schemas', () => {
  it('NumericTextSchema should keep the exact text', () => {
    expect(NumericTextSchema.parse('0.50000000')).toBe('0.50000000');
    expect(NumericTextSchema.parse(2)).toBe('2');
    expect(NumericTextSchema.safeParse('').success).toBe(false);
    expect(NumericTextSchema.safeParse('abc').success).toBe(false);
  });

  it('DecimalSchema should parse without float rounding', () => {
    expect(DecimalSchema.parse('0.1234567890123').toFixed()).toBe('0.1234567890123');
  });

  it('DecimalSchema should accept exponent notation', () => {
    expect(DecimalSchema.parse('1e-8').toFixed()).toBe('0.00000001');
    expect(DecimalSchema.parse(-2.5).toFixed()).toBe('-2.5');
  });

  it('should reject numeric text that is not a finite decimal literal', () => {
    for (const text of ['NaN', 'Infinity', '-Infinity', '0x10', '0b11', ' 1']) {
      expect(DecimalSchema.safeParse(text).success).toBe(false);
      expect(NumericTextSchema.safeParse(text).success).toBe(false);
    }
    expect(DecimalSchema.safeParse(Number.NaN).success).toBe(false);
    expect(NumericTextSchema.safeParse(Number.POSITIVE_INFINITY).success).toBe(false);
  });

  it('IntegerSchema should accept integer strings and numbers', () => {
    expect(IntegerSchema.parse('1393632000')).toBe(1393632000);
    expect(IntegerSchema.parse(4)).toBe(4);
    expect(IntegerSchema.safeParse('1.5').success).toBe(false);
    expect(IntegerSchema.safeParse(1.5).success).toBe(false);
  });

  it('IdentifierSchema should normalize ids to strings', () => {
    expect(IdentifierSchema.parse(123)).toBe('123');
    expect(IdentifierSchema.parse('abc')).toBe('abc');
  });

  it('CurrencyCodeSchema should upper-case codes', () => {
    expect(CurrencyCodeSchema.parse('btc')).toBe('BTC');
  });
});
