import { describe, expect, it } from 'vitest';

import { parseDecimal, parseInteger } from '@/common/numbers.js';

describe('parseInteger', () => {
  it('parses signed integers with surrounding whitespace', () => {
    expect(parseInteger('5100201')).toBe(5100201);
    expect(parseInteger(' -12 ')).toBe(-12);
    expect(parseInteger('+7')).toBe(7);
  });

  it('rejects fractions, exponents and text', () => {
    expect(parseInteger('1.0')).toBeNull();
    expect(parseInteger('1e3')).toBeNull();
    expect(parseInteger('0x10')).toBeNull();
    expect(parseInteger('')).toBeNull();
  });

  it('rejects integers beyond the safe range', () => {
    expect(parseInteger('9007199254740993')).toBeNull();
  });
});

describe('parseDecimal', () => {
  it('parses decimals and exponents exactly', () => {
    expect(parseDecimal('0.1')?.toString()).toBe('0.1');
    expect(parseDecimal('.5')?.toString()).toBe('0.5');
    expect(parseDecimal('3.')?.toString()).toBe('3');
    expect(parseDecimal('2.5e3')?.toString()).toBe('2500');
  });

  it('rejects non-decimal literals', () => {
    expect(parseDecimal('NaN')).toBeNull();
    expect(parseDecimal('Infinity')).toBeNull();
    expect(parseDecimal('0b101')).toBeNull();
    expect(parseDecimal('1,5')).toBeNull();
    expect(parseDecimal('.')).toBeNull();
  });
});
