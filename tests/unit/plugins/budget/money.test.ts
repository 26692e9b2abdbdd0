import { describe, it, expect } from 'vitest';
import { formatMoney, parseAmount, toMinor } from '../../../../src/plugins/budget/money.js';

describe('parseAmount', () => {
  it('should read whole and decimal amounts as minor units', () => {
    expect(parseAmount('5')).toBe(500);
    expect(parseAmount('2.5')).toBe(250);
    expect(parseAmount('£2.50')).toBe(250);
    expect(parseAmount(' $0.05 ')).toBe(5);
  });

  it('should reject anything else', () => {
    expect(parseAmount('-5')).toBeNull();
    expect(parseAmount('1.234')).toBeNull();
    expect(parseAmount('five')).toBeNull();
    expect(parseAmount('')).toBeNull();
  });
});

describe('formatMoney', () => {
  it('should format with two decimals and a leading sign', () => {
    expect(formatMoney(1500, '£')).toBe('£15.00');
    expect(formatMoney(5, '£')).toBe('£0.05');
    expect(formatMoney(-150, '£')).toBe('-£1.50');
  });
});

describe('toMinor', () => {
  it('should round to the nearest minor unit', () => {
    expect(toMinor(1.005)).toBe(100);
    expect(toMinor(0.1 + 0.2)).toBe(30);
  });
});
