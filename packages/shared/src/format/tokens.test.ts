import { describe, it, expect } from 'vitest';
import { estimateCostUsd, formatCost, formatCount, formatTokenCount } from './tokens';

describe('formatCount', () => {
  it('groups thousands', () => {
    expect(formatCount(0)).toBe('0');
    expect(formatCount(999)).toBe('999');
    expect(formatCount(1000)).toBe('1,000');
    expect(formatCount(1234567)).toBe('1,234,567');
  });
});

describe('cost', () => {
  it('charges $3 per million tokens', () => {
    expect(estimateCostUsd(1_000_000)).toBe(3);
    expect(formatCost(1_000_000)).toBe('3.00');
    expect(formatCost(0)).toBe('0.00');
    expect(formatCost(2_500_000)).toBe('7.50');
  });

  it('rounds exact half cents to even', () => {
    expect(formatCost(375_000)).toBe('1.12');
    expect(formatCost(875_000)).toBe('2.62');
    expect(formatCost(1_375_000)).toBe('4.12');
    expect(formatCost(125_000)).toBe('0.38');
    expect(formatTokenCount(375_000)).toBe('375,000 tokens (≈$1.12 at $3/1M tokens)');
  });

  it('rounds inexact values by their stored value', () => {
    // 0.015 is stored just below the half cent
    expect(formatCost(5_000)).toBe('0.01');
    expect(formatCost(1_500)).toBe('0.00');
  });
});

describe('formatTokenCount', () => {
  it('renders count and cost estimate', () => {
    expect(formatTokenCount(1234567)).toBe('1,234,567 tokens (≈$3.70 at $3/1M tokens)');
    expect(formatTokenCount(4)).toBe('4 tokens (≈$0.00 at $3/1M tokens)');
  });
});
