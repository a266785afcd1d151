import { describe, it, expect } from 'vitest';
import { parseDuration, isPositiveDuration } from '../duration.js';

describe('parseDuration', () => {
  it('should parse single unit durations', () => {
    expect(parseDuration('10m')).toBe(600_000);
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('2h')).toBe(7_200_000);
  });

  it('should parse compound and fractional durations', () => {
    expect(parseDuration('1h30m')).toBe(5_400_000);
    expect(parseDuration('1.5s')).toBe(1500);
  });

  it('should accept a bare zero and signed values', () => {
    expect(parseDuration('0')).toBe(0);
    expect(parseDuration('-5m')).toBe(-300_000);
  });

  it('should return null for invalid durations', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('10')).toBeNull();
    expect(parseDuration('ten minutes')).toBeNull();
    expect(parseDuration('10m5')).toBeNull();
    expect(parseDuration(' 10m ')).toBeNull();
  });
});

describe('isPositiveDuration', () => {
  it('should require a duration greater than zero', () => {
    expect(isPositiveDuration('10m')).toBe(true);
    expect(isPositiveDuration('0s')).toBe(false);
    expect(isPositiveDuration('-1m')).toBe(false);
    expect(isPositiveDuration('soon')).toBe(false);
  });
});
