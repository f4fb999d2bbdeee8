import { describe, it, expect } from 'vitest';
import { hours_between, parse_timestamp } from './time.js';

describe('parse_timestamp', () => {
  it('keeps an explicit offset', () => {
    expect(parse_timestamp('2024-06-15T12:00:00+02:00')?.toISOString()).toBe('2024-06-15T10:00:00.000Z');
  });

  it('reads a naive date-time as UTC', () => {
    expect(parse_timestamp('2020-01-01 00:00:00')?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
    expect(parse_timestamp('2024-06-15T08:15')?.toISOString()).toBe('2024-06-15T08:15:00.000Z');
    expect(parse_timestamp('2024-06-15T08:15:30.250')?.toISOString()).toBe('2024-06-15T08:15:30.250Z');
  });

  it('accepts Z and a space separator', () => {
    expect(parse_timestamp('2024-06-15T12:00:00Z')?.toISOString()).toBe('2024-06-15T12:00:00.000Z');
    expect(parse_timestamp('2024-06-15 12:00:00.500-05:00')?.toISOString()).toBe('2024-06-15T17:00:00.500Z');
  });

  it('reads a bare date as UTC midnight', () => {
    expect(parse_timestamp('2024-06-15')?.toISOString()).toBe('2024-06-15T00:00:00.000Z');
  });

  it('copies Date inputs', () => {
    const input = new Date('2024-06-15T00:00:00Z');
    const parsed = parse_timestamp(input);
    expect(parsed).toEqual(input);
    expect(parsed).not.toBe(input);
  });

  it('returns null for values that are not instants', () => {
    expect(parse_timestamp('')).toBeNull();
    expect(parse_timestamp('not a date')).toBeNull();
    expect(parse_timestamp('2024-13-45T00:00:00')).toBeNull();
    expect(parse_timestamp(new Date(Number.NaN))).toBeNull();
  });

  it('rejects non-ISO strings the host would read in local time', () => {
    expect(parse_timestamp('06/15/2024 10:00')).toBeNull();
    expect(parse_timestamp('1')).toBeNull();
    expect(parse_timestamp('June 15, 2024 10:00')).toBeNull();
    expect(parse_timestamp('2024/06/15 10:00')).toBeNull();
    expect(parse_timestamp('Sat, 15 Jun 2024 10:00:00 GMT')).toBeNull();
  });

  it('rejects days that do not exist', () => {
    expect(parse_timestamp('2024-02-30')).toBeNull();
    expect(parse_timestamp('2023-02-29T00:00:00Z')).toBeNull();
    expect(parse_timestamp('2024-02-29T00:00:00Z')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });
});

describe('hours_between', () => {
  it('returns fractional hours', () => {
    expect(hours_between(new Date('2024-06-15T00:00:00Z'), new Date('2024-06-15T01:45:00Z'))).toBe(1.75);
  });

  it('is negative when the first instant is later', () => {
    expect(hours_between(new Date('2024-06-15T02:00:00Z'), new Date('2024-06-15T00:00:00Z'))).toBe(-2);
  });
});
