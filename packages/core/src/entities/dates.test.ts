import { describe, it, expect } from 'vitest';
import { compareOptionalDates, comparePartialDates, intervalsOverlap, isPartialDate } from './dates.js';

describe('Partial dates', () => {
  it('should accept year, year-month and full dates', () => {
    expect(isPartialDate('1890')).toBe(true);
    expect(isPartialDate('1890-04')).toBe(true);
    expect(isPartialDate('1890-04-30')).toBe(true);
  });

  it('should reject malformed dates', () => {
    expect(isPartialDate('1890-13')).toBe(false);
    expect(isPartialDate('1890-4')).toBe(false);
    expect(isPartialDate('90')).toBe(false);
    expect(isPartialDate('1890-04-32')).toBe(false);
    expect(isPartialDate('circa 1890')).toBe(false);
  });

  it('should compare on the shared precision only', () => {
    expect(comparePartialDates('1990', '1990-05-01')).toBe(0);
    expect(comparePartialDates('1989-12-31', '1990')).toBe(-1);
    expect(comparePartialDates('1990-06', '1990-05-31')).toBe(1);
  });

  it('should order undated values last', () => {
    const dates = ['1950', null, '1920-07', null, '1920'];
    expect([...dates].sort(compareOptionalDates)).toEqual(['1920', '1920-07', '1950', null, null]);
  });
});

describe('intervalsOverlap', () => {
  it('should treat intervals as closed', () => {
    expect(intervalsOverlap({ start: '1900', end: '1910' }, { start: '1910', end: '1920' })).toBe(true);
  });

  it('should detect disjoint periods', () => {
    expect(intervalsOverlap({ start: '1900', end: '1909' }, { start: '1910', end: null })).toBe(false);
    expect(intervalsOverlap({ start: '1905', end: null }, { start: null, end: '1904' })).toBe(false);
  });

  it('should treat missing bounds as open-ended', () => {
    expect(intervalsOverlap({ start: null, end: null }, { start: '1950', end: '1960' })).toBe(true);
    expect(intervalsOverlap({ start: '1950', end: null }, { start: '2001', end: null })).toBe(true);
  });
});
