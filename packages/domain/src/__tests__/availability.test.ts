/**
 * Overlap Rule Tests
 *
 * The pure interval test behind availability, checked on fixed boundary
 * cases and against a day-by-day reference over seeded random intervals.
 */

import { describe, it, expect } from '@jest/globals';

import { addDays, eachDay, intervalsOverlap, isValidInterval } from '../index.js';
import type { DateInterval } from '../index.js';
import { SeededRng } from './support/seeded-rng.js';

const BASE = '2024-03-01';

function randomInterval(rng: SeededRng): DateInterval {
  const start = rng.nextInt(0, 40);
  const length = rng.nextInt(0, 10);
  return { startDate: addDays(BASE, start), endDate: addDays(BASE, start + length) };
}

function sharesADay(a: DateInterval, b: DateInterval): boolean {
  const days = new Set(eachDay(a.startDate, a.endDate));
  return eachDay(b.startDate, b.endDate).some((d) => days.has(d));
}

describe('intervalsOverlap (default rule)', () => {
  it('treats touching boundary days as overlap', () => {
    const existing = { startDate: '2024-03-01', endDate: '2024-03-05' };
    expect(intervalsOverlap(existing, { startDate: '2024-03-05', endDate: '2024-03-08' })).toBe(true);
    expect(intervalsOverlap(existing, { startDate: '2024-02-25', endDate: '2024-03-01' })).toBe(true);
  });

  it('does not overlap disjoint intervals', () => {
    const existing = { startDate: '2024-03-01', endDate: '2024-03-05' };
    expect(intervalsOverlap(existing, { startDate: '2024-03-06', endDate: '2024-03-08' })).toBe(false);
  });

  it('matches a shared-day reference on random intervals', () => {
    const rng = new SeededRng(20240301);
    for (let i = 0; i < 500; i++) {
      const a = randomInterval(rng);
      const b = randomInterval(rng);
      expect(intervalsOverlap(a, b)).toBe(sharesADay(a, b));
      expect(intervalsOverlap(b, a)).toBe(intervalsOverlap(a, b));
    }
  });
});

describe('intervalsOverlap (same-day turnover)', () => {
  it('frees the vehicle on the day it returns', () => {
    const existing = { startDate: '2024-03-01', endDate: '2024-03-05' };
    const requested = { startDate: '2024-03-05', endDate: '2024-03-07' };
    expect(intervalsOverlap(existing, requested, false)).toBe(true);
    expect(intervalsOverlap(existing, requested, true)).toBe(false);
  });

  it('still blocks a real overlap', () => {
    const existing = { startDate: '2024-03-01', endDate: '2024-03-05' };
    expect(intervalsOverlap(existing, { startDate: '2024-03-04', endDate: '2024-03-07' }, true)).toBe(
      true,
    );
  });

  it('never reports more overlap than the default rule', () => {
    const rng = new SeededRng(7);
    for (let i = 0; i < 500; i++) {
      const a = randomInterval(rng);
      const b = randomInterval(rng);
      if (intervalsOverlap(a, b, true)) expect(intervalsOverlap(a, b, false)).toBe(true);
    }
  });
});

describe('isValidInterval', () => {
  it('accepts same-day and forward intervals only', () => {
    expect(isValidInterval({ startDate: '2024-03-01', endDate: '2024-03-01' })).toBe(true);
    expect(isValidInterval({ startDate: '2024-03-02', endDate: '2024-03-01' })).toBe(false);
  });
});
