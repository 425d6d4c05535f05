import { describe, it, expect } from '@jest/globals';

import {
  addDays,
  diffDays,
  eachDay,
  formatMoney,
  kmUntilOilChange,
  lastDayOfMonth,
  roundMoney,
  ValidationError,
} from '../index.js';
import { makeVehicle } from './support/factories.js';

describe('calendar dates', () => {
  it('validates real days only', () => {
    expect(diffDays('2024-02-29', '2024-03-01')).toBe(1);
    expect(() => diffDays('2023-02-29', '2023-03-01')).toThrow(ValidationError);
    expect(() => addDays('2024-1-05', 1)).toThrow(ValidationError);
  });

  it('does day arithmetic without timezone drift', () => {
    expect(addDays('2024-03-30', 3)).toBe('2024-04-02');
    expect(diffDays('2024-03-10', '2024-03-31')).toBe(21);
    expect(diffDays('2024-03-31', '2024-03-10')).toBe(-21);
  });

  it('throws ValidationError on malformed input', () => {
    expect(() => addDays('yesterday', 1)).toThrow(ValidationError);
  });

  it('lists month days', () => {
    expect(lastDayOfMonth(2024, 2)).toBe('2024-02-29');
    expect(eachDay('2024-02-27', '2024-03-01')).toEqual([
      '2024-02-27',
      '2024-02-28',
      '2024-02-29',
      '2024-03-01',
    ]);
  });
});

describe('money rounding', () => {
  it('rounds half to even', () => {
    expect(roundMoney('2.345').toFixed(2)).toBe('2.34');
    expect(roundMoney('2.355').toFixed(2)).toBe('2.36');
  });

  it('formats with two decimals', () => {
    expect(formatMoney(300)).toBe('300.00');
  });
});

describe('kmUntilOilChange', () => {
  it('floors at zero and passes through unknown schedules', () => {
    expect(kmUntilOilChange(makeVehicle({ odometerKm: 4200, nextOilChangeKm: 5000 }))).toBe(800);
    expect(kmUntilOilChange(makeVehicle({ odometerKm: 5200, nextOilChangeKm: 5000 }))).toBe(0);
    expect(kmUntilOilChange(makeVehicle({ nextOilChangeKm: null }))).toBeNull();
  });
});
