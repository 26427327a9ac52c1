/**
 * Date Utility Tests
 */

import {
  daysInMonth,
  fixedClock,
  isValidTimeZone,
  monthBounds,
  monthName,
  parseDateISO,
  systemClock,
  toDateISO,
  yearMonthOf,
} from '../src/lib/date';

describe('monthBounds', () => {
  it('should cover a 31-day month', () => {
    expect(monthBounds(2024, 1)).toEqual({ first: '2024-01-01', last: '2024-01-31' });
  });

  it('should cover a 30-day month', () => {
    expect(monthBounds(2025, 4)).toEqual({ first: '2025-04-01', last: '2025-04-30' });
  });

  it('should end February on the 29th in a leap year', () => {
    expect(monthBounds(2024, 2)).toEqual({ first: '2024-02-01', last: '2024-02-29' });
  });

  it('should end February on the 28th in a common year', () => {
    expect(monthBounds(2023, 2).last).toBe('2023-02-28');
    expect(monthBounds(1900, 2).last).toBe('1900-02-28');
    expect(monthBounds(2000, 2).last).toBe('2000-02-29');
  });

  it('should end December on the 31st without touching the next year', () => {
    expect(monthBounds(2025, 12)).toEqual({ first: '2025-12-01', last: '2025-12-31' });
    expect(monthBounds(9999, 12).last).toBe('9999-12-31');
  });

  it('should keep years below 100 as written', () => {
    expect(monthBounds(45, 2)).toEqual({ first: '0045-02-01', last: '0045-02-28' });
  });

  it('should fail fast on an invalid month or year', () => {
    expect(() => monthBounds(2025, 0)).toThrow(RangeError);
    expect(() => monthBounds(2025, 13)).toThrow(RangeError);
    expect(() => monthBounds(2025, 1.5)).toThrow(RangeError);
    expect(() => monthBounds(0, 1)).toThrow(RangeError);
    expect(() => monthBounds(10000, 1)).toThrow(RangeError);
  });
});

describe('daysInMonth', () => {
  it('should count days per month', () => {
    expect(daysInMonth(2025, 1)).toBe(31);
    expect(daysInMonth(2025, 6)).toBe(30);
    expect(daysInMonth(2028, 2)).toBe(29);
  });
});

describe('parseDateISO', () => {
  it('should split a valid date', () => {
    expect(parseDateISO('2026-10-19')).toEqual({ year: 2026, month: 10, day: 19 });
  });

  it('should reject impossible or malformed dates', () => {
    expect(() => parseDateISO('2025-02-29')).toThrow(RangeError);
    expect(() => parseDateISO('2025-13-01')).toThrow(RangeError);
    expect(() => parseDateISO('2025-1-01')).toThrow(RangeError);
    expect(() => parseDateISO('yesterday')).toThrow(RangeError);
  });

  it('should return year and month of a date', () => {
    expect(yearMonthOf('2024-02-29')).toEqual({ year: 2024, month: 2 });
  });
});

describe('toDateISO', () => {
  it('should zero-pad every part', () => {
    expect(toDateISO(2025, 3, 7)).toBe('2025-03-07');
  });
});

describe('monthName', () => {
  it('should name months in English', () => {
    expect(monthName(1)).toBe('January');
    expect(monthName(3)).toBe('March');
    expect(monthName(12)).toBe('December');
  });

  it('should reject out-of-range months', () => {
    expect(() => monthName(13)).toThrow(RangeError);
  });
});

describe('systemClock', () => {
  const instant = new Date('2026-01-31T23:30:00Z');

  it('should resolve today in the configured timezone', () => {
    expect(systemClock('UTC', () => instant).today()).toBe('2026-01-31');
    expect(systemClock('Asia/Tokyo', () => instant).today()).toBe('2026-02-01');
    expect(systemClock('America/New_York', () => instant).today()).toBe('2026-01-31');
  });

  it('should read the time source on every call', () => {
    let now = new Date('2026-03-31T12:00:00Z');
    const clock = systemClock('UTC', () => now);

    expect(clock.today()).toBe('2026-03-31');
    now = new Date('2026-04-01T00:00:01Z');
    expect(clock.today()).toBe('2026-04-01');
  });
});

describe('fixedClock', () => {
  it('should always return the pinned date', () => {
    const clock = fixedClock('2026-03-15');
    expect(clock.today()).toBe('2026-03-15');
    expect(clock.today()).toBe('2026-03-15');
  });

  it('should reject an invalid date', () => {
    expect(() => fixedClock('2026-02-30')).toThrow(RangeError);
  });
});

describe('isValidTimeZone', () => {
  it('should accept IANA names and reject unknown ones', () => {
    expect(isValidTimeZone('Europe/Madrid')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
