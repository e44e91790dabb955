import { describe, it, expect } from 'vitest';
import { CalendarDate } from '../../../src/domain/model/CalendarDate.js';

describe('CalendarDate', () => {
  it('should build valid dates', () => {
    const date = CalendarDate.of(2018, 2, 23);
    expect(date?.toString()).toBe('2018-02-23');
    expect(JSON.stringify({ date })).toBe('{"date":"2018-02-23"}');
  });

  it('should refuse impossible dates', () => {
    expect(CalendarDate.of(2019, 2, 29)).toBeUndefined();
    expect(CalendarDate.of(2018, 4, 31)).toBeUndefined();
    expect(CalendarDate.of(2018, 0, 1)).toBeUndefined();
    expect(CalendarDate.of(0, 1, 1)).toBeUndefined();
    expect(CalendarDate.of(2018, 1.5, 1)).toBeUndefined();
  });

  it('should know leap years', () => {
    expect(CalendarDate.isLeapYear(2000)).toBe(true);
    expect(CalendarDate.isLeapYear(1900)).toBe(false);
    expect(CalendarDate.isLeapYear(2024)).toBe(true);
    expect(CalendarDate.daysInMonth(2024, 2)).toBe(29);
    expect(CalendarDate.daysInMonth(2023, 2)).toBe(28);
    expect(CalendarDate.daysInMonth(2023, 9)).toBe(30);
    expect(CalendarDate.daysInMonth(2023, 12)).toBe(31);
  });

  it('should read the UTC date of a Date', () => {
    expect(CalendarDate.fromDate(new Date('2018-02-23T23:30:00-05:00'))?.toString()).toBe('2018-02-24');
    expect(CalendarDate.fromDate(new Date(NaN))).toBeUndefined();
  });

  it('should convert epoch seconds', () => {
    expect(CalendarDate.fromEpochSeconds(1519344000)?.toString()).toBe('2018-02-23');
    expect(CalendarDate.fromEpochSeconds(NaN)).toBeUndefined();
  });

  it('should resolve a day of the year', () => {
    expect(CalendarDate.fromDayOfYear(2018, 1)?.toString()).toBe('2018-01-01');
    expect(CalendarDate.fromDayOfYear(2018, 54)?.toString()).toBe('2018-02-23');
    expect(CalendarDate.fromDayOfYear(2024, 60)?.toString()).toBe('2024-02-29');
    expect(CalendarDate.fromDayOfYear(2023, 366)?.toString()).toBe('2024-01-01');
    expect(CalendarDate.fromDayOfYear(2023, 0)).toBeUndefined();
  });

  it('should compare by value', () => {
    const a = CalendarDate.of(2018, 2, 23);
    const b = CalendarDate.of(2018, 2, 23);
    const c = CalendarDate.of(2018, 2, 24);
    expect(a && b && a.equals(b)).toBe(true);
    expect(a && c && a.equals(c)).toBe(false);
  });

  it('should convert back to midnight UTC', () => {
    expect(CalendarDate.of(2018, 2, 23)?.toDate().toISOString()).toBe('2018-02-23T00:00:00.000Z');
    expect(CalendarDate.of(45, 6, 1)?.toDate().getUTCFullYear()).toBe(45);
  });

  it('should be immutable', () => {
    expect(Object.isFrozen(CalendarDate.of(2018, 2, 23))).toBe(true);
  });
});
