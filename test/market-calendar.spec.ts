import { describe, expect, it } from 'vitest';
import { MarketCalendar } from '@libs/alerts';
import type { MarketCalendarOptions } from '@libs/alerts';
import { ist } from './support/fakes';

const options: MarketCalendarOptions = {
  timeZone: 'Asia/Kolkata',
  open: '09:15',
  close: '15:30',
  tradingDays: ['MON', 'TUE', 'WED', 'THU', 'FRI'],
  holidays: ['2026-10-20'],
  sessionOpenWindowMinutes: 5,
};

describe('MarketCalendar', () => {
  const calendar = new MarketCalendar(options);

  it('treats open and close as inclusive', () => {
    expect(calendar.isTradingNow(ist('2026-10-19', '09:14'))).toBe(false);
    expect(calendar.isTradingNow(ist('2026-10-19', '09:15'))).toBe(true);
    expect(calendar.isTradingNow(ist('2026-10-19', '15:30'))).toBe(true);
    expect(calendar.isTradingNow(ist('2026-10-19', '15:31'))).toBe(false);
  });

  it('compares in the market zone regardless of the instant representation', () => {
    expect(calendar.isTradingNow(new Date('2026-10-19T03:45:00Z'))).toBe(true);
    expect(calendar.isTradingNow(new Date('2026-10-19T03:44:59Z'))).toBe(false);
  });

  it('is closed on weekends and configured holidays', () => {
    expect(calendar.isTradingNow(ist('2026-10-24', '11:00'))).toBe(false);
    expect(calendar.isTradingNow(ist('2026-10-20', '11:00'))).toBe(false);
    expect(calendar.isTradingNow(ist('2026-10-21', '11:00'))).toBe(true);
  });

  it('limits the session-open window to the first minutes of trading', () => {
    expect(calendar.isSessionOpenWindow(ist('2026-10-19', '09:15'))).toBe(true);
    expect(calendar.isSessionOpenWindow(ist('2026-10-19', '09:19'))).toBe(true);
    expect(calendar.isSessionOpenWindow(ist('2026-10-19', '09:20'))).toBe(false);
    expect(calendar.isSessionOpenWindow(ist('2026-10-19', '09:10'))).toBe(false);
  });

  it('places the session open on the local day of the instant', () => {
    expect(calendar.sessionOpen(ist('2026-10-19', '11:00'))).toEqual(ist('2026-10-19', '09:15'));
    expect(calendar.sessionOpen(new Date('2026-10-18T20:00:00Z'))).toEqual(ist('2026-10-19', '09:15'));
  });

  it('keys sessions by the local date', () => {
    expect(calendar.sessionDate(new Date('2026-10-18T20:00:00Z'))).toBe('2026-10-19');
    expect(calendar.sessionDate(ist('2026-10-19', '15:00'))).toBe('2026-10-19');
  });

  it('reports market phases', () => {
    expect(calendar.phase(ist('2026-10-19', '08:59'))).toBe('CLOSED');
    expect(calendar.phase(ist('2026-10-19', '09:00'))).toBe('PRE_MARKET');
    expect(calendar.phase(ist('2026-10-19', '12:00'))).toBe('OPEN');
    expect(calendar.phase(ist('2026-10-19', '15:45'))).toBe('POST_MARKET');
    expect(calendar.phase(ist('2026-10-19', '16:01'))).toBe('CLOSED');
    expect(calendar.phase(ist('2026-10-24', '12:00'))).toBe('CLOSED');
  });

  it('finds the next session open, skipping weekends and holidays', () => {
    expect(calendar.nextOpen(ist('2026-10-19', '08:00'))).toEqual(ist('2026-10-19', '09:15'));
    expect(calendar.nextOpen(ist('2026-10-19', '09:15'))).toEqual(ist('2026-10-21', '09:15'));
    expect(calendar.nextOpen(ist('2026-10-23', '16:00'))).toEqual(ist('2026-10-26', '09:15'));
  });

  it('rejects invalid configuration', () => {
    expect(() => new MarketCalendar({ ...options, timeZone: 'Mars/Olympus' })).toThrow('Unknown time zone');
    expect(() => new MarketCalendar({ ...options, open: '16:00' })).toThrow(RangeError);
    expect(() => new MarketCalendar({ ...options, close: '25:00' })).toThrow('close must be HH:mm');
  });
});
