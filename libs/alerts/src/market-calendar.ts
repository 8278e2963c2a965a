import { DateTime } from 'luxon';

export const WEEKDAY_CODES = ['MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT', 'SUN'] as const;
export type WeekdayCode = (typeof WEEKDAY_CODES)[number];

export type MarketPhase = 'PRE_MARKET' | 'OPEN' | 'POST_MARKET' | 'CLOSED';

export interface MarketCalendarOptions {
  timeZone: string;
  /** Local HH:mm, inclusive. */
  open: string;
  /** Local HH:mm, inclusive. */
  close: string;
  tradingDays: readonly WeekdayCode[];
  holidays?: Iterable<string>;
  sessionOpenWindowMinutes: number;
  preMarketMinutes?: number;
  postMarketMinutes?: number;
}

const parseClock = (value: string, key: string): number => {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new RangeError(`${key} must be HH:mm, got "${value}"`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new RangeError(`${key} must be HH:mm, got "${value}"`);
  }
  return hours * 60 + minutes;
};

export const isWeekdayCode = (value: string): value is WeekdayCode =>
  WEEKDAY_CODES.some((code) => code === value);

/**
 * Trading-hours gate for a single exchange. Every comparison happens in the
 * configured zone, never in the zone of the host process.
 */
export class MarketCalendar {
  private readonly openMinute: number;
  private readonly closeMinute: number;
  private readonly tradingWeekdays: Set<number>;
  private readonly holidays: Set<string>;

  constructor(private readonly options: MarketCalendarOptions) {
    if (!DateTime.now().setZone(options.timeZone).isValid) {
      throw new RangeError(`Unknown time zone "${options.timeZone}"`);
    }
    this.openMinute = parseClock(options.open, 'open');
    this.closeMinute = parseClock(options.close, 'close');
    if (this.openMinute >= this.closeMinute) {
      throw new RangeError('Market close must be later than market open');
    }
    // luxon numbers weekdays 1 (Monday) through 7 (Sunday).
    this.tradingWeekdays = new Set(options.tradingDays.map((code) => WEEKDAY_CODES.indexOf(code) + 1));
    this.holidays = new Set(options.holidays ?? []);
  }

  get timeZone(): string {
    return this.options.timeZone;
  }

  isTradingNow(now: Date): boolean {
    const local = this.toLocal(now);
    if (!this.isTradingDate(local)) return false;
    const minute = this.minuteOfDay(local);
    return minute >= this.openMinute && minute <= this.closeMinute;
  }

  /** True during the first `sessionOpenWindowMinutes` of a trading session. */
  isSessionOpenWindow(now: Date): boolean {
    if (!this.isTradingNow(now)) return false;
    const minute = this.minuteOfDay(this.toLocal(now));
    return minute < this.openMinute + this.options.sessionOpenWindowMinutes;
  }

  /** The opening instant of the local calendar day containing `now`. */
  sessionOpen(now: Date): Date {
    return this.atOpen(this.toLocal(now).startOf('day')).toJSDate();
  }

  sessionDate(now: Date): string {
    return this.toLocal(now).toFormat('yyyy-MM-dd');
  }

  phase(now: Date): MarketPhase {
    const local = this.toLocal(now);
    if (!this.isTradingDate(local)) return 'CLOSED';
    const minute = this.minuteOfDay(local);
    const preMarketStart = this.openMinute - (this.options.preMarketMinutes ?? 15);
    const postMarketEnd = this.closeMinute + (this.options.postMarketMinutes ?? 30);
    if (minute >= this.openMinute && minute <= this.closeMinute) return 'OPEN';
    if (minute >= preMarketStart && minute < this.openMinute) return 'PRE_MARKET';
    if (minute > this.closeMinute && minute <= postMarketEnd) return 'POST_MARKET';
    return 'CLOSED';
  }

  /** Start of the next session strictly after `now`, or null when none within a year. */
  nextOpen(now: Date): Date | null {
    const local = this.toLocal(now);
    let day = local.startOf('day');
    for (let i = 0; i <= 366; i += 1) {
      const candidate = this.atOpen(day);
      if (candidate.toMillis() > local.toMillis() && this.isTradingDate(candidate)) {
        return candidate.toJSDate();
      }
      day = day.plus({ days: 1 });
    }
    return null;
  }

  private atOpen(day: DateTime): DateTime {
    return day.set({ hour: Math.floor(this.openMinute / 60), minute: this.openMinute % 60 });
  }

  private toLocal(now: Date): DateTime {
    return DateTime.fromJSDate(now, { zone: this.options.timeZone });
  }

  private isTradingDate(local: DateTime): boolean {
    return this.tradingWeekdays.has(local.weekday) && !this.holidays.has(local.toFormat('yyyy-MM-dd'));
  }

  private minuteOfDay(local: DateTime): number {
    return local.hour * 60 + local.minute + local.second / 60 + local.millisecond / 60_000;
  }
}
