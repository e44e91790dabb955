const MS_PER_SECOND = 1000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** An immutable calendar date without time of day or time zone. Canonical value of `date` fields. */
export class CalendarDate {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {
    Object.freeze(this);
  }

  /** Build a date from its parts (month is 1-based). Returns `undefined` for impossible dates such as Feb 30. */
  static of(year: number, month: number, day: number): CalendarDate | undefined {
    if (![year, month, day].every(Number.isInteger)) return undefined;
    if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) return undefined;
    if (day > CalendarDate.daysInMonth(year, month)) return undefined;
    return new CalendarDate(year, month, day);
  }

  /** Date component of a date-time, read in UTC. */
  static fromDate(date: Date): CalendarDate | undefined {
    if (isNaN(date.getTime())) return undefined;
    return CalendarDate.of(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
  }

  /** UTC calendar date of a Unix timestamp given in seconds. */
  static fromEpochSeconds(seconds: number): CalendarDate | undefined {
    if (!Number.isFinite(seconds)) return undefined;
    return CalendarDate.fromDate(new Date(seconds * MS_PER_SECOND));
  }

  /** Date of the `dayOfYear`-th day (1-based) of `year`. Day 366 of a common year rolls over to January 1st. */
  static fromDayOfYear(year: number, dayOfYear: number): CalendarDate | undefined {
    if (!Number.isInteger(dayOfYear) || dayOfYear < 1) return undefined;

    let y = year;
    let month = 1;
    let day = dayOfYear;
    while (day > CalendarDate.daysInMonth(y, month)) {
      day -= CalendarDate.daysInMonth(y, month);
      month += 1;
      if (month > 12) {
        month = 1;
        y += 1;
      }
    }
    return CalendarDate.of(y, month, day);
  }

  static daysInMonth(year: number, month: number): number {
    if (month === 2) return CalendarDate.isLeapYear(year) ? 29 : 28;
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
  }

  static isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  }

  equals(other: CalendarDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  /** Midnight UTC of this date. */
  toDate(): Date {
    const date = new Date(Date.UTC(this.year, this.month - 1, this.day));
    // Date.UTC maps years 0-99 onto 1900-1999.
    date.setUTCFullYear(this.year);
    return date;
  }

  /** ISO 8601 form, `YYYY-MM-DD`. */
  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
