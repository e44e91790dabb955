import { CalendarDate } from '../model/CalendarDate.js';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

type DatePart =
  | 'year'
  | 'shortYear'
  | 'month'
  | 'monthName'
  | 'day'
  | 'dayOfYear'
  | 'weekday'
  | 'weekdayName'
  | 'hour'
  | 'hour12'
  | 'meridiem'
  | 'minute'
  | 'second'
  | 'fraction'
  | 'offset';

interface Directive {
  readonly source: string;
  readonly part: DatePart;
}

const abbreviations = (names: readonly string[]): string => names.map((n) => n.slice(0, 3)).join('|');

// Ranges live in the alternations so that compact patterns such as %Y%m%d can
// backtrack to a valid split.
const DIRECTIVES: Readonly<Record<string, Directive>> = {
  Y: { source: '(\\d{4})', part: 'year' },
  y: { source: '(\\d{2})', part: 'shortYear' },
  m: { source: '(1[0-2]|0[1-9]|[1-9])', part: 'month' },
  b: { source: `(${abbreviations(MONTHS)})`, part: 'monthName' },
  B: { source: `(${MONTHS.join('|')})`, part: 'monthName' },
  d: { source: '(3[01]|[12]\\d|0[1-9]|[1-9])', part: 'day' },
  j: { source: '(36[0-6]|3[0-5]\\d|[12]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9])', part: 'dayOfYear' },
  a: { source: `(${abbreviations(WEEKDAYS)})`, part: 'weekdayName' },
  A: { source: `(${WEEKDAYS.join('|')})`, part: 'weekdayName' },
  w: { source: '([0-6])', part: 'weekday' },
  H: { source: '(2[0-3]|[01]\\d|\\d)', part: 'hour' },
  I: { source: '(1[0-2]|0[1-9]|[1-9])', part: 'hour12' },
  p: { source: '(am|pm)', part: 'meridiem' },
  M: { source: '([0-5]\\d|\\d)', part: 'minute' },
  S: { source: '(6[01]|[0-5]\\d|\\d)', part: 'second' },
  f: { source: '(\\d{1,6})', part: 'fraction' },
  z: { source: '([+-]\\d{2}:?[0-5]\\d(?::?[0-5]\\d(?:\\.\\d{1,6})?)?|z)', part: 'offset' },
};

/** Parts that fill the same slot of a date and so cannot appear together. */
const SLOT: Partial<Record<DatePart, DatePart>> = {
  shortYear: 'year',
  monthName: 'month',
  weekdayName: 'weekday',
  hour12: 'hour',
};

const slotOf = (part: DatePart): DatePart => SLOT[part] ?? part;

/** Two-digit years below this pivot belong to the 2000s, the rest to the 1900s. */
const SHORT_YEAR_PIVOT = 69;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A compiled `strftime`-style date pattern such as `%Y-%m-%d`.
 *
 * Matching is case-insensitive and must consume the whole input. Whitespace in
 * the pattern matches any run of whitespace. Weekday, time-of-day and UTC offset
 * directives are checked for range and then discarded. `%j` takes precedence over
 * month and day; missing date parts default to 1900-01-01.
 */
export class DatePattern {
  private constructor(
    readonly pattern: string,
    private readonly regex: RegExp,
    private readonly parts: readonly DatePart[],
  ) {}

  /** @throws SyntaxError on an unknown, incomplete or repeated directive */
  static compile(pattern: string): DatePattern {
    const parts: DatePart[] = [];
    let source = '';
    let i = 0;

    while (i < pattern.length) {
      const char = pattern.charAt(i);

      if (char === '%') {
        const code = pattern.charAt(i + 1);
        if (code === '') {
          throw new SyntaxError(`Date pattern '${pattern}' ends with an incomplete directive`);
        }
        if (code === '%') {
          source += '%';
        } else {
          const directive = DIRECTIVES[code];
          if (!directive) {
            throw new SyntaxError(`Unknown directive '%${code}' in date pattern '${pattern}'`);
          }
          if (parts.some((p) => slotOf(p) === slotOf(directive.part))) {
            throw new SyntaxError(`Directive '%${code}' repeats a date part in pattern '${pattern}'`);
          }
          parts.push(directive.part);
          source += directive.source;
        }
        i += 2;
      } else if (/\s/.test(char)) {
        source += '\\s+';
        while (i < pattern.length && /\s/.test(pattern.charAt(i))) i++;
      } else {
        source += escapeRegExp(char);
        i++;
      }
    }

    return new DatePattern(pattern, new RegExp(`^${source}$`, 'i'), parts);
  }

  /** Parse `text` into a calendar date. Returns `undefined` when it does not match or names an impossible date. */
  parse(text: string): CalendarDate | undefined {
    const match = this.regex.exec(text);
    if (!match) return undefined;

    let year = 1900;
    let month = 1;
    let day = 1;
    let dayOfYear: number | undefined;

    for (const [index, part] of this.parts.entries()) {
      const raw = match[index + 1] ?? '';
      const value = Number(raw);

      switch (part) {
        case 'year':
          year = value;
          break;
        case 'shortYear':
          year = value < SHORT_YEAR_PIVOT ? 2000 + value : 1900 + value;
          break;
        case 'month':
          month = value;
          break;
        case 'monthName':
          month = MONTHS.findIndex((m) => m.startsWith(raw.slice(0, 3).toLowerCase())) + 1;
          break;
        case 'day':
          day = value;
          break;
        case 'dayOfYear':
          dayOfYear = value;
          break;
        default:
          break;
      }
    }

    if (dayOfYear !== undefined) return CalendarDate.fromDayOfYear(year, dayOfYear);
    return CalendarDate.of(year, month, day);
  }
}
