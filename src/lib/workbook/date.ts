import { DateParseError } from "./errors";

export const DEFAULT_INPUT_DATE_FORMAT = "%Y-%m-%d";

const MS_PER_DAY = 86_400_000;
// Day zero of the 1900 date system. Anchoring on 1899-12-30 rather than
// 1900-01-01 absorbs the phantom 1900-02-29 for every date after March 1900.
const EXCEL_EPOCH = Date.UTC(1899, 11, 30);

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

/** Whole-day serial of the UTC calendar date of `d` (1900 date system). */
export function toExcelSerial(d: Date): number {
  const utcMidnight = utcDate(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
  return Math.round((utcMidnight.getTime() - EXCEL_EPOCH) / MS_PER_DAY);
}

/** Midnight UTC; years below 100 are taken literally. */
export function utcDate(year: number, monthIndex: number, day: number): Date {
  const d = new Date(0);
  d.setUTCFullYear(year, monthIndex, day);
  d.setUTCHours(0, 0, 0, 0);
  return d;
}

interface Fields {
  year?: number;
  month?: number;
  day?: number;
  dayOfYear?: number;
}

type Directive = {
  pattern: RegExp;
  apply: (raw: string, f: Fields) => string | undefined;
};

function numeric(
  digits: string,
  key: keyof Fields,
  min: number,
  max: number
): Directive {
  return {
    pattern: new RegExp(`^\\d{${digits}}`),
    apply: (raw, f) => {
      const n = Number(raw);
      if (n < min || n > max) return `${key} ${raw} out of range`;
      f[key] = n;
      return undefined;
    },
  };
}

const timePart = (max: number): Directive => ({
  pattern: /^\d{1,2}/,
  apply: (raw) => (Number(raw) > max ? `time field ${raw} out of range` : undefined),
});

const monthName: Directive = {
  pattern: /^[A-Za-z]+/,
  apply: (raw, f) => {
    const lower = raw.toLowerCase();
    const idx = MONTHS.findIndex((m) => m === lower || m.slice(0, 3) === lower);
    if (idx < 0) return `unknown month name '${raw}'`;
    f.month = idx + 1;
    return undefined;
  },
};

const DIRECTIVES: Record<string, Directive> = {
  Y: numeric("4", "year", 1, 9999),
  y: {
    pattern: /^\d{2}/,
    apply: (raw, f) => {
      const n = Number(raw);
      f.year = n < 69 ? 2000 + n : 1900 + n;
      return undefined;
    },
  },
  m: numeric("1,2", "month", 1, 12),
  d: numeric("1,2", "day", 1, 31),
  j: numeric("1,3", "dayOfYear", 1, 366),
  b: monthName,
  B: monthName,
  H: timePart(23),
  M: timePart(59),
  S: timePart(61),
};

/**
 * Parse `input` with a strptime-style `pattern` into a UTC calendar date.
 * Supports %Y %y %m %d %j %b %B %H %M %S and %%; time fields are validated
 * but do not affect the result. The whole input must match.
 */
export function parseDate(input: string, pattern = DEFAULT_INPUT_DATE_FORMAT): Date {
  const fail = (reason: string) => new DateParseError(input, pattern, reason);
  const fields: Fields = {};
  let rest = input;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== "%") {
      if (rest[0] !== ch) throw fail(`expected '${ch}' at '${rest}'`);
      rest = rest.slice(1);
      continue;
    }
    const code = pattern[++i];
    if (code === undefined) throw fail("pattern ends with a lone '%'");
    if (code === "%") {
      if (rest[0] !== "%") throw fail(`expected '%' at '${rest}'`);
      rest = rest.slice(1);
      continue;
    }
    const directive = DIRECTIVES[code];
    if (!directive) throw fail(`unsupported directive '%${code}'`);
    const m = rest.match(directive.pattern);
    if (!m) throw fail(`'%${code}' does not match '${rest}'`);
    const problem = directive.apply(m[0], fields);
    if (problem) throw fail(problem);
    rest = rest.slice(m[0].length);
  }
  if (rest) throw fail(`unconverted data remains: '${rest}'`);

  const year = fields.year ?? 1900;
  if (fields.dayOfYear !== undefined && fields.month === undefined && fields.day === undefined) {
    const d = utcDate(year, 0, fields.dayOfYear);
    if (d.getUTCFullYear() !== year) throw fail(`day of year ${fields.dayOfYear} out of range`);
    return d;
  }
  const month = fields.month ?? 1;
  const day = fields.day ?? 1;
  const d = utcDate(year, month - 1, day);
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day)
    throw fail(`day ${day} is out of range for month ${month}`);
  return d;
}
