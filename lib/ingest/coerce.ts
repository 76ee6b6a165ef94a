import { z } from "zod";

// Scalar coercers shared by the pipelines. None of them throw: a value that
// cannot be read degrades to null or the caller's default.

const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const toNum = z
  .union([z.number(), z.string(), z.boolean()])
  .transform((v) => {
    if (typeof v === "number") return v;
    if (typeof v === "boolean") return v ? 1 : 0;
    const s = v.trim();
    return DECIMAL_RE.test(s) ? Number(s) : Number.NaN;
  })
  .pipe(z.number().finite());

export function toFloat(value: unknown): number | null {
  const parsed = toNum.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function toInteger(value: unknown, fallback: number): number {
  const n = toFloat(value);
  if (n === null) return fallback;
  const t = Math.trunc(n);
  return t === 0 ? 0 : t; // no -0
}

export function toSafeString(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  if (typeof value === "number" && Number.isNaN(value)) return "";
  return String(value);
}

// ================= TIMESTAMPS =================

type DateParts = {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  ms: number;
  offsetMinutes: number; // east of UTC; 0 when the value carried no zone
};

type DateFormat = {
  name: string;
  re: RegExp;
  read: (m: RegExpExecArray) => DateParts | null;
};

const TIME = String.raw`(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?`;
const ZONE = String.raw`\s*(Z|UTC|GMT|[+-]\d{2}(?::?\d{2})?)?`;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, sept: 9, oct: 10, nov: 11, dec: 12,
  january: 1, february: 2, march: 3, april: 4, june: 6, july: 7,
  august: 8, september: 9, october: 10, november: 11, december: 12,
};

const WEEKDAYS = new Set([
  "mon", "tue", "tues", "wed", "thu", "thur", "thurs", "fri", "sat", "sun",
  "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
]);

function num(s: string | undefined, fallback = 0): number {
  return s === undefined || s === "" ? fallback : Number(s);
}

function millis(frac: string | undefined): number {
  return frac ? Number(frac.slice(0, 3).padEnd(3, "0")) : 0;
}

function zoneOffset(zone: string | undefined): number | null {
  if (!zone) return 0;
  const z = zone.toUpperCase();
  if (z === "Z" || z === "UTC" || z === "GMT") return 0;
  const m = /^([+-])(\d{2}):?(\d{2})?$/.exec(z);
  if (!m) return null;
  const mins = num(m[2]) * 60 + num(m[3]);
  if (mins > 14 * 60) return null;
  return m[1] === "-" ? -mins : mins;
}

function to24h(hour: number, meridiem: string | undefined): number | null {
  if (!meridiem) return hour;
  if (hour < 1 || hour > 12) return null;
  const pm = meridiem.toLowerCase() === "pm";
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

function partsFromTime(
  year: number,
  month: number,
  day: number,
  m: RegExpExecArray,
  at: number
): DateParts | null {
  const offsetMinutes = zoneOffset(m[at + 4]);
  if (offsetMinutes === null) return null;
  return {
    year,
    month,
    day,
    hour: num(m[at]),
    minute: num(m[at + 1]),
    second: num(m[at + 2]),
    ms: millis(m[at + 3]),
    offsetMinutes,
  };
}

/** Accepted layouts, tried in order before the textual fallback. */
export const DATE_FORMATS: readonly DateFormat[] = [
  {
    name: "iso-8601",
    re: new RegExp(String.raw`^(\d{4})-(\d{1,2})-(\d{1,2})${TIME}${ZONE}$`, "i"),
    read: (m) => partsFromTime(num(m[1]), num(m[2]), num(m[3]), m, 4),
  },
  {
    name: "ymd-slash",
    re: new RegExp(String.raw`^(\d{4})/(\d{1,2})/(\d{1,2})${TIME}${ZONE}$`, "i"),
    read: (m) => partsFromTime(num(m[1]), num(m[2]), num(m[3]), m, 4),
  },
  {
    name: "ymd-compact",
    re: /^(\d{4})(\d{2})(\d{2})$/,
    read: (m) => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]), hour: 0, minute: 0, second: 0, ms: 0, offsetMinutes: 0 }),
  },
  {
    // month first, as US exports write it
    name: "mdy",
    re: new RegExp(
      String.raw`^(\d{1,2})[/-](\d{1,2})[/-](\d{4}|\d{2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?\s*([ap]m)?)?${ZONE}$`,
      "i"
    ),
    read: (m) => {
      const hour = to24h(num(m[4]), m[7]);
      const offsetMinutes = zoneOffset(m[8]);
      if (hour === null || offsetMinutes === null) return null;
      const yy = num(m[3]);
      return {
        year: m[3].length === 2 ? 2000 + yy : yy,
        month: num(m[1]),
        day: num(m[2]),
        hour,
        minute: num(m[5]),
        second: num(m[6]),
        ms: 0,
        offsetMinutes,
      };
    },
  },
];

/**
 * Fallback for textual months: "Jan 15, 2024", "15 January 2024 10:30 PM",
 * "Mon, 15 Jan 2024 10:30:00 GMT". Needs a month name, a day and a 4 digit
 * year; any other word rejects the value.
 */
export function parseTextualDate(input: string): DateParts | null {
  const tokens = input
    .replace(/,/g, " ")
    .split(/\s+/)
    .filter(Boolean);
  let month: number | null = null;
  let day: number | null = null;
  let year: number | null = null;
  let hour = 0;
  let minute = 0;
  let second = 0;
  let ms = 0;
  let meridiem: string | undefined;
  let offsetMinutes = 0;

  for (const raw of tokens) {
    const t = raw.toLowerCase().replace(/\.$/, "");
    const time = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(am|pm)?$/.exec(t);
    if (time) {
      hour = num(time[1]);
      minute = num(time[2]);
      second = num(time[3]);
      ms = millis(time[4]);
      meridiem = time[5] ?? meridiem;
      continue;
    }
    if (t === "am" || t === "pm") {
      meridiem = t;
      continue;
    }
    if (Object.hasOwn(MONTHS, t) && month === null) {
      month = MONTHS[t];
      continue;
    }
    if (WEEKDAYS.has(t)) continue;
    const ordinal = /^(\d{1,2})(st|nd|rd|th)?$/.exec(t);
    if (ordinal && day === null) {
      day = num(ordinal[1]);
      continue;
    }
    if (/^\d{4}$/.test(t) && year === null) {
      year = num(t);
      continue;
    }
    const offset = zoneOffset(raw);
    if (/^(z|utc|gmt|[+-]\d{2}:?\d{2})$/.test(t) && offset !== null) {
      offsetMinutes = offset;
      continue;
    }
    return null;
  }

  if (month === null || day === null || year === null) return null;
  const h = to24h(hour, meridiem);
  if (h === null) return null;
  return { year, month, day, hour: h, minute, second, ms, offsetMinutes };
}

function toInstant(p: DateParts): Date | null {
  if (p.month < 1 || p.month > 12 || p.day < 1) return null;
  if (p.hour > 23 || p.minute > 59 || p.second > 59) return null;
  const wall = new Date(Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second, p.ms));
  // reject rollovers such as Feb 30
  if (wall.getUTCFullYear() !== p.year || wall.getUTCMonth() !== p.month - 1 || wall.getUTCDate() !== p.day) {
    return null;
  }
  return new Date(wall.getTime() - p.offsetMinutes * 60_000);
}

export function parseDateParts(input: string): DateParts | null {
  for (const fmt of DATE_FORMATS) {
    const m = fmt.re.exec(input);
    if (m) return fmt.read(m);
  }
  return parseTextualDate(input);
}

/**
 * Parses a free-form date/time into an ISO string in UTC. A value without a
 * zone is read as UTC, never as local time. Unreadable values give null.
 */
export function toUtcTimestamp(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value === null || value === undefined) return null;
  if (typeof value !== "string" && typeof value !== "number") return null;
  const s = String(value).trim();
  if (s === "") return null;
  try {
    const parts = parseDateParts(s);
    const instant = parts ? toInstant(parts) : null;
    return instant ? instant.toISOString() : null;
  } catch {
    return null;
  }
}
