/**
 * Parses human-friendly date strings into yyyy-MM-dd format and clock
 * times into HH:mm.
 * Dates: today, tomorrow, yesterday, relative (+3d/+2w/+1m),
 * day-of-week names (mon-sunday), month+day (jan15), and ISO format.
 * Times: 9:30, 09:30, 9am, 9:30pm, 21h.
 */

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;
const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;
const MERIDIEM_RE = /^(\d{1,2})(?::(\d{2}))?\s*(am|pm)$/;
const HOUR_RE = /^(\d{1,2})h$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd (local calendar day) */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Format a Date as HH:mm (local clock) */
export function formatTime(d: Date): string {
  return `${String(d.getHours()).padStart(2, '0')}:${String(d.getMinutes()).padStart(2, '0')}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/** Add months to a date (returns new Date) */
function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** Midnight (local) of the given moment's calendar day */
export function startOfDay(d: Date): Date {
  const r = new Date(d);
  r.setHours(0, 0, 0, 0);
  return r;
}

/**
 * Local moment for a yyyy-MM-dd date, at HH:mm when a time is given
 * and at midnight otherwise.
 */
export function toLocalDateTime(date: string, time?: string | null): Date {
  const [y, m, d] = date.split('-').map(Number);
  const [hh, mm] = time ? time.split(':').map(Number) : [0, 0];
  return new Date(y ?? 0, (m ?? 1) - 1, d ?? 1, hh ?? 0, mm ?? 0, 0, 0);
}

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** True for a real calendar date in yyyy-MM-dd form (rejects 2026-02-30) */
export function isValidDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;
  return formatDate(toLocalDateTime(input)) === input;
}

/** True for a 24-hour HH:mm time */
export function isValidTime(input: string): boolean {
  const m = /^(\d{2}):(\d{2})$/.exec(input);
  if (!m) return false;
  return Number(m[1]) < 24 && Number(m[2]) < 60;
}

function tryParseRelative(input: string, today: Date): string | null {
  const [, amount, unit] = RELATIVE_RE.exec(input) ?? [];
  if (!amount) return null;

  const count = parseInt(amount, 10);
  switch (unit) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return formatDate(addDays(today, daysUntil));
}

function tryParseMonthDay(input: string, today: Date): string | null {
  const [, monthName, dayText] = MONTH_DAY_RE.exec(input) ?? [];
  const month = monthName ? MONTH_MAP[monthName] : undefined;
  if (month === undefined || !dayText) return null;

  const day = parseInt(dayText, 10);

  const candidate = new Date(today.getFullYear(), month, day);
  if (candidate.getMonth() !== month || candidate.getDate() !== day) {
    return null; // Invalid date (e.g. feb30)
  }

  // If the date is in the past, use next year
  if (formatDate(candidate) < formatDate(today)) {
    candidate.setFullYear(candidate.getFullYear() + 1);
  }
  return formatDate(candidate);
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "today", "+3d", "friday", "jan15", "2026-03-01")
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  if (!input?.trim()) return null;

  const today = startOfDay(now ?? new Date());
  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? (isValidDate(input.trim()) ? input.trim() : null);
  }
}

function clock(hours: number, minutes: number): string | null {
  if (hours > 23 || minutes > 59) return null;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Parse a time of day into HH:mm. Returns null if the input can't be parsed.
 *
 * @param input - Time string (e.g. "9:30", "21:05", "9am", "7:45pm", "18h")
 */
export function parseTime(input: string | null | undefined): string | null {
  if (!input?.trim()) return null;
  const normalized = input.trim().toLowerCase();

  const [, clockHours, clockMinutes] = CLOCK_RE.exec(normalized) ?? [];
  if (clockHours && clockMinutes) return clock(parseInt(clockHours, 10), parseInt(clockMinutes, 10));

  const [, merHours, merMinutes, meridiem] = MERIDIEM_RE.exec(normalized) ?? [];
  if (merHours) {
    const hour = parseInt(merHours, 10);
    if (hour < 1 || hour > 12) return null;
    const minutes = merMinutes ? parseInt(merMinutes, 10) : 0;
    const base = hour % 12;
    return clock(meridiem === 'pm' ? base + 12 : base, minutes);
  }

  const [, hourOnly] = HOUR_RE.exec(normalized) ?? [];
  if (hourOnly) return clock(parseInt(hourOnly, 10), 0);

  return null;
}
