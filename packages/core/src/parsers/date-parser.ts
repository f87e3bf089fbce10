/**
 * Calendar-date parsing for due dates.
 *
 * The HTTP API only takes yyyy-MM-dd; the CLI also takes today, tomorrow,
 * yesterday, relative offsets (+3d/+2w/+1m) and day-of-week names.
 */

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE_RE = /^\+(\d+)([dwm])$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

/** Format a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/**
 * Accept a strict yyyy-MM-dd string naming a real calendar day.
 * Rejects 2026-02-30 and friends.
 */
export function parseIsoDate(input: string): string | null {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return null;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  const valid = d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
  return valid ? input : null;
}

export function isCalendarDate(input: string): boolean {
  return parseIsoDate(input) !== null;
}

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const n = Number(m[1]);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, n));
    case 'w': return formatDate(addDays(today, n * 7));
    case 'm': return formatDate(addMonths(today, n));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  if (!Object.hasOwn(DAY_MAP, input)) return null;
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return formatDate(addDays(today, daysUntil));
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd.
 * Returns null if the input can't be parsed.
 *
 * @param now - Override "today" for testing
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  if (!input?.trim()) return null;

  const today = new Date(now ?? new Date());
  today.setHours(0, 0, 0, 0);

  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? parseIsoDate(normalized);
  }
}
