/**
 * Calendar helpers. Journal dates are naive local dates ("YYYY-MM-DD") and
 * timestamps are naive local date-times, so everything here works in local
 * time and never routes a date-only string through `new Date(string)`, which
 * would read it as UTC midnight.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DAY_NAMES = [
	"Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday",
] as const;

export type DayName = typeof DAY_NAMES[number];

const LOCAL_DATE_TIME_RE =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?$/;

/**
 * Parse "YYYY-MM-DD" or a naive "YYYY-MM-DDTHH:mm[:ss[.ffffff]]" as local
 * time. Strings with a zone designator fall back to the built-in parser.
 * Returns null for anything unparseable.
 */
export function parseLocalDateTime(value: string): Date | null {
	const m = LOCAL_DATE_TIME_RE.exec(value.trim());
	if (!m) {
		if (!/(?:[zZ]|[+-]\d{2}:?\d{2})$/.test(value.trim())) return null;
		const d = new Date(value);
		return isNaN(d.getTime()) ? null : d;
	}
	const [, y, mo, d, h = "0", mi = "0", s = "0", frac = ""] = m;
	const ms = frac ? Math.floor(Number(`0.${frac}`) * 1000) : 0;
	const date = new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s), ms);
	// Reject rollovers such as 2025-02-30
	if (date.getMonth() !== Number(mo) - 1 || date.getDate() !== Number(d)) return null;
	return date;
}

/** Local midnight of the calendar day in a date or date-time string. */
export function parseCalendarDate(value: string): Date | null {
	const parsed = parseLocalDateTime(value);
	return parsed ? startOfDay(parsed) : null;
}

export function startOfDay(d: Date): Date {
	return new Date(d.getFullYear(), d.getMonth(), d.getDate());
}

export function addDays(d: Date, days: number): Date {
	return new Date(d.getFullYear(), d.getMonth(), d.getDate() + days);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: Date, to: Date): number {
	return Math.round((startOfDay(to).getTime() - startOfDay(from).getTime()) / MS_PER_DAY);
}

function wallClockMs(d: Date): number {
	return Date.UTC(d.getFullYear(), d.getMonth(), d.getDate(), d.getHours(), d.getMinutes(), d.getSeconds(), d.getMilliseconds());
}

/**
 * Full 24-hour days elapsed from `from` to `to`, on local wall-clock time so a
 * DST shift does not move the count. Rounds toward the earlier day, so 23:00
 * to 01:00 the next morning is 0.
 */
export function elapsedWholeDays(from: Date, to: Date): number {
	return Math.floor((wallClockMs(to) - wallClockMs(from)) / MS_PER_DAY);
}

export function formatDate(d: Date): string {
	return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}-${String(d.getDate()).padStart(2, "0")}`;
}

/** Local date-time without zone designator, e.g. "2025-06-15T09:05:00". */
export function formatLocalDateTime(d: Date): string {
	const time = [d.getHours(), d.getMinutes(), d.getSeconds()]
		.map((n) => String(n).padStart(2, "0"))
		.join(":");
	return `${formatDate(d)}T${time}`;
}

/**
 * Sunday-based week of year, "YYYY-WUU". Days before the year's first Sunday
 * fall in week 00, so keys sort chronologically as plain strings.
 */
export function weekKey(d: Date): string {
	const jan1 = new Date(d.getFullYear(), 0, 1);
	const dayOfYear = daysBetween(jan1, d);
	const week = Math.floor((dayOfYear + 7 - d.getDay()) / 7);
	return `${d.getFullYear()}-W${String(week).padStart(2, "0")}`;
}

export function monthKey(d: Date): string {
	return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}`;
}

export function dayName(d: Date): DayName {
	return DAY_NAMES[d.getDay()];
}
