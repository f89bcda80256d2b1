/**
 * Time Bucketing — groups journal events into calendar buckets and measures
 * the spacing between entries.
 *
 * Every function tolerates out-of-order input (dates are sorted before any
 * gap or span computation) and silently skips events whose date cannot be
 * parsed. Empty input yields empty/zero results.
 */

import { JournalEvent } from "../types";
import { daysBetween, formatDate, monthKey, parseCalendarDate, weekKey } from "./dates";

export interface DatedEvent {
	event: JournalEvent;
	day: Date;
}

/** Pair each event with its parsed calendar day, dropping undated events. */
export function withCalendarDays(events: readonly JournalEvent[]): DatedEvent[] {
	const dated: DatedEvent[] = [];
	for (const event of events) {
		const day = parseCalendarDate(event.date);
		if (day) dated.push({ event, day });
	}
	return dated;
}

export function sortedEventDays(events: readonly JournalEvent[]): Date[] {
	return withCalendarDays(events)
		.map((d) => d.day)
		.sort((a, b) => a.getTime() - b.getTime());
}

/** Whole-day gaps between consecutive entries, in chronological order. */
export function gapsInDays(events: readonly JournalEvent[]): number[] {
	const days = sortedEventDays(events);
	const gaps: number[] = [];
	for (let i = 1; i < days.length; i++) {
		gaps.push(daysBetween(days[i - 1], days[i]));
	}
	return gaps;
}

/** Unique calendar days with at least one entry. */
export function countTrackedDays(events: readonly JournalEvent[]): number {
	return new Set(withCalendarDays(events).map((d) => formatDate(d.day))).size;
}

/** Days between the earliest and latest entry, divided by seven. */
export function weeksSpanned(events: readonly JournalEvent[]): number {
	const days = sortedEventDays(events);
	if (days.length < 2) return 0;
	return daysBetween(days[0], days[days.length - 1]) / 7;
}

/** Most recent calendar day with an entry, or null for an empty journal. */
export function latestEventDay(events: readonly JournalEvent[]): Date | null {
	const days = sortedEventDays(events);
	return days.length > 0 ? days[days.length - 1] : null;
}

// ── Bucketing ──────────────────────────────────────────

/**
 * Group values under a bucket key derived from each event's calendar day.
 * Keys come back in ascending order; within a bucket, input order is kept.
 */
function bucketBy<T>(
	events: readonly JournalEvent[],
	keyOf: (day: Date) => string,
	valueOf: (event: JournalEvent) => T,
): Map<string, T[]> {
	const buckets: Map<string, T[]> = new Map();
	for (const { event, day } of withCalendarDays(events)) {
		const key = keyOf(day);
		const bucket = buckets.get(key);
		if (bucket) {
			bucket.push(valueOf(event));
		} else {
			buckets.set(key, [valueOf(event)]);
		}
	}
	return new Map([...buckets.entries()].sort((a, b) => a[0].localeCompare(b[0])));
}

/** Values grouped by Sunday-based week key ("YYYY-WUU"). */
export function groupByWeek<T>(events: readonly JournalEvent[], valueOf: (event: JournalEvent) => T): Map<string, T[]> {
	return bucketBy(events, weekKey, valueOf);
}

/** Entry counts per "YYYY-MM". */
export function countByMonth(events: readonly JournalEvent[]): Record<string, number> {
	const counts: Record<string, number> = {};
	for (const [month, items] of bucketBy(events, monthKey, () => 1)) {
		counts[month] = items.length;
	}
	return counts;
}

/** The last `n` items; empty for n ≤ 0 (plain slice(-0) would return everything). */
export function lastN<T>(items: readonly T[], n: number): T[] {
	return n > 0 ? items.slice(-n) : [];
}
