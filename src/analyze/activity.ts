/**
 * Activity Patterns — when entries get written: weekday and hour histograms,
 * plus recency and spacing of entries.
 */

import { ActivityPatterns, EntryFrequency, JournalEvent } from "../types";
import { dayName, daysBetween, parseLocalDateTime } from "./dates";
import { mean } from "./trend";
import { gapsInDays, latestEventDay } from "./time-buckets";

export const NO_ACTIVITY_MESSAGE = "No activity data available";

/**
 * Key with the highest count. Ties go to the key inserted first, so callers
 * must fill the map in event order for the result to be reproducible.
 */
function argmax<K>(counts: Map<K, number>): K | null {
	let best: K | null = null;
	let bestCount = -Infinity;
	for (const [key, count] of counts) {
		if (count > bestCount) {
			best = key;
			bestCount = count;
		}
	}
	return best;
}

/** The event's timestamp, falling back to its date (hour 0). */
function eventMoment(event: JournalEvent): Date | null {
	const fromTimestamp = event.timestamp ? parseLocalDateTime(event.timestamp) : null;
	return fromTimestamp ?? parseLocalDateTime(event.date);
}

export function computeEntryFrequency(events: readonly JournalEvent[], today: Date): EntryFrequency | null {
	const latest = latestEventDay(events);
	if (!latest) return null;

	const averageGap = mean(gapsInDays(events));
	return {
		daysSinceLast: Math.max(0, daysBetween(latest, today)),
		averageGap,
		frequencyScore: Math.max(0, 100 - averageGap * 5),
	};
}

export function emptyActivityPatterns(): ActivityPatterns {
	return {
		message: NO_ACTIVITY_MESSAGE,
		activityByDay: {},
		activityByHour: {},
		mostActiveDay: null,
		peakHour: null,
		entryFrequency: null,
	};
}

export function analyzeActivityPatterns(events: readonly JournalEvent[], today: Date): ActivityPatterns {
	if (events.length === 0) return emptyActivityPatterns();

	const byDay = new Map<string, number>();
	const byHour = new Map<number, number>();

	for (const event of events) {
		const moment = eventMoment(event);
		if (!moment) continue;
		const day = dayName(moment);
		const hour = moment.getHours();
		byDay.set(day, (byDay.get(day) ?? 0) + 1);
		byHour.set(hour, (byHour.get(hour) ?? 0) + 1);
	}

	return {
		activityByDay: Object.fromEntries(byDay),
		activityByHour: Object.fromEntries([...byHour].map(([hour, count]) => [String(hour), count])),
		mostActiveDay: argmax(byDay),
		peakHour: argmax(byHour),
		entryFrequency: computeEntryFrequency(events, today),
	};
}
