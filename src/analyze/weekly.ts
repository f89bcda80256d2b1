/**
 * Weekly Report — a focused look at the trailing week: mood label,
 * achievement and challenge entries verbatim, goals touched on, and a short
 * list of suggestions for the week ahead.
 */

import { AnalyticsConfig } from "../settings/types";
import { Goal, JournalEvent, WeeklyMoodSummary, WeeklyReport } from "../types";
import { addDays, formatDate, parseCalendarDate } from "./dates";
import { TextSignalExtractor } from "./signals";

const MAX_WEEKLY_ACHIEVEMENTS = 5;
const MAX_WEEKLY_CHALLENGES = 3;
const MAX_SUGGESTIONS = 3;
const GOAL_KEYWORD_COUNT = 3;
const MIN_WEEKLY_ENTRIES = 3;
const RECURRING_CHALLENGE_THRESHOLD = 2;

export const DEFAULT_FOCUS = "Continue current positive momentum";

/**
 * Events dated after `today − windowDays`: with the default 7-day window,
 * today and the six days before it. Undated events are left out.
 */
export function eventsInWindow(events: readonly JournalEvent[], today: Date, windowDays: number): JournalEvent[] {
	const boundary = addDays(today, -windowDays).getTime();
	return events.filter((e) => {
		const day = parseCalendarDate(e.date);
		return day !== null && day.getTime() > boundary;
	});
}

export function summarizeWeeklyMood(events: readonly JournalEvent[], extractor: TextSignalExtractor): WeeklyMoodSummary {
	if (events.length === 0) return "No entries this week";

	let positive = 0;
	let negative = 0;
	for (const event of events) {
		const signal = extractor.moodSignal(event.entry, extractor.lexicon.weekly);
		positive += signal.positive;
		negative += signal.negative;
	}

	if (positive > negative) return "Predominantly positive";
	if (negative > positive) return "Some challenges noted";
	return "Balanced week";
}

export function extractWeeklyAchievements(events: readonly JournalEvent[], extractor: TextSignalExtractor): string[] {
	return events
		.filter((e) => extractor.containsAny(e.entry, extractor.lexicon.weekly.achievement))
		.map((e) => e.entry)
		.slice(0, MAX_WEEKLY_ACHIEVEMENTS);
}

export function extractWeeklyChallenges(events: readonly JournalEvent[], extractor: TextSignalExtractor): string[] {
	return events
		.filter((e) => extractor.containsAny(e.entry, extractor.lexicon.weekly.challenge))
		.map((e) => e.entry)
		.slice(0, MAX_WEEKLY_CHALLENGES);
}

/** First three words of the goal text, lower-cased. */
export function goalKeywords(goal: Goal): string[] {
	return goal.text.toLowerCase().split(/\s+/).filter(Boolean).slice(0, GOAL_KEYWORD_COUNT);
}

/**
 * Texts of goals with any of their first three words appearing (as a
 * substring) in one of the entries.
 */
export function identifyGoalsMentioned(events: readonly JournalEvent[], goals: readonly Goal[]): string[] {
	const entries = events.map((e) => e.entry.toLowerCase());
	return goals
		.filter((goal) => {
			const keywords = goalKeywords(goal);
			return entries.some((entry) => keywords.some((k) => entry.includes(k)));
		})
		.map((goal) => goal.text);
}

export function suggestNextWeekFocus(
	events: readonly JournalEvent[],
	goals: readonly Goal[],
	extractor: TextSignalExtractor,
	mentioned: readonly string[] = identifyGoalsMentioned(events, goals),
): string[] {
	const suggestions: string[] = [];

	if (events.length < MIN_WEEKLY_ENTRIES) {
		suggestions.push("Increase daily reflection consistency");
	}

	const neglected = goals.find((g) => g.status === "active" && !mentioned.includes(g.text));
	if (neglected) {
		suggestions.push(`Work on neglected goal: ${neglected.text}`);
	}

	const recurring = events.filter((e) =>
		extractor.containsAny(e.entry, extractor.lexicon.weekly.recurringChallenge)
	);
	if (recurring.length > RECURRING_CHALLENGE_THRESHOLD) {
		suggestions.push("Address recurring challenges with specific action plans");
	}

	return suggestions.length > 0 ? suggestions.slice(0, MAX_SUGGESTIONS) : [DEFAULT_FOCUS];
}

export function buildWeeklyReport(
	events: readonly JournalEvent[],
	goals: readonly Goal[],
	extractor: TextSignalExtractor,
	today: Date,
	config: Pick<AnalyticsConfig, "weeklyWindowDays">,
): WeeklyReport {
	const windowDays = Math.max(1, config.weeklyWindowDays);
	const recent = eventsInWindow(events, today, windowDays);
	const mentioned = identifyGoalsMentioned(recent, goals);

	return {
		period: "Weekly Report",
		dateRange: `${formatDate(addDays(today, -(windowDays - 1)))} to ${formatDate(today)}`,
		entriesThisWeek: recent.length,
		moodSummary: summarizeWeeklyMood(recent, extractor),
		achievements: extractWeeklyAchievements(recent, extractor),
		challenges: extractWeeklyChallenges(recent, extractor),
		goalsWorkedOn: mentioned,
		nextWeekFocus: suggestNextWeekFocus(recent, goals, extractor, mentioned),
	};
}
