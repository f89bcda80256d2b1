/**
 * Per-entry pattern tracking. Runs when an entry is recorded, not when a
 * report is generated: a rolling window of mood scores, a concerning-mood
 * check over the tail of that window, and keyword counts for career entries.
 */

import { CAREER_FOCUS_AREAS, CareerFocusArea } from "../lexicon";
import { JournalEvent } from "../types";
import { lastN } from "./time-buckets";
import { TextSignalExtractor } from "./signals";

export const MOOD_TRENDS_PATTERN = "mood_trends";
export const CAREER_FOCUS_PATTERN = "career_focus";

export const MOOD_TREND_LIMIT = 30;
const CONCERNING_RUN_LENGTH = 5;
const CAREER_CONTEXT_EVENTS = 5;

export interface MoodTrendPattern {
	scores: number[];
	/** Calendar date of each score, parallel to `scores`. */
	dates: string[];
}

/**
 * Read a stored mood_trends payload. Anything that is not a pair of
 * equal-length score/date arrays starts a fresh series.
 */
export function readMoodTrend(data: unknown): MoodTrendPattern {
	if (typeof data !== "object" || data === null) return { scores: [], dates: [] };
	const scores: unknown[] = "scores" in data && Array.isArray(data.scores) ? data.scores : [];
	const dates: unknown[] = "dates" in data && Array.isArray(data.dates) ? data.dates : [];
	if (scores.length !== dates.length) return { scores: [], dates: [] };
	if (!scores.every((s): s is number => typeof s === "number")) return { scores: [], dates: [] };
	if (!dates.every((d): d is string => typeof d === "string")) return { scores: [], dates: [] };
	return { scores: [...scores], dates: [...dates] };
}

export function appendMoodScore(
	pattern: MoodTrendPattern,
	score: number,
	date: string,
	limit = MOOD_TREND_LIMIT,
): MoodTrendPattern {
	return {
		scores: lastN([...pattern.scores, score], limit),
		dates: lastN([...pattern.dates, date], limit),
	};
}

/** True once the last five scores are all below zero. */
export function isConcerningMood(scores: readonly number[]): boolean {
	if (scores.length < CONCERNING_RUN_LENGTH) return false;
	return scores.slice(-CONCERNING_RUN_LENGTH).every((s) => s < 0);
}

export function concerningMoodWarning(date: string): string {
	return `Pattern detected: Multiple negative mood indicators in recent entries (${date})`;
}

/**
 * Career keyword counts over the last five career entries plus the text
 * being recorded. Each keyword counts once however often it appears, so the
 * new entry may already be among `careerEvents`.
 */
export function computeCareerFocus(
	careerEvents: readonly JournalEvent[],
	currentText: string,
	extractor: TextSignalExtractor,
): Record<CareerFocusArea, number> {
	const text = [...lastN(careerEvents, CAREER_CONTEXT_EVENTS).map((e) => e.entry), currentText].join(" ");
	const counts = extractor.countCategories(text, extractor.lexicon.careerFocus, CAREER_FOCUS_AREAS);
	return {
		growth: counts.get("growth") ?? 0,
		learning: counts.get("learning") ?? 0,
		challenges: counts.get("challenges") ?? 0,
		networking: counts.get("networking") ?? 0,
		transitions: counts.get("transitions") ?? 0,
	};
}
