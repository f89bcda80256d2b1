/**
 * Entry recording with per-entry pattern tracking, and the compact memory
 * summary shown alongside a conversation.
 */

import * as log from "./log";
import { buildCareerAdvice, CareerAdvice } from "./analyze/career";
import {
	appendMoodScore,
	CAREER_FOCUS_PATTERN,
	computeCareerFocus,
	concerningMoodWarning,
	isConcerningMood,
	MOOD_TRENDS_PATTERN,
	readMoodTrend,
} from "./analyze/patterns";
import { TextSignalExtractor } from "./analyze/signals";
import { JsonJournalStore } from "./store/journal-store";
import { JournalEvent, MemorySummary } from "./types";

const SUMMARY_RECENT_EVENTS = 5;
const SUMMARY_WARNINGS = 3;

export interface RecordEntryOptions {
	/** Defaults to "general". Career entries also refresh the career focus pattern. */
	type?: string;
	extractor?: TextSignalExtractor;
}

export interface RecordedEntry {
	event: JournalEvent;
	/** Entry mood score, or null when pattern tracking failed. */
	moodScore: number | null;
	/** Warning raised by this entry, if any. */
	warning: string | null;
	/** Career insights and skill suggestions, for career entries only. */
	career: CareerAdvice | null;
}

/**
 * Append an entry, then update the mood trend. Career entries also refresh
 * the career focus pattern and come back with career advice. Only the append
 * itself can throw; pattern tracking failures are logged and leave the entry
 * in place.
 */
export function recordEntry(store: JsonJournalStore, text: string, options: RecordEntryOptions = {}): RecordedEntry {
	const type = options.type ?? "general";
	const extractor = options.extractor ?? new TextSignalExtractor();

	const event = store.addEvent(text, type);
	const result: RecordedEntry = { event, moodScore: null, warning: null, career: null };

	try {
		const snapshot = store.loadSnapshot();
		const score = extractor.moodSignal(text, extractor.lexicon.entryMood).score;
		const trend = appendMoodScore(readMoodTrend(snapshot.patterns[MOOD_TRENDS_PATTERN]?.data), score, event.date);
		store.writePattern(MOOD_TRENDS_PATTERN, trend);
		result.moodScore = score;

		if (isConcerningMood(trend.scores)) {
			const warning = concerningMoodWarning(event.date);
			if (store.addWarning(warning)) {
				result.warning = warning;
				log.warn(warning);
			}
		}

		if (type === "career") {
			const careerEvents = snapshot.events.filter((e) => e.type === "career");
			const focus = computeCareerFocus(careerEvents, text, extractor);
			store.writePattern(CAREER_FOCUS_PATTERN, focus);
			result.career = buildCareerAdvice(careerEvents, focus, extractor);
		}
	} catch (e) {
		log.error("Pattern tracking failed for new entry:", e);
	}

	return result;
}

export function memorySummary(store: JsonJournalStore): MemorySummary {
	const snapshot = store.loadSnapshot();
	return {
		totalEvents: snapshot.events.length,
		recentEvents: store.getRecentEvents(SUMMARY_RECENT_EVENTS),
		activeGoals: store.getActiveGoals(),
		totalGoals: snapshot.goals.length,
		warnings: snapshot.warnings.slice(-SUMMARY_WARNINGS),
		patterns: snapshot.patterns,
	};
}
