/**
 * Growth Metrics — growth vs. challenge language, recovery after setbacks,
 * learning mentions and skill areas.
 */

import { AnalyticsConfig } from "../settings/types";
import { GrowthMetrics, JournalEvent, SkillArea } from "../types";
import { TextSignalExtractor } from "./signals";
import { lastN } from "./time-buckets";

type GrowthConfig = Pick<AnalyticsConfig, "growthWindow" | "skillWindow" | "resilienceMinEvents" | "resilienceLookahead">;

/** Score when the journal is too short to judge recovery. */
export const RESILIENCE_SHORT_HISTORY_SCORE = 50;
/** Score when no challenge was ever mentioned. */
export const RESILIENCE_NO_CHALLENGE_SCORE = 75;

/**
 * Share of challenge entries (0–100) followed, within the next `lookahead`
 * entries, by an entry using recovery language.
 */
export function scoreResilience(
	events: readonly JournalEvent[],
	extractor: TextSignalExtractor,
	lookahead = 3,
): number {
	const { challenge, recovery } = extractor.lexicon.resilience;
	let challenges = 0;
	let recovered = 0;

	for (let i = 0; i < events.length; i++) {
		if (!extractor.containsAny(events[i].entry, challenge)) continue;
		challenges++;
		const end = Math.min(i + 1 + lookahead, events.length);
		for (let j = i + 1; j < end; j++) {
			if (extractor.containsAny(events[j].entry, recovery)) {
				recovered++;
				break;
			}
		}
	}

	if (challenges === 0) return RESILIENCE_NO_CHALLENGE_SCORE;
	return (recovered / challenges) * 100;
}

/** Percentage of the window's entries mentioning learning. */
export function learningFrequency(events: readonly JournalEvent[], extractor: TextSignalExtractor, window: number): number {
	const recent = lastN(events, window);
	if (recent.length === 0) return 0;
	const learning = recent.filter((e) => extractor.mentionsLearning(e.entry)).length;
	return (learning / recent.length) * 100;
}

/** Entries per skill area; only areas mentioned at least once appear. */
export function identifySkillAreas(
	events: readonly JournalEvent[],
	extractor: TextSignalExtractor,
	window: number,
): Partial<Record<SkillArea, number>> {
	const counts: Partial<Record<SkillArea, number>> = {};
	for (const event of lastN(events, window)) {
		for (const area of extractor.skillAreas(event.entry)) {
			counts[area] = (counts[area] ?? 0) + 1;
		}
	}
	return counts;
}

export function emptyGrowthMetrics(): GrowthMetrics {
	return {
		growthIndicators: 0,
		challengeMentions: 0,
		growthToChallengeRatio: 0,
		resilienceScore: RESILIENCE_SHORT_HISTORY_SCORE,
		learningFrequency: 0,
		skillDevelopmentAreas: {},
	};
}

export function calculateGrowthMetrics(
	events: readonly JournalEvent[],
	extractor: TextSignalExtractor,
	config: GrowthConfig,
): GrowthMetrics {
	const { growth, challenge } = extractor.lexicon;
	let growthIndicators = 0;
	let challengeMentions = 0;

	for (const event of lastN(events, config.growthWindow)) {
		growthIndicators += extractor.countMatches(event.entry, growth);
		challengeMentions += extractor.countMatches(event.entry, challenge);
	}

	const resilienceScore = events.length < config.resilienceMinEvents
		? RESILIENCE_SHORT_HISTORY_SCORE
		: scoreResilience(events, extractor, config.resilienceLookahead);

	return {
		growthIndicators,
		challengeMentions,
		growthToChallengeRatio: growthIndicators / Math.max(1, challengeMentions),
		resilienceScore,
		learningFrequency: learningFrequency(events, extractor, config.growthWindow),
		skillDevelopmentAreas: identifySkillAreas(events, extractor, config.skillWindow),
	};
}
