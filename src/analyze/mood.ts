/**
 * Mood Analysis — per-entry keyword mood scores, smoothed into weekly
 * averages for trend and volatility.
 */

import { AnalyticsConfig } from "../settings/types";
import { JournalEvent, MoodAnalysis, MoodPoint } from "../types";
import { TextSignalExtractor } from "./signals";
import { groupByWeek, lastN } from "./time-buckets";
import { classifyTrend, mean, sampleStdDev } from "./trend";

type MoodConfig = Pick<AnalyticsConfig, "recentMoodEntries" | "weeklyAverageWindow" | "trendThreshold">;

export function scoreMood(event: JournalEvent, extractor: TextSignalExtractor): MoodPoint {
	const signal = extractor.moodSignal(event.entry);
	return {
		date: event.date,
		moodScore: signal.score,
		positiveIndicators: signal.positive,
		negativeIndicators: signal.negative,
	};
}

/** Average mood score per week, weeks in chronological order. */
export function weeklyMoodAverages(events: readonly JournalEvent[], extractor: TextSignalExtractor): Map<string, number> {
	const averages = new Map<string, number>();
	for (const [week, scores] of groupByWeek(events, (e) => extractor.moodScore(e.entry))) {
		averages.set(week, mean(scores));
	}
	return averages;
}

export function analyzeMood(
	events: readonly JournalEvent[],
	extractor: TextSignalExtractor,
	config: MoodConfig,
): MoodAnalysis {
	const weekly = weeklyMoodAverages(events, extractor);
	const averages = [...weekly.values()];

	return {
		dailyMood: lastN(events, config.recentMoodEntries).map((e) => scoreMood(e, extractor)),
		weeklyAverages: Object.fromEntries(lastN([...weekly.entries()], config.weeklyAverageWindow)),
		overallTrend: classifyTrend(averages, config.trendThreshold),
		moodVolatility: sampleStdDev(averages),
	};
}
