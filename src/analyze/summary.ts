import { Goal, JournalEvent, SummaryStats } from "../types";
import { mean } from "./trend";
import { countTrackedDays, gapsInDays, weeksSpanned } from "./time-buckets";

/**
 * Consistency score (0–100): 100 minus ten points per day of average gap
 * between entries. Fewer than two entries means no gaps and a score of 0.
 */
export function computeConsistencyScore(gaps: readonly number[]): number {
	if (gaps.length === 0) return 0;
	return Math.min(100, Math.max(0, 100 - mean(gaps) * 10));
}

export function computeSummaryStats(events: readonly JournalEvent[], goals: readonly Goal[]): SummaryStats {
	return {
		totalEntries: events.length,
		totalGoals: goals.length,
		activeGoals: goals.filter((g) => g.status === "active").length,
		daysTracked: countTrackedDays(events),
		averageEntriesPerWeek: events.length / Math.max(1, weeksSpanned(events)),
		consistencyScore: computeConsistencyScore(gapsInDays(events)),
	};
}
