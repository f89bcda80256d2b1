import { AnalyticsConfig } from "../settings/types";
import { Achievement, AchievementTracking, JournalEvent } from "../types";
import { TextSignalExtractor } from "./signals";
import { countByMonth, lastN } from "./time-buckets";

/** Every entry using achievement language counts as one achievement. */
export function trackAchievements(
	events: readonly JournalEvent[],
	extractor: TextSignalExtractor,
	config: Pick<AnalyticsConfig, "recentAchievements">,
): AchievementTracking {
	const achievementEvents = events.filter((e) => extractor.isAchievement(e.entry));
	const achievements: Achievement[] = achievementEvents.map((e) => ({
		date: e.date,
		achievement: e.entry,
		type: e.type,
	}));

	return {
		totalAchievements: achievements.length,
		recentAchievements: lastN(achievements, config.recentAchievements),
		monthlyCounts: countByMonth(achievementEvents),
		achievementRate: (achievements.length / Math.max(1, events.length)) * 100,
	};
}
