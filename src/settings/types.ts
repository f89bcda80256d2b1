/**
 * Thresholds and windows that shape the analytics passes.
 * Defaults match the windows older journals were analyzed with.
 */
export interface AnalyticsConfig {
	/** Raw per-entry mood scores kept in the mood section. */
	recentMoodEntries: number;
	/** Weekly mood averages kept in the mood section. */
	weeklyAverageWindow: number;
	/** Slope magnitude beyond which a trend is improving/declining. */
	trendThreshold: number;
	/** Events scanned for growth/challenge/learning signals. */
	growthWindow: number;
	/** Events scanned for skill-area mentions. */
	skillWindow: number;
	/** Achievements listed in the recent achievements block. */
	recentAchievements: number;
	/** Below this many events the resilience score falls back to its neutral default. */
	resilienceMinEvents: number;
	/** Events after a challenge searched for a recovery word. */
	resilienceLookahead: number;
	/** Days without an entry before an engagement recommendation fires. */
	inactivityThresholdDays: number;
	/** Completion rate (percent) below which a goal recommendation fires. */
	completionRateThreshold: number;
	/** Length of the trailing weekly-report window, today included. */
	weeklyWindowDays: number;
}

export interface JournalSettings extends AnalyticsConfig {
	/** Path of the JSON journal document. */
	journalFile: string;
	/** Persist advisory patterns after each comprehensive report. */
	writePatterns: boolean;
	debugMode: boolean;
}

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = {
	recentMoodEntries: 30,
	weeklyAverageWindow: 12,
	trendThreshold: 0.1,
	growthWindow: 30,
	skillWindow: 50,
	recentAchievements: 10,
	resilienceMinEvents: 5,
	resilienceLookahead: 3,
	inactivityThresholdDays: 7,
	completionRateThreshold: 50,
	weeklyWindowDays: 7,
};

export const DEFAULT_SETTINGS: JournalSettings = {
	...DEFAULT_ANALYTICS_CONFIG,
	journalFile: "life_memory.json",
	writePatterns: true,
	debugMode: false,
};
