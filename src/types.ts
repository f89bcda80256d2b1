// ── Journal Records ──────────────────────────────────────

export interface JournalEvent {
	/** Calendar date, "YYYY-MM-DD". */
	date: string;
	/** Local date-time, "YYYY-MM-DDTHH:mm:ss". Absent on imported entries. */
	timestamp?: string;
	entry: string;
	/** "general", "career", ... — free-form, defaults to "general". */
	type: string;
}

/** "active" and "completed" are the only statuses the analytics counts. */
export type GoalStatus = "active" | "completed" | (string & {});

export interface Goal {
	id: number;
	text: string;
	status: GoalStatus;
	createdDate?: string;
	targetDate?: string;
	completedDate?: string;
	/** 0–100 */
	progress: number;
}

export interface PatternRecord {
	data: unknown;
	lastUpdated: string;
}

export interface JournalSnapshot {
	events: JournalEvent[];
	goals: Goal[];
	patterns: Record<string, PatternRecord>;
	warnings: string[];
}

export function buildEmptySnapshot(): JournalSnapshot {
	return { events: [], goals: [], patterns: {}, warnings: [] };
}

// ── Collaborator Interfaces ──────────────────────────────

export interface SnapshotSource {
	/** Throws StorageUnavailableError when the backing document cannot be read. */
	loadSnapshot(): JournalSnapshot;
}

export interface PatternWriter {
	writePattern(name: string, data: unknown): void;
}

export const NOOP_PATTERN_WRITER: PatternWriter = {
	writePattern: () => undefined,
};

// ── Comprehensive Report ─────────────────────────────────

export interface SummaryStats {
	totalEntries: number;
	totalGoals: number;
	activeGoals: number;
	daysTracked: number;
	averageEntriesPerWeek: number;
	consistencyScore: number;
}

export type TrendDirection = "improving" | "declining" | "stable" | "insufficient_data";

export interface MoodPoint {
	date: string;
	moodScore: number;
	positiveIndicators: number;
	negativeIndicators: number;
}

export interface MoodAnalysis {
	dailyMood: MoodPoint[];
	weeklyAverages: Record<string, number>;
	overallTrend: TrendDirection;
	moodVolatility: number;
}

export type GoalCategory = "career" | "health" | "relationships" | "learning" | "personal";

export interface OverdueGoal {
	goal: string;
	targetDate: string;
	daysOverdue: number;
}

export interface GoalProgress {
	/** Present only when there are no goals to analyze. */
	message?: string;
	totalGoals: number;
	completedGoals: number;
	activeGoals: number;
	completionRate: number;
	averageCompletionTime: number;
	goalsByCategory: Partial<Record<GoalCategory, number>>;
	overdueGoals: OverdueGoal[];
}

export interface EntryFrequency {
	daysSinceLast: number;
	averageGap: number;
	frequencyScore: number;
}

export interface ActivityPatterns {
	/** Present only when there is no activity to analyze. */
	message?: string;
	activityByDay: Record<string, number>;
	activityByHour: Record<string, number>;
	mostActiveDay: string | null;
	peakHour: number | null;
	entryFrequency: EntryFrequency | null;
}

export type SkillArea = "technical" | "communication" | "leadership" | "creative" | "analytical";

export interface GrowthMetrics {
	growthIndicators: number;
	challengeMentions: number;
	growthToChallengeRatio: number;
	resilienceScore: number;
	learningFrequency: number;
	skillDevelopmentAreas: Partial<Record<SkillArea, number>>;
}

export interface Recommendation {
	type: "mood" | "goals" | "engagement";
	priority: "high" | "medium";
	recommendation: string;
}

export interface Achievement {
	date: string;
	achievement: string;
	type: string;
}

export interface AchievementTracking {
	totalAchievements: number;
	recentAchievements: Achievement[];
	monthlyCounts: Record<string, number>;
	achievementRate: number;
}

export interface ComprehensiveReport {
	generatedAt: string;
	summary: SummaryStats;
	moodAnalysis: MoodAnalysis;
	goalProgress: GoalProgress;
	activityPatterns: ActivityPatterns;
	growthMetrics: GrowthMetrics;
	recommendations: Recommendation[];
	achievementTracking: AchievementTracking;
}

// ── Weekly Report ────────────────────────────────────────

export type WeeklyMoodSummary =
	| "No entries this week"
	| "Predominantly positive"
	| "Some challenges noted"
	| "Balanced week";

export interface WeeklyReport {
	period: "Weekly Report";
	dateRange: string;
	entriesThisWeek: number;
	moodSummary: WeeklyMoodSummary;
	achievements: string[];
	challenges: string[];
	goalsWorkedOn: string[];
	nextWeekFocus: string[];
}

// ── Store Views ──────────────────────────────────────────

export interface MemoryStats {
	totalEvents: number;
	totalGoals: number;
	activeGoals: number;
	patternsTracked: number;
	warnings: number;
}

export interface MemorySummary {
	totalEvents: number;
	recentEvents: JournalEvent[];
	activeGoals: Goal[];
	totalGoals: number;
	warnings: string[];
	patterns: Record<string, PatternRecord>;
}

export interface JournalExport {
	events: JournalEvent[];
	goals: Goal[];
	patterns: Record<string, PatternRecord>;
	exportTimestamp: string;
	version: "1.0";
}
