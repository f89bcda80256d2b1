/**
 * Report Assembly — the entry point for analytics.
 *
 * Loads a fresh snapshot on every call and runs each section pass over it.
 * A report is always returned: an unreadable store degrades to an empty
 * snapshot, and a section that throws is logged and replaced with its
 * neutral default. Advisory patterns are written after the report is built,
 * never for a journal with no events or goals, and their failure never
 * reaches the caller.
 */

import * as log from "../log";
import { DEFAULT_LEXICON, Lexicon } from "../lexicon";
import { AnalyticsConfig, DEFAULT_ANALYTICS_CONFIG } from "../settings/types";
import {
	buildEmptySnapshot,
	ComprehensiveReport,
	JournalSnapshot,
	NOOP_PATTERN_WRITER,
	PatternWriter,
	SnapshotSource,
	WeeklyReport,
} from "../types";
import { startOfDay } from "./dates";
import { trackAchievements } from "./achievements";
import { analyzeActivityPatterns, emptyActivityPatterns } from "./activity";
import { analyzeGoalProgress, emptyGoalProgress } from "./goals";
import { calculateGrowthMetrics, emptyGrowthMetrics } from "./growth";
import { analyzeMood } from "./mood";
import { generateRecommendations } from "./recommendations";
import { TextSignalExtractor } from "./signals";
import { computeSummaryStats } from "./summary";
import { buildWeeklyReport } from "./weekly";

export interface JournalAnalyticsOptions {
	patterns?: PatternWriter;
	lexicon?: Lexicon;
	config?: Partial<AnalyticsConfig>;
	/** Clock used for "today" and generatedAt. */
	now?: () => Date;
}

export class JournalAnalytics {
	private readonly source: SnapshotSource;
	private readonly patterns: PatternWriter;
	private readonly extractor: TextSignalExtractor;
	private readonly config: AnalyticsConfig;
	private readonly now: () => Date;

	constructor(source: SnapshotSource, options: JournalAnalyticsOptions = {}) {
		this.source = source;
		this.patterns = options.patterns ?? NOOP_PATTERN_WRITER;
		this.extractor = new TextSignalExtractor(options.lexicon ?? DEFAULT_LEXICON);
		this.config = { ...DEFAULT_ANALYTICS_CONFIG, ...options.config };
		this.now = options.now ?? (() => new Date());
	}

	comprehensiveReport(): ComprehensiveReport {
		const snapshot = this.loadSnapshot();
		const report = assembleComprehensiveReport(snapshot, this.extractor, this.config, this.now());
		if (snapshot.events.length > 0 || snapshot.goals.length > 0) {
			this.writeAdvisoryPatterns(report);
		} else {
			log.debug("Empty journal, skipping advisory patterns");
		}
		return report;
	}

	weeklyReport(): WeeklyReport {
		const snapshot = this.loadSnapshot();
		return buildWeeklyReport(
			snapshot.events,
			snapshot.goals,
			this.extractor,
			startOfDay(this.now()),
			this.config,
		);
	}

	private loadSnapshot(): JournalSnapshot {
		try {
			return this.source.loadSnapshot();
		} catch (e) {
			log.error("Journal snapshot unavailable, reporting on an empty journal:", e);
			return buildEmptySnapshot();
		}
	}

	private writeAdvisoryPatterns(report: ComprehensiveReport): void {
		const entries: [string, unknown][] = [
			["skill_development_areas", report.growthMetrics.skillDevelopmentAreas],
			["goals_by_category", report.goalProgress.goalsByCategory],
		];
		for (const [name, data] of entries) {
			try {
				this.patterns.writePattern(name, data);
			} catch (e) {
				log.warn(`Failed to persist pattern "${name}", continuing without:`, e);
			}
		}
	}
}

/** Run a section pass; on failure log it and fall back to the neutral value. */
function section<T>(name: string, compute: () => T, fallback: () => T): T {
	try {
		return compute();
	} catch (e) {
		log.error(`Analytics section "${name}" failed, using defaults:`, e);
		return fallback();
	}
}

/** Pure assembly over a snapshot; `now` only feeds "today" and generatedAt. */
export function assembleComprehensiveReport(
	snapshot: JournalSnapshot,
	extractor: TextSignalExtractor,
	config: AnalyticsConfig,
	now: Date,
): ComprehensiveReport {
	const { events, goals } = snapshot;
	const today = startOfDay(now);

	const summary = section(
		"summary",
		() => computeSummaryStats(events, goals),
		() => computeSummaryStats([], []),
	);
	const moodAnalysis = section(
		"mood_analysis",
		() => analyzeMood(events, extractor, config),
		() => analyzeMood([], extractor, config),
	);
	const goalProgress = section(
		"goal_progress",
		() => analyzeGoalProgress(goals, extractor, today),
		emptyGoalProgress,
	);
	const activityPatterns = section(
		"activity_patterns",
		() => analyzeActivityPatterns(events, today),
		emptyActivityPatterns,
	);
	const growthMetrics = section(
		"growth_metrics",
		() => calculateGrowthMetrics(events, extractor, config),
		emptyGrowthMetrics,
	);
	const recommendations = generateRecommendations(
		{ mood: moodAnalysis, goals: goalProgress, activity: activityPatterns },
		config,
	);
	const achievementTracking = section(
		"achievement_tracking",
		() => trackAchievements(events, extractor, config),
		() => trackAchievements([], extractor, config),
	);

	return {
		generatedAt: now.toISOString(),
		summary,
		moodAnalysis,
		goalProgress,
		activityPatterns,
		growthMetrics,
		recommendations,
		achievementTracking,
	};
}
