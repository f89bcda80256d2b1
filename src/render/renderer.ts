import { ComprehensiveReport, GoalProgress, Recommendation, WeeklyReport } from "../types";
import { escapeForMarkdown, escapeForTableCell, escapeForYaml } from "./escape";

const PRIORITY_ICONS: Record<Recommendation["priority"], string> = {
	high: "\u{1F534}",
	medium: "\u{1F7E1}",
};

const TREND_LABELS: Record<ComprehensiveReport["moodAnalysis"]["overallTrend"], string> = {
	improving: "\u{1F4C8} Improving",
	declining: "\u{1F4C9} Declining",
	stable: "➖ Stable",
	insufficient_data: "Not enough data yet",
};

/** At most one decimal place; integers stay bare. */
function num(n: number): string {
	return Number.isInteger(n) ? String(n) : n.toFixed(1);
}

function bulletList(lines: string[], items: readonly string[], empty: string): void {
	if (items.length === 0) {
		lines.push(`- _${empty}_`);
	} else {
		for (const item of items) {
			lines.push(`- ${escapeForMarkdown(item)}`);
		}
	}
	lines.push("");
}

function renderGoalSection(lines: string[], goals: GoalProgress): void {
	lines.push("## \u{1F3AF} Goals");
	lines.push("");
	if (goals.message) {
		lines.push(`> [!note] ${goals.message}`);
		lines.push("");
		return;
	}

	lines.push(
		`${goals.completedGoals} of ${goals.totalGoals} completed (${num(goals.completionRate)}%) · ` +
			`${goals.activeGoals} active · average ${num(goals.averageCompletionTime)} days to complete`
	);
	lines.push("");

	const categories = Object.entries(goals.goalsByCategory);
	if (categories.length > 0) {
		lines.push("| Category | Goals |");
		lines.push("|---|---|");
		for (const [category, count] of categories) {
			lines.push(`| ${category} | ${count} |`);
		}
		lines.push("");
	}

	if (goals.overdueGoals.length > 0) {
		lines.push("### ⏰ Overdue");
		lines.push("");
		for (const o of goals.overdueGoals) {
			lines.push(`- ${escapeForMarkdown(o.goal)} (due ${o.targetDate}, ${o.daysOverdue} days overdue)`);
		}
		lines.push("");
	}
}

export function renderComprehensiveReport(report: ComprehensiveReport): string {
	const { summary, moodAnalysis, goalProgress, activityPatterns, growthMetrics, achievementTracking } = report;
	const lines: string[] = [];

	// ── Frontmatter ──────────────────────────────
	lines.push("---");
	lines.push("type: journal-report");
	lines.push(`generated: ${escapeForYaml(report.generatedAt)}`);
	lines.push(`entries: ${summary.totalEntries}`);
	lines.push(`mood_trend: ${moodAnalysis.overallTrend}`);
	lines.push("tags: [journal, insights]");
	lines.push("---");
	lines.push("");

	lines.push("# \u{1F4D3} Journal Insights");
	lines.push("");
	lines.push(
		`> [!info] ${summary.totalEntries} entries · ${summary.daysTracked} days tracked · ` +
			`${num(summary.averageEntriesPerWeek)} per week · consistency ${num(summary.consistencyScore)}/100`
	);
	lines.push("");

	// ── Recommendations ──────────────────────────
	if (report.recommendations.length > 0) {
		lines.push("## \u{1F4A1} Recommendations");
		lines.push("");
		for (const r of report.recommendations) {
			lines.push(`- ${PRIORITY_ICONS[r.priority]} **${r.type}**: ${escapeForMarkdown(r.recommendation)}`);
		}
		lines.push("");
	}

	// ── Mood ─────────────────────────────────────
	lines.push("## \u{1F60A} Mood");
	lines.push("");
	lines.push(`**Trend:** ${TREND_LABELS[moodAnalysis.overallTrend]} · **Volatility:** ${num(moodAnalysis.moodVolatility)}`);
	lines.push("");
	const weeks = Object.entries(moodAnalysis.weeklyAverages);
	if (weeks.length > 0) {
		lines.push("| Week | Average mood |");
		lines.push("|---|---|");
		for (const [week, avg] of weeks) {
			lines.push(`| ${week} | ${num(avg)} |`);
		}
		lines.push("");
	}

	renderGoalSection(lines, goalProgress);

	// ── Activity ─────────────────────────────────
	lines.push("## \u{1F4C5} Activity");
	lines.push("");
	if (activityPatterns.message) {
		lines.push(`> [!note] ${activityPatterns.message}`);
		lines.push("");
	} else {
		if (activityPatterns.mostActiveDay) {
			lines.push(`- Most active day: ${activityPatterns.mostActiveDay}`);
		}
		if (activityPatterns.peakHour !== null) {
			lines.push(`- Peak hour: ${String(activityPatterns.peakHour).padStart(2, "0")}:00`);
		}
		const freq = activityPatterns.entryFrequency;
		if (freq) {
			lines.push(`- Last entry: ${freq.daysSinceLast} days ago`);
			lines.push(`- Average gap: ${num(freq.averageGap)} days (frequency score ${num(freq.frequencyScore)})`);
		}
		lines.push("");
	}

	// ── Growth ───────────────────────────────────
	lines.push("## \u{1F331} Growth");
	lines.push("");
	lines.push(`- Growth indicators: ${growthMetrics.growthIndicators}`);
	lines.push(`- Challenge mentions: ${growthMetrics.challengeMentions}`);
	lines.push(`- Resilience score: ${num(growthMetrics.resilienceScore)}`);
	lines.push(`- Learning frequency: ${num(growthMetrics.learningFrequency)}%`);
	const skills = Object.entries(growthMetrics.skillDevelopmentAreas);
	if (skills.length > 0) {
		lines.push(`- Skills: ${skills.map(([area, count]) => `${area} (${count})`).join(", ")}`);
	}
	lines.push("");

	// ── Achievements ─────────────────────────────
	lines.push("## \u{1F3C6} Achievements");
	lines.push("");
	lines.push(
		`${achievementTracking.totalAchievements} achievements · ${num(achievementTracking.achievementRate)}% of entries`
	);
	lines.push("");
	if (achievementTracking.recentAchievements.length > 0) {
		lines.push("| Date | Achievement |");
		lines.push("|---|---|");
		for (const a of achievementTracking.recentAchievements) {
			lines.push(`| ${a.date} | ${escapeForTableCell(a.achievement)} |`);
		}
		lines.push("");
	}

	return lines.join("\n");
}

export function renderWeeklyReport(report: WeeklyReport): string {
	const lines: string[] = [];

	lines.push("---");
	lines.push("type: weekly-report");
	lines.push(`range: ${escapeForYaml(report.dateRange)}`);
	lines.push(`entries: ${report.entriesThisWeek}`);
	lines.push("tags: [journal, weekly]");
	lines.push("---");
	lines.push("");

	lines.push(`# \u{1F5D3}\u{FE0F} ${report.period}: ${report.dateRange}`);
	lines.push("");
	lines.push(`> [!info] ${report.entriesThisWeek} entries · ${report.moodSummary}`);
	lines.push("");

	lines.push("## \u{1F3C6} Achievements");
	lines.push("");
	bulletList(lines, report.achievements, "None recorded");

	lines.push("## \u{1F9D7} Challenges");
	lines.push("");
	bulletList(lines, report.challenges, "None recorded");

	lines.push("## \u{1F3AF} Goals Worked On");
	lines.push("");
	bulletList(lines, report.goalsWorkedOn, "No goals mentioned");

	lines.push("## ➡\u{FE0F} Next Week");
	lines.push("");
	bulletList(lines, report.nextWeekFocus, "Nothing suggested");

	return lines.join("\n");
}
