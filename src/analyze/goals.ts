/**
 * Goal Progress — completion statistics, keyword categories and overdue
 * detection. Goals with a status other than "active" or "completed" count
 * toward the total only.
 */

import { Goal, GoalCategory, GoalProgress, OverdueGoal } from "../types";
import { daysBetween, elapsedWholeDays, parseCalendarDate, parseLocalDateTime } from "./dates";
import { TextSignalExtractor } from "./signals";
import { mean } from "./trend";

export const NO_GOALS_MESSAGE = "No goals found for analysis";

/** Percentage of goals completed; 0 with no goals. */
export function computeCompletionRate(goals: readonly Goal[]): number {
	if (goals.length === 0) return 0;
	return (goals.filter((g) => g.status === "completed").length / goals.length) * 100;
}

/** Mean elapsed whole days from creation to completion over goals carrying both dates. */
export function averageCompletionDays(goals: readonly Goal[]): number {
	const durations: number[] = [];
	for (const goal of goals) {
		if (goal.status !== "completed" || !goal.createdDate || !goal.completedDate) continue;
		const created = parseLocalDateTime(goal.createdDate);
		const completed = parseLocalDateTime(goal.completedDate);
		if (created && completed) durations.push(elapsedWholeDays(created, completed));
	}
	return mean(durations);
}

export function categorizeGoals(goals: readonly Goal[], extractor: TextSignalExtractor): Partial<Record<GoalCategory, number>> {
	const counts: Partial<Record<GoalCategory, number>> = {};
	for (const goal of goals) {
		const category = extractor.goalCategory(goal.text);
		counts[category] = (counts[category] ?? 0) + 1;
	}
	return counts;
}

/** Active goals whose target date is before `today`, in goal order. */
export function identifyOverdueGoals(goals: readonly Goal[], today: Date): OverdueGoal[] {
	const overdue: OverdueGoal[] = [];
	for (const goal of goals) {
		if (goal.status !== "active" || !goal.targetDate) continue;
		const target = parseCalendarDate(goal.targetDate);
		if (!target) continue;
		const daysOverdue = daysBetween(target, today);
		if (daysOverdue > 0) {
			overdue.push({ goal: goal.text, targetDate: goal.targetDate, daysOverdue });
		}
	}
	return overdue;
}

export function emptyGoalProgress(): GoalProgress {
	return {
		message: NO_GOALS_MESSAGE,
		totalGoals: 0,
		completedGoals: 0,
		activeGoals: 0,
		completionRate: 0,
		averageCompletionTime: 0,
		goalsByCategory: {},
		overdueGoals: [],
	};
}

export function analyzeGoalProgress(goals: readonly Goal[], extractor: TextSignalExtractor, today: Date): GoalProgress {
	if (goals.length === 0) return emptyGoalProgress();

	return {
		totalGoals: goals.length,
		completedGoals: goals.filter((g) => g.status === "completed").length,
		activeGoals: goals.filter((g) => g.status === "active").length,
		completionRate: computeCompletionRate(goals),
		averageCompletionTime: averageCompletionDays(goals),
		goalsByCategory: categorizeGoals(goals, extractor),
		overdueGoals: identifyOverdueGoals(goals, today),
	};
}
