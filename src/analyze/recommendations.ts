/**
 * Data-driven recommendations. Rules are evaluated in a fixed order
 * (mood, goals, engagement) and only matching rules produce output.
 */

import { AnalyticsConfig } from "../settings/types";
import { ActivityPatterns, GoalProgress, MoodAnalysis, Recommendation } from "../types";

export interface RecommendationInputs {
	mood: Pick<MoodAnalysis, "overallTrend">;
	goals: Pick<GoalProgress, "completionRate">;
	activity: Pick<ActivityPatterns, "entryFrequency">;
}

type RecommendationConfig = Pick<AnalyticsConfig, "completionRateThreshold" | "inactivityThresholdDays">;

export function generateRecommendations(inputs: RecommendationInputs, config: RecommendationConfig): Recommendation[] {
	const recommendations: Recommendation[] = [];

	if (inputs.mood.overallTrend === "declining") {
		recommendations.push({
			type: "mood",
			priority: "high",
			recommendation: "Your mood trend shows decline. Consider scheduling activities that typically boost your mood.",
		});
	}

	if (inputs.goals.completionRate < config.completionRateThreshold) {
		recommendations.push({
			type: "goals",
			priority: "medium",
			recommendation: "Your goal completion rate is low. Consider breaking goals into smaller, more manageable tasks.",
		});
	}

	const daysSinceLast = inputs.activity.entryFrequency?.daysSinceLast ?? 0;
	if (daysSinceLast > config.inactivityThresholdDays) {
		recommendations.push({
			type: "engagement",
			priority: "medium",
			recommendation: "You haven't logged an entry in a while. Regular reflection helps maintain progress.",
		});
	}

	return recommendations;
}
