/**
 * Career coaching from keyword rules: insights over the career entries and
 * skill suggestions from the stored career_focus counts.
 */

import { CAREER_FOCUS_AREAS, CareerFocusArea } from "../lexicon";
import { JournalEvent, JournalSnapshot } from "../types";
import { CAREER_FOCUS_PATTERN } from "./patterns";
import { TextSignalExtractor } from "./signals";
import { lastN } from "./time-buckets";

const MIN_CAREER_HISTORY = 3;
const RECENT_CAREER_EVENTS = 5;
const ACTIVE_RECENT_UPDATES = 3;
const LEARNING_FOCUS_THRESHOLD = 2;

export const NOT_ENOUGH_CAREER_HISTORY = "Build more career history to generate insights";
export const DEFAULT_SKILL_RECOMMENDATION = "Focus on core technical skills in your field";

export const CAREER_NEXT_STEPS: readonly string[] = [
	"Update your resume with recent achievements",
	"Set up informational interviews in your target field",
	"Identify 2-3 key skills to develop this quarter",
	"Establish regular career check-ins with your manager",
];

export type CareerFocusCounts = Record<CareerFocusArea, number>;

export interface CareerAdvice {
	insights: string[];
	skillRecommendations: string[];
	nextSteps: string[];
}

/** Read a stored career_focus payload; missing or non-numeric areas count 0. */
export function readCareerFocus(data: unknown): CareerFocusCounts {
	const counts: CareerFocusCounts = { growth: 0, learning: 0, challenges: 0, networking: 0, transitions: 0 };
	if (typeof data !== "object" || data === null) return counts;
	const stored: Record<string, unknown> = Object.fromEntries(Object.entries(data));
	for (const area of CAREER_FOCUS_AREAS) {
		const value = stored[area];
		if (typeof value === "number" && Number.isFinite(value)) counts[area] = value;
	}
	return counts;
}

export function careerInsights(careerEvents: readonly JournalEvent[], extractor: TextSignalExtractor): string[] {
	if (careerEvents.length < MIN_CAREER_HISTORY) return [NOT_ENOUGH_CAREER_HISTORY];

	const insights: string[] = [];
	const recent = lastN(careerEvents, RECENT_CAREER_EVENTS);
	if (recent.length >= ACTIVE_RECENT_UPDATES) {
		insights.push("Active career development - regular professional updates");
	}
	if (recent.some((e) => extractor.containsAny(e.entry, extractor.lexicon.careerTrajectory))) {
		insights.push("Positive career trajectory detected");
	}
	return insights;
}

/**
 * Skill suggestions from career keyword counts. Leadership is suggested off
 * the `growth` area, whose keywords include "leadership" and "management".
 */
export function recommendSkills(focus: CareerFocusCounts): string[] {
	const recommendations: string[] = [];
	if (focus.growth > 0) {
		recommendations.push("Leadership and team management skills");
	}
	if (focus.learning > LEARNING_FOCUS_THRESHOLD) {
		recommendations.push("Continuous learning mindset - consider advanced certifications");
	}
	if (focus.networking < 1) {
		recommendations.push("Professional networking and relationship building");
	}
	return recommendations.length > 0 ? recommendations : [DEFAULT_SKILL_RECOMMENDATION];
}

export function buildCareerAdvice(
	careerEvents: readonly JournalEvent[],
	focus: CareerFocusCounts,
	extractor: TextSignalExtractor,
): CareerAdvice {
	return {
		insights: careerInsights(careerEvents, extractor),
		skillRecommendations: recommendSkills(focus),
		nextSteps: [...CAREER_NEXT_STEPS],
	};
}

/** Career advice from what the journal has stored so far. */
export function careerAdvice(snapshot: JournalSnapshot, extractor: TextSignalExtractor): CareerAdvice {
	return buildCareerAdvice(
		snapshot.events.filter((e) => e.type === "career"),
		readCareerFocus(snapshot.patterns[CAREER_FOCUS_PATTERN]?.data),
		extractor,
	);
}
