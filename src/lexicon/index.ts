import { readFileSync } from "fs";
import lexiconData from "./lexicons.json";
import { GoalCategory, SkillArea } from "../types";

export type WordList = readonly string[];

export interface PolarityLexicon {
	readonly positive: WordList;
	readonly negative: WordList;
}

export type KeyedLexicon<K extends string> = Readonly<Record<K, WordList>>;

export type ClassifiedGoalCategory = Exclude<GoalCategory, "personal">;
export type CareerFocusArea = "growth" | "learning" | "challenges" | "networking" | "transitions";

export interface Lexicon {
	/** Comprehensive mood scoring. */
	readonly mood: PolarityLexicon;
	readonly growth: WordList;
	readonly challenge: WordList;
	readonly resilience: { readonly challenge: WordList; readonly recovery: WordList };
	readonly learning: WordList;
	readonly achievement: WordList;
	readonly skills: KeyedLexicon<SkillArea>;
	readonly goalCategories: KeyedLexicon<ClassifiedGoalCategory>;
	/** Shorter lists used by the weekly report. */
	readonly weekly: PolarityLexicon & {
		readonly achievement: WordList;
		readonly challenge: WordList;
		readonly recurringChallenge: WordList;
	};
	/** Per-entry mood tracking when a new entry is recorded. */
	readonly entryMood: PolarityLexicon;
	readonly careerFocus: KeyedLexicon<CareerFocusArea>;
	/** Words in recent career entries that signal upward movement. */
	readonly careerTrajectory: WordList;
}

/** First match wins; anything unmatched is "personal". */
export const GOAL_CATEGORY_PRIORITY: readonly ClassifiedGoalCategory[] = [
	"career", "health", "relationships", "learning",
];

export const SKILL_AREAS: readonly SkillArea[] = [
	"technical", "communication", "leadership", "creative", "analytical",
];

export const CAREER_FOCUS_AREAS: readonly CareerFocusArea[] = [
	"growth", "learning", "challenges", "networking", "transitions",
];

// ── Validation ───────────────────────────────────────────

class LexiconShapeError extends Error {
	constructor(path: string, expected: string) {
		super(`Invalid lexicon at "${path}": expected ${expected}`);
		this.name = "LexiconShapeError";
	}
}

function asRecord(raw: unknown, path: string): Record<string, unknown> {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new LexiconShapeError(path, "an object");
	}
	return Object.fromEntries(Object.entries(raw));
}

/** Lower-cases every keyword so matching stays case-insensitive. */
function wordList(raw: unknown, path: string): WordList {
	const words = Array.isArray(raw)
		? raw.filter((w): w is string => typeof w === "string" && w.trim() !== "")
		: [];
	if (!Array.isArray(raw) || words.length !== raw.length) {
		throw new LexiconShapeError(path, "an array of non-empty strings");
	}
	return Object.freeze(words.map((w) => w.toLowerCase()));
}

function polarity(raw: unknown, path: string): PolarityLexicon {
	const obj = asRecord(raw, path);
	return Object.freeze({
		positive: wordList(obj.positive, `${path}.positive`),
		negative: wordList(obj.negative, `${path}.negative`),
	});
}

/**
 * Validate and freeze a lexicon document. Throws on the first field with the
 * wrong shape, naming its path.
 */
export function parseLexicon(raw: unknown): Lexicon {
	const root = asRecord(raw, "$");
	const resilience = asRecord(root.resilience, "resilience");
	const weekly = asRecord(root.weekly, "weekly");
	const skills = asRecord(root.skills, "skills");
	const goalCategories = asRecord(root.goalCategories, "goalCategories");
	const careerFocus = asRecord(root.careerFocus, "careerFocus");

	return Object.freeze({
		mood: polarity(root.mood, "mood"),
		growth: wordList(root.growth, "growth"),
		challenge: wordList(root.challenge, "challenge"),
		resilience: Object.freeze({
			challenge: wordList(resilience.challenge, "resilience.challenge"),
			recovery: wordList(resilience.recovery, "resilience.recovery"),
		}),
		learning: wordList(root.learning, "learning"),
		achievement: wordList(root.achievement, "achievement"),
		skills: Object.freeze({
			technical: wordList(skills.technical, "skills.technical"),
			communication: wordList(skills.communication, "skills.communication"),
			leadership: wordList(skills.leadership, "skills.leadership"),
			creative: wordList(skills.creative, "skills.creative"),
			analytical: wordList(skills.analytical, "skills.analytical"),
		}),
		goalCategories: Object.freeze({
			career: wordList(goalCategories.career, "goalCategories.career"),
			health: wordList(goalCategories.health, "goalCategories.health"),
			relationships: wordList(goalCategories.relationships, "goalCategories.relationships"),
			learning: wordList(goalCategories.learning, "goalCategories.learning"),
		}),
		weekly: Object.freeze({
			...polarity(weekly, "weekly"),
			achievement: wordList(weekly.achievement, "weekly.achievement"),
			challenge: wordList(weekly.challenge, "weekly.challenge"),
			recurringChallenge: wordList(weekly.recurringChallenge, "weekly.recurringChallenge"),
		}),
		entryMood: polarity(root.entryMood, "entryMood"),
		careerFocus: Object.freeze({
			growth: wordList(careerFocus.growth, "careerFocus.growth"),
			learning: wordList(careerFocus.learning, "careerFocus.learning"),
			challenges: wordList(careerFocus.challenges, "careerFocus.challenges"),
			networking: wordList(careerFocus.networking, "careerFocus.networking"),
			transitions: wordList(careerFocus.transitions, "careerFocus.transitions"),
		}),
		careerTrajectory: wordList(root.careerTrajectory, "careerTrajectory"),
	});
}

/** Read a replacement lexicon from disk (same layout as lexicons.json). */
export function loadLexiconFile(path: string): Lexicon {
	return parseLexicon(JSON.parse(readFileSync(path, "utf-8")));
}

export const DEFAULT_LEXICON: Lexicon = parseLexicon(lexiconData);
