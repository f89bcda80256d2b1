/**
 * Text Signal Extraction — keyword scoring over free-text journal entries.
 *
 * Matching is case-insensitive substring containment, not word-boundary
 * tokenization: "sad" matches inside "sadly", "art" inside "started". Each
 * keyword counts at most once per text regardless of how often it occurs.
 *
 * All scoring is local and deterministic — no LLM calls.
 */

import { DEFAULT_LEXICON, GOAL_CATEGORY_PRIORITY, Lexicon, SKILL_AREAS, WordList } from "../lexicon";
import { GoalCategory, SkillArea } from "../types";

export interface MoodSignal {
	positive: number;
	negative: number;
	score: number;
}

export class TextSignalExtractor {
	readonly lexicon: Lexicon;

	constructor(lexicon: Lexicon = DEFAULT_LEXICON) {
		this.lexicon = lexicon;
	}

	/** Number of distinct keywords contained in the text. */
	countMatches(text: string, words: WordList): number {
		const lowered = text.toLowerCase();
		let count = 0;
		for (const word of words) {
			if (lowered.includes(word)) count++;
		}
		return count;
	}

	containsAny(text: string, words: WordList): boolean {
		const lowered = text.toLowerCase();
		return words.some((word) => lowered.includes(word));
	}

	/** category → number of that category's keywords contained in the text. */
	countCategories<K extends string>(text: string, categories: Readonly<Record<K, WordList>>, keys: readonly K[]): Map<K, number> {
		const counts = new Map<K, number>();
		for (const key of keys) {
			counts.set(key, this.countMatches(text, categories[key]));
		}
		return counts;
	}

	/** Positive minus negative keyword hits using the comprehensive mood lexicon. */
	moodSignal(text: string, polarity = this.lexicon.mood): MoodSignal {
		const positive = this.countMatches(text, polarity.positive);
		const negative = this.countMatches(text, polarity.negative);
		return { positive, negative, score: positive - negative };
	}

	moodScore(text: string): number {
		return this.moodSignal(text).score;
	}

	/** Skill areas mentioned at least once; an entry may touch several. */
	skillAreas(text: string): SkillArea[] {
		return SKILL_AREAS.filter((area) => this.containsAny(text, this.lexicon.skills[area]));
	}

	/** First category in priority order with a keyword hit, else "personal". */
	goalCategory(text: string): GoalCategory {
		for (const category of GOAL_CATEGORY_PRIORITY) {
			if (this.containsAny(text, this.lexicon.goalCategories[category])) return category;
		}
		return "personal";
	}

	isAchievement(text: string): boolean {
		return this.containsAny(text, this.lexicon.achievement);
	}

	mentionsLearning(text: string): boolean {
		return this.containsAny(text, this.lexicon.learning);
	}
}
