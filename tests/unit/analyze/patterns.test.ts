import { describe, it, expect } from "vitest";
import {
	appendMoodScore,
	computeCareerFocus,
	concerningMoodWarning,
	isConcerningMood,
	MOOD_TREND_LIMIT,
	readMoodTrend,
} from "../../../src/analyze/patterns";
import { TextSignalExtractor } from "../../../src/analyze/signals";
import { makeEvent } from "../../fixtures/journal";

const extractor = new TextSignalExtractor();

describe("readMoodTrend", () => {
	it("reads a stored series", () => {
		expect(readMoodTrend({ scores: [1, -1], dates: ["2025-06-14", "2025-06-15"] })).toEqual({
			scores: [1, -1],
			dates: ["2025-06-14", "2025-06-15"],
		});
	});

	it("starts fresh on anything malformed", () => {
		const empty = { scores: [], dates: [] };
		expect(readMoodTrend(undefined)).toEqual(empty);
		expect(readMoodTrend({ scores: [1], dates: [] })).toEqual(empty);
		expect(readMoodTrend({ scores: ["1"], dates: ["2025-06-15"] })).toEqual(empty);
	});
});

describe("appendMoodScore", () => {
	it("keeps a rolling window of scores and dates", () => {
		const full = {
			scores: Array.from({ length: MOOD_TREND_LIMIT }, (_, i) => i),
			dates: Array.from({ length: MOOD_TREND_LIMIT }, (_, i) => `d${i}`),
		};
		const next = appendMoodScore(full, -3, "2025-06-15");
		expect(next.scores).toHaveLength(MOOD_TREND_LIMIT);
		expect(next.scores[0]).toBe(1);
		expect(next.scores[MOOD_TREND_LIMIT - 1]).toBe(-3);
		expect(next.dates[MOOD_TREND_LIMIT - 1]).toBe("2025-06-15");
	});

	it("does not mutate the stored pattern", () => {
		const stored = { scores: [1], dates: ["2025-06-14"] };
		appendMoodScore(stored, 2, "2025-06-15");
		expect(stored.scores).toEqual([1]);
	});
});

describe("isConcerningMood", () => {
	it("fires when the last five scores are all negative", () => {
		expect(isConcerningMood([2, -1, -1, -2, -1, -1])).toBe(true);
	});

	it("does not fire when any of the last five is zero or positive", () => {
		expect(isConcerningMood([-1, -1, 0, -1, -1])).toBe(false);
	});

	it("needs five scores", () => {
		expect(isConcerningMood([-1, -1, -1, -1])).toBe(false);
	});
});

describe("concerningMoodWarning", () => {
	it("embeds the date", () => {
		expect(concerningMoodWarning("2025-06-15")).toBe(
			"Pattern detected: Multiple negative mood indicators in recent entries (2025-06-15)"
		);
	});
});

describe("computeCareerFocus", () => {
	it("counts each keyword once across recent career entries and the new text", () => {
		const careerEvents = [
			makeEvent({ type: "career", entry: "Asked about a promotion" }),
			makeEvent({ type: "career", entry: "Signed up for a certification course" }),
		];
		expect(computeCareerFocus(careerEvents, "Coffee with my mentor about the promotion", extractor)).toEqual({
			growth: 1,
			learning: 2,
			challenges: 0,
			networking: 1,
			transitions: 0,
		});
	});

	it("only looks at the last five career entries", () => {
		const careerEvents = [
			makeEvent({ type: "career", entry: "Had an interview" }),
			...Array.from({ length: 5 }, () => makeEvent({ type: "career", entry: "Quiet day" })),
		];
		expect(computeCareerFocus(careerEvents, "", extractor).transitions).toBe(0);
	});
});
