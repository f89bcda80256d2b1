import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { join } from "path";
import {
	CAREER_NEXT_STEPS,
	DEFAULT_SKILL_RECOMMENDATION,
	NOT_ENOUGH_CAREER_HISTORY,
} from "../../src/analyze/career";
import { memorySummary, recordEntry } from "../../src/journal";
import { JsonJournalStore } from "../../src/store/journal-store";
import { cleanupDir, createTestDir, fixedClock } from "../fixtures/journal";

const WARNING = "Pattern detected: Multiple negative mood indicators in recent entries (2025-06-15)";

let dir: string;
let store: JsonJournalStore;

beforeEach(() => {
	dir = createTestDir();
	store = new JsonJournalStore(join(dir, "life_memory.json"), { now: fixedClock });
});

afterEach(() => {
	cleanupDir(dir);
	vi.restoreAllMocks();
});

describe("recordEntry", () => {
	it("appends the entry and starts the mood trend", () => {
		const result = recordEntry(store, "Feeling happy today");

		expect(result).toEqual({
			event: { date: "2025-06-15", timestamp: "2025-06-15T12:00:00", entry: "Feeling happy today", type: "general" },
			moodScore: 1,
			warning: null,
			career: null,
		});
		expect(store.loadSnapshot().patterns.mood_trends.data).toEqual({ scores: [1], dates: ["2025-06-15"] });
	});

	it("raises the concerning-mood warning once after five negative entries", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const warnings = Array.from({ length: 6 }, () => recordEntry(store, "Feeling sad").warning);

		expect(warnings).toEqual([null, null, null, null, WARNING, null]);
		expect(store.loadSnapshot().warnings).toEqual([WARNING]);
		expect(warn).toHaveBeenCalledTimes(1);
	});

	it("returns starter career advice for a first career entry", () => {
		const result = recordEntry(store, "Weekly sync with my mentor", { type: "career" });

		expect(result.career).toEqual({
			insights: [NOT_ENOUGH_CAREER_HISTORY],
			skillRecommendations: [DEFAULT_SKILL_RECOMMENDATION],
			nextSteps: [...CAREER_NEXT_STEPS],
		});
	});

	it("refreshes career focus and advice from recent career entries", () => {
		recordEntry(store, "Weekly sync with my mentor", { type: "career" });
		recordEntry(store, "Took a training course", { type: "career" });
		const result = recordEntry(store, "Interview for a new role", { type: "career" });

		expect(store.loadSnapshot().patterns.career_focus.data).toEqual({
			growth: 0,
			learning: 2,
			challenges: 0,
			networking: 1,
			transitions: 1,
		});
		expect(result.career?.insights).toEqual([
			"Active career development - regular professional updates",
			"Positive career trajectory detected",
		]);
		expect(result.career?.skillRecommendations).toEqual([DEFAULT_SKILL_RECOMMENDATION]);
	});

	it("keeps the entry when pattern tracking fails", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		vi.spyOn(store, "writePattern").mockImplementation(() => {
			throw new Error("disk full");
		});

		const result = recordEntry(store, "Feeling happy today");
		expect(result.moodScore).toBeNull();
		expect(store.loadSnapshot().events).toHaveLength(1);
		expect(error).toHaveBeenCalledTimes(1);
	});
});

describe("memorySummary", () => {
	it("keeps the last five entries and last three warnings", () => {
		for (let i = 1; i <= 7; i++) {
			store.addEvent(`Entry ${i}`);
		}
		for (const text of ["first", "second", "third", "fourth"]) {
			store.addWarning(text);
		}
		store.addGoal("Run a marathon");

		const summary = memorySummary(store);
		expect(summary.totalEvents).toBe(7);
		expect(summary.recentEvents.map((e) => e.entry)).toEqual(["Entry 3", "Entry 4", "Entry 5", "Entry 6", "Entry 7"]);
		expect(summary.warnings).toEqual(["second", "third", "fourth"]);
		expect(summary.totalGoals).toBe(1);
		expect(summary.activeGoals.map((g) => g.text)).toEqual(["Run a marathon"]);
	});
});
