import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, readFileSync, writeFileSync } from "fs";
import { join } from "path";
import { StorageUnavailableError } from "../../../src/errors";
import { JsonJournalStore } from "../../../src/store/journal-store";
import { cleanupDir, createTestDir, fixedClock } from "../../fixtures/journal";

let dir: string;
let file: string;

function readRaw(): Record<string, unknown> {
	return JSON.parse(readFileSync(file, "utf-8"));
}

function writeRaw(doc: unknown): void {
	writeFileSync(file, JSON.stringify(doc), "utf-8");
}

beforeEach(() => {
	dir = createTestDir();
	file = join(dir, "life_memory.json");
});

afterEach(() => {
	cleanupDir(dir);
	vi.restoreAllMocks();
});

describe("JsonJournalStore reading", () => {
	it("treats a missing file as an empty journal without creating it", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		expect(store.loadSnapshot()).toEqual({ events: [], goals: [], patterns: {}, warnings: [] });
		expect(existsSync(file)).toBe(false);
	});

	it("throws StorageUnavailableError for a corrupt document", () => {
		writeFileSync(file, "{ not json", "utf-8");
		const store = new JsonJournalStore(file);
		expect(() => store.loadSnapshot()).toThrow(StorageUnavailableError);
		expect(() => store.addEvent("anything")).toThrow(StorageUnavailableError);
	});

	it("throws StorageUnavailableError when the root is not an object", () => {
		writeRaw([1, 2, 3]);
		expect(() => new JsonJournalStore(file).loadSnapshot()).toThrow(StorageUnavailableError);
	});

	it("skips malformed records with a warning", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		writeRaw({
			life_events: [
				{ date: "2025-06-10", entry: "Kept" },
				{ entry: "No date" },
				{ date: "tomorrow", entry: "Bad date" },
				"not an object",
			],
			goals: [{ goal: "" }, { goal: "Valid goal", status: "active" }],
		});

		const snapshot = new JsonJournalStore(file).loadSnapshot();
		expect(snapshot.events).toEqual([{ date: "2025-06-10", entry: "Kept", type: "general" }]);
		expect(snapshot.goals).toEqual([{ id: 2, text: "Valid goal", status: "active", progress: 0 }]);
		expect(warn).toHaveBeenCalledTimes(4);
	});

	it("reads date-time dates from older journals", () => {
		writeRaw({
			life_events: [{ id: 1, date: "2025-06-10T08:30:00.123456", entry: "Early start" }],
			goals: [{
				id: 3,
				goal: "Run a 10k",
				status: "completed",
				created_date: "2025-05-01T09:00:00",
				target_date: null,
				completed_date: "2025-06-01T18:00:00",
				progress: 100,
			}],
			patterns: { mood_trends: { data: { scores: [1], dates: ["2025-06-10"] }, last_updated: "2025-06-10T08:30:00" } },
			warnings: ["Old warning"],
		});

		expect(new JsonJournalStore(file).loadSnapshot()).toEqual({
			events: [{ date: "2025-06-10", timestamp: "2025-06-10T08:30:00.123456", entry: "Early start", type: "general" }],
			goals: [{
				id: 3,
				text: "Run a 10k",
				status: "completed",
				createdDate: "2025-05-01T09:00:00",
				completedDate: "2025-06-01T18:00:00",
				progress: 100,
			}],
			patterns: { mood_trends: { data: { scores: [1], dates: ["2025-06-10"] }, lastUpdated: "2025-06-10T08:30:00" } },
			warnings: ["Old warning"],
		});
	});
});

describe("JsonJournalStore events", () => {
	it("appends entries stamped with the local date and time", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		const event = store.addEvent("Happy day");

		expect(event).toEqual({ date: "2025-06-15", timestamp: "2025-06-15T12:00:00", entry: "Happy day", type: "general" });
		expect(store.loadSnapshot().events).toEqual([event]);
		expect(readRaw().life_events).toEqual([
			{ id: 1, date: "2025-06-15", entry: "Happy day", type: "general", timestamp: "2025-06-15T12:00:00" },
		]);
	});

	it("returns the most recent entries", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		store.addEvent("one");
		store.addEvent("two");
		store.addEvent("three", "career");
		expect(store.getRecentEvents(2).map((e) => e.entry)).toEqual(["two", "three"]);
		expect(store.getRecentEvents().length).toBe(3);
	});

	it("preserves unknown document keys and leaves no temp file", () => {
		writeRaw({ life_events: [], goals: [], patterns: {}, warnings: [], user_profile: { name: "Sam" } });
		new JsonJournalStore(file, { now: fixedClock }).addEvent("Still here");

		const raw = readRaw();
		expect(raw.user_profile).toEqual({ name: "Sam" });
		expect(raw.last_updated).toBe("2025-06-15T12:00:00");
		expect(existsSync(file + ".tmp")).toBe(false);
	});
});

describe("JsonJournalStore goals", () => {
	it("adds active goals with the next free id", () => {
		writeRaw({ goals: [{ id: 1, goal: "First" }, { id: 5, goal: "Fifth" }] });
		const store = new JsonJournalStore(file, { now: fixedClock });

		expect(store.addGoal("Learn Spanish", "2025-12-31")).toEqual({
			id: 6,
			text: "Learn Spanish",
			status: "active",
			createdDate: "2025-06-15T12:00:00",
			targetDate: "2025-12-31",
			progress: 0,
		});
		const goals = readRaw().goals;
		expect(Array.isArray(goals) && goals[2]).toEqual({
			id: 6,
			goal: "Learn Spanish",
			status: "active",
			created_date: "2025-06-15T12:00:00",
			target_date: "2025-12-31",
			progress: 0,
		});
	});

	it("rejects empty text and invalid target dates", () => {
		const store = new JsonJournalStore(file);
		expect(() => store.addGoal("   ")).toThrow("Goal text must not be empty");
		expect(() => store.addGoal("Travel", "next year")).toThrow('Invalid target date "next year"');
	});

	it("completes a goal", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		store.addGoal("Run a 10k");
		expect(store.completeGoal(1)).toEqual({
			id: 1,
			text: "Run a 10k",
			status: "completed",
			createdDate: "2025-06-15T12:00:00",
			completedDate: "2025-06-15T12:00:00",
			progress: 100,
		});
		expect(store.getActiveGoals()).toEqual([]);
	});

	it("returns null for an unknown goal id", () => {
		const store = new JsonJournalStore(file);
		expect(store.completeGoal(99)).toBeNull();
		expect(store.updateGoalProgress(99, 10)).toBeNull();
	});

	it("clamps progress to 0–100", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		store.addGoal("Write a novel");
		expect(store.updateGoalProgress(1, 150)?.progress).toBe(100);
		expect(store.updateGoalProgress(1, -5)?.progress).toBe(0);
		expect(store.updateGoalProgress(1, 40)?.status).toBe("active");
	});
});

describe("JsonJournalStore patterns, warnings and views", () => {
	it("stores patterns with their update time", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		store.writePattern("career_focus", { growth: 1 });
		expect(store.loadSnapshot().patterns).toEqual({
			career_focus: { data: { growth: 1 }, lastUpdated: "2025-06-15T12:00:00" },
		});
	});

	it("deduplicates warnings", () => {
		const store = new JsonJournalStore(file);
		expect(store.addWarning("Watch out")).toBe(true);
		expect(store.addWarning("Watch out")).toBe(false);
		expect(store.loadSnapshot().warnings).toEqual(["Watch out"]);
	});

	it("reports record counts", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		store.addEvent("one");
		store.addGoal("Goal A");
		store.addGoal("Goal B");
		store.completeGoal(2);
		store.writePattern("mood_trends", { scores: [], dates: [] });
		store.addWarning("Careful");
		expect(store.getStats()).toEqual({ totalEvents: 1, totalGoals: 2, activeGoals: 1, patternsTracked: 1, warnings: 1 });
	});

	it("exports the whole journal", () => {
		const store = new JsonJournalStore(file, { now: fixedClock });
		const event = store.addEvent("Exported");
		expect(store.exportData()).toEqual({
			events: [event],
			goals: [],
			patterns: {},
			exportTimestamp: "2025-06-15T12:00:00",
			version: "1.0",
		});
	});
});
