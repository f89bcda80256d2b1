import { describe, it, expect } from "vitest";
import { computeConsistencyScore, computeSummaryStats } from "../../../src/analyze/summary";
import { eventsOn, makeGoal } from "../../fixtures/journal";

describe("computeConsistencyScore", () => {
	it("loses ten points per day of average gap", () => {
		expect(computeConsistencyScore([1, 1])).toBe(90);
		expect(computeConsistencyScore([2])).toBe(80);
	});

	it("is 100 for same-day entries", () => {
		expect(computeConsistencyScore([0, 0])).toBe(100);
	});

	it("is clamped to zero", () => {
		expect(computeConsistencyScore([15])).toBe(0);
	});

	it("is 0 without any gaps", () => {
		expect(computeConsistencyScore([])).toBe(0);
	});

	it("never increases as the average gap grows", () => {
		const scores = [0, 1, 2, 5, 10, 20].map((gap) => computeConsistencyScore([gap]));
		for (let i = 1; i < scores.length; i++) {
			expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
		}
	});
});

describe("computeSummaryStats", () => {
	it("summarizes entries and goals", () => {
		const events = eventsOn([["2025-06-01", "a"], ["2025-06-08", "b"], ["2025-06-15", "c"]]);
		const goals = [makeGoal({ id: 1 }), makeGoal({ id: 2, status: "completed" })];
		expect(computeSummaryStats(events, goals)).toEqual({
			totalEntries: 3,
			totalGoals: 2,
			activeGoals: 1,
			daysTracked: 3,
			averageEntriesPerWeek: 1.5,
			consistencyScore: 30,
		});
	});

	it("returns zeros for an empty journal", () => {
		expect(computeSummaryStats([], [])).toEqual({
			totalEntries: 0,
			totalGoals: 0,
			activeGoals: 0,
			daysTracked: 0,
			averageEntriesPerWeek: 0,
			consistencyScore: 0,
		});
	});
});
