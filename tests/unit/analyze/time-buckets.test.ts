import { describe, it, expect } from "vitest";
import {
	countByMonth,
	countTrackedDays,
	gapsInDays,
	groupByWeek,
	lastN,
	latestEventDay,
	weeksSpanned,
} from "../../../src/analyze/time-buckets";
import { formatDate } from "../../../src/analyze/dates";
import { eventsOn, makeEvent } from "../../fixtures/journal";

describe("gapsInDays", () => {
	it("sorts before measuring gaps", () => {
		const events = eventsOn([["2025-06-10", "b"], ["2025-06-01", "a"], ["2025-06-15", "c"]]);
		expect(gapsInDays(events)).toEqual([9, 5]);
	});

	it("is empty for fewer than two entries", () => {
		expect(gapsInDays([])).toEqual([]);
		expect(gapsInDays([makeEvent()])).toEqual([]);
	});

	it("skips undated events", () => {
		const events = [makeEvent({ date: "2025-06-10" }), makeEvent({ date: "not a date" }), makeEvent({ date: "2025-06-12" })];
		expect(gapsInDays(events)).toEqual([2]);
	});
});

describe("countTrackedDays", () => {
	it("counts unique calendar days", () => {
		const events = eventsOn([["2025-06-10", "a"], ["2025-06-10", "b"], ["2025-06-12", "c"]]);
		expect(countTrackedDays(events)).toBe(2);
	});
});

describe("weeksSpanned", () => {
	it("divides the first-to-last span by seven", () => {
		expect(weeksSpanned(eventsOn([["2025-06-15", "b"], ["2025-06-01", "a"]]))).toBe(2);
	});

	it("is 0 for a single entry", () => {
		expect(weeksSpanned([makeEvent()])).toBe(0);
	});
});

describe("latestEventDay", () => {
	it("returns the most recent day regardless of order", () => {
		const latest = latestEventDay(eventsOn([["2025-06-15", "b"], ["2025-06-01", "a"]]));
		expect(latest && formatDate(latest)).toBe("2025-06-15");
	});

	it("is null for an empty journal", () => {
		expect(latestEventDay([])).toBeNull();
	});
});

describe("groupByWeek", () => {
	it("returns weeks in order with entries in input order", () => {
		const events = eventsOn([
			["2025-06-14", "sat"],
			["2025-06-15", "sun"],
			["2025-06-09", "mon"],
		]);
		const weeks = groupByWeek(events, (e) => e.entry);
		expect([...weeks.entries()]).toEqual([
			["2025-W23", ["sat", "mon"]],
			["2025-W24", ["sun"]],
		]);
	});
});

describe("countByMonth", () => {
	it("counts entries per month", () => {
		const events = eventsOn([["2025-06-01", "a"], ["2025-05-31", "b"], ["2025-06-02", "c"]]);
		expect(countByMonth(events)).toEqual({ "2025-05": 1, "2025-06": 2 });
	});
});

describe("lastN", () => {
	it("keeps the tail", () => {
		expect(lastN([1, 2, 3], 2)).toEqual([2, 3]);
		expect(lastN([1], 5)).toEqual([1]);
	});

	it("is empty for a zero window", () => {
		expect(lastN([1, 2, 3], 0)).toEqual([]);
	});
});
