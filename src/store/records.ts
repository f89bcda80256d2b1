/**
 * Conversion between the on-disk journal layout and the in-memory records.
 *
 * The document keeps the field names older journals were written with
 * (`life_events`, `goal`, `created_date`, ...). Readers tolerate extra
 * fields; the analytics only ever sees normalized records.
 */

import { formatDate, parseLocalDateTime } from "../analyze/dates";
import { MalformedRecordError } from "../errors";
import { Goal, JournalEvent, PatternRecord } from "../types";

export type RawRecord = Record<string, unknown>;

export interface RawJournalDocument {
	life_events: unknown[];
	goals: unknown[];
	patterns: Record<string, unknown>;
	warnings: unknown[];
	/** created_at, last_updated, user_profile and anything else stored. */
	[key: string]: unknown;
}

export function isRecord(value: unknown): value is RawRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
	return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/**
 * Normalize a stored event. `date` may be a calendar date or a full
 * date-time; a date-time doubles as the timestamp when none is stored.
 */
export function normalizeEvent(raw: unknown, index: number): JournalEvent {
	if (!isRecord(raw)) throw new MalformedRecordError("event", index, "not an object");

	const entry = raw.entry;
	if (typeof entry !== "string") throw new MalformedRecordError("event", index, "missing entry text");

	const rawDate = optionalString(raw.date);
	if (!rawDate) throw new MalformedRecordError("event", index, "missing date");
	const moment = parseLocalDateTime(rawDate);
	if (!moment) throw new MalformedRecordError("event", index, `unparseable date "${rawDate}"`);

	const storedTimestamp = optionalString(raw.timestamp);
	const timestamp = storedTimestamp && parseLocalDateTime(storedTimestamp)
		? storedTimestamp
		: rawDate.length > 10 ? rawDate : undefined;

	const event: JournalEvent = {
		date: formatDate(moment),
		entry,
		type: optionalString(raw.type) ?? "general",
	};
	if (timestamp) event.timestamp = timestamp;
	return event;
}

function clampProgress(value: unknown): number {
	const n = typeof value === "number" ? value : Number(value);
	if (!Number.isFinite(n)) return 0;
	return Math.min(100, Math.max(0, n));
}

export function normalizeGoal(raw: unknown, index: number): Goal {
	if (!isRecord(raw)) throw new MalformedRecordError("goal", index, "not an object");

	const text = optionalString(raw.goal) ?? optionalString(raw.text);
	if (!text) throw new MalformedRecordError("goal", index, "missing goal text");

	const id = typeof raw.id === "number" && Number.isInteger(raw.id) ? raw.id : index + 1;

	const goal: Goal = {
		id,
		text,
		status: optionalString(raw.status) ?? "active",
		progress: clampProgress(raw.progress ?? 0),
	};
	const createdDate = optionalString(raw.created_date);
	const targetDate = optionalString(raw.target_date);
	const completedDate = optionalString(raw.completed_date);
	if (createdDate) goal.createdDate = createdDate;
	if (targetDate) goal.targetDate = targetDate;
	if (completedDate) goal.completedDate = completedDate;
	return goal;
}

/** Stored patterns are `{ data, last_updated }`; bare values are wrapped. */
export function normalizePattern(raw: unknown): PatternRecord {
	if (isRecord(raw) && "data" in raw) {
		return { data: raw.data, lastUpdated: optionalString(raw.last_updated) ?? "" };
	}
	return { data: raw, lastUpdated: "" };
}

export function toRawEvent(event: JournalEvent, id: number): RawRecord {
	const raw: RawRecord = { id, date: event.date, entry: event.entry, type: event.type };
	if (event.timestamp) raw.timestamp = event.timestamp;
	return raw;
}

export function toRawGoal(goal: Goal): RawRecord {
	return {
		id: goal.id,
		goal: goal.text,
		status: goal.status,
		created_date: goal.createdDate ?? null,
		target_date: goal.targetDate ?? null,
		progress: goal.progress,
	};
}

export function toRawPattern(data: unknown, lastUpdated: string): RawRecord {
	return { data, last_updated: lastUpdated };
}
