import * as fs from "fs";
import * as path from "path";
import * as log from "../log";
import { formatDate, formatLocalDateTime, parseCalendarDate } from "../analyze/dates";
import { lastN } from "../analyze/time-buckets";
import { MalformedRecordError, StorageUnavailableError } from "../errors";
import {
	Goal,
	JournalEvent,
	JournalExport,
	JournalSnapshot,
	MemoryStats,
	PatternRecord,
	PatternWriter,
	SnapshotSource,
} from "../types";
import {
	isRecord,
	normalizeEvent,
	normalizeGoal,
	normalizePattern,
	RawJournalDocument,
	RawRecord,
	toRawEvent,
	toRawGoal,
	toRawPattern,
} from "./records";

export const EXPORT_VERSION = "1.0";
export const DEFAULT_RECENT_EVENTS = 10;

export interface JsonJournalStoreOptions {
	/** Clock for entry dates and document timestamps. */
	now?: () => Date;
}

/**
 * Journal persisted as a single JSON document. Every call re-reads the file,
 * so separate store instances over the same path always agree. Writes go to
 * a sibling temp file that is then renamed over the document.
 */
export class JsonJournalStore implements SnapshotSource, PatternWriter {
	readonly filePath: string;
	private readonly now: () => Date;

	constructor(filePath: string, options: JsonJournalStoreOptions = {}) {
		this.filePath = filePath;
		this.now = options.now ?? (() => new Date());
	}

	// ── Reading ───────────────────────────────────────────

	loadSnapshot(): JournalSnapshot {
		const doc = this.readDocument();
		const patterns: Record<string, PatternRecord> = {};
		for (const [name, raw] of Object.entries(doc.patterns)) {
			patterns[name] = normalizePattern(raw);
		}
		return {
			events: collectRecords(doc.life_events, normalizeEvent),
			goals: collectRecords(doc.goals, normalizeGoal),
			patterns,
			warnings: doc.warnings.filter((w): w is string => typeof w === "string"),
		};
	}

	getRecentEvents(limit = DEFAULT_RECENT_EVENTS): JournalEvent[] {
		return lastN(this.loadSnapshot().events, limit);
	}

	getActiveGoals(): Goal[] {
		return this.loadSnapshot().goals.filter((g) => g.status === "active");
	}

	getStats(): MemoryStats {
		const snapshot = this.loadSnapshot();
		return {
			totalEvents: snapshot.events.length,
			totalGoals: snapshot.goals.length,
			activeGoals: snapshot.goals.filter((g) => g.status === "active").length,
			patternsTracked: Object.keys(snapshot.patterns).length,
			warnings: snapshot.warnings.length,
		};
	}

	exportData(): JournalExport {
		const snapshot = this.loadSnapshot();
		return {
			events: snapshot.events,
			goals: snapshot.goals,
			patterns: snapshot.patterns,
			exportTimestamp: formatLocalDateTime(this.now()),
			version: EXPORT_VERSION,
		};
	}

	// ── Writing ───────────────────────────────────────────

	addEvent(entry: string, type = "general"): JournalEvent {
		const now = this.now();
		const event: JournalEvent = {
			date: formatDate(now),
			timestamp: formatLocalDateTime(now),
			entry,
			type,
		};
		const doc = this.readDocument();
		doc.life_events.push(toRawEvent(event, doc.life_events.length + 1));
		this.writeDocument(doc);
		log.debug(`Recorded ${type} entry for ${event.date}`);
		return event;
	}

	addGoal(text: string, targetDate?: string): Goal {
		const goalText = text.trim();
		if (!goalText) throw new Error("Goal text must not be empty");
		if (targetDate !== undefined && !parseCalendarDate(targetDate)) {
			throw new Error(`Invalid target date "${targetDate}", expected YYYY-MM-DD`);
		}

		const doc = this.readDocument();
		const existing = collectRecords(doc.goals, normalizeGoal);
		const goal: Goal = {
			id: existing.reduce((max, g) => Math.max(max, g.id), 0) + 1,
			text: goalText,
			status: "active",
			createdDate: formatLocalDateTime(this.now()),
			progress: 0,
		};
		if (targetDate !== undefined) goal.targetDate = targetDate;

		doc.goals.push(toRawGoal(goal));
		this.writeDocument(doc);
		return goal;
	}

	/** Mark a goal completed. Returns null when no goal has that id. */
	completeGoal(id: number): Goal | null {
		return this.updateGoal(id, (raw) => {
			raw.status = "completed";
			raw.progress = 100;
			raw.completed_date = formatLocalDateTime(this.now());
		});
	}

	/** Set progress, clamped to 0–100. Returns null when no goal has that id. */
	updateGoalProgress(id: number, progress: number): Goal | null {
		if (!Number.isFinite(progress)) throw new Error(`Invalid progress value: ${progress}`);
		return this.updateGoal(id, (raw) => {
			raw.progress = Math.min(100, Math.max(0, progress));
		});
	}

	/** Append a warning unless the same text is already stored. */
	addWarning(text: string): boolean {
		const doc = this.readDocument();
		if (doc.warnings.includes(text)) return false;
		doc.warnings.push(text);
		this.writeDocument(doc);
		return true;
	}

	writePattern(name: string, data: unknown): void {
		const doc = this.readDocument();
		doc.patterns[name] = toRawPattern(data, formatLocalDateTime(this.now()));
		this.writeDocument(doc);
	}

	// ── Document I/O ──────────────────────────────────────

	private updateGoal(id: number, mutate: (raw: RawRecord) => void): Goal | null {
		const doc = this.readDocument();
		for (let i = 0; i < doc.goals.length; i++) {
			const raw = doc.goals[i];
			if (!isRecord(raw)) continue;
			let goal: Goal;
			try {
				goal = normalizeGoal(raw, i);
			} catch (e) {
				if (e instanceof MalformedRecordError) continue;
				throw e;
			}
			if (goal.id !== id) continue;

			mutate(raw);
			this.writeDocument(doc);
			return normalizeGoal(raw, i);
		}
		return null;
	}

	private emptyDocument(): RawJournalDocument {
		const stamp = formatLocalDateTime(this.now());
		return {
			life_events: [],
			goals: [],
			patterns: {},
			warnings: [],
			created_at: stamp,
			last_updated: stamp,
		};
	}

	private readDocument(): RawJournalDocument {
		if (!fs.existsSync(this.filePath)) return this.emptyDocument();

		let parsed: unknown;
		try {
			parsed = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
		} catch (e) {
			throw new StorageUnavailableError(this.filePath, e);
		}
		if (!isRecord(parsed)) {
			throw new StorageUnavailableError(this.filePath, "document root is not an object");
		}

		return {
			...parsed,
			life_events: Array.isArray(parsed.life_events) ? parsed.life_events : [],
			goals: Array.isArray(parsed.goals) ? parsed.goals : [],
			patterns: isRecord(parsed.patterns) ? parsed.patterns : {},
			warnings: Array.isArray(parsed.warnings) ? parsed.warnings : [],
		};
	}

	private writeDocument(doc: RawJournalDocument): void {
		doc.last_updated = formatLocalDateTime(this.now());
		const tmp = this.filePath + ".tmp";
		try {
			fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
			fs.writeFileSync(tmp, JSON.stringify(doc, null, 2) + "\n", "utf-8");
			fs.renameSync(tmp, this.filePath);
		} catch (e) {
			throw new StorageUnavailableError(this.filePath, e);
		}
	}
}

/** Normalize each raw record, skipping (and logging) malformed ones. */
function collectRecords<T>(raws: readonly unknown[], normalize: (raw: unknown, index: number) => T): T[] {
	const records: T[] = [];
	raws.forEach((raw, index) => {
		try {
			records.push(normalize(raw, index));
		} catch (e) {
			if (!(e instanceof MalformedRecordError)) throw e;
			log.warn(`Skipping record: ${e.message}`);
		}
	});
	return records;
}
