/**
 * Error types raised by the journal store.
 *
 * Neither error ever reaches a report consumer: the analytics degrades to an
 * empty snapshot on StorageUnavailableError, and the store skips a record
 * that raises MalformedRecordError.
 */

/** The journal document exists but could not be read or parsed. */
export class StorageUnavailableError extends Error {
	readonly filePath: string;

	constructor(filePath: string, cause?: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
		super(`Journal store unavailable at ${filePath}: ${reason}`);
		this.name = "StorageUnavailableError";
		this.filePath = filePath;
	}
}

/** A stored event or goal lacks a field the analytics depends on. */
export class MalformedRecordError extends Error {
	readonly kind: "event" | "goal";
	readonly index: number;

	constructor(kind: "event" | "goal", index: number, reason: string) {
		super(`Malformed ${kind} at index ${index}: ${reason}`);
		this.name = "MalformedRecordError";
		this.kind = kind;
		this.index = index;
	}
}
