/**
 * Namespaced logging for Journal Insights.
 *
 * Library code should use these functions instead of raw console.* calls.
 */

const PREFIX = "Journal Insights";

let _debugEnabled = false;

/** Call after settings load to sync the debug gate. */
export function setDebugEnabled(enabled: boolean): void {
	_debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
	return _debugEnabled;
}

/** Debug-level logging — gated behind settings.debugMode. */
export function debug(...args: unknown[]): void {
	if (!_debugEnabled) return;
	console.debug(`${PREFIX}:`, ...args);
}

/** Warning-level logging — non-fatal issues worth investigating. */
export function warn(...args: unknown[]): void {
	console.warn(`${PREFIX}:`, ...args);
}

/** Error-level logging — unexpected failures. */
export function error(...args: unknown[]): void {
	console.error(`${PREFIX}:`, ...args);
}
